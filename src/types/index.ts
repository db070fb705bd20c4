/**
 * Type definitions for the Context Switch Tracker
 */

// ============================================
// Jira API Types
// ============================================

/**
 * Jira user reference as returned on the assignee field
 */
export interface JiraUser {
  displayName?: string | null;
  name?: string | null;
  accountId?: string | null;
}

/**
 * Jira component reference
 */
export interface JiraComponent {
  name?: string | null;
}

/**
 * Fields requested from the search API. The story points field and the
 * classification custom field are configured by id, so they are only
 * reachable through the index signature.
 */
export interface JiraIssueFields {
  assignee?: JiraUser | null;
  labels?: string[] | null;
  components?: JiraComponent[] | null;
  status?: { name?: string | null } | null;
  updated?: string | null;
  [fieldId: string]: unknown;
}

/**
 * Raw Jira issue from API
 */
export interface JiraIssue {
  key?: string | null;
  fields: JiraIssueFields;
}

/**
 * One page of the /rest/api/3/search/jql endpoint
 */
export interface JiraSearchPage {
  issues: JiraIssue[];
  nextPageToken?: string | null;
  isLast?: boolean;
}

// ============================================
// Classification Types
// ============================================

/**
 * Where an issue's category is read from
 */
export type CategorySource = "labels" | "components" | "customfield";

/**
 * Custom field value, resolved once from whatever shape Jira returned
 */
export type CustomFieldValue =
  | { kind: "option"; value: string | null; name: string | null }
  | { kind: "list"; first: CustomFieldValue }
  | { kind: "scalar"; text: string }
  | { kind: "absent" };

/**
 * Issue attributes the category resolver looks at
 */
export interface CategoryInput {
  labels: string[];
  components: string[];
  customField: CustomFieldValue;
}

// ============================================
// Normalized Types
// ============================================

/**
 * One issue, flattened for aggregation
 */
export interface NormalizedRow {
  contributor: string;
  ticket: string;
  category: string;
  status: string;
  /** Local calendar date, YYYY-MM-DD */
  day: string;
  project: string;
  storyPoints: number;
}

export interface NormalizationResult {
  rows: NormalizedRow[];
  /** Keys of issues dropped because `updated` could not be parsed */
  dropped: string[];
}

// ============================================
// Aggregation Types
// ============================================

export interface CategoryCount {
  contributor: string;
  category: string;
  tickets: number;
}

export interface DailyBreadth {
  contributor: string;
  day: string;
  distinctCategories: number;
  /** 1 when more than one category was touched that day */
  switched: 0 | 1;
}

export interface ContributorSummary {
  contributor: string;
  /** Ticket count per display column, zero-filled */
  counts: Record<string, number>;
  total: number;
  contextSwitchDays: number;
}

export interface StatusCount {
  status: string;
  tickets: number;
}

export interface AggregationResult {
  /** Display columns in order: primary categories, then the catch-all */
  columns: string[];
  categoryCounts: CategoryCount[];
  dailyBreadth: DailyBreadth[];
  contributorSummary: ContributorSummary[];
  statusDistribution: StatusCount[];
}

// ============================================
// Efficiency Types
// ============================================

/**
 * Contributor display name to leave days within the period
 */
export type LeaveAdjustments = ReadonlyMap<string, number>;

/**
 * Project key to expected story points per working day
 */
export type ProjectThroughputRules = Readonly<Record<string, number>>;

export interface EfficiencyRecord {
  contributor: string;
  project: string;
  completedPoints: number;
  expectedPoints: number;
  /** Percentage, rounded to two decimals */
  efficiency: number;
  leaveDays: number;
  workingDays: number;
}

export interface ExcludedEfficiencyGroup {
  contributor: string;
  project: string;
  completedPoints: number;
  reason: string;
}

export interface EfficiencyReport {
  records: EfficiencyRecord[];
  excluded: ExcludedEfficiencyGroup[];
  /** False when any group was excluded for lack of a throughput rule */
  complete: boolean;
}

// ============================================
// Workflow Types
// ============================================

export type WeekScope = "current" | "previous";

export interface WorkloadAnalysis {
  normalization: NormalizationResult;
  aggregation: AggregationResult;
  efficiency: EfficiencyReport;
}
