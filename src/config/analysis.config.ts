import type { CategorySource, ProjectThroughputRules } from "../types";
import {
  getOptional,
  parseList,
  parsePositiveInt,
  parseThroughputRules,
} from "../utils/validation";

/**
 * Category assigned when no primary category matches
 */
export const CATCH_ALL_CATEGORY = "OTHERS";

const CATEGORY_SOURCES: readonly CategorySource[] = [
  "labels",
  "components",
  "customfield",
];

/**
 * Classification and efficiency settings
 */
export interface AnalysisConfig {
  /** Projects to fetch; also the known ticket key prefixes */
  projectKeys: string[];
  /** Statuses kept by the upstream search filter */
  statuses: string[];
  /** Null when CATEGORY_SOURCE names no known source */
  categorySource: CategorySource | null;
  customFieldId: string;
  /** Primary categories, uppercased, in match order */
  categories: string[];
  storyPointsField: string;
  throughputRules: ProjectThroughputRules;
  /** Working days in one analysis period */
  periodDays: number;
}

/**
 * Narrows a raw CATEGORY_SOURCE value to a known source
 */
export function parseCategorySource(raw: string): CategorySource | null {
  const normalized = raw.trim().toLowerCase();
  return CATEGORY_SOURCES.find((source) => source === normalized) ?? null;
}

/**
 * Lists configuration problems that degrade classification to the
 * catch-all without stopping the run
 */
export function describeClassificationIssues(config: AnalysisConfig): string[] {
  const issues: string[] = [];

  if (config.categorySource === null) {
    issues.push(
      `Unknown CATEGORY_SOURCE "${process.env.CATEGORY_SOURCE ?? ""}"; every ticket will be classified as ${CATCH_ALL_CATEGORY}`
    );
  } else if (config.categorySource === "customfield" && !config.customFieldId) {
    issues.push(
      `CATEGORY_SOURCE is customfield but CATEGORY_CUSTOMFIELD_ID is empty; every ticket will be classified as ${CATCH_ALL_CATEGORY}`
    );
  }

  if (config.categories.length === 0) {
    issues.push("CATEGORIES is empty; only the catch-all category is available");
  }

  return issues;
}

/**
 * Retrieves and validates analysis configuration from environment variables
 */
export function getAnalysisConfig(): AnalysisConfig {
  const projectKeys = parseList(
    getOptional(process.env.JIRA_PROJECT_KEYS, "YTCS,DS")
  );

  if (projectKeys.length === 0) {
    throw new Error("JIRA_PROJECT_KEYS must name at least one project");
  }

  const statuses = parseList(
    getOptional(process.env.JIRA_STATUSES, "DEV READY,QA RELEASE,DONE")
  );

  const categorySource = parseCategorySource(
    getOptional(process.env.CATEGORY_SOURCE, "labels")
  );

  const customFieldId = getOptional(process.env.CATEGORY_CUSTOMFIELD_ID, "").trim();

  // Uppercase once so label, component and field values compare directly
  const categories = parseList(
    getOptional(process.env.CATEGORIES, "VL,CS,POC,ClipFlow")
  ).map((category) => category.toUpperCase());

  const storyPointsField = getOptional(
    process.env.STORY_POINTS_FIELD,
    "customfield_10026"
  ).trim();

  const throughputRules = parseThroughputRules(
    getOptional(process.env.PROJECT_THROUGHPUT, "YTCS=3,DS=2")
  );

  const periodDays = parsePositiveInt(
    "PERIOD_DAYS",
    getOptional(process.env.PERIOD_DAYS, "5")
  );

  return {
    projectKeys,
    statuses,
    categorySource,
    customFieldId,
    categories,
    storyPointsField,
    throughputRules,
    periodDays,
  };
}
