import type {
  JiraIssue,
  JiraIssueFields,
  NormalizationResult,
  NormalizedRow,
} from "../types";
import { CategorizationService } from "./categorization-service";
import { parseCustomFieldValue } from "../utils/custom-field";
import { parseJiraTimestamp, toLocalDay } from "../utils/date-utils";

export const UNASSIGNED = "Unassigned";
export const UNKNOWN = "Unknown";

/**
 * Settings the normalizer needs from the analysis configuration
 */
export interface NormalizationOptions {
  /** Known ticket key prefixes, matched case-sensitively in order */
  projectKeys: string[];
  storyPointsField: string;
  customFieldId: string;
}

/**
 * Service that flattens raw Jira issues into rows ready for aggregation
 */
export class NormalizationService {
  constructor(
    private readonly categorizationService: CategorizationService,
    private readonly options: NormalizationOptions
  ) {}

  /**
   * Normalizes a fetched issue list. Issues whose `updated` timestamp cannot
   * be parsed produce no row and are listed in `dropped`.
   */
  normalize(issues: JiraIssue[]): NormalizationResult {
    const rows: NormalizedRow[] = [];
    const dropped: string[] = [];

    issues.forEach((issue) => {
      const row = this.toRow(issue);
      if (row) {
        rows.push(row);
      } else {
        dropped.push(issue.key ?? UNKNOWN);
      }
    });

    return { rows, dropped };
  }

  private toRow(issue: JiraIssue): NormalizedRow | null {
    const { fields } = issue;

    const updated = parseJiraTimestamp(fields.updated);
    if (!updated) {
      return null;
    }

    const category = this.categorizationService.resolveCategory({
      labels: Array.isArray(fields.labels)
        ? fields.labels.filter((label): label is string => typeof label === "string")
        : [],
      components: Array.isArray(fields.components)
        ? fields.components.map((component) =>
            typeof component?.name === "string" ? component.name : ""
          )
        : [],
      customField: this.options.customFieldId
        ? parseCustomFieldValue(fields[this.options.customFieldId])
        : parseCustomFieldValue(undefined),
    });

    return {
      contributor: this.resolveContributor(fields),
      ticket: issue.key ?? UNKNOWN,
      category,
      status: this.resolveStatus(fields),
      day: toLocalDay(updated),
      project: this.deriveProject(issue.key),
      storyPoints: this.readStoryPoints(fields),
    };
  }

  /**
   * Display name, then account name, then account id
   */
  private resolveContributor(fields: JiraIssueFields): string {
    const { assignee } = fields;
    if (!assignee) {
      return UNASSIGNED;
    }
    const candidates = [assignee.displayName, assignee.name, assignee.accountId];
    return (
      candidates.find(
        (candidate): candidate is string => typeof candidate === "string" && candidate !== ""
      ) ?? UNASSIGNED
    );
  }

  /**
   * Status name as given, including an empty one; Unknown only when missing
   */
  private resolveStatus(fields: JiraIssueFields): string {
    const name = fields.status?.name;
    return typeof name === "string" ? name : UNKNOWN;
  }

  /**
   * Project from the ticket key: a known prefix if one matches, otherwise
   * the first three characters of the key
   */
  deriveProject(key: string | null | undefined): string {
    if (!key) {
      return UNKNOWN;
    }
    const known = this.options.projectKeys.find((prefix) => key.startsWith(prefix));
    return known ?? key.slice(0, 3);
  }

  private readStoryPoints(fields: JiraIssueFields): number {
    const raw = fields[this.options.storyPointsField];
    const points = typeof raw === "string" ? Number(raw) : raw;

    if (typeof points !== "number" || !Number.isFinite(points) || points < 0) {
      return 0;
    }
    return points;
  }
}
