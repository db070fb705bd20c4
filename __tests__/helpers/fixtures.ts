import type { JiraIssue, JiraIssueFields, NormalizedRow } from "../../src/types";
import type { AnalysisConfig } from "../../src/config/analysis.config";

export const analysisConfig: AnalysisConfig = {
  projectKeys: ["YTCS", "DS"],
  statuses: ["DEV READY", "QA RELEASE", "DONE"],
  categorySource: "labels",
  customFieldId: "customfield_20000",
  categories: ["VL", "CS", "POC"],
  storyPointsField: "customfield_10026",
  throughputRules: { YTCS: 3, DS: 2 },
  periodDays: 5,
};

/**
 * Builds a raw issue with sensible defaults; `updated` is noon UTC so the
 * local day is the same in every timezone between UTC-11 and UTC+11
 */
export function makeIssue(
  key: string | null,
  fields: Partial<JiraIssueFields> = {}
): JiraIssue {
  return {
    key,
    fields: {
      assignee: { displayName: "Alice" },
      labels: [],
      components: [],
      status: { name: "DONE" },
      updated: "2024-03-04T12:00:00.000+0000",
      ...fields,
    },
  };
}

export function makeRow(overrides: Partial<NormalizedRow> = {}): NormalizedRow {
  return {
    contributor: "Alice",
    ticket: "YTCS-1",
    category: "VL",
    status: "DONE",
    day: "2024-03-04",
    project: "YTCS",
    storyPoints: 0,
    ...overrides,
  };
}
