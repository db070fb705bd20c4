import type {
  EfficiencyRecord,
  EfficiencyReport,
  ExcludedEfficiencyGroup,
  LeaveAdjustments,
  NormalizedRow,
  ProjectThroughputRules,
} from "../types";

/**
 * Settings the calculator needs from the analysis configuration
 */
export interface EfficiencyOptions {
  throughputRules: ProjectThroughputRules;
  /** Days in the analysis period before leave is subtracted */
  periodDays: number;
}

/**
 * Rounds a percentage to two decimal places
 */
export function roundPercentage(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Service computing completed versus expected story points per contributor
 * and project
 */
export class EfficiencyService {
  constructor(private readonly options: EfficiencyOptions) {}

  /**
   * Calculates one efficiency record per (contributor, project) pair in the rows.
   * Pairs whose project has no throughput rule are listed in `excluded`
   * instead of being scored against a default.
   * @param rows - Normalized rows for the period
   * @param leave - Leave days per contributor; missing contributors have none
   */
  calculate(rows: NormalizedRow[], leave: LeaveAdjustments): EfficiencyReport {
    const completedByGroup = new Map<
      string,
      { contributor: string; project: string; completedPoints: number }
    >();

    for (const row of rows) {
      const key = JSON.stringify([row.contributor, row.project]);
      const group = completedByGroup.get(key) ?? {
        contributor: row.contributor,
        project: row.project,
        completedPoints: 0,
      };
      group.completedPoints += row.storyPoints;
      completedByGroup.set(key, group);
    }

    const records: EfficiencyRecord[] = [];
    const excluded: ExcludedEfficiencyGroup[] = [];

    for (const group of completedByGroup.values()) {
      const perDay = this.pointsPerDay(group.project);

      if (perDay === null) {
        excluded.push({
          ...group,
          reason: `No throughput rule configured for project ${group.project}`,
        });
        continue;
      }

      const leaveDays = leave.get(group.contributor) ?? 0;
      const workingDays = Math.max(0, this.options.periodDays - leaveDays);
      const expectedPoints = workingDays * perDay;

      records.push({
        contributor: group.contributor,
        project: group.project,
        completedPoints: group.completedPoints,
        expectedPoints,
        efficiency: this.computeEfficiency(group.completedPoints, expectedPoints),
        leaveDays,
        workingDays,
      });
    }

    const order = (
      a: { contributor: string; project: string },
      b: { contributor: string; project: string }
    ): number =>
      a.contributor.localeCompare(b.contributor) || a.project.localeCompare(b.project);

    return {
      records: records.sort(order),
      excluded: excluded.sort(order),
      complete: excluded.length === 0,
    };
  }

  /**
   * Efficiency percentage. With nothing expected, any completed work counts
   * as 100% and no work as 0%.
   */
  computeEfficiency(completedPoints: number, expectedPoints: number): number {
    if (expectedPoints > 0) {
      return roundPercentage((completedPoints / expectedPoints) * 100);
    }
    return completedPoints > 0 ? 100 : 0;
  }

  private pointsPerDay(project: string): number | null {
    const rules = this.options.throughputRules;
    return Object.prototype.hasOwnProperty.call(rules, project) ? rules[project] : null;
  }
}
