import type {
  AggregationResult,
  CategoryCount,
  ContributorSummary,
  DailyBreadth,
  NormalizedRow,
  StatusCount,
} from "../types";

/**
 * Groups values by a string key, keeping first-seen order
 */
function groupBy<T>(items: T[], keyOf: (item: T) => string): Map<string, T[]> {
  const grouped = new Map<string, T[]>();

  for (const item of items) {
    const key = keyOf(item);
    const existing = grouped.get(key) || [];
    existing.push(item);
    grouped.set(key, existing);
  }

  return grouped;
}

const byText = (a: string, b: string): number => a.localeCompare(b);

/**
 * Service that derives the summary tables from normalized rows.
 * Every table is recomputed from the rows on each call.
 */
export class AggregationService {
  /**
   * @param columns - Display columns in order, ending with the catch-all
   */
  constructor(private readonly columns: string[]) {}

  /**
   * Builds all summary tables for one analysis run
   */
  aggregate(rows: NormalizedRow[]): AggregationResult {
    const categoryCounts = this.countByCategory(rows);
    const dailyBreadth = this.computeDailyBreadth(rows);

    return {
      columns: [...this.columns],
      categoryCounts,
      dailyBreadth,
      contributorSummary: this.summarizeContributors(categoryCounts, dailyBreadth),
      statusDistribution: this.countByStatus(rows),
    };
  }

  /**
   * Tickets per contributor per category
   */
  countByCategory(rows: NormalizedRow[]): CategoryCount[] {
    const grouped = groupBy(rows, (row) => JSON.stringify([row.contributor, row.category]));

    return [...grouped.values()]
      .map((group) => ({
        contributor: group[0].contributor,
        category: group[0].category,
        tickets: group.length,
      }))
      .sort(
        (a, b) => byText(a.contributor, b.contributor) || byText(a.category, b.category)
      );
  }

  /**
   * Distinct categories per contributor per day, flagging switch days
   */
  computeDailyBreadth(rows: NormalizedRow[]): DailyBreadth[] {
    const grouped = groupBy(rows, (row) => JSON.stringify([row.contributor, row.day]));

    return [...grouped.values()]
      .map((group): DailyBreadth => {
        const distinctCategories = new Set(group.map((row) => row.category)).size;
        return {
          contributor: group[0].contributor,
          day: group[0].day,
          distinctCategories,
          switched: distinctCategories > 1 ? 1 : 0,
        };
      })
      .sort((a, b) => byText(a.contributor, b.contributor) || byText(a.day, b.day));
  }

  /**
   * Pivots category counts into one row per contributor and joins the
   * number of switch days. Categories outside the display columns are not
   * counted in the pivot.
   */
  summarizeContributors(
    categoryCounts: CategoryCount[],
    dailyBreadth: DailyBreadth[]
  ): ContributorSummary[] {
    const switchDays = new Map<string, number>();
    for (const entry of dailyBreadth) {
      switchDays.set(entry.contributor, (switchDays.get(entry.contributor) ?? 0) + entry.switched);
    }

    const byContributor = groupBy(categoryCounts, (entry) => entry.contributor);

    return [...byContributor.entries()]
      .map(([contributor, entries]) => {
        const counts: Record<string, number> = {};
        for (const column of this.columns) {
          counts[column] = 0;
        }
        for (const entry of entries) {
          if (Object.prototype.hasOwnProperty.call(counts, entry.category)) {
            counts[entry.category] += entry.tickets;
          }
        }

        return {
          contributor,
          counts,
          total: this.columns.reduce((sum, column) => sum + counts[column], 0),
          contextSwitchDays: switchDays.get(contributor) ?? 0,
        };
      })
      .sort((a, b) => byText(a.contributor, b.contributor));
  }

  /**
   * Tickets per status, most common first
   */
  countByStatus(rows: NormalizedRow[]): StatusCount[] {
    return [...groupBy(rows, (row) => row.status).entries()]
      .map(([status, group]) => ({ status, tickets: group.length }))
      .sort((a, b) => b.tickets - a.tickets || byText(a.status, b.status));
  }
}
