import chalk from "chalk";
import type {
  AggregationResult,
  CategoryCount,
  DailyBreadth,
  EfficiencyReport,
  StatusCount,
} from "../types";
import { formatDayLabel } from "./date-utils";

type Cell = string | number;

/**
 * Lays out rows as fixed-width text columns. Text is left-aligned and
 * numbers right-aligned.
 * @returns One string per line: header, separator, then the rows
 */
export function formatTable(headers: string[], rows: Cell[][]): string[] {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map((row) => String(row[i] ?? "").length))
  );

  const formatRow = (row: Cell[]): string =>
    row
      .map((cell, i) =>
        typeof cell === "number"
          ? String(cell).padStart(widths[i])
          : cell.padEnd(widths[i])
      )
      .join("  ")
      .trimEnd();

  return [
    formatRow(headers),
    widths.map((width) => "-".repeat(width)).join("  "),
    ...rows.map(formatRow),
  ];
}

/**
 * Displays the per-contributor category totals and switch days
 */
export function displayContributorSummary(aggregation: AggregationResult): void {
  console.log("\n" + chalk.bold("📊 User Summary"));

  if (aggregation.contributorSummary.length === 0) {
    console.log(chalk.gray("  No data to display in summary table."));
    return;
  }

  const headers = ["Assignee", ...aggregation.columns, "Total", "ContextSwitchDays"];
  const rows = aggregation.contributorSummary.map((summary) => [
    summary.contributor,
    ...aggregation.columns.map((column) => summary.counts[column] ?? 0),
    summary.total,
    summary.contextSwitchDays,
  ]);

  printTable(headers, rows);
}

/**
 * Displays ticket counts per status
 */
export function displayStatusDistribution(statuses: StatusCount[]): void {
  console.log("\n" + chalk.bold("📋 Status Distribution"));

  if (statuses.length === 0) {
    console.log(chalk.gray("  No status data available."));
    return;
  }

  printTable(
    ["Status", "Count"],
    statuses.map((entry) => [entry.status, entry.tickets])
  );
}

/**
 * Colour for a heatmap cell: focused, moderate, or heavy switching
 */
function heatColor(distinctCategories: number): (text: string) => string {
  if (distinctCategories <= 1) {
    return chalk.green;
  }
  return distinctCategories === 2 ? chalk.yellow : chalk.red;
}

/**
 * Displays distinct categories per contributor per day as a grid
 */
export function displayHeatmap(dailyBreadth: DailyBreadth[]): void {
  console.log("\n" + chalk.bold("🔥 Context Switching Heatmap"));

  if (dailyBreadth.length === 0) {
    console.log(chalk.gray("  No heatmap data available."));
    return;
  }

  const days = [...new Set(dailyBreadth.map((entry) => entry.day))].sort();
  const contributors = [...new Set(dailyBreadth.map((entry) => entry.contributor))];
  const lookup = new Map(
    dailyBreadth.map((entry) => [`${entry.contributor}\u0000${entry.day}`, entry.distinctCategories])
  );

  const labels = days.map(formatDayLabel);
  const nameWidth = Math.max("Assignee".length, ...contributors.map((name) => name.length));

  console.log(
    "  " + ["Assignee".padEnd(nameWidth), ...labels].join("  ")
  );

  contributors.forEach((contributor) => {
    const cells = days.map((day, i) => {
      const count = lookup.get(`${contributor}\u0000${day}`) ?? 0;
      return heatColor(count)(String(count).padStart(labels[i].length));
    });
    console.log("  " + [contributor.padEnd(nameWidth), ...cells].join("  "));
  });

  console.log(
    chalk.gray(
      `  ${chalk.green("0-1")} focused · ${chalk.yellow("2")} moderate · ${chalk.red("3+")} high switching`
    )
  );
}

/**
 * Displays tickets per contributor per category
 */
export function displayCategoryCounts(counts: CategoryCount[]): void {
  console.log("\n" + chalk.bold("📈 Workload Distribution per User"));

  if (counts.length === 0) {
    console.log(chalk.gray("  No category data available."));
    return;
  }

  printTable(
    ["Assignee", "Category", "Tickets"],
    counts.map((entry) => [entry.contributor, entry.category, entry.tickets])
  );
}

/**
 * Displays efficiency records followed by any excluded groups
 */
export function displayEfficiency(report: EfficiencyReport): void {
  console.log("\n" + chalk.bold("⚡ Efficiency"));

  if (report.records.length === 0) {
    console.log(chalk.gray("  No efficiency data available."));
  } else {
    printTable(
      ["Assignee", "Project", "Completed", "Expected", "Efficiency%", "LeaveDays", "WorkingDays"],
      report.records.map((record) => [
        record.contributor,
        record.project,
        record.completedPoints,
        record.expectedPoints,
        record.efficiency.toFixed(2),
        record.leaveDays,
        record.workingDays,
      ])
    );
  }

  if (!report.complete) {
    displayWarning(
      `Efficiency covers only part of the data: ${report.excluded.length} group(s) excluded`
    );
    report.excluded.forEach((group) => {
      console.log(
        chalk.gray(
          `    ${group.contributor} / ${group.project} (${group.completedPoints} pts): ${group.reason}`
        )
      );
    });
  }
}

function printTable(headers: string[], rows: Cell[][]): void {
  const [header, separator, ...body] = formatTable(headers, rows);
  console.log("  " + chalk.bold(header));
  console.log("  " + chalk.gray(separator));
  body.forEach((line) => console.log("  " + line));
}

/**
 * Displays error messages in a consistent format
 */
export function displayError(message: string, error?: Error, debug = false): void {
  console.error(chalk.red("❌ Error:"), message);
  if (error && debug) {
    console.error(chalk.gray(error.stack));
  }
}

/**
 * Displays success messages in a consistent format
 */
export function displaySuccess(message: string): void {
  console.log(chalk.green("✅"), message);
}

/**
 * Displays warning messages in a consistent format
 */
export function displayWarning(message: string): void {
  console.log(chalk.yellow("⚠️"), message);
}

/**
 * Displays info messages in a consistent format
 */
export function displayInfo(message: string): void {
  console.log(chalk.blue("ℹ️"), message);
}
