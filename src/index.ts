#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import dotenv from "dotenv";
import { validateConfig, type Config } from "./config/config";
import { describeClassificationIssues } from "./config/analysis.config";
import { JiraService } from "./services/jira-service";
import { StorageService } from "./services/storage-service";
import { CategorizationService } from "./services/categorization-service";
import { NormalizationService } from "./services/normalization-service";
import { AggregationService } from "./services/aggregation-service";
import { EfficiencyService } from "./services/efficiency-service";
import { LeaveService } from "./services/leave-service";
import { WorkloadService } from "./services/workload-service";
import { parseLeaveList } from "./utils/leave-parser";
import { parseList } from "./utils/validation";
import type { JiraIssue, WorkloadAnalysis } from "./types";
import {
  displayCategoryCounts,
  displayContributorSummary,
  displayEfficiency,
  displayError,
  displayHeatmap,
  displayInfo,
  displayStatusDistribution,
  displaySuccess,
  displayWarning,
} from "./utils/display-utils";

// Load environment variables
dotenv.config();

interface CliOptions {
  lastWeek?: boolean;
  projects?: string;
  statuses?: string;
  file?: string;
  snapshotOnly?: boolean;
  leave?: string;
  efficiency: boolean;
}

/**
 * Main CLI program
 */
const program = new Command();

program
  .name("context-switch-tracker")
  .description("Measure context switching and throughput efficiency from Jira")
  .version("1.0.0")
  .option("-l, --last-week", "Analyse last week instead of the current week")
  .option("-p, --projects <keys>", "Comma-separated project keys (overrides JIRA_PROJECT_KEYS)")
  .option("-s, --statuses <list>", "Comma-separated statuses to include (overrides JIRA_STATUSES)")
  .option("-f, --file <path>", "Analyse a saved snapshot instead of fetching from Jira")
  .option("--snapshot-only", "Only fetch and save a snapshot without analysing it")
  .option("-L, --leave <list>", 'Leave days per person, e.g. "Jane Doe=2,Sam=1"')
  .option("--no-efficiency", "Skip the efficiency table")
  .action(async (options: CliOptions) => {
    let debug = false;
    try {
      // Validate configuration before starting
      const config = validateConfig({ offline: Boolean(options.file) });
      debug = config.app.debug;

      describeClassificationIssues(config.analysis).forEach(displayWarning);

      const workloadService = createWorkloadService(config);
      const leave = buildLeave(config, options.leave);

      console.log(chalk.blue("🚀 Starting workload analysis..."));
      console.log(
        chalk.gray(
          `Category source: ${config.analysis.categorySource ?? "unknown"}` +
            (config.analysis.categorySource === "customfield"
              ? ` (${config.analysis.customFieldId || "no field id"})`
              : "")
        )
      );

      let issues: JiraIssue[];

      // Either use provided file or take a new snapshot
      if (options.file) {
        console.log(chalk.gray(`Using existing snapshot: ${options.file}`));
        issues = await workloadService.loadIssues(options.file);
      } else {
        const projects = options.projects
          ? parseList(options.projects)
          : config.analysis.projectKeys;
        const statuses = options.statuses
          ? parseList(options.statuses)
          : config.analysis.statuses;

        if (projects.length === 0) {
          throw new Error("Please enter at least one project key.");
        }

        const spinner = ora("Fetching Jira issues...").start();
        try {
          const snapshot = await workloadService.takeSnapshot({
            projects,
            statuses,
            week: options.lastWeek ? "previous" : "current",
          });
          issues = snapshot.issues;
          spinner.succeed(
            `Fetched ${issues.length} issues, snapshot saved as ${chalk.green(snapshot.fileName)}`
          );
        } catch (error) {
          spinner.fail("Failed to fetch Jira issues");
          throw error;
        }
      }

      // If snapshot-only mode, exit here
      if (options.snapshotOnly) {
        console.log(chalk.green("\n✅ Snapshot complete!"));
        return;
      }

      const analysis = workloadService.analyze(issues, leave.toMap());
      displayAnalysis(analysis, options.efficiency);
    } catch (error) {
      displayError(
        error instanceof Error ? error.message : "Unknown error",
        error instanceof Error ? error : undefined,
        debug
      );
      process.exit(1);
    }
  });

/**
 * Wires the services together with dependency injection
 */
function createWorkloadService(config: Config): WorkloadService {
  const { analysis } = config;

  const categorizationService = new CategorizationService(analysis);
  const normalizationService = new NormalizationService(categorizationService, analysis);
  const aggregationService = new AggregationService(categorizationService.columns);
  const efficiencyService = new EfficiencyService(analysis);
  const jiraService = config.jira ? new JiraService(config.jira, analysis) : null;
  const storageService = new StorageService(config.app.dataDirectory);

  return new WorkloadService(
    jiraService,
    storageService,
    normalizationService,
    aggregationService,
    efficiencyService
  );
}

/**
 * Builds the session's leave ledger from the --leave option
 */
function buildLeave(config: Config, leaveOption?: string): LeaveService {
  const leave = new LeaveService(config.analysis.periodDays);
  if (!leaveOption) {
    return leave;
  }

  const { entries, unparsed } = parseLeaveList(leaveOption);
  if (unparsed.length > 0) {
    displayWarning(`Ignoring leave entries without Name=days form: ${unparsed.join(", ")}`);
  }
  entries.forEach(({ contributor, days }) => leave.set(contributor, days));

  return leave;
}

/**
 * Prints every table produced by one analysis run
 */
function displayAnalysis(analysis: WorkloadAnalysis, showEfficiency: boolean): void {
  const { normalization, aggregation, efficiency } = analysis;

  if (normalization.dropped.length > 0) {
    displayWarning(
      `${normalization.dropped.length} issue(s) skipped for an unparseable updated date: ${normalization.dropped.join(", ")}`
    );
  }

  if (normalization.rows.length === 0) {
    displayInfo("No issues found for the selected week/projects.");
    return;
  }

  displayContributorSummary(aggregation);
  displayStatusDistribution(aggregation.statusDistribution);
  displayHeatmap(aggregation.dailyBreadth);
  displayCategoryCounts(aggregation.categoryCounts);

  if (showEfficiency) {
    displayEfficiency(efficiency);
  }

  displaySuccess(`Analysed ${normalization.rows.length} tickets`);
}

// Parse command line arguments
program.parseAsync(process.argv).catch((error: unknown) => {
  displayError(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
