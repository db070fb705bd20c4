import { JiraService, FetchIssuesParams } from "./jira-service";
import { StorageService } from "./storage-service";
import { NormalizationService } from "./normalization-service";
import { AggregationService } from "./aggregation-service";
import { EfficiencyService } from "./efficiency-service";
import type { JiraIssue, LeaveAdjustments, WorkloadAnalysis } from "../types";

/**
 * Service responsible for orchestrating one workload analysis run
 * Coordinates between Jira, Storage, Normalization, Aggregation, and Efficiency services
 */
export class WorkloadService {
  constructor(
    private readonly jiraService: JiraService | null,
    private readonly storageService: StorageService,
    private readonly normalizationService: NormalizationService,
    private readonly aggregationService: AggregationService,
    private readonly efficiencyService: EfficiencyService
  ) {}

  /**
   * Fetches issues for the week and saves them as a snapshot
   * @returns The fetched issues and the filename that was saved
   * @throws {Error} When no Jira client is configured or the fetch fails
   */
  async takeSnapshot(
    params: FetchIssuesParams,
    customDate?: string
  ): Promise<{ issues: JiraIssue[]; fileName: string }> {
    if (!this.jiraService) {
      throw new Error("Jira is not configured; use --file to analyse a saved snapshot");
    }

    const issues = await this.jiraService.fetchIssues(params);
    const fileName = await this.storageService.saveSnapshot(issues, customDate);

    return { issues, fileName };
  }

  /**
   * Loads issues from a snapshot file
   * @param fileName - Optional filename to load (defaults to latest)
   */
  async loadIssues(fileName?: string): Promise<JiraIssue[]> {
    const targetFile = fileName || (await this.storageService.getLatestSnapshot());

    const exists = await this.storageService.snapshotExists(targetFile);
    if (!exists) {
      throw new Error(`Snapshot file not found: ${targetFile}`);
    }

    return await this.storageService.loadSnapshot(targetFile);
  }

  /**
   * Runs the classification, aggregation and efficiency pipeline.
   * An empty issue list yields empty tables.
   * @param leave - Leave days for this session
   */
  analyze(issues: JiraIssue[], leave: LeaveAdjustments): WorkloadAnalysis {
    const normalization = this.normalizationService.normalize(issues);

    return {
      normalization,
      aggregation: this.aggregationService.aggregate(normalization.rows),
      efficiency: this.efficiencyService.calculate(normalization.rows, leave),
    };
  }
}
