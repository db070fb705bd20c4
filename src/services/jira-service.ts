import axios from "axios";
import { JiraConfig } from "../config/config";
import type { CategorySource, JiraIssue, JiraSearchPage, WeekScope } from "../types";

/**
 * Parameters for fetching Jira issues
 */
export interface FetchIssuesParams {
  /** Project keys to search */
  projects: string[];
  /** Statuses to keep; empty means no status filter */
  statuses: string[];
  /** Which working week to look at (default: current) */
  week?: WeekScope;
}

/**
 * Fields the analysis needs besides the always-requested ones
 */
export interface FieldSelection {
  storyPointsField: string;
  categorySource: CategorySource | null;
  customFieldId: string;
}

const BASE_FIELDS = ["assignee", "labels", "updated", "components", "status"];

/**
 * Service class for interacting with Jira API
 */
export class JiraService {
  private readonly headers: { Authorization: string; Accept: string };

  constructor(
    private readonly config: JiraConfig,
    private readonly fieldSelection: FieldSelection
  ) {
    this.headers = {
      Authorization: `Basic ${Buffer.from(
        `${this.config.username}:${this.config.token}`
      ).toString("base64")}`,
      Accept: "application/json",
    };
  }

  /**
   * Comma-separated field list for the search request
   */
  get fields(): string {
    const { storyPointsField, categorySource, customFieldId } = this.fieldSelection;
    const fields = [...BASE_FIELDS];

    if (storyPointsField) {
      fields.push(storyPointsField);
    }
    if (categorySource === "customfield" && customFieldId) {
      fields.push(customFieldId);
    }

    return [...new Set(fields)].join(",");
  }

  /**
   * Builds the JQL for the given projects, week and statuses
   * @returns JQL query string
   */
  buildJql({ projects, statuses, week = "current" }: FetchIssuesParams): string {
    const projectClause = projects.map((p) => `project = "${p}"`).join(" OR ");
    const offset = week === "current" ? "" : "-1";
    const timeClause = `updated >= startOfWeek(${offset}) AND updated <= endOfWeek(${offset})`;

    if (statuses.length === 0) {
      return `(${projectClause}) AND ${timeClause}`;
    }

    const statusClause = statuses.map((s) => `status = "${s}"`).join(" OR ");
    return `(${projectClause}) AND ${timeClause} AND (${statusClause})`;
  }

  /**
   * Fetches every page of a search. The returned list is complete before
   * any analysis runs.
   * @throws {Error} When any page request fails, with the HTTP status if known
   */
  async fetchIssues(params: FetchIssuesParams): Promise<JiraIssue[]> {
    if (params.projects.length === 0) {
      throw new Error("At least one project key is required to fetch issues");
    }

    const jql = this.buildJql(params);
    const issues: JiraIssue[] = [];
    let nextPageToken: string | undefined;

    do {
      const page = await this.fetchPage(jql, nextPageToken);
      issues.push(...page.issues);
      nextPageToken =
        !page.isLast && page.issues.length > 0 && page.nextPageToken
          ? page.nextPageToken
          : undefined;
    } while (nextPageToken);

    return issues;
  }

  /**
   * Fetches one page of the JQL search endpoint
   */
  private async fetchPage(jql: string, nextPageToken?: string): Promise<JiraSearchPage> {
    const url = `${this.config.url}/rest/api/3/search/jql`;

    try {
      const response = await axios.get<JiraSearchPage>(url, {
        headers: this.headers,
        timeout: 30_000,
        params: {
          jql,
          fields: this.fields,
          maxResults: this.config.pageSize,
          ...(nextPageToken ? { nextPageToken } : {}),
        },
      });
      return {
        issues: response.data.issues ?? [],
        nextPageToken: response.data.nextPageToken,
        isLast: response.data.isLast,
      };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new Error(
          status
            ? `Jira API error ${status}: ${error.message}`
            : `Jira API request failed: ${error.message}`
        );
      }
      throw error;
    }
  }
}
