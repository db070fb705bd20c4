import {
  validateRequired,
  isValidJiraUrl,
  getOptional,
  parsePositiveInt,
} from "../utils/validation";

/**
 * Jira API configuration
 */
export interface JiraConfig {
  url: string;
  username: string;
  token: string;
  /** Issues requested per search page */
  pageSize: number;
}

/**
 * Retrieves and validates Jira configuration from environment variables
 */
export function getJiraConfig(): JiraConfig {
  const url = validateRequired("JIRA_URL", process.env.JIRA_URL);
  const username = validateRequired("JIRA_USERNAME", process.env.JIRA_USERNAME);
  const token = validateRequired("JIRA_TOKEN", process.env.JIRA_TOKEN);

  // Validate Jira URL format
  if (!isValidJiraUrl(url)) {
    throw new Error(
      `Invalid JIRA_URL format: ${url}\n` +
        `Expected format: https://your-company.atlassian.net`
    );
  }

  const pageSize = parsePositiveInt(
    "JIRA_PAGE_SIZE",
    getOptional(process.env.JIRA_PAGE_SIZE, "100")
  );

  return {
    url: url.replace(/\/+$/, ""),
    username,
    token,
    pageSize,
  };
}
