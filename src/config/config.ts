import { JiraConfig, getJiraConfig } from "./jira.config";
import { AnalysisConfig, getAnalysisConfig } from "./analysis.config";
import { AppConfig, getAppConfig } from "./app.config";

/**
 * Complete application configuration
 */
export interface Config {
  /** Null when running offline against a saved snapshot */
  jira: JiraConfig | null;
  analysis: AnalysisConfig;
  app: AppConfig;
}

/**
 * Re-export individual config interfaces for convenience
 */
export type { JiraConfig, AnalysisConfig, AppConfig };

interface GetConfigOptions {
  /** Skip Jira credentials when no fetch will happen */
  offline?: boolean;
}

/**
 * Retrieves complete application configuration with validation
 * This is the main entry point for accessing configuration
 */
export function getConfig({ offline = false }: GetConfigOptions = {}): Config {
  return {
    jira: offline ? null : getJiraConfig(),
    analysis: getAnalysisConfig(),
    app: getAppConfig(),
  };
}

/**
 * Validates that all required configuration is present and valid
 * Throws descriptive errors if configuration is missing or invalid
 */
export function validateConfig(options: GetConfigOptions = {}): Config {
  try {
    return getConfig(options);
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(
        `Configuration Error:\n${error.message}\n\n` +
          `Please check your .env file. See .env.example for reference.`
      );
    }
    throw error;
  }
}
