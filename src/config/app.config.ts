import { getOptional } from "../utils/validation";

/**
 * Application configuration
 */
export interface AppConfig {
  /** Directory holding raw issue snapshots */
  dataDirectory: string;
  /** Print stack traces alongside error messages */
  debug: boolean;
}

/**
 * Retrieves application configuration from environment variables
 */
export function getAppConfig(): AppConfig {
  return {
    dataDirectory: getOptional(process.env.DATA_DIRECTORY, "./data"),
    debug: getOptional(process.env.NODE_ENV, "production") === "development",
  };
}
