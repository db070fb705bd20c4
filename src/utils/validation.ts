/**
 * Validation utilities for configuration and inputs
 */
import type { JiraIssue } from "../types";

/**
 * Validates Jira URL format
 */
export function isValidJiraUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return (
      (parsed.protocol === "http:" || parsed.protocol === "https:") &&
      parsed.hostname.length > 0
    );
  } catch {
    return false;
  }
}

/**
 * Validates that a string is not empty after trimming
 */
export function isNonEmptyString(value: string): boolean {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Splits a comma-separated list, dropping blank entries
 */
export function parseList(list: string): string[] {
  return list
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parses a positive integer setting or throws with the setting name
 */
export function parsePositiveInt(name: string, raw: string): number {
  const value = Number(raw);

  if (!Number.isInteger(value) || value < 1) {
    throw new Error(
      `Invalid ${name}: ${raw}\n` + `Expected a positive integer`
    );
  }

  return value;
}

/**
 * Parses project throughput rules of the form "YTCS=3,DS=2"
 */
export function parseThroughputRules(raw: string): Record<string, number> {
  const rules: Record<string, number> = {};

  for (const entry of parseList(raw)) {
    const [project, perDay, ...rest] = entry.split("=").map((s) => s.trim());
    const value = Number(perDay);

    if (!project || perDay === undefined || rest.length > 0 || !Number.isFinite(value) || value < 0) {
      throw new Error(
        `Invalid PROJECT_THROUGHPUT entry: "${entry}"\n` +
          `Expected PROJECT=pointsPerDay, e.g. YTCS=3,DS=2`
      );
    }

    rules[project] = value;
  }

  return rules;
}

/**
 * Validates required environment variable
 */
export function validateRequired(
  name: string,
  value: string | undefined
): string {
  if (!value || !isNonEmptyString(value)) {
    throw new Error(
      `Missing required environment variable: ${name}\n` +
        `Please add this to your .env file. See .env.example for reference.`
    );
  }
  return value;
}

/**
 * Gets optional environment variable with default value
 */
export function getOptional(
  value: string | undefined,
  defaultValue: string
): string {
  return value && isNonEmptyString(value) ? value : defaultValue;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Checks the outer shape of a stored or fetched issue. Field contents are
 * left to the normalizer, which tolerates missing and malformed values.
 */
export function isJiraIssue(value: unknown): value is JiraIssue {
  if (!isRecord(value) || !isRecord(value.fields)) {
    return false;
  }
  return value.key === undefined || value.key === null || typeof value.key === "string";
}
