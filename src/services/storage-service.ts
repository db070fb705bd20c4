import fs from "fs/promises";
import path from "path";
import type { JiraIssue } from "../types";
import { isJiraIssue } from "../utils/validation";

/**
 * Service responsible for all file I/O operations
 * Handles raw issue snapshot storage, retrieval, and listing
 */
export class StorageService {
  constructor(private readonly dataDirectory: string) {}

  /**
   * Ensures the data directory exists
   */
  async ensureDataDirectory(): Promise<void> {
    await fs.mkdir(this.dataDirectory, { recursive: true });
  }

  /**
   * Saves fetched issues to a JSON file
   * @param issues - Raw issues exactly as returned by Jira
   * @param customDate - Optional custom date for filename (defaults to today)
   * @returns The filename that was saved
   */
  async saveSnapshot(issues: JiraIssue[], customDate?: string): Promise<string> {
    await this.ensureDataDirectory();

    const date = customDate || new Date().toISOString().split("T")[0];
    const fileName = path.join(this.dataDirectory, `${date}.json`);

    await fs.writeFile(fileName, JSON.stringify(issues, null, 2), "utf-8");

    return fileName;
  }

  /**
   * Loads issues from a snapshot file
   * @throws {Error} If the file is not a JSON array of issues
   */
  async loadSnapshot(fileName: string): Promise<JiraIssue[]> {
    const data = await fs.readFile(fileName, "utf-8");

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      throw new Error(
        `Snapshot ${fileName} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!Array.isArray(parsed)) {
      throw new Error(`Snapshot ${fileName} must contain an array of issues`);
    }

    const invalidIndex = parsed.findIndex((item) => !isJiraIssue(item));
    if (invalidIndex !== -1) {
      throw new Error(
        `Snapshot ${fileName} has a malformed issue at index ${invalidIndex}`
      );
    }

    return parsed.filter(isJiraIssue);
  }

  /**
   * Lists all available snapshot files
   * @returns Array of snapshot filenames, sorted most recent first
   */
  async listSnapshots(): Promise<string[]> {
    await this.ensureDataDirectory();

    const files = await fs.readdir(this.dataDirectory);
    return files
      .filter((file) => file.endsWith(".json"))
      .sort()
      .reverse();
  }

  /**
   * Gets the path to the most recent snapshot file
   * @throws {Error} If no snapshots exist
   */
  async getLatestSnapshot(): Promise<string> {
    const snapshots = await this.listSnapshots();

    if (snapshots.length === 0) {
      throw new Error("No snapshots found. Please take a snapshot first.");
    }

    return path.join(this.dataDirectory, snapshots[0]);
  }

  /**
   * Checks if a snapshot file exists
   */
  async snapshotExists(fileName: string): Promise<boolean> {
    try {
      await fs.access(fileName);
      return true;
    } catch {
      return false;
    }
  }
}
