import fs from "fs/promises";
import path from "path";
import type { PipelineResult, RawRecord } from "../types";
import { isJiraSearchResponse, jiraIssueToRecord } from "../utils/jira-record-mapper";
import { isPlainObject } from "../utils/validation";
import { SourceError } from "../utils/errors";

/**
 * Service responsible for all file I/O operations
 * Reads raw record exports and writes analytics reports
 */
export class StorageService {
  constructor(private readonly dataDirectory: string) {}

  /**
   * Ensures the data directory exists
   */
  async ensureDataDirectory(): Promise<void> {
    try {
      await fs.access(this.dataDirectory);
    } catch {
      await fs.mkdir(this.dataDirectory, { recursive: true });
    }
  }

  /**
   * Loads raw records from a JSON file: either an array of flat records
   * or a saved Jira search response ({ "issues": [...] })
   * @param fileName - Path to the export
   * @throws {SourceError} When the file cannot be read or has an unknown shape
   */
  async loadRecords(fileName: string): Promise<RawRecord[]> {
    let parsed: unknown;
    try {
      const data = await fs.readFile(fileName, "utf-8");
      parsed = JSON.parse(data);
    } catch (error) {
      throw new SourceError(
        `Cannot read issue export ${fileName}: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { cause: error }
      );
    }

    if (isJiraSearchResponse(parsed)) {
      return parsed.issues.map((issue) => jiraIssueToRecord(issue));
    }

    if (Array.isArray(parsed)) {
      // Non-object entries become empty records and fail normalization
      return parsed.map((entry: unknown) => (isPlainObject(entry) ? entry : {}));
    }

    throw new SourceError(
      `Unsupported issue export ${fileName}: expected an array of records or a Jira search response`
    );
  }

  /**
   * Saves a pipeline result as JSON
   * @param result - Pipeline output
   * @param fileName - Target path; defaults to issue-analytics-<date>.json in the data directory
   * @returns The path that was written
   */
  async saveReport(result: PipelineResult, fileName?: string): Promise<string> {
    const date = new Date().toISOString().split("T")[0];
    const target =
      fileName ?? path.join(this.dataDirectory, `issue-analytics-${date}.json`);

    try {
      if (fileName) {
        await fs.mkdir(path.dirname(target), { recursive: true });
      } else {
        await this.ensureDataDirectory();
      }
      await fs.writeFile(target, serializeResult(result), "utf-8");
    } catch (error) {
      throw new SourceError(`Cannot write report ${target}`, { cause: error });
    }

    return target;
  }

  /**
   * Checks if a file exists
   */
  async fileExists(fileName: string): Promise<boolean> {
    try {
      await fs.access(fileName);
      return true;
    } catch {
      return false;
    }
  }
}

/**
 * Serializes a pipeline result as indented JSON; dates become ISO strings
 */
export function serializeResult(result: PipelineResult): string {
  return JSON.stringify(result, null, 2) + "\n";
}
