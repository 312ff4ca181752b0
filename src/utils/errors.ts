import type { NormalizationReport } from "../types";

/**
 * Error codes surfaced by the pipeline and its collaborators
 */
export type AnalyticsErrorCode =
  | "RECORD_ERROR"
  | "CONFIGURATION_ERROR"
  | "SOURCE_ERROR"
  | "CAPACITY_ERROR"
  | "NO_USABLE_RECORDS";

/**
 * Base class for every error the pipeline raises on purpose
 */
export class AnalyticsError extends Error {
  constructor(
    message: string,
    public readonly code: AnalyticsErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A single malformed record. Recovered inside the normalizer and counted.
 */
export class RecordError extends AnalyticsError {
  constructor(
    public readonly index: number,
    public readonly reasons: readonly string[],
    public readonly recordId?: string
  ) {
    super(
      `Record #${index}${recordId ? ` (${recordId})` : ""}: ${reasons.join("; ")}`,
      "RECORD_ERROR"
    );
  }
}

/**
 * Malformed or missing configuration; raised before any processing starts
 */
export class ConfigurationError extends AnalyticsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIGURATION_ERROR", options);
  }
}

/**
 * Failure of an issue source or report destination. The original error is kept as `cause`.
 */
export class SourceError extends AnalyticsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "SOURCE_ERROR", options);
  }
}

/**
 * Input larger than the configured record ceiling
 */
export class CapacityError extends AnalyticsError {
  constructor(
    public readonly observed: number,
    public readonly allowed: number
  ) {
    super(
      `Input has at least ${observed} records, which exceeds the maximum of ${allowed}`,
      "CAPACITY_ERROR"
    );
  }
}

/**
 * Every record failed normalization
 */
export class NoUsableRecordsError extends AnalyticsError {
  constructor(public readonly report: NormalizationReport) {
    super(
      `No usable records after normalization (${report.failed} of ${report.total} rejected)`,
      "NO_USABLE_RECORDS"
    );
  }
}
