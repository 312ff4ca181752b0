import type {
  CanonicalField,
  Issue,
  NormalizationFailure,
  NormalizationResult,
  NormalizationWarning,
  RawRecord,
} from "../types";
import { RecordError } from "../utils/errors";
import { parseDate } from "../utils/date-utils";
import { isPlainObject } from "../utils/validation";
import { logger } from "../utils/logger";

type DateField = "createdAt" | "updatedAt" | "resolvedAt";

const CANONICAL_FIELDS: readonly CanonicalField[] = [
  "id",
  "summary",
  "description",
  "status",
  "priority",
  "issueType",
  "resolution",
  "rootCause",
  "createdAt",
  "updatedAt",
  "resolvedAt",
  "assignee",
  "reporter",
];

const DATE_FIELDS: readonly DateField[] = ["createdAt", "updatedAt", "resolvedAt"];

/**
 * Object properties tracker exports use for named values ({ name: "High" }, ...)
 */
const NAMED_VALUE_KEYS = ["name", "displayName", "value"] as const;

/**
 * Canonical field values picked out of one record, before coercion
 */
type PickedFields = Partial<Record<CanonicalField, unknown>>;

/**
 * Result of normalizing a single record
 */
interface NormalizedRecord {
  issue: Issue;
  warnings: NormalizationWarning[];
}

/**
 * Service responsible for mapping heterogeneous source records onto the canonical Issue schema
 */
export class NormalizationService {
  private readonly aliasLookup: ReadonlyMap<string, CanonicalField>;
  private readonly aliasRank: ReadonlyMap<string, number>;

  constructor(fieldAliases: Readonly<Record<CanonicalField, readonly string[]>>) {
    const lookup = new Map<string, CanonicalField>();
    const rank = new Map<string, number>();

    for (const field of CANONICAL_FIELDS) {
      fieldAliases[field].forEach((alias, index) => {
        const key = this.aliasKey(alias);
        if (!lookup.has(key)) {
          lookup.set(key, field);
          rank.set(key, index);
        }
      });
    }

    this.aliasLookup = lookup;
    this.aliasRank = rank;
  }

  /**
   * Normalizes a batch of raw records. Malformed records are skipped and reported;
   * they never stop the batch.
   * @param records - Raw source records
   * @returns Usable issues plus the normalization report
   */
  normalize(records: readonly RawRecord[]): NormalizationResult {
    const issues: Issue[] = [];
    const failures: NormalizationFailure[] = [];
    const warnings: NormalizationWarning[] = [];
    const seenIds = new Set<string>();

    records.forEach((record, index) => {
      try {
        const normalized = this.normalizeRecord(record, index);
        if (seenIds.has(normalized.issue.id)) {
          throw new RecordError(index, ["duplicate id"], normalized.issue.id);
        }
        seenIds.add(normalized.issue.id);
        issues.push(normalized.issue);
        warnings.push(...normalized.warnings);
      } catch (error) {
        if (!(error instanceof RecordError)) {
          throw error;
        }
        logger.debug(`Skipping record: ${error.message}`);
        failures.push({
          index: error.index,
          id: error.recordId,
          reasons: error.reasons,
        });
      }
    });

    if (failures.length > 0) {
      logger.warn(
        `${failures.length} of ${records.length} records could not be normalized`
      );
    }

    return {
      issues,
      report: {
        total: records.length,
        succeeded: issues.length,
        failed: failures.length,
        failures,
        reasonCounts: this.countReasons(failures),
        warnings,
      },
    };
  }

  /**
   * Normalizes a single record
   * @throws {RecordError} When a required field is missing or unusable
   */
  normalizeRecord(record: RawRecord, index: number): NormalizedRecord {
    if (!isPlainObject(record)) {
      throw new RecordError(index, ["record is not an object"]);
    }

    const { picked, rawFields } = this.pickFields(record);
    const id = this.toText(picked.id);
    const warnings: NormalizationWarning[] = [];
    const dates: Partial<Record<DateField, Date>> = {};

    for (const field of DATE_FIELDS) {
      const value = picked[field];
      if (this.isBlank(value)) {
        continue;
      }
      const parsed = parseDate(value);
      if (parsed) {
        dates[field] = parsed;
      } else if (id !== undefined) {
        warnings.push(
          this.warning(index, id, field, value, `unparseable date treated as missing`)
        );
      }
    }

    const reasons: string[] = [];
    if (id === undefined) {
      reasons.push("missing required field: id");
    }
    if (!dates.createdAt) {
      reasons.push(
        this.isBlank(picked.createdAt)
          ? "missing required field: created_at"
          : "unparseable date in required field: created_at"
      );
    }
    if (id === undefined || !dates.createdAt) {
      throw new RecordError(index, reasons, id);
    }

    if (dates.resolvedAt && dates.resolvedAt.getTime() < dates.createdAt.getTime()) {
      warnings.push(
        this.warning(
          index,
          id,
          "resolvedAt",
          picked.resolvedAt,
          "resolved before created; treated as unresolved"
        )
      );
      delete dates.resolvedAt;
    }

    for (const warning of warnings) {
      logger.warn(`${warning.id}: ${warning.field} "${warning.value}" ${warning.message}`);
    }

    const issue: Issue = {
      id,
      summary: this.toText(picked.summary) ?? "",
      description: this.toText(picked.description),
      status: this.toText(picked.status) ?? "Unknown",
      priority: this.toText(picked.priority) ?? "Unknown",
      issueType: this.toText(picked.issueType),
      resolution: this.toText(picked.resolution),
      rootCause: this.toText(picked.rootCause),
      createdAt: dates.createdAt,
      updatedAt: dates.updatedAt,
      resolvedAt: dates.resolvedAt,
      assignee: this.toText(picked.assignee),
      reporter: this.toText(picked.reporter),
      rawFields,
    };

    return { issue, warnings };
  }

  /**
   * Splits a record into canonical field values and unclaimed source fields.
   * When several aliases of one field are present, the earliest alias in the configured list wins.
   */
  private pickFields(record: Record<string, unknown>): {
    picked: PickedFields;
    rawFields: Record<string, unknown>;
  } {
    const picked: PickedFields = {};
    const pickedRank: Partial<Record<CanonicalField, number>> = {};
    const rawFields: Record<string, unknown> = {};

    for (const sourceName of Object.keys(record).sort()) {
      const key = this.aliasKey(sourceName);
      const field = this.aliasLookup.get(key);
      const value = record[sourceName];

      if (!field) {
        rawFields[sourceName] = value;
        continue;
      }

      const rank = this.aliasRank.get(key) ?? Number.MAX_SAFE_INTEGER;
      const currentRank = pickedRank[field];
      if (this.isBlank(value)) {
        continue;
      }
      if (currentRank === undefined || rank < currentRank) {
        picked[field] = value;
        pickedRank[field] = rank;
      }
    }

    return { picked, rawFields };
  }

  /**
   * Coerces a source value to trimmed text; blank values become undefined
   */
  private toText(value: unknown): string | undefined {
    if (typeof value === "string") {
      const trimmed = value.trim();
      return trimmed.length > 0 ? trimmed : undefined;
    }
    if (typeof value === "number" || typeof value === "boolean") {
      return String(value);
    }
    if (Array.isArray(value)) {
      const parts = value
        .map((item) => this.toText(item))
        .filter((item): item is string => item !== undefined);
      return parts.length > 0 ? parts.join(", ") : undefined;
    }
    if (isPlainObject(value)) {
      for (const key of NAMED_VALUE_KEYS) {
        const named = this.toText(value[key]);
        if (named !== undefined) {
          return named;
        }
      }
    }
    return undefined;
  }

  private isBlank(value: unknown): boolean {
    return (
      value === undefined ||
      value === null ||
      (typeof value === "string" && value.trim() === "")
    );
  }

  private aliasKey(name: string): string {
    return name.trim().toLowerCase();
  }

  private warning(
    index: number,
    id: string,
    field: CanonicalField,
    value: unknown,
    message: string
  ): NormalizationWarning {
    return {
      index,
      id,
      field,
      value: typeof value === "string" ? value : JSON.stringify(value) ?? String(value),
      message,
    };
  }

  private countReasons(failures: NormalizationFailure[]): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const failure of failures) {
      for (const reason of failure.reasons) {
        counts[reason] = (counts[reason] ?? 0) + 1;
      }
    }
    return Object.fromEntries(
      Object.entries(counts).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    );
  }
}
