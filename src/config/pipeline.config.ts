import fs from "fs";
import type { CanonicalField, ExtractionConfidence } from "../types";
import defaultAppPatterns from "../data/default-app-patterns.json";
import defaultErrorTypePatterns from "../data/default-error-type-patterns.json";
import defaultStopWords from "../data/customer-stop-words.json";
import { ConfigurationError } from "../utils/errors";
import { parseMonthDay } from "../utils/date-utils";
import {
  isNonEmptyString,
  isPlainObject,
  validateNumber,
  validatePattern,
  validateStringList,
} from "../utils/validation";

/**
 * Known application name, optionally with its own pattern (case-insensitive)
 */
export interface AppPatternConfig {
  name: string;
  pattern?: string;
}

/**
 * Customer extraction rule. The first capture group is the candidate name.
 */
export interface CustomerPatternConfig {
  name: string;
  confidence: Exclude<ExtractionConfidence, "none">;
  pattern: string;
  flags: string;
  /** Minimum number of words a cleaned candidate must keep */
  minWords: number;
}

/**
 * Error-type rule: issues whose text matches `pattern` (case-insensitive) get `type`
 */
export interface ErrorTypePatternConfig {
  name: string;
  type: string;
  pattern: string;
}

/**
 * Named, year-independent month/day range; both boundaries inclusive
 */
export interface HolidayRangeConfig {
  name: string;
  start: string;
  end: string;
}

export type CategoryField =
  | "integrationApp"
  | "customer"
  | "extractionConfidence"
  | "errorType"
  | "assignee"
  | "resolutionType"
  | "rootCause"
  | "status"
  | "priority"
  | "issueType"
  | "holidayPeriod";

export type BucketField = "monthYear" | "quarterLabel" | "year" | "holidayPeriod";

/**
 * One requested aggregation: category x bucket
 */
export interface TableConfig {
  name: string;
  category: CategoryField;
  bucket: BucketField;
  topN: number;
}

/**
 * Complete, immutable pipeline configuration
 */
export interface PipelineConfig {
  readonly fieldAliases: Readonly<Record<CanonicalField, readonly string[]>>;
  readonly appPatterns: readonly Readonly<AppPatternConfig>[];
  readonly customerPatterns: readonly Readonly<CustomerPatternConfig>[];
  readonly customerStopWords: readonly string[];
  readonly errorTypePatterns: readonly Readonly<ErrorTypePatternConfig>[];
  readonly holidayRanges: readonly Readonly<HolidayRangeConfig>[];
  readonly holidayFallback: string;
  /** Relative change between series halves that counts as a trend (0.15 = 15%) */
  readonly trendThreshold: number;
  readonly trendMinPoints: number;
  /** Trailing months compared against each month */
  readonly anomalyWindow: number;
  /** Deviations (in effective standard deviations) above which a month is anomalous */
  readonly anomalySensitivity: number;
  readonly anomalyMinHistory: number;
  readonly maxRecords: number;
  readonly tables: readonly Readonly<TableConfig>[];
}

const DEFAULT_FIELD_ALIASES: Record<CanonicalField, string[]> = {
  id: ["id", "Key", "Issue Key", "Issue key", "JIRA ID", "Case Key", "Ticket ID"],
  summary: ["summary", "Summary", "JIRA Text", "Title", "Subject"],
  description: ["description", "Description", "Details"],
  status: ["status", "Status"],
  priority: ["priority", "Priority"],
  issueType: ["issue_type", "issueType", "Issue Type", "issuetype", "Type"],
  resolution: ["resolution", "Resolution", "Resolution Type"],
  rootCause: ["root_cause", "rootCause", "Root Cause", "RCA"],
  createdAt: ["created_at", "createdAt", "Created", "Created Date"],
  updatedAt: ["updated_at", "updatedAt", "Updated", "Updated Date"],
  resolvedAt: [
    "resolved_at",
    "resolvedAt",
    "Resolved",
    "resolutiondate",
    "Resolved Date",
    "Resolution Date",
  ],
  assignee: ["assignee", "Assignee"],
  reporter: ["reporter", "Reporter"],
};

const DEFAULT_CUSTOMER_PATTERNS: CustomerPatternConfig[] = [
  {
    name: "labelled-field",
    confidence: "high",
    pattern:
      "\\b(?:customer|account|company|client|organi[sz]ation)(?:\\s+name)?\\s*:\\s*([^\\n|;,()\\u2013\\u2014]+)",
    flags: "i",
    minWords: 1,
  },
  {
    name: "trigger-phrase",
    confidence: "medium",
    pattern:
      "\\b(?:[Ff]or|[Cc]lient|[Cc]ustomer)\\s+([A-Z][\\w&.'-]*(?:\\s+(?:&\\s+)?[A-Z][\\w&.'-]*)+)",
    flags: "",
    minWords: 2,
  },
  {
    name: "trigger-token",
    confidence: "low",
    pattern: "\\b(?:[Ff]or|[Cc]lient|[Cc]ustomer)\\s+([A-Z][\\w&'-]+)",
    flags: "",
    minWords: 1,
  },
  {
    name: "capitalized-token",
    confidence: "low",
    pattern: "(?<=[^\\s.!?:]\\s+)([A-Z][a-z][\\w&'-]*)",
    flags: "",
    minWords: 1,
  },
];

const DEFAULT_HOLIDAY_RANGES: HolidayRangeConfig[] = [
  { name: "Black Friday Week", start: "Nov 20", end: "Nov 27" },
  { name: "Cyber Monday", start: "Nov 27", end: "Dec 1" },
  { name: "Holiday Shopping", start: "Dec 1", end: "Dec 24" },
  { name: "Christmas Week", start: "Dec 24", end: "Jan 1" },
  { name: "New Year Recovery", start: "Jan 1", end: "Jan 15" },
];

const DEFAULT_TABLES: TableConfig[] = [
  {
    name: "Issues per Integration App per Month",
    category: "integrationApp",
    bucket: "monthYear",
    topN: 10,
  },
  {
    name: "Resolution Types per Month",
    category: "resolutionType",
    bucket: "monthYear",
    topN: 10,
  },
  {
    name: "Root Causes per Month",
    category: "rootCause",
    bucket: "monthYear",
    topN: 10,
  },
  {
    name: "Customers per Month",
    category: "customer",
    bucket: "monthYear",
    topN: 10,
  },
  {
    name: "Error Types per Month",
    category: "errorType",
    bucket: "monthYear",
    topN: 10,
  },
  {
    name: "Holiday Periods per Year",
    category: "holidayPeriod",
    bucket: "year",
    topN: 10,
  },
];

/**
 * Keys accepted in a pipeline configuration file
 */
const FILE_KEYS = [
  "field_aliases",
  "app_patterns",
  "customer_patterns",
  "customer_stop_words",
  "error_type_patterns",
  "holiday_ranges",
  "holiday_fallback",
  "trend_threshold",
  "trend_min_points",
  "anomaly_window",
  "anomaly_sensitivity",
  "anomaly_min_history",
  "max_records",
  "tables",
] as const;

const FIELD_ALIAS_KEYS: Record<string, CanonicalField> = {
  id: "id",
  summary: "summary",
  description: "description",
  status: "status",
  priority: "priority",
  issue_type: "issueType",
  resolution: "resolution",
  root_cause: "rootCause",
  created_at: "createdAt",
  updated_at: "updatedAt",
  resolved_at: "resolvedAt",
  assignee: "assignee",
  reporter: "reporter",
};

const CATEGORY_FIELDS: Record<string, CategoryField> = {
  integration_app: "integrationApp",
  customer: "customer",
  extraction_confidence: "extractionConfidence",
  error_type: "errorType",
  assignee: "assignee",
  resolution_type: "resolutionType",
  root_cause: "rootCause",
  status: "status",
  priority: "priority",
  issue_type: "issueType",
  holiday_period: "holidayPeriod",
};

const BUCKET_FIELDS: Record<string, BucketField> = {
  month_year: "monthYear",
  quarter: "quarterLabel",
  year: "year",
  holiday_period: "holidayPeriod",
};

const CONFIDENCE_CLASSES = ["high", "medium", "low"] as const;

function isConfidenceClass(
  value: unknown
): value is CustomerPatternConfig["confidence"] {
  return CONFIDENCE_CLASSES.some((confidence) => confidence === value);
}

function lookup<T>(
  name: string,
  table: Record<string, T>,
  value: unknown
): T {
  if (typeof value === "string" && Object.prototype.hasOwnProperty.call(table, value)) {
    return table[value];
  }
  throw new ConfigurationError(
    `Invalid ${name}: ${String(value)}\n` +
      `Expected one of: ${Object.keys(table).join(", ")}`
  );
}

function parseFieldAliases(
  value: unknown
): Record<CanonicalField, string[]> {
  if (!isPlainObject(value)) {
    throw new ConfigurationError("field_aliases must be an object of alias lists");
  }

  const aliases = { ...DEFAULT_FIELD_ALIASES };
  for (const [key, list] of Object.entries(value)) {
    const field = lookup("field_aliases key", FIELD_ALIAS_KEYS, key);
    aliases[field] = validateStringList(`field_aliases.${key}`, list);
  }
  return aliases;
}

/**
 * Rule names identify rules within a list
 */
function rejectDuplicateNames(key: string, rules: readonly { name: string }[]): void {
  const seen = new Set<string>();
  rules.forEach((rule, index) => {
    if (seen.has(rule.name)) {
      throw new ConfigurationError(`${key}[${index}]: duplicate rule name "${rule.name}"`);
    }
    seen.add(rule.name);
  });
}

/**
 * Validates an ordered list of application patterns
 */
function parseAppPatterns(value: unknown): AppPatternConfig[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigurationError("app_patterns must be a non-empty list");
  }

  const patterns = value.map((entry: unknown, index): AppPatternConfig => {
    if (isNonEmptyString(entry)) {
      return { name: entry.trim() };
    }
    if (isPlainObject(entry) && isNonEmptyString(entry.name)) {
      if (entry.pattern === undefined) {
        return { name: entry.name.trim() };
      }
      if (isNonEmptyString(entry.pattern)) {
        validatePattern(`app_patterns[${index}]`, entry.pattern, "i");
        return { name: entry.name.trim(), pattern: entry.pattern };
      }
    }
    throw new ConfigurationError(
      `app_patterns[${index}] must be a name or { "name", "pattern" }`
    );
  });

  rejectDuplicateNames("app_patterns", patterns);
  return patterns;
}

/**
 * Validates an ordered list of error-type rules; `type` defaults to the rule name
 */
function parseErrorTypePatterns(value: unknown): ErrorTypePatternConfig[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigurationError("error_type_patterns must be a non-empty list");
  }

  const patterns = value.map((entry: unknown, index): ErrorTypePatternConfig => {
    const where = `error_type_patterns[${index}]`;
    if (
      !isPlainObject(entry) ||
      !isNonEmptyString(entry.name) ||
      !isNonEmptyString(entry.pattern)
    ) {
      throw new ConfigurationError(`${where} must have a "name" and a "pattern"`);
    }
    const name = entry.name.trim();
    const type = entry.type === undefined ? name : entry.type;
    if (!isNonEmptyString(type)) {
      throw new ConfigurationError(`${where}.type must be a non-empty string`);
    }
    validatePattern(where, entry.pattern, "i");

    return { name, type: type.trim(), pattern: entry.pattern };
  });

  rejectDuplicateNames("error_type_patterns", patterns);
  return patterns;
}

/**
 * Validates an ordered list of customer extraction rules
 */
export function parseCustomerPatterns(value: unknown): CustomerPatternConfig[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigurationError("customer_patterns must be a non-empty list");
  }

  const patterns = value.map((entry: unknown, index): CustomerPatternConfig => {
    const where = `customer_patterns[${index}]`;
    if (
      !isPlainObject(entry) ||
      !isNonEmptyString(entry.name) ||
      !isNonEmptyString(entry.pattern)
    ) {
      throw new ConfigurationError(
        `${where} must have a "name", a "confidence" and a "pattern"`
      );
    }
    if (!isConfidenceClass(entry.confidence)) {
      throw new ConfigurationError(
        `${where}.confidence must be one of: ${CONFIDENCE_CLASSES.join(", ")}`
      );
    }

    const flags = entry.flags === undefined ? "" : entry.flags;
    if (typeof flags !== "string") {
      throw new ConfigurationError(`${where}.flags must be a string`);
    }
    const regex = validatePattern(where, entry.pattern, flags);
    // An empty alternative always matches, so the result length is the group count + 1
    const groups = (new RegExp(`${regex.source}|`).exec("") ?? []).length - 1;
    if (groups < 1) {
      throw new ConfigurationError(`${where}.pattern needs a capture group`);
    }

    return {
      name: entry.name.trim(),
      confidence: entry.confidence,
      pattern: entry.pattern,
      flags,
      minWords:
        entry.min_words === undefined
          ? 1
          : validateNumber(`${where}.min_words`, entry.min_words, {
              min: 1,
              integer: true,
            }),
    };
  });

  rejectDuplicateNames("customer_patterns", patterns);

  // Confidence classes must not increase down the list
  for (let i = 1; i < patterns.length; i++) {
    const previous = CONFIDENCE_CLASSES.indexOf(patterns[i - 1].confidence);
    const current = CONFIDENCE_CLASSES.indexOf(patterns[i].confidence);
    if (current < previous) {
      throw new ConfigurationError(
        `customer_patterns must be ordered by decreasing confidence: ` +
          `"${patterns[i].name}" (${patterns[i].confidence}) follows ` +
          `"${patterns[i - 1].name}" (${patterns[i - 1].confidence})`
      );
    }
  }

  return patterns;
}

/**
 * Validates an ordered list of holiday ranges
 */
function parseHolidayRanges(value: unknown): HolidayRangeConfig[] {
  if (!Array.isArray(value)) {
    throw new ConfigurationError("holiday_ranges must be a list");
  }

  const names = new Set<string>();
  return value.map((entry: unknown, index) => {
    const where = `holiday_ranges[${index}]`;
    if (
      !isPlainObject(entry) ||
      !isNonEmptyString(entry.name) ||
      !isNonEmptyString(entry.start) ||
      !isNonEmptyString(entry.end)
    ) {
      throw new ConfigurationError(
        `${where} must have a "name", a "start" and an "end"`
      );
    }
    for (const boundary of [entry.start, entry.end]) {
      if (parseMonthDay(boundary) === undefined) {
        throw new ConfigurationError(
          `${where}: invalid month/day "${boundary}" (expected e.g. "Nov 20" or "11-20")`
        );
      }
    }
    const name = entry.name.trim();
    if (names.has(name)) {
      throw new ConfigurationError(`${where}: duplicate holiday period "${name}"`);
    }
    names.add(name);
    return { name, start: entry.start, end: entry.end };
  });
}

function parseTables(value: unknown): TableConfig[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigurationError("tables must be a non-empty list");
  }

  return value.map((entry: unknown, index) => {
    const where = `tables[${index}]`;
    if (!isPlainObject(entry) || !isNonEmptyString(entry.name)) {
      throw new ConfigurationError(`${where} must have a "name"`);
    }
    return {
      name: entry.name.trim(),
      category: lookup(`${where}.category`, CATEGORY_FIELDS, entry.category),
      bucket: lookup(`${where}.bucket`, BUCKET_FIELDS, entry.bucket),
      topN:
        entry.top_n === undefined
          ? 10
          : validateNumber(`${where}.top_n`, entry.top_n, { min: 1, integer: true }),
    };
  });
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Default pipeline configuration
 */
export function getDefaultPipelineConfig(): PipelineConfig {
  return buildPipelineConfig({}, {});
}

/**
 * Builds the pipeline configuration from defaults, a parsed config file and the environment
 * @param fileConfig - Parsed JSON configuration (snake_case keys), or {} for none
 * @param env - Environment variables; TREND_THRESHOLD, ANOMALY_WINDOW, ANOMALY_SENSITIVITY and MAX_RECORDS win over the file
 * @throws {ConfigurationError} When any setting is malformed
 */
export function buildPipelineConfig(
  fileConfig: unknown,
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  if (!isPlainObject(fileConfig)) {
    throw new ConfigurationError("Pipeline configuration must be a JSON object");
  }

  const unknownKeys = Object.keys(fileConfig).filter(
    (key) => !FILE_KEYS.some((known) => known === key)
  );
  if (unknownKeys.length > 0) {
    throw new ConfigurationError(
      `Unknown pipeline configuration key(s): ${unknownKeys.join(", ")}`
    );
  }

  const file = fileConfig;
  const setting = (envName: string, fileKey: (typeof FILE_KEYS)[number]) =>
    env[envName] !== undefined && env[envName] !== "" ? env[envName] : file[fileKey];

  const holidayFallback =
    file.holiday_fallback === undefined ? "Off-Season" : file.holiday_fallback;
  if (!isNonEmptyString(holidayFallback)) {
    throw new ConfigurationError("holiday_fallback must be a non-empty string");
  }

  const config: PipelineConfig = {
    fieldAliases:
      file.field_aliases === undefined
        ? DEFAULT_FIELD_ALIASES
        : parseFieldAliases(file.field_aliases),
    appPatterns: parseAppPatterns(file.app_patterns ?? defaultAppPatterns),
    customerPatterns:
      file.customer_patterns === undefined
        ? DEFAULT_CUSTOMER_PATTERNS
        : parseCustomerPatterns(file.customer_patterns),
    customerStopWords: validateStringList(
      "customer_stop_words",
      file.customer_stop_words ?? defaultStopWords
    ).map((word) => word.toLowerCase()),
    errorTypePatterns: parseErrorTypePatterns(
      file.error_type_patterns ?? defaultErrorTypePatterns
    ),
    holidayRanges: parseHolidayRanges(file.holiday_ranges ?? DEFAULT_HOLIDAY_RANGES),
    holidayFallback: holidayFallback.trim(),
    trendThreshold: validateNumber(
      "trend_threshold",
      setting("TREND_THRESHOLD", "trend_threshold") ?? 0.15,
      { min: 0 }
    ),
    trendMinPoints: validateNumber(
      "trend_min_points",
      file.trend_min_points ?? 2,
      { min: 2, integer: true }
    ),
    anomalyWindow: validateNumber(
      "anomaly_window",
      setting("ANOMALY_WINDOW", "anomaly_window") ?? 3,
      { min: 1, integer: true }
    ),
    anomalySensitivity: validateNumber(
      "anomaly_sensitivity",
      setting("ANOMALY_SENSITIVITY", "anomaly_sensitivity") ?? 2,
      { min: 0 }
    ),
    anomalyMinHistory: validateNumber(
      "anomaly_min_history",
      file.anomaly_min_history ?? 2,
      { min: 1, integer: true }
    ),
    maxRecords: validateNumber(
      "max_records",
      setting("MAX_RECORDS", "max_records") ?? 50000,
      { min: 1, integer: true }
    ),
    tables: file.tables === undefined ? DEFAULT_TABLES : parseTables(file.tables),
  };

  if (config.holidayRanges.some((range) => range.name === config.holidayFallback)) {
    throw new ConfigurationError(
      `holiday_fallback "${config.holidayFallback}" must differ from every holiday_ranges name`
    );
  }

  const tableNames = new Set(config.tables.map((table) => table.name));
  if (tableNames.size !== config.tables.length) {
    throw new ConfigurationError("tables must have unique names");
  }

  return deepFreeze(structuredClone(config));
}

/**
 * Loads the pipeline configuration, reading the JSON file at `filePath` when given
 * @throws {ConfigurationError} When the file cannot be read or parsed, or a setting is invalid
 */
export function getPipelineConfig(filePath?: string): PipelineConfig {
  if (!filePath) {
    return buildPipelineConfig({});
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read pipeline configuration file: ${filePath}`,
      { cause: error }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `Pipeline configuration file is not valid JSON: ${filePath}`,
      { cause: error }
    );
  }

  return buildPipelineConfig(parsed);
}
