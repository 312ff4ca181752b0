/**
 * Type definitions for the Issue Analytics Pipeline
 */

// ============================================
// Jira API Types
// ============================================

/**
 * Jira content structure (Atlassian Document Format nodes)
 */
export interface JiraContent {
  type?: string;
  text?: string;
  content?: JiraContent[];
}

/**
 * Named Jira field value (status, priority, resolution, ...)
 */
export interface JiraNamedValue {
  name: string;
}

/**
 * Raw Jira issue from the search API
 */
export interface JiraIssue {
  key: string;
  fields: {
    summary?: string;
    description?: JiraContent | string | null;
    status?: JiraNamedValue | null;
    priority?: JiraNamedValue | null;
    issuetype?: JiraNamedValue | null;
    resolution?: JiraNamedValue | null;
    project?: { key: string; name: string } | null;
    assignee?: { displayName: string } | null;
    reporter?: { displayName: string } | null;
    created?: string;
    updated?: string;
    resolutiondate?: string | null;
    labels?: string[];
    components?: JiraNamedValue[];
    [customField: string]: unknown;
  };
}

/**
 * One page of the Jira search endpoint
 */
export interface JiraSearchPage {
  issues: JiraIssue[];
  nextPageToken?: string;
  isLast?: boolean;
}

// ============================================
// Pipeline Record Types
// ============================================

/**
 * A source record keyed by whatever field names the source uses
 */
export type RawRecord = Readonly<Record<string, unknown>>;

/**
 * Canonical fields the normalizer knows how to fill
 */
export type CanonicalField =
  | "id"
  | "summary"
  | "description"
  | "status"
  | "priority"
  | "issueType"
  | "resolution"
  | "rootCause"
  | "createdAt"
  | "updatedAt"
  | "resolvedAt"
  | "assignee"
  | "reporter";

/**
 * Canonical issue record
 */
export interface Issue {
  readonly id: string;
  readonly summary: string;
  readonly description?: string;
  readonly status: string;
  readonly priority: string;
  readonly issueType?: string;
  /** Resolution type as recorded by the tracker */
  readonly resolution?: string;
  readonly rootCause?: string;
  readonly createdAt: Date;
  readonly updatedAt?: Date;
  readonly resolvedAt?: Date;
  readonly assignee?: string;
  readonly reporter?: string;
  /** Source fields no alias claimed, kept verbatim for traceability */
  readonly rawFields: Readonly<Record<string, unknown>>;
}

export type ExtractionConfidence = "high" | "medium" | "low" | "none";

/**
 * Issue with derived temporal and extracted-entity fields
 */
export interface EnrichedIssue extends Issue {
  /** "YYYY-MM" of createdAt (UTC) */
  readonly monthYear: string;
  readonly year: number;
  /** 1-based quarter of createdAt */
  readonly quarter: number;
  /** "YYYY-Qn" */
  readonly quarterLabel: string;
  readonly resolutionTimeMs?: number;
  readonly resolutionDays?: number;
  /** Tracker resolution, or "Unresolved" for open issues without one */
  readonly resolutionType?: string;
  readonly integrationApp: string;
  /** Kind of failure classified from the issue text, "Other" when no rule matches */
  readonly errorType: string;
  readonly customer: string;
  readonly extractionConfidence: ExtractionConfidence;
  /** Name of the extraction rule that produced the customer */
  readonly customerRule?: string;
  readonly holidayPeriod: string;
  readonly isHolidaySeason: boolean;
}

// ============================================
// Normalization Report Types
// ============================================

export interface NormalizationFailure {
  readonly index: number;
  readonly id?: string;
  readonly reasons: readonly string[];
}

export interface NormalizationWarning {
  readonly index: number;
  readonly id: string;
  readonly field: CanonicalField;
  readonly value: string;
  readonly message: string;
}

export interface NormalizationReport {
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly failures: readonly NormalizationFailure[];
  readonly reasonCounts: Readonly<Record<string, number>>;
  readonly warnings: readonly NormalizationWarning[];
}

export interface NormalizationResult {
  readonly issues: readonly Issue[];
  readonly report: NormalizationReport;
}

// ============================================
// Aggregation Types
// ============================================

export interface RankedCategory {
  readonly rank: number;
  readonly category: string;
  readonly total: number;
  /** Share of the grand total, percent, two decimals (half-even) */
  readonly percentage: number;
  /** Mean resolution days of the category's resolved issues, null when none is resolved */
  readonly meanResolutionDays: number | null;
}

/**
 * Issue counts by category value and time bucket
 */
export interface AggregationTable {
  readonly name: string;
  readonly categoryField: string;
  readonly bucketField: string;
  /** Categories in ranked order */
  readonly categories: readonly string[];
  /** Buckets in ascending order */
  readonly buckets: readonly string[];
  readonly cells: Readonly<Record<string, Readonly<Record<string, number>>>>;
  readonly rowTotals: Readonly<Record<string, number>>;
  readonly columnTotals: Readonly<Record<string, number>>;
  readonly grandTotal: number;
  readonly ranking: readonly RankedCategory[];
  readonly top: readonly RankedCategory[];
}

// ============================================
// Trend Types
// ============================================

export type TrendLabel = "increasing" | "decreasing" | "stable";

export interface TrendPoint {
  readonly month: string;
  readonly count: number;
}

export interface TrendSeries {
  readonly category: string;
  readonly points: readonly TrendPoint[];
  readonly trendLabel: TrendLabel;
  /** Relative change of the later half against the earlier half, null when undefined */
  readonly changePercent: number | null;
  /** Least-squares slope in issues per month */
  readonly slope: number;
  readonly anomalousMonths: readonly string[];
}

// ============================================
// Pipeline Output Types
// ============================================

export interface ResolutionStats {
  readonly count: number;
  readonly meanDays: number | null;
  readonly medianDays: number | null;
}

export interface PipelineSummary {
  readonly totalIssues: number;
  readonly resolvedIssues: number;
  readonly openIssues: number;
  /** Percent, two decimals (half-even) */
  readonly resolutionRate: number;
  readonly resolution: ResolutionStats;
  readonly holidaySeasonResolution: ResolutionStats;
  readonly offSeasonResolution: ResolutionStats;
  readonly holidayPeriodDistribution: Readonly<Record<string, number>>;
}

export interface PipelineResult {
  readonly report: NormalizationReport;
  readonly issues: readonly EnrichedIssue[];
  readonly tables: readonly AggregationTable[];
  /** Trend series per month-bucketed table, keyed by table name */
  readonly trends: Readonly<Record<string, readonly TrendSeries[]>>;
  readonly summary: PipelineSummary;
}
