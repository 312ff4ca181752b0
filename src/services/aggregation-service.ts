import type { AggregationTable, EnrichedIssue, RankedCategory } from "../types";
import type { BucketField, CategoryField, TableConfig } from "../config/pipeline.config";
import { UNKNOWN } from "./extraction-service";
import { compareStrings, mean, roundHalfEven } from "../utils/math-utils";

/**
 * Picks the value an issue is grouped by; undefined and empty values count as "Unknown"
 */
export type Selector = (issue: EnrichedIssue) => string | number | undefined;

/**
 * A table to build: which category and which bucket to count by
 */
export interface TableDefinition {
  name: string;
  categoryField: string;
  bucketField: string;
  category: Selector;
  bucket: Selector;
  /** Number of categories kept in `top` */
  topN?: number;
}

const CATEGORY_SELECTORS: Record<CategoryField, Selector> = {
  integrationApp: (issue) => issue.integrationApp,
  customer: (issue) => issue.customer,
  extractionConfidence: (issue) => issue.extractionConfidence,
  errorType: (issue) => issue.errorType,
  assignee: (issue) => issue.assignee,
  resolutionType: (issue) => issue.resolutionType,
  rootCause: (issue) => issue.rootCause,
  status: (issue) => issue.status,
  priority: (issue) => issue.priority,
  issueType: (issue) => issue.issueType,
  holidayPeriod: (issue) => issue.holidayPeriod,
};

const BUCKET_SELECTORS: Record<BucketField, Selector> = {
  monthYear: (issue) => issue.monthYear,
  quarterLabel: (issue) => issue.quarterLabel,
  year: (issue) => issue.year,
  holidayPeriod: (issue) => issue.holidayPeriod,
};

/**
 * Resolves a configured table to its selectors
 */
export function toTableDefinition(table: TableConfig): TableDefinition {
  return {
    name: table.name,
    categoryField: table.category,
    bucketField: table.bucket,
    category: CATEGORY_SELECTORS[table.category],
    bucket: BUCKET_SELECTORS[table.bucket],
    topN: table.topN,
  };
}

/**
 * Service responsible for building pivot tables of issue counts
 */
export class AggregationService {
  /**
   * Counts issues per (category, bucket). Every issue lands in exactly one cell.
   * @param issues - Enriched issues to count
   * @param definition - Category and bucket selectors
   * @returns Table with totals, ranking and top-N
   */
  aggregate(
    issues: readonly EnrichedIssue[],
    definition: TableDefinition
  ): AggregationTable {
    const counts = new Map<string, Map<string, number>>();
    const resolutionDays = new Map<string, number[]>();
    const bucketSet = new Set<string>();

    for (const issue of issues) {
      const category = this.toKey(definition.category(issue));
      const bucket = this.toKey(definition.bucket(issue));
      bucketSet.add(bucket);

      const row = counts.get(category) ?? new Map<string, number>();
      row.set(bucket, (row.get(bucket) ?? 0) + 1);
      counts.set(category, row);

      if (issue.resolutionDays !== undefined) {
        const days = resolutionDays.get(category) ?? [];
        days.push(issue.resolutionDays);
        resolutionDays.set(category, days);
      }
    }

    const buckets = [...bucketSet].sort(compareStrings);
    const grandTotal = issues.length;
    const ranking = this.rankCategories(counts, resolutionDays, grandTotal);
    const categories = ranking.map((entry) => entry.category);

    // Category and bucket text become own keys, "__proto__" included
    const cells: Record<string, Record<string, number>> = Object.fromEntries(
      ranking.map((entry) => {
        const row = counts.get(entry.category) ?? new Map<string, number>();
        return [
          entry.category,
          Object.fromEntries(buckets.map((bucket) => [bucket, row.get(bucket) ?? 0])),
        ];
      })
    );
    const rowTotals: Record<string, number> = Object.fromEntries(
      ranking.map((entry) => [entry.category, entry.total])
    );

    const columnTotals: Record<string, number> = Object.fromEntries(
      buckets.map((bucket) => [
        bucket,
        categories.reduce(
          (sum, category) => sum + (counts.get(category)?.get(bucket) ?? 0),
          0
        ),
      ])
    );

    return {
      name: definition.name,
      categoryField: definition.categoryField,
      bucketField: definition.bucketField,
      categories,
      buckets,
      cells,
      rowTotals,
      columnTotals,
      grandTotal,
      ranking,
      top: this.topN(ranking, definition.topN ?? ranking.length),
    };
  }

  /**
   * First `n` entries of a ranking
   */
  topN(ranking: readonly RankedCategory[], n: number): RankedCategory[] {
    return ranking.slice(0, Math.max(0, n));
  }

  /**
   * Ranks categories by total descending, ties broken by category ascending
   */
  private rankCategories(
    counts: ReadonlyMap<string, ReadonlyMap<string, number>>,
    resolutionDays: ReadonlyMap<string, readonly number[]>,
    grandTotal: number
  ): RankedCategory[] {
    const totals = [...counts.entries()].map(([category, row]) => ({
      category,
      total: [...row.values()].reduce((sum, count) => sum + count, 0),
    }));

    totals.sort(
      (a, b) => b.total - a.total || compareStrings(a.category, b.category)
    );

    return totals.map((entry, index) => ({
      rank: index + 1,
      category: entry.category,
      total: entry.total,
      percentage:
        grandTotal === 0 ? 0 : roundHalfEven((entry.total / grandTotal) * 100, 2),
      meanResolutionDays: this.meanDays(resolutionDays.get(entry.category)),
    }));
  }

  private meanDays(days: readonly number[] | undefined): number | null {
    return days && days.length > 0 ? roundHalfEven(mean(days), 2) : null;
  }

  private toKey(value: string | number | undefined): string {
    if (value === undefined) {
      return UNKNOWN;
    }
    const key = String(value).trim();
    return key.length > 0 ? key : UNKNOWN;
  }
}
