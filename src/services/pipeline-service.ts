import type {
  EnrichedIssue,
  PipelineResult,
  PipelineSummary,
  RawRecord,
  ResolutionStats,
  TrendSeries,
} from "../types";
import type { PipelineConfig } from "../config/pipeline.config";
import { NormalizationService } from "./normalization-service";
import { ExtractionService } from "./extraction-service";
import { EnrichmentService } from "./enrichment-service";
import { AggregationService, toTableDefinition } from "./aggregation-service";
import { TrendService } from "./trend-service";
import { HolidayCalendar } from "../utils/holiday-calendar";
import { CapacityError, NoUsableRecordsError } from "../utils/errors";
import { mean, median, roundHalfEven } from "../utils/math-utils";
import { logger } from "../utils/logger";

/**
 * Service responsible for orchestrating one pipeline run
 * Coordinates normalization, enrichment, aggregation and trend detection
 */
export class PipelineService {
  constructor(
    private readonly config: PipelineConfig,
    private readonly normalizationService: NormalizationService,
    private readonly enrichmentService: EnrichmentService,
    private readonly aggregationService: AggregationService,
    private readonly trendService: TrendService
  ) {}

  /**
   * Runs the pipeline over a batch of raw records
   * @param records - Raw records from any issue source
   * @returns Normalization report, enriched issues, tables, trends and summary statistics
   * @throws {CapacityError} When the batch exceeds maxRecords
   * @throws {NoUsableRecordsError} When no record survives normalization
   */
  run(records: Iterable<RawRecord>): PipelineResult {
    const batch: RawRecord[] = [];
    for (const record of records) {
      // stop reading at the first record past the ceiling
      if (batch.length === this.config.maxRecords) {
        throw new CapacityError(batch.length + 1, this.config.maxRecords);
      }
      batch.push(record);
    }

    const { issues, report } = this.normalizationService.normalize(batch);
    if (issues.length === 0) {
      throw new NoUsableRecordsError(report);
    }
    logger.debug(`Normalized ${issues.length} of ${report.total} records`);

    const enriched = this.enrichmentService.enrichAll(issues);

    const tables = this.config.tables.map((table) =>
      this.aggregationService.aggregate(enriched, toTableDefinition(table))
    );

    const trends: Record<string, TrendSeries[]> = {};
    for (const table of tables) {
      const series = this.trendService.buildSeries(table);
      if (series.length > 0) {
        trends[table.name] = series;
      }
    }
    logger.debug(
      `Built ${tables.length} tables and trends for ${Object.keys(trends).length}`
    );

    return {
      report,
      issues: enriched,
      tables,
      trends,
      summary: this.summarize(enriched),
    };
  }

  /**
   * Overall counts and resolution-time statistics
   */
  private summarize(issues: readonly EnrichedIssue[]): PipelineSummary {
    const resolved = issues.filter((issue) => issue.resolvedAt !== undefined);

    const distribution = new Map<string, number>();
    for (const issue of issues) {
      distribution.set(issue.holidayPeriod, (distribution.get(issue.holidayPeriod) ?? 0) + 1);
    }
    const periodOrder = [
      ...this.config.holidayRanges.map((range) => range.name),
      this.config.holidayFallback,
    ];

    return {
      totalIssues: issues.length,
      resolvedIssues: resolved.length,
      openIssues: issues.length - resolved.length,
      resolutionRate: roundHalfEven((resolved.length / issues.length) * 100, 2),
      resolution: this.resolutionStats(resolved),
      holidaySeasonResolution: this.resolutionStats(
        resolved.filter((issue) => issue.isHolidaySeason)
      ),
      offSeasonResolution: this.resolutionStats(
        resolved.filter((issue) => !issue.isHolidaySeason)
      ),
      holidayPeriodDistribution: Object.fromEntries(
        periodOrder.map((period) => [period, distribution.get(period) ?? 0])
      ),
    };
  }

  private resolutionStats(issues: readonly EnrichedIssue[]): ResolutionStats {
    const days = issues
      .map((issue) => issue.resolutionDays)
      .filter((value): value is number => value !== undefined);

    if (days.length === 0) {
      return { count: 0, meanDays: null, medianDays: null };
    }

    return {
      count: days.length,
      meanDays: roundHalfEven(mean(days), 2),
      medianDays: median(days),
    };
  }
}

/**
 * Wires the pipeline services for a configuration
 */
export function createPipeline(config: PipelineConfig): PipelineService {
  const extractionService = new ExtractionService(config);
  const holidayCalendar = new HolidayCalendar(
    config.holidayRanges,
    config.holidayFallback
  );

  return new PipelineService(
    config,
    new NormalizationService(config.fieldAliases),
    new EnrichmentService(extractionService, holidayCalendar),
    new AggregationService(),
    new TrendService(config)
  );
}

/**
 * Runs the pipeline once: a pure function of the records and the configuration
 */
export function runPipeline(
  records: Iterable<RawRecord>,
  config: PipelineConfig
): PipelineResult {
  return createPipeline(config).run(records);
}
