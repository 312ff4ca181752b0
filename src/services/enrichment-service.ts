import type { EnrichedIssue, Issue } from "../types";
import { ExtractionService } from "./extraction-service";
import { HolidayCalendar } from "../utils/holiday-calendar";
import { getQuarter, msToWholeDays, toMonthYear } from "../utils/date-utils";

/**
 * Resolution type given to open issues the tracker left without one
 */
const UNRESOLVED = "Unresolved";

/**
 * Service responsible for deriving temporal fields and extracted entities from issues
 */
export class EnrichmentService {
  constructor(
    private readonly extractionService: ExtractionService,
    private readonly holidayCalendar: HolidayCalendar
  ) {}

  /**
   * Enriches every issue; the input issues are left untouched
   */
  enrichAll(issues: readonly Issue[]): EnrichedIssue[] {
    return issues.map((issue) => this.enrich(issue));
  }

  /**
   * Builds the enriched view of one issue. Same issue in, same enriched issue out.
   */
  enrich(issue: Issue): EnrichedIssue {
    const { createdAt, resolvedAt } = issue;
    const year = createdAt.getUTCFullYear();
    const quarter = getQuarter(createdAt);

    const resolutionTimeMs = resolvedAt
      ? Math.max(0, resolvedAt.getTime() - createdAt.getTime())
      : undefined;

    const customer = this.extractionService.extractCustomer(
      issue.summary,
      issue.description
    );
    const holidayPeriod = this.holidayCalendar.classify(createdAt);

    return {
      ...issue,
      monthYear: toMonthYear(createdAt),
      year,
      quarter,
      quarterLabel: `${year}-Q${quarter}`,
      resolutionTimeMs,
      resolutionDays:
        resolutionTimeMs === undefined ? undefined : msToWholeDays(resolutionTimeMs),
      resolutionType: issue.resolution ?? (resolvedAt ? undefined : UNRESOLVED),
      integrationApp: this.extractionService.extractIntegrationApp(
        issue.summary,
        issue.description
      ),
      errorType: this.extractionService.extractErrorType(
        issue.summary,
        issue.description
      ),
      customer: customer.value,
      extractionConfidence: customer.confidence,
      customerRule: customer.rule,
      holidayPeriod,
      isHolidaySeason: holidayPeriod !== this.holidayCalendar.fallback,
    };
  }
}
