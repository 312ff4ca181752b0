import type { HolidayRangeConfig } from "../config/pipeline.config";
import { getMonthDay, parseMonthDay } from "./date-utils";
import { RuleList } from "./rule-list";

/**
 * A holiday range resolved to month/day ordinals (Nov 20 -> 1120)
 */
export interface HolidayRange {
  readonly name: string;
  readonly start: number;
  readonly end: number;
  /** Range runs from `start` in one year to `end` in the next */
  readonly crossesYearBoundary: boolean;
}

/**
 * Resolves a configured range to month/day ordinals
 * @throws {Error} When a boundary is not a valid month/day
 */
export function toHolidayRange(config: HolidayRangeConfig): HolidayRange {
  const start = parseMonthDay(config.start);
  const end = parseMonthDay(config.end);
  if (start === undefined || end === undefined) {
    throw new Error(
      `Invalid holiday range "${config.name}": ${config.start} - ${config.end}`
    );
  }
  return { name: config.name, start, end, crossesYearBoundary: start > end };
}

/**
 * Whether a month/day falls inside a range, both boundaries included.
 * A range crossing the year boundary covers [start, Dec 31] of one year and [Jan 1, end] of the next.
 */
export function isInRange(range: HolidayRange, monthDay: number): boolean {
  if (range.crossesYearBoundary) {
    return monthDay >= range.start || monthDay <= range.end;
  }
  return monthDay >= range.start && monthDay <= range.end;
}

/**
 * Classifies dates into named holiday periods. Ranges may overlap; they are evaluated
 * in configured order and the first one containing the date wins. Dates outside every
 * range get the fallback period.
 */
export class HolidayCalendar {
  private readonly rules: RuleList<number, string>;

  constructor(
    ranges: readonly HolidayRangeConfig[],
    readonly fallback: string
  ) {
    this.rules = new RuleList(
      ranges.map(toHolidayRange).map((range) => ({
        name: range.name,
        tag: undefined,
        apply: (monthDay: number) =>
          isInRange(range, monthDay) ? range.name : undefined,
      }))
    );
  }

  /**
   * Returns the holiday period of a date (UTC month/day)
   */
  classify(date: Date): string {
    return this.rules.evaluate(getMonthDay(date))?.value ?? this.fallback;
  }

  /**
   * Period names in priority order, fallback last
   */
  get periods(): string[] {
    return [...this.rules.rules.map((rule) => rule.name), this.fallback];
  }
}
