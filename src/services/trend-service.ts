import type {
  AggregationTable,
  TrendLabel,
  TrendPoint,
  TrendSeries,
} from "../types";
import { isMonthBucket, monthRange } from "../utils/date-utils";
import {
  linearSlope,
  mean,
  roundHalfEven,
  standardDeviation,
} from "../utils/math-utils";

/**
 * Thresholds for trend labelling and anomaly flagging
 */
export interface TrendOptions {
  /** Relative change between series halves that counts as a trend (0.15 = 15%) */
  trendThreshold: number;
  /** Shorter series are labelled stable */
  trendMinPoints: number;
  /** Trailing months each month is compared against */
  anomalyWindow: number;
  /** Effective standard deviations a month may deviate before it is anomalous */
  anomalySensitivity: number;
  /** Earlier months required before a month can be flagged */
  anomalyMinHistory: number;
}

/**
 * Service responsible for labelling monthly series and flagging anomalous months.
 *
 * Trend: mean of the later half against mean of the earlier half (the middle point of an
 * odd-length series belongs to neither).
 *
 * Anomaly: rolling z-score. Month i is compared with the up to `anomalyWindow` months before
 * it; with mean m and population standard deviation s of that window, the month is anomalous
 * when |count - m| / max(s, sqrt(m), 1) > `anomalySensitivity` (sqrt(m): Poisson noise of a
 * count around m).
 */
export class TrendService {
  constructor(private readonly options: TrendOptions) {}

  /**
   * Builds one series per category of a month-bucketed table, over a gap-free month range
   * @returns Series in the table's category order; empty when the table has no month buckets
   */
  buildSeries(table: AggregationTable): TrendSeries[] {
    const months = table.buckets.filter(isMonthBucket);
    if (months.length === 0) {
      return [];
    }

    const range = monthRange(months[0], months[months.length - 1]);

    return table.categories.map((category) =>
      this.analyze(
        category,
        range.map((month) => ({
          month,
          count: table.cells[category]?.[month] ?? 0,
        }))
      )
    );
  }

  /**
   * Labels a series and flags its anomalous months
   */
  analyze(category: string, points: readonly TrendPoint[]): TrendSeries {
    const counts = points.map((point) => point.count);
    const { label, changePercent } = this.labelTrend(counts);
    const anomalies = this.findAnomalies(counts);

    return {
      category,
      points,
      trendLabel: label,
      changePercent,
      slope: roundHalfEven(linearSlope(counts), 4),
      anomalousMonths: anomalies.map((index) => points[index].month),
    };
  }

  /**
   * Compares the later half of a series with the earlier half
   */
  labelTrend(counts: readonly number[]): {
    label: TrendLabel;
    changePercent: number | null;
  } {
    if (counts.length < this.options.trendMinPoints || counts.length < 2) {
      return { label: "stable", changePercent: null };
    }

    const half = Math.floor(counts.length / 2);
    const earlier = mean(counts.slice(0, half));
    const later = mean(counts.slice(counts.length - half));

    if (earlier === 0) {
      return { label: later > 0 ? "increasing" : "stable", changePercent: null };
    }

    const change = (later - earlier) / earlier;
    const changePercent = roundHalfEven(change * 100, 2);

    if (change > this.options.trendThreshold) {
      return { label: "increasing", changePercent };
    }
    if (change < -this.options.trendThreshold) {
      return { label: "decreasing", changePercent };
    }
    return { label: "stable", changePercent };
  }

  /**
   * Indexes of anomalous points
   */
  findAnomalies(counts: readonly number[]): number[] {
    const { anomalyWindow, anomalySensitivity, anomalyMinHistory } = this.options;
    const anomalies: number[] = [];

    for (let i = anomalyMinHistory; i < counts.length; i++) {
      const window = counts.slice(Math.max(0, i - anomalyWindow), i);
      if (window.length === 0) {
        continue;
      }

      const windowMean = mean(window);
      const deviation = Math.max(
        standardDeviation(window),
        Math.sqrt(windowMean),
        1
      );

      if (Math.abs(counts[i] - windowMean) / deviation > anomalySensitivity) {
        anomalies.push(i);
      }
    }

    return anomalies;
  }
}
