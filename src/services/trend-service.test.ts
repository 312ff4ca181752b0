import { describe, expect, it } from "vitest";
import { TrendService } from "./trend-service";
import type { AggregationTable } from "../types";

const service = new TrendService({
  trendThreshold: 0.15,
  trendMinPoints: 2,
  anomalyWindow: 3,
  anomalySensitivity: 2,
  anomalyMinHistory: 2,
});

const months = ["2024-01", "2024-02", "2024-03", "2024-04", "2024-05"];
const points = (counts: number[]) =>
  counts.map((count, index) => ({ month: months[index], count }));

describe("TrendService.analyze", () => {
  it("flags a sudden spike against the trailing months", () => {
    const series = service.analyze("Salesforce", points([5, 5, 4, 6, 20]));
    expect(series.anomalousMonths).toEqual(["2024-05"]);
    expect(series.trendLabel).toBe("increasing");
  });

  it("labels a rising series as increasing", () => {
    const series = service.analyze("Shopify", points([2, 4, 6, 8, 10]));
    expect(series.trendLabel).toBe("increasing");
    expect(series.changePercent).toBe(200);
    expect(series.slope).toBe(2);
  });

  it("labels a falling series as decreasing", () => {
    const series = service.analyze("NetSuite", points([10, 8, 6, 4, 2]));
    expect(series.trendLabel).toBe("decreasing");
    expect(series.changePercent).toBe(-66.67);
    expect(series.slope).toBe(-2);
  });

  it("labels flat series as stable without anomalies", () => {
    const series = service.analyze("Magento", points([5, 5, 5, 5]));
    expect(series.trendLabel).toBe("stable");
    expect(series.changePercent).toBe(0);
    expect(series.anomalousMonths).toEqual([]);
  });

  it("keeps changes within the threshold stable", () => {
    expect(service.labelTrend([10, 10, 11, 10])).toEqual({
      label: "stable",
      changePercent: 5,
    });
  });

  it("labels series too short to compare as stable", () => {
    expect(service.analyze("Zoom", points([7]))).toEqual({
      category: "Zoom",
      points: [{ month: "2024-01", count: 7 }],
      trendLabel: "stable",
      changePercent: null,
      slope: 0,
      anomalousMonths: [],
    });
  });

  it("labels growth from zero as increasing with no percentage", () => {
    expect(service.labelTrend([0, 0, 3, 4])).toEqual({
      label: "increasing",
      changePercent: null,
    });
    expect(service.labelTrend([0, 0, 0, 0])).toEqual({
      label: "stable",
      changePercent: null,
    });
  });

  it("needs enough history before flagging a month", () => {
    expect(service.findAnomalies([1, 40])).toEqual([]);
  });
});

describe("TrendService.buildSeries", () => {
  const table: AggregationTable = {
    name: "Apps per Month",
    categoryField: "integrationApp",
    bucketField: "monthYear",
    categories: ["Salesforce", "Shopify"],
    buckets: ["2024-01", "2024-03"],
    cells: {
      Salesforce: { "2024-01": 3, "2024-03": 1 },
      Shopify: { "2024-01": 0, "2024-03": 2 },
    },
    rowTotals: { Salesforce: 4, Shopify: 2 },
    columnTotals: { "2024-01": 3, "2024-03": 3 },
    grandTotal: 6,
    ranking: [],
    top: [],
  };

  it("fills months without issues with zero", () => {
    const [salesforce, shopify] = service.buildSeries(table);
    expect(salesforce.points).toEqual([
      { month: "2024-01", count: 3 },
      { month: "2024-02", count: 0 },
      { month: "2024-03", count: 1 },
    ]);
    expect(salesforce.trendLabel).toBe("decreasing");
    expect(shopify.trendLabel).toBe("increasing");
  });

  it("builds nothing for tables not bucketed by month", () => {
    expect(
      service.buildSeries({ ...table, bucketField: "year", buckets: ["2024", "2025"] })
    ).toEqual([]);
  });
});
