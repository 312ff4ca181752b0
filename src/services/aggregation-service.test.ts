import { describe, expect, it } from "vitest";
import { AggregationService, TableDefinition, toTableDefinition } from "./aggregation-service";
import type { EnrichedIssue } from "../types";

const service = new AggregationService();

let sequence = 0;
function makeIssue(overrides: Partial<EnrichedIssue> = {}): EnrichedIssue {
  sequence += 1;
  return {
    id: `CS-${sequence}`,
    summary: "",
    status: "Open",
    priority: "Medium",
    createdAt: new Date("2024-01-10T00:00:00Z"),
    rawFields: {},
    monthYear: "2024-01",
    year: 2024,
    quarter: 1,
    quarterLabel: "2024-Q1",
    integrationApp: "Unknown",
    errorType: "Other",
    customer: "Unknown",
    extractionConfidence: "none",
    holidayPeriod: "Off-Season",
    isHolidaySeason: false,
    ...overrides,
  };
}

const byApp = toTableDefinition({
  name: "Apps per Month",
  category: "integrationApp",
  bucket: "monthYear",
  topN: 2,
});

const issues = [
  makeIssue({ integrationApp: "Salesforce", monthYear: "2024-01" }),
  makeIssue({ integrationApp: "Salesforce", monthYear: "2024-02" }),
  makeIssue({ integrationApp: "Shopify", monthYear: "2024-02" }),
  makeIssue({ integrationApp: "NetSuite", monthYear: "2024-03" }),
];

describe("AggregationService", () => {
  it("counts issues per category and bucket", () => {
    const table = service.aggregate(issues, byApp);

    expect(table.buckets).toEqual(["2024-01", "2024-02", "2024-03"]);
    expect(table.cells).toEqual({
      Salesforce: { "2024-01": 1, "2024-02": 1, "2024-03": 0 },
      NetSuite: { "2024-01": 0, "2024-02": 0, "2024-03": 1 },
      Shopify: { "2024-01": 0, "2024-02": 1, "2024-03": 0 },
    });
    expect(table.rowTotals).toEqual({ Salesforce: 2, NetSuite: 1, Shopify: 1 });
    expect(table.columnTotals).toEqual({ "2024-01": 1, "2024-02": 2, "2024-03": 1 });
    expect(table.grandTotal).toBe(4);
  });

  it("ranks by total, breaking ties by name, and keeps the top N", () => {
    const table = service.aggregate(issues, byApp);

    expect(table.ranking).toEqual([
      { rank: 1, category: "Salesforce", total: 2, percentage: 50, meanResolutionDays: null },
      { rank: 2, category: "NetSuite", total: 1, percentage: 25, meanResolutionDays: null },
      { rank: 3, category: "Shopify", total: 1, percentage: 25, meanResolutionDays: null },
    ]);
    expect(table.categories).toEqual(["Salesforce", "NetSuite", "Shopify"]);
    expect(table.top.map((entry) => entry.category)).toEqual(["Salesforce", "NetSuite"]);
  });

  it("counts missing values as Unknown", () => {
    const table = service.aggregate(
      [makeIssue({ rootCause: "Token Expired" }), makeIssue(), makeIssue({ rootCause: "  " })],
      toTableDefinition({
        name: "Root Causes",
        category: "rootCause",
        bucket: "monthYear",
        topN: 10,
      })
    );

    expect(table.rowTotals).toEqual({ Unknown: 2, "Token Expired": 1 });
  });

  it("keeps category text that collides with object internals as a row", () => {
    const table = service.aggregate(
      [makeIssue({ rootCause: "__proto__" }), makeIssue({ rootCause: "Config" })],
      toTableDefinition({
        name: "Root Causes",
        category: "rootCause",
        bucket: "monthYear",
        topN: 10,
      })
    );

    expect(table.categories).toEqual(["Config", "__proto__"]);
    expect(Object.entries(table.rowTotals)).toEqual([
      ["Config", 1],
      ["__proto__", 1],
    ]);
    const serialized = JSON.parse(JSON.stringify(table.cells));
    expect(Object.keys(serialized)).toEqual(["Config", "__proto__"]);
    expect(Object.getOwnPropertyDescriptor(table.cells, "__proto__")?.value).toEqual({
      "2024-01": 1,
    });
    expect(table.columnTotals).toEqual({ "2024-01": 2 });
  });

  it("averages resolution days per category over resolved issues", () => {
    const table = service.aggregate(
      [
        makeIssue({ errorType: "Sync/Flow", resolutionDays: 1 }),
        makeIssue({ errorType: "Sync/Flow", resolutionDays: 2 }),
        makeIssue({ errorType: "Sync/Flow", resolutionDays: 4 }),
        makeIssue({ errorType: "Sync/Flow" }),
        makeIssue({ errorType: "Authentication" }),
      ],
      toTableDefinition({
        name: "Error Types",
        category: "errorType",
        bucket: "monthYear",
        topN: 10,
      })
    );

    expect(table.ranking).toEqual([
      { rank: 1, category: "Sync/Flow", total: 4, percentage: 80, meanResolutionDays: 2.33 },
      { rank: 2, category: "Authentication", total: 1, percentage: 20, meanResolutionDays: null },
    ]);
  });

  it("groups by assignee", () => {
    const table = service.aggregate(
      [
        makeIssue({ assignee: "Dana Smith" }),
        makeIssue({ assignee: "Dana Smith" }),
        makeIssue(),
      ],
      toTableDefinition({
        name: "Assignees",
        category: "assignee",
        bucket: "quarterLabel",
        topN: 10,
      })
    );

    expect(table.cells).toEqual({
      "Dana Smith": { "2024-Q1": 2 },
      Unknown: { "2024-Q1": 1 },
    });
  });

  it("rounds percentages half to even", () => {
    const many = Array.from({ length: 8 }, (_, index) =>
      makeIssue({ integrationApp: index === 0 ? "Zoom" : "Slack" })
    );
    const thirds = [
      makeIssue({ integrationApp: "Jira" }),
      makeIssue({ integrationApp: "Asana" }),
      makeIssue({ integrationApp: "Azure" }),
    ];

    expect(service.aggregate(many, byApp).ranking[1].percentage).toBe(12.5);
    expect(service.aggregate(thirds, byApp).ranking.map((entry) => entry.percentage)).toEqual([
      33.33, 33.33, 33.33,
    ]);
  });

  it("places every issue in exactly one cell", () => {
    const table = service.aggregate(issues, byApp);
    const cellSum = table.categories.reduce(
      (sum, category) =>
        sum + table.buckets.reduce((row, bucket) => row + table.cells[category][bucket], 0),
      0
    );
    expect(cellSum).toBe(issues.length);
  });

  it("does not depend on input order", () => {
    const forward = service.aggregate(issues, byApp);
    const reversed = service.aggregate([...issues].reverse(), byApp);
    expect(reversed).toEqual(forward);
  });

  it("supports numeric buckets and custom selectors", () => {
    const definition: TableDefinition = {
      name: "Priorities per Year",
      categoryField: "priority",
      bucketField: "year",
      category: (issue) => issue.priority,
      bucket: (issue) => issue.year,
    };
    const table = service.aggregate(
      [makeIssue({ priority: "High", year: 2025 }), makeIssue({ priority: "High" })],
      definition
    );

    expect(table.cells).toEqual({ High: { "2024": 1, "2025": 1 } });
    expect(table.top).toHaveLength(1);
  });

  it("returns an empty table for no issues", () => {
    const table = service.aggregate([], byApp);
    expect(table.grandTotal).toBe(0);
    expect(table.ranking).toEqual([]);
    expect(table.buckets).toEqual([]);
  });
});
