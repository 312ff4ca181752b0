import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  buildPipelineConfig,
  getDefaultPipelineConfig,
  getPipelineConfig,
  parseCustomerPatterns,
} from "./pipeline.config";
import { ConfigurationError } from "../utils/errors";

describe("getDefaultPipelineConfig", () => {
  it("uses the documented defaults", () => {
    const config = getDefaultPipelineConfig();

    expect(config).toMatchObject({
      holidayFallback: "Off-Season",
      trendThreshold: 0.15,
      trendMinPoints: 2,
      anomalyWindow: 3,
      anomalySensitivity: 2,
      anomalyMinHistory: 2,
      maxRecords: 50000,
    });
    expect(config.holidayRanges.map((range) => range.name)).toEqual([
      "Black Friday Week",
      "Cyber Monday",
      "Holiday Shopping",
      "Christmas Week",
      "New Year Recovery",
    ]);
    expect(config.customerPatterns.map((pattern) => pattern.confidence)).toEqual([
      "high",
      "medium",
      "low",
      "low",
    ]);
    expect(config.appPatterns[0].name).toBe("SAP Business ByDesign");
    expect(config.errorTypePatterns[0]).toMatchObject({
      name: "Authentication",
      type: "Authentication",
    });
    expect(config.tables.map((table) => table.category)).toEqual([
      "integrationApp",
      "resolutionType",
      "rootCause",
      "customer",
      "errorType",
      "holidayPeriod",
    ]);
  });

  it("returns a deeply frozen configuration", () => {
    const config = getDefaultPipelineConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.tables[0])).toBe(true);
    expect(Object.isFrozen(config.fieldAliases.id)).toBe(true);
  });
});

describe("buildPipelineConfig", () => {
  it("applies file settings over the defaults", () => {
    const config = buildPipelineConfig(
      {
        trend_threshold: 0.25,
        holiday_fallback: "Regular",
        field_aliases: { id: ["Ticket"] },
        app_patterns: ["Acumatica", { name: "Odoo", pattern: "\\bOdoo\\b" }],
        tables: [{ name: "Status by Quarter", category: "status", bucket: "quarter" }],
      },
      {}
    );

    expect(config.trendThreshold).toBe(0.25);
    expect(config.holidayFallback).toBe("Regular");
    expect(config.fieldAliases.id).toEqual(["Ticket"]);
    expect(config.fieldAliases.summary).toContain("Summary");
    expect(config.appPatterns).toEqual([
      { name: "Acumatica" },
      { name: "Odoo", pattern: "\\bOdoo\\b" },
    ]);
    expect(config.tables).toEqual([
      { name: "Status by Quarter", category: "status", bucket: "quarterLabel", topN: 10 },
    ]);
  });

  it("reads error type rules and assignee tables", () => {
    const config = buildPipelineConfig(
      {
        error_type_patterns: [
          { name: "Billing", pattern: "\\binvoice\\b" },
          { name: "Refunds", type: "Billing", pattern: "\\brefund" },
        ],
        tables: [{ name: "Assignees", category: "assignee", bucket: "month_year", top_n: 5 }],
      },
      {}
    );

    expect(config.errorTypePatterns).toEqual([
      { name: "Billing", type: "Billing", pattern: "\\binvoice\\b" },
      { name: "Refunds", type: "Billing", pattern: "\\brefund" },
    ]);
    expect(config.tables).toEqual([
      { name: "Assignees", category: "assignee", bucket: "monthYear", topN: 5 },
    ]);
  });

  it("lets environment variables win over the file", () => {
    const config = buildPipelineConfig(
      { anomaly_window: 4, max_records: 100 },
      { ANOMALY_WINDOW: "6", TREND_THRESHOLD: "0.3", ANOMALY_SENSITIVITY: "", MAX_RECORDS: undefined }
    );

    expect(config.anomalyWindow).toBe(6);
    expect(config.trendThreshold).toBe(0.3);
    expect(config.anomalySensitivity).toBe(2);
    expect(config.maxRecords).toBe(100);
  });

  const invalidConfigs: [string, unknown, string][] = [
    ["an unknown key", { trend_treshold: 0.2 }, "Unknown pipeline configuration key(s): trend_treshold"],
    ["a negative threshold", { trend_threshold: -1 }, "Invalid trend_threshold: -1"],
    ["a fractional window", { anomaly_window: 2.5 }, "Invalid anomaly_window: 2.5"],
    ["an invalid app pattern", { app_patterns: [{ name: "Broken", pattern: "(" }] }, "Invalid pattern in app_patterns[0]"],
    ["an impossible holiday date", { holiday_ranges: [{ name: "Late", start: "Nov 31", end: "Dec 2" }] }, 'invalid month/day "Nov 31"'],
    ["a repeated holiday period", { holiday_ranges: [{ name: "Peak", start: "Nov 1", end: "Nov 5" }, { name: "Peak", start: "Dec 1", end: "Dec 5" }] }, 'duplicate holiday period "Peak"'],
    ["an unknown table category", { tables: [{ name: "Bad", category: "reporter", bucket: "month_year" }] }, "Invalid tables[0].category: reporter"],
    ["repeated application names", { app_patterns: ["Shopify", "Shopify"] }, 'app_patterns[1]: duplicate rule name "Shopify"'],
    ["repeated customer rule names", { customer_patterns: [{ name: "ref", confidence: "high", pattern: "ref:(\\w+)" }, { name: "ref", confidence: "low", pattern: "for (\\w+)" }] }, 'customer_patterns[1]: duplicate rule name "ref"'],
    ["repeated error type rule names", { error_type_patterns: [{ name: "Auth", pattern: "token" }, { name: "Auth", pattern: "login" }] }, 'error_type_patterns[1]: duplicate rule name "Auth"'],
    ["an invalid error type pattern", { error_type_patterns: [{ name: "Broken", pattern: "(" }] }, "Invalid pattern in error_type_patterns[0]"],
    ["a fallback named like a holiday period", { holiday_fallback: "Christmas Week" }, 'holiday_fallback "Christmas Week" must differ from every holiday_ranges name'],
    ["duplicate table names", { tables: [{ name: "T", category: "status", bucket: "year" }, { name: "T", category: "priority", bucket: "year" }] }, "tables must have unique names"],
    ["a non-object file", ["not", "an", "object"], "Pipeline configuration must be a JSON object"],
  ];

  it.each(invalidConfigs)("rejects %s", (_label, fileConfig, message) => {
    expect(() => buildPipelineConfig(fileConfig, {})).toThrow(ConfigurationError);
    expect(() => buildPipelineConfig(fileConfig, {})).toThrow(message);
  });
});

describe("parseCustomerPatterns", () => {
  it("reads confidence, flags and minimum words", () => {
    expect(
      parseCustomerPatterns([
        { name: "ref", confidence: "high", pattern: "ref:\\s*(\\w+)", flags: "i" },
        { name: "words", confidence: "medium", pattern: "for\\s+(\\w+ \\w+)", min_words: 2 },
      ])
    ).toEqual([
      { name: "ref", confidence: "high", pattern: "ref:\\s*(\\w+)", flags: "i", minWords: 1 },
      { name: "words", confidence: "medium", pattern: "for\\s+(\\w+ \\w+)", flags: "", minWords: 2 },
    ]);
  });

  it("requires a capture group", () => {
    expect(() =>
      parseCustomerPatterns([{ name: "bare", confidence: "high", pattern: "customer" }])
    ).toThrow("customer_patterns[0].pattern needs a capture group");
  });

  it("requires confidence to decrease down the list", () => {
    expect(() =>
      parseCustomerPatterns([
        { name: "loose", confidence: "low", pattern: "(\\w+)" },
        { name: "strict", confidence: "high", pattern: "id:(\\w+)" },
      ])
    ).toThrow("customer_patterns must be ordered by decreasing confidence");
  });

  it("rejects unknown confidence classes", () => {
    expect(() =>
      parseCustomerPatterns([{ name: "x", confidence: "certain", pattern: "(\\w+)" }])
    ).toThrow("customer_patterns[0].confidence must be one of: high, medium, low");
  });
});

describe("getPipelineConfig", () => {
  let directory: string;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), "pipeline-config-"));
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it("returns the defaults without a file", () => {
    expect(getPipelineConfig().maxRecords).toBe(50000);
  });

  it("reads a JSON file", () => {
    const file = path.join(directory, "pipeline.json");
    fs.writeFileSync(file, JSON.stringify({ max_records: 10 }));
    expect(getPipelineConfig(file).maxRecords).toBe(10);
  });

  it("reports unreadable and malformed files", () => {
    const missing = path.join(directory, "missing.json");
    expect(() => getPipelineConfig(missing)).toThrow(
      `Cannot read pipeline configuration file: ${missing}`
    );

    const broken = path.join(directory, "broken.json");
    fs.writeFileSync(broken, "{ not json");
    expect(() => getPipelineConfig(broken)).toThrow(
      `Pipeline configuration file is not valid JSON: ${broken}`
    );
  });
});
