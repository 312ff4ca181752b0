import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { getConfig, loadConfig } from "./config";
import { getJiraConfig } from "./jira.config";
import { ConfigurationError } from "../utils/errors";

describe("getJiraConfig", () => {
  beforeEach(() => {
    vi.stubEnv("JIRA_URL", "https://example.atlassian.net/");
    vi.stubEnv("JIRA_USERNAME", "analyst@example.com");
    vi.stubEnv("JIRA_TOKEN", "test-token");
    vi.stubEnv("JIRA_MAX_RESULTS", "");
    vi.stubEnv("JIRA_ROOT_CAUSE_FIELD", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reads the connection settings", () => {
    const config = getJiraConfig();

    expect(config).toMatchObject({
      url: "https://example.atlassian.net",
      username: "analyst@example.com",
      token: "test-token",
      maxResults: 100,
      rootCauseField: undefined,
    });
    expect(config.fields.split(",")).toContain("resolutiondate");
  });

  it("requests the root cause field when one is configured", () => {
    vi.stubEnv("JIRA_ROOT_CAUSE_FIELD", "customfield_10100");
    vi.stubEnv("JIRA_MAX_RESULTS", "50");

    const config = getJiraConfig();
    expect(config.rootCauseField).toBe("customfield_10100");
    expect(config.fields.endsWith(",customfield_10100")).toBe(true);
    expect(config.maxResults).toBe(50);
  });

  it("rejects a missing token and a malformed URL", () => {
    vi.stubEnv("JIRA_TOKEN", "");
    expect(() => getJiraConfig()).toThrow("Missing required environment variable: JIRA_TOKEN");

    vi.stubEnv("JIRA_TOKEN", "test-token");
    vi.stubEnv("JIRA_URL", "example.atlassian.net");
    expect(() => getJiraConfig()).toThrow("Invalid JIRA_URL format: example.atlassian.net");
  });
});

describe("loadConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("skips the Jira settings when reading from a file", () => {
    vi.stubEnv("JIRA_URL", "");
    vi.stubEnv("DATA_DIRECTORY", "");
    vi.stubEnv("PIPELINE_CONFIG_FILE", "");

    const config = getConfig({ useJira: false });
    expect(config.jira).toBeUndefined();
    expect(config.app.dataDirectory).toBe("./data");
  });

  it("reads the pipeline file named by PIPELINE_CONFIG_FILE unless --config is given", () => {
    const directory = fs.mkdtempSync(path.join(os.tmpdir(), "issue-analytics-config-"));
    try {
      const fromEnv = path.join(directory, "env.json");
      const fromFlag = path.join(directory, "flag.json");
      fs.writeFileSync(fromEnv, JSON.stringify({ anomaly_min_history: 3 }));
      fs.writeFileSync(fromFlag, JSON.stringify({ anomaly_min_history: 4 }));
      vi.stubEnv("PIPELINE_CONFIG_FILE", fromEnv);

      const fromEnvConfig = getConfig({ useJira: false });
      expect(fromEnvConfig.app.pipelineConfigFile).toBe(fromEnv);
      expect(fromEnvConfig.pipeline.anomalyMinHistory).toBe(3);
      expect(
        getConfig({ useJira: false, pipelineConfigPath: fromFlag }).pipeline.anomalyMinHistory
      ).toBe(4);
    } finally {
      fs.rmSync(directory, { recursive: true, force: true });
    }
  });

  it("wraps configuration errors with a pointer to the .env file", () => {
    vi.stubEnv("JIRA_URL", "");
    vi.stubEnv("PIPELINE_CONFIG_FILE", "");

    let caught: unknown;
    try {
      loadConfig({ useJira: true });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof Error ? caught.message : "").toMatch(
      /^Configuration Error:\nMissing required environment variable: JIRA_URL/
    );
  });
});
