#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import ora from "ora";
import dotenv from "dotenv";
import { loadConfig } from "./config/config";
import { JiraService } from "./services/jira-service";
import { StorageService } from "./services/storage-service";
import { createPipeline } from "./services/pipeline-service";
import {
  ConfigurationError,
  NoUsableRecordsError,
  SourceError,
} from "./utils/errors";
import type { PipelineResult, RawRecord } from "./types";
import {
  displayError,
  displayNormalizationReport,
  displaySummary,
  displayTable,
  displayTrends,
} from "./utils/display-utils";

// Load environment variables
dotenv.config();

interface CliOptions {
  file?: string;
  project?: string;
  jql?: string;
  from?: string;
  to?: string;
  config?: string;
  output?: string;
  top?: number;
}

function parseDateOption(value: string): string {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new InvalidArgumentError("Expected a date as YYYY-MM-DD.");
  }
  return value;
}

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/**
 * Main CLI program
 */
const program = new Command();

program
  .name("issue-analytics")
  .description(
    "Normalize, enrich and aggregate issue-tracker records into analytical tables"
  )
  .version("1.0.0")
  .option("-f, --file <path>", "Read raw records from a JSON export instead of Jira")
  .option("-p, --project <key>", "Jira project key to analyze")
  .option("-j, --jql <query>", "Raw JQL query (overrides --project/--from/--to)")
  .option("--from <date>", "Only issues created on or after this date (YYYY-MM-DD)", parseDateOption)
  .option("--to <date>", "Only issues created on or before this date (YYYY-MM-DD)", parseDateOption)
  .option("-c, --config <path>", "Pipeline configuration JSON file")
  .option("-o, --output <path>", "Where to write the JSON report")
  .option("-n, --top <n>", "Override the number of ranked categories shown", parsePositiveInt)
  .action(async (options: CliOptions) => {
    try {
      const useJira = !options.file;
      const config = loadConfig({
        pipelineConfigPath: options.config,
        useJira,
      });

      const storageService = new StorageService(config.app.dataDirectory);
      const pipeline = createPipeline(config.pipeline);

      console.log(chalk.blue("🚀 Starting issue analytics..."));

      let records: RawRecord[];
      if (options.file) {
        if (!(await storageService.fileExists(options.file))) {
          throw new SourceError(`Issue export not found: ${options.file}`);
        }
        const spinner = ora(`Reading ${options.file}...`).start();
        records = await storageService.loadRecords(options.file);
        spinner.succeed(`Loaded ${chalk.green(records.length)} records`);
      } else if (config.jira) {
        const jiraService = new JiraService(config.jira);
        const spinner = ora("Fetching Jira issues...").start();
        try {
          records = await jiraService.fetchRawRecords(options);
        } catch (error) {
          spinner.fail("Failed to fetch Jira issues");
          throw error;
        }
        spinner.succeed(`Fetched ${chalk.green(records.length)} issues`);
      } else {
        throw new ConfigurationError("Jira configuration is missing");
      }

      const spinner = ora("Running pipeline...").start();
      let result: PipelineResult;
      try {
        result = pipeline.run(records);
      } catch (error) {
        spinner.fail("Pipeline failed");
        if (error instanceof NoUsableRecordsError) {
          displayNormalizationReport(error.report);
        }
        throw error;
      }
      spinner.succeed("Pipeline complete!");

      const reportFile = await storageService.saveReport(result, options.output);

      displayNormalizationReport(result.report);
      displaySummary(result.summary);
      result.tables.forEach((table) => {
        const shown = options.top
          ? { ...table, top: table.ranking.slice(0, options.top) }
          : table;
        displayTable(shown);
        displayTrends(shown, result.trends[table.name] ?? []);
      });

      console.log(chalk.green(`\n✅ Report saved as ${reportFile}`));
    } catch (error) {
      displayError(
        error instanceof Error ? error.message : "Unknown error",
        error instanceof Error ? error : undefined
      );
      process.exit(1);
    }
  });

// Parse command line arguments
program.parseAsync(process.argv).catch((error: unknown) => {
  displayError(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
