import chalk from "chalk";
import type {
  AggregationTable,
  NormalizationReport,
  PipelineSummary,
  TrendLabel,
  TrendSeries,
} from "../types";

/**
 * Displays the normalization outcome, including why records were skipped
 */
export function displayNormalizationReport(report: NormalizationReport): void {
  console.log("\n" + chalk.bold("🧹 Normalization"));
  console.log(`  ${chalk.green("Usable:")} ${report.succeeded}`);
  console.log(`  ${chalk.white("Total:")} ${report.total}`);

  if (report.failed === 0) {
    console.log(chalk.gray("  No records skipped"));
  } else {
    console.log(`  ${chalk.red("Skipped:")} ${report.failed}`);
    Object.entries(report.reasonCounts).forEach(([reason, count]) => {
      console.log(`    ${chalk.red("•")} ${reason} ${chalk.gray(`(${count})`)}`);
    });
  }

  if (report.warnings.length > 0) {
    console.log(
      `  ${chalk.yellow("Warnings:")} ${report.warnings.length} ${chalk.gray(
        "(values treated as missing)"
      )}`
    );
  }
}

/**
 * Displays the headline statistics of a run
 */
export function displaySummary(summary: PipelineSummary): void {
  console.log("\n" + chalk.bold("📈 Summary Statistics:"));
  console.log(`  ${chalk.white("Issues:")} ${summary.totalIssues}`);
  console.log(`  ${chalk.green("Resolved:")} ${summary.resolvedIssues}`);
  console.log(`  ${chalk.yellow("Open:")} ${summary.openIssues}`);
  console.log(`  ${chalk.blue("Resolution rate:")} ${summary.resolutionRate}%`);
  console.log(
    `  ${chalk.blue("Avg resolution:")} ${formatDays(summary.resolution.meanDays)} ` +
      chalk.gray(
        `(holiday season ${formatDays(
          summary.holidaySeasonResolution.meanDays
        )}, off-season ${formatDays(summary.offSeasonResolution.meanDays)})`
      )
  );

  console.log("\n" + chalk.bold("🎄 Holiday Periods"));
  Object.entries(summary.holidayPeriodDistribution).forEach(([period, count]) => {
    console.log(`  ${chalk.magenta("•")} ${period}: ${count}`);
  });
}

/**
 * Displays the top-N ranking of a table
 */
export function displayTable(table: AggregationTable): void {
  console.log("\n" + chalk.bold(`📊 ${table.name}`));

  if (table.top.length === 0) {
    console.log(chalk.gray("  No items in this table"));
    return;
  }

  table.top.forEach((entry) => {
    const days =
      entry.meanResolutionDays === null ? "" : `, avg ${entry.meanResolutionDays}d to resolve`;
    console.log(
      `  ${chalk.cyan(`${entry.rank}.`)} ${chalk.bold(entry.category)}: ` +
        `${entry.total} ${chalk.gray(`(${entry.percentage}%${days})`)}`
    );
  });

  const hidden = table.ranking.length - table.top.length;
  if (hidden > 0) {
    console.log(chalk.gray(`  … and ${hidden} more`));
  }
}

/**
 * Displays trend labels and anomalous months for the categories shown in a table's top-N
 */
export function displayTrends(
  table: AggregationTable,
  series: readonly TrendSeries[]
): void {
  const shown = new Set(table.top.map((entry) => entry.category));
  const visible = series.filter((entry) => shown.has(entry.category));
  if (visible.length === 0) {
    return;
  }

  console.log("  " + chalk.bold.gray("Trends:"));
  visible.forEach((entry) => {
    const anomalies =
      entry.anomalousMonths.length > 0
        ? chalk.red(` ⚠️  anomalies: ${entry.anomalousMonths.join(", ")}`)
        : "";
    const change =
      entry.changePercent === null ? "" : chalk.gray(` (${formatChange(entry.changePercent)})`);
    console.log(
      `    ${entry.category}: ${trendText(entry.trendLabel)}${change}${anomalies}`
    );
  });
}

function trendText(label: TrendLabel): string {
  switch (label) {
    case "increasing":
      return chalk.red("↑ increasing");
    case "decreasing":
      return chalk.green("↓ decreasing");
    case "stable":
      return chalk.gray("→ stable");
  }
}

function formatDays(days: number | null): string {
  if (days === null) {
    return "n/a";
  }
  return `${days} ${days === 1 ? "day" : "days"}`;
}

function formatChange(percent: number): string {
  return `${percent > 0 ? "+" : ""}${percent}%`;
}

/**
 * Displays error messages in a consistent format
 */
export function displayError(message: string, error?: Error): void {
  console.error(chalk.red("\n❌ Error:"), message);
  if (error && process.env.NODE_ENV === "development") {
    console.error(chalk.gray(error.stack));
  }
}
