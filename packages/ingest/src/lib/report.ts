import { appendFileSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { ScrapeConfig } from "./settings";
import type { ScrapeSummary } from "./types";

export type ScrapeReport = {
  generatedAt: string;
  provider: string;
  lookbackDays: number;
  limitPerQuery: number;
  files: {
    daily: string;
    latest: string;
  };
  summary: ScrapeSummary;
};

export const buildScrapeReport = (
  config: ScrapeConfig,
  summary: ScrapeSummary,
  now = new Date(),
): ScrapeReport => ({
  generatedAt: now.toISOString(),
  provider: config.search.provider,
  lookbackDays: config.days,
  limitPerQuery: config.limit,
  files: {
    daily: config.outfile,
    latest: config.latestFile,
  },
  summary,
});

export const writeScrapeReport = (report: ScrapeReport, filePath: string) => {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, `${JSON.stringify(report, null, 2)}\n`, "utf-8");
};

export const formatReportSummary = (report: ScrapeReport) => {
  const { summary } = report;
  const lines: string[] = [];
  lines.push("## Funding Scrape");
  lines.push("");
  lines.push(`Provider: **${report.provider}**`);
  lines.push(`Lookback: **${report.lookbackDays} days**`);
  lines.push(`Queries: **${summary.queries}** (${summary.searchPages} pages, ${summary.searchFailures} failed)`);
  lines.push(`Candidates: **${summary.candidates}** | fetched ${summary.fetched} | fetch failed ${summary.fetchFailed}`);
  lines.push(`Kept: **${summary.kept}**`);
  lines.push("");
  lines.push("### Dropped");
  for (const [reason, count] of Object.entries(summary.rejected)) {
    lines.push(`- ${reason}: ${count}`);
  }
  lines.push("");
  lines.push(`Daily file: \`${report.files.daily}\``);
  return `${lines.join("\n")}\n`;
};

/** Appends the Markdown summary to the CI step summary file, when one is set. */
export const writeReportSummary = (report: ScrapeReport, summaryPath = process.env.GITHUB_STEP_SUMMARY) => {
  if (!summaryPath) {
    return;
  }
  appendFileSync(summaryPath, formatReportSummary(report), "utf-8");
};
