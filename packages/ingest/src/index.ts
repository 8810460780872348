import { loadDotEnv } from "./lib/env";
import { RegexFieldExtractor } from "./lib/extract";
import { createPageFetcher } from "./lib/fetcher";
import { loadQueries } from "./lib/queries";
import { buildScrapeReport, writeReportSummary, writeScrapeReport } from "./lib/report";
import { runScrape } from "./lib/scrape";
import { GoogleSearchProvider } from "./lib/search/google";
import { TavilySearchProvider } from "./lib/search/tavily";
import type { SearchProvider } from "./lib/search/types";
import { loadScrapeConfig, type SearchSettings } from "./lib/settings";
import { CsvRecordSink } from "./repo/csv";

const createSearchProvider = (settings: SearchSettings, timeoutMs: number): SearchProvider => {
  if (settings.provider === "tavily") {
    return new TavilySearchProvider({ apiKey: settings.apiKey, timeoutMs });
  }
  return new GoogleSearchProvider({ apiKey: settings.apiKey, cseId: settings.cseId, timeoutMs });
};

const main = async () => {
  loadDotEnv();
  const config = loadScrapeConfig(process.argv.slice(2));
  const queries = loadQueries(config.queriesPath);

  const summary = await runScrape(queries, config, {
    search: createSearchProvider(config.search, config.fetchTimeoutMs),
    fetchPage: createPageFetcher(config.fetchTimeoutMs),
    extractor: new RegexFieldExtractor(),
    sink: new CsvRecordSink(config.outfile, config.latestFile),
  });

  const report = buildScrapeReport(config, summary);
  if (config.reportPath) {
    writeScrapeReport(report, config.reportPath);
    console.log(`[scrape] report written to ${config.reportPath}`);
  }
  writeReportSummary(report);

  console.log(`[scrape] kept ${summary.kept} of ${summary.candidates} candidates`);
  console.log(`Saved: ${config.outfile}`);
  console.log(`Latest: ${config.latestFile}`);
};

main().catch((error) => {
  console.error("Scrape failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
