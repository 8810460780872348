import { describe, expect, it } from "vitest";
import { parseFlags } from "../src/lib/cli";
import { loadScrapeConfig } from "../src/lib/settings";

const NOW = new Date("2024-06-15T12:00:00Z");
const GOOGLE_ENV = { GOOGLE_API_KEY: "test-key", GOOGLE_CSE_ID: "test-cse" };

describe("parseFlags", () => {
  it("reads both flag forms and bare switches", () => {
    const flags = parseFlags(["--days", "30", "--limit=5", "--dry-run", "--csv", "x.csv"], new Set(["dry-run"]));
    expect(Object.fromEntries(flags)).toEqual({ days: "30", limit: "5", "dry-run": true, csv: "x.csv" });
  });
});

describe("loadScrapeConfig", () => {
  it("uses defaults with only credentials set", () => {
    expect(loadScrapeConfig([], GOOGLE_ENV, NOW)).toEqual({
      days: 90,
      limit: 80,
      queriesPath: "queries.txt",
      outfile: "data/funding_2024-06-15.csv",
      latestFile: "data/funding_latest.csv",
      sleepMs: 1000,
      fetchTimeoutMs: 30000,
      reportPath: null,
      debugSearch: false,
      search: { provider: "google", apiKey: "test-key", cseId: "test-cse" },
    });
  });

  it("lets flags override the environment", () => {
    const config = loadScrapeConfig(
      ["--days", "30", "--sleep=0.5", "--data-dir", "out"],
      { ...GOOGLE_ENV, SCRAPE_DAYS: "14", SCRAPE_LIMIT: "5" },
      NOW,
    );
    expect(config.days).toBe(30);
    expect(config.limit).toBe(5);
    expect(config.sleepMs).toBe(500);
    expect(config.outfile).toBe("out/funding_2024-06-15.csv");
    expect(config.latestFile).toBe("out/funding_latest.csv");
  });

  it("falls back to defaults for invalid numbers", () => {
    const config = loadScrapeConfig(["--days=-3", "--limit=abc"], GOOGLE_ENV, NOW);
    expect(config.days).toBe(90);
    expect(config.limit).toBe(80);
  });

  it("accepts a zero-day window", () => {
    expect(loadScrapeConfig(["--days", "0"], GOOGLE_ENV, NOW).days).toBe(0);
    expect(loadScrapeConfig([], { ...GOOGLE_ENV, SCRAPE_DAYS: "0" }, NOW).days).toBe(0);
  });

  it("resolves relative paths against the directory npm was invoked from", () => {
    const env = { ...GOOGLE_ENV, INIT_CWD: "/repo" };
    const config = loadScrapeConfig(["--report", "artifacts/report.json"], env, NOW);

    expect(config.queriesPath).toBe("/repo/queries.txt");
    expect(config.outfile).toBe("/repo/data/funding_2024-06-15.csv");
    expect(config.latestFile).toBe("/repo/data/funding_latest.csv");
    expect(config.reportPath).toBe("/repo/artifacts/report.json");
    expect(loadScrapeConfig([], env, NOW).reportPath).toBeNull();
    expect(loadScrapeConfig(["--queries", "/etc/fundscout/queries.txt"], env, NOW).queriesPath).toBe(
      "/etc/fundscout/queries.txt",
    );
  });

  it("requires the credentials of the selected provider", () => {
    expect(() => loadScrapeConfig([], {}, NOW)).toThrow("Missing required env var: GOOGLE_API_KEY");
    expect(() => loadScrapeConfig(["--provider=tavily"], GOOGLE_ENV, NOW)).toThrow(
      "Missing required env var: TAVILY_API_KEY",
    );
    expect(loadScrapeConfig([], { SEARCH_PROVIDER: "Tavily", TAVILY_API_KEY: "test-key" }, NOW).search).toEqual({
      provider: "tavily",
      apiKey: "test-key",
    });
  });

  it("rejects unknown providers", () => {
    expect(() => loadScrapeConfig(["--provider", "bing"], GOOGLE_ENV, NOW)).toThrow("Unknown search provider: bing");
  });
});
