import { join } from "path";
import {
  coerceNonNegativeInt,
  coerceNonNegativeNumber,
  coercePositiveInt,
  flagValue,
  parseFlags,
  requireEnv,
  resolveFromInvocationDir,
} from "./cli";
import { toCalendarDate } from "./dates";

export type SearchSettings =
  | { provider: "google"; apiKey: string; cseId: string }
  | { provider: "tavily"; apiKey: string };

export type ScrapeConfig = {
  days: number;
  /** Kept rows per seed query. */
  limit: number;
  queriesPath: string;
  outfile: string;
  latestFile: string;
  sleepMs: number;
  fetchTimeoutMs: number;
  reportPath: string | null;
  debugSearch: boolean;
  search: SearchSettings;
};

const DEFAULT_DAYS = 90;
const DEFAULT_LIMIT = 80;
const DEFAULT_SLEEP_SECONDS = 1;
const DEFAULT_FETCH_TIMEOUT_MS = 30000;

const getSearchSettings = (provider: string, env: NodeJS.ProcessEnv): SearchSettings => {
  if (provider === "google") {
    return {
      provider,
      apiKey: requireEnv(env, "GOOGLE_API_KEY"),
      cseId: requireEnv(env, "GOOGLE_CSE_ID"),
    };
  }
  if (provider === "tavily") {
    return { provider, apiKey: requireEnv(env, "TAVILY_API_KEY") };
  }
  throw new Error(`Unknown search provider: ${provider}`);
};

/**
 * Builds the scrape configuration once at start-up. Flags win over
 * environment variables, which win over defaults. Throws when credentials for
 * the selected provider are missing.
 */
export const loadScrapeConfig = (
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  now = new Date(),
): ScrapeConfig => {
  const flags = parseFlags(argv);
  const option = (flag: string, envKey: string) => flagValue(flags, flag) ?? env[envKey];
  const toPath = (filePath: string) => resolveFromInvocationDir(env, filePath);

  const dataDir = option("data-dir", "SCRAPE_DATA_DIR") || "data";
  const sleepSeconds = coerceNonNegativeNumber(option("sleep", "SCRAPE_SLEEP")) ?? DEFAULT_SLEEP_SECONDS;
  const reportPath = option("report", "SCRAPE_REPORT_PATH");
  const provider = (option("provider", "SEARCH_PROVIDER") || "google").toLowerCase();

  return {
    days: coerceNonNegativeInt(option("days", "SCRAPE_DAYS")) ?? DEFAULT_DAYS,
    limit: coercePositiveInt(option("limit", "SCRAPE_LIMIT")) ?? DEFAULT_LIMIT,
    queriesPath: toPath(option("queries", "SCRAPE_QUERIES") || "queries.txt"),
    outfile: toPath(option("outfile", "SCRAPE_OUTFILE") || join(dataDir, `funding_${toCalendarDate(now)}.csv`)),
    latestFile: toPath(join(dataDir, "funding_latest.csv")),
    sleepMs: Math.round(sleepSeconds * 1000),
    fetchTimeoutMs: coercePositiveInt(option("timeout", "SCRAPE_FETCH_TIMEOUT_MS")) ?? DEFAULT_FETCH_TIMEOUT_MS,
    reportPath: reportPath ? toPath(reportPath) : null,
    debugSearch: env.SCRAPE_DEBUG_SEARCH === "1",
    search: getSearchSettings(provider, env),
  };
};
