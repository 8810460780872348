import {
  DEFAULT_SITES,
  FUNDING_KEYWORDS,
  QUERY_EXCLUDE_WORDS,
  SEARCH_MAX_OFFSET,
  SEARCH_PAGE_SIZE,
} from "../config/sources";
import type { RecordSink } from "../repo/types";
import type { FieldExtractor } from "./extract";
import type { PageFetcher } from "./fetcher";
import { evaluateArticle, screenCandidate } from "./filter";
import { formatFoundAt } from "./records";
import type { SearchHit, SearchProvider } from "./search/types";
import type { ScrapeConfig } from "./settings";
import type { ArticleCandidate, ExtractedFields, FundingRecord, ScrapeSummary } from "./types";
import { getHostname } from "./url";

export type ScrapeDependencies = {
  search: SearchProvider;
  fetchPage: PageFetcher;
  extractor: FieldExtractor;
  sink: RecordSink;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
};

export type ScrapeOptions = Pick<ScrapeConfig, "days" | "limit" | "sleepMs" | "debugSearch">;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const createSummary = (): ScrapeSummary => ({
  queries: 0,
  searchPages: 0,
  searchFailures: 0,
  candidates: 0,
  fetched: 0,
  fetchFailed: 0,
  kept: 0,
  rejected: {
    excluded_domain: 0,
    job_posting: 0,
    duplicate: 0,
    missing_date: 0,
    stale_date: 0,
    no_funding_signal: 0,
  },
});

const safeExtract = (extractor: FieldExtractor, html: string, url: string): ExtractedFields | null => {
  try {
    return extractor.extract(html);
  } catch (error) {
    console.warn(`[scrape] extraction failed for ${url}:`, error instanceof Error ? error.message : error);
    return null;
  }
};

/**
 * Runs every seed query through search → screen → fetch → extract → filter and
 * writes the kept records to the sink, which is closed at the end. Work is
 * strictly sequential, with a fixed delay after every page fetch.
 */
export const runScrape = async (
  queries: string[],
  options: ScrapeOptions,
  deps: ScrapeDependencies,
): Promise<ScrapeSummary> => {
  const summary = createSummary();
  const seen = new Set<string>();
  const wait = deps.sleep ?? sleep;
  const now = deps.now ?? (() => new Date());

  // Returns true when the candidate was written.
  const processHit = async (query: string, hit: SearchHit) => {
    const candidate: ArticleCandidate = {
      query,
      url: hit.url,
      title: hit.title,
      snippet: hit.snippet,
      domain: getHostname(hit.url) ?? "",
    };
    summary.candidates += 1;

    const screen = screenCandidate(candidate.url, candidate.title);
    if (!screen.keep) {
      summary.rejected[screen.reason] += 1;
      return false;
    }

    const key = `${candidate.domain} ${candidate.url}`;
    if (seen.has(key)) {
      summary.rejected.duplicate += 1;
      return false;
    }
    seen.add(key);

    const html = await deps.fetchPage(candidate.url);
    await wait(options.sleepMs);

    const fields = html === null ? null : safeExtract(deps.extractor, html, candidate.url);
    if (fields) {
      summary.fetched += 1;
    } else {
      summary.fetchFailed += 1;
    }

    const record: FundingRecord = {
      foundAt: formatFoundAt(now()),
      query,
      sourceUrl: candidate.url,
      sourceDomain: candidate.domain,
      title: fields?.title || candidate.title,
      amountUsd: fields?.amountUsd ?? 0,
      round: fields?.round ?? "",
      investors: fields?.investors ?? "",
      pubDate: fields?.pubDate ?? "",
      snippet: candidate.snippet,
    };

    const decision = evaluateArticle(
      { title: record.title, snippet: record.snippet },
      fields,
      options.days,
      now(),
    );
    if (!decision.keep) {
      summary.rejected[decision.reason] += 1;
      return false;
    }

    await deps.sink.write(record);
    summary.kept += 1;
    return true;
  };

  for (const query of queries) {
    summary.queries += 1;
    let kept = 0;

    for (
      let offset = 1;
      offset <= SEARCH_MAX_OFFSET && kept < options.limit;
      offset += SEARCH_PAGE_SIZE
    ) {
      let hits: SearchHit[];
      try {
        hits = await deps.search.search({
          seedQuery: query,
          sites: DEFAULT_SITES,
          fundingKeywords: FUNDING_KEYWORDS,
          excludeWords: QUERY_EXCLUDE_WORDS,
          offset,
          pageSize: SEARCH_PAGE_SIZE,
          lookbackDays: options.days,
        });
        summary.searchPages += 1;
      } catch (error) {
        summary.searchFailures += 1;
        console.warn(
          `[scrape][search] ${deps.search.name} failed for query "${query}":`,
          error instanceof Error ? error.message : error,
        );
        break;
      }

      if (options.debugSearch) {
        for (const hit of hits) {
          console.log("[scrape][search]", query, hit.title, hit.url);
        }
      }

      if (!hits.length) {
        break;
      }

      for (const hit of hits) {
        if (await processHit(query, hit)) {
          kept += 1;
          if (kept >= options.limit) {
            break;
          }
        }
      }
    }
  }

  await deps.sink.close();
  return summary;
};
