export type ArticleCandidate = {
  query: string;
  url: string;
  title: string;
  snippet: string;
  domain: string;
};

export type ExtractedFields = {
  title: string;
  amountUsd: number | null;
  round: string;
  investors: string;
  /** ISO calendar date, or "" when none resolved. */
  pubDate: string;
};

export type FundingRecord = {
  foundAt: string;
  query: string;
  sourceUrl: string;
  sourceDomain: string;
  title: string;
  amountUsd: number;
  round: string;
  investors: string;
  pubDate: string;
  snippet: string;
};

export type RejectionReason =
  | "excluded_domain"
  | "job_posting"
  | "duplicate"
  | "missing_date"
  | "stale_date"
  | "no_funding_signal";

export type FilterDecision =
  | { keep: true }
  | { keep: false; reason: RejectionReason };

export type ScrapeSummary = {
  queries: number;
  searchPages: number;
  searchFailures: number;
  candidates: number;
  fetched: number;
  fetchFailed: number;
  kept: number;
  rejected: Record<RejectionReason, number>;
};
