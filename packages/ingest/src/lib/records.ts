import { stringify } from "csv-stringify/sync";
import type { FundingRecord } from "./types";

export type { FundingRecord } from "./types";

/** Persisted column order. New columns are only ever appended. */
export const FUNDING_RECORD_COLUMNS = [
  "found_at",
  "query",
  "source_url",
  "source_domain",
  "title",
  "amount_usd",
  "round",
  "investors",
  "pub_date",
  "snippet",
] as const;

export type FundingRecordColumn = (typeof FUNDING_RECORD_COLUMNS)[number];

export type RawRecord = Partial<Record<string, string>>;

const toColumns = (record: FundingRecord): Record<FundingRecordColumn, string> => ({
  found_at: record.foundAt,
  query: record.query,
  source_url: record.sourceUrl,
  source_domain: record.sourceDomain,
  title: record.title,
  amount_usd: String(record.amountUsd),
  round: record.round,
  investors: record.investors,
  pub_date: record.pubDate,
  snippet: record.snippet,
});

export const formatCsvHeader = () => stringify([[...FUNDING_RECORD_COLUMNS]]);

export const formatCsvRow = (record: FundingRecord) => {
  const columns = toColumns(record);
  return stringify([FUNDING_RECORD_COLUMNS.map((column) => columns[column])]);
};

/** Non-negative integer; anything unparsable becomes 0. */
export const coerceAmount = (value: string | number | null | undefined) => {
  const parsed = typeof value === "number" ? value : Number((value ?? "").trim());
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return 0;
  }
  return Math.trunc(parsed);
};

/**
 * Reads one CSV row under any header layout: missing columns take their
 * defaults and unknown columns are ignored.
 */
export const readFundingRecord = (raw: RawRecord): FundingRecord => {
  const text = (column: FundingRecordColumn) => raw[column] ?? "";
  return {
    foundAt: text("found_at"),
    query: text("query"),
    sourceUrl: text("source_url"),
    sourceDomain: text("source_domain"),
    title: text("title"),
    amountUsd: coerceAmount(raw.amount_usd),
    round: text("round"),
    investors: text("investors"),
    pubDate: text("pub_date"),
    snippet: text("snippet"),
  };
};

export const formatFoundAt = (now: Date) => now.toISOString().replace(/\.\d{3}Z$/, "Z");
