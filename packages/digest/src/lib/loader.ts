import { existsSync, readFileSync } from "fs";
import { parse } from "csv-parse/sync";
import { parseCalendarDate, windowStart } from "@fundscout/ingest/dates";
import { readFundingRecord, type FundingRecord, type RawRecord } from "@fundscout/ingest/records";
import { tagRow } from "./tagger";
import type { DigestRow } from "./types";

const isRawRecord = (value: unknown): value is RawRecord =>
  typeof value === "object"
  && value !== null
  && !Array.isArray(value)
  && Object.values(value).every((field) => typeof field === "string");

/** Parses a records CSV under whatever header it carries. */
export const parseRecordsCsv = (contents: string): FundingRecord[] => {
  const parsed: unknown = parse(contents, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.filter(isRawRecord).map(readFundingRecord);
};

const toDigestRow = (record: FundingRecord, date: string): DigestRow => ({
  date,
  title: record.title,
  amountUsd: record.amountUsd,
  round: record.round,
  investors: record.investors,
  sourceDomain: record.sourceDomain,
  sourceUrl: record.sourceUrl,
  tags: tagRow(record),
  query: record.query,
  snippet: record.snippet,
});

/**
 * Rows published on or after today - `days` (UTC calendar days), newest first
 * and larger rounds first within a day. Rows without a readable date are dropped.
 */
export const selectRecentRows = (records: FundingRecord[], days: number, now: Date): DigestRow[] => {
  const cutoff = windowStart(now, days);
  const dated = records.flatMap((record) => {
    const date = parseCalendarDate(record.pubDate);
    return date && date >= cutoff ? [{ record, date }] : [];
  });

  dated.sort((a, b) => {
    if (a.date !== b.date) {
      return a.date < b.date ? 1 : -1;
    }
    return b.record.amountUsd - a.record.amountUsd;
  });

  return dated.map(({ record, date }) => toDigestRow(record, date));
};

export const loadDigestRows = (csvPath: string, days: number, now = new Date()) => {
  if (!existsSync(csvPath)) {
    throw new Error(`Data file not found: ${csvPath}`);
  }
  return selectRecentRows(parseRecordsCsv(readFileSync(csvPath, "utf-8")), days, now);
};
