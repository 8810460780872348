import { stringify } from "csv-stringify/sync";
import { toCalendarDate } from "@fundscout/ingest/dates";
import { escapeHtml, formatMoney, truncate } from "./format";
import type { Digest, DigestRow } from "./types";

export type RenderOptions = {
  days: number;
  topic: string;
  /** Rows shown in the message body; the attachment always has all of them. */
  maxRows: number;
};

const TEXT_CELL_LIMIT = 120;

export const DIGEST_CSV_COLUMNS = [
  "date",
  "title",
  "amount_usd_int",
  "round",
  "investors",
  "source_domain",
  "source_url",
  "tags",
  "query",
  "snippet",
];

export const formatDigestCsv = (rows: DigestRow[]) =>
  stringify([
    DIGEST_CSV_COLUMNS,
    ...rows.map((row) => [
      row.date,
      row.title,
      String(row.amountUsd),
      row.round,
      row.investors,
      row.sourceDomain,
      row.sourceUrl,
      row.tags,
      row.query,
      row.snippet,
    ]),
  ]);

export const buildSubject = (topic: string, today: string, days: number) =>
  `${topic} funding digest | through ${today} (last ${days} days)`;

const renderRow = (row: DigestRow) => {
  const cells = [
    escapeHtml(row.date),
    `<a href="${escapeHtml(row.sourceUrl)}">${escapeHtml(truncate(row.title, TEXT_CELL_LIMIT))}</a>`,
    escapeHtml(formatMoney(row.amountUsd)),
    escapeHtml(row.tags),
    escapeHtml(truncate(row.investors, TEXT_CELL_LIMIT)),
    escapeHtml(row.sourceDomain),
  ];
  return `<tr>${cells.map((cell) => `<td>${cell}</td>`).join("")}</tr>`;
};

export const renderDigestHtml = (rows: DigestRow[], options: RenderOptions) => {
  const lines = [
    `<p>Funding news for ${escapeHtml(options.topic.toLowerCase())} from the last ${options.days} days, newest first:</p>`,
    '<table border="1" cellpadding="6" cellspacing="0" style="border-collapse:collapse;font-family:Arial,Helvetica,sans-serif;font-size:13px;">',
    "<tr><th>Date</th><th>Title</th><th>Amount</th><th>Tags / round</th><th>Investors (excerpt)</th><th>Source</th></tr>",
    ...rows.slice(0, options.maxRows).map(renderRow),
    "</table>",
    "<p>The attached CSV has the full list with amounts and links.</p>",
  ];
  return lines.join("\n");
};

export const renderDigestText = (rowCount: number) =>
  `See the HTML version; ${rowCount} item(s) in total (the attachment has every result).`;

export const buildDigest = (rows: DigestRow[], options: RenderOptions, now = new Date()): Digest => {
  const today = toCalendarDate(now);
  return {
    today,
    subject: buildSubject(options.topic, today, options.days),
    text: renderDigestText(rows.length),
    html: renderDigestHtml(rows, options),
    attachment: {
      filename: `funding_week_${today}.csv`,
      content: formatDigestCsv(rows),
    },
    rowCount: rows.length,
  };
};
