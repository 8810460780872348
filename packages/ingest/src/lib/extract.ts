import * as cheerio from "cheerio";
import { findLargestAmount } from "./amount";
import { DATE_PATTERN, parseCalendarDate } from "./dates";
import { normalizeWhitespace, toTitleCase } from "./normalize";
import type { ExtractedFields } from "./types";

export const ROUND_PATTERN =
  /\b(pre-?seed|seed|angel|series\s+[A-K]|growth\s+equity|mezzanine|venture\s+debt)\b/i;

export const INVESTOR_PATTERN =
  /\b(led by|co-led by|participat(?:ed|ing) (?:from|by)|back(?:ed)? by|invest(?:ed|s) by)\b[^.]{0,200}\./i;

// Checked in order; the first tag whose content parses wins.
const PUBLISHED_META_SELECTORS = [
  '[property="article:published_time"]',
  '[name="date"]',
  '[name="pubdate"]',
  '[itemprop="datePublished"]',
];

/**
 * Turns a fetched article page into structured funding fields. Implementations
 * never throw; a field that cannot be read is left empty.
 */
export interface FieldExtractor {
  extract(html: string): ExtractedFields;
}

const toPlainText = ($: cheerio.CheerioAPI) => {
  $("script, style, noscript, template").remove();
  $("*").each((_, element) => {
    $(element).prepend(" ").append(" ");
  });
  return normalizeWhitespace($.root().text());
};

const resolvePublishDate = ($: cheerio.CheerioAPI, text: string) => {
  for (const selector of PUBLISHED_META_SELECTORS) {
    const content = $(selector).first().attr("content");
    const parsed = parseCalendarDate(content);
    if (parsed) {
      return parsed;
    }
  }

  const match = text.match(DATE_PATTERN);
  return parseCalendarDate(match?.[1]) ?? "";
};

export const extractRound = (text: string) => {
  const match = text.match(ROUND_PATTERN);
  return match ? toTitleCase(normalizeWhitespace(match[1])) : "";
};

export const extractInvestors = (text: string) => text.match(INVESTOR_PATTERN)?.[0] ?? "";

export class RegexFieldExtractor implements FieldExtractor {
  extract(html: string): ExtractedFields {
    const $ = cheerio.load(html);
    const title = normalizeWhitespace($("title").first().text());
    const text = toPlainText($);

    return {
      title,
      amountUsd: findLargestAmount(text),
      round: extractRound(text),
      investors: extractInvestors(text),
      pubDate: resolvePublishDate($, text),
    };
  }
}
