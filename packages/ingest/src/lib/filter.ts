import {
  EXCLUDED_DOMAINS,
  FUNDING_HARD_KEYWORDS,
  JOB_DOMAINS,
  JOB_KEYWORDS,
  MIN_AMOUNT_FOR_SIGNAL,
  MIN_PUBLISH_YEAR,
} from "../config/sources";
import { calendarYear, toCalendarDate, windowStart } from "./dates";
import { containsAny } from "./normalize";
import { getHostname, isListedDomain } from "./url";
import type { ExtractedFields, FilterDecision } from "./types";

const keep: FilterDecision = { keep: true };

export const isExcludedDomain = (url: string) =>
  isListedDomain(getHostname(url), EXCLUDED_DOMAINS);

/** Job boards, or a title/URL that reads like a job posting. */
export const isJobPosting = (url: string, title: string) => {
  if (isListedDomain(getHostname(url), JOB_DOMAINS)) {
    return true;
  }
  return containsAny([title, url], JOB_KEYWORDS);
};

export const hasFundingKeyword = (title: string, snippet: string) =>
  containsAny([title, snippet], FUNDING_HARD_KEYWORDS);

/**
 * Publish date must fall inside [today - days, today] (UTC calendar days) and
 * not before the minimum year. A missing date fails: recency cannot be assumed.
 */
export const checkPublishDate = (pubDate: string, days: number, now: Date): FilterDecision => {
  if (!pubDate) {
    return { keep: false, reason: "missing_date" };
  }
  const today = toCalendarDate(now);
  if (
    pubDate < windowStart(now, days)
    || pubDate > today
    || calendarYear(pubDate) < MIN_PUBLISH_YEAR
  ) {
    return { keep: false, reason: "stale_date" };
  }
  return keep;
};

export const hasFundingSignal = (
  text: { title: string; snippet: string },
  fields: Pick<ExtractedFields, "amountUsd" | "round"> | null,
) => {
  if (hasFundingKeyword(text.title, text.snippet)) {
    return true;
  }
  if (!fields) {
    return false;
  }
  return (fields.amountUsd ?? 0) >= MIN_AMOUNT_FOR_SIGNAL || Boolean(fields.round);
};

/** Gates applied before a page is fetched. */
export const screenCandidate = (url: string, title: string): FilterDecision => {
  if (isExcludedDomain(url)) {
    return { keep: false, reason: "excluded_domain" };
  }
  if (isJobPosting(url, title)) {
    return { keep: false, reason: "job_posting" };
  }
  return keep;
};

/**
 * Gates applied after the fetch. With no fields (fetch failed) only the
 * title/snippet keyword signal can keep the candidate.
 */
export const evaluateArticle = (
  text: { title: string; snippet: string },
  fields: ExtractedFields | null,
  days: number,
  now: Date,
): FilterDecision => {
  if (fields) {
    const dateDecision = checkPublishDate(fields.pubDate, days, now);
    if (!dateDecision.keep) {
      return dateDecision;
    }
  }
  if (!hasFundingSignal(text, fields)) {
    return { keep: false, reason: "no_funding_signal" };
  }
  return keep;
};
