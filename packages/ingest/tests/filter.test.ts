import { describe, expect, it } from "vitest";
import {
  checkPublishDate,
  evaluateArticle,
  hasFundingSignal,
  isJobPosting,
  screenCandidate,
} from "../src/lib/filter";
import type { ExtractedFields } from "../src/lib/types";

const now = new Date("2024-06-15T12:00:00Z");

const fields = (overrides: Partial<ExtractedFields> = {}): ExtractedFields => ({
  title: "",
  amountUsd: null,
  round: "",
  investors: "",
  pubDate: "2024-06-01",
  ...overrides,
});

describe("screenCandidate", () => {
  it("drops job postings even when they mention funding", () => {
    expect(
      screenCandidate(
        "https://techcrunch.com/2024/06/01/acme-update",
        "We're Hiring: Robotics Engineer at Acme, which raises $10M",
      ),
    ).toEqual({ keep: false, reason: "job_posting" });
  });

  it("drops job boards by host", () => {
    expect(isJobPosting("https://boards.greenhouse.io/acme/123", "Acme")).toBe(true);
  });

  it("matches job keywords in the URL", () => {
    expect(isJobPosting("https://acme.com/careers/engineer", "Acme")).toBe(true);
  });

  it("drops social and aggregator domains before anything else", () => {
    expect(screenCandidate("https://www.linkedin.com/posts/acme", "Acme raises seed")).toEqual({
      keep: false,
      reason: "excluded_domain",
    });
  });

  it("keeps ordinary news links", () => {
    expect(
      screenCandidate("https://techcrunch.com/2024/06/01/acme-raises-seed", "Acme raises seed"),
    ).toEqual({ keep: true });
  });
});

describe("checkPublishDate", () => {
  it("keeps the first day of the window", () => {
    expect(checkPublishDate("2024-05-16", 30, now)).toEqual({ keep: true });
  });

  it("drops the day before the window", () => {
    expect(checkPublishDate("2024-05-15", 30, now)).toEqual({ keep: false, reason: "stale_date" });
  });

  it("keeps today and drops tomorrow", () => {
    expect(checkPublishDate("2024-06-15", 30, now)).toEqual({ keep: true });
    expect(checkPublishDate("2024-06-16", 30, now)).toEqual({ keep: false, reason: "stale_date" });
  });

  it("keeps only today for a zero-day window", () => {
    expect(checkPublishDate("2024-06-15", 0, now)).toEqual({ keep: true });
    expect(checkPublishDate("2024-06-14", 0, now)).toEqual({ keep: false, reason: "stale_date" });
  });

  it("enforces the minimum year even inside a long window", () => {
    expect(checkPublishDate("2017-12-31", 5000, now)).toEqual({ keep: false, reason: "stale_date" });
    expect(checkPublishDate("2018-01-01", 5000, now)).toEqual({ keep: true });
  });

  it("rejects a missing date", () => {
    expect(checkPublishDate("", 30, now)).toEqual({ keep: false, reason: "missing_date" });
  });
});

describe("hasFundingSignal", () => {
  const plain = { title: "Kitchen robot maker expands", snippet: "A new site opened." };

  it("accepts a keyword in the title or snippet", () => {
    expect(hasFundingSignal({ title: "Acme RAISES seed", snippet: "" }, null)).toBe(true);
    expect(hasFundingSignal({ title: "Acme news", snippet: "Round led by Accel" }, null)).toBe(true);
  });

  it("accepts an amount at the floor or a round", () => {
    expect(hasFundingSignal(plain, fields({ amountUsd: 100_000 }))).toBe(true);
    expect(hasFundingSignal(plain, fields({ amountUsd: 99_999 }))).toBe(false);
    expect(hasFundingSignal(plain, fields({ round: "Seed" }))).toBe(true);
  });

  it("needs a keyword when no fields were extracted", () => {
    expect(hasFundingSignal(plain, null)).toBe(false);
  });
});

describe("evaluateArticle", () => {
  const plain = { title: "Kitchen robot maker expands", snippet: "" };

  it("applies the date gate before the signal gate", () => {
    expect(evaluateArticle(plain, fields({ pubDate: "", round: "Seed" }), 90, now)).toEqual({
      keep: false,
      reason: "missing_date",
    });
  });

  it("keeps a dated article with an amount signal", () => {
    expect(evaluateArticle(plain, fields({ amountUsd: 250_000 }), 90, now)).toEqual({ keep: true });
  });

  it("skips the date gate when the page was not fetched", () => {
    expect(evaluateArticle({ title: "Acme raises $3M", snippet: "" }, null, 90, now)).toEqual({ keep: true });
    expect(evaluateArticle(plain, null, 90, now)).toEqual({ keep: false, reason: "no_funding_signal" });
  });
});
