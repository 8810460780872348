import { describe, expect, it } from "vitest";
import { findLargestAmount, normalizeAmount } from "../src/lib/amount";

describe("normalizeAmount", () => {
  it("applies the scale word", () => {
    expect(normalizeAmount("10", "million")).toBe(10_000_000);
    expect(normalizeAmount("1.5", "b")).toBe(1_500_000_000);
    expect(normalizeAmount("2.5", "MM")).toBe(2_500_000);
    expect(normalizeAmount("250", "k")).toBe(250_000);
    expect(normalizeAmount("1,250", "thousand")).toBe(1_250_000);
  });

  it("treats a missing scale as units", () => {
    expect(normalizeAmount("50,000")).toBe(50_000);
    expect(normalizeAmount("75000", null)).toBe(75_000);
  });

  it("returns null for unparsable numerals", () => {
    expect(normalizeAmount("abc")).toBeNull();
    expect(normalizeAmount("")).toBeNull();
  });

  it("rounds away floating-point artefacts", () => {
    expect(normalizeAmount("4.35", "million")).toBe(4_350_000);
  });
});

describe("findLargestAmount", () => {
  it("keeps the largest plausible figure", () => {
    const text = "Acme raised $5 million from investors and won a $50,000 grant last year.";
    expect(findLargestAmount(text)).toBe(5_000_000);
  });

  it("reads prefixed and abbreviated forms", () => {
    expect(findLargestAmount("The startup closed a US$1.2bn facility.")).toBe(1_200_000_000);
    expect(findLargestAmount("Acme lands $10M for kitchen robots.")).toBe(10_000_000);
  });

  it("discards figures outside the plausible range", () => {
    expect(findLargestAmount("Founded in 2019, the market is worth $20 billion.")).toBeNull();
  });

  it("does not read a scale letter from the start of a longer word", () => {
    expect(findLargestAmount("They sold 10 bananas.")).toBeNull();
  });
});
