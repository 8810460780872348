import type { DigestRow } from "../src/lib/types";

export const makeRow = (overrides: Partial<DigestRow> = {}): DigestRow => ({
  date: "2024-05-02",
  title: "Acme raises $12M",
  amountUsd: 12_000_000,
  round: "Series A",
  investors: "led by Accel.",
  sourceDomain: "techcrunch.com",
  sourceUrl: "https://techcrunch.com/acme",
  tags: "large-round, notable-investor, Series A",
  query: "kitchen robot",
  snippet: "",
  ...overrides,
});
