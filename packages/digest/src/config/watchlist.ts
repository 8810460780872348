/** Rounds at or above this size get the large-round tag. */
export const LARGE_ROUND_USD = 10_000_000;

// Matched as case-insensitive substrings of the investors text.
export const NOTABLE_INVESTORS = [
  "Sequoia",
  "Andreessen Horowitz",
  "a16z",
  "Accel",
  "Lightspeed",
  "SoftBank",
  "Tiger Global",
  "Temasek",
  "GGV",
  "DST",
  "Index Ventures",
  "General Catalyst",
  "Founders Fund",
  "Y Combinator",
  "YC",
  "Khosla",
];

export const TAG_LARGE_ROUND = "large-round";
export const TAG_NOTABLE_INVESTOR = "notable-investor";
