import {
  LARGE_ROUND_USD,
  NOTABLE_INVESTORS,
  TAG_LARGE_ROUND,
  TAG_NOTABLE_INVESTOR,
} from "../config/watchlist";

export const hasNotableInvestor = (investors: string, watchlist: string[] = NOTABLE_INVESTORS) => {
  const lowered = investors.toLowerCase();
  return watchlist.some((name) => lowered.includes(name.toLowerCase()));
};

/** Labels in display order: size, investor, then the round name as stored. */
export const tagRow = (row: { amountUsd: number; investors: string; round: string }) => {
  const tags: string[] = [];
  if (row.amountUsd >= LARGE_ROUND_USD) {
    tags.push(TAG_LARGE_ROUND);
  }
  if (hasNotableInvestor(row.investors)) {
    tags.push(TAG_NOTABLE_INVESTOR);
  }
  if (row.round) {
    tags.push(row.round);
  }
  return tags.join(", ");
};
