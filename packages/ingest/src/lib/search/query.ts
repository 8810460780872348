import type { SearchRequest } from "./types";

const orGroup = (terms: string[]) => terms.join(" OR ");

/**
 * `(seed) AND ("k1" OR …) AND (site:a OR …) -"job" …`, the boolean form the
 * Programmable Search API accepts.
 */
export const buildBooleanQuery = (
  request: Pick<SearchRequest, "seedQuery" | "sites" | "fundingKeywords" | "excludeWords">,
) => {
  const funding = orGroup(request.fundingKeywords.map((keyword) => `"${keyword}"`));
  const sites = orGroup(request.sites.map((site) => `site:${site}`));
  const negations = request.excludeWords.map((word) => ` -"${word}"`).join("");
  return `(${request.seedQuery}) AND (${funding}) AND (${sites})${negations}`;
};
