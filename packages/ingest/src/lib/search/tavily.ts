import type { SearchHit, SearchProvider, SearchRequest } from "./types";

type TavilyResponse = {
  results?: Array<{
    title?: string;
    url?: string;
    content?: string;
  }>;
};

export type TavilySearchOptions = {
  apiKey: string;
  topic?: "news" | "general";
  searchDepth?: "basic" | "advanced";
  timeoutMs?: number;
};

/**
 * Tavily takes plain-language queries and a domain allowlist, and has no
 * result offset: only the first page returns hits.
 */
export class TavilySearchProvider implements SearchProvider {
  readonly name = "tavily";

  constructor(private readonly options: TavilySearchOptions) {}

  async search(request: SearchRequest): Promise<SearchHit[]> {
    if (request.offset > 1) {
      return [];
    }

    const { topic = "news", searchDepth = "basic", timeoutMs = 30000 } = this.options;
    const response = await fetch("https://api.tavily.com/search", {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      signal: AbortSignal.timeout(timeoutMs),
      body: JSON.stringify({
        api_key: this.options.apiKey,
        query: `${request.seedQuery} funding`,
        search_depth: searchDepth,
        topic,
        max_results: request.pageSize,
        days: Math.max(1, request.lookbackDays),
        include_domains: request.sites,
        include_answer: false,
        include_raw_content: false,
      }),
    });

    if (!response.ok) {
      throw new Error(`Tavily search failed (${response.status})`);
    }

    const payload = (await response.json()) as TavilyResponse;

    return (payload.results ?? []).flatMap((result) =>
      result.url
        ? [{ url: result.url, title: result.title ?? "", snippet: result.content ?? "" }]
        : [],
    );
  }
}
