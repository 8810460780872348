import { buildBooleanQuery } from "./query";
import type { SearchHit, SearchProvider, SearchRequest } from "./types";

const ENDPOINT = "https://www.googleapis.com/customsearch/v1";

type GoogleSearchResponse = {
  items?: Array<{
    link?: string;
    title?: string;
    snippet?: string;
  }>;
};

export type GoogleSearchOptions = {
  apiKey: string;
  cseId: string;
  timeoutMs?: number;
};

export class GoogleSearchProvider implements SearchProvider {
  readonly name = "google";

  constructor(private readonly options: GoogleSearchOptions) {}

  buildUrl(request: SearchRequest) {
    const url = new URL(ENDPOINT);
    url.searchParams.set("key", this.options.apiKey);
    url.searchParams.set("cx", this.options.cseId);
    url.searchParams.set("q", buildBooleanQuery(request));
    url.searchParams.set("num", String(request.pageSize));
    url.searchParams.set("start", String(request.offset));
    url.searchParams.set("safe", "off");
    return url;
  }

  async search(request: SearchRequest): Promise<SearchHit[]> {
    const response = await fetch(this.buildUrl(request), {
      signal: AbortSignal.timeout(this.options.timeoutMs ?? 30000),
    });

    if (!response.ok) {
      throw new Error(`Google search failed (${response.status})`);
    }

    const payload = (await response.json()) as GoogleSearchResponse;

    return (payload.items ?? []).flatMap((item) =>
      item.link
        ? [{ url: item.link, title: item.title ?? "", snippet: item.snippet ?? "" }]
        : [],
    );
  }
}
