export type SearchHit = {
  url: string;
  title: string;
  snippet: string;
};

export type SearchRequest = {
  seedQuery: string;
  sites: string[];
  fundingKeywords: string[];
  excludeWords: string[];
  /** 1-based index of the first result on the page. */
  offset: number;
  pageSize: number;
  lookbackDays: number;
};

export interface SearchProvider {
  readonly name: string;
  search(request: SearchRequest): Promise<SearchHit[]>;
}
