import { tavily } from "@tavily/core";
import { abortable } from "../shared/utils/abort";
import type {
  CallOptions,
  ExtractionBatch,
  NewsSearchOptions,
  NewsSearchProvider,
  SearchHit,
} from "../research/services";

export interface TavilySearchRequest {
  searchDepth: "basic" | "advanced";
  topic: "news";
  maxResults: number;
  startDate?: string;
  endDate?: string;
  includeDomains?: string[];
}

/**
 * The two calls this adapter makes on the @tavily/core client.
 */
export interface TavilyLike {
  search(query: string, options: TavilySearchRequest): Promise<{ results: object[] }>;
  extract(urls: string[]): Promise<{ results: object[]; failedResults: object[] }>;
}

function stringField(record: object, key: string): string {
  const value: unknown = Reflect.get(record, key);
  return typeof value === "string" ? value : "";
}

/**
 * News search and article extraction through Tavily.
 */
export class TavilyNewsProvider implements NewsSearchProvider {
  constructor(private readonly client: TavilyLike) {}

  async search(query: string, options: NewsSearchOptions): Promise<SearchHit[]> {
    const request: TavilySearchRequest = {
      searchDepth: options.depth,
      topic: "news",
      maxResults: options.maxResults,
    };
    if (options.startDate) request.startDate = options.startDate;
    if (options.endDate) request.endDate = options.endDate;
    if (options.includeDomains?.length) request.includeDomains = options.includeDomains;

    const response = await abortable(this.client.search(query, request), options.signal);
    return response.results.map((result) => ({
      url: stringField(result, "url"),
      title: stringField(result, "title"),
      content: stringField(result, "content"),
      publishedDate: stringField(result, "publishedDate"),
    }));
  }

  async extract(urls: string[], options: CallOptions = {}): Promise<ExtractionBatch> {
    const response = await abortable(this.client.extract(urls), options.signal);
    return {
      results: response.results.map((result) => ({
        url: stringField(result, "url"),
        rawContent: stringField(result, "rawContent"),
      })),
      failedUrls: response.failedResults.map((failure) => stringField(failure, "url")),
    };
  }
}

export function createTavilyNewsProvider(apiKey: string): TavilyNewsProvider {
  return new TavilyNewsProvider(tavily({ apiKey }));
}
