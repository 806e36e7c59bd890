import { joinUrlPath, serializeSearchFilter, type SearchFilter } from "@ctxsync/shared";

export interface SearchRequest {
  query?: string;
  limit?: number;
  filter?: SearchFilter;
}

export interface SearchResult {
  id: string;
  content: string;
  type: string;
  similarity: number;
  metadata: unknown;
}

export interface SearchResponse {
  results: SearchResult[];
  total: number;
  query: string;
}

export interface SearchClientOptions {
  apiBaseUrl: string;
  timeoutMs?: number;
}

export const SEARCH_PATH = "/api/v1/search";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toResult = (value: unknown): SearchResult | undefined => {
  if (!isRecord(value)) return undefined;
  if (typeof value.content !== "string") return undefined;
  return {
    id: typeof value.id === "string" ? value.id : String(value.id ?? ""),
    content: value.content,
    type: typeof value.type === "string" ? value.type : "unknown",
    similarity: typeof value.similarity === "number" ? value.similarity : 0,
    metadata: value.metadata ?? {},
  };
};

export const parseSearchResponse = (payload: unknown): SearchResponse => {
  if (!isRecord(payload) || !Array.isArray(payload.results)) {
    throw new Error("Failed to parse search response: missing results array");
  }
  const results = payload.results
    .map(toResult)
    .filter((result): result is SearchResult => result !== undefined);
  return {
    results,
    total: typeof payload.total === "number" ? payload.total : results.length,
    query: typeof payload.query === "string" ? payload.query : "",
  };
};

export class SearchClient {
  constructor(private options: SearchClientOptions) {}

  async search(request: SearchRequest, token: string): Promise<SearchResponse> {
    const url = joinUrlPath(this.options.apiBaseUrl, SEARCH_PATH);
    const body: Record<string, unknown> = {};
    if (request.query !== undefined) body.query = request.query;
    if (request.limit !== undefined) body.limit = request.limit;
    if (request.filter) body.filter = serializeSearchFilter(request.filter);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs ?? 30_000);
    try {
      const response = await fetch(url, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          accept: "application/json",
          authorization: `Bearer ${token}`,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      if (!response.ok) {
        const detail = await response.text().catch(() => "");
        throw new Error(`Search request failed with status ${response.status}: ${detail}`);
      }
      return parseSearchResponse(await response.json());
    } finally {
      clearTimeout(timeout);
    }
  }
}
