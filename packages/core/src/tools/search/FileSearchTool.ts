import { hasValue, serializeSearchFilter, type SearchFilter } from "@ctxsync/shared";
import type { SearchRequest, SearchResponse, TokenSource } from "@ctxsync/integrations";
import { mergeContextFilter } from "../../sync/ContextFilterMerger.js";
import type { SyncedContextStore } from "../../sync/SyncedContextStore.js";
import type { ToolDefinition } from "../ToolTypes.js";

export const FILE_SEARCH_TOOL_NAME = "file_search";
export const DEFAULT_SEARCH_LIMIT = 10;
export const MAX_SEARCH_LIMIT = 100;
const PREVIEW_LENGTH = 200;

const FILTER_KEYS = [
  "search_type",
  "content_type",
  "thread_id",
  "account_id",
  "product_id",
  "board_id",
  "task_id",
] as const;

export interface FileSearchInput {
  query?: string;
  limit?: number;
  filter?: SearchFilter;
}

export interface SearchBackend {
  search(request: SearchRequest, token: string): Promise<SearchResponse>;
}

export interface FileSearchToolDeps {
  store: SyncedContextStore;
  tokens: TokenSource;
  search: SearchBackend;
}

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseFilter = (raw: unknown): SearchFilter => {
  if (!isObject(raw)) {
    throw new Error("Invalid file_search filter: expected object");
  }
  const filter: SearchFilter = {};
  for (const key of FILTER_KEYS) {
    // `type` is the wire name of search_type; accept either spelling.
    const value = key === "search_type" ? (raw.search_type ?? raw.type) : raw[key];
    if (value === undefined || value === null) continue;
    if (typeof value !== "string") {
      throw new Error(`Invalid file_search filter.${key}: expected string`);
    }
    filter[key] = value;
  }
  return filter;
};

export const parseFileSearchInput = (args: unknown): FileSearchInput => {
  if (args === undefined || args === null) return {};
  if (!isObject(args)) {
    throw new Error("Invalid file_search input: expected object");
  }
  const input: FileSearchInput = {};
  if (args.query !== undefined && args.query !== null) {
    if (typeof args.query !== "string") throw new Error("Invalid file_search query: expected string");
    input.query = args.query;
  }
  if (args.limit !== undefined && args.limit !== null) {
    if (typeof args.limit !== "number" || !Number.isFinite(args.limit)) {
      throw new Error("Invalid file_search limit: expected number");
    }
    input.limit = args.limit;
  }
  if (args.filter !== undefined && args.filter !== null) {
    input.filter = parseFilter(args.filter);
  }
  return input;
};

export const clampSearchLimit = (limit?: number): number => {
  if (limit === undefined) return DEFAULT_SEARCH_LIMIT;
  return Math.min(MAX_SEARCH_LIMIT, Math.max(1, Math.floor(limit)));
};

export const describeSearch = (args: unknown): string => {
  let input: FileSearchInput;
  try {
    input = parseFileSearchInput(args);
  } catch {
    return "Search content";
  }
  const threadId = input.filter?.thread_id;
  const searchType = input.filter?.search_type;
  if (hasValue(input.query)) return `Searching for "${input.query}"`;
  if (hasValue(threadId)) return `Searching thread ${threadId}`;
  if (hasValue(searchType)) return `Searching ${searchType} content`;
  return "Searching content";
};

const preview = (content: string): string =>
  content.length > PREVIEW_LENGTH ? `${content.slice(0, PREVIEW_LENGTH)}...` : content;

export const formatSearchMessage = (response: SearchResponse): string => {
  let message = `Found ${response.total} results`;
  if (response.query) {
    message += ` for query "${response.query}"`;
  }
  if (response.results.length) {
    message += ":\n\n";
    response.results.forEach((result, index) => {
      message += `${index + 1}. [${result.type}] (similarity: ${result.similarity.toFixed(2)})\n${preview(result.content)}\n\n`;
    });
  }
  return message;
};

/**
 * Remote planning-context search. The synced task scopes every call unless
 * the caller names the ids explicitly.
 */
export const createFileSearchTool = (deps: FileSearchToolDeps): ToolDefinition => ({
  name: FILE_SEARCH_TOOL_NAME,
  description:
    "Search project planning context including big bet descriptions, work item details, requirements, and specifications. " +
    "Filter by type: 'conversations', 'tasks' (work items), 'compressed', or 'all'. " +
    "Use content_type 'work_item', 'big_bet' or 'auto' (default) to pick what is extracted. " +
    "Automatically scoped to the synced task. Results include content, type, and similarity score.",
  inputSchema: {
    type: "object",
    properties: {
      query: { type: "string", description: "The search query to find relevant context" },
      limit: {
        type: "integer",
        minimum: 1,
        maximum: MAX_SEARCH_LIMIT,
        description: `Maximum number of results to return (default: ${DEFAULT_SEARCH_LIMIT})`,
      },
      filter: {
        type: "object",
        properties: Object.fromEntries(FILTER_KEYS.map((key) => [key, { type: "string" }])),
      },
    },
  },
  describe: describeSearch,
  handler: async (args, context) => {
    const input = parseFileSearchInput(args);
    if (!hasValue(input.query) && !hasValue(input.filter?.thread_id)) {
      throw new Error("Either 'query' or 'filter.thread_id' must be provided");
    }
    const filter = mergeContextFilter(input.filter, deps.store.get());
    const request: SearchRequest = { limit: clampSearchLimit(input.limit) };
    if (hasValue(input.query)) request.query = input.query;
    if (Object.keys(serializeSearchFilter(filter)).length) request.filter = filter;

    await context.events?.log("file_search_dispatched", {
      callId: context.callId ?? null,
      limit: request.limit,
      filter: serializeSearchFilter(filter),
    });
    const token = await deps.tokens.acquire();
    const response = await deps.search.search(request, token);
    return { output: formatSearchMessage(response), data: response };
  },
});
