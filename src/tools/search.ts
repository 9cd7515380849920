import type { Tool, ToolRunContext } from "./types.js";

export type SearchArgs = {
  query: string;
  limit?: number;
};

export interface SearchResult {
  title: string;
  snippet: string;
  url?: string;
  score?: number;
}

export interface SearchAdapter {
  search(request: {
    query: string;
    limit: number;
    signal?: AbortSignal;
    metadata?: Record<string, unknown>;
  }): Promise<Array<SearchResult | string>>;
}

export interface CreateSearchToolOptions {
  name?: string;
  description?: string;
  defaultLimit?: number;
  maxLimit?: number;
  minQueryLength?: number;
  maxQueryLength?: number;
}

const DEFAULT_LIMIT = 5;
const DEFAULT_MAX_LIMIT = 10;
const DEFAULT_MIN_QUERY_LENGTH = 2;
const DEFAULT_MAX_QUERY_LENGTH = 256;

/**
 * Search over a caller-supplied backend. Adapters may return bare strings;
 * they are normalised into results with the string as the snippet.
 */
export function createSearchTool(
  adapter: SearchAdapter,
  options: CreateSearchToolOptions = {}
): Tool<SearchArgs, SearchResult[]> {
  if (!adapter || typeof adapter.search !== "function") {
    throw new Error("createSearchTool requires an adapter with a search method");
  }

  const defaultLimit = options.defaultLimit ?? DEFAULT_LIMIT;
  const maxLimit = options.maxLimit ?? DEFAULT_MAX_LIMIT;
  const minQueryLength = options.minQueryLength ?? DEFAULT_MIN_QUERY_LENGTH;
  const maxQueryLength = options.maxQueryLength ?? DEFAULT_MAX_QUERY_LENGTH;

  if (!Number.isInteger(defaultLimit) || defaultLimit <= 0) {
    throw new Error("defaultLimit must be a positive integer");
  }
  if (!Number.isInteger(maxLimit) || maxLimit <= 0) {
    throw new Error("maxLimit must be a positive integer");
  }
  if (defaultLimit > maxLimit) {
    throw new Error("defaultLimit cannot be greater than maxLimit");
  }

  return {
    name: options.name?.trim() || "search",
    description: options.description?.trim() || "Search for information using the provided query",
    schema: {
      query: { type: "string", description: "Search query", required: true },
      limit: { type: "integer", description: `Maximum results (1-${maxLimit})` },
    },
    async execute(args: SearchArgs, ctx: ToolRunContext): Promise<SearchResult[]> {
      if (!args || typeof args.query !== "string") {
        throw new Error("search requires a query string");
      }
      const query = args.query.trim();
      if (query.length < minQueryLength) {
        throw new Error(`Query must be at least ${minQueryLength} characters`);
      }
      if (query.length > maxQueryLength) {
        throw new Error(`Query exceeds maximum length of ${maxQueryLength} characters`);
      }
      const requested = args.limit ?? defaultLimit;
      if (!Number.isInteger(requested) || requested <= 0) {
        throw new Error("limit must be a positive integer when provided");
      }
      const limit = Math.min(requested, maxLimit);

      const results = await adapter.search({ query, limit, signal: ctx.signal, metadata: ctx.metadata });
      if (!Array.isArray(results)) {
        throw new Error("Search adapter must return an array of results");
      }
      return results.slice(0, limit).map(normalizeResult);
    },
  };
}

function normalizeResult(result: SearchResult | string): SearchResult {
  if (typeof result === "string") {
    return { title: result.slice(0, 80), snippet: result };
  }
  if (!result || typeof result.title !== "string" || typeof result.snippet !== "string") {
    throw new Error("Search result must carry a title and a snippet");
  }
  return {
    title: result.title.trim(),
    snippet: result.snippet.trim(),
    url: result.url?.trim(),
    score: result.score,
  };
}
