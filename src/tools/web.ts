import type { Tool, ToolRunContext } from "./types.js";

export type WebOperation = "fetch" | "headers";

export type WebArgs = {
  operation: WebOperation;
  url: string;
};

export type FetchLike = (
  input: string,
  init: { method: string; signal?: AbortSignal }
) => Promise<{ ok: boolean; status: number; headers: { forEach(cb: (value: string, key: string) => void): void }; text(): Promise<string> }>;

export interface WebToolOptions {
  name?: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  maxChars?: number;
}

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_MAX_CHARS = 2000;

export function createWebTool(options: WebToolOptions = {}): Tool<WebArgs, string | Record<string, string>> {
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const maxChars = options.maxChars ?? DEFAULT_MAX_CHARS;

  return {
    name: options.name?.trim() || "web",
    description: "Perform web operations like fetching webpage content or response headers",
    schema: {
      operation: { type: "string", enum: ["fetch", "headers"], required: true },
      url: { type: "string", description: "Absolute http(s) URL", required: true },
    },
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    async execute(args: WebArgs, ctx: ToolRunContext): Promise<string | Record<string, string>> {
      const url = parseUrl(args?.url);
      if (args.operation !== "fetch" && args.operation !== "headers") {
        throw new Error(`Unsupported web operation: ${String(args.operation)}`);
      }

      const response = await fetchImpl(url.toString(), {
        method: args.operation === "fetch" ? "GET" : "HEAD",
        signal: ctx.signal,
      });
      if (!response.ok) {
        throw new Error(`Request failed with status ${response.status}`);
      }

      if (args.operation === "headers") {
        const headers: Record<string, string> = {};
        response.headers.forEach((value, key) => {
          headers[key] = value;
        });
        return headers;
      }
      const body = await response.text();
      return body.slice(0, maxChars);
    },
  };
}

function parseUrl(raw: unknown): URL {
  if (typeof raw !== "string" || raw.trim() === "") {
    throw new Error("web requires a url");
  }
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new Error(`Invalid URL: ${raw}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new Error(`Unsupported URL protocol: ${url.protocol}`);
  }
  return url;
}
