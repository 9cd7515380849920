import { describe, expect, it, vi } from "vitest";
import { createSearchTool, type SearchAdapter } from "../../src/tools/search.js";

describe("createSearchTool", () => {
  it("normalizes adapter results", async () => {
    const adapter: SearchAdapter = {
      search: async () => ["plain result", { title: " Title ", snippet: " Snippet ", url: " https://example.test " }],
    };
    const tool = createSearchTool(adapter);

    await expect(tool.execute({ query: "agents" }, {})).resolves.toEqual([
      { title: "plain result", snippet: "plain result" },
      { title: "Title", snippet: "Snippet", url: "https://example.test" },
    ]);
  });

  it("caps the requested limit", async () => {
    const search = vi.fn<Parameters<SearchAdapter["search"]>, ReturnType<SearchAdapter["search"]>>(async () => []);
    const tool = createSearchTool({ search }, { maxLimit: 10 });

    await tool.execute({ query: "agents", limit: 20 }, { metadata: { runId: "r1" } });
    expect(search).toHaveBeenCalledWith({ query: "agents", limit: 10, signal: undefined, metadata: { runId: "r1" } });
  });

  it("validates the query", async () => {
    const tool = createSearchTool({ search: async () => [] });
    await expect(tool.execute({ query: "a" }, {})).rejects.toThrow("Query must be at least 2 characters");
    await expect(tool.execute({ query: "agents", limit: 0 }, {})).rejects.toThrow(
      "limit must be a positive integer when provided"
    );
  });

  it("requires an adapter", () => {
    expect(() => createSearchTool({} as SearchAdapter)).toThrow("createSearchTool requires an adapter with a search method");
  });
});
