import { describe, expect, it } from "vitest";
import { NotFoundError } from "../../src/errors.js";
import { PostgresEpisodicMemory } from "../../src/memory/postgres.js";
import { MockPgPool } from "../helpers/mock-pg.js";

describe("PostgresEpisodicMemory", () => {
  it("creates its tables once and round-trips episodes", async () => {
    const pool = new MockPgPool();
    const memory = new PostgresEpisodicMemory({ pool, namespace: "tests" });
    const timestamp = new Date("2024-04-01T00:00:00.000Z");

    const [first, second] = await Promise.all([
      memory.addEpisode({ content: "deploy the web service", outcome: "done", toolsUsed: ["web"], timestamp }),
      memory.addEpisode({ content: "write a report", outcome: "written", toolsUsed: [], metadata: { pages: 3 } }),
    ]);

    expect(first).not.toBe(second);
    expect(pool.queries.filter((query) => query.text.includes("CREATE TABLE"))).toHaveLength(1);
    await expect(memory.getEpisode(first)).resolves.toEqual({
      id: first,
      content: "deploy the web service",
      outcome: "done",
      toolsUsed: ["web"],
      timestamp,
    });
    await expect(memory.getEpisode(second)).resolves.toMatchObject({ metadata: { pages: 3 } });
  });

  it("throws NotFoundError for unknown ids", async () => {
    const memory = new PostgresEpisodicMemory({ pool: new MockPgPool() });
    await expect(memory.getEpisode("missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("searches with an OR-ed full-text query", async () => {
    const pool = new MockPgPool();
    const memory = new PostgresEpisodicMemory({ pool, namespace: "tests", ensureSchema: false });
    await memory.addEpisode({ content: "deploy the web service", outcome: "a", toolsUsed: [] });
    await memory.addEpisode({ content: "deploy a database", outcome: "c", toolsUsed: [] });
    await memory.addEpisode({ content: "bake bread", outcome: "b", toolsUsed: [] });

    const matches = await memory.searchEpisodes("Deploy web service!");

    expect(matches.map((match) => match.episode.outcome)).toEqual(["a", "c"]);
    expect(matches[0].score).toBe(1);
    expect(matches[1].score).toBeCloseTo(1 / 3);
    const search = pool.queries.find((query) => query.text.includes("ts_rank"));
    expect(search?.params).toEqual(["tests", "deploy | web | service", 5]);
    expect(pool.queries.some((query) => query.text.includes("CREATE TABLE"))).toBe(false);
  });

  it("skips the query when nothing can match", async () => {
    const pool = new MockPgPool();
    const memory = new PostgresEpisodicMemory({ pool });

    await expect(memory.searchEpisodes("the and of")).resolves.toEqual([]);
    await expect(memory.searchEpisodes("report", 0)).resolves.toEqual([]);
    expect(pool.queries).toEqual([]);
  });

  it("stores values per namespace and clears them with the episodes", async () => {
    const pool = new MockPgPool();
    const memory = new PostgresEpisodicMemory({ pool, namespace: "a" });
    const other = new PostgresEpisodicMemory({ pool, namespace: "b" });

    await memory.store("k", { v: 1 });
    await other.store("k", { v: 2 });
    await memory.recordInteraction({
      input: "hello",
      output: "hi",
      strategy: "reflection",
      status: "completed",
      toolsUsed: [],
      timestamp: new Date("2024-01-01T00:00:00.000Z"),
    });
    await expect(memory.retrieve("k")).resolves.toEqual({ v: 1 });

    await memory.clear();
    await expect(memory.retrieve("k")).resolves.toBeUndefined();
    await expect(other.retrieve("k")).resolves.toEqual({ v: 2 });
    expect(pool.episodeCount).toBe(0);
  });

  it("validates the schema name and closes the pool", async () => {
    expect(() => new PostgresEpisodicMemory({ pool: new MockPgPool(), schema: "bad-name" })).toThrow(
      'Invalid schema name "bad-name"'
    );
    const pool = new MockPgPool();
    await new PostgresEpisodicMemory({ pool }).close();
    expect(pool.ended).toBe(true);
  });
});
