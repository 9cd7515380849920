import { describe, expect, it } from "vitest";
import { createMemory } from "../../src/memory/factory.js";
import { LAST_INPUT_KEY, SimpleMemory } from "../../src/memory/simple.js";
import type { Interaction } from "../../src/memory/types.js";

const interaction: Interaction = {
  input: "What is 2 + 2?",
  output: "4",
  strategy: "react",
  status: "completed",
  toolsUsed: ["calculator"],
  timestamp: new Date("2024-01-01T00:00:00.000Z"),
};

describe("SimpleMemory", () => {
  it("stores, overwrites and clears values", async () => {
    const memory = new SimpleMemory();
    await memory.store("k", 1);
    await memory.store("k", { nested: true });
    await expect(memory.retrieve("k")).resolves.toEqual({ nested: true });
    await expect(memory.retrieve("missing")).resolves.toBeUndefined();

    await memory.clear();
    await expect(memory.retrieve("k")).resolves.toBeUndefined();
    expect(memory.keys()).toEqual([]);
  });

  it("offers the last exchange as context", async () => {
    const memory = new SimpleMemory();
    await expect(memory.getContext()).resolves.toEqual([]);

    await memory.recordInteraction(interaction);
    await expect(memory.retrieve(LAST_INPUT_KEY)).resolves.toBe("What is 2 + 2?");
    await expect(memory.getContext()).resolves.toEqual([
      { role: "user", content: "What is 2 + 2?", metadata: { source: "memory" } },
      { role: "agent", content: "4", metadata: { source: "memory" } },
    ]);
  });
});

describe("createMemory", () => {
  it("builds each in-process backend", () => {
    expect(createMemory().kind).toBe("simple");
    expect(createMemory({ kind: "conversation", maxHistory: 3 }).kind).toBe("conversation");
    expect(createMemory({ kind: "episodic" }).kind).toBe("episodic");
  });

  it("validates conversation bounds", () => {
    expect(() => createMemory({ kind: "conversation", maxHistory: 0 })).toThrow("maxHistory must be a positive integer");
  });
});
