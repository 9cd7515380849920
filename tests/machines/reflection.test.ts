import { describe, expect, it } from "vitest";
import { Agent } from "../../src/agent/agent.js";
import type { AgentEvent } from "../../src/agent/types.js";
import { createReflectionMachine } from "../../src/machines/reflection.js";
import { scriptedGenerator } from "../helpers/scripted-generator.js";
import { stateOf } from "../helpers/states.js";

function reflectionAgent(script: ReadonlyArray<string | Error>, maxReflections: number) {
  const generator = scriptedGenerator(script);
  const events: AgentEvent[] = [];
  const agent = new Agent({
    machine: createReflectionMachine({ maxReflections }),
    generator: generator.generate,
    onEvent: (event) => events.push(event),
  });
  return { agent, generator, events };
}

describe("reflection machine", () => {
  it("stops after the first draft when no reflections are allowed", async () => {
    const { agent, generator } = reflectionAgent(["draft"], 0);

    const result = await agent.process("Write a haiku");

    expect(result.status).toBe("completed");
    expect(result.output).toBe("draft");
    expect(result.trace).toEqual(["GENERATE_INITIAL"]);
    expect(generator.calls).toHaveLength(1);
    expect(generator.calls[0]?.prompt).toBe("Write a haiku");
  });

  it("alternates critique and refinement up to the bound", async () => {
    const { agent, generator } = reflectionAgent(["v1", "c1", "v2", "c2", "v3"], 2);

    const result = await agent.process("Explain recursion");
    const state = stateOf(result.state, "reflection");

    expect(result.trace).toEqual(["GENERATE_INITIAL", "REFLECT", "REFINE", "REFLECT", "REFINE"]);
    expect(result.output).toBe("v3");
    expect(state.reflectionCount).toBe(2);
    expect(state.initialResponse).toBe("v1");
    expect(state.currentReflection).toBe("c2");
    expect(generator.calls[3]?.prompt).toContain("Response:\nv2");
    expect(state.messages.toArray().map((message) => message.metadata)).toEqual([
      {},
      { step: "GENERATE_INITIAL" },
      { step: "REFLECT", reflection: 1 },
      { step: "REFINE", reflection: 1 },
      { step: "REFLECT", reflection: 2 },
      { step: "REFINE", reflection: 2 },
    ]);
  });

  it("finishes once a critique opens with the stop marker", async () => {
    const { agent } = reflectionAgent(["v1", "NO FURTHER IMPROVEMENT - reads well", "v1 polished"], 3);

    const result = await agent.process("Summarize the memo");

    expect(result.trace).toEqual(["GENERATE_INITIAL", "REFLECT", "REFINE"]);
    expect(result.output).toBe("v1 polished");
    expect(stateOf(result.state, "reflection").reflectionCount).toBe(1);
  });

  it("keeps the best response when a later model call fails", async () => {
    const { agent, events } = reflectionAgent(["v1", new Error("model down")], 2);

    const result = await agent.process("Draft an email");

    expect(result.status).toBe("failed");
    expect(result.output).toBe("v1");
    expect(result.error).toBe("Model call failed: model down");
    expect(result.trace).toEqual(["GENERATE_INITIAL", "REFLECT"]);
    const generations = events.flatMap((event) => (event.type === "agent.generation" ? [event.status] : []));
    expect(generations).toEqual(["ok", "error"]);
    expect(events[events.length - 1]?.type).toBe("agent.run.error");
  });

  it("reports a failure when no draft was produced", async () => {
    const { agent } = reflectionAgent([new Error("boom")], 1);

    const result = await agent.process("Anything");

    expect(result.status).toBe("failed");
    expect(result.output).toBe("Unable to generate a response: Model call failed: boom");
  });

  it("accepts custom prompts", async () => {
    const generator = scriptedGenerator(["v1", "c1", "v2"]);
    const agent = new Agent({
      machine: createReflectionMachine({
        maxReflections: 1,
        prompts: { critique: (task, response) => `critique ${task} / ${response}` },
      }),
      generator: generator.generate,
    });

    await agent.process("t");

    expect(generator.calls[1]?.prompt).toBe("critique t / v1");
    expect(generator.calls[2]?.prompt).toContain("Critique:\nc1");
  });
});
