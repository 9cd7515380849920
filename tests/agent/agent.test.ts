import { afterEach, describe, expect, it, vi } from "vitest";
import { Agent } from "../../src/agent/agent.js";
import type { AgentEvent } from "../../src/agent/types.js";
import { AgentError } from "../../src/errors.js";
import { createReActMachine } from "../../src/machines/react.js";
import { createReflectionMachine } from "../../src/machines/reflection.js";
import { ConversationMemory } from "../../src/memory/conversation.js";
import { SimpleMemory } from "../../src/memory/simple.js";
import type { AgentMemory } from "../../src/memory/types.js";
import { ContentFilterPolicy } from "../../src/policy/builtin.js";
import { serializeState } from "../../src/state/serialize.js";
import { createReActState, createReflectionState } from "../../src/state/types.js";
import type { GenerateFn } from "../../src/types.js";
import { createCalculatorTool } from "../../src/tools/calculator.js";
import { actionReply, scriptedGenerator } from "../helpers/scripted-generator.js";
import { stateOf } from "../helpers/states.js";

const echo: GenerateFn = async (prompt) => `answer to ${prompt}`;

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Agent", () => {
  it("gives the same result for the same input once memory is cleared", async () => {
    const memory = new SimpleMemory();
    const { generate } = scriptedGenerator([
      actionReply("calculator", { expression: "2+2" }, "add"),
      "FINAL ANSWER: 4",
      actionReply("calculator", { expression: "2+2" }, "add"),
      "FINAL ANSWER: 4",
    ]);
    const agent = new Agent({ machine: createReActMachine(), generator: generate, memory, tools: [createCalculatorTool()] });

    const first = await agent.process("What is 2+2?");
    await memory.clear();
    const second = await agent.process("What is 2+2?");

    expect(second.output).toBe("4");
    expect(second.output).toBe(first.output);
    expect(second.trace).toEqual(first.trace);
    expect(second.toolsUsed).toEqual(first.toolsUsed);
    expect(second.status).toBe(first.status);
    expect(second.runId).not.toBe(first.runId);
    const { messages: firstMessages, ...firstFields } = stateOf(first.state, "react");
    const { messages: secondMessages, ...secondFields } = stateOf(second.state, "react");
    expect(secondFields).toEqual(firstFields);
    expect(secondMessages.toArray()).toEqual(firstMessages.toArray());
  });

  it("starts every run from a fresh state", async () => {
    const { generate } = scriptedGenerator([
      actionReply("calculator", { expression: "2+2" }, "add"),
      "FINAL ANSWER: 4",
      "FINAL ANSWER: done",
    ]);
    const agent = new Agent({ machine: createReActMachine(), generator: generate, tools: [createCalculatorTool()] });

    const first = await agent.process("What is 2+2?");
    const second = await agent.process("Say done");

    expect(first.toolsUsed).toEqual(["calculator"]);
    expect(second.toolsUsed).toEqual([]);
    expect(second.trace).toEqual(["THINK"]);
    const state = stateOf(second.state, "react");
    expect(state.thought).toBeUndefined();
    expect(state.action).toBeUndefined();
    expect(state.observation).toBeUndefined();
    expect(state.stepCount).toBe(0);
    expect(state.finalAnswer).toBe("done");
  });

  it("emits lifecycle events in order with run and agent ids", async () => {
    const events: AgentEvent[] = [];
    const agent = new Agent({
      id: "writer",
      machine: createReflectionMachine({ maxReflections: 0 }),
      generator: echo,
      onEvent: (event) => events.push(event),
    });

    const result = await agent.process("hello", { runId: "run-42", metadata: { user: "u1" } });

    expect(events.map((event) => event.type)).toEqual([
      "agent.run.start",
      "agent.step.start",
      "agent.generation",
      "agent.step.done",
      "agent.memory.record",
      "agent.run.complete",
    ]);
    expect(events.every((event) => event.runId === "run-42" && event.agentId === "writer")).toBe(true);
    expect(events[0]).toMatchObject({ strategy: "reflection", input: "hello", metadata: { user: "u1" } });
    expect(events[5]).toMatchObject({ status: "completed", output: "answer to hello", stepCount: 1 });
    expect(result.runId).toBe("run-42");
  });

  it("records each run in memory and feeds it back as context", async () => {
    const memory = new ConversationMemory({ maxHistory: 10 });
    const generator = scriptedGenerator(["first reply", "second reply"]);
    const agent = new Agent({
      machine: createReflectionMachine({ maxReflections: 0 }),
      generator: generator.generate,
      memory,
    });

    await agent.process("first question");
    await agent.process("second question");

    const turns = await memory.getRecentContext(5);
    expect(turns.map((turn) => [turn.userInput, turn.agentResponse])).toEqual([
      ["first question", "first reply"],
      ["second question", "second reply"],
    ]);
    expect(generator.calls[1]?.context.map((message) => message.content)).toEqual([
      "first question",
      "first reply",
      "second question",
    ]);
  });

  it("keeps running when memory fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const broken: AgentMemory = {
      kind: "simple",
      store: async () => {},
      retrieve: async () => undefined,
      clear: async () => {},
      getContext: async () => {
        throw new Error("context down");
      },
      recordInteraction: async () => {
        throw new Error("write down");
      },
    };
    const agent = new Agent({
      machine: createReflectionMachine({ maxReflections: 0 }),
      generator: echo,
      memory: broken,
    });

    const result = await agent.process("hello");

    expect(result.status).toBe("completed");
    expect(result.output).toBe("answer to hello");
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it("keeps running when the event handler throws", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const agent = new Agent({
      machine: createReflectionMachine({ maxReflections: 0 }),
      generator: echo,
      onEvent: () => {
        throw new Error("sink down");
      },
    });

    const result = await agent.process("hello");

    expect(result.status).toBe("completed");
    expect(error).toHaveBeenCalledWith("Agent telemetry emit failed", expect.any(Error));
  });

  it("filters the final response through policies", async () => {
    const agent = new Agent({
      machine: createReflectionMachine({ maxReflections: 0 }),
      generator: async () => "the password is test-secret",
      policies: [new ContentFilterPolicy({ blockedTerms: ["test-secret"] })],
    });

    const result = await agent.process("tell me");

    expect(result.output).toBe("the password is [REDACTED]");
    expect(result.state.output).toBe("the password is [REDACTED]");
  });

  it("withholds the response when a filter fails", async () => {
    const agent = new Agent({
      machine: createReflectionMachine({ maxReflections: 0 }),
      generator: echo,
      policies: [
        {
          name: "broken",
          filterResponse: () => {
            throw new Error("filter down");
          },
        },
      ],
    });

    const result = await agent.process("hello");

    expect(result.status).toBe("failed");
    expect(result.error).toBe("Response filter failed: filter down");
    expect(result.output).toBe("Response withheld: filter down");
  });

  it("stops before the first step when already aborted", async () => {
    const controller = new AbortController();
    controller.abort("stop");
    const agent = new Agent({ machine: createReflectionMachine(), generator: echo });

    const result = await agent.process("hello", { signal: controller.signal });

    expect(result.status).toBe("failed");
    expect(result.trace).toEqual([]);
    expect(result.output).toBe("Unable to generate a response: Run aborted before GENERATE_INITIAL: stop");
  });

  it("resumes a serialized state", async () => {
    const saved = createReflectionState("Describe the sea", 1);
    saved.initialResponse = "draft";
    saved.messages.append("agent", "draft", { step: "GENERATE_INITIAL" });
    saved.trace.push("GENERATE_INITIAL");
    saved.currentStep = "REFLECT";
    const generator = scriptedGenerator(["needs waves", "draft with waves"]);
    const agent = new Agent({
      machine: createReflectionMachine({ maxReflections: 1 }),
      generator: generator.generate,
    });

    const result = await agent.process("ignored", { resume: JSON.parse(JSON.stringify(serializeState(saved))) });

    expect(result.output).toBe("draft with waves");
    expect(result.trace).toEqual(["GENERATE_INITIAL", "REFLECT", "REFINE"]);
    expect(result.state.input).toBe("Describe the sea");
    expect(generator.calls[0]?.prompt).toContain("Task: Describe the sea");
  });

  it("refuses to resume another strategy's state", async () => {
    const agent = new Agent({ machine: createReflectionMachine(), generator: echo });

    await expect(agent.process("x", { resume: serializeState(createReActState("x", 3)) })).rejects.toThrow(
      "Cannot resume a react state with a reflection agent"
    );
    await expect(agent.process("x", { resume: { strategy: "swarm" } })).rejects.toBeInstanceOf(AgentError);
  });

  it("exposes copies of its last state and graph", async () => {
    const agent = new Agent({ machine: createReActMachine(), generator: async () => "FINAL ANSWER: done" });
    expect(agent.getState()).toBeUndefined();

    await agent.process("finish");
    const state = agent.getState();
    state?.trace.push("MUTATED");
    const graph = agent.getCompiledGraph();

    expect(agent.getState()?.trace).toEqual(["THINK"]);
    expect(graph.entry).toBe("THINK");
    expect(graph.nodes).toEqual(["THINK", "ACT", "OBSERVE", "TERMINATE"]);
  });

  it("swaps memory and adds tools and policies after construction", async () => {
    const agent = new Agent({ machine: createReActMachine(), generator: echo });
    const memory = new SimpleMemory();

    agent.setMemory(memory).addTool({ name: "noop", description: "does nothing", schema: {}, execute: () => null });

    expect(agent.getMemory()).toBe(memory);
    expect(agent.tools.list()).toEqual(["noop"]);
    expect(agent.strategy).toBe("react");
  });
});
