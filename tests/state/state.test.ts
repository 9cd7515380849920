import { describe, expect, it } from "vitest";
import { AgentError, ConfigError } from "../../src/errors.js";
import { MessageLog, formatTranscript } from "../../src/state/messages.js";
import { cloneState, restoreState, serializeState } from "../../src/state/serialize.js";
import {
  createPlanningState,
  createReActState,
  createReflectionState,
  getContext,
  getMessages,
  isStrategyName,
} from "../../src/state/types.js";

describe("state creation", () => {
  it("starts every strategy at its entry node with the input as the first message", () => {
    const reflection = createReflectionState("Explain recursion", 2);
    const react = createReActState("What is 2 + 2?", 5);
    const planning = createPlanningState("Ship v1", 10, 2);

    expect(reflection).toMatchObject({ strategy: "reflection", currentStep: "GENERATE_INITIAL", reflectionCount: 0 });
    expect(react).toMatchObject({ strategy: "react", currentStep: "THINK", stepCount: 0, maxSteps: 5 });
    expect(planning).toMatchObject({ strategy: "planning", currentStep: "UNDERSTAND_GOAL", plan: [], maxReplans: 2 });
    expect(getMessages(react)).toEqual([{ role: "user", content: "What is 2 + 2?", metadata: {} }]);
    expect(react.status).toBe("running");
  });

  it("rejects invalid bounds", () => {
    expect(() => createReActState("x", -1)).toThrow(ConfigError);
    expect(() => createReflectionState("x", 1.5)).toThrow("maxReflections must be a non-negative integer");
    expect(() => createPlanningState("x", 3, -2)).toThrow("maxReplans must be a non-negative integer");
  });

  it("recognizes strategy names", () => {
    expect(isStrategyName("react")).toBe(true);
    expect(isStrategyName("swarm")).toBe(false);
  });
});

describe("MessageLog", () => {
  it("appends frozen entries and finds the latest by role", () => {
    const log = new MessageLog();
    const first = log.append("user", "hi");
    log.append("agent", "hello", { step: "THINK" });
    log.append("user", "bye");

    expect(Object.isFrozen(first)).toBe(true);
    expect(log.length).toBe(3);
    expect(log.last("agent")?.content).toBe("hello");
    expect(log.last()?.content).toBe("bye");
    expect(log.last("tool")).toBeUndefined();
    expect(formatTranscript(log)).toBe("user: hi\nagent: hello\nuser: bye");
  });

  it("renders a state's transcript", () => {
    const state = createReActState("question", 3);
    state.messages.append("agent", "answer");
    expect(getContext(state)).toBe("user: question\nagent: answer");
  });
});

describe("serializeState / restoreState", () => {
  it("round-trips through JSON", () => {
    const state = createReActState("What is 2 + 2?", 5);
    state.messages.append("agent", "thinking", { step: "THINK" });
    state.action = { tool: "calculator", args: { expression: "2+2" } };
    state.trace.push("THINK");
    state.stepCount = 1;

    const record = JSON.parse(JSON.stringify(serializeState(state)));
    const restored = restoreState(record);

    expect(restored.messages).toBeInstanceOf(MessageLog);
    expect(getMessages(restored)).toEqual(getMessages(state));
    expect(serializeState(restored)).toEqual(serializeState(state));
  });

  it("produces copies that do not share mutable parts", () => {
    const state = createPlanningState("goal", 5, 1);
    state.plan.push("design");
    const copy = cloneState(state);
    if (copy.strategy !== "planning") {
      throw new Error("expected a planning state");
    }
    copy.plan.push("implement");
    copy.messages.append("agent", "extra");

    expect(state.plan).toEqual(["design"]);
    expect(state.messages.length).toBe(1);
  });

  it("rejects records that break a bound", () => {
    const record = { ...serializeState(createReActState("x", 5)), stepCount: 6 };
    expect(() => restoreState(record)).toThrow("Serialized state is invalid: stepCount exceeds maxSteps");
  });

  it("rejects unknown strategies with INVALID_STATE", () => {
    try {
      restoreState({ strategy: "swarm" });
      expect.unreachable("restoreState should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(AgentError);
      expect(error).toMatchObject({ code: "INVALID_STATE" });
    }
  });
});
