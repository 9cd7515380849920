import { createReflectionState, type ReflectionState } from "../state/types.js";
import { generateText } from "./actions.js";
import { STOP_MARKER, hasStopMarker } from "./markers.js";
import { defineStateMachine } from "./runner.js";
import { TERMINATE, type StateMachine, type StepContext } from "./types.js";

export const DEFAULT_MAX_REFLECTIONS = 3;

export interface ReflectionPrompts {
  critique(task: string, response: string): string;
  refine(task: string, response: string, critique: string): string;
}

export interface ReflectionMachineOptions {
  maxReflections?: number;
  prompts?: Partial<ReflectionPrompts>;
}

export const defaultReflectionPrompts: ReflectionPrompts = {
  critique: (task, response) =>
    [
      "Critique the response to the task below. List concrete problems and how to fix them.",
      `If the response cannot be meaningfully improved, begin your reply with "${STOP_MARKER}".`,
      "",
      `Task: ${task}`,
      "",
      "Response:",
      response,
    ].join("\n"),
  refine: (task, response, critique) =>
    [
      "Rewrite the response so it addresses the critique. Reply with the improved response only.",
      "",
      `Task: ${task}`,
      "",
      "Response:",
      response,
      "",
      "Critique:",
      critique,
    ].join("\n"),
};

function latestResponse(state: ReflectionState): string | undefined {
  return state.refinedResponse ?? state.initialResponse;
}

export function createReflectionMachine(options: ReflectionMachineOptions = {}): StateMachine {
  const maxReflections = options.maxReflections ?? DEFAULT_MAX_REFLECTIONS;
  const prompts: ReflectionPrompts = { ...defaultReflectionPrompts, ...options.prompts };

  async function generateInitial(state: ReflectionState, ctx: StepContext): Promise<string> {
    const outcome = await generateText(state, ctx, "GENERATE_INITIAL", state.input);
    if (!outcome.ok) {
      state.status = "failed";
      state.error = outcome.error.message;
      return TERMINATE;
    }
    state.initialResponse = outcome.text;
    state.messages.append("agent", outcome.text, { step: "GENERATE_INITIAL" });
    return state.reflectionCount < state.maxReflections ? "REFLECT" : TERMINATE;
  }

  async function reflect(state: ReflectionState, ctx: StepContext): Promise<string> {
    const response = latestResponse(state);
    if (response === undefined || state.reflectionCount >= state.maxReflections) {
      return TERMINATE;
    }
    const outcome = await generateText(state, ctx, "REFLECT", prompts.critique(state.input, response));
    if (!outcome.ok) {
      state.status = "failed";
      state.error = outcome.error.message;
      return TERMINATE;
    }
    state.currentReflection = outcome.text;
    state.reflectionCount += 1;
    state.messages.append("agent", outcome.text, { step: "REFLECT", reflection: state.reflectionCount });
    return "REFINE";
  }

  async function refine(state: ReflectionState, ctx: StepContext): Promise<string> {
    const response = latestResponse(state);
    const critique = state.currentReflection;
    if (response === undefined || critique === undefined) {
      return TERMINATE;
    }
    const outcome = await generateText(state, ctx, "REFINE", prompts.refine(state.input, response, critique));
    if (!outcome.ok) {
      state.status = "failed";
      state.error = outcome.error.message;
      return TERMINATE;
    }
    state.refinedResponse = outcome.text;
    state.messages.append("agent", outcome.text, { step: "REFINE", reflection: state.reflectionCount });
    const keepGoing = state.reflectionCount < state.maxReflections && !hasStopMarker(critique);
    return keepGoing ? "REFLECT" : TERMINATE;
  }

  return defineStateMachine({
    strategy: "reflection",
    graph: {
      strategy: "reflection",
      entry: "GENERATE_INITIAL",
      nodes: ["GENERATE_INITIAL", "REFLECT", "REFINE", TERMINATE],
      edges: [
        { from: "GENERATE_INITIAL", to: "REFLECT", when: "maxReflections > 0" },
        { from: "GENERATE_INITIAL", to: TERMINATE, when: "maxReflections = 0 or generation failed" },
        { from: "REFLECT", to: "REFINE" },
        { from: "REFINE", to: "REFLECT", when: "reflectionCount < maxReflections and no stop marker" },
        { from: "REFINE", to: TERMINATE, when: "otherwise" },
      ],
    },
    handlers: {
      GENERATE_INITIAL: generateInitial,
      REFLECT: reflect,
      REFINE: refine,
    },
    createState: (input) => createReflectionState(input, maxReflections),
    finalize: (state) => {
      const best = latestResponse(state);
      if (best !== undefined) {
        return best;
      }
      return `Unable to generate a response: ${state.error ?? "no output was produced"}`;
    },
  });
}
