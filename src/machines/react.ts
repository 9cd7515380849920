import { createReActState, type ReActState } from "../state/types.js";
import type { ToolDescription } from "../tools/types.js";
import { generateText, invokeToolAction } from "./actions.js";
import { FINAL_ANSWER_MARKER, parseReActOutput } from "./markers.js";
import { defineStateMachine } from "./runner.js";
import { TERMINATE, type StateMachine, type StepContext } from "./types.js";

export const DEFAULT_MAX_STEPS = 5;

export interface ReActMachineOptions {
  maxSteps?: number;
  /** Builds the THINK prompt from the task, tool listing and transcript. */
  prompt?: (task: string, tools: readonly ToolDescription[], history: string) => string;
}

export function describeTools(tools: readonly ToolDescription[]): string {
  if (tools.length === 0) {
    return "No tools are available. Answer directly.";
  }
  return tools
    .map((tool) => {
      const params = Object.entries(tool.schema).map(
        ([name, param]) => `${name}: ${param.type}${param.required ? "" : "?"}`
      );
      return `- ${tool.name}: ${tool.description}${params.length > 0 ? ` (${params.join(", ")})` : ""}`;
    })
    .join("\n");
}

export function defaultReActPrompt(task: string, tools: readonly ToolDescription[], history: string): string {
  return [
    "Solve the task by reasoning step by step and calling tools when they help.",
    "Tools:",
    describeTools(tools),
    "",
    'To call a tool reply with JSON only: {"thought": "...", "action": {"tool": "<name>", "args": {...}}}',
    `When you know the answer reply with {"thought": "...", "final": "<answer>"} or a line starting with "${FINAL_ANSWER_MARKER}".`,
    "",
    `Task: ${task}`,
    history === "" ? "" : `\nProgress so far:\n${history}`,
  ]
    .join("\n")
    .trimEnd();
}

function progress(state: ReActState): string {
  return state.messages
    .toArray()
    .slice(1)
    .map((message) => (message.role === "tool" ? `Observation: ${message.content}` : `Thought: ${message.content}`))
    .join("\n");
}

function truncationNote(state: ReActState): string {
  return `[truncated: step limit of ${state.maxSteps} reached without a final answer]`;
}

export function createReActMachine(options: ReActMachineOptions = {}): StateMachine {
  const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  const buildPrompt = options.prompt ?? defaultReActPrompt;

  async function think(state: ReActState, ctx: StepContext): Promise<string> {
    if (state.stepCount >= state.maxSteps) {
      state.status = "truncated";
      return TERMINATE;
    }
    const prompt = buildPrompt(state.input, ctx.tools.describe(), progress(state));
    const outcome = await generateText(state, ctx, "THINK", prompt);
    if (!outcome.ok) {
      state.status = "failed";
      state.error = outcome.error.message;
      return TERMINATE;
    }

    const decision = parseReActOutput(outcome.text);
    if (decision.kind === "final") {
      if (decision.thought !== undefined) {
        state.thought = decision.thought;
      }
      state.finalAnswer = decision.answer;
      state.messages.append("agent", decision.answer, { step: "THINK", final: true });
      return TERMINATE;
    }

    state.thought = decision.thought;
    state.action = decision.action;
    state.observation = undefined;
    state.messages.append("agent", decision.thought || `Calling ${decision.action.tool}`, {
      step: "THINK",
      action: decision.action,
    });
    return "ACT";
  }

  async function act(state: ReActState, ctx: StepContext): Promise<string> {
    const action = state.action;
    if (!action) {
      return "THINK";
    }
    const outcome = await invokeToolAction(state, ctx, "ACT", action);
    state.action = outcome.action;
    state.observation = outcome.observation;
    return "OBSERVE";
  }

  async function observe(state: ReActState): Promise<string> {
    const observation = state.observation ?? "";
    state.messages.append("tool", observation, { step: "OBSERVE", tool: state.action?.tool });
    state.stepCount += 1;
    if (state.stepCount >= state.maxSteps) {
      state.status = "truncated";
      return TERMINATE;
    }
    return "THINK";
  }

  return defineStateMachine({
    strategy: "react",
    graph: {
      strategy: "react",
      entry: "THINK",
      nodes: ["THINK", "ACT", "OBSERVE", TERMINATE],
      edges: [
        { from: "THINK", to: "ACT", when: "an action was proposed" },
        { from: "THINK", to: TERMINATE, when: "final answer or generation failed" },
        { from: "ACT", to: "OBSERVE" },
        { from: "OBSERVE", to: "THINK", when: "stepCount < maxSteps" },
        { from: "OBSERVE", to: TERMINATE, when: "stepCount = maxSteps" },
      ],
    },
    handlers: { THINK: think, ACT: act, OBSERVE: observe },
    createState: (input) => createReActState(input, maxSteps),
    finalize: (state) => {
      if (state.finalAnswer !== undefined) {
        return state.finalAnswer;
      }
      if (state.status === "truncated") {
        return state.observation !== undefined
          ? `${state.observation}\n${truncationNote(state)}`
          : truncationNote(state);
      }
      if (state.observation !== undefined) {
        return state.observation;
      }
      return `Unable to complete the task: ${state.error ?? "no answer was produced"}`;
    },
  });
}
