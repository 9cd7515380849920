import { createPlanningState, type PlanningState, type StepRecord } from "../state/types.js";
import type { ToolDescription } from "../tools/types.js";
import { generateText, invokeToolAction } from "./actions.js";
import { REPLAN_MARKER, isReplanSignal, parseActionRequest, parsePlanSteps } from "./markers.js";
import { describeTools } from "./react.js";
import { defineStateMachine } from "./runner.js";
import { TERMINATE, type StateMachine, type StepContext } from "./types.js";

export const DEFAULT_PLAN_STEPS = 10;
export const DEFAULT_MAX_REPLANS = 2;

export interface PlanningPrompts {
  plan(goal: string, tools: readonly ToolDescription[]): string;
  step(goal: string, plan: readonly string[], index: number, records: readonly StepRecord[]): string;
  replan(goal: string, plan: readonly string[], records: readonly StepRecord[]): string;
}

export interface PlanningMachineOptions {
  /** Bound on executed steps across every replan. */
  maxSteps?: number;
  maxReplans?: number;
  prompts?: Partial<PlanningPrompts>;
}

export function formatStepRecord(record: StepRecord): string {
  const detail = record.status === "succeeded" ? record.result ?? "" : `error: ${record.error ?? "unknown"}`;
  return `${record.index + 1}. [${record.status}] ${record.description}: ${detail}`;
}

export const defaultPlanningPrompts: PlanningPrompts = {
  plan: (goal, tools) =>
    [
      "Break the goal into a short ordered list of concrete steps.",
      'Reply with JSON {"steps": ["...", "..."]} or a numbered list.',
      "Tools available while executing steps:",
      describeTools(tools),
      "",
      `Goal: ${goal}`,
    ].join("\n"),
  step: (goal, plan, index, records) =>
    [
      `Goal: ${goal}`,
      "Plan:",
      ...plan.map((step, position) => `${position + 1}. ${step}`),
      records.length > 0 ? `Completed so far:\n${records.map(formatStepRecord).join("\n")}` : "",
      "",
      `Carry out step ${index + 1}: ${plan[index] ?? ""}`,
      'Reply with the result, or with JSON {"action": {"tool": "<name>", "args": {...}}} to use a tool.',
      `If the step cannot be done as planned, begin your reply with "${REPLAN_MARKER}" and explain why.`,
    ].join("\n"),
  replan: (goal, plan, records) =>
    [
      "The plan below is blocked. Propose new steps to finish the goal from here.",
      'Reply with JSON {"steps": [...]} or a numbered list containing only the remaining steps.',
      "",
      `Goal: ${goal}`,
      "Original plan:",
      ...plan.map((step, position) => `${position + 1}. ${step}`),
      "Step results:",
      ...records.map(formatStepRecord),
    ].join("\n"),
};

export function createPlanningMachine(options: PlanningMachineOptions = {}): StateMachine {
  const maxSteps = options.maxSteps ?? DEFAULT_PLAN_STEPS;
  const maxReplans = options.maxReplans ?? DEFAULT_MAX_REPLANS;
  const prompts: PlanningPrompts = { ...defaultPlanningPrompts, ...options.prompts };

  async function understandGoal(state: PlanningState): Promise<string> {
    state.goal = state.input.trim();
    return "CREATE_PLAN";
  }

  async function createPlan(state: PlanningState, ctx: StepContext): Promise<string> {
    const outcome = await generateText(state, ctx, "CREATE_PLAN", prompts.plan(state.goal, ctx.tools.describe()));
    if (!outcome.ok) {
      state.status = "failed";
      state.error = outcome.error.message;
      return TERMINATE;
    }
    const steps = parsePlanSteps(outcome.text);
    if (steps.length === 0) {
      return TERMINATE;
    }
    state.plan = steps;
    state.currentStepIndex = 0;
    state.messages.append("agent", steps.map((step, index) => `${index + 1}. ${step}`).join("\n"), {
      step: "CREATE_PLAN",
    });
    return "EXECUTE_STEP";
  }

  async function executeStep(state: PlanningState, ctx: StepContext): Promise<string> {
    if (state.completedSteps.length >= state.maxSteps) {
      state.status = "truncated";
      return TERMINATE;
    }
    const index = state.currentStepIndex;
    const description = state.plan[index];
    if (description === undefined) {
      return TERMINATE;
    }

    const record = await runStep(state, ctx, index, description);
    state.completedSteps.push(Object.freeze(record));
    return "EVALUATE";
  }

  async function runStep(
    state: PlanningState,
    ctx: StepContext,
    index: number,
    description: string
  ): Promise<StepRecord> {
    const prompt = prompts.step(state.goal, state.plan, index, state.completedSteps);
    const outcome = await generateText(state, ctx, "EXECUTE_STEP", prompt);
    if (!outcome.ok) {
      return { index, description, status: "failed", error: outcome.error.message };
    }

    const action = parseActionRequest(outcome.text);
    if (!action) {
      state.messages.append("agent", outcome.text, { step: "EXECUTE_STEP", planStep: index });
      return { index, description, status: "succeeded", result: outcome.text };
    }

    const call = await invokeToolAction(state, ctx, "EXECUTE_STEP", action);
    state.messages.append("tool", call.observation, { step: "EXECUTE_STEP", planStep: index, tool: call.action.tool });
    if (call.status === "succeeded") {
      return { index, description, status: "succeeded", result: call.observation };
    }
    return { index, description, status: "failed", error: call.observation };
  }

  async function evaluate(state: PlanningState): Promise<string> {
    const last = state.completedSteps[state.completedSteps.length - 1];
    const blocked =
      last !== undefined && (last.status === "failed" || (last.result !== undefined && isReplanSignal(last.result)));
    if (blocked && state.replanCount < state.maxReplans) {
      return "REPLAN";
    }
    if (state.currentStepIndex + 1 < state.plan.length) {
      state.currentStepIndex += 1;
      return "EXECUTE_STEP";
    }
    return TERMINATE;
  }

  async function replan(state: PlanningState, ctx: StepContext): Promise<string> {
    state.replanCount += 1;
    const prompt = prompts.replan(state.goal, state.plan, state.completedSteps);
    const outcome = await generateText(state, ctx, "REPLAN", prompt);
    if (!outcome.ok) {
      state.status = "failed";
      state.error = outcome.error.message;
      return TERMINATE;
    }
    const steps = parsePlanSteps(outcome.text);
    if (steps.length === 0) {
      return TERMINATE;
    }
    state.plan = [...state.plan.slice(0, state.currentStepIndex + 1), ...steps];
    state.currentStepIndex += 1;
    const numbered = steps.map((step, offset) => `${state.currentStepIndex + offset + 1}. ${step}`);
    state.messages.append("agent", numbered.join("\n"), { step: "REPLAN", replan: state.replanCount });
    return "EXECUTE_STEP";
  }

  return defineStateMachine({
    strategy: "planning",
    graph: {
      strategy: "planning",
      entry: "UNDERSTAND_GOAL",
      nodes: ["UNDERSTAND_GOAL", "CREATE_PLAN", "EXECUTE_STEP", "EVALUATE", "REPLAN", TERMINATE],
      edges: [
        { from: "UNDERSTAND_GOAL", to: "CREATE_PLAN" },
        { from: "CREATE_PLAN", to: "EXECUTE_STEP", when: "plan is not empty" },
        { from: "CREATE_PLAN", to: TERMINATE, when: "empty plan or generation failed" },
        { from: "EXECUTE_STEP", to: "EVALUATE" },
        { from: "EXECUTE_STEP", to: TERMINATE, when: "step limit reached" },
        { from: "EVALUATE", to: "REPLAN", when: "step failed or asked to replan, replans left" },
        { from: "EVALUATE", to: "EXECUTE_STEP", when: "steps remain" },
        { from: "EVALUATE", to: TERMINATE, when: "plan finished" },
        { from: "REPLAN", to: "EXECUTE_STEP", when: "new steps proposed" },
        { from: "REPLAN", to: TERMINATE, when: "no new steps" },
      ],
    },
    handlers: {
      UNDERSTAND_GOAL: understandGoal,
      CREATE_PLAN: createPlan,
      EXECUTE_STEP: executeStep,
      EVALUATE: evaluate,
      REPLAN: replan,
    },
    createState: (input) => createPlanningState(input, maxSteps, maxReplans),
    finalize: summarizePlan,
  });
}

export function summarizePlan(state: PlanningState): string {
  if (state.plan.length === 0) {
    const reason = state.error ? ` (${state.error})` : "";
    return `No plan was produced for goal: ${state.goal || state.input}${reason}`;
  }
  const lines = [`Goal: ${state.goal}`, ...state.completedSteps.map(formatStepRecord)];
  if (state.status === "truncated") {
    lines.push(`[truncated: step limit of ${state.maxSteps} reached]`);
  } else if (state.error) {
    lines.push(`[stopped: ${state.error}]`);
  }
  return lines.join("\n");
}
