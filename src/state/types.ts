import { ConfigError } from "../errors.js";
import type { ToolAction } from "../policy/types.js";
import type { Message } from "../types.js";
import { MessageLog, formatTranscript } from "./messages.js";

export type StrategyName = "reflection" | "react" | "planning";

export const STRATEGIES: readonly StrategyName[] = ["reflection", "react", "planning"];

export function isStrategyName(value: string): value is StrategyName {
  return value === "reflection" || value === "react" || value === "planning";
}

/** `truncated` is a normal end: a step bound was reached before completion. */
export type RunStatus = "running" | "completed" | "truncated" | "failed";

interface BaseState {
  input: string;
  messages: MessageLog;
  status: RunStatus;
  /** Node the machine runs next; `TERMINATE` once finished. */
  currentStep: string;
  /** Executed node names, in order. */
  trace: string[];
  toolsUsed: string[];
  output?: string;
  error?: string;
}

export interface ReflectionState extends BaseState {
  strategy: "reflection";
  initialResponse?: string;
  currentReflection?: string;
  refinedResponse?: string;
  reflectionCount: number;
  maxReflections: number;
}

export interface ReActState extends BaseState {
  strategy: "react";
  thought?: string;
  action?: ToolAction;
  observation?: string;
  stepCount: number;
  maxSteps: number;
  finalAnswer?: string;
}

export interface StepRecord {
  index: number;
  description: string;
  status: "succeeded" | "failed";
  result?: string;
  error?: string;
}

export interface PlanningState extends BaseState {
  strategy: "planning";
  goal: string;
  plan: string[];
  currentStepIndex: number;
  completedSteps: StepRecord[];
  replanCount: number;
  maxReplans: number;
  /** Bound on executed steps across all replans. */
  maxSteps: number;
}

export type AgentState = ReflectionState | ReActState | PlanningState;

export type StateOfStrategy<S extends StrategyName> = Extract<AgentState, { strategy: S }>;

function baseState(input: string, entry: string): BaseState {
  return {
    input,
    messages: new MessageLog([{ role: "user", content: input, metadata: {} }]),
    status: "running",
    currentStep: entry,
    trace: [],
    toolsUsed: [],
  };
}

export function createReflectionState(input: string, maxReflections: number): ReflectionState {
  assertBound("maxReflections", maxReflections);
  return { ...baseState(input, "GENERATE_INITIAL"), strategy: "reflection", reflectionCount: 0, maxReflections };
}

export function createReActState(input: string, maxSteps: number): ReActState {
  assertBound("maxSteps", maxSteps);
  return { ...baseState(input, "THINK"), strategy: "react", stepCount: 0, maxSteps };
}

export function createPlanningState(input: string, maxSteps: number, maxReplans: number): PlanningState {
  assertBound("maxSteps", maxSteps);
  assertBound("maxReplans", maxReplans);
  return {
    ...baseState(input, "UNDERSTAND_GOAL"),
    strategy: "planning",
    goal: "",
    plan: [],
    currentStepIndex: 0,
    completedSteps: [],
    replanCount: 0,
    maxReplans,
    maxSteps,
  };
}

export function getMessages(state: AgentState): Message[] {
  return state.messages.toArray();
}

/** The run so far as a plain transcript, one `role: content` line per message. */
export function getContext(state: AgentState): string {
  return formatTranscript(state.messages);
}

function assertBound(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer`);
  }
}
