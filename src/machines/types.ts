import type { AgentEventPayload } from "../agent/types.js";
import type { PolicyEngine } from "../policy/engine.js";
import type { AgentState, StrategyName, StateOfStrategy } from "../state/types.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { Message, TextGenerator } from "../types.js";

export const TERMINATE = "TERMINATE";

/** Everything a node may touch besides the state it advances. */
export interface StepContext {
  runId: string;
  generator: TextGenerator;
  tools: ToolRegistry;
  policies: PolicyEngine;
  /** Messages supplied by memory at the start of the run. */
  memoryContext: readonly Message[];
  signal?: AbortSignal;
  toolTimeoutMs?: number;
  metadata?: Record<string, unknown>;
  emit(event: AgentEventPayload): void;
}

/** Runs one node against the state and names the node to run next. */
export type NodeHandler<S extends AgentState> = (state: S, ctx: StepContext) => Promise<string>;

export interface GraphEdge {
  from: string;
  to: string;
  /** Human-readable guard, for inspection only. */
  when?: string;
}

export interface StateGraph {
  strategy: StrategyName;
  entry: string;
  nodes: readonly string[];
  edges: readonly GraphEdge[];
}

export interface StateMachineDefinition<S extends StrategyName> {
  strategy: S;
  graph: StateGraph;
  handlers: Readonly<Record<string, NodeHandler<StateOfStrategy<S>>>>;
  createState(input: string): StateOfStrategy<S>;
  /** The response a finished (or stopped) state stands for. */
  finalize(state: StateOfStrategy<S>): string;
}

/** A strategy's graph bound to its handlers; states of other strategies are refused. */
export interface StateMachine {
  readonly strategy: StrategyName;
  readonly graph: StateGraph;
  createState(input: string): AgentState;
  /** Advances the state node by node until it leaves `running`. */
  run(state: AgentState, ctx: StepContext): Promise<void>;
  finalize(state: AgentState): string;
}
