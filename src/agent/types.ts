import type { MemoryKind } from "../memory/types.js";
import type { ToolAction } from "../policy/types.js";
import type { AgentState, RunStatus, StrategyName } from "../state/types.js";

export interface ProcessOptions {
  signal?: AbortSignal;
  metadata?: Record<string, unknown>;
  /** A serialized state to continue instead of starting fresh. */
  resume?: unknown;
  runId?: string;
}

export interface ProcessResult {
  runId: string;
  strategy: StrategyName;
  status: RunStatus;
  output: string;
  /** The run's own state; the agent keeps no reference to it. */
  state: AgentState;
  trace: string[];
  toolsUsed: string[];
  elapsedMs: number;
  error?: string;
}

export type AgentEvent =
  | {
      type: "agent.run.start";
      runId: string;
      strategy: StrategyName;
      input: string;
      metadata?: Record<string, unknown>;
      agentId?: string;
    }
  | {
      type: "agent.step.start";
      runId: string;
      step: string;
      index: number;
      agentId?: string;
    }
  | {
      type: "agent.step.done";
      runId: string;
      step: string;
      index: number;
      next: string;
      status: "ok" | "error";
      durationMs: number;
      error?: string;
      agentId?: string;
    }
  | {
      type: "agent.generation";
      runId: string;
      step: string;
      durationMs: number;
      status: "ok" | "error";
      error?: string;
      agentId?: string;
    }
  | {
      type: "agent.tool.start";
      runId: string;
      step: string;
      tool: string;
      action: ToolAction;
      agentId?: string;
    }
  | {
      type: "agent.tool.end";
      runId: string;
      step: string;
      tool: string;
      action: ToolAction;
      result: unknown;
      durationMs: number;
      agentId?: string;
    }
  | {
      type: "agent.tool.error";
      runId: string;
      step: string;
      tool: string;
      action: ToolAction;
      error: string;
      code: string;
      durationMs: number;
      agentId?: string;
    }
  | {
      type: "agent.tool.blocked";
      runId: string;
      step: string;
      tool: string;
      action: ToolAction;
      policy: string;
      reason: string;
      agentId?: string;
    }
  | {
      type: "agent.run.complete";
      runId: string;
      strategy: StrategyName;
      status: "completed" | "truncated";
      output: string;
      stepCount: number;
      elapsedMs: number;
      agentId?: string;
    }
  | {
      type: "agent.run.error";
      runId: string;
      strategy: StrategyName;
      error: string;
      output: string;
      stepCount: number;
      elapsedMs: number;
      agentId?: string;
    }
  | {
      type: "agent.memory.record";
      runId: string;
      kind: MemoryKind;
      agentId?: string;
    };

export type AgentEventType = AgentEvent["type"];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event as a state machine emits it; the agent stamps run and agent ids. */
export type AgentEventPayload = DistributiveOmit<AgentEvent, "runId" | "agentId">;
