import type { AgentEvent } from "../agent/types.js";
import type { StrategyName } from "../state/types.js";

export interface TimedEvent {
  at: Date;
  event: AgentEvent;
}

export interface AgentRunMetrics {
  stepCount: number;
  stepDurationMs: number;
  stepErrors: number;
  generations: number;
  generationErrors: number;
  generationDurationMs: number;
  toolCalls: number;
  toolErrors: number;
  toolBlocked: number;
  toolDurationMs: number;
  memoryRecords: number;
}

export type AgentRunOutcome =
  | { type: "completed"; status: "completed" | "truncated"; output: string }
  | { type: "error"; error: string; output: string };

export interface AgentRunSnapshot {
  runId: string;
  agentId?: string;
  strategy?: StrategyName;
  status: "running" | "completed" | "error";
  startedAt?: Date;
  completedAt?: Date;
  elapsedMs?: number;
  metadata?: Record<string, unknown>;
  /** Executed step names, in order. */
  trace: string[];
  /** Tools that started executing, in order, repeats included. */
  toolsUsed: string[];
  metrics: AgentRunMetrics;
  events: TimedEvent[];
  outcome?: AgentRunOutcome;
}

interface OpenRun {
  runId: string;
  agentId?: string;
  strategy?: StrategyName;
  metadata?: Record<string, unknown>;
  startedAt?: Date;
  trace: string[];
  toolsUsed: string[];
  events: TimedEvent[];
  metrics: AgentRunMetrics;
}

function emptyMetrics(): AgentRunMetrics {
  return {
    stepCount: 0,
    stepDurationMs: 0,
    stepErrors: 0,
    generations: 0,
    generationErrors: 0,
    generationDurationMs: 0,
    toolCalls: 0,
    toolErrors: 0,
    toolBlocked: 0,
    toolDurationMs: 0,
    memoryRecords: 0,
  };
}

export interface AgentRunTrackerOptions {
  clock?: () => Date;
  /** Keep every event on the snapshot. Defaults to true. */
  keepEvents?: boolean;
}

export interface AgentRunTracker {
  /** Folds one event into its run; returns the final snapshot when the run ends. */
  handle(event: AgentEvent, at?: Date): AgentRunSnapshot | undefined;
  get(runId: string): AgentRunSnapshot | undefined;
  getActiveRuns(): AgentRunSnapshot[];
  clear(runId?: string): void;
}

/**
 * Aggregates `AgentEvent`s per run id. Runs are dropped from the tracker as soon
 * as their completion or error event arrives.
 */
export function createAgentRunTracker(options: AgentRunTrackerOptions = {}): AgentRunTracker {
  const open = new Map<string, OpenRun>();
  const now = options.clock ?? (() => new Date());
  const keepEvents = options.keepEvents ?? true;

  const snapshot = (run: OpenRun, status: AgentRunSnapshot["status"]): AgentRunSnapshot => ({
    runId: run.runId,
    agentId: run.agentId,
    strategy: run.strategy,
    status,
    startedAt: run.startedAt,
    metadata: run.metadata,
    trace: [...run.trace],
    toolsUsed: [...run.toolsUsed],
    metrics: { ...run.metrics },
    events: run.events.map(({ at, event }) => ({ at: new Date(at.getTime()), event })),
  });

  const runFor = (event: AgentEvent, at: Date): OpenRun => {
    if (event.type === "agent.run.start") {
      const run: OpenRun = {
        runId: event.runId,
        agentId: event.agentId,
        strategy: event.strategy,
        metadata: event.metadata,
        startedAt: at,
        trace: [],
        toolsUsed: [],
        events: [],
        metrics: emptyMetrics(),
      };
      open.set(event.runId, run);
      return run;
    }
    let run = open.get(event.runId);
    if (!run) {
      // Joined mid-run: no start time or metadata.
      run = { runId: event.runId, trace: [], toolsUsed: [], events: [], metrics: emptyMetrics() };
      open.set(event.runId, run);
    }
    run.agentId ??= event.agentId;
    return run;
  };

  return {
    handle(event, at = now()) {
      const run = runFor(event, at);
      if (keepEvents) {
        run.events.push({ at, event });
      }
      record(run, event);

      switch (event.type) {
        case "agent.run.complete":
          open.delete(event.runId);
          return {
            ...snapshot(run, "completed"),
            strategy: event.strategy,
            completedAt: at,
            elapsedMs: event.elapsedMs,
            outcome: { type: "completed", status: event.status, output: event.output },
          };
        case "agent.run.error":
          open.delete(event.runId);
          return {
            ...snapshot(run, "error"),
            strategy: event.strategy,
            completedAt: at,
            elapsedMs: event.elapsedMs,
            outcome: { type: "error", error: event.error, output: event.output },
          };
        default:
          return undefined;
      }
    },
    get(runId) {
      const run = open.get(runId);
      return run && snapshot(run, "running");
    },
    getActiveRuns() {
      return [...open.values()].map((run) => snapshot(run, "running"));
    },
    clear(runId) {
      if (runId === undefined) {
        open.clear();
      } else {
        open.delete(runId);
      }
    },
  };
}

function record(run: OpenRun, event: AgentEvent): void {
  const metrics = run.metrics;
  switch (event.type) {
    case "agent.step.done":
      run.trace.push(event.step);
      metrics.stepCount += 1;
      metrics.stepDurationMs += event.durationMs;
      metrics.stepErrors += event.status === "error" ? 1 : 0;
      break;
    case "agent.generation":
      metrics.generations += 1;
      metrics.generationDurationMs += event.durationMs;
      metrics.generationErrors += event.status === "error" ? 1 : 0;
      break;
    case "agent.tool.start":
      run.toolsUsed.push(event.tool);
      break;
    case "agent.tool.end":
      metrics.toolCalls += 1;
      metrics.toolDurationMs += event.durationMs;
      break;
    case "agent.tool.error":
      metrics.toolErrors += 1;
      metrics.toolDurationMs += event.durationMs;
      break;
    case "agent.tool.blocked":
      metrics.toolBlocked += 1;
      break;
    case "agent.memory.record":
      metrics.memoryRecords += 1;
      break;
    default:
      break;
  }
}

export interface NdjsonTraceSinkOptions {
  writer: { write(chunk: string): unknown };
  clock?: () => Date;
  /** Append an `agent.run.summary` line when a run ends. Defaults to true. */
  summary?: boolean | ((snapshot: AgentRunSnapshot) => unknown);
}

function defaultSummary(snapshot: AgentRunSnapshot): Record<string, unknown> {
  return {
    type: "agent.run.summary",
    runId: snapshot.runId,
    agentId: snapshot.agentId,
    strategy: snapshot.strategy,
    status: snapshot.status,
    startedAt: snapshot.startedAt?.toISOString(),
    completedAt: snapshot.completedAt?.toISOString(),
    elapsedMs: snapshot.elapsedMs,
    trace: snapshot.trace,
    toolsUsed: snapshot.toolsUsed,
    metrics: snapshot.metrics,
  };
}

/** An `onEvent` handler writing newline-delimited JSON, e.g. to `process.stderr`. */
export function createNdjsonTraceSink(options: NdjsonTraceSinkOptions): (event: AgentEvent) => void {
  const now = options.clock ?? (() => new Date());
  const tracker = createAgentRunTracker({ clock: now, keepEvents: false });
  const summary = options.summary ?? true;
  const writeLine = (value: unknown): void => {
    options.writer.write(`${JSON.stringify(value)}\n`);
  };

  return (event) => {
    const at = now();
    const finished = tracker.handle(event, at);
    writeLine({ timestamp: at.toISOString(), ...event });
    if (!finished || summary === false) {
      return;
    }
    writeLine(summary === true ? defaultSummary(finished) : summary(finished));
  };
}
