import type { AgentEvent } from "../agent/types.js";

export type OtelAttributeValue = string | number | boolean;
export type OtelAttributes = Record<string, OtelAttributeValue>;

export interface OtelCounter {
  add(value: number, attributes?: OtelAttributes): void;
}

export interface OtelHistogram {
  record(value: number, attributes?: OtelAttributes): void;
}

/** The slice of an OpenTelemetry `Meter` the observer needs. */
export interface OtelMeter {
  createCounter(name: string, options?: { description?: string; unit?: string }): OtelCounter;
  createHistogram(name: string, options?: { description?: string; unit?: string }): OtelHistogram;
}

export interface OtelAgentObserverOptions {
  meter: OtelMeter;
  metricPrefix?: string;
  defaultAttributes?: OtelAttributes;
}

export function createOtelAgentObserver(options: OtelAgentObserverOptions): (event: AgentEvent) => void {
  const prefix = options.metricPrefix ?? "agent";
  const baseAttributes = options.defaultAttributes ?? {};
  const meter = options.meter;

  const runsCounter = meter.createCounter(`${prefix}.runs`, {
    description: "Count of agent run lifecycle events",
  });
  const runDuration = meter.createHistogram(`${prefix}.run.duration`, {
    description: "Agent run duration",
    unit: "ms",
  });
  const stepDuration = meter.createHistogram(`${prefix}.step.duration`, {
    description: "State machine node latency",
    unit: "ms",
  });
  const stepErrors = meter.createCounter(`${prefix}.step.errors`, {
    description: "State machine node failures",
  });
  const generationDuration = meter.createHistogram(`${prefix}.generation.duration`, {
    description: "Model call latency",
    unit: "ms",
  });
  const generationErrors = meter.createCounter(`${prefix}.generation.errors`, {
    description: "Failed model calls",
  });
  const toolCalls = meter.createCounter(`${prefix}.tool.calls`, {
    description: "Tool invocations",
  });
  const toolDuration = meter.createHistogram(`${prefix}.tool.duration`, {
    description: "Tool execution latency",
    unit: "ms",
  });
  const toolErrors = meter.createCounter(`${prefix}.tool.errors`, {
    description: "Tool errors",
  });
  const toolBlocked = meter.createCounter(`${prefix}.tool.blocked`, {
    description: "Tool actions rejected by policy",
  });
  const memoryRecords = meter.createCounter(`${prefix}.memory.records`, {
    description: "Interactions written to memory",
  });

  const makeAttributes = (event: AgentEvent, extra?: OtelAttributes): OtelAttributes => {
    const attributes: OtelAttributes = { ...baseAttributes, ...(extra ?? {}) };
    if (event.agentId) {
      attributes.agentId = event.agentId;
    }
    return attributes;
  };

  return (event: AgentEvent): void => {
    switch (event.type) {
      case "agent.run.start":
        runsCounter.add(1, makeAttributes(event, { phase: "start", strategy: event.strategy }));
        break;
      case "agent.run.complete":
        runsCounter.add(1, makeAttributes(event, { phase: "complete", status: event.status, strategy: event.strategy }));
        runDuration.record(event.elapsedMs, makeAttributes(event, { status: event.status, strategy: event.strategy }));
        break;
      case "agent.run.error":
        runsCounter.add(1, makeAttributes(event, { phase: "complete", status: "error", strategy: event.strategy }));
        runDuration.record(event.elapsedMs, makeAttributes(event, { status: "error", strategy: event.strategy }));
        break;
      case "agent.step.done":
        stepDuration.record(event.durationMs, makeAttributes(event, { step: event.step, status: event.status }));
        if (event.status === "error") {
          stepErrors.add(1, makeAttributes(event, { step: event.step }));
        }
        break;
      case "agent.generation":
        generationDuration.record(event.durationMs, makeAttributes(event, { step: event.step, status: event.status }));
        if (event.status === "error") {
          generationErrors.add(1, makeAttributes(event, { step: event.step }));
        }
        break;
      case "agent.tool.start":
        toolCalls.add(1, makeAttributes(event, { tool: event.tool }));
        break;
      case "agent.tool.end":
        toolDuration.record(event.durationMs, makeAttributes(event, { tool: event.tool }));
        break;
      case "agent.tool.error":
        toolErrors.add(1, makeAttributes(event, { tool: event.tool, code: event.code }));
        toolDuration.record(event.durationMs, makeAttributes(event, { tool: event.tool, error: true }));
        break;
      case "agent.tool.blocked":
        toolBlocked.add(1, makeAttributes(event, { tool: event.tool, policy: event.policy }));
        break;
      case "agent.memory.record":
        memoryRecords.add(1, makeAttributes(event, { kind: event.kind }));
        break;
      default:
        break;
    }
  };
}
