import { describe, expect, it } from "vitest";
import type { AgentEvent } from "../../src/agent/types.js";
import { createOtelAgentObserver } from "../../src/telemetry/otel.js";

interface RecordedMetric {
  name: string;
  value: number;
  attributes?: Record<string, unknown>;
}

class StubCounter {
  constructor(private readonly name: string, private readonly records: RecordedMetric[]) {}

  add(value: number, attributes?: Record<string, unknown>): void {
    this.records.push({ name: this.name, value, attributes });
  }
}

class StubHistogram {
  constructor(private readonly name: string, private readonly records: RecordedMetric[]) {}

  record(value: number, attributes?: Record<string, unknown>): void {
    this.records.push({ name: this.name, value, attributes });
  }
}

class StubMeter {
  constructor(private readonly records: RecordedMetric[]) {}

  createCounter(name: string, _options?: { description?: string; unit?: string }): StubCounter {
    return new StubCounter(name, this.records);
  }

  createHistogram(name: string, _options?: { description?: string; unit?: string }): StubHistogram {
    return new StubHistogram(name, this.records);
  }
}

describe("createOtelAgentObserver", () => {
  it("records metrics for run, step, tool and memory events", () => {
    const records: RecordedMetric[] = [];
    const observe = createOtelAgentObserver({
      meter: new StubMeter(records),
      defaultAttributes: { service: "docs-bot" },
    });
    const action = { tool: "calculator", args: { expression: "1+1" } };
    const events: AgentEvent[] = [
      { type: "agent.run.start", runId: "r1", agentId: "a1", strategy: "react", input: "1+1?" },
      { type: "agent.step.done", runId: "r1", step: "THINK", index: 0, next: "ACT", status: "error", durationMs: 9 },
      { type: "agent.generation", runId: "r1", step: "THINK", status: "ok", durationMs: 8 },
      { type: "agent.tool.start", runId: "r1", step: "ACT", tool: "calculator", action },
      { type: "agent.tool.end", runId: "r1", step: "ACT", tool: "calculator", action, result: 2, durationMs: 3 },
      {
        type: "agent.tool.error",
        runId: "r1",
        step: "ACT",
        tool: "calculator",
        action,
        error: "boom",
        code: "TOOL_EXECUTION_FAILED",
        durationMs: 4,
      },
      {
        type: "agent.tool.blocked",
        runId: "r1",
        step: "ACT",
        tool: "web",
        action: { tool: "web", args: {} },
        policy: "allow-list",
        reason: "nope",
      },
      { type: "agent.memory.record", runId: "r1", kind: "simple" },
      {
        type: "agent.run.complete",
        runId: "r1",
        agentId: "a1",
        strategy: "react",
        status: "truncated",
        output: "2",
        stepCount: 3,
        elapsedMs: 50,
      },
    ];

    events.forEach(observe);

    expect(records).toEqual([
      { name: "agent.runs", value: 1, attributes: { service: "docs-bot", phase: "start", strategy: "react", agentId: "a1" } },
      { name: "agent.step.duration", value: 9, attributes: { service: "docs-bot", step: "THINK", status: "error" } },
      { name: "agent.step.errors", value: 1, attributes: { service: "docs-bot", step: "THINK" } },
      { name: "agent.generation.duration", value: 8, attributes: { service: "docs-bot", step: "THINK", status: "ok" } },
      { name: "agent.tool.calls", value: 1, attributes: { service: "docs-bot", tool: "calculator" } },
      { name: "agent.tool.duration", value: 3, attributes: { service: "docs-bot", tool: "calculator" } },
      {
        name: "agent.tool.errors",
        value: 1,
        attributes: { service: "docs-bot", tool: "calculator", code: "TOOL_EXECUTION_FAILED" },
      },
      { name: "agent.tool.duration", value: 4, attributes: { service: "docs-bot", tool: "calculator", error: true } },
      { name: "agent.tool.blocked", value: 1, attributes: { service: "docs-bot", tool: "web", policy: "allow-list" } },
      { name: "agent.memory.records", value: 1, attributes: { service: "docs-bot", kind: "simple" } },
      {
        name: "agent.runs",
        value: 1,
        attributes: { service: "docs-bot", phase: "complete", status: "truncated", strategy: "react", agentId: "a1" },
      },
      {
        name: "agent.run.duration",
        value: 50,
        attributes: { service: "docs-bot", status: "truncated", strategy: "react", agentId: "a1" },
      },
    ]);
  });

  it("uses the metric prefix and records failed runs", () => {
    const records: RecordedMetric[] = [];
    const observe = createOtelAgentObserver({ meter: new StubMeter(records), metricPrefix: "bots" });

    observe({
      type: "agent.run.error",
      runId: "r2",
      strategy: "planning",
      error: "boom",
      output: "",
      stepCount: 0,
      elapsedMs: 7,
    });
    observe({ type: "agent.generation", runId: "r2", step: "CREATE_PLAN", status: "error", durationMs: 2, error: "x" });

    expect(records.map((record) => record.name)).toEqual([
      "bots.runs",
      "bots.run.duration",
      "bots.generation.duration",
      "bots.generation.errors",
    ]);
    expect(records[0]?.attributes).toEqual({ phase: "complete", status: "error", strategy: "planning" });
  });
});
