import { randomUUID } from "node:crypto";
import { performance } from "node:perf_hooks";
import { AgentError, describeError } from "../errors.js";
import type { StateMachine, StateGraph, StepContext } from "../machines/types.js";
import { SimpleMemory } from "../memory/simple.js";
import type { AgentMemory } from "../memory/types.js";
import { createGenerator } from "../model/generator.js";
import { PolicyEngine } from "../policy/engine.js";
import type { Policy, PolicyContext } from "../policy/types.js";
import { cloneState, restoreState } from "../state/serialize.js";
import type { AgentState, StrategyName } from "../state/types.js";
import { ToolRegistry, type RegisterToolOptions } from "../tools/registry.js";
import type { Tool } from "../tools/types.js";
import type { GenerateFn, Message, RetryOpts, SamplingOptions, TextGenerator } from "../types.js";
import type { AgentEvent, AgentEventPayload, ProcessOptions, ProcessResult } from "./types.js";

export interface AgentOptions {
  id?: string;
  machine: StateMachine;
  generator: GenerateFn | TextGenerator;
  /** A registry is used as is (and so shared); any other iterable is copied into a new one. */
  tools?: Iterable<Tool> | ToolRegistry;
  memory?: AgentMemory;
  policies?: Iterable<Policy>;
  sampling?: SamplingOptions;
  modelTimeoutMs?: number;
  toolTimeoutMs?: number;
  retry?: Omit<RetryOpts, "signal">;
  /** How many turns or episodes memory contributes to each run. */
  contextLimit?: number;
  metadata?: Record<string, unknown>;
  onEvent?: (event: AgentEvent) => void;
}

/**
 * One state machine composed with memory, tools and policies. `process` never
 * throws for step failures: the result carries a degraded output and a
 * `failed` status instead.
 */
export class Agent {
  private readonly machine: StateMachine;
  private readonly generator: TextGenerator;
  private readonly registry: ToolRegistry;
  private readonly policies: PolicyEngine;
  private memory: AgentMemory;
  private lastState?: AgentState;

  constructor(private readonly options: AgentOptions) {
    if (!options) {
      throw new AgentError("INVALID_CONFIG", "Agent options are required");
    }
    if (!options.machine) {
      throw new AgentError("INVALID_CONFIG", "Agent state machine is required");
    }
    if (!options.generator) {
      throw new AgentError("INVALID_CONFIG", "Agent generator is required");
    }
    this.machine = options.machine;
    this.generator = createGenerator(options.generator, {
      timeoutMs: options.modelTimeoutMs,
      retry: options.retry,
      sampling: options.sampling,
    });
    this.registry = options.tools instanceof ToolRegistry ? options.tools : buildRegistry(options.tools);
    this.policies = new PolicyEngine(options.policies);
    this.memory = options.memory ?? new SimpleMemory();
  }

  get id(): string | undefined {
    return this.options.id;
  }

  get strategy(): StrategyName {
    return this.machine.strategy;
  }

  get tools(): ToolRegistry {
    return this.registry;
  }

  addTool(tool: Tool, options?: RegisterToolOptions): this {
    this.registry.add(tool, options);
    return this;
  }

  addPolicy(policy: Policy): this {
    this.policies.add(policy);
    return this;
  }

  setMemory(memory: AgentMemory): this {
    this.memory = memory;
    return this;
  }

  getMemory(): AgentMemory {
    return this.memory;
  }

  /** A copy of the state the most recent `process` call finished with. */
  getState(): AgentState | undefined {
    return this.lastState ? cloneState(this.lastState) : undefined;
  }

  getCompiledGraph(): StateGraph {
    const graph = this.machine.graph;
    return { ...graph, nodes: [...graph.nodes], edges: graph.edges.map((edge) => ({ ...edge })) };
  }

  async process(input: string, options: ProcessOptions = {}): Promise<ProcessResult> {
    const runId = options.runId ?? randomUUID();
    const started = performance.now();
    const state = options.resume !== undefined ? restoreState(options.resume) : this.machine.createState(input);
    if (state.strategy !== this.machine.strategy) {
      throw new AgentError(
        "INVALID_STATE",
        `Cannot resume a ${state.strategy} state with a ${this.machine.strategy} agent`
      );
    }
    const metadata = mergeMetadata(this.options.metadata, options.metadata);
    const emit = (event: AgentEventPayload): void => this.emit({ ...event, runId, agentId: this.id });

    emit({ type: "agent.run.start", strategy: state.strategy, input: state.input, metadata });

    const ctx: StepContext = {
      runId,
      generator: this.generator,
      tools: this.registry,
      policies: this.policies,
      memoryContext: await this.loadContext(state.input),
      signal: options.signal,
      toolTimeoutMs: this.options.toolTimeoutMs,
      metadata,
      emit,
    };

    try {
      await this.machine.run(state, ctx);
    } catch (error) {
      state.status = "failed";
      state.error = describeError(error);
      state.output = this.machine.finalize(state);
    }

    const policyContext: PolicyContext = { strategy: state.strategy, step: state.trace.length, metadata };
    let output = state.output ?? this.machine.finalize(state);
    try {
      output = await this.policies.filterResponse(output, policyContext);
    } catch (error) {
      state.status = "failed";
      state.error = `Response filter failed: ${describeError(error)}`;
      output = `Response withheld: ${describeError(error)}`;
    }
    state.output = output;

    await this.record(state, output, runId, metadata);

    const elapsedMs = performance.now() - started;
    if (state.status === "failed") {
      emit({
        type: "agent.run.error",
        strategy: state.strategy,
        error: state.error ?? "unknown error",
        output,
        stepCount: state.trace.length,
        elapsedMs,
      });
    } else {
      emit({
        type: "agent.run.complete",
        strategy: state.strategy,
        status: state.status === "truncated" ? "truncated" : "completed",
        output,
        stepCount: state.trace.length,
        elapsedMs,
      });
    }

    this.lastState = cloneState(state);
    return {
      runId,
      strategy: state.strategy,
      status: state.status,
      output,
      state,
      trace: [...state.trace],
      toolsUsed: [...state.toolsUsed],
      elapsedMs,
      error: state.error,
    };
  }

  private async loadContext(input: string): Promise<Message[]> {
    try {
      return await this.memory.getContext(input, this.options.contextLimit);
    } catch (error) {
      console.warn("Agent memory context unavailable", error);
      return [];
    }
  }

  private async record(
    state: AgentState,
    output: string,
    runId: string,
    metadata: Record<string, unknown> | undefined
  ): Promise<void> {
    try {
      await this.memory.recordInteraction({
        input: state.input,
        output,
        strategy: state.strategy,
        status: state.status,
        toolsUsed: [...state.toolsUsed],
        metadata,
        timestamp: new Date(),
      });
      this.emit({ type: "agent.memory.record", runId, kind: this.memory.kind, agentId: this.id });
    } catch (error) {
      console.warn("Agent memory write failed", error);
    }
  }

  private emit(event: AgentEvent): void {
    if (!this.options.onEvent) {
      return;
    }
    try {
      this.options.onEvent(event);
    } catch (error) {
      console.error("Agent telemetry emit failed", error);
    }
  }
}

function buildRegistry(tools: Iterable<Tool> | undefined): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of tools ?? []) {
    registry.add(tool);
  }
  return registry;
}

function mergeMetadata(
  base: Record<string, unknown> | undefined,
  extra: Record<string, unknown> | undefined
): Record<string, unknown> | undefined {
  if (!base && !extra) {
    return undefined;
  }
  return { ...(base ?? {}), ...(extra ?? {}) };
}
