import { parseAgentConfig, resolveAgentConfig, type AgentConfig, type EnvSource, type PolicyConfig } from "../core/config.js";
import { ConfigError, UnknownStrategyError } from "../errors.js";
import { createPlanningMachine } from "../machines/planning.js";
import { createReActMachine } from "../machines/react.js";
import { createReflectionMachine } from "../machines/reflection.js";
import type { StateMachine } from "../machines/types.js";
import { createMemory, type MemorySpec } from "../memory/factory.js";
import type { AgentMemory } from "../memory/types.js";
import { AllowListPolicy, ContentFilterPolicy, SafetyPolicy } from "../policy/builtin.js";
import type { Policy } from "../policy/types.js";
import { isStrategyName } from "../state/types.js";
import { ToolRegistry, registerDefaultTools } from "../tools/registry.js";
import type { Tool } from "../tools/types.js";
import type { GenerateFn, TextGenerator } from "../types.js";
import { Agent, type AgentOptions } from "./agent.js";
import type { AgentEvent } from "./types.js";

export interface MachineBounds {
  maxSteps?: number;
  maxReflections?: number;
  maxReplans?: number;
}

/** Resolves a strategy name to its state machine; any other name is a configuration error. */
export function createStateMachine(strategy: string, bounds: MachineBounds = {}): StateMachine {
  if (!isStrategyName(strategy)) {
    throw new UnknownStrategyError(strategy);
  }
  switch (strategy) {
    case "reflection":
      return createReflectionMachine({ maxReflections: bounds.maxReflections });
    case "react":
      return createReActMachine({ maxSteps: bounds.maxSteps });
    case "planning":
      return createPlanningMachine({ maxSteps: bounds.maxSteps, maxReplans: bounds.maxReplans });
  }
}

export type CreateAgentOptions = Omit<AgentOptions, "machine"> & MachineBounds;

/** Collaborators a declarative config cannot describe. */
export interface AgentDependencies {
  generator: GenerateFn | TextGenerator;
  /** Resolves the tool names a config lists. Defaults to a registry holding the built-ins. */
  registry?: ToolRegistry;
  tools?: Iterable<Tool>;
  memory?: AgentMemory;
  policies?: Iterable<Policy>;
  onEvent?: (event: AgentEvent) => void;
}

export function policiesFromConfig(config: PolicyConfig | undefined): Policy[] {
  if (!config) {
    return [];
  }
  const policies: Policy[] = [];
  if (config.allowedTools) {
    policies.push(new AllowListPolicy(config.allowedTools));
  }
  if (config.blockedTools) {
    policies.push(new SafetyPolicy({ blockedTools: config.blockedTools }));
  }
  if (config.blockedTerms || config.maxResponseLength !== undefined) {
    policies.push(new ContentFilterPolicy({ blockedTerms: config.blockedTerms, maxLength: config.maxResponseLength }));
  }
  return policies;
}

export class AgentFactory {
  static createAgent(strategy: string, options: CreateAgentOptions): Agent {
    const { maxSteps, maxReflections, maxReplans, ...agentOptions } = options;
    const machine = createStateMachine(strategy, { maxSteps, maxReflections, maxReplans });
    return new Agent({ ...agentOptions, machine });
  }

  /** Builds an agent from a validated config object. */
  static fromConfig(raw: unknown, dependencies: AgentDependencies): Agent {
    return AgentFactory.fromParsedConfig(parseAgentConfig(raw), dependencies);
  }

  /** Like `fromConfig`, with `AGENT_*` environment overrides applied first. */
  static fromEnvironment(raw: unknown, dependencies: AgentDependencies, env?: EnvSource): Agent {
    return AgentFactory.fromParsedConfig(resolveAgentConfig(raw, env), dependencies);
  }

  private static fromParsedConfig(config: AgentConfig, dependencies: AgentDependencies): Agent {
    if (!isStrategyName(config.strategy)) {
      throw new UnknownStrategyError(config.strategy);
    }
    const source = dependencies.registry ?? registerDefaultTools(new ToolRegistry());
    const tools = new ToolRegistry();
    for (const name of config.tools ?? []) {
      tools.add(source.get(name));
    }
    for (const tool of dependencies.tools ?? []) {
      tools.add(tool);
    }

    return AgentFactory.createAgent(config.strategy, {
      id: config.id,
      generator: dependencies.generator,
      tools,
      memory: dependencies.memory ?? createMemory(config.memory),
      policies: [...policiesFromConfig(config.policies), ...(dependencies.policies ?? [])],
      maxSteps: config.maxSteps,
      maxReflections: config.maxReflections,
      maxReplans: config.maxReplans,
      sampling: config.sampling,
      modelTimeoutMs: config.modelTimeoutMs,
      toolTimeoutMs: config.toolTimeoutMs,
      retry: config.retry,
      metadata: config.metadata,
      onEvent: dependencies.onEvent,
    });
  }
}

export type BuilderSettings = Omit<CreateAgentOptions, "generator" | "tools" | "memory" | "policies" | "onEvent">;

/**
 * Fluent accumulation of an agent's parts. Nothing is wired (and the strategy
 * is not resolved) until `build()`.
 */
export class AgentBuilder {
  private generator?: GenerateFn | TextGenerator;
  private memory?: AgentMemory | MemorySpec;
  private readonly tools: Tool[] = [];
  private readonly policies: Policy[] = [];
  private settings: BuilderSettings = {};
  private eventHandler?: (event: AgentEvent) => void;

  constructor(private readonly strategy: string) {}

  withGenerator(generator: GenerateFn | TextGenerator): this {
    this.generator = generator;
    return this;
  }

  /** An instance, or a description of an in-process backend to create at build time. */
  withMemory(memory: AgentMemory | MemorySpec): this {
    this.memory = memory;
    return this;
  }

  withTool(tool: Tool): this {
    this.tools.push(tool);
    return this;
  }

  withTools(tools: Iterable<Tool>): this {
    for (const tool of tools) {
      this.tools.push(tool);
    }
    return this;
  }

  withPolicy(policy: Policy): this {
    this.policies.push(policy);
    return this;
  }

  withConfig(settings: BuilderSettings): this {
    this.settings = { ...this.settings, ...settings };
    return this;
  }

  onEvent(handler: (event: AgentEvent) => void): this {
    this.eventHandler = handler;
    return this;
  }

  build(): Agent {
    if (!this.generator) {
      throw new ConfigError("AgentBuilder needs a generator before build()");
    }
    return AgentFactory.createAgent(this.strategy, {
      ...this.settings,
      generator: this.generator,
      tools: [...this.tools],
      memory: resolveMemory(this.memory),
      policies: [...this.policies],
      onEvent: this.eventHandler,
    });
  }
}

function resolveMemory(memory: AgentMemory | MemorySpec | undefined): AgentMemory | undefined {
  if (memory === undefined) {
    return undefined;
  }
  return "store" in memory ? memory : createMemory(memory);
}
