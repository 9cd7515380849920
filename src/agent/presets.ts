import type { AgentConfigInput } from "../core/config.js";
import { NotFoundError } from "../errors.js";
import type { Agent } from "./agent.js";
import { AgentFactory, type AgentDependencies } from "./factory.js";

export const AgentPresets = {
  basic_reflection: {
    strategy: "reflection",
    maxReflections: 2,
    memory: { kind: "simple" },
  },
  calculator_react: {
    strategy: "react",
    maxSteps: 5,
    tools: ["calculator"],
    memory: { kind: "conversation", maxHistory: 50 },
    policies: { allowedTools: ["calculator"] },
  },
  research_react: {
    strategy: "react",
    maxSteps: 8,
    tools: ["web", "data_analysis", "time"],
    memory: { kind: "episodic", contextEpisodes: 3 },
    policies: { maxResponseLength: 4000 },
  },
  project_planner: {
    strategy: "planning",
    maxSteps: 10,
    maxReplans: 2,
    tools: ["calculator", "time"],
    memory: { kind: "conversation", maxHistory: 100 },
  },
} satisfies Record<string, AgentConfigInput>;

export type PresetName = keyof typeof AgentPresets;

export function isPresetName(name: string): name is PresetName {
  return Object.hasOwn(AgentPresets, name);
}

/**
 * Builds an agent from a named preset. `overrides` are merged over the preset
 * one level deep before validation.
 */
export function createFromPreset(
  name: string,
  dependencies: AgentDependencies,
  overrides: Partial<AgentConfigInput> = {}
): Agent {
  if (!isPresetName(name)) {
    throw new NotFoundError(`Unknown agent preset "${name}"`, { available: Object.keys(AgentPresets) });
  }
  const preset: AgentConfigInput = AgentPresets[name];
  return AgentFactory.fromConfig({ ...preset, ...overrides }, dependencies);
}
