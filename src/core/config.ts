import { z } from "zod";
import { ConfigError } from "../errors.js";

const Count = z.number().int().nonnegative();
const Millis = z.number().int().positive();

const SamplingSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  topP: z.number().min(0).max(1).optional(),
  maxTokens: z.number().int().positive().optional(),
});

const RetrySchema = z.object({
  maxAttempts: z.number().int().positive().optional(),
  baseMs: z.number().int().nonnegative().optional(),
  maxMs: z.number().int().nonnegative().optional(),
  jitter: z.enum(["none", "full"]).optional(),
  maxTotalMs: z.number().int().positive().optional(),
});

const MemorySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("simple") }),
  z.object({
    kind: z.literal("conversation"),
    maxHistory: z.number().int().positive().optional(),
    contextTurns: z.number().int().positive().optional(),
  }),
  z.object({
    kind: z.literal("episodic"),
    contextEpisodes: z.number().int().positive().optional(),
    maxEpisodes: z.number().int().positive().optional(),
    minScore: z.number().min(0).max(1).optional(),
  }),
]);

const PolicySchema = z.object({
  allowedTools: z.array(z.string()).optional(),
  blockedTools: z.array(z.string()).optional(),
  blockedTerms: z.array(z.string()).optional(),
  maxResponseLength: z.number().int().positive().optional(),
});

export const AgentConfigSchema = z.object({
  id: z.string().min(1).optional(),
  /** Resolved by the agent factory. */
  strategy: z.string().trim().min(1),
  maxSteps: Count.optional(),
  maxReflections: Count.optional(),
  maxReplans: Count.optional(),
  sampling: SamplingSchema.optional(),
  modelTimeoutMs: Millis.optional(),
  toolTimeoutMs: Millis.optional(),
  retry: RetrySchema.optional(),
  memory: MemorySchema.optional(),
  /** Names resolved against a tool registry. */
  tools: z.array(z.string().min(1)).optional(),
  policies: PolicySchema.optional(),
  metadata: z.record(z.unknown()).optional(),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;
export type MemoryConfig = z.infer<typeof MemorySchema>;
export type PolicyConfig = z.infer<typeof PolicySchema>;

const EnvSchema = z.object({
  AGENT_STRATEGY: z.string().trim().min(1).optional(),
  AGENT_MAX_STEPS: z.coerce.number().pipe(Count).optional(),
  AGENT_MAX_REFLECTIONS: z.coerce.number().pipe(Count).optional(),
  AGENT_MAX_REPLANS: z.coerce.number().pipe(Count).optional(),
  AGENT_MODEL_TIMEOUT_MS: z.coerce.number().pipe(Millis).optional(),
  AGENT_TOOL_TIMEOUT_MS: z.coerce.number().pipe(Millis).optional(),
  AGENT_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
});

export type EnvSource = Readonly<Record<string, string | undefined>>;

export function parseAgentConfig(raw: unknown): AgentConfig {
  const parsed = AgentConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid agent config: ${formatIssues(parsed.error)}`, {
      details: { issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

/**
 * Validates a declarative agent config after applying `AGENT_*` overrides from
 * the environment. Blank variables count as unset.
 */
export function resolveAgentConfig(raw: unknown, env: EnvSource = process.env): AgentConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith("AGENT_") && value !== undefined && value.trim() !== "")
  );
  const envParsed = EnvSchema.safeParse(present);
  if (!envParsed.success) {
    throw new ConfigError(`Invalid agent environment: ${formatIssues(envParsed.error)}`, {
      details: { issues: envParsed.error.issues },
    });
  }
  const overrides = envParsed.data;
  let base: Record<string, unknown>;
  if (raw === undefined) {
    base = {};
  } else if (isRecord(raw)) {
    base = { ...raw };
  } else {
    return parseAgentConfig(raw);
  }

  setIfDefined(base, "strategy", overrides.AGENT_STRATEGY);
  setIfDefined(base, "maxSteps", overrides.AGENT_MAX_STEPS);
  setIfDefined(base, "maxReflections", overrides.AGENT_MAX_REFLECTIONS);
  setIfDefined(base, "maxReplans", overrides.AGENT_MAX_REPLANS);
  setIfDefined(base, "modelTimeoutMs", overrides.AGENT_MODEL_TIMEOUT_MS);
  setIfDefined(base, "toolTimeoutMs", overrides.AGENT_TOOL_TIMEOUT_MS);
  if (overrides.AGENT_TEMPERATURE !== undefined) {
    const sampling = base.sampling;
    base.sampling = { ...(isRecord(sampling) ? sampling : {}), temperature: overrides.AGENT_TEMPERATURE };
  }
  return parseAgentConfig(base);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setIfDefined(target: Record<string, unknown>, key: string, value: unknown): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
