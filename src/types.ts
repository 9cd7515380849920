export type Role = "user" | "agent" | "tool";

export interface Message {
  role: Role;
  content: string;
  metadata: Record<string, unknown>;
}

export interface SamplingOptions {
  temperature?: number;
  topP?: number;
  maxTokens?: number;
}

export interface GenerateOptions extends SamplingOptions {
  signal?: AbortSignal;
  metadata?: Record<string, unknown>;
}

/**
 * The text-generation capability consumed by every state machine. Implementations
 * may throw; callers convert failures into `GenerationError`.
 */
export interface TextGenerator {
  generate(prompt: string, context: readonly Message[], options?: GenerateOptions): Promise<string>;
}

export type GenerateFn = (
  prompt: string,
  context: readonly Message[],
  options?: GenerateOptions
) => Promise<string> | string;

export interface RetryOpts {
  maxAttempts?: number;
  baseMs?: number;
  maxMs?: number;
  jitter?: "none" | "full";
  signal?: AbortSignal;
  maxTotalMs?: number;
  onRetry?: (info: { attempt: number; waitMs: number; error: unknown }) => void;
  shouldRetry?: (error: unknown) => boolean;
}
