export type AgentErrorCode =
  | "GENERATION_FAILED"
  | "TOOL_NOT_FOUND"
  | "TOOL_EXECUTION_FAILED"
  | "DUPLICATE_TOOL"
  | "UNKNOWN_STRATEGY"
  | "POLICY_REJECTED"
  | "STEP_TIMEOUT"
  | "NOT_FOUND"
  | "INVALID_CONFIG"
  | "INVALID_STATE";

export interface AgentErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class AgentError extends Error {
  readonly code: AgentErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: AgentErrorCode, message: string, options?: AgentErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "AgentError";
    this.code = code;
    this.details = options?.details;
  }
}

export class GenerationError extends AgentError {
  constructor(
    message: string,
    public readonly retryable: boolean = true,
    options?: AgentErrorOptions
  ) {
    super("GENERATION_FAILED", message, options);
    this.name = "GenerationError";
  }
}

export class ToolNotFoundError extends AgentError {
  constructor(public readonly tool: string) {
    super("TOOL_NOT_FOUND", `Tool "${tool}" is not registered`, { details: { tool } });
    this.name = "ToolNotFoundError";
  }
}

export class ToolExecutionError extends AgentError {
  constructor(public readonly tool: string, message: string, options?: AgentErrorOptions) {
    super("TOOL_EXECUTION_FAILED", `Tool "${tool}" failed: ${message}`, options);
    this.name = "ToolExecutionError";
  }
}

export class DuplicateToolError extends AgentError {
  constructor(public readonly tool: string) {
    super("DUPLICATE_TOOL", `Tool "${tool}" is already registered`, { details: { tool } });
    this.name = "DuplicateToolError";
  }
}

export class UnknownStrategyError extends AgentError {
  constructor(public readonly strategy: string) {
    super("UNKNOWN_STRATEGY", `Unknown agent strategy "${strategy}"`, { details: { strategy } });
    this.name = "UnknownStrategyError";
  }
}

/**
 * Produced as data when a policy rejects a tool action; never thrown out of `process`.
 */
export class PolicyRejectionError extends AgentError {
  constructor(
    public readonly policy: string,
    public readonly reason: string
  ) {
    super("POLICY_REJECTED", `Policy "${policy}" rejected the action: ${reason}`, {
      details: { policy, reason },
    });
    this.name = "PolicyRejectionError";
  }
}

export class StepTimeoutError extends AgentError {
  constructor(public readonly timeoutMs: number, operation: string) {
    super("STEP_TIMEOUT", `${operation} timed out after ${timeoutMs}ms`, { details: { timeoutMs } });
    this.name = "StepTimeoutError";
  }
}

export class NotFoundError extends AgentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("NOT_FOUND", message, { details });
    this.name = "NotFoundError";
  }
}

export class ConfigError extends AgentError {
  constructor(message: string, options?: AgentErrorOptions) {
    super("INVALID_CONFIG", message, options);
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
