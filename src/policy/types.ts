import type { ToolArgs } from "../tools/types.js";

export interface ToolAction {
  tool: string;
  args: ToolArgs;
}

export type PolicyVerdict = "allow" | "reject" | "rewrite";

export interface PolicyDecision {
  verdict: PolicyVerdict;
  reason?: string;
  /** Replacement arguments; required when `verdict` is "rewrite", otherwise ignored. */
  rewrittenValue?: ToolArgs;
}

export interface PolicyContext {
  strategy: string;
  /** Step counter of the run at the time the action was proposed. */
  step: number;
  metadata?: Record<string, unknown>;
}

/**
 * Gate applied to proposed tool actions and to the final response of a run.
 * A boolean from `validateAction` is shorthand for allow/reject.
 */
export interface Policy {
  readonly name: string;
  validateAction?(
    action: ToolAction,
    context: PolicyContext
  ): PolicyDecision | boolean | Promise<PolicyDecision | boolean>;
  filterResponse?(response: string, context: PolicyContext): string | Promise<string>;
}

export const allow = (): PolicyDecision => ({ verdict: "allow" });

export const reject = (reason: string): PolicyDecision => ({ verdict: "reject", reason });

export const rewrite = (args: ToolArgs, reason?: string): PolicyDecision => ({
  verdict: "rewrite",
  rewrittenValue: args,
  reason,
});

export function isPolicy(value: unknown): value is Policy {
  if (typeof value !== "object" || value === null || !("name" in value) || typeof value.name !== "string") {
    return false;
  }
  const validate = "validateAction" in value ? value.validateAction : undefined;
  const filter = "filterResponse" in value ? value.filterResponse : undefined;
  return (
    (validate === undefined || typeof validate === "function") &&
    (filter === undefined || typeof filter === "function")
  );
}
