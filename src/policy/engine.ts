import { PolicyRejectionError, describeError } from "../errors.js";
import { isPolicy, type Policy, type PolicyContext, type PolicyDecision, type ToolAction } from "./types.js";

export type ActionEvaluation =
  | { verdict: "allow"; action: ToolAction; rewrittenBy: string[] }
  | { verdict: "reject"; policy: string; reason: string; error: PolicyRejectionError };

/**
 * Ordered, append-only policy list. Actions pass through every policy in
 * registration order; the first reject stops evaluation and rewrites feed
 * the policies after them.
 */
export class PolicyEngine {
  private readonly policies: Policy[] = [];

  constructor(policies: Iterable<Policy> = []) {
    for (const policy of policies) {
      this.add(policy);
    }
  }

  add(policy: Policy): this {
    if (!isPolicy(policy) || policy.name.trim() === "") {
      throw new Error("Each policy must have a non-empty name");
    }
    this.policies.push(policy);
    return this;
  }

  list(): readonly Policy[] {
    return [...this.policies];
  }

  get size(): number {
    return this.policies.length;
  }

  async evaluateAction(action: ToolAction, context: PolicyContext): Promise<ActionEvaluation> {
    let current: ToolAction = { tool: action.tool, args: { ...action.args } };
    const rewrittenBy: string[] = [];

    for (const policy of this.policies) {
      if (!policy.validateAction) {
        continue;
      }
      let decision: PolicyDecision;
      try {
        decision = normalizeDecision(await policy.validateAction(current, context));
      } catch (error) {
        decision = { verdict: "reject", reason: `policy check failed: ${describeError(error)}` };
      }

      if (decision.verdict === "reject") {
        const reason = decision.reason ?? "action not permitted";
        return {
          verdict: "reject",
          policy: policy.name,
          reason,
          error: new PolicyRejectionError(policy.name, reason),
        };
      }
      if (decision.verdict === "rewrite") {
        if (!decision.rewrittenValue) {
          const reason = "rewrite decision carried no arguments";
          return { verdict: "reject", policy: policy.name, reason, error: new PolicyRejectionError(policy.name, reason) };
        }
        current = { tool: current.tool, args: { ...decision.rewrittenValue } };
        rewrittenBy.push(policy.name);
      }
    }

    return { verdict: "allow", action: current, rewrittenBy };
  }

  async filterResponse(response: string, context: PolicyContext): Promise<string> {
    let filtered = response;
    for (const policy of this.policies) {
      if (policy.filterResponse) {
        filtered = await policy.filterResponse(filtered, context);
      }
    }
    return filtered;
  }
}

function normalizeDecision(decision: PolicyDecision | boolean): PolicyDecision {
  if (decision === true) {
    return { verdict: "allow" };
  }
  if (decision === false) {
    return { verdict: "reject" };
  }
  return decision;
}
