import { performance } from "node:perf_hooks";
import { runWithDeadline } from "../core/abort.js";
import { AgentError, GenerationError, StepTimeoutError, ToolExecutionError, describeError } from "../errors.js";
import { toGenerationError } from "../model/generator.js";
import type { ToolAction } from "../policy/types.js";
import type { AgentState } from "../state/types.js";
import type { Tool } from "../tools/types.js";
import { formatObservation } from "./markers.js";
import type { StepContext } from "./types.js";

export type GenerationOutcome = { ok: true; text: string } | { ok: false; error: GenerationError };

/** One model call for `step`; failures come back as data. */
export async function generateText(
  state: AgentState,
  ctx: StepContext,
  step: string,
  prompt: string
): Promise<GenerationOutcome> {
  const started = performance.now();
  try {
    const text = await ctx.generator.generate(prompt, [...ctx.memoryContext, ...state.messages], {
      signal: ctx.signal,
      metadata: { ...ctx.metadata, runId: ctx.runId, strategy: state.strategy, step },
    });
    ctx.emit({ type: "agent.generation", step, status: "ok", durationMs: performance.now() - started });
    return { ok: true, text };
  } catch (caught) {
    const error = toGenerationError(caught);
    ctx.emit({
      type: "agent.generation",
      step,
      status: "error",
      error: error.message,
      durationMs: performance.now() - started,
    });
    return { ok: false, error };
  }
}

export type ToolCallOutcome =
  | { status: "succeeded"; action: ToolAction; result: unknown; observation: string }
  | { status: "blocked"; action: ToolAction; policy: string; reason: string; observation: string }
  | { status: "failed"; action: ToolAction; error: AgentError; observation: string };

/**
 * The policy-gated tool path shared by ReAct and Planning. A rejected action
 * never reaches `execute`; lookup failures, tool errors and timeouts all come
 * back as an observation instead of a throw.
 */
export async function invokeToolAction(
  state: AgentState,
  ctx: StepContext,
  step: string,
  proposed: ToolAction
): Promise<ToolCallOutcome> {
  const evaluation = await ctx.policies.evaluateAction(proposed, {
    strategy: state.strategy,
    step: state.trace.length,
    metadata: ctx.metadata,
  });
  if (evaluation.verdict === "reject") {
    ctx.emit({
      type: "agent.tool.blocked",
      step,
      tool: proposed.tool,
      action: proposed,
      policy: evaluation.policy,
      reason: evaluation.reason,
    });
    return {
      status: "blocked",
      action: proposed,
      policy: evaluation.policy,
      reason: evaluation.reason,
      observation: `Action rejected: ${evaluation.error.message}`,
    };
  }

  const action = evaluation.action;
  let tool: Tool;
  try {
    tool = ctx.tools.get(action.tool);
  } catch (caught) {
    const error =
      caught instanceof AgentError
        ? caught
        : new ToolExecutionError(action.tool, describeError(caught), { cause: caught });
    return failed(ctx, step, action, error, 0);
  }

  ctx.emit({ type: "agent.tool.start", step, tool: action.tool, action });
  state.toolsUsed.push(action.tool);
  const started = performance.now();
  try {
    const result = await runWithDeadline(
      (signal) => tool.execute(action.args, { signal, metadata: { ...ctx.metadata, runId: ctx.runId, step } }),
      { timeoutMs: tool.timeoutMs ?? ctx.toolTimeoutMs, signal: ctx.signal, label: `Tool "${action.tool}"` }
    );
    const durationMs = performance.now() - started;
    ctx.emit({ type: "agent.tool.end", step, tool: action.tool, action, result, durationMs });
    return { status: "succeeded", action, result, observation: formatObservation(result) };
  } catch (caught) {
    const error =
      caught instanceof StepTimeoutError
        ? caught
        : new ToolExecutionError(action.tool, describeError(caught), { cause: caught });
    return failed(ctx, step, action, error, performance.now() - started);
  }
}

function failed(
  ctx: StepContext,
  step: string,
  action: ToolAction,
  error: AgentError,
  durationMs: number
): ToolCallOutcome {
  ctx.emit({
    type: "agent.tool.error",
    step,
    tool: action.tool,
    action,
    error: error.message,
    code: error.code,
    durationMs,
  });
  return { status: "failed", action, error, observation: `Error: ${error.message}` };
}
