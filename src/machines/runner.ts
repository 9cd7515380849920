import { performance } from "node:perf_hooks";
import { AgentError, describeError } from "../errors.js";
import type { AgentState, StrategyName, StateOfStrategy } from "../state/types.js";
import { TERMINATE, type StateMachine, type StateMachineDefinition, type StepContext } from "./types.js";

function isStateOf<S extends StrategyName>(state: AgentState, strategy: S): state is StateOfStrategy<S> {
  return state.strategy === strategy;
}

function requireState<S extends StrategyName>(state: AgentState, strategy: S): StateOfStrategy<S> {
  if (isStateOf(state, strategy)) {
    return state;
  }
  throw new AgentError(
    "INVALID_STATE",
    `A ${strategy} machine cannot run a ${state.strategy} state`,
    { details: { expected: strategy, actual: state.strategy } }
  );
}

export function defineStateMachine<S extends StrategyName>(definition: StateMachineDefinition<S>): StateMachine {
  return {
    strategy: definition.strategy,
    graph: definition.graph,
    createState: (input) => definition.createState(input),
    async run(state, ctx) {
      const typed = requireState(state, definition.strategy);
      await drive(state, ctx, (node) => {
        if (!Object.hasOwn(definition.handlers, node)) {
          return undefined;
        }
        const handler = definition.handlers[node];
        return () => handler(typed, ctx);
      });
      state.output = definition.finalize(typed);
    },
    finalize: (state) => definition.finalize(requireState(state, definition.strategy)),
  };
}

/**
 * The shared step loop. A node that throws marks the run failed; an abort
 * between nodes stops the run before the next one starts.
 */
async function drive(
  state: AgentState,
  ctx: StepContext,
  resolve: (node: string) => (() => Promise<string>) | undefined
): Promise<void> {
  while (state.status === "running" && state.currentStep !== TERMINATE) {
    const node = state.currentStep;
    if (ctx.signal?.aborted) {
      state.status = "failed";
      state.error = `Run aborted before ${node}: ${describeError(ctx.signal.reason)}`;
      state.currentStep = TERMINATE;
      break;
    }

    const runNode = resolve(node);
    if (!runNode) {
      state.status = "failed";
      state.error = `Unknown step "${node}"`;
      state.currentStep = TERMINATE;
      break;
    }

    const index = state.trace.length;
    ctx.emit({ type: "agent.step.start", step: node, index });
    const started = performance.now();
    let next: string;
    let error: string | undefined;
    try {
      next = await runNode();
    } catch (caught) {
      error = describeError(caught);
      state.status = "failed";
      state.error = error;
      next = TERMINATE;
    }
    state.trace.push(node);
    state.currentStep = next;
    ctx.emit({
      type: "agent.step.done",
      step: node,
      index,
      next,
      status: error === undefined ? "ok" : "error",
      durationMs: performance.now() - started,
      error,
    });
  }

  if (state.status === "running") {
    state.status = "completed";
  }
  state.currentStep = TERMINATE;
}
