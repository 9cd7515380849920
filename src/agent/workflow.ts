import { ConfigError, NotFoundError } from "../errors.js";
import type { RunStatus } from "../state/types.js";
import type { Agent } from "./agent.js";

export interface WorkflowStep {
  agent: string;
  /**
   * Input template for this step. `{input}` is the workflow input and
   * `{previous}` the prior step's output. Without one the prior output is
   * passed through unchanged.
   */
  prompt?: string;
}

export interface WorkflowStepResult {
  agent: string;
  input: string;
  output: string;
  status: RunStatus;
  runId: string;
  error?: string;
}

export interface WorkflowResult {
  workflow: string;
  status: "completed" | "failed";
  output: string;
  steps: WorkflowStepResult[];
}

export interface ExecuteWorkflowOptions {
  signal?: AbortSignal;
  /** Stop at the first failed step. Defaults to true. */
  stopOnFailure?: boolean;
  metadata?: Record<string, unknown>;
}

export function renderStepInput(step: WorkflowStep, input: string, previous: string): string {
  if (step.prompt === undefined) {
    return previous;
  }
  return step.prompt.replaceAll("{input}", input).replaceAll("{previous}", previous);
}

/** Named agents chained into ordered pipelines. */
export class AgentWorkflow {
  private readonly agents = new Map<string, Agent>();
  private readonly workflows = new Map<string, readonly WorkflowStep[]>();

  registerAgent(name: string, agent: Agent): this {
    if (!name.trim()) {
      throw new ConfigError("Agent name must be a non-empty string");
    }
    if (this.agents.has(name)) {
      throw new ConfigError(`Agent "${name}" is already registered`);
    }
    this.agents.set(name, agent);
    return this;
  }

  getAgent(name: string): Agent {
    const agent = this.agents.get(name);
    if (!agent) {
      throw new NotFoundError(`Agent "${name}" is not registered`, { agent: name });
    }
    return agent;
  }

  addWorkflow(name: string, steps: readonly WorkflowStep[]): this {
    if (steps.length === 0) {
      throw new ConfigError(`Workflow "${name}" needs at least one step`);
    }
    for (const step of steps) {
      this.getAgent(step.agent);
    }
    this.workflows.set(name, steps.map((step) => ({ ...step })));
    return this;
  }

  listWorkflows(): string[] {
    return [...this.workflows.keys()];
  }

  async executeWorkflow(name: string, input: string, options: ExecuteWorkflowOptions = {}): Promise<WorkflowResult> {
    const steps = this.workflows.get(name);
    if (!steps) {
      throw new NotFoundError(`Workflow "${name}" is not defined`, { workflow: name });
    }
    const stopOnFailure = options.stopOnFailure ?? true;
    const results: WorkflowStepResult[] = [];
    let previous = input;
    let status: WorkflowResult["status"] = "completed";

    for (const [index, step] of steps.entries()) {
      const stepInput = renderStepInput(step, input, previous);
      const result = await this.getAgent(step.agent).process(stepInput, {
        signal: options.signal,
        metadata: { ...options.metadata, workflow: name, workflowStep: index },
      });
      results.push({
        agent: step.agent,
        input: stepInput,
        output: result.output,
        status: result.status,
        runId: result.runId,
        error: result.error,
      });
      previous = result.output;
      if (result.status === "failed") {
        status = "failed";
        if (stopOnFailure) {
          break;
        }
      }
    }

    return { workflow: name, status, output: previous, steps: results };
  }
}
