export type ToolArgs = Record<string, unknown>;

export type ToolParamType = "string" | "number" | "integer" | "boolean" | "array" | "object" | "any";

export interface ToolParamDescriptor {
  type: ToolParamType;
  description?: string;
  required?: boolean;
  enum?: readonly string[];
}

/** Declarative parameter metadata. Tools enforce their own validation. */
export type ToolSchema = Readonly<Record<string, ToolParamDescriptor>>;

export interface ToolRunContext {
  signal?: AbortSignal;
  metadata?: Record<string, unknown>;
}

export interface Tool<Args extends ToolArgs = ToolArgs, Result = unknown> {
  name: string;
  description: string;
  schema: ToolSchema;
  /** Overrides the agent-wide tool timeout for this tool. */
  timeoutMs?: number;
  execute(args: Args, ctx: ToolRunContext): Promise<Result> | Result;
}

export type ToolFactory = () => Tool;

export interface ToolDescription {
  name: string;
  description: string;
  schema: ToolSchema;
}

export function isTool(value: unknown): value is Tool {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "execute" in value &&
    typeof value.execute === "function"
  );
}

export function describeTool(tool: Tool): ToolDescription {
  return { name: tool.name, description: tool.description, schema: tool.schema };
}
