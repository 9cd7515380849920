import { DuplicateToolError, ToolNotFoundError } from "../errors.js";
import { DEFAULT_TOOL_FACTORIES, createDefaultTools } from "./defaults.js";
import { describeTool, isTool, type Tool, type ToolDescription, type ToolFactory } from "./types.js";

export interface RegisterToolOptions {
  /** Replace an existing registration in place, keeping its position. */
  override?: boolean;
}

interface RegistryEntry {
  factory?: ToolFactory;
  instance?: Tool;
}

/**
 * Name → tool map that preserves registration order. Policy evaluation and the
 * tool listing shown to the model both follow that order. Every mutation is a
 * single synchronous update, so concurrent agent runs never observe a
 * half-registered entry.
 */
export class ToolRegistry {
  private readonly entries = new Map<string, RegistryEntry>();

  /** Names are trimmed here and in every lookup. */
  register(name: string, tool: Tool | ToolFactory, options: RegisterToolOptions = {}): this {
    const key = name.trim();
    if (key === "") {
      throw new Error("Tool name must be a non-empty string");
    }
    if (this.entries.has(key) && !options.override) {
      throw new DuplicateToolError(key);
    }
    if (isTool(tool)) {
      this.entries.set(key, { instance: tool });
    } else if (typeof tool === "function") {
      this.entries.set(key, { factory: tool });
    } else {
      throw new Error(`Tool "${key}" must be a tool instance or a factory`);
    }
    return this;
  }

  /** Registers an instance under its own name. */
  add(tool: Tool, options: RegisterToolOptions = {}): this {
    return this.register(tool.name, tool, options);
  }

  unregister(name: string): boolean {
    return this.entries.delete(name.trim());
  }

  has(name: string): boolean {
    return this.entries.has(name.trim());
  }

  get(name: string): Tool {
    const key = name.trim();
    const entry = this.entries.get(key);
    if (!entry) {
      throw new ToolNotFoundError(key);
    }
    if (!entry.instance) {
      if (!entry.factory) {
        throw new ToolNotFoundError(key);
      }
      entry.instance = entry.factory();
    }
    return entry.instance;
  }

  list(): string[] {
    return [...this.entries.keys()];
  }

  tools(): Tool[] {
    return this.list().map((name) => this.get(name));
  }

  describe(): ToolDescription[] {
    return this.list().map((name) => ({ ...describeTool(this.get(name)), name }));
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Instantiates every built-in tool with its default configuration. Built-ins
   * not yet registered are added, so later `get` calls resolve to these
   * instances.
   */
  createDefaultSet(): Tool[] {
    const tools = createDefaultTools();
    for (const tool of tools) {
      if (!this.entries.has(tool.name)) {
        this.entries.set(tool.name, { instance: tool });
      }
    }
    return tools;
  }

  /** Copies registrations (not instances) into a fresh registry. */
  clone(): ToolRegistry {
    const copy = new ToolRegistry();
    for (const [name, entry] of this.entries) {
      copy.entries.set(name, { ...entry });
    }
    return copy;
  }
}

export const toolRegistry = new ToolRegistry();

/**
 * Registers factories for the built-in tools on the given registry (the
 * process-wide one by default). Names already present are left alone.
 */
export function registerDefaultTools(registry: ToolRegistry = toolRegistry): ToolRegistry {
  for (const [name, factory] of DEFAULT_TOOL_FACTORIES) {
    if (!registry.has(name)) {
      registry.register(name, factory);
    }
  }
  return registry;
}
