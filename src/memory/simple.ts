import type { Message } from "../types.js";
import type { AgentMemory, Interaction } from "./types.js";

export const LAST_INPUT_KEY = "last_input";
export const LAST_RESPONSE_KEY = "last_response";

/** Unordered key/value memory with no expiry. */
export class SimpleMemory implements AgentMemory {
  readonly kind = "simple";
  private readonly values = new Map<string, unknown>();

  async store(key: string, value: unknown): Promise<void> {
    this.values.set(key, value);
  }

  async retrieve(key: string): Promise<unknown> {
    return this.values.get(key);
  }

  async clear(): Promise<void> {
    this.values.clear();
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  async getContext(): Promise<Message[]> {
    const input = this.values.get(LAST_INPUT_KEY);
    const response = this.values.get(LAST_RESPONSE_KEY);
    if (typeof input !== "string" || typeof response !== "string") {
      return [];
    }
    return [
      { role: "user", content: input, metadata: { source: "memory" } },
      { role: "agent", content: response, metadata: { source: "memory" } },
    ];
  }

  async recordInteraction(interaction: Interaction): Promise<void> {
    this.values.set(LAST_INPUT_KEY, interaction.input);
    this.values.set(LAST_RESPONSE_KEY, interaction.output);
  }
}
