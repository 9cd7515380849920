import type { Message } from "../types.js";
import type {
  ConversationMemoryStore,
  ConversationTurn,
  ConversationTurnInput,
  Interaction,
} from "./types.js";

export const DEFAULT_MAX_HISTORY = 100;
export const DEFAULT_CONTEXT_TURNS = 5;

export interface ConversationMemoryOptions {
  /** Capacity; the oldest turn is evicted once exceeded. */
  maxHistory?: number;
  /** Turns returned by `getContext` when no limit is given. */
  contextTurns?: number;
}

export function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }
}

export function realizeTurn(turn: ConversationTurnInput): ConversationTurn {
  return {
    userInput: turn.userInput,
    agentResponse: turn.agentResponse,
    metadata: { ...(turn.metadata ?? {}) },
    timestamp: turn.timestamp ? new Date(turn.timestamp) : new Date(),
  };
}

export function cloneTurn(turn: ConversationTurn): ConversationTurn {
  return { ...turn, metadata: { ...turn.metadata }, timestamp: new Date(turn.timestamp) };
}

export function turnsToMessages(turns: readonly ConversationTurn[]): Message[] {
  return turns.flatMap((turn): Message[] => [
    { role: "user", content: turn.userInput, metadata: { source: "memory", timestamp: turn.timestamp.toISOString() } },
    { role: "agent", content: turn.agentResponse, metadata: { source: "memory", timestamp: turn.timestamp.toISOString() } },
  ]);
}

export function interactionToTurn(interaction: Interaction): ConversationTurnInput {
  return {
    userInput: interaction.input,
    agentResponse: interaction.output,
    timestamp: interaction.timestamp,
    metadata: {
      ...(interaction.metadata ?? {}),
      strategy: interaction.strategy,
      status: interaction.status,
      toolsUsed: [...interaction.toolsUsed],
    },
  };
}

/**
 * Bounded conversation history with strict FIFO eviction. Each append and its
 * eviction happen in one synchronous block, so concurrent callers can never
 * drop more than the single oldest turn per insert.
 */
export class ConversationMemory implements ConversationMemoryStore {
  readonly kind = "conversation";
  readonly maxHistory: number;
  private readonly contextTurns: number;
  private turns: ConversationTurn[] = [];
  private readonly values = new Map<string, unknown>();

  constructor(options: ConversationMemoryOptions = {}) {
    this.maxHistory = options.maxHistory ?? DEFAULT_MAX_HISTORY;
    this.contextTurns = options.contextTurns ?? DEFAULT_CONTEXT_TURNS;
    assertPositiveInteger("maxHistory", this.maxHistory);
    assertPositiveInteger("contextTurns", this.contextTurns);
  }

  async store(key: string, value: unknown): Promise<void> {
    this.values.set(key, value);
  }

  async retrieve(key: string): Promise<unknown> {
    return this.values.get(key);
  }

  async clear(): Promise<void> {
    this.turns = [];
    this.values.clear();
  }

  async addConversationTurn(input: ConversationTurnInput): Promise<ConversationTurn> {
    const turn = realizeTurn(input);
    this.turns.push(turn);
    if (this.turns.length > this.maxHistory) {
      this.turns.splice(0, this.turns.length - this.maxHistory);
    }
    return cloneTurn(turn);
  }

  async getRecentContext(n: number): Promise<ConversationTurn[]> {
    const count = Number.isFinite(n) ? Math.floor(n) : 0;
    if (count <= 0) {
      return [];
    }
    return this.turns.slice(-count).map(cloneTurn);
  }

  get size(): number {
    return this.turns.length;
  }

  async getContext(_input: string, limit: number = this.contextTurns): Promise<Message[]> {
    return turnsToMessages(await this.getRecentContext(limit));
  }

  async recordInteraction(interaction: Interaction): Promise<void> {
    await this.addConversationTurn(interactionToTurn(interaction));
  }
}
