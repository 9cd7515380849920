import { z } from "zod";
import { Mutex } from "../core/mutex.js";
import type { Message } from "../types.js";
import {
  DEFAULT_CONTEXT_TURNS,
  DEFAULT_MAX_HISTORY,
  assertPositiveInteger,
  interactionToTurn,
  realizeTurn,
  turnsToMessages,
} from "./conversation.js";
import type {
  ConversationMemoryStore,
  ConversationTurn,
  ConversationTurnInput,
  Interaction,
} from "./types.js";

/** The subset of a node-redis v4 client this backend needs. */
export interface RedisClientLike {
  rPush(key: string, value: string): Promise<number>;
  lRange(key: string, start: number, stop: number): Promise<string[]>;
  lTrim(key: string, start: number, stop: number): Promise<unknown>;
  del(key: string): Promise<number>;
  hSet(key: string, field: string, value: string): Promise<number>;
  hGet(key: string, field: string): Promise<string | null | undefined>;
  expire?(key: string, ttlSeconds: number): Promise<unknown>;
  eval?(script: string, options: { keys: string[]; arguments: string[] }): Promise<unknown>;
}

export interface RedisConversationMemoryOptions {
  client: RedisClientLike;
  namespace?: string;
  maxHistory?: number;
  contextTurns?: number;
  ttlSeconds?: number;
}

const APPEND_AND_TRIM_SCRIPT = `
local key = KEYS[1]
local payload = ARGV[1]
local maxHistory = tonumber(ARGV[2]) or 0
local ttlSeconds = tonumber(ARGV[3]) or 0
local length = redis.call('RPUSH', key, payload)
if maxHistory > 0 and length > maxHistory then
  redis.call('LTRIM', key, length - maxHistory, -1)
end
if ttlSeconds > 0 then
  redis.call('EXPIRE', key, ttlSeconds)
end
return length
`;

const SerializedTurnSchema = z.object({
  userInput: z.string(),
  agentResponse: z.string(),
  metadata: z.record(z.unknown()),
  timestamp: z.string(),
});

type SerializedTurn = z.infer<typeof SerializedTurnSchema>;

/**
 * Conversation memory on a Redis list. Append and trim run as one Lua script
 * so eviction stays strict FIFO across processes; clients without `eval` fall
 * back to RPUSH + LTRIM serialised through a local mutex.
 */
export class RedisConversationMemory implements ConversationMemoryStore {
  readonly kind = "conversation";
  readonly maxHistory: number;
  private readonly client: RedisClientLike;
  private readonly namespace: string;
  private readonly contextTurns: number;
  private readonly ttlSeconds?: number;
  private readonly fallbackLock = new Mutex();

  constructor(options: RedisConversationMemoryOptions) {
    if (!options || !options.client) {
      throw new Error("RedisConversationMemory requires a Redis client");
    }
    this.client = options.client;
    this.namespace = options.namespace ?? "agent";
    this.maxHistory = options.maxHistory ?? DEFAULT_MAX_HISTORY;
    this.contextTurns = options.contextTurns ?? DEFAULT_CONTEXT_TURNS;
    this.ttlSeconds = options.ttlSeconds;
    assertPositiveInteger("maxHistory", this.maxHistory);
    assertPositiveInteger("contextTurns", this.contextTurns);
  }

  private get historyKey(): string {
    return `${this.namespace}:conversation`;
  }

  private get valuesKey(): string {
    return `${this.namespace}:values`;
  }

  async store(key: string, value: unknown): Promise<void> {
    await this.client.hSet(this.valuesKey, key, JSON.stringify(value ?? null));
  }

  async retrieve(key: string): Promise<unknown> {
    const raw = await this.client.hGet(this.valuesKey, key);
    if (raw === null || raw === undefined) {
      return undefined;
    }
    const value: unknown = JSON.parse(raw);
    return value;
  }

  async clear(): Promise<void> {
    await this.client.del(this.historyKey);
    await this.client.del(this.valuesKey);
  }

  async addConversationTurn(input: ConversationTurnInput): Promise<ConversationTurn> {
    const turn = realizeTurn(input);
    const payload = JSON.stringify(serializeTurn(turn));

    if (typeof this.client.eval === "function") {
      await this.client.eval(APPEND_AND_TRIM_SCRIPT, {
        keys: [this.historyKey],
        arguments: [payload, String(this.maxHistory), String(this.ttlSeconds ?? 0)],
      });
      return turn;
    }

    await this.fallbackLock.runExclusive(async () => {
      await this.client.rPush(this.historyKey, payload);
      await this.client.lTrim(this.historyKey, -this.maxHistory, -1);
      if (this.ttlSeconds && this.client.expire) {
        await this.client.expire(this.historyKey, this.ttlSeconds);
      }
    });
    return turn;
  }

  async getRecentContext(n: number): Promise<ConversationTurn[]> {
    const count = Number.isFinite(n) ? Math.floor(n) : 0;
    if (count <= 0) {
      return [];
    }
    const entries = await this.client.lRange(this.historyKey, -count, -1);
    return entries.map(deserializeTurn);
  }

  async getContext(_input: string, limit: number = this.contextTurns): Promise<Message[]> {
    return turnsToMessages(await this.getRecentContext(limit));
  }

  async recordInteraction(interaction: Interaction): Promise<void> {
    await this.addConversationTurn(interactionToTurn(interaction));
  }
}

function serializeTurn(turn: ConversationTurn): SerializedTurn {
  return {
    userInput: turn.userInput,
    agentResponse: turn.agentResponse,
    metadata: turn.metadata,
    timestamp: turn.timestamp.toISOString(),
  };
}

function deserializeTurn(entry: string): ConversationTurn {
  const parsed = SerializedTurnSchema.safeParse(JSON.parse(entry));
  if (!parsed.success) {
    throw new Error("Stored conversation turn is malformed");
  }
  return {
    userInput: parsed.data.userInput,
    agentResponse: parsed.data.agentResponse,
    metadata: parsed.data.metadata,
    timestamp: new Date(parsed.data.timestamp),
  };
}
