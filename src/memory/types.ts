import type { Message } from "../types.js";

export type MemoryKind = "simple" | "conversation" | "episodic";

/** What the Agent hands to memory after each `process` call. */
export interface Interaction {
  input: string;
  output: string;
  strategy: string;
  status: string;
  toolsUsed: string[];
  metadata?: Record<string, unknown>;
  timestamp: Date;
}

/**
 * Contract shared by every backend. `getContext` supplies the messages a new
 * run starts from; `recordInteraction` is called once a run has finished.
 */
export interface AgentMemory {
  readonly kind: MemoryKind;
  store(key: string, value: unknown): Promise<void>;
  retrieve(key: string): Promise<unknown>;
  clear(): Promise<void>;
  getContext(input: string, limit?: number): Promise<Message[]>;
  recordInteraction(interaction: Interaction): Promise<void>;
}

export interface ConversationTurn {
  userInput: string;
  agentResponse: string;
  metadata: Record<string, unknown>;
  timestamp: Date;
}

export interface ConversationTurnInput {
  userInput: string;
  agentResponse: string;
  metadata?: Record<string, unknown>;
  timestamp?: Date;
}

export interface ConversationMemoryStore extends AgentMemory {
  readonly kind: "conversation";
  readonly maxHistory: number;
  addConversationTurn(turn: ConversationTurnInput): Promise<ConversationTurn>;
  /** Last `n` turns in insertion order; fewer when history is shorter. */
  getRecentContext(n: number): Promise<ConversationTurn[]>;
}

export interface EpisodeInput {
  content: string;
  outcome: string;
  toolsUsed: string[];
  timestamp?: Date;
  metadata?: Record<string, unknown>;
}

export interface Episode {
  id: string;
  content: string;
  outcome: string;
  toolsUsed: string[];
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface EpisodeMatch {
  episode: Episode;
  score: number;
}

export interface EpisodicMemoryStore extends AgentMemory {
  readonly kind: "episodic";
  addEpisode(record: EpisodeInput): Promise<string>;
  /** Matches ordered by descending relevance. */
  searchEpisodes(query: string, limit?: number): Promise<EpisodeMatch[]>;
  getEpisode(id: string): Promise<Episode>;
}

export function isConversationMemory(memory: AgentMemory): memory is ConversationMemoryStore {
  return memory.kind === "conversation";
}

export function isEpisodicMemory(memory: AgentMemory): memory is EpisodicMemoryStore {
  return memory.kind === "episodic";
}
