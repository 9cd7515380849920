import { randomUUID } from "node:crypto";
import { NotFoundError } from "../errors.js";
import type { Message } from "../types.js";
import { defaultScorer, type SimilarityScorer } from "./similarity.js";
import type { Episode, EpisodeInput, EpisodeMatch, EpisodicMemoryStore, Interaction } from "./types.js";

export const DEFAULT_SEARCH_LIMIT = 5;
export const DEFAULT_EPISODE_CONTEXT = 3;

export interface EpisodicMemoryOptions {
  scorer?: SimilarityScorer;
  /** Matches scoring at or below this are dropped from search results. */
  minScore?: number;
  /** Episodes returned by `getContext` when no limit is given. */
  contextEpisodes?: number;
  /** Oldest episodes are dropped beyond this count. Unlimited by default. */
  maxEpisodes?: number;
  idGenerator?: () => string;
}

interface StoredEpisode {
  episode: Episode;
  sequence: number;
}

export function cloneEpisode(episode: Episode): Episode {
  const copy: Episode = {
    id: episode.id,
    content: episode.content,
    outcome: episode.outcome,
    toolsUsed: [...episode.toolsUsed],
    timestamp: new Date(episode.timestamp),
  };
  if (episode.metadata !== undefined) {
    copy.metadata = { ...episode.metadata };
  }
  return copy;
}

export function episodesToMessages(matches: readonly EpisodeMatch[]): Message[] {
  return matches.map(({ episode, score }): Message => ({
    role: "agent",
    content: `Past episode: ${episode.content}\nOutcome: ${episode.outcome}${
      episode.toolsUsed.length > 0 ? `\nTools used: ${episode.toolsUsed.join(", ")}` : ""
    }`,
    metadata: { source: "memory", episodeId: episode.id, score },
  }));
}

export function interactionToEpisode(interaction: Interaction): EpisodeInput {
  return {
    content: interaction.input,
    outcome: interaction.output,
    toolsUsed: [...interaction.toolsUsed],
    timestamp: interaction.timestamp,
    metadata: { ...(interaction.metadata ?? {}), strategy: interaction.strategy, status: interaction.status },
  };
}

/**
 * Store of past experiences searchable by similarity of their content. Ids are
 * random UUIDs, so concurrent inserts cannot collide.
 */
export class EpisodicMemory implements EpisodicMemoryStore {
  readonly kind = "episodic";
  private readonly episodes = new Map<string, StoredEpisode>();
  private readonly values = new Map<string, unknown>();
  private readonly scorer: SimilarityScorer;
  private readonly minScore: number;
  private readonly contextEpisodes: number;
  private readonly maxEpisodes?: number;
  private readonly idGenerator: () => string;
  private sequence = 0;

  constructor(options: EpisodicMemoryOptions = {}) {
    this.scorer = options.scorer ?? defaultScorer;
    this.minScore = options.minScore ?? 0;
    this.contextEpisodes = options.contextEpisodes ?? DEFAULT_EPISODE_CONTEXT;
    this.maxEpisodes = options.maxEpisodes;
    this.idGenerator = options.idGenerator ?? randomUUID;
  }

  async store(key: string, value: unknown): Promise<void> {
    this.values.set(key, value);
  }

  async retrieve(key: string): Promise<unknown> {
    return this.values.get(key);
  }

  async clear(): Promise<void> {
    this.episodes.clear();
    this.values.clear();
  }

  get size(): number {
    return this.episodes.size;
  }

  async addEpisode(record: EpisodeInput): Promise<string> {
    let id = this.idGenerator();
    while (this.episodes.has(id)) {
      id = this.idGenerator();
    }
    const episode: Episode = {
      id,
      content: record.content,
      outcome: record.outcome,
      toolsUsed: [...record.toolsUsed],
      timestamp: record.timestamp ? new Date(record.timestamp) : new Date(),
    };
    if (record.metadata !== undefined) {
      episode.metadata = { ...record.metadata };
    }
    this.sequence += 1;
    this.episodes.set(id, { episode, sequence: this.sequence });

    if (this.maxEpisodes !== undefined && this.episodes.size > this.maxEpisodes) {
      const oldest = this.episodes.keys().next();
      if (!oldest.done) {
        this.episodes.delete(oldest.value);
      }
    }
    return id;
  }

  async getEpisode(id: string): Promise<Episode> {
    const stored = this.episodes.get(id);
    if (!stored) {
      throw new NotFoundError(`Episode "${id}" not found`, { id });
    }
    return cloneEpisode(stored.episode);
  }

  async searchEpisodes(query: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<EpisodeMatch[]> {
    if (!Number.isFinite(limit) || limit <= 0) {
      return [];
    }
    const scored: Array<{ stored: StoredEpisode; score: number }> = [];
    for (const stored of this.episodes.values()) {
      const score = this.scorer.score(query, stored.episode.content);
      if (score > this.minScore) {
        scored.push({ stored, score });
      }
    }
    scored.sort((a, b) => b.score - a.score || b.stored.sequence - a.stored.sequence);
    return scored.slice(0, Math.floor(limit)).map(({ stored, score }) => ({
      episode: cloneEpisode(stored.episode),
      score,
    }));
  }

  async getContext(input: string, limit: number = this.contextEpisodes): Promise<Message[]> {
    return episodesToMessages(await this.searchEpisodes(input, limit));
  }

  async recordInteraction(interaction: Interaction): Promise<void> {
    await this.addEpisode(interactionToEpisode(interaction));
  }
}
