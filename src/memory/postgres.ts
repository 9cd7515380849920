import { randomUUID } from "node:crypto";
import { Pool, type PoolConfig } from "pg";
import { z } from "zod";
import { Mutex } from "../core/mutex.js";
import { NotFoundError } from "../errors.js";
import type { Message } from "../types.js";
import { DEFAULT_EPISODE_CONTEXT, DEFAULT_SEARCH_LIMIT, episodesToMessages, interactionToEpisode } from "./episodic.js";
import { tokenizeTerms } from "./similarity.js";
import type { Episode, EpisodeInput, EpisodeMatch, EpisodicMemoryStore, Interaction } from "./types.js";

/** The subset of a `pg` Pool this backend needs. */
export interface PgPoolLike {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
  end?(): Promise<void>;
}

export interface PostgresEpisodicMemoryOptions {
  pool?: PgPoolLike;
  poolConfig?: PoolConfig;
  schema?: string;
  namespace?: string;
  ensureSchema?: boolean;
  contextEpisodes?: number;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const EpisodeRowSchema = z.object({
  id: z.string(),
  content: z.string(),
  outcome: z.string(),
  tools_used: z.array(z.string()),
  metadata: z.record(z.unknown()).nullable().optional(),
  created_at: z.coerce.date(),
  score: z.coerce.number().optional(),
});

const ValueRowSchema = z.object({ value: z.unknown() });

type EpisodeRow = z.infer<typeof EpisodeRowSchema>;

const ensureTablesSQL = (schema: string) => `
CREATE TABLE IF NOT EXISTS ${schema}.agent_episodes (
  id UUID PRIMARY KEY,
  namespace TEXT NOT NULL,
  content TEXT NOT NULL,
  outcome TEXT NOT NULL,
  tools_used JSONB NOT NULL DEFAULT '[]'::jsonb,
  metadata JSONB,
  created_at TIMESTAMPTZ NOT NULL
);

CREATE INDEX IF NOT EXISTS agent_episodes_content_idx
  ON ${schema}.agent_episodes USING GIN (to_tsvector('simple', content));

CREATE TABLE IF NOT EXISTS ${schema}.agent_memory_values (
  namespace TEXT NOT NULL,
  key TEXT NOT NULL,
  value JSONB,
  PRIMARY KEY (namespace, key)
);
`;

/**
 * Episodic memory on Postgres. Relevance is full-text rank over `content`
 * with any query term matching; ids are UUIDs generated client-side.
 */
export class PostgresEpisodicMemory implements EpisodicMemoryStore {
  readonly kind = "episodic";
  private readonly pool: PgPoolLike;
  private readonly schema: string;
  private readonly namespace: string;
  private readonly ensureSchema: boolean;
  private readonly contextEpisodes: number;
  private readonly initLock = new Mutex();
  private initialized = false;

  constructor(options: PostgresEpisodicMemoryOptions = {}) {
    this.schema = options.schema ?? "public";
    if (!IDENTIFIER.test(this.schema)) {
      throw new Error(`Invalid schema name "${this.schema}"`);
    }
    this.pool = options.pool ?? wrapPool(new Pool(options.poolConfig));
    this.namespace = options.namespace ?? "default";
    this.ensureSchema = options.ensureSchema ?? true;
    this.contextEpisodes = options.contextEpisodes ?? DEFAULT_EPISODE_CONTEXT;
  }

  private get episodeTable(): string {
    return `${this.schema}.agent_episodes`;
  }

  private get valueTable(): string {
    return `${this.schema}.agent_memory_values`;
  }

  private async ready(): Promise<void> {
    if (this.initialized) return;
    await this.initLock.runExclusive(async () => {
      if (this.initialized) return;
      if (this.ensureSchema) {
        await this.pool.query(ensureTablesSQL(this.schema));
      }
      this.initialized = true;
    });
  }

  async store(key: string, value: unknown): Promise<void> {
    await this.ready();
    await this.pool.query(
      `INSERT INTO ${this.valueTable} (namespace, key, value) VALUES ($1, $2, $3)
       ON CONFLICT (namespace, key) DO UPDATE SET value = EXCLUDED.value`,
      [this.namespace, key, JSON.stringify(value ?? null)]
    );
  }

  async retrieve(key: string): Promise<unknown> {
    await this.ready();
    const result = await this.pool.query(
      `SELECT value FROM ${this.valueTable} WHERE namespace = $1 AND key = $2`,
      [this.namespace, key]
    );
    const row = result.rows[0];
    if (row === undefined) {
      return undefined;
    }
    return ValueRowSchema.parse(row).value;
  }

  async clear(): Promise<void> {
    await this.ready();
    await this.pool.query(`DELETE FROM ${this.episodeTable} WHERE namespace = $1`, [this.namespace]);
    await this.pool.query(`DELETE FROM ${this.valueTable} WHERE namespace = $1`, [this.namespace]);
  }

  async addEpisode(record: EpisodeInput): Promise<string> {
    await this.ready();
    const id = randomUUID();
    await this.pool.query(
      `INSERT INTO ${this.episodeTable} (id, namespace, content, outcome, tools_used, metadata, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        id,
        this.namespace,
        record.content,
        record.outcome,
        JSON.stringify(record.toolsUsed),
        record.metadata === undefined ? null : JSON.stringify(record.metadata),
        record.timestamp ?? new Date(),
      ]
    );
    return id;
  }

  async getEpisode(id: string): Promise<Episode> {
    await this.ready();
    const result = await this.pool.query(
      `SELECT id, content, outcome, tools_used, metadata, created_at FROM ${this.episodeTable}
       WHERE namespace = $1 AND id = $2`,
      [this.namespace, id]
    );
    const row = result.rows[0];
    if (row === undefined) {
      throw new NotFoundError(`Episode "${id}" not found`, { id });
    }
    return rowToEpisode(EpisodeRowSchema.parse(row));
  }

  async searchEpisodes(query: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<EpisodeMatch[]> {
    const terms = [...tokenizeTerms(query)];
    if (terms.length === 0 || !Number.isFinite(limit) || limit <= 0) {
      return [];
    }
    await this.ready();
    const result = await this.pool.query(
      `SELECT id, content, outcome, tools_used, metadata, created_at,
              ts_rank(to_tsvector('simple', content), to_tsquery('simple', $2)) AS score
       FROM ${this.episodeTable}
       WHERE namespace = $1 AND to_tsvector('simple', content) @@ to_tsquery('simple', $2)
       ORDER BY score DESC, created_at DESC
       LIMIT $3`,
      [this.namespace, terms.join(" | "), Math.floor(limit)]
    );
    return result.rows.map((raw) => {
      const row = EpisodeRowSchema.parse(raw);
      return { episode: rowToEpisode(row), score: row.score ?? 0 };
    });
  }

  async getContext(input: string, limit: number = this.contextEpisodes): Promise<Message[]> {
    return episodesToMessages(await this.searchEpisodes(input, limit));
  }

  async recordInteraction(interaction: Interaction): Promise<void> {
    await this.addEpisode(interactionToEpisode(interaction));
  }

  async close(): Promise<void> {
    await this.pool.end?.();
  }
}

function wrapPool(pool: Pool): PgPoolLike {
  return {
    query: (text, params) => pool.query(text, params),
    end: () => pool.end(),
  };
}

function rowToEpisode(row: EpisodeRow): Episode {
  const episode: Episode = {
    id: row.id,
    content: row.content,
    outcome: row.outcome,
    toolsUsed: row.tools_used,
    timestamp: row.created_at,
  };
  if (row.metadata) {
    episode.metadata = row.metadata;
  }
  return episode;
}
