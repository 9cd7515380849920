import { ConversationMemory, type ConversationMemoryOptions } from "./conversation.js";
import { EpisodicMemory, type EpisodicMemoryOptions } from "./episodic.js";
import { SimpleMemory } from "./simple.js";
import type { AgentMemory } from "./types.js";

export type MemorySpec =
  | { kind: "simple" }
  | ({ kind: "conversation" } & ConversationMemoryOptions)
  | ({ kind: "episodic" } & EpisodicMemoryOptions);

/** Builds one of the in-process backends from a declarative description. */
export function createMemory(spec: MemorySpec = { kind: "simple" }): AgentMemory {
  switch (spec.kind) {
    case "simple":
      return new SimpleMemory();
    case "conversation":
      return new ConversationMemory({ maxHistory: spec.maxHistory, contextTurns: spec.contextTurns });
    case "episodic":
      return new EpisodicMemory({
        scorer: spec.scorer,
        minScore: spec.minScore,
        contextEpisodes: spec.contextEpisodes,
        maxEpisodes: spec.maxEpisodes,
        idGenerator: spec.idGenerator,
      });
  }
}
