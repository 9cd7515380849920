export * from "./types.js";
export * from "./similarity.js";
export * from "./simple.js";
export * from "./conversation.js";
export * from "./episodic.js";
export * from "./redis.js";
export * from "./postgres.js";
export * from "./factory.js";
