export * from "./messages.js";
export * from "./types.js";
export * from "./serialize.js";
