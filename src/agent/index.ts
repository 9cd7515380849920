export * from "./types.js";
export * from "./agent.js";
export * from "./factory.js";
export * from "./presets.js";
export * from "./router.js";
export * from "./workflow.js";
