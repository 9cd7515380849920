export * from "./types.js";
export * from "./registry.js";
export * from "./defaults.js";
export * from "./calculator.js";
export * from "./filesystem.js";
export * from "./web.js";
export * from "./data-analysis.js";
export * from "./time.js";
export * from "./search.js";
