export * from "./types.js";
export * from "./markers.js";
export * from "./actions.js";
export * from "./runner.js";
export * from "./reflection.js";
export * from "./react.js";
export * from "./planning.js";
