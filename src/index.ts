export * from "./types.js";
export * from "./errors.js";
export * from "./core/abort.js";
export * from "./core/retry.js";
export * from "./core/mutex.js";
export * from "./core/config.js";
export * from "./model/generator.js";
export * from "./state/index.js";
export * from "./tools/index.js";
export * from "./memory/index.js";
export * from "./policy/index.js";
export * from "./machines/index.js";
export * from "./agent/index.js";
export * from "./telemetry/events.js";
export * from "./telemetry/otel.js";
