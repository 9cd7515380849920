import type { Tool } from "./types.js";

export function createTimeTool(clock: () => Date = () => new Date()): Tool<Record<string, never>, string> {
  return {
    name: "time",
    description: "Get the current time as an ISO-8601 timestamp",
    schema: {},
    execute: () => clock().toISOString(),
  };
}
