import { createCalculatorTool } from "./calculator.js";
import { createDataAnalysisTool } from "./data-analysis.js";
import { createFileSystemTool } from "./filesystem.js";
import { createTimeTool } from "./time.js";
import type { Tool, ToolFactory } from "./types.js";
import { createWebTool } from "./web.js";

// `search` is absent: it needs a caller-supplied adapter.
export const DEFAULT_TOOL_FACTORIES: ReadonlyArray<readonly [string, ToolFactory]> = [
  ["calculator", () => createCalculatorTool()],
  ["filesystem", () => createFileSystemTool()],
  ["web", () => createWebTool()],
  ["data_analysis", () => createDataAnalysisTool()],
  ["time", () => createTimeTool()],
];

export function createDefaultTools(): Tool[] {
  return DEFAULT_TOOL_FACTORIES.map(([, factory]) => factory());
}
