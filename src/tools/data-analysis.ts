import type { Tool, ToolRunContext } from "./types.js";

export type DataAnalysisArgs = {
  operation: "summarize" | "statistics";
  data: unknown;
};

export interface NumericStatistics {
  count: number;
  mean: number;
  median: number;
  min: number;
  max: number;
}

export function createDataAnalysisTool(): Tool<DataAnalysisArgs, string | NumericStatistics> {
  return {
    name: "data_analysis",
    description: "Perform basic data analysis: summarize text or lists, or compute statistics for numeric lists",
    schema: {
      operation: { type: "string", enum: ["summarize", "statistics"], required: true },
      data: { type: "any", description: "Text or list to analyse", required: true },
    },
    execute(args: DataAnalysisArgs, _ctx: ToolRunContext): string | NumericStatistics {
      switch (args?.operation) {
        case "summarize":
          return summarize(args.data);
        case "statistics":
          return statistics(args.data);
        default:
          throw new Error(`Unsupported data operation: ${String(args?.operation)}`);
      }
    },
  };
}

function summarize(data: unknown): string {
  if (typeof data === "string") {
    const words = data.trim() === "" ? 0 : data.trim().split(/\s+/u).length;
    const lines = data.split("\n").length;
    return `Text summary: ${words} words, ${data.length} characters, ${lines} lines`;
  }
  if (Array.isArray(data)) {
    return `List summary: ${data.length} items`;
  }
  return `Data type: ${data === null ? "null" : typeof data}`;
}

function statistics(data: unknown): NumericStatistics {
  if (!Array.isArray(data) || data.length === 0) {
    throw new Error("Statistics only available for non-empty numeric lists");
  }
  const values: number[] = [];
  for (const item of data) {
    if (typeof item !== "number" || !Number.isFinite(item)) {
      throw new Error("Statistics only available for non-empty numeric lists");
    }
    values.push(item);
  }

  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  const median = sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
  const sum = values.reduce((total, value) => total + value, 0);

  return {
    count: values.length,
    mean: sum / values.length,
    median,
    min: sorted[0],
    max: sorted[sorted.length - 1],
  };
}
