import { describe, expect, it } from "vitest";
import { createDataAnalysisTool } from "../../src/tools/data-analysis.js";
import { createTimeTool } from "../../src/tools/time.js";

describe("createDataAnalysisTool", () => {
  const tool = createDataAnalysisTool();

  it("computes statistics for numeric lists", () => {
    expect(tool.execute({ operation: "statistics", data: [3, 1, 2, 10] }, {})).toEqual({
      count: 4,
      mean: 4,
      median: 2.5,
      min: 1,
      max: 10,
    });
  });

  it("summarizes text and lists", () => {
    expect(tool.execute({ operation: "summarize", data: "one two\nthree" }, {})).toBe(
      "Text summary: 3 words, 13 characters, 2 lines"
    );
    expect(tool.execute({ operation: "summarize", data: ["a", "b"] }, {})).toBe("List summary: 2 items");
    expect(tool.execute({ operation: "summarize", data: {} }, {})).toBe("Data type: object");
  });

  it("refuses statistics over non-numeric data", () => {
    expect(() => tool.execute({ operation: "statistics", data: [1, "two"] }, {})).toThrow(
      "Statistics only available for non-empty numeric lists"
    );
    expect(() => tool.execute({ operation: "statistics", data: [] }, {})).toThrow(
      "Statistics only available for non-empty numeric lists"
    );
  });
});

describe("createTimeTool", () => {
  it("reports the clock as ISO-8601", () => {
    const tool = createTimeTool(() => new Date("2024-05-01T12:00:00.000Z"));
    expect(tool.execute({}, {})).toBe("2024-05-01T12:00:00.000Z");
  });
});
