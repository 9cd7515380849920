#!/usr/bin/env node
/**
 * ReAct agent with the calculator tool, a policy and NDJSON tracing.
 * The "model" is a scripted stand-in; swap in any GenerateFn backed by a real LLM.
 */

import {
  AgentBuilder,
  AllowListPolicy,
  createCalculatorTool,
  createNdjsonTraceSink,
  serializeState,
  type GenerateFn,
} from "../src/index.js";

function scriptedModel(replies: string[]): GenerateFn {
  let turn = 0;
  return async () => replies[Math.min(turn++, replies.length - 1)] ?? "FINAL ANSWER: (no reply)";
}

async function main() {
  console.log("🧮 ReAct calculator agent");

  const agent = new AgentBuilder("react")
    .withGenerator(
      scriptedModel([
        '{"thought": "Multiply the two numbers", "action": {"tool": "calculator", "args": {"expression": "25 * 17"}}}',
        "FINAL ANSWER: 25 * 17 = 425",
      ])
    )
    .withTool(createCalculatorTool())
    .withPolicy(new AllowListPolicy(["calculator"]))
    .withMemory({ kind: "conversation", maxHistory: 20 })
    .withConfig({ id: "calculator", maxSteps: 4 })
    .onEvent(createNdjsonTraceSink({ writer: process.stderr }))
    .build();

  const result = await agent.process("What is 25 * 17?");

  console.log(`✅ ${result.status}: ${result.output}`);
  console.log("Trace:", result.trace.join(" → "));
  console.log("Tools used:", result.toolsUsed.join(", "));
  console.log("Saved state:", JSON.stringify(serializeState(result.state)).length, "bytes");
}

main().catch((error) => {
  console.error("❌ Example failed:", error);
  process.exitCode = 1;
});
