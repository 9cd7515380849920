#!/usr/bin/env node
/**
 * Keyword routing across the three strategies, then a two-agent workflow that
 * drafts with Planning and polishes with Reflection.
 */

import {
  AgentFactory,
  AgentWorkflow,
  createDefaultRouter,
  createFromPreset,
  type GenerateFn,
} from "../src/index.js";

// Answers every prompt with a canned reply chosen by what the prompt asks for.
const cannedModel: GenerateFn = async (prompt) => {
  if (prompt.includes("Break the goal")) return '{"steps": ["List the audience", "Draft the outline"]}';
  if (prompt.includes("Carry out step 1")) return "Developers new to agents";
  if (prompt.includes("Carry out step 2")) return "Intro, strategies, tools, memory, policies";
  if (prompt.startsWith("Critique")) return "NO FURTHER IMPROVEMENT";
  if (prompt.startsWith("Rewrite")) return "Final outline: intro, strategies, tools, memory, policies";
  if (prompt.includes("Tools:")) return "FINAL ANSWER: 425";
  return `Draft: ${prompt}`;
};

async function routing() {
  console.log("🧭 Routing requests");
  const router = createDefaultRouter({ generator: cannedModel });
  for (const input of ["Calculate 25 * 17", "Plan a docs project", "Write a tagline"]) {
    const result = await router.process(input);
    console.log(`  [${result.route}] ${input} → ${result.output.split("\n")[0]}`);
  }
}

async function workflow() {
  console.log("🔗 Planner → editor workflow");
  const workflow = new AgentWorkflow()
    .registerAgent("planner", createFromPreset("project_planner", { generator: cannedModel }))
    .registerAgent(
      "editor",
      AgentFactory.fromConfig({ strategy: "reflection", maxReflections: 1 }, { generator: cannedModel })
    )
    .addWorkflow("outline", [
      { agent: "planner" },
      { agent: "editor", prompt: "Tidy this plan for {input}:\n{previous}" },
    ]);

  const result = await workflow.executeWorkflow("outline", "an agents tutorial");
  for (const step of result.steps) {
    console.log(`  ${step.agent} (${step.status}): ${step.output.split("\n")[0]}`);
  }
  console.log(`✅ ${result.status}: ${result.output}`);
}

async function main() {
  await routing();
  await workflow();
}

main().catch((error) => {
  console.error("❌ Example failed:", error);
  process.exitCode = 1;
});
