import { describe, expect, it } from "vitest";
import { Agent } from "../../src/agent/agent.js";
import { AgentRouter, DEFAULT_ROUTE, createDefaultRouter } from "../../src/agent/router.js";
import { ConfigError } from "../../src/errors.js";
import { createReflectionMachine } from "../../src/machines/reflection.js";

function fixedAgent(reply: string): Agent {
  return new Agent({ machine: createReflectionMachine({ maxReflections: 0 }), generator: async () => reply });
}

describe("AgentRouter", () => {
  it("picks the route with the most keyword hits", () => {
    const router = new AgentRouter(fixedAgent("fallback"))
      .addRoute("math", ["sum", "Multiply"], fixedAgent("math"))
      .addRoute("files", ["file", "read", "sum"], fixedAgent("files"));

    expect(router.route("Read the file and sum it").route).toBe("files");
    expect(router.route("read the file and sum it").matched).toEqual(["file", "read", "sum"]);
    expect(router.route("please MULTIPLY these").route).toBe("math");
    expect(router.listRoutes()).toEqual(["math", "files", DEFAULT_ROUTE]);
  });

  it("breaks ties by registration order", () => {
    const router = new AgentRouter(fixedAgent("fallback"))
      .addRoute("first", ["alpha"], fixedAgent("1"))
      .addRoute("second", ["beta"], fixedAgent("2"));

    expect(router.route("beta alpha").route).toBe("first");
  });

  it("falls back to the default agent", async () => {
    const router = new AgentRouter(fixedAgent("fallback")).addRoute("math", ["sum"], fixedAgent("math"));

    const result = await router.process("tell me a story");

    expect(result.route).toBe(DEFAULT_ROUTE);
    expect(result.output).toBe("fallback");
  });

  it("validates routes", () => {
    const router = new AgentRouter(fixedAgent("fallback")).addRoute("math", ["sum"], fixedAgent("math"));

    expect(() => router.addRoute(" ", ["x"], fixedAgent("x"))).toThrow("Route name must be a non-empty string");
    expect(() => router.addRoute("math", ["x"], fixedAgent("x"))).toThrow('Route "math" is already defined');
    expect(() => router.addRoute(DEFAULT_ROUTE, ["x"], fixedAgent("x"))).toThrow(ConfigError);
    expect(() => router.addRoute("empty", [" "], fixedAgent("x"))).toThrow('Route "empty" needs at least one keyword');
  });
});

describe("createDefaultRouter", () => {
  it("routes tool work, planning and everything else", async () => {
    const router = createDefaultRouter({ generator: async () => "FINAL ANSWER: done" });

    expect(router.route("Calculate 25 * 17").route).toBe("react");
    expect(router.route("Plan a project launch").route).toBe("planning");
    expect(router.route("Plan the search").route).toBe("react");
    expect(router.route("Write a poem about autumn").route).toBe(DEFAULT_ROUTE);

    const result = await router.process("Compute the sum");
    expect(result.route).toBe("react");
    expect(result.strategy).toBe("react");
    expect(result.output).toBe("done");
  });
});
