import { ConfigError } from "../errors.js";
import { tokenizeTerms } from "../memory/similarity.js";
import type { Agent } from "./agent.js";
import { AgentFactory, type AgentDependencies } from "./factory.js";
import type { ProcessOptions, ProcessResult } from "./types.js";

export interface AgentRoute {
  name: string;
  keywords: readonly string[];
  agent: Agent;
}

export interface RouteMatch {
  route: string;
  agent: Agent;
  /** Input terms that matched the route's keywords. */
  matched: string[];
}

export interface RoutedResult extends ProcessResult {
  route: string;
}

export const DEFAULT_ROUTE = "default";

/**
 * Sends each request to the agent whose keywords it mentions most. Ties go to
 * the route registered first; no match goes to the default agent.
 */
export class AgentRouter {
  private readonly routes: AgentRoute[] = [];

  constructor(private readonly fallback: Agent) {}

  addRoute(name: string, keywords: Iterable<string>, agent: Agent): this {
    if (!name.trim()) {
      throw new ConfigError("Route name must be a non-empty string");
    }
    if (name === DEFAULT_ROUTE || this.routes.some((route) => route.name === name)) {
      throw new ConfigError(`Route "${name}" is already defined`);
    }
    const normalized = [...new Set([...keywords].map((keyword) => keyword.trim().toLowerCase()))].filter(Boolean);
    if (normalized.length === 0) {
      throw new ConfigError(`Route "${name}" needs at least one keyword`);
    }
    this.routes.push({ name, keywords: normalized, agent });
    return this;
  }

  listRoutes(): string[] {
    return [...this.routes.map((route) => route.name), DEFAULT_ROUTE];
  }

  route(input: string): RouteMatch {
    const terms = tokenizeTerms(input);
    let best: RouteMatch | undefined;
    for (const route of this.routes) {
      const matched = route.keywords.filter((keyword) => terms.has(keyword));
      if (matched.length > 0 && (!best || matched.length > best.matched.length)) {
        best = { route: route.name, agent: route.agent, matched };
      }
    }
    return best ?? { route: DEFAULT_ROUTE, agent: this.fallback, matched: [] };
  }

  async process(input: string, options?: ProcessOptions): Promise<RoutedResult> {
    const match = this.route(input);
    const result = await match.agent.process(input, options);
    return { ...result, route: match.route };
  }
}

export const DEFAULT_ROUTE_KEYWORDS = {
  react: [
    "calculate",
    "calculation",
    "compute",
    "math",
    "sum",
    "multiply",
    "divide",
    "file",
    "files",
    "read",
    "fetch",
    "url",
    "search",
    "time",
    "date",
  ],
  planning: ["plan", "planning", "steps", "organize", "project", "schedule", "roadmap", "milestones"],
} as const;

/** ReAct for tool work, Planning for multi-step goals, Reflection for everything else. */
export function createDefaultRouter(dependencies: AgentDependencies): AgentRouter {
  const react = AgentFactory.fromConfig(
    { strategy: "react", tools: ["calculator", "filesystem", "web", "time"] },
    dependencies
  );
  const planning = AgentFactory.fromConfig({ strategy: "planning", tools: ["calculator", "time"] }, dependencies);
  const reflection = AgentFactory.fromConfig({ strategy: "reflection" }, dependencies);
  return new AgentRouter(reflection)
    .addRoute("react", DEFAULT_ROUTE_KEYWORDS.react, react)
    .addRoute("planning", DEFAULT_ROUTE_KEYWORDS.planning, planning);
}
