import type { z } from "zod";
import type { ToolArgs } from "../tools/types.js";
import { allow, reject, rewrite, type Policy, type PolicyDecision, type ToolAction } from "./types.js";

export const DEFAULT_BLOCKED_PATTERNS: readonly RegExp[] = [/\brm\s+-rf\b/i, /\bdrop\s+table\b/i];

export interface SafetyPolicyOptions {
  name?: string;
  blockedTools?: Iterable<string>;
  /** Tested against every string argument, nested values included. */
  blockedPatterns?: readonly RegExp[];
}

/** Rejects blocked tools and actions whose string arguments match a blocked pattern. */
export class SafetyPolicy implements Policy {
  readonly name: string;
  private readonly blockedTools: Set<string>;
  private readonly blockedPatterns: readonly RegExp[];

  constructor(options: SafetyPolicyOptions = {}) {
    this.name = options.name ?? "safety";
    this.blockedTools = new Set(options.blockedTools ?? []);
    this.blockedPatterns = options.blockedPatterns ?? DEFAULT_BLOCKED_PATTERNS;
  }

  validateAction(action: ToolAction): PolicyDecision {
    if (this.blockedTools.has(action.tool)) {
      return reject(`Tool "${action.tool}" is blocked`);
    }
    for (const [path, value] of collectStrings(action.args)) {
      const pattern = this.blockedPatterns.find((candidate) => matches(candidate, value));
      if (pattern) {
        return reject(`Argument "${path}" matches blocked pattern ${pattern}`);
      }
    }
    return allow();
  }
}

export interface ContentFilterPolicyOptions {
  name?: string;
  blockedTerms?: readonly string[];
  replacement?: string;
  /** Responses longer than this are cut and suffixed with "...". */
  maxLength?: number;
}

/** Redacts blocked terms from final responses and caps their length. */
export class ContentFilterPolicy implements Policy {
  readonly name: string;
  private readonly patterns: RegExp[];
  private readonly replacement: string;
  private readonly maxLength?: number;

  constructor(options: ContentFilterPolicyOptions = {}) {
    this.name = options.name ?? "content-filter";
    this.patterns = (options.blockedTerms ?? [])
      .filter((term) => term.trim() !== "")
      .map((term) => new RegExp(escapeRegExp(term), "gi"));
    this.replacement = options.replacement ?? "[REDACTED]";
    if (options.maxLength !== undefined && (!Number.isInteger(options.maxLength) || options.maxLength < 1)) {
      throw new Error("maxLength must be a positive integer");
    }
    this.maxLength = options.maxLength;
  }

  filterResponse(response: string): string {
    let filtered = response;
    for (const pattern of this.patterns) {
      filtered = filtered.replace(pattern, this.replacement);
    }
    if (this.maxLength !== undefined && filtered.length > this.maxLength) {
      filtered = `${filtered.slice(0, this.maxLength)}...`;
    }
    return filtered;
  }
}

/** Only the listed tools may run. */
export class AllowListPolicy implements Policy {
  readonly name: string;
  private readonly allowed: Set<string>;

  constructor(tools: Iterable<string>, name = "allow-list") {
    this.name = name;
    this.allowed = new Set(tools);
  }

  validateAction(action: ToolAction): PolicyDecision {
    return this.allowed.has(action.tool)
      ? allow()
      : reject(`Tool "${action.tool}" is not permitted by policy`);
  }
}

export type ToolArgsSchema = z.ZodType<ToolArgs, z.ZodTypeDef, unknown>;

/**
 * Validates arguments of the listed tools against zod schemas. Valid actions
 * are rewritten to the parsed value, so defaults and coercions apply.
 */
export class SchemaPolicy implements Policy {
  readonly name: string;
  private readonly schemas: Map<string, ToolArgsSchema>;

  constructor(schemas: Record<string, ToolArgsSchema>, name = "schema") {
    this.name = name;
    this.schemas = new Map(Object.entries(schemas));
  }

  validateAction(action: ToolAction): PolicyDecision {
    const schema = this.schemas.get(action.tool);
    if (!schema) {
      return allow();
    }
    const parsed = schema.safeParse(action.args);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      return reject(`Tool "${action.tool}" input failed validation: ${issues}`);
    }
    return rewrite(parsed.data);
  }
}

function collectStrings(value: unknown, path = ""): Array<[string, string]> {
  if (typeof value === "string") {
    return [[path || "(root)", value]];
  }
  if (Array.isArray(value)) {
    return value.flatMap((item, index) => collectStrings(item, `${path}[${index}]`));
  }
  if (value && typeof value === "object") {
    return Object.entries(value).flatMap(([key, item]) =>
      collectStrings(item, path ? `${path}.${key}` : key)
    );
  }
  return [];
}

function matches(pattern: RegExp, value: string): boolean {
  pattern.lastIndex = 0;
  return pattern.test(value);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
