import type { ToolAction } from "../policy/types.js";
import type { ToolArgs } from "../tools/types.js";

export const STOP_MARKER = "NO FURTHER IMPROVEMENT";
export const FINAL_ANSWER_MARKER = "FINAL ANSWER:";
export const REPLAN_MARKER = "REPLAN:";

export type ReActDecision =
  | { kind: "action"; thought: string; action: ToolAction }
  | { kind: "final"; thought?: string; answer: string };

function firstLine(text: string): string {
  return text.split(/\r?\n/).find((line) => line.trim() !== "")?.trim() ?? "";
}

function startsWithMarker(line: string, marker: string): boolean {
  return line.toUpperCase().startsWith(marker);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** True when the first non-blank line of a reflection opens with the stop marker. */
export function hasStopMarker(reflection: string): boolean {
  return startsWithMarker(firstLine(reflection), STOP_MARKER);
}

export function isReplanSignal(result: string): boolean {
  return startsWithMarker(result.trim(), REPLAN_MARKER);
}

interface JsonSpan {
  start: number;
  end: number;
}

function findBalancedSpan(text: string, from: number): JsonSpan | undefined {
  const stack: string[] = [];
  let start = -1;
  let inString = false;
  let escape = false;

  for (let index = from; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (escape) {
        escape = false;
        continue;
      }
      if (char === "\\") {
        escape = true;
        continue;
      }
      if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      if (stack.length > 0) {
        inString = true;
      }
      continue;
    }

    if (char === "{" || char === "[") {
      if (stack.length === 0) {
        start = index;
      }
      stack.push(char === "{" ? "}" : "]");
      continue;
    }

    if (char === "}" || char === "]") {
      if (stack.length === 0) {
        continue;
      }
      if (stack[stack.length - 1] !== char) {
        stack.length = 0;
        start = -1;
        continue;
      }
      stack.pop();
      if (stack.length === 0 && start !== -1) {
        return { start, end: index + 1 };
      }
    }
  }
  return undefined;
}

/**
 * Returns the first balanced JSON object or array embedded in `text`, ignoring
 * brackets inside string literals.
 */
export function extractFirstJson(text: string): string | undefined {
  const span = findBalancedSpan(text, 0);
  return span && text.slice(span.start, span.end);
}

/**
 * Scans `text` for embedded JSON values and returns the first one `accept`
 * maps to a result. Bracketed prose that fails to parse is skipped.
 */
export function findEmbeddedJson<T>(text: string, accept: (value: unknown) => T | undefined): T | undefined {
  let from = 0;
  while (from < text.length) {
    const span = findBalancedSpan(text, from);
    if (!span) {
      return undefined;
    }
    let value: unknown;
    try {
      value = JSON.parse(text.slice(span.start, span.end));
    } catch {
      // Not JSON; look again from inside the brackets.
      from = span.start + 1;
      continue;
    }
    const result = accept(value);
    if (result !== undefined) {
      return result;
    }
    from = span.end;
  }
  return undefined;
}

export function parseEmbeddedJson(text: string): unknown {
  return findEmbeddedJson(text, (value) => value);
}

function toAction(value: unknown): ToolAction | undefined {
  if (!isRecord(value) || typeof value.tool !== "string" || value.tool.trim() === "") {
    return undefined;
  }
  const args: ToolArgs = isRecord(value.args) ? value.args : {};
  return { tool: value.tool.trim(), args };
}

function readReActJson(parsed: unknown): ReActDecision | undefined {
  if (!isRecord(parsed)) {
    return undefined;
  }
  const thought = typeof parsed.thought === "string" ? parsed.thought : undefined;
  if (parsed.final !== undefined && parsed.final !== null) {
    const answer = typeof parsed.final === "string" ? parsed.final : JSON.stringify(parsed.final);
    return { kind: "final", thought, answer };
  }
  const action = toAction(parsed.action);
  return action && { kind: "action", thought: thought ?? "", action };
}

/**
 * Reads one ReAct turn. Accepted shapes are a JSON action
 * (`{"thought", "action": {"tool", "args"}}`), a JSON final answer
 * (`{"thought", "final"}`), or text opening with `FINAL ANSWER:`. Anything
 * else is taken as the final answer verbatim.
 */
export function parseReActOutput(text: string): ReActDecision {
  const trimmed = text.trim();
  if (startsWithMarker(firstLine(trimmed), FINAL_ANSWER_MARKER)) {
    return { kind: "final", answer: trimmed.slice(FINAL_ANSWER_MARKER.length).trim() };
  }

  const decision = findEmbeddedJson(trimmed, readReActJson);
  if (decision) {
    return decision;
  }

  return { kind: "final", answer: trimmed };
}

/** A planning step answer that asks for a tool: `{"action": {"tool", "args"}}`. */
export function parseActionRequest(text: string): ToolAction | undefined {
  return findEmbeddedJson(text, (parsed) => (isRecord(parsed) ? toAction(parsed.action) : undefined));
}

const LIST_ITEM = /^\s*(?:\d+[.)]|[-*•])\s+(.+?)\s*$/;

/**
 * Reads a plan from a JSON array, a `{"steps": [...]}` object, or a numbered
 * or bulleted list. Plain lines count as steps when no list markers are found.
 */
export function parsePlanSteps(text: string): string[] {
  const list = findEmbeddedJson(text, (parsed): unknown[] | undefined =>
    Array.isArray(parsed) ? parsed : isRecord(parsed) && Array.isArray(parsed.steps) ? parsed.steps : undefined
  );
  if (list) {
    return list.map(stepText).filter((step): step is string => step !== undefined);
  }

  const lines = text.split(/\r?\n/);
  const items = lines
    .map((line) => LIST_ITEM.exec(line)?.[1])
    .filter((item): item is string => item !== undefined && item !== "");
  if (items.length > 0) {
    return items;
  }
  return lines.map((line) => line.trim()).filter((line) => line !== "");
}

function stepText(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value.trim() === "" ? undefined : value.trim();
  }
  if (isRecord(value)) {
    const description = value.description ?? value.step;
    return typeof description === "string" && description.trim() !== "" ? description.trim() : undefined;
  }
  return undefined;
}

export function formatObservation(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === undefined) {
    return "";
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}
