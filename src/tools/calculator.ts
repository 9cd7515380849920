import type { Tool, ToolRunContext } from "./types.js";

export type CalculatorArgs = {
  expression: string;
  variables?: Record<string, number>;
  precision?: number;
};

export interface CalculatorToolOptions {
  name?: string;
  description?: string;
  maxExpressionLength?: number;
  defaultPrecision?: number;
}

const DEFAULT_NAME = "calculator";
const DEFAULT_DESCRIPTION =
  "Perform mathematical calculations. Supports + - * / % ^ (or **), parentheses, pi, e and sqrt/abs/round/floor/ceil/min/max/log/exp/sin/cos/tan.";
const DEFAULT_MAX_LENGTH = 512;
const DEFAULT_PRECISION = 12;

const CONSTANTS: Readonly<Record<string, number>> = { pi: Math.PI, e: Math.E };

const FUNCTIONS: Readonly<Record<string, (...values: number[]) => number>> = {
  sqrt: Math.sqrt,
  abs: Math.abs,
  round: Math.round,
  floor: Math.floor,
  ceil: Math.ceil,
  min: Math.min,
  max: Math.max,
  log: Math.log,
  exp: Math.exp,
  sin: Math.sin,
  cos: Math.cos,
  tan: Math.tan,
};

export function createCalculatorTool(options: CalculatorToolOptions = {}): Tool<CalculatorArgs, number> {
  const maxExpressionLength = options.maxExpressionLength ?? DEFAULT_MAX_LENGTH;
  const defaultPrecision = options.defaultPrecision ?? DEFAULT_PRECISION;
  if (maxExpressionLength <= 0) {
    throw new Error("maxExpressionLength must be positive");
  }
  assertPrecision(defaultPrecision);

  return {
    name: options.name?.trim() || DEFAULT_NAME,
    description: options.description?.trim() || DEFAULT_DESCRIPTION,
    schema: {
      expression: { type: "string", description: "Arithmetic expression", required: true },
      variables: { type: "object", description: "Named numeric variables" },
      precision: { type: "integer", description: "Decimal places to round to (0-15)" },
    },
    execute(args: CalculatorArgs, _ctx: ToolRunContext): number {
      if (!args || typeof args.expression !== "string") {
        throw new Error("calculator requires an expression string");
      }
      const expression = args.expression.trim();
      if (expression.length === 0) {
        throw new Error("Expression cannot be empty");
      }
      if (expression.length > maxExpressionLength) {
        throw new Error(`Expression exceeds maximum length of ${maxExpressionLength} characters`);
      }
      const precision = args.precision ?? defaultPrecision;
      assertPrecision(precision);

      const value = evaluateExpression(expression, args.variables ?? {});
      return Number(value.toFixed(Math.floor(precision)));
    },
  };
}

export function evaluateExpression(expression: string, variables: Readonly<Record<string, number>> = {}): number {
  const parser = new ExpressionParser(tokenize(expression), variables);
  const value = parser.parse();
  if (!Number.isFinite(value)) {
    throw new Error("Expression evaluated to a non-finite value");
  }
  return value;
}

function assertPrecision(value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 15) {
    throw new Error("precision must be between 0 and 15");
  }
}

type Token =
  | { kind: "number"; value: number }
  | { kind: "name"; value: string }
  | { kind: "symbol"; value: string };

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  const pattern = /(\d+(?:\.\d*)?|\.\d+)|([A-Za-z_][A-Za-z0-9_]*)|(\*\*|[-+*/%^(),])/y;
  let index = 0;
  while (index < source.length) {
    const char = source.charAt(index);
    if (/\s/.test(char)) {
      index += 1;
      continue;
    }
    pattern.lastIndex = index;
    const match = pattern.exec(source);
    if (!match) {
      throw new Error(`Unsupported character in expression: ${char}`);
    }
    index = pattern.lastIndex;
    const [, numberLiteral, name, symbol] = match;
    if (numberLiteral !== undefined) {
      tokens.push({ kind: "number", value: Number(numberLiteral) });
    } else if (name !== undefined) {
      tokens.push({ kind: "name", value: name });
    } else if (symbol !== undefined) {
      tokens.push({ kind: "symbol", value: symbol === "**" ? "^" : symbol });
    }
  }
  return tokens;
}

/**
 * expression := term (("+" | "-") term)*
 * term       := unary (("*" | "/" | "%") unary)*
 * unary      := ("-" | "+") unary | power
 * power      := primary ("^" unary)?
 */
class ExpressionParser {
  private position = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly variables: Readonly<Record<string, number>>
  ) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw new Error("Expression cannot be empty");
    }
    const value = this.expression();
    const trailing = this.peek();
    if (trailing) {
      throw new Error(`Unexpected token "${tokenText(trailing)}"`);
    }
    return value;
  }

  private expression(): number {
    let value = this.term();
    for (let symbol = this.peekSymbol(); symbol === "+" || symbol === "-"; symbol = this.peekSymbol()) {
      this.position += 1;
      const right = this.term();
      value = symbol === "+" ? value + right : value - right;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    for (let symbol = this.peekSymbol(); symbol === "*" || symbol === "/" || symbol === "%"; symbol = this.peekSymbol()) {
      this.position += 1;
      const right = this.unary();
      if ((symbol === "/" || symbol === "%") && right === 0) {
        throw new Error("Division by zero");
      }
      value = symbol === "*" ? value * right : symbol === "/" ? value / right : value % right;
    }
    return value;
  }

  private unary(): number {
    const symbol = this.peekSymbol();
    if (symbol === "-" || symbol === "+") {
      this.position += 1;
      const operand = this.unary();
      return symbol === "-" ? -operand : operand;
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.peekSymbol() === "^") {
      this.position += 1;
      return base ** this.unary();
    }
    return base;
  }

  private primary(): number {
    const token = this.next();
    if (token.kind === "number") {
      return token.value;
    }
    if (token.kind === "name") {
      if (this.peekSymbol() === "(") {
        return this.call(token.value);
      }
      return this.resolveName(token.value);
    }
    if (token.value === "(") {
      const value = this.expression();
      this.expect(")");
      return value;
    }
    throw new Error(`Unexpected token "${token.value}"`);
  }

  private call(name: string): number {
    const fn = FUNCTIONS[name];
    if (!fn) {
      throw new Error(`Unknown function "${name}"`);
    }
    this.expect("(");
    const args: number[] = [];
    if (this.peekSymbol() !== ")") {
      args.push(this.expression());
      while (this.peekSymbol() === ",") {
        this.position += 1;
        args.push(this.expression());
      }
    }
    this.expect(")");
    return fn(...args);
  }

  private resolveName(name: string): number {
    if (Object.prototype.hasOwnProperty.call(this.variables, name)) {
      const value = this.variables[name];
      if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new Error(`Variable "${name}" must be a finite number`);
      }
      return value;
    }
    const constant = CONSTANTS[name];
    if (constant !== undefined) {
      return constant;
    }
    throw new Error(`Variable "${name}" is not defined`);
  }

  private expect(symbol: string): void {
    const token = this.peek();
    if (!token) {
      throw new Error(`Expected "${symbol}" but found end of expression`);
    }
    if (token.kind !== "symbol" || token.value !== symbol) {
      throw new Error(`Expected "${symbol}" but found "${tokenText(token)}"`);
    }
    this.position += 1;
  }

  private next(): Token {
    const token = this.tokens[this.position];
    if (!token) {
      throw new Error("Unexpected end of expression");
    }
    this.position += 1;
    return token;
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private peekSymbol(): string | undefined {
    const token = this.peek();
    return token?.kind === "symbol" ? token.value : undefined;
  }
}

function tokenText(token: Token): string {
  return String(token.value);
}
