/**
 * Arithmetic expression evaluator for the calculate tool.
 *
 * Grammar (no names beyond the tables below, no attribute access, no strings):
 *
 *   expr     := term (("+" | "-") term)*
 *   term     := unary (("*" | "/" | "%") unary)*
 *   unary    := ("+" | "-") unary | power
 *   power    := primary (("^" | "**") unary)?        right-associative
 *   primary  := NUMBER | NAME | NAME "(" args ")" | "(" expr ")"
 *
 * `-2 ^ 2` is -4 and `2 ^ 3 ^ 2` is 512. `%` takes the sign of the divisor.
 */

export const MAX_EXPRESSION_LENGTH = 1000;
export const MAX_EXPRESSION_DEPTH = 100;

/** The expression is not in the grammar (bad character, name, arity, shape). */
export class ExpressionSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExpressionSyntaxError";
  }
}

/** The expression parsed but has no finite value (division by zero, overflow, domain). */
export class ExpressionMathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExpressionMathError";
  }
}

// ── Tokens ──────────────────────────────────────

type Token =
  | { kind: "number"; value: number; pos: number }
  | { kind: "name"; value: string; pos: number }
  | { kind: "op"; value: string; pos: number }
  | { kind: "end"; pos: number };

const NUMBER_RE = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*/;
const SINGLE_OPS = new Set(["+", "-", "*", "/", "%", "^", "(", ")", ","]);

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source.charAt(pos);
    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    const rest = source.slice(pos);
    const number = NUMBER_RE.exec(rest);
    if (number) {
      tokens.push({ kind: "number", value: Number(number[0]), pos });
      pos += number[0].length;
      continue;
    }

    const name = NAME_RE.exec(rest);
    if (name) {
      tokens.push({ kind: "name", value: name[0], pos });
      pos += name[0].length;
      continue;
    }

    if (rest.startsWith("**")) {
      tokens.push({ kind: "op", value: "**", pos });
      pos += 2;
      continue;
    }

    if (SINGLE_OPS.has(ch)) {
      tokens.push({ kind: "op", value: ch, pos });
      pos++;
      continue;
    }

    throw new ExpressionSyntaxError(`unexpected character '${ch}' at position ${pos}`);
  }

  tokens.push({ kind: "end", pos });
  return tokens;
}

// ── Names ───────────────────────────────────────

const CONSTANTS: Record<string, number> = {
  pi: Math.PI,
  e: Math.E,
  tau: 2 * Math.PI,
};

interface MathFunction {
  min: number;
  max: number;
  apply: (...args: number[]) => number;
}

function unary(fn: (x: number) => number): MathFunction {
  return { min: 1, max: 1, apply: (x = NaN) => fn(x) };
}

function roundTo(x: number, digits = 0): number {
  if (!Number.isInteger(digits)) {
    throw new ExpressionSyntaxError("round() digits must be an integer");
  }
  const factor = 10 ** digits;
  return Math.round(x * factor) / factor;
}

const FUNCTIONS: Record<string, MathFunction> = {
  sqrt: unary(Math.sqrt),
  abs: unary(Math.abs),
  sin: unary(Math.sin),
  cos: unary(Math.cos),
  tan: unary(Math.tan),
  asin: unary(Math.asin),
  acos: unary(Math.acos),
  atan: unary(Math.atan),
  exp: unary(Math.exp),
  ln: unary(Math.log),
  log10: unary(Math.log10),
  log2: unary(Math.log2),
  floor: unary(Math.floor),
  ceil: unary(Math.ceil),
  // log(x) is natural, log(x, base) uses the base
  log: {
    min: 1,
    max: 2,
    apply: (x = NaN, base?: number) => (base === undefined ? Math.log(x) : Math.log(x) / Math.log(base)),
  },
  round: { min: 1, max: 2, apply: (x = NaN, digits?: number) => roundTo(x, digits) },
  min: { min: 1, max: Infinity, apply: (...xs) => Math.min(...xs) },
  max: { min: 1, max: Infinity, apply: (...xs) => Math.max(...xs) },
  pow: { min: 2, max: 2, apply: (x = NaN, y = NaN) => x ** y },
  hypot: { min: 1, max: Infinity, apply: (...xs) => Math.hypot(...xs) },
};

export const KNOWN_CONSTANTS = Object.keys(CONSTANTS);
export const KNOWN_FUNCTIONS = Object.keys(FUNCTIONS);

function lookupOwn<T>(table: Record<string, T>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

// ── Parser ──────────────────────────────────────

class Parser {
  private index = 0;
  private depth = 0;

  constructor(private tokens: Token[]) {}

  parse(): number {
    const value = this.expr();
    const token = this.peek();
    if (token.kind !== "end") {
      throw new ExpressionSyntaxError(`unexpected ${describe(token)} at position ${token.pos}`);
    }
    return value;
  }

  private peek(): Token {
    return this.tokens[this.index] ?? { kind: "end", pos: 0 };
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== "end") this.index++;
    return token;
  }

  private isOp(...ops: string[]): boolean {
    const token = this.peek();
    return token.kind === "op" && ops.includes(token.value);
  }

  private expect(op: string): void {
    const token = this.next();
    if (token.kind !== "op" || token.value !== op) {
      throw new ExpressionSyntaxError(`expected '${op}' but found ${describe(token)} at position ${token.pos}`);
    }
  }

  private enter(): void {
    this.depth++;
    if (this.depth > MAX_EXPRESSION_DEPTH) {
      throw new ExpressionSyntaxError(`expression nests deeper than ${MAX_EXPRESSION_DEPTH} levels`);
    }
  }

  private leave(): void {
    this.depth--;
  }

  private expr(): number {
    let value = this.term();
    while (this.isOp("+", "-")) {
      const op = this.next();
      const right = this.term();
      value = op.kind === "op" && op.value === "-" ? value - right : value + right;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    while (this.isOp("*", "/", "%")) {
      const op = this.next();
      const right = this.unary();
      const symbol = op.kind === "op" ? op.value : "*";
      if (symbol === "*") {
        value *= right;
      } else if (right === 0) {
        throw new ExpressionMathError(symbol === "/" ? "division by zero" : "modulo by zero");
      } else if (symbol === "/") {
        value /= right;
      } else {
        value = value - right * Math.floor(value / right);
      }
    }
    return value;
  }

  private unary(): number {
    if (this.isOp("+", "-")) {
      const op = this.next();
      this.enter();
      const operand = this.unary();
      this.leave();
      return op.kind === "op" && op.value === "-" ? -operand : operand;
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.isOp("^", "**")) {
      this.next();
      this.enter();
      const exponent = this.unary();
      this.leave();
      return base ** exponent;
    }
    return base;
  }

  private primary(): number {
    const token = this.next();

    if (token.kind === "number") {
      return token.value;
    }

    if (token.kind === "op" && token.value === "(") {
      this.enter();
      const value = this.expr();
      this.expect(")");
      this.leave();
      return value;
    }

    if (token.kind === "name") {
      return this.isOp("(") ? this.call(token.value) : this.constant(token.value);
    }

    throw new ExpressionSyntaxError(
      token.kind === "end"
        ? "unexpected end of expression"
        : `unexpected ${describe(token)} at position ${token.pos}`,
    );
  }

  private constant(name: string): number {
    const value = lookupOwn(CONSTANTS, name);
    if (value !== undefined) return value;
    if (lookupOwn(FUNCTIONS, name)) {
      throw new ExpressionSyntaxError(`function '${name}' must be called with arguments`);
    }
    throw new ExpressionSyntaxError(`unknown name '${name}'`);
  }

  private call(name: string): number {
    const fn = lookupOwn(FUNCTIONS, name);
    if (!fn) {
      throw new ExpressionSyntaxError(
        lookupOwn(CONSTANTS, name) !== undefined
          ? `'${name}' is a constant, not a function`
          : `unknown function '${name}'`,
      );
    }

    this.expect("(");
    this.enter();
    const args: number[] = [];
    if (!this.isOp(")")) {
      args.push(this.expr());
      while (this.isOp(",")) {
        this.next();
        args.push(this.expr());
      }
    }
    this.expect(")");
    this.leave();

    if (args.length < fn.min || args.length > fn.max) {
      const expected = fn.max === Infinity
        ? `at least ${fn.min}`
        : fn.min === fn.max ? `${fn.min}` : `${fn.min} or ${fn.max}`;
      throw new ExpressionSyntaxError(
        `${name}() takes ${expected} argument${fn.max === 1 ? "" : "s"}, got ${args.length}`,
      );
    }

    return fn.apply(...args);
  }
}

function describe(token: Token): string {
  switch (token.kind) {
    case "number":
      return `number ${token.value}`;
    case "name":
      return `name '${token.value}'`;
    case "op":
      return `'${token.value}'`;
    case "end":
      return "end of expression";
  }
}

/**
 * Evaluate an arithmetic expression.
 *
 * @throws ExpressionSyntaxError when the text is outside the grammar
 * @throws ExpressionMathError when the value is undefined or not finite
 */
export function evaluateExpression(source: string): number {
  if (source.length > MAX_EXPRESSION_LENGTH) {
    throw new ExpressionSyntaxError(
      `expression is longer than ${MAX_EXPRESSION_LENGTH} characters`,
    );
  }
  if (source.trim() === "") {
    throw new ExpressionSyntaxError("expression is empty");
  }

  const value = new Parser(tokenize(source)).parse();
  if (!Number.isFinite(value)) {
    throw new ExpressionMathError(`result is not a finite number (${value})`);
  }
  // -0 reads as 0 everywhere it is shown
  return Object.is(value, -0) ? 0 : value;
}
