/**
 * Boolean filter expressions over a single event.
 *
 *   event.action == "changed" && event.change.field == "name"
 *   !(event.resource.resource_subtype == "milestone") || event.user == null
 *
 * Paths start at `event` and walk the event's own keys with `.`; inherited
 * members such as `constructor` read as absent. A missing last key reads as
 * `null`; stepping through `null` or a non-object is an evaluation error, and
 * any evaluation error means "does not match".
 */

import { SdkError } from "./errors.ts";
import { type AsanaEvent, type JsonValue } from "./types.ts";

export const ROOT_IDENTIFIER = "event";

// ── Tokens ───────────────────────────────────────────────────────────

type Token =
  | { readonly kind: "ident"; readonly text: string; readonly pos: number }
  | { readonly kind: "string"; readonly value: string; readonly pos: number }
  | { readonly kind: "number"; readonly value: number; readonly pos: number }
  | { readonly kind: "op"; readonly text: Operator; readonly pos: number }
  | { readonly kind: "eof"; readonly pos: number };

type Operator = "==" | "!=" | "&&" | "||" | "!" | "(" | ")" | ".";

const TWO_CHAR_OPS: readonly Operator[] = ["==", "!=", "&&", "||"];
const ONE_CHAR_OPS: readonly Operator[] = ["!", "(", ")", "."];

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  '"': '"',
  "'": "'",
  "\\": "\\",
};

function filterError(expr: string, message: string, pos: number): SdkError {
  return new SdkError(
    `Invalid filter at position ${pos}: ${message}`,
    "INVALID_FILTER",
    `Check the expression "${expr}". Paths start with "${ROOT_IDENTIFIER}."; operators are == != && || ! and parentheses.`,
  );
}

function tokenize(expr: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < expr.length) {
    const ch = expr.charAt(i);
    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }

    const two = expr.slice(i, i + 2);
    const twoOp = TWO_CHAR_OPS.find((op) => op === two);
    if (twoOp) {
      tokens.push({ kind: "op", text: twoOp, pos: i });
      i += 2;
      continue;
    }
    const oneOp = ONE_CHAR_OPS.find((op) => op === ch);
    if (oneOp) {
      tokens.push({ kind: "op", text: oneOp, pos: i });
      i += 1;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const start = i;
      let value = "";
      i += 1;
      for (;;) {
        if (i >= expr.length) throw filterError(expr, "unterminated string", start);
        const c = expr.charAt(i);
        if (c === ch) break;
        if (c === "\\") {
          const escaped = ESCAPES[expr.charAt(i + 1)];
          if (escaped === undefined) throw filterError(expr, "unknown escape sequence", i);
          value += escaped;
          i += 2;
          continue;
        }
        value += c;
        i += 1;
      }
      tokens.push({ kind: "string", value, pos: start });
      i += 1;
      continue;
    }

    const num = /^-?\d+(?:\.\d+)?/.exec(expr.slice(i));
    if (num) {
      tokens.push({ kind: "number", value: Number(num[0]), pos: i });
      i += num[0].length;
      continue;
    }

    const ident = /^[A-Za-z_][A-Za-z0-9_]*/.exec(expr.slice(i));
    if (ident) {
      tokens.push({ kind: "ident", text: ident[0], pos: i });
      i += ident[0].length;
      continue;
    }

    throw filterError(expr, `unexpected character "${ch}"`, i);
  }

  tokens.push({ kind: "eof", pos: expr.length });
  return tokens;
}

// ── AST and parser ───────────────────────────────────────────────────

type Node =
  | { readonly type: "literal"; readonly value: JsonValue }
  | { readonly type: "path"; readonly segments: readonly string[] }
  | { readonly type: "not"; readonly operand: Node }
  | { readonly type: "compare"; readonly op: "==" | "!="; readonly left: Node; readonly right: Node }
  | { readonly type: "logical"; readonly op: "&&" | "||"; readonly left: Node; readonly right: Node };

class Parser {
  private index = 0;

  constructor(
    private readonly expr: string,
    private readonly tokens: readonly Token[],
  ) {}

  parse(): Node {
    const node = this.parseOr();
    const rest = this.peek();
    if (rest.kind !== "eof") throw filterError(this.expr, `unexpected ${describe(rest)}`, rest.pos);
    return node;
  }

  private peek(): Token {
    return this.tokens[this.index] ?? { kind: "eof", pos: this.expr.length };
  }

  private take(): Token {
    const token = this.peek();
    if (token.kind !== "eof") this.index += 1;
    return token;
  }

  private isOp(op: Operator): boolean {
    const token = this.peek();
    return token.kind === "op" && token.text === op;
  }

  private parseOr(): Node {
    let left = this.parseAnd();
    while (this.isOp("||")) {
      this.take();
      left = { type: "logical", op: "||", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Node {
    let left = this.parseUnary();
    while (this.isOp("&&")) {
      this.take();
      left = { type: "logical", op: "&&", left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): Node {
    if (this.isOp("!")) {
      this.take();
      return { type: "not", operand: this.parseUnary() };
    }
    return this.parseComparison();
  }

  private parseComparison(): Node {
    const left = this.parsePrimary();
    const token = this.peek();
    if (token.kind === "op" && (token.text === "==" || token.text === "!=")) {
      this.take();
      return { type: "compare", op: token.text, left, right: this.parsePrimary() };
    }
    return left;
  }

  private parsePrimary(): Node {
    const token = this.take();
    switch (token.kind) {
      case "string":
      case "number":
        return { type: "literal", value: token.value };
      case "ident":
        return this.parseIdentifier(token.text, token.pos);
      case "op":
        if (token.text === "(") {
          const inner = this.parseOr();
          const close = this.take();
          if (close.kind !== "op" || close.text !== ")") {
            throw filterError(this.expr, `expected ")" but found ${describe(close)}`, close.pos);
          }
          return inner;
        }
        throw filterError(this.expr, `unexpected ${describe(token)}`, token.pos);
      case "eof":
        throw filterError(this.expr, "unexpected end of expression", token.pos);
    }
  }

  private parseIdentifier(name: string, pos: number): Node {
    if (name === "true") return { type: "literal", value: true };
    if (name === "false") return { type: "literal", value: false };
    if (name === "null") return { type: "literal", value: null };
    if (name !== ROOT_IDENTIFIER) {
      throw filterError(this.expr, `unknown identifier "${name}"`, pos);
    }
    const segments: string[] = [];
    while (this.isOp(".")) {
      this.take();
      const key = this.take();
      if (key.kind !== "ident") {
        throw filterError(this.expr, `expected a field name after "." but found ${describe(key)}`, key.pos);
      }
      segments.push(key.text);
    }
    return { type: "path", segments };
  }
}

function describe(token: Token): string {
  switch (token.kind) {
    case "eof":
      return "end of expression";
    case "ident":
      return `"${token.text}"`;
    case "op":
      return `"${token.text}"`;
    case "string":
      return "string literal";
    case "number":
      return "number literal";
  }
}

// ── Evaluation ───────────────────────────────────────────────────────

class EvaluationError extends Error {}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => {
      const other = b[i];
      return other !== undefined && jsonEquals(item, other);
    });
  }
  if (isJsonObject(a) && isJsonObject(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((k) => {
      const left = a[k];
      const right = b[k];
      return left !== undefined && right !== undefined && jsonEquals(left, right);
    });
  }
  return false;
}

function asBoolean(value: JsonValue, op: string): boolean {
  if (typeof value !== "boolean") throw new EvaluationError(`operand of ${op} is not a boolean`);
  return value;
}

function resolvePath(root: JsonValue, segments: readonly string[]): JsonValue {
  let current = root;
  for (const key of segments) {
    if (!isJsonObject(current)) {
      throw new EvaluationError(`cannot read "${key}" of ${current === null ? "null" : typeof current}`);
    }
    current = Object.hasOwn(current, key) ? (current[key] ?? null) : null;
  }
  return current;
}

function evaluate(node: Node, root: JsonValue): JsonValue {
  switch (node.type) {
    case "literal":
      return node.value;
    case "path":
      return resolvePath(root, node.segments);
    case "not":
      return !asBoolean(evaluate(node.operand, root), "!");
    case "compare": {
      const equal = jsonEquals(evaluate(node.left, root), evaluate(node.right, root));
      return node.op === "==" ? equal : !equal;
    }
    case "logical": {
      const left = asBoolean(evaluate(node.left, root), node.op);
      if (node.op === "&&" && !left) return false;
      if (node.op === "||" && left) return true;
      return asBoolean(evaluate(node.right, root), node.op);
    }
  }
}

// ── Public API ───────────────────────────────────────────────────────

/**
 * Converts a decoded value into a plain JSON tree: `undefined` members are
 * dropped, so absent fields and missing fields look the same to a path.
 */
export function toFieldTree(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map((item: unknown) => toFieldTree(item));
  if (typeof value === "object") {
    const out: { [key: string]: JsonValue } = {};
    for (const [k, v] of Object.entries(value)) {
      // A "__proto__" key must stay an own member.
      if (v !== undefined) {
        Object.defineProperty(out, k, { value: toFieldTree(v), enumerable: true, writable: true, configurable: true });
      }
    }
    return out;
  }
  return null;
}

export type FilterEvaluator = {
  readonly expression: string;
  /** True only when the expression evaluates to boolean `true`. */
  matches(event: AsanaEvent): boolean;
};

/** Parses `expr` up front; syntax errors throw INVALID_FILTER. */
export function compileFilter(expr: string): FilterEvaluator {
  if (!expr.trim()) throw filterError(expr, "expression is empty", 0);
  const ast = new Parser(expr, tokenize(expr)).parse();

  return {
    expression: expr,
    matches(event) {
      try {
        return evaluate(ast, toFieldTree(event)) === true;
      } catch (err) {
        if (err instanceof EvaluationError) return false;
        throw err;
      }
    },
  };
}

export function filterEvents(
  events: readonly AsanaEvent[],
  evaluator: FilterEvaluator,
): AsanaEvent[] {
  return events.filter((event) => evaluator.matches(event));
}
