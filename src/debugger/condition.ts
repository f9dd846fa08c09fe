// Expression language of breakpoint conditions and watch expressions.
//
//   expr    := or
//   or      := and ("||" and)*
//   and     := compare ("&&" compare)*
//   compare := sum (("==" | "!=" | "<" | "<=" | ">" | ">=") sum)?
//   sum     := product (("+" | "-") product)*
//   product := unary (("*" | "/" | "%") unary)*
//   unary   := ("-" | "!") unary | primary
//   primary := INT | FLOAT | "local" N | "$" NAME | "global" N | "stack" N | "(" expr ")"
//
// `$NAME` is a named local of the current frame, or else a global known by
// that name (name section or export).
//
// Integers (i32, i64 and integer literals) evaluate as bigint and floats as
// number; mixing the two promotes to float. Comparisons and logic yield 0 or 1.

import { ConditionError } from "../errors/errors.js";
import type { Value } from "../runtime/values.js";

type TokenKind = "int" | "float" | "ident" | "name" | "op" | "lparen" | "rparen" | "eof";

interface Token {
  kind: TokenKind;
  text: string;
  /** 1-based column of the token's first character. */
  column: number;
}

export type BinaryOp = "+" | "-" | "*" | "/" | "%" | "==" | "!=" | "<" | "<=" | ">" | ">=" | "&&" | "||";

export type ConditionExpr =
  | { kind: "Int"; value: bigint }
  | { kind: "Float"; value: number }
  | { kind: "Local"; index: number; column: number }
  | { kind: "Named"; name: string; column: number }
  | { kind: "Global"; index: number; column: number }
  | { kind: "Stack"; depth: number; column: number }
  | { kind: "Unary"; op: "-" | "!"; operand: ConditionExpr }
  | { kind: "Binary"; op: BinaryOp; left: ConditionExpr; right: ConditionExpr; column: number };

/** Result of evaluating an expression. */
export type Scalar = { kind: "int"; value: bigint } | { kind: "float"; value: number };

/** Where the evaluator reads locals, globals and operands from. */
export interface EvalContext {
  local(index: number): Value | undefined;
  localIndex(name: string): number | undefined;
  global(index: number): Value | undefined;
  globalIndex(name: string): number | undefined;
  /** Operand `depth` slots below the top of the current frame's stack. */
  operand(depth: number): Value | undefined;
}

const OPERATORS = ["==", "!=", "<=", ">=", "&&", "||", "<", ">", "+", "-", "*", "/", "%", "!"];

// ============================================================
// Lexer
// ============================================================

class Lexer {
  private pos = 0;

  constructor(private readonly source: string) {}

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      while (this.pos < this.source.length && /\s/.test(this.source[this.pos])) this.pos++;
      if (this.pos >= this.source.length) break;
      tokens.push(this.next());
    }
    tokens.push({ kind: "eof", text: "", column: this.pos + 1 });
    return tokens;
  }

  private next(): Token {
    const start = this.pos;
    const ch = this.source[this.pos];
    const column = start + 1;

    if (/[0-9]/.test(ch)) {
      const match = /^(0x[0-9a-fA-F]+|\d+(\.\d+)?([eE][+-]?\d+)?)/.exec(this.source.slice(start));
      const text = match ? match[0] : ch;
      this.pos += text.length;
      const isFloat = !text.startsWith("0x") && /[.eE]/.test(text);
      return { kind: isFloat ? "float" : "int", text, column };
    }
    if (/[A-Za-z_]/.test(ch)) {
      const text = this.take(/[A-Za-z0-9_]/);
      return { kind: "ident", text, column };
    }
    if (ch === "$") {
      this.pos++;
      const text = this.take(/[A-Za-z0-9_.]/);
      if (text.length === 0) throw new ConditionError("expected a name after '$'", column);
      return { kind: "name", text, column };
    }
    if (ch === "(") {
      this.pos++;
      return { kind: "lparen", text: ch, column };
    }
    if (ch === ")") {
      this.pos++;
      return { kind: "rparen", text: ch, column };
    }
    for (const op of OPERATORS) {
      if (this.source.startsWith(op, start)) {
        this.pos += op.length;
        return { kind: "op", text: op, column };
      }
    }
    throw new ConditionError(`unexpected character '${ch}'`, column);
  }

  private take(pattern: RegExp): string {
    const start = this.pos;
    while (this.pos < this.source.length && pattern.test(this.source[this.pos])) this.pos++;
    return this.source.slice(start, this.pos);
  }
}

// ============================================================
// Parser
// ============================================================

const PRECEDENCE: Record<BinaryOp, number> = {
  "||": 1,
  "&&": 2,
  "==": 3, "!=": 3, "<": 3, "<=": 3, ">": 3, ">=": 3,
  "+": 4, "-": 4,
  "*": 5, "/": 5, "%": 5,
};

const BINARY_OPS: ReadonlySet<string> = new Set(Object.keys(PRECEDENCE));

function isBinaryOp(text: string): text is BinaryOp {
  return BINARY_OPS.has(text);
}

const INDEXED = /^(local|global|stack)(\d+)$/;

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): ConditionExpr {
    const expr = this.parseExpr(0);
    const tok = this.peek();
    if (tok.kind !== "eof") throw new ConditionError(`unexpected '${tok.text}'`, tok.column);
    return expr;
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private advance(): Token {
    const tok = this.tokens[this.pos];
    if (tok.kind !== "eof") this.pos++;
    return tok;
  }

  private parseExpr(minPrec: number): ConditionExpr {
    let left = this.parseUnary();
    for (;;) {
      const tok = this.peek();
      if (tok.kind !== "op" || !isBinaryOp(tok.text)) break;
      const op: BinaryOp = tok.text;
      const prec = PRECEDENCE[op];
      if (prec <= minPrec) break;
      this.advance();
      const right = this.parseExpr(prec);
      // Comparisons do not chain: `a < b < c` is rejected.
      if (prec === 3) {
        const next = this.peek();
        if (next.kind === "op" && isBinaryOp(next.text) && PRECEDENCE[next.text] === 3) {
          throw new ConditionError("comparisons cannot be chained", next.column);
        }
      }
      left = { kind: "Binary", op, left, right, column: tok.column };
    }
    return left;
  }

  private parseUnary(): ConditionExpr {
    const tok = this.peek();
    if (tok.kind === "op" && (tok.text === "-" || tok.text === "!")) {
      this.advance();
      return { kind: "Unary", op: tok.text, operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ConditionExpr {
    const tok = this.advance();
    switch (tok.kind) {
      case "int":
        return { kind: "Int", value: BigInt(tok.text) };
      case "float":
        return { kind: "Float", value: Number(tok.text) };
      case "name":
        return { kind: "Named", name: tok.text, column: tok.column };
      case "ident": {
        const match = INDEXED.exec(tok.text);
        if (!match) throw new ConditionError(`unknown identifier '${tok.text}'`, tok.column);
        const n = Number(match[2]);
        switch (match[1]) {
          case "local": return { kind: "Local", index: n, column: tok.column };
          case "global": return { kind: "Global", index: n, column: tok.column };
          default: return { kind: "Stack", depth: n, column: tok.column };
        }
      }
      case "lparen": {
        const inner = this.parseExpr(0);
        const close = this.advance();
        if (close.kind !== "rparen") throw new ConditionError("expected ')'", close.column);
        return inner;
      }
      case "eof":
        throw new ConditionError("unexpected end of expression", tok.column);
      default:
        throw new ConditionError(`unexpected '${tok.text}'`, tok.column);
    }
  }
}

export function parseCondition(source: string): ConditionExpr {
  const tokens = new Lexer(source).tokenize();
  return new Parser(tokens).parse();
}

// ============================================================
// Evaluation
// ============================================================

const TRUE: Scalar = { kind: "int", value: 1n };
const FALSE: Scalar = { kind: "int", value: 0n };

export function toScalar(v: Value): Scalar {
  switch (v.type) {
    case "i32": return { kind: "int", value: BigInt(v.value) };
    case "i64": return { kind: "int", value: v.value };
    case "f32":
    case "f64": return { kind: "float", value: v.value };
    // A reference is 0 when null and 1 otherwise.
    case "funcref":
    case "externref": return v.value === null ? FALSE : TRUE;
  }
}

export function isTruthy(s: Scalar): boolean {
  return s.kind === "int" ? s.value !== 0n : s.value !== 0 && !Number.isNaN(s.value);
}

function asFloat(s: Scalar): number {
  return s.kind === "float" ? s.value : Number(s.value);
}

function compare(op: BinaryOp, a: Scalar, b: Scalar): boolean {
  const [x, y]: [number | bigint, number | bigint] = a.kind === "int" && b.kind === "int"
    ? [a.value, b.value]
    : [asFloat(a), asFloat(b)];
  switch (op) {
    case "==": return x === y;
    case "!=": return x !== y;
    case "<": return x < y;
    case "<=": return x <= y;
    case ">": return x > y;
    default: return x >= y;
  }
}

function arithmetic(op: BinaryOp, a: Scalar, b: Scalar, column: number): Scalar {
  if (a.kind === "int" && b.kind === "int") {
    switch (op) {
      case "+": return { kind: "int", value: a.value + b.value };
      case "-": return { kind: "int", value: a.value - b.value };
      case "*": return { kind: "int", value: a.value * b.value };
      case "/":
      case "%":
        if (b.value === 0n) throw new ConditionError("division by zero", column);
        return { kind: "int", value: op === "/" ? a.value / b.value : a.value % b.value };
    }
  }
  const x = asFloat(a);
  const y = asFloat(b);
  switch (op) {
    case "+": return { kind: "float", value: x + y };
    case "-": return { kind: "float", value: x - y };
    case "*": return { kind: "float", value: x * y };
    case "/": return { kind: "float", value: x / y };
    default: return { kind: "float", value: x % y };
  }
}

export function evaluateCondition(expr: ConditionExpr, ctx: EvalContext): Scalar {
  const read = (value: Value | undefined, what: string, column: number): Scalar => {
    if (value === undefined) throw new ConditionError(`no ${what}`, column);
    return toScalar(value);
  };

  switch (expr.kind) {
    case "Int": return { kind: "int", value: expr.value };
    case "Float": return { kind: "float", value: expr.value };
    case "Local": return read(ctx.local(expr.index), `local ${expr.index}`, expr.column);
    case "Global": return read(ctx.global(expr.index), `global ${expr.index}`, expr.column);
    case "Stack": return read(ctx.operand(expr.depth), `operand at stack depth ${expr.depth}`, expr.column);
    case "Named": {
      const local = ctx.localIndex(expr.name);
      if (local !== undefined) return read(ctx.local(local), `local $${expr.name}`, expr.column);
      const global = ctx.globalIndex(expr.name);
      if (global !== undefined) return read(ctx.global(global), `global $${expr.name}`, expr.column);
      throw new ConditionError(`no local or global named $${expr.name}`, expr.column);
    }
    case "Unary": {
      const v = evaluateCondition(expr.operand, ctx);
      if (expr.op === "!") return isTruthy(v) ? FALSE : TRUE;
      return v.kind === "int" ? { kind: "int", value: -v.value } : { kind: "float", value: -v.value };
    }
    case "Binary": {
      if (expr.op === "&&" || expr.op === "||") {
        const left = isTruthy(evaluateCondition(expr.left, ctx));
        if (expr.op === "&&" && !left) return FALSE;
        if (expr.op === "||" && left) return TRUE;
        return isTruthy(evaluateCondition(expr.right, ctx)) ? TRUE : FALSE;
      }
      const a = evaluateCondition(expr.left, ctx);
      const b = evaluateCondition(expr.right, ctx);
      switch (expr.op) {
        case "==": case "!=": case "<": case "<=": case ">": case ">=":
          return compare(expr.op, a, b) ? TRUE : FALSE;
        default:
          return arithmetic(expr.op, a, b, expr.column);
      }
    }
  }
}

export function formatScalar(s: Scalar): string {
  if (s.kind === "int") return s.value.toString();
  if (Number.isNaN(s.value)) return "nan";
  if (!Number.isFinite(s.value)) return s.value > 0 ? "inf" : "-inf";
  return String(s.value);
}
