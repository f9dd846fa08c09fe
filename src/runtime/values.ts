import type { ValueType } from "../binary/module.js";
import type { FunctionInstance } from "./instance.js";

/**
 * A runtime value tagged with its type. i32 is kept as a signed 32-bit
 * number and i64 as a signed 64-bit bigint. Floats carry their IEEE bit
 * pattern (`bits`, unsigned) next to the decoded number: arithmetic reads
 * `value`, while sign operations, reinterpretation and memory traffic work
 * on `bits`, so NaN payloads and signaling NaNs survive them.
 * A `null` reference is the null reference of its type.
 */
export type Value =
  | { type: "i32"; value: number }
  | { type: "i64"; value: bigint }
  | { type: "f32"; value: number; bits: number }
  | { type: "f64"; value: number; bits: bigint }
  | { type: "funcref"; value: FunctionInstance | null }
  | { type: "externref"; value: unknown };

const scratch = new DataView(new ArrayBuffer(8));

export const F32_SIGN = 0x80000000;
export const F64_SIGN = 1n << 63n;
const F32_PAYLOAD = 0x7fffff;
const F64_PAYLOAD = (1n << 52n) - 1n;

export const i32 = (value: number): Value => ({ type: "i32", value: value | 0 });
export const i64 = (value: bigint): Value => ({ type: "i64", value: BigInt.asIntN(64, value) });

export const F32_CANONICAL_NAN = 0x7fc00000;
export const F64_CANONICAL_NAN = 0x7ff8000000000000n;

/** An f32 from a number, rounded to single precision. Any NaN becomes the canonical NaN. */
export function f32(value: number): Value {
  if (Number.isNaN(value)) return { type: "f32", value: NaN, bits: F32_CANONICAL_NAN };
  scratch.setFloat32(0, value);
  return { type: "f32", value: scratch.getFloat32(0), bits: scratch.getUint32(0) };
}

export function f64(value: number): Value {
  if (Number.isNaN(value)) return { type: "f64", value: NaN, bits: F64_CANONICAL_NAN };
  scratch.setFloat64(0, value);
  return { type: "f64", value, bits: scratch.getBigUint64(0) };
}

/** An f32 with exactly the given bit pattern. */
export function f32OfBits(bits: number): Value {
  const u = bits >>> 0;
  scratch.setUint32(0, u);
  return { type: "f32", value: scratch.getFloat32(0), bits: u };
}

/** An f64 with exactly the given bit pattern. */
export function f64OfBits(bits: bigint): Value {
  const u = BigInt.asUintN(64, bits);
  scratch.setBigUint64(0, u);
  return { type: "f64", value: scratch.getFloat64(0), bits: u };
}
export const funcref = (value: FunctionInstance | null): Value => ({ type: "funcref", value });
export const externref = (value: unknown): Value => ({ type: "externref", value: value ?? null });

export function defaultValue(type: ValueType): Value {
  switch (type) {
    case "i32": return i32(0);
    case "i64": return i64(0n);
    case "f32": return f32(0);
    case "f64": return f64(0);
    case "funcref": return funcref(null);
    case "externref": return externref(null);
  }
}

// Narrowing accessors. Validated code never hands them the wrong type, so a
// mismatch is an engine bug rather than a trap.

export function asI32(v: Value): number {
  if (v.type !== "i32") throw new TypeError(`expected i32, found ${v.type}`);
  return v.value;
}

export function asI64(v: Value): bigint {
  if (v.type !== "i64") throw new TypeError(`expected i64, found ${v.type}`);
  return v.value;
}

export function asF32(v: Value): number {
  if (v.type !== "f32") throw new TypeError(`expected f32, found ${v.type}`);
  return v.value;
}

export function asF64(v: Value): number {
  if (v.type !== "f64") throw new TypeError(`expected f64, found ${v.type}`);
  return v.value;
}

export function f32BitsOf(v: Value): number {
  if (v.type !== "f32") throw new TypeError(`expected f32, found ${v.type}`);
  return v.bits;
}

export function f64BitsOf(v: Value): bigint {
  if (v.type !== "f64") throw new TypeError(`expected f64, found ${v.type}`);
  return v.bits;
}

export function isNullRef(v: Value): boolean {
  return (v.type === "funcref" || v.type === "externref") && v.value === null;
}

function floatText(n: number): string {
  if (Number.isNaN(n)) return "nan";
  if (n === Infinity) return "inf";
  if (n === -Infinity) return "-inf";
  if (Object.is(n, -0)) return "-0";
  return String(n);
}

/** `nan` for the canonical payload, `nan:0x...` for any other; `-` when the sign bit is set. */
function nanText(negative: boolean, payload: bigint, canonical: bigint): string {
  const sign = negative ? "-" : "";
  return payload === canonical ? `${sign}nan` : `${sign}nan:0x${payload.toString(16)}`;
}

/** Rendering used by backtraces, the CLI and stop events, e.g. `i32:42`. */
export function formatValue(v: Value): string {
  switch (v.type) {
    case "i32":
    case "i64":
      return `${v.type}:${v.value}`;
    case "f32":
      if (!Number.isNaN(v.value)) return `f32:${floatText(v.value)}`;
      return `f32:${nanText((v.bits & F32_SIGN) !== 0, BigInt(v.bits & F32_PAYLOAD), 0x400000n)}`;
    case "f64":
      if (!Number.isNaN(v.value)) return `f64:${floatText(v.value)}`;
      return `f64:${nanText((v.bits & F64_SIGN) !== 0n, v.bits & F64_PAYLOAD, 0x8000000000000n)}`;
    case "funcref":
      return v.value === null ? "funcref:null" : `funcref:${v.value.name}`;
    case "externref":
      return v.value === null ? "externref:null" : `externref:${String(v.value)}`;
  }
}

/**
 * Parse a textual argument for a parameter of the given type.
 * Integers accept decimal and `0x` hex; floats accept `nan`, `inf` and `-inf`,
 * and `nan:0x...` for a NaN with a given payload.
 */
export function parseValue(text: string, type: ValueType): Value {
  const trimmed = text.trim();
  switch (type) {
    case "i32": {
      const big = parseInteger(trimmed);
      if (big === undefined) throw new Error(`invalid i32 literal '${text}'`);
      return i32(Number(BigInt.asIntN(32, big)));
    }
    case "i64": {
      const big = parseInteger(trimmed);
      if (big === undefined) throw new Error(`invalid i64 literal '${text}'`);
      return i64(big);
    }
    case "f32":
    case "f64": {
      const nan = parseNanPayload(trimmed, type);
      if (nan) return nan;
      const n = parseFloatLiteral(trimmed);
      if (n === undefined) throw new Error(`invalid ${type} literal '${text}'`);
      return type === "f32" ? f32(n) : f64(n);
    }
    case "funcref":
    case "externref":
      if (trimmed !== "null") throw new Error(`only 'null' can be given for ${type}`);
      return defaultValue(type);
  }
}

function parseInteger(text: string): bigint | undefined {
  if (!/^-?(0x[0-9a-f]+|\d+)$/i.test(text)) return undefined;
  return text.startsWith("-") ? -BigInt(text.slice(1)) : BigInt(text);
}

function parseNanPayload(text: string, type: "f32" | "f64"): Value | undefined {
  const match = /^(-?)nan:0x([0-9a-f]+)$/i.exec(text);
  if (!match) return undefined;
  const payload = BigInt(`0x${match[2]}`);
  const negative = match[1] === "-";
  if (type === "f32") {
    if (payload === 0n || payload > BigInt(F32_PAYLOAD)) throw new Error(`NaN payload out of range in '${text}'`);
    return f32OfBits((negative ? F32_SIGN : 0) | 0x7f800000 | Number(payload));
  }
  if (payload === 0n || payload > F64_PAYLOAD) throw new Error(`NaN payload out of range in '${text}'`);
  return f64OfBits((negative ? F64_SIGN : 0n) | 0x7ff0000000000000n | payload);
}

function parseFloatLiteral(text: string): number | undefined {
  switch (text) {
    case "nan": return NaN;
    case "inf": case "+inf": return Infinity;
    case "-inf": return -Infinity;
  }
  const n = Number(text);
  return text.length > 0 && !Number.isNaN(n) ? n : undefined;
}
