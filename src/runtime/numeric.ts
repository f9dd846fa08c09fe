import { isNumericOp, type NumericOp } from "../binary/opcodes.js";
import { Trap } from "../errors/errors.js";
import {
  asF32, asF64, asI32, asI64, f32, f32BitsOf, f32OfBits, F32_SIGN, f64, f64BitsOf, f64OfBits, F64_SIGN,
  i32, i64, type Value,
} from "./values.js";

// Semantics of every instruction of the "numeric" class, keyed by mnemonic.
// Integer arithmetic wraps (two's complement); traps are thrown as Trap and
// turned into a step outcome by the interpreter. Float arithmetic runs on the
// decoded numbers; abs, neg, copysign and the reinterpretations touch only bits.

export type NumericImpl =
  | { arity: 1; apply: (a: Value) => Value }
  | { arity: 2; apply: (a: Value, b: Value) => Value };

type Accessor<T> = (v: Value) => T;

function unary<A, R>(get: Accessor<A>, make: (r: R) => Value, f: (a: A) => R): NumericImpl {
  return { arity: 1, apply: a => make(f(get(a))) };
}

function binary<A, R>(get: Accessor<A>, make: (r: R) => Value, f: (a: A, b: A) => R): NumericImpl {
  return { arity: 2, apply: (a, b) => make(f(get(a), get(b))) };
}

const bool = (b: boolean): Value => i32(b ? 1 : 0);

const INT32_MIN = -0x80000000;
const INT64_MIN = -(2n ** 63n);
const TWO_63 = 2 ** 63;
const TWO_64 = 2 ** 64;

// ------------------------------------------------------------
// Integer helpers
// ------------------------------------------------------------

const u32 = (a: number): number => a >>> 0;
const u64 = (a: bigint): bigint => BigInt.asUintN(64, a);

function popcnt32(a: number): number {
  let v = a >>> 0;
  let count = 0;
  while (v !== 0) {
    v &= v - 1;
    count++;
  }
  return count;
}

function ctz32(a: number): number {
  return a === 0 ? 32 : 31 - Math.clz32(a & -a);
}

function rotl32(a: number, b: number): number {
  const k = b & 31;
  return k === 0 ? a : (a << k) | (a >>> (32 - k));
}

function rotr32(a: number, b: number): number {
  const k = b & 31;
  return k === 0 ? a : (a >>> k) | (a << (32 - k));
}

function clz64(a: bigint): bigint {
  const u = u64(a);
  return u === 0n ? 64n : BigInt(64 - u.toString(2).length);
}

function ctz64(a: bigint): bigint {
  const u = u64(a);
  if (u === 0n) return 64n;
  return BigInt((u & -u).toString(2).length - 1);
}

function popcnt64(a: bigint): bigint {
  let count = 0n;
  for (const digit of u64(a).toString(2)) if (digit === "1") count++;
  return count;
}

function rotl64(a: bigint, b: bigint): bigint {
  const u = u64(a);
  const k = b & 63n;
  return k === 0n ? u : (u << k) | (u >> (64n - k));
}

function rotr64(a: bigint, b: bigint): bigint {
  const u = u64(a);
  const k = b & 63n;
  return k === 0n ? u : (u >> k) | (u << (64n - k));
}

function divS32(a: number, b: number): number {
  if (b === 0) throw new Trap("DivideByZero");
  if (a === INT32_MIN && b === -1) throw new Trap("IntegerOverflow");
  return Math.trunc(a / b);
}

function divU32(a: number, b: number): number {
  if (b === 0) throw new Trap("DivideByZero");
  return Math.trunc(u32(a) / u32(b));
}

function remS32(a: number, b: number): number {
  if (b === 0) throw new Trap("DivideByZero");
  return a % b;
}

function remU32(a: number, b: number): number {
  if (b === 0) throw new Trap("DivideByZero");
  return u32(a) % u32(b);
}

function divS64(a: bigint, b: bigint): bigint {
  if (b === 0n) throw new Trap("DivideByZero");
  if (a === INT64_MIN && b === -1n) throw new Trap("IntegerOverflow");
  return a / b;
}

function divU64(a: bigint, b: bigint): bigint {
  if (b === 0n) throw new Trap("DivideByZero");
  return u64(a) / u64(b);
}

function remS64(a: bigint, b: bigint): bigint {
  if (b === 0n) throw new Trap("DivideByZero");
  return a % b;
}

function remU64(a: bigint, b: bigint): bigint {
  if (b === 0n) throw new Trap("DivideByZero");
  return u64(a) % u64(b);
}

// ------------------------------------------------------------
// Float helpers
// ------------------------------------------------------------

/** Round to nearest, ties to even. */
export function nearest(x: number): number {
  if (!Number.isFinite(x) || x === 0) return x;
  const frac = Math.abs(x - Math.trunc(x));
  const r = frac === 0.5 ? 2 * Math.round(x / 2) : Math.round(x);
  return r === 0 ? (x < 0 ? -0 : 0) : r;
}

/** i64 to f32 with a single rounding step (going through f64 would round twice). */
function bigIntToF32(n: bigint): number {
  const negative = n < 0n;
  let u = negative ? -n : n;
  const width = u.toString(2).length;
  if (width > 24) {
    const shift = BigInt(width - 24);
    const kept = u >> shift;
    const rest = u - (kept << shift);
    const half = 1n << (shift - 1n);
    const roundUp = rest > half || (rest === half && (kept & 1n) === 1n);
    u = (roundUp ? kept + 1n : kept) << shift;
  }
  const r = Math.fround(Number(u));
  return negative ? -r : r;
}

// ------------------------------------------------------------
// Float to integer conversions
// ------------------------------------------------------------

function truncChecked(x: number, min: number, maxExclusive: number): number {
  if (Number.isNaN(x)) throw new Trap("InvalidConversionToInteger");
  const t = Math.trunc(x);
  if (t < min || t >= maxExclusive) throw new Trap("IntegerOverflow");
  return t;
}

const truncS32 = (x: number): number => truncChecked(x, INT32_MIN, 0x80000000);
const truncU32 = (x: number): number => truncChecked(x, 0, 0x100000000);
const truncS64 = (x: number): bigint => BigInt(truncChecked(x, -TWO_63, TWO_63));
const truncU64 = (x: number): bigint => BigInt(truncChecked(x, 0, TWO_64));

function saturate(x: number, min: number, max: number): number {
  if (Number.isNaN(x)) return 0;
  return Math.min(Math.max(Math.trunc(x), min), max);
}

function saturateBig(x: number, min: bigint, max: bigint): bigint {
  if (Number.isNaN(x)) return 0n;
  if (x === Infinity) return max;
  if (x === -Infinity) return min;
  const t = BigInt(Math.trunc(x));
  return t < min ? min : t > max ? max : t;
}

// ------------------------------------------------------------
// Sign bit
// ------------------------------------------------------------

const f32Abs = (bits: number): number => bits & ~F32_SIGN;
const f32Neg = (bits: number): number => bits ^ F32_SIGN;
const f32CopySign = (a: number, b: number): number => (a & ~F32_SIGN) | (b & F32_SIGN);

const f64Abs = (bits: bigint): bigint => bits & ~F64_SIGN;
const f64Neg = (bits: bigint): bigint => bits ^ F64_SIGN;
const f64CopySign = (a: bigint, b: bigint): bigint => (a & ~F64_SIGN) | (b & F64_SIGN);

const identity = <T>(a: T): T => a;

// ------------------------------------------------------------
// Table
// ------------------------------------------------------------

export const NUMERIC_IMPLS: Readonly<Record<NumericOp, NumericImpl>> = {
  "i32.eqz": unary(asI32, bool, a => a === 0),
  "i32.eq": binary(asI32, bool, (a, b) => a === b),
  "i32.ne": binary(asI32, bool, (a, b) => a !== b),
  "i32.lt_s": binary(asI32, bool, (a, b) => a < b),
  "i32.lt_u": binary(asI32, bool, (a, b) => u32(a) < u32(b)),
  "i32.gt_s": binary(asI32, bool, (a, b) => a > b),
  "i32.gt_u": binary(asI32, bool, (a, b) => u32(a) > u32(b)),
  "i32.le_s": binary(asI32, bool, (a, b) => a <= b),
  "i32.le_u": binary(asI32, bool, (a, b) => u32(a) <= u32(b)),
  "i32.ge_s": binary(asI32, bool, (a, b) => a >= b),
  "i32.ge_u": binary(asI32, bool, (a, b) => u32(a) >= u32(b)),

  "i64.eqz": unary(asI64, bool, a => a === 0n),
  "i64.eq": binary(asI64, bool, (a, b) => a === b),
  "i64.ne": binary(asI64, bool, (a, b) => a !== b),
  "i64.lt_s": binary(asI64, bool, (a, b) => a < b),
  "i64.lt_u": binary(asI64, bool, (a, b) => u64(a) < u64(b)),
  "i64.gt_s": binary(asI64, bool, (a, b) => a > b),
  "i64.gt_u": binary(asI64, bool, (a, b) => u64(a) > u64(b)),
  "i64.le_s": binary(asI64, bool, (a, b) => a <= b),
  "i64.le_u": binary(asI64, bool, (a, b) => u64(a) <= u64(b)),
  "i64.ge_s": binary(asI64, bool, (a, b) => a >= b),
  "i64.ge_u": binary(asI64, bool, (a, b) => u64(a) >= u64(b)),

  "i32.clz": unary(asI32, i32, Math.clz32),
  "i32.ctz": unary(asI32, i32, ctz32),
  "i32.popcnt": unary(asI32, i32, popcnt32),
  "i32.add": binary(asI32, i32, (a, b) => a + b),
  "i32.sub": binary(asI32, i32, (a, b) => a - b),
  "i32.mul": binary(asI32, i32, Math.imul),
  "i32.div_s": binary(asI32, i32, divS32),
  "i32.div_u": binary(asI32, i32, divU32),
  "i32.rem_s": binary(asI32, i32, remS32),
  "i32.rem_u": binary(asI32, i32, remU32),
  "i32.and": binary(asI32, i32, (a, b) => a & b),
  "i32.or": binary(asI32, i32, (a, b) => a | b),
  "i32.xor": binary(asI32, i32, (a, b) => a ^ b),
  "i32.shl": binary(asI32, i32, (a, b) => a << (b & 31)),
  "i32.shr_s": binary(asI32, i32, (a, b) => a >> (b & 31)),
  "i32.shr_u": binary(asI32, i32, (a, b) => a >>> (b & 31)),
  "i32.rotl": binary(asI32, i32, rotl32),
  "i32.rotr": binary(asI32, i32, rotr32),

  "i64.clz": unary(asI64, i64, clz64),
  "i64.ctz": unary(asI64, i64, ctz64),
  "i64.popcnt": unary(asI64, i64, popcnt64),
  "i64.add": binary(asI64, i64, (a, b) => a + b),
  "i64.sub": binary(asI64, i64, (a, b) => a - b),
  "i64.mul": binary(asI64, i64, (a, b) => a * b),
  "i64.div_s": binary(asI64, i64, divS64),
  "i64.div_u": binary(asI64, i64, divU64),
  "i64.rem_s": binary(asI64, i64, remS64),
  "i64.rem_u": binary(asI64, i64, remU64),
  "i64.and": binary(asI64, i64, (a, b) => a & b),
  "i64.or": binary(asI64, i64, (a, b) => a | b),
  "i64.xor": binary(asI64, i64, (a, b) => a ^ b),
  "i64.shl": binary(asI64, i64, (a, b) => a << (b & 63n)),
  "i64.shr_s": binary(asI64, i64, (a, b) => a >> (b & 63n)),
  "i64.shr_u": binary(asI64, i64, (a, b) => u64(a) >> (b & 63n)),
  "i64.rotl": binary(asI64, i64, rotl64),
  "i64.rotr": binary(asI64, i64, rotr64),

  "f32.eq": binary(asF32, bool, (a, b) => a === b),
  "f32.ne": binary(asF32, bool, (a, b) => a !== b),
  "f32.lt": binary(asF32, bool, (a, b) => a < b),
  "f32.gt": binary(asF32, bool, (a, b) => a > b),
  "f32.le": binary(asF32, bool, (a, b) => a <= b),
  "f32.ge": binary(asF32, bool, (a, b) => a >= b),

  "f64.eq": binary(asF64, bool, (a, b) => a === b),
  "f64.ne": binary(asF64, bool, (a, b) => a !== b),
  "f64.lt": binary(asF64, bool, (a, b) => a < b),
  "f64.gt": binary(asF64, bool, (a, b) => a > b),
  "f64.le": binary(asF64, bool, (a, b) => a <= b),
  "f64.ge": binary(asF64, bool, (a, b) => a >= b),

  "f32.abs": unary(f32BitsOf, f32OfBits, f32Abs),
  "f32.neg": unary(f32BitsOf, f32OfBits, f32Neg),
  "f32.ceil": unary(asF32, f32, Math.ceil),
  "f32.floor": unary(asF32, f32, Math.floor),
  "f32.trunc": unary(asF32, f32, Math.trunc),
  "f32.nearest": unary(asF32, f32, nearest),
  "f32.sqrt": unary(asF32, f32, Math.sqrt),
  "f32.add": binary(asF32, f32, (a, b) => a + b),
  "f32.sub": binary(asF32, f32, (a, b) => a - b),
  "f32.mul": binary(asF32, f32, (a, b) => a * b),
  "f32.div": binary(asF32, f32, (a, b) => a / b),
  "f32.min": binary(asF32, f32, Math.min),
  "f32.max": binary(asF32, f32, Math.max),
  "f32.copysign": binary(f32BitsOf, f32OfBits, f32CopySign),

  "f64.abs": unary(f64BitsOf, f64OfBits, f64Abs),
  "f64.neg": unary(f64BitsOf, f64OfBits, f64Neg),
  "f64.ceil": unary(asF64, f64, Math.ceil),
  "f64.floor": unary(asF64, f64, Math.floor),
  "f64.trunc": unary(asF64, f64, Math.trunc),
  "f64.nearest": unary(asF64, f64, nearest),
  "f64.sqrt": unary(asF64, f64, Math.sqrt),
  "f64.add": binary(asF64, f64, (a, b) => a + b),
  "f64.sub": binary(asF64, f64, (a, b) => a - b),
  "f64.mul": binary(asF64, f64, (a, b) => a * b),
  "f64.div": binary(asF64, f64, (a, b) => a / b),
  "f64.min": binary(asF64, f64, Math.min),
  "f64.max": binary(asF64, f64, Math.max),
  "f64.copysign": binary(f64BitsOf, f64OfBits, f64CopySign),

  "i32.wrap_i64": unary(asI64, i32, a => Number(BigInt.asIntN(32, a))),
  "i32.trunc_f32_s": unary(asF32, i32, truncS32),
  "i32.trunc_f32_u": unary(asF32, i32, truncU32),
  "i32.trunc_f64_s": unary(asF64, i32, truncS32),
  "i32.trunc_f64_u": unary(asF64, i32, truncU32),
  "i64.extend_i32_s": unary(asI32, i64, a => BigInt(a)),
  "i64.extend_i32_u": unary(asI32, i64, a => BigInt(u32(a))),
  "i64.trunc_f32_s": unary(asF32, i64, truncS64),
  "i64.trunc_f32_u": unary(asF32, i64, truncU64),
  "i64.trunc_f64_s": unary(asF64, i64, truncS64),
  "i64.trunc_f64_u": unary(asF64, i64, truncU64),
  "f32.convert_i32_s": unary(asI32, f32, a => a),
  "f32.convert_i32_u": unary(asI32, f32, u32),
  "f32.convert_i64_s": unary(asI64, f32, bigIntToF32),
  "f32.convert_i64_u": unary(asI64, f32, a => bigIntToF32(u64(a))),
  "f32.demote_f64": unary(asF64, f32, a => a),
  "f64.convert_i32_s": unary(asI32, f64, a => a),
  "f64.convert_i32_u": unary(asI32, f64, u32),
  "f64.convert_i64_s": unary(asI64, f64, a => Number(a)),
  "f64.convert_i64_u": unary(asI64, f64, a => Number(u64(a))),
  "f64.promote_f32": unary(asF32, f64, a => a),
  "i32.reinterpret_f32": unary(f32BitsOf, i32, identity),
  "i64.reinterpret_f64": unary(f64BitsOf, i64, identity),
  "f32.reinterpret_i32": unary(asI32, f32OfBits, identity),
  "f64.reinterpret_i64": unary(asI64, f64OfBits, identity),

  "i32.extend8_s": unary(asI32, i32, a => (a << 24) >> 24),
  "i32.extend16_s": unary(asI32, i32, a => (a << 16) >> 16),
  "i64.extend8_s": unary(asI64, i64, a => BigInt.asIntN(8, a)),
  "i64.extend16_s": unary(asI64, i64, a => BigInt.asIntN(16, a)),
  "i64.extend32_s": unary(asI64, i64, a => BigInt.asIntN(32, a)),

  "i32.trunc_sat_f32_s": unary(asF32, i32, a => saturate(a, INT32_MIN, 0x7fffffff)),
  "i32.trunc_sat_f32_u": unary(asF32, i32, a => saturate(a, 0, 0xffffffff)),
  "i32.trunc_sat_f64_s": unary(asF64, i32, a => saturate(a, INT32_MIN, 0x7fffffff)),
  "i32.trunc_sat_f64_u": unary(asF64, i32, a => saturate(a, 0, 0xffffffff)),
  "i64.trunc_sat_f32_s": unary(asF32, i64, a => saturateBig(a, INT64_MIN, 2n ** 63n - 1n)),
  "i64.trunc_sat_f32_u": unary(asF32, i64, a => saturateBig(a, 0n, 2n ** 64n - 1n)),
  "i64.trunc_sat_f64_s": unary(asF64, i64, a => saturateBig(a, INT64_MIN, 2n ** 63n - 1n)),
  "i64.trunc_sat_f64_u": unary(asF64, i64, a => saturateBig(a, 0n, 2n ** 64n - 1n)),
};

/** Lookup by mnemonic text, for callers that hold a name rather than a decoded instruction. */
export function numericOp(name: string): NumericImpl {
  if (!isNumericOp(name)) throw new Error(`no implementation for numeric instruction '${name}'`);
  return NUMERIC_IMPLS[name];
}
