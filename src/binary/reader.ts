import { DecodeError } from "../errors/errors.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Cursor over a byte buffer with the primitive encodings of the binary format:
 * LEB128 integers, little-endian IEEE 754 bit patterns, names and vectors.
 */
export class ByteReader {
  private bytes: Uint8Array;
  private view: DataView;
  pos: number;
  /** Exclusive end of the region this reader may consume. */
  end: number;

  constructor(bytes: Uint8Array, start = 0, end = bytes.length) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.pos = start;
    this.end = end;
  }

  get remaining(): number {
    return this.end - this.pos;
  }

  isAtEnd(): boolean {
    return this.pos >= this.end;
  }

  fail(message: string, at: number = this.pos): never {
    throw new DecodeError(message, at);
  }

  readU8(): number {
    if (this.pos >= this.end) this.fail("unexpected end");
    return this.bytes[this.pos++];
  }

  peekU8(): number {
    if (this.pos >= this.end) this.fail("unexpected end");
    return this.bytes[this.pos];
  }

  readBytes(length: number): Uint8Array {
    if (length > this.remaining) this.fail("unexpected end");
    const out = this.bytes.slice(this.pos, this.pos + length);
    this.pos += length;
    return out;
  }

  readU32(): number {
    const start = this.pos;
    let result = 0;
    for (let i = 0; i < 5; i++) {
      const byte = this.readU8();
      result += (byte & 0x7f) * 2 ** (7 * i);
      if ((byte & 0x80) === 0) {
        if (i === 4 && (byte & 0x70) !== 0) this.fail("integer too large", start);
        return result;
      }
    }
    return this.fail("integer representation too long", start);
  }

  readS32(): number {
    const start = this.pos;
    let result = 0;
    for (let i = 0; i < 5; i++) {
      const byte = this.readU8();
      result += (byte & 0x7f) * 2 ** (7 * i);
      if ((byte & 0x80) === 0) {
        if (i === 4) {
          const high = byte & 0x78;
          if (high !== 0 && high !== 0x78) this.fail("integer too large", start);
        }
        const bits = 7 * (i + 1);
        if (bits < 32 && (byte & 0x40) !== 0) result -= 2 ** bits;
        return result | 0;
      }
    }
    return this.fail("integer representation too long", start);
  }

  /** Signed 33-bit integer, used for block types that reference a type index. */
  readS33(): number {
    const start = this.pos;
    let result = 0;
    for (let i = 0; i < 5; i++) {
      const byte = this.readU8();
      result += (byte & 0x7f) * 2 ** (7 * i);
      if ((byte & 0x80) === 0) {
        if (i === 4) {
          const high = byte & 0x70;
          if (high !== 0 && high !== 0x70) this.fail("integer too large", start);
        }
        if ((byte & 0x40) !== 0) result -= 2 ** (7 * (i + 1));
        return result;
      }
    }
    return this.fail("integer representation too long", start);
  }

  readS64(): bigint {
    const start = this.pos;
    let result = 0n;
    for (let i = 0; i < 10; i++) {
      const byte = this.readU8();
      result |= BigInt(byte & 0x7f) << BigInt(7 * i);
      if ((byte & 0x80) === 0) {
        if (i === 9) {
          const high = byte & 0x7f;
          if (high !== 0 && high !== 0x7f) this.fail("integer too large", start);
        }
        const bits = BigInt(7 * (i + 1));
        if ((byte & 0x40) !== 0) result -= 1n << bits;
        return BigInt.asIntN(64, result);
      }
    }
    return this.fail("integer representation too long", start);
  }

  readF32Bits(): bigint {
    if (this.remaining < 4) this.fail("unexpected end");
    const bits = this.view.getUint32(this.pos, true);
    this.pos += 4;
    return BigInt(bits);
  }

  readF64Bits(): bigint {
    if (this.remaining < 8) this.fail("unexpected end");
    const bits = this.view.getBigUint64(this.pos, true);
    this.pos += 8;
    return bits;
  }

  readName(): string {
    const length = this.readU32();
    const start = this.pos;
    const raw = this.readBytes(length);
    try {
      return utf8.decode(raw);
    } catch (e) {
      if (e instanceof TypeError) this.fail("malformed UTF-8 encoding", start);
      throw e;
    }
  }

  readVec<T>(item: (reader: ByteReader, index: number) => T): T[] {
    const count = this.readU32();
    // Every element takes at least one byte, so a larger count is necessarily truncated.
    if (count > this.remaining) this.fail("unexpected end");
    const out: T[] = [];
    for (let i = 0; i < count; i++) out.push(item(this, i));
    return out;
  }

  /** A reader over the next `length` bytes; this reader skips past them. */
  sub(length: number): ByteReader {
    if (length > this.remaining) this.fail("unexpected end");
    const child = new ByteReader(this.bytes, this.pos, this.pos + length);
    this.pos += length;
    return child;
  }
}

const scratch = new DataView(new ArrayBuffer(8));

export function f32FromBits(bits: bigint): number {
  scratch.setUint32(0, Number(bits & 0xffffffffn));
  return scratch.getFloat32(0);
}

export function f64FromBits(bits: bigint): number {
  scratch.setBigUint64(0, BigInt.asUintN(64, bits));
  return scratch.getFloat64(0);
}

export function f32ToBits(value: number): bigint {
  scratch.setFloat32(0, value);
  return BigInt(scratch.getUint32(0));
}

export function f64ToBits(value: number): bigint {
  scratch.setFloat64(0, value);
  return scratch.getBigUint64(0);
}
