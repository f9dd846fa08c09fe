import type { MemoryType } from "../binary/module.js";
import { Trap } from "../errors/errors.js";

export const PAGE_SIZE = 65536;
export const MAX_PAGES = 65536;

/** A linear memory: a growable little-endian byte buffer measured in 64 KiB pages. */
export class MemoryInstance {
  private buffer: Uint8Array;
  private view: DataView;
  readonly type: MemoryType;
  /** Engine-wide ceiling, applied on top of the declared maximum. */
  private readonly pageLimit: number;

  constructor(type: MemoryType, pageLimit = MAX_PAGES) {
    this.type = type;
    this.pageLimit = Math.min(pageLimit, MAX_PAGES);
    this.buffer = new Uint8Array(type.limits.min * PAGE_SIZE);
    this.view = new DataView(this.buffer.buffer);
  }

  get pages(): number {
    return this.buffer.length / PAGE_SIZE;
  }

  get byteLength(): number {
    return this.buffer.length;
  }

  get max(): number | undefined {
    return this.type.limits.max;
  }

  /** Grow by `delta` pages. Returns the previous size, or -1 leaving memory untouched. */
  grow(delta: number): number {
    const old = this.pages;
    const next = old + delta;
    const max = Math.min(this.type.limits.max ?? MAX_PAGES, this.pageLimit);
    if (delta < 0 || next > max) return -1;
    if (delta === 0) return old;
    const grown = new Uint8Array(next * PAGE_SIZE);
    grown.set(this.buffer);
    this.buffer = grown;
    this.view = new DataView(grown.buffer);
    return old;
  }

  /** Effective address of an access, trapping unless `[ea, ea + size)` is in bounds. */
  private check(address: number, offset: number, size: number): number {
    const ea = (address >>> 0) + offset;
    if (ea + size > this.buffer.length) throw new Trap("OutOfBoundsMemoryAccess");
    return ea;
  }

  checkRange(start: number, length: number): void {
    if (start < 0 || length < 0 || start + length > this.buffer.length) throw new Trap("OutOfBoundsMemoryAccess");
  }

  loadI32(address: number, offset: number, size: 1 | 2 | 4, signed: boolean): number {
    const ea = this.check(address, offset, size);
    switch (size) {
      case 1: return signed ? this.view.getInt8(ea) : this.view.getUint8(ea);
      case 2: return signed ? this.view.getInt16(ea, true) : this.view.getUint16(ea, true);
      case 4: return signed ? this.view.getInt32(ea, true) : this.view.getUint32(ea, true);
    }
  }

  loadI64(address: number, offset: number, size: 1 | 2 | 4 | 8, signed: boolean): bigint {
    const ea = this.check(address, offset, size);
    switch (size) {
      case 1: return BigInt(signed ? this.view.getInt8(ea) : this.view.getUint8(ea));
      case 2: return BigInt(signed ? this.view.getInt16(ea, true) : this.view.getUint16(ea, true));
      case 4: return BigInt(signed ? this.view.getInt32(ea, true) : this.view.getUint32(ea, true));
      case 8: return this.view.getBigInt64(ea, true);
    }
  }

  storeI32(address: number, offset: number, size: 1 | 2 | 4, value: number): void {
    const ea = this.check(address, offset, size);
    switch (size) {
      case 1: this.view.setUint8(ea, value & 0xff); break;
      case 2: this.view.setUint16(ea, value & 0xffff, true); break;
      case 4: this.view.setInt32(ea, value, true); break;
    }
  }

  storeI64(address: number, offset: number, size: 1 | 2 | 4 | 8, value: bigint): void {
    const ea = this.check(address, offset, size);
    switch (size) {
      case 1: this.view.setUint8(ea, Number(value & 0xffn)); break;
      case 2: this.view.setUint16(ea, Number(value & 0xffffn), true); break;
      case 4: this.view.setUint32(ea, Number(value & 0xffffffffn), true); break;
      case 8: this.view.setBigInt64(ea, BigInt.asIntN(64, value), true); break;
    }
  }

  /** Copy of `length` bytes at `start`; traps when out of range. */
  read(start: number, length: number): Uint8Array {
    this.checkRange(start, length);
    return this.buffer.slice(start, start + length);
  }

  write(start: number, data: Uint8Array): void {
    this.checkRange(start, data.length);
    this.buffer.set(data, start);
  }

  fill(start: number, value: number, length: number): void {
    this.checkRange(start, length);
    this.buffer.fill(value & 0xff, start, start + length);
  }

  copyWithin(dst: number, src: number, length: number): void {
    this.checkRange(src, length);
    this.checkRange(dst, length);
    this.buffer.copyWithin(dst, src, src + length);
  }
}
