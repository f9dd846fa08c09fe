import type { TableType } from "../binary/module.js";
import { Trap } from "../errors/errors.js";
import { defaultValue, type Value } from "./values.js";

/** Engine ceiling on table length; growing past it fails like growing past a declared maximum. */
export const MAX_TABLE_ENTRIES = 10_000_000;

/** A table of references. Every slot holds a value of the table's element type. */
export class TableInstance {
  readonly type: TableType;
  private elements: Value[];

  constructor(type: TableType, init?: Value) {
    this.type = type;
    const fill = init ?? defaultValue(type.elemType);
    this.elements = Array.from({ length: type.limits.min }, () => fill);
  }

  get size(): number {
    return this.elements.length;
  }

  get(index: number): Value {
    const value = this.elements[index >>> 0];
    if (value === undefined) throw new Trap("OutOfBoundsTableAccess");
    return value;
  }

  set(index: number, value: Value): void {
    if ((index >>> 0) >= this.elements.length) throw new Trap("OutOfBoundsTableAccess");
    this.elements[index >>> 0] = value;
  }

  /** Grow by `delta` slots filled with `init`. Returns the old size, or -1 on failure. */
  grow(delta: number, init: Value): number {
    const old = this.elements.length;
    const max = Math.min(this.type.limits.max ?? MAX_TABLE_ENTRIES, MAX_TABLE_ENTRIES);
    if (delta < 0 || old + delta > max) return -1;
    for (let i = 0; i < delta; i++) this.elements.push(init);
    return old;
  }

  checkRange(start: number, length: number): void {
    if (start < 0 || length < 0 || start + length > this.elements.length) throw new Trap("OutOfBoundsTableAccess");
  }

  fill(start: number, value: Value, length: number): void {
    this.checkRange(start, length);
    for (let i = 0; i < length; i++) this.elements[start + i] = value;
  }

  copyFrom(src: TableInstance, dst: number, srcStart: number, length: number): void {
    src.checkRange(srcStart, length);
    this.checkRange(dst, length);
    const items = src.elements.slice(srcStart, srcStart + length);
    for (let i = 0; i < length; i++) this.elements[dst + i] = items[i];
  }

  /** Write a run of values (element segment initialisation and `table.init`). */
  initFrom(items: readonly Value[], dst: number, srcStart: number, length: number): void {
    if (srcStart < 0 || length < 0 || srcStart + length > items.length) throw new Trap("OutOfBoundsTableAccess");
    this.checkRange(dst, length);
    for (let i = 0; i < length; i++) this.elements[dst + i] = items[srcStart + i];
  }

  entries(): readonly Value[] {
    return this.elements;
  }
}
