import type { GlobalType } from "../binary/module.js";
import { EngineError } from "../errors/errors.js";
import type { Value } from "./values.js";

export class GlobalInstance {
  readonly type: GlobalType;
  private current: Value;

  constructor(type: GlobalType, value: Value) {
    if (value.type !== type.valueType) {
      throw new EngineError(`global of type ${type.valueType} cannot hold a ${value.type}`);
    }
    this.type = type;
    this.current = value;
  }

  get value(): Value {
    return this.current;
  }

  /** Assign from validated code; mutability was checked statically. */
  set value(next: Value) {
    this.current = next;
  }

  /** Assign from outside the program (the debugger or an embedder), checking type and mutability. */
  assign(next: Value, force = false): void {
    if (!this.type.mutable && !force) throw new EngineError("global is immutable");
    if (next.type !== this.type.valueType) {
      throw new EngineError(`global of type ${this.type.valueType} cannot hold a ${next.type}`);
    }
    this.current = next;
  }
}
