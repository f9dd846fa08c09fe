import { ConditionError } from "../errors/errors.js";
import { evaluateCondition, isTruthy, parseCondition, type ConditionExpr, type EvalContext } from "./condition.js";

export interface Breakpoint {
  readonly id: number;
  readonly funcIndex: number;
  /** Index of the instruction within the function body. */
  readonly instrIndex: number;
  enabled: boolean;
  /** Times the location was reached with the condition holding. */
  hitCount: number;
  /** Hits to let pass before suspending. */
  ignoreCount: number;
  condition?: string;
}

export interface BreakpointOptions {
  condition?: string;
  ignoreCount?: number;
  enabled?: boolean;
}

export interface BreakpointHit {
  breakpoint: Breakpoint;
  /** Set when the condition could not be evaluated; the breakpoint then counts as hit. */
  conditionError?: ConditionError;
}

interface Entry {
  breakpoint: Breakpoint;
  condition?: ConditionExpr;
}

const key = (funcIndex: number, instrIndex: number) => `${funcIndex}:${instrIndex}`;

export class BreakpointTable {
  private nextId = 1;
  private byId = new Map<number, Entry>();
  private byLocation = new Map<string, Entry[]>();

  get size(): number {
    return this.byId.size;
  }

  /** Parses the condition up front, so a malformed one throws here rather than at the first hit. */
  add(funcIndex: number, instrIndex: number, options: BreakpointOptions = {}): Breakpoint {
    const condition = options.condition === undefined ? undefined : parseCondition(options.condition);
    const breakpoint: Breakpoint = {
      id: this.nextId++,
      funcIndex,
      instrIndex,
      enabled: options.enabled ?? true,
      hitCount: 0,
      ignoreCount: options.ignoreCount ?? 0,
      condition: options.condition,
    };
    const entry: Entry = { breakpoint, condition };
    this.byId.set(breakpoint.id, entry);
    const k = key(funcIndex, instrIndex);
    this.byLocation.set(k, [...(this.byLocation.get(k) ?? []), entry]);
    return breakpoint;
  }

  remove(id: number): boolean {
    const entry = this.byId.get(id);
    if (!entry) return false;
    this.byId.delete(id);
    const k = key(entry.breakpoint.funcIndex, entry.breakpoint.instrIndex);
    const rest = (this.byLocation.get(k) ?? []).filter(e => e !== entry);
    if (rest.length > 0) this.byLocation.set(k, rest);
    else this.byLocation.delete(k);
    return true;
  }

  get(id: number): Breakpoint | undefined {
    return this.byId.get(id)?.breakpoint;
  }

  /** Flip (or set) the enabled flag. */
  toggle(id: number, enabled?: boolean): Breakpoint | undefined {
    const bp = this.byId.get(id)?.breakpoint;
    if (bp) bp.enabled = enabled ?? !bp.enabled;
    return bp;
  }

  list(): Breakpoint[] {
    return [...this.byId.values()].map(e => ({ ...e.breakpoint }));
  }

  /**
   * Consult the breakpoints at a location. Every enabled breakpoint whose
   * condition holds counts a hit; the first one past its ignore count suspends.
   */
  check(funcIndex: number, instrIndex: number, context: EvalContext): BreakpointHit | undefined {
    const entries = this.byLocation.get(key(funcIndex, instrIndex));
    if (!entries) return undefined;
    let hit: BreakpointHit | undefined;
    for (const { breakpoint, condition } of entries) {
      if (!breakpoint.enabled) continue;
      let conditionError: ConditionError | undefined;
      if (condition) {
        try {
          if (!isTruthy(evaluateCondition(condition, context))) continue;
        } catch (e) {
          if (!(e instanceof ConditionError)) throw e;
          conditionError = e;
        }
      }
      breakpoint.hitCount++;
      if (!hit && breakpoint.hitCount > breakpoint.ignoreCount) hit = { breakpoint: { ...breakpoint }, conditionError };
    }
    return hit;
  }
}

export interface BreakpointSpec {
  func: number | string;
  instrIndex: number;
  condition?: string;
}

const SPEC_PATTERN = /^([^:\s]+)(?::(\d+))?(?:\s+if\s+(.+))?$/;

/**
 * Parse the command-line form of a breakpoint: `function[:instruction][ if condition]`,
 * where the function is an index or a name, e.g. `add:3` or `7:0 if local0 > 10`.
 */
export function parseBreakpointSpec(text: string): BreakpointSpec {
  const match = SPEC_PATTERN.exec(text.trim());
  if (!match) throw new Error(`invalid breakpoint '${text}', expected function[:instruction][ if condition]`);
  const [, func, instr, condition] = match;
  return {
    func: /^\d+$/.test(func) ? Number(func) : func,
    instrIndex: instr === undefined ? 0 : Number(instr),
    condition: condition?.trim(),
  };
}
