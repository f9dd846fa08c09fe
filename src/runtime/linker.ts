import { DEFAULT_CONFIG, type EngineConfig } from "../config.js";
import { HostTrap, InstantiationError, Trap } from "../errors/errors.js";
import { isHostFunction, type HostFunction } from "../host/bridge.js";
import { invokeFunction } from "../interpreter/machine.js";
import type { ValidatedModule } from "../validator/metadata.js";
import { GlobalInstance } from "./global.js";
import { instantiate, type ExternValue, type ImportResolver, type Instance, type Instantiated } from "./instance.js";
import { MemoryInstance } from "./memory.js";
import { TableInstance } from "./table.js";

/** Anything an embedder can bind to an import. */
export type HostValue = HostFunction | MemoryInstance | TableInstance | GlobalInstance;

/** Plain-object imports: `{ env: { log: hostFunction(...), memory: new MemoryInstance(...) } }`. */
export type Imports = Record<string, Record<string, HostValue>>;

export function toExternValue(module: string, name: string, value: HostValue): ExternValue {
  if (value instanceof MemoryInstance) return { kind: "memory", value };
  if (value instanceof TableInstance) return { kind: "table", value };
  if (value instanceof GlobalInstance) return { kind: "global", value };
  if (isHostFunction(value)) {
    return { kind: "func", value: { kind: "host", name: `${module}.${name}`, type: value.type, host: value } };
  }
  throw new InstantiationError(`${module}.${name} is not a function, memory, table or global`);
}

export interface LinkOptions {
  config?: EngineConfig;
  /** Leave the start function for the caller to run (the debugger uses this to step through it). */
  deferStart?: boolean;
}

/**
 * Named namespace of importable values. Host modules and instantiated modules
 * are registered under a name; later modules import from them by that name.
 */
export class Linker implements ImportResolver {
  private namespaces = new Map<string, Map<string, ExternValue>>();

  static from(imports: Imports | Linker | undefined): Linker {
    if (imports instanceof Linker) return imports;
    const linker = new Linker();
    for (const [module, fields] of Object.entries(imports ?? {})) linker.defineModule(module, fields);
    return linker;
  }

  define(module: string, name: string, value: HostValue): this {
    return this.defineExtern(module, name, toExternValue(module, name, value));
  }

  defineExtern(module: string, name: string, value: ExternValue): this {
    let ns = this.namespaces.get(module);
    if (!ns) {
      ns = new Map();
      this.namespaces.set(module, ns);
    }
    ns.set(name, value);
    return this;
  }

  defineModule(module: string, fields: Record<string, HostValue>): this {
    for (const [name, value] of Object.entries(fields)) this.define(module, name, value);
    return this;
  }

  /** Make every export of `instance` importable as `name.<export>`. */
  registerInstance(name: string, instance: Instance): this {
    for (const [field, value] of instance.exports) this.defineExtern(name, field, value);
    return this;
  }

  resolve(module: string, name: string): ExternValue | undefined {
    return this.namespaces.get(module)?.get(name);
  }

  has(module: string): boolean {
    return this.namespaces.has(module);
  }

  /**
   * Instantiate a validated module against this linker and, unless deferred,
   * run its start function. A trap in the start function fails instantiation.
   */
  instantiate(validated: ValidatedModule, options: LinkOptions = {}): Instantiated {
    const config = options.config ?? DEFAULT_CONFIG;
    const result = instantiate(validated, this, { maxMemoryPages: config.maxMemoryPages });
    if (result.start && !options.deferStart) {
      try {
        invokeFunction(result.start, [], config);
      } catch (e) {
        if (e instanceof Trap || e instanceof HostTrap) {
          throw new InstantiationError(`start function trapped: ${e.message}`, e);
        }
        throw e;
      }
      return { instance: result.instance };
    }
    return result;
  }
}
