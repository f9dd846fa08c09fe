import { decodeModule } from "./binary/decoder.js";
import type { Module } from "./binary/module.js";
import type { Diagnostic } from "./errors/diagnostic.js";
import { DecodeError } from "./errors/errors.js";
import { Validator } from "./validator/validator.js";
import type { ValidatedModule } from "./validator/metadata.js";

export interface LoadResult {
  module?: Module;
  validated?: ValidatedModule;
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

/**
 * Decode and validate a module binary. Failures come back as diagnostics
 * rather than exceptions so callers can report all of them at once.
 */
export function loadModule(bytes: Uint8Array, source = "<module>"): LoadResult {
  // 1. Decode
  let module: Module;
  let warnings: Diagnostic[];
  try {
    ({ module, warnings } = decodeModule(bytes, source));
  } catch (e) {
    if (e instanceof DecodeError) return { errors: [e.toDiagnostic(source)], warnings: [] };
    throw e;
  }

  // 2. Validate
  const { validated, errors } = new Validator().validate(module);
  if (!validated) {
    return { module, errors: errors.map(e => e.toDiagnostic(source)), warnings };
  }
  return { module, validated, errors: [], warnings };
}
