import binaryen from "binaryen";

// Proposals the engine executes; binaryen rejects text that uses anything else.
const FEATURES = binaryen.Features.MutableGlobals
  | binaryen.Features.SignExt
  | binaryen.Features.NontrappingFPToInt
  | binaryen.Features.BulkMemory
  | binaryen.Features.ReferenceTypes
  | binaryen.Features.Multivalue;

/**
 * Assemble WebAssembly text into a binary. binaryen rebuilds the module in
 * its own IR, so instruction indices refer to the emitted binary, not to the
 * text as written.
 */
export function watToBinary(text: string): Uint8Array {
  const mod = binaryen.parseText(text);
  try {
    mod.setFeatures(FEATURES);
    if (!mod.validate()) throw new Error("WebAssembly text does not describe a valid module");
    return mod.emitBinary();
  } finally {
    mod.dispose();
  }
}

/** Disassemble a binary into WebAssembly text. */
export function binaryToWat(bytes: Uint8Array): string {
  const mod = binaryen.readBinary(bytes);
  try {
    mod.setFeatures(FEATURES);
    return mod.emitText();
  } finally {
    mod.dispose();
  }
}

/** True when a file name looks like WebAssembly text rather than a binary. */
export function isTextFormat(fileName: string): boolean {
  return fileName.endsWith(".wat") || fileName.endsWith(".wast");
}
