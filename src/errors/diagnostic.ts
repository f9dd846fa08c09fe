export interface Location {
  /** Byte offset into the module binary (or into the code entry, see `instrIndex`). */
  offset: number;
  funcIndex?: number;
  instrIndex?: number;
  source: string;
}

export type Severity = "error" | "warning" | "info";

export interface Diagnostic {
  severity: Severity;
  message: string;
  location: Location;
  help?: string;
}

export function error(message: string, location: Location, help?: string): Diagnostic {
  return { severity: "error", message, location, help };
}

export function warning(message: string, location: Location, help?: string): Diagnostic {
  return { severity: "warning", message, location, help };
}
