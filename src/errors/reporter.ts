import chalk from "chalk";
import type { Diagnostic } from "./diagnostic.js";

const ROW = 16;

function hex(n: number, width: number): string {
  return n.toString(16).padStart(width, "0");
}

/** One row of the hex dump around `offset`, with a caret under the byte. */
function dumpRow(bytes: Uint8Array, offset: number): string[] {
  const start = offset - (offset % ROW);
  const cells: string[] = [];
  for (let i = start; i < Math.min(start + ROW, bytes.length); i++) cells.push(hex(bytes[i], 2));
  const label = hex(start, 8);
  const padding = " ".repeat(label.length);
  const column = (offset - start) * 3;
  const caret = offset < bytes.length ? "^^" : "^";
  return [
    `${chalk.blue(label)} ${chalk.blue("|")} ${cells.join(" ")}`,
    `${padding} ${chalk.blue("|")} ${" ".repeat(column)}${chalk.red(caret)}`,
  ];
}

export function formatDiagnostic(bytes: Uint8Array, diag: Diagnostic): string {
  const { location } = diag;
  const severityLabel =
    diag.severity === "error"
      ? chalk.red.bold("error")
      : diag.severity === "warning"
        ? chalk.yellow.bold("warning")
        : chalk.blue.bold("info");

  let where = `${location.source}@0x${hex(location.offset, 0)}`;
  if (location.funcIndex !== undefined) {
    where += ` (function ${location.funcIndex}${location.instrIndex === undefined ? "" : `, instruction ${location.instrIndex}`})`;
  }

  let output = `${severityLabel}: ${chalk.bold(diag.message)}\n`;
  output += `  ${chalk.blue("-->")} ${where}\n`;
  if (location.offset <= bytes.length) {
    for (const line of dumpRow(bytes, location.offset)) output += `  ${line}\n`;
  }
  if (diag.help) {
    output += `  ${chalk.blue("=")} ${chalk.green("help")}: ${diag.help}\n`;
  }
  return output;
}

export function formatDiagnostics(bytes: Uint8Array, diagnostics: Diagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(bytes, d)).join("\n");
}
