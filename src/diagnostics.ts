/**
 * Formatting of compile errors, runtime errors and token dumps for the
 * terminal.
 */

import color from "cli-color";
import type { CompileError } from "./compiler";
import type { Token } from "./lexer";
import type { RuntimeError } from "./vm";

export interface FormatOptions {
  /** Use ANSI colors. */
  color?: boolean;
}

function paint(enabled: boolean, style: (text: string) => string, text: string): string {
  return enabled ? style(text) : text;
}

export function formatCompileError(error: CompileError, options: FormatOptions = {}): string {
  const on = options.color ?? false;
  const location = paint(on, color.bold, `[line ${error.line}]`);
  return `${location} ${paint(on, color.red, `Error${error.where}:`)} ${error.reason}`;
}

export function formatCompileErrors(errors: CompileError[], options: FormatOptions = {}): string {
  return errors.map((e) => formatCompileError(e, options)).join("\n");
}

/**
 * Message followed by the call trace, innermost frame first.
 */
export function formatRuntimeError(error: RuntimeError, options: FormatOptions = {}): string {
  const on = options.color ?? false;
  const lines = [paint(on, color.red, error.reason)];
  for (const entry of error.trace) {
    lines.push(paint(on, color.blackBright, entry));
  }
  return lines.join("\n");
}

export function formatToken(token: Token, options: FormatOptions = {}): string {
  const on = options.color ?? false;
  const position = `${String(token.line).padStart(4)}:${String(token.column).padEnd(3)}`;
  return `${paint(on, color.blackBright, position)} ${paint(on, color.cyan, token.type.padEnd(14))} ${token.value}`;
}
