/**
 * Compile-and-run entry points used by the CLI, the REPL and tests.
 */

import { compile } from "./compiler";
import type { CompileError, CompilerOptions } from "./compiler";
import { VM } from "./vm";
import type { RuntimeError, VMOptions } from "./vm";

export type InterpretResult =
  | { tag: "ok" }
  | { tag: "compileFailure"; errors: CompileError[] }
  | { tag: "runtimeFailure"; error: RuntimeError };

export interface InterpretOptions extends VMOptions, CompilerOptions {}

/** Conventional process exit codes for each outcome. */
export const EXIT_CODES = {
  ok: 0,
  compileFailure: 65,
  runtimeFailure: 70,
} as const;

/**
 * A long-lived VM. Globals defined by one `run` are visible to the next,
 * which is what the REPL needs.
 */
export class Session {
  readonly vm: VM;

  constructor(private readonly options: InterpretOptions = {}) {
    this.vm = new VM(options);
  }

  run(source: string, overrides: CompilerOptions = {}): InterpretResult {
    const compiled = compile(source, this.vm.heap, { ...this.options, ...overrides });
    if (compiled.tag === "error") {
      return { tag: "compileFailure", errors: compiled.errors };
    }
    return this.vm.interpret(compiled.fn);
  }
}

/**
 * Compile and run one complete source unit in a fresh VM.
 */
export function interpret(source: string, options: InterpretOptions = {}): InterpretResult {
  return new Session(options).run(source);
}
