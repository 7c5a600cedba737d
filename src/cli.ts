#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 * Usage:
 *   loxvm                  Start the REPL
 *   loxvm <file> [options] Run a script
 *
 * Options:
 *   --disassemble          Print the bytecode of each compiled function
 *   --trace                Trace every executed instruction
 *   --stress-gc            Collect garbage on every allocation
 *   --max-frames <n>       Maximum call depth (default 64)
 *   -h, --help             Show help
 */

import * as fs from "fs";
import * as path from "path";
import { formatCompileErrors, formatRuntimeError } from "./diagnostics";
import { EXIT_CODES, interpret } from "./interpret";
import type { InterpretOptions } from "./interpret";
import { startRepl } from "./repl";

/** Exit codes beyond the interpreter's own outcomes. */
const EXIT_USAGE = 64;
const EXIT_IO = 74;

export interface CliOptions {
  inputFile: string | null;
  disassemble: boolean;
  trace: boolean;
  stressGC: boolean;
  maxFrames: number | null;
}

function printHelp(): void {
  console.log(`
loxvm - bytecode virtual machine for Lox

Usage:
  loxvm                  Start the REPL
  loxvm <file> [options] Run a script

Options:
  --disassemble          Print the bytecode of each compiled function
  --trace                Trace every executed instruction
  --stress-gc            Collect garbage on every allocation
  --max-frames <n>       Maximum call depth (default 64)
  -h, --help             Show this help

Exit codes:
  0 success, 64 usage error, 65 compile error, 70 runtime error, 74 file error
`);
}

/**
 * Returns null and reports the problem when the arguments are invalid.
 */
export function parseArgs(args: string[]): CliOptions | "help" | null {
  const options: CliOptions = {
    inputFile: null,
    disassemble: false,
    trace: false,
    stressGC: false,
    maxFrames: null,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      return "help";
    } else if (arg === "--disassemble") {
      options.disassemble = true;
    } else if (arg === "--trace") {
      options.trace = true;
    } else if (arg === "--stress-gc") {
      options.stressGC = true;
    } else if (arg === "--max-frames") {
      i++;
      const value = Number(args[i]);
      if (i >= args.length || !Number.isInteger(value) || value < 1) {
        console.error("Error: --max-frames requires a positive integer");
        return null;
      }
      options.maxFrames = value;
    } else if (arg.startsWith("-")) {
      console.error(`Error: Unknown option: ${arg}`);
      return null;
    } else {
      if (options.inputFile !== null) {
        console.error("Error: Multiple input files not supported");
        return null;
      }
      options.inputFile = arg;
    }
    i++;
  }

  return options;
}

export function toInterpretOptions(options: CliOptions): InterpretOptions {
  return {
    traceExecution: options.trace,
    stressGC: options.stressGC,
    maxFrames: options.maxFrames ?? undefined,
    printCode: options.disassemble ? (listing) => console.log(listing) : undefined,
  };
}

/**
 * Run a script file and return the process exit code.
 */
export function runFile(
  filePath: string,
  options: InterpretOptions,
  colored: boolean = process.stderr.isTTY === true
): number {
  const inputPath = path.resolve(filePath);
  let source: string;
  try {
    source = fs.readFileSync(inputPath, "utf-8");
  } catch (err) {
    console.error(`Error reading file: ${inputPath}`);
    if (err instanceof Error) {
      console.error(err.message);
    }
    return EXIT_IO;
  }

  const result = interpret(source, options);
  switch (result.tag) {
    case "ok":
      return EXIT_CODES.ok;
    case "compileFailure":
      console.error(formatCompileErrors(result.errors, { color: colored }));
      return EXIT_CODES.compileFailure;
    case "runtimeFailure":
      console.error(formatRuntimeError(result.error, { color: colored }));
      return EXIT_CODES.runtimeFailure;
  }
}

function main(): void {
  const options = parseArgs(process.argv.slice(2));
  if (options === "help") {
    printHelp();
    process.exit(0);
  }
  if (options === null) {
    printHelp();
    process.exit(EXIT_USAGE);
  }

  const interpretOptions = toInterpretOptions(options);
  if (options.inputFile === null) {
    startRepl(interpretOptions);
    return;
  }

  process.exit(runFile(options.inputFile, interpretOptions));
}

if (require.main === module) {
  main();
}
