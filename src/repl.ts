#!/usr/bin/env node
/**
 * REPL - Read-Eval-Print Loop.
 *
 * Each complete input is compiled and run in one long-lived session, so
 * globals persist between inputs. Input that stops in the middle of a
 * construct (an unclosed block, a missing ";") is accumulated under a "..."
 * prompt until it is complete.
 */

import * as fs from "fs";
import * as readline from "readline";
import { formatCompileErrors, formatRuntimeError, formatToken } from "./diagnostics";
import { Session } from "./interpret";
import type { InterpretOptions } from "./interpret";
import { tokenize } from "./lexer";

// ============================================================================
// Commands
// ============================================================================

interface Command {
  description: string;
  handler: (repl: Repl, args: string) => void;
}

const COMMANDS: Record<string, Command> = {
  help: {
    description: "Show this help message",
    handler: (repl) => repl.showHelp(),
  },
  exit: {
    description: "Exit the REPL",
    handler: (repl) => {
      repl.done = true;
    },
  },
  lex: {
    description: "Toggle a token dump of each input",
    handler: (repl) => {
      repl.showTokens = !repl.showTokens;
      console.log(`Token dump: ${repl.showTokens ? "on" : "off"}`);
    },
  },
  dis: {
    description: "Toggle bytecode disassembly of compiled input",
    handler: (repl) => {
      repl.showBytecode = !repl.showBytecode;
      console.log(`Disassembly: ${repl.showBytecode ? "on" : "off"}`);
    },
  },
  trace: {
    description: "Toggle instruction tracing",
    handler: (repl) => {
      const vm = repl.session.vm;
      vm.traceExecution = !vm.traceExecution;
      console.log(`Execution trace: ${vm.traceExecution ? "on" : "off"}`);
    },
  },
  gc: {
    description: "Run the garbage collector and show heap statistics",
    handler: (repl) => {
      const heap = repl.session.vm.heap;
      const { freed } = heap.collect();
      const stats = heap.stats();
      console.log(`Freed ${freed} objects; ${stats.objects} live (${stats.strings} strings), next collection at ${stats.nextGC}`);
    },
  },
  load: {
    description: "Run a script file in this session",
    handler: (repl, args) => repl.load(args.trim()),
  },
};

// ============================================================================
// REPL State
// ============================================================================

export class Repl {
  readonly session: Session;
  done: boolean = false;
  showTokens: boolean = false;
  showBytecode: boolean = false;
  /** Lines of an input that is not complete yet. */
  private pending: string = "";
  private readonly colored: boolean;

  constructor(options: InterpretOptions = {}, colored: boolean = false) {
    this.session = new Session(options);
    this.colored = colored;
  }

  get prompt(): string {
    return this.pending === "" ? ">>> " : "... ";
  }

  showHelp(): void {
    console.log("\nCommands:");
    for (const [name, { description }] of Object.entries(COMMANDS)) {
      console.log(`  :${name.padEnd(12)} ${description}`);
    }
    console.log("\nA final expression without ';' prints its value.");
    console.log("\nExamples:");
    console.log("  1 + 2 * 3");
    console.log("  var greeting = \"hello\";");
    console.log("  fun add(a, b) { return a + b; }");
    console.log("  print add(1, 2);");
    console.log("");
  }

  /**
   * Append a line to the unfinished input. An empty line at end of file adds
   * nothing, so errors point at the last line actually typed.
   */
  private joinPending(line: string, atEof: boolean): string {
    if (this.pending === "") return line;
    if (atEof && line === "") return this.pending;
    return `${this.pending}\n${line}`;
  }

  /**
   * Handle one line of input. `atEof` flushes any pending input even if it
   * is incomplete.
   */
  processInput(line: string, atEof: boolean = false): void {
    const trimmed = line.trim();

    if (this.pending === "" && trimmed.startsWith(":")) {
      this.runCommand(trimmed.slice(1));
      return;
    }

    const source = this.joinPending(line, atEof);
    if (source.trim() === "") {
      this.pending = "";
      return;
    }

    const result = this.session.run(source, {
      replMode: true,
      printCode: this.showBytecode ? (listing) => console.log(listing) : undefined,
    });

    if (result.tag === "compileFailure" && !atEof && result.errors.every((e) => e.atEnd)) {
      this.pending = source;
      return;
    }
    this.pending = "";

    if (this.showTokens) {
      for (const token of tokenize(source)) {
        console.log(formatToken(token, { color: this.colored }));
      }
    }

    switch (result.tag) {
      case "ok":
        break;
      case "compileFailure":
        console.log(formatCompileErrors(result.errors, { color: this.colored }));
        break;
      case "runtimeFailure":
        console.log(formatRuntimeError(result.error, { color: this.colored }));
        break;
    }
  }

  load(filePath: string): void {
    if (filePath === "") {
      console.log("Usage: :load <file>");
      return;
    }

    let source: string;
    try {
      source = fs.readFileSync(filePath, "utf-8");
    } catch (err) {
      console.log(`Error reading file: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }

    const result = this.session.run(source);
    switch (result.tag) {
      case "ok":
        console.log("ok");
        break;
      case "compileFailure":
        console.log(formatCompileErrors(result.errors, { color: this.colored }));
        break;
      case "runtimeFailure":
        console.log(formatRuntimeError(result.error, { color: this.colored }));
        break;
    }
  }

  private runCommand(text: string): void {
    const spaceIdx = text.indexOf(" ");
    const name = spaceIdx > 0 ? text.slice(0, spaceIdx) : text;
    const args = spaceIdx > 0 ? text.slice(spaceIdx + 1) : "";

    const command = COMMANDS[name];
    if (command) {
      command.handler(this, args);
    } else {
      console.log(`Unknown command: :${name}. Type :help for available commands.`);
    }
  }
}

// ============================================================================
// Main
// ============================================================================

export function startRepl(options: InterpretOptions = {}): void {
  console.log("Lox bytecode VM");
  console.log("Type :help for available commands, :exit to quit\n");

  const repl = new Repl(options, process.stdout.isTTY);
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: repl.prompt,
  });

  rl.prompt();

  rl.on("line", (line: string) => {
    repl.processInput(line);
    if (repl.done) {
      rl.close();
      return;
    }
    rl.setPrompt(repl.prompt);
    rl.prompt();
  });

  rl.on("close", () => {
    repl.processInput("", true);
    console.log("\nGoodbye!");
    process.exit(0);
  });
}

// Run if executed directly
if (require.main === module) {
  startRepl();
}
