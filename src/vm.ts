/**
 * Virtual machine - executes compiled chunks.
 *
 * One operand stack is shared by all call frames; each frame's locals are a
 * window into it starting at the frame's base slot (slot 0 holds the callee).
 * Captured variables stay on the stack while their frame is live and are
 * copied into their upvalue ("closed") when the frame goes away.
 */

import { disassembleInstruction } from "./disassembler";
import { InternalError } from "./errors";
import { Heap } from "./heap";
import type { HeapOptions, RootSource } from "./heap";
import { NativeError, STANDARD_NATIVES } from "./natives";
import { OpCode, isOpCode } from "./opcode";
import {
  boolVal,
  falseVal,
  formatValue,
  isFalsey,
  nilVal,
  numberVal,
  trueVal,
  typeName,
  valuesEqual,
} from "./value";
import type { NativeFn, ObjClosure, ObjFunction, ObjString, ObjUpvalue, Value } from "./value";

// ============================================================================
// Options and Results
// ============================================================================

export interface VMOptions extends HeapOptions {
  /** Receives each line written by `print`. Defaults to console.log. */
  stdout?: (text: string) => void;
  /** Receives execution traces. Defaults to console.error. */
  trace?: (text: string) => void;
  /** Trace the stack and each instruction before it executes. */
  traceExecution?: boolean;
  /** Maximum call depth before "Stack overflow." */
  maxFrames?: number;
}

export type RunResult = { tag: "ok" } | { tag: "runtimeFailure"; error: RuntimeError };

export const DEFAULT_MAX_FRAMES = 64;

// ============================================================================
// Errors
// ============================================================================

export class RuntimeError extends Error {
  constructor(
    public readonly reason: string,
    /** Source line of the failing instruction. */
    public readonly line: number,
    /** One entry per active frame, innermost first. */
    public readonly trace: string[]
  ) {
    super(reason);
    this.name = "RuntimeError";
  }
}

// ============================================================================
// Call Frames
// ============================================================================

interface CallFrame {
  closure: ObjClosure;
  /** Offset of the next byte to execute in the closure's chunk. */
  ip: number;
  /** Stack index of slot 0 of this frame. */
  base: number;
}

type NumericOp = (a: number, b: number) => Value;

const NUMERIC_OPS: Partial<Record<OpCode, NumericOp>> = {
  [OpCode.GREATER]: (a, b) => boolVal(a > b),
  [OpCode.GREATER_EQUAL]: (a, b) => boolVal(a >= b),
  [OpCode.LESS]: (a, b) => boolVal(a < b),
  [OpCode.LESS_EQUAL]: (a, b) => boolVal(a <= b),
  [OpCode.SUBTRACT]: (a, b) => numberVal(a - b),
  [OpCode.MULTIPLY]: (a, b) => numberVal(a * b),
  [OpCode.DIVIDE]: (a, b) => numberVal(a / b),
};

// ============================================================================
// VM Class
// ============================================================================

export class VM implements RootSource {
  readonly heap: Heap;
  private stack: Value[] = [];
  private frames: CallFrame[] = [];
  private globals: Map<ObjString, Value> = new Map();
  /** Open upvalues, ordered by descending stack slot. */
  private openUpvalues: ObjUpvalue | null = null;
  private readonly stdout: (text: string) => void;
  private readonly traceOut: (text: string) => void;
  private readonly maxFrames: number;
  traceExecution: boolean;

  constructor(options: VMOptions = {}, heap?: Heap) {
    this.heap = heap ?? new Heap(options);
    this.stdout = options.stdout ?? ((text) => console.log(text));
    this.traceOut = options.trace ?? ((text) => console.error(text));
    this.traceExecution = options.traceExecution ?? false;
    this.maxFrames = options.maxFrames ?? DEFAULT_MAX_FRAMES;

    this.heap.addRootSource(this);
    for (const native of STANDARD_NATIVES) {
      this.defineNative(native.name, native.arity, native.fn);
    }
  }

  /**
   * Run a compiled script function to completion or to its first runtime
   * error. Globals survive between calls; the stacks do not.
   */
  interpret(fn: ObjFunction): RunResult {
    try {
      this.push(fn);
      const closure = this.heap.newClosure(fn);
      this.pop();
      this.push(closure);
      this.call(closure, 0);
      this.run();
      return { tag: "ok" };
    } catch (e) {
      this.resetStack();
      if (e instanceof RuntimeError) {
        return { tag: "runtimeFailure", error: e };
      }
      throw e;
    }
  }

  defineNative(name: string, arity: number, fn: NativeFn): void {
    const nameObj = this.heap.intern(name);
    this.push(nameObj);
    const native = this.heap.newNative(nameObj, arity, fn);
    this.push(native);
    this.globals.set(nameObj, native);
    this.pop();
    this.pop();
  }

  getGlobal(name: string): Value | undefined {
    const key = this.heap.findString(name);
    return key === undefined ? undefined : this.globals.get(key);
  }

  get stackDepth(): number {
    return this.stack.length;
  }

  markRoots(heap: Heap): void {
    for (const value of this.stack) {
      heap.markValue(value);
    }
    for (const frame of this.frames) {
      heap.markObject(frame.closure);
    }
    for (let upvalue = this.openUpvalues; upvalue !== null; upvalue = upvalue.next) {
      heap.markObject(upvalue);
    }
    for (const [name, value] of this.globals) {
      heap.markObject(name);
      heap.markValue(value);
    }
  }

  // ==========================================================================
  // Stack
  // ==========================================================================

  private push(value: Value): void {
    this.stack.push(value);
  }

  private pop(): Value {
    const value = this.stack.pop();
    if (value === undefined) {
      throw new InternalError("operand stack underflow");
    }
    return value;
  }

  private peek(distance: number): Value {
    const value = this.stack[this.stack.length - 1 - distance];
    if (value === undefined) {
      throw new InternalError(`peek ${distance} below the bottom of the stack`);
    }
    return value;
  }

  private resetStack(): void {
    // Escaped closures keep the values their variables had when execution stopped
    this.closeUpvalues(0);
    this.stack = [];
    this.frames = [];
    this.openUpvalues = null;
  }

  private frame(): CallFrame {
    const frame = this.frames[this.frames.length - 1];
    if (frame === undefined) {
      throw new InternalError("no active call frame");
    }
    return frame;
  }

  // ==========================================================================
  // Errors
  // ==========================================================================

  private runtimeError(message: string): RuntimeError {
    const trace: string[] = [];
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      const fn = frame.closure.fn;
      // ip has already moved past the failing instruction
      const line = fn.chunk.lines[Math.max(frame.ip - 1, 0)];
      trace.push(`[line ${line}] in ${fn.name === null ? "script" : `${fn.name.chars}()`}`);
    }

    const top = this.frames[this.frames.length - 1];
    const line = top === undefined ? 0 : top.closure.fn.chunk.lines[Math.max(top.ip - 1, 0)];
    return new RuntimeError(message, line, trace);
  }

  // ==========================================================================
  // Calls
  // ==========================================================================

  private callValue(callee: Value, argCount: number): void {
    switch (callee.tag) {
      case "closure":
        this.call(callee, argCount);
        return;

      case "native": {
        if (argCount !== callee.arity) {
          throw this.runtimeError(`Expected ${callee.arity} arguments but got ${argCount}.`);
        }
        const args = this.stack.slice(this.stack.length - argCount);
        let result: Value;
        try {
          result = callee.fn(args);
        } catch (e) {
          if (e instanceof NativeError) throw this.runtimeError(e.message);
          throw e;
        }
        this.stack.length -= argCount + 1;
        this.push(result);
        return;
      }

      default:
        throw this.runtimeError("Can only call functions.");
    }
  }

  private call(closure: ObjClosure, argCount: number): void {
    if (argCount !== closure.fn.arity) {
      throw this.runtimeError(`Expected ${closure.fn.arity} arguments but got ${argCount}.`);
    }
    if (this.frames.length >= this.maxFrames) {
      throw this.runtimeError("Stack overflow.");
    }

    const base = this.stack.length - argCount - 1;
    if (base < 0) {
      throw new InternalError(`frame base ${base} below the bottom of the stack`);
    }
    this.frames.push({ closure, ip: 0, base });
  }

  // ==========================================================================
  // Upvalues
  // ==========================================================================

  private captureUpvalue(slot: number): ObjUpvalue {
    let prev: ObjUpvalue | null = null;
    let upvalue = this.openUpvalues;
    while (upvalue !== null && upvalue.slot > slot) {
      prev = upvalue;
      upvalue = upvalue.next;
    }

    // Every closure capturing this slot shares one upvalue
    if (upvalue !== null && upvalue.slot === slot) return upvalue;

    const created = this.heap.newUpvalue(slot);
    created.next = upvalue;
    if (prev === null) {
      this.openUpvalues = created;
    } else {
      prev.next = created;
    }
    return created;
  }

  /**
   * Close every open upvalue at or above `lastSlot`.
   */
  private closeUpvalues(lastSlot: number): void {
    while (this.openUpvalues !== null && this.openUpvalues.slot >= lastSlot) {
      const upvalue = this.openUpvalues;
      upvalue.closed = this.stack[upvalue.slot];
      upvalue.isOpen = false;
      this.openUpvalues = upvalue.next;
      upvalue.next = null;
    }
  }

  private readUpvalue(upvalue: ObjUpvalue): Value {
    return upvalue.isOpen ? this.stack[upvalue.slot] : upvalue.closed;
  }

  private writeUpvalue(upvalue: ObjUpvalue, value: Value): void {
    if (upvalue.isOpen) {
      this.stack[upvalue.slot] = value;
    } else {
      upvalue.closed = value;
    }
  }

  // ==========================================================================
  // Dispatch Loop
  // ==========================================================================

  private readByte(frame: CallFrame): number {
    return frame.closure.fn.chunk.code[frame.ip++];
  }

  private readShort(frame: CallFrame): number {
    const value = frame.closure.fn.chunk.read16(frame.ip);
    frame.ip += 2;
    return value;
  }

  private readConstant(frame: CallFrame): Value {
    return frame.closure.fn.chunk.constants[this.readByte(frame)];
  }

  private readString(frame: CallFrame): ObjString {
    const value = this.readConstant(frame);
    if (value.tag !== "string") {
      throw new InternalError(`expected a string constant, found ${value.tag}`);
    }
    return value;
  }

  private traceInstruction(frame: CallFrame): void {
    const slots = this.stack.map((value) => `[ ${formatValue(value)} ]`).join("");
    this.traceOut(`          ${slots}`);
    this.traceOut(disassembleInstruction(frame.closure.fn.chunk, frame.ip).text);
  }

  private run(): void {
    for (;;) {
      const frame = this.frame();
      if (this.traceExecution) this.traceInstruction(frame);

      const instruction = this.readByte(frame);
      if (!isOpCode(instruction)) {
        throw new InternalError(`unknown opcode ${instruction} at offset ${frame.ip - 1}`);
      }

      switch (instruction) {
        case OpCode.CONSTANT:
          this.push(this.readConstant(frame));
          break;
        case OpCode.NIL:
          this.push(nilVal);
          break;
        case OpCode.TRUE:
          this.push(trueVal);
          break;
        case OpCode.FALSE:
          this.push(falseVal);
          break;
        case OpCode.POP:
          this.pop();
          break;

        case OpCode.GET_LOCAL: {
          const slot = this.readByte(frame);
          this.push(this.stack[frame.base + slot]);
          break;
        }
        case OpCode.SET_LOCAL: {
          const slot = this.readByte(frame);
          // Assignment is an expression, so the value stays on the stack
          this.stack[frame.base + slot] = this.peek(0);
          break;
        }
        case OpCode.GET_GLOBAL: {
          const name = this.readString(frame);
          const value = this.globals.get(name);
          if (value === undefined) {
            throw this.runtimeError(`Undefined variable '${name.chars}'.`);
          }
          this.push(value);
          break;
        }
        case OpCode.DEFINE_GLOBAL: {
          const name = this.readString(frame);
          this.globals.set(name, this.peek(0));
          this.pop();
          break;
        }
        case OpCode.SET_GLOBAL: {
          const name = this.readString(frame);
          if (!this.globals.has(name)) {
            throw this.runtimeError(`Undefined variable '${name.chars}'.`);
          }
          this.globals.set(name, this.peek(0));
          break;
        }
        case OpCode.GET_UPVALUE: {
          const index = this.readByte(frame);
          this.push(this.readUpvalue(frame.closure.upvalues[index]));
          break;
        }
        case OpCode.SET_UPVALUE: {
          const index = this.readByte(frame);
          this.writeUpvalue(frame.closure.upvalues[index], this.peek(0));
          break;
        }

        case OpCode.EQUAL: {
          const b = this.pop();
          const a = this.pop();
          this.push(boolVal(valuesEqual(a, b)));
          break;
        }
        case OpCode.ADD:
          this.add();
          break;
        case OpCode.GREATER:
        case OpCode.GREATER_EQUAL:
        case OpCode.LESS:
        case OpCode.LESS_EQUAL:
        case OpCode.SUBTRACT:
        case OpCode.MULTIPLY:
        case OpCode.DIVIDE:
          this.numericBinary(instruction);
          break;
        case OpCode.NOT:
          this.push(boolVal(isFalsey(this.pop())));
          break;
        case OpCode.NEGATE: {
          const operand = this.peek(0);
          if (operand.tag !== "number") {
            throw this.runtimeError("Operand must be a number.");
          }
          this.pop();
          this.push(numberVal(-operand.value));
          break;
        }
        case OpCode.TYPEOF: {
          const name = this.heap.intern(typeName(this.peek(0)));
          this.pop();
          this.push(name);
          break;
        }

        case OpCode.PRINT:
          this.stdout(formatValue(this.pop()));
          break;

        case OpCode.JUMP: {
          const offset = this.readShort(frame);
          frame.ip += offset;
          break;
        }
        case OpCode.JUMP_IF_FALSE: {
          const offset = this.readShort(frame);
          if (isFalsey(this.peek(0))) frame.ip += offset;
          break;
        }
        case OpCode.LOOP: {
          const offset = this.readShort(frame);
          frame.ip -= offset;
          break;
        }

        case OpCode.CALL: {
          const argCount = this.readByte(frame);
          this.callValue(this.peek(argCount), argCount);
          break;
        }
        case OpCode.CLOSURE: {
          const fn = this.readConstant(frame);
          if (fn.tag !== "function") {
            throw new InternalError(`closure over a ${fn.tag} constant`);
          }
          const closure = this.heap.newClosure(fn);
          // On the stack before capturing, so it survives a collection
          this.push(closure);
          for (const descriptor of fn.upvalues) {
            closure.upvalues.push(
              descriptor.isLocal
                ? this.captureUpvalue(frame.base + descriptor.index)
                : frame.closure.upvalues[descriptor.index]
            );
          }
          break;
        }
        case OpCode.CLOSE_UPVALUE:
          this.closeUpvalues(this.stack.length - 1);
          this.pop();
          break;

        case OpCode.RETURN: {
          const result = this.pop();
          this.closeUpvalues(frame.base);
          this.frames.pop();
          this.stack.length = frame.base;
          if (this.frames.length === 0) return;
          this.push(result);
          break;
        }

        default: {
          const _exhaustive: never = instruction;
          throw new InternalError(`unhandled opcode ${String(_exhaustive)}`);
        }
      }
    }
  }

  private add(): void {
    const b = this.peek(0);
    const a = this.peek(1);

    if (a.tag === "string" && b.tag === "string") {
      // Operands stay on the stack until the result is interned
      const result = this.heap.intern(a.chars + b.chars);
      this.pop();
      this.pop();
      this.push(result);
    } else if (a.tag === "number" && b.tag === "number") {
      this.pop();
      this.pop();
      this.push(numberVal(a.value + b.value));
    } else {
      throw this.runtimeError("Operands must be two numbers or two strings.");
    }
  }

  private numericBinary(op: OpCode): void {
    const b = this.peek(0);
    const a = this.peek(1);
    if (a.tag !== "number" || b.tag !== "number") {
      throw this.runtimeError("Operands must be numbers.");
    }

    const apply = NUMERIC_OPS[op];
    if (apply === undefined) {
      throw new InternalError(`${OpCode[op]} is not a numeric operator`);
    }
    this.pop();
    this.pop();
    this.push(apply(a.value, b.value));
  }
}
