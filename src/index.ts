/**
 * Lox bytecode compiler and virtual machine.
 */

// Scanner
export { Lexer, tokenize } from "./lexer";
export type { Token, TokenType } from "./lexer";

// Bytecode
export { OpCode, operandWidth, opName, isOpCode } from "./opcode";
export { Chunk, MAX_CONSTANTS } from "./chunk";
export { disassembleChunk, disassembleInstruction } from "./disassembler";
export type { DisassembledInstruction } from "./disassembler";

// Values and heap
export {
  nilVal,
  trueVal,
  falseVal,
  boolVal,
  numberVal,
  isObj,
  isFalsey,
  valuesEqual,
  formatValue,
  formatNumber,
  typeName,
} from "./value";
export type {
  Value,
  Obj,
  NilValue,
  BoolValue,
  NumberValue,
  ObjString,
  ObjFunction,
  ObjNative,
  ObjClosure,
  ObjUpvalue,
  UpvalueDescriptor,
  NativeFn,
} from "./value";
export { Heap } from "./heap";
export type { HeapOptions, HeapStats, CollectionStats, RootSource } from "./heap";

// Compiler
export { Compiler, CompileError, compile, PREC } from "./compiler";
export type { CompilerOptions, CompileResult } from "./compiler";

// Virtual machine
export { VM, RuntimeError, DEFAULT_MAX_FRAMES } from "./vm";
export type { VMOptions, RunResult } from "./vm";
export { NativeError, STANDARD_NATIVES } from "./natives";
export type { NativeDefinition } from "./natives";
export { InternalError } from "./errors";

// Pipeline
export { interpret, Session, EXIT_CODES } from "./interpret";
export type { InterpretResult, InterpretOptions } from "./interpret";

// Diagnostics
export { formatCompileError, formatCompileErrors, formatRuntimeError, formatToken } from "./diagnostics";
export type { FormatOptions } from "./diagnostics";
