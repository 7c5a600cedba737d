/**
 * Bytecode opcodes.
 *
 * Every instruction is one opcode byte followed by a fixed number of operand
 * bytes, given by `operandWidth`. Multi-byte operands are big-endian.
 */

export enum OpCode {
  // Constants and literals
  CONSTANT,
  NIL,
  TRUE,
  FALSE,

  // Stack
  POP,

  // Variables
  GET_LOCAL,
  SET_LOCAL,
  GET_GLOBAL,
  DEFINE_GLOBAL,
  SET_GLOBAL,
  GET_UPVALUE,
  SET_UPVALUE,

  // Comparison
  EQUAL,
  GREATER,
  GREATER_EQUAL,
  LESS,
  LESS_EQUAL,

  // Arithmetic
  ADD,
  SUBTRACT,
  MULTIPLY,
  DIVIDE,
  NOT,
  NEGATE,
  TYPEOF,

  PRINT,

  // Control flow
  JUMP,
  JUMP_IF_FALSE,
  LOOP,

  // Functions
  CALL,
  CLOSURE,
  CLOSE_UPVALUE,
  RETURN,
}

/** Largest value that fits a one-byte operand. */
export const U8_MAX = 0xff;

/** Largest value that fits a two-byte operand. */
export const U16_MAX = 0xffff;

/**
 * Number of operand bytes following the opcode.
 */
export function operandWidth(op: OpCode): number {
  switch (op) {
    case OpCode.CONSTANT:
    case OpCode.GET_LOCAL:
    case OpCode.SET_LOCAL:
    case OpCode.GET_GLOBAL:
    case OpCode.DEFINE_GLOBAL:
    case OpCode.SET_GLOBAL:
    case OpCode.GET_UPVALUE:
    case OpCode.SET_UPVALUE:
    case OpCode.CALL:
    case OpCode.CLOSURE:
      return 1;

    case OpCode.JUMP:
    case OpCode.JUMP_IF_FALSE:
    case OpCode.LOOP:
      return 2;

    case OpCode.NIL:
    case OpCode.TRUE:
    case OpCode.FALSE:
    case OpCode.POP:
    case OpCode.EQUAL:
    case OpCode.GREATER:
    case OpCode.GREATER_EQUAL:
    case OpCode.LESS:
    case OpCode.LESS_EQUAL:
    case OpCode.ADD:
    case OpCode.SUBTRACT:
    case OpCode.MULTIPLY:
    case OpCode.DIVIDE:
    case OpCode.NOT:
    case OpCode.NEGATE:
    case OpCode.TYPEOF:
    case OpCode.PRINT:
    case OpCode.CLOSE_UPVALUE:
    case OpCode.RETURN:
      return 0;

    default: {
      const _exhaustive: never = op;
      throw new Error(`Unknown opcode: ${String(_exhaustive)}`);
    }
  }
}

/**
 * Mnemonic used in disassembly, e.g. `OP_CONSTANT`.
 */
export function opName(op: OpCode): string {
  return `OP_${OpCode[op]}`;
}

/**
 * Narrow a raw byte to an opcode.
 */
export function isOpCode(byte: number): byte is OpCode {
  return OpCode[byte] !== undefined;
}
