/**
 * Disassembler - renders a chunk as a human-readable listing.
 *
 * Read-only: nothing here writes to the chunk, so listing the same chunk
 * twice gives the same text.
 *
 * Example:
 *
 *   == <script> ==
 *   0000    1 OP_CONSTANT         0 '1'
 *   0002    | OP_CONSTANT         1 '2'
 *   0004    | OP_ADD
 */

import type { Chunk } from "./chunk";
import { OpCode, isOpCode, opName, operandWidth } from "./opcode";
import { formatValue } from "./value";

export interface DisassembledInstruction {
  text: string;
  /** Offset of the following instruction. */
  next: number;
}

const NAME_WIDTH = 16;

export function disassembleChunk(chunk: Chunk, name: string): string {
  const lines = [`== ${name} ==`];
  let offset = 0;
  while (offset < chunk.code.length) {
    const { text, next } = disassembleInstruction(chunk, offset);
    lines.push(text);
    offset = next;
  }
  return lines.join("\n");
}

export function disassembleInstruction(chunk: Chunk, offset: number): DisassembledInstruction {
  const prefix = `${String(offset).padStart(4, "0")} ${lineColumn(chunk, offset)} `;
  const byte = chunk.code[offset];

  if (!isOpCode(byte)) {
    return { text: `${prefix}Unknown opcode ${byte}`, next: offset + 1 };
  }

  const op = byte;
  return { text: prefix + describeOperands(chunk, op, offset), next: offset + 1 + operandWidth(op) };
}

function describeOperands(chunk: Chunk, op: OpCode, offset: number): string {
  const name = opName(op);

  switch (op) {
    case OpCode.CONSTANT:
    case OpCode.GET_GLOBAL:
    case OpCode.DEFINE_GLOBAL:
    case OpCode.SET_GLOBAL:
      return constantOperand(chunk, name, offset);

    case OpCode.GET_LOCAL:
    case OpCode.SET_LOCAL:
    case OpCode.GET_UPVALUE:
    case OpCode.SET_UPVALUE:
    case OpCode.CALL:
      return byteOperand(chunk, name, offset);

    case OpCode.JUMP:
    case OpCode.JUMP_IF_FALSE:
      return jumpOperand(chunk, name, 1, offset);

    case OpCode.LOOP:
      return jumpOperand(chunk, name, -1, offset);

    case OpCode.CLOSURE:
      return closureOperand(chunk, name, offset);

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
      return name;
  }
}

/**
 * Source line, or "   |" when it repeats the previous instruction's line.
 */
function lineColumn(chunk: Chunk, offset: number): string {
  const line = chunk.lines[offset];
  if (offset > 0 && line === chunk.lines[offset - 1]) {
    return "   |";
  }
  return String(line).padStart(4, " ");
}

function operandColumn(name: string, operand: number): string {
  return `${name.padEnd(NAME_WIDTH)} ${String(operand).padStart(4, " ")}`;
}

function constantOperand(chunk: Chunk, name: string, offset: number): string {
  const index = chunk.code[offset + 1];
  const constant = chunk.constants[index];
  const shown = constant === undefined ? "<missing>" : formatValue(constant);
  return `${operandColumn(name, index)} '${shown}'`;
}

function byteOperand(chunk: Chunk, name: string, offset: number): string {
  return operandColumn(name, chunk.code[offset + 1]);
}

function jumpOperand(chunk: Chunk, name: string, sign: 1 | -1, offset: number): string {
  const jump = chunk.read16(offset + 1);
  const target = offset + 3 + sign * jump;
  return `${operandColumn(name, offset)} -> ${target}`;
}

function closureOperand(chunk: Chunk, name: string, offset: number): string {
  const text = constantOperand(chunk, name, offset);
  const fn = chunk.constants[chunk.code[offset + 1]];
  if (fn === undefined || fn.tag !== "function" || fn.upvalues.length === 0) return text;

  const captures = fn.upvalues.map((u) => `${u.isLocal ? "local" : "upvalue"} ${u.index}`);
  return `${text} (${captures.join(", ")})`;
}
