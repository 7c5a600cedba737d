/**
 * Chunk - the compiled code of one function body.
 *
 * Holds the byte stream, a constant pool and a line table parallel to the
 * byte stream. The compiler writes into a chunk and freezes it when the
 * function body is finished; from then on it is read-only.
 */

import { InternalError } from "./errors";
import { U16_MAX, U8_MAX } from "./opcode";
import type { Value } from "./value";

/** Maximum number of constants addressable by a one-byte operand. */
export const MAX_CONSTANTS = U8_MAX + 1;

export class Chunk {
  readonly code: number[] = [];
  /** Source line of each byte in `code`. */
  readonly lines: number[] = [];
  readonly constants: Value[] = [];
  private frozen: boolean = false;

  get isFrozen(): boolean {
    return this.frozen;
  }

  write(byte: number, line: number): void {
    this.assertWritable();
    if (!Number.isInteger(byte) || byte < 0 || byte > U8_MAX) {
      throw new InternalError(`byte out of range: ${byte}`);
    }
    this.code.push(byte);
    this.lines.push(line);
  }

  /**
   * Add a constant and return its pool index. Equal numbers and identical
   * heap objects share one slot; -0 and 0 stay distinct.
   */
  addConstant(value: Value): number {
    this.assertWritable();
    const existing = this.constants.findIndex((c) => sameConstant(c, value));
    if (existing !== -1) return existing;
    this.constants.push(value);
    return this.constants.length - 1;
  }

  /**
   * Backpatch the two-byte operand at `offset` with `value`.
   */
  patch16(offset: number, value: number): void {
    this.assertWritable();
    if (offset < 0 || offset + 1 >= this.code.length) {
      throw new InternalError(`patch offset ${offset} outside chunk of ${this.code.length} bytes`);
    }
    if (value < 0 || value > U16_MAX) {
      throw new InternalError(`jump operand out of range: ${value}`);
    }
    this.code[offset] = (value >> 8) & 0xff;
    this.code[offset + 1] = value & 0xff;
  }

  read16(offset: number): number {
    return (this.code[offset] << 8) | this.code[offset + 1];
  }

  freeze(): void {
    this.frozen = true;
  }

  private assertWritable(): void {
    if (this.frozen) {
      throw new InternalError("write to a chunk that has finished compiling");
    }
  }
}

function sameConstant(a: Value, b: Value): boolean {
  if (a.tag === "number" && b.tag === "number") {
    return Object.is(a.value, b.value);
  }
  return a === b;
}
