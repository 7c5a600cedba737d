/**
 * Tests for chunks and the instruction set.
 */

import { describe, it, expect } from "vitest";
import { Chunk, Heap, InternalError, OpCode, isOpCode, numberVal, opName, operandWidth } from "../src/index";

describe("Chunk", () => {
  it("records a line for every byte", () => {
    const chunk = new Chunk();
    chunk.write(OpCode.NIL, 1);
    chunk.write(OpCode.PRINT, 2);
    expect(chunk.code).toEqual([OpCode.NIL, OpCode.PRINT]);
    expect(chunk.lines).toEqual([1, 2]);
  });

  it("rejects bytes outside 0..255", () => {
    const chunk = new Chunk();
    expect(() => chunk.write(256, 1)).toThrow(InternalError);
    expect(() => chunk.write(-1, 1)).toThrow(InternalError);
  });

  describe("constants", () => {
    it("shares a slot between equal numbers", () => {
      const chunk = new Chunk();
      expect(chunk.addConstant(numberVal(1))).toBe(0);
      expect(chunk.addConstant(numberVal(2))).toBe(1);
      expect(chunk.addConstant(numberVal(1))).toBe(0);
    });

    it("keeps 0 and -0 apart but shares NaN", () => {
      const chunk = new Chunk();
      expect(chunk.addConstant(numberVal(0))).toBe(0);
      expect(chunk.addConstant(numberVal(-0))).toBe(1);
      expect(chunk.addConstant(numberVal(NaN))).toBe(2);
      expect(chunk.addConstant(numberVal(NaN))).toBe(2);
    });

    it("shares a slot for the same interned string", () => {
      const heap = new Heap();
      const chunk = new Chunk();
      expect(chunk.addConstant(heap.intern("a"))).toBe(0);
      expect(chunk.addConstant(heap.intern("a"))).toBe(0);
      expect(chunk.constants).toHaveLength(1);
    });
  });

  describe("jump operands", () => {
    it("patches big-endian", () => {
      const chunk = new Chunk();
      chunk.write(OpCode.JUMP, 1);
      chunk.write(0xff, 1);
      chunk.write(0xff, 1);
      chunk.patch16(1, 0x0102);
      expect(chunk.code).toEqual([OpCode.JUMP, 1, 2]);
      expect(chunk.read16(1)).toBe(258);
    });

    it("refuses to patch outside the code", () => {
      const chunk = new Chunk();
      chunk.write(OpCode.JUMP, 1);
      chunk.write(0, 1);
      expect(() => chunk.patch16(1, 0)).toThrow(InternalError);
    });

    it("refuses values wider than 16 bits", () => {
      const chunk = new Chunk();
      chunk.write(0, 1);
      chunk.write(0, 1);
      expect(() => chunk.patch16(0, 0x10000)).toThrow(InternalError);
    });
  });

  it("is read-only once frozen", () => {
    const chunk = new Chunk();
    chunk.write(OpCode.RETURN, 1);
    chunk.freeze();
    expect(chunk.isFrozen).toBe(true);
    expect(() => chunk.write(OpCode.NIL, 1)).toThrow(InternalError);
    expect(() => chunk.addConstant(numberVal(1))).toThrow(InternalError);
    expect(chunk.code).toEqual([OpCode.RETURN]);
  });
});

describe("OpCode", () => {
  it("knows each instruction's operand width", () => {
    expect(operandWidth(OpCode.ADD)).toBe(0);
    expect(operandWidth(OpCode.CONSTANT)).toBe(1);
    expect(operandWidth(OpCode.CLOSURE)).toBe(1);
    expect(operandWidth(OpCode.CALL)).toBe(1);
    expect(operandWidth(OpCode.JUMP_IF_FALSE)).toBe(2);
    expect(operandWidth(OpCode.LOOP)).toBe(2);
  });

  it("names instructions", () => {
    expect(opName(OpCode.ADD)).toBe("OP_ADD");
    expect(opName(OpCode.JUMP_IF_FALSE)).toBe("OP_JUMP_IF_FALSE");
  });

  it("recognizes valid opcode bytes", () => {
    expect(isOpCode(OpCode.RETURN)).toBe(true);
    expect(isOpCode(200)).toBe(false);
  });
});
