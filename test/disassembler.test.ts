/**
 * Tests for bytecode listings.
 */

import { describe, it, expect } from "vitest";
import { Chunk, Heap, OpCode, compile, disassembleChunk, disassembleInstruction, isOpCode, numberVal, operandWidth } from "../src/index";
import type { CompilerOptions, ObjFunction } from "../src/index";

function compileOk(source: string, options: CompilerOptions = {}): ObjFunction {
  const result = compile(source, new Heap(), options);
  if (result.tag === "error") {
    throw new Error(result.errors.map((e) => e.message).join("\n"));
  }
  return result.fn;
}

function listing(source: string): string[] {
  return disassembleChunk(compileOk(source).chunk, "<script>").split("\n");
}

describe("Disassembler", () => {
  it("lists constants with their values", () => {
    expect(listing("print 1 + 2;")).toEqual([
      "== <script> ==",
      "0000    1 OP_CONSTANT         0 '1'",
      "0002    | OP_CONSTANT         1 '2'",
      "0004    | OP_ADD",
      "0005    | OP_PRINT",
      "0006    | OP_NIL",
      "0007    | OP_RETURN",
    ]);
  });

  it("shows a line number only when it changes", () => {
    expect(listing("print 1;\nprint 2;")).toEqual([
      "== <script> ==",
      "0000    1 OP_CONSTANT         0 '1'",
      "0002    | OP_PRINT",
      "0003    2 OP_CONSTANT         1 '2'",
      "0005    | OP_PRINT",
      "0006    | OP_NIL",
      "0007    | OP_RETURN",
    ]);
  });

  it("resolves forward jump targets", () => {
    const lines = listing("if (true) print 1;");
    expect(lines[2]).toBe("0001    | OP_JUMP_IF_FALSE    1 -> 11");
    expect(lines[6]).toBe("0008    | OP_JUMP             8 -> 12");
  });

  it("resolves backward loop targets", () => {
    const lines = listing("while (false) {}");
    expect(lines[2]).toBe("0001    | OP_JUMP_IF_FALSE    1 -> 8");
    expect(lines[4]).toBe("0005    | OP_LOOP             5 -> 0");
  });

  it("shows closure captures", () => {
    const listings: string[] = [];
    compileOk("fun outer() { var x = 1; fun inner() { return x; } return inner; }", {
      printCode: (text) => listings.push(text),
    });
    expect(listings[1].split("\n")).toEqual([
      "== outer ==",
      "0000    1 OP_CONSTANT         0 '1'",
      "0002    | OP_CLOSURE          1 '<fn inner>' (local 1)",
      "0004    | OP_GET_LOCAL        2",
      "0006    | OP_RETURN",
      "0007    | OP_NIL",
      "0008    | OP_RETURN",
    ]);
  });

  it("steps over operands", () => {
    const chunk = compileOk("print 1;").chunk;
    expect(disassembleInstruction(chunk, 0).next).toBe(2);
    expect(disassembleInstruction(chunk, 2)).toEqual({ text: "0002    | OP_PRINT", next: 3 });
  });

  it("steps each instruction by its operand width", () => {
    const chunk = compileOk("var i = 0; while (i < 2) { if (i == 0) print i; i = i + 1; }").chunk;
    const ops: OpCode[] = [];
    for (let offset = 0; offset < chunk.code.length; ) {
      const op = chunk.code[offset];
      if (!isOpCode(op)) throw new Error(`no opcode at ${offset}`);
      const { next } = disassembleInstruction(chunk, offset);
      expect(next).toBe(offset + 1 + operandWidth(op));
      ops.push(op);
      offset = next;
    }
    expect(ops).toContain(OpCode.JUMP_IF_FALSE);
    expect(ops).toContain(OpCode.LOOP);
  });

  it("reports bytes that are not opcodes", () => {
    const chunk = new Chunk();
    chunk.write(250, 1);
    expect(disassembleChunk(chunk, "bad")).toBe("== bad ==\n0000    1 Unknown opcode 250");
  });

  it("does not modify the chunk", () => {
    const chunk = new Chunk();
    const index = chunk.addConstant(numberVal(7));
    chunk.write(OpCode.CONSTANT, 1);
    chunk.write(index, 1);
    chunk.write(OpCode.RETURN, 2);
    const code = [...chunk.code];

    const first = disassembleChunk(chunk, "test");
    const second = disassembleChunk(chunk, "test");
    expect(second).toBe(first);
    expect(first).toBe("== test ==\n0000    1 OP_CONSTANT         0 '7'\n0002    2 OP_RETURN");
    expect(chunk.code).toEqual(code);
    expect(chunk.constants).toHaveLength(1);
  });
});
