/**
 * Tests for the single-pass compiler: emitted bytecode, scoping and
 * compile errors.
 */

import { describe, it, expect } from "vitest";
import { Heap, OpCode, compile, formatValue } from "../src/index";
import type { CompilerOptions, ObjFunction } from "../src/index";

function compileOk(source: string, options: CompilerOptions = {}): ObjFunction {
  const result = compile(source, new Heap(), options);
  if (result.tag === "error") {
    throw new Error(result.errors.map((e) => e.message).join("\n"));
  }
  return result.fn;
}

function compileErrors(source: string, options: CompilerOptions = {}): string[] {
  const result = compile(source, new Heap(), options);
  return result.tag === "error" ? result.errors.map((e) => e.message) : [];
}

function nestedFunction(fn: ObjFunction, name: string): ObjFunction {
  for (const constant of fn.chunk.constants) {
    if (constant.tag === "function" && constant.name?.chars === name) return constant;
  }
  throw new Error(`no function '${name}' in constant pool`);
}

describe("Compiler", () => {
  describe("expressions", () => {
    it("emits operands before their operator", () => {
      const fn = compileOk("print 1 + 2;");
      expect(fn.chunk.code).toEqual([
        OpCode.CONSTANT, 0,
        OpCode.CONSTANT, 1,
        OpCode.ADD,
        OpCode.PRINT,
        OpCode.NIL,
        OpCode.RETURN,
      ]);
      expect(fn.chunk.constants.map(formatValue)).toEqual(["1", "2"]);
    });

    it("reuses the constant slot for a repeated literal", () => {
      const fn = compileOk("print 1 + 1;");
      expect(fn.chunk.code.slice(0, 4)).toEqual([OpCode.CONSTANT, 0, OpCode.CONSTANT, 0]);
      expect(fn.chunk.constants).toHaveLength(1);
    });

    it("respects precedence", () => {
      const fn = compileOk("print 1 + 2 * 3;");
      expect(fn.chunk.code).toEqual([
        OpCode.CONSTANT, 0,
        OpCode.CONSTANT, 1,
        OpCode.CONSTANT, 2,
        OpCode.MULTIPLY,
        OpCode.ADD,
        OpCode.PRINT,
        OpCode.NIL,
        OpCode.RETURN,
      ]);
    });

    it("has dedicated opcodes for >= and <=", () => {
      expect(compileOk("print 1 >= 2;").chunk.code[4]).toBe(OpCode.GREATER_EQUAL);
      expect(compileOk("print 1 <= 2;").chunk.code[4]).toBe(OpCode.LESS_EQUAL);
    });

    it("compiles != as equality then not", () => {
      expect(compileOk("print 1 != 2;").chunk.code.slice(4, 6)).toEqual([OpCode.EQUAL, OpCode.NOT]);
    });

    it("compiles typeof as a unary operator", () => {
      expect(compileOk("print typeof nil;").chunk.code).toEqual([
        OpCode.NIL,
        OpCode.TYPEOF,
        OpCode.PRINT,
        OpCode.NIL,
        OpCode.RETURN,
      ]);
    });

    it("strips the quotes from string literals", () => {
      const fn = compileOk('print "hi";');
      expect(fn.chunk.constants.map(formatValue)).toEqual(["hi"]);
    });
  });

  describe("variables", () => {
    it("defines globals by name", () => {
      const fn = compileOk("var a = 1;");
      expect(fn.chunk.code).toEqual([OpCode.CONSTANT, 1, OpCode.DEFINE_GLOBAL, 0, OpCode.NIL, OpCode.RETURN]);
      expect(fn.chunk.constants.map(formatValue)).toEqual(["a", "1"]);
    });

    it("addresses locals by slot and pops them at scope end", () => {
      const fn = compileOk("{ var a = 1; print a; }");
      expect(fn.chunk.code).toEqual([
        OpCode.CONSTANT, 0,
        OpCode.GET_LOCAL, 1,
        OpCode.PRINT,
        OpCode.POP,
        OpCode.NIL,
        OpCode.RETURN,
      ]);
    });

    it("closes captured locals instead of popping them", () => {
      const fn = compileOk("{ var x = 1; fun f() { return x; } }");
      expect(fn.chunk.code).toEqual([
        OpCode.CONSTANT, 0,
        OpCode.CLOSURE, 1,
        OpCode.POP,
        OpCode.CLOSE_UPVALUE,
        OpCode.NIL,
        OpCode.RETURN,
      ]);
    });
  });

  describe("control flow", () => {
    it("patches if/else jumps", () => {
      const fn = compileOk("if (true) print 1;");
      expect(fn.chunk.code).toEqual([
        OpCode.TRUE,
        OpCode.JUMP_IF_FALSE, 0, 7,
        OpCode.POP,
        OpCode.CONSTANT, 0,
        OpCode.PRINT,
        OpCode.JUMP, 0, 1,
        OpCode.POP,
        OpCode.NIL,
        OpCode.RETURN,
      ]);
    });

    it("loops back to the condition", () => {
      const fn = compileOk("while (false) {}");
      expect(fn.chunk.code).toEqual([
        OpCode.FALSE,
        OpCode.JUMP_IF_FALSE, 0, 4,
        OpCode.POP,
        OpCode.LOOP, 0, 8,
        OpCode.POP,
        OpCode.NIL,
        OpCode.RETURN,
      ]);
    });
  });

  describe("functions", () => {
    it("records arity and a name", () => {
      const script = compileOk("fun add(a, b) { return a + b; }");
      const add = nestedFunction(script, "add");
      expect(add.arity).toBe(2);
      expect(add.chunk.code).toEqual([
        OpCode.GET_LOCAL, 1,
        OpCode.GET_LOCAL, 2,
        OpCode.ADD,
        OpCode.RETURN,
        OpCode.NIL,
        OpCode.RETURN,
      ]);
    });

    it("describes captures of an enclosing local", () => {
      const script = compileOk("fun outer() { var x = 1; fun inner() { return x; } return inner; }");
      const inner = nestedFunction(nestedFunction(script, "outer"), "inner");
      expect(inner.upvalues).toEqual([{ isLocal: true, index: 1 }]);
      expect(inner.chunk.code.slice(0, 2)).toEqual([OpCode.GET_UPVALUE, 0]);
    });

    it("threads captures through intermediate functions", () => {
      const script = compileOk("fun a() { var x = 1; fun b() { fun c() { return x; } return c; } return b; }");
      const b = nestedFunction(nestedFunction(script, "a"), "b");
      const c = nestedFunction(b, "c");
      expect(b.upvalues).toEqual([{ isLocal: true, index: 1 }]);
      expect(c.upvalues).toEqual([{ isLocal: false, index: 0 }]);
    });

    it("captures a variable once however often it is used", () => {
      const script = compileOk("fun f() { var x = 1; fun g() { return x + x; } }");
      const g = nestedFunction(nestedFunction(script, "f"), "g");
      expect(g.upvalues).toHaveLength(1);
    });

    it("freezes every finished chunk", () => {
      const script = compileOk("fun f() {}");
      expect(script.chunk.isFrozen).toBe(true);
      expect(nestedFunction(script, "f").chunk.isFrozen).toBe(true);
    });
  });

  describe("errors", () => {
    it("recovers and reports each bad statement", () => {
      expect(compileErrors("print 1 +;\nvar = 3;")).toEqual([
        "[line 1] Error at ';': Expect expression.",
        "[line 2] Error at '=': Expect variable name.",
      ]);
    });

    it("rejects invalid assignment targets", () => {
      expect(compileErrors("1 + 2 = 3;")).toEqual(["[line 1] Error at '=': Invalid assignment target."]);
    });

    it("rejects return at top level", () => {
      expect(compileErrors("return 1;")).toEqual(["[line 1] Error at 'return': Can't return from top-level code."]);
    });

    it("rejects reading a local in its own initializer", () => {
      expect(compileErrors("{ var a = a; }")).toEqual([
        "[line 1] Error at 'a': Can't read local variable in its own initializer.",
      ]);
    });

    it("rejects redeclaring a local in the same scope", () => {
      expect(compileErrors("{ var a = 1; var a = 2; }")).toEqual([
        "[line 1] Error at 'a': Already a variable with this name in this scope.",
      ]);
    });

    it("allows shadowing in an inner scope", () => {
      expect(compileErrors("{ var a = 1; { var a = 2; } }")).toEqual([]);
    });

    it("has no expression form for class keywords", () => {
      expect(compileErrors("print this;")).toEqual(["[line 1] Error at 'this': Expect expression."]);
    });

    it("reports lexical errors without a location", () => {
      expect(compileErrors("print @;")).toEqual(["[line 1] Error: Unexpected character."]);
    });

    it("flags errors at end of input", () => {
      const result = compile("print 1", new Heap());
      expect(result.tag).toBe("error");
      if (result.tag !== "error") return;
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].message).toBe("[line 1] Error at end: Expect ';' after value.");
      expect(result.errors[0].atEnd).toBe(true);
    });

    it("limits a chunk to 256 constants", () => {
      const terms = Array.from({ length: 300 }, (_, i) => String(i));
      expect(compileErrors(`print ${terms.join(" + ")};`)).toEqual([
        "[line 1] Error at '256': Too many constants in one chunk.",
      ]);
    });

    it("limits a function to 256 local slots", () => {
      const decls = Array.from({ length: 256 }, (_, i) => `var v${i};`);
      expect(compileErrors(`{ ${decls.join(" ")} }`)).toEqual([
        "[line 1] Error at 'v255': Too many local variables in function.",
      ]);
    });

    it("limits calls to 255 arguments", () => {
      const args = Array.from({ length: 256 }, () => "nil");
      expect(compileErrors(`f(${args.join(", ")});`)).toEqual([
        "[line 1] Error at 'nil': Can't have more than 255 arguments.",
      ]);
    });

    it("limits functions to 255 parameters", () => {
      const params = Array.from({ length: 256 }, (_, i) => `p${i}`);
      expect(compileErrors(`fun f(${params.join(", ")}) {}`)).toEqual([
        "[line 1] Error at 'p255': Can't have more than 255 parameters.",
      ]);
    });

    it("limits a function to 256 captured variables", () => {
      const outer = Array.from({ length: 200 }, (_, i) => `var a${i};`).join(" ");
      const middle = Array.from({ length: 200 }, (_, i) => `var b${i};`).join(" ");
      const uses = [
        ...Array.from({ length: 200 }, (_, i) => `a${i};`),
        ...Array.from({ length: 57 }, (_, i) => `b${i};`),
      ].join(" ");
      const source = `fun outer() { ${outer} fun middle() { ${middle} fun inner() { ${uses} } } }`;
      expect(compileErrors(source)).toEqual([
        "[line 1] Error at 'b56': Too many closure variables in function.",
      ]);
    });

    it("rejects a forward jump past 65535 bytes", () => {
      const body = "print 1;".repeat(22000);
      expect(compileErrors(`if (true) { ${body} }`)).toEqual([
        "[line 1] Error at '}': Too much code to jump over.",
      ]);
    });

    it("rejects a loop body past 65535 bytes", () => {
      const body = "print 1;".repeat(22000);
      expect(compileErrors(`while (true) { ${body} }`)).toEqual([
        "[line 1] Error at '}': Loop body too large.",
      ]);
    });

    it("reports deeply nested expressions once", () => {
      const source = `print ${"(".repeat(20000)}1${")".repeat(20000)};`;
      expect(compileErrors(source)).toEqual(["[line 1] Error at '(': Nesting is too deep."]);
    });

    it("reports deeply nested blocks once", () => {
      expect(compileErrors(`${"{".repeat(5000)}${"}".repeat(5000)}`)).toEqual([
        "[line 1] Error at '{': Nesting is too deep.",
      ]);
    });

    it("accepts nesting below the limit", () => {
      expect(compileErrors(`print ${"(".repeat(100)}1${")".repeat(100)};`)).toEqual([]);
    });
  });

  describe("REPL mode", () => {
    it("prints a final expression without ';'", () => {
      const fn = compileOk("1 + 2", { replMode: true });
      expect(fn.chunk.code.slice(-4)).toEqual([OpCode.ADD, OpCode.PRINT, OpCode.NIL, OpCode.RETURN]);
    });

    it("discards a final expression with ';'", () => {
      const fn = compileOk("1 + 2;", { replMode: true });
      expect(fn.chunk.code.slice(-4)).toEqual([OpCode.ADD, OpCode.POP, OpCode.NIL, OpCode.RETURN]);
    });

    it("still requires ';' outside REPL mode", () => {
      expect(compileErrors("1 + 2")).toEqual(["[line 1] Error at end: Expect ';' after expression."]);
    });

    it("still requires ';' inside a block", () => {
      expect(compileErrors("{ 1 }", { replMode: true })).toEqual([
        "[line 1] Error at '}': Expect ';' after expression.",
        "[line 1] Error at end: Expect '}' after block.",
      ]);
    });

    it("only echoes a top-level expression statement", () => {
      expect(compileErrors("if (true) 1", { replMode: true })).toEqual([
        "[line 1] Error at end: Expect ';' after expression.",
      ]);
    });
  });

  describe("listing hook", () => {
    it("receives each function's disassembly, innermost first", () => {
      const listings: string[] = [];
      compileOk("fun f() {}", { printCode: (listing) => listings.push(listing) });
      expect(listings).toEqual([
        "== f ==\n0000    1 OP_NIL\n0001    | OP_RETURN",
        "== <script> ==\n0000    1 OP_CLOSURE          1 '<fn f>'\n0002    | OP_DEFINE_GLOBAL    0 'f'\n0004    | OP_NIL\n0005    | OP_RETURN",
      ]);
    });

    it("is not called when compilation fails", () => {
      const listings: string[] = [];
      compileErrors("print ;", { printCode: (listing) => listings.push(listing) });
      expect(listings).toEqual([]);
    });
  });
});
