/**
 * Compiler - single-pass bytecode compiler for Lox.
 *
 * Statements are parsed by recursive descent and expressions by precedence
 * climbing (Pratt parsing); bytecode is emitted as each construct is
 * recognized, with no intermediate syntax tree.
 *
 * Grammar (statements):
 *
 * program     = declaration* EOF
 * declaration = funDecl | varDecl | statement
 * funDecl     = "fun" IDENTIFIER "(" params? ")" block
 * varDecl     = "var" IDENTIFIER ("=" expression)? ";"
 * statement   = printStmt | ifStmt | whileStmt | forStmt | returnStmt
 *             | block | exprStmt
 * forStmt     = "for" "(" (varDecl | exprStmt | ";") expression? ";"
 *               expression? ")" statement
 *
 * Expression precedence, lowest to highest: assignment, or, and, equality,
 * comparison, term, factor, unary ("!", "-", "typeof"), call, primary.
 */

import { MAX_CONSTANTS } from "./chunk";
import type { Chunk } from "./chunk";
import { disassembleChunk } from "./disassembler";
import { InternalError } from "./errors";
import type { Heap, RootSource } from "./heap";
import { Lexer } from "./lexer";
import type { Token, TokenType } from "./lexer";
import { OpCode, U16_MAX, U8_MAX } from "./opcode";
import { numberVal } from "./value";
import type { ObjFunction, Value } from "./value";

// ============================================================================
// Options and Results
// ============================================================================

export interface CompilerOptions {
  /**
   * Accept a final expression statement without its ";" and print its value.
   * Used by the REPL.
   */
  replMode?: boolean;
  /** Receives the disassembly of every function compiled without errors. */
  printCode?: (listing: string) => void;
}

export type CompileResult =
  | { tag: "ok"; fn: ObjFunction }
  | { tag: "error"; errors: CompileError[] };

// ============================================================================
// Errors
// ============================================================================

export class CompileError extends Error {
  constructor(
    public readonly reason: string,
    public readonly line: number,
    /** " at end", " at 'lexeme'", or "" for lexical errors. */
    public readonly where: string,
    /** Raised at end of input, so more input might complete the program. */
    public readonly atEnd: boolean
  ) {
    super(`[line ${line}] Error${where}: ${reason}`);
    this.name = "CompileError";
  }
}

// ============================================================================
// Precedence
// ============================================================================

// Higher numbers bind tighter
export const PREC = {
  NONE: 0,
  ASSIGNMENT: 1, // =
  OR: 2,         // or
  AND: 3,        // and
  EQUALITY: 4,   // == !=
  COMPARISON: 5, // < > <= >=
  TERM: 6,       // + -
  FACTOR: 7,     // * /
  UNARY: 8,      // ! - typeof
  CALL: 9,       // ()
  PRIMARY: 10,
} as const;

type ParseFn = (canAssign: boolean) => void;

interface ParseRule {
  prefix: ParseFn | null;
  infix: ParseFn | null;
  precedence: number;
}

// ============================================================================
// Function State
// ============================================================================

type FunctionType = "script" | "function";

interface Local {
  name: string;
  /** -1 while the variable's initializer is being compiled. */
  depth: number;
  isCaptured: boolean;
}

const MAX_LOCALS = U8_MAX + 1;
const MAX_UPVALUES = U8_MAX + 1;
const MAX_ARGS = 255;
/** Bound on nested declarations, statements and expressions. */
const MAX_NESTING = 1000;

/**
 * Per-function compilation state. States form a chain through `enclosing`
 * that mirrors the lexical nesting of function bodies.
 */
class FunctionState {
  readonly locals: Local[] = [];
  scopeDepth: number = 0;

  constructor(
    readonly enclosing: FunctionState | null,
    readonly fn: ObjFunction,
    readonly type: FunctionType
  ) {
    // Slot 0 holds the callee itself
    this.locals.push({ name: "", depth: 0, isCaptured: false });
  }
}

// ============================================================================
// Compiler Class
// ============================================================================

export class Compiler implements RootSource {
  private lexer: Lexer;
  private current: Token;
  private previous: Token;
  private hadError: boolean = false;
  private panicMode: boolean = false;
  /** Set once the nesting limit is hit; the rest of the input is skipped. */
  private abandoned: boolean = false;
  private nesting: number = 0;
  private errors: CompileError[] = [];
  private state: FunctionState | null = null;
  private readonly rules: Partial<Record<TokenType, ParseRule>>;

  constructor(
    source: string,
    private readonly heap: Heap,
    private readonly options: CompilerOptions = {}
  ) {
    this.lexer = new Lexer(source);
    const start: Token = { type: "EOF", value: "", line: 1, column: 1 };
    this.current = start;
    this.previous = start;

    this.rules = {
      LEFT_PAREN: { prefix: () => this.grouping(), infix: () => this.call(), precedence: PREC.CALL },
      MINUS: { prefix: () => this.unary(), infix: () => this.binary(), precedence: PREC.TERM },
      PLUS: { prefix: null, infix: () => this.binary(), precedence: PREC.TERM },
      SLASH: { prefix: null, infix: () => this.binary(), precedence: PREC.FACTOR },
      STAR: { prefix: null, infix: () => this.binary(), precedence: PREC.FACTOR },
      BANG: { prefix: () => this.unary(), infix: null, precedence: PREC.NONE },
      TYPEOF: { prefix: () => this.unary(), infix: null, precedence: PREC.NONE },
      BANG_EQUAL: { prefix: null, infix: () => this.binary(), precedence: PREC.EQUALITY },
      EQUAL_EQUAL: { prefix: null, infix: () => this.binary(), precedence: PREC.EQUALITY },
      GREATER: { prefix: null, infix: () => this.binary(), precedence: PREC.COMPARISON },
      GREATER_EQUAL: { prefix: null, infix: () => this.binary(), precedence: PREC.COMPARISON },
      LESS: { prefix: null, infix: () => this.binary(), precedence: PREC.COMPARISON },
      LESS_EQUAL: { prefix: null, infix: () => this.binary(), precedence: PREC.COMPARISON },
      IDENTIFIER: { prefix: (canAssign) => this.variable(canAssign), infix: null, precedence: PREC.NONE },
      STRING: { prefix: () => this.string(), infix: null, precedence: PREC.NONE },
      NUMBER: { prefix: () => this.number(), infix: null, precedence: PREC.NONE },
      AND: { prefix: null, infix: () => this.and(), precedence: PREC.AND },
      OR: { prefix: null, infix: () => this.or(), precedence: PREC.OR },
      FALSE: { prefix: () => this.literal(), infix: null, precedence: PREC.NONE },
      NIL: { prefix: () => this.literal(), infix: null, precedence: PREC.NONE },
      TRUE: { prefix: () => this.literal(), infix: null, precedence: PREC.NONE },
    };
  }

  /**
   * Compile the whole source as the body of the implicit script function.
   */
  compile(): CompileResult {
    this.heap.addRootSource(this);
    try {
      this.beginFunction("script", null);
      this.advance();

      while (!this.match("EOF")) {
        this.declaration(true);
      }

      const fn = this.endFunction();
      return this.hadError ? { tag: "error", errors: this.errors } : { tag: "ok", fn };
    } finally {
      this.heap.removeRootSource(this);
    }
  }

  markRoots(heap: Heap): void {
    for (let state = this.state; state !== null; state = state.enclosing) {
      heap.markObject(state.fn);
    }
  }

  // ==========================================================================
  // Token Helpers
  // ==========================================================================

  private advance(): void {
    this.previous = this.current;
    for (;;) {
      this.current = this.lexer.scanToken();
      if (this.current.type !== "ERROR") break;
      this.errorAtCurrent(this.current.value);
    }
  }

  private check(type: TokenType): boolean {
    return this.current.type === type;
  }

  private match(type: TokenType): boolean {
    if (!this.check(type)) return false;
    this.advance();
    return true;
  }

  private consume(type: TokenType, message: string): void {
    if (this.check(type)) {
      this.advance();
      return;
    }
    this.errorAtCurrent(message);
  }

  // ==========================================================================
  // Error Reporting
  // ==========================================================================

  private errorAtCurrent(message: string): void {
    this.errorAt(this.current, message);
  }

  private error(message: string): void {
    this.errorAt(this.previous, message);
  }

  private errorAt(token: Token, message: string): void {
    // Suppress cascades until the parser resynchronizes
    if (this.panicMode || this.abandoned) return;
    this.panicMode = true;
    this.hadError = true;

    let where = "";
    if (token.type === "EOF") {
      where = " at end";
    } else if (token.type !== "ERROR") {
      where = ` at '${token.value}'`;
    }
    this.errors.push(new CompileError(message, token.line, where, token.type === "EOF"));
  }

  /**
   * Enter one level of nesting. Past the limit, report an error and skip to
   * the end of input so every enclosing level unwinds without parsing more.
   */
  private enterNesting(): boolean {
    if (this.nesting >= MAX_NESTING) {
      this.errorAtCurrent("Nesting is too deep.");
      this.abandoned = true;
      while (this.current.type !== "EOF") {
        this.advance();
      }
      return false;
    }
    this.nesting++;
    return true;
  }

  private leaveNesting(): void {
    this.nesting--;
  }

  /**
   * Skip tokens until something that looks like a statement boundary.
   */
  private synchronize(): void {
    this.panicMode = false;

    while (this.current.type !== "EOF") {
      if (this.previous.type === "SEMICOLON") return;
      switch (this.current.type) {
        case "CLASS":
        case "FUN":
        case "VAR":
        case "FOR":
        case "IF":
        case "WHILE":
        case "PRINT":
        case "RETURN":
          return;
        default:
          this.advance();
      }
    }
  }

  // ==========================================================================
  // Emission
  // ==========================================================================

  private get fnState(): FunctionState {
    if (this.state === null) {
      throw new InternalError("no function is being compiled");
    }
    return this.state;
  }

  private get chunk(): Chunk {
    return this.fnState.fn.chunk;
  }

  private emitByte(byte: number): void {
    this.chunk.write(byte, this.previous.line);
  }

  private emitBytes(...bytes: number[]): void {
    for (const byte of bytes) {
      this.emitByte(byte);
    }
  }

  private emitReturn(): void {
    this.emitBytes(OpCode.NIL, OpCode.RETURN);
  }

  private makeConstant(value: Value): number {
    const index = this.chunk.addConstant(value);
    if (index >= MAX_CONSTANTS) {
      this.error("Too many constants in one chunk.");
      return 0;
    }
    return index;
  }

  private emitConstant(value: Value): void {
    this.emitBytes(OpCode.CONSTANT, this.makeConstant(value));
  }

  /**
   * Emit a jump with a placeholder operand; returns the operand's offset.
   */
  private emitJump(op: OpCode): number {
    this.emitBytes(op, 0xff, 0xff);
    return this.chunk.code.length - 2;
  }

  private patchJump(offset: number): void {
    // -2 skips the operand bytes themselves
    const jump = this.chunk.code.length - offset - 2;
    if (jump > U16_MAX) {
      this.error("Too much code to jump over.");
      return;
    }
    this.chunk.patch16(offset, jump);
  }

  private emitLoop(loopStart: number): void {
    this.emitByte(OpCode.LOOP);

    const offset = this.chunk.code.length - loopStart + 2;
    if (offset > U16_MAX) this.error("Loop body too large.");

    this.emitBytes((offset >> 8) & 0xff, offset & 0xff);
  }

  // ==========================================================================
  // Functions and Scopes
  // ==========================================================================

  private beginFunction(type: FunctionType, name: string | null): void {
    let fn: ObjFunction;
    if (name === null) {
      fn = this.heap.newFunction(null);
    } else {
      const nameObj = this.heap.intern(name);
      this.heap.pushRoot(nameObj);
      fn = this.heap.newFunction(nameObj);
      this.heap.popRoot();
    }
    this.state = new FunctionState(this.state, fn, type);
  }

  private endFunction(): ObjFunction {
    this.emitReturn();
    const { fn, enclosing } = this.fnState;
    fn.chunk.freeze();

    if (this.options.printCode && !this.hadError) {
      this.options.printCode(disassembleChunk(fn.chunk, fn.name?.chars ?? "<script>"));
    }

    this.state = enclosing;
    return fn;
  }

  private beginScope(): void {
    this.fnState.scopeDepth++;
  }

  private endScope(): void {
    const state = this.fnState;
    state.scopeDepth--;

    let local = state.locals[state.locals.length - 1];
    while (local !== undefined && local.depth > state.scopeDepth) {
      this.emitByte(local.isCaptured ? OpCode.CLOSE_UPVALUE : OpCode.POP);
      state.locals.pop();
      local = state.locals[state.locals.length - 1];
    }
  }

  // ==========================================================================
  // Variables
  // ==========================================================================

  private identifierConstant(name: Token): number {
    return this.makeConstant(this.heap.intern(name.value));
  }

  private addLocal(name: Token): void {
    const state = this.fnState;
    if (state.locals.length === MAX_LOCALS) {
      this.error("Too many local variables in function.");
      return;
    }
    state.locals.push({ name: name.value, depth: -1, isCaptured: false });
  }

  private declareVariable(): void {
    const state = this.fnState;
    if (state.scopeDepth === 0) return;

    const name = this.previous;
    for (let i = state.locals.length - 1; i >= 0; i--) {
      const local = state.locals[i];
      if (local.depth !== -1 && local.depth < state.scopeDepth) break;
      if (local.name === name.value) {
        this.error("Already a variable with this name in this scope.");
      }
    }

    this.addLocal(name);
  }

  /**
   * Consume a variable name. Returns the name's constant index for globals,
   * or 0 for locals, which are addressed by slot instead.
   */
  private parseVariable(message: string): number {
    this.consume("IDENTIFIER", message);

    this.declareVariable();
    if (this.fnState.scopeDepth > 0) return 0;

    return this.identifierConstant(this.previous);
  }

  private markInitialized(): void {
    const state = this.fnState;
    if (state.scopeDepth === 0) return;
    state.locals[state.locals.length - 1].depth = state.scopeDepth;
  }

  private defineVariable(global: number): void {
    if (this.fnState.scopeDepth > 0) {
      this.markInitialized();
      return;
    }
    this.emitBytes(OpCode.DEFINE_GLOBAL, global);
  }

  private resolveLocal(state: FunctionState, name: string): number {
    for (let i = state.locals.length - 1; i >= 0; i--) {
      const local = state.locals[i];
      if (local.name === name) {
        if (local.depth === -1) {
          this.error("Can't read local variable in its own initializer.");
        }
        return i;
      }
    }
    return -1;
  }

  private addUpvalue(state: FunctionState, index: number, isLocal: boolean): number {
    const upvalues = state.fn.upvalues;
    const existing = upvalues.findIndex((u) => u.index === index && u.isLocal === isLocal);
    if (existing !== -1) return existing;

    if (upvalues.length === MAX_UPVALUES) {
      this.error("Too many closure variables in function.");
      return 0;
    }

    upvalues.push({ isLocal, index });
    return upvalues.length - 1;
  }

  /**
   * Look `name` up in the enclosing functions. Each function between the
   * definition and the use gets its own upvalue, so the chain can be
   * followed at closure-creation time without re-resolving names.
   */
  private resolveUpvalue(state: FunctionState, name: string): number {
    const enclosing = state.enclosing;
    if (enclosing === null) return -1;

    const local = this.resolveLocal(enclosing, name);
    if (local !== -1) {
      enclosing.locals[local].isCaptured = true;
      return this.addUpvalue(state, local, true);
    }

    const upvalue = this.resolveUpvalue(enclosing, name);
    if (upvalue !== -1) {
      return this.addUpvalue(state, upvalue, false);
    }

    return -1;
  }

  private namedVariable(name: Token, canAssign: boolean): void {
    const state = this.fnState;
    let getOp: OpCode;
    let setOp: OpCode;

    let arg = this.resolveLocal(state, name.value);
    if (arg !== -1) {
      getOp = OpCode.GET_LOCAL;
      setOp = OpCode.SET_LOCAL;
    } else if ((arg = this.resolveUpvalue(state, name.value)) !== -1) {
      getOp = OpCode.GET_UPVALUE;
      setOp = OpCode.SET_UPVALUE;
    } else {
      arg = this.identifierConstant(name);
      getOp = OpCode.GET_GLOBAL;
      setOp = OpCode.SET_GLOBAL;
    }

    if (canAssign && this.match("EQUAL")) {
      this.expression();
      this.emitBytes(setOp, arg);
    } else {
      this.emitBytes(getOp, arg);
    }
  }

  // ==========================================================================
  // Declarations
  // ==========================================================================

  /**
   * `topLevel` is set only for declarations directly in the script body.
   */
  private declaration(topLevel: boolean = false): void {
    if (!this.enterNesting()) return;

    if (this.match("FUN")) {
      this.funDeclaration();
    } else if (this.match("VAR")) {
      this.varDeclaration();
    } else {
      this.statement(topLevel);
    }

    if (this.panicMode) this.synchronize();
    this.leaveNesting();
  }

  private funDeclaration(): void {
    const global = this.parseVariable("Expect function name.");
    // A function may refer to itself, so it is usable before its body ends
    this.markInitialized();
    this.functionBody("function");
    this.defineVariable(global);
  }

  private functionBody(type: FunctionType): void {
    this.beginFunction(type, this.previous.value);
    this.beginScope();

    this.consume("LEFT_PAREN", "Expect '(' after function name.");
    if (!this.check("RIGHT_PAREN")) {
      do {
        const fn = this.fnState.fn;
        fn.arity++;
        if (fn.arity > MAX_ARGS) {
          this.errorAtCurrent(`Can't have more than ${MAX_ARGS} parameters.`);
        }
        const constant = this.parseVariable("Expect parameter name.");
        this.defineVariable(constant);
      } while (this.match("COMMA"));
    }
    this.consume("RIGHT_PAREN", "Expect ')' after parameters.");
    this.consume("LEFT_BRACE", "Expect '{' before function body.");
    this.block();

    // No endScope: the frame's whole stack window is discarded on return
    const fn = this.endFunction();
    this.emitBytes(OpCode.CLOSURE, this.makeConstant(fn));
  }

  private varDeclaration(): void {
    const global = this.parseVariable("Expect variable name.");

    if (this.match("EQUAL")) {
      this.expression();
    } else {
      this.emitByte(OpCode.NIL);
    }
    this.consume("SEMICOLON", "Expect ';' after variable declaration.");

    this.defineVariable(global);
  }

  // ==========================================================================
  // Statements
  // ==========================================================================

  private statement(topLevel: boolean = false): void {
    if (!this.enterNesting()) return;

    if (this.match("PRINT")) {
      this.printStatement();
    } else if (this.match("FOR")) {
      this.forStatement();
    } else if (this.match("IF")) {
      this.ifStatement();
    } else if (this.match("RETURN")) {
      this.returnStatement();
    } else if (this.match("WHILE")) {
      this.whileStatement();
    } else if (this.match("LEFT_BRACE")) {
      this.beginScope();
      this.block();
      this.endScope();
    } else {
      this.expressionStatement(topLevel);
    }

    this.leaveNesting();
  }

  private block(): void {
    while (!this.check("RIGHT_BRACE") && !this.check("EOF")) {
      this.declaration();
    }
    this.consume("RIGHT_BRACE", "Expect '}' after block.");
  }

  private printStatement(): void {
    this.expression();
    this.consume("SEMICOLON", "Expect ';' after value.");
    this.emitByte(OpCode.PRINT);
  }

  private expressionStatement(topLevel: boolean = false): void {
    this.expression();

    // In the REPL a bare trailing expression echoes its value
    if (this.options.replMode && topLevel && this.check("EOF")) {
      this.emitByte(OpCode.PRINT);
      return;
    }

    this.consume("SEMICOLON", "Expect ';' after expression.");
    this.emitByte(OpCode.POP);
  }

  private ifStatement(): void {
    this.consume("LEFT_PAREN", "Expect '(' after 'if'.");
    this.expression();
    this.consume("RIGHT_PAREN", "Expect ')' after condition.");

    const thenJump = this.emitJump(OpCode.JUMP_IF_FALSE);
    this.emitByte(OpCode.POP);
    this.statement();

    const elseJump = this.emitJump(OpCode.JUMP);
    this.patchJump(thenJump);
    this.emitByte(OpCode.POP);

    if (this.match("ELSE")) this.statement();
    this.patchJump(elseJump);
  }

  private whileStatement(): void {
    const loopStart = this.chunk.code.length;
    this.consume("LEFT_PAREN", "Expect '(' after 'while'.");
    this.expression();
    this.consume("RIGHT_PAREN", "Expect ')' after condition.");

    const exitJump = this.emitJump(OpCode.JUMP_IF_FALSE);
    this.emitByte(OpCode.POP);
    this.statement();
    this.emitLoop(loopStart);

    this.patchJump(exitJump);
    this.emitByte(OpCode.POP);
  }

  private forStatement(): void {
    this.beginScope();
    this.consume("LEFT_PAREN", "Expect '(' after 'for'.");

    if (this.match("SEMICOLON")) {
      // No initializer
    } else if (this.match("VAR")) {
      this.varDeclaration();
    } else {
      this.expressionStatement();
    }

    let loopStart = this.chunk.code.length;
    let exitJump = -1;
    if (!this.match("SEMICOLON")) {
      this.expression();
      this.consume("SEMICOLON", "Expect ';' after loop condition.");

      exitJump = this.emitJump(OpCode.JUMP_IF_FALSE);
      this.emitByte(OpCode.POP);
    }

    // The increment runs after the body, so jump over it now and loop back to it later
    if (!this.match("RIGHT_PAREN")) {
      const bodyJump = this.emitJump(OpCode.JUMP);
      const incrementStart = this.chunk.code.length;
      this.expression();
      this.emitByte(OpCode.POP);
      this.consume("RIGHT_PAREN", "Expect ')' after for clauses.");

      this.emitLoop(loopStart);
      loopStart = incrementStart;
      this.patchJump(bodyJump);
    }

    this.statement();
    this.emitLoop(loopStart);

    if (exitJump !== -1) {
      this.patchJump(exitJump);
      this.emitByte(OpCode.POP);
    }

    this.endScope();
  }

  private returnStatement(): void {
    if (this.fnState.type === "script") {
      this.error("Can't return from top-level code.");
    }

    if (this.match("SEMICOLON")) {
      this.emitReturn();
    } else {
      this.expression();
      this.consume("SEMICOLON", "Expect ';' after return value.");
      this.emitByte(OpCode.RETURN);
    }
  }

  // ==========================================================================
  // Expressions
  // ==========================================================================

  private expression(): void {
    this.parsePrecedence(PREC.ASSIGNMENT);
  }

  private getRule(type: TokenType): ParseRule {
    return this.rules[type] ?? { prefix: null, infix: null, precedence: PREC.NONE };
  }

  private parsePrecedence(precedence: number): void {
    if (!this.enterNesting()) return;

    this.advance();
    const prefix = this.getRule(this.previous.type).prefix;
    if (prefix === null) {
      this.error("Expect expression.");
      this.leaveNesting();
      return;
    }

    const canAssign = precedence <= PREC.ASSIGNMENT;
    prefix(canAssign);

    while (precedence <= this.getRule(this.current.type).precedence) {
      this.advance();
      const infix = this.getRule(this.previous.type).infix;
      if (infix === null) break;
      infix(canAssign);
    }

    if (canAssign && this.match("EQUAL")) {
      this.error("Invalid assignment target.");
    }
    this.leaveNesting();
  }

  private number(): void {
    this.emitConstant(numberVal(Number(this.previous.value)));
  }

  private string(): void {
    const text = this.previous.value;
    this.emitConstant(this.heap.intern(text.slice(1, -1)));
  }

  private literal(): void {
    switch (this.previous.type) {
      case "FALSE":
        this.emitByte(OpCode.FALSE);
        break;
      case "NIL":
        this.emitByte(OpCode.NIL);
        break;
      case "TRUE":
        this.emitByte(OpCode.TRUE);
        break;
    }
  }

  private variable(canAssign: boolean): void {
    this.namedVariable(this.previous, canAssign);
  }

  private grouping(): void {
    this.expression();
    this.consume("RIGHT_PAREN", "Expect ')' after expression.");
  }

  private unary(): void {
    const operator = this.previous.type;
    this.parsePrecedence(PREC.UNARY);

    switch (operator) {
      case "BANG":
        this.emitByte(OpCode.NOT);
        break;
      case "MINUS":
        this.emitByte(OpCode.NEGATE);
        break;
      case "TYPEOF":
        this.emitByte(OpCode.TYPEOF);
        break;
    }
  }

  private binary(): void {
    const operator = this.previous.type;
    const rule = this.getRule(operator);
    // Left-associative: the right operand binds one level tighter
    this.parsePrecedence(rule.precedence + 1);

    switch (operator) {
      case "BANG_EQUAL":
        this.emitBytes(OpCode.EQUAL, OpCode.NOT);
        break;
      case "EQUAL_EQUAL":
        this.emitByte(OpCode.EQUAL);
        break;
      case "GREATER":
        this.emitByte(OpCode.GREATER);
        break;
      case "GREATER_EQUAL":
        this.emitByte(OpCode.GREATER_EQUAL);
        break;
      case "LESS":
        this.emitByte(OpCode.LESS);
        break;
      case "LESS_EQUAL":
        this.emitByte(OpCode.LESS_EQUAL);
        break;
      case "PLUS":
        this.emitByte(OpCode.ADD);
        break;
      case "MINUS":
        this.emitByte(OpCode.SUBTRACT);
        break;
      case "STAR":
        this.emitByte(OpCode.MULTIPLY);
        break;
      case "SLASH":
        this.emitByte(OpCode.DIVIDE);
        break;
    }
  }

  private and(): void {
    const endJump = this.emitJump(OpCode.JUMP_IF_FALSE);
    this.emitByte(OpCode.POP);
    this.parsePrecedence(PREC.AND);
    this.patchJump(endJump);
  }

  private or(): void {
    const elseJump = this.emitJump(OpCode.JUMP_IF_FALSE);
    const endJump = this.emitJump(OpCode.JUMP);

    this.patchJump(elseJump);
    this.emitByte(OpCode.POP);

    this.parsePrecedence(PREC.OR);
    this.patchJump(endJump);
  }

  private call(): void {
    const argCount = this.argumentList();
    this.emitBytes(OpCode.CALL, argCount);
  }

  private argumentList(): number {
    let argCount = 0;
    if (!this.check("RIGHT_PAREN")) {
      do {
        this.expression();
        if (argCount === MAX_ARGS) {
          this.error(`Can't have more than ${MAX_ARGS} arguments.`);
        }
        argCount++;
      } while (this.match("COMMA"));
    }
    this.consume("RIGHT_PAREN", "Expect ')' after arguments.");
    return Math.min(argCount, MAX_ARGS);
  }
}

// ============================================================================
// Convenience Function
// ============================================================================

export function compile(source: string, heap: Heap, options: CompilerOptions = {}): CompileResult {
  return new Compiler(source, heap, options).compile();
}
