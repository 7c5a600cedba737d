/**
 * Runtime values for the virtual machine.
 *
 * Immediates (nil, booleans, numbers) are small tagged records; everything
 * else is a heap object owned by the `Heap` and referenced directly.
 */

import type { Chunk } from "./chunk";

// ============================================================================
// Value Types
// ============================================================================

export type Value = NilValue | BoolValue | NumberValue | Obj;

export type Obj = ObjString | ObjFunction | ObjNative | ObjClosure | ObjUpvalue;

export interface NilValue {
  tag: "nil";
}

export interface BoolValue {
  tag: "bool";
  value: boolean;
}

export interface NumberValue {
  tag: "number";
  value: number;
}

/** Fields shared by every heap object. */
interface ObjHeader {
  /** Set by the collector during marking; cleared again on sweep. */
  marked: boolean;
}

/**
 * An immutable string. Interned by the heap, so two strings with the same
 * content are the same object.
 */
export interface ObjString extends ObjHeader {
  tag: "string";
  chars: string;
}

/**
 * How a function reaches one captured variable when its closure is built:
 * from a local slot of the enclosing frame, or from one of the enclosing
 * closure's own upvalues.
 */
export interface UpvalueDescriptor {
  isLocal: boolean;
  index: number;
}

export interface ObjFunction extends ObjHeader {
  tag: "function";
  /** Null for the top-level script. */
  name: ObjString | null;
  arity: number;
  upvalues: UpvalueDescriptor[];
  chunk: Chunk;
}

export type NativeFn = (args: Value[]) => Value;

export interface ObjNative extends ObjHeader {
  tag: "native";
  name: ObjString;
  arity: number;
  fn: NativeFn;
}

export interface ObjClosure extends ObjHeader {
  tag: "closure";
  fn: ObjFunction;
  upvalues: ObjUpvalue[];
}

/**
 * A captured variable. While open it refers to a live stack slot; once
 * closed the value lives in `closed` and the slot is no longer consulted.
 */
export interface ObjUpvalue extends ObjHeader {
  tag: "upvalue";
  slot: number;
  isOpen: boolean;
  closed: Value;
  /** Next open upvalue, ordered by descending slot. */
  next: ObjUpvalue | null;
}

// ============================================================================
// Constructors
// ============================================================================

export const nilVal: NilValue = { tag: "nil" };
export const trueVal: BoolValue = { tag: "bool", value: true };
export const falseVal: BoolValue = { tag: "bool", value: false };

export const boolVal = (value: boolean): BoolValue => (value ? trueVal : falseVal);
export const numberVal = (value: number): NumberValue => ({ tag: "number", value });

// ============================================================================
// Predicates
// ============================================================================

export function isObj(value: Value): value is Obj {
  switch (value.tag) {
    case "nil":
    case "bool":
    case "number":
      return false;
    case "string":
    case "function":
    case "native":
    case "closure":
    case "upvalue":
      return true;
  }
}

/**
 * `nil` and `false` are falsy; everything else, including 0 and "", is truthy.
 */
export function isFalsey(value: Value): boolean {
  switch (value.tag) {
    case "nil":
      return true;
    case "bool":
      return !value.value;
    case "number":
    case "string":
    case "function":
    case "native":
    case "closure":
    case "upvalue":
      return false;
  }
}

export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.tag) {
    case "nil":
      return b.tag === "nil";
    case "bool":
      return b.tag === "bool" && a.value === b.value;
    case "number":
      return b.tag === "number" && a.value === b.value;
    case "string":
    case "function":
    case "native":
    case "closure":
    case "upvalue":
      return a === b;
  }
}

// ============================================================================
// Printing
// ============================================================================

export function formatNumber(n: number): string {
  if (Number.isNaN(n)) return "nan";
  if (n === Infinity) return "inf";
  if (n === -Infinity) return "-inf";
  if (Object.is(n, -0)) return "-0";
  return String(n);
}

function formatFunction(fn: ObjFunction): string {
  return fn.name === null ? "<script>" : `<fn ${fn.name.chars}>`;
}

/**
 * Render a value the way `print` shows it.
 */
export function formatValue(value: Value): string {
  switch (value.tag) {
    case "nil":
      return "nil";
    case "bool":
      return value.value ? "true" : "false";
    case "number":
      return formatNumber(value.value);
    case "string":
      return value.chars;
    case "function":
      return formatFunction(value);
    case "closure":
      return formatFunction(value.fn);
    case "native":
      return "<native fn>";
    case "upvalue":
      return "upvalue";
  }
}

/**
 * Name reported by the `typeof` operator.
 */
export function typeName(value: Value): string {
  switch (value.tag) {
    case "nil":
      return "nil";
    case "bool":
      return "boolean";
    case "number":
      return "number";
    case "string":
      return "string";
    case "function":
    case "native":
    case "closure":
      return "function";
    case "upvalue":
      return "upvalue";
  }
}
