/**
 * Object heap and lifetime manager.
 *
 * Every heap object is allocated here and tracked in a registry. A tracing
 * mark-sweep collector drops objects that are no longer reachable from any
 * registered root source. Strings are interned through a weak table: a
 * string that dies is also forgotten by the intern table, so interning does
 * not keep garbage alive.
 *
 * Shared and cyclic object graphs (closures capturing closures, upvalue
 * chains) need no special treatment: reachability is computed by tracing.
 */

import { Chunk } from "./chunk";
import { InternalError } from "./errors";
import type {
  NativeFn,
  Obj,
  ObjClosure,
  ObjFunction,
  ObjNative,
  ObjString,
  ObjUpvalue,
  Value,
} from "./value";
import { isObj, nilVal } from "./value";

// ============================================================================
// Roots
// ============================================================================

/**
 * Something that holds references the collector must treat as live:
 * the VM's stacks and globals, or the compiler's functions in progress.
 */
export interface RootSource {
  markRoots(heap: Heap): void;
}

export interface HeapOptions {
  /** Collect on every allocation. */
  stressGC?: boolean;
  /** Live-object count that triggers the first collection. */
  initialGCThreshold?: number;
  /** After a collection the threshold becomes `live * growFactor`. */
  growFactor?: number;
}

export interface CollectionStats {
  before: number;
  after: number;
  freed: number;
}

export interface HeapStats {
  objects: number;
  strings: number;
  collections: number;
  nextGC: number;
}

const DEFAULT_GC_THRESHOLD = 1024;
const DEFAULT_GROW_FACTOR = 2;

// ============================================================================
// Heap
// ============================================================================

export class Heap {
  private objects: Set<Obj> = new Set();
  private strings: Map<string, ObjString> = new Map();
  private roots: RootSource[] = [];
  /** Values between allocation and being stored somewhere reachable. */
  private tempRoots: Value[] = [];
  private grayStack: Obj[] = [];
  private nextGC: number;
  private collections: number = 0;
  private readonly stressGC: boolean;
  private readonly minThreshold: number;
  private readonly growFactor: number;

  constructor(options: HeapOptions = {}) {
    this.stressGC = options.stressGC ?? false;
    this.minThreshold = options.initialGCThreshold ?? DEFAULT_GC_THRESHOLD;
    this.nextGC = this.minThreshold;
    this.growFactor = options.growFactor ?? DEFAULT_GROW_FACTOR;
  }

  // ==========================================================================
  // Roots
  // ==========================================================================

  addRootSource(source: RootSource): void {
    this.roots.push(source);
  }

  removeRootSource(source: RootSource): void {
    const index = this.roots.lastIndexOf(source);
    if (index !== -1) this.roots.splice(index, 1);
  }

  /**
   * Keep `value` alive until the matching `popRoot`.
   */
  pushRoot(value: Value): void {
    this.tempRoots.push(value);
  }

  popRoot(): void {
    if (this.tempRoots.pop() === undefined) {
      throw new InternalError("temporary root stack underflow");
    }
  }

  // ==========================================================================
  // Allocation
  // ==========================================================================

  /**
   * Return the unique string object with these characters.
   */
  intern(chars: string): ObjString {
    const existing = this.strings.get(chars);
    if (existing) return existing;

    const str: ObjString = { tag: "string", marked: false, chars };
    this.register(str);
    this.strings.set(chars, str);
    return str;
  }

  findString(chars: string): ObjString | undefined {
    return this.strings.get(chars);
  }

  newFunction(name: ObjString | null): ObjFunction {
    const fn: ObjFunction = {
      tag: "function",
      marked: false,
      name,
      arity: 0,
      upvalues: [],
      chunk: new Chunk(),
    };
    this.register(fn);
    return fn;
  }

  newNative(name: ObjString, arity: number, fn: NativeFn): ObjNative {
    const native: ObjNative = { tag: "native", marked: false, name, arity, fn };
    this.register(native);
    return native;
  }

  newClosure(fn: ObjFunction): ObjClosure {
    const closure: ObjClosure = { tag: "closure", marked: false, fn, upvalues: [] };
    this.register(closure);
    return closure;
  }

  newUpvalue(slot: number): ObjUpvalue {
    const upvalue: ObjUpvalue = {
      tag: "upvalue",
      marked: false,
      slot,
      isOpen: true,
      closed: nilVal,
      next: null,
    };
    this.register(upvalue);
    return upvalue;
  }

  /**
   * Collection happens before the new object joins the registry, so callers
   * must keep every object they still need reachable across an allocation.
   */
  private register(obj: Obj): void {
    if (this.stressGC || this.objects.size >= this.nextGC) {
      this.collect();
    }
    this.objects.add(obj);
  }

  // ==========================================================================
  // Collection
  // ==========================================================================

  collect(): CollectionStats {
    const before = this.objects.size;

    for (const root of this.roots) {
      root.markRoots(this);
    }
    for (const value of this.tempRoots) {
      this.markValue(value);
    }
    this.traceReferences();
    this.removeWhiteStrings();
    this.sweep();

    const after = this.objects.size;
    this.nextGC = Math.max(after * this.growFactor, this.minThreshold);
    this.collections++;
    return { before, after, freed: before - after };
  }

  markValue(value: Value): void {
    if (isObj(value)) this.markObject(value);
  }

  markObject(obj: Obj | null): void {
    if (obj === null || obj.marked) return;
    obj.marked = true;
    this.grayStack.push(obj);
  }

  isLive(obj: Obj): boolean {
    return this.objects.has(obj);
  }

  stats(): HeapStats {
    return {
      objects: this.objects.size,
      strings: this.strings.size,
      collections: this.collections,
      nextGC: this.nextGC,
    };
  }

  private traceReferences(): void {
    let obj = this.grayStack.pop();
    while (obj !== undefined) {
      this.blacken(obj);
      obj = this.grayStack.pop();
    }
  }

  private blacken(obj: Obj): void {
    switch (obj.tag) {
      case "string":
        break;
      case "function":
        this.markObject(obj.name);
        for (const constant of obj.chunk.constants) {
          this.markValue(constant);
        }
        break;
      case "native":
        this.markObject(obj.name);
        break;
      case "closure":
        this.markObject(obj.fn);
        for (const upvalue of obj.upvalues) {
          this.markObject(upvalue);
        }
        break;
      case "upvalue":
        // An open upvalue's value sits on the VM stack, which is a root.
        if (!obj.isOpen) this.markValue(obj.closed);
        break;
    }
  }

  private removeWhiteStrings(): void {
    for (const [chars, str] of this.strings) {
      if (!str.marked) this.strings.delete(chars);
    }
  }

  private sweep(): void {
    for (const obj of this.objects) {
      if (obj.marked) {
        obj.marked = false;
      } else {
        this.objects.delete(obj);
      }
    }
  }
}
