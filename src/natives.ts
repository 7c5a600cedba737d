/**
 * Host functions available to every program.
 */

import { numberVal } from "./value";
import type { NativeFn } from "./value";

export interface NativeDefinition {
  name: string;
  arity: number;
  fn: NativeFn;
}

/**
 * Thrown by a native function to report a fault in the calling program.
 * The VM turns it into a runtime error at the call site.
 */
export class NativeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NativeError";
  }
}

export const STANDARD_NATIVES: NativeDefinition[] = [
  {
    name: "clock",
    arity: 0,
    // Seconds since the process started
    fn: () => numberVal(performance.now() / 1000),
  },
];
