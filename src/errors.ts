/**
 * Fatal errors that indicate a bug in the compiler or VM rather than a fault
 * in the user's program. These are never turned into a failure result.
 */
export class InternalError extends Error {
  constructor(message: string) {
    super(`Internal error: ${message}`);
    this.name = "InternalError";
  }
}
