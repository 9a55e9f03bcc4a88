export class RunlogError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A run or record the caller asked for is not in the store. */
export class NotFoundError extends RunlogError {}

/** Unchecked input fell outside a fixed enumeration or range. */
export class InvalidArgumentError extends RunlogError {}

/** The store could not be opened or queried. */
export class StoreConnectionError extends RunlogError {}

export function asErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
