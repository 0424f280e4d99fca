// Error taxonomy shared by the mapping store and the HTTP boundary.
// A missing code is not an error: lookups return null for it.

export class InvalidInputError extends Error {
  constructor(
    message: string,
    readonly field: string,
    readonly value: string,
  ) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class StorageError extends Error {
  constructor(
    message: string,
    readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StorageError";
  }
}

export class AllocationExhaustedError extends Error {
  constructor(
    readonly identifier: string,
    readonly probes: number,
  ) {
    super(`No free code for "${identifier}" after ${probes} probes`);
    this.name = "AllocationExhaustedError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
