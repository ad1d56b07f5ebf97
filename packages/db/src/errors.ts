/**
 * Database errors
 */

export class DatabaseError extends Error {
  public readonly operation: string;
  public readonly code?: string;

  constructor(message: string, operation: string, options?: { code?: string; cause?: unknown }) {
    super(message);
    this.name = "DatabaseError";
    this.operation = operation;
    this.code = options?.code;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Shape of the error object PostgREST calls resolve with
 */
export interface PostgrestErrorLike {
  message: string;
  code?: string;
}

export function toDatabaseError(operation: string, error: PostgrestErrorLike): DatabaseError {
  return new DatabaseError(`${operation} failed: ${error.message}`, operation, { code: error.code, cause: error });
}
