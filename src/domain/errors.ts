/**
 * Typed error model for the debugger core.
 *
 * Transport failures reach the core as RpcError rejections from the
 * ExecutionRepositoryClient. They are scoped to the one execution or request
 * that triggered them and are surfaced as TypedError values or notifications,
 * never as exceptions that abort a whole view.
 */

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "RPC.TRANSPORT"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated execution if applicable. */
  executionId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  executionId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    executionId: params.executionId,
    retryable: params.retryable ?? false,
    details: params.details,
  };
}

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.CONFIG',
    message,
    retryable: false,
    details,
  });
}

// --- RPC failures ---

/** Status codes an ExecutionRepositoryClient rejects with. */
export type RpcStatusCode =
  | 'NOT_FOUND'
  | 'UNAVAILABLE'
  | 'DEADLINE_EXCEEDED'
  | 'CANCELLED'
  | 'INTERNAL'
  | 'UNKNOWN';

/**
 * Error thrown by client implementations. Anything else a client throws is
 * treated as UNKNOWN.
 */
export class RpcError extends Error {
  readonly code: RpcStatusCode;

  constructor(code: RpcStatusCode, message: string) {
    super(message);
    this.name = 'RpcError';
    this.code = code;
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof RpcError && err.code === 'NOT_FOUND';
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Map a failed RPC call to a typed error. */
export function rpcTypedError(operation: string, err: unknown, executionId?: string): TypedError {
  const code: RpcStatusCode = err instanceof RpcError ? err.code : 'UNKNOWN';
  if (code === 'NOT_FOUND') {
    return createTypedError({
      code: 'RPC.NOT_FOUND',
      message: `${operation}: ${errorMessage(err)}`,
      executionId,
      retryable: false,
    });
  }
  const retryable = code === 'UNAVAILABLE' || code === 'DEADLINE_EXCEEDED';
  return createTypedError({
    code: 'RPC.TRANSPORT',
    message: `${operation}: ${errorMessage(err)}`,
    executionId,
    retryable,
    details: { rpcCode: code },
  });
}

// --- Payload invariants ---

/**
 * Thrown when the server omits a field its contract guarantees. Treated as an
 * unrecoverable assertion for the render path that hit it.
 */
export class PayloadInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PayloadInvariantError';
  }
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new PayloadInvariantError(message);
  }
}
