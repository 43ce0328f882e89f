// ═══════════════════════════════════════════════════════════════════════════════
// ERROR TAXONOMY — Failures Crossing the Retrieval Core
// ═══════════════════════════════════════════════════════════════════════════════
//
// A sector with no stored topic is not an error and has no class here.
//
// ═══════════════════════════════════════════════════════════════════════════════

export const ErrorCode = {
  TRANSPORT_FAILURE: 'TRANSPORT_FAILURE',
  MALFORMED_RESPONSE: 'MALFORMED_RESPONSE',
  STORAGE_FAILURE: 'STORAGE_FAILURE',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Base class for every failure the retrieval core classifies.
 */
export class KnowledgeError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { cause?: unknown; context?: Record<string, unknown> }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'KnowledgeError';
    this.code = code;
    this.context = options?.context;
  }
}

/**
 * Network error, timeout or non-success status from a remote source.
 */
export class TransportFailure extends KnowledgeError {
  /** HTTP status when the source answered; undefined for network errors and timeouts */
  readonly status?: number;
  readonly retryable: boolean;

  constructor(
    message: string,
    options?: { status?: number; retryable?: boolean; cause?: unknown; context?: Record<string, unknown> }
  ) {
    super(ErrorCode.TRANSPORT_FAILURE, message, options);
    this.name = 'TransportFailure';
    this.status = options?.status;
    this.retryable = options?.retryable ?? isRetryableStatus(options?.status);
  }
}

/**
 * Payload that is not JSON or does not match the expected shape.
 */
export class MalformedResponse extends KnowledgeError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(ErrorCode.MALFORMED_RESPONSE, message, options);
    this.name = 'MalformedResponse';
  }
}

/**
 * Store unavailable or a query against it failed.
 */
export class StorageFailure extends KnowledgeError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(ErrorCode.STORAGE_FAILURE, message, options);
    this.name = 'StorageFailure';
  }
}

/**
 * Errors a remote client can return.
 */
export type ClientError = TransportFailure | MalformedResponse;

function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return true;
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
