/**
 * Ledger SDK error codes and error class
 */

export enum LedgerErrorCode {
  // Encoding errors (1xxx)
  MALFORMED_ENCODING = 1001,
  INVALID_ARGUMENT = 1002,

  // Signing errors (2xxx)
  MISSING_KEY_MATERIAL = 2001,

  // Assembly errors (3xxx)
  FROZEN_TRANSACTION = 3001,
  INVALID_TRANSACTION_STATE = 3002,

  // Network errors (4xxx)
  TRANSPORT_FAILURE = 4001,
  NO_AVAILABLE_NODES = 4002,
  TIMEOUT = 4003,
  CANCELLED = 4004,

  // Execution errors (5xxx)
  PRECHECK_FAILED = 5001,
  MAX_RETRIES_EXCEEDED = 5002,
  RECEIPT_FAILED = 5003,
  RECEIPT_UNKNOWN = 5004,
}

export interface LedgerErrorDetails {
  code: LedgerErrorCode;
  message: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

/**
 * Error raised by every layer of the SDK.
 *
 * `context` carries the structured detail a caller needs to decide whether a
 * manual resubmission is safe: attempted node, last status, attempt count and
 * transaction id, depending on where the error was raised.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(details: LedgerErrorDetails) {
    super(details.message, { cause: details.cause });
    this.name = 'LedgerError';
    this.code = details.code;
    this.context = details.context;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LedgerError);
    }
  }

  /**
   * Whether a transport failure is worth retrying on the same node later
   */
  get transient(): boolean {
    return this.context?.transient === true;
  }

  /**
   * Creates a human-readable error message with code
   */
  toString(): string {
    let str = `[LedgerError ${this.code}] ${this.message}`;
    if (this.context) {
      str += ` (${JSON.stringify(this.context, jsonReplacer)})`;
    }
    return str;
  }

  /**
   * Converts error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      stack: this.stack,
    };
  }

  // Factory methods for common errors

  static malformedEncoding(reason: string, context?: Record<string, unknown>): LedgerError {
    return new LedgerError({
      code: LedgerErrorCode.MALFORMED_ENCODING,
      message: `Malformed encoding: ${reason}`,
      context,
    });
  }

  static invalidArgument(reason: string, context?: Record<string, unknown>): LedgerError {
    return new LedgerError({
      code: LedgerErrorCode.INVALID_ARGUMENT,
      message: reason,
      context,
    });
  }

  static missingKeyMaterial(missingKeys: string[]): LedgerError {
    return new LedgerError({
      code: LedgerErrorCode.MISSING_KEY_MATERIAL,
      message: missingKeys.length > 0
        ? `Missing private key material for ${missingKeys.length} required key(s)`
        : 'Transaction has no signatures',
      context: { missingKeys },
    });
  }

  static frozenTransaction(state: string, field: string): LedgerError {
    return new LedgerError({
      code: LedgerErrorCode.FROZEN_TRANSACTION,
      message: `Cannot modify ${field}: transaction is ${state} and its body bytes are fixed`,
      context: { state, field },
    });
  }

  static invalidState(operation: string, state: string, expected: string[]): LedgerError {
    return new LedgerError({
      code: LedgerErrorCode.INVALID_TRANSACTION_STATE,
      message: `Cannot ${operation} while transaction is ${state} (expected ${expected.join(' or ')})`,
      context: { operation, state, expected },
    });
  }

  static transport(
    message: string,
    transient: boolean,
    context?: Record<string, unknown>,
    cause?: Error
  ): LedgerError {
    return new LedgerError({
      code: LedgerErrorCode.TRANSPORT_FAILURE,
      message,
      context: { ...context, transient },
      cause,
    });
  }

  static noAvailableNodes(candidates: string[]): LedgerError {
    return new LedgerError({
      code: LedgerErrorCode.NO_AVAILABLE_NODES,
      message: candidates.length > 0
        ? `None of the candidate nodes are known to the registry: ${candidates.join(', ')}`
        : 'No nodes are available in the registry',
      context: { candidates },
    });
  }

  static timeout(operation: string, timeoutMs: number, context?: Record<string, unknown>): LedgerError {
    return new LedgerError({
      code: LedgerErrorCode.TIMEOUT,
      message: `Operation timed out: ${operation} (${timeoutMs}ms)`,
      context: { ...context, operation, timeoutMs },
    });
  }

  static cancelled(operation: string, context?: Record<string, unknown>): LedgerError {
    return new LedgerError({
      code: LedgerErrorCode.CANCELLED,
      message: `Operation cancelled: ${operation}`,
      context: { ...context, operation },
    });
  }

  static precheckFailed(status: string, context: Record<string, unknown>): LedgerError {
    return new LedgerError({
      code: LedgerErrorCode.PRECHECK_FAILED,
      message: `Transaction failed precheck with status ${status}`,
      context: { ...context, status },
    });
  }

  static maxRetriesExceeded(attempts: number, context: Record<string, unknown>, cause?: Error): LedgerError {
    return new LedgerError({
      code: LedgerErrorCode.MAX_RETRIES_EXCEEDED,
      message: `Gave up after ${attempts} attempt(s)`,
      context: { ...context, attempts },
      cause,
    });
  }

  static receiptFailed(status: string, transactionId: string): LedgerError {
    return new LedgerError({
      code: LedgerErrorCode.RECEIPT_FAILED,
      message: `Receipt for ${transactionId} has status ${status}`,
      context: { status, transactionId },
    });
  }

  static receiptUnknown(transactionId: string, nodeAccountId: string): LedgerError {
    return new LedgerError({
      code: LedgerErrorCode.RECEIPT_UNKNOWN,
      message: `Node ${nodeAccountId} has no receipt for ${transactionId}; resubmitting may duplicate it`,
      context: { transactionId, nodeAccountId },
    });
  }
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Classify an error thrown by a transport as a `TRANSPORT_FAILURE`.
 *
 * Timeouts, resets and "unavailable" responses are transient; anything that
 * says the node cannot be reached at all is not.
 */
export function toTransportError(error: unknown, context?: Record<string, unknown>): LedgerError {
  if (error instanceof LedgerError) {
    return error;
  }

  const originalError = error instanceof Error ? error : new Error(String(error));
  const message = originalError.message.toLowerCase();

  if (
    message.includes('enotfound') ||
    message.includes('econnrefused') ||
    message.includes('ehostunreach') ||
    message.includes('unreachable') ||
    message.includes('decommissioned')
  ) {
    return LedgerError.transport(originalError.message, false, context, originalError);
  }

  return LedgerError.transport(originalError.message, true, context, originalError);
}

/**
 * Helper to check for a specific error code
 */
export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerError {
  return error instanceof LedgerError && (code === undefined || error.code === code);
}
