/**
 * interbus - Error Classes and Codes
 *
 * Resolution failures (an interface or bus that cannot be found) are plain
 * return values and never appear here. Everything in this file describes a
 * contract violation: the caller broke an invariant of the object graph.
 * Error codes follow HTTP status code conventions for familiarity.
 */

/**
 * Contract violation codes
 */
export enum BusErrorCode {
  /** Missing argument, invalid bus level, finish order or bus name */
  BAD_REQUEST = 400,

  /** Second hosting bus, duplicate capability or duplicate interface id */
  CONFLICT = 409,

  /** Operation on a finished or destroyed object */
  GONE = 410,

  /** Reference count would drop below zero */
  UNPROCESSABLE_ENTITY = 422,

  /** Internal error or unexpected failure */
  INTERNAL_ERROR = 500,
}

export type BusErrorDetails = Record<string, unknown>;

/**
 * Error raised for every contract violation
 */
export class BusError extends Error {
  /**
   * @param message Human-readable error description
   * @param busCode Specific error code for programmatic handling
   * @param details Additional error context
   */
  constructor(
    message: string,
    public readonly busCode: BusErrorCode,
    public readonly details?: BusErrorDetails
  ) {
    super(message);
    this.name = 'BusError';

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, BusError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BusError);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): object {
    return {
      name: this.name,
      message: this.message,
      busCode: this.busCode,
      details: this.details,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `${this.name} [${this.busCode}]: ${this.message}`;
  }

  /**
   * True when the violation comes from the caller rather than from the library
   */
  isClientError(): boolean {
    return this.busCode >= 400 && this.busCode < 500;
  }

  isServerError(): boolean {
    return this.busCode >= 500 && this.busCode < 600;
  }
}

/**
 * Factory functions for the contract violations raised by the object model
 */
export class BusErrorFactory {
  /**
   * Missing or malformed argument
   */
  static badRequest(op: string, reason: string, details?: BusErrorDetails): BusError {
    return new BusError(
      `Bad request for ${op}. ${reason}`,
      BusErrorCode.BAD_REQUEST,
      { op, reason, ...details }
    );
  }

  /**
   * An extended interface already has a hosting bus
   */
  static hostConflict(op: string, details?: BusErrorDetails): BusError {
    return new BusError(
      `Hosting bus already exists for ${op}`,
      BusErrorCode.CONFLICT,
      { op, ...details }
    );
  }

  /**
   * An identity is registered twice
   */
  static duplicateInterface(op: string, name: string, details?: BusErrorDetails): BusError {
    return new BusError(
      `Interface "${name}" is already defined for ${op}`,
      BusErrorCode.CONFLICT,
      { op, name, ...details }
    );
  }

  /**
   * The object has been finished; its apis are disabled
   */
  static finished(op: string, details?: BusErrorDetails): BusError {
    return new BusError(
      `${ErrorMessages.API_DISABLED} (${op})`,
      BusErrorCode.GONE,
      { op, ...details }
    );
  }

  /**
   * The object has already been destroyed by its last unref()
   */
  static destroyed(op: string, details?: BusErrorDetails): BusError {
    return new BusError(
      `${ErrorMessages.OBJECT_DESTROYED} (${op})`,
      BusErrorCode.GONE,
      { op, ...details }
    );
  }

  /**
   * unref() or unrefNoDelete() on a zero count
   */
  static refUnderflow(op: string, details?: BusErrorDetails): BusError {
    return new BusError(
      `${op} >> ref-count is already 0`,
      BusErrorCode.UNPROCESSABLE_ENTITY,
      { op, ...details }
    );
  }

  /**
   * Creates an INTERNAL_ERROR for unexpected failures
   */
  static internal(message: string, originalError?: Error, details?: BusErrorDetails): BusError {
    return new BusError(
      `Internal error: ${message}`,
      BusErrorCode.INTERNAL_ERROR,
      { originalError: originalError?.message, stack: originalError?.stack, ...details }
    );
  }
}

/**
 * Type guard to check if an error is a BusError
 */
export function isBusError(error: unknown): error is BusError {
  return error instanceof BusError;
}

/**
 * Type guard to check if error has a specific bus error code
 */
export function hasBusErrorCode(error: unknown, code: BusErrorCode): error is BusError {
  return isBusError(error) && error.busCode === code;
}

/**
 * Wraps unknown errors as BusError, keeping BusErrors intact
 */
export function wrapError(error: unknown, op?: string): BusError {
  if (isBusError(error)) {
    if (op && error.details?.op === undefined) {
      return new BusError(error.message, error.busCode, {
        ...error.details,
        op,
        wrappedFrom: op,
      });
    }
    return error;
  }

  if (error instanceof Error) {
    const busError = BusErrorFactory.internal(error.message, error, { op });
    if (error.stack) {
      busError.stack = error.stack;
    }
    return busError;
  }

  return BusErrorFactory.internal(`Unknown error: ${String(error)}`, undefined, {
    op,
    originalError: error,
  });
}

/**
 * Error message templates for consistent error formatting
 */
export const ErrorMessages = {
  API_DISABLED: 'api already disabled!',
  OBJECT_DESTROYED: 'object already destroyed',
  INVALID_BUS_NAME: 'Bus name must be a valid identifier',
  INVALID_BUS_LEVEL: 'Bus level must be a non-negative integer',
  INVALID_FINISH_ORDER: 'Finish order must be an integer within the teardown passes',
  MISSING_ARGUMENT: 'Argument is required',
  EMPTY_HANDLE: 'Handle does not hold a reference',
} as const;

/**
 * Helper function to create validation errors
 */
export function createValidationError(field: string, value: unknown, expected: string): BusError {
  return BusErrorFactory.badRequest(
    'validation',
    `Invalid ${field}: expected ${expected}, got ${typeof value}`,
    { field, value, expected }
  );
}
