/**
 * Rate Counter Error Hierarchy
 *
 * All errors extend RateCounterError with an error code and a recoverable
 * flag. LimitExceededError is the only condition a caller is expected to
 * recover from (by trying again later).
 *
 * @module packages/adapters/rate-counter/errors
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Error code categories:
 * - LIMIT_*: Admission decisions (1xxx)
 * - CONFIG_*: Programming/configuration errors (2xxx)
 * - STORE_*: Backing store failures (3xxx)
 */
export const ErrorCodes = {
  // Admission (1xxx)
  LIMIT_EXCEEDED: 'RC1001',

  // Configuration (2xxx)
  CONFIG_STORE_NOT_CONFIGURED: 'RC2001',
  CONFIG_UNKNOWN_COUNTER: 'RC2002',
  CONFIG_INVALID: 'RC2003',

  // Store (3xxx)
  STORE_COMMUNICATION: 'RC3001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Base Error Class
// ============================================================================

export class RateCounterError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;

  /** Whether the caller may retry later and expect success */
  readonly recoverable: boolean;

  constructor(
    message: string,
    options: {
      code: ErrorCode;
      recoverable?: boolean;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = 'RateCounterError';
    this.code = options.code;
    this.recoverable = options.recoverable ?? false;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

// ============================================================================
// Admission
// ============================================================================

/**
 * The window already holds `limit` entries; the action must not proceed now.
 */
export class LimitExceededError extends RateCounterError {
  readonly limit: number;
  readonly observedCount: number;

  constructor(limit: number, observedCount: number) {
    super(`Limit of ${limit} exceeded with count ${observedCount}`, {
      code: ErrorCodes.LIMIT_EXCEEDED,
      recoverable: true,
    });
    this.name = 'LimitExceededError';
    this.limit = limit;
    this.observedCount = observedCount;
  }
}

export function isLimitExceeded(error: unknown): error is LimitExceededError {
  return error instanceof LimitExceededError;
}

// ============================================================================
// Configuration
// ============================================================================

export class StoreNotConfiguredError extends RateCounterError {
  constructor() {
    super(
      'No sliding window store configured. Call configureCounters({ store }) ' +
        'at bootstrap or pass a store to the counter.',
      { code: ErrorCodes.CONFIG_STORE_NOT_CONFIGURED },
    );
    this.name = 'StoreNotConfiguredError';
  }
}

export class UnknownCounterError extends RateCounterError {
  readonly counterName: string;

  constructor(counterName: string, ownerName?: string) {
    const where = ownerName ? ` in ${ownerName}` : '';
    super(`No counter named "${counterName}"${where}`, {
      code: ErrorCodes.CONFIG_UNKNOWN_COUNTER,
    });
    this.name = 'UnknownCounterError';
    this.counterName = counterName;
  }
}

export class InvalidCounterConfigError extends RateCounterError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid counter configuration: ${issues.join('; ')}`, {
      code: ErrorCodes.CONFIG_INVALID,
    });
    this.name = 'InvalidCounterConfigError';
    this.issues = issues;
  }
}

// ============================================================================
// Store
// ============================================================================

/**
 * Transport or protocol failure from the backing store.
 * The original failure is kept as `cause`.
 */
export class BackingStoreError extends RateCounterError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Backing store ${operation} failed: ${detail}`, {
      code: ErrorCodes.STORE_COMMUNICATION,
      cause,
    });
    this.name = 'BackingStoreError';
    this.operation = operation;
  }
}
