/**
 * Lending Hub - Error Taxonomy
 *
 * Every failure rejects the whole action. Nothing is retried here;
 * the caller fixes the request and re-submits.
 *
 * - PRECONDITION: unknown pool/loan, wrong owner, deprecated or unsupported
 * - CAPACITY:     caps and liquidity (expected steady-state conditions)
 * - SOLVENCY:     under-collateralised loans, liquidating a healthy loan
 * - ARITHMETIC:   ratio out of range
 */

export type ErrorCategory = 'PRECONDITION' | 'CAPACITY' | 'SOLVENCY' | 'ARITHMETIC';

export type ErrorDetail = bigint | number | string | boolean;

export class LendingError<C extends string = string> extends Error {
  constructor(
    public readonly code: C,
    public readonly category: ErrorCategory,
    message: string,
    public readonly details: Readonly<Record<string, ErrorDetail>> = {}
  ) {
    super(message);
    this.name = 'LendingError';
  }

  /**
   * JSON-safe view for API responses and logs
   */
  toJSON(): { code: C; category: ErrorCategory; message: string; details: Record<string, string | number | boolean> } {
    const details: Record<string, string | number | boolean> = {};
    for (const [key, value] of Object.entries(this.details)) {
      details[key] = typeof value === 'bigint' ? value.toString() : value;
    }
    return { code: this.code, category: this.category, message: this.message, details };
  }
}

/**
 * Capacity failure carrying the offending value and the limit it crossed
 */
export class CapacityError<C extends string = string> extends LendingError<C> {
  constructor(
    code: C,
    message: string,
    public readonly current: bigint,
    public readonly limit: bigint,
    details: Readonly<Record<string, ErrorDetail>> = {}
  ) {
    super(code, 'CAPACITY', `${message} (current=${current}, limit=${limit})`, { ...details, current, limit });
    this.name = 'CapacityError';
  }
}

export function isLendingError(error: unknown): error is LendingError {
  return error instanceof LendingError;
}

/**
 * Result type for operations reported back to a caller instead of thrown
 */
export type Result<T> =
  | { success: true; value: T }
  | { success: false; error: string; code?: string; category?: ErrorCategory };
