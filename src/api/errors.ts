/**
 * Lending Hub - HTTP Error Mapping
 */

import { Response } from 'express';
import { ErrorCategory, isLendingError } from '../shared/errors';

const NOT_FOUND = /^Unknown|Unknown$/;

/**
 * Status for a rejected action. Unknown records are 404, other failed
 * preconditions and malformed requests 400.
 */
export function httpStatusFor(category: ErrorCategory | undefined, code: string | undefined): number {
  if (code === 'InvalidAction') return 400;
  switch (category) {
    case 'PRECONDITION':
      return code !== undefined && NOT_FOUND.test(code) ? 404 : 400;
    case 'CAPACITY':
      return 409;
    case 'SOLVENCY':
      return 422;
    case 'ARITHMETIC':
      return 400;
    default:
      return 500;
  }
}

export function sendError(res: Response, error: unknown, scope: string): void {
  if (isLendingError(error)) {
    res.status(httpStatusFor(error.category, error.code)).json({ error: error.toJSON() });
    return;
  }
  console.error(`[${scope}] Unexpected error:`, error);
  res.status(500).json({ error: 'Internal server error' });
}
