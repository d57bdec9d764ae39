import { createHash } from 'crypto';
import { AccountId, LoanId } from '../../shared/types';

/**
 * Loan ids are the sha256 of the owning account id followed by a caller nonce
 */
export function generateLoanId(accountId: AccountId, nonce: string): LoanId {
  return createHash('sha256').update(`${accountId}${nonce}`).digest('hex');
}
