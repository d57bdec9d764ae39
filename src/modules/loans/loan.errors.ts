/**
 * Lending Hub - Loan Errors
 */

import { CapacityError, ErrorCategory, ErrorDetail, LendingError } from '../../shared/errors';

export type LoanErrorCode =
  // Loans
  | 'UnknownUserLoan'
  | 'NotAccountOwner'
  | 'LoanNotEmpty'
  | 'SameLoan'
  | 'UserLoanAlreadyCreated'
  // Loan types and loan pools
  | 'LoanTypeUnknown'
  | 'LoanTypeDeprecated'
  | 'LoanTypeAlreadyCreated'
  | 'LoanTypeAlreadyDeprecated'
  | 'LoanTargetHealthTooLow'
  | 'LoanPoolUnknown'
  | 'LoanPoolDeprecated'
  | 'LoanPoolAlreadyAdded'
  | 'LoanPoolAlreadyDeprecated'
  | 'CollateralFactorTooHigh'
  | 'BorrowFactorTooLow'
  | 'LiquidationBonusTooHigh'
  | 'LiquidationFeeTooHigh'
  // Positions
  | 'BorrowTypeMismatch'
  | 'LoanTypeMismatch'
  | 'NoCollateralInLoanForPool'
  | 'NoBorrowInLoanForPool'
  | 'NoVariableBorrowInLoanForPool'
  | 'NoStableBorrowInLoanForPool'
  | 'RebalanceDownThresholdNotReached'
  | 'InsufficientFTokenBalance'
  // Capacity
  | 'CollateralCapReached'
  | 'BorrowCapReached'
  | 'ExcessRepaymentExceeded'
  | 'InsufficientCollateral'
  | 'InsufficientSeized'
  // Solvency
  | 'UnderCollateralizedLoan'
  | 'OverCollateralizedLoan';

export class LoanError extends LendingError<LoanErrorCode> {
  constructor(
    code: LoanErrorCode,
    message: string,
    details: Readonly<Record<string, ErrorDetail>> = {},
    category: ErrorCategory = 'PRECONDITION'
  ) {
    super(code, category, message, details);
    this.name = 'LoanError';
  }
}

export class LoanCapacityError extends CapacityError<LoanErrorCode> {
  constructor(code: LoanErrorCode, message: string, current: bigint, limit: bigint, details: Readonly<Record<string, ErrorDetail>> = {}) {
    super(code, message, current, limit, details);
    this.name = 'LoanCapacityError';
  }
}
