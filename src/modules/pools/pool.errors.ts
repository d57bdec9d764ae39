/**
 * Lending Hub - Pool Errors
 */

import { CapacityError, ErrorCategory, ErrorDetail, LendingError } from '../../shared/errors';

export type PoolErrorCode =
  // Preconditions
  | 'PoolUnknown'
  | 'PriceFeedUnavailable'
  | 'PoolAlreadyAdded'
  | 'DeprecatedPool'
  | 'StableBorrowNotSupported'
  | 'CannotMintFToken'
  | 'FlashLoanNotSupported'
  | 'RebalanceUpUtilisationRatioNotReached'
  | 'RebalanceUpThresholdNotReached'
  // Capacity
  | 'DepositCapReached'
  | 'BorrowCapReached'
  | 'InsufficientLiquidity'
  | 'StableBorrowPercentageCapExceeded'
  | 'MaxStableRateExceeded'
  // Parameter validation
  | 'FlashLoanFeeTooHigh'
  | 'RetentionRateTooHigh'
  | 'OptimalUtilisationRatioTooLow'
  | 'OptimalUtilisationRatioTooHigh'
  | 'MaxVariableInterestRateTooHigh'
  | 'MaxStableInterestRateTooHigh'
  | 'OptimalStableToTotalDebtRatioTooHigh'
  | 'RebalanceUpUtilisationRatioTooHigh'
  | 'RebalanceUpDepositInterestRateTooHigh'
  | 'StableBorrowPercentageTooHigh';

export class PoolError extends LendingError<PoolErrorCode> {
  constructor(
    code: PoolErrorCode,
    message: string,
    details: Readonly<Record<string, ErrorDetail>> = {},
    category: ErrorCategory = 'PRECONDITION'
  ) {
    super(code, category, message, details);
    this.name = 'PoolError';
  }
}

export class PoolCapacityError extends CapacityError<PoolErrorCode> {
  constructor(code: PoolErrorCode, message: string, current: bigint, limit: bigint, details: Readonly<Record<string, ErrorDetail>> = {}) {
    super(code, message, current, limit, details);
    this.name = 'PoolCapacityError';
  }
}
