/**
 * Lending Hub - Pool Configuration
 * Creation of new pools and validation of operator-chosen parameters
 */

import { ONE_4_DP, ONE_6_DP, ONE_18_DP } from '../../core/math';
import { CapsData, FeeData, Pool, PoolParams, StableBorrowData, VariableBorrowData } from '../../shared/types';
import { PoolError } from './pool.errors';

// ============================================
// LIMITS
// ============================================

export const MAX_FLASH_LOAN_FEE = 100_000n;           // 10% (6dp)
export const MAX_RETENTION_RATE = ONE_6_DP;           // 100% (6dp)
export const MAX_INTEREST_RATE_PARAMS = 100n * ONE_6_DP; // 10,000% (6dp)

type VariableCurve = Pick<VariableBorrowData, 'vr0' | 'vr1' | 'vr2'>;
type StableParams = PoolParams['stableBorrow'];

export function validateFeeData(fees: Pick<FeeData, 'flashLoanFee' | 'retentionRate'>): void {
  if (fees.flashLoanFee > MAX_FLASH_LOAN_FEE) {
    throw new PoolError('FlashLoanFeeTooHigh', `Flash loan fee ${fees.flashLoanFee} exceeds ${MAX_FLASH_LOAN_FEE}`);
  }
  if (fees.retentionRate > MAX_RETENTION_RATE) {
    throw new PoolError('RetentionRateTooHigh', `Retention rate ${fees.retentionRate} exceeds ${MAX_RETENTION_RATE}`);
  }
}

export function validateOptimalUtilisationRatio(optimalUtilisationRatio: bigint): void {
  if (optimalUtilisationRatio <= 0n) {
    throw new PoolError('OptimalUtilisationRatioTooLow', 'Optimal utilisation ratio must be above zero');
  }
  if (optimalUtilisationRatio >= ONE_4_DP) {
    throw new PoolError('OptimalUtilisationRatioTooHigh', 'Optimal utilisation ratio must be below one');
  }
}

/**
 * The stable curve builds on vr1, so both curves are checked together
 */
export function validateInterestRateCurves(variable: VariableCurve, stable: StableParams): void {
  if (variable.vr0 + variable.vr1 + variable.vr2 > MAX_INTEREST_RATE_PARAMS) {
    throw new PoolError('MaxVariableInterestRateTooHigh', 'Variable rate curve exceeds the maximum rate');
  }
  if (variable.vr1 + stable.sr0 + stable.sr1 + stable.sr2 + stable.sr3 > MAX_INTEREST_RATE_PARAMS) {
    throw new PoolError('MaxStableInterestRateTooHigh', 'Stable rate curve exceeds the maximum rate');
  }
  if (stable.optimalStableToTotalDebtRatio >= ONE_4_DP) {
    throw new PoolError('OptimalStableToTotalDebtRatioTooHigh', 'Optimal stable to total debt ratio must be below one');
  }
  if (stable.rebalanceUpUtilisationRatio > ONE_4_DP) {
    throw new PoolError('RebalanceUpUtilisationRatioTooHigh', 'Rebalance up utilisation ratio exceeds one');
  }
  if (stable.rebalanceUpDepositInterestRate > ONE_4_DP) {
    throw new PoolError('RebalanceUpDepositInterestRateTooHigh', 'Rebalance up deposit interest rate exceeds one');
  }
}

export function validateCapsData(caps: CapsData): void {
  if (caps.stableBorrowPercentage > ONE_18_DP) {
    throw new PoolError('StableBorrowPercentageTooHigh', 'Stable borrow percentage exceeds one');
  }
}

export function validatePoolParams(params: PoolParams): void {
  validateFeeData(params.fees);
  validateOptimalUtilisationRatio(params.optimalUtilisationRatio);
  validateInterestRateCurves(params.variableBorrow, params.stableBorrow);
  validateCapsData(params.caps);
}

/**
 * Build the initial record of a new pool. Rates are left at zero;
 * the caller recomputes them through PoolAccount.
 */
export function createPoolRecord(params: PoolParams, now: bigint): Pool {
  validatePoolParams(params);

  const stableBorrowData: StableBorrowData = {
    ...params.stableBorrow,
    totalAmount: 0n,
    interestRate: 0n,
    averageInterestRate: 0n,
  };

  return {
    poolId: params.poolId,
    tokenDecimals: params.tokenDecimals,
    lastUpdateTimestamp: now,
    depositData: {
      optimalUtilisationRatio: params.optimalUtilisationRatio,
      totalAmount: 0n,
      interestRate: 0n,
      interestIndex: ONE_18_DP,
    },
    variableBorrowData: {
      ...params.variableBorrow,
      totalAmount: 0n,
      interestRate: 0n,
      interestIndex: ONE_18_DP,
    },
    stableBorrowData,
    feeData: { ...params.fees, totalRetainedAmount: 0n },
    capsData: { ...params.caps },
    configData: { ...params.config },
  };
}
