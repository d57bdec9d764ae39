/**
 * Lending Hub - Loan Health
 *
 * Collateral counts at its current underlying value times the collateral
 * factor; debt counts at its accrued balance times the borrow factor, rounded up.
 */

import {
  assetDollarValue,
  assetDollarValueRoundUp,
  borrowUtilisationRatio,
  effectiveBorrowValue,
  effectiveCollateralValue,
  liquidationMargin,
  ltvRatio,
  toUnderlyingAmount,
} from '../../core/math';
import { LoanHealth, LoanPool, LoanType, PoolId, PriceFeed, UserLoan } from '../../shared/types';
import { PoolAccount } from '../pools';
import { updatedBorrowBalance } from './borrow-position';
import { LoanError } from './loan.errors';

export interface HealthContext {
  now: bigint;
  pool(poolId: PoolId): PoolAccount;
  priceFeed(poolId: PoolId): PriceFeed;
}

export interface LoanValues {
  collateralValue: bigint;
  borrowValue: bigint;
  effectiveCollateralValue: bigint;
  effectiveBorrowValue: bigint;
}

export function loanValues(loan: UserLoan, loanType: LoanType, context: HealthContext): LoanValues {
  const values: LoanValues = { collateralValue: 0n, borrowValue: 0n, effectiveCollateralValue: 0n, effectiveBorrowValue: 0n };

  for (const [poolId, collateral] of loan.collaterals) {
    const pool = context.pool(poolId);
    const underlying = toUnderlyingAmount(collateral.balance, pool.updatedDepositIndex());
    const value = assetDollarValue(underlying, context.priceFeed(poolId));
    values.collateralValue += value;
    values.effectiveCollateralValue += effectiveCollateralValue(value, loanPoolOf(loanType, poolId).collateralFactor);
  }

  for (const [poolId, borrow] of loan.borrows) {
    const pool = context.pool(poolId);
    const balance = updatedBorrowBalance(borrow, pool.updatedVariableBorrowIndex(), context.now);
    const value = assetDollarValueRoundUp(balance, context.priceFeed(poolId));
    values.borrowValue += value;
    values.effectiveBorrowValue += effectiveBorrowValue(value, loanPoolOf(loanType, poolId).borrowFactor);
  }

  return values;
}

export function isOverCollateralized(values: LoanValues): boolean {
  return values.effectiveCollateralValue >= values.effectiveBorrowValue;
}

export function loanHealth(values: LoanValues): LoanHealth {
  return {
    ...values,
    ltvRatio: ltvRatio(values.borrowValue, values.collateralValue),
    borrowUtilisationRatio: borrowUtilisationRatio(values.effectiveBorrowValue, values.effectiveCollateralValue),
    liquidationMargin: liquidationMargin(values.effectiveBorrowValue, values.effectiveCollateralValue),
    isOverCollateralized: isOverCollateralized(values),
  };
}

export function assertOverCollateralized(loan: UserLoan, loanType: LoanType, context: HealthContext): void {
  const values = loanValues(loan, loanType, context);
  if (!isOverCollateralized(values)) {
    throw new LoanError(
      'UnderCollateralizedLoan',
      `Loan ${loan.loanId} is under-collateralised`,
      {
        loanId: loan.loanId,
        effectiveCollateralValue: values.effectiveCollateralValue,
        effectiveBorrowValue: values.effectiveBorrowValue,
      },
      'SOLVENCY'
    );
  }
}

function loanPoolOf(loanType: LoanType, poolId: PoolId): LoanPool {
  const loanPool = loanType.pools.get(poolId);
  if (!loanPool) {
    throw new LoanError('LoanPoolUnknown', `Pool ${poolId} is not part of loan type ${loanType.loanTypeId}`, {
      loanTypeId: loanType.loanTypeId,
      poolId,
    });
  }
  return loanPool;
}
