/**
 * Lending Hub - Liquidation Sizing
 *
 * Repay is capped by the liquidator's maximum, the violator's balance and the
 * amount that restores the loan type's target health. Seized collateral is the
 * repay converted at oracle prices plus the borrow pool's bonus; when the
 * violator holds less, everything is seized and the repay shrinks to match.
 * The collateral pool's liquidation fee of the bonus portion goes to the
 * protocol reserve.
 */

import {
  assetAmountFromValue,
  convertAssetAmount,
  minBigInt,
  repayAmountForCollateral,
  repayValueToTargetHealth,
  reserveCollateral,
  seizedCollateralAmount,
  toFAmount,
  toUnderlyingAmount,
} from '../../core/math';
import { LoanPool, PriceFeed } from '../../shared/types';
import { LoanValues } from './health';

export interface LiquidationInput {
  maxRepayAmount: bigint;
  violatorBorrowBalance: bigint;
  violatorCollateralFAmount: bigint;
  violatorValues: LoanValues;
  loanTargetHealth: bigint;
  borrowLoanPool: Pick<LoanPool, 'borrowFactor' | 'liquidationBonus'>;
  collateralLoanPool: Pick<LoanPool, 'collateralFactor' | 'liquidationFee'>;
  borrowFeed: PriceFeed;
  collateralFeed: PriceFeed;
  collateralDepositIndex: bigint;
}

export interface LiquidationAmounts {
  repayAmount: bigint;
  seizedFAmount: bigint;
  reserveFAmount: bigint;
  liquidatorFAmount: bigint;
}

export function calcLiquidationAmounts(input: LiquidationInput): LiquidationAmounts {
  const { borrowLoanPool, collateralLoanPool, borrowFeed, collateralFeed, collateralDepositIndex } = input;

  let repayAmount = minBigInt(input.maxRepayAmount, input.violatorBorrowBalance);
  const repayValueToTarget = repayValueToTargetHealth(
    input.violatorValues.effectiveCollateralValue,
    input.violatorValues.effectiveBorrowValue,
    input.loanTargetHealth,
    borrowLoanPool.borrowFactor,
    collateralLoanPool.collateralFactor,
    borrowLoanPool.liquidationBonus
  );
  if (repayValueToTarget !== undefined) {
    repayAmount = minBigInt(repayAmount, assetAmountFromValue(repayValueToTarget, borrowFeed));
  }

  const seizedAmount = seizedCollateralAmount(repayAmount, borrowFeed, collateralFeed, borrowLoanPool.liquidationBonus);
  let seizedFAmount = toFAmount(seizedAmount, collateralDepositIndex);
  if (seizedFAmount > input.violatorCollateralFAmount) {
    seizedFAmount = input.violatorCollateralFAmount;
    repayAmount = repayAmountForCollateral(
      toUnderlyingAmount(seizedFAmount, collateralDepositIndex),
      collateralFeed,
      borrowFeed,
      borrowLoanPool.liquidationBonus
    );
  }

  const repayInCollateralFAmount = toFAmount(
    convertAssetAmount(repayAmount, borrowFeed, collateralFeed),
    collateralDepositIndex
  );
  const reserveFAmount = reserveCollateral(seizedFAmount, repayInCollateralFAmount, collateralLoanPool.liquidationFee);

  return { repayAmount, seizedFAmount, reserveFAmount, liquidatorFAmount: seizedFAmount - reserveFAmount };
}
