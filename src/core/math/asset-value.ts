/**
 * Lending Hub - Asset Valuation
 * Oracle-priced conversions used by loan health and liquidation
 *
 * Prices are 18dp USD per whole token; values are 18dp USD.
 */

import { PriceFeed } from '../../shared/types';
import { ONE_4_DP, ONE_18_DP, divScale, mulScale, mulScaleRoundUp } from './fixed-point';

function unit(decimals: number): bigint {
  return 10n ** BigInt(decimals);
}

export function assetDollarValue(amount: bigint, feed: PriceFeed): bigint {
  return mulScale(amount, feed.price, unit(feed.decimals));
}

export function assetDollarValueRoundUp(amount: bigint, feed: PriceFeed): bigint {
  return mulScaleRoundUp(amount, feed.price, unit(feed.decimals));
}

/**
 * Token amount worth `value` (18dp USD), rounded down
 */
export function assetAmountFromValue(value: bigint, feed: PriceFeed): bigint {
  return divScale(value, feed.price, unit(feed.decimals));
}

export function convertAssetAmount(amount: bigint, from: PriceFeed, to: PriceFeed): bigint {
  if (to.price === 0n) return 0n;
  return mulScale(assetDollarValue(amount, from), unit(to.decimals), to.price);
}

/**
 * Whole-USD cap check: true when `value` (18dp) exceeds `cap` dollars
 */
export function exceedsDollarCap(value: bigint, cap: bigint): boolean {
  return value > cap * ONE_18_DP;
}

// ============================================
// RISK-WEIGHTED VALUES
// ============================================

export function effectiveCollateralValue(value: bigint, collateralFactor: bigint): bigint {
  return mulScale(value, collateralFactor, ONE_4_DP);
}

export function effectiveBorrowValue(value: bigint, borrowFactor: bigint): bigint {
  return mulScaleRoundUp(value, borrowFactor, ONE_4_DP);
}

export function borrowValueTarget(effectiveBorrow: bigint, loanTargetHealth: bigint): bigint {
  return mulScale(effectiveBorrow, loanTargetHealth, ONE_4_DP);
}

/**
 * Borrow value over collateral value (4dp)
 */
export function ltvRatio(borrowValue: bigint, collateralValue: bigint): bigint {
  return divScale(borrowValue, collateralValue, ONE_4_DP);
}

export function borrowUtilisationRatio(effectiveBorrow: bigint, effectiveCollateral: bigint): bigint {
  return divScale(effectiveBorrow, effectiveCollateral, ONE_4_DP);
}

/**
 * (effCol − effBor) / effCol in 4dp; negative once under-collateralised
 */
export function liquidationMargin(effectiveBorrow: bigint, effectiveCollateral: bigint): bigint {
  return divScale(effectiveCollateral - effectiveBorrow, effectiveCollateral, ONE_4_DP);
}

// ============================================
// LIQUIDATION CONVERSIONS
// ============================================

/**
 * Collateral (underlying) seized for repaying `repayAmount` of the borrow asset,
 * including the liquidation bonus (4dp)
 */
export function seizedCollateralAmount(
  repayAmount: bigint,
  borrowFeed: PriceFeed,
  collateralFeed: PriceFeed,
  liquidationBonus: bigint
): bigint {
  return mulScale(convertAssetAmount(repayAmount, borrowFeed, collateralFeed), ONE_4_DP + liquidationBonus, ONE_4_DP);
}

/**
 * Inverse of seizedCollateralAmount: borrow repaid by seizing `collateralAmount`
 */
export function repayAmountForCollateral(
  collateralAmount: bigint,
  collateralFeed: PriceFeed,
  borrowFeed: PriceFeed,
  liquidationBonus: bigint
): bigint {
  return divScale(
    convertAssetAmount(collateralAmount, collateralFeed, borrowFeed),
    ONE_4_DP + liquidationBonus,
    ONE_4_DP
  );
}

/**
 * Protocol share of the bonus portion of seized collateral
 */
export function reserveCollateral(seized: bigint, repayInCollateral: bigint, liquidationFee: bigint): bigint {
  const bonusPortion = seized > repayInCollateral ? seized - repayInCollateral : 0n;
  return mulScale(bonusPortion, liquidationFee, ONE_4_DP);
}

/**
 * USD value of debt that must be repaid to bring the loan back to
 * `loanTargetHealth`, or undefined when no repayment can restore it.
 *
 *   R = (T·effBor − effCol) / (T·BF − (1 + bonus)·CF)
 */
export function repayValueToTargetHealth(
  effectiveCollateral: bigint,
  effectiveBorrow: bigint,
  loanTargetHealth: bigint,
  borrowFactor: bigint,
  collateralFactor: bigint,
  liquidationBonus: bigint
): bigint | undefined {
  const numerator = borrowValueTarget(effectiveBorrow, loanTargetHealth) - effectiveCollateral;
  if (numerator <= 0n) return 0n;
  const denominator =
    mulScale(loanTargetHealth, borrowFactor, ONE_4_DP) - mulScale(ONE_4_DP + liquidationBonus, collateralFactor, ONE_4_DP);
  if (denominator <= 0n) return undefined;
  return divScale(numerator, denominator, ONE_4_DP);
}
