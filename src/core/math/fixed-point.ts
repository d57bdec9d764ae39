/**
 * Lending Hub - Fixed-Point Math
 *
 * NO FLOATING POINT: every amount, rate and index is a bigint in a fixed
 * decimal domain. Multiplications happen before divisions; rounding is
 * always explicit (down unless the function name says RoundUp).
 */

import { LendingError } from '../../shared/errors';

export const SECONDS_IN_YEAR = 365n * 24n * 60n * 60n;

export const ONE_4_DP = 10n ** 4n;
export const ONE_6_DP = 10n ** 6n;
export const ONE_12_DP = 10n ** 12n;
export const ONE_14_DP = 10n ** 14n;
export const ONE_18_DP = 10n ** 18n;

export type MathErrorCode = 'RatioExceedsOne';

export class MathError extends LendingError<MathErrorCode> {
  constructor(code: MathErrorCode, message: string, details: Record<string, bigint> = {}) {
    super(code, 'ARITHMETIC', message, details);
    this.name = 'MathError';
  }
}

// ============================================
// SCALED MULTIPLY / DIVIDE
// ============================================

export function mulScale(a: bigint, b: bigint, scale: bigint): bigint {
  return (a * b) / scale;
}

export function mulScaleRoundUp(a: bigint, b: bigint, scale: bigint): bigint {
  const product = a * b;
  return product / scale + (product % scale > 0n ? 1n : 0n);
}

/**
 * a * scale / b, or 0 when b is 0
 */
export function divScale(a: bigint, b: bigint, scale: bigint): bigint {
  if (b === 0n) return 0n;
  return (a * scale) / b;
}

export function divScaleRoundUp(a: bigint, b: bigint, scale: bigint): bigint {
  if (b === 0n) return 0n;
  const scaled = a * scale;
  return scaled / b + (scaled % b > 0n ? 1n : 0n);
}

/**
 * x^n where x is expressed in `scale`, by repeated squaring
 */
export function expBySquaring(x: bigint, n: bigint, scale: bigint): bigint {
  if (n === 0n) return scale;

  let base = x;
  let exponent = n;
  let y = scale;
  while (exponent > 1n) {
    if (exponent % 2n === 1n) {
      y = mulScale(base, y, scale);
      exponent = (exponent - 1n) / 2n;
    } else {
      exponent = exponent / 2n;
    }
    base = mulScale(base, base, scale);
  }
  return mulScale(base, y, scale);
}

export function from4DPto18DP(value: bigint): bigint {
  return value * ONE_14_DP;
}

export function from6DPto18DP(value: bigint): bigint {
  return value * ONE_12_DP;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

/**
 * a - b, floored at zero
 */
export function subFloor(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n;
}

// ============================================
// RATIOS
// ============================================

/**
 * numerator / denominator in 18dp
 * FAILS with RatioExceedsOne when numerator > denominator.
 * Defined as 0 when denominator is 0.
 */
export function ratio(numerator: bigint, denominator: bigint): bigint {
  if (numerator > denominator) {
    throw new MathError('RatioExceedsOne', `Ratio ${numerator}/${denominator} exceeds one`, {
      numerator,
      denominator,
    });
  }
  if (denominator === 0n) return 0n;
  return divScale(numerator, denominator, ONE_18_DP);
}

export function utilisationRatio(totalDebt: bigint, totalDeposits: bigint): bigint {
  return ratio(totalDebt, totalDeposits);
}

export function stableDebtToTotalDebtRatio(totalStableDebt: bigint, totalDebt: bigint): bigint {
  return ratio(totalStableDebt, totalDebt);
}

// ============================================
// INDEX COMPOUNDING
// ============================================

/**
 * Grow an 18dp index by an 18dp annual rate over `secondsElapsed`.
 *
 * compounding = true:  index * (1 + rate / SECONDS_IN_YEAR) ^ dt  (per-second compounding)
 * compounding = false: index * (1 + rate * dt / SECONDS_IN_YEAR) (simple interest)
 *
 * Both round down, so the index never grows faster than the rate allows.
 */
export function compoundIndex(rate: bigint, oldIndex: bigint, secondsElapsed: bigint, compounding: boolean): bigint {
  if (secondsElapsed <= 0n) return oldIndex;
  if (compounding) {
    const growth = expBySquaring(ONE_18_DP + rate / SECONDS_IN_YEAR, secondsElapsed, ONE_18_DP);
    return mulScale(oldIndex, growth, ONE_18_DP);
  }
  return mulScale(oldIndex, ONE_18_DP + mulScale(rate, secondsElapsed, SECONDS_IN_YEAR), ONE_18_DP);
}

/**
 * Balance after index growth, rounded up in the protocol's favour
 */
export function calcBorrowBalance(balance: bigint, newIndex: bigint, oldIndex: bigint): bigint {
  return mulScaleRoundUp(balance, divScaleRoundUp(newIndex, oldIndex, ONE_18_DP), ONE_18_DP);
}

// ============================================
// STABLE RATE AVERAGES
// ============================================

export function increasingAverageStableRate(
  amountAdded: bigint,
  rateOfAdded: bigint,
  totalBefore: bigint,
  avgBefore: bigint
): bigint {
  return divScale(
    mulScale(totalBefore, avgBefore, ONE_18_DP) + mulScale(amountAdded, rateOfAdded, ONE_18_DP),
    totalBefore + amountAdded,
    ONE_18_DP
  );
}

/**
 * Returns 0 when nothing remains, and when rounding would take the
 * weighted sum below zero.
 */
export function decreasingAverageStableRate(
  amountRemoved: bigint,
  rateOfRemoved: bigint,
  totalBefore: bigint,
  avgBefore: bigint
): bigint {
  if (amountRemoved >= totalBefore) return 0n;
  const weighted = mulScale(totalBefore, avgBefore, ONE_18_DP) - mulScale(amountRemoved, rateOfRemoved, ONE_18_DP);
  if (weighted <= 0n) return 0n;
  return divScale(weighted, totalBefore - amountRemoved, ONE_18_DP);
}

/**
 * Amount-weighted average of two stable rates
 */
export function averageStableRate(amountA: bigint, rateA: bigint, amountB: bigint, rateB: bigint): bigint {
  return divScale(
    mulScale(amountA, rateA, ONE_18_DP) + mulScale(amountB, rateB, ONE_18_DP),
    amountA + amountB,
    ONE_18_DP
  );
}

// ============================================
// RECEIPT (F-TOKEN) CONVERSIONS
// ============================================

export function toFAmount(underlyingAmount: bigint, depositInterestIndex: bigint, roundUp = false): bigint {
  return roundUp
    ? divScaleRoundUp(underlyingAmount, depositInterestIndex, ONE_18_DP)
    : divScale(underlyingAmount, depositInterestIndex, ONE_18_DP);
}

export function toUnderlyingAmount(fAmount: bigint, depositInterestIndex: bigint): bigint {
  return mulScale(fAmount, depositInterestIndex, ONE_18_DP);
}

// ============================================
// FEES
// ============================================

/**
 * Flash loan fee for a 6dp fee rate, rounded up
 */
export function flashLoanFeeAmount(amount: bigint, feeRate: bigint): bigint {
  return mulScaleRoundUp(amount, feeRate, ONE_6_DP);
}
