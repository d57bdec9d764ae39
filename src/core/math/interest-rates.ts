/**
 * Lending Hub - Interest Rate Curves
 * Utilisation-driven rate models for variable and stable borrows
 *
 * Units: ut / ratiot 18dp, uopt / ratioopt 4dp, vr* / sr* / rr 6dp.
 * All returned rates are annual, 18dp.
 */

import {
  ONE_4_DP,
  ONE_6_DP,
  ONE_18_DP,
  divScale,
  from4DPto18DP,
  from6DPto18DP,
  mulScale,
} from './fixed-point';

export interface VariableRateCurve {
  vr0: bigint;
  vr1: bigint;
  vr2: bigint;
}

export interface StableRateCurve {
  sr0: bigint;
  sr1: bigint;
  sr2: bigint;
  sr3: bigint;
}

/**
 * Kinked curve: vr0 + vr1·ut/uopt below the kink, vr0 + vr1 + vr2·(ut−uopt)/(1−uopt) above it
 */
export function variableBorrowInterestRate(curve: VariableRateCurve, ut: bigint, uopt: bigint): bigint {
  const uopt18 = from4DPto18DP(uopt);
  if (ut < uopt18) {
    return from6DPto18DP(curve.vr0) + divScale(mulScale(ut, curve.vr1, ONE_6_DP), uopt, ONE_4_DP);
  }
  return (
    from6DPto18DP(curve.vr0 + curve.vr1) +
    divScale(mulScale(ut - uopt18, curve.vr2, ONE_6_DP), ONE_4_DP - uopt, ONE_4_DP)
  );
}

/**
 * Offer rate for new stable borrows. Adds the sr3 penalty once the
 * stable share of debt passes its optimum.
 */
export function stableBorrowInterestRate(
  vr1: bigint,
  curve: StableRateCurve,
  ut: bigint,
  uopt: bigint,
  ratiot: bigint,
  ratioopt: bigint
): bigint {
  const uopt18 = from4DPto18DP(uopt);
  const base =
    ut <= uopt18
      ? from6DPto18DP(vr1 + curve.sr0) + divScale(mulScale(ut, curve.sr1, ONE_6_DP), uopt, ONE_4_DP)
      : from6DPto18DP(vr1 + curve.sr0 + curve.sr1) +
        divScale(mulScale(ut - uopt18, curve.sr2, ONE_6_DP), ONE_4_DP - uopt, ONE_4_DP);

  const ratioopt18 = from4DPto18DP(ratioopt);
  const extra =
    ratiot > ratioopt18
      ? divScale(mulScale(curve.sr3, ratiot - ratioopt18, ONE_6_DP), ONE_4_DP - ratioopt, ONE_4_DP)
      : 0n;

  return base + extra;
}

export function overallBorrowInterestRate(
  totalVariable: bigint,
  totalStable: bigint,
  variableRate: bigint,
  averageStableRate: bigint
): bigint {
  const totalDebt = totalVariable + totalStable;
  if (totalDebt === 0n) return 0n;
  return (totalVariable * variableRate + totalStable * averageStableRate) / totalDebt;
}

export function depositInterestRate(ut: bigint, overallRate: bigint, retentionRate: bigint): bigint {
  return mulScale(mulScale(ut, overallRate, ONE_18_DP), ONE_6_DP - retentionRate, ONE_6_DP);
}

// ============================================
// REBALANCE THRESHOLDS
// ============================================

/**
 * Deposit rate at or below which stable borrows may be rebalanced up (18dp)
 */
export function rebalanceUpThreshold(rebalanceUpDepositInterestRate: bigint, curve: VariableRateCurve): bigint {
  return mulScale(from4DPto18DP(rebalanceUpDepositInterestRate), curve.vr0 + curve.vr1 + curve.vr2, ONE_6_DP);
}

/**
 * Loan stable rate at or above which it may be rebalanced down (18dp)
 */
export function rebalanceDownThreshold(rebalanceDownDelta: bigint, currentStableRate: bigint): bigint {
  return mulScale(ONE_4_DP + rebalanceDownDelta, currentStableRate, ONE_4_DP);
}
