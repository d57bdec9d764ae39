/**
 * Lending Hub - Borrow Positions
 *
 * A variable position tracks the pool's variable index. A stable position
 * carries its own index, starting at 1e18 and compounding at the
 * position's rate since its last update.
 */

import { ONE_18_DP, calcBorrowBalance, compoundIndex } from '../../core/math';
import { UserLoanBorrow } from '../../shared/types';

export function isStableBorrow(borrow: UserLoanBorrow): boolean {
  return borrow.stableInterestRate > 0n;
}

export function stablePositionIndex(borrow: UserLoanBorrow, now: bigint): bigint {
  return compoundIndex(borrow.stableInterestRate, borrow.lastInterestIndex, now - borrow.lastStableUpdateTimestamp, true);
}

/**
 * Balance including interest up to now, without touching the position
 */
export function updatedBorrowBalance(borrow: UserLoanBorrow, variableInterestIndex: bigint, now: bigint): bigint {
  const newIndex = isStableBorrow(borrow) ? stablePositionIndex(borrow, now) : variableInterestIndex;
  return calcBorrowBalance(borrow.balance, newIndex, borrow.lastInterestIndex);
}

/**
 * Roll accrued interest into the balance and move the position's index to now
 */
export function accrueBorrowInterest(borrow: UserLoanBorrow, variableInterestIndex: bigint, now: bigint): void {
  if (isStableBorrow(borrow)) {
    const newIndex = stablePositionIndex(borrow, now);
    borrow.balance = calcBorrowBalance(borrow.balance, newIndex, borrow.lastInterestIndex);
    borrow.lastInterestIndex = newIndex;
    borrow.lastStableUpdateTimestamp = now;
  } else {
    borrow.balance = calcBorrowBalance(borrow.balance, variableInterestIndex, borrow.lastInterestIndex);
    borrow.lastInterestIndex = variableInterestIndex;
  }
}

/**
 * Balance-weighted rate of a stable position after adding `amount` at `addedRate`
 */
export function stableRateAfterIncrease(balance: bigint, amount: bigint, currentRate: bigint, addedRate: bigint): bigint {
  const total = balance + amount;
  if (total === 0n) return addedRate;
  return (balance * currentRate + amount * addedRate) / total;
}

export function newVariableBorrow(amount: bigint, variableInterestIndex: bigint, rewardIndex: bigint): UserLoanBorrow {
  return {
    amount,
    balance: amount,
    lastInterestIndex: variableInterestIndex,
    stableInterestRate: 0n,
    lastStableUpdateTimestamp: 0n,
    rewardIndex,
  };
}

export function newStableBorrow(amount: bigint, stableInterestRate: bigint, now: bigint, rewardIndex: bigint): UserLoanBorrow {
  return {
    amount,
    balance: amount,
    lastInterestIndex: ONE_18_DP,
    stableInterestRate,
    lastStableUpdateTimestamp: now,
    rewardIndex,
  };
}

/**
 * Add debt to an existing position whose interest has been accrued to now.
 * A stable position re-weights its rate by balance.
 */
export function increaseBorrow(
  borrow: UserLoanBorrow,
  principalAdded: bigint,
  balanceAdded: bigint,
  stableInterestRate: bigint
): void {
  if (isStableBorrow(borrow)) {
    borrow.stableInterestRate = stableRateAfterIncrease(
      borrow.balance,
      balanceAdded,
      borrow.stableInterestRate,
      stableInterestRate
    );
  }
  borrow.amount += principalAdded;
  borrow.balance += balanceAdded;
}

/**
 * Turn an accrued position into a stable one at `stableInterestRate`, or into a
 * variable one at the pool's index
 */
export function switchBorrowPosition(
  borrow: UserLoanBorrow,
  toStable: boolean,
  stableInterestRate: bigint,
  variableInterestIndex: bigint,
  now: bigint
): void {
  if (toStable) {
    borrow.lastInterestIndex = ONE_18_DP;
    borrow.stableInterestRate = stableInterestRate;
    borrow.lastStableUpdateTimestamp = now;
  } else {
    borrow.lastInterestIndex = variableInterestIndex;
    borrow.stableInterestRate = 0n;
    borrow.lastStableUpdateTimestamp = 0n;
  }
}
