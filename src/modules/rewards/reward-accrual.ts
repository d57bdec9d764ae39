/**
 * Lending Hub - Reward Accrual
 *
 * Per loan pool, a collateral and a borrow reward index grow by
 * speed · dt / used whenever the pool's usage is above its minimum.
 * Positions checkpoint the index they last accrued at, so accruing twice
 * at the same instant adds nothing.
 */

import { ONE_18_DP, mulScale } from '../../core/math';
import {
  AccountId,
  EventSink,
  LoanId,
  LoanPool,
  LoanTypeId,
  PoolId,
  UserLoan,
  UserPoolRewards,
} from '../../shared/types';

export interface RewardAccrualContext {
  now: bigint;
  emit: EventSink;
  loanPool(loanTypeId: LoanTypeId, poolId: PoolId): LoanPool;
  loan(loanId: LoanId): UserLoan;
  userPoolRewards(accountId: AccountId, poolId: PoolId): UserPoolRewards;
}

export function rewardIndexIncrement(elapsed: bigint, speed: bigint, used: bigint, minimumAmount: bigint): bigint {
  if (elapsed <= 0n || used <= minimumAmount) return 0n;
  return mulScale(elapsed, speed, used);
}

export function accruedRewards(amount: bigint, currentIndex: bigint, positionIndex: bigint): bigint {
  return mulScale(amount, currentIndex - positionIndex, ONE_18_DP);
}

export function emptyUserPoolRewards(): UserPoolRewards {
  return { collateral: 0n, borrow: 0n, interestPaid: 0n };
}

export class RewardAccrual {
  // loan pools already brought up to date in this action
  private readonly touched = new Set<string>();

  constructor(private readonly context: RewardAccrualContext) {}

  /**
   * Bring one loan pool's reward indexes up to now
   */
  updateLoanPoolRewardIndexes(loanTypeId: LoanTypeId, poolId: PoolId): LoanPool {
    const loanPool = this.context.loanPool(loanTypeId, poolId);
    const key = `${loanTypeId}:${poolId}`;
    if (this.touched.has(key)) return loanPool;

    const { reward } = loanPool;
    const elapsed = this.context.now - reward.lastUpdateTimestamp;
    reward.collateralRewardIndex += rewardIndexIncrement(
      elapsed,
      reward.collateralSpeed,
      loanPool.collateralUsed,
      reward.minimumAmount
    );
    reward.borrowRewardIndex += rewardIndexIncrement(elapsed, reward.borrowSpeed, loanPool.borrowUsed, reward.minimumAmount);
    reward.lastUpdateTimestamp = this.context.now;
    this.touched.add(key);

    this.context.emit({
      type: 'RewardIndexesUpdated',
      loanTypeId,
      poolId,
      collateralRewardIndex: reward.collateralRewardIndex,
      borrowRewardIndex: reward.borrowRewardIndex,
      timestamp: this.context.now,
    });
    return loanPool;
  }

  updateLoanPoolsRewardIndexes(loanTypeIds: LoanTypeId[], poolIdsPerLoanType: PoolId[][]): void {
    loanTypeIds.forEach((loanTypeId, i) => {
      for (const poolId of poolIdsPerLoanType[i] ?? []) {
        this.updateLoanPoolRewardIndexes(loanTypeId, poolId);
      }
    });
  }

  /**
   * Accrue a loan's collateral and borrow rewards in one pool and
   * checkpoint both positions at the current indexes
   */
  updateUserPoolRewards(loan: UserLoan, poolId: PoolId): LoanPool {
    const loanPool = this.updateLoanPoolRewardIndexes(loan.loanTypeId, poolId);
    const { collateralRewardIndex, borrowRewardIndex } = loanPool.reward;

    const collateral = loan.collaterals.get(poolId);
    const borrow = loan.borrows.get(poolId);
    if (collateral === undefined && borrow === undefined) return loanPool;

    const rewards = this.context.userPoolRewards(loan.accountId, poolId);
    if (collateral) {
      rewards.collateral += accruedRewards(collateral.balance, collateralRewardIndex, collateral.rewardIndex);
      collateral.rewardIndex = collateralRewardIndex;
    }
    if (borrow) {
      rewards.borrow += accruedRewards(borrow.amount, borrowRewardIndex, borrow.rewardIndex);
      borrow.rewardIndex = borrowRewardIndex;
    }
    return loanPool;
  }

  updateUserLoansPoolsRewards(loanIds: LoanId[]): void {
    for (const loanId of loanIds) {
      const loan = this.context.loan(loanId);
      const poolIds = new Set<PoolId>([...loan.collaterals.keys(), ...loan.borrows.keys()]);
      for (const poolId of poolIds) {
        this.updateUserPoolRewards(loan, poolId);
      }
    }
  }
}
