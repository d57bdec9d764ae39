/**
 * Lending Hub - Loan Types
 * User loans, loan types (risk classes) and per-account reward points
 */

import { PoolId } from './pool.types';

export type LoanId = string;
export type AccountId = string;
export type LoanTypeId = number;

export interface UserLoanCollateral {
  balance: bigint;                   // f-token units
  rewardIndex: bigint;               // 18dp
}

export interface UserLoanBorrow {
  amount: bigint;                    // principal, excluding interest
  balance: bigint;                   // principal plus accrued interest
  lastInterestIndex: bigint;         // 18dp
  stableInterestRate: bigint;        // 18dp, 0 for a variable borrow
  lastStableUpdateTimestamp: bigint; // unix seconds, 0 for a variable borrow
  rewardIndex: bigint;               // 18dp
}

/**
 * A stored loan is active. Deleting a loan removes the record.
 */
export interface UserLoan {
  loanId: LoanId;
  accountId: AccountId;
  loanTypeId: LoanTypeId;
  name: string;
  collaterals: Map<PoolId, UserLoanCollateral>;
  borrows: Map<PoolId, UserLoanBorrow>;
}

export interface LoanPoolReward {
  lastUpdateTimestamp: bigint;
  minimumAmount: bigint;
  collateralSpeed: bigint;           // 18dp reward units per second
  borrowSpeed: bigint;               // 18dp reward units per second
  collateralRewardIndex: bigint;     // 18dp
  borrowRewardIndex: bigint;         // 18dp
}

export interface LoanPool {
  collateralUsed: bigint;            // f-token units across all loans of the type
  borrowUsed: bigint;                // principal across all loans of the type
  collateralCap: bigint;             // whole USD
  borrowCap: bigint;                 // whole USD
  collateralFactor: bigint;          // 4dp, <= 1e4
  borrowFactor: bigint;              // 4dp, >= 1e4
  liquidationBonus: bigint;          // 4dp
  liquidationFee: bigint;            // 4dp
  isDeprecated: boolean;
  reward: LoanPoolReward;
}

export interface LoanType {
  loanTypeId: LoanTypeId;
  loanTargetHealth: bigint;          // 4dp, >= 1e4
  isDeprecated: boolean;
  pools: Map<PoolId, LoanPool>;
}

export interface LoanPoolParams {
  collateralFactor: bigint;
  collateralCap: bigint;
  borrowFactor: bigint;
  borrowCap: bigint;
  liquidationBonus: bigint;
  liquidationFee: bigint;
  rewardCollateralSpeed: bigint;
  rewardBorrowSpeed: bigint;
  rewardMinimumAmount: bigint;
}

/**
 * Accumulated reward points of an account in a pool
 */
export interface UserPoolRewards {
  collateral: bigint;
  borrow: bigint;
  interestPaid: bigint;
}

/**
 * Loan health snapshot, values in USD (18dp), ratios in 4dp
 */
export interface LoanHealth {
  collateralValue: bigint;
  borrowValue: bigint;
  effectiveCollateralValue: bigint;
  effectiveBorrowValue: bigint;
  ltvRatio: bigint;
  borrowUtilisationRatio: bigint;
  liquidationMargin: bigint;
  isOverCollateralized: boolean;
}
