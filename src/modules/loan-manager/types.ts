/**
 * Lending Hub - Loan Manager Types
 */

import {
  AccountId,
  LoanId,
  LoanType,
  LoanTypeId,
  Pool,
  PoolId,
  PriceFeed,
  RewardEpochState,
  UserLoan,
  UserPoolRewards,
} from '../../shared/types';

/**
 * The records an action reads and writes. Repositories hand out a private
 * copy per action; nothing is visible to other actions until commit.
 */
export interface HubSnapshot {
  pools: Map<PoolId, Pool>;
  loanTypes: Map<LoanTypeId, LoanType>;
  loans: Map<LoanId, UserLoan>;
  userPoolRewards: Map<AccountId, Map<PoolId, UserPoolRewards>>;
  rewardEpochs: RewardEpochState;
}

/**
 * Which loans and accounts an action touches
 */
export interface LoadScope {
  loanIds: LoanId[];
  accountIds: AccountId[];
}

export interface LendingRepository {
  load(scope: LoadScope): Promise<HubSnapshot>;
  /**
   * Persist every record in the snapshot and remove deleted loans, atomically
   */
  commit(snapshot: HubSnapshot, deletedLoanIds: LoanId[]): Promise<void>;
}

export interface PriceOracle {
  getPriceFeed(poolId: PoolId): Promise<PriceFeed>;
}

/**
 * Per-pool receipt token balances held outside loans
 */
export interface ReceiptTokenLedger {
  balanceOf(poolId: PoolId, account: string): Promise<bigint>;
  mint(poolId: PoolId, account: string, fAmount: bigint): Promise<void>;
  burn(poolId: PoolId, account: string, fAmount: bigint): Promise<void>;
}

export interface Clock {
  /** unix seconds */
  now(): bigint;
}

/**
 * Outside inputs an action sees, fetched before it starts
 */
export interface ActionEnvironment {
  now: bigint;
  priceFeeds: Map<PoolId, PriceFeed>;
  fTokenBalances: Map<string, bigint>;
}

export function fTokenBalanceKey(poolId: PoolId, account: string): string {
  return `${poolId}:${account}`;
}
