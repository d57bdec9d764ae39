/**
 * Lending Hub - In-Memory Collaborators
 * Used in MOCK MODE (no DATABASE_URL) and by tests
 */

import { LoanId, PoolId, PriceFeed } from '../../shared/types';
import { createRewardEpochState } from '../rewards';
import { HubSnapshot, LendingRepository, LoadScope, PriceOracle, ReceiptTokenLedger, fTokenBalanceKey } from './types';
import { PoolError } from '../pools';

export function createEmptySnapshot(): HubSnapshot {
  return {
    pools: new Map(),
    loanTypes: new Map(),
    loans: new Map(),
    userPoolRewards: new Map(),
    rewardEpochs: createRewardEpochState(),
  };
}

export class InMemoryLendingRepository implements LendingRepository {
  private stored: HubSnapshot = createEmptySnapshot();

  async load(scope: LoadScope): Promise<HubSnapshot> {
    const snapshot: HubSnapshot = {
      pools: this.stored.pools,
      loanTypes: this.stored.loanTypes,
      loans: new Map(),
      userPoolRewards: new Map(),
      rewardEpochs: this.stored.rewardEpochs,
    };
    for (const loanId of scope.loanIds) {
      const loan = this.stored.loans.get(loanId);
      if (loan) snapshot.loans.set(loanId, loan);
    }
    for (const accountId of scope.accountIds) {
      const rewards = this.stored.userPoolRewards.get(accountId);
      if (rewards) snapshot.userPoolRewards.set(accountId, rewards);
    }
    return structuredClone(snapshot);
  }

  async commit(snapshot: HubSnapshot, deletedLoanIds: LoanId[]): Promise<void> {
    const copy = structuredClone(snapshot);
    const next: HubSnapshot = {
      pools: copy.pools,
      loanTypes: copy.loanTypes,
      loans: new Map(this.stored.loans),
      userPoolRewards: new Map(this.stored.userPoolRewards),
      rewardEpochs: copy.rewardEpochs,
    };
    for (const [loanId, loan] of copy.loans) next.loans.set(loanId, loan);
    for (const loanId of deletedLoanIds) next.loans.delete(loanId);
    for (const [accountId, rewards] of copy.userPoolRewards) next.userPoolRewards.set(accountId, rewards);
    this.stored = next;
  }

  /**
   * Read-only copy of everything stored
   */
  dump(): HubSnapshot {
    return structuredClone(this.stored);
  }
}

export class InMemoryPriceOracle implements PriceOracle {
  private readonly feeds = new Map<PoolId, PriceFeed>();

  setPriceFeed(poolId: PoolId, feed: PriceFeed): void {
    this.feeds.set(poolId, { ...feed });
  }

  async getPriceFeed(poolId: PoolId): Promise<PriceFeed> {
    const feed = this.feeds.get(poolId);
    if (!feed) {
      throw new PoolError('PriceFeedUnavailable', `No price feed for pool ${poolId}`, { poolId });
    }
    return { ...feed };
  }
}

export class InMemoryReceiptTokenLedger implements ReceiptTokenLedger {
  private readonly balances = new Map<string, bigint>();

  async balanceOf(poolId: PoolId, account: string): Promise<bigint> {
    return this.balances.get(fTokenBalanceKey(poolId, account)) ?? 0n;
  }

  async mint(poolId: PoolId, account: string, fAmount: bigint): Promise<void> {
    const key = fTokenBalanceKey(poolId, account);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + fAmount);
  }

  async burn(poolId: PoolId, account: string, fAmount: bigint): Promise<void> {
    const key = fTokenBalanceKey(poolId, account);
    const balance = this.balances.get(key) ?? 0n;
    if (fAmount > balance) {
      throw new Error(`[Ledger] Cannot burn ${fAmount} f-tokens of ${account} in pool ${poolId}: balance ${balance}`);
    }
    this.balances.set(key, balance - fAmount);
  }
}
