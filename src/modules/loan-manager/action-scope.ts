/**
 * Lending Hub - Action Scope
 *
 * Wires pools, loan types, loans and rewards over one action's snapshot.
 * Events and token instructions are buffered here until the action commits.
 */

import {
  AccountId,
  EventSink,
  LendingEvent,
  PoolId,
  PoolParams,
  PriceFeed,
  TokenInstruction,
  UserPoolRewards,
} from '../../shared/types';
import { LoanAccount } from '../loans/loan.account';
import { LoanTypeRegistry } from '../loans/loan-type.registry';
import { PoolAccount, PoolError, createPoolRecord } from '../pools';
import { RewardAccrual, RewardEpochs, emptyUserPoolRewards } from '../rewards';
import { ActionEnvironment, HubSnapshot, fTokenBalanceKey } from './types';

export class ActionScope {
  readonly now: bigint;
  readonly events: LendingEvent[] = [];
  readonly tokenInstructions: TokenInstruction[] = [];
  readonly emit: EventSink = (event) => {
    this.events.push(event);
  };

  readonly loanTypes: LoanTypeRegistry;
  readonly rewards: RewardAccrual;
  readonly epochs: RewardEpochs;
  readonly loans: LoanAccount;

  private readonly poolAccounts = new Map<PoolId, PoolAccount>();

  constructor(
    readonly snapshot: HubSnapshot,
    private readonly env: ActionEnvironment
  ) {
    const { now } = env;
    this.now = now;

    this.loanTypes = new LoanTypeRegistry(snapshot.loanTypes, {
      now,
      emit: this.emit,
      hasPool: (poolId) => snapshot.pools.has(poolId),
      updateRewardIndexes: (loanTypeId, poolId) => {
        this.rewards.updateLoanPoolRewardIndexes(loanTypeId, poolId);
      },
    });

    this.rewards = new RewardAccrual({
      now,
      emit: this.emit,
      loanPool: (loanTypeId, poolId) => this.loanTypes.getLoanPool(loanTypeId, poolId),
      loan: (loanId) => this.loans.getLoan(loanId),
      userPoolRewards: (accountId, poolId) => this.userPoolRewards(accountId, poolId),
    });

    this.epochs = new RewardEpochs(snapshot.rewardEpochs, {
      now,
      emit: this.emit,
      userPoolRewards: (accountId, poolId) => this.userPoolRewards(accountId, poolId),
    });

    this.loans = new LoanAccount({
      now,
      emit: this.emit,
      loans: snapshot.loans,
      loanTypes: this.loanTypes,
      rewards: this.rewards,
      userPoolRewards: (accountId, poolId) => this.userPoolRewards(accountId, poolId),
      fTokenBalanceOf: (poolId, account) => env.fTokenBalances.get(fTokenBalanceKey(poolId, account)) ?? 0n,
      pool: (poolId) => this.pool(poolId),
      priceFeed: (poolId) => this.priceFeed(poolId),
    });
  }

  pool(poolId: PoolId): PoolAccount {
    const cached = this.poolAccounts.get(poolId);
    if (cached) return cached;

    const pool = this.snapshot.pools.get(poolId);
    if (!pool) {
      throw new PoolError('PoolUnknown', `Unknown pool ${poolId}`, { poolId });
    }
    const account = new PoolAccount(pool, {
      now: this.now,
      emit: this.emit,
      queueTokenInstruction: (instruction) => {
        this.tokenInstructions.push(instruction);
      },
    });
    this.poolAccounts.set(poolId, account);
    return account;
  }

  createPool(params: PoolParams): PoolAccount {
    if (this.snapshot.pools.has(params.poolId)) {
      throw new PoolError('PoolAlreadyAdded', `Pool ${params.poolId} already exists`, { poolId: params.poolId });
    }
    this.snapshot.pools.set(params.poolId, createPoolRecord(params, this.now));

    const account = this.pool(params.poolId);
    account.recomputeRates();
    this.emit({ type: 'PoolCreated', poolId: params.poolId });
    return account;
  }

  priceFeed(poolId: PoolId): PriceFeed {
    const feed = this.env.priceFeeds.get(poolId);
    if (!feed) {
      throw new PoolError('PriceFeedUnavailable', `No price feed for pool ${poolId}`, { poolId });
    }
    return feed;
  }

  /**
   * Reward points of an account in a pool, created empty on first use
   */
  userPoolRewards(accountId: AccountId, poolId: PoolId): UserPoolRewards {
    let byPool = this.snapshot.userPoolRewards.get(accountId);
    if (!byPool) {
      byPool = new Map();
      this.snapshot.userPoolRewards.set(accountId, byPool);
    }
    let rewards = byPool.get(poolId);
    if (!rewards) {
      rewards = emptyUserPoolRewards();
      byPool.set(poolId, rewards);
    }
    return rewards;
  }
}
