/**
 * @file modules/rewards/reward-epochs.test.ts
 * @description Epoch budgets, epoch points and reward claims
 */

import { describe, it, expect } from '@jest/globals';
import { AccountId, LendingEvent, PoolId, RewardEpochState, UserPoolRewards } from '../../shared/types';
import { MIN_EPOCH_LENGTH, RewardEpochs, createRewardEpochState } from './reward-epochs';
import { emptyUserPoolRewards } from './reward-accrual';
import { RewardError } from './reward.errors';
import { T0 } from '../../../test/fixtures/pool.fixtures';

const POOL: PoolId = 1;
const END = T0 + MIN_EPOCH_LENGTH;

function createHarness() {
  const state: RewardEpochState = createRewardEpochState();
  const points = new Map<string, UserPoolRewards>();
  const events: LendingEvent[] = [];

  const rewardsOf = (accountId: AccountId, poolId: PoolId): UserPoolRewards => {
    const key = `${accountId}:${poolId}`;
    let rewards = points.get(key);
    if (!rewards) {
      rewards = emptyUserPoolRewards();
      points.set(key, rewards);
    }
    return rewards;
  };

  const at = (now: bigint) => new RewardEpochs(state, { now, emit: (event) => events.push(event), userPoolRewards: rewardsOf });
  return { state, events, rewardsOf, at };
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof RewardError) return error.code;
    throw error;
  }
  return undefined;
}

describe('RewardEpochs', () => {
  describe('addEpoch', () => {
    it('numbers epochs from 1 per pool', () => {
      const { at, events } = createHarness();
      const epochs = at(T0);

      expect(epochs.addEpoch(POOL, T0, END, 1_000n)).toBe(1);
      expect(epochs.addEpoch(POOL, END + 1n, END + 1n + MIN_EPOCH_LENGTH, 500n)).toBe(2);
      expect(epochs.addEpoch(2, T0, END, 1n)).toBe(1);
      expect(events[0]).toEqual({ type: 'EpochAdded', poolId: POOL, start: T0, end: END, totalRewards: 1_000n, epochIndex: 1 });
    });

    it('rejects inverted, overlapping and short epochs', () => {
      const { at } = createHarness();
      const epochs = at(T0);
      expect(codeOf(() => epochs.addEpoch(POOL, END, T0, 1n))).toBe('InvalidEpochRange');
      expect(codeOf(() => epochs.addEpoch(POOL, T0, END - 1n, 1n))).toBe('InvalidEpochLength');

      epochs.addEpoch(POOL, T0, END, 1n);
      expect(codeOf(() => epochs.addEpoch(POOL, END, END + MIN_EPOCH_LENGTH, 1n))).toBe('InvalidEpochStart');
    });
  });

  describe('updateEpochTotalRewards', () => {
    it('changes the budget until the epoch ends', () => {
      const { at, state } = createHarness();
      at(T0).addEpoch(POOL, T0, END, 1_000n);

      at(END - 1n).updateEpochTotalRewards(POOL, 1, 2_000n);
      expect(state.poolEpochs.get(POOL)?.[0]?.totalRewards).toBe(2_000n);
      expect(codeOf(() => at(END).updateEpochTotalRewards(POOL, 1, 3_000n))).toBe('CannotUpdateExpiredEpoch');
      expect(codeOf(() => at(T0).updateEpochTotalRewards(POOL, 2, 1n))).toBe('EpochUnknown');
    });
  });

  describe('points and claims', () => {
    function withPoints() {
      const harness = createHarness();
      harness.at(T0).addEpoch(POOL, T0, END, 1_000n);
      harness.rewardsOf('alice', POOL).collateral = 300n;
      harness.rewardsOf('bob', POOL).collateral = 100n;
      harness.at(T0 + 10n).updateAccountPoints(['alice', 'bob'], [{ poolId: POOL, epochIndex: 1 }]);

      // alice keeps earning
      harness.rewardsOf('alice', POOL).collateral = 500n;
      harness.at(T0 + 20n).updateAccountPoints(['alice'], [{ poolId: POOL, epochIndex: 1 }]);
      return harness;
    }

    it('credits only points earned since the last update', () => {
      const { at } = withPoints();
      const epochs = at(T0 + 20n);
      expect(epochs.getAccountEpochPoints('alice', POOL, 1)).toBe(500n);
      expect(epochs.getAccountEpochPoints('bob', POOL, 1)).toBe(100n);
      expect(epochs.getPoolTotalEpochPoints(POOL, 1)).toBe(600n);
      expect(epochs.getActiveEpoch(POOL)).toEqual({ poolId: POOL, epochIndex: 1, epoch: { start: T0, end: END, totalRewards: 1_000n } });
    });

    it('shares the budget pro rata', () => {
      const { at } = withPoints();
      const epochs = at(END);
      expect(epochs.getUnclaimedRewards('alice', [{ poolId: POOL, epochIndex: 1 }])).toBe(833n);
      expect(epochs.getUnclaimedRewards('bob', [{ poolId: POOL, epochIndex: 1 }])).toBe(166n);
      expect(epochs.getUnclaimedRewards('carol', [{ poolId: POOL, epochIndex: 1 }])).toBe(0n);
    });

    it('pays a claim once', () => {
      const { at, events } = withPoints();
      const epochs = at(END);
      const epoch = { poolId: POOL, epochIndex: 1 };

      expect(epochs.claimRewards('alice', [epoch])).toBe(833n);
      expect(epochs.claimRewards('alice', [epoch])).toBe(0n);
      expect(epochs.claimRewards('bob', [epoch, epoch])).toBe(166n);
      expect(events[events.length - 1]).toEqual({ type: 'RewardsClaimed', accountId: 'bob', amount: 166n });
    });

    it('only counts points in active epochs and pays after they end', () => {
      const { at } = withPoints();
      expect(codeOf(() => at(END - 1n).claimRewards('alice', [{ poolId: POOL, epochIndex: 1 }]))).toBe('EpochNotEnded');
      expect(codeOf(() => at(END).updateAccountPoints(['alice'], [{ poolId: POOL, epochIndex: 1 }]))).toBe('EpochNotActive');
      expect(codeOf(() => at(END).getActiveEpoch(POOL))).toBe('EpochNotActive');
    });
  });
});
