/**
 * Lending Hub - Reward Epochs
 *
 * Distributes a fixed reward budget per (pool, epoch) in proportion to the
 * collateral reward points each account gained while the epoch was active.
 */

import {
  AccountId,
  Epoch,
  EventSink,
  PoolEpoch,
  PoolId,
  RewardEpochState,
  UserPoolRewards,
  epochKey,
} from '../../shared/types';
import { RewardError } from './reward.errors';

export const MIN_EPOCH_LENGTH = 86_400n;

export interface RewardEpochContext {
  now: bigint;
  emit: EventSink;
  userPoolRewards(accountId: AccountId, poolId: PoolId): UserPoolRewards;
}

export function createRewardEpochState(): RewardEpochState {
  return {
    poolEpochs: new Map(),
    poolTotalEpochPoints: new Map(),
    accountLastUpdatedPoints: new Map(),
    accountEpochPoints: new Map(),
  };
}

export class RewardEpochs {
  constructor(
    private readonly state: RewardEpochState,
    private readonly context: RewardEpochContext
  ) {}

  // ============================================
  // EPOCH ADMINISTRATION
  // ============================================

  /**
   * @returns index of the new epoch, starting at 1
   */
  addEpoch(poolId: PoolId, start: bigint, end: bigint, totalRewards: bigint): number {
    if (end < start) {
      throw new RewardError('InvalidEpochRange', `Epoch end ${end} before start ${start}`, { start, end });
    }

    const epochs = this.state.poolEpochs.get(poolId) ?? [];
    const previous = epochs[epochs.length - 1];
    if (previous !== undefined && start <= previous.end) {
      throw new RewardError('InvalidEpochStart', `Epoch overlaps the previous epoch of pool ${poolId}`, {
        poolId,
        previousEnd: previous.end,
        start,
      });
    }

    const length = end - start;
    if (length < MIN_EPOCH_LENGTH) {
      throw new RewardError('InvalidEpochLength', `Epoch length ${length}s under ${MIN_EPOCH_LENGTH}s`, {
        length,
        minimum: MIN_EPOCH_LENGTH,
      });
    }

    epochs.push({ start, end, totalRewards });
    this.state.poolEpochs.set(poolId, epochs);

    const epochIndex = epochs.length;
    this.context.emit({ type: 'EpochAdded', poolId, start, end, totalRewards, epochIndex });
    return epochIndex;
  }

  updateEpochTotalRewards(poolId: PoolId, epochIndex: number, totalRewards: bigint): void {
    const epoch = this.getEpoch(poolId, epochIndex);
    if (this.context.now >= epoch.end) {
      throw new RewardError('CannotUpdateExpiredEpoch', `Epoch ${epochIndex} of pool ${poolId} has ended`, {
        poolId,
        epochIndex,
        end: epoch.end,
      });
    }
    epoch.totalRewards = totalRewards;
    this.context.emit({ type: 'EpochUpdated', poolId, epochIndex, totalRewards });
  }

  getEpoch(poolId: PoolId, epochIndex: number): Epoch {
    const epoch = this.state.poolEpochs.get(poolId)?.[epochIndex - 1];
    if (epoch === undefined) {
      throw new RewardError('EpochUnknown', `Unknown epoch ${epochIndex} of pool ${poolId}`, { poolId, epochIndex });
    }
    return epoch;
  }

  getActiveEpoch(poolId: PoolId): PoolEpoch & { epoch: Epoch } {
    const epochs = this.state.poolEpochs.get(poolId) ?? [];
    const epochIndex = epochs.length;
    const epoch = epochs[epochIndex - 1];
    if (epoch === undefined || !this.isActive(epoch)) {
      throw new RewardError('EpochNotActive', `No active epoch in pool ${poolId}`, { poolId, epochIndex });
    }
    return { poolId, epochIndex, epoch };
  }

  // ============================================
  // POINTS
  // ============================================

  /**
   * Move each account's newly earned collateral points into the given active epochs
   */
  updateAccountPoints(accountIds: AccountId[], poolEpochs: PoolEpoch[]): void {
    for (const { poolId, epochIndex } of poolEpochs) {
      const epoch = this.getEpoch(poolId, epochIndex);
      if (!this.isActive(epoch)) {
        throw new RewardError('EpochNotActive', `Epoch ${epochIndex} of pool ${poolId} is not active`, {
          poolId,
          epochIndex,
        });
      }

      const key = epochKey(poolId, epochIndex);
      for (const accountId of accountIds) {
        const current = this.context.userPoolRewards(accountId, poolId).collateral;
        const lastUpdated = this.accountLastUpdatedPoints(accountId);
        const delta = current - (lastUpdated.get(poolId) ?? 0n);
        lastUpdated.set(poolId, current);

        const accountPoints = this.accountEpochPoints(accountId);
        accountPoints.set(key, (accountPoints.get(key) ?? 0n) + delta);
        this.state.poolTotalEpochPoints.set(key, (this.state.poolTotalEpochPoints.get(key) ?? 0n) + delta);
      }
    }
  }

  getAccountEpochPoints(accountId: AccountId, poolId: PoolId, epochIndex: number): bigint {
    return this.state.accountEpochPoints.get(accountId)?.get(epochKey(poolId, epochIndex)) ?? 0n;
  }

  getPoolTotalEpochPoints(poolId: PoolId, epochIndex: number): bigint {
    return this.state.poolTotalEpochPoints.get(epochKey(poolId, epochIndex)) ?? 0n;
  }

  // ============================================
  // CLAIMS
  // ============================================

  /**
   * Duplicated pool epochs are counted once per occurrence
   */
  getUnclaimedRewards(accountId: AccountId, poolEpochs: PoolEpoch[]): bigint {
    return poolEpochs.reduce((sum, { poolId, epochIndex }) => sum + this.epochRewards(accountId, poolId, epochIndex), 0n);
  }

  /**
   * Zeroes the claimed points, so a pool epoch listed twice pays out once
   */
  claimRewards(accountId: AccountId, poolEpochs: PoolEpoch[]): bigint {
    let amount = 0n;
    for (const { poolId, epochIndex } of poolEpochs) {
      const epoch = this.getEpoch(poolId, epochIndex);
      if (this.context.now < epoch.end) {
        throw new RewardError('EpochNotEnded', `Epoch ${epochIndex} of pool ${poolId} has not ended`, {
          poolId,
          epochIndex,
          end: epoch.end,
        });
      }
      amount += this.epochRewards(accountId, poolId, epochIndex);
      this.accountEpochPoints(accountId).set(epochKey(poolId, epochIndex), 0n);
    }

    this.context.emit({ type: 'RewardsClaimed', accountId, amount });
    return amount;
  }

  // ============================================
  // INTERNALS
  // ============================================

  private isActive(epoch: Epoch): boolean {
    return epoch.start <= this.context.now && this.context.now < epoch.end;
  }

  private epochRewards(accountId: AccountId, poolId: PoolId, epochIndex: number): bigint {
    const totalPoints = this.getPoolTotalEpochPoints(poolId, epochIndex);
    if (totalPoints === 0n) return 0n;
    const { totalRewards } = this.getEpoch(poolId, epochIndex);
    return (this.getAccountEpochPoints(accountId, poolId, epochIndex) * totalRewards) / totalPoints;
  }

  private accountLastUpdatedPoints(accountId: AccountId): Map<PoolId, bigint> {
    let points = this.state.accountLastUpdatedPoints.get(accountId);
    if (!points) {
      points = new Map();
      this.state.accountLastUpdatedPoints.set(accountId, points);
    }
    return points;
  }

  private accountEpochPoints(accountId: AccountId): Map<string, bigint> {
    let points = this.state.accountEpochPoints.get(accountId);
    if (!points) {
      points = new Map();
      this.state.accountEpochPoints.set(accountId, points);
    }
    return points;
  }
}
