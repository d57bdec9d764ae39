/**
 * Lending Hub - Reward Epoch Types
 */

import { PoolId } from './pool.types';
import { AccountId } from './loan.types';

export interface Epoch {
  start: bigint;                     // unix seconds, inclusive
  end: bigint;                       // unix seconds, exclusive
  totalRewards: bigint;
}

export interface PoolEpoch {
  poolId: PoolId;
  epochIndex: number;                // 1-based
}

/**
 * Distributor state. Epoch points are keyed `${poolId}:${epochIndex}`.
 */
export interface RewardEpochState {
  poolEpochs: Map<PoolId, Epoch[]>;
  poolTotalEpochPoints: Map<string, bigint>;
  accountLastUpdatedPoints: Map<AccountId, Map<PoolId, bigint>>;
  accountEpochPoints: Map<AccountId, Map<string, bigint>>;
}

export function epochKey(poolId: PoolId, epochIndex: number): string {
  return `${poolId}:${epochIndex}`;
}
