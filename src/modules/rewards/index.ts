/**
 * Lending Hub - Rewards Module Export
 */

export {
  RewardAccrual,
  RewardAccrualContext,
  accruedRewards,
  emptyUserPoolRewards,
  rewardIndexIncrement,
} from './reward-accrual';
export { RewardEpochs, RewardEpochContext, MIN_EPOCH_LENGTH, createRewardEpochState } from './reward-epochs';
export { RewardError, RewardErrorCode } from './reward.errors';
