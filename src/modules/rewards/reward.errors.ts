/**
 * Lending Hub - Reward Errors
 */

import { ErrorDetail, LendingError } from '../../shared/errors';

export type RewardErrorCode =
  | 'InvalidEpochStart'
  | 'InvalidEpochLength'
  | 'InvalidEpochRange'
  | 'CannotUpdateExpiredEpoch'
  | 'EpochUnknown'
  | 'EpochNotActive'
  | 'EpochNotEnded';

export class RewardError extends LendingError<RewardErrorCode> {
  constructor(code: RewardErrorCode, message: string, details: Readonly<Record<string, ErrorDetail>> = {}) {
    super(code, 'PRECONDITION', message, details);
    this.name = 'RewardError';
  }
}
