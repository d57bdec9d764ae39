/**
 * Lending Hub - Event Types
 * Structured notifications emitted after every committed state change
 */

import { PoolId } from './pool.types';
import { AccountId, LoanId, LoanTypeId } from './loan.types';

export type PoolEvent =
  | { type: 'PoolCreated'; poolId: PoolId }
  | { type: 'PoolParamsUpdated'; poolId: PoolId; section: 'config' | 'caps' | 'fees' | 'deposit' | 'variableBorrow' | 'stableBorrow' }
  | { type: 'InterestIndexesUpdated'; poolId: PoolId; variableBorrowInterestIndex: bigint; depositInterestIndex: bigint; timestamp: bigint }
  | { type: 'InterestRatesUpdated'; poolId: PoolId; variableBorrowInterestRate: bigint; stableBorrowInterestRate: bigint; depositInterestRate: bigint }
  | { type: 'FlashLoan'; poolId: PoolId; amount: bigint; fee: bigint }
  | { type: 'ClearTokenFees'; poolId: PoolId; amount: bigint };

export type LoanTypeEvent =
  | { type: 'LoanTypeCreated'; loanTypeId: LoanTypeId }
  | { type: 'LoanTypeDeprecated'; loanTypeId: LoanTypeId }
  | { type: 'LoanPoolAdded'; loanTypeId: LoanTypeId; poolId: PoolId }
  | { type: 'LoanPoolDeprecated'; loanTypeId: LoanTypeId; poolId: PoolId }
  | { type: 'LoanPoolUpdated'; loanTypeId: LoanTypeId; poolId: PoolId; field: 'caps' | 'collateralFactor' | 'borrowFactor' | 'liquidation' | 'rewardParams' }
  | { type: 'RewardIndexesUpdated'; loanTypeId: LoanTypeId; poolId: PoolId; collateralRewardIndex: bigint; borrowRewardIndex: bigint; timestamp: bigint };

export type LoanEvent =
  | { type: 'CreateUserLoan'; loanId: LoanId; accountId: AccountId; loanTypeId: LoanTypeId }
  | { type: 'DeleteUserLoan'; loanId: LoanId; accountId: AccountId }
  | { type: 'Deposit'; loanId: LoanId; poolId: PoolId; amount: bigint; fAmount: bigint }
  | { type: 'DepositFToken'; loanId: LoanId; poolId: PoolId; fAmount: bigint }
  | { type: 'Withdraw'; loanId: LoanId; poolId: PoolId; amount: bigint; fAmount: bigint }
  | { type: 'WithdrawFToken'; loanId: LoanId; poolId: PoolId; fAmount: bigint }
  | { type: 'Borrow'; loanId: LoanId; poolId: PoolId; amount: bigint; isStable: boolean; stableInterestRate: bigint }
  | { type: 'Repay'; loanId: LoanId; poolId: PoolId; principalPaid: bigint; interestPaid: bigint; excessPaid: bigint }
  | { type: 'RepayWithCollateral'; loanId: LoanId; poolId: PoolId; principalPaid: bigint; interestPaid: bigint; fAmount: bigint }
  | {
      type: 'Liquidate';
      violatorLoanId: LoanId;
      liquidatorLoanId: LoanId;
      colPoolId: PoolId;
      borPoolId: PoolId;
      repayBorrowAmount: bigint;
      liquidatorCollateralFAmount: bigint;
      reserveCollateralFAmount: bigint;
    }
  | { type: 'SwitchBorrowType'; loanId: LoanId; poolId: PoolId; isStable: boolean }
  | { type: 'RebalanceUp'; loanId: LoanId; poolId: PoolId; stableInterestRate: bigint }
  | { type: 'RebalanceDown'; loanId: LoanId; poolId: PoolId; stableInterestRate: bigint };

export type RewardEpochEvent =
  | { type: 'EpochAdded'; poolId: PoolId; start: bigint; end: bigint; totalRewards: bigint; epochIndex: number }
  | { type: 'EpochUpdated'; poolId: PoolId; epochIndex: number; totalRewards: bigint }
  | { type: 'RewardsClaimed'; accountId: AccountId; amount: bigint };

export type LendingEvent = PoolEvent | LoanTypeEvent | LoanEvent | RewardEpochEvent;

export type LendingEventType = LendingEvent['type'];

/**
 * Envelope delivered to observers once the emitting action has committed
 */
export interface EventEnvelope {
  id: string;
  emittedAt: Date;
  event: LendingEvent;
}

export type EventSink = (event: LendingEvent) => void;
