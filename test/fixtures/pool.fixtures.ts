/**
 * @file test/fixtures/pool.fixtures.ts
 * @description Pool records and parameters for tests
 */

import {
  CapsData,
  ConfigData,
  DepositData,
  FeeData,
  LendingEvent,
  Pool,
  PoolParams,
  StableBorrowData,
  TokenInstruction,
  VariableBorrowData,
} from '../../src/shared/types';
import { PoolContext } from '../../src/modules/pools';

export const T0 = 1_700_000_000n;

export interface PoolOverrides {
  poolId?: number;
  tokenDecimals?: number;
  lastUpdateTimestamp?: bigint;
  depositData?: Partial<DepositData>;
  variableBorrowData?: Partial<VariableBorrowData>;
  stableBorrowData?: Partial<StableBorrowData>;
  feeData?: Partial<FeeData>;
  capsData?: Partial<CapsData>;
  configData?: Partial<ConfigData>;
}

/**
 * A fresh pool with the default curve and no activity
 */
export function createMockPool(overrides: PoolOverrides = {}): Pool {
  return {
    poolId: overrides.poolId ?? 1,
    tokenDecimals: overrides.tokenDecimals ?? 18,
    lastUpdateTimestamp: overrides.lastUpdateTimestamp ?? T0,
    depositData: {
      optimalUtilisationRatio: 7_500n,
      totalAmount: 0n,
      interestRate: 0n,
      interestIndex: 10n ** 18n,
      ...overrides.depositData,
    },
    variableBorrowData: {
      vr0: 17_500n,
      vr1: 50_000n,
      vr2: 1_000_000n,
      totalAmount: 0n,
      interestRate: 17_500_000_000_000_000n,
      interestIndex: 10n ** 18n,
      ...overrides.variableBorrowData,
    },
    stableBorrowData: {
      sr0: 20_000n,
      sr1: 20_000n,
      sr2: 1_000_000n,
      sr3: 250_000n,
      optimalStableToTotalDebtRatio: 2_000n,
      rebalanceUpUtilisationRatio: 9_500n,
      rebalanceUpDepositInterestRate: 4_000n,
      rebalanceDownDelta: 2_000n,
      totalAmount: 0n,
      interestRate: 70_000_000_000_000_000n,
      averageInterestRate: 0n,
      ...overrides.stableBorrowData,
    },
    feeData: {
      flashLoanFee: 1_000n,
      retentionRate: 100_000n,
      fTokenFeeRecipient: 'fee-recipient',
      tokenFeeRecipient: 'token-fee-recipient',
      totalRetainedAmount: 0n,
      ...overrides.feeData,
    },
    capsData: {
      deposit: 100_000_000n,
      borrow: 50_000_000n,
      stableBorrowPercentage: 50_000_000_000_000_000n,
      ...overrides.capsData,
    },
    configData: {
      deprecated: false,
      stableBorrowSupported: true,
      canMintFToken: true,
      flashLoanSupported: true,
      ...overrides.configData,
    },
  };
}

export function createMockPoolParams(overrides: Partial<PoolParams> = {}): PoolParams {
  return {
    poolId: 1,
    tokenDecimals: 18,
    optimalUtilisationRatio: 7_500n,
    variableBorrow: { vr0: 17_500n, vr1: 50_000n, vr2: 1_000_000n },
    stableBorrow: {
      sr0: 20_000n,
      sr1: 20_000n,
      sr2: 1_000_000n,
      sr3: 250_000n,
      optimalStableToTotalDebtRatio: 2_000n,
      rebalanceUpUtilisationRatio: 9_500n,
      rebalanceUpDepositInterestRate: 4_000n,
      rebalanceDownDelta: 2_000n,
    },
    fees: {
      flashLoanFee: 1_000n,
      retentionRate: 100_000n,
      fTokenFeeRecipient: 'fee-recipient',
      tokenFeeRecipient: 'token-fee-recipient',
    },
    caps: { deposit: 100_000_000n, borrow: 50_000_000n, stableBorrowPercentage: 50_000_000_000_000_000n },
    config: { deprecated: false, stableBorrowSupported: true, canMintFToken: true, flashLoanSupported: true },
    ...overrides,
  };
}

/**
 * Pool context that records what an action emitted
 */
export function createRecordingContext(now: bigint = T0): PoolContext & {
  events: LendingEvent[];
  tokenInstructions: TokenInstruction[];
} {
  const events: LendingEvent[] = [];
  const tokenInstructions: TokenInstruction[] = [];
  return {
    now,
    events,
    tokenInstructions,
    emit: (event) => {
      events.push(event);
    },
    queueTokenInstruction: (instruction) => {
      tokenInstructions.push(instruction);
    },
  };
}
