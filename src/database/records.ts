/**
 * Lending Hub - Stored Records
 * JSONB documents are validated and revived into domain types on load
 */

import { z } from 'zod';
import { AmountSchema, PoolIdSchema, numberKeyedMap, stringKeyedMap } from '../shared/codec';
import { LoanType, Pool, RewardEpochState, UserLoan, UserPoolRewards } from '../shared/types';

export const PoolRecordSchema: z.ZodType<Pool, z.ZodTypeDef, unknown> = z.object({
  poolId: PoolIdSchema,
  tokenDecimals: z.number().int().nonnegative(),
  lastUpdateTimestamp: AmountSchema,
  depositData: z.object({
    optimalUtilisationRatio: AmountSchema,
    totalAmount: AmountSchema,
    interestRate: AmountSchema,
    interestIndex: AmountSchema,
  }),
  variableBorrowData: z.object({
    vr0: AmountSchema,
    vr1: AmountSchema,
    vr2: AmountSchema,
    totalAmount: AmountSchema,
    interestRate: AmountSchema,
    interestIndex: AmountSchema,
  }),
  stableBorrowData: z.object({
    sr0: AmountSchema,
    sr1: AmountSchema,
    sr2: AmountSchema,
    sr3: AmountSchema,
    optimalStableToTotalDebtRatio: AmountSchema,
    rebalanceUpUtilisationRatio: AmountSchema,
    rebalanceUpDepositInterestRate: AmountSchema,
    rebalanceDownDelta: AmountSchema,
    totalAmount: AmountSchema,
    interestRate: AmountSchema,
    averageInterestRate: AmountSchema,
  }),
  feeData: z.object({
    flashLoanFee: AmountSchema,
    retentionRate: AmountSchema,
    fTokenFeeRecipient: z.string(),
    tokenFeeRecipient: z.string(),
    totalRetainedAmount: AmountSchema,
  }),
  capsData: z.object({
    deposit: AmountSchema,
    borrow: AmountSchema,
    stableBorrowPercentage: AmountSchema,
  }),
  configData: z.object({
    deprecated: z.boolean(),
    stableBorrowSupported: z.boolean(),
    canMintFToken: z.boolean(),
    flashLoanSupported: z.boolean(),
  }),
});

const LoanPoolRecordSchema = z.object({
  collateralUsed: AmountSchema,
  borrowUsed: AmountSchema,
  collateralCap: AmountSchema,
  borrowCap: AmountSchema,
  collateralFactor: AmountSchema,
  borrowFactor: AmountSchema,
  liquidationBonus: AmountSchema,
  liquidationFee: AmountSchema,
  isDeprecated: z.boolean(),
  reward: z.object({
    lastUpdateTimestamp: AmountSchema,
    minimumAmount: AmountSchema,
    collateralSpeed: AmountSchema,
    borrowSpeed: AmountSchema,
    collateralRewardIndex: AmountSchema,
    borrowRewardIndex: AmountSchema,
  }),
});

export const LoanTypeRecordSchema: z.ZodType<LoanType, z.ZodTypeDef, unknown> = z.object({
  loanTypeId: z.number().int().nonnegative(),
  loanTargetHealth: AmountSchema,
  isDeprecated: z.boolean(),
  pools: numberKeyedMap(LoanPoolRecordSchema),
});

export const UserLoanRecordSchema: z.ZodType<UserLoan, z.ZodTypeDef, unknown> = z.object({
  loanId: z.string().min(1),
  accountId: z.string().min(1),
  loanTypeId: z.number().int().nonnegative(),
  name: z.string(),
  collaterals: numberKeyedMap(z.object({ balance: AmountSchema, rewardIndex: AmountSchema })),
  borrows: numberKeyedMap(
    z.object({
      amount: AmountSchema,
      balance: AmountSchema,
      lastInterestIndex: AmountSchema,
      stableInterestRate: AmountSchema,
      lastStableUpdateTimestamp: AmountSchema,
      rewardIndex: AmountSchema,
    })
  ),
});

export const AccountRewardsRecordSchema: z.ZodType<Map<number, UserPoolRewards>, z.ZodTypeDef, unknown> = numberKeyedMap(
  z.object({ collateral: AmountSchema, borrow: AmountSchema, interestPaid: AmountSchema })
);

export const RewardEpochsRecordSchema: z.ZodType<RewardEpochState, z.ZodTypeDef, unknown> = z.object({
  poolEpochs: numberKeyedMap(z.array(z.object({ start: AmountSchema, end: AmountSchema, totalRewards: AmountSchema }))),
  poolTotalEpochPoints: stringKeyedMap(AmountSchema),
  accountLastUpdatedPoints: stringKeyedMap(numberKeyedMap(AmountSchema)),
  accountEpochPoints: stringKeyedMap(stringKeyedMap(AmountSchema)),
});
