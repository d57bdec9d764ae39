/**
 * Lending Hub - Action Messages
 *
 * Hub actions arrive from spoke chains on behalf of accounts; admin actions
 * come from operators. Amounts are decimal strings.
 */

import { z } from 'zod';
import { AmountSchema, PoolIdSchema } from '../shared/codec';

const LoanIdSchema = z.string().min(1);
const AccountIdSchema = z.string().min(1);
const LoanTypeIdSchema = z.number().int().nonnegative();
const PoolEpochSchema = z.object({ poolId: PoolIdSchema, epochIndex: z.number().int().positive() });

// ============================================================================
// HUB ACTIONS
// ============================================================================

const loanAction = { loanId: LoanIdSchema, accountId: AccountIdSchema };
const poolAction = { ...loanAction, poolId: PoolIdSchema };

export const HubActionSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal('createUserLoan'),
    nonce: z.string().min(1),
    accountId: AccountIdSchema,
    loanTypeId: LoanTypeIdSchema,
    name: z.string().max(64),
  }),
  z.object({ action: z.literal('deleteUserLoan'), ...loanAction }),
  z.object({ action: z.literal('deposit'), ...poolAction, amount: AmountSchema }),
  z.object({ action: z.literal('depositFToken'), ...poolAction, sender: z.string().min(1), fAmount: AmountSchema }),
  z.object({ action: z.literal('withdraw'), ...poolAction, amount: AmountSchema, isFAmount: z.boolean() }),
  z.object({ action: z.literal('withdrawFToken'), ...poolAction, recipient: z.string().min(1), fAmount: AmountSchema }),
  z.object({ action: z.literal('borrow'), ...poolAction, amount: AmountSchema, maxStableRate: AmountSchema }),
  z.object({ action: z.literal('repay'), ...poolAction, amount: AmountSchema, maxOverRepayment: AmountSchema }),
  z.object({ action: z.literal('repayWithCollateral'), ...poolAction, amount: AmountSchema }),
  z.object({
    action: z.literal('liquidate'),
    violatorLoanId: LoanIdSchema,
    liquidatorLoanId: LoanIdSchema,
    liquidatorAccountId: AccountIdSchema,
    colPoolId: PoolIdSchema,
    borPoolId: PoolIdSchema,
    maxRepayAmount: AmountSchema,
    minSeizedAmount: AmountSchema,
  }),
  z.object({ action: z.literal('switchBorrowType'), ...poolAction, maxStableRate: AmountSchema }),
  z.object({ action: z.literal('rebalanceUp'), loanId: LoanIdSchema, poolId: PoolIdSchema }),
  z.object({ action: z.literal('rebalanceDown'), loanId: LoanIdSchema, poolId: PoolIdSchema }),
  z.object({
    action: z.literal('updateUserLoansPoolsRewards'),
    loanIds: z.array(LoanIdSchema),
    accountIds: z.array(AccountIdSchema),
  }),
  z.object({
    action: z.literal('updateAccountPoints'),
    accountIds: z.array(AccountIdSchema),
    poolEpochs: z.array(PoolEpochSchema),
  }),
  z.object({ action: z.literal('claimRewards'), accountId: AccountIdSchema, poolEpochs: z.array(PoolEpochSchema) }),
  z.object({ action: z.literal('flashLoan'), poolId: PoolIdSchema, amount: AmountSchema }),
]);

export type HubAction = z.infer<typeof HubActionSchema>;

// ============================================================================
// ADMIN ACTIONS
// ============================================================================

const VariableCurveSchema = z.object({ vr0: AmountSchema, vr1: AmountSchema, vr2: AmountSchema });

const StableParamsSchema = z.object({
  sr0: AmountSchema,
  sr1: AmountSchema,
  sr2: AmountSchema,
  sr3: AmountSchema,
  optimalStableToTotalDebtRatio: AmountSchema,
  rebalanceUpUtilisationRatio: AmountSchema,
  rebalanceUpDepositInterestRate: AmountSchema,
  rebalanceDownDelta: AmountSchema,
});

const FeesSchema = z.object({
  flashLoanFee: AmountSchema,
  retentionRate: AmountSchema,
  fTokenFeeRecipient: z.string().min(1),
  tokenFeeRecipient: z.string().min(1),
});

const CapsSchema = z.object({ deposit: AmountSchema, borrow: AmountSchema, stableBorrowPercentage: AmountSchema });

const ConfigSchema = z.object({
  deprecated: z.boolean(),
  stableBorrowSupported: z.boolean(),
  canMintFToken: z.boolean(),
  flashLoanSupported: z.boolean(),
});

const loanPoolAction = { loanTypeId: LoanTypeIdSchema, poolId: PoolIdSchema };

export const AdminActionSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal('createPool'),
    params: z.object({
      poolId: PoolIdSchema,
      tokenDecimals: z.number().int().min(0).max(36),
      optimalUtilisationRatio: AmountSchema,
      variableBorrow: VariableCurveSchema,
      stableBorrow: StableParamsSchema,
      fees: FeesSchema,
      caps: CapsSchema,
      config: ConfigSchema,
    }),
  }),
  z.object({ action: z.literal('updatePoolConfigData'), poolId: PoolIdSchema, config: ConfigSchema }),
  z.object({ action: z.literal('updatePoolCapsData'), poolId: PoolIdSchema, caps: CapsSchema }),
  z.object({ action: z.literal('updatePoolFeeData'), poolId: PoolIdSchema, fees: FeesSchema }),
  z.object({ action: z.literal('updatePoolDepositData'), poolId: PoolIdSchema, optimalUtilisationRatio: AmountSchema }),
  z.object({ action: z.literal('updatePoolVariableBorrowData'), poolId: PoolIdSchema, curve: VariableCurveSchema }),
  z.object({ action: z.literal('updatePoolStableBorrowData'), poolId: PoolIdSchema, params: StableParamsSchema }),
  z.object({ action: z.literal('clearTokenFees'), poolId: PoolIdSchema }),
  z.object({ action: z.literal('createLoanType'), loanTypeId: LoanTypeIdSchema, loanTargetHealth: AmountSchema }),
  z.object({ action: z.literal('deprecateLoanType'), loanTypeId: LoanTypeIdSchema }),
  z.object({
    action: z.literal('addPoolToLoanType'),
    ...loanPoolAction,
    params: z.object({
      collateralFactor: AmountSchema,
      collateralCap: AmountSchema,
      borrowFactor: AmountSchema,
      borrowCap: AmountSchema,
      liquidationBonus: AmountSchema,
      liquidationFee: AmountSchema,
      rewardCollateralSpeed: AmountSchema,
      rewardBorrowSpeed: AmountSchema,
      rewardMinimumAmount: AmountSchema,
    }),
  }),
  z.object({ action: z.literal('deprecatePoolInLoanType'), ...loanPoolAction }),
  z.object({ action: z.literal('updateLoanPoolCaps'), ...loanPoolAction, collateralCap: AmountSchema, borrowCap: AmountSchema }),
  z.object({ action: z.literal('updateLoanPoolCollateralFactor'), ...loanPoolAction, collateralFactor: AmountSchema }),
  z.object({ action: z.literal('updateLoanPoolBorrowFactor'), ...loanPoolAction, borrowFactor: AmountSchema }),
  z.object({
    action: z.literal('updateLoanPoolLiquidation'),
    ...loanPoolAction,
    liquidationBonus: AmountSchema,
    liquidationFee: AmountSchema,
  }),
  z.object({
    action: z.literal('updateLoanPoolRewardParams'),
    ...loanPoolAction,
    collateralSpeed: AmountSchema,
    borrowSpeed: AmountSchema,
    minimumAmount: AmountSchema,
  }),
  z.object({
    action: z.literal('updateLoanPoolsRewardIndexes'),
    loanTypeIds: z.array(LoanTypeIdSchema),
    poolIdsPerLoanType: z.array(z.array(PoolIdSchema)),
  }),
  z.object({
    action: z.literal('addEpoch'),
    poolId: PoolIdSchema,
    start: AmountSchema,
    end: AmountSchema,
    totalRewards: AmountSchema,
  }),
  z.object({
    action: z.literal('updateEpochTotalRewards'),
    poolId: PoolIdSchema,
    epochIndex: z.number().int().positive(),
    totalRewards: AmountSchema,
  }),
]);

export type AdminAction = z.infer<typeof AdminActionSchema>;
