/**
 * Lending Hub - Action Processor
 *
 * Validates an incoming action message and runs it on the loan manager.
 * Rejections come back as a failed Result; infrastructure failures throw.
 */

import { z } from 'zod';
import { LoanManagerService } from '../modules/loan-manager';
import { JsonValue, toJson } from '../shared/codec';
import { Result, isLendingError } from '../shared/errors';
import { AdminAction, AdminActionSchema, HubAction, HubActionSchema } from './schema';

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

export class ActionProcessor {
  constructor(private readonly service: LoanManagerService) {}

  async processHubAction(raw: unknown): Promise<Result<JsonValue>> {
    const parsed = HubActionSchema.safeParse(raw);
    if (!parsed.success) {
      return { success: false, error: `Invalid action: ${describeIssues(parsed.error)}`, code: 'InvalidAction' };
    }
    const action = parsed.data;
    return this.run(action.action, () => this.runHubAction(action));
  }

  async processAdminAction(raw: unknown): Promise<Result<JsonValue>> {
    const parsed = AdminActionSchema.safeParse(raw);
    if (!parsed.success) {
      return { success: false, error: `Invalid action: ${describeIssues(parsed.error)}`, code: 'InvalidAction' };
    }
    const action = parsed.data;
    return this.run(action.action, () => this.runAdminAction(action));
  }

  private async run(name: string, fn: () => Promise<unknown>): Promise<Result<JsonValue>> {
    try {
      const value = await fn();
      return { success: true, value: toJson(value) };
    } catch (error) {
      if (isLendingError(error)) {
        return { success: false, error: error.message, code: error.code, category: error.category };
      }
      console.error(`[Processor] ${name} failed:`, error);
      throw error;
    }
  }

  // ============================================================================
  // DISPATCH
  // ============================================================================

  private async runHubAction(action: HubAction): Promise<unknown> {
    const service = this.service;
    switch (action.action) {
      case 'createUserLoan':
        return { loanId: await service.createUserLoan(action.nonce, action.accountId, action.loanTypeId, action.name) };
      case 'deleteUserLoan':
        return service.deleteUserLoan(action.loanId, action.accountId);
      case 'deposit':
        return { fAmount: await service.deposit(action.loanId, action.accountId, action.poolId, action.amount) };
      case 'depositFToken':
        return service.depositFToken(action.loanId, action.accountId, action.poolId, action.sender, action.fAmount);
      case 'withdraw':
        return service.withdraw(action.loanId, action.accountId, action.poolId, action.amount, action.isFAmount);
      case 'withdrawFToken':
        return service.withdrawFToken(action.loanId, action.accountId, action.poolId, action.recipient, action.fAmount);
      case 'borrow':
        return service.borrow(action.loanId, action.accountId, action.poolId, action.amount, action.maxStableRate);
      case 'repay':
        return service.repay(action.loanId, action.accountId, action.poolId, action.amount, action.maxOverRepayment);
      case 'repayWithCollateral':
        return service.repayWithCollateral(action.loanId, action.accountId, action.poolId, action.amount);
      case 'liquidate':
        return service.liquidate(
          action.violatorLoanId,
          action.liquidatorLoanId,
          action.liquidatorAccountId,
          action.colPoolId,
          action.borPoolId,
          action.maxRepayAmount,
          action.minSeizedAmount
        );
      case 'switchBorrowType':
        return service.switchBorrowType(action.loanId, action.accountId, action.poolId, action.maxStableRate);
      case 'rebalanceUp':
        return service.rebalanceUp(action.loanId, action.poolId);
      case 'rebalanceDown':
        return service.rebalanceDown(action.loanId, action.poolId);
      case 'updateUserLoansPoolsRewards':
        return service.updateUserLoansPoolsRewards(action.loanIds, action.accountIds);
      case 'updateAccountPoints':
        return service.updateAccountPoints(action.accountIds, action.poolEpochs);
      case 'claimRewards':
        return { amount: await service.claimRewards(action.accountId, action.poolEpochs) };
      case 'flashLoan':
        return { fee: await service.flashLoan(action.poolId, action.amount) };
      default: {
        const unhandled: never = action;
        throw new Error(`[Processor] Unhandled hub action ${JSON.stringify(toJson(unhandled))}`);
      }
    }
  }

  private async runAdminAction(action: AdminAction): Promise<unknown> {
    const service = this.service;
    switch (action.action) {
      case 'createPool':
        return service.createPool(action.params);
      case 'updatePoolConfigData':
        return service.updatePoolConfigData(action.poolId, action.config);
      case 'updatePoolCapsData':
        return service.updatePoolCapsData(action.poolId, action.caps);
      case 'updatePoolFeeData':
        return service.updatePoolFeeData(action.poolId, action.fees);
      case 'updatePoolDepositData':
        return service.updatePoolDepositData(action.poolId, action.optimalUtilisationRatio);
      case 'updatePoolVariableBorrowData':
        return service.updatePoolVariableBorrowData(action.poolId, action.curve);
      case 'updatePoolStableBorrowData':
        return service.updatePoolStableBorrowData(action.poolId, action.params);
      case 'clearTokenFees':
        return { amount: await service.clearTokenFees(action.poolId) };
      case 'createLoanType':
        return service.createLoanType(action.loanTypeId, action.loanTargetHealth);
      case 'deprecateLoanType':
        return service.deprecateLoanType(action.loanTypeId);
      case 'addPoolToLoanType':
        return service.addPoolToLoanType(action.loanTypeId, action.poolId, action.params);
      case 'deprecatePoolInLoanType':
        return service.deprecatePoolInLoanType(action.loanTypeId, action.poolId);
      case 'updateLoanPoolCaps':
        return service.updateLoanPoolCaps(action.loanTypeId, action.poolId, action.collateralCap, action.borrowCap);
      case 'updateLoanPoolCollateralFactor':
        return service.updateLoanPoolCollateralFactor(action.loanTypeId, action.poolId, action.collateralFactor);
      case 'updateLoanPoolBorrowFactor':
        return service.updateLoanPoolBorrowFactor(action.loanTypeId, action.poolId, action.borrowFactor);
      case 'updateLoanPoolLiquidation':
        return service.updateLoanPoolLiquidation(action.loanTypeId, action.poolId, action.liquidationBonus, action.liquidationFee);
      case 'updateLoanPoolRewardParams':
        return service.updateLoanPoolRewardParams(
          action.loanTypeId,
          action.poolId,
          action.collateralSpeed,
          action.borrowSpeed,
          action.minimumAmount
        );
      case 'updateLoanPoolsRewardIndexes':
        return service.updateLoanPoolsRewardIndexes(action.loanTypeIds, action.poolIdsPerLoanType);
      case 'addEpoch':
        return { epochIndex: await service.addEpoch(action.poolId, action.start, action.end, action.totalRewards) };
      case 'updateEpochTotalRewards':
        return service.updateEpochTotalRewards(action.poolId, action.epochIndex, action.totalRewards);
      default: {
        const unhandled: never = action;
        throw new Error(`[Processor] Unhandled admin action ${JSON.stringify(toJson(unhandled))}`);
      }
    }
  }
}
