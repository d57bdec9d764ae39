/**
 * Lending Hub - Loan Manager Service
 * THE ENTRY POINT: every pool, loan type, loan and reward action
 *
 * FLOW (per action):
 * 1. Queue: one action at a time
 * 2. Load the touched records into a private snapshot
 * 3. Fetch prices and wallet balances the action needs
 * 4. Apply the action; any failure discards the snapshot
 * 5. Commit, then mint/burn receipt tokens, then publish events
 */

import {
  AccountId,
  CapsData,
  ConfigData,
  FeeData,
  LoanHealth,
  LoanId,
  LoanPoolParams,
  LoanType,
  LoanTypeId,
  Pool,
  PoolEpoch,
  PoolId,
  PoolParams,
  PriceFeed,
  TokenInstruction,
  UserLoan,
  UserPoolRewards,
  WithdrawPoolResult,
} from '../../shared/types';
import { isLendingError } from '../../shared/errors';
import { LiquidationAmounts, RepayResult, RepayWithCollateralResult, generateLoanId } from '../loans';
import { PoolError } from '../pools';
import { ActionScope } from './action-scope';
import { ActionQueue } from './action-queue';
import { EventBus } from './event-bus';
import { Clock, HubSnapshot, LendingRepository, PriceOracle, ReceiptTokenLedger, fTokenBalanceKey } from './types';

interface ActionRequest {
  loanIds?: LoanId[];
  accountIds?: AccountId[];
  /** pools priced on top of those the loaded loans hold */
  poolIds?: PoolId[];
  /** wallet f-token balance to read before the action */
  fTokenBalance?: { poolId: PoolId; account: string };
}

export class LoanManagerService {
  private readonly queue = new ActionQueue();

  constructor(
    private readonly repository: LendingRepository,
    private readonly oracle: PriceOracle,
    private readonly tokens: ReceiptTokenLedger,
    private readonly clock: Clock,
    readonly events: EventBus = new EventBus()
  ) {}

  // ============================================
  // POOLS
  // ============================================

  async createPool(params: PoolParams): Promise<Pool> {
    return this.execute('createPool', {}, (action) => action.createPool(params).data);
  }

  async updatePoolConfigData(poolId: PoolId, config: ConfigData): Promise<void> {
    return this.execute('updatePoolConfigData', {}, (action) => action.pool(poolId).updateConfigData(config));
  }

  async updatePoolCapsData(poolId: PoolId, caps: CapsData): Promise<void> {
    return this.execute('updatePoolCapsData', {}, (action) => action.pool(poolId).updateCapsData(caps));
  }

  async updatePoolFeeData(poolId: PoolId, fees: Omit<FeeData, 'totalRetainedAmount'>): Promise<void> {
    return this.execute('updatePoolFeeData', {}, (action) => action.pool(poolId).updateFeeData(fees));
  }

  async updatePoolDepositData(poolId: PoolId, optimalUtilisationRatio: bigint): Promise<void> {
    return this.execute('updatePoolDepositData', {}, (action) =>
      action.pool(poolId).updateDepositData(optimalUtilisationRatio)
    );
  }

  async updatePoolVariableBorrowData(poolId: PoolId, curve: PoolParams['variableBorrow']): Promise<void> {
    return this.execute('updatePoolVariableBorrowData', {}, (action) => action.pool(poolId).updateVariableBorrowData(curve));
  }

  async updatePoolStableBorrowData(poolId: PoolId, params: PoolParams['stableBorrow']): Promise<void> {
    return this.execute('updatePoolStableBorrowData', {}, (action) => action.pool(poolId).updateStableBorrowData(params));
  }

  /**
   * @returns retained amount handed to the pool's token fee recipient
   */
  async clearTokenFees(poolId: PoolId): Promise<bigint> {
    return this.execute('clearTokenFees', {}, (action) => action.pool(poolId).clearFees());
  }

  /**
   * @returns fee charged on the flash loan
   */
  async flashLoan(poolId: PoolId, amount: bigint): Promise<bigint> {
    return this.execute('flashLoan', {}, (action) => action.pool(poolId).flashLoan(amount));
  }

  // ============================================
  // LOAN TYPES
  // ============================================

  async createLoanType(loanTypeId: LoanTypeId, loanTargetHealth: bigint): Promise<void> {
    return this.execute('createLoanType', {}, (action) => {
      action.loanTypes.createLoanType(loanTypeId, loanTargetHealth);
    });
  }

  async deprecateLoanType(loanTypeId: LoanTypeId): Promise<void> {
    return this.execute('deprecateLoanType', {}, (action) => action.loanTypes.deprecateLoanType(loanTypeId));
  }

  async addPoolToLoanType(loanTypeId: LoanTypeId, poolId: PoolId, params: LoanPoolParams): Promise<void> {
    return this.execute('addPoolToLoanType', {}, (action) => {
      action.loanTypes.addPoolToLoanType(loanTypeId, poolId, params);
    });
  }

  async deprecatePoolInLoanType(loanTypeId: LoanTypeId, poolId: PoolId): Promise<void> {
    return this.execute('deprecatePoolInLoanType', {}, (action) =>
      action.loanTypes.deprecatePoolInLoanType(loanTypeId, poolId)
    );
  }

  async updateLoanPoolCaps(loanTypeId: LoanTypeId, poolId: PoolId, collateralCap: bigint, borrowCap: bigint): Promise<void> {
    return this.execute('updateLoanPoolCaps', {}, (action) =>
      action.loanTypes.updateLoanPoolCaps(loanTypeId, poolId, collateralCap, borrowCap)
    );
  }

  async updateLoanPoolCollateralFactor(loanTypeId: LoanTypeId, poolId: PoolId, collateralFactor: bigint): Promise<void> {
    return this.execute('updateLoanPoolCollateralFactor', {}, (action) =>
      action.loanTypes.updateLoanPoolCollateralFactor(loanTypeId, poolId, collateralFactor)
    );
  }

  async updateLoanPoolBorrowFactor(loanTypeId: LoanTypeId, poolId: PoolId, borrowFactor: bigint): Promise<void> {
    return this.execute('updateLoanPoolBorrowFactor', {}, (action) =>
      action.loanTypes.updateLoanPoolBorrowFactor(loanTypeId, poolId, borrowFactor)
    );
  }

  async updateLoanPoolLiquidation(
    loanTypeId: LoanTypeId,
    poolId: PoolId,
    liquidationBonus: bigint,
    liquidationFee: bigint
  ): Promise<void> {
    return this.execute('updateLoanPoolLiquidation', {}, (action) =>
      action.loanTypes.updateLoanPoolLiquidation(loanTypeId, poolId, liquidationBonus, liquidationFee)
    );
  }

  async updateLoanPoolRewardParams(
    loanTypeId: LoanTypeId,
    poolId: PoolId,
    collateralSpeed: bigint,
    borrowSpeed: bigint,
    minimumAmount: bigint
  ): Promise<void> {
    return this.execute('updateLoanPoolRewardParams', {}, (action) =>
      action.loanTypes.updateLoanPoolRewardParams(loanTypeId, poolId, collateralSpeed, borrowSpeed, minimumAmount)
    );
  }

  // ============================================
  // USER LOANS
  // ============================================

  /**
   * @returns id of the new loan
   */
  async createUserLoan(nonce: string, accountId: AccountId, loanTypeId: LoanTypeId, name: string): Promise<LoanId> {
    const loanId = generateLoanId(accountId, nonce);
    return this.execute(
      'createUserLoan',
      { loanIds: [loanId] },
      (action) => action.loans.createUserLoan(nonce, accountId, loanTypeId, name).loanId
    );
  }

  async deleteUserLoan(loanId: LoanId, accountId: AccountId): Promise<void> {
    return this.execute('deleteUserLoan', { loanIds: [loanId] }, (action) => action.loans.deleteUserLoan(loanId, accountId));
  }

  async deposit(loanId: LoanId, accountId: AccountId, poolId: PoolId, amount: bigint): Promise<bigint> {
    return this.execute(
      'deposit',
      { loanIds: [loanId], accountIds: [accountId], poolIds: [poolId] },
      (action) => action.loans.deposit(loanId, accountId, poolId, amount).fAmount
    );
  }

  async depositFToken(loanId: LoanId, accountId: AccountId, poolId: PoolId, sender: string, fAmount: bigint): Promise<void> {
    return this.execute(
      'depositFToken',
      { loanIds: [loanId], accountIds: [accountId], poolIds: [poolId], fTokenBalance: { poolId, account: sender } },
      (action) => action.loans.depositFToken(loanId, accountId, poolId, sender, fAmount)
    );
  }

  async withdraw(
    loanId: LoanId,
    accountId: AccountId,
    poolId: PoolId,
    amount: bigint,
    isFAmount: boolean
  ): Promise<WithdrawPoolResult> {
    return this.execute('withdraw', { loanIds: [loanId], accountIds: [accountId] }, (action) =>
      action.loans.withdraw(loanId, accountId, poolId, amount, isFAmount)
    );
  }

  async withdrawFToken(loanId: LoanId, accountId: AccountId, poolId: PoolId, recipient: string, fAmount: bigint): Promise<void> {
    return this.execute('withdrawFToken', { loanIds: [loanId], accountIds: [accountId] }, (action) =>
      action.loans.withdrawFToken(loanId, accountId, poolId, recipient, fAmount)
    );
  }

  async borrow(loanId: LoanId, accountId: AccountId, poolId: PoolId, amount: bigint, maxStableRate: bigint): Promise<void> {
    return this.execute('borrow', { loanIds: [loanId], accountIds: [accountId], poolIds: [poolId] }, (action) =>
      action.loans.borrow(loanId, accountId, poolId, amount, maxStableRate)
    );
  }

  async repay(
    loanId: LoanId,
    accountId: AccountId,
    poolId: PoolId,
    amount: bigint,
    maxOverRepayment: bigint
  ): Promise<RepayResult> {
    return this.execute('repay', { loanIds: [loanId], accountIds: [accountId] }, (action) =>
      action.loans.repay(loanId, accountId, poolId, amount, maxOverRepayment)
    );
  }

  async repayWithCollateral(
    loanId: LoanId,
    accountId: AccountId,
    poolId: PoolId,
    amount: bigint
  ): Promise<RepayWithCollateralResult> {
    return this.execute('repayWithCollateral', { loanIds: [loanId], accountIds: [accountId] }, (action) =>
      action.loans.repayWithCollateral(loanId, accountId, poolId, amount)
    );
  }

  async liquidate(
    violatorLoanId: LoanId,
    liquidatorLoanId: LoanId,
    liquidatorAccountId: AccountId,
    colPoolId: PoolId,
    borPoolId: PoolId,
    maxRepayAmount: bigint,
    minSeizedAmount: bigint
  ): Promise<LiquidationAmounts> {
    return this.execute(
      'liquidate',
      { loanIds: [violatorLoanId, liquidatorLoanId], accountIds: [liquidatorAccountId], poolIds: [colPoolId, borPoolId] },
      (action) =>
        action.loans.liquidate(
          violatorLoanId,
          liquidatorLoanId,
          liquidatorAccountId,
          colPoolId,
          borPoolId,
          maxRepayAmount,
          minSeizedAmount
        )
    );
  }

  async switchBorrowType(loanId: LoanId, accountId: AccountId, poolId: PoolId, maxStableRate: bigint): Promise<void> {
    return this.execute('switchBorrowType', { loanIds: [loanId], accountIds: [accountId] }, (action) =>
      action.loans.switchBorrowType(loanId, accountId, poolId, maxStableRate)
    );
  }

  async rebalanceUp(loanId: LoanId, poolId: PoolId): Promise<void> {
    return this.execute('rebalanceUp', { loanIds: [loanId] }, (action) => action.loans.rebalanceUp(loanId, poolId));
  }

  async rebalanceDown(loanId: LoanId, poolId: PoolId): Promise<void> {
    return this.execute('rebalanceDown', { loanIds: [loanId] }, (action) => action.loans.rebalanceDown(loanId, poolId));
  }

  // ============================================
  // REWARDS
  // ============================================

  async updateLoanPoolsRewardIndexes(loanTypeIds: LoanTypeId[], poolIdsPerLoanType: PoolId[][]): Promise<void> {
    return this.execute('updateLoanPoolsRewardIndexes', {}, (action) =>
      action.rewards.updateLoanPoolsRewardIndexes(loanTypeIds, poolIdsPerLoanType)
    );
  }

  async updateUserLoansPoolsRewards(loanIds: LoanId[], accountIds: AccountId[]): Promise<void> {
    return this.execute('updateUserLoansPoolsRewards', { loanIds, accountIds }, (action) =>
      action.rewards.updateUserLoansPoolsRewards(loanIds)
    );
  }

  async addEpoch(poolId: PoolId, start: bigint, end: bigint, totalRewards: bigint): Promise<number> {
    return this.execute('addEpoch', {}, (action) => action.epochs.addEpoch(poolId, start, end, totalRewards));
  }

  async updateEpochTotalRewards(poolId: PoolId, epochIndex: number, totalRewards: bigint): Promise<void> {
    return this.execute('updateEpochTotalRewards', {}, (action) =>
      action.epochs.updateEpochTotalRewards(poolId, epochIndex, totalRewards)
    );
  }

  async updateAccountPoints(accountIds: AccountId[], poolEpochs: PoolEpoch[]): Promise<void> {
    return this.execute('updateAccountPoints', { accountIds }, (action) =>
      action.epochs.updateAccountPoints(accountIds, poolEpochs)
    );
  }

  async claimRewards(accountId: AccountId, poolEpochs: PoolEpoch[]): Promise<bigint> {
    return this.execute('claimRewards', { accountIds: [accountId] }, (action) =>
      action.epochs.claimRewards(accountId, poolEpochs)
    );
  }

  // ============================================
  // VIEWS
  // ============================================

  async getPool(poolId: PoolId): Promise<Pool> {
    return this.view({}, (action) => {
      const pool = action.snapshot.pools.get(poolId);
      if (!pool) throw new PoolError('PoolUnknown', `Unknown pool ${poolId}`, { poolId });
      return pool;
    });
  }

  async getLoanType(loanTypeId: LoanTypeId): Promise<LoanType> {
    return this.view({}, (action) => action.loanTypes.get(loanTypeId));
  }

  async getUserLoan(loanId: LoanId): Promise<UserLoan> {
    return this.view({ loanIds: [loanId] }, (action) => action.loans.getLoan(loanId));
  }

  async getLoanHealth(loanId: LoanId): Promise<LoanHealth> {
    return this.view({ loanIds: [loanId] }, (action) => action.loans.getLoanHealth(loanId));
  }

  async getUserPoolRewards(accountId: AccountId, poolId: PoolId): Promise<UserPoolRewards> {
    return this.view({ accountIds: [accountId] }, (action) => ({ ...action.userPoolRewards(accountId, poolId) }));
  }

  async getUnclaimedRewards(accountId: AccountId, poolEpochs: PoolEpoch[]): Promise<bigint> {
    return this.view({ accountIds: [accountId] }, (action) => action.epochs.getUnclaimedRewards(accountId, poolEpochs));
  }

  async maxFlashLoan(poolId: PoolId): Promise<bigint> {
    return this.view({}, (action) => action.pool(poolId).maxFlashLoan());
  }

  async flashFee(poolId: PoolId, amount: bigint): Promise<bigint> {
    return this.view({}, (action) => action.pool(poolId).flashFee(amount));
  }

  // ============================================
  // UNIT OF WORK
  // ============================================

  private async execute<T>(label: string, request: ActionRequest, apply: (action: ActionScope) => T): Promise<T> {
    return this.queue.run(async () => {
      const action = await this.open(request);
      const loadedLoanIds = [...action.snapshot.loans.keys()];

      let value: T;
      try {
        value = apply(action);
      } catch (error) {
        const reason = isLendingError(error) ? error.code : String(error);
        console.warn(`[LoanManager] ${label} rejected: ${reason}`);
        throw error;
      }

      const deletedLoanIds = loadedLoanIds.filter((loanId) => !action.snapshot.loans.has(loanId));
      await this.repository.commit(action.snapshot, deletedLoanIds);
      console.log(`[LoanManager] ${label} committed (${action.events.length} events)`);

      await this.applyTokenInstructions(action.tokenInstructions);
      await this.events.publish(action.events);
      return value;
    });
  }

  private async view<T>(request: ActionRequest, read: (action: ActionScope) => T): Promise<T> {
    return this.queue.run(async () => read(await this.open(request)));
  }

  /**
   * Load the snapshot, then reload it when the loaded loans belong to accounts
   * whose reward points were not requested
   */
  private async open(request: ActionRequest): Promise<ActionScope> {
    const loanIds = request.loanIds ?? [];
    const accountIds = request.accountIds ?? [];
    const snapshot = await this.repository.load({ loanIds, accountIds });

    const owners = loanOwners(snapshot).filter((accountId) => !accountIds.includes(accountId));
    if (owners.length === 0) return this.scopeFor(snapshot, request);

    const withOwners = await this.repository.load({ loanIds, accountIds: [...accountIds, ...owners] });
    return this.scopeFor(withOwners, request);
  }

  private async scopeFor(snapshot: HubSnapshot, request: ActionRequest): Promise<ActionScope> {
    const fTokenBalances = new Map<string, bigint>();
    if (request.fTokenBalance) {
      const { poolId, account } = request.fTokenBalance;
      fTokenBalances.set(fTokenBalanceKey(poolId, account), await this.tokens.balanceOf(poolId, account));
    }

    return new ActionScope(snapshot, {
      now: this.clock.now(),
      priceFeeds: await this.fetchPriceFeeds(snapshot, request.poolIds ?? []),
      fTokenBalances,
    });
  }

  /**
   * Prices for the requested pools and every pool a loaded loan holds
   */
  private async fetchPriceFeeds(snapshot: HubSnapshot, poolIds: PoolId[]): Promise<Map<PoolId, PriceFeed>> {
    const needed = new Set<PoolId>(poolIds);
    for (const loan of snapshot.loans.values()) {
      for (const poolId of loan.collaterals.keys()) needed.add(poolId);
      for (const poolId of loan.borrows.keys()) needed.add(poolId);
    }

    const feeds = new Map<PoolId, PriceFeed>();
    for (const poolId of needed) {
      if (!snapshot.pools.has(poolId)) continue;
      feeds.set(poolId, await this.oracle.getPriceFeed(poolId));
    }
    return feeds;
  }

  private async applyTokenInstructions(instructions: TokenInstruction[]): Promise<void> {
    for (const { kind, poolId, account, fAmount } of instructions) {
      if (fAmount === 0n) continue;
      try {
        if (kind === 'mint') {
          await this.tokens.mint(poolId, account, fAmount);
        } else {
          await this.tokens.burn(poolId, account, fAmount);
        }
      } catch (error) {
        console.error(`[LoanManager] Receipt token ${kind} of ${fAmount} for ${account} in pool ${poolId} failed:`, error);
        throw error;
      }
    }
  }
}

function loanOwners(snapshot: HubSnapshot): AccountId[] {
  return [...new Set([...snapshot.loans.values()].map((loan) => loan.accountId))];
}
