/**
 * Lending Hub - Pool Account
 * THE RATE ENGINE: one pool's deposit, borrow and fee ledgers
 *
 * RULES:
 * 1. Sole writer of pool totals, indices and rates. Never touches loan data.
 * 2. Indices are refreshed before any amount is read or changed.
 * 3. Rates are recomputed after every amount change.
 * 4. Totals clamp at zero on rounding underflow instead of failing.
 */

import {
  ONE_18_DP,
  assetDollarValue,
  compoundIndex,
  decreasingAverageStableRate,
  depositInterestRate,
  divScale,
  exceedsDollarCap,
  flashLoanFeeAmount,
  from4DPto18DP,
  increasingAverageStableRate,
  overallBorrowInterestRate,
  rebalanceDownThreshold,
  rebalanceUpThreshold,
  stableBorrowInterestRate,
  stableDebtToTotalDebtRatio,
  subFloor,
  toFAmount,
  toUnderlyingAmount,
  utilisationRatio,
  variableBorrowInterestRate,
} from '../../core/math';
import {
  BorrowPoolParams,
  CapsData,
  ConfigData,
  DepositPoolResult,
  EventSink,
  FeeData,
  Pool,
  PoolId,
  PoolParams,
  PriceFeed,
  RebalanceDownPoolParams,
  TokenInstruction,
  WithdrawPoolResult,
} from '../../shared/types';
import {
  validateCapsData,
  validateFeeData,
  validateInterestRateCurves,
  validateOptimalUtilisationRatio,
} from './pool.config';
import { PoolCapacityError, PoolError } from './pool.errors';

/**
 * Everything a pool needs from the action it runs inside
 */
export interface PoolContext {
  now: bigint;                                           // unix seconds
  emit: EventSink;
  queueTokenInstruction: (instruction: TokenInstruction) => void;
}

export class PoolAccount {
  constructor(
    private readonly pool: Pool,
    private readonly context: PoolContext
  ) {}

  get poolId(): PoolId {
    return this.pool.poolId;
  }

  get data(): Readonly<Pool> {
    return this.pool;
  }

  // ============================================
  // INDICES AND RATES
  // ============================================

  updatedDepositIndex(): bigint {
    const { interestRate, interestIndex } = this.pool.depositData;
    return compoundIndex(interestRate, interestIndex, this.elapsed(), false);
  }

  updatedVariableBorrowIndex(): bigint {
    const { interestRate, interestIndex } = this.pool.variableBorrowData;
    return compoundIndex(interestRate, interestIndex, this.elapsed(), true);
  }

  refreshIndices(): void {
    if (this.elapsed() <= 0n) return;

    this.pool.depositData.interestIndex = this.updatedDepositIndex();
    this.pool.variableBorrowData.interestIndex = this.updatedVariableBorrowIndex();
    this.pool.lastUpdateTimestamp = this.context.now;

    this.context.emit({
      type: 'InterestIndexesUpdated',
      poolId: this.pool.poolId,
      variableBorrowInterestIndex: this.pool.variableBorrowData.interestIndex,
      depositInterestIndex: this.pool.depositData.interestIndex,
      timestamp: this.context.now,
    });
  }

  recomputeRates(): void {
    const { depositData, variableBorrowData, stableBorrowData, feeData } = this.pool;
    const totalDebt = variableBorrowData.totalAmount + stableBorrowData.totalAmount;
    const ut = utilisationRatio(totalDebt, depositData.totalAmount);
    const ratiot = stableDebtToTotalDebtRatio(stableBorrowData.totalAmount, totalDebt);

    const variableRate = variableBorrowInterestRate(variableBorrowData, ut, depositData.optimalUtilisationRatio);
    const stableRate = stableBorrowInterestRate(
      variableBorrowData.vr1,
      stableBorrowData,
      ut,
      depositData.optimalUtilisationRatio,
      ratiot,
      stableBorrowData.optimalStableToTotalDebtRatio
    );
    const overallRate = overallBorrowInterestRate(
      variableBorrowData.totalAmount,
      stableBorrowData.totalAmount,
      variableRate,
      stableBorrowData.averageInterestRate
    );

    variableBorrowData.interestRate = variableRate;
    stableBorrowData.interestRate = stableRate;
    depositData.interestRate = depositInterestRate(ut, overallRate, feeData.retentionRate);

    this.context.emit({
      type: 'InterestRatesUpdated',
      poolId: this.pool.poolId,
      variableBorrowInterestRate: variableRate,
      stableBorrowInterestRate: stableRate,
      depositInterestRate: depositData.interestRate,
    });
  }

  totalDebt(): bigint {
    return this.pool.variableBorrowData.totalAmount + this.pool.stableBorrowData.totalAmount;
  }

  availableLiquidity(): bigint {
    return subFloor(this.pool.depositData.totalAmount, this.totalDebt());
  }

  // ============================================
  // DEPOSIT / WITHDRAW
  // ============================================

  /**
   * @param priceFeed - oracle price of this pool's token, for the USD deposit cap
   */
  applyDeposit(amount: bigint, priceFeed: PriceFeed): DepositPoolResult {
    this.assertNotDeprecated();
    this.refreshIndices();

    const newTotal = this.pool.depositData.totalAmount + amount;
    const newValue = assetDollarValue(newTotal, priceFeed);
    if (exceedsDollarCap(newValue, this.pool.capsData.deposit)) {
      throw new PoolCapacityError(
        'DepositCapReached',
        `Deposit cap reached in pool ${this.pool.poolId}`,
        newValue,
        this.pool.capsData.deposit * ONE_18_DP,
        { poolId: this.pool.poolId }
      );
    }

    const depositInterestIndex = this.pool.depositData.interestIndex;
    this.pool.depositData.totalAmount = newTotal;
    this.recomputeRates();

    return { fAmount: toFAmount(amount, depositInterestIndex), depositInterestIndex };
  }

  /**
   * Burning f-tokens for an underlying amount rounds the burn up;
   * redeeming f-tokens rounds the payout down.
   */
  applyWithdraw(amount: bigint, isFAmount: boolean): WithdrawPoolResult {
    this.refreshIndices();

    const index = this.pool.depositData.interestIndex;
    const result: WithdrawPoolResult = isFAmount
      ? { underlyingAmount: toUnderlyingAmount(amount, index), fAmount: amount }
      : { underlyingAmount: amount, fAmount: toFAmount(amount, index, true) };

    const available = this.availableLiquidity();
    if (result.underlyingAmount > available) {
      throw new PoolCapacityError(
        'InsufficientLiquidity',
        `Insufficient liquidity in pool ${this.pool.poolId}`,
        result.underlyingAmount,
        available,
        { poolId: this.pool.poolId }
      );
    }

    this.pool.depositData.totalAmount = subFloor(this.pool.depositData.totalAmount, result.underlyingAmount);
    this.recomputeRates();
    return result;
  }

  prepareWithdrawFToken(): void {
    this.assertNotDeprecated();
    if (!this.pool.configData.canMintFToken) {
      throw new PoolError('CannotMintFToken', `Pool ${this.pool.poolId} cannot mint f-tokens`);
    }
  }

  // ============================================
  // BORROW
  // ============================================

  /**
   * Validate a borrow against liquidity, stable-borrow limits and the USD borrow cap.
   * A positive maxStableRate requests a stable borrow.
   */
  prepareBorrow(amount: bigint, maxStableRate: bigint, priceFeed: PriceFeed): BorrowPoolParams {
    this.assertNotDeprecated();
    this.refreshIndices();

    const available = this.availableLiquidity();
    if (amount > available) {
      throw new PoolCapacityError(
        'InsufficientLiquidity',
        `Insufficient liquidity in pool ${this.pool.poolId}`,
        amount,
        available,
        { poolId: this.pool.poolId }
      );
    }

    if (maxStableRate > 0n) this.assertStableBorrowAllowed(amount, maxStableRate);

    const newDebtValue = assetDollarValue(this.totalDebt() + amount, priceFeed);
    if (exceedsDollarCap(newDebtValue, this.pool.capsData.borrow)) {
      throw new PoolCapacityError(
        'BorrowCapReached',
        `Borrow cap reached in pool ${this.pool.poolId}`,
        newDebtValue,
        this.pool.capsData.borrow * ONE_18_DP,
        { poolId: this.pool.poolId }
      );
    }

    return this.borrowParams();
  }

  /**
   * @param stableRate - rate of the new stable borrow, 0 for variable
   */
  applyBorrow(amount: bigint, stableRate: bigint): void {
    if (stableRate > 0n) {
      const stable = this.pool.stableBorrowData;
      stable.averageInterestRate = increasingAverageStableRate(
        amount,
        stableRate,
        stable.totalAmount,
        stable.averageInterestRate
      );
      stable.totalAmount += amount;
    } else {
      this.pool.variableBorrowData.totalAmount += amount;
    }
    this.recomputeRates();
  }

  // ============================================
  // REPAY
  // ============================================

  prepareRepay(): BorrowPoolParams {
    this.refreshIndices();
    return this.borrowParams();
  }

  /**
   * Interest flows to depositors, excess over the balance is retained by the pool
   * @param loanStableRate - rate of the repaid stable borrow, 0 for variable
   */
  applyRepay(principalPaid: bigint, interestPaid: bigint, loanStableRate: bigint, excessAmount: bigint): void {
    this.removeDebt(principalPaid, loanStableRate);
    this.pool.depositData.totalAmount += interestPaid;
    this.pool.feeData.totalRetainedAmount += excessAmount;
    this.recomputeRates();
  }

  /**
   * Collateral pays principal and interest, so deposits only lose the principal
   * @returns f-token amount to take from the loan's collateral, rounded up
   */
  applyRepayWithCollateral(principalPaid: bigint, interestPaid: bigint, loanStableRate: bigint): bigint {
    this.removeDebt(principalPaid, loanStableRate);
    this.pool.depositData.totalAmount = subFloor(this.pool.depositData.totalAmount, principalPaid);
    this.recomputeRates();
    return toFAmount(principalPaid + interestPaid, this.pool.depositData.interestIndex, true);
  }

  /**
   * Liquidation moves debt between loans without changing pool totals
   */
  applyLiquidation(): void {
    this.recomputeRates();
  }

  // ============================================
  // SWITCH BORROW TYPE
  // ============================================

  /**
   * Only switching to stable (maxStableRate > 0) is checked against stable limits
   */
  prepareSwitchBorrowType(amount: bigint, maxStableRate: bigint): BorrowPoolParams {
    this.assertNotDeprecated();
    this.refreshIndices();
    if (maxStableRate > 0n) this.assertStableBorrowAllowed(amount, maxStableRate);
    return this.borrowParams();
  }

  applySwitchBorrowType(amount: bigint, switchingToStable: boolean, oldLoanStableRate: bigint): void {
    const variable = this.pool.variableBorrowData;
    const stable = this.pool.stableBorrowData;

    if (switchingToStable) {
      variable.totalAmount = subFloor(variable.totalAmount, amount);
      stable.averageInterestRate = increasingAverageStableRate(
        amount,
        stable.interestRate,
        stable.totalAmount,
        stable.averageInterestRate
      );
      stable.totalAmount += amount;
    } else {
      stable.averageInterestRate = decreasingAverageStableRate(
        amount,
        oldLoanStableRate,
        stable.totalAmount,
        stable.averageInterestRate
      );
      stable.totalAmount = subFloor(stable.totalAmount, amount);
      variable.totalAmount += amount;
    }
    this.recomputeRates();
  }

  // ============================================
  // REBALANCE
  // ============================================

  prepareRebalanceUp(): BorrowPoolParams {
    this.refreshIndices();

    const { depositData, variableBorrowData, stableBorrowData } = this.pool;
    const ut = utilisationRatio(this.totalDebt(), depositData.totalAmount);
    const minUtilisation = from4DPto18DP(stableBorrowData.rebalanceUpUtilisationRatio);
    if (ut < minUtilisation) {
      throw new PoolError(
        'RebalanceUpUtilisationRatioNotReached',
        `Utilisation ${ut} below rebalance up ratio ${minUtilisation}`,
        { utilisationRatio: ut, rebalanceUpUtilisationRatio: minUtilisation }
      );
    }

    const threshold = rebalanceUpThreshold(stableBorrowData.rebalanceUpDepositInterestRate, variableBorrowData);
    if (depositData.interestRate > threshold) {
      throw new PoolError(
        'RebalanceUpThresholdNotReached',
        `Deposit rate ${depositData.interestRate} above rebalance up threshold ${threshold}`,
        { depositInterestRate: depositData.interestRate, threshold }
      );
    }

    return this.borrowParams();
  }

  applyRebalanceUp(amount: bigint, oldLoanStableRate: bigint): void {
    this.restakeStableDebt(amount, oldLoanStableRate);
  }

  /**
   * The caller compares the loan's rate with the returned threshold
   */
  prepareRebalanceDown(): RebalanceDownPoolParams {
    this.refreshIndices();
    const { rebalanceDownDelta, interestRate } = this.pool.stableBorrowData;
    return { ...this.borrowParams(), threshold: rebalanceDownThreshold(rebalanceDownDelta, interestRate) };
  }

  applyRebalanceDown(amount: bigint, oldLoanStableRate: bigint): void {
    this.restakeStableDebt(amount, oldLoanStableRate);
  }

  // ============================================
  // FEES AND FLASH LOANS
  // ============================================

  clearFees(): bigint {
    const amount = this.pool.feeData.totalRetainedAmount;
    this.pool.feeData.totalRetainedAmount = 0n;
    this.context.emit({ type: 'ClearTokenFees', poolId: this.pool.poolId, amount });
    return amount;
  }

  maxFlashLoan(): bigint {
    const { deprecated, flashLoanSupported } = this.pool.configData;
    if (deprecated || !flashLoanSupported) return 0n;
    return this.availableLiquidity();
  }

  flashFee(amount: bigint): bigint {
    if (!this.pool.configData.flashLoanSupported) {
      throw new PoolError('FlashLoanNotSupported', `Pool ${this.pool.poolId} does not support flash loans`);
    }
    return flashLoanFeeAmount(amount, this.pool.feeData.flashLoanFee);
  }

  /**
   * Lend up to maxFlashLoan() within one action; only the fee stays behind, in retained fees.
   * @returns fee owed on top of the amount
   */
  flashLoan(amount: bigint): bigint {
    const fee = this.flashFee(amount);
    const max = this.maxFlashLoan();
    if (amount > max) {
      throw new PoolCapacityError(
        'InsufficientLiquidity',
        `Flash loan exceeds free liquidity in pool ${this.pool.poolId}`,
        amount,
        max,
        { poolId: this.pool.poolId }
      );
    }

    this.pool.feeData.totalRetainedAmount += fee;
    this.context.emit({ type: 'FlashLoan', poolId: this.pool.poolId, amount, fee });
    return fee;
  }

  // ============================================
  // RECEIPT TOKENS
  // ============================================

  mintFToken(recipient: string, fAmount: bigint): void {
    this.context.queueTokenInstruction({ kind: 'mint', poolId: this.pool.poolId, account: recipient, fAmount });
  }

  burnFToken(sender: string, fAmount: bigint): void {
    this.context.queueTokenInstruction({ kind: 'burn', poolId: this.pool.poolId, account: sender, fAmount });
  }

  mintFTokenForFeeRecipient(fAmount: bigint): void {
    this.mintFToken(this.pool.feeData.fTokenFeeRecipient, fAmount);
  }

  // ============================================
  // PARAMETER UPDATES
  // ============================================

  updateConfigData(config: ConfigData): void {
    this.refreshIndices();
    this.pool.configData = { ...config };
    this.paramsUpdated('config');
  }

  updateCapsData(caps: CapsData): void {
    validateCapsData(caps);
    this.refreshIndices();
    this.pool.capsData = { ...caps };
    this.paramsUpdated('caps');
  }

  updateFeeData(fees: Omit<FeeData, 'totalRetainedAmount'>): void {
    validateFeeData(fees);
    this.refreshIndices();
    this.pool.feeData = { ...fees, totalRetainedAmount: this.pool.feeData.totalRetainedAmount };
    this.paramsUpdated('fees');
  }

  updateDepositData(optimalUtilisationRatio: bigint): void {
    validateOptimalUtilisationRatio(optimalUtilisationRatio);
    this.refreshIndices();
    this.pool.depositData.optimalUtilisationRatio = optimalUtilisationRatio;
    this.paramsUpdated('deposit');
  }

  updateVariableBorrowData(curve: PoolParams['variableBorrow']): void {
    validateInterestRateCurves(curve, this.pool.stableBorrowData);
    this.refreshIndices();
    Object.assign(this.pool.variableBorrowData, curve);
    this.paramsUpdated('variableBorrow');
  }

  updateStableBorrowData(params: PoolParams['stableBorrow']): void {
    validateInterestRateCurves(this.pool.variableBorrowData, params);
    this.refreshIndices();
    Object.assign(this.pool.stableBorrowData, params);
    this.paramsUpdated('stableBorrow');
  }

  // ============================================
  // INTERNALS
  // ============================================

  private elapsed(): bigint {
    return this.context.now - this.pool.lastUpdateTimestamp;
  }

  private borrowParams(): BorrowPoolParams {
    return {
      variableInterestIndex: this.pool.variableBorrowData.interestIndex,
      stableInterestRate: this.pool.stableBorrowData.interestRate,
    };
  }

  private assertNotDeprecated(): void {
    if (this.pool.configData.deprecated) {
      throw new PoolError('DeprecatedPool', `Pool ${this.pool.poolId} is deprecated`, { poolId: this.pool.poolId });
    }
  }

  /**
   * Stable debt after the borrow, as a share of total deposits, may not exceed stableBorrowPercentage
   */
  private assertStableBorrowAllowed(amount: bigint, maxStableRate: bigint): void {
    const { configData, capsData, depositData, stableBorrowData } = this.pool;
    if (!configData.stableBorrowSupported) {
      throw new PoolError('StableBorrowNotSupported', `Pool ${this.pool.poolId} does not support stable borrows`);
    }

    const stableShare = divScale(stableBorrowData.totalAmount + amount, depositData.totalAmount, ONE_18_DP);
    if (stableShare > capsData.stableBorrowPercentage) {
      throw new PoolCapacityError(
        'StableBorrowPercentageCapExceeded',
        `Stable debt would exceed ${capsData.stableBorrowPercentage} of deposits`,
        stableShare,
        capsData.stableBorrowPercentage,
        { poolId: this.pool.poolId }
      );
    }

    if (stableBorrowData.interestRate > maxStableRate) {
      throw new PoolCapacityError(
        'MaxStableRateExceeded',
        'Stable rate above the requested maximum',
        stableBorrowData.interestRate,
        maxStableRate,
        { poolId: this.pool.poolId }
      );
    }
  }

  private removeDebt(principal: bigint, loanStableRate: bigint): void {
    if (loanStableRate > 0n) {
      const stable = this.pool.stableBorrowData;
      stable.averageInterestRate = decreasingAverageStableRate(
        principal,
        loanStableRate,
        stable.totalAmount,
        stable.averageInterestRate
      );
      stable.totalAmount = subFloor(stable.totalAmount, principal);
    } else {
      const variable = this.pool.variableBorrowData;
      variable.totalAmount = subFloor(variable.totalAmount, principal);
    }
  }

  /**
   * Re-price `amount` of stable debt from its old rate to the current offer rate
   */
  private restakeStableDebt(amount: bigint, oldLoanStableRate: bigint): void {
    const stable = this.pool.stableBorrowData;
    const remaining = subFloor(stable.totalAmount, amount);
    const averageWithout = decreasingAverageStableRate(
      amount,
      oldLoanStableRate,
      stable.totalAmount,
      stable.averageInterestRate
    );
    stable.averageInterestRate = increasingAverageStableRate(amount, stable.interestRate, remaining, averageWithout);
    this.recomputeRates();
  }

  private paramsUpdated(section: 'config' | 'caps' | 'fees' | 'deposit' | 'variableBorrow' | 'stableBorrow'): void {
    this.recomputeRates();
    this.context.emit({ type: 'PoolParamsUpdated', poolId: this.pool.poolId, section });
  }
}
