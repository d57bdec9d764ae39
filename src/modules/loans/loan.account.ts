/**
 * Lending Hub - Loan Account
 * THE RISK ENGINE: user loans, their collateral and borrow positions
 *
 * RULES:
 * 1. Only the owning account may act on a loan, except for liquidation
 *    (as the violator) and rebalancing, which anyone may trigger.
 * 2. Reward indexes are brought up to date before a position changes.
 * 3. Pool totals move only through PoolAccount.
 * 4. Actions that can weaken a loan end with a health check.
 */

import {
  ONE_18_DP,
  assetDollarValue,
  exceedsDollarCap,
  minBigInt,
  subFloor,
  toUnderlyingAmount,
} from '../../core/math';
import {
  AccountId,
  DepositPoolResult,
  EventSink,
  LoanHealth,
  LoanId,
  LoanPool,
  LoanTypeId,
  PoolId,
  PriceFeed,
  UserLoan,
  UserLoanBorrow,
  UserPoolRewards,
  WithdrawPoolResult,
} from '../../shared/types';
import { PoolAccount, PoolCapacityError } from '../pools';
import { RewardAccrual } from '../rewards/reward-accrual';
import {
  accrueBorrowInterest,
  increaseBorrow,
  isStableBorrow,
  newStableBorrow,
  newVariableBorrow,
  switchBorrowPosition,
} from './borrow-position';
import { HealthContext, assertOverCollateralized, isOverCollateralized, loanHealth, loanValues } from './health';
import { LiquidationAmounts, calcLiquidationAmounts } from './liquidation';
import { generateLoanId } from './loan-id';
import { LoanTypeRegistry } from './loan-type.registry';
import { LoanCapacityError, LoanError } from './loan.errors';

/**
 * Everything a loan action reads and writes, already loaded for the action
 */
export interface LoanContext extends HealthContext {
  emit: EventSink;
  loans: Map<LoanId, UserLoan>;
  loanTypes: LoanTypeRegistry;
  rewards: RewardAccrual;
  userPoolRewards(accountId: AccountId, poolId: PoolId): UserPoolRewards;
  fTokenBalanceOf(poolId: PoolId, account: string): bigint;
}

export interface RepayResult {
  principalPaid: bigint;
  interestPaid: bigint;
  excessPaid: bigint;
}

export interface RepayWithCollateralResult {
  principalPaid: bigint;
  interestPaid: bigint;
  fAmount: bigint;
}

export class LoanAccount {
  constructor(private readonly context: LoanContext) {}

  // ============================================
  // LIFECYCLE
  // ============================================

  createUserLoan(nonce: string, accountId: AccountId, loanTypeId: LoanTypeId, name: string): UserLoan {
    this.context.loanTypes.getActive(loanTypeId);

    const loanId = generateLoanId(accountId, nonce);
    if (this.context.loans.has(loanId)) {
      throw new LoanError('UserLoanAlreadyCreated', `Loan ${loanId} already exists`, { loanId });
    }

    const loan: UserLoan = { loanId, accountId, loanTypeId, name, collaterals: new Map(), borrows: new Map() };
    this.context.loans.set(loanId, loan);
    this.context.emit({ type: 'CreateUserLoan', loanId, accountId, loanTypeId });
    return loan;
  }

  deleteUserLoan(loanId: LoanId, accountId: AccountId): void {
    const loan = this.getOwnedLoan(loanId, accountId);
    if (loan.collaterals.size > 0 || loan.borrows.size > 0) {
      throw new LoanError('LoanNotEmpty', `Loan ${loanId} still has collateral or borrows`, { loanId });
    }
    this.context.loans.delete(loanId);
    this.context.emit({ type: 'DeleteUserLoan', loanId, accountId });
  }

  getLoan(loanId: LoanId): UserLoan {
    const loan = this.context.loans.get(loanId);
    if (!loan) {
      throw new LoanError('UnknownUserLoan', `Unknown loan ${loanId}`, { loanId });
    }
    return loan;
  }

  getOwnedLoan(loanId: LoanId, accountId: AccountId): UserLoan {
    const loan = this.getLoan(loanId);
    if (loan.accountId !== accountId) {
      throw new LoanError('NotAccountOwner', `Account ${accountId} does not own loan ${loanId}`, { loanId, accountId });
    }
    return loan;
  }

  getLoanHealth(loanId: LoanId): LoanHealth {
    const loan = this.getLoan(loanId);
    return loanHealth(loanValues(loan, this.context.loanTypes.get(loan.loanTypeId), this.context));
  }

  // ============================================
  // COLLATERAL
  // ============================================

  deposit(loanId: LoanId, accountId: AccountId, poolId: PoolId, amount: bigint): DepositPoolResult {
    const loan = this.getOwnedLoan(loanId, accountId);
    const loanPool = this.getActiveLoanPool(loan, poolId);
    const feed = this.context.priceFeed(poolId);

    const result = this.context.pool(poolId).applyDeposit(amount, feed);
    this.increaseCollateral(loan, poolId, loanPool, result.fAmount, result.depositInterestIndex, feed);

    this.context.emit({ type: 'Deposit', loanId, poolId, amount, fAmount: result.fAmount });
    return result;
  }

  /**
   * Move receipt tokens from the sender's wallet into the loan
   */
  depositFToken(loanId: LoanId, accountId: AccountId, poolId: PoolId, sender: string, fAmount: bigint): void {
    const loan = this.getOwnedLoan(loanId, accountId);
    const loanPool = this.getActiveLoanPool(loan, poolId);
    const pool = this.context.pool(poolId);

    const balance = this.context.fTokenBalanceOf(poolId, sender);
    if (fAmount > balance) {
      throw new LoanCapacityError('InsufficientFTokenBalance', `Insufficient f-token balance of ${sender}`, fAmount, balance, {
        poolId,
      });
    }

    pool.refreshIndices();
    this.increaseCollateral(loan, poolId, loanPool, fAmount, pool.data.depositData.interestIndex, this.context.priceFeed(poolId));
    pool.burnFToken(sender, fAmount);

    this.context.emit({ type: 'DepositFToken', loanId, poolId, fAmount });
  }

  withdraw(
    loanId: LoanId,
    accountId: AccountId,
    poolId: PoolId,
    amount: bigint,
    isFAmount: boolean,
    checkOverCollateralization = true
  ): WithdrawPoolResult {
    const loan = this.getOwnedLoan(loanId, accountId);
    this.getCollateral(loan, poolId);

    const result = this.context.pool(poolId).applyWithdraw(amount, isFAmount);
    this.decreaseCollateral(loan, poolId, result.fAmount);
    if (checkOverCollateralization) this.assertHealthy(loan);

    this.context.emit({ type: 'Withdraw', loanId, poolId, amount: result.underlyingAmount, fAmount: result.fAmount });
    return result;
  }

  /**
   * Take collateral out as receipt tokens minted to `recipient`
   */
  withdrawFToken(loanId: LoanId, accountId: AccountId, poolId: PoolId, recipient: string, fAmount: bigint): void {
    const loan = this.getOwnedLoan(loanId, accountId);
    this.getCollateral(loan, poolId);

    const pool = this.context.pool(poolId);
    pool.prepareWithdrawFToken();
    pool.refreshIndices();
    this.decreaseCollateral(loan, poolId, fAmount);
    this.assertHealthy(loan);
    pool.mintFToken(recipient, fAmount);

    this.context.emit({ type: 'WithdrawFToken', loanId, poolId, fAmount });
  }

  // ============================================
  // BORROW / REPAY
  // ============================================

  /**
   * A positive maxStableRate requests a stable borrow
   */
  borrow(loanId: LoanId, accountId: AccountId, poolId: PoolId, amount: bigint, maxStableRate: bigint): void {
    const loan = this.getOwnedLoan(loanId, accountId);
    const loanPool = this.getActiveLoanPool(loan, poolId);
    const isStable = maxStableRate > 0n;

    const existing = loan.borrows.get(poolId);
    if (existing && isStableBorrow(existing) !== isStable) {
      throw new LoanError('BorrowTypeMismatch', `Loan ${loanId} already borrows from pool ${poolId} at the other rate type`, {
        loanId,
        poolId,
      });
    }

    const feed = this.context.priceFeed(poolId);
    const pool = this.context.pool(poolId);
    const { variableInterestIndex, stableInterestRate } = pool.prepareBorrow(amount, maxStableRate, feed);

    const newBorrowUsed = loanPool.borrowUsed + amount;
    const newBorrowValue = assetDollarValue(newBorrowUsed, feed);
    if (exceedsDollarCap(newBorrowValue, loanPool.borrowCap)) {
      throw new LoanCapacityError(
        'BorrowCapReached',
        `Borrow cap reached for pool ${poolId} in loan type ${loan.loanTypeId}`,
        newBorrowValue,
        loanPool.borrowCap * ONE_18_DP,
        { loanTypeId: loan.loanTypeId, poolId }
      );
    }

    this.context.rewards.updateUserPoolRewards(loan, poolId);
    const rate = isStable ? stableInterestRate : 0n;
    if (existing) {
      accrueBorrowInterest(existing, variableInterestIndex, this.context.now);
      increaseBorrow(existing, amount, amount, rate);
    } else {
      const rewardIndex = loanPool.reward.borrowRewardIndex;
      loan.borrows.set(
        poolId,
        isStable
          ? newStableBorrow(amount, rate, this.context.now, rewardIndex)
          : newVariableBorrow(amount, variableInterestIndex, rewardIndex)
      );
    }
    loanPool.borrowUsed = newBorrowUsed;
    pool.applyBorrow(amount, rate);
    this.assertHealthy(loan);

    this.context.emit({ type: 'Borrow', loanId, poolId, amount, isStable, stableInterestRate: rate });
  }

  /**
   * Interest is paid first, then principal. Anything above the balance is
   * retained by the pool, up to maxOverRepayment.
   */
  repay(loanId: LoanId, accountId: AccountId, poolId: PoolId, amount: bigint, maxOverRepayment: bigint): RepayResult {
    const loan = this.getOwnedLoan(loanId, accountId);
    const borrow = this.getBorrow(loan, poolId);
    const pool = this.context.pool(poolId);

    const { variableInterestIndex } = pool.prepareRepay();
    const loanPool = this.context.rewards.updateUserPoolRewards(loan, poolId);
    accrueBorrowInterest(borrow, variableInterestIndex, this.context.now);

    const { principalPaid, interestPaid, excessPaid } = splitRepayment(borrow, amount);
    if (excessPaid > maxOverRepayment) {
      throw new LoanCapacityError('ExcessRepaymentExceeded', 'Repayment exceeds the borrow balance', excessPaid, maxOverRepayment, {
        loanId,
        poolId,
      });
    }

    const loanStableRate = borrow.stableInterestRate;
    this.reduceBorrow(loan, poolId, borrow, loanPool, principalPaid, principalPaid + interestPaid);
    this.context.userPoolRewards(loan.accountId, poolId).interestPaid += interestPaid;
    pool.applyRepay(principalPaid, interestPaid, loanStableRate, excessPaid);

    this.context.emit({ type: 'Repay', loanId, poolId, principalPaid, interestPaid, excessPaid });
    return { principalPaid, interestPaid, excessPaid };
  }

  /**
   * Repay from the same pool's collateral; any amount above the balance is ignored
   */
  repayWithCollateral(loanId: LoanId, accountId: AccountId, poolId: PoolId, amount: bigint): RepayWithCollateralResult {
    const loan = this.getOwnedLoan(loanId, accountId);
    const borrow = this.getBorrow(loan, poolId);
    const collateral = this.getCollateral(loan, poolId);
    const pool = this.context.pool(poolId);

    const { variableInterestIndex } = pool.prepareRepay();
    const loanPool = this.context.rewards.updateUserPoolRewards(loan, poolId);
    accrueBorrowInterest(borrow, variableInterestIndex, this.context.now);

    const { principalPaid, interestPaid } = splitRepayment(borrow, amount);
    const loanStableRate = borrow.stableInterestRate;
    const fAmount = pool.applyRepayWithCollateral(principalPaid, interestPaid, loanStableRate);
    if (fAmount > collateral.balance) {
      throw new LoanCapacityError('InsufficientCollateral', `Insufficient collateral in pool ${poolId}`, fAmount, collateral.balance, {
        loanId,
        poolId,
      });
    }

    collateral.balance -= fAmount;
    if (collateral.balance === 0n) loan.collaterals.delete(poolId);
    loanPool.collateralUsed = subFloor(loanPool.collateralUsed, fAmount);
    this.reduceBorrow(loan, poolId, borrow, loanPool, principalPaid, principalPaid + interestPaid);
    this.context.userPoolRewards(loan.accountId, poolId).interestPaid += interestPaid;

    this.context.emit({ type: 'RepayWithCollateral', loanId, poolId, principalPaid, interestPaid, fAmount });
    return { principalPaid, interestPaid, fAmount };
  }

  // ============================================
  // LIQUIDATION
  // ============================================

  liquidate(
    violatorLoanId: LoanId,
    liquidatorLoanId: LoanId,
    liquidatorAccountId: AccountId,
    colPoolId: PoolId,
    borPoolId: PoolId,
    maxRepayAmount: bigint,
    minSeizedAmount: bigint
  ): LiquidationAmounts {
    const violator = this.getLoan(violatorLoanId);
    const liquidator = this.getOwnedLoan(liquidatorLoanId, liquidatorAccountId);
    if (violatorLoanId === liquidatorLoanId) {
      throw new LoanError('SameLoan', 'Violator and liquidator loans are the same', { loanId: violatorLoanId });
    }

    const violatorBorrow = this.getBorrow(violator, borPoolId);
    const violatorCollateral = this.getCollateral(violator, colPoolId);
    if (violator.loanTypeId !== liquidator.loanTypeId) {
      throw new LoanError('LoanTypeMismatch', 'Violator and liquidator loans have different loan types', {
        violatorLoanTypeId: violator.loanTypeId,
        liquidatorLoanTypeId: liquidator.loanTypeId,
      });
    }
    const liquidatorBorrow = liquidator.borrows.get(borPoolId);
    if (liquidatorBorrow && isStableBorrow(liquidatorBorrow) !== isStableBorrow(violatorBorrow)) {
      throw new LoanError('BorrowTypeMismatch', `Liquidator borrows from pool ${borPoolId} at the other rate type`, {
        loanId: liquidatorLoanId,
        poolId: borPoolId,
      });
    }

    const loanType = this.context.loanTypes.get(violator.loanTypeId);
    const borPool = this.context.pool(borPoolId);
    const colPool = this.context.pool(colPoolId);
    const { variableInterestIndex } = borPool.prepareRepay();
    colPool.refreshIndices();

    const violatorValues = loanValues(violator, loanType, this.context);
    if (isOverCollateralized(violatorValues)) {
      throw new LoanError('OverCollateralizedLoan', `Loan ${violatorLoanId} is over-collateralised`, { loanId: violatorLoanId }, 'SOLVENCY');
    }

    const colLoanPool = this.context.rewards.updateUserPoolRewards(violator, colPoolId);
    const borLoanPool = this.context.rewards.updateUserPoolRewards(violator, borPoolId);
    this.context.rewards.updateUserPoolRewards(liquidator, colPoolId);
    this.context.rewards.updateUserPoolRewards(liquidator, borPoolId);

    accrueBorrowInterest(violatorBorrow, variableInterestIndex, this.context.now);
    if (liquidatorBorrow) accrueBorrowInterest(liquidatorBorrow, variableInterestIndex, this.context.now);

    const amounts = calcLiquidationAmounts({
      maxRepayAmount,
      violatorBorrowBalance: violatorBorrow.balance,
      violatorCollateralFAmount: violatorCollateral.balance,
      violatorValues,
      loanTargetHealth: loanType.loanTargetHealth,
      borrowLoanPool: borLoanPool,
      collateralLoanPool: colLoanPool,
      borrowFeed: this.context.priceFeed(borPoolId),
      collateralFeed: this.context.priceFeed(colPoolId),
      collateralDepositIndex: colPool.data.depositData.interestIndex,
    });
    if (amounts.liquidatorFAmount < minSeizedAmount) {
      throw new LoanCapacityError('InsufficientSeized', 'Seized collateral below the requested minimum', amounts.liquidatorFAmount, minSeizedAmount, {
        loanId: violatorLoanId,
      });
    }

    // collateral: violator -> liquidator, fee share -> reserve
    violatorCollateral.balance -= amounts.seizedFAmount;
    if (violatorCollateral.balance === 0n) violator.collaterals.delete(colPoolId);
    const liquidatorCollateral = liquidator.collaterals.get(colPoolId);
    if (liquidatorCollateral) {
      liquidatorCollateral.balance += amounts.liquidatorFAmount;
    } else if (amounts.liquidatorFAmount > 0n) {
      liquidator.collaterals.set(colPoolId, {
        balance: amounts.liquidatorFAmount,
        rewardIndex: colLoanPool.reward.collateralRewardIndex,
      });
    }
    colLoanPool.collateralUsed = subFloor(colLoanPool.collateralUsed, amounts.reserveFAmount);
    colPool.mintFTokenForFeeRecipient(amounts.reserveFAmount);

    // debt: violator -> liquidator
    const { repayAmount } = amounts;
    const principalMoved = minBigInt(repayAmount, violatorBorrow.amount);
    const violatorStableRate = violatorBorrow.stableInterestRate;
    violatorBorrow.amount -= principalMoved;
    violatorBorrow.balance = subFloor(violatorBorrow.balance, repayAmount);
    if (violatorBorrow.balance === 0n) violator.borrows.delete(borPoolId);

    if (liquidatorBorrow) {
      increaseBorrow(liquidatorBorrow, principalMoved, repayAmount, violatorStableRate);
    } else if (repayAmount > 0n) {
      const rewardIndex = borLoanPool.reward.borrowRewardIndex;
      const moved =
        violatorStableRate > 0n
          ? newStableBorrow(repayAmount, violatorStableRate, this.context.now, rewardIndex)
          : newVariableBorrow(repayAmount, variableInterestIndex, rewardIndex);
      moved.amount = principalMoved;
      liquidator.borrows.set(borPoolId, moved);
    }
    borPool.applyLiquidation();
    this.assertHealthy(liquidator);

    this.context.emit({
      type: 'Liquidate',
      violatorLoanId,
      liquidatorLoanId,
      colPoolId,
      borPoolId,
      repayBorrowAmount: repayAmount,
      liquidatorCollateralFAmount: amounts.liquidatorFAmount,
      reserveCollateralFAmount: amounts.reserveFAmount,
    });
    return amounts;
  }

  // ============================================
  // RATE TYPE
  // ============================================

  /**
   * Variable positions switch to stable (bounded by maxStableRate);
   * stable positions switch to variable.
   */
  switchBorrowType(loanId: LoanId, accountId: AccountId, poolId: PoolId, maxStableRate: bigint): void {
    const loan = this.getOwnedLoan(loanId, accountId);
    const borrow = this.getBorrow(loan, poolId);
    const pool = this.context.pool(poolId);
    const toStable = !isStableBorrow(borrow);

    if (toStable && maxStableRate === 0n) {
      throw new PoolCapacityError(
        'MaxStableRateExceeded',
        'Stable rate above the requested maximum',
        pool.data.stableBorrowData.interestRate,
        maxStableRate,
        { poolId }
      );
    }

    const { variableInterestIndex, stableInterestRate } = pool.prepareSwitchBorrowType(
      borrow.amount,
      toStable ? maxStableRate : 0n
    );
    this.context.rewards.updateUserPoolRewards(loan, poolId);
    accrueBorrowInterest(borrow, variableInterestIndex, this.context.now);

    const oldRate = borrow.stableInterestRate;
    switchBorrowPosition(borrow, toStable, stableInterestRate, variableInterestIndex, this.context.now);
    pool.applySwitchBorrowType(borrow.amount, toStable, oldRate);

    this.context.emit({ type: 'SwitchBorrowType', loanId, poolId, isStable: toStable });
  }

  /**
   * Re-price a stable position at the pool's current stable rate once the
   * pool is highly utilised and depositors earn too little
   */
  rebalanceUp(loanId: LoanId, poolId: PoolId): void {
    const loan = this.getLoan(loanId);
    const borrow = this.getStableBorrow(loan, poolId);
    const pool = this.context.pool(poolId);

    const { variableInterestIndex, stableInterestRate } = pool.prepareRebalanceUp();
    accrueBorrowInterest(borrow, variableInterestIndex, this.context.now);
    const oldRate = borrow.stableInterestRate;
    borrow.stableInterestRate = stableInterestRate;
    pool.applyRebalanceUp(borrow.amount, oldRate);

    this.context.emit({ type: 'RebalanceUp', loanId, poolId, stableInterestRate });
  }

  /**
   * Re-price a stable position whose rate sits at or above the pool's
   * current stable rate plus the rebalance down delta
   */
  rebalanceDown(loanId: LoanId, poolId: PoolId): void {
    const loan = this.getLoan(loanId);
    const borrow = this.getStableBorrow(loan, poolId);
    const pool = this.context.pool(poolId);

    const { variableInterestIndex, stableInterestRate, threshold } = pool.prepareRebalanceDown();
    if (borrow.stableInterestRate < threshold) {
      throw new LoanError('RebalanceDownThresholdNotReached', `Stable rate ${borrow.stableInterestRate} below ${threshold}`, {
        loanId,
        poolId,
        stableInterestRate: borrow.stableInterestRate,
        threshold,
      });
    }

    accrueBorrowInterest(borrow, variableInterestIndex, this.context.now);
    const oldRate = borrow.stableInterestRate;
    borrow.stableInterestRate = stableInterestRate;
    pool.applyRebalanceDown(borrow.amount, oldRate);

    this.context.emit({ type: 'RebalanceDown', loanId, poolId, stableInterestRate });
  }

  // ============================================
  // INTERNALS
  // ============================================

  private getActiveLoanPool(loan: UserLoan, poolId: PoolId): LoanPool {
    this.context.loanTypes.getActive(loan.loanTypeId);
    return this.context.loanTypes.getActiveLoanPool(loan.loanTypeId, poolId);
  }

  private getCollateral(loan: UserLoan, poolId: PoolId): { balance: bigint; rewardIndex: bigint } {
    const collateral = loan.collaterals.get(poolId);
    if (!collateral) {
      throw new LoanError('NoCollateralInLoanForPool', `Loan ${loan.loanId} has no collateral in pool ${poolId}`, {
        loanId: loan.loanId,
        poolId,
      });
    }
    return collateral;
  }

  private getBorrow(loan: UserLoan, poolId: PoolId): UserLoanBorrow {
    const borrow = loan.borrows.get(poolId);
    if (!borrow) {
      throw new LoanError('NoBorrowInLoanForPool', `Loan ${loan.loanId} has no borrow in pool ${poolId}`, {
        loanId: loan.loanId,
        poolId,
      });
    }
    return borrow;
  }

  private getStableBorrow(loan: UserLoan, poolId: PoolId): UserLoanBorrow {
    const borrow = loan.borrows.get(poolId);
    if (!borrow || !isStableBorrow(borrow)) {
      throw new LoanError('NoStableBorrowInLoanForPool', `Loan ${loan.loanId} has no stable borrow in pool ${poolId}`, {
        loanId: loan.loanId,
        poolId,
      });
    }
    return borrow;
  }

  private increaseCollateral(
    loan: UserLoan,
    poolId: PoolId,
    loanPool: LoanPool,
    fAmount: bigint,
    depositInterestIndex: bigint,
    feed: PriceFeed
  ): void {
    const newCollateralUsed = loanPool.collateralUsed + fAmount;
    const newCollateralValue = assetDollarValue(toUnderlyingAmount(newCollateralUsed, depositInterestIndex), feed);
    if (exceedsDollarCap(newCollateralValue, loanPool.collateralCap)) {
      throw new LoanCapacityError(
        'CollateralCapReached',
        `Collateral cap reached for pool ${poolId} in loan type ${loan.loanTypeId}`,
        newCollateralValue,
        loanPool.collateralCap * ONE_18_DP,
        { loanTypeId: loan.loanTypeId, poolId }
      );
    }

    this.context.rewards.updateUserPoolRewards(loan, poolId);
    loanPool.collateralUsed = newCollateralUsed;
    if (fAmount === 0n) return;

    const collateral = loan.collaterals.get(poolId);
    if (collateral) {
      collateral.balance += fAmount;
    } else {
      loan.collaterals.set(poolId, { balance: fAmount, rewardIndex: loanPool.reward.collateralRewardIndex });
    }
  }

  private decreaseCollateral(loan: UserLoan, poolId: PoolId, fAmount: bigint): void {
    const collateral = this.getCollateral(loan, poolId);
    if (fAmount > collateral.balance) {
      throw new LoanCapacityError('InsufficientCollateral', `Insufficient collateral in pool ${poolId}`, fAmount, collateral.balance, {
        loanId: loan.loanId,
        poolId,
      });
    }

    const loanPool = this.context.rewards.updateUserPoolRewards(loan, poolId);
    collateral.balance -= fAmount;
    if (collateral.balance === 0n) loan.collaterals.delete(poolId);
    loanPool.collateralUsed = subFloor(loanPool.collateralUsed, fAmount);
  }

  private reduceBorrow(
    loan: UserLoan,
    poolId: PoolId,
    borrow: UserLoanBorrow,
    loanPool: LoanPool,
    principal: bigint,
    balance: bigint
  ): void {
    borrow.amount = subFloor(borrow.amount, principal);
    borrow.balance = subFloor(borrow.balance, balance);
    if (borrow.balance === 0n) loan.borrows.delete(poolId);
    loanPool.borrowUsed = subFloor(loanPool.borrowUsed, principal);
  }

  private assertHealthy(loan: UserLoan): void {
    assertOverCollateralized(loan, this.context.loanTypes.get(loan.loanTypeId), this.context);
  }
}

/**
 * Interest first, then principal, then excess
 */
export function splitRepayment(borrow: UserLoanBorrow, amount: bigint): RepayResult {
  const interest = subFloor(borrow.balance, borrow.amount);
  const interestPaid = minBigInt(amount, interest);
  const principalPaid = minBigInt(amount - interestPaid, borrow.amount);
  return { principalPaid, interestPaid, excessPaid: amount - interestPaid - principalPaid };
}
