/**
 * @file modules/loans/loan.account.test.ts
 * @description User loans: collateral, borrows, repayment, rate switches and liquidation
 */

import { describe, it, expect } from '@jest/globals';
import { LoanId, UserLoan } from '../../shared/types';
import { HubSnapshot } from '../loan-manager';
import { generateLoanId } from './loan-id';
import { T0 } from '../../../test/fixtures/pool.fixtures';
import {
  E18,
  E6,
  ETH_POOL,
  LOAN_TYPE,
  USDC_POOL,
  createHubSnapshot,
  createMockLoanPoolParams,
  loanPoolOf,
  openAction,
  poolOf,
} from '../../../test/fixtures/loan.fixtures';
import { capacityErrorOf, errorOf } from '../../../test/fixtures/errors';

function createLoan(snapshot: HubSnapshot, accountId: string, nonce = '1'): LoanId {
  return openAction(snapshot).loans.createUserLoan(nonce, accountId, LOAN_TYPE, `${accountId} loan`).loanId;
}

function loanOf(snapshot: HubSnapshot, loanId: LoanId): UserLoan {
  const loan = snapshot.loans.get(loanId);
  if (!loan) throw new Error(`Loan ${loanId} not found`);
  return loan;
}

/**
 * A lender with 10,000 USDC deposited and a borrower with 1 ETH of collateral
 */
function setupHub() {
  const snapshot = createHubSnapshot();
  const lenderLoanId = createLoan(snapshot, 'lender');
  openAction(snapshot).loans.deposit(lenderLoanId, 'lender', USDC_POOL, 10_000n * E6);
  const borrowerLoanId = createLoan(snapshot, 'borrower');
  openAction(snapshot).loans.deposit(borrowerLoanId, 'borrower', ETH_POOL, E18);
  return { snapshot, lenderLoanId, borrowerLoanId };
}

describe('LoanAccount', () => {
  describe('createUserLoan / deleteUserLoan', () => {
    it('derives the loan id from account and nonce', () => {
      const snapshot = createHubSnapshot();
      const action = openAction(snapshot);
      const loan = action.loans.createUserLoan('nonce-1', 'account-1', LOAN_TYPE, 'main');

      expect(loan.loanId).toBe(generateLoanId('account-1', 'nonce-1'));
      expect(loan.loanId).toMatch(/^[0-9a-f]{64}$/);
      expect(action.events).toEqual([
        { type: 'CreateUserLoan', loanId: loan.loanId, accountId: 'account-1', loanTypeId: LOAN_TYPE },
      ]);
      expect(errorOf(() => openAction(snapshot).loans.createUserLoan('nonce-1', 'account-1', LOAN_TYPE, 'again'))?.code).toBe(
        'UserLoanAlreadyCreated'
      );
    });

    it('rejects unknown and deprecated loan types', () => {
      const snapshot = createHubSnapshot();
      expect(errorOf(() => openAction(snapshot).loans.createUserLoan('1', 'account-1', 99, 'x'))?.code).toBe('LoanTypeUnknown');

      openAction(snapshot).loanTypes.deprecateLoanType(LOAN_TYPE);
      expect(errorOf(() => openAction(snapshot).loans.createUserLoan('1', 'account-1', LOAN_TYPE, 'x'))?.code).toBe(
        'LoanTypeDeprecated'
      );
    });

    it('deletes only empty loans owned by the caller', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      expect(errorOf(() => openAction(snapshot).loans.deleteUserLoan(borrowerLoanId, 'lender'))?.code).toBe('NotAccountOwner');
      expect(errorOf(() => openAction(snapshot).loans.deleteUserLoan(borrowerLoanId, 'borrower'))?.code).toBe('LoanNotEmpty');

      openAction(snapshot).loans.withdraw(borrowerLoanId, 'borrower', ETH_POOL, E18, true);
      const action = openAction(snapshot);
      action.loans.deleteUserLoan(borrowerLoanId, 'borrower');

      expect(snapshot.loans.has(borrowerLoanId)).toBe(false);
      expect(action.events).toEqual([{ type: 'DeleteUserLoan', loanId: borrowerLoanId, accountId: 'borrower' }]);
      expect(errorOf(() => openAction(snapshot).loans.getLoan(borrowerLoanId))?.code).toBe('UnknownUserLoan');
    });
  });

  describe('deposit', () => {
    it('credits f-tokens to the loan and the loan pool', () => {
      const { snapshot, borrowerLoanId } = setupHub();

      expect(loanOf(snapshot, borrowerLoanId).collaterals.get(ETH_POOL)).toEqual({ balance: E18, rewardIndex: 0n });
      expect(loanPoolOf(snapshot, ETH_POOL).collateralUsed).toBe(E18);
      expect(poolOf(snapshot, ETH_POOL).depositData.totalAmount).toBe(E18);
    });

    it('converts at the current deposit index', () => {
      const snapshot = createHubSnapshot();
      poolOf(snapshot, ETH_POOL).depositData.interestIndex = 1_250_000_000_000_000_000n;
      const loanId = createLoan(snapshot, 'borrower');

      const action = openAction(snapshot);
      const result = action.loans.deposit(loanId, 'borrower', ETH_POOL, E18);

      expect(result.fAmount).toBe(800_000_000_000_000_000n);
      expect(action.events[action.events.length - 1]).toEqual({
        type: 'Deposit',
        loanId,
        poolId: ETH_POOL,
        amount: E18,
        fAmount: 800_000_000_000_000_000n,
      });
    });

    it('enforces the loan pool collateral cap in USD', () => {
      const snapshot = createHubSnapshot();
      loanPoolOf(snapshot, ETH_POOL).collateralCap = 1_000n;
      const loanId = createLoan(snapshot, 'borrower');

      const error = capacityErrorOf(() => openAction(snapshot).loans.deposit(loanId, 'borrower', ETH_POOL, E18));
      expect(error?.code).toBe('CollateralCapReached');
      expect(error?.current).toBe(2_000n * E18);
      expect(error?.limit).toBe(1_000n * E18);
    });

    it('rejects pools outside the loan type and deprecated loan pools', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      expect(errorOf(() => openAction(snapshot).loans.deposit(borrowerLoanId, 'borrower', 3, 1n))?.code).toBe('LoanPoolUnknown');

      openAction(snapshot).loanTypes.deprecatePoolInLoanType(LOAN_TYPE, ETH_POOL);
      expect(errorOf(() => openAction(snapshot).loans.deposit(borrowerLoanId, 'borrower', ETH_POOL, 1n))?.code).toBe(
        'LoanPoolDeprecated'
      );
    });
  });

  describe('withdraw', () => {
    it('burns f-tokens rounded up and keeps the remainder', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      const action = openAction(snapshot);
      const result = action.loans.withdraw(borrowerLoanId, 'borrower', ETH_POOL, E18 / 2n, false);

      expect(result).toEqual({ underlyingAmount: E18 / 2n, fAmount: E18 / 2n });
      expect(loanOf(snapshot, borrowerLoanId).collaterals.get(ETH_POOL)?.balance).toBe(E18 / 2n);
      expect(loanPoolOf(snapshot, ETH_POOL).collateralUsed).toBe(E18 / 2n);
      expect(action.events[action.events.length - 1]).toEqual({
        type: 'Withdraw',
        loanId: borrowerLoanId,
        poolId: ETH_POOL,
        amount: E18 / 2n,
        fAmount: E18 / 2n,
      });
    });

    it('removes the position once empty', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      openAction(snapshot).loans.withdraw(borrowerLoanId, 'borrower', ETH_POOL, E18, true);
      expect(loanOf(snapshot, borrowerLoanId).collaterals.has(ETH_POOL)).toBe(false);
      expect(errorOf(() => openAction(snapshot).loans.withdraw(borrowerLoanId, 'borrower', ETH_POOL, 1n, true))?.code).toBe(
        'NoCollateralInLoanForPool'
      );
    });

    it('rejects withdrawing more than the loan holds', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      const otherLoanId = createLoan(snapshot, 'other');
      openAction(snapshot).loans.deposit(otherLoanId, 'other', ETH_POOL, 5n * E18);

      const error = capacityErrorOf(() =>
        openAction(snapshot).loans.withdraw(borrowerLoanId, 'borrower', ETH_POOL, 2n * E18, true)
      );
      expect(error?.code).toBe('InsufficientCollateral');
      expect(error?.current).toBe(2n * E18);
      expect(error?.limit).toBe(E18);
    });

    it('rejects a withdrawal that leaves the loan under-collateralised', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      openAction(snapshot).loans.borrow(borrowerLoanId, 'borrower', USDC_POOL, 1_000n * E6, 0n);

      const error = errorOf(() => openAction(snapshot).loans.withdraw(borrowerLoanId, 'borrower', ETH_POOL, E18 / 2n, false));
      expect(error?.code).toBe('UnderCollateralizedLoan');
      expect(error?.category).toBe('SOLVENCY');
    });
  });

  describe('f-token collateral', () => {
    it('burns wallet f-tokens into collateral', () => {
      const snapshot = createHubSnapshot();
      const loanId = createLoan(snapshot, 'borrower');
      const action = openAction(snapshot, { fTokenBalances: [[ETH_POOL, 'wallet-1', E18 / 2n]] });
      action.loans.depositFToken(loanId, 'borrower', ETH_POOL, 'wallet-1', E18 / 5n);

      expect(loanOf(snapshot, loanId).collaterals.get(ETH_POOL)?.balance).toBe(E18 / 5n);
      expect(loanPoolOf(snapshot, ETH_POOL).collateralUsed).toBe(E18 / 5n);
      expect(action.tokenInstructions).toEqual([{ kind: 'burn', poolId: ETH_POOL, account: 'wallet-1', fAmount: E18 / 5n }]);
      expect(action.events[action.events.length - 1]).toEqual({
        type: 'DepositFToken',
        loanId,
        poolId: ETH_POOL,
        fAmount: E18 / 5n,
      });
    });

    it('rejects burning more than the wallet holds', () => {
      const snapshot = createHubSnapshot();
      const loanId = createLoan(snapshot, 'borrower');
      const action = openAction(snapshot, { fTokenBalances: [[ETH_POOL, 'wallet-1', E18 / 2n]] });

      const error = capacityErrorOf(() => action.loans.depositFToken(loanId, 'borrower', ETH_POOL, 'wallet-1', E18));
      expect(error?.code).toBe('InsufficientFTokenBalance');
      expect(error?.current).toBe(E18);
      expect(error?.limit).toBe(E18 / 2n);
    });

    it('mints collateral out as f-tokens without touching pool deposits', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      const action = openAction(snapshot);
      action.loans.withdrawFToken(borrowerLoanId, 'borrower', ETH_POOL, 'wallet-1', 400_000_000_000_000_000n);

      expect(loanOf(snapshot, borrowerLoanId).collaterals.get(ETH_POOL)?.balance).toBe(600_000_000_000_000_000n);
      expect(poolOf(snapshot, ETH_POOL).depositData.totalAmount).toBe(E18);
      expect(action.tokenInstructions).toEqual([
        { kind: 'mint', poolId: ETH_POOL, account: 'wallet-1', fAmount: 400_000_000_000_000_000n },
      ]);
    });

    it('refuses to mint in pools without f-token minting', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      poolOf(snapshot, ETH_POOL).configData.canMintFToken = false;
      expect(
        errorOf(() => openAction(snapshot).loans.withdrawFToken(borrowerLoanId, 'borrower', ETH_POOL, 'wallet-1', 1n))?.code
      ).toBe('CannotMintFToken');
    });
  });

  describe('borrow', () => {
    it('opens a variable position at the pool index', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      const action = openAction(snapshot);
      action.loans.borrow(borrowerLoanId, 'borrower', USDC_POOL, 1_000n * E6, 0n);

      expect(loanOf(snapshot, borrowerLoanId).borrows.get(USDC_POOL)).toEqual({
        amount: 1_000n * E6,
        balance: 1_000n * E6,
        lastInterestIndex: E18,
        stableInterestRate: 0n,
        lastStableUpdateTimestamp: 0n,
        rewardIndex: 0n,
      });
      expect(loanPoolOf(snapshot, USDC_POOL).borrowUsed).toBe(1_000n * E6);
      expect(poolOf(snapshot, USDC_POOL).variableBorrowData.totalAmount).toBe(1_000n * E6);
      expect(action.events[action.events.length - 1]).toEqual({
        type: 'Borrow',
        loanId: borrowerLoanId,
        poolId: USDC_POOL,
        amount: 1_000n * E6,
        isStable: false,
        stableInterestRate: 0n,
      });
    });

    it('opens a stable position at the offered rate and re-weights it on increase', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      openAction(snapshot).loans.borrow(borrowerLoanId, 'borrower', USDC_POOL, 100n * E6, 100_000_000_000_000_000n);

      expect(loanOf(snapshot, borrowerLoanId).borrows.get(USDC_POOL)).toEqual({
        amount: 100n * E6,
        balance: 100n * E6,
        lastInterestIndex: E18,
        stableInterestRate: 70_000_000_000_000_000n,
        lastStableUpdateTimestamp: T0,
        rewardIndex: 0n,
      });
      expect(poolOf(snapshot, USDC_POOL).stableBorrowData.totalAmount).toBe(100n * E6);
      expect(poolOf(snapshot, USDC_POOL).stableBorrowData.averageInterestRate).toBe(70_000_000_000_000_000n);
      expect(poolOf(snapshot, USDC_POOL).stableBorrowData.interestRate).toBe(320_266_666_666_666_666n);

      openAction(snapshot).loans.borrow(borrowerLoanId, 'borrower', USDC_POOL, 100n * E6, 500_000_000_000_000_000n);
      const borrow = loanOf(snapshot, borrowerLoanId).borrows.get(USDC_POOL);
      expect(borrow?.amount).toBe(200n * E6);
      expect(borrow?.stableInterestRate).toBe(195_133_333_333_333_333n);
    });

    it('rejects a stable offer above the requested maximum', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      const error = capacityErrorOf(() => openAction(snapshot).loans.borrow(borrowerLoanId, 'borrower', USDC_POOL, E6, 1n));
      expect(error?.code).toBe('MaxStableRateExceeded');
      expect(error?.current).toBe(70_000_000_000_000_000n);
      expect(error?.limit).toBe(1n);
    });

    it('rejects mixing variable and stable borrows in one pool', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      openAction(snapshot).loans.borrow(borrowerLoanId, 'borrower', USDC_POOL, 100n * E6, 0n);
      expect(
        errorOf(() =>
          openAction(snapshot).loans.borrow(borrowerLoanId, 'borrower', USDC_POOL, E6, 100_000_000_000_000_000n)
        )?.code
      ).toBe('BorrowTypeMismatch');
    });

    it('enforces the loan pool borrow cap in USD', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      loanPoolOf(snapshot, USDC_POOL).borrowCap = 500n;

      const error = capacityErrorOf(() =>
        openAction(snapshot).loans.borrow(borrowerLoanId, 'borrower', USDC_POOL, 1_000n * E6, 0n)
      );
      expect(error?.code).toBe('BorrowCapReached');
      expect(error?.current).toBe(1_000n * E18);
      expect(error?.limit).toBe(500n * E18);
    });

    it('rejects a borrow the collateral cannot cover', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      expect(
        errorOf(() => openAction(snapshot).loans.borrow(borrowerLoanId, 'borrower', USDC_POOL, 1_500n * E6, 0n))?.code
      ).toBe('UnderCollateralizedLoan');
    });
  });

  describe('repay', () => {
    function withInterest() {
      const hub = setupHub();
      openAction(hub.snapshot).loans.borrow(hub.borrowerLoanId, 'borrower', USDC_POOL, 1_000n * E6, 0n);
      // 10% interest accrued on the variable index
      poolOf(hub.snapshot, USDC_POOL).variableBorrowData.interestIndex = 1_100_000_000_000_000_000n;
      return hub;
    }

    it('pays interest before principal', () => {
      const { snapshot, borrowerLoanId } = withInterest();
      const action = openAction(snapshot);
      const result = action.loans.repay(borrowerLoanId, 'borrower', USDC_POOL, 150n * E6, 0n);

      expect(result).toEqual({ principalPaid: 50n * E6, interestPaid: 100n * E6, excessPaid: 0n });
      expect(loanOf(snapshot, borrowerLoanId).borrows.get(USDC_POOL)).toMatchObject({
        amount: 950n * E6,
        balance: 950n * E6,
        lastInterestIndex: 1_100_000_000_000_000_000n,
      });
      expect(loanPoolOf(snapshot, USDC_POOL).borrowUsed).toBe(950n * E6);
      expect(poolOf(snapshot, USDC_POOL).variableBorrowData.totalAmount).toBe(950n * E6);
      expect(poolOf(snapshot, USDC_POOL).depositData.totalAmount).toBe(10_100n * E6);
      expect(action.userPoolRewards('borrower', USDC_POOL).interestPaid).toBe(100n * E6);
    });

    it('retains over-repayment up to the allowed maximum and closes the position', () => {
      const { snapshot, borrowerLoanId } = withInterest();
      const result = openAction(snapshot).loans.repay(borrowerLoanId, 'borrower', USDC_POOL, 1_200n * E6, 100n * E6);

      expect(result).toEqual({ principalPaid: 1_000n * E6, interestPaid: 100n * E6, excessPaid: 100n * E6 });
      expect(loanOf(snapshot, borrowerLoanId).borrows.has(USDC_POOL)).toBe(false);
      expect(loanPoolOf(snapshot, USDC_POOL).borrowUsed).toBe(0n);
      expect(poolOf(snapshot, USDC_POOL).feeData.totalRetainedAmount).toBe(100n * E6);
    });

    it('rejects over-repayment above the allowed maximum', () => {
      const { snapshot, borrowerLoanId } = withInterest();
      const error = capacityErrorOf(() =>
        openAction(snapshot).loans.repay(borrowerLoanId, 'borrower', USDC_POOL, 1_200n * E6, 50n * E6)
      );
      expect(error?.code).toBe('ExcessRepaymentExceeded');
      expect(error?.current).toBe(100n * E6);
      expect(error?.limit).toBe(50n * E6);
    });

    it('requires a borrow in the pool', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      expect(errorOf(() => openAction(snapshot).loans.repay(borrowerLoanId, 'borrower', USDC_POOL, E6, 0n))?.code).toBe(
        'NoBorrowInLoanForPool'
      );
    });

    it('repays from same-pool collateral', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      openAction(snapshot).loans.deposit(borrowerLoanId, 'borrower', USDC_POOL, 2_000n * E6);
      openAction(snapshot).loans.borrow(borrowerLoanId, 'borrower', USDC_POOL, 1_000n * E6, 0n);
      poolOf(snapshot, USDC_POOL).variableBorrowData.interestIndex = 1_100_000_000_000_000_000n;

      const result = openAction(snapshot).loans.repayWithCollateral(borrowerLoanId, 'borrower', USDC_POOL, 500n * E6);

      expect(result).toEqual({ principalPaid: 400n * E6, interestPaid: 100n * E6, fAmount: 500n * E6 });
      const loan = loanOf(snapshot, borrowerLoanId);
      expect(loan.collaterals.get(USDC_POOL)?.balance).toBe(1_500n * E6);
      expect(loan.borrows.get(USDC_POOL)).toMatchObject({ amount: 600n * E6, balance: 600n * E6 });
      expect(loanPoolOf(snapshot, USDC_POOL).collateralUsed).toBe(11_500n * E6);
      expect(loanPoolOf(snapshot, USDC_POOL).borrowUsed).toBe(600n * E6);
      expect(poolOf(snapshot, USDC_POOL).depositData.totalAmount).toBe(11_600n * E6);
    });
  });

  describe('switchBorrowType', () => {
    it('moves a variable position to the stable rate and back', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      openAction(snapshot).loans.borrow(borrowerLoanId, 'borrower', USDC_POOL, 100n * E6, 0n);

      openAction(snapshot).loans.switchBorrowType(borrowerLoanId, 'borrower', USDC_POOL, 100_000_000_000_000_000n);
      expect(loanOf(snapshot, borrowerLoanId).borrows.get(USDC_POOL)).toMatchObject({
        lastInterestIndex: E18,
        stableInterestRate: 70_266_666_666_666_666n,
        lastStableUpdateTimestamp: T0,
      });
      expect(poolOf(snapshot, USDC_POOL).variableBorrowData.totalAmount).toBe(0n);
      expect(poolOf(snapshot, USDC_POOL).stableBorrowData.totalAmount).toBe(100n * E6);
      expect(poolOf(snapshot, USDC_POOL).stableBorrowData.averageInterestRate).toBe(70_266_666_660_000_000n);

      const action = openAction(snapshot);
      action.loans.switchBorrowType(borrowerLoanId, 'borrower', USDC_POOL, 0n);
      expect(loanOf(snapshot, borrowerLoanId).borrows.get(USDC_POOL)).toMatchObject({
        lastInterestIndex: E18,
        stableInterestRate: 0n,
        lastStableUpdateTimestamp: 0n,
      });
      expect(poolOf(snapshot, USDC_POOL).stableBorrowData.averageInterestRate).toBe(0n);
      expect(poolOf(snapshot, USDC_POOL).variableBorrowData.totalAmount).toBe(100n * E6);
      expect(action.events[action.events.length - 1]).toEqual({
        type: 'SwitchBorrowType',
        loanId: borrowerLoanId,
        poolId: USDC_POOL,
        isStable: false,
      });
    });

    it('needs a maximum stable rate to switch to stable', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      openAction(snapshot).loans.borrow(borrowerLoanId, 'borrower', USDC_POOL, 100n * E6, 0n);
      expect(
        errorOf(() => openAction(snapshot).loans.switchBorrowType(borrowerLoanId, 'borrower', USDC_POOL, 0n))?.code
      ).toBe('MaxStableRateExceeded');
    });
  });

  describe('rebalance', () => {
    function withStableBorrow(rate: bigint) {
      const hub = setupHub();
      openAction(hub.snapshot).loans.borrow(hub.borrowerLoanId, 'borrower', USDC_POOL, 100n * E6, 100_000_000_000_000_000n);
      const borrow = loanOf(hub.snapshot, hub.borrowerLoanId).borrows.get(USDC_POOL);
      if (borrow) borrow.stableInterestRate = rate;
      return hub;
    }

    it('re-prices a stable position at or above the down threshold', () => {
      const { snapshot, borrowerLoanId } = withStableBorrow(500_000_000_000_000_000n);
      const action = openAction(snapshot);
      action.loans.rebalanceDown(borrowerLoanId, USDC_POOL);

      expect(loanOf(snapshot, borrowerLoanId).borrows.get(USDC_POOL)?.stableInterestRate).toBe(320_266_666_666_666_666n);
      expect(poolOf(snapshot, USDC_POOL).stableBorrowData.averageInterestRate).toBe(320_266_666_660_000_000n);
      expect(action.events[action.events.length - 1]).toEqual({
        type: 'RebalanceDown',
        loanId: borrowerLoanId,
        poolId: USDC_POOL,
        stableInterestRate: 320_266_666_666_666_666n,
      });
    });

    it('leaves positions below the down threshold alone', () => {
      const { snapshot, borrowerLoanId } = withStableBorrow(384_319_999_999_999_998n);
      const error = errorOf(() => openAction(snapshot).loans.rebalanceDown(borrowerLoanId, USDC_POOL));
      expect(error?.code).toBe('RebalanceDownThresholdNotReached');
      expect(error?.details.threshold).toBe(384_319_999_999_999_999n);
    });

    it('only rebalances stable positions', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      openAction(snapshot).loans.borrow(borrowerLoanId, 'borrower', USDC_POOL, 100n * E6, 0n);
      expect(errorOf(() => openAction(snapshot).loans.rebalanceUp(borrowerLoanId, USDC_POOL))?.code).toBe(
        'NoStableBorrowInLoanForPool'
      );
    });
  });

  describe('liquidate', () => {
    function liquidatable() {
      const hub = setupHub();
      openAction(hub.snapshot).loans.borrow(hub.borrowerLoanId, 'borrower', USDC_POOL, 1_000n * E6, 0n);
      const liquidatorLoanId = createLoan(hub.snapshot, 'liquidator');
      openAction(hub.snapshot).loans.deposit(liquidatorLoanId, 'liquidator', USDC_POOL, 1_000n * E6);
      return { ...hub, liquidatorLoanId };
    }

    const ethAt1400 = { ethPrice: 1_400n * E18 };

    it('repays up to target health and moves collateral and debt to the liquidator', () => {
      const { snapshot, borrowerLoanId, liquidatorLoanId } = liquidatable();
      const action = openAction(snapshot, ethAt1400);
      const amounts = action.loans.liquidate(borrowerLoanId, liquidatorLoanId, 'liquidator', ETH_POOL, USDC_POOL, 1_000n * E6, 0n);

      expect(amounts).toEqual({
        repayAmount: 217_391_304n,
        seizedFAmount: 161_490_682_971_428_571n,
        reserveFAmount: 621_118_011_428_571n,
        liquidatorFAmount: 160_869_564_960_000_000n,
      });

      const violator = loanOf(snapshot, borrowerLoanId);
      expect(violator.collaterals.get(ETH_POOL)?.balance).toBe(838_509_317_028_571_429n);
      expect(violator.borrows.get(USDC_POOL)).toMatchObject({ amount: 782_608_696n, balance: 782_608_696n });

      const liquidator = loanOf(snapshot, liquidatorLoanId);
      expect(liquidator.collaterals.get(ETH_POOL)).toEqual({ balance: 160_869_564_960_000_000n, rewardIndex: 0n });
      expect(liquidator.borrows.get(USDC_POOL)).toEqual({
        amount: 217_391_304n,
        balance: 217_391_304n,
        lastInterestIndex: E18,
        stableInterestRate: 0n,
        lastStableUpdateTimestamp: 0n,
        rewardIndex: 0n,
      });

      expect(loanPoolOf(snapshot, ETH_POOL).collateralUsed).toBe(999_378_881_988_571_429n);
      expect(loanPoolOf(snapshot, USDC_POOL).borrowUsed).toBe(1_000n * E6);
      expect(action.tokenInstructions).toEqual([
        { kind: 'mint', poolId: ETH_POOL, account: 'fee-recipient', fAmount: 621_118_011_428_571n },
      ]);
      expect(action.events[action.events.length - 1]).toEqual({
        type: 'Liquidate',
        violatorLoanId: borrowerLoanId,
        liquidatorLoanId,
        colPoolId: ETH_POOL,
        borPoolId: USDC_POOL,
        repayBorrowAmount: 217_391_304n,
        liquidatorCollateralFAmount: 160_869_564_960_000_000n,
        reserveCollateralFAmount: 621_118_011_428_571n,
      });
    });

    it('rejects seizing less than the liquidator asked for', () => {
      const { snapshot, borrowerLoanId, liquidatorLoanId } = liquidatable();
      const error = capacityErrorOf(() =>
        openAction(snapshot, ethAt1400).loans.liquidate(
          borrowerLoanId,
          liquidatorLoanId,
          'liquidator',
          ETH_POOL,
          USDC_POOL,
          1_000n * E6,
          160_869_564_960_000_001n
        )
      );
      expect(error?.code).toBe('InsufficientSeized');
      expect(error?.current).toBe(160_869_564_960_000_000n);
    });

    it('rejects liquidating a healthy loan', () => {
      const { snapshot, borrowerLoanId, liquidatorLoanId } = liquidatable();
      const error = errorOf(() =>
        openAction(snapshot).loans.liquidate(borrowerLoanId, liquidatorLoanId, 'liquidator', ETH_POOL, USDC_POOL, E6, 0n)
      );
      expect(error?.code).toBe('OverCollateralizedLoan');
      expect(error?.category).toBe('SOLVENCY');
    });

    it('rejects self-liquidation and mismatched loan types', () => {
      const { snapshot, borrowerLoanId } = liquidatable();
      expect(
        errorOf(() =>
          openAction(snapshot, ethAt1400).loans.liquidate(borrowerLoanId, borrowerLoanId, 'borrower', ETH_POOL, USDC_POOL, E6, 0n)
        )?.code
      ).toBe('SameLoan');

      const setup = openAction(snapshot);
      setup.loanTypes.createLoanType(2, 10_500n);
      setup.loanTypes.addPoolToLoanType(2, USDC_POOL, createMockLoanPoolParams());
      const otherLoanId = openAction(snapshot).loans.createUserLoan('1', 'other', 2, 'other loan').loanId;
      expect(
        errorOf(() =>
          openAction(snapshot, ethAt1400).loans.liquidate(borrowerLoanId, otherLoanId, 'other', ETH_POOL, USDC_POOL, E6, 0n)
        )?.code
      ).toBe('LoanTypeMismatch');
    });
  });

  describe('getLoanHealth', () => {
    it('reports values and ratios', () => {
      const { snapshot, borrowerLoanId } = setupHub();
      openAction(snapshot).loans.borrow(borrowerLoanId, 'borrower', USDC_POOL, 1_000n * E6, 0n);

      expect(openAction(snapshot).loans.getLoanHealth(borrowerLoanId)).toEqual({
        collateralValue: 2_000n * E18,
        borrowValue: 1_000n * E18,
        effectiveCollateralValue: 1_400n * E18,
        effectiveBorrowValue: 1_000n * E18,
        ltvRatio: 5_000n,
        borrowUtilisationRatio: 7_142n,
        liquidationMargin: 2_857n,
        isOverCollateralized: true,
      });
    });
  });
});
