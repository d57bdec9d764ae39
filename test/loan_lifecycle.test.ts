import { describe, it, expect } from '@jest/globals';
import { generateLoanId } from '../src/modules/loans';
import { createHub } from './fixtures/hub.fixtures';
import { E18, E6, ETH_POOL, LOAN_TYPE, USDC_POOL } from './fixtures/loan.fixtures';
import { T0 } from './fixtures/pool.fixtures';

const ONE_DAY = 86_400n;

async function lenderAndBorrower() {
  const setup = await createHub();
  const { hub } = setup;
  const lenderLoanId = await hub.createUserLoan('1', 'lender', LOAN_TYPE, 'savings');
  await hub.deposit(lenderLoanId, 'lender', USDC_POOL, 10_000n * E6);
  const borrowerLoanId = await hub.createUserLoan('1', 'borrower', LOAN_TYPE, 'leverage');
  await hub.deposit(borrowerLoanId, 'borrower', ETH_POOL, E18);
  return { ...setup, lenderLoanId, borrowerLoanId };
}

describe('Loan Lifecycle', () => {
  it('should open, borrow against and close a loan', async () => {
    const { hub, clock, repository, borrowerLoanId } = await lenderAndBorrower();
    expect(borrowerLoanId).toBe(generateLoanId('borrower', '1'));

    await hub.borrow(borrowerLoanId, 'borrower', USDC_POOL, 1_000n * E6, 0n);
    const health = await hub.getLoanHealth(borrowerLoanId);
    expect(health.effectiveCollateralValue).toBe(1_400n * E18);
    expect(health.effectiveBorrowValue).toBe(1_000n * E18);
    expect(health.isOverCollateralized).toBe(true);
    await expect(hub.withdraw(borrowerLoanId, 'borrower', ETH_POOL, E18, true)).rejects.toMatchObject({
      code: 'UnderCollateralizedLoan',
    });

    clock.advance(30n * ONE_DAY);
    const repaid = await hub.repay(borrowerLoanId, 'borrower', USDC_POOL, 2_000n * E6, 2_000n * E6);
    expect(repaid.principalPaid).toBe(1_000n * E6);
    expect(repaid.interestPaid > 0n).toBe(true);
    expect(repaid.principalPaid + repaid.interestPaid + repaid.excessPaid).toBe(2_000n * E6);

    const rewards = await hub.getUserPoolRewards('borrower', USDC_POOL);
    expect(rewards.interestPaid).toBe(repaid.interestPaid);

    const withdrawn = await hub.withdraw(borrowerLoanId, 'borrower', ETH_POOL, E18, true);
    expect(withdrawn).toEqual({ underlyingAmount: E18, fAmount: E18 });

    await hub.deleteUserLoan(borrowerLoanId, 'borrower');
    await expect(hub.getUserLoan(borrowerLoanId)).rejects.toMatchObject({ code: 'UnknownUserLoan' });
    expect(repository.dump().loans.has(borrowerLoanId)).toBe(false);
  });

  it('should leave stored state untouched when an action is rejected', async () => {
    const { hub, repository, published, borrowerLoanId } = await lenderAndBorrower();
    await hub.borrow(borrowerLoanId, 'borrower', USDC_POOL, 1_000n * E6, 0n);
    const before = repository.dump();
    const publishedBefore = published.length;

    await expect(hub.borrow(borrowerLoanId, 'borrower', USDC_POOL, 500n * E6, 0n)).rejects.toMatchObject({
      code: 'UnderCollateralizedLoan',
      category: 'SOLVENCY',
    });

    expect(repository.dump()).toEqual(before);
    expect(published).toHaveLength(publishedBefore);
    expect((await hub.getUserLoan(borrowerLoanId)).borrows.get(USDC_POOL)?.amount).toBe(1_000n * E6);
  });

  it('should publish events only after commit', async () => {
    const { hub, published, borrowerLoanId } = await lenderAndBorrower();
    const from = published.length;
    await hub.borrow(borrowerLoanId, 'borrower', USDC_POOL, 100n * E6, 0n);

    const types = published.slice(from).map((envelope) => envelope.event.type);
    expect(types[types.length - 1]).toBe('Borrow');
    expect(published[from]?.emittedAt).toBe(published[published.length - 1]?.emittedAt);
  });

  it('should move collateral in and out as receipt tokens', async () => {
    const { hub, tokens, lenderLoanId } = await lenderAndBorrower();

    await hub.withdrawFToken(lenderLoanId, 'lender', USDC_POOL, 'lender-wallet', 1_000n * E6);
    expect(await tokens.balanceOf(USDC_POOL, 'lender-wallet')).toBe(1_000n * E6);

    await hub.depositFToken(lenderLoanId, 'lender', USDC_POOL, 'lender-wallet', 400n * E6);
    expect(await tokens.balanceOf(USDC_POOL, 'lender-wallet')).toBe(600n * E6);
    expect((await hub.getUserLoan(lenderLoanId)).collaterals.get(USDC_POOL)?.balance).toBe(9_400n * E6);

    await expect(
      hub.depositFToken(lenderLoanId, 'lender', USDC_POOL, 'lender-wallet', 700n * E6)
    ).rejects.toMatchObject({ code: 'InsufficientFTokenBalance' });
  });

  it('should distribute epoch rewards by collateral points', async () => {
    const { hub, clock, lenderLoanId } = await lenderAndBorrower();
    const epoch = { poolId: USDC_POOL, epochIndex: 1 };

    expect(await hub.addEpoch(USDC_POOL, T0, T0 + ONE_DAY, 1_000n)).toBe(1);
    await hub.updateLoanPoolRewardParams(LOAN_TYPE, USDC_POOL, 10n ** 20n, 0n, 0n);

    clock.advance(100n);
    await hub.updateUserLoansPoolsRewards([lenderLoanId], ['lender']);
    expect((await hub.getUserPoolRewards('lender', USDC_POOL)).collateral).toBe(10_000n);
    await hub.updateAccountPoints(['lender'], [epoch]);

    await expect(hub.claimRewards('lender', [epoch])).rejects.toMatchObject({ code: 'EpochNotEnded' });

    clock.set(T0 + ONE_DAY);
    expect(await hub.getUnclaimedRewards('lender', [epoch])).toBe(1_000n);
    expect(await hub.claimRewards('lender', [epoch])).toBe(1_000n);
    expect(await hub.getUnclaimedRewards('lender', [epoch])).toBe(0n);
  });
});
