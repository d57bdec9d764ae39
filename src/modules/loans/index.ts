/**
 * Lending Hub - Loans Module
 *
 * Exports the loan risk engine: loan types, user loans, health and liquidation.
 */

export { LoanAccount, LoanContext, RepayResult, RepayWithCollateralResult, splitRepayment } from './loan.account';
export {
  LoanTypeRegistry,
  LoanTypeContext,
  MIN_LOAN_TARGET_HEALTH,
  MAX_COLLATERAL_FACTOR,
  MIN_BORROW_FACTOR,
  MAX_LIQUIDATION_BONUS,
  MAX_LIQUIDATION_FEE,
} from './loan-type.registry';
export { LoanError, LoanCapacityError, LoanErrorCode } from './loan.errors';
export { HealthContext, LoanValues, loanValues, loanHealth, isOverCollateralized, assertOverCollateralized } from './health';
export { LiquidationInput, LiquidationAmounts, calcLiquidationAmounts } from './liquidation';
export { generateLoanId } from './loan-id';
export * from './borrow-position';
