/**
 * Lending Hub - Pool Types
 *
 * FIXED-POINT UNITS (callers must track the domain of every field):
 * - 18dp: interest indices, interest rates, stableBorrowPercentage
 * - 6dp:  vr0..vr2, sr0..sr3, retentionRate, flashLoanFee
 * - 4dp:  utilisation/debt ratios, rebalance parameters
 * - 0dp:  token amounts (underlying or f-token), caps in whole USD
 */

export type PoolId = number;

/**
 * Oracle price of one whole token in USD (18dp) with the token's decimals
 */
export interface PriceFeed {
  price: bigint;
  decimals: number;
}

export interface DepositData {
  optimalUtilisationRatio: bigint;   // 4dp
  totalAmount: bigint;               // underlying units
  interestRate: bigint;              // 18dp
  interestIndex: bigint;             // 18dp, starts at 1e18
}

export interface VariableBorrowData {
  vr0: bigint;                       // 6dp
  vr1: bigint;                       // 6dp
  vr2: bigint;                       // 6dp
  totalAmount: bigint;
  interestRate: bigint;              // 18dp
  interestIndex: bigint;             // 18dp, starts at 1e18
}

export interface StableBorrowData {
  sr0: bigint;                       // 6dp
  sr1: bigint;                       // 6dp
  sr2: bigint;                       // 6dp
  sr3: bigint;                       // 6dp
  optimalStableToTotalDebtRatio: bigint;   // 4dp
  rebalanceUpUtilisationRatio: bigint;     // 4dp
  rebalanceUpDepositInterestRate: bigint;  // 4dp
  rebalanceDownDelta: bigint;              // 4dp
  totalAmount: bigint;
  interestRate: bigint;              // 18dp, offered to new stable borrows
  averageInterestRate: bigint;       // 18dp, weighted over existing stable borrows
}

export interface FeeData {
  flashLoanFee: bigint;              // 6dp
  retentionRate: bigint;             // 6dp
  fTokenFeeRecipient: string;
  tokenFeeRecipient: string;
  totalRetainedAmount: bigint;
}

export interface CapsData {
  deposit: bigint;                   // whole USD
  borrow: bigint;                    // whole USD
  stableBorrowPercentage: bigint;    // 18dp
}

export interface ConfigData {
  deprecated: boolean;
  stableBorrowSupported: boolean;
  canMintFToken: boolean;
  flashLoanSupported: boolean;
}

export interface Pool {
  poolId: PoolId;
  tokenDecimals: number;
  lastUpdateTimestamp: bigint;       // unix seconds
  depositData: DepositData;
  variableBorrowData: VariableBorrowData;
  stableBorrowData: StableBorrowData;
  feeData: FeeData;
  capsData: CapsData;
  configData: ConfigData;
}

/**
 * Pool creation parameters - everything an operator chooses.
 * Totals, indices, rates and timestamps are derived at creation.
 */
export interface PoolParams {
  poolId: PoolId;
  tokenDecimals: number;
  optimalUtilisationRatio: bigint;
  variableBorrow: Pick<VariableBorrowData, 'vr0' | 'vr1' | 'vr2'>;
  stableBorrow: Pick<
    StableBorrowData,
    | 'sr0'
    | 'sr1'
    | 'sr2'
    | 'sr3'
    | 'optimalStableToTotalDebtRatio'
    | 'rebalanceUpUtilisationRatio'
    | 'rebalanceUpDepositInterestRate'
    | 'rebalanceDownDelta'
  >;
  fees: Omit<FeeData, 'totalRetainedAmount'>;
  caps: CapsData;
  config: ConfigData;
}

export interface DepositPoolResult {
  fAmount: bigint;
  depositInterestIndex: bigint;
}

export interface WithdrawPoolResult {
  underlyingAmount: bigint;
  fAmount: bigint;
}

export interface BorrowPoolParams {
  variableInterestIndex: bigint;
  stableInterestRate: bigint;
}

export interface RebalanceDownPoolParams extends BorrowPoolParams {
  threshold: bigint;
}

/**
 * Receipt-token movement requested by an action, applied after commit
 */
export interface TokenInstruction {
  kind: 'mint' | 'burn';
  poolId: PoolId;
  account: string;
  fAmount: bigint;
}
