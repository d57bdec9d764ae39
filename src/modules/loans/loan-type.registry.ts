/**
 * Lending Hub - Loan Type Registry
 *
 * Loan types are risk classes; each lists the pools a loan of that type may
 * use as collateral or borrow, with per-pool factors, caps, liquidation
 * terms and reward speeds.
 */

import { ONE_4_DP } from '../../core/math';
import {
  EventSink,
  LoanPool,
  LoanPoolParams,
  LoanType,
  LoanTypeEvent,
  LoanTypeId,
  PoolId,
} from '../../shared/types';
import { PoolError } from '../pools';
import { LoanError } from './loan.errors';

export const MIN_LOAN_TARGET_HEALTH = ONE_4_DP;
export const MAX_COLLATERAL_FACTOR = ONE_4_DP;
export const MIN_BORROW_FACTOR = ONE_4_DP;
export const MAX_LIQUIDATION_BONUS = ONE_4_DP;
export const MAX_LIQUIDATION_FEE = ONE_4_DP;

type LoanPoolField = Extract<LoanTypeEvent, { type: 'LoanPoolUpdated' }>['field'];

export interface LoanTypeContext {
  now: bigint;
  emit: EventSink;
  hasPool(poolId: PoolId): boolean;
  /** Accrue rewards at the old speeds before they change */
  updateRewardIndexes(loanTypeId: LoanTypeId, poolId: PoolId): void;
}

export class LoanTypeRegistry {
  constructor(
    private readonly loanTypes: Map<LoanTypeId, LoanType>,
    private readonly context: LoanTypeContext
  ) {}

  // ============================================
  // LOOKUPS
  // ============================================

  get(loanTypeId: LoanTypeId): LoanType {
    const loanType = this.loanTypes.get(loanTypeId);
    if (!loanType) {
      throw new LoanError('LoanTypeUnknown', `Unknown loan type ${loanTypeId}`, { loanTypeId });
    }
    return loanType;
  }

  getActive(loanTypeId: LoanTypeId): LoanType {
    const loanType = this.get(loanTypeId);
    if (loanType.isDeprecated) {
      throw new LoanError('LoanTypeDeprecated', `Loan type ${loanTypeId} is deprecated`, { loanTypeId });
    }
    return loanType;
  }

  getLoanPool(loanTypeId: LoanTypeId, poolId: PoolId): LoanPool {
    const loanPool = this.get(loanTypeId).pools.get(poolId);
    if (!loanPool) {
      throw new LoanError('LoanPoolUnknown', `Pool ${poolId} is not part of loan type ${loanTypeId}`, {
        loanTypeId,
        poolId,
      });
    }
    return loanPool;
  }

  getActiveLoanPool(loanTypeId: LoanTypeId, poolId: PoolId): LoanPool {
    const loanPool = this.getLoanPool(loanTypeId, poolId);
    if (loanPool.isDeprecated) {
      throw new LoanError('LoanPoolDeprecated', `Pool ${poolId} is deprecated in loan type ${loanTypeId}`, {
        loanTypeId,
        poolId,
      });
    }
    return loanPool;
  }

  // ============================================
  // LOAN TYPES
  // ============================================

  createLoanType(loanTypeId: LoanTypeId, loanTargetHealth: bigint): LoanType {
    if (this.loanTypes.has(loanTypeId)) {
      throw new LoanError('LoanTypeAlreadyCreated', `Loan type ${loanTypeId} already exists`, { loanTypeId });
    }
    if (loanTargetHealth < MIN_LOAN_TARGET_HEALTH) {
      throw new LoanError('LoanTargetHealthTooLow', `Loan target health ${loanTargetHealth} below ${MIN_LOAN_TARGET_HEALTH}`, {
        loanTargetHealth,
      });
    }

    const loanType: LoanType = { loanTypeId, loanTargetHealth, isDeprecated: false, pools: new Map() };
    this.loanTypes.set(loanTypeId, loanType);
    this.context.emit({ type: 'LoanTypeCreated', loanTypeId });
    return loanType;
  }

  deprecateLoanType(loanTypeId: LoanTypeId): void {
    const loanType = this.get(loanTypeId);
    if (loanType.isDeprecated) {
      throw new LoanError('LoanTypeAlreadyDeprecated', `Loan type ${loanTypeId} is already deprecated`, { loanTypeId });
    }
    loanType.isDeprecated = true;
    this.context.emit({ type: 'LoanTypeDeprecated', loanTypeId });
  }

  // ============================================
  // LOAN POOLS
  // ============================================

  addPoolToLoanType(loanTypeId: LoanTypeId, poolId: PoolId, params: LoanPoolParams): LoanPool {
    const loanType = this.getActive(loanTypeId);
    if (!this.context.hasPool(poolId)) {
      throw new PoolError('PoolUnknown', `Unknown pool ${poolId}`, { poolId });
    }
    if (loanType.pools.has(poolId)) {
      throw new LoanError('LoanPoolAlreadyAdded', `Pool ${poolId} already added to loan type ${loanTypeId}`, {
        loanTypeId,
        poolId,
      });
    }
    validateCollateralFactor(params.collateralFactor);
    validateBorrowFactor(params.borrowFactor);
    validateLiquidation(params.liquidationBonus, params.liquidationFee);

    const loanPool: LoanPool = {
      collateralUsed: 0n,
      borrowUsed: 0n,
      collateralCap: params.collateralCap,
      borrowCap: params.borrowCap,
      collateralFactor: params.collateralFactor,
      borrowFactor: params.borrowFactor,
      liquidationBonus: params.liquidationBonus,
      liquidationFee: params.liquidationFee,
      isDeprecated: false,
      reward: {
        lastUpdateTimestamp: this.context.now,
        minimumAmount: params.rewardMinimumAmount,
        collateralSpeed: params.rewardCollateralSpeed,
        borrowSpeed: params.rewardBorrowSpeed,
        collateralRewardIndex: 0n,
        borrowRewardIndex: 0n,
      },
    };
    loanType.pools.set(poolId, loanPool);
    this.context.emit({ type: 'LoanPoolAdded', loanTypeId, poolId });
    return loanPool;
  }

  deprecatePoolInLoanType(loanTypeId: LoanTypeId, poolId: PoolId): void {
    const loanPool = this.getLoanPool(loanTypeId, poolId);
    if (loanPool.isDeprecated) {
      throw new LoanError('LoanPoolAlreadyDeprecated', `Pool ${poolId} is already deprecated in loan type ${loanTypeId}`, {
        loanTypeId,
        poolId,
      });
    }
    loanPool.isDeprecated = true;
    this.context.emit({ type: 'LoanPoolDeprecated', loanTypeId, poolId });
  }

  updateLoanPoolCaps(loanTypeId: LoanTypeId, poolId: PoolId, collateralCap: bigint, borrowCap: bigint): void {
    const loanPool = this.getLoanPool(loanTypeId, poolId);
    loanPool.collateralCap = collateralCap;
    loanPool.borrowCap = borrowCap;
    this.loanPoolUpdated(loanTypeId, poolId, 'caps');
  }

  updateLoanPoolCollateralFactor(loanTypeId: LoanTypeId, poolId: PoolId, collateralFactor: bigint): void {
    const loanPool = this.getLoanPool(loanTypeId, poolId);
    validateCollateralFactor(collateralFactor);
    loanPool.collateralFactor = collateralFactor;
    this.loanPoolUpdated(loanTypeId, poolId, 'collateralFactor');
  }

  updateLoanPoolBorrowFactor(loanTypeId: LoanTypeId, poolId: PoolId, borrowFactor: bigint): void {
    const loanPool = this.getLoanPool(loanTypeId, poolId);
    validateBorrowFactor(borrowFactor);
    loanPool.borrowFactor = borrowFactor;
    this.loanPoolUpdated(loanTypeId, poolId, 'borrowFactor');
  }

  updateLoanPoolLiquidation(loanTypeId: LoanTypeId, poolId: PoolId, liquidationBonus: bigint, liquidationFee: bigint): void {
    const loanPool = this.getLoanPool(loanTypeId, poolId);
    validateLiquidation(liquidationBonus, liquidationFee);
    loanPool.liquidationBonus = liquidationBonus;
    loanPool.liquidationFee = liquidationFee;
    this.loanPoolUpdated(loanTypeId, poolId, 'liquidation');
  }

  updateLoanPoolRewardParams(
    loanTypeId: LoanTypeId,
    poolId: PoolId,
    collateralSpeed: bigint,
    borrowSpeed: bigint,
    minimumAmount: bigint
  ): void {
    const loanPool = this.getLoanPool(loanTypeId, poolId);
    this.context.updateRewardIndexes(loanTypeId, poolId);
    Object.assign(loanPool.reward, { collateralSpeed, borrowSpeed, minimumAmount });
    this.loanPoolUpdated(loanTypeId, poolId, 'rewardParams');
  }

  private loanPoolUpdated(loanTypeId: LoanTypeId, poolId: PoolId, field: LoanPoolField): void {
    this.context.emit({ type: 'LoanPoolUpdated', loanTypeId, poolId, field });
  }
}

// ============================================
// VALIDATION
// ============================================

function validateCollateralFactor(collateralFactor: bigint): void {
  if (collateralFactor > MAX_COLLATERAL_FACTOR) {
    throw new LoanError('CollateralFactorTooHigh', `Collateral factor ${collateralFactor} above ${MAX_COLLATERAL_FACTOR}`, {
      collateralFactor,
    });
  }
}

function validateBorrowFactor(borrowFactor: bigint): void {
  if (borrowFactor < MIN_BORROW_FACTOR) {
    throw new LoanError('BorrowFactorTooLow', `Borrow factor ${borrowFactor} below ${MIN_BORROW_FACTOR}`, { borrowFactor });
  }
}

function validateLiquidation(liquidationBonus: bigint, liquidationFee: bigint): void {
  if (liquidationBonus > MAX_LIQUIDATION_BONUS) {
    throw new LoanError('LiquidationBonusTooHigh', `Liquidation bonus ${liquidationBonus} above ${MAX_LIQUIDATION_BONUS}`, {
      liquidationBonus,
    });
  }
  if (liquidationFee > MAX_LIQUIDATION_FEE) {
    throw new LoanError('LiquidationFeeTooHigh', `Liquidation fee ${liquidationFee} above ${MAX_LIQUIDATION_FEE}`, {
      liquidationFee,
    });
  }
}
