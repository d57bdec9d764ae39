/**
 * Lending Hub - Pools Module
 */

export { PoolAccount, PoolContext } from './pool.account';
export { PoolError, PoolCapacityError, PoolErrorCode } from './pool.errors';
export {
  createPoolRecord,
  validatePoolParams,
  validateFeeData,
  validateCapsData,
  validateInterestRateCurves,
  validateOptimalUtilisationRatio,
} from './pool.config';
