/**
 * Lending Hub - Shared Types Export
 */

export * from './pool.types';
export * from './loan.types';
export * from './event.types';
export * from './reward.types';
