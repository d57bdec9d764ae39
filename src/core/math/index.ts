/**
 * Lending Hub - Math Module
 */

export * from './fixed-point';
export * from './interest-rates';
export * from './asset-value';
