export * from './connection';
export * from './records';
export * from './lending.repository';
export * from './market.repository';
