/**
 * Lending Hub - Loan Manager Module
 */

export { LoanManagerService } from './loan-manager.service';
export { ActionScope } from './action-scope';
export { ActionQueue } from './action-queue';
export { EventBus, EventSubscriber } from './event-bus';
export { SystemClock, ManualClock } from './clock';
export {
  InMemoryLendingRepository,
  InMemoryPriceOracle,
  InMemoryReceiptTokenLedger,
  createEmptySnapshot,
} from './in-memory';
export * from './types';
