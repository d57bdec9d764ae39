export { LendingError, CapacityError, ErrorCategory, ErrorDetail, Result, isLendingError } from './lending.error';
