import { ApiError } from '../middleware/errorHandler.js';
import type { Money } from '../lib/money.js';

/**
 * A debit would have left the wallet below zero. Nothing was applied.
 */
export class InsufficientFundsError extends ApiError {
  readonly userId: string;
  readonly required: Money;
  readonly available: Money;

  constructor(userId: string, required: Money, available: Money) {
    super(400, 'WAL_001', 'Insufficient wallet balance. Please add money to your wallet', {
      required: required.toString(),
      available: available.toString(),
    });
    this.name = 'InsufficientFundsError';
    this.userId = userId;
    this.required = required;
    this.available = available;
  }
}

/**
 * The change would take the balance past what a wallet can hold. Nothing was applied.
 */
export class BalanceLimitError extends ApiError {
  constructor(userId: string, attempted: Money, limit: Money) {
    super(400, 'WAL_003', 'Wallet balance limit exceeded', {
      userId,
      attempted: attempted.toString(),
      limit: limit.toString(),
    });
    this.name = 'BalanceLimitError';
  }
}

export class InvalidReferenceError extends ApiError {
  constructor(maxLength: number) {
    super(400, 'WAL_004', `Reference must be at most ${maxLength} characters`);
    this.name = 'InvalidReferenceError';
  }
}

export class InvalidUserIdError extends ApiError {
  constructor(maxLength: number) {
    super(400, 'WAL_005', `User id must be 1 to ${maxLength} characters`);
    this.name = 'InvalidUserIdError';
  }
}

/**
 * The unit of work could not be started, locked or committed. Nothing was
 * persisted, so the caller may retry the whole operation.
 */
export class StorageUnavailableError extends ApiError {
  readonly retryable = true;

  constructor(message: string, cause?: unknown) {
    super(503, 'WAL_006', message);
    this.name = 'StorageUnavailableError';
    this.cause = cause;
  }
}

/**
 * A balance change and its transaction record disagree. Aborts the unit of work.
 */
export class InvariantViolationError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(500, 'WAL_007', message, details);
    this.name = 'InvariantViolationError';
  }
}
