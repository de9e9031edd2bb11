import type { Cents, Coin, CollectionDenialReason } from '@coinquest/shared';

export type HuntErrorCode =
  | 'INPUT_REJECTED'
  | 'COLLECTION_DENIED'
  | 'INVARIANT_VIOLATION'
  | 'DUPLICATE_COIN'
  | 'FOREIGN_COIN'
  | 'INVALID_COIN'
  | 'CREDIT_FAILED'
  | 'DUPLICATE_CREDIT'
  | 'CONFIG_INVALID';

export class HuntError extends Error {
  constructor(
    public code: HuntErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'HuntError';
  }
}

/** Malformed tick or query input. The tick is skipped, prior state kept. */
export class InputRejectedError extends HuntError {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super('INPUT_REJECTED', message);
    this.name = 'InputRejectedError';
  }
}

/** A user-facing denial, for callers that prefer exceptions to result tags */
export class CollectionDeniedError extends HuntError {
  constructor(
    public reason: CollectionDenialReason,
    message: string,
  ) {
    super('COLLECTION_DENIED', message);
    this.name = 'CollectionDeniedError';
  }
}

/** The engine found itself pointing at a coin its pool never removed */
export class InvariantViolationError extends HuntError {
  constructor(
    message: string,
    public coinId: string,
  ) {
    super('INVARIANT_VIOLATION', message);
    this.name = 'InvariantViolationError';
  }
}

export class CoinPoolError extends HuntError {
  constructor(
    code: 'DUPLICATE_COIN' | 'FOREIGN_COIN' | 'INVALID_COIN',
    message: string,
    public coinId: string,
  ) {
    super(code, message);
    this.name = 'CoinPoolError';
  }
}

/** The coin left the pool but the wallet did not take the credit */
export class CreditFailedError extends HuntError {
  constructor(
    message: string,
    public coin: Coin,
    public amount: Cents,
    public failure?: unknown,
  ) {
    super('CREDIT_FAILED', message);
    this.name = 'CreditFailedError';
  }
}

export class ConfigError extends HuntError {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super('CONFIG_INVALID', message);
    this.name = 'ConfigError';
  }
}
