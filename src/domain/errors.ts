export type LedgerErrorCode =
  | 'NoSuchVault'
  | 'AlreadyExists'
  | 'ZeroAmount'
  | 'InsufficientCollateral'
  | 'ExceedsDebt'
  | 'RatioViolation'
  | 'NotLiquidatable'
  | 'InvalidPrice'
  | 'TransferFailed'
  | 'ReentrantCall';

// Every ledger rejection is one of these; callers switch on `code`.
export abstract class LedgerError extends Error {
  abstract readonly code: LedgerErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NoSuchVaultError extends LedgerError {
  readonly code = 'NoSuchVault' as const;
  constructor(readonly owner: string) {
    super(`No vault for ${owner}`);
  }
}

export class AlreadyExistsError extends LedgerError {
  readonly code = 'AlreadyExists' as const;
  constructor(readonly owner: string) {
    super(`Vault already exists for ${owner}`);
  }
}

export class ZeroAmountError extends LedgerError {
  readonly code = 'ZeroAmount' as const;
  constructor() {
    super('Amount must be greater than zero');
  }
}

export class InsufficientCollateralError extends LedgerError {
  readonly code = 'InsufficientCollateral' as const;
  constructor(readonly requested: bigint, readonly available: bigint) {
    super(`Requested ${requested} exceeds locked collateral ${available}`);
  }
}

export class ExceedsDebtError extends LedgerError {
  readonly code = 'ExceedsDebt' as const;
  constructor(readonly requested: bigint, readonly outstanding: bigint) {
    super(`Repayment ${requested} exceeds outstanding debt ${outstanding}`);
  }
}

export class RatioViolationError extends LedgerError {
  readonly code = 'RatioViolation' as const;
  constructor(readonly collateral: bigint, readonly debt: bigint) {
    super(`Vault would fall below the collateralization ratio (collateral=${collateral}, debt=${debt})`);
  }
}

export class NotLiquidatableError extends LedgerError {
  readonly code = 'NotLiquidatable' as const;
  constructor(readonly owner: string) {
    super(`Vault ${owner} is above the liquidation threshold`);
  }
}

export class InvalidPriceError extends LedgerError {
  readonly code = 'InvalidPrice' as const;
  constructor(message = 'Price feed returned an invalid reading', options?: ErrorOptions) {
    super(message, options);
  }
}

export class TransferFailedError extends LedgerError {
  readonly code = 'TransferFailed' as const;
  constructor(message = 'Transfer failed', options?: ErrorOptions) {
    super(message, options);
  }
}

export class ReentrantCallError extends LedgerError {
  readonly code = 'ReentrantCall' as const;
  constructor(operation: string) {
    super(`Re-entrant call to ${operation} while another ledger operation is in progress`);
  }
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}

// Failures raised by the collaborators (token, asset rail). The ledger wraps
// these into TransferFailedError with the original as `cause`.
export class CollaboratorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnauthorizedCallerError extends CollaboratorError {
  constructor(readonly caller: string) {
    super(`Caller ${caller} is not authorized`);
  }
}

export class InsufficientBalanceError extends CollaboratorError {
  constructor(readonly account: string, readonly requested: bigint, readonly balance: bigint) {
    super(`Account ${account} holds ${balance}, needs ${requested}`);
  }
}

export class TransferRejectedError extends CollaboratorError {
  constructor(readonly recipient: string, options?: ErrorOptions) {
    super(`Recipient ${recipient} rejected the transfer`, options);
  }
}
