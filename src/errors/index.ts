/**
 * Custom Error Classes
 *
 * Every failure the wallet surfaces is a {@link WalletError} carrying a
 * `kind` tag, so callers can switch on the kind instead of parsing messages.
 */

export type WalletErrorKind =
  | 'NETWORK'
  | 'DECODE'
  | 'UNSUPPORTED_NETWORK'
  | 'INVALID_ADDRESS'
  | 'INSUFFICIENT_FUNDS'
  | 'BROADCAST'
  | 'INTERNAL_SIGNING'
  | 'INVALID_TRANSACTION'
  | 'INVALID_MNEMONIC'
  | 'UTXO_LOCK'
  | 'CONFIG';

export abstract class WalletError extends Error {
  abstract readonly kind: WalletErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WalletError';
  }
}

/**
 * Transport failure, timeout or a non-2xx answer from a read endpoint.
 * Safe for the caller to retry.
 */
export class NetworkError extends WalletError {
  readonly kind = 'NETWORK' as const;
  public url: string;
  public status?: number;

  constructor(message: string, url: string, status?: number, cause?: unknown) {
    super(message, { cause });
    this.name = 'NetworkError';
    this.url = url;
    this.status = status;
  }
}

export class DecodeError extends WalletError {
  readonly kind = 'DECODE' as const;
  public url: string;

  constructor(message: string, url: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DecodeError';
    this.url = url;
  }
}

export class UnsupportedNetworkError extends WalletError {
  readonly kind = 'UNSUPPORTED_NETWORK' as const;
  public network: string;

  constructor(network: string) {
    super(`Unsupported network: no explorer API configured for ${network}`);
    this.name = 'UnsupportedNetworkError';
    this.network = network;
  }
}

export class InvalidAddressError extends WalletError {
  readonly kind = 'INVALID_ADDRESS' as const;
  public address: string;
  public network: string;

  constructor(address: string, network: string) {
    super(`Invalid address for ${network}: ${address}`);
    this.name = 'InvalidAddressError';
    this.address = address;
    this.network = network;
  }
}

export class InsufficientFundsError extends WalletError {
  readonly kind = 'INSUFFICIENT_FUNDS' as const;
  public required: number;
  public available: number;

  constructor(required: number, available: number) {
    super(`Insufficient funds: required ${required}, available ${available}`);
    this.name = 'InsufficientFundsError';
    this.required = required;
    this.available = available;
  }
}

/**
 * The explorer refused the transaction. `reason` is the response body as
 * returned by the node (e.g. "min relay fee not met").
 */
export class BroadcastError extends WalletError {
  readonly kind = 'BROADCAST' as const;
  public reason: string;
  public status?: number;

  constructor(reason: string, status?: number) {
    super(`Failed to broadcast transaction: ${reason}`);
    this.name = 'BroadcastError';
    this.reason = reason;
    this.status = status;
  }
}

/**
 * Key material could not be turned into a signing key. Never expected after
 * a successful derivation.
 */
export class InternalSigningError extends WalletError {
  readonly kind = 'INTERNAL_SIGNING' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'InternalSigningError';
  }
}

export class InvalidTransactionError extends WalletError {
  readonly kind = 'INVALID_TRANSACTION' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidTransactionError';
  }
}

export class InvalidMnemonicError extends WalletError {
  readonly kind = 'INVALID_MNEMONIC' as const;

  constructor(message = 'Invalid mnemonic phrase') {
    super(message);
    this.name = 'InvalidMnemonicError';
  }
}

export class UTXOLockError extends WalletError {
  readonly kind = 'UTXO_LOCK' as const;
  public code: 'ALREADY_LOCKED' | 'MULTIPLE_CONFLICTS';
  public outpoints: string[];

  constructor(
    message: string,
    code: 'ALREADY_LOCKED' | 'MULTIPLE_CONFLICTS',
    outpoints: string[] = [],
  ) {
    super(message);
    this.name = 'UTXOLockError';
    this.code = code;
    this.outpoints = outpoints;
  }
}

export class ConfigError extends WalletError {
  readonly kind = 'CONFIG' as const;
  public problems: string[];

  constructor(problems: string[]) {
    super(`Configuration validation failed: ${problems.join(', ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

/**
 * Closed union of every concrete wallet error; `switch (error.kind)` narrows it.
 */
export type AnyWalletError =
  | NetworkError
  | DecodeError
  | UnsupportedNetworkError
  | InvalidAddressError
  | InsufficientFundsError
  | BroadcastError
  | InternalSigningError
  | InvalidTransactionError
  | InvalidMnemonicError
  | UTXOLockError
  | ConfigError;

export function isWalletError(value: unknown): value is AnyWalletError {
  return value instanceof WalletError;
}
