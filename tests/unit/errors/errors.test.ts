import { describe, expect, it } from 'vitest';

import {
  type AnyWalletError,
  BroadcastError,
  ConfigError,
  DecodeError,
  InsufficientFundsError,
  InternalSigningError,
  InvalidAddressError,
  InvalidMnemonicError,
  InvalidTransactionError,
  isWalletError,
  NetworkError,
  UnsupportedNetworkError,
  UTXOLockError,
  WalletError,
} from '../../../src/errors/index.ts';

describe('Wallet errors', () => {
  const samples: AnyWalletError[] = [
    new NetworkError('timeout', 'https://explorer.test/api'),
    new DecodeError('bad body', 'https://explorer.test/api'),
    new UnsupportedNetworkError('regtest'),
    new InvalidAddressError('bc1qxyz', 'testnet'),
    new InsufficientFundsError(101260, 100000),
    new BroadcastError('min relay fee not met', 400),
    new InternalSigningError('bad key'),
    new InvalidTransactionError('bad amount'),
    new InvalidMnemonicError(),
    new UTXOLockError('held', 'ALREADY_LOCKED'),
    new ConfigError(['network is wrong']),
  ];

  it('should carry a distinct kind per class', () => {
    expect(samples.map((error) => error.kind)).toEqual([
      'NETWORK',
      'DECODE',
      'UNSUPPORTED_NETWORK',
      'INVALID_ADDRESS',
      'INSUFFICIENT_FUNDS',
      'BROADCAST',
      'INTERNAL_SIGNING',
      'INVALID_TRANSACTION',
      'INVALID_MNEMONIC',
      'UTXO_LOCK',
      'CONFIG',
    ]);
  });

  it('should all be Error and WalletError instances', () => {
    for (const error of samples) {
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(WalletError);
      expect(isWalletError(error)).toBe(true);
    }
  });

  it('should not claim foreign errors', () => {
    expect(isWalletError(new Error('plain'))).toBe(false);
    expect(isWalletError({ kind: 'NETWORK', message: 'lookalike' })).toBe(false);
  });

  it('should format messages with their details', () => {
    expect(new InsufficientFundsError(101260, 100000).message).toBe(
      'Insufficient funds: required 101260, available 100000',
    );
    expect(new BroadcastError('min relay fee not met').message).toBe(
      'Failed to broadcast transaction: min relay fee not met',
    );
    expect(new InvalidAddressError('bc1qxyz', 'testnet').message).toBe('Invalid address for testnet: bc1qxyz');
    expect(new ConfigError(['a', 'b']).message).toBe('Configuration validation failed: a, b');
  });

  it('should keep the underlying cause', () => {
    const cause = new Error('socket hang up');

    expect(new NetworkError('failed', 'https://explorer.test', undefined, cause).cause).toBe(cause);
  });

  it('should narrow on kind', () => {
    const summarize = (error: AnyWalletError): string => {
      switch (error.kind) {
        case 'INSUFFICIENT_FUNDS':
          return `short by ${error.required - error.available}`;
        case 'BROADCAST':
          return error.reason;
        default:
          return error.name;
      }
    };

    expect(summarize(new InsufficientFundsError(101260, 100000))).toBe('short by 1260');
    expect(summarize(new BroadcastError('txn-mempool-conflict'))).toBe('txn-mempool-conflict');
    expect(summarize(new InvalidMnemonicError())).toBe('InvalidMnemonicError');
  });
});
