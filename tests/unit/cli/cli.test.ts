import { beforeEach, describe, expect, it } from 'vitest';

import { NOT_INITIALIZED, parseSendArgs, resolveCommand, runCli, USAGE } from '../../../src/cli.ts';
import { ConfigLoader, type WalletConfig } from '../../../src/config/config-loader.ts';
import { keyMaterialFromMnemonic } from '../../../src/core/key-material.ts';
import { BroadcastError } from '../../../src/errors/index.ts';
import { MemoryMnemonicStore } from '../../../src/storage/memory-mnemonic-store.ts';
import { silentLogger } from '../../../src/utils/logger.ts';
import { ADDRESSES, TEST_MNEMONIC } from '../../fixtures/keys.ts';
import { SINGLE_UTXO } from '../../fixtures/utxos.ts';
import { InMemoryChainProvider } from '../../mocks/mockChainProvider.ts';

describe('CLI', () => {
  let config: WalletConfig;
  let provider: InMemoryChainProvider;
  let store: MemoryMnemonicStore;
  let out: string[];
  let err: string[];

  const run = (...argv: string[]) =>
    runCli(argv, {
      config,
      deps: { provider, store, logger: silentLogger },
      io: { out: (line) => out.push(line), err: (line) => err.push(line) },
    });

  const address = keyMaterialFromMnemonic(TEST_MNEMONIC, 'testnet').address;

  beforeEach(() => {
    config = { ...ConfigLoader.getDefaults(), logLevel: 'silent' };
    provider = new InMemoryChainProvider('testnet', SINGLE_UTXO);
    store = new MemoryMnemonicStore();
    out = [];
    err = [];
  });

  describe('resolveCommand', () => {
    it('should map aliases to commands', () => {
      expect(resolveCommand('s')).toBe('send');
      expect(resolveCommand('balance')).toBe('balance');
      expect(resolveCommand(undefined)).toBe('help');
      expect(resolveCommand('withdraw')).toBeNull();
    });
  });

  describe('parseSendArgs', () => {
    it('should split out the fee tier in either form', () => {
      expect(parseSendArgs(['tb1qx', '1000', '--fee-tier', 'low'])).toEqual({
        positional: ['tb1qx', '1000'],
        feeTier: 'low',
      });
      expect(parseSendArgs(['--fee-tier=medium', 'tb1qx', '1000'])).toEqual({
        positional: ['tb1qx', '1000'],
        feeTier: 'medium',
      });
      expect(parseSendArgs(['tb1qx', '1000'])).toEqual({ positional: ['tb1qx', '1000'], feeTier: undefined });
    });

    it('should reject unknown or missing tiers', () => {
      expect(() => parseSendArgs(['--fee-tier', 'urgent'])).toThrow(
        '--fee-tier must be one of low, medium, high (got urgent)',
      );
      expect(() => parseSendArgs(['--fee-tier'])).toThrow('--fee-tier must be one of low, medium, high (got nothing)');
    });
  });

  it('should print usage without a command', async () => {
    expect(await run()).toBe(0);
    expect(out).toEqual([USAGE]);
  });

  it('should fail on an unknown command', async () => {
    expect(await run('withdraw')).toBe(1);
    expect(err).toEqual(['Unknown command: withdraw', USAGE]);
  });

  it('should print the network of the stored wallet', async () => {
    await store.save(TEST_MNEMONIC);

    expect(await run('n')).toBe(0);
    expect(out).toEqual(['testnet']);
  });

  it.each(['address', 'balance', 'network', 'reset', 'send'])('should require a wallet for %s', async (command) => {
    expect(await run(command)).toBe(1);
    expect(err).toEqual([NOT_INITIALIZED]);
  });

  it('should create a wallet and show its mnemonic and address', async () => {
    expect(await run('c')).toBe(0);

    const stored = await store.load();
    expect(stored.split(' ')).toHaveLength(12);
    expect(out[0]).toBe(`Mnemonic: ${stored}`);
    expect(out[1].startsWith('Address: tb1q')).toBe(true);
  });

  it('should restore from mnemonic words', async () => {
    expect(await run('m', ...TEST_MNEMONIC.split(' '))).toBe(0);

    expect(out).toEqual([`Address: ${address}`]);
    expect(await store.load()).toBe(TEST_MNEMONIC);
  });

  it('should ask for words when restoring with none', async () => {
    expect(await run('mnemonic')).toBe(1);
    expect(err).toEqual(['Usage: wallet mnemonic <words...>']);
  });

  it('should report an invalid mnemonic with its kind', async () => {
    expect(await run('m', 'abandon', 'abandon')).toBe(1);
    expect(err).toEqual(['Error [INVALID_MNEMONIC]: Invalid mnemonic phrase']);
  });

  describe('with a stored wallet', () => {
    beforeEach(async () => {
      await store.save(TEST_MNEMONIC);
    });

    it('should print the address', async () => {
      expect(await run('a')).toBe(0);
      expect(out).toEqual([address]);
    });

    it('should print the balance in satoshis', async () => {
      provider.balance = 42000;

      expect(await run('b')).toBe(0);
      expect(out).toEqual(['42000 sats']);
    });

    it('should reset the wallet', async () => {
      expect(await run('r')).toBe(0);
      expect(out).toEqual(['Wallet reset']);
      expect(await store.load()).toBe('');
    });

    it('should send with the requested fee tier', async () => {
      expect(await run('s', ADDRESSES.testnetP2WPKH, '50000', '--fee-tier', 'medium')).toBe(0);

      expect(provider.broadcasts).toHaveLength(1);
      expect(out[0].startsWith('Transaction broadcast: ')).toBe(true);
      expect(out[1]).toBe('Amount: 50000 sats, fee: 1130 sats (5 sat/byte, medium)');
    });

    it('should print the raw explorer reason when broadcasting fails', async () => {
      provider.broadcastHandler = () => Promise.reject(new BroadcastError('min relay fee not met', 400));

      expect(await run('send', ADDRESSES.testnetP2WPKH, '50000')).toBe(1);
      expect(err).toEqual(['Error [BROADCAST]: min relay fee not met']);
    });

    it('should report insufficient funds', async () => {
      expect(await run('s', ADDRESSES.testnetP2WPKH, '99000')).toBe(1);
      expect(err).toEqual(['Error [INSUFFICIENT_FUNDS]: Insufficient funds: required 101260, available 100000']);
    });

    it('should reject a fractional amount', async () => {
      expect(await run('s', ADDRESSES.testnetP2WPKH, '12.5')).toBe(1);
      expect(err).toEqual(['Error: Amount must be a whole number of satoshis, got 12.5']);
      expect(provider.broadcasts).toEqual([]);
    });

    it('should require both recipient and amount', async () => {
      expect(await run('s', ADDRESSES.testnetP2WPKH)).toBe(1);
      expect(err).toEqual(['Usage: wallet send <to> <amount> [--fee-tier low|medium|high]']);
    });
  });
});
