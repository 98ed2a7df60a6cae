import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigLoader, DEFAULT_DERIVATION_PATH } from '../../../src/config/config-loader.ts';
import { ConfigError } from '../../../src/errors/index.ts';

describe('ConfigLoader', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'wallet-config-'));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  const load = (env: NodeJS.ProcessEnv = {}, options?: Parameters<typeof ConfigLoader.loadConfig>[0]) =>
    ConfigLoader.loadConfig(options, { env, cwd });

  const captureProblems = (fn: () => unknown): string[] => {
    try {
      fn();
    } catch (error) {
      if (error instanceof ConfigError) {
        return error.problems;
      }
      throw error;
    }
    throw new Error('expected a ConfigError');
  };

  it('should fall back to defaults', () => {
    expect(load()).toEqual({
      network: 'testnet',
      apiUrl: undefined,
      feeTier: 'high',
      timeout: 30000,
      dataDir: path.join(os.homedir(), '.p2wpkh-wallet'),
      derivationPath: DEFAULT_DERIVATION_PATH,
      lockDurationMs: 600000,
      logLevel: 'warn',
    });
  });

  it('should read environment variables', () => {
    const config = load({
      WALLET_NETWORK: 'bitcoin',
      WALLET_API_URL: 'https://explorer.test/',
      WALLET_FEE_TIER: 'low',
      WALLET_TIMEOUT_MS: '5000',
      WALLET_DATA_DIR: '/tmp/wallet-data',
      WALLET_DERIVATION_PATH: "m/84'/1'/0'/0/0",
      WALLET_LOCK_DURATION_MS: '120000',
      WALLET_LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({
      network: 'mainnet',
      apiUrl: 'https://explorer.test',
      feeTier: 'low',
      timeout: 5000,
      dataDir: '/tmp/wallet-data',
      derivationPath: "m/84'/1'/0'/0/0",
      lockDurationMs: 120000,
      logLevel: 'debug',
    });
  });

  it('should ignore blank environment variables', () => {
    expect(load({ WALLET_NETWORK: '  ' }).network).toBe('testnet');
  });

  it('should layer file < environment < runtime options', () => {
    fs.writeFileSync(
      path.join(cwd, '.wallet.json'),
      JSON.stringify({ network: 'mainnet', feeTier: 'medium', timeout: 8000 }),
    );

    const fromFile = load();
    expect(fromFile).toMatchObject({ network: 'mainnet', feeTier: 'medium', timeout: 8000 });

    const fromEnv = load({ WALLET_FEE_TIER: 'low' });
    expect(fromEnv).toMatchObject({ network: 'mainnet', feeTier: 'low', timeout: 8000 });

    const fromOptions = load({ WALLET_FEE_TIER: 'low' }, { feeTier: 'high', network: undefined });
    expect(fromOptions).toMatchObject({ network: 'mainnet', feeTier: 'high' });
  });

  it('should use wallet.config.json when .wallet.json is absent', () => {
    fs.writeFileSync(path.join(cwd, 'wallet.config.json'), JSON.stringify({ network: 'regtest' }));

    expect(load().network).toBe('regtest');
  });

  it('should report invalid JSON in the config file', () => {
    const file = path.join(cwd, '.wallet.json');
    fs.writeFileSync(file, '{ network: ');

    const problems = captureProblems(() => load());

    expect(problems).toHaveLength(1);
    expect(problems[0].startsWith(`${file} is not valid JSON`)).toBe(true);
  });

  it('should require the config file to hold an object', () => {
    const file = path.join(cwd, '.wallet.json');
    fs.writeFileSync(file, '["mainnet"]');

    expect(captureProblems(() => load())).toEqual([`${file} must contain a JSON object`]);
  });

  it('should list every invalid value at once', () => {
    const problems = captureProblems(() =>
      load({
        WALLET_NETWORK: 'signet',
        WALLET_TIMEOUT_MS: '10',
        WALLET_LOG_LEVEL: 'verbose',
      })
    );

    expect(problems).toEqual([
      'network must be mainnet, testnet or regtest (got signet)',
      'timeout must be an integer between 1000 and 300000 (got 10)',
      'logLevel must be debug, info, warn, error or silent (got verbose)',
    ]);
  });

  it('should reject a non-http API URL', () => {
    expect(captureProblems(() => load({ WALLET_API_URL: 'ftp://explorer.test' }))).toEqual([
      'apiUrl must be an http(s) URL (got ftp://explorer.test)',
    ]);
  });

  it('should reject a malformed derivation path', () => {
    expect(captureProblems(() => load({ WALLET_DERIVATION_PATH: '84/0' }))).toEqual([
      "derivationPath must look like m/84'/0'/0'/0/0 (got 84/0)",
    ]);
  });

  it('should reject an unknown fee tier and an out-of-range lock duration', () => {
    expect(captureProblems(() => load({ WALLET_FEE_TIER: 'urgent', WALLET_LOCK_DURATION_MS: '5' }))).toEqual([
      'feeTier must be low, medium or high (got urgent)',
      'lockDurationMs must be an integer between 1000 and 86400000 (got 5)',
    ]);
  });

  it('should throw a CONFIG kind error', () => {
    expect(() => load({ WALLET_NETWORK: 'signet' })).toThrow(
      'Configuration validation failed: network must be mainnet, testnet or regtest (got signet)',
    );
  });

  it('should document every environment variable', () => {
    const docs = ConfigLoader.getConfigDocumentation();

    for (const name of ['WALLET_NETWORK', 'WALLET_API_URL', 'WALLET_FEE_TIER', 'WALLET_LOG_LEVEL']) {
      expect(docs).toContain(name);
    }
  });
});
