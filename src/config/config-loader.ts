/**
 * Configuration Loader for the wallet
 * Loads configuration with priority:
 * 1. Runtime options (passed to loadConfig)
 * 2. Environment variables
 * 3. Config file (.wallet.json or wallet.config.json)
 * 4. Default values
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import process from 'node:process';

import { ConfigError } from '../errors/index.ts';
import { type FeeTier, isFeeTier } from '../interfaces/fee.interface.ts';
import type { NetworkType } from '../interfaces/network.interface.ts';
import { isLogLevel, type LogLevel } from '../utils/logger.ts';
import { isRecord } from '../utils/type-guards.ts';
import { parseNetworkType } from './networks.ts';

export interface WalletConfig {
  network: NetworkType;
  /** Explorer base URL; the network's default when unset */
  apiUrl?: string;
  feeTier: FeeTier;
  /** Per-request timeout in milliseconds */
  timeout: number;
  /** Directory holding mnemonic.txt */
  dataDir: string;
  derivationPath: string;
  /** How long a successful send keeps its inputs reserved */
  lockDurationMs: number;
  logLevel: LogLevel;
}

export interface ConfigSource {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

type RawConfig = Partial<Record<keyof WalletConfig, unknown>>;

export const ENV_VARS: Readonly<Record<keyof WalletConfig, string>> = {
  network: 'WALLET_NETWORK',
  apiUrl: 'WALLET_API_URL',
  feeTier: 'WALLET_FEE_TIER',
  timeout: 'WALLET_TIMEOUT_MS',
  dataDir: 'WALLET_DATA_DIR',
  derivationPath: 'WALLET_DERIVATION_PATH',
  lockDurationMs: 'WALLET_LOCK_DURATION_MS',
  logLevel: 'WALLET_LOG_LEVEL',
};

export const CONFIG_FILE_NAMES = ['.wallet.json', 'wallet.config.json'] as const;

export const DEFAULT_DERIVATION_PATH = "m/84'/0'/0'/0/0";

const TIMEOUT_RANGE = { min: 1000, max: 300000 };
const LOCK_DURATION_RANGE = { min: 1000, max: 24 * 60 * 60 * 1000 };
const CONFIG_KEYS: readonly (keyof WalletConfig)[] = [
  'network',
  'apiUrl',
  'feeTier',
  'timeout',
  'dataDir',
  'derivationPath',
  'lockDurationMs',
  'logLevel',
];

export class ConfigLoader {
  static getDefaults(): WalletConfig {
    return {
      network: 'testnet',
      feeTier: 'high',
      timeout: 30000,
      dataDir: path.join(os.homedir(), '.p2wpkh-wallet'),
      derivationPath: DEFAULT_DERIVATION_PATH,
      lockDurationMs: 10 * 60 * 1000,
      logLevel: 'warn',
    };
  }

  /**
   * Merge every layer and validate the result; throws ConfigError listing
   * all invalid values at once.
   */
  static loadConfig(options?: Partial<WalletConfig>, source: ConfigSource = {}): WalletConfig {
    const env = source.env ?? process.env;
    const cwd = source.cwd ?? process.cwd();

    const raw: RawConfig = {
      ...ConfigLoader.getDefaults(),
      ...ConfigLoader.loadConfigFile(cwd),
      ...ConfigLoader.loadConfigFromEnvironment(env),
      ...ConfigLoader.withoutUndefined(options ?? {}),
    };

    return ConfigLoader.validate(raw);
  }

  private static loadConfigFromEnvironment(env: NodeJS.ProcessEnv): RawConfig {
    const config: RawConfig = {};
    for (const key of CONFIG_KEYS) {
      const value = env[ENV_VARS[key]];
      if (value !== undefined && value.trim() !== '') {
        config[key] = value.trim();
      }
    }
    return config;
  }

  private static loadConfigFile(cwd: string): RawConfig {
    for (const name of CONFIG_FILE_NAMES) {
      const configPath = path.join(cwd, name);
      if (!fs.existsSync(configPath)) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      } catch (error) {
        throw new ConfigError([
          `${configPath} is not valid JSON (${error instanceof Error ? error.message : String(error)})`,
        ]);
      }
      if (!isRecord(parsed)) {
        throw new ConfigError([`${configPath} must contain a JSON object`]);
      }

      const config: RawConfig = {};
      for (const key of CONFIG_KEYS) {
        if (parsed[key] !== undefined) {
          config[key] = parsed[key];
        }
      }
      return config;
    }

    return {};
  }

  private static validate(raw: RawConfig): WalletConfig {
    const problems: string[] = [];
    const defaults = ConfigLoader.getDefaults();

    const network = typeof raw.network === 'string' ? parseNetworkType(raw.network) : null;
    if (!network) {
      problems.push(`network must be mainnet, testnet or regtest (got ${String(raw.network)})`);
    }

    let apiUrl: string | undefined;
    if (raw.apiUrl !== undefined) {
      apiUrl = ConfigLoader.parseUrl(raw.apiUrl) ?? undefined;
      if (!apiUrl) {
        problems.push(`apiUrl must be an http(s) URL (got ${String(raw.apiUrl)})`);
      }
    }

    const feeTier = typeof raw.feeTier === 'string' && isFeeTier(raw.feeTier) ? raw.feeTier : null;
    if (!feeTier) {
      problems.push(`feeTier must be low, medium or high (got ${String(raw.feeTier)})`);
    }

    const timeout = ConfigLoader.parseInteger(raw.timeout, TIMEOUT_RANGE);
    if (timeout === null) {
      problems.push(
        `timeout must be an integer between ${TIMEOUT_RANGE.min} and ${TIMEOUT_RANGE.max} (got ${String(raw.timeout)})`,
      );
    }

    const dataDir = typeof raw.dataDir === 'string' && raw.dataDir.length > 0 ? raw.dataDir : null;
    if (!dataDir) {
      problems.push('dataDir must be a non-empty path');
    }

    const derivationPath = typeof raw.derivationPath === 'string' &&
        /^m(\/\d+'?)+$/.test(raw.derivationPath)
      ? raw.derivationPath
      : null;
    if (!derivationPath) {
      problems.push(`derivationPath must look like m/84'/0'/0'/0/0 (got ${String(raw.derivationPath)})`);
    }

    const lockDurationMs = ConfigLoader.parseInteger(raw.lockDurationMs, LOCK_DURATION_RANGE);
    if (lockDurationMs === null) {
      problems.push(
        `lockDurationMs must be an integer between ${LOCK_DURATION_RANGE.min} and ${LOCK_DURATION_RANGE.max} (got ${
          String(raw.lockDurationMs)
        })`,
      );
    }

    const logLevel = typeof raw.logLevel === 'string' && isLogLevel(raw.logLevel) ? raw.logLevel : null;
    if (!logLevel) {
      problems.push(`logLevel must be debug, info, warn, error or silent (got ${String(raw.logLevel)})`);
    }

    if (problems.length > 0) {
      throw new ConfigError(problems);
    }

    return {
      network: network ?? defaults.network,
      apiUrl,
      feeTier: feeTier ?? defaults.feeTier,
      timeout: timeout ?? defaults.timeout,
      dataDir: dataDir ?? defaults.dataDir,
      derivationPath: derivationPath ?? defaults.derivationPath,
      lockDurationMs: lockDurationMs ?? defaults.lockDurationMs,
      logLevel: logLevel ?? defaults.logLevel,
    };
  }

  private static parseInteger(value: unknown, range: { min: number; max: number }): number | null {
    const parsed = typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed)) {
      return null;
    }
    return parsed >= range.min && parsed <= range.max ? parsed : null;
  }

  private static parseUrl(value: unknown): string | null {
    if (typeof value !== 'string') {
      return null;
    }
    try {
      const url = new URL(value);
      if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        return null;
      }
      return value.replace(/\/+$/, '');
    } catch {
      return null;
    }
  }

  private static withoutUndefined(options: Partial<WalletConfig>): RawConfig {
    const config: RawConfig = {};
    for (const key of CONFIG_KEYS) {
      if (options[key] !== undefined) {
        config[key] = options[key];
      }
    }
    return config;
  }

  /**
   * Get configuration documentation
   */
  static getConfigDocumentation(): string {
    return `
Environment Variables:
   ${ENV_VARS.network}=testnet            mainnet | testnet | regtest
   ${ENV_VARS.apiUrl}=https://...          Esplora base URL (required for regtest)
   ${ENV_VARS.feeTier}=high              low | medium | high
   ${ENV_VARS.timeout}=30000             request timeout in ms
   ${ENV_VARS.dataDir}=~/.p2wpkh-wallet   where mnemonic.txt is kept
   ${ENV_VARS.derivationPath}=m/84'/0'/0'/0/0
   ${ENV_VARS.lockDurationMs}=600000      input reservation after a send
   ${ENV_VARS.logLevel}=warn             debug | info | warn | error | silent

Configuration File:
   ${CONFIG_FILE_NAMES.join(' or ')} in the working directory, e.g.
   { "network": "mainnet", "feeTier": "medium" }

Priority: runtime options > environment > config file > defaults
    `;
  }
}
