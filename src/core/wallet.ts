/**
 * Wallet
 *
 * One key, one P2WPKH address. `send` runs fetch → reserve → build → sign →
 * broadcast once, stopping at the first failure; nothing is retried and no
 * partially built transaction survives a failed call.
 */

import type { WalletConfig } from '../config/config-loader.ts';
import { ConfigError } from '../errors/index.ts';
import type { FeeTier } from '../interfaces/fee.interface.ts';
import type { KeyMaterial } from '../interfaces/key.interface.ts';
import type { NetworkType } from '../interfaces/network.interface.ts';
import type { IChainDataProvider } from '../interfaces/provider.interface.ts';
import type { IMnemonicStore } from '../interfaces/storage.interface.ts';
import type { BuildSummary } from '../interfaces/transaction.interface.ts';
import type { IUTXOLockManager } from '../interfaces/utxo-lock.interface.ts';
import { EsploraProvider } from '../providers/esplora-provider.ts';
import { FileMnemonicStore } from '../storage/file-mnemonic-store.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { Broadcaster } from './broadcaster.ts';
import { generateMnemonic, keyMaterialFromMnemonic, normalizeMnemonic } from './key-material.ts';
import { TransactionBuilder } from './transaction-builder.ts';
import { TransactionSigner } from './transaction-signer.ts';
import { toOutpoint, UTXOLockManager } from './utxo-lock-manager.ts';

export type SendStage = 'idle' | 'utxos-fetched' | 'built' | 'signed' | 'broadcast';

export type SendState =
  | { stage: Exclude<SendStage, 'broadcast'> }
  | { stage: 'broadcast'; txid: string }
  | { stage: 'failed'; failedAt: Exclude<SendStage, 'idle'>; error: unknown };

const NEXT_STAGE: Record<Exclude<SendStage, 'broadcast'>, Exclude<SendStage, 'idle'>> = {
  idle: 'utxos-fetched',
  'utxos-fetched': 'built',
  built: 'signed',
  signed: 'broadcast',
};

export interface SendResult extends BuildSummary {
  txid: string;
  inputCount: number;
}

export interface WalletDependencies {
  provider: IChainDataProvider;
  store: IMnemonicStore;
  logger?: Logger;
  lockManager?: IUTXOLockManager;
  defaultFeeTier?: FeeTier;
  /** How long inputs stay reserved after a successful broadcast */
  lockDurationMs?: number;
}

export class Wallet {
  private keys: KeyMaterial;
  private provider: IChainDataProvider;
  private store: IMnemonicStore;
  private logger: Logger;
  private lockManager: IUTXOLockManager;
  private builder: TransactionBuilder;
  private signer: TransactionSigner;
  private broadcaster: Broadcaster;
  private defaultFeeTier: FeeTier;
  private lockDurationMs?: number;
  private state: SendState = { stage: 'idle' };

  constructor(keys: KeyMaterial, deps: WalletDependencies) {
    if (deps.provider.getNetworkType() !== keys.network) {
      throw new ConfigError([
        `provider network ${deps.provider.getNetworkType()} does not match wallet network ${keys.network}`,
      ]);
    }

    this.keys = keys;
    this.provider = deps.provider;
    this.store = deps.store;
    this.logger = deps.logger ?? new ConsoleLogger('warn', 'wallet');
    this.lockManager = deps.lockManager ?? new UTXOLockManager();
    this.defaultFeeTier = deps.defaultFeeTier ?? 'high';
    this.lockDurationMs = deps.lockDurationMs;

    this.builder = new TransactionBuilder(
      {
        network: keys.network,
        changeAddress: keys.address,
        feeSource: this.provider,
        defaultFeeTier: this.defaultFeeTier,
      },
      this.logger,
    );
    this.signer = new TransactionSigner(keys, this.logger);
    this.broadcaster = new Broadcaster(this.provider, this.logger);
  }

  /**
   * Generate a fresh 12-word mnemonic, persist it and open the wallet.
   * The phrase is returned so it can be shown to the user once.
   */
  static async create(
    config: WalletConfig,
    deps?: Partial<WalletDependencies>,
  ): Promise<{ wallet: Wallet; mnemonic: string }> {
    const mnemonic = generateMnemonic();
    const wallet = await Wallet.fromMnemonic(mnemonic, config, deps);
    return { wallet, mnemonic };
  }

  /**
   * Restore from a phrase and persist it, replacing any stored phrase
   */
  static async fromMnemonic(
    mnemonic: string,
    config: WalletConfig,
    deps?: Partial<WalletDependencies>,
  ): Promise<Wallet> {
    const phrase = normalizeMnemonic(mnemonic);
    const keys = keyMaterialFromMnemonic(phrase, config.network, config.derivationPath);
    const resolved = Wallet.resolveDependencies(config, deps);
    const wallet = new Wallet(keys, resolved);
    await resolved.store.save(phrase);
    return wallet;
  }

  /**
   * Open the wallet for the stored phrase, or null when nothing is stored
   */
  static async load(config: WalletConfig, deps?: Partial<WalletDependencies>): Promise<Wallet | null> {
    const resolved = Wallet.resolveDependencies(config, deps);
    const mnemonic = await resolved.store.load();
    if (mnemonic === '') {
      return null;
    }
    return new Wallet(keyMaterialFromMnemonic(mnemonic, config.network, config.derivationPath), resolved);
  }

  private static resolveDependencies(
    config: WalletConfig,
    deps: Partial<WalletDependencies> = {},
  ): WalletDependencies {
    const logger = deps.logger ?? new ConsoleLogger(config.logLevel, 'wallet');
    return {
      provider: deps.provider ?? new EsploraProvider(
        { networkType: config.network, baseUrl: config.apiUrl, timeout: config.timeout },
        logger,
      ),
      store: deps.store ?? new FileMnemonicStore(config.dataDir),
      logger,
      lockManager: deps.lockManager ?? new UTXOLockManager({ defaultLockDuration: config.lockDurationMs }),
      defaultFeeTier: deps.defaultFeeTier ?? config.feeTier,
      lockDurationMs: deps.lockDurationMs ?? config.lockDurationMs,
    };
  }

  getAddress(): string {
    return this.keys.address;
  }

  getNetwork(): NetworkType {
    return this.keys.network;
  }

  getBalance(): Promise<number> {
    return this.provider.getBalance(this.keys.address);
  }

  /**
   * Stage reached by the most recent send
   */
  getSendState(): SendState {
    return this.state;
  }

  /**
   * Pay `amount` satoshis to `to`, spending every UTXO not reserved by
   * another in-flight send. Resolves once the explorer accepted the
   * transaction.
   */
  async send(to: string, amount: number, feeTier: FeeTier = this.defaultFeeTier): Promise<SendResult> {
    let stage: Exclude<SendStage, 'broadcast'> = 'idle';
    let lockIds: string[] = [];
    this.state = { stage };

    try {
      const fetched = await this.provider.getUTXOs(this.keys.address);

      // No await between partition and lock: concurrent sends see the lease
      const { available, locked } = this.lockManager.partition(fetched);
      if (locked.length > 0) {
        this.logger.info('Skipping UTXOs reserved by another send', { count: locked.length });
      }
      lockIds = this.lockManager.lockMultiple(available.map(toOutpoint), 'send', this.lockDurationMs);
      stage = this.advance('utxos-fetched', { utxos: available.length });

      const { transaction, summary } = await this.builder.build(to, amount, available, feeTier);
      stage = this.advance('built', { fee: summary.fee, change: summary.change });

      const signed = this.signer.sign(transaction, available);
      stage = this.advance('signed', { txid: signed.getId() });

      const txid = await this.broadcaster.broadcast(signed);
      this.state = { stage: 'broadcast', txid };
      this.logger.info('Transaction broadcast', { txid, amount, fee: summary.fee });

      return { ...summary, txid, inputCount: available.length };
    } catch (error) {
      this.lockManager.unlockMultiple(lockIds);
      const failedAt = NEXT_STAGE[stage];
      this.state = { stage: 'failed', failedAt, error };
      this.logger.warn('Send failed', {
        failedAt,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Forget the stored mnemonic. The in-memory key stays usable until the
   * wallet object is dropped.
   */
  reset(): Promise<void> {
    return this.store.reset();
  }

  private advance<S extends Exclude<SendStage, 'idle' | 'broadcast'>>(
    stage: S,
    context: Record<string, unknown>,
  ): S {
    this.state = { stage };
    this.logger.debug?.(`Send stage: ${stage}`, context);
    return stage;
  }
}
