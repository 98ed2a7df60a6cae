/**
 * Transaction Builder
 *
 * Spends every UTXO it is handed into exactly two outputs: the payment and
 * the change back to the wallet.
 */

import { Buffer } from 'node:buffer';

import * as bitcoin from 'bitcoinjs-lib';

import { toBitcoinNetwork } from '../config/networks.ts';
import {
  InsufficientFundsError,
  InvalidAddressError,
  InvalidTransactionError,
} from '../errors/index.ts';
import type { FeeRates, FeeTier, IFeeRateSource } from '../interfaces/fee.interface.ts';
import type { NetworkType } from '../interfaces/network.interface.ts';
import type { UTXO } from '../interfaces/provider.interface.ts';
import type {
  BuildResult,
  ITransactionBuilder,
  TransactionBuilderConfig,
} from '../interfaces/transaction.interface.ts';
import { type Logger, silentLogger } from '../utils/logger.ts';
import { isTxid } from '../utils/type-guards.ts';
import './ecc.ts';
import { FeeEstimator } from './fee-estimator.ts';

export const TX_VERSION = 2;
export const TX_LOCKTIME = 0;
/**
 * Signals replace-by-fee (BIP125) without enabling a relative locktime
 */
export const RBF_SEQUENCE = 0xfffffffd;
/**
 * Payment plus change
 */
export const OUTPUT_COUNT = 2;

export class TransactionBuilder implements ITransactionBuilder {
  private networkType: NetworkType;
  private network: bitcoin.Network;
  private changeScript: Buffer;
  private feeSource: IFeeRateSource;
  private defaultFeeTier: FeeTier;
  private feeEstimator = new FeeEstimator();
  private logger: Logger;

  constructor(config: TransactionBuilderConfig, logger: Logger = silentLogger) {
    this.networkType = config.network;
    this.network = toBitcoinNetwork(config.network);
    this.feeSource = config.feeSource;
    this.defaultFeeTier = config.defaultFeeTier ?? 'high';
    this.logger = logger;

    const changeScript = this.toOutputScript(config.changeAddress);
    if (!changeScript) {
      throw new InvalidAddressError(config.changeAddress, config.network);
    }
    this.changeScript = changeScript;
  }

  /**
   * Fetch fee rates, then assemble the unsigned transaction
   */
  async build(
    recipient: string,
    amount: number,
    utxos: readonly UTXO[],
    feeTier: FeeTier = this.defaultFeeTier,
  ): Promise<BuildResult> {
    this.assertAmount(amount);
    const feeRates = await this.feeSource.getFeeRates();
    return this.assemble(recipient, amount, utxos, feeRates, feeTier);
  }

  /**
   * Deterministic part of {@link build}: same arguments, same bytes.
   */
  assemble(
    recipient: string,
    amount: number,
    utxos: readonly UTXO[],
    feeRates: FeeRates,
    feeTier: FeeTier = this.defaultFeeTier,
  ): BuildResult {
    this.assertAmount(amount);

    const { fee, feeRate, size } = this.feeEstimator.feeForTier(
      feeRates,
      feeTier,
      utxos.length,
      OUTPUT_COUNT,
    );
    const totalIn = utxos.reduce((sum, utxo) => sum + utxo.value, 0);

    if (amount + fee > totalIn) {
      throw new InsufficientFundsError(amount + fee, totalIn);
    }

    const change = totalIn - amount - fee;

    const recipientScript = this.toOutputScript(recipient);
    if (!recipientScript) {
      throw new InvalidAddressError(recipient, this.networkType);
    }

    const transaction = new bitcoin.Transaction();
    transaction.version = TX_VERSION;
    transaction.locktime = TX_LOCKTIME;

    for (const utxo of utxos) {
      if (!isTxid(utxo.txid)) {
        throw new InvalidTransactionError(`Invalid UTXO txid: ${utxo.txid}`);
      }
      // txids are displayed byte-reversed
      transaction.addInput(Buffer.from(utxo.txid, 'hex').reverse(), utxo.vout, RBF_SEQUENCE);
    }

    transaction.addOutput(recipientScript, amount);
    // Emitted even at zero value
    transaction.addOutput(this.changeScript, change);

    this.logger.debug?.('Assembled unsigned transaction', {
      inputs: utxos.length,
      amount,
      fee,
      feeRate,
      feeTier,
      change,
    });

    return {
      transaction,
      summary: {
        amount,
        fee,
        feeRate,
        feeTier,
        change,
        totalIn,
        estimatedSize: size,
      },
    };
  }

  private toOutputScript(address: string): Buffer | null {
    try {
      return bitcoin.address.toOutputScript(address, this.network);
    } catch {
      return null;
    }
  }

  private assertAmount(amount: number): void {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new InvalidTransactionError(`Amount must be a positive integer number of satoshis, got ${amount}`);
    }
  }
}
