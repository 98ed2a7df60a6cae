/**
 * Transaction Builder / Signer Interfaces
 */

import type { Transaction } from 'bitcoinjs-lib';

import type { FeeTier, IFeeRateSource } from './fee.interface.ts';
import type { NetworkType } from './network.interface.ts';
import type { UTXO } from './provider.interface.ts';

export interface BuildSummary {
  amount: number;
  fee: number;
  feeRate: number;
  feeTier: FeeTier;
  change: number;
  totalIn: number;
  estimatedSize: number;
}

export interface BuildResult {
  /** Unsigned: empty scriptSigs and witnesses */
  transaction: Transaction;
  summary: BuildSummary;
}

export interface ITransactionBuilder {
  build(
    recipient: string,
    amount: number,
    utxos: readonly UTXO[],
    feeTier?: FeeTier,
  ): Promise<BuildResult>;
}

export interface ITransactionSigner {
  /**
   * Returns a signed copy; `unsigned` is left untouched
   */
  sign(unsigned: Transaction, utxos: readonly UTXO[]): Transaction;
}

export interface ITransactionBroadcaster {
  broadcast(signed: Transaction): Promise<string>;
}

export interface TransactionBuilderConfig {
  network: NetworkType;
  /** The wallet's own address; receives the change output */
  changeAddress: string;
  feeSource: IFeeRateSource;
  defaultFeeTier?: FeeTier;
}
