/**
 * Chain Data Provider Interface
 * Defines the contract for reading chain state and submitting transactions
 */

import type { FeeRates, IFeeRateSource } from './fee.interface.ts';
import type { NetworkType } from './network.interface.ts';

export interface UTXO {
  txid: string;
  vout: number;
  value: number;
  confirmed: boolean;
  blockHeight?: number;
  blockHash?: string;
  blockTime?: number;
}

export interface IChainDataProvider extends IFeeRateSource {
  /**
   * Confirmed balance in satoshis (funded minus spent)
   */
  getBalance(address: string): Promise<number>;

  /**
   * Every output the explorer reports as unspent for the address
   */
  getUTXOs(address: string): Promise<UTXO[]>;

  getFeeRates(): Promise<FeeRates>;

  /**
   * Submit a raw transaction; resolves to the accepted txid
   */
  broadcastTransaction(hexTx: string): Promise<string>;

  getNetworkType(): NetworkType;
}

/**
 * Subset of the global `fetch` the providers rely on
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ProviderOptions {
  networkType: NetworkType;
  /** Overrides the network's default explorer URL */
  baseUrl?: string;
  timeout?: number;
  fetch?: FetchLike;
}
