/**
 * Base Chain Data Provider
 * HTTP plumbing shared by explorer-backed providers: base URL resolution,
 * request timeouts and error classification
 */

import * as bitcoin from 'bitcoinjs-lib';

import { getNetworkConfig } from '../config/networks.ts';
import { DecodeError, NetworkError, UnsupportedNetworkError } from '../errors/index.ts';
import type { FeeRates } from '../interfaces/fee.interface.ts';
import type { NetworkType } from '../interfaces/network.interface.ts';
import type {
  FetchLike,
  IChainDataProvider,
  ProviderOptions,
  UTXO,
} from '../interfaces/provider.interface.ts';
import { type Logger, silentLogger } from '../utils/logger.ts';

export interface ExplorerResponse {
  url: string;
  status: number;
  ok: boolean;
  body: string;
}

export abstract class BaseProvider implements IChainDataProvider {
  protected networkType: NetworkType;
  protected baseUrl?: string;
  protected timeout: number;
  protected fetchFn: FetchLike;
  protected logger: Logger;

  constructor(options: ProviderOptions, logger: Logger = silentLogger) {
    this.networkType = options.networkType;
    this.baseUrl = getNetworkConfig(options.networkType, options.baseUrl).apiUrl?.replace(/\/+$/, '');
    this.timeout = options.timeout ?? 30000;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = logger;
  }

  abstract getBalance(address: string): Promise<number>;
  abstract getUTXOs(address: string): Promise<UTXO[]>;
  abstract getFeeRates(): Promise<FeeRates>;
  abstract broadcastTransaction(hexTx: string): Promise<string>;

  getNetworkType(): NetworkType {
    return this.networkType;
  }

  /**
   * Explorer base URL; fails before any request is made when the network has none
   */
  protected requireBaseUrl(): string {
    if (!this.baseUrl) {
      throw new UnsupportedNetworkError(this.networkType);
    }
    return this.baseUrl;
  }

  /**
   * Issue a request against the explorer and read its body, both inside the
   * timeout window. Transport failures and timeouts become NetworkError;
   * HTTP status is left to the caller.
   */
  protected async request(path: string, init: RequestInit = {}): Promise<ExplorerResponse> {
    const url = `${this.requireBaseUrl()}${path}`;
    this.logger.debug?.('Explorer request', { method: init.method ?? 'GET', url });

    try {
      return await this.executeWithTimeout(async (signal) => {
        const response = await this.fetchFn(url, { ...init, signal });
        const body = await response.text();
        return { url, status: response.status, ok: response.ok, body };
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Request to ${url} failed: ${message}`, url, undefined, error);
    }
  }

  /**
   * GET a JSON document; non-2xx is a NetworkError, unparsable JSON a DecodeError
   */
  protected async getJson(path: string): Promise<{ url: string; data: unknown }> {
    const { url, status, ok, body } = await this.request(path);

    if (!ok) {
      throw new NetworkError(`Explorer returned HTTP ${status} for ${url}`, url, status);
    }

    try {
      return { url, data: JSON.parse(body) };
    } catch (error) {
      throw new DecodeError(`Malformed JSON from ${url}`, url, error);
    }
  }

  /**
   * Execute request with timeout; the signal is aborted when time runs out
   */
  protected async executeWithTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    timeout = this.timeout,
  ): Promise<T> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new Error(`Request timeout after ${timeout}ms`);
        // Settle first so the race reports the timeout, not the abort
        reject(error);
        controller.abort(error);
      }, timeout);
    });

    try {
      return await Promise.race([fn(controller.signal), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Validate Bitcoin address format for this provider's network
   */
  protected isValidAddress(address: string): boolean {
    try {
      bitcoin.address.toOutputScript(address, getNetworkConfig(this.networkType).network);
      return true;
    } catch {
      return false;
    }
  }
}
