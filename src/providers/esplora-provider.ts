/**
 * Esplora Provider
 * Reads address state and fee recommendations from an Esplora/mempool.space
 * style explorer and broadcasts raw transactions through it
 */

import { BroadcastError, DecodeError, InvalidAddressError } from '../errors/index.ts';
import type { FeeRates } from '../interfaces/fee.interface.ts';
import type { UTXO } from '../interfaces/provider.interface.ts';
import {
  getOptionalNumber,
  getOptionalString,
  isNonNegativeInteger,
  isNonNegativeNumber,
  isRecord,
  isTxid,
} from '../utils/type-guards.ts';
import { BaseProvider } from './base-provider.ts';

/**
 * Fields of `/api/v1/fees/recommended`; hourFee and economyFee are required
 * to be well-formed but are not used by the wallet
 */
const RECOMMENDED_FEE_FIELDS = [
  'fastestFee',
  'halfHourFee',
  'hourFee',
  'minimumFee',
  'economyFee',
] as const;

export class EsploraProvider extends BaseProvider {
  async getBalance(address: string): Promise<number> {
    this.assertAddress(address);
    const { url, data } = await this.getJson(`/api/address/${address}`);

    const stats = isRecord(data) ? data.chain_stats : undefined;
    if (!isRecord(stats)) {
      throw new DecodeError('Address response is missing chain_stats', url);
    }

    const funded = stats.funded_txo_sum;
    const spent = stats.spent_txo_sum;
    if (!isNonNegativeInteger(funded) || !isNonNegativeInteger(spent)) {
      throw new DecodeError('chain_stats funded_txo_sum/spent_txo_sum must be non-negative integers', url);
    }
    if (spent > funded) {
      throw new DecodeError(`chain_stats spent (${spent}) exceeds funded (${funded})`, url);
    }

    return funded - spent;
  }

  async getUTXOs(address: string): Promise<UTXO[]> {
    this.assertAddress(address);
    const { url, data } = await this.getJson(`/api/address/${address}/utxo`);

    if (!Array.isArray(data)) {
      throw new DecodeError('UTXO response must be an array', url);
    }

    const utxos = data.map((entry: unknown, index) => this.decodeUTXO(entry, index, url));
    this.logger.debug?.('Fetched UTXOs', { address, count: utxos.length });
    return utxos;
  }

  async getFeeRates(): Promise<FeeRates> {
    const { url, data } = await this.getJson('/api/v1/fees/recommended');

    if (!isRecord(data)) {
      throw new DecodeError('Fee response must be an object', url);
    }
    for (const field of RECOMMENDED_FEE_FIELDS) {
      if (!isNonNegativeNumber(data[field])) {
        throw new DecodeError(`Fee response field ${field} must be a non-negative number`, url);
      }
    }

    return {
      high: Number(data.fastestFee),
      medium: Number(data.halfHourFee),
      low: Number(data.minimumFee),
    };
  }

  /**
   * POST the raw hex. A 2xx body is returned trimmed as the txid; a
   * rejection surfaces the explorer's body untouched.
   */
  async broadcastTransaction(hexTx: string): Promise<string> {
    const { status, ok, body } = await this.request('/api/tx', {
      method: 'POST',
      headers: { 'Content-Type': 'text/plain' },
      body: hexTx,
    });

    if (!ok) {
      this.logger.warn('Explorer rejected transaction', { status, reason: body });
      throw new BroadcastError(body, status);
    }

    // Accepted: the body is the explorer's txid, whatever its shape
    const txid = body.trim();
    if (!isTxid(txid)) {
      this.logger.warn('Broadcast accepted with an unexpected response body', { body });
    }
    return txid;
  }

  private decodeUTXO(entry: unknown, index: number, url: string): UTXO {
    if (
      !isRecord(entry) ||
      !isTxid(entry.txid) ||
      !isNonNegativeInteger(entry.vout) ||
      !isNonNegativeInteger(entry.value) ||
      !isRecord(entry.status) ||
      typeof entry.status.confirmed !== 'boolean'
    ) {
      throw new DecodeError(`Malformed UTXO at index ${index}`, url);
    }

    const utxo: UTXO = {
      txid: entry.txid.toLowerCase(),
      vout: entry.vout,
      value: entry.value,
      confirmed: entry.status.confirmed,
    };

    const blockHeight = getOptionalNumber(entry.status.block_height);
    const blockHash = getOptionalString(entry.status.block_hash);
    const blockTime = getOptionalNumber(entry.status.block_time);
    if (blockHeight !== undefined) utxo.blockHeight = blockHeight;
    if (blockHash !== undefined) utxo.blockHash = blockHash;
    if (blockTime !== undefined) utxo.blockTime = blockTime;

    return utxo;
  }

  private assertAddress(address: string): void {
    if (!this.isValidAddress(address)) {
      throw new InvalidAddressError(address, this.networkType);
    }
  }
}
