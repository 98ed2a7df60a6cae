/**
 * Broadcaster
 * Serializes a signed transaction and hands it to the chain provider
 */

import type { Transaction } from 'bitcoinjs-lib';

import { InvalidTransactionError } from '../errors/index.ts';
import type { IChainDataProvider } from '../interfaces/provider.interface.ts';
import type { ITransactionBroadcaster } from '../interfaces/transaction.interface.ts';
import { type Logger, silentLogger } from '../utils/logger.ts';

export class Broadcaster implements ITransactionBroadcaster {
  private provider: Pick<IChainDataProvider, 'broadcastTransaction'>;
  private logger: Logger;

  constructor(provider: Pick<IChainDataProvider, 'broadcastTransaction'>, logger: Logger = silentLogger) {
    this.provider = provider;
    this.logger = logger;
  }

  /**
   * Resolves to the txid the explorer accepted. Rejections propagate as
   * BroadcastError with the explorer's reason; nothing is retried.
   */
  async broadcast(signed: Transaction): Promise<string> {
    if (!signed.hasWitnesses()) {
      throw new InvalidTransactionError('Refusing to broadcast a transaction without witnesses');
    }

    const hex = signed.toHex();
    this.logger.info('Broadcasting transaction', { txid: signed.getId(), bytes: hex.length / 2 });

    const txid = await this.provider.broadcastTransaction(hex);
    if (txid !== signed.getId()) {
      this.logger.warn('Explorer returned an unexpected txid', { expected: signed.getId(), received: txid });
    }
    return txid;
  }
}
