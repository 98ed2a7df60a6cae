/**
 * @module p2wpkh-wallet
 *
 * Single-address native SegWit (P2WPKH) wallet: derives one key from a
 * BIP39 mnemonic, spends its UTXOs into a payment plus change, signs with
 * BIP143 and broadcasts through an Esplora-compatible explorer.
 *
 * @example Sending from a stored wallet
 * ```typescript
 * import { ConfigLoader, Wallet } from 'p2wpkh-wallet';
 *
 * const config = ConfigLoader.loadConfig({ network: 'testnet' });
 * const wallet = await Wallet.load(config);
 * if (wallet) {
 *   const { txid, fee } = await wallet.send('tb1q...', 50_000, 'medium');
 * }
 * ```
 */

export * from './config/index.ts';
export * from './core/index.ts';
export * from './errors/index.ts';
export * from './interfaces/index.ts';
export * from './providers/index.ts';
export * from './storage/index.ts';
export * from './utils/index.ts';
