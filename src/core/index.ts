/**
 * @module Core
 * Key derivation, fee estimation, building, signing, broadcasting and the
 * wallet that sequences them.
 */

export * from './broadcaster.ts';
export { bip32, ECPair } from './ecc.ts';
export * from './fee-estimator.ts';
export * from './key-material.ts';
export * from './transaction-builder.ts';
export * from './transaction-signer.ts';
export * from './utxo-lock-manager.ts';
export * from './wallet.ts';
