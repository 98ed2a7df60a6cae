/**
 * Shared contracts between the wallet's components
 */

export type * from './fee.interface.ts';
export { FEE_TIERS, isFeeTier } from './fee.interface.ts';
export type * from './key.interface.ts';
export type * from './network.interface.ts';
export type * from './provider.interface.ts';
export type * from './storage.interface.ts';
export type * from './transaction.interface.ts';
export type * from './utxo-lock.interface.ts';
