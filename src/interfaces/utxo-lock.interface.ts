/**
 * UTXO Lock Interface
 */

import type { UTXO } from './provider.interface.ts';

export interface UTXOLock {
  outpoint: string; // "txid:vout"
  expiresAt: number;
  /** Free-form label shown in conflict errors, e.g. "send" */
  purpose: string;
  lockId: string;
}

export interface IUTXOLockManager {
  lockUTXO(outpoint: string, purpose: string, durationMs?: number): string;
  unlockUTXO(lockId: string): boolean;
  isLocked(outpoint: string): boolean;
  /**
   * Lock every outpoint or none of them
   */
  lockMultiple(outpoints: readonly string[], purpose: string, durationMs?: number): string[];
  unlockMultiple(lockIds: readonly string[]): { successful: string[]; failed: string[] };
  getLockedUTXOs(): UTXOLock[];
  clearExpiredLocks(): number;
  /**
   * Split UTXOs into those free to spend and those held by a live lease.
   * Expired leases are swept first.
   */
  partition<T extends Pick<UTXO, 'txid' | 'vout'>>(utxos: readonly T[]): { available: T[]; locked: T[] };
}
