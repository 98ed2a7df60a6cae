/**
 * UTXO Lock Manager
 * In-memory leases keyed by outpoint, so overlapping sends from one wallet
 * never pick the same inputs
 *
 * All operations are synchronous: a check followed by a lock cannot be
 * interleaved with another send.
 */

import { randomUUID } from 'node:crypto';

import { UTXOLockError } from '../errors/index.ts';
import type { IUTXOLockManager, UTXOLock } from '../interfaces/utxo-lock.interface.ts';
import type { UTXO } from '../interfaces/provider.interface.ts';

export function toOutpoint(utxo: Pick<UTXO, 'txid' | 'vout'>): string {
  return `${utxo.txid}:${utxo.vout}`;
}

export interface UTXOLockManagerOptions {
  defaultLockDuration?: number;
  now?: () => number;
}

export class UTXOLockManager implements IUTXOLockManager {
  private locks = new Map<string, UTXOLock>(); // outpoint -> lock
  private lockIdToOutpoint = new Map<string, string>(); // lockId -> outpoint
  private defaultLockDuration: number;
  private now: () => number;

  constructor(options: UTXOLockManagerOptions = {}) {
    this.defaultLockDuration = options.defaultLockDuration ?? 10 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  lockUTXO(outpoint: string, purpose: string, durationMs?: number): string {
    const existingLock = this.getLockInfo(outpoint);
    if (existingLock) {
      throw new UTXOLockError(
        `UTXO ${outpoint} is already locked (purpose: ${existingLock.purpose}, expires: ${
          new Date(existingLock.expiresAt).toISOString()
        })`,
        'ALREADY_LOCKED',
        [outpoint],
      );
    }

    const lockId = `lock_${randomUUID()}`;
    const lock: UTXOLock = {
      outpoint,
      expiresAt: this.now() + (durationMs ?? this.defaultLockDuration),
      purpose,
      lockId,
    };

    this.locks.set(outpoint, lock);
    this.lockIdToOutpoint.set(lockId, outpoint);

    return lockId;
  }

  unlockUTXO(lockId: string): boolean {
    const outpoint = this.lockIdToOutpoint.get(lockId);
    if (!outpoint) {
      return false;
    }

    const lock = this.locks.get(outpoint);
    this.lockIdToOutpoint.delete(lockId);
    if (!lock || lock.lockId !== lockId) {
      return false;
    }

    this.locks.delete(outpoint);
    return true;
  }

  isLocked(outpoint: string): boolean {
    return this.getLockInfo(outpoint) !== null;
  }

  lockMultiple(outpoints: readonly string[], purpose: string, durationMs?: number): string[] {
    const conflicts = outpoints.filter((outpoint) => this.isLocked(outpoint));
    if (conflicts.length > 0) {
      throw new UTXOLockError(
        `Cannot lock UTXOs - the following are already locked: ${conflicts.join(', ')}`,
        'MULTIPLE_CONFLICTS',
        conflicts,
      );
    }

    const lockIds: string[] = [];
    try {
      for (const outpoint of outpoints) {
        lockIds.push(this.lockUTXO(outpoint, purpose, durationMs));
      }
      return lockIds;
    } catch (error) {
      // duplicate outpoints in the request
      this.unlockMultiple(lockIds);
      throw error;
    }
  }

  unlockMultiple(lockIds: readonly string[]): { successful: string[]; failed: string[] } {
    const successful: string[] = [];
    const failed: string[] = [];

    for (const lockId of lockIds) {
      if (this.unlockUTXO(lockId)) {
        successful.push(lockId);
      } else {
        failed.push(lockId);
      }
    }

    return { successful, failed };
  }

  getLockInfo(outpoint: string): UTXOLock | null {
    const lock = this.locks.get(outpoint);
    if (!lock) {
      return null;
    }

    if (lock.expiresAt <= this.now()) {
      this.locks.delete(outpoint);
      this.lockIdToOutpoint.delete(lock.lockId);
      return null;
    }

    return { ...lock };
  }

  getLockedUTXOs(): UTXOLock[] {
    this.clearExpiredLocks();
    return Array.from(this.locks.values(), (lock) => ({ ...lock }));
  }

  clearExpiredLocks(): number {
    const now = this.now();
    let clearedCount = 0;

    for (const [outpoint, lock] of this.locks) {
      if (lock.expiresAt <= now) {
        this.locks.delete(outpoint);
        this.lockIdToOutpoint.delete(lock.lockId);
        clearedCount++;
      }
    }

    return clearedCount;
  }

  /**
   * Split UTXOs into those free to spend and those held by another send.
   * Spent outpoints never come back from the explorer, so their expired
   * leases are only dropped by this sweep.
   */
  partition<T extends Pick<UTXO, 'txid' | 'vout'>>(utxos: readonly T[]): { available: T[]; locked: T[] } {
    this.clearExpiredLocks();

    const available: T[] = [];
    const locked: T[] = [];

    for (const utxo of utxos) {
      if (this.isLocked(toOutpoint(utxo))) {
        locked.push(utxo);
      } else {
        available.push(utxo);
      }
    }

    return { available, locked };
  }
}
