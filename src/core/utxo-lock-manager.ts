/**
 * UTXO Lock Manager
 * Process-wide table of outputs held by in-flight selections, so two concurrent
 * requests never build transactions over the same output
 */

import { InvalidParameterError, UtxoLockConflictError } from '../errors/index.ts';
import type {
  LockLease,
  LockPurpose,
  LockStatistics,
  UtxoLock,
} from '../interfaces/lock.interface.ts';
import { type Logger, SilentLogger } from '../utils/logger.ts';

export interface UtxoLockManagerOptions {
  /** Lifetime of a lock unless extended (default 10 minutes) */
  defaultTtlMs?: number;
  logger?: Logger;
}

/**
 * UTXO Lock Manager Implementation
 *
 * Every method is synchronous, so a check-and-set never interleaves with another
 * request. Only `withLocks` awaits, and it releases on every exit path.
 */
export class UtxoLockManager {
  static readonly DEFAULT_TTL_MS = 10 * 60 * 1000;

  private locks = new Map<string, UtxoLock>(); // outpoint -> lock
  private leases = new Map<string, LockLease>(); // lockId -> lease
  private readonly defaultTtlMs: number;
  private readonly logger: Logger;
  private sweeper: NodeJS.Timeout | undefined;
  private lockCounter = 0;

  constructor(options: UtxoLockManagerOptions = {}) {
    this.defaultTtlMs = options.defaultTtlMs ?? UtxoLockManager.DEFAULT_TTL_MS;
    this.logger = options.logger ?? new SilentLogger();
  }

  /**
   * Lock a set of outpoints atomically: either all are locked or none is.
   *
   * @throws UtxoLockConflictError listing every outpoint already held
   */
  acquire(outpoints: readonly string[], purpose: LockPurpose, ttlMs = this.defaultTtlMs): LockLease {
    if (outpoints.length === 0) {
      throw new InvalidParameterError('Cannot lock an empty set of outpoints');
    }
    if (!Number.isInteger(ttlMs) || ttlMs <= 0) {
      throw new InvalidParameterError(`Lock TTL must be a positive integer, got ${ttlMs}`);
    }

    const unique = [...new Set(outpoints)];
    const conflicts = unique.filter((outpoint) => this.isLocked(outpoint));
    if (conflicts.length > 0) {
      this.logger.warn('UTXO lock conflict', { purpose, conflicts });
      throw new UtxoLockConflictError(conflicts, 'locked');
    }

    const lockId = this.generateLockId();
    const acquiredAt = Date.now();
    const expiresAt = acquiredAt + ttlMs;

    for (const outpoint of unique) {
      this.locks.set(outpoint, { outpoint, lockId, purpose, acquiredAt, expiresAt });
    }

    const lease: LockLease = { lockId, outpoints: unique, purpose, expiresAt };
    this.leases.set(lockId, lease);
    this.logger.debug?.('UTXOs locked', { lockId, purpose, count: unique.length });

    return { ...lease };
  }

  /**
   * Release every outpoint held under a lease. Idempotent; returns the number
   * of outpoints actually released.
   */
  release(lease: LockLease | string): number {
    const lockId = typeof lease === 'string' ? lease : lease.lockId;
    const held = this.leases.get(lockId);
    if (!held) {
      return 0;
    }

    let released = 0;
    for (const outpoint of held.outpoints) {
      const lock = this.locks.get(outpoint);
      if (lock && lock.lockId === lockId) {
        this.locks.delete(outpoint);
        released++;
      }
    }
    this.leases.delete(lockId);

    return released;
  }

  /**
   * Lock, run `fn`, then release whether `fn` resolved or threw
   */
  async withLocks<T>(
    outpoints: readonly string[],
    purpose: LockPurpose,
    fn: (lease: LockLease) => Promise<T>,
    ttlMs?: number,
  ): Promise<T> {
    const lease = this.acquire(outpoints, purpose, ttlMs);
    try {
      return await fn(lease);
    } finally {
      this.release(lease);
    }
  }

  /**
   * Check if UTXO is locked
   */
  isLocked(outpoint: string): boolean {
    return this.getLockInfo(outpoint) !== null;
  }

  /**
   * Get lock information
   */
  getLockInfo(outpoint: string): UtxoLock | null {
    const lock = this.locks.get(outpoint);

    if (!lock) {
      return null;
    }

    // Check if expired
    if (lock.expiresAt <= Date.now()) {
      this.removeLock(lock);
      return null;
    }

    return { ...lock }; // Return copy to prevent mutation
  }

  /**
   * Currently held locks, expired entries removed first
   */
  getLockedOutpoints(): UtxoLock[] {
    this.clearExpiredLocks();
    return Array.from(this.locks.values(), (lock) => ({ ...lock }));
  }

  /**
   * Extend lock duration
   */
  extendLock(lockId: string, additionalDurationMs: number): boolean {
    const lease = this.leases.get(lockId);
    if (!lease || lease.expiresAt <= Date.now()) {
      return false;
    }

    const expiresAt = lease.expiresAt + additionalDurationMs;
    this.leases.set(lockId, { ...lease, expiresAt });
    for (const outpoint of lease.outpoints) {
      const lock = this.locks.get(outpoint);
      if (lock && lock.lockId === lockId) {
        this.locks.set(outpoint, { ...lock, expiresAt });
      }
    }

    return true;
  }

  /**
   * Force unlock UTXO (admin function)
   */
  forceUnlock(outpoint: string): boolean {
    const lock = this.locks.get(outpoint);

    if (!lock) {
      return false;
    }

    this.removeLock(lock);
    return true;
  }

  /**
   * Clear expired locks
   */
  clearExpiredLocks(): number {
    const now = Date.now();
    const expired = Array.from(this.locks.values()).filter((lock) => lock.expiresAt <= now);

    for (const lock of expired) {
      this.removeLock(lock);
    }
    if (expired.length > 0) {
      this.logger.info('Expired UTXO locks cleared', { count: expired.length });
    }

    return expired.length;
  }

  /**
   * Clear expired locks on an interval. The timer never keeps the process alive.
   */
  startSweeper(intervalMs = 60_000): void {
    if (this.sweeper) {
      return;
    }
    this.sweeper = setInterval(() => this.clearExpiredLocks(), intervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = undefined;
    }
  }

  /**
   * Stop the sweeper and drop every lock. Returns the number of locks dropped.
   */
  shutdown(): number {
    this.stopSweeper();
    const dropped = this.locks.size;
    this.locks.clear();
    this.leases.clear();
    return dropped;
  }

  /**
   * Get lock statistics
   */
  getStatistics(): LockStatistics {
    this.clearExpiredLocks();

    const locksByPurpose: Record<LockPurpose, number> = { payment: 0, consolidation: 0 };
    const now = Date.now();
    let totalRemainingTime = 0;
    const upcomingExpirations: LockStatistics['upcomingExpirations'] = [];

    for (const lock of this.locks.values()) {
      locksByPurpose[lock.purpose]++;

      const remainingTime = lock.expiresAt - now;
      totalRemainingTime += remainingTime;

      if (remainingTime < 5 * 60 * 1000) {
        upcomingExpirations.push({
          outpoint: lock.outpoint,
          expiresAt: lock.expiresAt,
          purpose: lock.purpose,
        });
      }
    }

    upcomingExpirations.sort((a, b) => a.expiresAt - b.expiresAt);
    const totalLocks = this.locks.size;

    return {
      totalLocks,
      locksByPurpose,
      averageRemainingTime: totalLocks > 0 ? totalRemainingTime / totalLocks : 0,
      upcomingExpirations,
    };
  }

  private removeLock(lock: UtxoLock): void {
    this.locks.delete(lock.outpoint);

    const lease = this.leases.get(lock.lockId);
    if (lease && !lease.outpoints.some((outpoint) => this.locks.get(outpoint)?.lockId === lock.lockId)) {
      this.leases.delete(lock.lockId);
    }
  }

  private generateLockId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `lock_${timestamp}_${(++this.lockCounter).toString(36)}_${random}`;
  }
}
