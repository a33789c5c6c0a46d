/**
 * UTXO Lock Interface
 */

export type LockPurpose = 'payment' | 'consolidation';

export interface UtxoLock {
  /** "txId:outputIndex" */
  outpoint: string;
  lockId: string;
  purpose: LockPurpose;
  acquiredAt: number;
  expiresAt: number;
}

/**
 * Handle for a set of outpoints locked together
 */
export interface LockLease {
  lockId: string;
  outpoints: readonly string[];
  purpose: LockPurpose;
  expiresAt: number;
}

export interface LockStatistics {
  totalLocks: number;
  locksByPurpose: Record<LockPurpose, number>;
  averageRemainingTime: number;
  /** Locks expiring within the next 5 minutes, soonest first */
  upcomingExpirations: Array<{ outpoint: string; expiresAt: number; purpose: LockPurpose }>;
}
