/**
 * UTXO Type Definitions
 *
 * Core types for unspent transaction output handling. All amounts are integer
 * koinu (1 coin = 100,000,000 koinu).
 */

/**
 * Reference to a single transaction output
 */
export interface Outpoint {
  /** Transaction ID */
  readonly txId: string;
  /** Output index */
  readonly outputIndex: number;
}

/**
 * Snapshot of a spendable output. Never a live reference into ledger state:
 * the output may be spent elsewhere between snapshot and broadcast.
 */
export interface Utxo extends Outpoint {
  /** Address controlling the output */
  readonly address: string;
  /** Value in koinu */
  readonly amount: number;
  /** Number of confirmations */
  readonly confirmations: number;
  /** Whether an in-flight selection currently holds this output */
  readonly locked: boolean;
}

/**
 * Options for bookkeeping reads of the UTXO set
 */
export interface UtxoSnapshotOptions {
  /** Minimum confirmations (default 0 for snapshots) */
  minConfirmations?: number;
  /** Keep outputs held by the lock table, flagged as locked (default true) */
  includeLocked?: boolean;
}

/**
 * Balance breakdown for a set of addresses, in koinu
 */
export interface InventoryBalance {
  /** Outputs at or above the spend confirmation depth */
  confirmed: number;
  /** Outputs below the spend confirmation depth */
  unconfirmed: number;
  /** Outputs held by in-flight selections */
  locked: number;
  /** Confirmed and not locked */
  spendable: number;
  /** Number of outputs seen */
  utxoCount: number;
}
