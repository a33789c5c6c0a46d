/**
 * UTXO Inventory
 * Fresh, immutable snapshots of the outputs a set of addresses controls
 */

import { InventoryUnavailableError } from '../errors/index.ts';
import type { ILedgerNode } from '../interfaces/provider.interface.ts';
import type {
  InventoryBalance,
  Utxo,
  UtxoSnapshotOptions,
} from '../interfaces/utxo.interface.ts';
import { type Logger, SilentLogger } from '../utils/logger.ts';
import { toOutpointKey } from '../utils/outpoint.ts';
import type { UtxoLockManager } from './utxo-lock-manager.ts';

export interface UtxoInventoryOptions {
  logger?: Logger;
}

export class UtxoInventory {
  /** Upper confirmation bound passed to the node */
  static readonly MAX_CONFIRMATIONS = 9_999_999;

  private readonly logger: Logger;

  constructor(
    private readonly node: ILedgerNode,
    private readonly lockManager: UtxoLockManager,
    options: UtxoInventoryOptions = {},
  ) {
    this.logger = options.logger ?? new SilentLogger();
  }

  /**
   * Spendable outputs: at least `minConfirmations` deep and not held by the lock table
   *
   * @throws InventoryUnavailableError when the node cannot be queried
   */
  async load(addresses: readonly string[], minConfirmations = 1): Promise<Utxo[]> {
    const utxos = await this.fetch(addresses, minConfirmations);
    return utxos.filter((utxo) => !utxo.locked);
  }

  /**
   * Bookkeeping read. Unconfirmed outputs are included by default and locked
   * outputs are kept with their `locked` flag set.
   */
  async snapshot(
    addresses: readonly string[],
    options: UtxoSnapshotOptions = {},
  ): Promise<Utxo[]> {
    const utxos = await this.fetch(addresses, options.minConfirmations ?? 0);
    return options.includeLocked === false ? utxos.filter((utxo) => !utxo.locked) : utxos;
  }

  /**
   * Balance split by spend depth and lock state
   */
  async balance(addresses: readonly string[], minConfirmations = 1): Promise<InventoryBalance> {
    const utxos = await this.fetch(addresses, 0);
    const balance: InventoryBalance = {
      confirmed: 0,
      unconfirmed: 0,
      locked: 0,
      spendable: 0,
      utxoCount: utxos.length,
    };

    for (const utxo of utxos) {
      if (utxo.confirmations >= minConfirmations) {
        balance.confirmed += utxo.amount;
        if (!utxo.locked) {
          balance.spendable += utxo.amount;
        }
      } else {
        balance.unconfirmed += utxo.amount;
      }
      if (utxo.locked) {
        balance.locked += utxo.amount;
      }
    }

    return balance;
  }

  private async fetch(addresses: readonly string[], minConfirmations: number): Promise<Utxo[]> {
    if (addresses.length === 0) {
      return [];
    }

    let listed: Utxo[];
    try {
      listed = await this.node.listUnspent(
        minConfirmations,
        UtxoInventory.MAX_CONFIRMATIONS,
        addresses,
      );
    } catch (error) {
      this.logger.error('Failed to list unspent outputs', {
        addresses: addresses.length,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new InventoryUnavailableError(addresses, error);
    }

    const wanted = new Set(addresses);
    const seen = new Set<string>();
    const utxos: Utxo[] = [];

    for (const utxo of listed) {
      const key = toOutpointKey(utxo);
      if (!wanted.has(utxo.address) || utxo.confirmations < minConfirmations || seen.has(key)) {
        continue;
      }
      seen.add(key);
      utxos.push(Object.freeze({ ...utxo, locked: this.lockManager.isLocked(key) }));
    }

    if (utxos.length !== listed.length) {
      this.logger.debug?.('Dropped foreign or duplicate outputs', {
        listed: listed.length,
        kept: utxos.length,
      });
    }

    return utxos;
  }
}
