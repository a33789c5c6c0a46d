/**
 * Exact Subset Sum Strategy
 *
 * For small inventories, finds a subset whose total equals the payment plus the
 * fee for its own input count exactly, so nothing is left over. Sparse dynamic
 * programming over (input count, reachable sum); complete within its bound.
 */

import type { SelectionOptions, StrategyOutcome } from '../interfaces/selector.interface.ts';
import type { StrategyName } from '../interfaces/selector-result.interface.ts';
import type { Utxo } from '../interfaces/utxo.interface.ts';
import { BaseStrategy } from './base-strategy.ts';

interface SubsetEntry {
  /** Bit i set when utxos[i] is in the subset */
  mask: number;
  confirmations: number;
}

export class ExactSubsetSumStrategy extends BaseStrategy {
  /** Masks are 32-bit integers; the table size also grows with 2^n */
  static readonly MAX_INVENTORY = 15;

  readonly name: StrategyName = 'exact-subset-sum';

  attempt(candidates: readonly Utxo[], options: SelectionOptions): StrategyOutcome {
    const n = candidates.length;
    if (n === 0 || n > ExactSubsetSumStrategy.MAX_INVENTORY) {
      return this.proceed(0);
    }

    const utxos = this.sortDescending(candidates);
    // fee(k, 1) is non-decreasing in k, so no useful sum exceeds this
    const bound = options.targetAmount + this.fee(n, 1, options.feeRate);

    const layers: Array<Map<number, SubsetEntry>> = Array.from({ length: n + 1 }, () => new Map());
    layers[0]?.set(0, { mask: 0, confirmations: 0 });
    let examined = 0;

    utxos.forEach((utxo, i) => {
      // Descending count so each UTXO joins a subset at most once
      for (let count = i; count >= 0; count--) {
        const from = layers[count];
        const to = layers[count + 1];
        if (!from || !to) continue;

        for (const [sum, entry] of from) {
          examined++;
          const reached = sum + utxo.amount;
          if (reached > bound) continue;

          const confirmations = entry.confirmations + utxo.confirmations;
          const existing = to.get(reached);
          if (!existing || confirmations > existing.confirmations) {
            to.set(reached, { mask: entry.mask | (1 << i), confirmations });
          }
        }
      }
    });

    for (let k = 1; k <= n; k++) {
      const fee = this.fee(k, 1, options.feeRate);
      const entry = layers[k]?.get(options.targetAmount + fee);
      if (entry) {
        const chosen = utxos.filter((_, i) => (entry.mask & (1 << i)) !== 0);
        return this.selected(chosen, fee, 'changeless', examined);
      }
    }

    return this.proceed(examined);
  }
}
