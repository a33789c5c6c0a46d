/**
 * Bounded Combination Strategy
 *
 * Searches combinations of 2 to 5 inputs drawn from the 20 largest UTXOs for a
 * changeless payment. Sizes are examined in ascending order so the first size
 * with a valid combination wins; within a size the smallest leftover wins, then
 * the higher aggregate confirmation count.
 */

import type { SelectionOptions, StrategyOutcome } from '../interfaces/selector.interface.ts';
import type { StrategyName } from '../interfaces/selector-result.interface.ts';
import type { Utxo } from '../interfaces/utxo.interface.ts';
import { BaseStrategy } from './base-strategy.ts';

export class BoundedCombinationStrategy extends BaseStrategy {
  static readonly MAX_CANDIDATES = 20;
  static readonly MIN_SIZE = 2;
  static readonly MAX_SIZE = 5;
  /** C(20,2) + C(20,3) + C(20,4) + C(20,5) */
  static readonly MAX_COMBINATIONS_EXAMINED = 21_679;

  readonly name: StrategyName = 'bounded-combination';

  attempt(candidates: readonly Utxo[], options: SelectionOptions): StrategyOutcome {
    const pool = this.sortDescending(candidates).slice(0, BoundedCombinationStrategy.MAX_CANDIDATES);
    const maxSize = Math.min(BoundedCombinationStrategy.MAX_SIZE, pool.length);
    let examined = 0;

    for (let size = BoundedCombinationStrategy.MIN_SIZE; size <= maxSize; size++) {
      const fee = this.fee(size, 1, options.feeRate);
      const required = options.targetAmount + fee;

      // The pool is sorted descending, so its prefix is the largest reachable sum
      if (this.sumAmounts(pool.slice(0, size)) < required) {
        continue;
      }

      let best: number[] | undefined;
      let bestLeftover = Infinity;
      let bestConfirmations = -1;

      const indices = Array.from({ length: size }, (_, i) => i);
      for (;;) {
        examined++;

        let total = 0;
        let confirmations = 0;
        for (const index of indices) {
          const utxo = pool[index];
          if (utxo) {
            total += utxo.amount;
            confirmations += utxo.confirmations;
          }
        }

        const leftover = total - required;
        if (
          leftover >= 0 &&
          leftover <= options.maxOverpay &&
          (leftover < bestLeftover ||
            (leftover === bestLeftover && confirmations > bestConfirmations))
        ) {
          best = [...indices];
          bestLeftover = leftover;
          bestConfirmations = confirmations;
        }

        if (!nextCombination(indices, pool.length)) {
          break;
        }
      }

      if (best) {
        const chosen = best.flatMap((index) => {
          const utxo = pool[index];
          return utxo ? [utxo] : [];
        });
        return this.selected(chosen, fee, 'changeless', examined);
      }
    }

    return this.proceed(examined);
  }
}

/**
 * Advance `indices` to the next k-combination of [0, n) in lexicographic order.
 * Returns false once the last combination has been visited.
 */
export function nextCombination(indices: number[], n: number): boolean {
  const k = indices.length;
  let i = k - 1;
  while (i >= 0 && indices[i] === n - k + i) {
    i--;
  }
  if (i < 0) {
    return false;
  }

  let next = (indices[i] ?? 0) + 1;
  for (let j = i; j < k; j++) {
    indices[j] = next++;
  }
  return true;
}
