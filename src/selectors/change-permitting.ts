/**
 * Change Permitting Strategy
 *
 * Fallback when no changeless selection exists. Accumulates the largest UTXOs
 * until the leftover after a 2-output fee can stand as a change output, or until
 * the leftover after a 1-output fee is positive but below dust and can be folded
 * into the fee.
 */

import type { SelectionOptions, StrategyOutcome } from '../interfaces/selector.interface.ts';
import type { StrategyName } from '../interfaces/selector-result.interface.ts';
import type { Utxo } from '../interfaces/utxo.interface.ts';
import { BaseStrategy } from './base-strategy.ts';

export class ChangePermittingStrategy extends BaseStrategy {
  readonly name: StrategyName = 'change-permitting';

  attempt(candidates: readonly Utxo[], options: SelectionOptions): StrategyOutcome {
    const sorted = this.sortDescending(candidates);
    let total = 0;
    let examined = 0;
    // First prefix that covers the payment with a leftover too big to fold but
    // too small to leave as change once the change output's fee is paid
    let band: { count: number; fee: number } | undefined;

    for (const [index, utxo] of sorted.entries()) {
      const count = index + 1;
      total += utxo.amount;
      examined++;

      const withChangeFee = this.fee(count, 2, options.feeRate);
      if (total - options.targetAmount - withChangeFee >= options.dustThreshold) {
        return this.selected(sorted.slice(0, count), withChangeFee, 'with-change', examined);
      }

      const changelessFee = this.fee(count, 1, options.feeRate);
      const leftover = total - options.targetAmount - changelessFee;
      if (leftover >= 0 && leftover < options.dustThreshold) {
        return this.selected(sorted.slice(0, count), changelessFee, 'changeless', examined);
      }
      if (leftover >= options.dustThreshold && !band) {
        band = { count, fee: changelessFee };
      }
    }

    if (band) {
      return this.selected(sorted.slice(0, band.count), band.fee, 'changeless', examined);
    }
    return this.proceed(examined);
  }
}
