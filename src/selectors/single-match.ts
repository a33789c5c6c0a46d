/**
 * Single Match Strategy
 *
 * One input, one output. Accepts a UTXO whose leftover after the payment and
 * the 1-in/1-out fee is at most maxOverpay; that leftover goes to the fee.
 */

import type { SelectionOptions, StrategyOutcome } from '../interfaces/selector.interface.ts';
import type { StrategyName } from '../interfaces/selector-result.interface.ts';
import type { Utxo } from '../interfaces/utxo.interface.ts';
import { BaseStrategy } from './base-strategy.ts';

export class SingleMatchStrategy extends BaseStrategy {
  readonly name: StrategyName = 'single-match';

  attempt(candidates: readonly Utxo[], options: SelectionOptions): StrategyOutcome {
    const fee = this.fee(1, 1, options.feeRate);
    const required = options.targetAmount + fee;

    let best: Utxo | undefined;
    let bestLeftover = Infinity;
    let examined = 0;

    for (const utxo of this.sortDescending(candidates)) {
      if (utxo.amount < required) {
        break;
      }
      examined++;

      const leftover = utxo.amount - required;
      if (leftover > options.maxOverpay) {
        continue;
      }
      if (
        leftover < bestLeftover ||
        (leftover === bestLeftover && best !== undefined && utxo.confirmations > best.confirmations)
      ) {
        best = utxo;
        bestLeftover = leftover;
      }
    }

    return best ? this.selected([best], fee, 'changeless', examined) : this.proceed(examined);
  }
}
