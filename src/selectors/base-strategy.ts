/**
 * Base Selection Strategy
 * Common functionality for all selection strategies
 */

import { FeeModel } from '../core/fee-model.ts';
import type { FeeRate, IFeeModel } from '../interfaces/fee.interface.ts';
import type {
  ISelectionStrategy,
  SelectionOptions,
  StrategyOutcome,
} from '../interfaces/selector.interface.ts';
import type { SelectionMode, StrategyName } from '../interfaces/selector-result.interface.ts';
import type { Utxo } from '../interfaces/utxo.interface.ts';

export abstract class BaseStrategy implements ISelectionStrategy {
  abstract readonly name: StrategyName;

  constructor(protected readonly feeModel: IFeeModel = new FeeModel()) {}

  abstract attempt(candidates: readonly Utxo[], options: SelectionOptions): StrategyOutcome;

  /**
   * Sort by amount, largest first. Equal amounts order by confirmations, then
   * outpoint, so every strategy sees the same deterministic order.
   */
  protected sortDescending(utxos: readonly Utxo[]): Utxo[] {
    return [...utxos].sort((a, b) =>
      b.amount - a.amount ||
      b.confirmations - a.confirmations ||
      a.txId.localeCompare(b.txId) ||
      a.outputIndex - b.outputIndex
    );
  }

  /**
   * Calculate total value of UTXOs
   */
  protected sumAmounts(utxos: readonly Utxo[]): number {
    return utxos.reduce((sum, utxo) => sum + utxo.amount, 0);
  }

  protected sumConfirmations(utxos: readonly Utxo[]): number {
    return utxos.reduce((sum, utxo) => sum + utxo.confirmations, 0);
  }

  protected fee(inputCount: number, outputCount: number, feeRate: FeeRate): number {
    return this.feeModel.estimateFee(inputCount, outputCount, feeRate);
  }

  protected selected(
    chosen: Utxo[],
    computedFee: number,
    mode: SelectionMode,
    examined: number,
  ): StrategyOutcome {
    return { kind: 'selected', chosen, computedFee, mode, examined };
  }

  protected proceed(examined: number): StrategyOutcome {
    return { kind: 'continue', examined };
  }
}
