/**
 * UTXO Selection Strategy Interface
 * Defines the contract between the coin selector and the strategies it composes
 */

import type { FeeRate } from './fee.interface.ts';
import type {
  SelectionMode,
  SelectionResult,
  StrategyName,
} from './selector-result.interface.ts';
import type { Utxo } from './utxo.interface.ts';

export interface SelectionOptions {
  /** Amount paid to the destination, in koinu */
  targetAmount: number;
  feeRate: FeeRate;
  /** Largest leftover a changeless selection may fold into the fee */
  maxOverpay: number;
  /** Smallest output value the ledger relays */
  dustThreshold: number;
  /** Run the change-permitting fallback when no changeless selection exists */
  allowChange?: boolean;
}

/**
 * Result-or-continue signal returned by every strategy
 */
export type StrategyOutcome =
  | {
    kind: 'selected';
    chosen: Utxo[];
    computedFee: number;
    mode: SelectionMode;
    examined: number;
  }
  | {
    kind: 'continue';
    examined: number;
  };

export interface ISelectionStrategy {
  readonly name: StrategyName;

  /**
   * Try to select inputs from the candidates. Pure: candidates are never mutated.
   */
  attempt(candidates: readonly Utxo[], options: SelectionOptions): StrategyOutcome;
}

export interface ICoinSelector {
  /**
   * Select UTXOs for a payment
   * Always returns a structured result
   */
  select(inventory: readonly Utxo[], options: SelectionOptions): SelectionResult;
}
