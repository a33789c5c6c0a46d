/**
 * @module Selectors
 * @description Coin selection for changeless payments. Strategies run in
 * priority order and return result-or-continue:
 *
 * - **SingleMatchStrategy**: one UTXO covering the payment within the overpay bound
 * - **BoundedCombinationStrategy**: 2 to 5 of the 20 largest UTXOs
 * - **ExactSubsetSumStrategy**: exact match for inventories of at most 15 UTXOs
 * - **ChangePermittingStrategy**: greedy fallback that may add a change output
 *
 * @example
 * ```typescript
 * import { CoinSelector } from 'changeless-payments';
 *
 * const result = new CoinSelector().select(utxos, {
 *   targetAmount: 500_000_000, // 5 coins in koinu
 *   feeRate: 1_000_000, // koinu per 1000 bytes
 *   maxOverpay: 1_000_000,
 *   dustThreshold: 1_000_000,
 * });
 *
 * if (result.success) {
 *   console.log(`${result.strategy}: ${result.inputCount} inputs, fee ${result.computedFee}`);
 * }
 * ```
 */

export { BaseStrategy } from './base-strategy.ts';
export { SingleMatchStrategy } from './single-match.ts';
export { BoundedCombinationStrategy, nextCombination } from './bounded-combination.ts';
export { ExactSubsetSumStrategy } from './exact-subset-sum.ts';
export { ChangePermittingStrategy } from './change-permitting.ts';
export { CoinSelector, type CoinSelectorOptions } from './coin-selector.ts';
