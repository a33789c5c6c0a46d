/**
 * Coin Selector
 *
 * Runs the changeless strategies in priority order (single match, bounded
 * combination, exact subset sum) and, when the caller permits change, the
 * change-permitting fallback. Strategies signal result-or-continue; nothing in
 * the pipeline throws for an ordinary failure to select.
 */

import { FeeModel } from '../core/fee-model.ts';
import type { IFeeModel } from '../interfaces/fee.interface.ts';
import type {
  ICoinSelector,
  ISelectionStrategy,
  SelectionOptions,
} from '../interfaces/selector.interface.ts';
import {
  createSelectionFailure,
  type SelectionFailure,
  SelectionFailureReason,
  type SelectionMode,
  type SelectionResult,
  type StrategyName,
} from '../interfaces/selector-result.interface.ts';
import type { Utxo } from '../interfaces/utxo.interface.ts';
import { type Logger, SilentLogger } from '../utils/logger.ts';
import { isKoinuAmount } from '../utils/type-guards.ts';
import { BoundedCombinationStrategy } from './bounded-combination.ts';
import { ChangePermittingStrategy } from './change-permitting.ts';
import { ExactSubsetSumStrategy } from './exact-subset-sum.ts';
import { SingleMatchStrategy } from './single-match.ts';

export interface CoinSelectorOptions {
  feeModel?: IFeeModel;
  /** Changeless strategies, in priority order */
  strategies?: ISelectionStrategy[];
  /** Strategy run when change is permitted and every changeless strategy continued */
  fallback?: ISelectionStrategy;
  logger?: Logger;
}

export class CoinSelector implements ICoinSelector {
  private readonly feeModel: IFeeModel;
  private readonly strategies: readonly ISelectionStrategy[];
  private readonly fallback: ISelectionStrategy;
  private readonly logger: Logger;

  constructor(options: CoinSelectorOptions = {}) {
    this.feeModel = options.feeModel ?? new FeeModel();
    this.strategies = options.strategies ?? [
      new SingleMatchStrategy(this.feeModel),
      new BoundedCombinationStrategy(this.feeModel),
      new ExactSubsetSumStrategy(this.feeModel),
    ];
    this.fallback = options.fallback ?? new ChangePermittingStrategy(this.feeModel);
    this.logger = options.logger ?? new SilentLogger();
  }

  select(inventory: readonly Utxo[], options: SelectionOptions): SelectionResult {
    const invalid = this.checkOptionsValidity(options);
    if (invalid) {
      return invalid;
    }

    const candidates = inventory.filter((utxo) => !utxo.locked && utxo.amount > 0);
    const malformed = candidates.find((utxo) => !isKoinuAmount(utxo.amount));
    if (malformed) {
      return createSelectionFailure(
        SelectionFailureReason.INVALID_OPTIONS,
        `UTXO ${malformed.txId}:${malformed.outputIndex} has an invalid amount ${malformed.amount}`,
        { targetAmount: options.targetAmount, utxoCount: candidates.length },
      );
    }

    // Every subset sum stays exact once the whole inventory does.
    const availableTotal = candidates.reduce((sum, utxo) => sum + utxo.amount, 0);
    if (!Number.isSafeInteger(availableTotal)) {
      return createSelectionFailure(
        SelectionFailureReason.INVALID_OPTIONS,
        `Spendable total exceeds ${Number.MAX_SAFE_INTEGER} koinu and cannot be summed exactly`,
        { targetAmount: options.targetAmount, utxoCount: candidates.length },
      );
    }
    const singleInputFee = this.feeModel.estimateFee(1, 1, options.feeRate);

    if (candidates.length === 0) {
      return createSelectionFailure(
        SelectionFailureReason.NO_UTXOS_AVAILABLE,
        'No spendable UTXOs available',
        {
          targetAmount: options.targetAmount,
          availableTotal: 0,
          feeAttempted: singleInputFee,
          utxoCount: 0,
        },
      );
    }

    if (availableTotal < options.targetAmount + singleInputFee) {
      return this.insufficientFunds(options, candidates.length, availableTotal, singleInputFee, []);
    }

    const attempted: StrategyName[] = [];
    for (const strategy of this.strategies) {
      attempted.push(strategy.name);
      const outcome = strategy.attempt(candidates, options);
      this.logger.debug?.('Strategy finished', {
        strategy: strategy.name,
        outcome: outcome.kind,
        examined: outcome.examined,
      });
      if (outcome.kind === 'selected') {
        return this.createResult(outcome.chosen, options, outcome.computedFee, strategy.name, outcome.mode);
      }
    }

    if (options.allowChange === false) {
      const coverable = this.largestPrefixCovering(candidates, options);
      if (!coverable) {
        const allInputsFee = this.feeModel.estimateFee(candidates.length, 1, options.feeRate);
        return this.insufficientFunds(options, candidates.length, availableTotal, allInputsFee, attempted);
      }
      return createSelectionFailure(
        SelectionFailureReason.NO_CHANGE_FREE_SOLUTION,
        `No changeless selection pays ${options.targetAmount} within an overpay of ${options.maxOverpay}`,
        {
          targetAmount: options.targetAmount,
          availableTotal,
          utxoCount: candidates.length,
          feeRate: options.feeRate,
          maxOverpay: options.maxOverpay,
          attemptedStrategies: attempted,
        },
      );
    }

    attempted.push(this.fallback.name);
    const outcome = this.fallback.attempt(candidates, options);
    if (outcome.kind === 'selected') {
      return this.createResult(outcome.chosen, options, outcome.computedFee, this.fallback.name, outcome.mode);
    }

    const allInputsFee = this.feeModel.estimateFee(candidates.length, 1, options.feeRate);
    return this.insufficientFunds(options, candidates.length, availableTotal, allInputsFee, attempted);
  }

  /**
   * Whether some set of n inputs covers the target plus the 1-output fee for n.
   * The n largest UTXOs are the best set of size n, so checking prefixes is enough.
   */
  private largestPrefixCovering(candidates: readonly Utxo[], options: SelectionOptions): boolean {
    const descending = [...candidates].sort((a, b) => b.amount - a.amount);
    let total = 0;
    return descending.some((utxo, index) => {
      total += utxo.amount;
      return total >= options.targetAmount + this.feeModel.estimateFee(index + 1, 1, options.feeRate);
    });
  }

  private createResult(
    chosen: Utxo[],
    options: SelectionOptions,
    computedFee: number,
    strategy: StrategyName,
    mode: SelectionMode,
  ): SelectionResult {
    const totalInput = chosen.reduce((sum, utxo) => sum + utxo.amount, 0);
    if (!Number.isSafeInteger(totalInput)) {
      return createSelectionFailure(
        SelectionFailureReason.INVALID_OPTIONS,
        `Selected total exceeds ${Number.MAX_SAFE_INTEGER} koinu and cannot be summed exactly`,
        { targetAmount: options.targetAmount, utxoCount: chosen.length },
      );
    }
    const outputCount = mode === 'with-change' ? 2 : 1;

    return {
      success: true,
      chosen,
      totalInput,
      computedFee,
      leftover: totalInput - options.targetAmount - computedFee,
      strategy,
      mode,
      inputCount: chosen.length,
      outputCount,
      estimatedSize: this.feeModel.estimateSize(chosen.length, outputCount),
    };
  }

  private insufficientFunds(
    options: SelectionOptions,
    utxoCount: number,
    availableTotal: number,
    feeAttempted: number,
    attemptedStrategies: StrategyName[],
  ): SelectionFailure {
    return createSelectionFailure(
      SelectionFailureReason.INSUFFICIENT_FUNDS,
      `Insufficient funds: need ${options.targetAmount + feeAttempted}, have ${availableTotal}`,
      {
        targetAmount: options.targetAmount,
        availableTotal,
        feeAttempted,
        utxoCount,
        feeRate: options.feeRate,
        attemptedStrategies,
      },
    );
  }

  /**
   * Check if options are valid and return failure result if not
   */
  private checkOptionsValidity(options: SelectionOptions): SelectionFailure | null {
    const checks: Array<[string, number, number]> = [
      ['targetAmount', options.targetAmount, 1],
      ['feeRate', options.feeRate, 0],
      ['maxOverpay', options.maxOverpay, 0],
      ['dustThreshold', options.dustThreshold, 0],
    ];

    for (const [field, value, min] of checks) {
      if (!Number.isSafeInteger(value) || value < min) {
        return createSelectionFailure(
          SelectionFailureReason.INVALID_OPTIONS,
          `${field} must be an integer >= ${min}, got ${value}`,
          field === 'feeRate' ? { feeRate: value } : { targetAmount: options.targetAmount },
        );
      }
    }

    return null;
  }
}
