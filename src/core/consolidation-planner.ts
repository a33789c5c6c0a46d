/**
 * Consolidation Planner
 *
 * Merges many small outputs into one, reducing the input count (and fee) of
 * later payments. Also reports on UTXO set fragmentation so callers can decide
 * when consolidating is worth its fee.
 */

import { ConsolidationNotBeneficialError, InvalidParameterError } from '../errors/index.ts';
import type { FeeRate, IFeeModel } from '../interfaces/fee.interface.ts';
import type { TxPlan } from '../interfaces/transaction.interface.ts';
import type { Utxo } from '../interfaces/utxo.interface.ts';
import { type Logger, SilentLogger } from '../utils/logger.ts';
import { FeeModel } from './fee-model.ts';
import { TransactionAssembler } from './transaction-assembler.ts';

export interface ConsolidationPlanParams {
  destination: string;
  /** Outputs strictly below this amount are merged */
  smallThreshold: number;
  maxInputs: number;
  feeRate: FeeRate;
}

export interface UtxoSetSummary {
  totalCount: number;
  confirmedCount: number;
  unconfirmedCount: number;
  lockedCount: number;
  /** Outputs below the dust threshold */
  dustCount: number;
  /** Outputs below the consolidation threshold */
  smallCount: number;
  totalAmount: number;
  smallAmount: number;
}

export interface ConsolidationRecommendation {
  shouldConsolidate: boolean;
  reason: string;
  candidateCount: number;
  estimatedFee: number;
}

export interface ConsolidationPlannerOptions {
  feeModel?: IFeeModel;
  dustThreshold?: number;
  /** Outputs below this amount count as small (default 1 coin) */
  smallThreshold?: number;
  maxInputs?: number;
  /** Small-output count from which consolidation is recommended */
  recommendAboveCount?: number;
  logger?: Logger;
}

export class ConsolidationPlanner {
  static readonly DEFAULT_SMALL_THRESHOLD = 100_000_000;
  static readonly DEFAULT_MAX_INPUTS = 200;
  static readonly DEFAULT_RECOMMEND_ABOVE_COUNT = 50;

  private readonly feeModel: IFeeModel;
  private readonly assembler: TransactionAssembler;
  private readonly smallThreshold: number;
  private readonly maxInputs: number;
  private readonly recommendAboveCount: number;
  private readonly logger: Logger;

  constructor(options: ConsolidationPlannerOptions = {}) {
    this.feeModel = options.feeModel ?? new FeeModel();
    this.logger = options.logger ?? new SilentLogger();
    this.assembler = new TransactionAssembler({
      dustThreshold: options.dustThreshold,
      logger: this.logger,
    });
    this.smallThreshold = options.smallThreshold ?? ConsolidationPlanner.DEFAULT_SMALL_THRESHOLD;
    this.maxInputs = options.maxInputs ?? ConsolidationPlanner.DEFAULT_MAX_INPUTS;
    this.recommendAboveCount = options.recommendAboveCount ??
      ConsolidationPlanner.DEFAULT_RECOMMEND_ABOVE_COUNT;
  }

  /**
   * Plan a transaction spending the smallest outputs below the threshold into a
   * single output to `destination`
   *
   * @throws ConsolidationNotBeneficialError with fewer than two candidates, or
   *   when the merged output would be dust
   */
  plan(inventory: readonly Utxo[], params: ConsolidationPlanParams): TxPlan {
    if (!Number.isInteger(params.maxInputs) || params.maxInputs < 2) {
      throw new InvalidParameterError(`maxInputs must be an integer >= 2, got ${params.maxInputs}`);
    }
    if (!Number.isSafeInteger(params.smallThreshold) || params.smallThreshold <= 0) {
      throw new InvalidParameterError(
        `smallThreshold must be a positive integer, got ${params.smallThreshold}`,
      );
    }

    const candidates = this.candidates(inventory, params.smallThreshold, params.maxInputs);
    if (candidates.length < 2) {
      throw new ConsolidationNotBeneficialError(
        candidates.length,
        `Nothing to consolidate: ${candidates.length} output(s) below ${params.smallThreshold}`,
      );
    }

    const totalInput = candidates.reduce((sum, utxo) => sum + utxo.amount, 0);
    if (!Number.isSafeInteger(totalInput)) {
      throw new InvalidParameterError(
        `Consolidated total exceeds ${Number.MAX_SAFE_INTEGER} koinu; lower maxInputs or smallThreshold`,
      );
    }
    const fee = this.feeModel.estimateFee(candidates.length, 1, params.feeRate);
    const output = totalInput - fee;
    if (output < this.assembler.dustThreshold) {
      throw new ConsolidationNotBeneficialError(
        candidates.length,
        `Consolidated output ${output} would be below the dust threshold ${this.assembler.dustThreshold}`,
      );
    }

    const plan: TxPlan = {
      kind: 'consolidation',
      inputs: candidates.map(({ txId, outputIndex, amount }) => ({ txId, outputIndex, amount })),
      outputs: new Map([[params.destination, output]]),
      fee,
      totalInput,
      changeAmount: 0,
      foldedLeftover: 0,
      strategy: 'consolidation',
    };
    this.assembler.verifyPlan(plan);

    this.logger.info('Consolidation planned', {
      inputs: candidates.length,
      totalInput,
      fee,
    });
    return plan;
  }

  /**
   * Fragmentation overview of a UTXO set
   */
  summarize(utxos: readonly Utxo[], minConfirmations = 1): UtxoSetSummary {
    const summary: UtxoSetSummary = {
      totalCount: utxos.length,
      confirmedCount: 0,
      unconfirmedCount: 0,
      lockedCount: 0,
      dustCount: 0,
      smallCount: 0,
      totalAmount: 0,
      smallAmount: 0,
    };

    for (const utxo of utxos) {
      summary.totalAmount += utxo.amount;
      if (utxo.confirmations >= minConfirmations) {
        summary.confirmedCount++;
      } else {
        summary.unconfirmedCount++;
      }
      if (utxo.locked) summary.lockedCount++;
      if (utxo.amount < this.assembler.dustThreshold) summary.dustCount++;
      if (utxo.amount < this.smallThreshold) {
        summary.smallCount++;
        summary.smallAmount += utxo.amount;
      }
    }

    return summary;
  }

  /**
   * Recommend consolidating when enough small outputs exist and their value is
   * more than twice the fee of merging them
   */
  recommend(utxos: readonly Utxo[], feeRate: FeeRate): ConsolidationRecommendation {
    const candidates = this.candidates(utxos, this.smallThreshold, this.maxInputs);
    const candidateCount = candidates.length;
    const estimatedFee = this.feeModel.estimateFee(Math.max(candidateCount, 1), 1, feeRate);
    const value = candidates.reduce((sum, utxo) => sum + utxo.amount, 0);

    if (candidateCount < this.recommendAboveCount) {
      return {
        shouldConsolidate: false,
        reason: `${candidateCount} small output(s), below the ${this.recommendAboveCount} that warrant consolidation`,
        candidateCount,
        estimatedFee,
      };
    }
    if (value <= estimatedFee * 2) {
      return {
        shouldConsolidate: false,
        reason: `Small outputs total ${value}, not more than twice the fee ${estimatedFee}`,
        candidateCount,
        estimatedFee,
      };
    }

    return {
      shouldConsolidate: true,
      reason: `${candidateCount} small outputs totalling ${value} can be merged for ${estimatedFee}`,
      candidateCount,
      estimatedFee,
    };
  }

  private candidates(utxos: readonly Utxo[], smallThreshold: number, maxInputs: number): Utxo[] {
    return utxos
      .filter((utxo) => !utxo.locked && utxo.amount > 0 && utxo.amount < smallThreshold)
      .sort((a, b) => a.amount - b.amount || b.confirmations - a.confirmations)
      .slice(0, maxInputs);
  }
}
