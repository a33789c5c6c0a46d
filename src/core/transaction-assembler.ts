/**
 * Transaction Assembler
 * Turns a selection into a fully decided plan: which outputs exist, what the
 * fee is, and where the leftover goes
 */

import {
  FeeLimitExceededError,
  InvalidParameterError,
  InvalidPlanError,
} from '../errors/index.ts';
import type { SelectionSuccess } from '../interfaces/selector-result.interface.ts';
import type { TargetPayment, TxPlan } from '../interfaces/transaction.interface.ts';
import { type Logger, SilentLogger } from '../utils/logger.ts';
import { toOutpointKey } from '../utils/outpoint.ts';
import { isKoinuAmount } from '../utils/type-guards.ts';

export interface TransactionAssemblerOptions {
  dustThreshold?: number;
  logger?: Logger;
}

export class TransactionAssembler {
  static readonly DEFAULT_DUST_THRESHOLD = 1_000_000;

  readonly dustThreshold: number;
  private readonly logger: Logger;

  constructor(options: TransactionAssemblerOptions = {}) {
    this.dustThreshold = options.dustThreshold ?? TransactionAssembler.DEFAULT_DUST_THRESHOLD;
    this.logger = options.logger ?? new SilentLogger();
  }

  /**
   * Reject a payment that could never produce a valid plan. Runs before selection.
   *
   * @throws InvalidParameterError
   */
  validatePayment(payment: TargetPayment): void {
    if (!Number.isSafeInteger(payment.amount) || payment.amount <= 0) {
      throw new InvalidParameterError(`Payment amount must be a positive integer, got ${payment.amount}`);
    }
    if (payment.amount < this.dustThreshold) {
      throw new InvalidParameterError(
        `Payment amount ${payment.amount} is below the dust threshold ${this.dustThreshold}`,
      );
    }
    if (!Number.isSafeInteger(payment.maxAcceptableFee) || payment.maxAcceptableFee < 0) {
      throw new InvalidParameterError(
        `Maximum fee must be a non-negative integer, got ${payment.maxAcceptableFee}`,
      );
    }
  }

  /**
   * Build the plan for a selection.
   *
   * A leftover below dust always goes to the fee. A leftover at or above dust
   * becomes a change output in `with-change` mode and goes to the fee otherwise.
   *
   * @throws InvalidPlanError when a change output is needed and no usable change address exists
   * @throws FeeLimitExceededError when the final fee exceeds `payment.maxAcceptableFee`
   */
  build(selection: SelectionSuccess, payment: TargetPayment, changeAddress?: string): TxPlan {
    this.validatePayment(payment);

    const { leftover } = selection;
    if (leftover < 0 || selection.totalInput - payment.amount - selection.computedFee !== leftover) {
      throw new InvalidPlanError(`Selection does not cover payment ${payment.amount}`);
    }

    const outputs = new Map<string, number>([[payment.destination, payment.amount]]);
    let changeAmount = 0;
    let foldedLeftover = 0;

    if (leftover >= this.dustThreshold && selection.mode === 'with-change') {
      if (!changeAddress) {
        throw new InvalidPlanError('A change output is required but no change address was given');
      }
      if (changeAddress === payment.destination) {
        throw new InvalidPlanError('Change address must differ from the destination');
      }
      outputs.set(changeAddress, leftover);
      changeAmount = leftover;
    } else if (leftover > 0) {
      foldedLeftover = leftover;
      if (leftover < this.dustThreshold) {
        this.logger.debug?.('Dust change folded into fee', { leftover });
      }
    }

    const plan: TxPlan = {
      kind: 'payment',
      inputs: selection.chosen.map(({ txId, outputIndex, amount }) => ({ txId, outputIndex, amount })),
      outputs,
      fee: selection.computedFee + foldedLeftover,
      totalInput: selection.totalInput,
      changeAmount,
      changeAddress: changeAmount > 0 ? changeAddress : undefined,
      foldedLeftover,
      strategy: selection.strategy,
    };

    this.verifyPlan(plan, payment.maxAcceptableFee);
    return plan;
  }

  /**
   * Check the balance, dust and input-uniqueness invariants of a plan
   *
   * @throws InvalidPlanError
   * @throws FeeLimitExceededError when `maxFee` is given and exceeded
   */
  verifyPlan(plan: TxPlan, maxFee?: number): void {
    if (plan.inputs.length === 0) {
      throw new InvalidPlanError('Plan has no inputs');
    }
    if (plan.outputs.size === 0) {
      throw new InvalidPlanError('Plan has no outputs');
    }

    const keys = new Set(plan.inputs.map(toOutpointKey));
    if (keys.size !== plan.inputs.length) {
      throw new InvalidPlanError('Plan spends the same output twice');
    }

    for (const input of plan.inputs) {
      if (!isKoinuAmount(input.amount)) {
        throw new InvalidPlanError(`Input ${toOutpointKey(input)} has an invalid amount ${input.amount}`);
      }
    }
    const inputTotal = plan.inputs.reduce((sum, input) => sum + input.amount, 0);
    if (!Number.isSafeInteger(inputTotal)) {
      throw new InvalidPlanError(`Input total exceeds ${Number.MAX_SAFE_INTEGER} koinu`);
    }
    if (inputTotal !== plan.totalInput) {
      throw new InvalidPlanError(`Input total ${inputTotal} does not match ${plan.totalInput}`);
    }

    let outputTotal = 0;
    for (const [address, amount] of plan.outputs) {
      if (!Number.isSafeInteger(amount) || amount < this.dustThreshold) {
        throw new InvalidPlanError(`Output to ${address} of ${amount} is below the dust threshold`);
      }
      outputTotal += amount;
    }

    if (!isKoinuAmount(plan.fee)) {
      throw new InvalidPlanError(`Fee ${plan.fee} is not a valid amount`);
    }
    if (!Number.isSafeInteger(outputTotal + plan.fee) || outputTotal + plan.fee !== plan.totalInput) {
      throw new InvalidPlanError(
        `Outputs ${outputTotal} plus fee ${plan.fee} do not equal inputs ${plan.totalInput}`,
      );
    }
    if (maxFee !== undefined && plan.fee > maxFee) {
      throw new FeeLimitExceededError(plan.fee, maxFee);
    }
  }
}
