/**
 * Payment Engine
 *
 * Caller-facing surface: plans payments and consolidations over a fresh UTXO
 * snapshot, and runs them end to end (lock, verify inputs, create, sign,
 * broadcast, release). A lock conflict triggers exactly one re-selection.
 */

import type { Network } from 'bitcoinjs-lib';

import {
  createEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
  validateConfig,
} from '../config/engine-config.ts';
import { getNetwork } from '../config/networks.ts';
import {
  BroadcastFailedError,
  ConfigurationError,
  InsufficientFundsError,
  InvalidParameterError,
  NoChangeFreeSolutionError,
  SigningFailedError,
  UtxoLockConflictError,
} from '../errors/index.ts';
import type { FeeRate } from '../interfaces/fee.interface.ts';
import type { LockPurpose } from '../interfaces/lock.interface.ts';
import type { ILedgerNode, SignedTransaction } from '../interfaces/provider.interface.ts';
import type { ICoinSelector } from '../interfaces/selector.interface.ts';
import {
  type SelectionFailure,
  SelectionFailureReason,
  type SelectionResult,
  type SelectionSuccess,
} from '../interfaces/selector-result.interface.ts';
import type {
  BroadcastReceipt,
  ConsolidationRequest,
  FeeQuote,
  PaymentRequest,
  PlanInput,
  PlanOutcome,
  TargetPayment,
  TxPlan,
} from '../interfaces/transaction.interface.ts';
import type { InventoryBalance, Utxo } from '../interfaces/utxo.interface.ts';
import { CoinSelector } from '../selectors/coin-selector.ts';
import { assertValidAddress } from '../utils/address.ts';
import { type Logger, SilentLogger } from '../utils/logger.ts';
import { toOutpointKey } from '../utils/outpoint.ts';
import {
  type ConsolidationRecommendation,
  ConsolidationPlanner,
  type UtxoSetSummary,
} from './consolidation-planner.ts';
import { FeeModel } from './fee-model.ts';
import { TransactionAssembler } from './transaction-assembler.ts';
import { UtxoInventory } from './utxo-inventory.ts';
import { UtxoLockManager } from './utxo-lock-manager.ts';

export interface PaymentEngineOptions {
  node: ILedgerNode;
  config?: EngineConfigOverrides;
  /** Shared lock table; one per process */
  lockManager?: UtxoLockManager;
  selector?: ICoinSelector;
  logger?: Logger;
}

export interface UtxoAnalysis {
  summary: UtxoSetSummary;
  recommendation: ConsolidationRecommendation;
}

export class PaymentEngine {
  /** Confirmation target passed to the node when the fee rate is 'node' */
  static readonly FEE_ESTIMATE_BLOCKS = 2;

  readonly config: Readonly<EngineConfig>;
  readonly lockManager: UtxoLockManager;

  private readonly node: ILedgerNode;
  private readonly network: Network;
  private readonly feeModel: FeeModel;
  private readonly selector: ICoinSelector;
  private readonly inventory: UtxoInventory;
  private readonly assembler: TransactionAssembler;
  private readonly planner: ConsolidationPlanner;
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError when the merged configuration is invalid
   */
  constructor(options: PaymentEngineOptions) {
    const config = createEngineConfig(options.config);
    const errors = validateConfig(config);
    if (errors.length > 0) {
      throw new ConfigurationError(errors);
    }

    this.config = config;
    this.node = options.node;
    this.network = getNetwork(config.network);
    this.logger = options.logger ?? new SilentLogger();
    this.feeModel = new FeeModel({ minFee: config.minFee });
    this.selector = options.selector ??
      new CoinSelector({ feeModel: this.feeModel, logger: this.logger });
    this.lockManager = options.lockManager ??
      new UtxoLockManager({ defaultTtlMs: config.lockTtlMs, logger: this.logger });
    this.inventory = new UtxoInventory(this.node, this.lockManager, { logger: this.logger });
    this.assembler = new TransactionAssembler({
      dustThreshold: config.dustThreshold,
      logger: this.logger,
    });
    this.planner = new ConsolidationPlanner({
      feeModel: this.feeModel,
      dustThreshold: config.dustThreshold,
      smallThreshold: config.consolidation.smallThreshold,
      maxInputs: config.consolidation.maxInputs,
      recommendAboveCount: config.consolidation.recommendAboveCount,
      logger: this.logger,
    });
  }

  /**
   * Start the background sweep of expired locks
   */
  start(sweepIntervalMs?: number): void {
    this.lockManager.startSweeper(sweepIntervalMs);
  }

  /**
   * Stop the sweeper and drop every lock. Returns the number of locks dropped.
   */
  shutdown(): number {
    return this.lockManager.shutdown();
  }

  /**
   * Select inputs and assemble a plan without locking or signing anything.
   * Ordinary selection failures come back as a structured failure.
   */
  async selectAndPlan(request: PaymentRequest): Promise<PlanOutcome> {
    const payment = this.validatePaymentRequest(request);
    const utxos = await this.inventory.load(request.addresses, this.config.minConfirmations);
    const selection = this.select(utxos, request, await this.resolveFeeRate(request.feeRate));
    if (!selection.success) {
      return selection;
    }

    const changeAddress = this.needsChange(selection)
      ? request.changeAddress ?? await this.node.getNewAddress('change')
      : undefined;
    if (changeAddress !== undefined) {
      assertValidAddress(changeAddress, this.network);
    }

    const plan = this.assembler.build(selection, payment, changeAddress);
    return { success: true, plan, selection };
  }

  /**
   * Plan merging the smallest outputs of `addresses` into one output
   *
   * @throws ConsolidationNotBeneficialError
   */
  async planConsolidation(request: ConsolidationRequest): Promise<TxPlan> {
    this.validateAddresses(request.addresses);
    assertValidAddress(request.destination, this.network);

    const utxos = await this.inventory.load(request.addresses, this.config.minConfirmations);
    const plan = this.planner.plan(utxos, {
      destination: request.destination,
      smallThreshold: request.smallThreshold ?? this.config.consolidation.smallThreshold,
      maxInputs: request.maxInputs ?? this.config.consolidation.maxInputs,
      feeRate: await this.resolveFeeRate(request.feeRate),
    });
    this.assembler.verifyPlan(plan, this.config.maxFee);

    return plan;
  }

  /**
   * Plan, lock, sign and broadcast a payment
   *
   * @throws InsufficientFundsError, NoChangeFreeSolutionError, UtxoLockConflictError
   *   (after one re-selection), SigningFailedError, BroadcastFailedError
   */
  sendPayment(request: PaymentRequest): Promise<BroadcastReceipt> {
    return this.withConflictRetry('payment', async (attempts) => {
      const outcome = await this.selectAndPlan(request);
      if (!outcome.success) {
        throw this.toError(outcome, request.amount);
      }

      const txid = await this.executePlan(outcome.plan, 'payment');
      this.logger.info('Payment broadcast', {
        txid,
        amount: request.amount,
        fee: outcome.plan.fee,
        inputs: outcome.plan.inputs.length,
        strategy: outcome.plan.strategy,
      });
      return { txid, plan: outcome.plan, attempts };
    });
  }

  /**
   * Plan, lock, sign and broadcast a consolidation
   */
  consolidate(request: ConsolidationRequest): Promise<BroadcastReceipt> {
    return this.withConflictRetry('consolidation', async (attempts) => {
      const plan = await this.planConsolidation(request);
      const txid = await this.executePlan(plan, 'consolidation');
      this.logger.info('Consolidation broadcast', {
        txid,
        inputs: plan.inputs.length,
        fee: plan.fee,
      });
      return { txid, plan, attempts };
    });
  }

  /**
   * Fee the payment would pay right now, without fetching a change address
   *
   * @throws InsufficientFundsError, NoChangeFreeSolutionError
   */
  async estimatePaymentFee(request: PaymentRequest): Promise<FeeQuote> {
    this.validatePaymentRequest(request);
    const utxos = await this.inventory.load(request.addresses, this.config.minConfirmations);
    const selection = this.select(utxos, request, await this.resolveFeeRate(request.feeRate));
    if (!selection.success) {
      throw this.toError(selection, request.amount);
    }

    const changeless = !this.needsChange(selection);
    return {
      fee: changeless ? selection.computedFee + selection.leftover : selection.computedFee,
      changeless,
      inputCount: selection.inputCount,
    };
  }

  async getBalance(addresses: readonly string[]): Promise<InventoryBalance> {
    this.validateAddresses(addresses);
    return this.inventory.balance(addresses, this.config.minConfirmations);
  }

  /**
   * Fragmentation summary and consolidation advice for `addresses`
   */
  async analyzeUtxos(
    addresses: readonly string[],
    feeRate?: FeeRate | 'node',
  ): Promise<UtxoAnalysis> {
    this.validateAddresses(addresses);
    const utxos = await this.inventory.snapshot(addresses, {
      minConfirmations: 0,
      includeLocked: true,
    });
    const spendable = utxos.filter((utxo) => utxo.confirmations >= this.config.minConfirmations);
    const rate = await this.resolveFeeRate(feeRate);

    return {
      summary: this.planner.summarize(utxos, this.config.minConfirmations),
      recommendation: this.planner.recommend(spendable, rate),
    };
  }

  private select(utxos: readonly Utxo[], request: PaymentRequest, feeRate: FeeRate): SelectionResult {
    return this.selector.select(utxos, {
      targetAmount: request.amount,
      feeRate,
      maxOverpay: this.config.maxOverpay,
      dustThreshold: this.config.dustThreshold,
      allowChange: request.allowChange ?? true,
    });
  }

  private needsChange(selection: SelectionSuccess): boolean {
    return selection.mode === 'with-change' && selection.leftover >= this.config.dustThreshold;
  }

  private async withConflictRetry(
    purpose: LockPurpose,
    run: (attempt: number) => Promise<BroadcastReceipt>,
  ): Promise<BroadcastReceipt> {
    try {
      return await run(1);
    } catch (error) {
      if (!(error instanceof UtxoLockConflictError)) {
        throw error;
      }
      this.logger.warn('UTXO conflict, re-selecting from a fresh inventory', {
        purpose,
        reason: error.reason,
        conflicts: error.conflicts,
      });
      return await run(2);
    }
  }

  /**
   * Lock, verify, create, sign and broadcast. Locks are released on every exit path.
   */
  private async executePlan(plan: TxPlan, purpose: LockPurpose): Promise<string> {
    const lease = this.lockManager.acquire(plan.inputs.map(toOutpointKey), purpose);

    try {
      await this.sendLockHints(plan.inputs, true);
      await this.verifyInputs(plan.inputs);

      const raw = await this.node.createTransaction(plan.inputs, plan.outputs);

      let signed: SignedTransaction;
      try {
        signed = await this.node.signTransaction(raw);
      } catch (error) {
        throw new SigningFailedError(
          `Node failed to sign: ${error instanceof Error ? error.message : String(error)}`,
          error,
        );
      }
      if (!signed.complete) {
        throw new SigningFailedError('Node could not sign every input');
      }

      try {
        return await this.node.broadcastTransaction(signed.hex);
      } catch (error) {
        throw new BroadcastFailedError(
          `Broadcast rejected: ${error instanceof Error ? error.message : String(error)}`,
          error,
        );
      }
    } finally {
      this.lockManager.release(lease);
      await this.sendLockHints(plan.inputs, false);
    }
  }

  /**
   * Every input must still be unspent with the amount the plan was built on
   *
   * @throws UtxoLockConflictError with reason 'spent'
   */
  private async verifyInputs(inputs: readonly PlanInput[]): Promise<void> {
    const outputs = await Promise.all(
      inputs.map((input) => this.node.getOutput(input.txId, input.outputIndex)),
    );
    const gone = inputs.filter((input, i) => outputs[i]?.amount !== input.amount);

    if (gone.length > 0) {
      throw new UtxoLockConflictError(gone.map(toOutpointKey), 'spent');
    }
  }

  /**
   * Node-side lock hints are advisory; failures are logged and never abort
   */
  private async sendLockHints(inputs: readonly PlanInput[], lock: boolean): Promise<void> {
    await Promise.all(inputs.map(async (input) => {
      try {
        if (lock) {
          await this.node.lockOutput(input);
        } else {
          await this.node.unlockOutput(input);
        }
      } catch (error) {
        this.logger.warn(`Node ${lock ? 'lock' : 'unlock'} hint failed`, {
          outpoint: toOutpointKey(input),
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }));
  }

  private validatePaymentRequest(request: PaymentRequest): TargetPayment {
    this.validateAddresses(request.addresses);
    assertValidAddress(request.destination, this.network);
    if (request.changeAddress !== undefined) {
      assertValidAddress(request.changeAddress, this.network);
    }

    const payment: TargetPayment = {
      destination: request.destination,
      amount: request.amount,
      maxAcceptableFee: request.maxFee ?? this.config.maxFee,
    };
    this.assembler.validatePayment(payment);
    if (request.feeRate !== 'node') {
      this.checkFeeRate(request.feeRate);
    }

    return payment;
  }

  private validateAddresses(addresses: readonly string[]): void {
    if (addresses.length === 0) {
      throw new InvalidParameterError('At least one sender address is required');
    }
    for (const address of addresses) {
      assertValidAddress(address, this.network);
    }
  }

  /**
   * The given rate, the node's estimate for 'node', or the configured rate.
   * A node without an estimate falls back to the configured rate.
   */
  private async resolveFeeRate(feeRate: FeeRate | 'node' | undefined): Promise<FeeRate> {
    if (feeRate !== 'node') {
      return this.checkFeeRate(feeRate);
    }

    const estimate = await this.node.estimateFeeRate(PaymentEngine.FEE_ESTIMATE_BLOCKS);
    if (estimate === null) {
      this.logger.warn('Node has no fee estimate, using the configured rate', {
        feeRate: this.config.feeRate,
      });
      return this.config.feeRate;
    }
    return this.checkFeeRate(estimate);
  }

  private checkFeeRate(feeRate: FeeRate | undefined): FeeRate {
    const rate = feeRate ?? this.config.feeRate;
    if (!Number.isSafeInteger(rate) || rate < 0) {
      throw new InvalidParameterError(`Fee rate must be a non-negative integer, got ${rate}`);
    }
    return rate;
  }

  private toError(failure: SelectionFailure, amount: number): Error {
    const details = failure.details ?? {};
    switch (failure.reason) {
      case SelectionFailureReason.INSUFFICIENT_FUNDS:
      case SelectionFailureReason.NO_UTXOS_AVAILABLE:
        return new InsufficientFundsError(
          details.targetAmount ?? amount,
          details.availableTotal ?? 0,
          details.feeAttempted ?? 0,
        );
      case SelectionFailureReason.NO_CHANGE_FREE_SOLUTION:
        return new NoChangeFreeSolutionError(
          details.targetAmount ?? amount,
          details.availableTotal ?? 0,
        );
      case SelectionFailureReason.INVALID_OPTIONS:
        return new InvalidParameterError(failure.message);
    }
  }
}
