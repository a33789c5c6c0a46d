/**
 * Transaction Plan Interface
 * The engine decides what to sign and what to broadcast; the node does both.
 */

import type { FeeRate } from './fee.interface.ts';
import type {
  SelectionFailure,
  SelectionSuccess,
  StrategyName,
} from './selector-result.interface.ts';
import type { Outpoint } from './utxo.interface.ts';

/**
 * Payment to a single destination
 */
export interface TargetPayment {
  destination: string;
  /** Exact amount the destination receives, in koinu */
  amount: number;
  /** Largest total fee the sender accepts, in koinu */
  maxAcceptableFee: number;
}

/**
 * Plan input: outpoint plus the amount seen in the snapshot
 */
export interface PlanInput extends Outpoint {
  readonly amount: number;
}

export type PlanKind = 'payment' | 'consolidation';

/**
 * Fully decided transaction
 *
 * Invariant: sum(outputs) + fee === totalInput, and no output is below dust.
 */
export interface TxPlan {
  kind: PlanKind;
  /** Inputs in signing order */
  inputs: readonly PlanInput[];
  /** Address to amount, in koinu */
  outputs: ReadonlyMap<string, number>;
  fee: number;
  totalInput: number;
  /** Change output amount, 0 when the plan has none */
  changeAmount: number;
  changeAddress?: string | undefined;
  /** Leftover added to the fee instead of becoming change */
  foldedLeftover: number;
  /** Strategy that chose the inputs */
  strategy: StrategyName | 'consolidation';
}

/**
 * Caller-facing payment request
 */
export interface PaymentRequest {
  /** Sender addresses whose outputs may be spent */
  addresses: readonly string[];
  destination: string;
  /** Amount in koinu */
  amount: number;
  /** Overrides the configured fee rate; 'node' asks the node for an estimate */
  feeRate?: FeeRate | 'node' | undefined;
  /** Overrides the configured fee ceiling */
  maxFee?: number | undefined;
  /** Permit a change output when no changeless selection exists (default true) */
  allowChange?: boolean | undefined;
  /** Change destination; a fresh node address is requested when omitted */
  changeAddress?: string | undefined;
}

export interface ConsolidationRequest {
  addresses: readonly string[];
  destination: string;
  /** Outputs strictly below this amount are merged */
  smallThreshold?: number | undefined;
  maxInputs?: number | undefined;
  feeRate?: FeeRate | 'node' | undefined;
}

export type PlanOutcome =
  | { success: true; plan: TxPlan; selection: SelectionSuccess }
  | SelectionFailure;

export interface BroadcastReceipt {
  txid: string;
  plan: TxPlan;
  /** 1, or 2 when a lock conflict forced a re-selection */
  attempts: number;
}

export interface FeeQuote {
  fee: number;
  /** True when the payment needs no change output */
  changeless: boolean;
  inputCount: number;
}
