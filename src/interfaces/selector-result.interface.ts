/**
 * Selection Result Interface
 * Provides structured responses for both success and failure cases
 */

import type { Utxo } from './utxo.interface.ts';

/**
 * Strategies the coin selector can run, in priority order
 */
export type StrategyName =
  | 'single-match'
  | 'bounded-combination'
  | 'exact-subset-sum'
  | 'change-permitting';

/**
 * Whether the leftover is meant to be folded into the fee or returned as change
 */
export type SelectionMode = 'changeless' | 'with-change';

/**
 * Reasons why selection might fail
 */
export enum SelectionFailureReason {
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
  NO_UTXOS_AVAILABLE = 'NO_UTXOS_AVAILABLE',
  NO_CHANGE_FREE_SOLUTION = 'NO_CHANGE_FREE_SOLUTION',
  INVALID_OPTIONS = 'INVALID_OPTIONS',
}

/**
 * Successful selection result
 *
 * `totalInput` is the sum of `chosen` amounts and
 * `leftover = totalInput - targetAmount - computedFee` is never negative.
 */
export interface SelectionSuccess {
  success: true;
  chosen: Utxo[];
  totalInput: number;
  computedFee: number;
  leftover: number;
  strategy: StrategyName;
  mode: SelectionMode;
  inputCount: number;
  outputCount: number;
  estimatedSize: number;
}

/**
 * Failed selection result with the context needed to explain it
 */
export interface SelectionFailure {
  success: false;
  reason: SelectionFailureReason;
  message: string;
  details?: {
    targetAmount?: number;
    availableTotal?: number;
    feeAttempted?: number;
    utxoCount?: number;
    feeRate?: number;
    maxOverpay?: number;
    attemptedStrategies?: StrategyName[];
  };
}

export type SelectionResult = SelectionSuccess | SelectionFailure;

/**
 * Helper function to create a failure result
 */
export function createSelectionFailure(
  reason: SelectionFailureReason,
  message: string,
  details?: SelectionFailure['details'],
): SelectionFailure {
  return {
    success: false,
    reason,
    message,
    details,
  };
}

/**
 * Check if a result is successful
 */
export function isSelectionSuccess(
  result: SelectionResult,
): result is SelectionSuccess {
  return result.success === true;
}

/**
 * Check if a result is a failure
 */
export function isSelectionFailure(
  result: SelectionResult,
): result is SelectionFailure {
  return result.success === false;
}
