export type { FeeModelOptions, FeeRate, IFeeModel, TransactionShape } from './fee.interface.ts';
export type { LockLease, LockPurpose, LockStatistics, UtxoLock } from './lock.interface.ts';
export type { ILedgerNode, ProviderOptions, SignedTransaction } from './provider.interface.ts';
export type {
  ICoinSelector,
  ISelectionStrategy,
  SelectionOptions,
  StrategyOutcome,
} from './selector.interface.ts';
export {
  createSelectionFailure,
  isSelectionFailure,
  isSelectionSuccess,
  SelectionFailureReason,
} from './selector-result.interface.ts';
export type {
  SelectionFailure,
  SelectionMode,
  SelectionResult,
  SelectionSuccess,
  StrategyName,
} from './selector-result.interface.ts';
export type {
  BroadcastReceipt,
  ConsolidationRequest,
  FeeQuote,
  PaymentRequest,
  PlanInput,
  PlanKind,
  PlanOutcome,
  TargetPayment,
  TxPlan,
} from './transaction.interface.ts';
export type { InventoryBalance, Outpoint, Utxo, UtxoSnapshotOptions } from './utxo.interface.ts';
