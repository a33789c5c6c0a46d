/**
 * Custom Error Classes
 *
 * Every error that crosses the engine boundary carries a stable `code` and the
 * context a caller needs to render a message without re-deriving it.
 */

export type PaymentEngineErrorCode =
  | 'INVENTORY_UNAVAILABLE'
  | 'INSUFFICIENT_FUNDS'
  | 'NO_CHANGE_FREE_SOLUTION'
  | 'UTXO_LOCK_CONFLICT'
  | 'SIGNING_FAILED'
  | 'BROADCAST_FAILED'
  | 'CONSOLIDATION_NOT_BENEFICIAL'
  | 'FEE_LIMIT_EXCEEDED'
  | 'INVALID_PARAMETER'
  | 'INVALID_ADDRESS'
  | 'INVALID_PLAN'
  | 'NODE_RPC_ERROR'
  | 'CONFIGURATION_ERROR';

export class PaymentEngineError extends Error {
  public readonly code: PaymentEngineErrorCode;

  constructor(message: string, code: PaymentEngineErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PaymentEngineError';
    this.code = code;
  }
}

export class InventoryUnavailableError extends PaymentEngineError {
  public readonly addresses: readonly string[];

  constructor(addresses: readonly string[], cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(
      `UTXO inventory unavailable for ${addresses.length} address(es)${reason}`,
      'INVENTORY_UNAVAILABLE',
      { cause },
    );
    this.name = 'InventoryUnavailableError';
    this.addresses = addresses;
  }
}

export class InsufficientFundsError extends PaymentEngineError {
  public readonly targetAmount: number;
  public readonly availableTotal: number;
  public readonly feeAttempted: number;

  constructor(targetAmount: number, availableTotal: number, feeAttempted: number) {
    super(
      `Insufficient funds: required ${targetAmount + feeAttempted} (amount ${targetAmount} + fee ${feeAttempted}), available ${availableTotal}`,
      'INSUFFICIENT_FUNDS',
    );
    this.name = 'InsufficientFundsError';
    this.targetAmount = targetAmount;
    this.availableTotal = availableTotal;
    this.feeAttempted = feeAttempted;
  }
}

export class NoChangeFreeSolutionError extends PaymentEngineError {
  public readonly targetAmount: number;
  public readonly availableTotal: number;

  constructor(targetAmount: number, availableTotal: number) {
    super(
      `No selection pays ${targetAmount} without a change output (available ${availableTotal})`,
      'NO_CHANGE_FREE_SOLUTION',
    );
    this.name = 'NoChangeFreeSolutionError';
    this.targetAmount = targetAmount;
    this.availableTotal = availableTotal;
  }
}

export class UtxoLockConflictError extends PaymentEngineError {
  public readonly conflicts: readonly string[];
  public readonly reason: 'locked' | 'spent';

  constructor(conflicts: readonly string[], reason: 'locked' | 'spent' = 'locked') {
    super(
      reason === 'locked'
        ? `UTXOs already locked by another request: ${conflicts.join(', ')}`
        : `UTXOs no longer unspent: ${conflicts.join(', ')}`,
      'UTXO_LOCK_CONFLICT',
    );
    this.name = 'UtxoLockConflictError';
    this.conflicts = conflicts;
    this.reason = reason;
  }
}

export class SigningFailedError extends PaymentEngineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SIGNING_FAILED', { cause });
    this.name = 'SigningFailedError';
  }
}

export class BroadcastFailedError extends PaymentEngineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'BROADCAST_FAILED', { cause });
    this.name = 'BroadcastFailedError';
  }
}

export class ConsolidationNotBeneficialError extends PaymentEngineError {
  public readonly candidateCount: number;

  constructor(candidateCount: number, message: string) {
    super(message, 'CONSOLIDATION_NOT_BENEFICIAL');
    this.name = 'ConsolidationNotBeneficialError';
    this.candidateCount = candidateCount;
  }
}

export class FeeLimitExceededError extends PaymentEngineError {
  public readonly fee: number;
  public readonly maxFee: number;

  constructor(fee: number, maxFee: number) {
    super(`Fee ${fee} exceeds the accepted maximum ${maxFee}`, 'FEE_LIMIT_EXCEEDED');
    this.name = 'FeeLimitExceededError';
    this.fee = fee;
    this.maxFee = maxFee;
  }
}

export class InvalidParameterError extends PaymentEngineError {
  constructor(message: string) {
    super(message, 'INVALID_PARAMETER');
    this.name = 'InvalidParameterError';
  }
}

export class InvalidAddressError extends PaymentEngineError {
  public readonly address: string;

  constructor(address: string) {
    super(`Invalid address: ${address}`, 'INVALID_ADDRESS');
    this.name = 'InvalidAddressError';
    this.address = address;
  }
}

export class InvalidPlanError extends PaymentEngineError {
  constructor(message: string) {
    super(message, 'INVALID_PLAN');
    this.name = 'InvalidPlanError';
  }
}

export class NodeRpcError extends PaymentEngineError {
  public readonly method: string;
  public readonly rpcCode?: number | undefined;

  constructor(method: string, message: string, rpcCode?: number, cause?: unknown) {
    super(`Node call ${method} failed: ${message}`, 'NODE_RPC_ERROR', { cause });
    this.name = 'NodeRpcError';
    this.method = method;
    this.rpcCode = rpcCode;
  }
}

export class ConfigurationError extends PaymentEngineError {
  public readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(`Configuration validation failed: ${errors.join(', ')}`, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    this.errors = errors;
  }
}
