/**
 * @module changeless-payments
 *
 * Coin selection and transaction planning for Dogecoin-family UTXO wallets.
 * Payments are assembled to pay the exact amount with no change output where
 * the inventory allows it, and with a single change output otherwise.
 *
 * @example Planning a payment
 * ```typescript
 * import { PaymentEngine, RpcLedgerNode, ConfigLoader } from 'changeless-payments';
 *
 * const config = ConfigLoader.loadConfig();
 * const engine = new PaymentEngine({ node: RpcLedgerNode.fromConfig(config), config });
 *
 * const outcome = await engine.selectAndPlan({
 *   addresses: ['D...'],
 *   destination: 'D...',
 *   amount: 500_000_000,
 * });
 * if (outcome.success) {
 *   console.log(outcome.plan.fee, outcome.plan.changeAmount);
 * }
 * ```
 */

// Core exports
export * from './core/index.ts';

// Selector exports
export * from './selectors/index.ts';

// Provider exports
export * from './providers/index.ts';

// Configuration exports
export * from './config/index.ts';

// Interface exports
export * from './interfaces/index.ts';

// Error exports
export * from './errors/index.ts';

// Utility exports
export * from './utils/index.ts';
