/**
 * @module Core
 * @description Payment planning and execution: fee model, UTXO inventory and
 * lock table, transaction assembly, consolidation and the engine that runs
 * them against a ledger node.
 *
 * @example Paying without change
 * ```typescript
 * import { PaymentEngine, RpcLedgerNode, ConfigLoader } from 'changeless-payments';
 *
 * const config = ConfigLoader.loadConfig();
 * const engine = new PaymentEngine({ node: RpcLedgerNode.fromConfig(config), config });
 * engine.start();
 *
 * const receipt = await engine.sendPayment({
 *   addresses: ['D...'],
 *   destination: 'D...',
 *   amount: 1_000_000_000, // 10 coins in koinu
 * });
 * console.log(receipt.txid, receipt.plan.fee);
 *
 * engine.shutdown();
 * ```
 */

export {
  ConsolidationPlanner,
  type ConsolidationPlannerOptions,
  type ConsolidationPlanParams,
  type ConsolidationRecommendation,
  type UtxoSetSummary,
} from './consolidation-planner.ts';
export { FeeModel } from './fee-model.ts';
export { PaymentEngine, type PaymentEngineOptions, type UtxoAnalysis } from './payment-engine.ts';
export { TransactionAssembler, type TransactionAssemblerOptions } from './transaction-assembler.ts';
export { UtxoInventory, type UtxoInventoryOptions } from './utxo-inventory.ts';
export { UtxoLockManager, type UtxoLockManagerOptions } from './utxo-lock-manager.ts';
