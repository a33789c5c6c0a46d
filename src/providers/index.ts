/**
 * Ledger node providers
 */

export { BaseProvider } from './base-provider.ts';
export { RpcLedgerNode, type RpcLedgerNodeOptions } from './rpc-ledger-node.ts';
