/**
 * Ledger Node Interface
 * The operations the engine consumes from the node, independent of transport
 */

import type { Network } from 'bitcoinjs-lib';

import type { FeeRate } from './fee.interface.ts';
import type { Outpoint, Utxo } from './utxo.interface.ts';

export interface SignedTransaction {
  hex: string;
  /** False when the node could not sign every input */
  complete: boolean;
}

export interface ILedgerNode {
  /**
   * List unspent outputs for the given addresses
   */
  listUnspent(
    minConfirmations: number,
    maxConfirmations: number,
    addresses: readonly string[],
  ): Promise<Utxo[]>;

  /**
   * Hint the node to keep an output out of its own coin selection
   */
  lockOutput(outpoint: Outpoint): Promise<void>;

  /**
   * Release a hint set by lockOutput
   */
  unlockOutput(outpoint: Outpoint): Promise<void>;

  /**
   * Build an unsigned raw transaction
   */
  createTransaction(
    inputs: readonly Outpoint[],
    outputs: ReadonlyMap<string, number>,
  ): Promise<string>;

  /**
   * Sign a raw transaction with wallet keys
   */
  signTransaction(rawTransaction: string): Promise<SignedTransaction>;

  /**
   * Broadcast a signed transaction, returning its transaction ID
   */
  broadcastTransaction(signedTransaction: string): Promise<string>;

  /**
   * Look up an output, or null when it is spent or unknown
   */
  getOutput(txId: string, outputIndex: number): Promise<Utxo | null>;

  /**
   * Designate a fresh wallet address
   */
  getNewAddress(label?: string): Promise<string>;

  /**
   * Node fee estimate in koinu per 1000 bytes, or null when unavailable
   */
  estimateFeeRate(targetBlocks: number): Promise<FeeRate | null>;
}

export interface ProviderOptions {
  network: Network;
  timeout?: number;
  retries?: number;
  retryDelay?: number;
  maxRetryDelay?: number;
}
