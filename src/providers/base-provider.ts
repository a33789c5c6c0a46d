/**
 * Base Ledger Node Provider
 * Retry, timeout and validation shared by every node transport
 */

import type { Network } from 'bitcoinjs-lib';

import { NodeRpcError } from '../errors/index.ts';
import type { FeeRate } from '../interfaces/fee.interface.ts';
import type {
  ILedgerNode,
  ProviderOptions,
  SignedTransaction,
} from '../interfaces/provider.interface.ts';
import type { Outpoint, Utxo } from '../interfaces/utxo.interface.ts';
import { isValidAddress } from '../utils/address.ts';
import { type Logger, SilentLogger } from '../utils/logger.ts';

export abstract class BaseProvider implements ILedgerNode {
  protected network: Network;
  protected timeout: number;
  protected retries: number;
  protected retryDelay: number;
  protected maxRetryDelay: number;
  protected logger: Logger;

  constructor(options: ProviderOptions, logger?: Logger) {
    this.network = options.network;
    this.timeout = options.timeout ?? 30000;
    this.retries = options.retries ?? 3;
    this.retryDelay = options.retryDelay ?? 1000;
    this.maxRetryDelay = options.maxRetryDelay ?? 10000;
    this.logger = logger ?? new SilentLogger();
  }

  abstract listUnspent(
    minConfirmations: number,
    maxConfirmations: number,
    addresses: readonly string[],
  ): Promise<Utxo[]>;
  abstract lockOutput(outpoint: Outpoint): Promise<void>;
  abstract unlockOutput(outpoint: Outpoint): Promise<void>;
  abstract createTransaction(
    inputs: readonly Outpoint[],
    outputs: ReadonlyMap<string, number>,
  ): Promise<string>;
  abstract signTransaction(rawTransaction: string): Promise<SignedTransaction>;
  abstract broadcastTransaction(signedTransaction: string): Promise<string>;
  abstract getOutput(txId: string, outputIndex: number): Promise<Utxo | null>;
  abstract getNewAddress(label?: string): Promise<string>;
  abstract estimateFeeRate(targetBlocks: number): Promise<FeeRate | null>;

  getNetwork(): Network {
    return this.network;
  }

  /**
   * Execute request with retry logic. Errors the node answered with are final;
   * transport failures and timeouts are retried with exponential backoff.
   */
  protected async executeWithRetry<T>(
    fn: () => Promise<T>,
    retries = this.retries,
  ): Promise<T> {
    let lastError: unknown;
    let delay = this.retryDelay;

    for (let i = 0; i <= retries; i++) {
      try {
        return await this.executeWithTimeout(fn);
      } catch (error) {
        lastError = error;

        if (i < retries && this.isRetryable(error)) {
          this.logger.warn('Node request failed, retrying', {
            attempt: i + 1,
            delayMs: delay,
            error: error instanceof Error ? error.message : String(error),
          });
          await this.sleep(delay);
          delay = Math.min(delay * 2, this.maxRetryDelay); // Exponential backoff
        } else {
          break;
        }
      }
    }

    throw lastError ?? new Error('Request failed after retries');
  }

  /**
   * Execute request with timeout
   */
  protected async executeWithTimeout<T>(
    fn: () => Promise<T>,
    timeout = this.timeout,
  ): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        fn(),
        new Promise<T>((_, reject) => {
          timer = setTimeout(() => reject(new Error('Request timeout')), timeout);
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * An RPC error carrying a node error code is an answer, not a transport failure
   */
  protected isRetryable(error: unknown): boolean {
    return !(error instanceof NodeRpcError && error.rpcCode !== undefined);
  }

  /**
   * Sleep for specified milliseconds
   */
  protected sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  /**
   * Validate address format for this provider's network
   */
  protected isValidAddress(address: string): boolean {
    return isValidAddress(address, this.network);
  }

  /**
   * Validate transaction ID format
   */
  protected isValidTxid(txid: string): boolean {
    return /^[a-fA-F0-9]{64}$/.test(txid);
  }
}
