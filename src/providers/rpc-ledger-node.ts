/**
 * JSON-RPC Ledger Node
 * Talks to a Dogecoin Core compatible node over its HTTP JSON-RPC 1.0 interface
 */

import axios, { type AxiosInstance } from 'axios';

import { getNetwork } from '../config/networks.ts';
import type { EngineConfig } from '../config/engine-config.ts';
import {
  ConfigurationError,
  InvalidAddressError,
  InvalidParameterError,
  NodeRpcError,
} from '../errors/index.ts';
import type { FeeRate } from '../interfaces/fee.interface.ts';
import type { ProviderOptions, SignedTransaction } from '../interfaces/provider.interface.ts';
import type { Outpoint, Utxo } from '../interfaces/utxo.interface.ts';
import { formatAmount, parseAmount } from '../utils/amount.ts';
import type { Logger } from '../utils/logger.ts';
import {
  isNonEmptyString,
  isRecord,
  numberOrDefault,
  stringOrDefault,
} from '../utils/type-guards.ts';
import { BaseProvider } from './base-provider.ts';

export interface RpcLedgerNodeOptions extends ProviderOptions {
  url: string;
  username: string;
  password: string;
  /** Preconfigured HTTP client; replaces the one built from url and credentials */
  client?: AxiosInstance;
}

export class RpcLedgerNode extends BaseProvider {
  private readonly client: AxiosInstance;
  private requestId = 0;

  constructor(options: RpcLedgerNodeOptions, logger?: Logger) {
    super(options, logger);

    this.client = options.client ?? axios.create({
      baseURL: options.url,
      timeout: this.timeout,
      auth: { username: options.username, password: options.password },
      headers: { 'Content-Type': 'application/json' },
    });
  }

  /**
   * @throws ConfigurationError when RPC credentials are missing
   */
  static fromConfig(config: EngineConfig, logger?: Logger): RpcLedgerNode {
    const { username, password } = config.rpc;
    if (!username || !password) {
      throw new ConfigurationError(['rpc.username and rpc.password are required']);
    }

    return new RpcLedgerNode(
      {
        network: getNetwork(config.network),
        url: config.rpc.url,
        username,
        password,
        timeout: config.rpc.timeout,
        retries: config.rpc.retries,
        retryDelay: config.rpc.retryDelay,
      },
      logger,
    );
  }

  listUnspent(
    minConfirmations: number,
    maxConfirmations: number,
    addresses: readonly string[],
  ): Promise<Utxo[]> {
    return this.executeWithRetry(() =>
      this.call(
        'listunspent',
        [minConfirmations, maxConfirmations, [...addresses]],
        (result) => {
          if (!Array.isArray(result)) {
            throw new NodeRpcError('listunspent', 'Expected an array of unspent outputs');
          }
          return result.map((entry) => parseUnspent(entry));
        },
      )
    );
  }

  lockOutput(outpoint: Outpoint): Promise<void> {
    return this.setOutputLock(outpoint, false);
  }

  unlockOutput(outpoint: Outpoint): Promise<void> {
    return this.setOutputLock(outpoint, true);
  }

  async createTransaction(
    inputs: readonly Outpoint[],
    outputs: ReadonlyMap<string, number>,
  ): Promise<string> {
    const amounts: Record<string, string> = {};
    for (const [address, amount] of outputs) {
      if (!this.isValidAddress(address)) {
        throw new InvalidAddressError(address);
      }
      amounts[address] = formatAmount(amount);
    }
    const spends = inputs.map(({ txId, outputIndex }) => ({ txid: txId, vout: outputIndex }));

    return this.executeWithRetry(() =>
      this.call('createrawtransaction', [spends, amounts], (result) => {
        if (!isNonEmptyString(result)) {
          throw new NodeRpcError('createrawtransaction', 'Expected a raw transaction hex string');
        }
        return result;
      })
    );
  }

  /**
   * Signing is never retried
   */
  signTransaction(rawTransaction: string): Promise<SignedTransaction> {
    return this.executeWithTimeout(() =>
      this.call('signrawtransaction', [rawTransaction], (result) => {
        if (!isRecord(result) || typeof result.hex !== 'string' || typeof result.complete !== 'boolean') {
          throw new NodeRpcError('signrawtransaction', 'Expected { hex, complete }');
        }
        return { hex: result.hex, complete: result.complete };
      })
    );
  }

  /**
   * Broadcasting is never retried
   */
  broadcastTransaction(signedTransaction: string): Promise<string> {
    return this.executeWithTimeout(() =>
      this.call('sendrawtransaction', [signedTransaction], (result) => {
        if (typeof result !== 'string' || !this.isValidTxid(result)) {
          throw new NodeRpcError('sendrawtransaction', 'Expected a transaction ID');
        }
        return result;
      })
    );
  }

  async getOutput(txId: string, outputIndex: number): Promise<Utxo | null> {
    if (!this.isValidTxid(txId)) {
      throw new InvalidParameterError(`Invalid transaction ID: ${txId}`);
    }

    return this.executeWithRetry(() =>
      this.call('gettxout', [txId, outputIndex, true], (result) => {
        if (result === null) {
          return null;
        }
        if (!isRecord(result) || !isRecord(result.scriptPubKey)) {
          throw new NodeRpcError('gettxout', 'Malformed output');
        }

        const { scriptPubKey } = result;
        const address = Array.isArray(scriptPubKey.addresses)
          ? scriptPubKey.addresses[0]
          : scriptPubKey.address;

        return {
          txId,
          outputIndex,
          address: stringOrDefault(address, ''),
          amount: parseNodeAmount('gettxout', result.value),
          confirmations: numberOrDefault(result.confirmations, 0),
          locked: false,
        };
      })
    );
  }

  getNewAddress(label?: string): Promise<string> {
    return this.executeWithRetry(() =>
      this.call('getnewaddress', label === undefined ? [] : [label], (result) => {
        if (!isNonEmptyString(result)) {
          throw new NodeRpcError('getnewaddress', 'Expected an address');
        }
        return result;
      })
    );
  }

  /**
   * Koinu per 1000 bytes, or null when the node has too little data (-1)
   */
  estimateFeeRate(targetBlocks: number): Promise<FeeRate | null> {
    return this.executeWithRetry(() =>
      this.call('estimatefee', [targetBlocks], (result) => {
        if (typeof result !== 'number') {
          throw new NodeRpcError('estimatefee', 'Expected a number');
        }
        return result < 0 ? null : parseNodeAmount('estimatefee', result);
      })
    );
  }

  private setOutputLock(outpoint: Outpoint, unlock: boolean): Promise<void> {
    return this.executeWithRetry(() =>
      this.call(
        'lockunspent',
        [unlock, [{ txid: outpoint.txId, vout: outpoint.outputIndex }]],
        () => undefined,
      )
    );
  }

  /**
   * One JSON-RPC round trip. Node errors surface as NodeRpcError with the
   * node's error code; transport errors carry no code.
   */
  private async call<T>(
    method: string,
    params: unknown[],
    parse: (result: unknown) => T,
  ): Promise<T> {
    const payload = { jsonrpc: '1.0', id: ++this.requestId, method, params };

    let body: unknown;
    try {
      const response = await this.client.post<unknown>('/', payload);
      body = response.data;
    } catch (error) {
      // The node answers RPC errors with HTTP 500 and the usual envelope
      if (axios.isAxiosError(error) && error.response) {
        const rpcError = extractRpcError(method, error.response.data, error);
        if (rpcError) {
          throw rpcError;
        }
        throw new NodeRpcError(method, `HTTP ${error.response.status}`, undefined, error);
      }
      throw new NodeRpcError(
        method,
        error instanceof Error ? error.message : String(error),
        undefined,
        error,
      );
    }

    const rpcError = extractRpcError(method, body);
    if (rpcError) {
      throw rpcError;
    }
    if (!isRecord(body) || !('result' in body)) {
      throw new NodeRpcError(method, 'Malformed JSON-RPC response');
    }

    return parse(body.result);
  }
}

function extractRpcError(method: string, body: unknown, cause?: unknown): NodeRpcError | null {
  if (!isRecord(body) || !isRecord(body.error)) {
    return null;
  }
  const message = stringOrDefault(body.error.message, 'Unknown node error');
  const code = typeof body.error.code === 'number' ? body.error.code : undefined;
  return new NodeRpcError(method, message, code, cause);
}

function parseNodeAmount(method: string, value: unknown): number {
  if (typeof value !== 'number' && typeof value !== 'string') {
    throw new NodeRpcError(method, `Expected an amount, got ${typeof value}`);
  }
  try {
    return parseAmount(value);
  } catch (error) {
    throw new NodeRpcError(
      method,
      error instanceof Error ? error.message : String(error),
      undefined,
      error,
    );
  }
}

function parseUnspent(entry: unknown): Utxo {
  if (
    !isRecord(entry) ||
    typeof entry.txid !== 'string' ||
    typeof entry.vout !== 'number' ||
    typeof entry.address !== 'string'
  ) {
    throw new NodeRpcError('listunspent', 'Malformed unspent output');
  }

  return {
    txId: entry.txid,
    outputIndex: entry.vout,
    address: entry.address,
    amount: parseNodeAmount('listunspent', entry.amount),
    confirmations: numberOrDefault(entry.confirmations, 0),
    locked: false,
  };
}
