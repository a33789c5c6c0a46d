/**
 * Payment engine configuration
 *
 * Monetary values are integer koinu; the loader converts decimal coin strings
 * from the environment at the boundary.
 */

import { isNetworkName, type NetworkName } from './networks.ts';

export interface ConsolidationConfig {
  /** Outputs strictly below this amount count as small */
  smallThreshold: number;
  /** Cap on inputs merged by one consolidation */
  maxInputs: number;
  /** Small-output count at which consolidation is recommended */
  recommendAboveCount: number;
}

export interface RpcConfig {
  url: string;
  username?: string | undefined;
  password?: string | undefined;
  timeout: number;
  retries: number;
  retryDelay: number;
}

export interface EngineConfig {
  network: NetworkName;
  /** Koinu per 1000 bytes */
  feeRate: number;
  minFee: number;
  dustThreshold: number;
  /** Largest leftover a changeless selection may give up to the fee */
  maxOverpay: number;
  /** Default ceiling on the total fee of a payment */
  maxFee: number;
  minConfirmations: number;
  lockTtlMs: number;
  consolidation: ConsolidationConfig;
  rpc: RpcConfig;
}

export type EngineConfigOverrides = Partial<Omit<EngineConfig, 'consolidation' | 'rpc'>> & {
  consolidation?: Partial<ConsolidationConfig> | undefined;
  rpc?: Partial<RpcConfig> | undefined;
};

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = {
  network: 'mainnet',
  feeRate: 1_000_000,
  minFee: 100_000,
  dustThreshold: 1_000_000,
  maxOverpay: 1_000_000,
  maxFee: 100_000_000,
  minConfirmations: 1,
  lockTtlMs: 10 * 60 * 1000,
  consolidation: {
    smallThreshold: 100_000_000,
    maxInputs: 200,
    recommendAboveCount: 50,
  },
  rpc: {
    url: 'http://127.0.0.1:22555',
    timeout: 30000,
    retries: 3,
    retryDelay: 1000,
  },
};

/**
 * Merge overrides onto the defaults. Nested sections merge key by key.
 * The result is not validated; see validateConfig.
 */
export function createEngineConfig(
  overrides: EngineConfigOverrides = {},
  base: Readonly<EngineConfig> = DEFAULT_ENGINE_CONFIG,
): EngineConfig {
  const { consolidation, rpc, ...flat } = overrides;
  return {
    ...base,
    ...flat,
    consolidation: { ...base.consolidation, ...consolidation },
    rpc: { ...base.rpc, ...rpc },
  };
}

function checkAmount(errors: string[], name: string, value: number, min = 0): void {
  if (!Number.isSafeInteger(value) || value < min) {
    errors.push(`${name} must be an integer amount in koinu >= ${min}`);
  }
}

/**
 * Validate configuration, returning every problem found
 */
export function validateConfig(config: EngineConfig): string[] {
  const errors: string[] = [];

  if (!isNetworkName(config.network)) {
    errors.push(`network must be one of mainnet, testnet, regtest (got ${String(config.network)})`);
  }

  checkAmount(errors, 'feeRate', config.feeRate);
  checkAmount(errors, 'minFee', config.minFee);
  checkAmount(errors, 'dustThreshold', config.dustThreshold, 1);
  checkAmount(errors, 'maxOverpay', config.maxOverpay);
  checkAmount(errors, 'maxFee', config.maxFee, 1);
  if (Number.isSafeInteger(config.maxFee) && config.maxFee < config.minFee) {
    errors.push('maxFee must not be below minFee');
  }

  if (!Number.isInteger(config.minConfirmations) || config.minConfirmations < 0) {
    errors.push('minConfirmations must be a non-negative integer');
  }
  if (!Number.isInteger(config.lockTtlMs) || config.lockTtlMs <= 0) {
    errors.push('lockTtlMs must be a positive integer');
  }

  checkAmount(errors, 'consolidation.smallThreshold', config.consolidation.smallThreshold, 1);
  if (!Number.isInteger(config.consolidation.maxInputs) || config.consolidation.maxInputs < 2) {
    errors.push('consolidation.maxInputs must be an integer >= 2');
  }
  if (
    !Number.isInteger(config.consolidation.recommendAboveCount) ||
    config.consolidation.recommendAboveCount < 2
  ) {
    errors.push('consolidation.recommendAboveCount must be an integer >= 2');
  }

  try {
    const url = new URL(config.rpc.url);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      errors.push(`rpc.url must use http or https (got ${url.protocol})`);
    }
  } catch {
    errors.push(`rpc.url is not a valid URL: ${config.rpc.url}`);
  }
  if (!Number.isInteger(config.rpc.timeout) || config.rpc.timeout <= 0) {
    errors.push('rpc.timeout must be a positive integer');
  }
  if (!Number.isInteger(config.rpc.retries) || config.rpc.retries < 0) {
    errors.push('rpc.retries must be a non-negative integer');
  }
  if (!Number.isInteger(config.rpc.retryDelay) || config.rpc.retryDelay < 0) {
    errors.push('rpc.retryDelay must be a non-negative integer');
  }

  return errors;
}
