/**
 * Configuration Loader for the payment engine
 * Loads configuration with priority:
 * 1. Runtime options (passed to loadConfig)
 * 2. Environment variables
 * 3. Config file (.payment-engine.json or payment-engine.config.json)
 * 4. Default values
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import process from 'node:process';

import { ConfigurationError } from '../errors/index.ts';
import { parseAmount } from '../utils/amount.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { isRecord } from '../utils/type-guards.ts';
import {
  type ConsolidationConfig,
  createEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
  type RpcConfig,
  validateConfig,
} from './engine-config.ts';
import { isNetworkName } from './networks.ts';

export const CONFIG_FILE_NAMES = [
  '.payment-engine.json',
  'payment-engine.config.json',
  path.join('config', 'payment-engine.json'),
] as const;

/**
 * Environment variables understood by the loader. Monetary values are decimal coins.
 */
export const ENGINE_ENV_VARS = {
  PAYMENT_ENGINE_NETWORK: 'mainnet | testnet | regtest',
  PAYMENT_ENGINE_FEE_RATE: 'Fee rate in coins per 1000 bytes, e.g. 0.01',
  PAYMENT_ENGINE_MIN_FEE: 'Minimum fee in coins',
  PAYMENT_ENGINE_DUST_THRESHOLD: 'Smallest output value in coins',
  PAYMENT_ENGINE_MAX_OVERPAY: 'Largest leftover folded into the fee, in coins',
  PAYMENT_ENGINE_MAX_FEE: 'Default fee ceiling per payment, in coins',
  PAYMENT_ENGINE_MIN_CONFIRMATIONS: 'Confirmations required to spend an output',
  PAYMENT_ENGINE_LOCK_TTL_MS: 'Lifetime of an in-flight UTXO lock, in milliseconds',
  PAYMENT_ENGINE_CONSOLIDATION_THRESHOLD: 'Outputs below this many coins are consolidated',
  PAYMENT_ENGINE_CONSOLIDATION_MAX_INPUTS: 'Most inputs merged per consolidation',
  NODE_RPC_URL: 'Node JSON-RPC endpoint, e.g. http://127.0.0.1:22555',
  NODE_RPC_USER: 'Node RPC username',
  NODE_RPC_PASSWORD: 'Node RPC password',
  NODE_RPC_TIMEOUT: 'RPC request timeout in milliseconds',
} as const;

export interface ConfigLoaderOptions {
  /** Directory searched for config files (default: process.cwd()) */
  cwd?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export class ConfigLoader {
  private readonly cwd: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;

  constructor(options: ConfigLoaderOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? new ConsoleLogger();
  }

  /**
   * Load and validate configuration
   *
   * @throws ConfigurationError listing every invalid value
   */
  static loadConfig(
    overrides?: EngineConfigOverrides,
    options?: ConfigLoaderOptions,
  ): EngineConfig {
    return new ConfigLoader(options).load(overrides);
  }

  load(overrides?: EngineConfigOverrides): EngineConfig {
    const errors: string[] = [];

    let config = createEngineConfig();

    const fileConfig = this.loadConfigFile(errors);
    if (fileConfig) {
      config = createEngineConfig(fileConfig, config);
    }

    const envConfig = this.loadConfigFromEnvironment(errors);
    config = createEngineConfig(envConfig, config);

    if (overrides) {
      config = createEngineConfig(overrides, config);
    }

    errors.push(...validateConfig(config));
    if (errors.length > 0) {
      throw new ConfigurationError(errors);
    }

    return config;
  }

  private loadConfigFromEnvironment(errors: string[]): EngineConfigOverrides {
    const env = this.env;
    const config: EngineConfigOverrides = {};
    const consolidation: Partial<ConsolidationConfig> = {};
    const rpc: Partial<RpcConfig> = {};

    const network = env.PAYMENT_ENGINE_NETWORK?.trim().toLowerCase();
    if (network) {
      if (isNetworkName(network)) {
        config.network = network;
      } else {
        errors.push(`PAYMENT_ENGINE_NETWORK must be mainnet, testnet or regtest (got ${network})`);
      }
    }

    const amount = (name: keyof typeof ENGINE_ENV_VARS): number | undefined => {
      const raw = env[name];
      if (raw === undefined || raw.trim() === '') return undefined;
      try {
        return parseAmount(raw);
      } catch (error) {
        errors.push(`${name}: ${error instanceof Error ? error.message : String(error)}`);
        return undefined;
      }
    };

    const integer = (name: keyof typeof ENGINE_ENV_VARS): number | undefined => {
      const raw = env[name];
      if (raw === undefined || raw.trim() === '') return undefined;
      if (!/^\d+$/.test(raw.trim())) {
        errors.push(`${name} must be a non-negative integer (got ${raw})`);
        return undefined;
      }
      return Number(raw.trim());
    };

    const feeRate = amount('PAYMENT_ENGINE_FEE_RATE');
    if (feeRate !== undefined) config.feeRate = feeRate;
    const minFee = amount('PAYMENT_ENGINE_MIN_FEE');
    if (minFee !== undefined) config.minFee = minFee;
    const dustThreshold = amount('PAYMENT_ENGINE_DUST_THRESHOLD');
    if (dustThreshold !== undefined) config.dustThreshold = dustThreshold;
    const maxOverpay = amount('PAYMENT_ENGINE_MAX_OVERPAY');
    if (maxOverpay !== undefined) config.maxOverpay = maxOverpay;
    const maxFee = amount('PAYMENT_ENGINE_MAX_FEE');
    if (maxFee !== undefined) config.maxFee = maxFee;
    const minConfirmations = integer('PAYMENT_ENGINE_MIN_CONFIRMATIONS');
    if (minConfirmations !== undefined) config.minConfirmations = minConfirmations;
    const lockTtlMs = integer('PAYMENT_ENGINE_LOCK_TTL_MS');
    if (lockTtlMs !== undefined) config.lockTtlMs = lockTtlMs;

    const smallThreshold = amount('PAYMENT_ENGINE_CONSOLIDATION_THRESHOLD');
    if (smallThreshold !== undefined) consolidation.smallThreshold = smallThreshold;
    const maxInputs = integer('PAYMENT_ENGINE_CONSOLIDATION_MAX_INPUTS');
    if (maxInputs !== undefined) consolidation.maxInputs = maxInputs;

    if (env.NODE_RPC_URL) rpc.url = env.NODE_RPC_URL;
    if (env.NODE_RPC_USER) rpc.username = env.NODE_RPC_USER;
    if (env.NODE_RPC_PASSWORD) rpc.password = env.NODE_RPC_PASSWORD;
    const timeout = integer('NODE_RPC_TIMEOUT');
    if (timeout !== undefined) rpc.timeout = timeout;

    config.consolidation = consolidation;
    config.rpc = rpc;
    return config;
  }

  private loadConfigFile(errors: string[]): EngineConfigOverrides | null {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(this.cwd, fileName);
      if (!fs.existsSync(configPath)) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      } catch (error) {
        this.logger.warn(`Failed to load config from ${configPath}`, {
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      if (!isRecord(parsed)) {
        errors.push(`${configPath} must contain a JSON object`);
        return null;
      }
      return parseConfigFile(parsed, configPath, errors);
    }

    return null;
  }

  /**
   * Get configuration documentation
   */
  static getConfigDocumentation(): string {
    const variables = Object.entries(ENGINE_ENV_VARS)
      .map(([name, description]) => `   ${name}  ${description}`)
      .join('\n');

    return `
Environment Variables:
${variables}

Configuration File:
   Create .payment-engine.json or payment-engine.config.json in the working directory.
   Amounts in the file are integer koinu:
   {
     "network": "mainnet",
     "feeRate": 1000000,
     "maxOverpay": 1000000,
     "consolidation": { "smallThreshold": 100000000, "maxInputs": 200 },
     "rpc": { "url": "http://127.0.0.1:22555", "username": "rpcuser" }
   }

Configuration Priority Order:
1. Runtime overrides (Highest Priority): ConfigLoader.loadConfig({ feeRate: ... })
2. Environment variables
3. Configuration file
4. Defaults (Lowest Priority)
    `;
  }
}

const FLAT_NUMBER_KEYS = [
  'feeRate',
  'minFee',
  'dustThreshold',
  'maxOverpay',
  'maxFee',
  'minConfirmations',
  'lockTtlMs',
] as const;

const CONSOLIDATION_KEYS = ['smallThreshold', 'maxInputs', 'recommendAboveCount'] as const;
const RPC_NUMBER_KEYS = ['timeout', 'retries', 'retryDelay'] as const;
const RPC_STRING_KEYS = ['url', 'username', 'password'] as const;

function parseConfigFile(
  raw: Record<string, unknown>,
  source: string,
  errors: string[],
): EngineConfigOverrides {
  const config: EngineConfigOverrides = {};

  if (raw.network !== undefined) {
    if (typeof raw.network === 'string' && isNetworkName(raw.network)) {
      config.network = raw.network;
    } else {
      errors.push(`${source}: network must be mainnet, testnet or regtest`);
    }
  }

  for (const key of FLAT_NUMBER_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === 'number') {
      config[key] = value;
    } else {
      errors.push(`${source}: ${key} must be a number`);
    }
  }

  if (isRecord(raw.consolidation)) {
    const section: Partial<ConsolidationConfig> = {};
    for (const key of CONSOLIDATION_KEYS) {
      const value = raw.consolidation[key];
      if (value === undefined) continue;
      if (typeof value === 'number') {
        section[key] = value;
      } else {
        errors.push(`${source}: consolidation.${key} must be a number`);
      }
    }
    config.consolidation = section;
  }

  if (isRecord(raw.rpc)) {
    const section: Partial<RpcConfig> = {};
    for (const key of RPC_NUMBER_KEYS) {
      const value = raw.rpc[key];
      if (value === undefined) continue;
      if (typeof value === 'number') {
        section[key] = value;
      } else {
        errors.push(`${source}: rpc.${key} must be a number`);
      }
    }
    for (const key of RPC_STRING_KEYS) {
      const value = raw.rpc[key];
      if (value === undefined) continue;
      if (typeof value === 'string') {
        section[key] = value;
      } else {
        errors.push(`${source}: rpc.${key} must be a string`);
      }
    }
    config.rpc = section;
  }

  return config;
}
