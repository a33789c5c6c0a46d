/**
 * Configuration module exports
 */

export {
  type ConsolidationConfig,
  createEngineConfig,
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
  type EngineConfigOverrides,
  type RpcConfig,
  validateConfig,
} from './engine-config.ts';

export {
  DOGECOIN_MAINNET,
  DOGECOIN_REGTEST,
  DOGECOIN_TESTNET,
  getNetwork,
  isNetworkName,
  type NetworkName,
  NETWORKS,
} from './networks.ts';

export {
  CONFIG_FILE_NAMES,
  ConfigLoader,
  type ConfigLoaderOptions,
  ENGINE_ENV_VARS,
} from './config-loader.ts';
