import { describe, expect, it } from 'vitest';

import {
  createEngineConfig,
  DEFAULT_ENGINE_CONFIG,
  validateConfig,
} from '../../../src/config/engine-config';
import {
  DOGECOIN_MAINNET,
  DOGECOIN_REGTEST,
  getNetwork,
  isNetworkName,
} from '../../../src/config/networks';

describe('engine configuration', () => {
  describe('defaults', () => {
    it('should describe a mainnet engine paying 0.01 coin per 1000 bytes', () => {
      expect(DEFAULT_ENGINE_CONFIG.network).toBe('mainnet');
      expect(DEFAULT_ENGINE_CONFIG.feeRate).toBe(1_000_000);
      expect(DEFAULT_ENGINE_CONFIG.minFee).toBe(100_000);
      expect(DEFAULT_ENGINE_CONFIG.dustThreshold).toBe(1_000_000);
      expect(DEFAULT_ENGINE_CONFIG.maxOverpay).toBe(1_000_000);
      expect(DEFAULT_ENGINE_CONFIG.lockTtlMs).toBe(600_000);
    });

    it('should be valid', () => {
      expect(validateConfig(createEngineConfig())).toEqual([]);
    });
  });

  describe('createEngineConfig', () => {
    it('should merge nested sections key by key', () => {
      const config = createEngineConfig({
        feeRate: 2_000_000,
        consolidation: { maxInputs: 50 },
        rpc: { username: 'test-user' },
      });

      expect(config.feeRate).toBe(2_000_000);
      expect(config.maxOverpay).toBe(1_000_000);
      expect(config.consolidation).toEqual({
        smallThreshold: 100_000_000,
        maxInputs: 50,
        recommendAboveCount: 50,
      });
      expect(config.rpc.url).toBe('http://127.0.0.1:22555');
      expect(config.rpc.username).toBe('test-user');
    });

    it('should layer onto the base it is given', () => {
      const base = createEngineConfig({ network: 'testnet' });

      expect(createEngineConfig({ feeRate: 5 }, base).network).toBe('testnet');
    });

    it('should leave the defaults untouched', () => {
      createEngineConfig({ consolidation: { maxInputs: 3 } });

      expect(DEFAULT_ENGINE_CONFIG.consolidation.maxInputs).toBe(200);
    });
  });

  describe('validateConfig', () => {
    it('should report every invalid value', () => {
      const config = createEngineConfig({
        feeRate: -1,
        dustThreshold: 0,
        maxFee: 50_000,
        lockTtlMs: 0,
        consolidation: { maxInputs: 1 },
        rpc: { url: 'ftp://127.0.0.1' },
      });

      expect(validateConfig(config)).toEqual([
        'feeRate must be an integer amount in koinu >= 0',
        'dustThreshold must be an integer amount in koinu >= 1',
        'maxFee must not be below minFee',
        'lockTtlMs must be a positive integer',
        'consolidation.maxInputs must be an integer >= 2',
        'rpc.url must use http or https (got ftp:)',
      ]);
    });

    it('should reject an unparseable RPC URL', () => {
      const config = createEngineConfig({ rpc: { url: 'not a url' } });

      expect(validateConfig(config)).toEqual(['rpc.url is not a valid URL: not a url']);
    });

    it('should reject fractional koinu', () => {
      expect(validateConfig(createEngineConfig({ maxOverpay: 0.5 }))).toEqual([
        'maxOverpay must be an integer amount in koinu >= 0',
      ]);
    });
  });

  describe('networks', () => {
    it('should resolve network names', () => {
      expect(getNetwork('mainnet')).toBe(DOGECOIN_MAINNET);
      expect(getNetwork('regtest')).toBe(DOGECOIN_REGTEST);
      expect(DOGECOIN_MAINNET.pubKeyHash).toBe(0x1e);
    });

    it('should recognise only known network names', () => {
      expect(isNetworkName('testnet')).toBe(true);
      expect(isNetworkName('bitcoin')).toBe(false);
    });
  });
});
