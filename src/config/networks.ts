/**
 * Dogecoin network parameters in bitcoinjs-lib form
 */

import type { Network } from 'bitcoinjs-lib';

export type NetworkName = 'mainnet' | 'testnet' | 'regtest';

export const DOGECOIN_MAINNET: Network = {
  messagePrefix: '\x19Dogecoin Signed Message:\n',
  bech32: 'doge',
  bip32: {
    public: 0x02facafd,
    private: 0x02fac398,
  },
  pubKeyHash: 0x1e,
  scriptHash: 0x16,
  wif: 0x9e,
};

export const DOGECOIN_TESTNET: Network = {
  messagePrefix: '\x19Dogecoin Signed Message:\n',
  bech32: 'tdge',
  bip32: {
    public: 0x043587cf,
    private: 0x04358394,
  },
  pubKeyHash: 0x71,
  scriptHash: 0xc4,
  wif: 0xf1,
};

export const DOGECOIN_REGTEST: Network = {
  messagePrefix: '\x19Dogecoin Signed Message:\n',
  bech32: 'dcrt',
  bip32: {
    public: 0x043587cf,
    private: 0x04358394,
  },
  pubKeyHash: 0x6f,
  scriptHash: 0xc4,
  wif: 0xef,
};

export const NETWORKS: Readonly<Record<NetworkName, Network>> = {
  mainnet: DOGECOIN_MAINNET,
  testnet: DOGECOIN_TESTNET,
  regtest: DOGECOIN_REGTEST,
};

export function isNetworkName(value: string): value is NetworkName {
  return value === 'mainnet' || value === 'testnet' || value === 'regtest';
}

export function getNetwork(name: NetworkName): Network {
  return NETWORKS[name];
}
