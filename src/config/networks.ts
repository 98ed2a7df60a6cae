/**
 * Network table: bitcoinjs-lib parameters and default Esplora endpoints
 */

import * as bitcoin from 'bitcoinjs-lib';
import type { Network } from 'bitcoinjs-lib';

import type { NetworkConfig, NetworkType } from '../interfaces/network.interface.ts';

export const NETWORK_TYPES: readonly NetworkType[] = ['mainnet', 'testnet', 'regtest'];

/**
 * Regtest has no public explorer and must be given an explicit URL.
 */
export const DEFAULT_API_URLS: Readonly<Partial<Record<NetworkType, string>>> = {
  mainnet: 'https://mempool.space',
  testnet: 'https://mempool.space/testnet4',
};

export function toBitcoinNetwork(type: NetworkType): Network {
  switch (type) {
    case 'mainnet':
      return bitcoin.networks.bitcoin;
    case 'testnet':
      return bitcoin.networks.testnet;
    case 'regtest':
      return bitcoin.networks.regtest;
  }
}

export function getNetworkConfig(type: NetworkType, apiUrl?: string): NetworkConfig {
  return {
    type,
    network: toBitcoinNetwork(type),
    apiUrl: apiUrl ?? DEFAULT_API_URLS[type],
  };
}

/**
 * Accepts the names users tend to type for each network
 */
export function parseNetworkType(value: string): NetworkType | null {
  switch (value.trim().toLowerCase()) {
    case 'mainnet':
    case 'main':
    case 'bitcoin':
      return 'mainnet';
    case 'testnet':
    case 'test':
    case 'testnet4':
      return 'testnet';
    case 'regtest':
      return 'regtest';
    default:
      return null;
  }
}
