/**
 * Network Configuration Interface
 * Defines network-specific parameters and configurations
 */

import type { Network } from 'bitcoinjs-lib';

/**
 * Network Type definition
 */
export type NetworkType = 'mainnet' | 'testnet' | 'regtest';

export interface NetworkConfig {
  type: NetworkType;
  network: Network;
  /** Esplora-compatible explorer base URL; absent when the network has no public explorer */
  apiUrl?: string;
}
