import type { Buffer } from 'node:buffer';

import type { NetworkType } from './network.interface.ts';

/**
 * Signing key and the single P2WPKH receive address derived from it
 */
export interface KeyMaterial {
  readonly privateKey: Buffer;
  readonly publicKey: Buffer; // 33-byte compressed
  readonly network: NetworkType;
  readonly address: string;
  readonly scriptPubKey: Buffer;
}
