/**
 * secp256k1 backends for bitcoinjs-lib, ecpair and bip32
 */

import { BIP32Factory } from 'bip32';
import * as bitcoin from 'bitcoinjs-lib';
import { ECPairFactory } from 'ecpair';
import * as ecc from 'tiny-secp256k1';

// Needed to decode taproot recipient addresses
bitcoin.initEccLib(ecc);

export const ECPair = ECPairFactory(ecc);
export const bip32 = BIP32Factory(ecc);
