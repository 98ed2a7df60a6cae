/**
 * Key Material
 * Mnemonic handling, BIP32 derivation and the wallet's single P2WPKH address
 */

import { Buffer } from 'node:buffer';

import * as bip39 from 'bip39';
import * as bitcoin from 'bitcoinjs-lib';

import { DEFAULT_DERIVATION_PATH } from '../config/config-loader.ts';
import { toBitcoinNetwork } from '../config/networks.ts';
import { InternalSigningError, InvalidMnemonicError } from '../errors/index.ts';
import type { KeyMaterial } from '../interfaces/key.interface.ts';
import type { NetworkType } from '../interfaces/network.interface.ts';
import { bip32, ECPair } from './ecc.ts';

/**
 * 128 bits of entropy, 12 words
 */
export const MNEMONIC_STRENGTH = 128;

export function normalizeMnemonic(mnemonic: string): string {
  return mnemonic.trim().toLowerCase().split(/\s+/).join(' ');
}

export function generateMnemonic(): string {
  return bip39.generateMnemonic(MNEMONIC_STRENGTH);
}

export function isValidMnemonic(mnemonic: string): boolean {
  return bip39.validateMnemonic(normalizeMnemonic(mnemonic));
}

/**
 * Mnemonic → seed → BIP32 master → child private key at `derivationPath`.
 * The master key is always derived with mainnet version bytes; the path
 * alone selects the key.
 */
export function deriveKey(mnemonic: string, derivationPath = DEFAULT_DERIVATION_PATH): Buffer {
  const phrase = normalizeMnemonic(mnemonic);
  if (!bip39.validateMnemonic(phrase)) {
    throw new InvalidMnemonicError();
  }

  const seed = bip39.mnemonicToSeedSync(phrase);
  const child = bip32.fromSeed(seed).derivePath(derivationPath);
  if (!child.privateKey) {
    throw new InternalSigningError(`No private key at ${derivationPath}`);
  }

  return Buffer.from(child.privateKey);
}

/**
 * Build key material for a raw 32-byte secret. A secret outside the curve
 * order is an InternalSigningError.
 */
export function createKeyMaterial(privateKey: Buffer, network: NetworkType): KeyMaterial {
  let publicKey: Buffer;
  try {
    publicKey = Buffer.from(ECPair.fromPrivateKey(privateKey, { compressed: true }).publicKey);
  } catch (error) {
    throw new InternalSigningError('Private key could not be parsed', error);
  }

  const payment = bitcoin.payments.p2wpkh({ pubkey: publicKey, network: toBitcoinNetwork(network) });
  if (!payment.address || !payment.output) {
    throw new InternalSigningError('Failed to derive P2WPKH address');
  }

  return Object.freeze({
    privateKey: Buffer.from(privateKey),
    publicKey,
    network,
    address: payment.address,
    scriptPubKey: payment.output,
  });
}

export function keyMaterialFromMnemonic(
  mnemonic: string,
  network: NetworkType,
  derivationPath = DEFAULT_DERIVATION_PATH,
): KeyMaterial {
  return createKeyMaterial(deriveKey(mnemonic, derivationPath), network);
}
