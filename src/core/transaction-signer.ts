/**
 * Transaction Signer
 *
 * Signs every input of a P2WPKH spend with the wallet key (BIP143 sighash,
 * SIGHASH_ALL) and attaches the `[signature, pubkey]` witness. Input i is
 * paired with utxos[i]; the order is positional, not matched by outpoint.
 */

import { Buffer } from 'node:buffer';

import * as bitcoin from 'bitcoinjs-lib';
import type { ECPairInterface } from 'ecpair';

import { InternalSigningError, InvalidTransactionError } from '../errors/index.ts';
import type { KeyMaterial } from '../interfaces/key.interface.ts';
import type { UTXO } from '../interfaces/provider.interface.ts';
import type { ITransactionSigner } from '../interfaces/transaction.interface.ts';
import { type Logger, silentLogger } from '../utils/logger.ts';
import { ECPair } from './ecc.ts';

export const SIGHASH_TYPE = bitcoin.Transaction.SIGHASH_ALL;

export class TransactionSigner implements ITransactionSigner {
  private keys: KeyMaterial;
  private logger: Logger;

  constructor(keys: KeyMaterial, logger: Logger = silentLogger) {
    this.keys = keys;
    this.logger = logger;
  }

  sign(unsigned: bitcoin.Transaction, utxos: readonly UTXO[]): bitcoin.Transaction {
    if (unsigned.ins.length !== utxos.length) {
      throw new InvalidTransactionError(
        `Input count ${unsigned.ins.length} does not match UTXO count ${utxos.length}`,
      );
    }

    const keyPair = this.loadKeyPair();
    const publicKey = Buffer.from(keyPair.publicKey);
    const scriptCode = this.scriptCode(publicKey);
    const signed = unsigned.clone();

    utxos.forEach((utxo, index) => {
      const sighash = signed.hashForWitnessV0(index, scriptCode, utxo.value, SIGHASH_TYPE);
      const signature = bitcoin.script.signature.encode(Buffer.from(keyPair.sign(sighash)), SIGHASH_TYPE);
      signed.setWitness(index, [signature, publicKey]);
    });

    this.logger.debug?.('Signed transaction', { txid: signed.getId(), inputs: utxos.length });
    return signed;
  }

  private loadKeyPair(): ECPairInterface {
    try {
      return ECPair.fromPrivateKey(this.keys.privateKey, { compressed: true });
    } catch (error) {
      throw new InternalSigningError('Private key could not be parsed', error);
    }
  }

  /**
   * BIP143 scriptCode for a P2WPKH input: the P2PKH script of the key hash
   */
  private scriptCode(publicKey: Buffer): Buffer {
    const { output } = bitcoin.payments.p2pkh({ hash: bitcoin.crypto.hash160(publicKey) });
    if (!output) {
      throw new InternalSigningError('Failed to derive P2PKH script code');
    }
    return output;
  }
}
