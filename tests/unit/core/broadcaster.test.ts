import * as bitcoin from 'bitcoinjs-lib';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { Broadcaster } from '../../../src/core/broadcaster.ts';
import { createKeyMaterial } from '../../../src/core/key-material.ts';
import { TransactionBuilder } from '../../../src/core/transaction-builder.ts';
import { TransactionSigner } from '../../../src/core/transaction-signer.ts';
import { BroadcastError, InvalidTransactionError } from '../../../src/errors/index.ts';
import { ADDRESSES, TEST_PRIVATE_KEY } from '../../fixtures/keys.ts';
import { FEE_RATES, SINGLE_UTXO } from '../../fixtures/utxos.ts';
import { createMockLogger } from '../../mocks/mockLogger.ts';

describe('Broadcaster', () => {
  let unsigned: bitcoin.Transaction;
  let signed: bitcoin.Transaction;
  let provider: { broadcastTransaction: ReturnType<typeof vi.fn> };
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    const keys = createKeyMaterial(TEST_PRIVATE_KEY, 'testnet');
    const builder = new TransactionBuilder({
      network: 'testnet',
      changeAddress: keys.address,
      feeSource: { getFeeRates: vi.fn().mockResolvedValue(FEE_RATES) },
    });
    unsigned = builder.assemble(ADDRESSES.testnetP2WPKH, 50000, SINGLE_UTXO, FEE_RATES, 'high').transaction;
    signed = new TransactionSigner(keys).sign(unsigned, SINGLE_UTXO);
    provider = { broadcastTransaction: vi.fn().mockResolvedValue(signed.getId()) };
    logger = createMockLogger();
  });

  it('should submit the serialized transaction and return the txid', async () => {
    const txid = await new Broadcaster(provider, logger).broadcast(signed);

    expect(txid).toBe(signed.getId());
    expect(provider.broadcastTransaction).toHaveBeenCalledWith(signed.toHex());
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should refuse an unsigned transaction', async () => {
    await expect(new Broadcaster(provider, logger).broadcast(unsigned)).rejects.toThrow(InvalidTransactionError);
    expect(provider.broadcastTransaction).not.toHaveBeenCalled();
  });

  it('should propagate explorer rejections once, without retrying', async () => {
    provider.broadcastTransaction.mockRejectedValue(new BroadcastError('min relay fee not met', 400));

    const error = await new Broadcaster(provider, logger).broadcast(signed).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BroadcastError);
    expect(error).toMatchObject({ reason: 'min relay fee not met', status: 400 });
    expect(provider.broadcastTransaction).toHaveBeenCalledTimes(1);
  });

  it('should warn when the explorer reports a different txid', async () => {
    const other = 'f'.repeat(64);
    provider.broadcastTransaction.mockResolvedValue(other);

    const txid = await new Broadcaster(provider, logger).broadcast(signed);

    expect(txid).toBe(other);
    expect(logger.warn).toHaveBeenCalledWith('Explorer returned an unexpected txid', {
      expected: signed.getId(),
      received: other,
    });
  });
});
