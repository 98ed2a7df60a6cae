/**
 * Fee Estimator
 *
 * Sizes transactions with the legacy (non-witness-discounted) byte formula.
 * For P2WPKH spends this overestimates the real virtual size, so fees err on
 * the high side.
 */

import { InvalidTransactionError } from '../errors/index.ts';
import type { FeeRates, FeeTier, IFeeEstimator } from '../interfaces/fee.interface.ts';

export class FeeEstimator implements IFeeEstimator {
  static readonly OVERHEAD_SIZE = 10; // version + locktime + in/out counts
  static readonly INPUT_SIZE = 148; // outpoint + scriptSig + sequence, legacy sized
  static readonly OUTPUT_SIZE = 34; // value + script length + script

  /**
   * Estimate transaction size in bytes: 10 + 148 per input + 34 per output
   */
  estimateSize(inputCount: number, outputCount: number): number {
    this.assertCount(inputCount, 'inputCount');
    this.assertCount(outputCount, 'outputCount');

    return FeeEstimator.OVERHEAD_SIZE +
      inputCount * FeeEstimator.INPUT_SIZE +
      outputCount * FeeEstimator.OUTPUT_SIZE;
  }

  /**
   * Fee in satoshis, truncated to a whole satoshi
   */
  estimateFee(feeRate: number, size: number): number {
    if (!Number.isFinite(feeRate) || feeRate < 0) {
      throw new InvalidTransactionError(`Fee rate must be a non-negative number, got ${feeRate}`);
    }
    this.assertCount(size, 'size');

    return Math.floor(feeRate * size);
  }

  /**
   * Fee for spending `inputCount` inputs into `outputCount` outputs at the
   * given tier
   */
  feeForTier(
    rates: FeeRates,
    tier: FeeTier,
    inputCount: number,
    outputCount: number,
  ): { fee: number; feeRate: number; size: number } {
    const size = this.estimateSize(inputCount, outputCount);
    const feeRate = rates[tier];
    return { fee: this.estimateFee(feeRate, size), feeRate, size };
  }

  private assertCount(value: number, name: string): void {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new InvalidTransactionError(`${name} must be a non-negative integer, got ${value}`);
    }
  }
}
