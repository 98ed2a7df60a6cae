/**
 * Fee Estimation Interface
 */

export type FeeTier = 'low' | 'medium' | 'high';

export const FEE_TIERS: readonly FeeTier[] = ['low', 'medium', 'high'];

/**
 * Fee rates in sat/byte
 */
export interface FeeRates {
  low: number; // explorer "minimumFee"
  medium: number; // explorer "halfHourFee"
  high: number; // explorer "fastestFee"
}

export interface IFeeRateSource {
  getFeeRates(): Promise<FeeRates>;
}

export interface IFeeEstimator {
  /**
   * Estimated serialized size in bytes for a single-key transaction
   */
  estimateSize(inputCount: number, outputCount: number): number;

  /**
   * Absolute fee in satoshis for `size` bytes at `feeRate` sat/byte
   */
  estimateFee(feeRate: number, size: number): number;
}

export function isFeeTier(value: string): value is FeeTier {
  return FEE_TIERS.some((tier) => tier === value);
}
