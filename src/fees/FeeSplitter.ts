import { VaultError } from '../errors/VaultError.js';
import { bpsOf, clampBps, mulDiv } from '../utils/math.js';

export type FeeSplit = {
  net: bigint;
  fee: bigint;
  burnAmount: bigint;
  redirectAmount: bigint;
};

export type TaxSchedule = {
  feeRateBps: number;
  /** Percentage (0-100) of the fee that is burned; the rest is redirected. */
  burnShareRatio: number;
};

/** 4.5% fee, 60% of it burned and 40% redirected to the controller. */
export const RESERVE_TAX: TaxSchedule = { feeRateBps: 450, burnShareRatio: 60 };

/** 0.5% fee, burned in full. */
export const CLAIM_TAX: TaxSchedule = { feeRateBps: 50, burnShareRatio: 100 };

export const FeeSplitter = {
  /**
   * The fee is truncated once and then divided, so
   * `burnAmount + redirectAmount === fee` and `net + fee === amount` hold exactly.
   */
  split(amount: bigint, feeRateBps: number, burnShareRatio: number): FeeSplit {
    if (amount < 0n) {
      throw new VaultError('InvalidArgument', 'amount must be non-negative');
    }
    if (!Number.isInteger(burnShareRatio) || burnShareRatio < 0 || burnShareRatio > 100) {
      throw new VaultError('InvalidArgument', 'burnShareRatio must be an integer in [0, 100]');
    }

    const fee = bpsOf(amount, clampBps(feeRateBps));
    const burnAmount = mulDiv(fee, BigInt(burnShareRatio), 100n);
    const redirectAmount = fee - burnAmount;

    return { net: amount - fee, fee, burnAmount, redirectAmount };
  },

  apply(amount: bigint, schedule: TaxSchedule): FeeSplit {
    return this.split(amount, schedule.feeRateBps, schedule.burnShareRatio);
  }
} as const;
