import { VaultError } from '../errors/VaultError.js';
import { RESERVE_TAX, type TaxSchedule } from '../fees/FeeSplitter.js';
import { invariant } from '../utils/invariant.js';
import { SCALE, bpsOf, mulDiv } from '../utils/math.js';

export type PoolState = {
  reserveBalance: bigint;
  totalSupply: bigint;
};

export type IssuePreview = {
  /** Shares credited to the buyer. */
  sharesOut: bigint;
  /** Shares credited to the controller. */
  controllerShares: bigint;
  /** Backing asset forwarded to the controller. */
  controllerBacking: bigint;
  feeTotal: bigint;
};

export type RedeemPreview = {
  payout: bigint;
};

export class VaultMath {
  static validateState(state: PoolState): void {
    invariant(state.reserveBalance >= 0n, 'reserveBalance must be non-negative');
    invariant(state.totalSupply >= 0n, 'totalSupply must be non-negative');
  }

  /**
   * Issuance is 1:1 minus the issuance fee. Half the fee is minted as shares to
   * the controller, the other half leaves the vault as backing asset.
   */
  static previewIssue(backingAmount: bigint, schedule: TaxSchedule = RESERVE_TAX): IssuePreview {
    if (backingAmount <= 0n) {
      throw new VaultError('InvalidAmount', 'issue amount must be > 0');
    }

    const feeTotal = bpsOf(backingAmount, schedule.feeRateBps);
    const half = feeTotal / 2n;

    return {
      sharesOut: backingAmount - feeTotal,
      controllerShares: half,
      controllerBacking: half,
      feeTotal
    };
  }

  /** Pro-rata payout against the live reserve and live supply. */
  static previewRedeem(state: PoolState, shareAmount: bigint): RedeemPreview {
    this.validateState(state);

    if (shareAmount <= 0n) {
      throw new VaultError('InvalidAmount', 'redeem amount must be > 0');
    }

    if (state.totalSupply === 0n) {
      throw new VaultError('InsufficientReserve', 'no shares outstanding');
    }
    if (state.reserveBalance === 0n) {
      throw new VaultError('InsufficientReserve', 'reserve is empty');
    }

    if (shareAmount > state.totalSupply) {
      throw new VaultError('InsufficientBalance', 'redeem exceeds outstanding shares', {
        details: { shares: shareAmount.toString(), totalSupply: state.totalSupply.toString() }
      });
    }

    const payout = mulDiv(state.reserveBalance, shareAmount, state.totalSupply, 'down');
    if (payout <= 0n) {
      throw new VaultError('InsufficientReserve', 'redeem results in zero payout', {
        details: { shares: shareAmount.toString() }
      });
    }

    return { payout };
  }

  /** Reserve per share at 1e18 scale; 0 while no shares are outstanding. */
  static backingRatio(state: PoolState): bigint {
    if (state.totalSupply === 0n) return 0n;
    return mulDiv(state.reserveBalance, SCALE, state.totalSupply, 'down');
  }
}
