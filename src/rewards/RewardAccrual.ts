import type { PublicKey } from '@solana/web3.js';
import type { ShareBalanceReader } from '../ledger/BackingAsset.js';
import { accountKey } from '../utils/encoding.js';
import { invariant } from '../utils/invariant.js';
import { SCALE, mulDiv } from '../utils/math.js';

export interface WeightProvider {
  getCurrentWeight(): bigint;
}

export type EligibilitySources = {
  /** Balances counted 1:1. */
  tokenA: ShareBalanceReader;
  /** Balances scaled by the current weight. */
  tokenB: ShareBalanceReader;
  weight: WeightProvider;
};

export type AccountRewardState = {
  /** Accumulator value at the last settlement. */
  checkpoint: bigint;
  /** Reward frozen at the last settlement and not yet claimed. */
  settledReward: bigint;
};

export type RewardNotification = {
  attributed: boolean;
  accumulatorDelta: bigint;
  totalEligible: bigint;
};

/**
 * Reward-per-token accounting over the weighted sum of two share balances.
 *
 * earned(a) = settledReward + eligible(a) * (accumulator - checkpoint) / 1e18
 *
 * Balances are read live on every call. Callers must `settle` an account before
 * its eligible balance changes and before its reward is consumed.
 */
export class RewardAccrual {
  private accumulator = 0n;
  private readonly accounts = new Map<string, AccountRewardState>();

  constructor(readonly sources: EligibilitySources) {}

  get rewardPerToken(): bigint {
    return this.accumulator;
  }

  eligibleBalances(account: PublicKey): { balanceA: bigint; balanceB: bigint } {
    return {
      balanceA: this.sources.tokenA.balanceOf(account),
      balanceB: this.sources.tokenB.balanceOf(account)
    };
  }

  eligibleWeightedBalance(account: PublicKey): bigint {
    const { balanceA, balanceB } = this.eligibleBalances(account);
    return balanceA + mulDiv(balanceB, this.sources.weight.getCurrentWeight(), SCALE);
  }

  totalEligibleWeighted(): bigint {
    const weight = this.sources.weight.getCurrentWeight();
    return this.sources.tokenA.totalSupply() + mulDiv(this.sources.tokenB.totalSupply(), weight, SCALE);
  }

  accountState(account: PublicKey): AccountRewardState {
    const state = this.accounts.get(accountKey(account));
    return state ? { ...state } : { checkpoint: 0n, settledReward: 0n };
  }

  earned(account: PublicKey): bigint {
    const state = this.accountState(account);
    const pending = mulDiv(this.eligibleWeightedBalance(account), this.accumulator - state.checkpoint, SCALE);
    return state.settledReward + pending;
  }

  /** Freezes the account's reward and moves its checkpoint to the accumulator. */
  settle(account: PublicKey): bigint {
    const settledReward = this.earned(account);
    this.accounts.set(accountKey(account), { checkpoint: this.accumulator, settledReward });
    return settledReward;
  }

  /** Settles, then zeroes the account's reward and returns what was zeroed. */
  consume(account: PublicKey): bigint {
    const reward = this.settle(account);
    this.accounts.set(accountKey(account), { checkpoint: this.accumulator, settledReward: 0n });
    return reward;
  }

  /**
   * Spreads `amount` over the current eligible weighted supply. With no eligible
   * supply the accumulator is left unchanged.
   */
  notifyReward(amount: bigint): RewardNotification {
    const totalEligible = this.totalEligibleWeighted();
    if (totalEligible === 0n) {
      return { attributed: false, accumulatorDelta: 0n, totalEligible };
    }

    const accumulatorDelta = mulDiv(amount, SCALE, totalEligible);
    const next = this.accumulator + accumulatorDelta;
    invariant(next >= this.accumulator, 'reward accumulator must not decrease');
    this.accumulator = next;

    return { attributed: true, accumulatorDelta, totalEligible };
  }
}
