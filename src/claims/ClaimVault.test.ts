import { describe, expect, it } from 'vitest';
import { PublicKey } from '@solana/web3.js';

import { ONE, START, claimFixture, fund, issue, type ClaimFixture } from '../testing/harness.js';

/** alice holds 955 rsvA, bob 1910 rsvB, the controller 22 rsvA and 45 rsvB. */
function seeded(opts: Parameters<typeof claimFixture>[0] = {}) {
  const fx = claimFixture(opts);
  const alice = PublicKey.unique();
  const bob = PublicKey.unique();
  issue(fx.vaultA, fx.backingA, alice, 1_000n);
  issue(fx.vaultB, fx.backingB, bob, 2_000n);
  return { ...fx, alice, bob };
}

function deposit(fx: ClaimFixture, amount: bigint) {
  const depositor = PublicKey.unique();
  fund(fx.reward, depositor, fx.claim.custody, amount);
  return fx.claim.depositTokens(depositor, amount);
}

describe('ClaimVault', () => {
  describe('depositTokens', () => {
    it('raises reward-per-token by amount over the weighted eligible supply', () => {
      const fx = seeded();
      expect(fx.vaultA.totalSupply()).toBe(977n);
      expect(fx.vaultB.totalSupply()).toBe(1_955n);

      const notification = deposit(fx, 29_320n);

      expect(notification).toEqual({ attributed: true, accumulatorDelta: 10n * ONE, totalEligible: 2_932n });
      expect(fx.claim.getClaimEligibility(fx.alice).claimable).toBe(9_550n);
      expect(fx.claim.getClaimEligibility(fx.bob).claimable).toBe(19_100n);
      expect(fx.claim.getClaimEligibility(fx.controller).claimable).toBe(670n);
      expect(fx.events.ofType('TokensDeposited').map((e) => e.amount)).toEqual([29_320n]);
    });

    it('reports metrics before anything is claimed', () => {
      const fx = seeded();
      deposit(fx, 29_320n);

      expect(fx.claim.getContractMetrics()).toEqual({
        totalSupply: 0n,
        reserveBalance: 29_320n,
        totalMinted: 0n,
        totalBurned: 0n,
        rewardPerToken: 10n * ONE,
        avgRewardPerEligibleUnit: 10n * ONE,
        backingRatio: 0n
      });
    });

    it('pools a deposit without eligible supply and leaves the accumulator unchanged', () => {
      const fx = claimFixture();

      expect(deposit(fx, 1_000n)).toEqual({ attributed: false, accumulatorDelta: 0n, totalEligible: 0n });
      expect(fx.claim.reserveBalance()).toBe(1_000n);
      expect(fx.claim.accrual.rewardPerToken).toBe(0n);
    });

    it('rejects deposits below the minimum or beyond the allowance', () => {
      const fx = seeded({ minimumDeposit: 100n });
      const dave = PublicKey.unique();
      fx.reward.mint(dave, 500n);
      fx.reward.approve(dave, fx.claim.custody, 100n);

      expect(() => fx.claim.depositTokens(dave, 99n)).toThrow(expect.objectContaining({ code: 'InvalidAmount' }));
      expect(() => fx.claim.depositTokens(dave, 500n)).toThrow(
        expect.objectContaining({ code: 'InsufficientAllowance' })
      );
      expect(fx.reward.balanceOf(dave)).toBe(500n);
      expect(fx.claim.reserveBalance()).toBe(0n);
    });
  });

  describe('claimPLSTR', () => {
    it('mints the accrued reward once', () => {
      const fx = seeded();
      deposit(fx, 29_320n);

      expect(fx.claim.claimPLSTR(fx.alice)).toBe(9_550n);
      expect(fx.claim.balanceOf(fx.alice)).toBe(9_550n);
      expect(fx.claim.totalMinted).toBe(9_550n);
      expect(fx.claim.getClaimEligibility(fx.alice).claimable).toBe(0n);

      expect(() => fx.claim.claimPLSTR(fx.alice)).toThrow(expect.objectContaining({ code: 'NoClaimableReward' }));
      expect(fx.events.ofType('RewardClaimed').map((e) => e.amount)).toEqual([9_550n]);
    });

    it('settles holders before a reserve share transfer moves their balance', () => {
      const fx = seeded();
      const carol = PublicKey.unique();
      deposit(fx, 29_320n);

      // 500 taxed: 13 burned, 9 to the controller, 478 to carol
      fx.vaultA.transfer(fx.alice, carol, 500n);
      expect(fx.vaultA.balanceOf(fx.alice)).toBe(455n);
      expect(fx.vaultA.balanceOf(carol)).toBe(478n);
      expect(fx.vaultA.totalSupply()).toBe(964n);

      expect(fx.claim.getClaimEligibility(carol).claimable).toBe(0n);
      expect(fx.claim.getClaimEligibility(fx.alice).claimable).toBe(9_550n);

      expect(deposit(fx, 2_919n).accumulatorDelta).toBe(ONE);
      expect(fx.claim.getClaimEligibility(carol).claimable).toBe(478n);
      expect(fx.claim.getClaimEligibility(fx.alice).claimable).toBe(10_005n);
      expect(fx.claim.getClaimEligibility(fx.controller).claimable).toBe(746n);
      expect(fx.claim.getClaimEligibility(fx.bob).claimable).toBe(21_010n);
    });

    it('stops settling reserve share transfers after close', () => {
      const fx = seeded();
      const carol = PublicKey.unique();
      deposit(fx, 29_320n);

      fx.claim.close();
      fx.vaultA.transfer(fx.alice, carol, 500n);

      // Balances moved without a settlement, so accrued reward follows the shares.
      expect(fx.claim.getClaimEligibility(fx.alice).claimable).toBe(4_550n);
      expect(fx.claim.getClaimEligibility(carol).claimable).toBe(4_780n);
    });

    it('commits a claim when an event subscriber throws', () => {
      const fx = seeded();
      deposit(fx, 29_320n);
      fx.events.subscribe((event) => {
        if (event.type === 'RewardClaimed') throw new Error('subscriber failed');
      });

      expect(fx.claim.claimPLSTR(fx.alice)).toBe(9_550n);
      expect(fx.claim.balanceOf(fx.alice)).toBe(9_550n);
      expect(fx.claim.totalMinted).toBe(9_550n);
      expect(fx.events.ofType('RewardClaimed').map((e) => e.amount)).toEqual([9_550n]);
    });
  });

  describe('redeemPLSTR', () => {
    it('pays out pro-rata against the pooled reward asset', () => {
      const fx = seeded();
      deposit(fx, 29_320n);
      fx.claim.claimPLSTR(fx.alice);
      fx.claim.claimPLSTR(fx.bob);
      expect(fx.claim.totalSupply()).toBe(28_650n);

      const preview = fx.claim.redeemPLSTR(fx.alice, 9_550n);

      expect(preview.payout).toBe(9_773n);
      expect(fx.reward.balanceOf(fx.alice)).toBe(9_773n);
      expect(fx.claim.balanceOf(fx.alice)).toBe(0n);
      expect(fx.claim.reserveBalance()).toBe(19_547n);
      expect(fx.claim.getContractMetrics()).toMatchObject({
        totalSupply: 19_100n,
        totalMinted: 28_650n,
        totalBurned: 9_550n
      });
      expect(fx.events.ofType('ClaimRedeemed').map((e) => e.payout)).toEqual([9_773n]);
    });

    it('rejects zero and over-balance redemptions', () => {
      const fx = seeded();
      deposit(fx, 29_320n);
      fx.claim.claimPLSTR(fx.alice);

      expect(() => fx.claim.redeemPLSTR(fx.alice, 0n)).toThrow(expect.objectContaining({ code: 'InvalidAmount' }));
      expect(() => fx.claim.redeemPLSTR(fx.alice, 9_551n)).toThrow(
        expect.objectContaining({ code: 'InsufficientBalance' })
      );
    });
  });

  describe('redeemPLSTR against an empty pool', () => {
    it('rejects while no meta-shares exist', () => {
      const fx = seeded();
      deposit(fx, 29_320n);
      expect(fx.claim.totalSupply()).toBe(0n);

      expect(() => fx.claim.redeemPLSTR(fx.alice, 1n)).toThrow(
        expect.objectContaining({ code: 'InsufficientBalance' })
      );
      expect(fx.claim.reserveBalance()).toBe(29_320n);
    });

    it('rejects when the pooled reserve is empty or the payout rounds to zero', () => {
      const fx = seeded();
      const sink = PublicKey.unique();
      deposit(fx, 29_320n);
      fx.claim.claimPLSTR(fx.alice);

      fx.reward.transfer(fx.claim.custody, sink, 29_319n);
      expect(() => fx.claim.redeemPLSTR(fx.alice, 1n)).toThrow(
        expect.objectContaining({ code: 'InsufficientReserve' })
      );

      fx.reward.transfer(fx.claim.custody, sink, 1n);
      expect(() => fx.claim.redeemPLSTR(fx.alice, 100n)).toThrow(
        expect.objectContaining({ code: 'InsufficientReserve' })
      );

      expect(fx.claim.balanceOf(fx.alice)).toBe(9_550n);
      expect(fx.claim.totalSupply()).toBe(9_550n);
      expect(fx.events.ofType('ClaimRedeemed')).toHaveLength(0);
    });
  });

  describe('meta-share transfers', () => {
    it('burns the transfer tax and emits BurnApplied', () => {
      const fx = seeded();
      const carol = PublicKey.unique();
      deposit(fx, 29_320n);
      fx.claim.claimPLSTR(fx.alice);

      fx.claim.transfer(fx.alice, carol, 1_000n);

      expect(fx.claim.balanceOf(fx.alice)).toBe(8_550n);
      expect(fx.claim.balanceOf(carol)).toBe(995n);
      expect(fx.claim.totalSupply()).toBe(9_545n);
      const [burn] = fx.events.ofType('BurnApplied');
      expect(burn?.amount).toBe(5n);
      expect(burn?.from.equals(fx.alice)).toBe(true);
    });

    it('rejects transfers below the minimum', () => {
      const fx = seeded({ minimumTransfer: 100n });
      deposit(fx, 29_320n);
      fx.claim.claimPLSTR(fx.alice);

      expect(() => fx.claim.transfer(fx.alice, PublicKey.unique(), 99n)).toThrow(
        expect.objectContaining({ code: 'InvalidAmount' })
      );
      expect(fx.claim.balanceOf(fx.alice)).toBe(9_550n);
    });
  });

  describe('weight', () => {
    it('updates through the oracle and scales B balances', async () => {
      const fx = seeded();
      fx.supplyB.supply = 2_000n;

      await expect(fx.claim.updateWeight()).resolves.toBe(2n * ONE);
      expect(fx.claim.getCurrentWeight()).toBe(2n * ONE);
      expect(fx.claim.getLastWeightUpdate()).toBe(START);

      expect(deposit(fx, 4_887n)).toEqual({ attributed: true, accumulatorDelta: ONE, totalEligible: 4_887n });
      expect(fx.claim.getClaimEligibility(fx.bob)).toEqual({
        account: fx.bob,
        claimable: 3_820n,
        balanceA: 0n,
        balanceB: 1_910n
      });
      expect(fx.claim.getClaimEligibility(fx.alice).claimable).toBe(955n);
    });
  });
});
