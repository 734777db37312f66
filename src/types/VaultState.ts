import type { PublicKey } from '@solana/web3.js';

export type ReserveVaultMetrics = {
  totalSupply: bigint;
  reserveBalance: bigint;
  totalMinted: bigint;
  totalBurned: bigint;
  /** Reserve per share, 1e18 scale. */
  backingRatio: bigint;
};

export type IssuanceStatus = {
  isActive: boolean;
  /** Seconds until issuance closes; 0 once closed. */
  timeRemaining: number;
};

export type ClaimVaultMetrics = ReserveVaultMetrics & {
  /** Global reward-per-token accumulator, 1e18 scale. */
  rewardPerToken: bigint;
  /** Pooled reserve per unit of eligible weighted supply, 1e18 scale. */
  avgRewardPerEligibleUnit: bigint;
};

export type ClaimEligibility = {
  account: PublicKey;
  claimable: bigint;
  balanceA: bigint;
  balanceB: bigint;
};
