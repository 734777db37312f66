import type { PublicKey } from '@solana/web3.js';

/**
 * The slice of a fungible token the vaults need from their backing asset.
 * Implementations must move exact amounts and either succeed fully or throw.
 */
export interface BackingAsset {
  balanceOf(account: PublicKey): bigint;
  allowance(owner: PublicKey, spender: PublicKey): bigint;
  transfer(from: PublicKey, to: PublicKey, amount: bigint): void;
  transferFrom(spender: PublicKey, from: PublicKey, to: PublicKey, amount: bigint): void;
}

export interface SupplyReader {
  totalSupply(): bigint;
}

export interface ShareBalanceReader extends SupplyReader {
  balanceOf(account: PublicKey): bigint;
}
