import type { PublicKey } from '@solana/web3.js';
import { VaultError } from '../errors/VaultError.js';
import { accountKey } from '../utils/encoding.js';
import type { BackingAsset, ShareBalanceReader } from './BackingAsset.js';

/**
 * Raw ledger mutations, handed to a transfer hook so it can split one
 * requested transfer into several movements.
 */
export interface LedgerPrimitives {
  mint(to: PublicKey, amount: bigint): void;
  burn(from: PublicKey, amount: bigint): void;
  move(from: PublicKey, to: PublicKey, amount: bigint): void;
  balanceOf(account: PublicKey): bigint;
}

export type TransferHook = (from: PublicKey, to: PublicKey, amount: bigint, ledger: LedgerPrimitives) => void;

/**
 * In-memory fungible token: balances, allowances and supply. Serves as the share
 * ledger of a vault (with a transfer hook installed) and as a plain backing asset.
 */
export class TokenLedger implements BackingAsset, ShareBalanceReader, LedgerPrimitives {
  private readonly balances = new Map<string, bigint>();
  private readonly allowances = new Map<string, bigint>();
  private supply = 0n;
  private hook?: TransferHook;

  constructor(readonly symbol: string) {}

  setTransferHook(hook: TransferHook): void {
    this.hook = hook;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(account: PublicKey): bigint {
    return this.balances.get(accountKey(account)) ?? 0n;
  }

  allowance(owner: PublicKey, spender: PublicKey): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  approve(owner: PublicKey, spender: PublicKey, amount: bigint): void {
    assertNonNegative(amount);
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  transfer(from: PublicKey, to: PublicKey, amount: bigint): void {
    assertNonNegative(amount);
    if (this.hook) {
      this.hook(from, to, amount, this);
      return;
    }
    this.move(from, to, amount);
  }

  transferFrom(spender: PublicKey, from: PublicKey, to: PublicKey, amount: bigint): void {
    assertNonNegative(amount);
    const allowed = this.allowance(from, spender);
    if (allowed < amount) {
      throw new VaultError('InsufficientAllowance', `${this.symbol}: allowance too low`, {
        details: { allowance: allowed.toString(), amount: amount.toString() }
      });
    }
    if (this.balanceOf(from) < amount) {
      throw insufficientBalance(this.symbol, this.balanceOf(from), amount);
    }
    this.transfer(from, to, amount);
    this.allowances.set(allowanceKey(from, spender), allowed - amount);
  }

  mint(to: PublicKey, amount: bigint): void {
    assertNonNegative(amount);
    this.credit(to, amount);
    this.supply += amount;
  }

  burn(from: PublicKey, amount: bigint): void {
    assertNonNegative(amount);
    const balance = this.balanceOf(from);
    if (balance < amount) throw insufficientBalance(this.symbol, balance, amount);
    this.balances.set(accountKey(from), balance - amount);
    this.supply -= amount;
  }

  move(from: PublicKey, to: PublicKey, amount: bigint): void {
    assertNonNegative(amount);
    const balance = this.balanceOf(from);
    if (balance < amount) throw insufficientBalance(this.symbol, balance, amount);
    this.balances.set(accountKey(from), balance - amount);
    this.credit(to, amount);
  }

  private credit(to: PublicKey, amount: bigint): void {
    this.balances.set(accountKey(to), this.balanceOf(to) + amount);
  }
}

function allowanceKey(owner: PublicKey, spender: PublicKey): string {
  return `${accountKey(owner)}:${accountKey(spender)}`;
}

function assertNonNegative(amount: bigint): void {
  if (amount < 0n) {
    throw new VaultError('InvalidAmount', 'amount must be non-negative');
  }
}

function insufficientBalance(symbol: string, balance: bigint, amount: bigint): VaultError {
  return new VaultError('InsufficientBalance', `${symbol}: balance too low`, {
    details: { balance: balance.toString(), amount: amount.toString() }
  });
}
