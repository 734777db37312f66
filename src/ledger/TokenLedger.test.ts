import { describe, expect, it } from 'vitest';
import { PublicKey } from '@solana/web3.js';

import { TokenLedger } from './TokenLedger.js';

describe('TokenLedger', () => {
  const alice = PublicKey.unique();
  const bob = PublicKey.unique();

  it('mints, moves and burns while tracking supply', () => {
    const ledger = new TokenLedger('TKN');
    ledger.mint(alice, 100n);
    ledger.transfer(alice, bob, 40n);
    ledger.burn(bob, 10n);

    expect(ledger.balanceOf(alice)).toBe(60n);
    expect(ledger.balanceOf(bob)).toBe(30n);
    expect(ledger.totalSupply()).toBe(90n);
  });

  it('rejects overdrafts without changing balances', () => {
    const ledger = new TokenLedger('TKN');
    ledger.mint(alice, 5n);

    expect(() => ledger.transfer(alice, bob, 6n)).toThrow(expect.objectContaining({ code: 'InsufficientBalance' }));
    expect(() => ledger.burn(alice, 6n)).toThrow(expect.objectContaining({ code: 'InsufficientBalance' }));
    expect(ledger.balanceOf(alice)).toBe(5n);
    expect(ledger.totalSupply()).toBe(5n);
  });

  it('spends allowance on transferFrom', () => {
    const ledger = new TokenLedger('TKN');
    ledger.mint(alice, 100n);
    ledger.approve(alice, bob, 30n);

    ledger.transferFrom(bob, alice, bob, 20n);
    expect(ledger.allowance(alice, bob)).toBe(10n);
    expect(ledger.balanceOf(bob)).toBe(20n);

    expect(() => ledger.transferFrom(bob, alice, bob, 11n)).toThrow(
      expect.objectContaining({ code: 'InsufficientAllowance' })
    );
    expect(ledger.allowance(alice, bob)).toBe(10n);
  });

  it('routes transfers through an installed hook', () => {
    const ledger = new TokenLedger('TKN');
    ledger.mint(alice, 100n);
    ledger.setTransferHook((from, to, amount, primitives) => {
      primitives.burn(from, 1n);
      primitives.move(from, to, amount - 1n);
    });

    ledger.transfer(alice, bob, 10n);

    expect(ledger.balanceOf(alice)).toBe(90n);
    expect(ledger.balanceOf(bob)).toBe(9n);
    expect(ledger.totalSupply()).toBe(99n);
  });
});
