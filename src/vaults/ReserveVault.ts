import type { PublicKey } from '@solana/web3.js';

import { PDA } from '../accounts/PDA.js';
import type { Clock } from '../clock/Clock.js';
import { VaultError } from '../errors/VaultError.js';
import { EventLog } from '../events/VaultEvents.js';
import { FeeSplitter, RESERVE_TAX, type TaxSchedule } from '../fees/FeeSplitter.js';
import { ReentrancyGuard } from '../guards/ReentrancyGuard.js';
import type { BackingAsset, ShareBalanceReader } from '../ledger/BackingAsset.js';
import { TokenLedger } from '../ledger/TokenLedger.js';
import { amounts, makeNoopLogger, type Logger } from '../logging/logger.js';
import type { IssuanceStatus, ReserveVaultMetrics } from '../types/VaultState.js';
import { requireNonZeroAddress } from '../utils/encoding.js';
import { invariant } from '../utils/invariant.js';
import { toBigIntAmount, type AmountInput } from '../utils/math.js';
import { classifyTransfer } from './TransferClassifier.js';
import { VaultMath, type IssuePreview, type PoolState, type RedeemPreview } from './VaultMath.js';

export type ReserveVaultConfig = {
  symbol: string;
  /** Identity of the backing asset; seeds the custody address. */
  backingMint: PublicKey;
  programId: PublicKey;
  backingAsset: BackingAsset;
  controller: PublicKey;

  /** Smallest amount accepted for a transfer between two accounts. */
  minimumTransfer: bigint;
  /** Smallest backing amount accepted by issueShares. */
  minimumLiquidity: bigint;
  issuanceWindowSec: number;

  clock: Clock;
  events?: EventLog;
  logger?: Logger;
  tax?: TaxSchedule;
};

/**
 * Called with every account whose share balance is about to change, after the
 * operation has been validated and before anything is mutated. A throwing
 * observer aborts the operation.
 */
export type BalanceChangeObserver = (accounts: readonly PublicKey[]) => void;

/** A validated share-ledger change: who it touches, and how to apply it. */
type PreparedUpdate = {
  accounts: PublicKey[];
  commit: () => void;
};

export class ReserveVault implements ShareBalanceReader {
  readonly symbol: string;
  readonly controller: PublicKey;
  readonly custody: PublicKey;
  readonly backingMint: PublicKey;
  readonly backingAsset: BackingAsset;
  readonly minimumTransfer: bigint;
  readonly minimumLiquidity: bigint;
  readonly deploymentTime: number;
  readonly issuanceWindowSec: number;
  readonly events: EventLog;

  private readonly shares: TokenLedger;
  private readonly guard: ReentrancyGuard;
  private readonly observers = new Set<BalanceChangeObserver>();
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly tax: TaxSchedule;
  private minted = 0n;

  constructor(cfg: ReserveVaultConfig) {
    this.controller = requireNonZeroAddress(cfg.controller, 'controller');
    requireNonZeroAddress(cfg.backingMint, 'backingMint');
    requireNonZeroAddress(cfg.programId, 'programId');
    if (cfg.minimumLiquidity <= 0n) {
      throw new VaultError('InvalidArgument', 'minimumLiquidity must be > 0');
    }
    if (cfg.minimumTransfer < 0n) {
      throw new VaultError('InvalidArgument', 'minimumTransfer must be >= 0');
    }
    if (!Number.isInteger(cfg.issuanceWindowSec) || cfg.issuanceWindowSec < 0) {
      throw new VaultError('InvalidArgument', 'issuanceWindowSec must be a non-negative integer');
    }

    this.symbol = cfg.symbol;
    this.custody = PDA.reserveCustody(cfg.programId, cfg.backingMint).publicKey;
    this.backingMint = cfg.backingMint;
    this.backingAsset = cfg.backingAsset;
    this.minimumTransfer = cfg.minimumTransfer;
    this.minimumLiquidity = cfg.minimumLiquidity;
    this.issuanceWindowSec = cfg.issuanceWindowSec;
    this.clock = cfg.clock;
    this.deploymentTime = cfg.clock.now();
    this.logger = (cfg.logger ?? makeNoopLogger()).child({ vault: cfg.symbol });
    this.events = cfg.events ?? new EventLog({ logger: this.logger });
    this.tax = cfg.tax ?? RESERVE_TAX;

    this.guard = new ReentrancyGuard(cfg.symbol);
    this.shares = new TokenLedger(cfg.symbol);
    this.shares.setTransferHook((from, to, amount) => this.update(from, to, amount));
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  totalSupply(): bigint {
    return this.shares.totalSupply();
  }

  balanceOf(account: PublicKey): bigint {
    return this.shares.balanceOf(account);
  }

  allowance(owner: PublicKey, spender: PublicKey): bigint {
    return this.shares.allowance(owner, spender);
  }

  get totalMinted(): bigint {
    return this.minted;
  }

  reserveBalance(): bigint {
    return this.backingAsset.balanceOf(this.custody);
  }

  poolState(): PoolState {
    return { reserveBalance: this.reserveBalance(), totalSupply: this.totalSupply() };
  }

  previewIssue(amount: AmountInput): IssuePreview {
    return VaultMath.previewIssue(toBigIntAmount(amount), this.tax);
  }

  previewRedeem(shares: AmountInput): RedeemPreview {
    return VaultMath.previewRedeem(this.poolState(), toBigIntAmount(shares));
  }

  getContractMetrics(): ReserveVaultMetrics {
    const state = this.poolState();
    return {
      totalSupply: state.totalSupply,
      reserveBalance: state.reserveBalance,
      totalMinted: this.minted,
      totalBurned: this.minted - state.totalSupply,
      backingRatio: VaultMath.backingRatio(state)
    };
  }

  getIssuanceStatus(): IssuanceStatus {
    const remaining = this.issuanceDeadline() - this.clock.now();
    return { isActive: remaining >= 0, timeRemaining: Math.max(0, remaining) };
  }

  issuanceDeadline(): number {
    return this.deploymentTime + this.issuanceWindowSec;
  }

  onBalanceChange(observer: BalanceChangeObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  // ---------------------------------------------------------------------------
  // Transfer surface
  // ---------------------------------------------------------------------------

  transfer(sender: PublicKey, to: PublicKey, amount: AmountInput): void {
    const value = toBigIntAmount(amount);
    this.events.atomic(() => this.guard.run('transfer', () => this.shares.transfer(sender, to, value)));
  }

  approve(owner: PublicKey, spender: PublicKey, amount: AmountInput): void {
    this.shares.approve(owner, spender, toBigIntAmount(amount));
  }

  transferFrom(spender: PublicKey, from: PublicKey, to: PublicKey, amount: AmountInput): void {
    const value = toBigIntAmount(amount);
    this.events.atomic(() =>
      this.guard.run('transferFrom', () => this.shares.transferFrom(spender, from, to, value))
    );
  }

  // ---------------------------------------------------------------------------
  // Issuance / redemption
  // ---------------------------------------------------------------------------

  issueShares(caller: PublicKey, amount: AmountInput): IssuePreview {
    return this.events.atomic(() => this.guard.run('issueShares', () => this.issue(caller, amount)));
  }

  redeemShares(caller: PublicKey, shares: AmountInput): RedeemPreview {
    return this.events.atomic(() => this.guard.run('redeemShares', () => this.redeem(caller, shares)));
  }

  private issue(caller: PublicKey, amount: AmountInput): IssuePreview {
    const backingAmount = toBigIntAmount(amount);

    if (backingAmount < this.minimumLiquidity) {
      throw new VaultError('InvalidAmount', 'issue amount below minimum liquidity', {
        details: { amount: backingAmount.toString(), minimum: this.minimumLiquidity.toString() }
      });
    }

    const now = this.clock.now();
    if (now > this.issuanceDeadline()) {
      throw new VaultError('IssuanceClosed', 'issuance window has closed', {
        details: { now, deadline: this.issuanceDeadline() }
      });
    }

    const allowance = this.backingAsset.allowance(caller, this.custody);
    if (allowance < backingAmount) {
      throw new VaultError('InsufficientAllowance', 'backing asset allowance too low', {
        details: { allowance: allowance.toString(), amount: backingAmount.toString() }
      });
    }
    const balance = this.backingAsset.balanceOf(caller);
    if (balance < backingAmount) {
      throw new VaultError('InsufficientBalance', 'backing asset balance too low', {
        details: { balance: balance.toString(), amount: backingAmount.toString() }
      });
    }

    const preview = VaultMath.previewIssue(backingAmount, this.tax);
    const mints = [this.prepareUpdate(null, caller, preview.sharesOut)];
    if (preview.controllerShares > 0n) {
      mints.push(this.prepareUpdate(null, this.controller, preview.controllerShares));
    }
    this.notify(mints.flatMap((m) => m.accounts));

    this.backingAsset.transferFrom(this.custody, caller, this.custody, backingAmount);
    for (const mint of mints) mint.commit();
    this.minted += preview.sharesOut + preview.controllerShares;
    if (preview.controllerBacking > 0n) {
      this.backingAsset.transfer(this.custody, this.controller, preview.controllerBacking);
    }

    invariant(this.totalSupply() <= this.minted, 'share supply exceeds lifetime minted');

    this.events.emit(this.symbol, now, {
      type: 'SharesIssued',
      buyer: caller,
      shares: preview.sharesOut,
      feeTotal: preview.feeTotal
    });
    this.logger.debug(
      { buyer: caller.toBase58(), ...amounts({ backingAmount, shares: preview.sharesOut, fee: preview.feeTotal }) },
      'shares issued'
    );

    return preview;
  }

  private redeem(caller: PublicKey, shares: AmountInput): RedeemPreview {
    const shareAmount = toBigIntAmount(shares);
    if (shareAmount === 0n) {
      throw new VaultError('InvalidAmount', 'redeem amount must be > 0');
    }

    // Reserve first, then supply, both live.
    const reserveBalance = this.reserveBalance();
    const totalSupply = this.totalSupply();
    const preview = VaultMath.previewRedeem({ reserveBalance, totalSupply }, shareAmount);

    const balance = this.balanceOf(caller);
    if (balance < shareAmount) {
      throw new VaultError('InsufficientBalance', 'share balance too low', {
        details: { balance: balance.toString(), shares: shareAmount.toString() }
      });
    }

    const burn = this.prepareUpdate(caller, null, shareAmount);
    this.notify(burn.accounts);
    burn.commit();
    this.backingAsset.transfer(this.custody, caller, preview.payout);

    this.events.emit(this.symbol, this.clock.now(), {
      type: 'SharesRedeemed',
      redeemer: caller,
      shares: shareAmount,
      backingPayout: preview.payout
    });
    this.logger.debug(
      { redeemer: caller.toBase58(), ...amounts({ shares: shareAmount, payout: preview.payout }) },
      'shares redeemed'
    );

    return preview;
  }

  // ---------------------------------------------------------------------------
  // Ledger update path
  // ---------------------------------------------------------------------------

  private update(from: PublicKey | null, to: PublicKey | null, amount: bigint): void {
    const prepared = this.prepareUpdate(from, to, amount);
    this.notify(prepared.accounts);
    prepared.commit();
  }

  private prepareUpdate(from: PublicKey | null, to: PublicKey | null, amount: bigint): PreparedUpdate {
    const transfer = classifyTransfer({ from, to }, [this.controller, this.custody]);

    switch (transfer.kind) {
      case 'Mint':
        return {
          accounts: [transfer.to],
          commit: () => {
            this.shares.mint(transfer.to, amount);
            this.emitTax(null, transfer.to, amount, 0n, 0n);
          }
        };

      case 'Burn':
        this.requireBalance(transfer.from, amount);
        return {
          accounts: [transfer.from],
          commit: () => {
            this.shares.burn(transfer.from, amount);
            this.emitTax(transfer.from, null, amount, 0n, 0n);
          }
        };

      case 'Exempt':
        this.requireMinimumTransfer(amount);
        this.requireBalance(transfer.from, amount);
        return {
          accounts: [transfer.from, transfer.to],
          commit: () => {
            this.shares.move(transfer.from, transfer.to, amount);
            this.emitTax(transfer.from, transfer.to, amount, 0n, 0n);
          }
        };

      case 'Taxed': {
        this.requireMinimumTransfer(amount);
        this.requireBalance(transfer.from, amount);

        const split = FeeSplitter.apply(amount, this.tax);
        invariant(
          split.burnAmount + split.redirectAmount + split.net === amount,
          'transfer tax does not conserve amount'
        );

        return {
          accounts: [transfer.from, transfer.to, this.controller],
          commit: () => {
            this.shares.burn(transfer.from, split.burnAmount);
            this.shares.move(transfer.from, this.controller, split.redirectAmount);
            this.shares.move(transfer.from, transfer.to, split.net);

            this.emitTax(transfer.from, transfer.to, split.net, split.redirectAmount, split.burnAmount);
            this.logger.debug(
              {
                from: transfer.from.toBase58(),
                to: transfer.to.toBase58(),
                ...amounts({ net: split.net, redirect: split.redirectAmount, burn: split.burnAmount })
              },
              'transfer taxed'
            );
          }
        };
      }
    }
  }

  private requireMinimumTransfer(amount: bigint): void {
    if (amount < this.minimumTransfer) {
      throw new VaultError('InvalidAmount', 'transfer below minimum', {
        details: { amount: amount.toString(), minimum: this.minimumTransfer.toString() }
      });
    }
  }

  private requireBalance(account: PublicKey, amount: bigint): void {
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new VaultError('InsufficientBalance', 'share balance too low', {
        details: { account: account.toBase58(), balance: balance.toString(), amount: amount.toString() }
      });
    }
  }

  private notify(accounts: readonly PublicKey[]): void {
    for (const observer of this.observers) observer(accounts);
  }

  private emitTax(
    from: PublicKey | null,
    to: PublicKey | null,
    netAmount: bigint,
    redirectAmount: bigint,
    burnAmount: bigint
  ): void {
    this.events.emit(this.symbol, this.clock.now(), {
      type: 'TransferTaxApplied',
      from,
      to,
      netAmount,
      redirectAmount,
      burnAmount
    });
  }
}
