import type { PublicKey } from '@solana/web3.js';

import { PDA } from '../accounts/PDA.js';
import type { Clock } from '../clock/Clock.js';
import { VaultError } from '../errors/VaultError.js';
import { EventLog } from '../events/VaultEvents.js';
import { CLAIM_TAX, FeeSplitter, type TaxSchedule } from '../fees/FeeSplitter.js';
import { ReentrancyGuard } from '../guards/ReentrancyGuard.js';
import type { BackingAsset, ShareBalanceReader } from '../ledger/BackingAsset.js';
import { TokenLedger } from '../ledger/TokenLedger.js';
import { amounts, makeNoopLogger, type Logger } from '../logging/logger.js';
import type { WeightOracle } from '../oracle/WeightOracle.js';
import { RewardAccrual, type RewardNotification } from '../rewards/RewardAccrual.js';
import type { ClaimEligibility, ClaimVaultMetrics } from '../types/VaultState.js';
import { requireNonZeroAddress } from '../utils/encoding.js';
import { invariant } from '../utils/invariant.js';
import { SCALE, mulDiv, toBigIntAmount, type AmountInput } from '../utils/math.js';
import type { ReserveVault } from '../vaults/ReserveVault.js';
import { classifyTransfer } from '../vaults/TransferClassifier.js';
import { VaultMath, type PoolState, type RedeemPreview } from '../vaults/VaultMath.js';

export type ClaimVaultConfig = {
  symbol: string;
  rewardMint: PublicKey;
  programId: PublicKey;
  /** Asset pooled by depositTokens and paid out by redeemPLSTR. */
  rewardAsset: BackingAsset;

  /** Holders of vaultA shares count 1:1. */
  vaultA: ReserveVault;
  /** Holders of vaultB shares count at the oracle weight. */
  vaultB: ReserveVault;
  oracle: WeightOracle;

  minimumDeposit: bigint;
  minimumTransfer: bigint;

  clock: Clock;
  events?: EventLog;
  logger?: Logger;
  tax?: TaxSchedule;
};

/**
 * Meta-share vault. Holders of the two reserve vault shares accrue meta-shares
 * from deposits of the reward asset; meta-shares redeem pro-rata against the
 * pooled reward asset.
 */
export class ClaimVault implements ShareBalanceReader {
  readonly symbol: string;
  readonly custody: PublicKey;
  readonly rewardAsset: BackingAsset;
  readonly oracle: WeightOracle;
  readonly accrual: RewardAccrual;
  readonly minimumDeposit: bigint;
  readonly minimumTransfer: bigint;
  readonly events: EventLog;

  private readonly shares: TokenLedger;
  private readonly guard: ReentrancyGuard;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly tax: TaxSchedule;
  private readonly detach: Array<() => void>;
  private minted = 0n;

  constructor(cfg: ClaimVaultConfig) {
    requireNonZeroAddress(cfg.rewardMint, 'rewardMint');
    requireNonZeroAddress(cfg.programId, 'programId');
    if (cfg.minimumDeposit <= 0n) {
      throw new VaultError('InvalidArgument', 'minimumDeposit must be > 0');
    }
    if (cfg.minimumTransfer < 0n) {
      throw new VaultError('InvalidArgument', 'minimumTransfer must be >= 0');
    }
    const tax = cfg.tax ?? CLAIM_TAX;
    if (tax.burnShareRatio !== 100) {
      throw new VaultError('InvalidArgument', 'claim vault tax is burn-only');
    }

    this.symbol = cfg.symbol;
    this.custody = PDA.claimCustody(cfg.programId, cfg.rewardMint).publicKey;
    this.rewardAsset = cfg.rewardAsset;
    this.oracle = cfg.oracle;
    this.minimumDeposit = cfg.minimumDeposit;
    this.minimumTransfer = cfg.minimumTransfer;
    this.clock = cfg.clock;
    this.logger = (cfg.logger ?? makeNoopLogger()).child({ vault: cfg.symbol });
    this.events = cfg.events ?? new EventLog({ logger: this.logger });
    this.tax = tax;

    this.accrual = new RewardAccrual({ tokenA: cfg.vaultA, tokenB: cfg.vaultB, weight: cfg.oracle });
    this.guard = new ReentrancyGuard(cfg.symbol);
    this.shares = new TokenLedger(cfg.symbol);
    this.shares.setTransferHook((from, to, amount) => this.update(from, to, amount));

    // Holders are settled before their reserve share balances move.
    const settleAll = (accounts: readonly PublicKey[]): void => {
      for (const account of accounts) this.accrual.settle(account);
    };
    this.detach = [cfg.vaultA.onBalanceChange(settleAll), cfg.vaultB.onBalanceChange(settleAll)];
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
    return this.rewardAsset.balanceOf(this.custody);
  }

  poolState(): PoolState {
    return { reserveBalance: this.reserveBalance(), totalSupply: this.totalSupply() };
  }

  getCurrentWeight(): bigint {
    return this.oracle.getCurrentWeight();
  }

  getLastWeightUpdate(): number {
    return this.oracle.getLastWeightUpdate();
  }

  getClaimEligibility(account: PublicKey): ClaimEligibility {
    const { balanceA, balanceB } = this.accrual.eligibleBalances(account);
    return { account, claimable: this.accrual.earned(account), balanceA, balanceB };
  }

  getContractMetrics(): ClaimVaultMetrics {
    const state = this.poolState();
    const totalEligible = this.accrual.totalEligibleWeighted();
    return {
      totalSupply: state.totalSupply,
      reserveBalance: state.reserveBalance,
      totalMinted: this.minted,
      totalBurned: this.minted - state.totalSupply,
      rewardPerToken: this.accrual.rewardPerToken,
      avgRewardPerEligibleUnit:
        totalEligible === 0n ? 0n : mulDiv(state.reserveBalance, SCALE, totalEligible),
      backingRatio: VaultMath.backingRatio(state)
    };
  }

  // ---------------------------------------------------------------------------
  // Entry points
  // ---------------------------------------------------------------------------

  async updateWeight(): Promise<bigint> {
    return this.oracle.updateWeight();
  }

  depositTokens(caller: PublicKey, amount: AmountInput): RewardNotification {
    return this.events.atomic(() => this.guard.run('depositTokens', () => this.deposit(caller, amount)));
  }

  private deposit(caller: PublicKey, amount: AmountInput): RewardNotification {
    const value = toBigIntAmount(amount);
    if (value < this.minimumDeposit) {
      throw new VaultError('InvalidAmount', 'deposit below minimum', {
        details: { amount: value.toString(), minimum: this.minimumDeposit.toString() }
      });
    }

    const allowance = this.rewardAsset.allowance(caller, this.custody);
    if (allowance < value) {
      throw new VaultError('InsufficientAllowance', 'reward asset allowance too low', {
        details: { allowance: allowance.toString(), amount: value.toString() }
      });
    }
    const balance = this.rewardAsset.balanceOf(caller);
    if (balance < value) {
      throw new VaultError('InsufficientBalance', 'reward asset balance too low', {
        details: { balance: balance.toString(), amount: value.toString() }
      });
    }

    this.rewardAsset.transferFrom(this.custody, caller, this.custody, value);
    const notification = this.accrual.notifyReward(value);

    if (!notification.attributed) {
      this.logger.warn(
        { depositor: caller.toBase58(), ...amounts({ amount: value }) },
        'deposit pooled without eligible supply; accumulator unchanged'
      );
    }

    this.events.emit(this.symbol, this.clock.now(), {
      type: 'TokensDeposited',
      depositor: caller,
      amount: value
    });
    this.logger.debug(
      {
        depositor: caller.toBase58(),
        ...amounts({ amount: value, delta: notification.accumulatorDelta, totalEligible: notification.totalEligible })
      },
      'tokens deposited'
    );

    return notification;
  }

  claimPLSTR(caller: PublicKey): bigint {
    return this.events.atomic(() => this.guard.run('claimPLSTR', () => this.claim(caller)));
  }

  private claim(caller: PublicKey): bigint {
    const reward = this.accrual.settle(caller);
    if (reward === 0n) {
      throw new VaultError('NoClaimableReward', 'nothing to claim', {
        details: { account: caller.toBase58() }
      });
    }

    const consumed = this.accrual.consume(caller);
    invariant(consumed === reward, 'settled reward changed during claim');

    this.update(null, caller, reward);
    this.minted += reward;

    this.events.emit(this.symbol, this.clock.now(), { type: 'RewardClaimed', claimer: caller, amount: reward });
    this.logger.debug({ claimer: caller.toBase58(), ...amounts({ reward }) }, 'reward claimed');

    return reward;
  }

  redeemPLSTR(caller: PublicKey, shares: AmountInput): RedeemPreview {
    return this.events.atomic(() => this.guard.run('redeemPLSTR', () => this.redeem(caller, shares)));
  }

  private redeem(caller: PublicKey, shares: AmountInput): RedeemPreview {
    const shareAmount = toBigIntAmount(shares);
    if (shareAmount === 0n) {
      throw new VaultError('InvalidAmount', 'redeem amount must be > 0');
    }
    const balance = this.balanceOf(caller);
    if (shareAmount > balance) {
      throw new VaultError('InsufficientBalance', 'meta-share balance too low', {
        details: { balance: balance.toString(), shares: shareAmount.toString() }
      });
    }

    const reserveBalance = this.reserveBalance();
    const totalSupply = this.totalSupply();
    const preview = VaultMath.previewRedeem({ reserveBalance, totalSupply }, shareAmount);

    this.update(caller, null, shareAmount);
    this.rewardAsset.transfer(this.custody, caller, preview.payout);

    this.events.emit(this.symbol, this.clock.now(), {
      type: 'ClaimRedeemed',
      redeemer: caller,
      shares: shareAmount,
      payout: preview.payout
    });
    this.logger.debug(
      { redeemer: caller.toBase58(), ...amounts({ shares: shareAmount, payout: preview.payout }) },
      'meta-shares redeemed'
    );

    return preview;
  }

  // ---------------------------------------------------------------------------
  // Meta-share transfer surface
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

  /** Stops settling on reserve vault balance changes. */
  close(): void {
    for (const off of this.detach) off();
    this.detach.length = 0;
  }

  private update(from: PublicKey | null, to: PublicKey | null, amount: bigint): void {
    const transfer = classifyTransfer({ from, to }, [this.custody]);

    switch (transfer.kind) {
      case 'Mint':
        this.shares.mint(transfer.to, amount);
        return;

      case 'Burn':
        this.shares.burn(transfer.from, amount);
        return;

      case 'Exempt':
        this.requireMinimumTransfer(amount);
        this.shares.move(transfer.from, transfer.to, amount);
        return;

      case 'Taxed': {
        this.requireMinimumTransfer(amount);
        const balance = this.balanceOf(transfer.from);
        if (balance < amount) {
          throw new VaultError('InsufficientBalance', 'meta-share balance too low', {
            details: { balance: balance.toString(), amount: amount.toString() }
          });
        }

        const split = FeeSplitter.apply(amount, this.tax);
        invariant(split.redirectAmount === 0n, 'claim vault tax must not redirect');

        this.shares.burn(transfer.from, split.burnAmount);
        this.shares.move(transfer.from, transfer.to, split.net);

        this.events.emit(this.symbol, this.clock.now(), {
          type: 'BurnApplied',
          from: transfer.from,
          amount: split.burnAmount
        });
        return;
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
}
