import type { PublicKey } from '@solana/web3.js';

import { makeLogger, type Logger } from '../logging/logger.js';

export type SharesIssued = {
  type: 'SharesIssued';
  buyer: PublicKey;
  shares: bigint;
  feeTotal: bigint;
};

export type SharesRedeemed = {
  type: 'SharesRedeemed';
  redeemer: PublicKey;
  shares: bigint;
  backingPayout: bigint;
};

export type TransferTaxApplied = {
  type: 'TransferTaxApplied';
  from: PublicKey | null;
  to: PublicKey | null;
  netAmount: bigint;
  redirectAmount: bigint;
  burnAmount: bigint;
};

export type TokensDeposited = {
  type: 'TokensDeposited';
  depositor: PublicKey;
  amount: bigint;
};

export type RewardClaimed = {
  type: 'RewardClaimed';
  claimer: PublicKey;
  amount: bigint;
};

export type ClaimRedeemed = {
  type: 'ClaimRedeemed';
  redeemer: PublicKey;
  shares: bigint;
  payout: bigint;
};

export type WeightUpdated = {
  type: 'WeightUpdated';
  newWeight: bigint;
};

export type BurnApplied = {
  type: 'BurnApplied';
  from: PublicKey;
  amount: bigint;
};

export type VaultEventBody =
  | SharesIssued
  | SharesRedeemed
  | TransferTaxApplied
  | TokensDeposited
  | RewardClaimed
  | ClaimRedeemed
  | WeightUpdated
  | BurnApplied;

export type VaultEvent = VaultEventBody & {
  /** Emitting component, e.g. the vault symbol. */
  source: string;
  timestamp: number;
  seq: number;
};

export type VaultEventType = VaultEvent['type'];

export type VaultEventListener = (event: VaultEvent) => void;

type PendingEvent = { source: string; timestamp: number; body: VaultEventBody };

export type EventLogOptions = {
  /** Receives listener failures; defaults to the pino stdout logger. */
  logger?: Logger;
};

/**
 * Append-only event history with synchronous subscribers, for indexers and tests.
 *
 * Events emitted inside `atomic` are held until the outermost `atomic` call
 * returns and are dropped if it throws. A throwing listener is logged and does
 * not reach the emitter.
 */
export class EventLog {
  private readonly events: VaultEvent[] = [];
  private readonly listeners = new Set<VaultEventListener>();
  private readonly pending: PendingEvent[][] = [];
  private readonly logger: Logger;

  constructor(options: EventLogOptions = {}) {
    this.logger = options.logger ?? makeLogger();
  }

  emit(source: string, timestamp: number, body: VaultEventBody): void {
    const batch = this.pending[this.pending.length - 1];
    if (batch) {
      batch.push({ source, timestamp, body });
      return;
    }
    this.publish([{ source, timestamp, body }]);
  }

  /** Runs `fn`, publishing the events it emits only once it has returned. */
  atomic<T>(fn: () => T): T {
    this.pending.push([]);
    let result: T;
    try {
      result = fn();
    } catch (err) {
      this.pending.pop();
      throw err;
    }

    const batch = this.pending.pop() ?? [];
    const parent = this.pending[this.pending.length - 1];
    if (parent) parent.push(...batch);
    else this.publish(batch);
    return result;
  }

  subscribe(listener: VaultEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  history(): readonly VaultEvent[] {
    return this.events;
  }

  ofType<T extends VaultEventType>(type: T): Array<Extract<VaultEvent, { type: T }>> {
    return this.events.filter((e): e is Extract<VaultEvent, { type: T }> => e.type === type);
  }

  private publish(batch: readonly PendingEvent[]): void {
    const published: VaultEvent[] = [];
    for (const { source, timestamp, body } of batch) {
      const event: VaultEvent = { ...body, source, timestamp, seq: this.events.length };
      this.events.push(event);
      published.push(event);
    }

    const listeners = [...this.listeners];
    for (const event of published) {
      for (const listener of listeners) {
        try {
          listener(event);
        } catch (err) {
          this.logger.error({ err, source: event.source, type: event.type, seq: event.seq }, 'event listener failed');
        }
      }
    }
  }
}
