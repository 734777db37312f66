import type { Clock } from '../clock/Clock.js';
import { VaultError } from '../errors/VaultError.js';
import { EventLog } from '../events/VaultEvents.js';
import { ReentrancyGuard } from '../guards/ReentrancyGuard.js';
import { amounts, makeNoopLogger, type Logger } from '../logging/logger.js';
import { SCALE, mulDiv } from '../utils/math.js';
import type { SupplySource } from './SupplySource.js';

export const DEFAULT_WEIGHT_COOLDOWN_SEC = 86_400;

export type WeightOracleConfig = {
  /** Denominator supply: the token whose balances count 1:1. */
  sourceA: SupplySource;
  /** Numerator supply: the token whose balances are scaled by the weight. */
  sourceB: SupplySource;
  clock: Clock;
  cooldownSec?: number;
  /** Weight in effect before the first successful update, 1e18 scale. */
  initialWeight?: bigint;
  label?: string;
  events?: EventLog;
  logger?: Logger;
};

/**
 * Holds `weight = supplyB * 1e18 / supplyA`, recomputed by anyone at most once
 * per cooldown window.
 */
export class WeightOracle {
  readonly cooldownSec: number;
  readonly label: string;
  readonly events: EventLog;

  private weight: bigint;
  private lastUpdate = 0;
  private readonly guard: ReentrancyGuard;
  private readonly logger: Logger;

  constructor(readonly config: WeightOracleConfig) {
    const cooldownSec = config.cooldownSec ?? DEFAULT_WEIGHT_COOLDOWN_SEC;
    if (!Number.isInteger(cooldownSec) || cooldownSec < 0) {
      throw new VaultError('InvalidArgument', 'cooldownSec must be a non-negative integer');
    }
    const initialWeight = config.initialWeight ?? SCALE;
    if (initialWeight <= 0n) {
      throw new VaultError('InvalidArgument', 'initialWeight must be > 0');
    }

    this.cooldownSec = cooldownSec;
    this.weight = initialWeight;
    this.label = config.label ?? 'weight-oracle';
    this.logger = (config.logger ?? makeNoopLogger()).child({ component: this.label });
    this.events = config.events ?? new EventLog({ logger: this.logger });
    this.guard = new ReentrancyGuard(this.label);
  }

  getCurrentWeight(): bigint {
    return this.weight;
  }

  getLastWeightUpdate(): number {
    return this.lastUpdate;
  }

  nextUpdateAt(): number {
    return this.lastUpdate + this.cooldownSec;
  }

  /** Converts a B-denominated balance into A units at the current weight. */
  weigh(amountB: bigint): bigint {
    return mulDiv(amountB, this.weight, SCALE);
  }

  async updateWeight(): Promise<bigint> {
    return this.guard.runAsync('updateWeight', async () => {
      const now = this.config.clock.now();
      if (now < this.nextUpdateAt()) {
        throw new VaultError('CooldownActive', 'weight update cooldown has not elapsed', {
          details: { now, nextUpdateAt: this.nextUpdateAt() }
        });
      }

      const [supplyA, supplyB] = await Promise.all([
        this.config.sourceA.totalSupply(),
        this.config.sourceB.totalSupply()
      ]);
      if (supplyA === 0n || supplyB === 0n) {
        throw new VaultError('ZeroSourceSupply', 'source supply is zero', {
          details: {
            sourceA: this.config.sourceA.id,
            sourceB: this.config.sourceB.id,
            ...amounts({ supplyA, supplyB })
          }
        });
      }

      const newWeight = mulDiv(supplyB, SCALE, supplyA);
      if (newWeight === 0n) {
        throw new VaultError('ZeroSourceSupply', 'supply ratio rounds to a zero weight', {
          details: amounts({ supplyA, supplyB })
        });
      }

      this.weight = newWeight;
      this.lastUpdate = now;

      this.events.emit(this.label, now, { type: 'WeightUpdated', newWeight });
      this.logger.info(amounts({ newWeight, supplyA, supplyB }), 'weight updated');

      return newWeight;
    });
  }
}
