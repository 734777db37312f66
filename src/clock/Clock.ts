import { VaultError } from '../errors/VaultError.js';

/** Unix seconds, monotonic non-decreasing. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000)
};

export class ManualClock implements Clock {
  constructor(private current: number) {
    if (!Number.isInteger(current) || current < 0) {
      throw new VaultError('InvalidArgument', 'clock start must be a non-negative integer');
    }
  }

  now(): number {
    return this.current;
  }

  advance(seconds: number): number {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new VaultError('InvalidArgument', 'clock can only move forward by whole seconds');
    }
    this.current += seconds;
    return this.current;
  }

  set(timestamp: number): void {
    if (timestamp < this.current) {
      throw new VaultError('InvalidArgument', 'clock cannot move backwards', {
        details: { current: this.current, requested: timestamp }
      });
    }
    this.current = timestamp;
  }
}
