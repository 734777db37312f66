import { VaultError } from '../errors/VaultError.js';

/**
 * Mutual exclusion per instance: a guarded call cannot start while another
 * guarded call on the same guard is still running. Released on every exit path.
 */
export class ReentrancyGuard {
  private entered = false;

  constructor(readonly owner: string) {}

  get locked(): boolean {
    return this.entered;
  }

  run<T>(operation: string, fn: () => T): T {
    this.acquire(operation);
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }

  async runAsync<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    this.acquire(operation);
    try {
      return await fn();
    } finally {
      this.entered = false;
    }
  }

  private acquire(operation: string): void {
    if (this.entered) {
      throw new VaultError('ReentrantCall', `${this.owner}: reentrant call to ${operation}`, {
        details: { owner: this.owner, operation }
      });
    }
    this.entered = true;
  }
}
