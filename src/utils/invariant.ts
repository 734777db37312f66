import { VaultError } from '../errors/VaultError.js';

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new VaultError('InvariantViolation', message);
  }
}
