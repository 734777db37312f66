import { PublicKey } from '@solana/web3.js';
import { VaultError } from '../errors/VaultError.js';

export function asPublicKey(value: PublicKey | string, fieldName = 'publicKey'): PublicKey {
  if (value instanceof PublicKey) return value;
  try {
    return new PublicKey(value);
  } catch (cause) {
    throw new VaultError('InvalidArgument', `Invalid ${fieldName}`, { cause, details: { value } });
  }
}

/** Map key for per-account stores. */
export function accountKey(account: PublicKey): string {
  return account.toBase58();
}

export function isZeroAddress(account: PublicKey): boolean {
  return account.equals(PublicKey.default);
}

export function requireNonZeroAddress(account: PublicKey, fieldName: string): PublicKey {
  if (isZeroAddress(account)) {
    throw new VaultError('ZeroAddress', `${fieldName} must not be the zero address`);
  }
  return account;
}

export function utf8Bytes(text: string): Buffer {
  return Buffer.from(text, 'utf8');
}
