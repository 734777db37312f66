import { VaultError } from '../errors/VaultError.js';

export type RoundingMode = 'down' | 'up';

export type AmountInput = bigint | number | string;

/** Fixed-point scale shared by the weight and the reward accumulator. */
export const SCALE = 1_000_000_000_000_000_000n;

export const BPS_DENOMINATOR = 10_000n;

export function toBigIntAmount(value: AmountInput): bigint {
  if (typeof value === 'bigint') {
    if (value < 0n) throw new VaultError('InvalidArgument', 'Amount must be non-negative');
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || !Number.isInteger(value) || value < 0) {
      throw new VaultError('InvalidArgument', 'Amount must be a non-negative integer');
    }
    return BigInt(value);
  }
  if (!/^[0-9]+$/.test(value)) {
    throw new VaultError('InvalidArgument', 'Amount string must be base-10 integer');
  }
  return BigInt(value);
}

export function pow10(exp: number): bigint {
  if (!Number.isInteger(exp) || exp < 0) {
    throw new VaultError('InvalidArgument', 'pow10 exponent must be a non-negative integer');
  }
  let result = 1n;
  for (let i = 0; i < exp; i++) result *= 10n;
  return result;
}

/** Parses a decimal token amount ("95.5") into base units at `decimals`. */
export function parseUnits(value: string, decimals = 18): bigint {
  const match = /^([0-9]+)(?:\.([0-9]+))?$/.exec(value);
  if (!match) {
    throw new VaultError('InvalidArgument', 'Decimal amount must be a non-negative number', {
      details: { value }
    });
  }
  const whole = match[1] ?? '0';
  const frac = match[2] ?? '';
  if (frac.length > decimals) {
    throw new VaultError('InvalidArgument', 'Too many fractional digits', { details: { value, decimals } });
  }
  return BigInt(whole) * pow10(decimals) + BigInt(frac.padEnd(decimals, '0') || '0');
}

export function mulDiv(
  a: bigint,
  b: bigint,
  denom: bigint,
  rounding: RoundingMode = 'down'
): bigint {
  if (denom === 0n) throw new VaultError('InvalidArgument', 'Division by zero');
  const product = a * b;
  if (rounding === 'down') return product / denom;
  const q = product / denom;
  const r = product % denom;
  return r === 0n ? q : q + 1n;
}

export function clampBps(bps: number): number {
  if (!Number.isInteger(bps) || bps < 0 || bps > 10_000) {
    throw new VaultError('InvalidArgument', 'bps must be an integer in [0, 10000]');
  }
  return bps;
}

export function bpsOf(amount: bigint, bps: number, rounding: RoundingMode = 'down'): bigint {
  const safeBps = clampBps(bps);
  return mulDiv(amount, BigInt(safeBps), BPS_DENOMINATOR, rounding);
}
