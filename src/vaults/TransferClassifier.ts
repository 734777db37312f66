import type { PublicKey } from '@solana/web3.js';
import { invariant } from '../utils/invariant.js';

export type TransferEndpoints = {
  from: PublicKey | null;
  to: PublicKey | null;
};

export type TransferKind =
  | { kind: 'Mint'; to: PublicKey }
  | { kind: 'Burn'; from: PublicKey }
  | { kind: 'Exempt'; from: PublicKey; to: PublicKey }
  | { kind: 'Taxed'; from: PublicKey; to: PublicKey };

/**
 * Classifies a movement once per call. `null` endpoints are mint/burn; a
 * counterparty found in `exempt` passes through untaxed.
 */
export function classifyTransfer(endpoints: TransferEndpoints, exempt: readonly PublicKey[]): TransferKind {
  const { from, to } = endpoints;
  if (from === null) {
    invariant(to !== null, 'transfer needs at least one endpoint');
    return { kind: 'Mint', to };
  }
  if (to === null) return { kind: 'Burn', from };

  const isExempt = exempt.some((a) => a.equals(from) || a.equals(to));
  return isExempt ? { kind: 'Exempt', from, to } : { kind: 'Taxed', from, to };
}
