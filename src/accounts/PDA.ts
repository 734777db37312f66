import { PublicKey } from '@solana/web3.js';
import { utf8Bytes } from '../utils/encoding.js';
import { Seeds } from './Seeds.js';

export type DerivedPda = { publicKey: PublicKey; bump: number };

function find(programId: PublicKey, seeds: Array<Buffer | Uint8Array>): DerivedPda {
  const [publicKey, bump] = PublicKey.findProgramAddressSync(seeds, programId);
  return { publicKey, bump };
}

/** Self-custody addresses: where each vault holds its pooled reserve. */
export const PDA = {
  reserveCustody(programId: PublicKey, mint: PublicKey): DerivedPda {
    return find(programId, [utf8Bytes(Seeds.ReserveCustody), mint.toBuffer()]);
  },

  claimCustody(programId: PublicKey, mint: PublicKey): DerivedPda {
    return find(programId, [utf8Bytes(Seeds.ClaimCustody), mint.toBuffer()]);
  }
} as const;
