import type { Commitment, Connection, PublicKey } from '@solana/web3.js';
import { TOKEN_PROGRAM_ID, getMint } from '@solana/spl-token';
import { VaultError } from '../errors/VaultError.js';
import type { SupplySource } from './SupplySource.js';

export type MintSupplySourceConfig = {
  commitment?: Commitment;
  /** Token program owning the mint; Token-2022 mints pass TOKEN_2022_PROGRAM_ID. */
  programId?: PublicKey;
};

/** Total supply of an SPL mint, read from chain on every call. */
export class MintSupplySource implements SupplySource {
  readonly id: string;

  constructor(
    readonly connection: Connection,
    readonly mint: PublicKey,
    readonly config: MintSupplySourceConfig = {}
  ) {
    this.id = mint.toBase58();
  }

  async totalSupply(): Promise<bigint> {
    try {
      const info = await getMint(
        this.connection,
        this.mint,
        this.config.commitment,
        this.config.programId ?? TOKEN_PROGRAM_ID
      );
      return info.supply;
    } catch (cause) {
      throw new VaultError('SupplyReadFailed', 'Unable to read mint supply', {
        cause,
        details: { mint: this.id }
      });
    }
  }
}
