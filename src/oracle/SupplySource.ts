import type { SupplyReader } from '../ledger/BackingAsset.js';

/** An external total-supply reading used to weight one token against another. */
export interface SupplySource {
  readonly id: string;
  totalSupply(): Promise<bigint>;
}

/** Supply read from an in-process ledger (or anything else exposing totalSupply). */
export class LedgerSupplySource implements SupplySource {
  constructor(
    readonly id: string,
    readonly reader: SupplyReader
  ) {}

  async totalSupply(): Promise<bigint> {
    return this.reader.totalSupply();
  }
}
