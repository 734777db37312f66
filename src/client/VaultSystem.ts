import { Connection } from '@solana/web3.js';

import { ClaimVault } from '../claims/ClaimVault.js';
import { systemClock, type Clock } from '../clock/Clock.js';
import type { VaultSystemConfig } from '../config/config.js';
import { VaultError } from '../errors/VaultError.js';
import { EventLog } from '../events/VaultEvents.js';
import type { BackingAsset } from '../ledger/BackingAsset.js';
import { makeLogger, type Logger } from '../logging/logger.js';
import { MintSupplySource } from '../oracle/MintSupplySource.js';
import type { SupplySource } from '../oracle/SupplySource.js';
import { WeightOracle } from '../oracle/WeightOracle.js';
import { ReserveVault } from '../vaults/ReserveVault.js';

export type VaultSystemDeps = {
  backingAssetA: BackingAsset;
  backingAssetB: BackingAsset;
  rewardAsset: BackingAsset;

  /**
   * Supply readings for the weight oracle. When omitted, both are read from
   * SPL mints configured by RPC_URL / WEIGHT_SUPPLY_MINT_A / WEIGHT_SUPPLY_MINT_B.
   */
  supplySources?: { a: SupplySource; b: SupplySource };

  clock?: Clock;
  logger?: Logger;
  events?: EventLog;
};

/**
 * Composition root: two reserve vaults, the weight oracle, and the claim vault
 * sharing one clock, logger and event log.
 */
export class VaultSystem {
  readonly vaultA: ReserveVault;
  readonly vaultB: ReserveVault;
  readonly oracle: WeightOracle;
  readonly claim: ClaimVault;
  readonly events: EventLog;
  readonly clock: Clock;
  readonly logger: Logger;

  constructor(
    readonly config: VaultSystemConfig,
    deps: VaultSystemDeps
  ) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? makeLogger({ level: config.logLevel });
    this.events = deps.events ?? new EventLog({ logger: this.logger });

    const shared = { clock: this.clock, events: this.events, logger: this.logger };

    this.vaultA = new ReserveVault({
      ...config.vaultA,
      ...shared,
      programId: config.programId,
      controller: config.controller,
      backingAsset: deps.backingAssetA
    });

    this.vaultB = new ReserveVault({
      ...config.vaultB,
      ...shared,
      programId: config.programId,
      controller: config.controller,
      backingAsset: deps.backingAssetB
    });

    const sources = deps.supplySources ?? VaultSystem.mintSupplySources(config);
    this.oracle = new WeightOracle({
      ...shared,
      sourceA: sources.a,
      sourceB: sources.b,
      cooldownSec: config.weight.cooldownSec,
      initialWeight: config.weight.initialWeight
    });

    this.claim = new ClaimVault({
      ...shared,
      symbol: config.claim.symbol,
      rewardMint: config.claim.rewardMint,
      programId: config.programId,
      rewardAsset: deps.rewardAsset,
      vaultA: this.vaultA,
      vaultB: this.vaultB,
      oracle: this.oracle,
      minimumDeposit: config.claim.minimumDeposit,
      minimumTransfer: config.claim.minimumTransfer
    });

    this.logger.info(
      {
        vaultA: config.vaultA.symbol,
        vaultB: config.vaultB.symbol,
        claim: config.claim.symbol,
        controller: config.controller.toBase58()
      },
      'vault system ready'
    );
  }

  private static mintSupplySources(config: VaultSystemConfig): { a: SupplySource; b: SupplySource } {
    const { rpcUrl, supplyMintA, supplyMintB } = config.weight;
    if (!rpcUrl || !supplyMintA || !supplyMintB) {
      throw new VaultError(
        'ConfigInvalid',
        'Provide supplySources or RPC_URL with WEIGHT_SUPPLY_MINT_A and WEIGHT_SUPPLY_MINT_B'
      );
    }
    const connection = new Connection(rpcUrl, 'confirmed');
    return {
      a: new MintSupplySource(connection, supplyMintA),
      b: new MintSupplySource(connection, supplyMintB)
    };
  }
}
