export * from './src/client/VaultSystem.js';

export * from './src/vaults/ReserveVault.js';
export * from './src/vaults/VaultMath.js';
export * from './src/vaults/TransferClassifier.js';

export * from './src/claims/ClaimVault.js';
export * from './src/rewards/RewardAccrual.js';

export * from './src/oracle/WeightOracle.js';
export * from './src/oracle/SupplySource.js';
export * from './src/oracle/MintSupplySource.js';

export * from './src/fees/FeeSplitter.js';
export * from './src/ledger/BackingAsset.js';
export * from './src/ledger/TokenLedger.js';
export * from './src/guards/ReentrancyGuard.js';
export * from './src/clock/Clock.js';
export * from './src/events/VaultEvents.js';

export * from './src/accounts/PDA.js';
export * from './src/accounts/Seeds.js';

export * from './src/config/config.js';
export * from './src/logging/logger.js';

export * from './src/types/VaultState.js';

export * from './src/errors/VaultError.js';

export * from './src/utils/math.js';
export * from './src/utils/invariant.js';
export * from './src/utils/encoding.js';
