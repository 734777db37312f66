/**
 * Configuration for a vault deployment, validated with zod. Values come from
 * environment variables (strings, coerced) or from a plain object.
 */

import { z } from 'zod';
import type { PublicKey } from '@solana/web3.js';

import { VaultError } from '../errors/VaultError.js';
import { asPublicKey } from '../utils/encoding.js';
import { SCALE } from '../utils/math.js';

const DAY = 86_400;

const baseUnits = z
  .union([z.string().regex(/^[0-9]+$/, 'expected a base-10 integer'), z.bigint().nonnegative()])
  .transform((v) => BigInt(v));

const seconds = z.coerce.number().int().min(0);

const base58 = z.string().min(32).max(44);

export const ConfigSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  PROGRAM_ID: base58,
  CONTROLLER: base58,

  VAULT_A_SYMBOL: z.string().min(1).default('rsvA'),
  VAULT_A_BACKING_MINT: base58,
  VAULT_A_MIN_TRANSFER: baseUnits.default('1000000000000000'),
  VAULT_A_MIN_LIQUIDITY: baseUnits.default('1000000000000000000'),
  VAULT_A_ISSUANCE_WINDOW_SEC: seconds.default(180 * DAY),

  VAULT_B_SYMBOL: z.string().min(1).default('rsvB'),
  VAULT_B_BACKING_MINT: base58,
  VAULT_B_MIN_TRANSFER: baseUnits.default('10000000000000000'),
  VAULT_B_MIN_LIQUIDITY: baseUnits.default('10000000000000000000'),
  VAULT_B_ISSUANCE_WINDOW_SEC: seconds.default(90 * DAY),

  CLAIM_SYMBOL: z.string().min(1).default('PLSTR'),
  CLAIM_REWARD_MINT: base58,
  CLAIM_MIN_DEPOSIT: baseUnits.default('1000000000000000000'),
  CLAIM_MIN_TRANSFER: baseUnits.default('1000000000000000'),

  WEIGHT_COOLDOWN_SEC: seconds.default(DAY),
  WEIGHT_INITIAL: baseUnits.default(SCALE.toString()),

  // On-chain supply readings for the weight oracle
  RPC_URL: z.string().url().optional(),
  WEIGHT_SUPPLY_MINT_A: base58.optional(),
  WEIGHT_SUPPLY_MINT_B: base58.optional()
});

export type RawConfig = z.infer<typeof ConfigSchema>;

export type ReserveVaultSettings = {
  symbol: string;
  backingMint: PublicKey;
  minimumTransfer: bigint;
  minimumLiquidity: bigint;
  issuanceWindowSec: number;
};

export type VaultSystemConfig = {
  logLevel: RawConfig['LOG_LEVEL'];
  nodeEnv: RawConfig['NODE_ENV'];
  programId: PublicKey;
  controller: PublicKey;
  vaultA: ReserveVaultSettings;
  vaultB: ReserveVaultSettings;
  claim: {
    symbol: string;
    rewardMint: PublicKey;
    minimumDeposit: bigint;
    minimumTransfer: bigint;
  };
  weight: {
    cooldownSec: number;
    initialWeight: bigint;
    rpcUrl?: string;
    supplyMintA?: PublicKey;
    supplyMintB?: PublicKey;
  };
};

export function parseConfig(input: Record<string, unknown>): VaultSystemConfig {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new VaultError('ConfigInvalid', `Invalid configuration: ${issues.join('; ')}`, {
      cause: result.error,
      details: { issues }
    });
  }
  const raw = result.data;

  const weight: VaultSystemConfig['weight'] = {
    cooldownSec: raw.WEIGHT_COOLDOWN_SEC,
    initialWeight: raw.WEIGHT_INITIAL
  };
  if (raw.RPC_URL !== undefined) weight.rpcUrl = raw.RPC_URL;
  if (raw.WEIGHT_SUPPLY_MINT_A !== undefined) {
    weight.supplyMintA = asPublicKey(raw.WEIGHT_SUPPLY_MINT_A, 'WEIGHT_SUPPLY_MINT_A');
  }
  if (raw.WEIGHT_SUPPLY_MINT_B !== undefined) {
    weight.supplyMintB = asPublicKey(raw.WEIGHT_SUPPLY_MINT_B, 'WEIGHT_SUPPLY_MINT_B');
  }

  return {
    logLevel: raw.LOG_LEVEL,
    nodeEnv: raw.NODE_ENV,
    programId: asPublicKey(raw.PROGRAM_ID, 'PROGRAM_ID'),
    controller: asPublicKey(raw.CONTROLLER, 'CONTROLLER'),
    vaultA: {
      symbol: raw.VAULT_A_SYMBOL,
      backingMint: asPublicKey(raw.VAULT_A_BACKING_MINT, 'VAULT_A_BACKING_MINT'),
      minimumTransfer: raw.VAULT_A_MIN_TRANSFER,
      minimumLiquidity: raw.VAULT_A_MIN_LIQUIDITY,
      issuanceWindowSec: raw.VAULT_A_ISSUANCE_WINDOW_SEC
    },
    vaultB: {
      symbol: raw.VAULT_B_SYMBOL,
      backingMint: asPublicKey(raw.VAULT_B_BACKING_MINT, 'VAULT_B_BACKING_MINT'),
      minimumTransfer: raw.VAULT_B_MIN_TRANSFER,
      minimumLiquidity: raw.VAULT_B_MIN_LIQUIDITY,
      issuanceWindowSec: raw.VAULT_B_ISSUANCE_WINDOW_SEC
    },
    claim: {
      symbol: raw.CLAIM_SYMBOL,
      rewardMint: asPublicKey(raw.CLAIM_REWARD_MINT, 'CLAIM_REWARD_MINT'),
      minimumDeposit: raw.CLAIM_MIN_DEPOSIT,
      minimumTransfer: raw.CLAIM_MIN_TRANSFER
    },
    weight
  };
}

/** Reads configuration from environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): VaultSystemConfig {
  return parseConfig({ ...env });
}
