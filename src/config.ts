import dotenv from 'dotenv';
import { validateFeeBounds } from './core/fees.js';
import type { ProtocolSettings, TierSettings } from './types.js';

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

function flagFromEnv(name: string): boolean {
    const raw = (process.env[name] ?? '').toLowerCase();
    return raw === '1' || raw === 'true';
}

export const NODE_ENV = process.env.NODE_ENV ?? 'development';
export const PORT = intFromEnv('PORT', 3000);
export const DB_PATH = process.env.DB_PATH ?? './tierpool.sqlite';

export const AUTHORITY_KEY = process.env.AUTHORITY_KEY ?? 'change_me';
export const FEE_VAULT_KEY = process.env.FEE_VAULT_KEY ?? 'fee_vault';
export const TREASURY_KEY = process.env.TREASURY_KEY ?? 'treasury';

// Fees in basis points (100 = 1.00%)
export const BASE_FEE_BPS = intFromEnv('BASE_FEE_BPS', 500);
export const MIN_FEE_BPS = intFromEnv('MIN_FEE_BPS', 200);
export const ROLLOVER_FEE_STEP_BPS = intFromEnv('ROLLOVER_FEE_STEP_BPS', 100);

// Ticks that must remain in the epoch for a stake to be accepted
export const BET_CUTOFF_TICKS = intFromEnv('BET_CUTOFF_TICKS', 300);
export const BETTING_PAUSED = flagFromEnv('BETTING_PAUSED');

// Epoch schedule: 432000 ticks of 400ms ≈ 2 days
export const TICKS_PER_EPOCH = intFromEnv('TICKS_PER_EPOCH', 432_000);
export const TICK_MS = intFromEnv('TICK_MS', 400);
export const GENESIS_MS = intFromEnv('GENESIS_MS', 0);

export const RESOLVER_URL = process.env.RESOLVER_URL ?? 'http://localhost:4000';
export const API_BASE = process.env.API_BASE ?? `http://localhost:${PORT}`;
export const RESOLVER_TIMEOUT_MS = intFromEnv('RESOLVER_TIMEOUT_MS', 10_000);
export const RESOLVER_POLL_CRON = process.env.RESOLVER_POLL_CRON ?? '*/30 * * * * *';
export const RESOLVER_CRANK_ENABLED = (process.env.RESOLVER_CRANK ?? 'on') !== 'off';

const UNIT = 1_000_000_000n;

export const DEFAULT_TIERS: TierSettings[] = [
    { tier: 1, active: true, minStake: UNIT / 100n, maxStake: UNIT },
    { tier: 2, active: false, minStake: UNIT, maxStake: 10n * UNIT },
    { tier: 3, active: false, minStake: 10n * UNIT, maxStake: 100n * UNIT },
    // placeholders, not activatable until bounds are configured
    { tier: 4, active: false, minStake: 0n, maxStake: 0n },
    { tier: 5, active: false, minStake: 0n, maxStake: 0n },
];

export function loadSettings(): ProtocolSettings {
    const settings: ProtocolSettings = {
        authority: AUTHORITY_KEY,
        feeVault: FEE_VAULT_KEY,
        treasury: TREASURY_KEY,
        baseFeeBps: BASE_FEE_BPS,
        minFeeBps: MIN_FEE_BPS,
        rolloverFeeStepBps: ROLLOVER_FEE_STEP_BPS,
        betCutoffTicks: BET_CUTOFF_TICKS,
        bettingPaused: BETTING_PAUSED,
    };
    validateFeeBounds(settings);
    return settings;
}
