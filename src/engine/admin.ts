import { ensure } from '../core/errors.js';
import { isValidBlockedNumber } from '../core/selection.js';
import { isPoolEmpty as poolIsEmpty, newPool, resetForNextEpoch, zeroCounts, zeroValues } from '../core/pool.js';
import { getPool, getTier, insertPool, listTiers, setTierActiveFlag, updatePool } from '../db/index.js';
import { atomically, requireAuthority, type EngineContext } from './context.js';
import type { FeeBounds, StakePool, TierSettings } from '../types.js';

function activate(ctx: EngineContext, tier: number, active: boolean): void {
    const settings = getTier(ctx.db, tier);
    ensure(settings !== undefined, 'UnknownTier', `tier ${tier}`);
    if (active) {
        ensure(settings.maxStake > 0n, 'InactiveTier', `tier ${tier} has no stake bounds`);
    }
    setTierActiveFlag(ctx.db, tier, active);
}

/** Activates a tier and opens its pool at the current epoch. */
export function openPool(ctx: EngineContext, signer: string, tier: number): StakePool {
    return atomically(ctx, () => {
        requireAuthority(ctx, signer);
        ensure(getPool(ctx.db, tier) === undefined, 'PoolAlreadyOpen', `tier ${tier}`);
        activate(ctx, tier, true);

        const { epoch } = ctx.clock.now();
        const pool = newPool(tier, epoch, ctx.settings.betCutoffTicks, ctx.settings.baseFeeBps);
        insertPool(ctx.db, pool);
        console.log(`[admin] Opened tier ${tier} pool at epoch ${epoch}`);
        return pool;
    });
}

/** Starts a fresh chain on an empty pool with the chosen blocked number. */
export function resetPool(ctx: EngineContext, signer: string, tier: number, blocked: number): StakePool {
    return atomically(ctx, () => {
        requireAuthority(ctx, signer);
        const pool = getPool(ctx.db, tier);
        ensure(pool !== undefined, 'PoolNotFound', `tier ${tier}`);
        ensure(pool.tier === tier, 'TierMismatch');

        const { epoch } = ctx.clock.now();
        ensure(epoch >= pool.epoch, 'EpochNotAdvanced', `clock ${epoch} < pool ${pool.epoch}`);
        ensure(isValidBlockedNumber(blocked), 'InvalidBlockedNumber', `blocked ${blocked}`);
        ensure(poolIsEmpty(pool), 'PoolNotEmpty', `tier ${tier}`);

        const next = resetForNextEpoch(pool, {
            nextEpoch: epoch,
            cutoffTicks: ctx.settings.betCutoffTicks,
            carryValue: 0n,
            carryCount: 0,
            carryValuePerNumber: zeroValues(),
            carryCountPerNumber: zeroCounts(),
            nextBlocked: blocked,
            nextFeeBps: ctx.settings.baseFeeBps,
        });
        updatePool(ctx.db, next);
        console.log(`[admin] Reset tier ${tier} pool at epoch ${epoch}, blocked ${blocked}`);
        return next;
    });
}

export function setTierActive(ctx: EngineContext, signer: string, tier: number, active: boolean): TierSettings {
    return atomically(ctx, () => {
        requireAuthority(ctx, signer);
        activate(ctx, tier, active);
        const settings = getTier(ctx.db, tier);
        ensure(settings !== undefined, 'UnknownTier', `tier ${tier}`);
        return settings;
    });
}

export function isPoolEmpty(ctx: EngineContext, tier: number): boolean {
    const pool = getPool(ctx.db, tier);
    ensure(pool !== undefined, 'PoolNotFound', `tier ${tier}`);
    return poolIsEmpty(pool);
}

export function readPool(ctx: EngineContext, tier: number): StakePool {
    const pool = getPool(ctx.db, tier);
    ensure(pool !== undefined, 'PoolNotFound', `tier ${tier}`);
    return pool;
}

export function tierSettings(ctx: EngineContext): TierSettings[] {
    return listTiers(ctx.db);
}

export function feeBounds(ctx: EngineContext): FeeBounds {
    const { baseFeeBps, minFeeBps, rolloverFeeStepBps } = ctx.settings;
    return { baseFeeBps, minFeeBps, rolloverFeeStepBps };
}
