import { isBettingStillOpen, type ClockReading } from '../core/clock.js';
import { ensure } from '../core/errors.js';
import { checkedAdd, checkedAddU32, saturatingIncU8 } from '../core/math.js';
import { addStakeToNumbers, moveCounts, retractStakeFromNumbers } from '../core/pool.js';
import { assertInvariant, assertMaskMatches, expectedTotal } from '../core/prediction.js';
import { deriveSelection } from '../core/selection.js';
import { getPool, getPrediction, getTier, insertPrediction, listPredictions, updatePool, updatePrediction } from '../db/index.js';
import { atomically, type EngineContext } from './context.js';
import { recordInflow, transfer } from './treasury.js';
import type { PredictionRecord, StakePool, TierSettings } from '../types.js';

export type PlaceStakeInput = {
    player: string;
    tier: number;
    epoch: number;
    predictionType: number;
    choice: number;
    perNumber: bigint;
};

export type IncreaseStakeInput = {
    player: string;
    tier: number;
    additional: bigint; // added to every selected number
    choice: number; // nonzero confirmation of the existing selection
};

export type ChangeSelectionInput = {
    player: string;
    tier: number;
    predictionType: number;
    choice: number;
};

function loadPool(ctx: EngineContext, tier: number): StakePool {
    const pool = getPool(ctx.db, tier);
    ensure(pool !== undefined, 'PoolNotFound', `tier ${tier}`);
    ensure(pool.tier === tier, 'TierMismatch');
    return pool;
}

function loadActiveTier(ctx: EngineContext, tier: number): TierSettings {
    const settings = getTier(ctx.db, tier);
    ensure(settings !== undefined, 'UnknownTier', `tier ${tier}`);
    ensure(settings.active, 'InactiveTier', `tier ${tier}`);
    return settings;
}

function ensureInTierRange(settings: TierSettings, perNumber: bigint): void {
    ensure(perNumber >= settings.minStake && perNumber <= settings.maxStake, 'StakeOutOfTierRange',
        `${perNumber} outside [${settings.minStake}, ${settings.maxStake}]`);
}

function loadOpenRecord(ctx: EngineContext, player: string, pool: StakePool): PredictionRecord {
    const record = getPrediction(ctx.db, player, pool.chainStartEpoch, pool.tier);
    ensure(record !== undefined, 'PredictionNotFound', `${player} in chain ${pool.chainStartEpoch}`);
    return record;
}

function ensureRecordInChain(record: PredictionRecord, pool: StakePool): void {
    ensure(record.chainEpoch === pool.chainStartEpoch, 'EpochMismatch', 'record belongs to another chain');
    ensure(record.epoch >= pool.chainStartEpoch && record.epoch <= pool.epoch, 'EpochMismatch', 'record epoch outside chain');
    ensure(record.tier === pool.tier, 'TierMismatch');
}

function ensureBettingOpen(ctx: EngineContext, pool: StakePool, now: ClockReading): void {
    ensure(
        isBettingStillOpen(now, ctx.schedule, pool.cutoffTicks),
        'BettingClosed',
        `cutoff ${pool.cutoffTicks} ticks`,
    );
}

export function placeStake(ctx: EngineContext, input: PlaceStakeInput): PredictionRecord {
    return atomically(ctx, () => {
        const { player, tier, epoch, perNumber } = input;
        ensure(!ctx.settings.bettingPaused, 'BettingPaused');
        ensure(perNumber > 0n, 'InvalidAmount', 'stake must be positive');

        const now = ctx.clock.now();
        const pool = loadPool(ctx, tier);
        ensure(now.epoch === epoch && pool.epoch === epoch, 'EpochMismatch', `requested ${epoch}, clock ${now.epoch}, pool ${pool.epoch}`);
        ensureBettingOpen(ctx, pool, now);

        const selection = deriveSelection(input.predictionType, input.choice, pool.blockedNumber);
        const settings = loadActiveTier(ctx, tier);
        ensureInTierRange(settings, perNumber);
        const total = expectedTotal(perNumber, selection.count);

        ensure(getPrediction(ctx.db, player, pool.chainStartEpoch, tier) === undefined, 'AlreadyPredicted',
            `${player} already staked in chain ${pool.chainStartEpoch}`);

        const record: PredictionRecord = {
            player,
            chainEpoch: pool.chainStartEpoch,
            tier,
            epoch: pool.epoch,
            placedTick: now.tick,
            predictionType: input.predictionType,
            selectionCount: selection.count,
            selections: selection.numbers,
            selectionsMask: selection.mask,
            valuePerNumber: perNumber,
            totalValue: total,
            changedCount: 0,
            placedAt: now.unixTimestamp,
            updatedAt: now.unixTimestamp,
            claimed: false,
            claimedAt: 0,
        };
        assertInvariant(record);

        const next = addStakeToNumbers(pool, selection.numbers, perNumber, 1);
        updatePool(ctx.db, {
            ...next,
            totalCount: checkedAddU32(pool.totalCount, 1),
            totalValue: checkedAdd(pool.totalValue, total),
        });
        insertPrediction(ctx.db, record);

        recordInflow(ctx.db, total);
        transfer(ctx.db, player, ctx.settings.treasury, total);

        console.log(`[staking] ${player} placed ${total} on [${selection.numbers.join(',')}] tier ${tier} epoch ${epoch}`);
        return record;
    });
}

export function increaseStake(ctx: EngineContext, input: IncreaseStakeInput): PredictionRecord {
    return atomically(ctx, () => {
        const { player, tier, additional } = input;
        const pool = loadPool(ctx, tier);
        const record = loadOpenRecord(ctx, player, pool);
        assertInvariant(record);

        ensure(!ctx.settings.bettingPaused, 'BettingPaused');
        ensure(!record.claimed, 'AlreadyClaimed');
        ensure(additional > 0n, 'InvalidAmount', 'increase must be positive');
        ensure(input.choice > 0, 'InvalidBetNumber', 'choice must be nonzero');

        const now = ctx.clock.now();
        ensure(now.epoch === pool.epoch, 'EpochMismatch', `clock ${now.epoch}, pool ${pool.epoch}`);
        ensureRecordInChain(record, pool);
        ensureBettingOpen(ctx, pool, now);

        const settings = loadActiveTier(ctx, tier);
        assertMaskMatches(record);

        const perNumber = checkedAdd(record.valuePerNumber, additional);
        ensureInTierRange(settings, perNumber);
        const additionalTotal = expectedTotal(additional, record.selectionCount);

        const updated: PredictionRecord = {
            ...record,
            valuePerNumber: perNumber,
            totalValue: checkedAdd(record.totalValue, additionalTotal),
            changedCount: saturatingIncU8(record.changedCount),
            updatedAt: now.unixTimestamp,
        };
        assertInvariant(updated);

        const next = addStakeToNumbers(pool, record.selections, additional, 0);
        updatePool(ctx.db, { ...next, totalValue: checkedAdd(pool.totalValue, additionalTotal) });
        updatePrediction(ctx.db, updated);

        recordInflow(ctx.db, additionalTotal);
        transfer(ctx.db, player, ctx.settings.treasury, additionalTotal);

        console.log(`[staking] ${player} increased tier ${tier} stake by ${additionalTotal}`);
        return updated;
    });
}

export function changeSelection(ctx: EngineContext, input: ChangeSelectionInput): PredictionRecord {
    return atomically(ctx, () => {
        const { player, tier } = input;
        const pool = loadPool(ctx, tier);
        const record = loadOpenRecord(ctx, player, pool);
        assertInvariant(record);

        const now = ctx.clock.now();
        ensure(now.epoch === pool.epoch, 'EpochMismatch', `clock ${now.epoch}, pool ${pool.epoch}`);
        ensure(!record.claimed, 'AlreadyClaimed');
        ensureRecordInChain(record, pool);
        ensureBettingOpen(ctx, pool, now);

        loadActiveTier(ctx, tier);
        const selection = deriveSelection(input.predictionType, input.choice, pool.blockedNumber);
        ensure(selection.mask !== record.selectionsMask, 'NoOpChange', 'selection unchanged');
        ensure(selection.count === record.selectionCount, 'InvalidChoiceCount',
            `new selection has ${selection.count} numbers, record has ${record.selectionCount}`);

        const retracted = retractStakeFromNumbers(pool, record.selections, record.valuePerNumber);
        const moved = moveCounts(retracted, record.selectionsMask, selection.mask);
        const next = addStakeToNumbers(moved, selection.numbers, record.valuePerNumber, 0);

        const updated: PredictionRecord = {
            ...record,
            predictionType: input.predictionType,
            selectionCount: selection.count,
            selections: selection.numbers,
            selectionsMask: selection.mask,
            changedCount: saturatingIncU8(record.changedCount),
            updatedAt: now.unixTimestamp,
        };
        assertInvariant(updated);

        updatePool(ctx.db, next);
        updatePrediction(ctx.db, updated);

        console.log(`[staking] ${player} changed tier ${tier} selection to [${selection.numbers.join(',')}]`);
        return updated;
    });
}

export function readPrediction(ctx: EngineContext, player: string, chainEpoch: number, tier: number): PredictionRecord {
    const record = getPrediction(ctx.db, player, chainEpoch, tier);
    ensure(record !== undefined, 'PredictionNotFound', `${player} in chain ${chainEpoch}`);
    return record;
}

// Every record of a chain, in placement order. Resolvers build payout trees from this.
export function readChainPredictions(ctx: EngineContext, chainEpoch: number, tier: number): PredictionRecord[] {
    return listPredictions(ctx.db, chainEpoch, tier);
}
