import { allocateBitmap, bitmapLength, MAX_BITMAP_LEN } from '../core/bitmap.js';
import { ensure } from '../core/errors.js';
import { expectedPotBreakdown, nextFeeOnNoWinners, nextFeeOnRollover } from '../core/fees.js';
import { HASH_LEN, isZero, RESULTS_POINTER_LEN } from '../core/hash.js';
import { checkedAdd, isU32, saturatingIncU8 } from '../core/math.js';
import { hasActivity, isRolloverNumber, nextBlockedNumber, resetForNextEpoch, zeroCounts, zeroValues } from '../core/pool.js';
import { getBalance, getLedger, getPool, getTier, insertLedger, updateLedger, updatePool } from '../db/index.js';
import { atomically, requireAuthority, type EngineContext } from './context.js';
import { recordFeeWithdrawal, transfer } from './treasury.js';
import type { SettlementLedger, StakePool } from '../types.js';

export type LedgerDraw = {
    epoch: number;
    tier: number;
    winningNumber: number;
    rngTick: number;
    rngSeed: Buffer;
};

export type FinalizeProposal = {
    epoch: number;
    tier: number;
    protocolFee: bigint;
    netPrizePool: bigint;
    totalWinners: number;
    merkleRoot: Buffer;
    resultsPointer: Buffer;
};

/**
 * Loads the pool for a closed epoch: it must sit on `epoch`, the clock
 * must have moved past it and the tier must still be active.
 */
function loadElapsedPool(ctx: EngineContext, epoch: number, tier: number): StakePool {
    const pool = getPool(ctx.db, tier);
    ensure(pool !== undefined, 'PoolNotFound', `tier ${tier}`);
    const { epoch: current } = ctx.clock.now();
    ensure(pool.epoch === epoch, 'EpochMismatch', `pool ${pool.epoch}, requested ${epoch}`);
    ensure(pool.epoch < current, 'EpochNotComplete', `epoch ${epoch} still open at ${current}`);
    ensure(pool.tier === tier, 'TierMismatch');

    const settings = getTier(ctx.db, tier);
    ensure(settings !== undefined, 'UnknownTier', `tier ${tier}`);
    ensure(settings.active, 'InactiveTier', `tier ${tier}`);
    return pool;
}

function ensureDraw(draw: LedgerDraw): void {
    ensure(Number.isInteger(draw.winningNumber) && draw.winningNumber >= 0 && draw.winningNumber <= 9,
        'InvalidWinningNumber', `${draw.winningNumber}`);
    ensure(draw.rngSeed.length === HASH_LEN, 'InvalidInput', 'rng seed must be 32 bytes');
}

function blankLedger(ctx: EngineContext, pool: StakePool, draw: LedgerDraw): SettlementLedger {
    const now = ctx.clock.now();
    return {
        epoch: draw.epoch,
        tier: draw.tier,
        chainStartEpoch: pool.chainStartEpoch,
        status: 'processing',
        winningNumber: draw.winningNumber,
        rngTick: draw.rngTick,
        rngSeed: Buffer.from(draw.rngSeed),
        attemptCount: 1,
        lastUpdatedTick: now.tick,
        lastUpdatedAt: now.unixTimestamp,
        totalCount: 0,
        carriedCount: 0,
        carryIn: pool.carriedValue,
        carryOut: 0n,
        protocolFee: 0n,
        feeBps: 0,
        netPrizePool: 0n,
        totalWinners: 0,
        claimedWinners: 0,
        claimedValue: 0n,
        resolvedAt: 0,
        merkleRoot: Buffer.alloc(HASH_LEN),
        resultsPointer: Buffer.alloc(RESULTS_POINTER_LEN),
        claimedBitmap: Buffer.alloc(0),
        rolloverReason: 'none',
        blockedNumber: pool.blockedNumber,
    };
}

// Pool state handed to the next epoch when the whole pool carries.
function fullCarry(pool: StakePool) {
    return {
        carryValue: pool.totalValue,
        carryCount: pool.totalCount,
        carryValuePerNumber: pool.valuePerNumber,
        carryCountPerNumber: pool.countPerNumber,
    };
}

export function initLedger(ctx: EngineContext, signer: string, draw: LedgerDraw): SettlementLedger {
    return atomically(ctx, () => {
        requireAuthority(ctx, signer);
        const pool = loadElapsedPool(ctx, draw.epoch, draw.tier);
        ensureDraw(draw);
        ensure(hasActivity(pool), 'NoBetsToResolve', `tier ${draw.tier} epoch ${draw.epoch}`);
        ensure(getLedger(ctx.db, draw.epoch, draw.tier) === undefined, 'LedgerAlreadyExists',
            `epoch ${draw.epoch} tier ${draw.tier}`);

        const ledger = blankLedger(ctx, pool, draw);
        insertLedger(ctx.db, ledger);
        console.log(`[settlement] Ledger opened: epoch ${draw.epoch} tier ${draw.tier} winning ${draw.winningNumber}`);
        return ledger;
    });
}

export function reprocessLedger(ctx: EngineContext, signer: string, epoch: number, tier: number): SettlementLedger {
    return atomically(ctx, () => {
        requireAuthority(ctx, signer);
        loadElapsedPool(ctx, epoch, tier);
        const ledger = getLedger(ctx.db, epoch, tier);
        ensure(ledger !== undefined, 'LedgerNotFound', `epoch ${epoch} tier ${tier}`);
        ensure(ledger.status !== 'resolved', 'LedgerAlreadyResolved', `epoch ${epoch} tier ${tier}`);

        const now = ctx.clock.now();
        const updated: SettlementLedger = {
            ...ledger,
            attemptCount: saturatingIncU8(ledger.attemptCount),
            status: 'processing',
            lastUpdatedTick: now.tick,
            lastUpdatedAt: now.unixTimestamp,
        };
        updateLedger(ctx.db, updated);
        console.log(`[settlement] Ledger reprocessing: epoch ${epoch} tier ${tier} attempt ${updated.attemptCount}`);
        return updated;
    });
}

export function finalizeLedger(ctx: EngineContext, signer: string, proposal: FinalizeProposal): SettlementLedger {
    return atomically(ctx, () => {
        requireAuthority(ctx, signer);
        const { epoch, tier, totalWinners } = proposal;
        ensure(isU32(totalWinners), 'InvalidInput', `total winners ${totalWinners}`);
        ensure(proposal.merkleRoot.length === HASH_LEN, 'InvalidInput', 'merkle root must be 32 bytes');
        ensure(proposal.resultsPointer.length === RESULTS_POINTER_LEN, 'InvalidInput', 'results pointer must be 128 bytes');

        const ledger = getLedger(ctx.db, epoch, tier);
        ensure(ledger !== undefined, 'LedgerNotFound', `epoch ${epoch} tier ${tier}`);
        ensure(ledger.status === 'processing', 'LedgerNotProcessing', `status ${ledger.status}`);

        const pool = loadElapsedPool(ctx, epoch, tier);
        ensure(hasActivity(pool), 'NoBetsToResolve', `tier ${tier} epoch ${epoch}`);
        ensure(!isZero(proposal.resultsPointer), 'EmptyResultsPointer');

        const gross = pool.totalValue;
        const expected = expectedPotBreakdown(gross, pool.feeBps, totalWinners);
        ensure(expected.fee === proposal.protocolFee, 'InvalidFee', `expected ${expected.fee}, got ${proposal.protocolFee}`);
        ensure(expected.net === proposal.netPrizePool, 'InvalidPotBreakdown', `expected ${expected.net}, got ${proposal.netPrizePool}`);
        ensure(checkedAdd(expected.fee, expected.net) <= gross, 'InvalidPotBreakdown', 'fee + net exceeds gross');
        ensure(bitmapLength(totalWinners) <= MAX_BITMAP_LEN, 'TooManyWinners', `${totalWinners} winners`);

        const noWinners = totalWinners === 0;
        const custody = getBalance(ctx.db, ctx.settings.treasury);
        ensure(custody >= expected.fee && custody - expected.fee >= expected.net, 'InsufficientTreasuryBalance',
            `custody ${custody} cannot cover fee ${expected.fee} and net ${expected.net}`);

        if (expected.fee > 0n) {
            transfer(ctx.db, ctx.settings.treasury, ctx.settings.feeVault, expected.fee);
            recordFeeWithdrawal(ctx.db, expected.fee);
        }

        const now = ctx.clock.now();
        const resolved: SettlementLedger = {
            ...ledger,
            status: 'resolved',
            chainStartEpoch: pool.chainStartEpoch,
            totalCount: pool.totalCount,
            carriedCount: noWinners ? pool.totalCount : 0,
            carryIn: pool.carriedValue,
            carryOut: noWinners ? expected.net : 0n,
            protocolFee: expected.fee,
            feeBps: pool.feeBps,
            netPrizePool: expected.net,
            totalWinners,
            claimedWinners: 0,
            claimedValue: 0n,
            claimedBitmap: allocateBitmap(totalWinners),
            merkleRoot: Buffer.from(proposal.merkleRoot),
            resultsPointer: Buffer.from(proposal.resultsPointer),
            resolvedAt: now.unixTimestamp,
            lastUpdatedTick: now.tick,
            lastUpdatedAt: now.unixTimestamp,
            rolloverReason: noWinners ? 'no_winners' : 'none',
        };
        updateLedger(ctx.db, resolved);

        const carry = noWinners
            ? fullCarry(pool)
            : { carryValue: 0n, carryCount: 0, carryValuePerNumber: zeroValues(), carryCountPerNumber: zeroCounts() };
        updatePool(ctx.db, resetForNextEpoch(pool, {
            ...carry,
            nextEpoch: pool.epoch + 1,
            cutoffTicks: ctx.settings.betCutoffTicks,
            nextBlocked: nextBlockedNumber(ledger.winningNumber, pool.blockedNumber),
            nextFeeBps: noWinners ? nextFeeOnNoWinners(pool.feeBps, ctx.settings.minFeeBps) : ctx.settings.baseFeeBps,
        }));

        console.log(
            `[settlement] Ledger resolved: epoch ${epoch} tier ${tier} winners ${totalWinners} fee ${expected.fee} net ${expected.net}`,
        );
        return resolved;
    });
}

/**
 * Resolves an epoch in one step when nobody can win: the winning number
 * is a rollover number, or no selection covers it. The whole pool carries.
 */
export function rolloverLedger(ctx: EngineContext, signer: string, draw: LedgerDraw): SettlementLedger {
    return atomically(ctx, () => {
        requireAuthority(ctx, signer);
        ensureDraw(draw);
        const pool = loadElapsedPool(ctx, draw.epoch, draw.tier);

        const rolloverNumber = isRolloverNumber(draw.winningNumber, pool.blockedNumber);
        ensure(rolloverNumber || pool.countPerNumber[draw.winningNumber] === 0, 'CarryNotAllowed',
            `number ${draw.winningNumber} has selections`);
        ensure(hasActivity(pool), 'NoBetsToResolve', `tier ${draw.tier} epoch ${draw.epoch}`);
        ensure(getLedger(ctx.db, draw.epoch, draw.tier) === undefined, 'LedgerAlreadyExists',
            `epoch ${draw.epoch} tier ${draw.tier}`);

        const gross = pool.totalValue;
        const expected = expectedPotBreakdown(gross, pool.feeBps, 0);
        const custody = getBalance(ctx.db, ctx.settings.treasury);
        ensure(custody >= expected.net, 'InsufficientTreasuryBalance', `custody ${custody} < ${expected.net}`);

        const now = ctx.clock.now();
        const ledger: SettlementLedger = {
            ...blankLedger(ctx, pool, draw),
            status: 'resolved',
            totalCount: pool.totalCount,
            carriedCount: pool.totalCount,
            carryOut: gross,
            protocolFee: expected.fee,
            feeBps: pool.feeBps,
            netPrizePool: expected.net,
            resolvedAt: now.unixTimestamp,
            rolloverReason: rolloverNumber ? 'rollover_number' : 'no_winners',
        };
        insertLedger(ctx.db, ledger);

        const { minFeeBps, rolloverFeeStepBps } = ctx.settings;
        updatePool(ctx.db, resetForNextEpoch(pool, {
            ...fullCarry(pool),
            nextEpoch: pool.epoch + 1,
            cutoffTicks: ctx.settings.betCutoffTicks,
            nextBlocked: nextBlockedNumber(draw.winningNumber, pool.blockedNumber),
            nextFeeBps: rolloverNumber
                ? nextFeeOnRollover(pool.feeBps, minFeeBps, rolloverFeeStepBps)
                : nextFeeOnNoWinners(pool.feeBps, minFeeBps),
        }));

        console.log(`[settlement] Rollover: epoch ${draw.epoch} tier ${draw.tier} reason ${ledger.rolloverReason} carry ${gross}`);
        return ledger;
    });
}

export function readLedger(ctx: EngineContext, epoch: number, tier: number): SettlementLedger {
    const ledger = getLedger(ctx.db, epoch, tier);
    ensure(ledger !== undefined, 'LedgerNotFound', `epoch ${epoch} tier ${tier}`);
    return ledger;
}
