import { EpochSchedule, type Clock, type ClockReading } from '../src/core/clock.js';
import { SettlementError } from '../src/core/errors.js';
import { buildMerkleTree, hashClaimLeaf, merkleProof, merkleRoot, type ClaimLeaf } from '../src/core/merkle.js';
import { openDatabase } from '../src/db/index.js';
import { openPool, resetPool } from '../src/engine/admin.js';
import type { EngineContext } from '../src/engine/context.js';
import { deposit } from '../src/engine/treasury.js';
import type { ProtocolSettings } from '../src/types.js';

export const TICKS_PER_EPOCH = 1000;
export const AUTHORITY = 'test-authority';
export const FEE_VAULT = 'test-fee-vault';
export const TREASURY = 'test-treasury';

export const ALICE = 'aa'.repeat(32);
export const BOB = 'bb'.repeat(32);
export const CAROL = 'cc'.repeat(32);
export const DAVE = 'dd'.repeat(32);

export const UNIT = 1_000_000_000n;
export const STAKE = 100_000_000n; // 0.1 unit, inside tier 1 bounds

export class ManualClock implements Clock {
    private reading: ClockReading;

    constructor(epoch: number, offset = 0) {
        this.reading = { epoch, tick: epoch * TICKS_PER_EPOCH + offset, unixTimestamp: 1_700_000_000 };
    }

    now(): ClockReading {
        return { ...this.reading };
    }

    at(epoch: number, offset = 0): void {
        this.reading = { ...this.reading, epoch, tick: epoch * TICKS_PER_EPOCH + offset };
    }

    set(reading: Partial<ClockReading>): void {
        this.reading = { ...this.reading, ...reading };
    }

    advanceEpoch(): void {
        this.at(this.reading.epoch + 1);
        this.reading.unixTimestamp += 60;
    }
}

export type TestContext = EngineContext & { clock: ManualClock; };

export function createTestContext(overrides: Partial<ProtocolSettings> = {}, epoch = 10): TestContext {
    return {
        db: openDatabase(':memory:'),
        clock: new ManualClock(epoch),
        schedule: new EpochSchedule(TICKS_PER_EPOCH),
        settings: {
            authority: AUTHORITY,
            feeVault: FEE_VAULT,
            treasury: TREASURY,
            baseFeeBps: 500,
            minFeeBps: 200,
            rolloverFeeStepBps: 100,
            betCutoffTicks: 300,
            bettingPaused: false,
            ...overrides,
        },
    };
}

/** Opens tier 1 and starts its first chain with `blocked` excluded. */
export function openTier(ctx: EngineContext, blocked = 5, tier = 1): void {
    openPool(ctx, AUTHORITY, tier);
    resetPool(ctx, AUTHORITY, tier, blocked);
}

export function fund(ctx: EngineContext, account: string, amount: bigint = 10n * UNIT): void {
    deposit(ctx, AUTHORITY, account, amount);
}

export function errorOf(fn: () => unknown): SettlementError {
    try {
        fn();
    } catch (err) {
        if (err instanceof SettlementError) return err;
        throw err;
    }
    throw new Error('expected a SettlementError');
}

export type WinnerTree = {
    root: Buffer;
    proofs: Buffer[][];
};

export function winnerTree(leaves: ClaimLeaf[]): WinnerTree {
    const levels = buildMerkleTree(leaves.map(hashClaimLeaf));
    return {
        root: merkleRoot(levels),
        proofs: leaves.map((_, i) => merkleProof(levels, i)),
    };
}

export const SEED = Buffer.alloc(32, 7);

export function pointer(text = 'ar://results'): Buffer {
    const buf = Buffer.alloc(128);
    buf.write(text, 'utf8');
    return buf;
}
