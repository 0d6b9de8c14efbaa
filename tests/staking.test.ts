import { beforeEach, describe, expect, test } from 'vitest';
import { sumValues } from '../src/core/pool.js';
import { readPool, setTierActive } from '../src/engine/admin.js';
import { changeSelection, increaseStake, placeStake } from '../src/engine/staking.js';
import { balanceOf, treasuryView } from '../src/engine/treasury.js';
import { PredictionType } from '../src/types.js';
import {
    ALICE,
    AUTHORITY,
    BOB,
    CAROL,
    createTestContext,
    errorOf,
    fund,
    openTier,
    STAKE,
    TREASURY,
    UNIT,
    type TestContext,
} from './helpers.js';

let ctx: TestContext;

const single = (player: string, number: number, perNumber = STAKE) =>
    placeStake(ctx, { player, tier: 1, epoch: 10, predictionType: PredictionType.SingleNumber, choice: number, perNumber });

beforeEach(() => {
    ctx = createTestContext();
    openTier(ctx, 5);
    fund(ctx, ALICE);
    fund(ctx, BOB);
});

describe('placeStake', () => {
    test('records the stake and moves value into custody', () => {
        const record = single(ALICE, 7);
        expect(record.chainEpoch).toBe(10);
        expect(record.selections).toEqual([7]);
        expect(record.totalValue).toBe(STAKE);

        const pool = readPool(ctx, 1);
        expect(pool.totalCount).toBe(1);
        expect(pool.totalValue).toBe(STAKE);
        expect(pool.valuePerNumber[7]).toBe(STAKE);
        expect(pool.countPerNumber[7]).toBe(1);

        expect(balanceOf(ctx, ALICE)).toBe(10n * UNIT - STAKE);
        expect(balanceOf(ctx, TREASURY)).toBe(STAKE);
        expect(treasuryView(ctx).totalIn).toBe(STAKE);
    });

    test('multi-number stakes charge per selected number', () => {
        const record = placeStake(ctx, {
            player: BOB, tier: 1, epoch: 10, predictionType: PredictionType.TwoNumbers, choice: 73, perNumber: 50_000_000n,
        });
        expect(record.totalValue).toBe(100_000_000n);
        single(ALICE, 7);

        const pool = readPool(ctx, 1);
        expect(pool.totalCount).toBe(2);
        expect(pool.totalValue).toBe(200_000_000n);
        expect(pool.valuePerNumber[3]).toBe(50_000_000n);
        expect(pool.valuePerNumber[7]).toBe(150_000_000n);
        expect(pool.countPerNumber[7]).toBe(2);
        expect(sumValues(pool.valuePerNumber)).toBe(pool.totalValue);
    });

    test('rejects when paused', () => {
        ctx.settings.bettingPaused = true;
        expect(errorOf(() => single(ALICE, 7)).code).toBe('BettingPaused');
    });

    test('rejects a zero stake', () => {
        expect(errorOf(() => single(ALICE, 7, 0n)).code).toBe('InvalidAmount');
    });

    test('rejects a stake for another epoch', () => {
        const err = errorOf(() => placeStake(ctx, {
            player: ALICE, tier: 1, epoch: 11, predictionType: PredictionType.SingleNumber, choice: 7, perNumber: STAKE,
        }));
        expect(err.code).toBe('EpochMismatch');
    });

    test('closes inside the cutoff window', () => {
        ctx.clock.at(10, 700); // 299 ticks left
        expect(errorOf(() => single(ALICE, 7)).code).toBe('BettingClosed');
        ctx.clock.at(10, 698); // 301 ticks left
        expect(single(ALICE, 7).totalValue).toBe(STAKE);
    });

    test('skips the cutoff when clock and schedule disagree', () => {
        ctx.clock.set({ epoch: 10, tick: 11_990 });
        expect(single(ALICE, 7).placedTick).toBe(11_990);
    });

    test('rejects the blocked number', () => {
        expect(errorOf(() => single(ALICE, 5)).code).toBe('InvalidBetNumber');
    });

    test('enforces tier bounds per number', () => {
        expect(errorOf(() => single(ALICE, 7, 1_000_000n)).code).toBe('StakeOutOfTierRange');
        expect(errorOf(() => single(ALICE, 7, UNIT + 1n)).code).toBe('StakeOutOfTierRange');
    });

    test('rejects a second record in the same chain', () => {
        single(ALICE, 7);
        expect(errorOf(() => single(ALICE, 3)).code).toBe('AlreadyPredicted');
    });

    test('rejects inactive tiers', () => {
        setTierActive(ctx, AUTHORITY, 1, false);
        expect(errorOf(() => single(ALICE, 7)).code).toBe('InactiveTier');
    });

    test('rolls everything back when the player cannot pay', () => {
        const err = errorOf(() => single(CAROL, 7));
        expect(err.code).toBe('InsufficientBalance');
        expect(err.kind).toBe('solvency');

        const pool = readPool(ctx, 1);
        expect(pool.totalCount).toBe(0);
        expect(pool.totalValue).toBe(0n);
        expect(treasuryView(ctx).totalIn).toBe(0n);
    });
});

describe('increaseStake', () => {
    test('adds to every selected number', () => {
        single(ALICE, 7);
        const record = increaseStake(ctx, { player: ALICE, tier: 1, additional: 50_000_000n, choice: 7 });
        expect(record.valuePerNumber).toBe(150_000_000n);
        expect(record.totalValue).toBe(150_000_000n);
        expect(record.changedCount).toBe(1);

        const pool = readPool(ctx, 1);
        expect(pool.valuePerNumber[7]).toBe(150_000_000n);
        expect(pool.totalValue).toBe(150_000_000n);
        expect(pool.countPerNumber[7]).toBe(1);
        expect(pool.totalCount).toBe(1);
        expect(treasuryView(ctx).totalIn).toBe(150_000_000n);
    });

    test('charges the increase once per selected number', () => {
        placeStake(ctx, {
            player: BOB, tier: 1, epoch: 10, predictionType: PredictionType.HighLow, choice: 1, perNumber: 20_000_000n,
        });
        const record = increaseStake(ctx, { player: BOB, tier: 1, additional: 10_000_000n, choice: 1 });
        expect(record.totalValue).toBe(120_000_000n);
        expect(readPool(ctx, 1).valuePerNumber[9]).toBe(30_000_000n);
        expect(balanceOf(ctx, BOB)).toBe(10n * UNIT - 120_000_000n);
    });

    test('checks the new per-number total against the tier', () => {
        single(ALICE, 7, UNIT);
        expect(errorOf(() => increaseStake(ctx, { player: ALICE, tier: 1, additional: 1n, choice: 1 })).code).toBe('StakeOutOfTierRange');
    });

    test('requires an existing record', () => {
        expect(errorOf(() => increaseStake(ctx, { player: BOB, tier: 1, additional: 1n, choice: 1 })).code).toBe('PredictionNotFound');
    });

    test('rejects when paused or zero', () => {
        single(ALICE, 7);
        expect(errorOf(() => increaseStake(ctx, { player: ALICE, tier: 1, additional: 0n, choice: 1 })).code).toBe('InvalidAmount');
        ctx.settings.bettingPaused = true;
        expect(errorOf(() => increaseStake(ctx, { player: ALICE, tier: 1, additional: 1n, choice: 1 })).code).toBe('BettingPaused');
    });

    test('rejects a zero choice', () => {
        single(ALICE, 7);
        const err = errorOf(() => increaseStake(ctx, { player: ALICE, tier: 1, additional: 1n, choice: 0 }));
        expect(err.code).toBe('InvalidBetNumber');
        expect(err.kind).toBe('selection-invalid');
    });
});

describe('changeSelection', () => {
    beforeEach(() => {
        placeStake(ctx, {
            player: BOB, tier: 1, epoch: 10, predictionType: PredictionType.TwoNumbers, choice: 73, perNumber: 50_000_000n,
        });
    });

    test('moves the stake to the new numbers', () => {
        const record = changeSelection(ctx, { player: BOB, tier: 1, predictionType: PredictionType.TwoNumbers, choice: 84 });
        expect(record.selections).toEqual([4, 8]);
        expect(record.selectionsMask).toBe(272);
        expect(record.totalValue).toBe(100_000_000n);
        expect(record.changedCount).toBe(1);

        const pool = readPool(ctx, 1);
        expect(pool.valuePerNumber[3]).toBe(0n);
        expect(pool.valuePerNumber[7]).toBe(0n);
        expect(pool.valuePerNumber[4]).toBe(50_000_000n);
        expect(pool.valuePerNumber[8]).toBe(50_000_000n);
        expect(pool.countPerNumber[3]).toBe(0);
        expect(pool.countPerNumber[8]).toBe(1);
        expect(pool.totalValue).toBe(100_000_000n);
        expect(sumValues(pool.valuePerNumber)).toBe(pool.totalValue);
    });

    test('keeps counts on numbers present in both selections', () => {
        changeSelection(ctx, { player: BOB, tier: 1, predictionType: PredictionType.TwoNumbers, choice: 79 });
        const pool = readPool(ctx, 1);
        expect(pool.countPerNumber[7]).toBe(1);
        expect(pool.countPerNumber[9]).toBe(1);
        expect(pool.valuePerNumber[7]).toBe(50_000_000n);
    });

    test('rejects a no-op change', () => {
        const err = errorOf(() => changeSelection(ctx, { player: BOB, tier: 1, predictionType: PredictionType.TwoNumbers, choice: 37 }));
        expect(err.code).toBe('NoOpChange');
    });

    test('rejects a different number count', () => {
        const err = errorOf(() => changeSelection(ctx, { player: BOB, tier: 1, predictionType: PredictionType.SingleNumber, choice: 4 }));
        expect(err.code).toBe('InvalidChoiceCount');
    });

    test('is refused on a deactivated tier', () => {
        setTierActive(ctx, AUTHORITY, 1, false);
        const err = errorOf(() => changeSelection(ctx, { player: BOB, tier: 1, predictionType: PredictionType.TwoNumbers, choice: 84 }));
        expect(err.code).toBe('InactiveTier');
        expect(readPool(ctx, 1).valuePerNumber[7]).toBe(50_000_000n);
    });

    test('is allowed while staking is paused', () => {
        ctx.settings.bettingPaused = true;
        expect(changeSelection(ctx, { player: BOB, tier: 1, predictionType: PredictionType.TwoNumbers, choice: 12 }).selections)
            .toEqual([1, 2]);
    });
});
