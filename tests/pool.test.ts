import { describe, expect, test } from 'vitest';
import {
    addStakeToNumbers,
    isPoolEmpty,
    moveCounts,
    newPool,
    nextBlockedNumber,
    resetForNextEpoch,
    retractStakeFromNumbers,
    sumValues,
    zeroCounts,
    zeroValues,
} from '../src/core/pool.js';
import { errorOf } from './helpers.js';

const staked = () => {
    const pool = addStakeToNumbers({ ...newPool(1, 10, 300, 500), blockedNumber: 5 }, [3, 7], 40n, 1);
    return { ...pool, totalValue: 80n, totalCount: 1 };
};

describe('newPool', () => {
    test('starts an empty chain at the epoch', () => {
        const pool = newPool(2, 42, 300, 500);
        expect(pool.epoch).toBe(42);
        expect(pool.chainStartEpoch).toBe(42);
        expect(pool.blockedNumber).toBe(0);
        expect(pool.feeBps).toBe(500);
        expect(pool.valuePerNumber).toEqual(zeroValues());
        expect(isPoolEmpty(pool)).toBe(true);
    });
});

describe('resetForNextEpoch', () => {
    test('carry keeps the chain going', () => {
        const pool = staked();
        const next = resetForNextEpoch(pool, {
            nextEpoch: 11,
            cutoffTicks: 250,
            carryValue: pool.totalValue,
            carryCount: pool.totalCount,
            carryValuePerNumber: pool.valuePerNumber,
            carryCountPerNumber: pool.countPerNumber,
            nextBlocked: 7,
            nextFeeBps: 400,
        });
        expect(next.epoch).toBe(11);
        expect(next.chainStartEpoch).toBe(10);
        expect(next.totalValue).toBe(80n);
        expect(next.carriedValue).toBe(80n);
        expect(next.carriedCount).toBe(1);
        expect(next.valuePerNumber[7]).toBe(40n);
        expect(next.epochsCarried).toBe(1);
        expect(next.blockedNumber).toBe(5);
        expect(next.feeBps).toBe(400);
        expect(next.cutoffTicks).toBe(250);
    });

    test('carry counter wraps to one', () => {
        const pool = { ...staked(), epochsCarried: 255 };
        const next = resetForNextEpoch(pool, {
            nextEpoch: 11,
            cutoffTicks: 300,
            carryValue: 1n,
            carryCount: 0,
            carryValuePerNumber: zeroValues(),
            carryCountPerNumber: zeroCounts(),
            nextBlocked: 0,
            nextFeeBps: 500,
        });
        expect(next.epochsCarried).toBe(1);
    });

    test('nothing carried starts a new chain', () => {
        const next = resetForNextEpoch({ ...staked(), epochsCarried: 3 }, {
            nextEpoch: 11,
            cutoffTicks: 300,
            carryValue: 0n,
            carryCount: 0,
            carryValuePerNumber: zeroValues(),
            carryCountPerNumber: zeroCounts(),
            nextBlocked: 7,
            nextFeeBps: 500,
        });
        expect(next.chainStartEpoch).toBe(11);
        expect(next.totalValue).toBe(0n);
        expect(next.epochsCarried).toBe(0);
        expect(next.blockedNumber).toBe(7);
        expect(next.countPerNumber).toEqual(zeroCounts());
    });
});

describe('per-number accounting', () => {
    test('apply keeps the value sum equal to the total', () => {
        const pool = staked();
        expect(sumValues(pool.valuePerNumber)).toBe(pool.totalValue);
        expect(pool.countPerNumber[3]).toBe(1);
    });

    test('retract refuses to go negative', () => {
        const err = errorOf(() => retractStakeFromNumbers(staked(), [3], 41n));
        expect(err.code).toBe('PoolCorrupted');
    });

    test('moveCounts shifts only the changed numbers', () => {
        const moved = moveCounts(staked(), (1 << 3) | (1 << 7), (1 << 7) | (1 << 8));
        expect(moved.countPerNumber[3]).toBe(0);
        expect(moved.countPerNumber[7]).toBe(1);
        expect(moved.countPerNumber[8]).toBe(1);
    });

    test('moveCounts refuses to remove a missing selection', () => {
        expect(errorOf(() => moveCounts(staked(), 1 << 4, 1 << 6)).code).toBe('PoolCorrupted');
    });
});

describe('nextBlockedNumber', () => {
    test('keeps the blocked number on rollover numbers', () => {
        expect(nextBlockedNumber(0, 4)).toBe(4);
        expect(nextBlockedNumber(4, 4)).toBe(4);
        expect(nextBlockedNumber(7, 4)).toBe(7);
    });
});
