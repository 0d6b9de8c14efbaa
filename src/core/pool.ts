import { ensure } from './errors.js';
import { checkedAdd, checkedAddU32, checkedSub, checkedSubU32 } from './math.js';
import { NUMBER_SLOTS, type StakePool } from '../types.js';

// Winning this number always carries the pool forward.
export const PRIMARY_ROLLOVER_NUMBER = 0;

export function zeroValues(): bigint[] {
    return Array.from({ length: NUMBER_SLOTS }, () => 0n);
}

export function zeroCounts(): number[] {
    return Array.from({ length: NUMBER_SLOTS }, () => 0);
}

export function newPool(tier: number, epoch: number, cutoffTicks: number, feeBps: number): StakePool {
    return {
        tier,
        epoch,
        chainStartEpoch: epoch,
        totalValue: 0n,
        carriedValue: 0n,
        totalCount: 0,
        carriedCount: 0,
        valuePerNumber: zeroValues(),
        countPerNumber: zeroCounts(),
        cutoffTicks,
        epochsCarried: 0,
        blockedNumber: 0,
        feeBps,
    };
}

export type PoolCarry = {
    nextEpoch: number;
    cutoffTicks: number;
    carryValue: bigint;
    carryCount: number;
    carryValuePerNumber: bigint[];
    carryCountPerNumber: number[];
    nextBlocked: number;
    nextFeeBps: number;
};

/**
 * Moves the pool into the next epoch. Any carried value or count keeps
 * the chain alive; otherwise a fresh chain starts at `nextEpoch`.
 */
export function resetForNextEpoch(pool: StakePool, carry: PoolCarry): StakePool {
    const base = { ...pool, epoch: carry.nextEpoch, cutoffTicks: carry.cutoffTicks, feeBps: carry.nextFeeBps };

    if (carry.carryValue > 0n || carry.carryCount > 0) {
        const carried = (pool.epochsCarried + 1) & 0xff;
        return {
            ...base,
            totalValue: carry.carryValue,
            carriedValue: carry.carryValue,
            totalCount: carry.carryCount,
            carriedCount: carry.carryCount,
            valuePerNumber: [...carry.carryValuePerNumber],
            countPerNumber: [...carry.carryCountPerNumber],
            epochsCarried: carried === 0 ? 1 : carried,
        };
    }

    return {
        ...base,
        chainStartEpoch: carry.nextEpoch,
        totalValue: 0n,
        carriedValue: 0n,
        totalCount: 0,
        carriedCount: 0,
        valuePerNumber: zeroValues(),
        countPerNumber: zeroCounts(),
        epochsCarried: 0,
        blockedNumber: carry.nextBlocked,
    };
}

export function isPoolEmpty(pool: StakePool): boolean {
    return pool.totalValue === 0n && pool.carriedValue === 0n && pool.totalCount === 0 && pool.carriedCount === 0;
}

export function hasActivity(pool: StakePool): boolean {
    return pool.totalCount > 0 && pool.totalValue > 0n;
}

export function nextBlockedNumber(winningNumber: number, currentBlocked: number): number {
    return winningNumber === PRIMARY_ROLLOVER_NUMBER || winningNumber === currentBlocked ? currentBlocked : winningNumber;
}

export function isRolloverNumber(winningNumber: number, blocked: number): boolean {
    return winningNumber === PRIMARY_ROLLOVER_NUMBER || winningNumber === blocked;
}

export function addStakeToNumbers(pool: StakePool, numbers: readonly number[], perNumber: bigint, countDelta: number): StakePool {
    const valuePerNumber = [...pool.valuePerNumber];
    const countPerNumber = [...pool.countPerNumber];
    for (const n of numbers) {
        valuePerNumber[n] = checkedAdd(valuePerNumber[n], perNumber);
        countPerNumber[n] = checkedAddU32(countPerNumber[n], countDelta);
    }
    return { ...pool, valuePerNumber, countPerNumber };
}

export function retractStakeFromNumbers(pool: StakePool, numbers: readonly number[], perNumber: bigint): StakePool {
    const valuePerNumber = [...pool.valuePerNumber];
    for (const n of numbers) {
        ensure(valuePerNumber[n] >= perNumber, 'PoolCorrupted', `number ${n} holds ${valuePerNumber[n]} < ${perNumber}`);
        valuePerNumber[n] = checkedSub(valuePerNumber[n], perNumber);
    }
    return { ...pool, valuePerNumber };
}

// Shifts per-number selection counts from the old mask to the new one.
export function moveCounts(pool: StakePool, oldMask: number, newMask: number): StakePool {
    const countPerNumber = [...pool.countPerNumber];
    const removed = oldMask & ~newMask;
    const added = newMask & ~oldMask;
    for (let n = 0; n < NUMBER_SLOTS; n += 1) {
        const bit = 1 << n;
        if (removed & bit) {
            ensure(countPerNumber[n] >= 1, 'PoolCorrupted', `number ${n} has no selections`);
            countPerNumber[n] = checkedSubU32(countPerNumber[n], 1);
        }
        if (added & bit) {
            countPerNumber[n] = checkedAddU32(countPerNumber[n], 1);
        }
    }
    return { ...pool, countPerNumber };
}

export function sumValues(values: readonly bigint[]): bigint {
    return values.reduce((acc, v) => acc + v, 0n);
}
