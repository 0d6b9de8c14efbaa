import { ensure } from './errors.js';
import { checkedMul } from './math.js';
import { maskOf, MAX_SELECTIONS } from './selection.js';
import type { PredictionRecord } from '../types.js';

export function expectedTotal(perNumber: bigint, count: number): bigint {
    return checkedMul(perNumber, BigInt(count));
}

export function assertInvariant(record: PredictionRecord): void {
    const { selectionCount, selections } = record;
    ensure(selectionCount >= 1 && selectionCount <= MAX_SELECTIONS, 'InvariantViolated', `selection count ${selectionCount}`);
    ensure(selections.length === selectionCount, 'InvariantViolated', 'selection list length differs from count');
    ensure(record.totalValue === expectedTotal(record.valuePerNumber, selectionCount), 'InvariantViolated', 'total != perNumber * count');
}

export function assertMaskMatches(record: PredictionRecord): void {
    ensure(maskOf(record.selections) === record.selectionsMask, 'InvalidBetNumber', 'stored mask does not match selections');
}
