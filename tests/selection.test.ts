import { describe, expect, test } from 'vitest';
import { deriveSelection, maskOf } from '../src/core/selection.js';
import { PredictionType } from '../src/types.js';
import { errorOf } from './helpers.js';

describe('deriveSelection', () => {
    test('single number', () => {
        expect(deriveSelection(PredictionType.SingleNumber, 7, 5)).toEqual({ count: 1, numbers: [7], mask: 128 });
    });

    test('two numbers are sorted ascending', () => {
        expect(deriveSelection(PredictionType.TwoNumbers, 73, 5)).toEqual({ count: 2, numbers: [3, 7], mask: 136 });
    });

    test('multi number decodes every digit', () => {
        expect(deriveSelection(PredictionType.MultiNumber, 9421, 5)).toEqual({ count: 4, numbers: [1, 2, 4, 9], mask: 534 });
    });

    test('multi number accepts eight numbers', () => {
        const selection = deriveSelection(PredictionType.MultiNumber, 87654321, 9);
        expect(selection.numbers).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
        expect(selection.count).toBe(8);
    });

    test('high/low splits the eight eligible numbers', () => {
        expect(deriveSelection(PredictionType.HighLow, 0, 5).numbers).toEqual([1, 2, 3, 4]);
        expect(deriveSelection(PredictionType.HighLow, 1, 5).numbers).toEqual([6, 7, 8, 9]);
        expect(deriveSelection(PredictionType.HighLow, 0, 1).numbers).toEqual([2, 3, 4, 5]);
    });

    test('even/odd depends on the blocked number', () => {
        expect(deriveSelection(PredictionType.EvenOdd, 0, 5).numbers).toEqual([2, 4, 6, 8]);
        expect(deriveSelection(PredictionType.EvenOdd, 1, 5).numbers).toEqual([1, 3, 7, 9]);
        expect(deriveSelection(PredictionType.EvenOdd, 0, 2)).toEqual({ count: 3, numbers: [4, 6, 8], mask: 336 });
        expect(deriveSelection(PredictionType.EvenOdd, 1, 2).count).toBe(5);
    });

    test('rejects the blocked number', () => {
        const err = errorOf(() => deriveSelection(PredictionType.SingleNumber, 5, 5));
        expect(err.code).toBe('InvalidBetNumber');
        expect(err.kind).toBe('selection-invalid');
    });

    test('rejects duplicates, zero digits and zero choice', () => {
        expect(errorOf(() => deriveSelection(PredictionType.TwoNumbers, 33, 5)).code).toBe('InvalidBetNumber');
        expect(errorOf(() => deriveSelection(PredictionType.SingleNumber, 10, 5)).code).toBe('InvalidBetNumber');
        expect(errorOf(() => deriveSelection(PredictionType.SingleNumber, 0, 5)).code).toBe('InvalidBetNumber');
    });

    test('rejects a digit count that does not fit the type', () => {
        expect(errorOf(() => deriveSelection(PredictionType.TwoNumbers, 7, 5)).code).toBe('InvalidChoiceCount');
        expect(errorOf(() => deriveSelection(PredictionType.SingleNumber, 12, 5)).code).toBe('InvalidChoiceCount');
        expect(errorOf(() => deriveSelection(PredictionType.MultiNumber, 12, 5)).code).toBe('InvalidChoiceCount');
    });

    test('rejects out-of-range derived choices', () => {
        expect(errorOf(() => deriveSelection(PredictionType.HighLow, 2, 5)).code).toBe('InvalidBetNumber');
        expect(errorOf(() => deriveSelection(PredictionType.EvenOdd, 7, 5)).code).toBe('InvalidBetNumber');
    });

    test('requires a blocked number in 1..9', () => {
        expect(errorOf(() => deriveSelection(PredictionType.SingleNumber, 7, 0)).kind).toBe('selection-invalid');
        expect(errorOf(() => deriveSelection(PredictionType.HighLow, 0, 10)).kind).toBe('selection-invalid');
    });

    test('rejects unknown prediction types', () => {
        expect(errorOf(() => deriveSelection(9, 7, 5)).code).toBe('InvalidBetNumber');
    });

    test('mask always matches the number list', () => {
        const cases: Array<[number, number]> = [
            [PredictionType.SingleNumber, 4],
            [PredictionType.TwoNumbers, 19],
            [PredictionType.MultiNumber, 8631],
            [PredictionType.HighLow, 1],
            [PredictionType.EvenOdd, 0],
        ];
        for (const [type, choice] of cases) {
            const selection = deriveSelection(type, choice, 5);
            expect(maskOf(selection.numbers)).toBe(selection.mask);
        }
    });
});
