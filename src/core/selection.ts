import { SettlementError, ensure } from './errors.js';
import { PredictionType, type Selection } from '../types.js';

export const MAX_SELECTIONS = 8;
export const MIN_NUMBER = 1;
export const MAX_NUMBER = 9;

export function isValidBlockedNumber(blocked: number): boolean {
    return Number.isInteger(blocked) && blocked >= MIN_NUMBER && blocked <= MAX_NUMBER;
}

export function maskOf(numbers: readonly number[]): number {
    let mask = 0;
    for (const n of numbers) {
        mask |= 1 << n;
    }
    return mask;
}

function eligibleNumbers(blocked: number): number[] {
    const out: number[] = [];
    for (let n = MIN_NUMBER; n <= MAX_NUMBER; n += 1) {
        if (n !== blocked) out.push(n);
    }
    return out;
}

// Decimal digits of the choice, each one a selected number.
export function decodeChoiceDigits(choice: number, blocked: number): number[] {
    ensure(Number.isInteger(choice) && choice > 0, 'InvalidBetNumber', `choice ${choice}`);
    const digits: number[] = [];
    let rest = choice;
    while (rest > 0) {
        const digit = rest % 10;
        ensure(digit >= MIN_NUMBER && digit <= MAX_NUMBER, 'InvalidBetNumber', `digit ${digit}`);
        ensure(digit !== blocked, 'InvalidBetNumber', `number ${digit} is blocked`);
        ensure(!digits.includes(digit), 'InvalidBetNumber', `duplicate number ${digit}`);
        digits.push(digit);
        ensure(digits.length <= MAX_SELECTIONS, 'InvalidChoiceCount', `more than ${MAX_SELECTIONS} numbers`);
        rest = Math.floor(rest / 10);
    }
    return digits.sort((a, b) => a - b);
}

function fromNumbers(numbers: number[]): Selection {
    ensure(numbers.length >= 1 && numbers.length <= MAX_SELECTIONS, 'InvalidChoiceCount', `${numbers.length} numbers`);
    let mask = 0;
    for (const n of numbers) {
        const bit = 1 << n;
        ensure((mask & bit) === 0, 'InvalidBetNumber', `duplicate number ${n}`);
        mask |= bit;
    }
    return { count: numbers.length, numbers, mask };
}

const DIGIT_COUNTS: Record<number, readonly [number, number]> = {
    [PredictionType.SingleNumber]: [1, 1],
    [PredictionType.TwoNumbers]: [2, 2],
    [PredictionType.MultiNumber]: [3, MAX_SELECTIONS],
};

export function deriveSelection(predictionType: number, choice: number, blocked: number): Selection {
    ensure(isValidBlockedNumber(blocked), 'InvalidBetNumber', `blocked number ${blocked} not set`);

    switch (predictionType) {
        case PredictionType.SingleNumber:
        case PredictionType.TwoNumbers:
        case PredictionType.MultiNumber: {
            const digits = decodeChoiceDigits(choice, blocked);
            const [min, max] = DIGIT_COUNTS[predictionType];
            ensure(digits.length >= min && digits.length <= max, 'InvalidChoiceCount',
                `${digits.length} numbers for type ${predictionType}`);
            return fromNumbers(digits);
        }
        case PredictionType.HighLow: {
            ensure(choice === 0 || choice === 1, 'InvalidBetNumber', `high/low choice ${choice}`);
            const eligible = eligibleNumbers(blocked);
            return fromNumbers(choice === 0 ? eligible.slice(0, 4) : eligible.slice(4));
        }
        case PredictionType.EvenOdd: {
            ensure(choice === 0 || choice === 1, 'InvalidBetNumber', `even/odd choice ${choice}`);
            const parity = choice === 0 ? 0 : 1;
            return fromNumbers(eligibleNumbers(blocked).filter((n) => n % 2 === parity));
        }
        default:
            throw new SettlementError('InvalidBetNumber', `unknown prediction type ${predictionType}`);
    }
}
