import { ensure } from './errors.js';
import { checkedMul, checkedSub } from './math.js';
import type { FeeBounds } from '../types.js';

export const FEE_BPS_DENOM = 10_000;

export type PotBreakdown = {
    fee: bigint;
    net: bigint;
};

export function validateFeeBounds(bounds: FeeBounds): void {
    const { baseFeeBps, minFeeBps, rolloverFeeStepBps } = bounds;
    for (const value of [baseFeeBps, minFeeBps, rolloverFeeStepBps]) {
        ensure(Number.isInteger(value) && value >= 0 && value <= FEE_BPS_DENOM, 'InvalidFeeConfig', `fee ${value} out of range`);
    }
    ensure(minFeeBps <= baseFeeBps, 'InvalidFeeConfig', 'min fee above base fee');
    ensure(rolloverFeeStepBps <= baseFeeBps, 'InvalidFeeConfig', 'rollover step above base fee');
}

export function computeFee(gross: bigint, feeBps: number): bigint {
    ensure(Number.isInteger(feeBps) && feeBps >= 0 && feeBps <= FEE_BPS_DENOM, 'InvalidFee', `${feeBps} bps`);
    return checkedMul(gross, BigInt(feeBps)) / BigInt(FEE_BPS_DENOM);
}

/**
 * Splits the gross pool into protocol fee and net prize pool.
 * Without winners nothing is charged and the full pool carries.
 */
export function expectedPotBreakdown(gross: bigint, feeBps: number, totalWinners: number): PotBreakdown {
    if (totalWinners === 0) {
        return { fee: 0n, net: gross };
    }
    const fee = computeFee(gross, feeBps);
    return { fee, net: checkedSub(gross, fee) };
}

export function nextFeeOnRollover(currentBps: number, minBps: number, stepBps: number): number {
    const floored = Math.max(currentBps, minBps);
    if (stepBps === 0) return floored;
    return Math.max(minBps, Math.max(floored - stepBps, 0));
}

export function nextFeeOnNoWinners(currentBps: number, minBps: number): number {
    return Math.max(currentBps, minBps);
}
