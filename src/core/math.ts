import { ensure } from './errors.js';

export const U64_MAX = (1n << 64n) - 1n;
export const U32_MAX = 0xffff_ffff;
export const U8_MAX = 0xff;

export function checkedAdd(a: bigint, b: bigint): bigint {
    const sum = a + b;
    ensure(sum <= U64_MAX, 'MathOverflow', `${a} + ${b}`);
    return sum;
}

export function checkedSub(a: bigint, b: bigint): bigint {
    ensure(a >= b, 'MathOverflow', `${a} - ${b}`);
    return a - b;
}

export function checkedMul(a: bigint, b: bigint): bigint {
    const product = a * b;
    ensure(product <= U64_MAX, 'MathOverflow', `${a} * ${b}`);
    return product;
}

export function checkedAddU32(a: number, b: number): number {
    const sum = a + b;
    ensure(sum <= U32_MAX, 'MathOverflow', `${a} + ${b}`);
    return sum;
}

export function checkedSubU32(a: number, b: number): number {
    ensure(a >= b, 'MathOverflow', `${a} - ${b}`);
    return a - b;
}

export function saturatingIncU8(value: number): number {
    return Math.min(value + 1, U8_MAX);
}

export function isU32(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value <= U32_MAX;
}
