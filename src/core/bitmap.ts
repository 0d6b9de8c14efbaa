import { ensure } from './errors.js';

export const MAX_WINNERS = 50_000;
export const MAX_BITMAP_LEN = MAX_WINNERS / 8;

export function bitmapLength(totalWinners: number): number {
    return Math.ceil(totalWinners / 8);
}

export function allocateBitmap(totalWinners: number): Buffer {
    ensure(totalWinners <= MAX_WINNERS, 'TooManyWinners', `${totalWinners} winners`);
    return Buffer.alloc(bitmapLength(totalWinners));
}

/**
 * Claim bitset over winner indices. Reads past the end report the
 * index as claimed; writes past the end are ignored.
 */
export class ClaimBitmap {
    constructor(private readonly bytes: Buffer) {}

    isClaimed(index: number): boolean {
        const byte = Math.floor(index / 8);
        if (byte >= this.bytes.length) return true;
        return (this.bytes[byte] & (1 << (index % 8))) !== 0;
    }

    markClaimed(index: number): void {
        const byte = Math.floor(index / 8);
        if (byte >= this.bytes.length) return;
        this.bytes[byte] |= 1 << (index % 8);
    }

    toBuffer(): Buffer {
        return Buffer.from(this.bytes);
    }
}
