import crypto from 'node:crypto';

export const HASH_LEN = 32;
export const RESULTS_POINTER_LEN = 128;

export function sha256(...parts: Buffer[]): Buffer {
    const hash = crypto.createHash('sha256');
    for (const part of parts) {
        hash.update(part);
    }
    return hash.digest();
}

export function u8(value: number): Buffer {
    return Buffer.from([value & 0xff]);
}

export function u16le(value: number): Buffer {
    const buf = Buffer.alloc(2);
    buf.writeUInt16LE(value);
    return buf;
}

export function u32le(value: number): Buffer {
    const buf = Buffer.alloc(4);
    buf.writeUInt32LE(value);
    return buf;
}

export function u64le(value: bigint | number): Buffer {
    const buf = Buffer.alloc(8);
    buf.writeBigUInt64LE(BigInt(value));
    return buf;
}

export function isZero(buf: Buffer): boolean {
    return buf.every((b) => b === 0);
}

const PLAYER_KEY_RE = /^[0-9a-f]{64}$/;

export function isPlayerKey(value: string): boolean {
    return PLAYER_KEY_RE.test(value);
}

export function playerKeyBytes(key: string): Buffer {
    return Buffer.from(key, 'hex');
}

// Fixed-width pointer to the off-ledger result set, zero padded.
export function encodeResultsPointer(pointer: string): Buffer {
    const buf = Buffer.alloc(RESULTS_POINTER_LEN);
    buf.write(pointer, 'utf8');
    return buf;
}

export function decodeResultsPointer(buf: Buffer): string {
    const end = buf.indexOf(0);
    return buf.subarray(0, end === -1 ? buf.length : end).toString('utf8');
}
