import { ensure } from './errors.js';
import { isZero, playerKeyBytes, sha256, u16le, u32le, u64le, u8 } from './hash.js';

export const LEAF_DOMAIN_TAG = Buffer.from('TPOOL_V2', 'utf8');
export const MAX_PROOF_LEN = 40;

export type ClaimLeaf = {
    epoch: number;
    tier: number;
    index: number;
    claimer: string;
    amount: bigint;
    mask: number;
};

export function hashClaimLeaf(leaf: ClaimLeaf): Buffer {
    return sha256(
        LEAF_DOMAIN_TAG,
        u64le(leaf.epoch),
        u8(leaf.tier),
        u32le(leaf.index),
        playerKeyBytes(leaf.claimer),
        u64le(leaf.amount),
        u16le(leaf.mask),
    );
}

export function hashPair(left: Buffer, right: Buffer): Buffer {
    return sha256(left, right);
}

export function computeRoot(leaf: Buffer, index: number, proof: readonly Buffer[]): Buffer {
    let computed = leaf;
    let position = index;
    for (const sibling of proof) {
        computed = position % 2 === 0 ? hashPair(computed, sibling) : hashPair(sibling, computed);
        position = Math.floor(position / 2);
    }
    return computed;
}

export function verifyMerkleProof(leaf: Buffer, index: number, proof: readonly Buffer[], root: Buffer): boolean {
    ensure(proof.length <= MAX_PROOF_LEN, 'ProofTooLong', `${proof.length} siblings`);
    ensure(!isZero(root), 'EmptyMerkleRoot');
    return computeRoot(leaf, index, proof).equals(root);
}

/**
 * Builds every level of a tree over the given leaves, duplicating the
 * last node of an odd level. Used by resolvers and tests to produce
 * roots and proofs the verifier accepts.
 */
export function buildMerkleTree(leaves: readonly Buffer[]): Buffer[][] {
    ensure(leaves.length > 0, 'InvalidInput', 'empty tree');
    const levels: Buffer[][] = [[...leaves]];
    let level = levels[0];
    while (level.length > 1) {
        const next: Buffer[] = [];
        for (let i = 0; i < level.length; i += 2) {
            next.push(hashPair(level[i], level[i + 1] ?? level[i]));
        }
        levels.push(next);
        level = next;
    }
    return levels;
}

export function merkleRoot(levels: readonly Buffer[][]): Buffer {
    return levels[levels.length - 1][0];
}

export function merkleProof(levels: readonly Buffer[][], index: number): Buffer[] {
    const proof: Buffer[] = [];
    let position = index;
    for (const level of levels.slice(0, -1)) {
        const siblingIndex = position % 2 === 0 ? position + 1 : position - 1;
        proof.push(level[siblingIndex] ?? level[position]);
        position = Math.floor(position / 2);
    }
    return proof;
}
