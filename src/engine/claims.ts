import { bitmapLength, ClaimBitmap } from '../core/bitmap.js';
import { ensure } from '../core/errors.js';
import { HASH_LEN, isPlayerKey } from '../core/hash.js';
import { checkedAdd, checkedAddU32, checkedSub, isU32 } from '../core/math.js';
import { hashClaimLeaf, MAX_PROOF_LEN, verifyMerkleProof } from '../core/merkle.js';
import { assertInvariant, assertMaskMatches } from '../core/prediction.js';
import { getBalance, getLedger, getPrediction, updateLedger, updatePrediction } from '../db/index.js';
import { atomically, type EngineContext } from './context.js';
import { recordOutflow, transfer } from './treasury.js';
import type { SettlementLedger } from '../types.js';

export type ClaimInput = {
    claimer: string;
    epoch: number;
    tier: number;
    index: number;
    amount: bigint;
    proof: Buffer[];
};

export type ClaimReceipt = {
    epoch: number;
    tier: number;
    index: number;
    amount: bigint;
    claimedWinners: number;
    claimedValue: bigint;
};

export function claim(ctx: EngineContext, input: ClaimInput): ClaimReceipt {
    return atomically(ctx, () => {
        const { claimer, epoch, tier, index, amount, proof } = input;
        ensure(proof.length <= MAX_PROOF_LEN, 'ProofTooLong', `${proof.length} siblings`);
        ensure(proof.every((sibling) => sibling.length === HASH_LEN), 'InvalidProof', 'siblings must be 32 bytes');
        ensure(isPlayerKey(claimer), 'InvalidInput', 'claimer must be a 32-byte hex key');
        ensure(isU32(index), 'InvalidClaimIndex', `index ${index}`);

        const ledger = getLedger(ctx.db, epoch, tier);
        ensure(ledger !== undefined, 'LedgerNotFound', `epoch ${epoch} tier ${tier}`);
        ensure(ledger.status === 'resolved', 'LedgerNotResolved', `status ${ledger.status}`);
        ensure(ledger.epoch === epoch, 'EpochMismatch');
        ensure(ledger.tier === tier, 'TierMismatch');
        ensure(amount > 0n, 'InvalidAmount', 'claim amount must be positive');
        ensure(ledger.totalWinners > 0, 'ClaimNotAllowed', 'epoch has no winners');
        ensure(index < ledger.totalWinners, 'InvalidClaimIndex', `index ${index} >= ${ledger.totalWinners}`);
        ensure(ledger.claimedWinners < ledger.totalWinners, 'TooManyClaims');
        ensure(ledger.claimedBitmap.length === bitmapLength(ledger.totalWinners), 'InvalidBitmapLength');

        const bitmap = new ClaimBitmap(Buffer.from(ledger.claimedBitmap));
        ensure(!bitmap.isClaimed(index), 'AlreadyClaimed', `index ${index}`);

        const record = getPrediction(ctx.db, claimer, ledger.chainStartEpoch, tier);
        ensure(record !== undefined, 'PredictionNotFound', `${claimer} in chain ${ledger.chainStartEpoch}`);
        assertInvariant(record);
        assertMaskMatches(record);
        ensure(!record.claimed, 'AlreadyClaimed', 'prediction already paid');

        const leaf = hashClaimLeaf({ epoch, tier, index, claimer, amount, mask: record.selectionsMask });
        ensure(verifyMerkleProof(leaf, index, proof, ledger.merkleRoot), 'InvalidProof', `index ${index}`);

        const remaining = checkedSub(ledger.netPrizePool, ledger.claimedValue);
        ensure(amount <= remaining, 'InsufficientPrizePool', `${amount} > remaining ${remaining}`);
        const custody = getBalance(ctx.db, ctx.settings.treasury);
        ensure(custody >= amount, 'InsufficientTreasuryBalance', `custody ${custody} < ${amount}`);

        transfer(ctx.db, ctx.settings.treasury, claimer, amount);
        recordOutflow(ctx.db, amount);
        bitmap.markClaimed(index);

        const now = ctx.clock.now();
        const updated: SettlementLedger = {
            ...ledger,
            claimedBitmap: bitmap.toBuffer(),
            claimedValue: checkedAdd(ledger.claimedValue, amount),
            claimedWinners: checkedAddU32(ledger.claimedWinners, 1),
        };
        updateLedger(ctx.db, updated);
        updatePrediction(ctx.db, { ...record, claimed: true, claimedAt: now.unixTimestamp });

        console.log(`[claims] ${claimer} claimed ${amount} for epoch ${epoch} tier ${tier} index ${index}`);
        return {
            epoch,
            tier,
            index,
            amount,
            claimedWinners: updated.claimedWinners,
            claimedValue: updated.claimedValue,
        };
    });
}
