import { z } from 'zod';
import { encodeResultsPointer, RESULTS_POINTER_LEN } from '../core/hash.js';
import { U64_MAX } from '../core/math.js';

// Request bodies carry u64 amounts as decimal strings and hashes as hex.

export const AmountSchema = z
    .string()
    .regex(/^\d{1,20}$/, 'amount must be a decimal string')
    .transform((v) => BigInt(v))
    .refine((v) => v <= U64_MAX, 'amount exceeds u64');

export const Hash32Schema = z
    .string()
    .regex(/^[0-9a-fA-F]{64}$/, 'expected 32 bytes of hex')
    .transform((v) => Buffer.from(v, 'hex'));

export const PlayerKeySchema = z.string().regex(/^[0-9a-f]{64}$/, 'expected a 64-char lowercase hex key');

export const ResultsPointerSchema = z
    .string()
    .min(1)
    .refine((v) => Buffer.byteLength(v, 'utf8') <= RESULTS_POINTER_LEN, `at most ${RESULTS_POINTER_LEN} bytes`)
    .transform(encodeResultsPointer);

const Epoch = z.number().int().nonnegative();
const Tier = z.number().int().min(1).max(255);
const Choice = z.number().int().nonnegative().max(0xffff_ffff);

export const TierParamSchema = z.coerce.number().int().min(1).max(255);
export const EpochParamSchema = z.coerce.number().int().nonnegative();

export const DepositSchema = z.object({
    account: z.string().min(1),
    amount: AmountSchema,
});

export const PlaceStakeSchema = z.object({
    tier: Tier,
    epoch: Epoch,
    predictionType: z.number().int().min(0).max(255),
    choice: Choice,
    perNumber: AmountSchema,
});

export const IncreaseStakeSchema = z.object({
    tier: Tier,
    additional: AmountSchema,
    choice: Choice,
});

export const ChangeSelectionSchema = z.object({
    tier: Tier,
    predictionType: z.number().int().min(0).max(255),
    choice: Choice,
});

export const ClaimSchema = z.object({
    epoch: Epoch,
    tier: Tier,
    index: z.number().int().nonnegative(),
    amount: AmountSchema,
    proof: z.array(Hash32Schema),
});

export const ResetPoolSchema = z.object({ blocked: z.number().int() });

export const TierActiveSchema = z.object({ active: z.boolean() });

export const LedgerDrawSchema = z.object({
    epoch: Epoch,
    tier: Tier,
    winningNumber: z.number().int(),
    rngTick: z.number().int().nonnegative(),
    rngSeed: Hash32Schema,
});

export const LedgerKeySchema = z.object({ epoch: Epoch, tier: Tier });

export const FinalizeSchema = z.object({
    epoch: Epoch,
    tier: Tier,
    protocolFee: AmountSchema,
    netPrizePool: AmountSchema,
    totalWinners: z.number().int().nonnegative(),
    merkleRoot: Hash32Schema,
    resultsPointer: ResultsPointerSchema,
});

/** What the external resolver publishes for one closed epoch of a tier. */
export const ResolverProposalSchema = z.object({
    epoch: Epoch,
    tier: Tier,
    winningNumber: z.number().int().min(0).max(9),
    rngTick: z.number().int().nonnegative(),
    rngSeed: z.string().regex(/^[0-9a-fA-F]{64}$/),
    totalWinners: z.number().int().nonnegative(),
    protocolFee: z.string().regex(/^\d+$/),
    netPrizePool: z.string().regex(/^\d+$/),
    merkleRoot: z.string().regex(/^[0-9a-fA-F]{64}$/),
    resultsPointer: z.string(),
});
export type ResolverProposal = z.infer<typeof ResolverProposalSchema>;
