export type ErrorKind =
    | 'authorization'
    | 'state-mismatch'
    | 'timing'
    | 'arithmetic'
    | 'selection-invalid'
    | 'proof-invalid'
    | 'double-spend'
    | 'capacity'
    | 'solvency'
    | 'invalid-input'
    | 'not-found';

export const ERROR_KINDS = {
    Unauthorized: 'authorization',

    EpochMismatch: 'state-mismatch',
    TierMismatch: 'state-mismatch',
    InactiveTier: 'state-mismatch',
    BettingPaused: 'state-mismatch',
    AlreadyPredicted: 'state-mismatch',
    NoBetsToResolve: 'state-mismatch',
    LedgerNotProcessing: 'state-mismatch',
    LedgerNotResolved: 'state-mismatch',
    LedgerAlreadyResolved: 'state-mismatch',
    CarryNotAllowed: 'state-mismatch',
    PoolCorrupted: 'state-mismatch',
    PoolNotEmpty: 'state-mismatch',
    PoolAlreadyOpen: 'state-mismatch',
    InvariantViolated: 'state-mismatch',
    InvalidFee: 'state-mismatch',
    InvalidPotBreakdown: 'state-mismatch',
    ClaimNotAllowed: 'state-mismatch',
    InvalidBitmapLength: 'state-mismatch',

    EpochNotComplete: 'timing',
    EpochNotAdvanced: 'timing',
    BettingClosed: 'timing',

    MathOverflow: 'arithmetic',

    InvalidBetNumber: 'selection-invalid',
    InvalidChoiceCount: 'selection-invalid',
    NoOpChange: 'selection-invalid',

    EmptyMerkleRoot: 'proof-invalid',
    InvalidProof: 'proof-invalid',

    AlreadyClaimed: 'double-spend',
    LedgerAlreadyExists: 'double-spend',

    TooManyWinners: 'capacity',
    ProofTooLong: 'capacity',
    TooManyClaims: 'capacity',
    InvalidClaimIndex: 'capacity',

    InsufficientBalance: 'solvency',
    InsufficientTreasuryBalance: 'solvency',
    InsufficientPrizePool: 'solvency',

    InvalidInput: 'invalid-input',
    InvalidAmount: 'invalid-input',
    StakeOutOfTierRange: 'invalid-input',
    InvalidWinningNumber: 'invalid-input',
    InvalidBlockedNumber: 'invalid-input',
    EmptyResultsPointer: 'invalid-input',
    InvalidFeeConfig: 'invalid-input',

    UnknownTier: 'not-found',
    PoolNotFound: 'not-found',
    PredictionNotFound: 'not-found',
    LedgerNotFound: 'not-found',
} as const satisfies Record<string, ErrorKind>;

export type ErrorCode = keyof typeof ERROR_KINDS;

export class SettlementError extends Error {
    readonly code: ErrorCode;
    readonly kind: ErrorKind;

    constructor(code: ErrorCode, detail?: string) {
        super(detail ? `${code}: ${detail}` : code);
        this.name = 'SettlementError';
        this.code = code;
        this.kind = ERROR_KINDS[code];
    }
}

export function ensure(condition: boolean, code: ErrorCode, detail?: string): asserts condition {
    if (!condition) {
        throw new SettlementError(code, detail);
    }
}

export function isSettlementError(err: unknown): err is SettlementError {
    return err instanceof SettlementError;
}
