export const NUMBER_SLOTS = 10;

export const PredictionType = {
    SingleNumber: 0,
    TwoNumbers: 1,
    HighLow: 2,
    EvenOdd: 3,
    MultiNumber: 4,
} as const;

export type PredictionType = (typeof PredictionType)[keyof typeof PredictionType];

export type LedgerStatus = 'failed' | 'processing' | 'resolved';

export type RolloverReason = 'none' | 'no_winners' | 'rollover_number';

export type TierSettings = {
    tier: number;
    active: boolean;
    minStake: bigint; // per selected number
    maxStake: bigint;
};

export type FeeBounds = {
    baseFeeBps: number;
    minFeeBps: number;
    rolloverFeeStepBps: number;
};

export type ProtocolSettings = FeeBounds & {
    authority: string;
    feeVault: string;
    treasury: string; // custody account holding staked value
    betCutoffTicks: number;
    bettingPaused: boolean;
};

export type StakePool = {
    tier: number;
    epoch: number;
    chainStartEpoch: number;
    totalValue: bigint;
    carriedValue: bigint;
    totalCount: number;
    carriedCount: number;
    valuePerNumber: bigint[]; // index = number 0..9
    countPerNumber: number[];
    cutoffTicks: number;
    epochsCarried: number;
    blockedNumber: number; // 0 = disabled
    feeBps: number;
};

export type Selection = {
    count: number;
    numbers: number[]; // ascending, at most 8 entries
    mask: number; // bit n set iff n selected
};

export type PredictionRecord = {
    player: string;
    chainEpoch: number;
    tier: number;
    epoch: number;
    placedTick: number;
    predictionType: number;
    selectionCount: number;
    selections: number[];
    selectionsMask: number;
    valuePerNumber: bigint;
    totalValue: bigint; // valuePerNumber * selectionCount
    changedCount: number;
    placedAt: number;
    updatedAt: number;
    claimed: boolean;
    claimedAt: number;
};

export type SettlementLedger = {
    epoch: number;
    tier: number;
    chainStartEpoch: number;
    status: LedgerStatus;
    winningNumber: number;
    rngTick: number;
    rngSeed: Buffer; // 32 bytes, audit only
    attemptCount: number;
    lastUpdatedTick: number;
    lastUpdatedAt: number;
    totalCount: number;
    carriedCount: number;
    carryIn: bigint;
    carryOut: bigint;
    protocolFee: bigint;
    feeBps: number;
    netPrizePool: bigint;
    totalWinners: number;
    claimedWinners: number;
    claimedValue: bigint;
    resolvedAt: number;
    merkleRoot: Buffer; // 32 bytes
    resultsPointer: Buffer; // 128 bytes
    claimedBitmap: Buffer;
    rolloverReason: RolloverReason;
    blockedNumber: number;
};

export type Treasury = {
    totalIn: bigint;
    totalOut: bigint;
    totalFeesWithdrawn: bigint;
};
