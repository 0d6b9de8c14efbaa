import Database from 'better-sqlite3';
import { z } from 'zod';
import { DB_PATH, DEFAULT_TIERS } from '../config.js';
import { NUMBER_SLOTS } from '../types.js';
import type {
    LedgerStatus,
    PredictionRecord,
    RolloverReason,
    SettlementLedger,
    StakePool,
    TierSettings,
    Treasury,
} from '../types.js';

export type Db = Database.Database;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS tiers (
  tier INTEGER PRIMARY KEY,
  active INTEGER NOT NULL,
  min_stake TEXT NOT NULL,
  max_stake TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS pools (
  tier INTEGER PRIMARY KEY,
  epoch INTEGER NOT NULL,
  chain_start_epoch INTEGER NOT NULL,
  total_value TEXT NOT NULL,
  carried_value TEXT NOT NULL,
  total_count INTEGER NOT NULL,
  carried_count INTEGER NOT NULL,
  value_per_number TEXT NOT NULL,
  count_per_number TEXT NOT NULL,
  cutoff_ticks INTEGER NOT NULL,
  epochs_carried INTEGER NOT NULL,
  blocked_number INTEGER NOT NULL,
  fee_bps INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS predictions (
  player TEXT NOT NULL,
  chain_epoch INTEGER NOT NULL,
  tier INTEGER NOT NULL,
  epoch INTEGER NOT NULL,
  placed_tick INTEGER NOT NULL,
  prediction_type INTEGER NOT NULL,
  selection_count INTEGER NOT NULL,
  selections TEXT NOT NULL,
  selections_mask INTEGER NOT NULL,
  value_per_number TEXT NOT NULL,
  total_value TEXT NOT NULL,
  changed_count INTEGER NOT NULL,
  placed_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL,
  claimed INTEGER NOT NULL,
  claimed_at INTEGER NOT NULL,
  PRIMARY KEY (player, chain_epoch, tier)
);

CREATE TABLE IF NOT EXISTS ledgers (
  epoch INTEGER NOT NULL,
  tier INTEGER NOT NULL,
  chain_start_epoch INTEGER NOT NULL,
  status TEXT NOT NULL,
  winning_number INTEGER NOT NULL,
  rng_tick INTEGER NOT NULL,
  rng_seed BLOB NOT NULL,
  attempt_count INTEGER NOT NULL,
  last_updated_tick INTEGER NOT NULL,
  last_updated_at INTEGER NOT NULL,
  total_count INTEGER NOT NULL,
  carried_count INTEGER NOT NULL,
  carry_in TEXT NOT NULL,
  carry_out TEXT NOT NULL,
  protocol_fee TEXT NOT NULL,
  fee_bps INTEGER NOT NULL,
  net_prize_pool TEXT NOT NULL,
  total_winners INTEGER NOT NULL,
  claimed_winners INTEGER NOT NULL,
  claimed_value TEXT NOT NULL,
  resolved_at INTEGER NOT NULL,
  merkle_root BLOB NOT NULL,
  results_pointer BLOB NOT NULL,
  claimed_bitmap BLOB NOT NULL,
  rollover_reason TEXT NOT NULL,
  blocked_number INTEGER NOT NULL,
  PRIMARY KEY (epoch, tier)
);

CREATE TABLE IF NOT EXISTS treasury (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  total_in TEXT NOT NULL,
  total_out TEXT NOT NULL,
  total_fees_withdrawn TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS accounts (
  key TEXT PRIMARY KEY,
  balance TEXT NOT NULL,
  updated_at INTEGER NOT NULL
);
`;

export function openDatabase(path: string = DB_PATH, tiers: readonly TierSettings[] = DEFAULT_TIERS): Db {
    const db = new Database(path);
    db.pragma('journal_mode = WAL');
    db.exec(SCHEMA);

    const seedTier = db.prepare(`INSERT OR IGNORE INTO tiers (tier, active, min_stake, max_stake) VALUES (?, ?, ?, ?)`);
    for (const t of tiers) {
        seedTier.run(t.tier, t.active ? 1 : 0, t.minStake.toString(), t.maxStake.toString());
    }
    db.prepare(`INSERT OR IGNORE INTO treasury (id, total_in, total_out, total_fees_withdrawn) VALUES (1, '0', '0', '0')`).run();
    return db;
}

// Row shapes as stored; amounts are decimal strings.

type TierRow = { tier: number; active: number; minStake: string; maxStake: string; };

type PoolRow = {
    tier: number;
    epoch: number;
    chainStartEpoch: number;
    totalValue: string;
    carriedValue: string;
    totalCount: number;
    carriedCount: number;
    valuePerNumber: string;
    countPerNumber: string;
    cutoffTicks: number;
    epochsCarried: number;
    blockedNumber: number;
    feeBps: number;
};

type PredictionRow = {
    player: string;
    chainEpoch: number;
    tier: number;
    epoch: number;
    placedTick: number;
    predictionType: number;
    selectionCount: number;
    selections: string;
    selectionsMask: number;
    valuePerNumber: string;
    totalValue: string;
    changedCount: number;
    placedAt: number;
    updatedAt: number;
    claimed: number;
    claimedAt: number;
};

type LedgerRow = {
    epoch: number;
    tier: number;
    chainStartEpoch: number;
    status: string;
    winningNumber: number;
    rngTick: number;
    rngSeed: Buffer;
    attemptCount: number;
    lastUpdatedTick: number;
    lastUpdatedAt: number;
    totalCount: number;
    carriedCount: number;
    carryIn: string;
    carryOut: string;
    protocolFee: string;
    feeBps: number;
    netPrizePool: string;
    totalWinners: number;
    claimedWinners: number;
    claimedValue: string;
    resolvedAt: number;
    merkleRoot: Buffer;
    resultsPointer: Buffer;
    claimedBitmap: Buffer;
    rolloverReason: string;
    blockedNumber: number;
};

type TreasuryRow = { totalIn: string; totalOut: string; totalFeesWithdrawn: string; };

const valueArray = z.array(z.string().regex(/^\d+$/)).length(NUMBER_SLOTS);
const countArray = z.array(z.number().int().nonnegative()).length(NUMBER_SLOTS);
const numberList = z.array(z.number().int().min(0).max(9)).max(8);
const ledgerStatus = z.enum(['failed', 'processing', 'resolved']);
const rolloverReason = z.enum(['none', 'no_winners', 'rollover_number']);

function parseValues(json: string): bigint[] {
    return valueArray.parse(JSON.parse(json)).map((v) => BigInt(v));
}

function encodeValues(values: readonly bigint[]): string {
    return JSON.stringify(values.map((v) => v.toString()));
}

// ─── tiers ────────────────────────────────────────────

export function getTier(db: Db, tier: number): TierSettings | undefined {
    const row = db.prepare<[number], TierRow>(
        `SELECT tier, active, min_stake as minStake, max_stake as maxStake FROM tiers WHERE tier = ?`
    ).get(tier);
    return row && toTier(row);
}

export function listTiers(db: Db): TierSettings[] {
    return db.prepare<[], TierRow>(
        `SELECT tier, active, min_stake as minStake, max_stake as maxStake FROM tiers ORDER BY tier`
    ).all().map(toTier);
}

export function setTierActiveFlag(db: Db, tier: number, active: boolean): void {
    db.prepare(`UPDATE tiers SET active = ? WHERE tier = ?`).run(active ? 1 : 0, tier);
}

function toTier(row: TierRow): TierSettings {
    return {
        tier: row.tier,
        active: row.active === 1,
        minStake: BigInt(row.minStake),
        maxStake: BigInt(row.maxStake),
    };
}

// ─── pools ────────────────────────────────────────────

export function getPool(db: Db, tier: number): StakePool | undefined {
    const row = db.prepare<[number], PoolRow>(
        `SELECT tier, epoch, chain_start_epoch as chainStartEpoch, total_value as totalValue, carried_value as carriedValue,
            total_count as totalCount, carried_count as carriedCount, value_per_number as valuePerNumber,
            count_per_number as countPerNumber, cutoff_ticks as cutoffTicks, epochs_carried as epochsCarried,
            blocked_number as blockedNumber, fee_bps as feeBps
       FROM pools WHERE tier = ?`
    ).get(tier);
    if (!row) return undefined;
    return {
        ...row,
        totalValue: BigInt(row.totalValue),
        carriedValue: BigInt(row.carriedValue),
        valuePerNumber: parseValues(row.valuePerNumber),
        countPerNumber: countArray.parse(JSON.parse(row.countPerNumber)),
    };
}

function poolParams(pool: StakePool) {
    return {
        tier: pool.tier,
        epoch: pool.epoch,
        chainStartEpoch: pool.chainStartEpoch,
        totalValue: pool.totalValue.toString(),
        carriedValue: pool.carriedValue.toString(),
        totalCount: pool.totalCount,
        carriedCount: pool.carriedCount,
        valuePerNumber: encodeValues(pool.valuePerNumber),
        countPerNumber: JSON.stringify(pool.countPerNumber),
        cutoffTicks: pool.cutoffTicks,
        epochsCarried: pool.epochsCarried,
        blockedNumber: pool.blockedNumber,
        feeBps: pool.feeBps,
    };
}

export function insertPool(db: Db, pool: StakePool): void {
    db.prepare(`INSERT INTO pools (tier, epoch, chain_start_epoch, total_value, carried_value, total_count, carried_count,
            value_per_number, count_per_number, cutoff_ticks, epochs_carried, blocked_number, fee_bps)
     VALUES (@tier, @epoch, @chainStartEpoch, @totalValue, @carriedValue, @totalCount, @carriedCount,
            @valuePerNumber, @countPerNumber, @cutoffTicks, @epochsCarried, @blockedNumber, @feeBps)`)
        .run(poolParams(pool));
}

export function updatePool(db: Db, pool: StakePool): void {
    db.prepare(`UPDATE pools SET epoch = @epoch, chain_start_epoch = @chainStartEpoch, total_value = @totalValue,
            carried_value = @carriedValue, total_count = @totalCount, carried_count = @carriedCount,
            value_per_number = @valuePerNumber, count_per_number = @countPerNumber, cutoff_ticks = @cutoffTicks,
            epochs_carried = @epochsCarried, blocked_number = @blockedNumber, fee_bps = @feeBps
     WHERE tier = @tier`)
        .run(poolParams(pool));
}

// ─── predictions ──────────────────────────────────────

const PREDICTION_COLUMNS = `player, chain_epoch as chainEpoch, tier, epoch, placed_tick as placedTick,
    prediction_type as predictionType, selection_count as selectionCount, selections,
    selections_mask as selectionsMask, value_per_number as valuePerNumber, total_value as totalValue,
    changed_count as changedCount, placed_at as placedAt, updated_at as updatedAt, claimed, claimed_at as claimedAt`;

export function getPrediction(db: Db, player: string, chainEpoch: number, tier: number): PredictionRecord | undefined {
    const row = db.prepare<[string, number, number], PredictionRow>(
        `SELECT ${PREDICTION_COLUMNS} FROM predictions WHERE player = ? AND chain_epoch = ? AND tier = ?`
    ).get(player, chainEpoch, tier);
    return row && toPrediction(row);
}

export function listPredictions(db: Db, chainEpoch: number, tier: number): PredictionRecord[] {
    return db.prepare<[number, number], PredictionRow>(
        `SELECT ${PREDICTION_COLUMNS} FROM predictions WHERE chain_epoch = ? AND tier = ? ORDER BY placed_tick, player`
    ).all(chainEpoch, tier).map(toPrediction);
}

function toPrediction(row: PredictionRow): PredictionRecord {
    return {
        ...row,
        selections: numberList.parse(JSON.parse(row.selections)),
        valuePerNumber: BigInt(row.valuePerNumber),
        totalValue: BigInt(row.totalValue),
        claimed: row.claimed === 1,
    };
}

function predictionParams(record: PredictionRecord) {
    return {
        ...record,
        selections: JSON.stringify(record.selections),
        valuePerNumber: record.valuePerNumber.toString(),
        totalValue: record.totalValue.toString(),
        claimed: record.claimed ? 1 : 0,
    };
}

export function insertPrediction(db: Db, record: PredictionRecord): void {
    db.prepare(`INSERT INTO predictions (player, chain_epoch, tier, epoch, placed_tick, prediction_type, selection_count,
            selections, selections_mask, value_per_number, total_value, changed_count, placed_at, updated_at, claimed, claimed_at)
     VALUES (@player, @chainEpoch, @tier, @epoch, @placedTick, @predictionType, @selectionCount,
            @selections, @selectionsMask, @valuePerNumber, @totalValue, @changedCount, @placedAt, @updatedAt, @claimed, @claimedAt)`)
        .run(predictionParams(record));
}

export function updatePrediction(db: Db, record: PredictionRecord): void {
    db.prepare(`UPDATE predictions SET epoch = @epoch, prediction_type = @predictionType, selection_count = @selectionCount,
            selections = @selections, selections_mask = @selectionsMask, value_per_number = @valuePerNumber,
            total_value = @totalValue, changed_count = @changedCount, updated_at = @updatedAt,
            claimed = @claimed, claimed_at = @claimedAt
     WHERE player = @player AND chain_epoch = @chainEpoch AND tier = @tier`)
        .run(predictionParams(record));
}

// ─── ledgers ──────────────────────────────────────────

export function getLedger(db: Db, epoch: number, tier: number): SettlementLedger | undefined {
    const row = db.prepare<[number, number], LedgerRow>(
        `SELECT epoch, tier, chain_start_epoch as chainStartEpoch, status, winning_number as winningNumber,
            rng_tick as rngTick, rng_seed as rngSeed, attempt_count as attemptCount,
            last_updated_tick as lastUpdatedTick, last_updated_at as lastUpdatedAt, total_count as totalCount,
            carried_count as carriedCount, carry_in as carryIn, carry_out as carryOut, protocol_fee as protocolFee,
            fee_bps as feeBps, net_prize_pool as netPrizePool, total_winners as totalWinners,
            claimed_winners as claimedWinners, claimed_value as claimedValue, resolved_at as resolvedAt,
            merkle_root as merkleRoot, results_pointer as resultsPointer, claimed_bitmap as claimedBitmap,
            rollover_reason as rolloverReason, blocked_number as blockedNumber
       FROM ledgers WHERE epoch = ? AND tier = ?`
    ).get(epoch, tier);
    if (!row) return undefined;
    const status: LedgerStatus = ledgerStatus.parse(row.status);
    const reason: RolloverReason = rolloverReason.parse(row.rolloverReason);
    return {
        ...row,
        status,
        rolloverReason: reason,
        carryIn: BigInt(row.carryIn),
        carryOut: BigInt(row.carryOut),
        protocolFee: BigInt(row.protocolFee),
        netPrizePool: BigInt(row.netPrizePool),
        claimedValue: BigInt(row.claimedValue),
    };
}

function ledgerParams(ledger: SettlementLedger) {
    return {
        ...ledger,
        carryIn: ledger.carryIn.toString(),
        carryOut: ledger.carryOut.toString(),
        protocolFee: ledger.protocolFee.toString(),
        netPrizePool: ledger.netPrizePool.toString(),
        claimedValue: ledger.claimedValue.toString(),
    };
}

export function insertLedger(db: Db, ledger: SettlementLedger): void {
    db.prepare(`INSERT INTO ledgers (epoch, tier, chain_start_epoch, status, winning_number, rng_tick, rng_seed, attempt_count,
            last_updated_tick, last_updated_at, total_count, carried_count, carry_in, carry_out, protocol_fee, fee_bps,
            net_prize_pool, total_winners, claimed_winners, claimed_value, resolved_at, merkle_root, results_pointer,
            claimed_bitmap, rollover_reason, blocked_number)
     VALUES (@epoch, @tier, @chainStartEpoch, @status, @winningNumber, @rngTick, @rngSeed, @attemptCount,
            @lastUpdatedTick, @lastUpdatedAt, @totalCount, @carriedCount, @carryIn, @carryOut, @protocolFee, @feeBps,
            @netPrizePool, @totalWinners, @claimedWinners, @claimedValue, @resolvedAt, @merkleRoot, @resultsPointer,
            @claimedBitmap, @rolloverReason, @blockedNumber)`)
        .run(ledgerParams(ledger));
}

export function updateLedger(db: Db, ledger: SettlementLedger): void {
    db.prepare(`UPDATE ledgers SET chain_start_epoch = @chainStartEpoch, status = @status, winning_number = @winningNumber,
            rng_tick = @rngTick, rng_seed = @rngSeed, attempt_count = @attemptCount, last_updated_tick = @lastUpdatedTick,
            last_updated_at = @lastUpdatedAt, total_count = @totalCount, carried_count = @carriedCount, carry_in = @carryIn,
            carry_out = @carryOut, protocol_fee = @protocolFee, fee_bps = @feeBps, net_prize_pool = @netPrizePool,
            total_winners = @totalWinners, claimed_winners = @claimedWinners, claimed_value = @claimedValue,
            resolved_at = @resolvedAt, merkle_root = @merkleRoot, results_pointer = @resultsPointer,
            claimed_bitmap = @claimedBitmap, rollover_reason = @rolloverReason, blocked_number = @blockedNumber
     WHERE epoch = @epoch AND tier = @tier`)
        .run(ledgerParams(ledger));
}

// ─── treasury & custody accounts ──────────────────────

export function getTreasury(db: Db): Treasury {
    const row = db.prepare<[], TreasuryRow>(
        `SELECT total_in as totalIn, total_out as totalOut, total_fees_withdrawn as totalFeesWithdrawn FROM treasury WHERE id = 1`
    ).get();
    return {
        totalIn: BigInt(row?.totalIn ?? '0'),
        totalOut: BigInt(row?.totalOut ?? '0'),
        totalFeesWithdrawn: BigInt(row?.totalFeesWithdrawn ?? '0'),
    };
}

export function updateTreasury(db: Db, treasury: Treasury): void {
    db.prepare(`UPDATE treasury SET total_in = ?, total_out = ?, total_fees_withdrawn = ? WHERE id = 1`)
        .run(treasury.totalIn.toString(), treasury.totalOut.toString(), treasury.totalFeesWithdrawn.toString());
}

export function getBalance(db: Db, key: string): bigint {
    const row = db.prepare<[string], { balance: string }>(`SELECT balance FROM accounts WHERE key = ?`).get(key);
    return BigInt(row?.balance ?? '0');
}

export function setBalance(db: Db, key: string, balance: bigint): void {
    db.prepare(`INSERT INTO accounts (key, balance, updated_at) VALUES (?, ?, ?)
              ON CONFLICT(key) DO UPDATE SET balance=excluded.balance, updated_at=excluded.updated_at`)
        .run(key, balance.toString(), Date.now());
}
