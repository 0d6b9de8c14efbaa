import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { ZodError } from 'zod';
import { ensure, isSettlementError, type ErrorKind } from '../core/errors.js';
import { decodeResultsPointer } from '../core/hash.js';
import { feeBounds, isPoolEmpty, openPool, readPool, resetPool, setTierActive, tierSettings } from '../engine/admin.js';
import { claim } from '../engine/claims.js';
import type { EngineContext } from '../engine/context.js';
import { finalizeLedger, initLedger, readLedger, reprocessLedger, rolloverLedger } from '../engine/settlement.js';
import { changeSelection, increaseStake, placeStake, readChainPredictions, readPrediction } from '../engine/staking.js';
import { balanceOf, deposit, treasuryView } from '../engine/treasury.js';
import {
    ChangeSelectionSchema,
    ClaimSchema,
    DepositSchema,
    EpochParamSchema,
    FinalizeSchema,
    IncreaseStakeSchema,
    LedgerDrawSchema,
    LedgerKeySchema,
    PlaceStakeSchema,
    PlayerKeySchema,
    ResetPoolSchema,
    TierActiveSchema,
    TierParamSchema,
} from './schemas.js';

declare global {
    namespace Express {
        interface Request {
            playerKey?: string;
            authorityKey?: string;
        }
    }
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
    'authorization': 403,
    'not-found': 404,
    'double-spend': 409,
    'invalid-input': 400,
    'selection-invalid': 400,
    'proof-invalid': 400,
    'state-mismatch': 422,
    'timing': 422,
    'arithmetic': 422,
    'capacity': 422,
    'solvency': 422,
};

export function statusForKind(kind: ErrorKind): number {
    return STATUS_BY_KIND[kind];
}

/** JSON view of engine values: bigints as decimal strings, buffers as hex. */
export function toJson(value: unknown): unknown {
    if (typeof value === 'bigint') return value.toString();
    if (Buffer.isBuffer(value)) return value.toString('hex');
    if (Array.isArray(value)) return value.map(toJson);
    if (value !== null && typeof value === 'object') {
        return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toJson(v)]));
    }
    return value;
}

function sendError(res: express.Response, error: unknown, label: string): void {
    if (isSettlementError(error)) {
        res.status(statusForKind(error.kind)).json({ error: error.code, kind: error.kind, message: error.message });
        return;
    }
    if (error instanceof ZodError) {
        res.status(400).json({ error: 'InvalidInput', kind: 'invalid-input', issues: error.issues });
        return;
    }
    console.error(`[api] ${label} error:`, error);
    res.status(500).json({ error: 'Internal server error' });
}

function validatePlayerKey(req: express.Request, res: express.Response, next: express.NextFunction) {
    const parsed = PlayerKeySchema.safeParse(req.headers['x-player-key']);
    if (!parsed.success) {
        return res.status(401).json({ error: 'Invalid player key' });
    }
    req.playerKey = parsed.data;
    next();
}

function validateAuthorityKey(req: express.Request, res: express.Response, next: express.NextFunction) {
    const key = req.headers['x-authority-key'];
    if (typeof key !== 'string' || key.length === 0) {
        return res.status(401).json({ error: 'Missing authority key' });
    }
    req.authorityKey = key;
    next();
}

function playerOf(req: express.Request): string {
    ensure(req.playerKey !== undefined, 'Unauthorized', 'no player key');
    return req.playerKey;
}

function authorityOf(req: express.Request): string {
    ensure(req.authorityKey !== undefined, 'Unauthorized', 'no authority key');
    return req.authorityKey;
}

export function createApp(ctx: EngineContext): express.Express {
    const app = express();

    app.use(helmet());
    app.use(cors({ origin: '*', credentials: false }));
    app.use(express.json());

    // Health check
    app.get('/api/health', (req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    app.get('/api/clock', (req, res) => {
        res.json(ctx.clock.now());
    });

    app.get('/api/tiers', (req, res) => {
        res.json({ tiers: toJson(tierSettings(ctx)), fees: feeBounds(ctx) });
    });

    app.get('/api/pools/:tier', (req, res) => {
        try {
            res.json(toJson(readPool(ctx, TierParamSchema.parse(req.params.tier))));
        } catch (error) {
            sendError(res, error, 'Pool');
        }
    });

    app.get('/api/pools/:tier/empty', (req, res) => {
        try {
            res.json({ empty: isPoolEmpty(ctx, TierParamSchema.parse(req.params.tier)) });
        } catch (error) {
            sendError(res, error, 'Pool');
        }
    });

    app.get('/api/predictions/:chainEpoch/:tier', (req, res) => {
        try {
            const chainEpoch = EpochParamSchema.parse(req.params.chainEpoch);
            const tier = TierParamSchema.parse(req.params.tier);
            res.json({ predictions: toJson(readChainPredictions(ctx, chainEpoch, tier)) });
        } catch (error) {
            sendError(res, error, 'Predictions');
        }
    });

    app.get('/api/predictions/:player/:chainEpoch/:tier', (req, res) => {
        try {
            const player = PlayerKeySchema.parse(req.params.player);
            const chainEpoch = EpochParamSchema.parse(req.params.chainEpoch);
            const tier = TierParamSchema.parse(req.params.tier);
            res.json(toJson(readPrediction(ctx, player, chainEpoch, tier)));
        } catch (error) {
            sendError(res, error, 'Prediction');
        }
    });

    app.get('/api/ledgers/:epoch/:tier', (req, res) => {
        try {
            const ledger = readLedger(ctx, EpochParamSchema.parse(req.params.epoch), TierParamSchema.parse(req.params.tier));
            res.json(toJson({ ...ledger, resultsPointer: decodeResultsPointer(ledger.resultsPointer) }));
        } catch (error) {
            sendError(res, error, 'Ledger');
        }
    });

    app.get('/api/treasury', (req, res) => {
        res.json(toJson(treasuryView(ctx)));
    });

    app.get('/api/accounts/:key', (req, res) => {
        res.json({ account: req.params.key, balance: balanceOf(ctx, req.params.key).toString() });
    });

    // Player operations

    app.post('/api/stake', validatePlayerKey, (req, res) => {
        try {
            const body = PlaceStakeSchema.parse(req.body);
            const record = placeStake(ctx, { ...body, player: playerOf(req) });
            res.json(toJson(record));
        } catch (error) {
            sendError(res, error, 'Stake');
        }
    });

    app.post('/api/stake/increase', validatePlayerKey, (req, res) => {
        try {
            const body = IncreaseStakeSchema.parse(req.body);
            res.json(toJson(increaseStake(ctx, { ...body, player: playerOf(req) })));
        } catch (error) {
            sendError(res, error, 'Increase');
        }
    });

    app.post('/api/stake/change', validatePlayerKey, (req, res) => {
        try {
            const body = ChangeSelectionSchema.parse(req.body);
            res.json(toJson(changeSelection(ctx, { ...body, player: playerOf(req) })));
        } catch (error) {
            sendError(res, error, 'Change');
        }
    });

    app.post('/api/claim', validatePlayerKey, (req, res) => {
        try {
            const body = ClaimSchema.parse(req.body);
            res.json(toJson(claim(ctx, { ...body, claimer: playerOf(req) })));
        } catch (error) {
            sendError(res, error, 'Claim');
        }
    });

    // Authority operations

    app.post('/api/deposit', validateAuthorityKey, (req, res) => {
        try {
            const body = DepositSchema.parse(req.body);
            const balance = deposit(ctx, authorityOf(req), body.account, body.amount);
            res.json({ success: true, account: body.account, balance: balance.toString() });
        } catch (error) {
            sendError(res, error, 'Deposit');
        }
    });

    app.post('/api/admin/pools/:tier/open', validateAuthorityKey, (req, res) => {
        try {
            res.json(toJson(openPool(ctx, authorityOf(req), TierParamSchema.parse(req.params.tier))));
        } catch (error) {
            sendError(res, error, 'Open pool');
        }
    });

    app.post('/api/admin/pools/:tier/reset', validateAuthorityKey, (req, res) => {
        try {
            const { blocked } = ResetPoolSchema.parse(req.body);
            res.json(toJson(resetPool(ctx, authorityOf(req), TierParamSchema.parse(req.params.tier), blocked)));
        } catch (error) {
            sendError(res, error, 'Reset pool');
        }
    });

    app.post('/api/admin/tiers/:tier/active', validateAuthorityKey, (req, res) => {
        try {
            const { active } = TierActiveSchema.parse(req.body);
            res.json(toJson(setTierActive(ctx, authorityOf(req), TierParamSchema.parse(req.params.tier), active)));
        } catch (error) {
            sendError(res, error, 'Tier activation');
        }
    });

    app.post('/api/admin/ledgers/init', validateAuthorityKey, (req, res) => {
        try {
            res.json(toJson(initLedger(ctx, authorityOf(req), LedgerDrawSchema.parse(req.body))));
        } catch (error) {
            sendError(res, error, 'Ledger init');
        }
    });

    app.post('/api/admin/ledgers/reprocess', validateAuthorityKey, (req, res) => {
        try {
            const { epoch, tier } = LedgerKeySchema.parse(req.body);
            res.json(toJson(reprocessLedger(ctx, authorityOf(req), epoch, tier)));
        } catch (error) {
            sendError(res, error, 'Ledger reprocess');
        }
    });

    app.post('/api/admin/ledgers/finalize', validateAuthorityKey, (req, res) => {
        try {
            res.json(toJson(finalizeLedger(ctx, authorityOf(req), FinalizeSchema.parse(req.body))));
        } catch (error) {
            sendError(res, error, 'Ledger finalize');
        }
    });

    app.post('/api/admin/ledgers/rollover', validateAuthorityKey, (req, res) => {
        try {
            res.json(toJson(rolloverLedger(ctx, authorityOf(req), LedgerDrawSchema.parse(req.body))));
        } catch (error) {
            sendError(res, error, 'Ledger rollover');
        }
    });

    // 404 handler - always JSON
    app.use((req, res) => {
        res.status(404).json({ error: 'Not found' });
    });

    return app;
}
