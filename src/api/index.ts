import { DB_PATH, GENESIS_MS, loadSettings, NODE_ENV, PORT, RESOLVER_CRANK_ENABLED, TICK_MS, TICKS_PER_EPOCH } from '../config.js';
import { EpochSchedule, SystemClock } from '../core/clock.js';
import { openDatabase } from '../db/index.js';
import type { EngineContext } from '../engine/context.js';
import { createApp } from './app.js';
import { startResolverCrank } from './resolver-puller.js';

const schedule = new EpochSchedule(TICKS_PER_EPOCH);
const ctx: EngineContext = {
    db: openDatabase(DB_PATH),
    clock: new SystemClock(schedule, GENESIS_MS, TICK_MS),
    schedule,
    settings: loadSettings(),
};

const app = createApp(ctx);

const server = app.listen(PORT, () => {
    console.log(`[api] Settlement API running on port ${PORT} (${NODE_ENV})`);
});

const crank = RESOLVER_CRANK_ENABLED ? startResolverCrank() : undefined;

// Graceful shutdown
process.on('SIGINT', () => {
    console.log('[api] Shutting down...');
    crank?.stop();
    server.close(() => {
        ctx.db.close();
        process.exit(0);
    });
});
