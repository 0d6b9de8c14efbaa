import { ensure } from '../core/errors.js';
import type { Clock, EpochSchedule } from '../core/clock.js';
import type { Db } from '../db/index.js';
import type { ProtocolSettings } from '../types.js';

export type EngineContext = {
    db: Db;
    clock: Clock;
    schedule: EpochSchedule;
    settings: ProtocolSettings;
};

export function requireAuthority(ctx: EngineContext, signer: string): void {
    ensure(signer === ctx.settings.authority, 'Unauthorized', 'signer is not the authority');
}

// Runs `fn` in one SQLite transaction; any throw rolls every write back.
export function atomically<T>(ctx: EngineContext, fn: () => T): T {
    return ctx.db.transaction(fn)();
}
