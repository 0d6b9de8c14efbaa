import { describe, expect, test } from 'vitest';
import { crankHttp, planSettlement, singleFlight, type PoolView } from '../src/api/resolver-puller.js';
import type { ResolverProposal } from '../src/api/schemas.js';
import { RESOLVER_TIMEOUT_MS } from '../src/config.js';

const pool: PoolView = {
    tier: 1,
    epoch: 10,
    totalCount: 2,
    blockedNumber: 5,
    countPerNumber: [0, 0, 0, 1, 0, 0, 0, 1, 0, 0],
};

const proposal = (winningNumber: number): ResolverProposal => ({
    epoch: 10,
    tier: 1,
    winningNumber,
    rngTick: 10_999,
    rngSeed: '07'.repeat(32),
    totalWinners: 1,
    protocolFee: '10000000',
    netPrizePool: '190000000',
    merkleRoot: '01'.repeat(32),
    resultsPointer: 'ar://results',
});

describe('planSettlement', () => {
    test('waits while the epoch is open', () => {
        expect(planSettlement(pool, 10, undefined, proposal(7))).toEqual([]);
    });

    test('skips a pool without stakes', () => {
        expect(planSettlement({ ...pool, totalCount: 0 }, 11, undefined, proposal(7))).toEqual([]);
    });

    test('ignores a proposal for another epoch', () => {
        expect(planSettlement(pool, 11, undefined, { ...proposal(7), epoch: 9 })).toEqual([]);
    });

    test('opens and finalizes a ledger when someone won', () => {
        expect(planSettlement(pool, 11, undefined, proposal(7))).toEqual(['init', 'finalize']);
    });

    test('rolls over on a rollover number', () => {
        expect(planSettlement(pool, 11, undefined, proposal(0))).toEqual(['rollover']);
        expect(planSettlement(pool, 11, undefined, proposal(5))).toEqual(['rollover']);
    });

    test('rolls over when nobody covered the number', () => {
        expect(planSettlement(pool, 11, undefined, proposal(4))).toEqual(['rollover']);
    });

    test('continues a ledger already in flight', () => {
        expect(planSettlement(pool, 11, 'processing', proposal(7))).toEqual(['finalize']);
        expect(planSettlement(pool, 11, 'failed', proposal(7))).toEqual(['reprocess', 'finalize']);
        expect(planSettlement(pool, 11, 'resolved', proposal(7))).toEqual([]);
    });
});

describe('singleFlight', () => {
    test('skips a tick while the previous poll is still running', async () => {
        let finish = () => {};
        let runs = 0;
        const poll = singleFlight(async () => {
            runs += 1;
            await new Promise<void>((resolve) => {
                finish = resolve;
            });
        });

        const first = poll();
        expect(await poll()).toBe(false);
        finish();
        expect(await first).toBe(true);
        expect(runs).toBe(1);
    });

    test('runs again once the previous poll settles, even after a failure', async () => {
        let fail = true;
        const poll = singleFlight(async () => {
            if (fail) throw new Error('resolver down');
        });

        await expect(poll()).rejects.toThrow('resolver down');
        fail = false;
        expect(await poll()).toBe(true);
    });
});

describe('crankHttp', () => {
    test('bounds every request with the resolver timeout', () => {
        expect(crankHttp.defaults.timeout).toBe(RESOLVER_TIMEOUT_MS);
        expect(RESOLVER_TIMEOUT_MS).toBeGreaterThan(0);
    });
});
