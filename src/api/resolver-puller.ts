import axios from 'axios';
import cron, { type ScheduledTask } from 'node-cron';
import { z } from 'zod';
import { API_BASE, AUTHORITY_KEY, RESOLVER_POLL_CRON, RESOLVER_TIMEOUT_MS, RESOLVER_URL } from '../config.js';
import { isRolloverNumber } from '../core/pool.js';
import { ResolverProposalSchema, type ResolverProposal } from './schemas.js';
import type { LedgerStatus } from '../types.js';

const PoolViewSchema = z.object({
    tier: z.number(),
    epoch: z.number(),
    totalCount: z.number(),
    blockedNumber: z.number(),
    countPerNumber: z.array(z.number()).length(10),
});
export type PoolView = z.infer<typeof PoolViewSchema>;

const LedgerViewSchema = z.object({ status: z.enum(['failed', 'processing', 'resolved']) });
const ClockViewSchema = z.object({ epoch: z.number() });
const TiersViewSchema = z.object({ tiers: z.array(z.object({ tier: z.number(), active: z.boolean() })) });

export type SettlementStep = 'rollover' | 'init' | 'reprocess' | 'finalize';

export const crankHttp = axios.create({ timeout: RESOLVER_TIMEOUT_MS });

/**
 * Wraps a poll so that a tick arriving while the previous run is still in
 * flight is skipped. Resolves to false for a skipped tick.
 */
export function singleFlight(run: () => Promise<void>): () => Promise<boolean> {
    let running = false;
    return async () => {
        if (running) return false;
        running = true;
        try {
            await run();
            return true;
        } finally {
            running = false;
        }
    };
}

/**
 * Decides which ledger calls settle a closed epoch. The engine re-checks
 * everything, so a wrong plan fails there instead of paying out.
 */
export function planSettlement(
    pool: PoolView,
    clockEpoch: number,
    ledgerStatus: LedgerStatus | undefined,
    proposal: ResolverProposal,
): SettlementStep[] {
    if (pool.epoch >= clockEpoch || pool.totalCount === 0) return [];
    if (proposal.epoch !== pool.epoch || proposal.tier !== pool.tier) return [];

    switch (ledgerStatus) {
        case 'resolved':
            return [];
        case 'processing':
            return ['finalize'];
        case 'failed':
            return ['reprocess', 'finalize'];
        case undefined: {
            const winning = proposal.winningNumber;
            const nobodyWins = isRolloverNumber(winning, pool.blockedNumber) || pool.countPerNumber[winning] === 0;
            return nobodyWins ? ['rollover'] : ['init', 'finalize'];
        }
    }
}

function stepBody(step: SettlementStep, proposal: ResolverProposal) {
    const { epoch, tier } = proposal;
    switch (step) {
        case 'rollover':
        case 'init':
            return { epoch, tier, winningNumber: proposal.winningNumber, rngTick: proposal.rngTick, rngSeed: proposal.rngSeed };
        case 'reprocess':
            return { epoch, tier };
        case 'finalize':
            return {
                epoch,
                tier,
                protocolFee: proposal.protocolFee,
                netPrizePool: proposal.netPrizePool,
                totalWinners: proposal.totalWinners,
                merkleRoot: proposal.merkleRoot,
                resultsPointer: proposal.resultsPointer,
            };
    }
}

async function fetchLedgerStatus(epoch: number, tier: number): Promise<LedgerStatus | undefined> {
    try {
        const response = await crankHttp.get(`${API_BASE}/api/ledgers/${epoch}/${tier}`);
        return LedgerViewSchema.parse(response.data).status;
    } catch (error) {
        if (axios.isAxiosError(error) && error.response?.status === 404) {
            return undefined;
        }
        throw error;
    }
}

async function settleTier(tier: number, clockEpoch: number): Promise<void> {
    const pool = PoolViewSchema.parse((await crankHttp.get(`${API_BASE}/api/pools/${tier}`)).data);
    if (pool.epoch >= clockEpoch || pool.totalCount === 0) return;

    const proposalResponse = await crankHttp.get(`${RESOLVER_URL}/proposals/${pool.epoch}/${tier}`);
    const parsed = ResolverProposalSchema.safeParse(proposalResponse.data);
    if (!parsed.success) {
        console.error(`[resolver-crank] Invalid proposal for tier ${tier} epoch ${pool.epoch}:`, parsed.error.issues);
        return;
    }

    const steps = planSettlement(pool, clockEpoch, await fetchLedgerStatus(pool.epoch, tier), parsed.data);
    for (const step of steps) {
        console.log(`[resolver-crank] tier ${tier} epoch ${pool.epoch}: ${step}`);
        await crankHttp.post(`${API_BASE}/api/admin/ledgers/${step}`, stepBody(step, parsed.data), {
            headers: { 'x-authority-key': AUTHORITY_KEY },
        });
    }
}

async function pollTiers(): Promise<void> {
    try {
        const clock = ClockViewSchema.parse((await crankHttp.get(`${API_BASE}/api/clock`)).data);
        const { tiers } = TiersViewSchema.parse((await crankHttp.get(`${API_BASE}/api/tiers`)).data);

        for (const { tier, active } of tiers) {
            if (!active) continue;
            try {
                await settleTier(tier, clock.epoch);
            } catch (error) {
                if (axios.isAxiosError(error)) {
                    console.error(`[resolver-crank] tier ${tier} failed:`, error.response?.status, error.response?.data);
                } else {
                    console.error(`[resolver-crank] tier ${tier} failed:`, error);
                }
            }
        }
    } catch (error) {
        console.error('[resolver-crank] Error polling:', error);
    }
}

export const pollOnce = singleFlight(pollTiers);

export function startResolverCrank(): ScheduledTask {
    const task = cron.schedule(RESOLVER_POLL_CRON, () => {
        void pollOnce().then((ran) => {
            if (!ran) console.warn('[resolver-crank] Previous poll still running, skipping tick');
        });
    });
    console.log(`[resolver-crank] Started (${RESOLVER_POLL_CRON}), resolver ${RESOLVER_URL}`);
    return task;
}
