export type ClockReading = {
    epoch: number;
    tick: number;
    unixTimestamp: number; // seconds
};

export interface Clock {
    now(): ClockReading;
}

export class EpochSchedule {
    constructor(readonly ticksPerEpoch: number) {}

    epochOf(tick: number): number {
        return Math.floor(tick / this.ticksPerEpoch);
    }

    firstTickOf(epoch: number): number {
        return epoch * this.ticksPerEpoch;
    }

    lastTickOf(epoch: number): number {
        return this.firstTickOf(epoch) + this.ticksPerEpoch - 1;
    }
}

// Wall-clock ticks counted from a genesis timestamp.
export class SystemClock implements Clock {
    constructor(
        private readonly schedule: EpochSchedule,
        private readonly genesisMs: number,
        private readonly tickMs: number,
    ) {}

    now(): ClockReading {
        const nowMs = Date.now();
        const tick = Math.max(0, Math.floor((nowMs - this.genesisMs) / this.tickMs));
        return {
            epoch: this.schedule.epochOf(tick),
            tick,
            unixTimestamp: Math.floor(nowMs / 1000),
        };
    }
}

/**
 * True while more than `cutoffTicks` remain before the epoch's last tick.
 * When the clock and the schedule disagree on the epoch the check is
 * skipped and staking stays open.
 */
export function isBettingStillOpen(clock: ClockReading, schedule: EpochSchedule, cutoffTicks: number): boolean {
    const scheduledEpoch = schedule.epochOf(clock.tick);
    if (scheduledEpoch !== clock.epoch) {
        console.warn(
            `[staking] Epoch mismatch: clock.epoch=${clock.epoch} schedule.epochOf(${clock.tick})=${scheduledEpoch}; skipping cutoff`,
        );
        return true;
    }
    const remaining = Math.max(0, schedule.lastTickOf(scheduledEpoch) - clock.tick);
    return remaining > cutoffTicks;
}
