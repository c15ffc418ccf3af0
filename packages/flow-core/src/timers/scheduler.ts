import { msToNs, nowNs, sleepUntilNs } from "./timing.js";

export interface Tick {
    /** 0 for the first tick, which fires at once. */
    tickId: number;
    /** How long after its slot the tick fired. */
    latenessMs: number;
    /** Slots dropped before this one because the consumer fell behind. */
    skippedSlots: number;
}

export interface FixedRateOptions {
    periodMs: number;
    signal?: AbortSignal;
}

/**
 * Ticks on the slots `start + n * periodMs` of the monotonic clock until
 * `signal` aborts. A consumer that falls behind (slow save, suspended host)
 * resumes at the next slot still ahead; missed slots are reported through
 * `skippedSlots`, never replayed.
 */
export async function* fixedRateTicks({ periodMs, signal }: FixedRateOptions): AsyncGenerator<Tick> {
    if (!Number.isFinite(periodMs) || periodMs <= 0) {
        throw new Error("fixedRateTicks: periodMs must be a positive number");
    }
    const periodNs = msToNs(periodMs);
    const originNs = nowNs();
    let slot = 0n;
    let skippedSlots = 0;

    for (let tickId = 0; !signal?.aborted; tickId++) {
        const dueNs = originNs + slot * periodNs;
        await sleepUntilNs(dueNs, signal);
        if (signal?.aborted) return;

        const firedNs = nowNs();
        const lateNs = firedNs > dueNs ? firedNs - dueNs : 0n;
        yield { tickId, latenessMs: Number(lateNs) / 1e6, skippedSlots };

        // slot after the one the clock is in now, at least one step forward
        const afterNow = (nowNs() - originNs) / periodNs + 1n;
        const nextSlot = afterNow > slot + 1n ? afterNow : slot + 1n;
        skippedSlots = Number(nextSlot - slot - 1n);
        slot = nextSlot;
    }
}
