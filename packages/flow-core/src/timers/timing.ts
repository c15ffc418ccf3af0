import process from "node:process";

const NS_PER_MS = 1_000_000n;

/** Monotonic clock, unaffected by wall-clock changes. */
export function nowNs(): bigint {
    return process.hrtime.bigint();
}

export function msToNs(ms: number): bigint {
    return BigInt(Math.round(ms * 1e6));
}

/**
 * Whole milliseconds for setTimeout, rounded up so the wait never ends
 * before the deadline.
 */
export function nsToMsCeil(ns: bigint): number {
    if (ns <= 0n) return 0;
    return Number((ns + NS_PER_MS - 1n) / NS_PER_MS);
}

export function sleepMs(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        signal?.addEventListener("abort", onAbort, { once: true });
    });
}

/**
 * Resolves once the monotonic clock reaches `deadlineNs`, at once when it
 * already has, or early on abort. Callers read `nowNs()` afterwards for the
 * actual wake-up time.
 */
export async function sleepUntilNs(deadlineNs: bigint, signal?: AbortSignal): Promise<void> {
    const remainingNs = deadlineNs - nowNs();
    if (remainingNs <= 0n || signal?.aborted) return;
    await sleepMs(nsToMsCeil(remainingNs), signal);
}
