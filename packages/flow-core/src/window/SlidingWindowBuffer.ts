export interface TimedEntry {
    ts: number; // epoch seconds
}

export interface ValueEntry extends TimedEntry {
    value: number;
}

export interface FlowStatsEntry extends TimedEntry {
    max: number;
    min: number;
}

export interface SlidingWindowOptions {
    retentionSeconds: number;
}

export type Selector<T> = (entry: T) => number;


/**
 * Time-ordered append-and-trim buffer with a fixed retention horizon.
 *
 * Entries are expected in non-decreasing `ts` order. An out-of-order entry
 * never faults, it only delays its own eviction until the entries before it
 * have aged out.
 */
export class SlidingWindowBuffer<T extends TimedEntry> {
    readonly retentionSeconds: number;
    private buffer: T[] = [];

    constructor(options: SlidingWindowOptions) {
        if (!Number.isFinite(options.retentionSeconds) || options.retentionSeconds <= 0) {
            throw new Error("Sliding window retention must be a positive number of seconds");
        }
        this.retentionSeconds = options.retentionSeconds;
    }

    get count(): number {
        return this.buffer.length;
    }

    append(entry: T): void {
        this.buffer.push(entry);
    }

    /**
     * Drops leading entries older than `nowTs - retentionSeconds`.
     */
    trim(nowTs: number): void {
        const cutoff = nowTs - this.retentionSeconds;
        let drop = 0;
        while (drop < this.buffer.length && this.buffer[drop].ts < cutoff) {
            drop++;
        }
        if (drop > 0) {
            this.buffer.splice(0, drop);
        }
    }

    entries(): T[] {
        return this.buffer.slice();
    }

    replace(entries: readonly T[]): void {
        this.buffer = entries.slice();
    }

    average(windowSeconds: number, nowTs: number, pick: Selector<T>): number | null {
        const values = this.windowValues(windowSeconds, nowTs, pick);
        if (values.length === 0) return null;
        let sum = 0;
        for (const v of values) sum += v;
        return sum / values.length;
    }

    max(windowSeconds: number, nowTs: number, pick: Selector<T>): number | null {
        return this.fold(windowSeconds, nowTs, pick, (acc, v) => (v > acc ? v : acc));
    }

    min(windowSeconds: number, nowTs: number, pick: Selector<T>): number | null {
        return this.fold(windowSeconds, nowTs, pick, (acc, v) => (v < acc ? v : acc));
    }

    private fold(
        windowSeconds: number,
        nowTs: number,
        pick: Selector<T>,
        step: (acc: number, value: number) => number
    ): number | null {
        let acc: number | null = null;
        for (const value of this.windowValues(windowSeconds, nowTs, pick)) {
            acc = acc === null ? value : step(acc, value);
        }
        return acc;
    }

    private windowValues(windowSeconds: number, nowTs: number, pick: Selector<T>): number[] {
        const cutoff = nowTs - windowSeconds;
        const values: number[] = [];
        for (const entry of this.buffer) {
            if (entry.ts >= cutoff) values.push(pick(entry));
        }
        return values;
    }
}

export const pickValue = (entry: ValueEntry) => entry.value;
export const pickMax = (entry: FlowStatsEntry) => entry.max;
export const pickMin = (entry: FlowStatsEntry) => entry.min;
