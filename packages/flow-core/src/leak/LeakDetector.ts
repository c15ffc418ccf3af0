export type LeakEventKind = "water_leak_detected" | "water_leak_cleared";

export interface LeakEvent {
    kind: LeakEventKind;
    data: {
        minFlow: number; // L/min, lowest hourly minimum of the trailing 24h
        threshold: number;
    };
}

/**
 * Two-state classifier over the trailing 24h minimum flow.
 *
 * A meter that never goes idle (minimum stays above the threshold for a full
 * day) is a leak; a single hour at or below the threshold clears it.
 */
export class LeakDetector {
    private leaking: boolean;
    private pending: LeakEvent | null = null;

    constructor(leaking = false) {
        this.leaking = leaking;
    }

    get isLeaking(): boolean {
        return this.leaking;
    }

    get pendingEvent(): LeakEvent | null {
        return this.pending;
    }

    /**
     * Returns the transition that happened on this call, if any.
     * `null` input (no hourly stats yet) never transitions.
     */
    evaluate(minFlow: number | null, threshold: number): LeakEvent | null {
        if (minFlow === null) return null;

        const leakingNow = minFlow > threshold;
        if (leakingNow === this.leaking) return null;

        this.leaking = leakingNow;
        // an undrained event is superseded, only the latest transition is kept
        this.pending = {
            kind: leakingNow ? "water_leak_detected" : "water_leak_cleared",
            data: { minFlow, threshold },
        };
        return this.pending;
    }

    drain(): LeakEvent | null {
        const event = this.pending;
        this.pending = null;
        return event;
    }

    restore(leaking: boolean): void {
        this.leaking = leaking;
        this.pending = null;
    }
}
