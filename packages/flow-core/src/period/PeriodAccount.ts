import type { DateTime } from "luxon";
import type { PeriodName, PeriodRule } from "./calendar.js";

// the meter's accumulators count millilitres, accounts are kept in litres
export const ML_PER_L = 1000;

export interface PeriodState {
    baseline: number; // litres finalized before the live accumulator started
    resetAt: DateTime;
}

export interface FinalizedPeriod {
    period: PeriodName;
    periodStart: DateTime;
    volume: number; // litres
    nextResetAt: DateTime;
}

export interface CaughtUpPeriod {
    period: PeriodName;
    periodStart: DateTime;
    volume: number;
}

export class PeriodAccount {
    readonly rule: PeriodRule;
    private state: PeriodState;

    constructor(rule: PeriodRule, initial: PeriodState) {
        this.rule = rule;
        this.state = { ...initial };
    }

    get name(): PeriodName {
        return this.rule.name;
    }

    get baseline(): number {
        return this.state.baseline;
    }

    get resetAt(): DateTime {
        return this.state.resetAt;
    }

    currentVolume(accumulatedMl: number): number {
        const live = Number.isFinite(accumulatedMl) && accumulatedMl > 0 ? accumulatedMl : 0;
        return this.state.baseline + live / ML_PER_L;
    }

    crossed(now: DateTime): boolean {
        return this.rule.crossed(this.state.resetAt, now);
    }

    /**
     * Archives the running total and starts a new period at `now`.
     * The caller must reset the meter accumulator toward `nextResetAt`.
     */
    finalizeAndReset(now: DateTime, accumulatedMl: number): FinalizedPeriod {
        const volume = this.currentVolume(accumulatedMl);
        const periodStart = this.state.resetAt;
        // single assignment: readers see either the old or the new period, never a mix
        this.state = { baseline: 0, resetAt: now };
        return { period: this.name, periodStart, volume, nextResetAt: this.rule.nextBoundary(now) };
    }

    /**
     * Startup variant of finalizeAndReset: no accumulator exists yet, so the
     * persisted baseline is the whole period.
     */
    catchUp(now: DateTime): CaughtUpPeriod | null {
        if (!this.crossed(now)) return null;
        const finalized = { period: this.name, periodStart: this.state.resetAt, volume: this.state.baseline };
        this.state = { baseline: 0, resetAt: now };
        return finalized;
    }

    restore(state: PeriodState): void {
        this.state = { ...state };
    }
}
