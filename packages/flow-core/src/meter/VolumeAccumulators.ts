import type { DateTime } from "luxon";

export interface AccumulatorState {
    volumeMl: number;
    targetResetAt: DateTime;
}

/**
 * Named running totals fed with every recorded volume delta.
 *
 * An accumulator is reset only on request; reaching its target instant does
 * nothing on its own, the engine decides when a period is over.
 */
export class VolumeAccumulators {
    private accumulators = new Map<string, AccumulatorState>();

    get names(): string[] {
        return [...this.accumulators.keys()];
    }

    /**
     * Registers `name` at 0 mL. Registering a known name starts it over:
     * whatever it held is already part of the caller's baseline.
     */
    add(name: string, targetResetAt: DateTime): void {
        this.accumulators.set(name, { volumeMl: 0, targetResetAt });
    }

    reset(name: string, nextTargetResetAt: DateTime): void {
        this.accumulators.set(name, { volumeMl: 0, targetResetAt: nextTargetResetAt });
    }

    record(volumeMl: number): void {
        if (!Number.isFinite(volumeMl) || volumeMl <= 0) return;
        for (const state of this.accumulators.values()) {
            state.volumeMl += volumeMl;
        }
    }

    volume(name: string): number {
        return this.accumulators.get(name)?.volumeMl ?? 0;
    }

    targetResetAt(name: string): DateTime | null {
        return this.accumulators.get(name)?.targetResetAt ?? null;
    }
}
