import type { DateTime } from "luxon";
import type { MeterReading, MeterTransport, PushResult } from "./MeterTransport.js";
import { VolumeAccumulators } from "./VolumeAccumulators.js";

export interface PushInput {
    flowRate?: number;
    volumeDelta?: number;
    available?: boolean;
}

export type ReadingListener = (reading: MeterReading) => void;

function isNonNegative(value: unknown): value is number {
    return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

/**
 * In-process meter fed by telemetry pushes (HTTP, demo generator, tests).
 *
 * Deltas pile up until the engine reads them, so two pushes between ticks
 * are never lost. Accumulators see every delta as soon as it is pushed.
 */
export class PushMeter implements MeterTransport {
    readonly accumulators = new VolumeAccumulators();

    private flowRate = 0;
    private pendingDeltaMl = 0;
    private available = false;
    private listeners = new Set<ReadingListener>();

    push(input: PushInput): PushResult {
        if (input.available === false) {
            this.available = false;
            this.notify({ flowRate: this.flowRate, volumeDelta: 0, available: false });
            return { ok: true };
        }
        if (!isNonNegative(input.flowRate)) {
            return { ok: false, reason: "invalid_flow_rate" };
        }
        if (!isNonNegative(input.volumeDelta)) {
            return { ok: false, reason: "invalid_volume_delta" };
        }

        this.available = true;
        this.flowRate = input.flowRate;
        this.pendingDeltaMl += input.volumeDelta;
        this.accumulators.record(input.volumeDelta);

        this.notify({ flowRate: input.flowRate, volumeDelta: input.volumeDelta, available: true });
        return { ok: true };
    }

    markUnavailable(): void {
        this.push({ available: false });
    }

    /**
     * Returns an unsubscribe function.
     */
    onReading(listener: ReadingListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    getFlowRate(): number {
        return this.flowRate;
    }

    getVolumeDelta(): number {
        const delta = this.pendingDeltaMl;
        this.pendingDeltaMl = 0;
        return delta;
    }

    getAvailability(): boolean {
        return this.available;
    }

    getAccumulatedVolume(name: string): number {
        return this.accumulators.volume(name);
    }

    addAccumulator(name: string, targetResetAt: DateTime): void {
        this.accumulators.add(name, targetResetAt);
    }

    resetAccumulator(name: string, nextTargetResetAt: DateTime): void {
        this.accumulators.reset(name, nextTargetResetAt);
    }

    private notify(reading: MeterReading): void {
        for (const listener of this.listeners) {
            listener(reading);
        }
    }
}
