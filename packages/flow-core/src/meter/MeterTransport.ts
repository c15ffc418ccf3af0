import type { DateTime } from "luxon";

/**
 * What the accounting engine needs from a meter connection.
 * Flow rates are L/min, volumes are mL.
 */
export interface MeterTransport {
    getFlowRate(): number;
    /** volume since the previous call; reading it resets it */
    getVolumeDelta(): number;
    getAvailability(): boolean;
    /** mL since the named accumulator was last reset, 0 for an unknown name */
    getAccumulatedVolume(name: string): number;
    addAccumulator(name: string, targetResetAt: DateTime): void;
    resetAccumulator(name: string, nextTargetResetAt: DateTime): void;
}

export interface MeterReading {
    flowRate: number;
    volumeDelta: number;
    available: boolean;
}

export type PushResult = { ok: true } | { ok: false; reason: string };
