import { DateTime } from "luxon";
import { PERIODS, mapPeriods, toIsoString, type PeriodName } from "../period/calendar.js";
import type { FlowStatsEntry, ValueEntry } from "../window/SlidingWindowBuffer.js";

export interface PeriodSnapshot {
    volume: number; // litres, live accumulator included
    resetAt: DateTime;
}

/**
 * Point-in-time copy of everything the engine needs to resume.
 */
export interface EngineSnapshot {
    periods: Record<PeriodName, PeriodSnapshot>;
    hourlyMaxFlow: number;
    hourlyMinFlow: number | null;
    flowSamples: ValueEntry[];
    hourlyConsumption: ValueEntry[];
    dailyConsumption: ValueEntry[];
    hourlyFlowStats: FlowStatsEntry[];
    waterLeakDetected: boolean;
}

// JSON shape on disk
export interface StoredPeriod {
    volume: number;
    reset_at: string;
}

export interface StoredSnapshot {
    periods: Record<PeriodName, StoredPeriod>;
    hourly_max_flow: number;
    hourly_min_flow: number | null;
    flow_samples: [number, number][];
    hourly_consumption: [number, number][];
    daily_consumption: [number, number][];
    hourly_flow_stats: [number, number, number][];
    water_leak_detected: boolean;
}

export function encodeSnapshot(snapshot: EngineSnapshot): StoredSnapshot {
    return {
        periods: mapPeriods((name) => ({
            volume: snapshot.periods[name].volume,
            reset_at: toIsoString(snapshot.periods[name].resetAt),
        })),
        hourly_max_flow: snapshot.hourlyMaxFlow,
        hourly_min_flow: snapshot.hourlyMinFlow,
        flow_samples: snapshot.flowSamples.map((e) => [e.ts, e.value]),
        hourly_consumption: snapshot.hourlyConsumption.map((e) => [e.ts, e.value]),
        daily_consumption: snapshot.dailyConsumption.map((e) => [e.ts, e.value]),
        hourly_flow_stats: snapshot.hourlyFlowStats.map((e) => [e.ts, e.max, e.min]),
        water_leak_detected: snapshot.waterLeakDetected,
    };
}

export function emptySnapshot(now: DateTime): EngineSnapshot {
    return {
        periods: mapPeriods(() => ({ volume: 0, resetAt: now })),
        hourlyMaxFlow: 0,
        hourlyMinFlow: null,
        flowSamples: [],
        hourlyConsumption: [],
        dailyConsumption: [],
        hourlyFlowStats: [],
        waterLeakDetected: false,
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
    return typeof value === "number" && Number.isFinite(value);
}

function nonNegative(value: unknown, fallback: number): number {
    return isFiniteNumber(value) && value >= 0 ? value : fallback;
}

function parseResetAt(value: unknown, now: DateTime, zone: string): DateTime {
    if (typeof value !== "string") return now;
    const parsed = DateTime.fromISO(value, { setZone: true });
    return parsed.isValid ? parsed.setZone(zone) : now;
}

function isNumberRow(row: unknown, length: number): row is number[] {
    return Array.isArray(row) && row.length === length && row.every(isFiniteNumber);
}

function decodeValueRows(value: unknown): ValueEntry[] {
    if (!Array.isArray(value)) return [];
    const rows: ValueEntry[] = [];
    for (const row of value) {
        if (isNumberRow(row, 2)) rows.push({ ts: row[0], value: row[1] });
    }
    return rows;
}

function decodeStatsRows(value: unknown): FlowStatsEntry[] {
    if (!Array.isArray(value)) return [];
    const rows: FlowStatsEntry[] = [];
    for (const row of value) {
        if (isNumberRow(row, 3)) rows.push({ ts: row[0], max: row[1], min: row[2] });
    }
    return rows;
}

/**
 * Field-by-field decode of a stored document. Never throws: every field that
 * is missing or malformed falls back to its fresh-install default, and
 * timestamps that do not parse become `now`.
 */
export function decodeSnapshot(raw: unknown, now: DateTime, zone: string): EngineSnapshot {
    const snapshot = emptySnapshot(now);
    if (!isRecord(raw)) return snapshot;

    const periods: Record<string, unknown> = isRecord(raw.periods) ? raw.periods : {};
    for (const name of PERIODS) {
        const stored = periods[name];
        if (!isRecord(stored)) continue;
        snapshot.periods[name] = {
            volume: nonNegative(stored.volume, 0),
            resetAt: parseResetAt(stored.reset_at, now, zone),
        };
    }

    snapshot.hourlyMaxFlow = nonNegative(raw.hourly_max_flow, 0);
    // null means no sample yet this hour and must survive the round trip
    const minFlow = raw.hourly_min_flow;
    snapshot.hourlyMinFlow = isFiniteNumber(minFlow) && minFlow >= 0 ? minFlow : null;
    snapshot.flowSamples = decodeValueRows(raw.flow_samples);
    snapshot.hourlyConsumption = decodeValueRows(raw.hourly_consumption);
    snapshot.dailyConsumption = decodeValueRows(raw.daily_consumption);
    snapshot.hourlyFlowStats = decodeStatsRows(raw.hourly_flow_stats);
    snapshot.waterLeakDetected = raw.water_leak_detected === true;

    return snapshot;
}
