import { EventEmitter } from "node:events";
import { DateTime } from "luxon";
import { costForVolume, isUnitSystem, type UnitSystem } from "../analysis/estimateCost.js";
import { LeakDetector, type LeakEvent } from "../leak/LeakDetector.js";
import type { MeterTransport } from "../meter/MeterTransport.js";
import {
    BOUNDARY_ORDER,
    PERIODS,
    PERIOD_RULES,
    assertValidZone,
    mapPeriods,
    type PeriodName,
} from "../period/calendar.js";
import { PeriodAccount, type CaughtUpPeriod, type FinalizedPeriod } from "../period/PeriodAccount.js";
import { emptySnapshot, type EngineSnapshot } from "../persistence/snapshot.js";
import {
    SlidingWindowBuffer,
    pickMax,
    pickMin,
    pickValue,
    type FlowStatsEntry,
    type ValueEntry,
} from "../window/SlidingWindowBuffer.js";

export type LogMode = "silent" | "info" | "debug";

const HOUR_S = 3600;
const DAY_S = 24 * HOUR_S;
const WEEK_S = 7 * DAY_S;
const MONTH_S = 30 * DAY_S;

export interface AccountingEngineOptions {
    meter: MeterTransport;
    zone: string; // IANA zone used for every calendar boundary
    tariff?: number;
    unitSystem?: UnitSystem;
    leakThreshold?: number; // L/min
    clock?: () => DateTime;
    log?: LogMode;
}

export interface FlowStatistics {
    avgFlow1h: number | null;
    peakFlow24h: number | null;
    peakFlow7d: number | null;
    minFlow24h: number | null;
    avgHourly24h: number | null;
    peakHourly24h: number | null;
    peakHourly7d: number | null;
    avgDaily7d: number | null;
    avgDaily30d: number | null;
    peakDaily30d: number | null;
}

export interface BufferCounts {
    flowSamples: number;
    hourlyConsumption: number;
    hourlyFlowStats: number;
    dailyConsumption: number;
}

function assertNonNegative(name: string, value: number): void {
    if (!Number.isFinite(value) || value < 0) {
        throw new Error(`${name} must be a non-negative number (got ${value})`);
    }
}

/**
 * Period totals, rolling statistics and leak state derived from one meter.
 *
 * Every mutation (`start`, `onTick`, setters) runs synchronously, so a reader
 * on the event loop never sees a half-applied tick. Emits `update` after
 * every tick, available or not.
 */
export class AccountingEngine extends EventEmitter {
    readonly zone: string;
    private readonly meter: MeterTransport;
    private readonly clock: () => DateTime;
    private readonly logMode: LogMode;

    private _tariff: number;
    private _unitSystem: UnitSystem;
    private _leakThreshold: number;

    private readonly accounts: Record<PeriodName, PeriodAccount>;
    private readonly flowSamples = new SlidingWindowBuffer<ValueEntry>({ retentionSeconds: HOUR_S });
    private readonly hourlyConsumption = new SlidingWindowBuffer<ValueEntry>({ retentionSeconds: WEEK_S });
    private readonly hourlyFlowStats = new SlidingWindowBuffer<FlowStatsEntry>({ retentionSeconds: WEEK_S });
    private readonly dailyConsumption = new SlidingWindowBuffer<ValueEntry>({ retentionSeconds: MONTH_S });
    private readonly leak = new LeakDetector();

    // within-hour flow extremes, min stays null until the hour's first sample
    private hourlyMax = 0;
    private hourlyMin: number | null = null;

    private _available = false;
    private _flowRate = 0;
    private _volumeDelta = 0;
    private _volumeLastReset: DateTime | null = null;

    constructor(options: AccountingEngineOptions) {
        super();
        assertValidZone(options.zone);
        this.zone = options.zone;
        this.meter = options.meter;
        this.clock = options.clock ?? (() => DateTime.now().setZone(options.zone));
        this.logMode = options.log ?? "info";

        const tariff = options.tariff ?? 0;
        const leakThreshold = options.leakThreshold ?? 0;
        assertNonNegative("tariff", tariff);
        assertNonNegative("leakThreshold", leakThreshold);
        this._tariff = tariff;
        this._leakThreshold = leakThreshold;
        this._unitSystem = options.unitSystem ?? "metric";

        const now = this.clock();
        this.accounts = mapPeriods((name) => new PeriodAccount(PERIOD_RULES[name], { baseline: 0, resetAt: now }));
    }

    // ---------- lifecycle ----------

    /**
     * Adopts a decoded snapshot, or fresh-install defaults when there is none.
     */
    restore(snapshot: EngineSnapshot | null, now: DateTime = this.clock()): void {
        const source = snapshot ?? emptySnapshot(now);
        for (const name of PERIODS) {
            const period = source.periods[name];
            this.accounts[name].restore({ baseline: period.volume, resetAt: period.resetAt.setZone(this.zone) });
        }
        this.hourlyMax = source.hourlyMaxFlow;
        this.hourlyMin = source.hourlyMinFlow;
        this.flowSamples.replace(source.flowSamples);
        this.hourlyConsumption.replace(source.hourlyConsumption);
        this.dailyConsumption.replace(source.dailyConsumption);
        this.hourlyFlowStats.replace(source.hourlyFlowStats);
        this.leak.restore(source.waterLeakDetected);
    }

    /**
     * Finalizes every period whose boundary passed while nothing was running.
     * Must run before the accumulators are registered: there is no live
     * reading yet, so the persisted baseline is the whole finalized volume.
     */
    handleStaleBoundaries(now: DateTime = this.clock()): CaughtUpPeriod[] {
        const caughtUp: CaughtUpPeriod[] = [];
        for (const name of BOUNDARY_ORDER) {
            const finalized = this.accounts[name].catchUp(now);
            if (finalized === null) continue;

            if (name === "hourly") {
                this.hourlyConsumption.append({ ts: finalized.periodStart.toSeconds(), value: finalized.volume });
                this.resetFlowTrackers();
            } else if (name === "daily") {
                this.dailyConsumption.append({ ts: finalized.periodStart.toSeconds(), value: finalized.volume });
            }
            this.debug(`catch-up ${name}: ${finalized.volume.toFixed(3)} L since ${finalized.periodStart.toISO()}`);
            caughtUp.push(finalized);
        }
        return caughtUp;
    }

    registerAccumulators(now: DateTime = this.clock()): void {
        for (const name of PERIODS) {
            this.meter.addAccumulator(name, PERIOD_RULES[name].nextBoundary(now));
        }
    }

    start(snapshot: EngineSnapshot | null, now: DateTime = this.clock()): void {
        this.restore(snapshot, now);
        this.handleStaleBoundaries(now);
        this.registerAccumulators(now);
    }

    // ---------- tick ----------

    /**
     * One telemetry tick. An unavailable meter freezes all state.
     *
     * The sample reaches the flow trackers before boundaries are checked, so
     * the tick that crosses the hour closes the hour it was read in. The new
     * hour starts with empty trackers.
     */
    onTick(now: DateTime = this.clock()): FinalizedPeriod[] {
        if (!this.meter.getAvailability()) {
            this._available = false;
            this.emit("update");
            return [];
        }

        const nowTs = now.toSeconds();
        const flowRate = this.meter.getFlowRate();
        this._available = true;
        this._flowRate = flowRate;
        this._volumeDelta = this.meter.getVolumeDelta();
        this._volumeLastReset = now;

        this.hourlyMax = Math.max(this.hourlyMax, flowRate);
        this.hourlyMin = this.hourlyMin === null ? flowRate : Math.min(this.hourlyMin, flowRate);

        const finalized = this.checkBoundaries(now);

        this.flowSamples.append({ ts: nowTs, value: flowRate });
        this.trimBuffers(nowTs);

        const transition = this.leak.evaluate(this.minFlow24h(nowTs), this._leakThreshold);
        if (transition !== null) this.logLeak(transition);

        this.emit("update");
        return finalized;
    }

    private checkBoundaries(now: DateTime): FinalizedPeriod[] {
        const finalized: FinalizedPeriod[] = [];
        // hour before day: the last hour is archived before the day baseline goes
        for (const name of BOUNDARY_ORDER) {
            const account = this.accounts[name];
            if (!account.crossed(now)) continue;

            const result = account.finalizeAndReset(now, this.meter.getAccumulatedVolume(name));
            this.meter.resetAccumulator(name, result.nextResetAt);
            this.archive(result);
            this.debug(`${name} finalized: ${result.volume.toFixed(3)} L since ${result.periodStart.toISO()}`);
            finalized.push(result);
        }
        return finalized;
    }

    private archive(result: FinalizedPeriod): void {
        const ts = result.periodStart.toSeconds();
        if (result.period === "hourly") {
            this.hourlyConsumption.append({ ts, value: result.volume });
            if (this.hourlyMin !== null) {
                this.hourlyFlowStats.append({ ts, max: this.hourlyMax, min: this.hourlyMin });
            }
            this.resetFlowTrackers();
        } else if (result.period === "daily") {
            this.dailyConsumption.append({ ts, value: result.volume });
        }
    }

    private resetFlowTrackers(): void {
        this.hourlyMax = 0;
        this.hourlyMin = null;
    }

    private trimBuffers(nowTs: number): void {
        this.flowSamples.trim(nowTs);
        this.hourlyConsumption.trim(nowTs);
        this.hourlyFlowStats.trim(nowTs);
        this.dailyConsumption.trim(nowTs);
    }

    /**
     * Copy of the current state with live accumulator readings folded into
     * the period volumes, ready for encodeSnapshot.
     */
    toSnapshot(): EngineSnapshot {
        return {
            periods: mapPeriods((name) => ({ volume: this.volume(name), resetAt: this.accounts[name].resetAt })),
            hourlyMaxFlow: this.hourlyMax,
            hourlyMinFlow: this.hourlyMin,
            flowSamples: this.flowSamples.entries(),
            hourlyConsumption: this.hourlyConsumption.entries(),
            dailyConsumption: this.dailyConsumption.entries(),
            hourlyFlowStats: this.hourlyFlowStats.entries(),
            waterLeakDetected: this.leak.isLeaking,
        };
    }

    // ---------- instantaneous values ----------

    get available(): boolean {
        return this._available;
    }

    get flowRate(): number {
        return this._flowRate;
    }

    get volumeDelta(): number {
        return this._volumeDelta;
    }

    get volumeLastReset(): DateTime | null {
        return this._volumeLastReset;
    }

    get hourlyMaxFlow(): number {
        return this.hourlyMax;
    }

    get hourlyMinFlow(): number | null {
        return this.hourlyMin;
    }

    // ---------- periods ----------

    volume(period: PeriodName): number {
        return this.accounts[period].currentVolume(this.meter.getAccumulatedVolume(period));
    }

    resetAt(period: PeriodName): DateTime {
        return this.accounts[period].resetAt;
    }

    cost(period: PeriodName): number {
        return costForVolume(this.volume(period), this._tariff, this._unitSystem);
    }

    // ---------- statistics ----------

    avgFlow1h(nowTs: number = this.clock().toSeconds()): number | null {
        return this.flowSamples.average(HOUR_S, nowTs, pickValue);
    }

    peakFlow24h(nowTs: number = this.clock().toSeconds()): number | null {
        return this.hourlyFlowStats.max(DAY_S, nowTs, pickMax);
    }

    peakFlow7d(nowTs: number = this.clock().toSeconds()): number | null {
        return this.hourlyFlowStats.max(WEEK_S, nowTs, pickMax);
    }

    minFlow24h(nowTs: number = this.clock().toSeconds()): number | null {
        return this.hourlyFlowStats.min(DAY_S, nowTs, pickMin);
    }

    avgHourly24h(nowTs: number = this.clock().toSeconds()): number | null {
        return this.hourlyConsumption.average(DAY_S, nowTs, pickValue);
    }

    peakHourly24h(nowTs: number = this.clock().toSeconds()): number | null {
        return this.hourlyConsumption.max(DAY_S, nowTs, pickValue);
    }

    peakHourly7d(nowTs: number = this.clock().toSeconds()): number | null {
        return this.hourlyConsumption.max(WEEK_S, nowTs, pickValue);
    }

    avgDaily7d(nowTs: number = this.clock().toSeconds()): number | null {
        return this.dailyConsumption.average(WEEK_S, nowTs, pickValue);
    }

    avgDaily30d(nowTs: number = this.clock().toSeconds()): number | null {
        return this.dailyConsumption.average(MONTH_S, nowTs, pickValue);
    }

    peakDaily30d(nowTs: number = this.clock().toSeconds()): number | null {
        return this.dailyConsumption.max(MONTH_S, nowTs, pickValue);
    }

    statistics(now: DateTime = this.clock()): FlowStatistics {
        const ts = now.toSeconds();
        return {
            avgFlow1h: this.avgFlow1h(ts),
            peakFlow24h: this.peakFlow24h(ts),
            peakFlow7d: this.peakFlow7d(ts),
            minFlow24h: this.minFlow24h(ts),
            avgHourly24h: this.avgHourly24h(ts),
            peakHourly24h: this.peakHourly24h(ts),
            peakHourly7d: this.peakHourly7d(ts),
            avgDaily7d: this.avgDaily7d(ts),
            avgDaily30d: this.avgDaily30d(ts),
            peakDaily30d: this.peakDaily30d(ts),
        };
    }

    get bufferCounts(): BufferCounts {
        return {
            flowSamples: this.flowSamples.count,
            hourlyConsumption: this.hourlyConsumption.count,
            hourlyFlowStats: this.hourlyFlowStats.count,
            dailyConsumption: this.dailyConsumption.count,
        };
    }

    // ---------- leak ----------

    get waterLeakDetected(): boolean {
        return this.leak.isLeaking;
    }

    get pendingLeakEvent(): LeakEvent | null {
        return this.leak.pendingEvent;
    }

    drainPendingLeakEvent(): LeakEvent | null {
        return this.leak.drain();
    }

    // ---------- runtime settings ----------

    get tariff(): number {
        return this._tariff;
    }

    get unitSystem(): UnitSystem {
        return this._unitSystem;
    }

    get leakThreshold(): number {
        return this._leakThreshold;
    }

    setTariff(value: number): void {
        assertNonNegative("tariff", value);
        this._tariff = value;
    }

    setLeakThreshold(value: number): void {
        assertNonNegative("leakThreshold", value);
        this._leakThreshold = value;
    }

    setUnitSystem(value: string): void {
        if (!isUnitSystem(value)) {
            throw new Error(`unitSystem must be "metric" or "imperial" (got ${value})`);
        }
        this._unitSystem = value;
    }

    // ---------- logging ----------

    private debug(message: string): void {
        if (this.logMode === "debug") console.debug(`[engine] ${message}`);
    }

    private logLeak(event: LeakEvent): void {
        if (this.logMode === "silent") return;
        const detail = `min flow 24h ${event.data.minFlow} L/min, threshold ${event.data.threshold} L/min`;
        if (event.kind === "water_leak_detected") {
            console.warn(`[engine] water leak detected (${detail})`);
        } else {
            console.info(`[engine] water leak cleared (${detail})`);
        }
    }
}
