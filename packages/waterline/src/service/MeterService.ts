import { DateTime } from "luxon";
import {
    fixedRateTicks,
    toIsoString,
    type AccountingEngine,
    type EngineSnapshot,
    type LeakEvent,
    type LogMode,
    type PushMeter,
} from "@waterline/core";
import type { JsonFileStore } from "../store/JsonFileStore.js";

export const MAX_RECENT_EVENTS = 50;

export interface RecordedLeakEvent extends LeakEvent {
    at: string; // ISO instant of the tick that produced it
}

export interface MeterServiceOptions {
    engine: AccountingEngine;
    meter: PushMeter;
    store: JsonFileStore<EngineSnapshot>;
    saveIntervalSeconds: number;
    clock?: () => DateTime;
    log?: LogMode;
}

/**
 * Wires a push meter into the engine, keeps the leak event history and
 * saves the engine state on a fixed schedule and at shutdown.
 */
export class MeterService {
    readonly engine: AccountingEngine;
    readonly meter: PushMeter;
    private readonly store: JsonFileStore<EngineSnapshot>;
    private readonly saveIntervalSeconds: number;
    private readonly clock: () => DateTime;
    private readonly log: LogMode;

    private events: RecordedLeakEvent[] = [];
    private controller: AbortController | null = null;
    private saveLoop: Promise<void> | null = null;
    private unsubscribe: (() => void) | null = null;

    constructor(options: MeterServiceOptions) {
        if (!Number.isFinite(options.saveIntervalSeconds) || options.saveIntervalSeconds <= 0) {
            throw new Error("saveIntervalSeconds must be a positive number");
        }
        this.engine = options.engine;
        this.meter = options.meter;
        this.store = options.store;
        this.saveIntervalSeconds = options.saveIntervalSeconds;
        this.clock = options.clock ?? (() => DateTime.now().setZone(options.engine.zone));
        this.log = options.log ?? "info";
    }

    get running(): boolean {
        return this.controller !== null;
    }

    get recentEvents(): RecordedLeakEvent[] {
        return this.events.slice();
    }

    async start(): Promise<void> {
        if (this.running) return;

        const snapshot = await this.store.load();
        this.engine.start(snapshot, this.clock());
        this.unsubscribe = this.meter.onReading(() => this.tick());

        this.controller = new AbortController();
        this.saveLoop = this.runSaveLoop(this.controller.signal);

        if (this.log !== "silent") {
            console.info(`[service] started (${snapshot ? "restored" : "fresh"} state, zone ${this.engine.zone})`);
        }
    }

    async stop(): Promise<void> {
        if (!this.controller) return;

        this.controller.abort();
        await this.saveLoop;
        this.unsubscribe?.();
        this.controller = null;
        this.saveLoop = null;
        this.unsubscribe = null;

        await this.save();
        if (this.log !== "silent") console.info("[service] stopped");
    }

    /**
     * One engine tick followed by a drain of the leak event it may have raised.
     */
    tick(now: DateTime = this.clock()): void {
        this.engine.onTick(now);
        const event = this.engine.drainPendingLeakEvent();
        if (event === null) return;

        this.events.push({ ...event, at: toIsoString(now) });
        if (this.events.length > MAX_RECENT_EVENTS) {
            this.events.splice(0, this.events.length - MAX_RECENT_EVENTS);
        }
    }

    async save(): Promise<void> {
        await this.store.save(this.engine.toSnapshot());
    }

    private async runSaveLoop(signal: AbortSignal): Promise<void> {
        for await (const tick of fixedRateTicks({ periodMs: this.saveIntervalSeconds * 1000, signal })) {
            // slot 0 fires immediately, nothing has changed since start
            if (tick.tickId === 0) continue;
            if (tick.skippedSlots > 0 && this.log === "debug") {
                console.debug(`[service] save ${tick.latenessMs.toFixed(0)} ms late, ${tick.skippedSlots} slot(s) skipped`);
            }
            try {
                await this.save();
            } catch (error) {
                if (this.log !== "silent") {
                    console.error(`[service] periodic save failed: ${error instanceof Error ? error.message : String(error)}`);
                }
            }
        }
    }
}
