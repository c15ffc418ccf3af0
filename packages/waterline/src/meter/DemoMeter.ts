import { fixedRateTicks, type LogMode, type PushMeter } from "@waterline/core";

export interface DemoMeterOptions {
    periodMs: number;
    random?: () => number;
    log?: LogMode;
}

// a dripping tap keeps the minimum above zero, bursts are taps and showers
const DRIP_L_PER_MIN = 0.02;
const BURST_PROBABILITY = 0.15;
const BURST_MIN_L_PER_MIN = 2;
const BURST_MAX_L_PER_MIN = 12;

/**
 * Synthetic readings pushed on a fixed-rate schedule, for running the
 * service without hardware.
 */
export class DemoMeter {
    private readonly meter: PushMeter;
    private readonly periodMs: number;
    private readonly random: () => number;
    private readonly log: LogMode;
    private controller: AbortController | null = null;
    private loop: Promise<void> | null = null;

    constructor(meter: PushMeter, options: DemoMeterOptions) {
        if (!Number.isFinite(options.periodMs) || options.periodMs <= 0) {
            throw new Error("demo periodMs must be a positive number");
        }
        this.meter = meter;
        this.periodMs = options.periodMs;
        this.random = options.random ?? Math.random;
        this.log = options.log ?? "info";
    }

    /**
     * Next synthetic reading; the volume is what `flowRate` delivers over
     * `periods` periods, in mL.
     */
    nextReading(periods = 1): { flowRate: number; volumeDelta: number } {
        const burst = this.random() < BURST_PROBABILITY;
        const flowRate = burst
            ? BURST_MIN_L_PER_MIN + this.random() * (BURST_MAX_L_PER_MIN - BURST_MIN_L_PER_MIN)
            : DRIP_L_PER_MIN;
        const volumeDelta = flowRate * ((this.periodMs * periods) / 60_000) * 1000;
        return { flowRate, volumeDelta };
    }

    start(): void {
        if (this.controller) return;
        this.controller = new AbortController();
        this.loop = this.run(this.controller.signal);
    }

    async stop(): Promise<void> {
        this.controller?.abort();
        await this.loop;
        this.controller = null;
        this.loop = null;
    }

    private async run(signal: AbortSignal): Promise<void> {
        for await (const tick of fixedRateTicks({ periodMs: this.periodMs, signal })) {
            // a late tick also covers the slots it replaced
            const reading = this.nextReading(1 + tick.skippedSlots);
            const result = this.meter.push(reading);
            if (!result.ok && this.log !== "silent") {
                console.warn(`[demo] reading rejected: ${result.reason}`);
            }
            if (this.log === "debug") {
                console.debug(
                    `[demo] tick ${tick.tickId}: ${reading.flowRate.toFixed(3)} L/min` +
                        ` (late ${tick.latenessMs.toFixed(1)} ms, skipped ${tick.skippedSlots})`
                );
            }
        }
    }
}
