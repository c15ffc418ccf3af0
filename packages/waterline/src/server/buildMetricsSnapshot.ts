import type { DateTime } from "luxon";
import { mapPeriods, toIsoString, type AccountingEngine, type FlowStatistics } from "@waterline/core";

export interface Metric {
    value: number | null;
    unit: string;
    hint: string;
}

type StatisticName = keyof FlowStatistics;

function rounded(value: number | null, digits: number): number | null {
    return value === null ? null : Number(value.toFixed(digits));
}

const STATISTIC_INFO: Record<StatisticName, { unit: string; hint: string }> = {
    avgFlow1h: { unit: "L/min", hint: "Average flow rate over the last hour" },
    peakFlow24h: { unit: "L/min", hint: "Highest hourly peak flow over the last 24 hours" },
    peakFlow7d: { unit: "L/min", hint: "Highest hourly peak flow over the last 7 days" },
    minFlow24h: { unit: "L/min", hint: "Lowest hourly minimum flow over the last 24 hours" },
    avgHourly24h: { unit: "L", hint: "Average hourly consumption over the last 24 hours" },
    peakHourly24h: { unit: "L", hint: "Highest hourly consumption over the last 24 hours" },
    peakHourly7d: { unit: "L", hint: "Highest hourly consumption over the last 7 days" },
    avgDaily7d: { unit: "L", hint: "Average daily consumption over the last 7 days" },
    avgDaily30d: { unit: "L", hint: "Average daily consumption over the last 30 days" },
    peakDaily30d: { unit: "L", hint: "Highest daily consumption over the last 30 days" },
};

function statistic(stats: FlowStatistics, name: StatisticName): Metric {
    return { value: rounded(stats[name], 3), ...STATISTIC_INFO[name] };
}

/**
 * Everything the engine exposes, rounded for display: volumes 3 dp,
 * costs 2 dp, statistics 3 dp. Absent statistics stay `null`.
 */
export function buildMetricsSnapshot(engine: AccountingEngine, now: DateTime) {
    const stats = engine.statistics(now);
    const costUnit = engine.unitSystem === "imperial" ? "per_us_gallon_tariff" : "per_m3_tariff";

    return {
        timestamp: toIsoString(now),
        available: engine.available,
        flowRate: {
            value: Number(engine.flowRate.toFixed(3)),
            unit: "L/min",
            hint: "Instantaneous flow rate reported by the meter",
        },
        volumeDelta: {
            value: Number(engine.volumeDelta.toFixed(3)),
            unit: "mL",
            hint: "Volume reported since the previous tick",
            lastReset: engine.volumeLastReset === null ? null : toIsoString(engine.volumeLastReset),
        },
        volumes: mapPeriods((period) => ({
            value: Number(engine.volume(period).toFixed(3)),
            unit: "L",
            hint: `Consumption since the ${period} period started`,
            resetAt: toIsoString(engine.resetAt(period)),
        })),
        costs: mapPeriods((period) => ({
            value: Number(engine.cost(period).toFixed(2)),
            unit: costUnit,
            hint: `Cost of the ${period} consumption at tariff ${engine.tariff}`,
        })),
        statistics: {
            avgFlow1h: statistic(stats, "avgFlow1h"),
            peakFlow24h: statistic(stats, "peakFlow24h"),
            peakFlow7d: statistic(stats, "peakFlow7d"),
            minFlow24h: statistic(stats, "minFlow24h"),
            avgHourly24h: statistic(stats, "avgHourly24h"),
            peakHourly24h: statistic(stats, "peakHourly24h"),
            peakHourly7d: statistic(stats, "peakHourly7d"),
            avgDaily7d: statistic(stats, "avgDaily7d"),
            avgDaily30d: statistic(stats, "avgDaily30d"),
            peakDaily30d: statistic(stats, "peakDaily30d"),
        },
        leak: {
            detected: engine.waterLeakDetected,
            threshold: { value: engine.leakThreshold, unit: "L/min", hint: "Leak when the 24h minimum flow stays above this" },
        },
        diagnostics: {
            bufferCounts: engine.bufferCounts,
            hourlyMaxFlow: engine.hourlyMaxFlow,
            hourlyMinFlow: engine.hourlyMinFlow,
        },
    };
}

export type MetricsSnapshot = ReturnType<typeof buildMetricsSnapshot>;
