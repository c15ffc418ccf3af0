import { DateTime, type DurationLikeObject } from "luxon";

export const PERIODS = ["hourly", "daily", "weekly", "monthly", "yearly", "lifetime"] as const;
export type PeriodName = (typeof PERIODS)[number];

// fixed order in which boundaries are checked on every tick; lifetime never crosses
export const BOUNDARY_ORDER = ["hourly", "daily", "weekly", "monthly", "yearly"] as const satisfies readonly PeriodName[];

type CalendarUnit = "hour" | "day" | "week" | "month" | "year";

const ONE_UNIT: Record<CalendarUnit, DurationLikeObject> = {
    hour: { hours: 1 },
    day: { days: 1 },
    week: { weeks: 1 },
    month: { months: 1 },
    year: { years: 1 },
};

export interface PeriodRule {
    name: PeriodName;
    /** true once `now` lies in a later local calendar unit than `resetAt` */
    crossed(resetAt: DateTime, now: DateTime): boolean;
    /** start of the local calendar unit following the one holding `now` */
    nextBoundary(now: DateTime): DateTime;
}

/**
 * Both instants are compared in the zone `now` carries. Local calendar
 * starts are compared as instants, so a 23h or 25h DST day still counts
 * as exactly one boundary.
 */
function unitRule(name: PeriodName, unit: CalendarUnit): PeriodRule {
    return {
        name,
        crossed(resetAt, now) {
            const from = resetAt.setZone(now.zone).startOf(unit).toMillis();
            const to = now.startOf(unit).toMillis();
            return to > from;
        },
        nextBoundary(now) {
            return now.startOf(unit).plus(ONE_UNIT[unit]);
        },
    };
}

const lifetimeRule: PeriodRule = {
    name: "lifetime",
    crossed() {
        return false;
    },
    nextBoundary(now) {
        return DateTime.fromObject({ year: 9999, month: 12, day: 31 }, { zone: now.zone });
    },
};

export const PERIOD_RULES: Record<PeriodName, PeriodRule> = {
    hourly: unitRule("hourly", "hour"),
    daily: unitRule("daily", "day"),
    weekly: unitRule("weekly", "week"),
    monthly: unitRule("monthly", "month"),
    yearly: unitRule("yearly", "year"),
    lifetime: lifetimeRule,
};

export function mapPeriods<T>(fn: (name: PeriodName) => T): Record<PeriodName, T> {
    return {
        hourly: fn("hourly"),
        daily: fn("daily"),
        weekly: fn("weekly"),
        monthly: fn("monthly"),
        yearly: fn("yearly"),
        lifetime: fn("lifetime"),
    };
}

/**
 * Throws when `zone` is not an IANA zone luxon can resolve.
 */
export function assertValidZone(zone: string): void {
    if (!DateTime.now().setZone(zone).isValid) {
        throw new Error(`Invalid time zone: ${zone}`);
    }
}

export function toIsoString(dt: DateTime): string {
    const iso = dt.toISO();
    if (iso === null) {
        throw new Error(`Cannot serialize invalid timestamp (${dt.invalidReason ?? "unknown"})`);
    }
    return iso;
}
