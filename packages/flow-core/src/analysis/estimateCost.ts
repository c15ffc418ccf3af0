export type UnitSystem = "metric" | "imperial";

export const UNIT_SYSTEMS: readonly UnitSystem[] = ["metric", "imperial"];

export interface CostEstimationInput {
    liters: number;
    tariff: number; // currency per m³ (metric) or per US gallon (imperial)
    unitSystem: UnitSystem;
}

export interface CostEstimationResult {
    ok: boolean;
    billedQuantity?: number;
    cost?: number;
    reason?: string;
}

const LITERS_PER_M3 = 1000;
const LITERS_PER_US_GALLON = 3.78541;

export function isUnitSystem(value: unknown): value is UnitSystem {
    return value === "metric" || value === "imperial";
}

export function estimateCost(input: CostEstimationInput): CostEstimationResult {
    const { liters, tariff, unitSystem } = input;
    if (!Number.isFinite(liters) || liters < 0) {
        return { ok: false, reason: "invalid_volume" };
    }
    if (!Number.isFinite(tariff) || tariff < 0) {
        return { ok: false, reason: "invalid_tariff" };
    }

    const billedQuantity = unitSystem === "imperial"
        ? liters / LITERS_PER_US_GALLON
        : liters / LITERS_PER_M3;

    return { ok: true, billedQuantity, cost: tariff === 0 ? 0 : billedQuantity * tariff };
}

/**
 * Cost of `liters` at `tariff`, `0` for a zero tariff or an input
 * estimateCost rejects.
 */
export function costForVolume(liters: number, tariff: number, unitSystem: UnitSystem): number {
    const result = estimateCost({ liters, tariff, unitSystem });
    return result.ok && result.cost !== undefined ? result.cost : 0;
}
