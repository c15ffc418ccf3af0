import { readFile } from "fs/promises";
import path from "node:path";
import process from "node:process";
import { assertValidZone, isUnitSystem, type UnitSystem } from "@waterline/core";
import { extractErrorCode, reasonFromCode } from "@waterline/shared";

export const DEFAULT_CONFIG_FILE = 'waterline.config.json';

export type MeterSource = 'http' | 'demo';

export interface AppConfig {
    timeZone?: string;
    tariff?: number;
    unitSystem?: UnitSystem;
    leakThreshold?: number;
    meter?: {
        source?: MeterSource;
        demoPeriodMs?: number;
    };
    storage?: {
        path?: string;
        saveIntervalSeconds?: number;
    };
    server?: {
        host?: string;
        port?: number;
    };
}

export interface ResolvedSettings {
    timeZone: string;
    tariff: number;
    unitSystem: UnitSystem;
    leakThreshold: number;
    meterSource: MeterSource;
    demoPeriodMs: number;
    storagePath: string;
    saveIntervalSeconds: number;
    host: string;
    port: number;
}

// flag values already parsed to numbers, undefined when not given
export interface SettingsOverrides {
    timeZone?: string;
    tariff?: number;
    unitSystem?: string;
    leakThreshold?: number;
    demo?: boolean;
    storagePath?: string;
    saveIntervalSeconds?: number;
    host?: string;
    port?: number;
}

export const DEFAULTS = {
    tariff: 0,
    unitSystem: 'metric',
    leakThreshold: 0,
    meterSource: 'http',
    demoPeriodMs: 5000,
    storagePath: './data/waterline.json',
    saveIntervalSeconds: 300,
    host: '127.0.0.1',
    port: 3000,
} as const satisfies Partial<ResolvedSettings>;

export function isMeterSource(value: unknown): value is MeterSource {
    return value === 'http' || value === 'demo';
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(source: Record<string, unknown>, key: string, label: string): number | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
        throw new Error(`[config] ${label} must be a non-negative number`);
    }
    return value;
}

function optionalString(source: Record<string, unknown>, key: string, label: string): string | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string' || value.length === 0) {
        throw new Error(`[config] ${label} must be a non-empty string`);
    }
    return value;
}

function optionalSection(source: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = source[key];
    if (value === undefined) return {};
    if (!isRecord(value)) throw new Error(`[config] ${key} must be an object`);
    return value;
}

/**
 * Checks the shape of a parsed config file; unknown keys are ignored.
 */
export function parseConfig(raw: unknown): AppConfig {
    if (!isRecord(raw)) {
        throw new Error("[config] invalid JSON object");
    }

    const unitSystem = raw.unitSystem;
    if (unitSystem !== undefined && !isUnitSystem(unitSystem)) {
        throw new Error('[config] unitSystem must be "metric" or "imperial"');
    }

    const meter = optionalSection(raw, 'meter');
    const source = meter.source;
    if (source !== undefined && !isMeterSource(source)) {
        throw new Error('[config] meter.source must be "http" or "demo"');
    }

    const storage = optionalSection(raw, 'storage');
    const server = optionalSection(raw, 'server');

    return {
        timeZone: optionalString(raw, 'timeZone', 'timeZone'),
        tariff: optionalNumber(raw, 'tariff', 'tariff'),
        unitSystem,
        leakThreshold: optionalNumber(raw, 'leakThreshold', 'leakThreshold'),
        meter: {
            source,
            demoPeriodMs: optionalNumber(meter, 'demoPeriodMs', 'meter.demoPeriodMs'),
        },
        storage: {
            path: optionalString(storage, 'path', 'storage.path'),
            saveIntervalSeconds: optionalNumber(storage, 'saveIntervalSeconds', 'storage.saveIntervalSeconds'),
        },
        server: {
            host: optionalString(server, 'host', 'server.host'),
            port: optionalNumber(server, 'port', 'server.port'),
        },
    };
}

/**
 * Loads a JSON config file. A missing file yields `undefined` unless it
 * was named explicitly (`--config`).
 */
export async function loadConfig(configPath: string, explicit = false): Promise<AppConfig | undefined> {
    let raw: string;
    try {
        raw = await readFile(configPath, 'utf-8');
    } catch (error) {
        const code = extractErrorCode(error);
        if (code === 'ENOENT' && !explicit) return undefined;
        if (code === 'ENOENT') throw new Error(`[--config]: no such file ${configPath}`);
        throw new Error(`[--config]: cannot read ${configPath} (${reasonFromCode(code)})`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new Error(`[--config]: invalid JSON in ${configPath} (${error instanceof Error ? error.message : String(error)})`);
    }
    return parseConfig(parsed);
}

export function defaultConfigPath(cwd: string = process.cwd()): string {
    return path.resolve(cwd, DEFAULT_CONFIG_FILE);
}

export function systemTimeZone(): string {
    return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/**
 * CLI flags > config file > defaults.
 */
export function resolveSettings(config: AppConfig | undefined, overrides: SettingsOverrides = {}): ResolvedSettings {
    const unitSystem = overrides.unitSystem ?? config?.unitSystem ?? DEFAULTS.unitSystem;
    if (!isUnitSystem(unitSystem)) {
        throw new Error('--units must be "metric" or "imperial"');
    }

    const timeZone = overrides.timeZone ?? config?.timeZone ?? systemTimeZone();
    assertValidZone(timeZone);

    const saveIntervalSeconds = overrides.saveIntervalSeconds ?? config?.storage?.saveIntervalSeconds ?? DEFAULTS.saveIntervalSeconds;
    if (saveIntervalSeconds <= 0) throw new Error('--save-interval must be > 0');

    const demoPeriodMs = config?.meter?.demoPeriodMs ?? DEFAULTS.demoPeriodMs;
    if (demoPeriodMs <= 0) throw new Error('meter.demoPeriodMs must be > 0');

    const port = overrides.port ?? config?.server?.port ?? DEFAULTS.port;
    if (!Number.isInteger(port) || port > 65535) throw new Error('--port must be an integer between 0 and 65535');

    return {
        timeZone,
        tariff: overrides.tariff ?? config?.tariff ?? DEFAULTS.tariff,
        unitSystem,
        leakThreshold: overrides.leakThreshold ?? config?.leakThreshold ?? DEFAULTS.leakThreshold,
        meterSource: overrides.demo ? 'demo' : config?.meter?.source ?? DEFAULTS.meterSource,
        demoPeriodMs,
        storagePath: overrides.storagePath ?? config?.storage?.path ?? DEFAULTS.storagePath,
        saveIntervalSeconds,
        host: overrides.host ?? config?.server?.host ?? DEFAULTS.host,
        port,
    };
}
