import fastify from "fastify";
import { DateTime } from "luxon";
import { toIsoString, type UnitSystem } from "@waterline/core";
import type { MeterService } from "../service/MeterService.js";
import { buildMetricsSnapshot } from "./buildMetricsSnapshot.js";

export interface ServerOptions {
    logger?: boolean;
    clock?: () => DateTime;
}

interface TelemetryBody {
    flowRate?: number;
    volumeDelta?: number;
    available?: boolean;
}

interface SettingsBody {
    tariff?: number;
    leakThreshold?: number;
    unitSystem?: UnitSystem;
}

const telemetrySchema = {
    body: {
        type: "object",
        additionalProperties: false,
        properties: {
            flowRate: { type: "number", minimum: 0 },
            volumeDelta: { type: "number", minimum: 0 },
            available: { type: "boolean" },
        },
    },
} as const;

const settingsSchema = {
    body: {
        type: "object",
        additionalProperties: false,
        minProperties: 1,
        properties: {
            tariff: { type: "number", minimum: 0 },
            leakThreshold: { type: "number", minimum: 0 },
            unitSystem: { type: "string", enum: ["metric", "imperial"] },
        },
    },
} as const;

export async function buildServer(service: MeterService, options: ServerOptions = {}) {
    const app = fastify({ logger: options.logger ?? false });
    const clock = options.clock ?? (() => DateTime.now().setZone(service.engine.zone));

    app.get('/status', async () => {
        const engine = service.engine;
        return {
            status: engine.available ? 'OK' : 'NO_DATA',
            timestamp: toIsoString(clock()),
            zone: engine.zone,
            running: service.running,
            waterLeakDetected: engine.waterLeakDetected,
            bufferCounts: engine.bufferCounts,
        };
    });

    app.get('/metrics', async () => {
        return buildMetricsSnapshot(service.engine, clock());
    });

    app.post<{ Body: TelemetryBody }>('/telemetry', { schema: telemetrySchema }, async (request, reply) => {
        const result = service.meter.push(request.body);
        if (!result.ok) {
            return reply.code(400).send({ ok: false, reason: result.reason });
        }
        return reply.code(202).send({ ok: true });
    });

    app.put<{ Body: SettingsBody }>('/settings', { schema: settingsSchema }, async (request) => {
        const engine = service.engine;
        const { tariff, leakThreshold, unitSystem } = request.body;
        if (tariff !== undefined) engine.setTariff(tariff);
        if (leakThreshold !== undefined) engine.setLeakThreshold(leakThreshold);
        if (unitSystem !== undefined) engine.setUnitSystem(unitSystem);
        return {
            tariff: engine.tariff,
            leakThreshold: engine.leakThreshold,
            unitSystem: engine.unitSystem,
        };
    });

    app.get('/events', async () => {
        return { events: service.recentEvents };
    });

    return app;
}
