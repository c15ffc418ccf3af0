import { parseArgs } from "node:util";
import process from "node:process";
import path from "node:path";
import { DateTime } from "luxon";
import { AccountingEngine, PERIODS, PushMeter } from "@waterline/core";
import { defaultConfigPath, loadConfig, resolveSettings } from "../../config/config.js";
import { buildMetricsSnapshot, type MetricsSnapshot } from "../../server/buildMetricsSnapshot.js";
import { createSnapshotStore } from "../../store/snapshotStore.js";
import { printHelp } from "./help-command.js";

function formatValue(value: number | null, unit: string): string {
  return value === null ? "n/a" : `${value} ${unit}`;
}

export function formatStatus(metrics: MetricsSnapshot): string[] {
  const lines: string[] = [];
  lines.push("==============================");
  lines.push("Water meter state");
  lines.push("------------------------------");
  lines.push(`As of: ${metrics.timestamp}`);
  lines.push("---------VOLUMES--------------");
  for (const period of PERIODS) {
    const volume = metrics.volumes[period];
    const cost = metrics.costs[period];
    lines.push(`${period}: ${volume.value} L  cost ${cost.value}  (since ${volume.resetAt})`);
  }
  lines.push("---------STATISTICS-----------");
  for (const [name, metric] of Object.entries(metrics.statistics)) {
    lines.push(`${name}: ${formatValue(metric.value, metric.unit)}`);
  }
  lines.push("-----------LEAK---------------");
  lines.push(`Leak detected: ${metrics.leak.detected ? "yes" : "no"}`);
  lines.push("==============================");
  return lines;
}

/**
 * Offline view of the state file; nothing is caught up or written back.
 */
export async function statusCommand(argv = process.argv.slice(2), cwd: string = process.cwd()) {
  const { values } = parseArgs({
    args: argv,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      data: { type: "string" },
      tz: { type: "string" },
      json: { type: "boolean" },
    },
    allowPositionals: true
  });

  if (values.help) {
    printHelp();
    return;
  }

  const configPath = values.config ? path.resolve(cwd, values.config) : defaultConfigPath(cwd);
  const config = await loadConfig(configPath, values.config !== undefined);
  const settings = resolveSettings(config, { timeZone: values.tz, storagePath: values.data });
  const storagePath = path.resolve(cwd, settings.storagePath);

  const result = await createSnapshotStore(storagePath, settings.timeZone, "silent").read();
  if (!result.ok) {
    throw new Error(`No usable state at ${storagePath} (${result.reason})`);
  }

  const now = DateTime.now().setZone(settings.timeZone);
  const engine = new AccountingEngine({
    meter: new PushMeter(),
    zone: settings.timeZone,
    tariff: settings.tariff,
    unitSystem: settings.unitSystem,
    leakThreshold: settings.leakThreshold,
    log: "silent",
  });
  engine.restore(result.data, now);

  const metrics = buildMetricsSnapshot(engine, now);
  if (values.json) {
    console.log(JSON.stringify(metrics, null, 2));
    return;
  }
  for (const line of formatStatus(metrics)) console.log(line);
}
