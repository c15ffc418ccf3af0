import { parseArgs } from "node:util";
import process from "node:process";
import path from "node:path";
import { AccountingEngine, PushMeter, type LogMode } from "@waterline/core";
import { defaultConfigPath, loadConfig, resolveSettings, type ResolvedSettings } from "../../config/config.js";
import { DemoMeter } from "../../meter/DemoMeter.js";
import { buildServer } from "../../server/server.js";
import { MeterService } from "../../service/MeterService.js";
import { createSnapshotStore } from "../../store/snapshotStore.js";
import { extractVerbosity, logModeFromVerbosity, parseOptionalNumberFromCommand } from "./command-utils.js";
import { printHelp } from "./help-command.js";

//parameter resolution order

//CLIFLAGS > CONFIG > DEFAULTS

export interface RunOptions {
  help: boolean;
  configPath: string;
  settings: ResolvedSettings;
  logMode: LogMode;
  httpLogger: boolean;
}

export async function parseRunArgs(argv: string[], cwd: string = process.cwd()): Promise<RunOptions> {
  const { level: verbosity, debugExplicit, rest } = extractVerbosity(argv);

  const { values } = parseArgs({
    args: rest,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      data: { type: "string" },
      host: { type: "string" },
      port: { type: "string" },
      tz: { type: "string" },
      tariff: { type: "string" },
      threshold: { type: "string" },
      units: { type: "string" },
      demo: { type: "boolean" },
      "save-interval": { type: "string" },
      quiet: { type: "boolean" },
    },
    allowPositionals: true
  });

  const configPath = values.config ? path.resolve(cwd, values.config) : defaultConfigPath(cwd);
  const config = await loadConfig(configPath, values.config !== undefined);

  const settings = resolveSettings(config, {
    timeZone: values.tz,
    tariff: parseOptionalNumberFromCommand('--tariff', values.tariff),
    leakThreshold: parseOptionalNumberFromCommand('--threshold', values.threshold),
    unitSystem: values.units,
    demo: values.demo,
    storagePath: values.data,
    saveIntervalSeconds: parseOptionalNumberFromCommand('--save-interval', values["save-interval"], { allowZero: false }),
    host: values.host,
    port: parseOptionalNumberFromCommand('--port', values.port, { integer: true }),
  });

  return {
    help: values.help ?? false,
    configPath,
    settings: { ...settings, storagePath: path.resolve(cwd, settings.storagePath) },
    logMode: logModeFromVerbosity(verbosity, debugExplicit, values.quiet ?? false),
    httpLogger: verbosity >= 1 && !values.quiet,
  };
}

function waitForShutdown(): Promise<string> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(signal);
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  });
}

export async function runCommand(argv = process.argv.slice(2), cwd: string = process.cwd()) {
  const options = await parseRunArgs(argv, cwd);
  if (options.help) {
    printHelp();
    return;
  }

  const { settings, logMode } = options;

  if (logMode !== "silent") {
    console.log(`Config: ${options.configPath}`);
    console.log(`State file: ${settings.storagePath}`);
    console.log(`Time zone: ${settings.timeZone}`);
    console.log(`Tariff: ${settings.tariff} (${settings.unitSystem})  Leak threshold: ${settings.leakThreshold} L/min`);
    console.log(`Meter source: ${settings.meterSource.toUpperCase()}`);
    console.log("");
  }

  const meter = new PushMeter();
  const engine = new AccountingEngine({
    meter,
    zone: settings.timeZone,
    tariff: settings.tariff,
    unitSystem: settings.unitSystem,
    leakThreshold: settings.leakThreshold,
    log: logMode,
  });
  const service = new MeterService({
    engine,
    meter,
    store: createSnapshotStore(settings.storagePath, settings.timeZone, logMode),
    saveIntervalSeconds: settings.saveIntervalSeconds,
    log: logMode,
  });

  await service.start();

  const demo = settings.meterSource === "demo"
    ? new DemoMeter(meter, { periodMs: settings.demoPeriodMs, log: logMode })
    : null;
  demo?.start();

  const app = await buildServer(service, { logger: options.httpLogger });
  try {
    await app.listen({ host: settings.host, port: settings.port });
  } catch (error) {
    await demo?.stop();
    await service.stop();
    throw error;
  }
  if (logMode !== "silent") console.log(`HTTP server listening on ${settings.host}:${settings.port}`);

  const signal = await waitForShutdown();
  if (logMode !== "silent") console.log(`\n${signal} received, saving state...`);

  await demo?.stop();
  await app.close();
  await service.stop();
}
