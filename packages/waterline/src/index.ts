export { buildServer } from "./server/server.js";
export type { ServerOptions } from "./server/server.js";
export { buildMetricsSnapshot } from "./server/buildMetricsSnapshot.js";
export type { Metric, MetricsSnapshot } from "./server/buildMetricsSnapshot.js";
export { MeterService, MAX_RECENT_EVENTS } from "./service/MeterService.js";
export type { MeterServiceOptions, RecordedLeakEvent } from "./service/MeterService.js";
export { JsonFileStore } from "./store/JsonFileStore.js";
export type { JsonFileStoreOptions, StoreLoadResult } from "./store/JsonFileStore.js";
export { createSnapshotStore, STORE_KEY, STORAGE_VERSION } from "./store/snapshotStore.js";
export { DemoMeter } from "./meter/DemoMeter.js";
export type { DemoMeterOptions } from "./meter/DemoMeter.js";
export { loadConfig, parseConfig, resolveSettings, DEFAULTS } from "./config/config.js";
export type { AppConfig, ResolvedSettings, SettingsOverrides, MeterSource } from "./config/config.js";
