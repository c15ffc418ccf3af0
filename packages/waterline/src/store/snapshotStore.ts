import { DateTime } from "luxon";
import { decodeSnapshot, encodeSnapshot, type EngineSnapshot, type LogMode } from "@waterline/core";
import { JsonFileStore } from "./JsonFileStore.js";

export const STORE_KEY = "waterline.meter";
export const STORAGE_VERSION = 1;

/**
 * Store for engine snapshots. Decoding happens at load time, so unparseable
 * reset instants fall back to `clock()` at the moment of loading.
 */
export function createSnapshotStore(
    path: string,
    zone: string,
    log: LogMode = "info",
    clock: () => DateTime = () => DateTime.now().setZone(zone),
): JsonFileStore<EngineSnapshot> {
    return new JsonFileStore<EngineSnapshot>({
        path,
        key: STORE_KEY,
        version: STORAGE_VERSION,
        encode: encodeSnapshot,
        decode: (raw) => decodeSnapshot(raw, clock(), zone),
        log,
    });
}
