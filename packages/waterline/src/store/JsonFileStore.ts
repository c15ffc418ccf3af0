import { readFile } from "node:fs/promises";
import type { LogMode } from "@waterline/core";
import { extractErrorCode, reasonFromCode, writeFileAtomic } from "@waterline/shared";

export interface JsonFileStoreOptions<T> {
    path: string;
    key: string;
    version: number;
    encode: (data: T) => unknown;
    decode: (raw: unknown) => T;
    log?: LogMode;
}

export type StoreLoadResult<T> =
    | { ok: true; data: T }
    | { ok: false; reason: string };

function isEnvelope(value: unknown): value is { version: unknown; key: unknown; data: unknown } {
    return typeof value === "object" && value !== null && "version" in value && "data" in value;
}

/**
 * One versioned JSON document on disk: `{ version, key, data }`.
 */
export class JsonFileStore<T> {
    readonly path: string;
    readonly key: string;
    readonly version: number;
    private readonly encode: (data: T) => unknown;
    private readonly decode: (raw: unknown) => T;
    private readonly log: LogMode;

    constructor(options: JsonFileStoreOptions<T>) {
        this.path = options.path;
        this.key = options.key;
        this.version = options.version;
        this.encode = options.encode;
        this.decode = options.decode;
        this.log = options.log ?? "info";
    }

    /**
     * Reads and decodes the document. Never throws: a missing, unreadable
     * or foreign document is reported as a reason.
     */
    async read(): Promise<StoreLoadResult<T>> {
        let raw: string;
        try {
            raw = await readFile(this.path, "utf-8");
        } catch (error) {
            return { ok: false, reason: reasonFromCode(extractErrorCode(error)) };
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch {
            return { ok: false, reason: "invalid_json" };
        }

        if (!isEnvelope(parsed)) return { ok: false, reason: "invalid_envelope" };
        if (parsed.version !== this.version) return { ok: false, reason: "version_mismatch" };
        if (parsed.key !== this.key) return { ok: false, reason: "key_mismatch" };

        return { ok: true, data: this.decode(parsed.data) };
    }

    /**
     * `null` when there is nothing usable; the caller starts from defaults.
     */
    async load(): Promise<T | null> {
        const result = await this.read();
        if (result.ok) return result.data;

        if (result.reason === "file_not_found") {
            if (this.log === "debug") console.debug(`[store] no document at ${this.path}, starting fresh`);
        } else if (this.log !== "silent") {
            console.warn(`[store] ignoring ${this.path}: ${result.reason}`);
        }
        return null;
    }

    async save(data: T): Promise<void> {
        const envelope = { version: this.version, key: this.key, data: this.encode(data) };
        await writeFileAtomic(this.path, JSON.stringify(envelope, null, 2));
        if (this.log === "debug") console.debug(`[store] saved ${this.path}`);
    }
}
