import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { at, createStoreFile } from "../../../../utils/test-utils.js";
import { emptySnapshot, encodeSnapshot } from "@waterline/core";
import { JsonFileStore } from "./JsonFileStore.js";
import { createSnapshotStore, STORE_KEY, STORAGE_VERSION } from "./snapshotStore.js";

interface Counter {
  count: number;
}

function counterStore(path: string) {
  return new JsonFileStore<Counter>({
    path,
    key: "test.counter",
    version: 1,
    encode: (data) => ({ n: data.count }),
    decode: (raw) => {
      const n = typeof raw === "object" && raw !== null && "n" in raw ? raw.n : undefined;
      return { count: typeof n === "number" ? n : 0 };
    },
    log: "silent",
  });
}

test("JsonFileStore test-suite", async (t) => {
  const dir = await mkdtemp(join(tmpdir(), "json-store-"));

  try {
    await t.test("save writes the envelope and read decodes it", async () => {
      const file = join(dir, "nested", "counter.json");
      const store = counterStore(file);

      await store.save({ count: 7 });

      const raw: unknown = JSON.parse(await readFile(file, "utf8"));
      assert.deepStrictEqual(raw, { version: 1, key: "test.counter", data: { n: 7 } });
      assert.deepStrictEqual(await store.read(), { ok: true, data: { count: 7 } });
      assert.deepStrictEqual(await store.load(), { count: 7 });
    });

    await t.test("a missing file is reported and loads as null", async () => {
      const store = counterStore(join(dir, "absent.json"));
      assert.deepStrictEqual(await store.read(), { ok: false, reason: "file_not_found" });
      assert.strictEqual(await store.load(), null);
    });

    await t.test("rejects documents it does not own", async () => {
      const cases: [string, string][] = [
        ["{not json", "invalid_json"],
        ["[1, 2]", "invalid_envelope"],
        ['{"key":"test.counter","data":{}}', "invalid_envelope"],
        ['{"version":2,"key":"test.counter","data":{"n":1}}', "version_mismatch"],
        ['{"version":1,"key":"other","data":{"n":1}}', "key_mismatch"],
      ];
      for (const [index, [content, reason]] of cases.entries()) {
        const file = join(dir, `foreign-${index}.json`);
        await writeFile(file, content, "utf8");
        assert.deepStrictEqual(await counterStore(file).read(), { ok: false, reason }, content);
      }
    });

    await t.test("load warns about an unusable document unless silent", async (t) => {
      const file = join(dir, "broken.json");
      await writeFile(file, "{not json", "utf8");
      const warn = t.mock.method(console, "warn", () => {});

      const store = new JsonFileStore<Counter>({
        path: file,
        key: "test.counter",
        version: 1,
        encode: (data) => data,
        decode: () => ({ count: 0 }),
      });

      assert.strictEqual(await store.load(), null);
      assert.strictEqual(warn.mock.callCount(), 1);
      assert.deepStrictEqual(warn.mock.calls[0].arguments, [`[store] ignoring ${file}: invalid_json`]);
    });

    await t.test("snapshot store reads what the engine encodes", async () => {
      const now = at("2026-03-01T10:00:00");
      const snapshot = emptySnapshot(now);
      snapshot.periods.daily = { volume: 12.5, resetAt: at("2026-03-01T00:00:00") };
      snapshot.waterLeakDetected = true;

      const file = await createStoreFile(dir, "meter.json", { data: encodeSnapshot(snapshot) });
      const result = await createSnapshotStore(file, "UTC", "silent").read();

      assert.strictEqual(result.ok, true);
      if (!result.ok) return;
      assert.strictEqual(result.data.periods.daily.volume, 12.5);
      assert.strictEqual(result.data.periods.daily.resetAt.toISO(), "2026-03-01T00:00:00.000Z");
      assert.strictEqual(result.data.waterLeakDetected, true);
      assert.strictEqual(STORE_KEY, "waterline.meter");
      assert.strictEqual(STORAGE_VERSION, 1);
    });
    await t.test("snapshot store dates unreadable reset instants from its clock", async () => {
      const loadedAt = at("2026-03-05T08:00:00");
      const file = await createStoreFile(dir, "bad-reset.json", {
        data: { periods: { daily: { volume: 3, reset_at: "yesterday-ish" } } },
      });
      const result = await createSnapshotStore(file, "UTC", "silent", () => loadedAt).read();

      assert.strictEqual(result.ok, true);
      if (!result.ok) return;
      assert.strictEqual(result.data.periods.daily.volume, 3);
      assert.strictEqual(result.data.periods.daily.resetAt.toISO(), "2026-03-05T08:00:00.000Z");
      assert.strictEqual(result.data.periods.hourly.resetAt.toISO(), "2026-03-05T08:00:00.000Z");
    });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
