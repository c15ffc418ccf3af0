import test from "node:test";
import assert from "node:assert/strict";
import { PushMeter, type MeterReading } from "@waterline/core";
import { DemoMeter } from "./DemoMeter.js";

function sequence(values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

test("DemoMeter: rejects a non-positive period", () => {
  assert.throws(() => new DemoMeter(new PushMeter(), { periodMs: 0 }), /demo periodMs must be a positive number/);
});

test("DemoMeter: a quiet period reports the drip flow", () => {
  const demo = new DemoMeter(new PushMeter(), { periodMs: 60_000, random: sequence([0.5]) });
  assert.deepStrictEqual(demo.nextReading(), { flowRate: 0.02, volumeDelta: 20 });
});

test("DemoMeter: a burst draws its flow from the second random value", () => {
  const demo = new DemoMeter(new PushMeter(), { periodMs: 60_000, random: sequence([0.1, 0.5]) });
  assert.deepStrictEqual(demo.nextReading(), { flowRate: 7, volumeDelta: 7000 });
});

test("DemoMeter: volume scales with the period", () => {
  const demo = new DemoMeter(new PushMeter(), { periodMs: 30_000, random: sequence([0.1, 0]) });
  assert.deepStrictEqual(demo.nextReading(), { flowRate: 2, volumeDelta: 1000 });
});

test("DemoMeter: a reading that replaces skipped slots carries their volume", () => {
  const demo = new DemoMeter(new PushMeter(), { periodMs: 30_000, random: sequence([0.1, 0]) });
  assert.deepStrictEqual(demo.nextReading(3), { flowRate: 2, volumeDelta: 3000 });
});

test("DemoMeter: start pushes readings until stopped", async () => {
  const meter = new PushMeter();
  const demo = new DemoMeter(meter, { periodMs: 60_000, random: sequence([0.5]), log: "silent" });

  const first = new Promise<MeterReading>((resolve) => {
    const unsubscribe = meter.onReading((reading) => {
      unsubscribe();
      resolve(reading);
    });
  });

  demo.start();
  const reading = await first;
  await demo.stop();

  assert.deepStrictEqual(reading, { flowRate: 0.02, volumeDelta: 20, available: true });
  assert.strictEqual(meter.getAvailability(), true);
  assert.strictEqual(meter.getVolumeDelta(), 20);
});
