import test from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as delay } from 'node:timers/promises';
import { fixedRateTicks } from '../../../packages/flow-core/src/timers/scheduler.js';
import { msToNs, nsToMsCeil, sleepMs } from '../../../packages/flow-core/src/timers/timing.js';

test('timing conversions', () => {
    assert.strictEqual(msToNs(1.5), 1_500_000n);
    assert.strictEqual(msToNs(5), 5_000_000n);
    assert.strictEqual(nsToMsCeil(0n), 0);
    assert.strictEqual(nsToMsCeil(-5n), 0);
    assert.strictEqual(nsToMsCeil(1n), 1);
    assert.strictEqual(nsToMsCeil(2_000_001n), 3);
});

test('sleepMs returns early on abort', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const sleeping = sleepMs(10_000, controller.signal);
    controller.abort();
    await sleeping;
    assert.ok(Date.now() - started < 5_000);
});

test('fixedRateTicks test-suite', async (t) => {

    await t.test('rejects a non-positive period', async () => {
        await assert.rejects(fixedRateTicks({ periodMs: 0 }).next(), /periodMs must be a positive number/);
    });

    await t.test('produces consecutive tick ids, the first one immediately', async () => {
        const ids: number[] = [];
        const started = Date.now();
        for await (const tick of fixedRateTicks({ periodMs: 5 })) {
            if (tick.tickId === 0) {
                assert.ok(Date.now() - started < 1_000);
                assert.strictEqual(tick.skippedSlots, 0);
                assert.ok(tick.latenessMs >= 0);
            }
            ids.push(tick.tickId);
            if (ids.length === 3) break;
        }
        assert.deepStrictEqual(ids, [0, 1, 2]);
    });

    await t.test('a slow consumer resumes ahead and reports the slots it missed', async () => {
        const ticks = fixedRateTicks({ periodMs: 5 });
        const first = await ticks.next();
        assert.strictEqual(first.done, false);

        await delay(30);
        const second = await ticks.next();
        await ticks.return(undefined);

        assert.strictEqual(second.done, false);
        if (second.done) return;
        assert.strictEqual(second.value.tickId, 1);
        assert.ok(second.value.skippedSlots >= 1);
    });

    await t.test('an aborted signal ends the schedule without a tick', async () => {
        const controller = new AbortController();
        controller.abort();
        let ticks = 0;
        for await (const _tick of fixedRateTicks({ periodMs: 5, signal: controller.signal })) {
            ticks++;
        }
        assert.strictEqual(ticks, 0);
    });

    await t.test('abort cuts a long wait short', async () => {
        const controller = new AbortController();
        const ticks = fixedRateTicks({ periodMs: 60_000, signal: controller.signal });

        const first = await ticks.next();
        assert.strictEqual(first.done, false);

        const second = ticks.next();
        await delay(10);
        controller.abort();
        assert.deepStrictEqual(await second, { done: true, value: undefined });
    });
});
