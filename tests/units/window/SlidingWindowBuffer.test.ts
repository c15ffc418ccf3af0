import test from 'node:test';
import assert from 'node:assert/strict';
import {
    SlidingWindowBuffer,
    pickMax,
    pickMin,
    pickValue,
    type FlowStatsEntry,
    type ValueEntry,
} from '../../../packages/flow-core/src/window/SlidingWindowBuffer.js';

function valueBuffer(entries: ValueEntry[] = [], retentionSeconds = 3600) {
    const buffer = new SlidingWindowBuffer<ValueEntry>({ retentionSeconds });
    for (const entry of entries) buffer.append(entry);
    return buffer;
}

test('SlidingWindowBuffer test-suite', async (t) => {

    await t.test('rejects a non-positive retention', () => {
        assert.throws(() => new SlidingWindowBuffer<ValueEntry>({ retentionSeconds: 0 }), /positive number of seconds/);
        assert.throws(() => new SlidingWindowBuffer<ValueEntry>({ retentionSeconds: Number.NaN }), /positive number of seconds/);
    });

    await t.test('trim drops leading entries older than the retention horizon', () => {
        const buffer = valueBuffer([
            { ts: 1000, value: 1 },
            { ts: 2000, value: 3 },
            { ts: 4000, value: 5 },
        ]);
        buffer.trim(4700); // cutoff 1100
        assert.deepStrictEqual(buffer.entries(), [
            { ts: 2000, value: 3 },
            { ts: 4000, value: 5 },
        ]);
    });

    await t.test('trim keeps an entry exactly on the cutoff', () => {
        const buffer = valueBuffer([{ ts: 2000, value: 3 }, { ts: 4000, value: 5 }]);
        buffer.trim(5600); // cutoff 2000
        assert.strictEqual(buffer.count, 2);
    });

    await t.test('trim is idempotent', () => {
        const buffer = valueBuffer([
            { ts: 1000, value: 1 },
            { ts: 2000, value: 3 },
            { ts: 4000, value: 5 },
        ]);
        buffer.trim(4700);
        const once = buffer.entries();
        buffer.trim(4700);
        assert.deepStrictEqual(buffer.entries(), once);
    });

    await t.test('an out-of-order entry never faults, it only waits behind newer ones', () => {
        const buffer = valueBuffer([{ ts: 100, value: 1 }, { ts: 50, value: 2 }, { ts: 200, value: 3 }]);
        buffer.trim(3750); // cutoff 150
        assert.deepStrictEqual(buffer.entries(), [{ ts: 200, value: 3 }]);

        const late = valueBuffer([{ ts: 300, value: 1 }, { ts: 100, value: 2 }]);
        late.trim(3850); // cutoff 250, 300 stops the scan
        assert.strictEqual(late.count, 2);
    });

    await t.test('windowed aggregates only consider entries inside the window', () => {
        const buffer = valueBuffer([
            { ts: 2000, value: 3 },
            { ts: 4000, value: 5 },
        ]);
        assert.strictEqual(buffer.average(3600, 4700, pickValue), 4);
        assert.strictEqual(buffer.average(1000, 4700, pickValue), 5);
        assert.strictEqual(buffer.average(700, 4700, pickValue), 5); // ts == cutoff qualifies
        assert.strictEqual(buffer.max(3600, 4700, pickValue), 5);
        assert.strictEqual(buffer.min(3600, 4700, pickValue), 3);
    });

    await t.test('aggregates return null when nothing qualifies', () => {
        const empty = valueBuffer();
        assert.strictEqual(empty.average(3600, 10_000, pickValue), null);
        assert.strictEqual(empty.max(3600, 10_000, pickValue), null);
        assert.strictEqual(empty.min(3600, 10_000, pickValue), null);

        const stale = valueBuffer([{ ts: 100, value: 7 }]);
        assert.strictEqual(stale.average(10, 10_000, pickValue), null);
    });

    await t.test('a zero value is a value, not an absence', () => {
        const buffer = valueBuffer([{ ts: 10, value: 0 }]);
        assert.strictEqual(buffer.min(60, 20, pickValue), 0);
        assert.strictEqual(buffer.average(60, 20, pickValue), 0);
    });

    await t.test('max and min over a (max, min) buffer use their own fields', () => {
        const buffer = new SlidingWindowBuffer<FlowStatsEntry>({ retentionSeconds: 7 * 86400 });
        buffer.append({ ts: 0, max: 4, min: 0.5 });
        buffer.append({ ts: 3600, max: 2, min: 0.1 });
        assert.strictEqual(buffer.max(7200, 3600, pickMax), 4);
        assert.strictEqual(buffer.min(7200, 3600, pickMin), 0.1);
        assert.strictEqual(buffer.max(7200, 3600, pickMin), 0.5);
    });

    await t.test('entries() is a copy and replace() adopts a new sequence', () => {
        const buffer = valueBuffer([{ ts: 1, value: 1 }]);
        const copy = buffer.entries();
        copy.push({ ts: 2, value: 2 });
        assert.strictEqual(buffer.count, 1);

        buffer.replace([{ ts: 5, value: 9 }, { ts: 6, value: 8 }]);
        assert.strictEqual(buffer.count, 2);
        assert.strictEqual(buffer.max(10, 6, pickValue), 9);
    });
});
