import test from 'node:test';
import assert from 'node:assert/strict';
import { DateTime } from 'luxon';
import { PERIOD_RULES, assertValidZone, toIsoString } from '../../../packages/flow-core/src/period/calendar.js';
import { at } from '../../../utils/test-utils.js';

const { hourly, daily, weekly, monthly, yearly, lifetime } = PERIOD_RULES;

test('calendar rules test-suite', async (t) => {

    await t.test('hourly crosses at the top of the next hour only', () => {
        const resetAt = at('2026-03-01T10:15:00');
        assert.strictEqual(hourly.crossed(resetAt, at('2026-03-01T10:59:59')), false);
        assert.strictEqual(hourly.crossed(resetAt, at('2026-03-01T11:00:00')), true);
        assert.strictEqual(toIsoString(hourly.nextBoundary(at('2026-03-01T10:15:00'))), '2026-03-01T11:00:00.000Z');
    });

    await t.test('daily crosses at local midnight', () => {
        const resetAt = at('2026-03-01T23:30:00', 'Europe/Paris');
        assert.strictEqual(daily.crossed(resetAt, at('2026-03-01T23:59:00', 'Europe/Paris')), false);
        assert.strictEqual(daily.crossed(resetAt, at('2026-03-02T00:05:00', 'Europe/Paris')), true);
    });

    await t.test('days are compared in the zone of now, not in UTC', () => {
        // 23:30Z on March 1 is already March 2 in Paris
        const resetAt = at('2026-03-01T23:30:00', 'UTC');
        const now = at('2026-03-02T01:00:00', 'Europe/Paris'); // 00:00Z March 2
        assert.strictEqual(daily.crossed(resetAt, now), false);
    });

    await t.test('a 23h DST day still counts as one day', () => {
        const zone = 'America/New_York';
        const resetAt = at('2026-03-08T00:00:00', zone);
        assert.strictEqual(daily.crossed(resetAt, at('2026-03-08T23:59:00', zone)), false);
        assert.strictEqual(daily.crossed(resetAt, at('2026-03-09T00:00:00', zone)), true);
        assert.strictEqual(toIsoString(daily.nextBoundary(at('2026-03-08T10:00:00', zone))), '2026-03-09T00:00:00.000-04:00');
    });

    await t.test('the repeated hour at the end of DST is a new hour', () => {
        const zone = 'America/New_York';
        const resetAt = DateTime.fromISO('2026-11-01T05:30:00Z').setZone(zone); // 01:30 EDT
        const now = DateTime.fromISO('2026-11-01T06:10:00Z').setZone(zone); // 01:10 EST
        assert.strictEqual(hourly.crossed(resetAt, now), true);
        assert.strictEqual(hourly.crossed(resetAt, DateTime.fromISO('2026-11-01T05:50:00Z').setZone(zone)), false);
    });

    await t.test('weekly crosses on Monday 00:00', () => {
        const resetAt = at('2026-02-25T12:00:00'); // Wednesday
        assert.strictEqual(weekly.crossed(resetAt, at('2026-03-01T23:00:00')), false); // Sunday
        assert.strictEqual(weekly.crossed(resetAt, at('2026-03-02T00:00:00')), true); // Monday
        assert.strictEqual(toIsoString(weekly.nextBoundary(at('2026-03-04T10:00:00'))), '2026-03-09T00:00:00.000Z');
    });

    await t.test('monthly uses calendar months', () => {
        const resetAt = at('2026-02-01T00:00:00');
        assert.strictEqual(monthly.crossed(resetAt, at('2026-02-28T23:59:00')), false);
        assert.strictEqual(monthly.crossed(resetAt, at('2026-03-01T00:00:00')), true);
        assert.strictEqual(toIsoString(monthly.nextBoundary(at('2026-01-31T10:00:00'))), '2026-02-01T00:00:00.000Z');
    });

    await t.test('yearly handles a leap year', () => {
        const resetAt = at('2028-02-29T12:00:00');
        assert.strictEqual(yearly.crossed(resetAt, at('2028-12-31T23:59:00')), false);
        assert.strictEqual(yearly.crossed(resetAt, at('2029-01-01T00:00:00')), true);
        assert.strictEqual(toIsoString(yearly.nextBoundary(at('2028-02-29T08:00:00'))), '2029-01-01T00:00:00.000Z');
    });

    await t.test('lifetime never crosses', () => {
        assert.strictEqual(lifetime.crossed(at('2000-01-01T00:00:00'), at('2026-03-01T00:00:00')), false);
        const next = lifetime.nextBoundary(at('2026-03-01T00:00:00'));
        assert.deepStrictEqual({ year: next.year, month: next.month, day: next.day }, { year: 9999, month: 12, day: 31 });
    });

    await t.test('assertValidZone rejects unknown zones', () => {
        assert.doesNotThrow(() => assertValidZone('Europe/Paris'));
        assert.throws(() => assertValidZone('Mars/Olympus'), /Invalid time zone: Mars\/Olympus/);
    });

    await t.test('toIsoString refuses an invalid DateTime', () => {
        assert.throws(() => toIsoString(DateTime.invalid('test')), /Cannot serialize invalid timestamp/);
    });
});
