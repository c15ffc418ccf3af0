// test-utils.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { at, createStoreFile } from '../../utils/test-utils.js';

test('at parses an ISO string in the given zone', () => {
  assert.strictEqual(at('2026-03-01T10:00:00').toISO(), '2026-03-01T10:00:00.000Z');
  assert.strictEqual(at('2026-07-01T10:00:00', 'Europe/Paris').toISO(), '2026-07-01T10:00:00.000+02:00');
  assert.throws(() => at('yesterday'), /unparseable yesterday/);
});

test('createStoreFile writes a default envelope', async () => {
  const baseDir = await mkdtemp(join(tmpdir(), 'store-file-default-'));

  try {
    const file = await createStoreFile(baseDir, 'meter.json');

    assert.strictEqual(file, join(baseDir, 'meter.json'));
    const content: unknown = JSON.parse(await readFile(file, 'utf8'));
    assert.deepStrictEqual(content, { version: 1, key: 'waterline.meter', data: {} });
  } finally {
    await rm(baseDir, { recursive: true, force: true });
  }
});

test('createStoreFile writes the provided envelope fields', async () => {
  const baseDir = await mkdtemp(join(tmpdir(), 'store-file-custom-'));

  try {
    const file = await createStoreFile(join(baseDir, 'nested'), 'meter.json', {
      version: 2,
      key: 'other.key',
      data: { water_leak_detected: true },
    });

    const content: unknown = JSON.parse(await readFile(file, 'utf8'));
    assert.deepStrictEqual(content, { version: 2, key: 'other.key', data: { water_leak_detected: true } });
  } finally {
    await rm(baseDir, { recursive: true, force: true });
  }
});
