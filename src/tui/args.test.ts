import assert from 'node:assert';
import { test } from 'node:test';
import { parseCliArgs, UsageError } from './args.js';

test('defaults to a single shot of ten events', () => {
  assert.deepStrictEqual(parseCliArgs([]), { limit: 10, help: false });
});

test('reads limit and refresh', () => {
  assert.deepStrictEqual(parseCliArgs(['--limit', '25', '--refresh', '30']), { limit: 25, refresh: 30, help: false });
  assert.deepStrictEqual(parseCliArgs(['--limit=3']), { limit: 3, help: false });
  assert.strictEqual(parseCliArgs(['--limit', '500']).limit, 100);
  assert.strictEqual(parseCliArgs(['-h']).help, true);
});

test('rejects bad values and unknown flags', () => {
  assert.throws(() => parseCliArgs(['--limit', 'ten']), UsageError);
  assert.throws(() => parseCliArgs(['--limit', '0']), UsageError);
  assert.throws(() => parseCliArgs(['--refresh', '-5']), UsageError);
  assert.throws(() => parseCliArgs(['--watch']), UsageError);
  assert.throws(() => parseCliArgs(['events']), UsageError);
});
