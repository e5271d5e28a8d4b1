import assert from 'node:assert';
import { test } from 'node:test';
import { parseEventList } from './client.js';
import { allContenders, parseYes, topContenders } from './contenders.js';

function eventWith(markets: unknown[]) {
  const [event] = parseEventList(JSON.stringify([{ title: 'x', markets }]));
  assert.ok(event);
  return event;
}

test('parseYes reads the first outcome price', () => {
  assert.strictEqual(parseYes('["0.62","0.38"]'), 0.62);
  assert.strictEqual(parseYes('[0.1, 0.9]'), 0.1);
  assert.strictEqual(parseYes(['0.7', '0.3']), 0.7);
});

test('parseYes degrades to 0', () => {
  assert.strictEqual(parseYes(undefined), 0);
  assert.strictEqual(parseYes(null), 0);
  assert.strictEqual(parseYes(''), 0);
  assert.strictEqual(parseYes('not json'), 0);
  assert.strictEqual(parseYes('[]'), 0);
  assert.strictEqual(parseYes('["abc"]'), 0);
  assert.strictEqual(parseYes('{"a":1}'), 0);
  assert.strictEqual(parseYes(42), 0);
});

test('names fall back from group label to question to placeholder', () => {
  const event = eventWith([
    { groupItemTitle: 'Label', question: 'Question?', outcomePrices: '["0.3","0.7"]' },
    { question: 'Question only?', outcomePrices: '["0.2","0.8"]' },
    { groupItemTitle: '', outcomePrices: '["0.1","0.9"]' }
  ]);
  assert.deepStrictEqual(
    topContenders(event).map((c) => c.name),
    ['Label', 'Question only?', '?']
  );
});

test('contenders are ordered by yes price, ties keep upstream order', () => {
  const event = eventWith([
    { groupItemTitle: 'A', outcomePrices: '["0.31","0.69"]' },
    { groupItemTitle: 'B', outcomePrices: '["0.42","0.58"]' },
    { groupItemTitle: 'C', outcomePrices: 'garbage' },
    { groupItemTitle: 'D', outcomePrices: '["0.42","0.58"]' }
  ]);
  const names = allContenders(event).map((c) => c.name);
  assert.deepStrictEqual(names, ['B', 'D', 'A', 'C']);

  const yes = allContenders(event).map((c) => c.yes);
  for (let i = 1; i < yes.length; i++) assert.ok(yes[i - 1] >= yes[i]);
});

test('topContenders is bounded and drops the end date', () => {
  const markets = Array.from({ length: 8 }, (_, i) => ({
    groupItemTitle: `M${i}`,
    outcomePrices: JSON.stringify([String(i / 10), String(1 - i / 10)]),
    oneDayPriceChange: '0.01',
    endDate: '2026-01-01'
  }));
  const top = topContenders(eventWith(markets), 3);
  assert.deepStrictEqual(top, [
    { name: 'M7', yes: 0.7, delta: 0.01 },
    { name: 'M6', yes: 0.6, delta: 0.01 },
    { name: 'M5', yes: 0.5, delta: 0.01 }
  ]);
  assert.strictEqual(topContenders(eventWith(markets)).length, 5);
});

test('allContenders resolves end dates', () => {
  const event = eventWith([
    { groupItemTitle: 'iso', outcomePrices: '["0.5","0.5"]', endDateIso: '2026-06-01', endDate: '2026-06-01T12:00:00Z' },
    { groupItemTitle: 'plain', outcomePrices: '["0.4","0.6"]', endDate: '2026-07-01T12:00:00Z' },
    { groupItemTitle: 'none', outcomePrices: '["0.3","0.7"]' }
  ]);
  assert.deepStrictEqual(
    allContenders(event).map((c) => c.endDate),
    ['2026-06-01', '2026-07-01T12:00:00Z', '']
  );
});

test('events without markets have no contenders', () => {
  const [event] = parseEventList('[{"title":"empty","markets":"oops"}]');
  assert.ok(event);
  assert.deepStrictEqual(allContenders(event), []);
});
