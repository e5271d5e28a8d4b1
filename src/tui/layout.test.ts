import assert from 'node:assert';
import { test } from 'node:test';
import { computeLayout, DEFAULT_LAYOUT, fixedWidth, totalWidth, type LayoutWidths } from './layout.js';

test('totalWidth counts content, separators and edge padding', () => {
  assert.strictEqual(fixedWidth(), 55);
  // 55 + 20 + (4 + 3 - 1) + 2
  assert.strictEqual(totalWidth(1, 8), 83);
  assert.strictEqual(totalWidth(5, 8), 175);
  assert.strictEqual(totalWidth(2, 15), 120);
});

test('wide terminals show every contender with wider names', () => {
  assert.deepStrictEqual(computeLayout(200, 5), { contenders: 5, nameWidth: 13, eventWidth: 35 });
  assert.deepStrictEqual(computeLayout(175, 5), { contenders: 5, nameWidth: 8, eventWidth: 35 });
});

test('narrower terminals drop contender groups first', () => {
  assert.deepStrictEqual(computeLayout(174, 5), { contenders: 4, nameWidth: 13, eventWidth: 35 });
  assert.deepStrictEqual(computeLayout(120, 5), { contenders: 2, nameWidth: 15, eventWidth: 35 });
  assert.deepStrictEqual(computeLayout(83, 5), { contenders: 1, nameWidth: 8, eventWidth: 35 });
});

test('never drops below one contender', () => {
  assert.deepStrictEqual(computeLayout(40, 5), { contenders: 1, nameWidth: 8, eventWidth: 35 });
  assert.deepStrictEqual(computeLayout(0, 5), { contenders: 1, nameWidth: 8, eventWidth: 35 });
  assert.deepStrictEqual(computeLayout(Number.NaN, 5), { contenders: 1, nameWidth: 8, eventWidth: 35 });
  assert.strictEqual(computeLayout(500, 0).contenders, 1);
});

test('leftover remainder is not distributed', () => {
  // 5 groups fit at 175; 179 leaves 4 columns, fewer than one per name column.
  assert.strictEqual(computeLayout(179, 5).nameWidth, 8);
  assert.strictEqual(computeLayout(180, 5).nameWidth, 9);
});

test('layout fits and is maximal for every width', () => {
  for (let max = 1; max <= 8; max++) {
    for (let width = 0; width <= 320; width++) {
      const { contenders, nameWidth } = computeLayout(width, max);
      assert.ok(contenders >= 1 && contenders <= max);
      assert.ok(nameWidth >= DEFAULT_LAYOUT.minName);

      if (totalWidth(1, DEFAULT_LAYOUT.minName) <= width) {
        assert.ok(totalWidth(contenders, nameWidth) <= width, `overflow at width=${width} max=${max}`);
        // Any remaining slack is smaller than one column per name.
        assert.ok(width - totalWidth(contenders, nameWidth) < contenders);
      }
      if (contenders < max) {
        assert.ok(totalWidth(contenders + 1, DEFAULT_LAYOUT.minName) > width);
      }
    }
  }
});

test('widths come from configuration', () => {
  const compact: LayoutWidths = { ...DEFAULT_LAYOUT, event: 20, minName: 6 };
  // fixed 40, per group 18 + 3 separators, plus 3 separators and 2 padding
  assert.strictEqual(totalWidth(3, 6, compact), 40 + 54 + 12 + 2);
  assert.deepStrictEqual(computeLayout(110, 5, compact), { contenders: 3, nameWidth: 6, eventWidth: 20 });
  assert.deepStrictEqual(computeLayout(131, 5, compact), { contenders: 4, nameWidth: 6, eventWidth: 20 });
});
