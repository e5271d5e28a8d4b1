// Column widths are content widths; each column boundary costs one space and
// `edgePadding` blank columns are split between the table's two edges.
export type LayoutWidths = {
  rank: number;
  event: number;
  total: number;
  day: number;
  price: number;
  delta: number;
  minName: number;
  edgePadding: number;
};

export const DEFAULT_LAYOUT: LayoutWidths = {
  rank: 3,
  event: 35,
  total: 9,
  day: 8,
  price: 5, // "<1¢", "100¢"
  delta: 7, // "▼-0.4", "▲+12.5"
  minName: 8,
  edgePadding: 2
};

export const FIXED_COLUMNS = 4;
export const COLUMNS_PER_CONTENDER = 3;

export type Layout = {
  contenders: number;
  nameWidth: number;
  eventWidth: number;
};

export function fixedWidth(widths: LayoutWidths = DEFAULT_LAYOUT): number {
  return widths.rank + widths.event + widths.total + widths.day;
}

export function totalWidth(contenders: number, nameWidth: number, widths: LayoutWidths = DEFAULT_LAYOUT): number {
  const separators = FIXED_COLUMNS + contenders * COLUMNS_PER_CONTENDER - 1;
  return (
    fixedWidth(widths) +
    contenders * (nameWidth + widths.price + widths.delta) +
    separators +
    widths.edgePadding
  );
}

/**
 * Picks the most contender groups that fit `available` columns at the minimum
 * name width, then spreads what is left over the name columns. Never returns
 * fewer than one contender.
 */
export function computeLayout(
  available: number,
  maxContenders = 5,
  widths: LayoutWidths = DEFAULT_LAYOUT
): Layout {
  const width = Number.isFinite(available) ? Math.floor(available) : 0;
  const max = Math.max(1, Math.floor(maxContenders));

  let contenders = 1;
  for (let k = max; k >= 1; k--) {
    if (totalWidth(k, widths.minName, widths) <= width) {
      contenders = k;
      break;
    }
  }

  const leftover = Math.max(0, width - totalWidth(contenders, widths.minName, widths));
  return {
    contenders,
    nameWidth: widths.minName + Math.floor(leftover / contenders),
    eventWidth: widths.event
  };
}
