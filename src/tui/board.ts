import { topContenders } from '../market/contenders.js';
import { pickField } from '../market/fields.js';
import { formatCents, formatDelta, formatHeaderTime, formatVolume, truncate } from '../market/format.js';
import type { DeltaDirection, RawEvent } from '../market/types.js';
import { computeLayout, DEFAULT_LAYOUT, type LayoutWidths } from './layout.js';

export type Tone =
  | 'plain'
  | 'dim'
  | 'bold'
  | 'italic'
  | 'up'
  | 'down'
  | 'badge'
  | 'title'
  | 'muted'
  | 'rule'
  | 'error';

export type Segment = { text: string; tone: Tone };

export type Cell = { text: string; tone?: Tone };

export type Column = {
  label: string;
  width: number;
  align: 'left' | 'right';
  tone: Tone;
};

export type BoardTable = {
  columns: Column[];
  rows: Cell[][];
  /** Blank columns around each line, split between the two edges. */
  edgePadding: number;
};

export type BoardFrame =
  | { kind: 'board'; header: Segment[]; table: BoardTable; footer: Segment[] }
  | { kind: 'empty'; message: string };

export type Painter = (text: string, tone: Tone) => string;

export type BoardOptions = {
  width: number;
  now: Date;
  maxContenders?: number;
  widths?: LayoutWidths;
};

export const NO_DATA_MESSAGE = 'No data available.';

const DELTA_TONES: Record<DeltaDirection, Tone> = { up: 'up', down: 'down', flat: 'dim' };

const EMPTY_CELL: Cell = { text: '' };

function buildColumns(widths: LayoutWidths, contenders: number, nameWidth: number, eventWidth: number): Column[] {
  const columns: Column[] = [
    { label: '#', width: widths.rank, align: 'right', tone: 'dim' },
    { label: 'Event', width: eventWidth, align: 'left', tone: 'bold' },
    { label: 'Total', width: widths.total, align: 'right', tone: 'plain' },
    { label: '24h', width: widths.day, align: 'right', tone: 'muted' }
  ];
  for (let i = 1; i <= contenders; i++) {
    columns.push(
      { label: `#${i}`, width: nameWidth, align: 'left', tone: 'italic' },
      { label: 'Prc¢', width: widths.price, align: 'right', tone: 'plain' },
      { label: 'Δ24h', width: widths.delta, align: 'right', tone: 'plain' }
    );
  }
  return columns;
}

function buildRow(event: RawEvent, rank: number, contenders: number, nameWidth: number, eventWidth: number): Cell[] {
  const row: Cell[] = [
    { text: String(rank) },
    { text: truncate(pickField(event, ['title']) ?? '?', eventWidth) },
    { text: formatVolume(event.volume) },
    { text: formatVolume(event.volume24hr) }
  ];

  const top = topContenders(event, contenders);
  for (let i = 0; i < contenders; i++) {
    const c = top[i];
    if (!c) {
      row.push(EMPTY_CELL, EMPTY_CELL, EMPTY_CELL);
      continue;
    }
    const delta = formatDelta(c.delta);
    row.push(
      { text: truncate(c.name, nameWidth) },
      { text: c.yes > 0 ? formatCents(c.yes) : '' },
      { text: delta.text, tone: DELTA_TONES[delta.direction] }
    );
  }
  return row;
}

export function buildBoard(events: RawEvent[], opts: BoardOptions): BoardFrame {
  if (events.length === 0) return { kind: 'empty', message: NO_DATA_MESSAGE };

  const widths = opts.widths ?? DEFAULT_LAYOUT;
  const layout = computeLayout(opts.width, opts.maxContenders, widths);

  return {
    kind: 'board',
    header: [
      { text: '  POLYMARKET  ', tone: 'badge' },
      { text: `  Top ${events.length} Events by Volume  `, tone: 'title' },
      { text: `  ${formatHeaderTime(opts.now)}  `, tone: 'muted' }
    ],
    table: {
      columns: buildColumns(widths, layout.contenders, layout.nameWidth, layout.eventWidth),
      rows: events.map((event, idx) =>
        buildRow(event, idx + 1, layout.contenders, layout.nameWidth, layout.eventWidth)
      ),
      edgePadding: widths.edgePadding
    },
    footer: [
      { text: '  Deltas: ', tone: 'dim' },
      { text: '▲ up ', tone: 'up' },
      { text: '▼ down ', tone: 'down' },
      { text: '  Prices = probability in cents  ', tone: 'dim' },
      { text: '  [Ctrl-C] quit', tone: 'rule' }
    ]
  };
}

export function tableWidth(table: BoardTable): number {
  const content = table.columns.reduce((sum, c) => sum + c.width, 0);
  return content + Math.max(0, table.columns.length - 1) + table.edgePadding;
}

function fit(text: string, column: Column): string {
  const clipped = truncate(text, column.width);
  const pad = ' '.repeat(Math.max(0, column.width - Array.from(clipped).length));
  return column.align === 'right' ? pad + clipped : clipped + pad;
}

/** Header, a heavy rule, then one line per row; every line is `tableWidth` wide. */
export function renderTableLines(table: BoardTable, paint: Painter): string[] {
  const left = ' '.repeat(Math.floor(table.edgePadding / 2));
  const right = ' '.repeat(Math.ceil(table.edgePadding / 2));
  const line = (cells: string[]) => left + cells.join(' ') + right;

  const header = line(table.columns.map((c) => paint(fit(c.label, c), 'bold')));
  const rule = paint('━'.repeat(tableWidth(table)), 'rule');
  const body = table.rows.map((row) =>
    line(
      table.columns.map((column, i) => {
        const cell = row[i] ?? EMPTY_CELL;
        return paint(fit(cell.text, column), cell.tone ?? column.tone);
      })
    )
  );
  return [header, rule, ...body];
}

export function segmentsText(segments: Segment[], paint: Painter): string {
  return segments.map((s) => paint(s.text, s.tone)).join('');
}

export function segmentsWidth(segments: Segment[]): number {
  return segments.reduce((sum, s) => sum + Array.from(s.text).length, 0);
}
