import blessed from 'blessed';
import chalk from 'chalk';
import {
  renderTableLines,
  segmentsText,
  segmentsWidth,
  tableWidth,
  type BoardFrame,
  type Painter,
  type Segment,
  type Tone
} from './board.js';

const ANSI: Record<Tone, (text: string) => string> = {
  plain: (text) => text,
  dim: chalk.dim,
  bold: chalk.bold,
  italic: chalk.italic,
  up: chalk.green,
  down: chalk.red,
  badge: chalk.bold.black.bgCyanBright,
  title: chalk.bold.whiteBright,
  muted: chalk.dim.cyan,
  rule: chalk.gray,
  error: chalk.red
};

// blessed has no dim or italic attribute; gray stands in for dim.
const TAGS: Record<Tone, string> = {
  plain: '',
  dim: '{gray-fg}',
  bold: '{bold}',
  italic: '',
  up: '{green-fg}',
  down: '{red-fg}',
  badge: '{black-fg}{cyan-bg}{bold}',
  title: '{white-fg}{bold}',
  muted: '{cyan-fg}',
  rule: '{gray-fg}',
  error: '{red-fg}'
};

export const ansiPainter: Painter = (text, tone) => ANSI[tone](text);

export const tagPainter: Painter = (text, tone) => {
  const escaped: string = blessed.escape(text);
  const open = TAGS[tone];
  return open ? `${open}${escaped}{/}` : escaped;
};

function heavyBox(segments: Segment[], inner: number, paint: Painter): string[] {
  const width = Math.max(inner, segmentsWidth(segments) + 2);
  const fill = ' '.repeat(width - segmentsWidth(segments) - 2);
  return [
    paint(`┏${'━'.repeat(width)}┓`, 'muted'),
    `${paint('┃', 'muted')} ${segmentsText(segments, paint)}${fill} ${paint('┃', 'muted')}`,
    paint(`┗${'━'.repeat(width)}┛`, 'muted')
  ];
}

/** Whole frame as ANSI text for a one-off print. */
export function paintAnsi(frame: BoardFrame): string {
  if (frame.kind === 'empty') {
    return heavyBox([{ text: frame.message, tone: 'error' }], frame.message.length + 2, ansiPainter).join('\n');
  }
  const lines = renderTableLines(frame.table, ansiPainter);
  const width = tableWidth(frame.table);
  return [
    ...heavyBox(frame.header, width - 2, ansiPainter),
    ...lines,
    '',
    segmentsText(frame.footer, ansiPainter)
  ].join('\n');
}

export type TaggedFrame = {
  header: string;
  table: string;
  footer: string;
};

/** Frame split into blessed-tagged strings for the live screen's boxes. */
export function paintTags(frame: BoardFrame, status = ''): TaggedFrame {
  const statusText = status ? tagPainter(`  ${status}`, 'error') : '';
  if (frame.kind === 'empty') {
    return { header: '', table: tagPainter(frame.message, 'error'), footer: statusText };
  }
  return {
    header: segmentsText(frame.header, tagPainter),
    table: renderTableLines(frame.table, tagPainter).join('\n'),
    footer: segmentsText(frame.footer, tagPainter) + statusText
  };
}
