import { toNumberOrNull } from './fields.js';
import type { DeltaView } from './types.js';

export const PLACEHOLDER = '—';
export const ELLIPSIS = '…';

// Price moves under this many cents are treated as noise.
const DELTA_NOISE_CENTS = 0.05;

const FLAT: DeltaView = { text: PLACEHOLDER, direction: 'flat' };

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export function formatVolume(value: unknown): string {
  const n = toNumberOrNull(value);
  if (n == null) return PLACEHOLDER;
  if (n >= 1_000_000) return `$${(n / 1_000_000).toFixed(1)}M`;
  if (n >= 1_000) return `$${(n / 1_000).toFixed(0)}K`;
  return `$${n.toFixed(0)}`;
}

export function formatCents(yes: number): string {
  const cents = yes * 100;
  if (cents < 1) return '<1¢';
  return `${cents.toFixed(0)}¢`;
}

export function formatDelta(value: unknown): DeltaView {
  const change = toNumberOrNull(value);
  if (change == null) return FLAT;
  const cents = change * 100;
  if (Math.abs(cents) < DELTA_NOISE_CENTS) return FLAT;
  if (cents > 0) return { text: `▲+${cents.toFixed(1)}`, direction: 'up' };
  return { text: `▼${cents.toFixed(1)}`, direction: 'down' };
}

export function truncate(value: string, max: number): string {
  const chars = Array.from(value);
  if (chars.length <= max) return value;
  if (max <= 0) return '';
  return chars.slice(0, max - 1).join('') + ELLIPSIS;
}

function pad2(n: number) {
  return String(n).padStart(2, '0');
}

export function formatHeaderTime(date: Date): string {
  return `${MONTHS[date.getMonth()]} ${pad2(date.getDate())}  ${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}
