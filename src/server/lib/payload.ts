import { allContenders } from '../../market/contenders.js';
import { END_DATE_KEYS, num, pickField } from '../../market/fields.js';
import { formatCents, formatDelta, formatVolume } from '../../market/format.js';
import type { DeltaView, RawEvent } from '../../market/types.js';

export type ContenderPayload = {
  name: string;
  price: string;
  delta: DeltaView;
  endDate: string;
};

export type EventPayload = {
  rank: number;
  title: string;
  volume: string;
  volume24h: string;
  volumeRaw: number;
  volume24hRaw: number;
  endDate: string;
  contenderCount: number;
  contenders: ContenderPayload[];
};

export type SnapshotPayload = {
  ts: string;
  ttl: number;
  events: EventPayload[];
};

// ISO-8601 UTC to the second.
export function isoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function toEventPayload(event: RawEvent, idx: number): EventPayload {
  const contenders = allContenders(event);
  return {
    rank: idx + 1,
    title: pickField(event, ['title']) ?? '?',
    volume: formatVolume(event.volume),
    volume24h: formatVolume(event.volume24hr),
    volumeRaw: num(event.volumeNum || event.volume),
    volume24hRaw: num(event.volume24hr),
    endDate: pickField(event, END_DATE_KEYS) ?? '',
    contenderCount: contenders.length,
    contenders: contenders.map((c) => ({
      name: c.name,
      price: c.yes > 0 ? formatCents(c.yes) : '',
      delta: formatDelta(c.delta),
      endDate: c.endDate
    }))
  };
}

export function toSnapshot(events: RawEvent[], opts: { ttlSeconds: number; now: Date }): SnapshotPayload {
  return {
    ts: isoSeconds(opts.now),
    ttl: opts.ttlSeconds,
    events: events.map(toEventPayload)
  };
}
