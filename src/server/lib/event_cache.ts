import type { RawEvent } from '../../market/types.js';

type CacheEntry = {
  events: RawEvent[];
  fetchedAtMs: number;
};

export type EventCacheOptions = {
  fetch: (limit: number) => Promise<RawEvent[]>;
  ttlMs: number;
  now?: () => number;
};

/**
 * TTL cache over the upstream fetch, keyed by the requested limit.
 *
 * Callers that miss while a fetch for the same limit is running share that
 * fetch instead of starting another. Empty results are cached like any other
 * so a failing upstream is hit at most once per TTL.
 */
export class EventCache {
  readonly ttlMs: number;

  private entries = new Map<number, CacheEntry>();
  private inFlight = new Map<number, Promise<RawEvent[]>>();
  private fetchEvents: (limit: number) => Promise<RawEvent[]>;
  private now: () => number;

  constructor(opts: EventCacheOptions) {
    this.fetchEvents = opts.fetch;
    this.ttlMs = opts.ttlMs;
    this.now = opts.now ?? (() => performance.now());
  }

  async get(limit: number): Promise<RawEvent[]> {
    const startedAtMs = this.now();

    const cached = this.entries.get(limit);
    if (cached && startedAtMs - cached.fetchedAtMs < this.ttlMs) return cached.events;

    const existing = this.inFlight.get(limit);
    if (existing) return existing;

    // Deferred so the slot is registered before the fetch can settle.
    const pending = Promise.resolve()
      .then(() => this.fetchEvents(limit))
      .then((events) => {
        this.entries.set(limit, { events, fetchedAtMs: startedAtMs });
        return events;
      })
      .finally(() => {
        this.inFlight.delete(limit);
      });

    this.inFlight.set(limit, pending);
    return pending;
  }

  clear() {
    this.entries.clear();
  }
}
