import { END_DATE_KEYS, pickField, toNumberOrNull } from './fields.js';
import type { Contender, DetailedContender, RawEvent, RawMarket } from './types.js';

export const TOP_N_CONTENDERS = 5;

export const CONTENDER_NAME_KEYS = ['groupItemTitle', 'question'] as const;

const DEFAULT_OUTCOME_PRICES = '[0,1]';

/** Yes probability from the JSON-encoded `outcomePrices` string; 0 when it cannot be read. */
export function parseYes(outcomePrices: unknown): number {
  let prices: unknown;
  if (Array.isArray(outcomePrices)) {
    prices = outcomePrices;
  } else {
    const encoded = outcomePrices == null || outcomePrices === '' ? DEFAULT_OUTCOME_PRICES : outcomePrices;
    if (typeof encoded !== 'string') return 0;
    try {
      prices = JSON.parse(encoded);
    } catch {
      return 0;
    }
  }
  if (!Array.isArray(prices) || prices.length === 0) return 0;
  return toNumberOrNull(prices[0]) ?? 0;
}

function toContender(market: RawMarket): DetailedContender {
  return {
    name: pickField(market, CONTENDER_NAME_KEYS) ?? '?',
    yes: parseYes(market.outcomePrices),
    delta: toNumberOrNull(market.oneDayPriceChange),
    endDate: pickField(market, END_DATE_KEYS) ?? ''
  };
}

// Array.prototype.sort is stable, so equal prices keep upstream order.
export function allContenders(event: RawEvent): DetailedContender[] {
  return event.markets.map(toContender).sort((a, b) => b.yes - a.yes);
}

export function topContenders(event: RawEvent, k = TOP_N_CONTENDERS): Contender[] {
  return allContenders(event)
    .slice(0, Math.max(0, k))
    .map(({ name, yes, delta }) => ({ name, yes, delta }));
}
