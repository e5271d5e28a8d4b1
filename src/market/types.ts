import { z } from 'zod';

// Upstream records are loosely typed: every field may be missing or carry the
// wrong type. Fields stay `unknown` here and are narrowed by the readers in
// fields.ts; only the container shapes are enforced.

function keepValid<T extends z.ZodTypeAny>(item: T) {
  return (items: unknown[]): z.infer<T>[] =>
    items.flatMap((value) => {
      const parsed = item.safeParse(value);
      return parsed.success ? [parsed.data] : [];
    });
}

export const RawMarketSchema = z
  .object({
    groupItemTitle: z.unknown(),
    question: z.unknown(),
    outcomePrices: z.unknown(),
    oneDayPriceChange: z.unknown(),
    endDate: z.unknown(),
    endDateIso: z.unknown()
  })
  .passthrough();

export const RawEventSchema = z
  .object({
    title: z.unknown(),
    volume: z.unknown(),
    volume24hr: z.unknown(),
    volumeNum: z.unknown(),
    endDate: z.unknown(),
    endDateIso: z.unknown(),
    markets: z.array(z.unknown()).catch([]).transform(keepValid(RawMarketSchema))
  })
  .passthrough();

export const RawEventListSchema = z.array(z.unknown()).transform(keepValid(RawEventSchema));

export type RawMarket = z.infer<typeof RawMarketSchema>;
export type RawEvent = z.infer<typeof RawEventSchema>;

export type DeltaDirection = 'up' | 'down' | 'flat';

export type DeltaView = {
  text: string;
  direction: DeltaDirection;
};

export type Contender = {
  name: string;
  yes: number;
  delta: number | null;
};

export type DetailedContender = Contender & {
  endDate: string;
};
