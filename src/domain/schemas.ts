import { z } from 'zod';

export const WireTradeSchema = z.object({
  s: z.string().min(1),
  p: z.number().finite(),
  v: z.number().finite(),
  t: z.number().int().nonnegative(),
});

export const FeedMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('error'), msg: z.string() }),
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('trade'), data: z.array(WireTradeSchema) }),
]);

export const TickerRecordSchema = z.object({
  symbol: z.string().min(1),
  price: z.number().finite(),
  volume: z.number().finite(),
  timestamp: z.number().int().nonnegative(),
});

export const PersistedSessionSchema = z.object({
  apiKey: z.string().default(''),
  tracked: z.array(z.string().min(1)).default([]),
  history: z.record(z.string(), z.array(TickerRecordSchema)).default({}),
});
