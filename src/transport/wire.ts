import { z } from 'zod';
import { InvalidRequestError } from '../core/errors.js';
import type { Signal, Tick } from '../core/types.js';

// proto3 doubles may carry NaN and ±Infinity; the strategy decides what they mean.
const wireDouble = z.union([z.number(), z.nan()]);

export const tickRequestSchema = z.object({
  symbol: z.string().default(''),
  price: wireDouble.default(0),
  indicators: z.record(z.string(), wireDouble).default({})
});

export const signalResponseSchema = z.object({
  action: z.enum(['BUY', 'SELL', 'HOLD']),
  symbol: z.string(),
  size: z.number(),
  note: z.string()
});

export type TickRequest = z.input<typeof tickRequestSchema>;
export type SignalResponse = z.infer<typeof signalResponseSchema>;

export const parseTickRequest = (request: unknown): Tick => {
  const parsed = tickRequestSchema.safeParse(request);
  if (!parsed.success) {
    throw new InvalidRequestError('malformed tick request', {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    });
  }
  return parsed.data;
};

export const parseSignalResponse = (response: unknown): Signal => {
  const parsed = signalResponseSchema.safeParse(response);
  if (!parsed.success) {
    throw new InvalidRequestError('malformed signal response', {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    });
  }
  return parsed.data;
};
