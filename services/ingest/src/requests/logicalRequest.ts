import { z } from 'zod';

import { parseDateInt } from '../partitions/calendar';
import type { PartitionAddress } from '../partitions/keys';

export const DEFAULT_INTERVAL_MS = 3_600_000;

const symbolSchema = z
  .string()
  .trim()
  .min(1)
  .max(16)
  .transform((value) => value.toUpperCase())
  .pipe(z.string().regex(/^[A-Z0-9.]+$/, 'Symbol may only contain letters, digits and dots'));

const boundSchema = z.number().int().positive();

const rangeFields = {
  start: boundSchema.optional(),
  end: boundSchema.optional(),
  all: z.boolean().default(false),
  forceRefresh: z.boolean().default(false)
};

const marketFields = {
  ...rangeFields,
  symbol: symbolSchema,
  interval: z.number().int().nonnegative().default(DEFAULT_INTERVAL_MS),
  granularity: z.enum(['monthly', 'daily']).default('monthly')
};

const optionRequestSchema = z.object({
  kind: z.enum(['option-quote', 'option-eod']),
  ...marketFields,
  expiration: z
    .number()
    .int()
    .nonnegative()
    .default(0)
    .refine((value) => value === 0 || parseDateInt(value) !== null, {
      message: 'Expiration must be 0 (all expirations) or a YYYYMMDD date'
    })
});

const stockRequestSchema = z.object({
  kind: z.enum(['stock-quote', 'stock-eod']),
  ...marketFields
});

const earningsRequestSchema = z.object({
  kind: z.literal('earnings'),
  ...rangeFields
});

export const logicalRequestSchema = z.discriminatedUnion('kind', [
  optionRequestSchema,
  stockRequestSchema,
  earningsRequestSchema
]);

export type LogicalRequestInput = z.input<typeof logicalRequestSchema>;
export type LogicalRequest = Readonly<z.infer<typeof logicalRequestSchema>>;
export type OptionRequest = Readonly<z.infer<typeof optionRequestSchema>>;
export type StockRequest = Readonly<z.infer<typeof stockRequestSchema>>;
export type EarningsRequest = Readonly<z.infer<typeof earningsRequestSchema>>;
export type MarketRequest = OptionRequest | StockRequest;

/** Validates caller input; throws the ZodError on failure. */
export function parseLogicalRequest(input: unknown): LogicalRequest {
  return Object.freeze(logicalRequestSchema.parse(input));
}

export function addressOf(request: LogicalRequest): PartitionAddress {
  if (request.kind === 'earnings') {
    return { kind: 'earnings', symbol: null, granularity: 'monthly', intervalMs: 0 };
  }
  const address: PartitionAddress = {
    kind: request.kind,
    symbol: request.symbol,
    granularity: request.granularity,
    intervalMs: request.interval
  };
  if (request.kind === 'option-quote' || request.kind === 'option-eod') {
    address.expiration = request.expiration;
  }
  return address;
}

export function describeRequest(request: LogicalRequest): string {
  const range = request.all ? 'all' : `${request.start ?? '?'}..${request.end ?? request.start ?? '?'}`;
  if (request.kind === 'earnings') {
    return `earnings ${range}`;
  }
  return `${request.kind} ${request.symbol} ${range}`;
}
