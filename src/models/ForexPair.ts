/**
 * Forex Pair Models
 * Schemas and types for the forex pair record and its saved file
 */

import { z } from 'zod';

export const MAX_FOREX_PAIR_ID = 18446744073709551615n; // 2^64 - 1

/**
 * A currency-pair quote. The id is chosen by the caller and is the only key.
 * Ids are unsigned 64-bit integers, so they are carried as bigint.
 */
export const ForexPairSchema = z.object({
  id: z.bigint().min(0n).max(MAX_FOREX_PAIR_ID),
  pair: z.string(),
  // Integral JSON numbers arrive as bigint from parseJson
  price: z.preprocess(
    (value) => (typeof value === 'bigint' ? Number(value) : value),
    z.number().finite()
  ),
});

export type ForexPair = z.infer<typeof ForexPairSchema>;

export const ForexPairListSchema = z.array(ForexPairSchema);

/**
 * On-disk shape: every pair keyed by its stringified id.
 */
export const PersistedDatabaseSchema = z.object({
  forex_pairs: z.record(z.string().regex(/^\d+$/), ForexPairSchema),
});

export type PersistedDatabase = z.infer<typeof PersistedDatabaseSchema>;
