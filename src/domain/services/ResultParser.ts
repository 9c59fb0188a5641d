import { z } from 'zod';
import type { BatchResult } from '../model/BatchResult.js';
import { MATCHED_STATUS, noMatchResult } from '../model/BatchResult.js';

// Every field degrades to null instead of failing the whole batch.
const nullableNumber = z.number().finite().nullish().catch(null);
const nullableString = z.string().nullish().catch(null);

const matchSchema = z
  .object({
    type: nullableString,
    entityType: nullableString,
    score: nullableNumber,
    position: z.object({ lat: nullableNumber, lon: nullableNumber }).nullish().catch(null),
  })
  .catch({ type: null, entityType: null, score: null, position: null });

const batchItemSchema = z
  .object({
    response: z
      .object({ results: z.array(matchSchema).nullish().catch(null) })
      .nullish()
      .catch(null),
  })
  .catch({ response: null });

const batchBodySchema = z
  .object({ batchItems: z.array(batchItemSchema).nullish().catch(null) })
  .catch({ batchItems: null });

type BatchMatch = z.infer<typeof matchSchema>;

/**
 * Extract the best match for every item of a ready batch response.
 *
 * Output order mirrors `batchItems`. A missing or empty `batchItems` yields
 * an empty array; the caller checks the count against what was submitted.
 */
export function parseBatchResults(body: unknown): BatchResult[] {
  const { batchItems } = batchBodySchema.parse(body);
  if (!batchItems) return [];

  return batchItems.map((item) => {
    const best = item.response?.results?.[0];
    return best ? toBatchResult(best) : noMatchResult();
  });
}

function toBatchResult(best: BatchMatch): BatchResult {
  return {
    lat: best.position?.lat ?? null,
    lon: best.position?.lon ?? null,
    status: best.type || best.entityType || MATCHED_STATUS,
    confidence: best.score ?? null,
  };
}
