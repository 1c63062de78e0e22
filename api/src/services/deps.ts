import type { FastifyBaseLogger } from "fastify";
import type { AnalysisConfig } from "../config.js";
import type { GraphAccessor } from "./graph-accessor.js";

export interface AnalysisDeps {
  accessor: GraphAccessor;
  config: AnalysisConfig;
  log?: FastifyBaseLogger;
}

/** Upper bound on concurrent graph reads issued by one fan-out step. */
export const READ_BATCH_SIZE = 16;

/** Maps `items` in slices of `batchSize`, awaiting each slice before the next; order is preserved. */
export async function mapInBatches<T, R>(
  items: readonly T[],
  fn: (item: T) => Promise<R>,
  batchSize: number = READ_BATCH_SIZE,
): Promise<R[]> {
  const results: R[] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    const batch = items.slice(i, i + batchSize);
    results.push(...(await Promise.all(batch.map(fn))));
  }
  return results;
}
