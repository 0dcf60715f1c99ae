/**
 * Per-record secondary lookups (tags, describe calls, last job run).
 */

import type { EnrichmentResult } from '@shared/types';
import { EnrichmentError, describeError } from '@shared/errors';

export interface EnrichmentStep<TRecord, TDetail> {
  /**
   * Short name used in warnings, e.g. "tags" or "describe-execution".
   */
  name: string;
  lookup: (record: TRecord) => Promise<TDetail>;
}

/**
 * Runs one lookup and returns its outcome as a value. Never throws.
 *
 * @param describe - Renders the record identity for the error message
 */
export async function runEnrichment<TRecord, TDetail>(
  step: EnrichmentStep<TRecord, TDetail>,
  record: TRecord,
  describe: (record: TRecord) => string
): Promise<EnrichmentResult<TDetail>> {
  try {
    return { ok: true, value: await step.lookup(record) };
  } catch (error) {
    const resource = describe(record);
    return {
      ok: false,
      error: new EnrichmentError(
        step.name,
        resource,
        `${step.name} lookup failed for ${resource}: ${describeError(error)}`,
        { cause: error }
      ),
    };
  }
}

/**
 * Caches one lookup per record object, failures included, so that two steps
 * backed by the same remote call issue it once.
 */
export function memoizeLookup<TRecord extends object, TDetail>(
  lookup: (record: TRecord) => Promise<TDetail>
): (record: TRecord) => Promise<TDetail> {
  const cache = new WeakMap<TRecord, Promise<TDetail>>();
  return (record) => {
    let pending = cache.get(record);
    if (!pending) {
      pending = lookup(record);
      cache.set(record, pending);
    }
    return pending;
  };
}
