/**
 * Generic discovery pipeline.
 *
 * Page source -> records -> field predicates -> filter enrichment ->
 * detail predicates -> display enrichment -> shape -> limit.
 *
 * The pipeline is a pull-based async generator: nothing is fetched until the
 * consumer asks for the next record, and at most one remote call is in
 * flight at any time.
 */

import type { DiscoveryWarning, EnrichmentResult, WarningHandler } from '@shared/types';
import { ConfigurationError } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';
import type { PredicateSet } from './predicates';
import { runEnrichment, type EnrichmentStep } from './enrichment';

const logger = setupLogger('cloud-sweep:pipeline');

/**
 * Lookup results handed to the shaping function.
 */
export interface Enriched<TDetail, TDisplay> {
  /**
   * Result of the filter enrichment, present when it ran and succeeded.
   */
  detail?: TDetail;
  /**
   * Result of the display enrichment, present when verbose output asked for it.
   */
  display?: EnrichmentResult<TDisplay>;
}

export interface DiscoveryOptions<TRecord, TDetail, TDisplay, TOut> {
  source: AsyncIterable<readonly TRecord[]>;
  predicates: PredicateSet<TRecord, TDetail>;
  /**
   * Lookup needed to evaluate detail predicates. Runs only for records that
   * passed every field predicate.
   */
  filterEnrichment?: EnrichmentStep<TRecord, TDetail>;
  /**
   * Run the filter enrichment for every record even without detail
   * predicates; records whose lookup fails are skipped.
   */
  mandatoryEnrichment?: boolean;
  /**
   * Lookup for verbose fields only. A failure never excludes the record.
   */
  displayEnrichment?: EnrichmentStep<TRecord, TDisplay>;
  verbose?: boolean;
  shape: (record: TRecord, enriched: Enriched<TDetail, TDisplay>) => TOut;
  /**
   * Identity of a record for warnings, usually its name or ARN.
   */
  describe: (record: TRecord) => string;
  /**
   * Ends the scan at the first record for which this returns true, before
   * any predicate runs. For listings ordered so that no later record can
   * match, e.g. newest first against a start-time cutoff.
   */
  until?: (record: TRecord) => boolean;
  limit?: number;
  onWarning?: WarningHandler;
}

/**
 * Default warning sink: the side channel is the structured log.
 */
export function logWarning(warning: DiscoveryWarning): void {
  logger.warn(
    { kind: warning.kind, resource: warning.resource, step: warning.step },
    warning.message
  );
}

/**
 * Runs the discovery pipeline.
 *
 * With a limit the generator returns as soon as the last wanted record has
 * been yielded, so no further page is requested.
 *
 * @throws {ConfigurationError} If the limit is not a non-negative integer
 * @throws {TransportError} When a page cannot be fetched (propagated from the source)
 */
export async function* discover<TRecord, TDetail, TDisplay, TOut>(
  options: DiscoveryOptions<TRecord, TDetail, TDisplay, TOut>
): AsyncGenerator<TOut, void, undefined> {
  const {
    source,
    predicates,
    filterEnrichment,
    mandatoryEnrichment = false,
    displayEnrichment,
    verbose = false,
    shape,
    describe,
    until,
    limit,
    onWarning = logWarning,
  } = options;

  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    throw new ConfigurationError(`Invalid limit ${limit}. Expected a non-negative integer`);
  }
  if ((predicates.requiresDetail || mandatoryEnrichment) && !filterEnrichment) {
    throw new Error('Detail predicates require a filter enrichment step');
  }
  if (limit === 0) {
    return;
  }

  let scanned = 0;
  let yielded = 0;

  for await (const batch of source) {
    for (const record of batch) {
      if (until?.(record)) {
        logger.debug({ scanned, yielded }, 'Stop condition reached, ending scan');
        return;
      }
      scanned++;

      if (!predicates.matchesFields(record)) {
        continue;
      }

      const enriched: Enriched<TDetail, TDisplay> = {};

      if (filterEnrichment && (predicates.requiresDetail || mandatoryEnrichment)) {
        const result = await runEnrichment(filterEnrichment, record, describe);
        if (!result.ok) {
          onWarning({
            kind: predicates.requiresDetail ? 'excluded-unverified' : 'skipped',
            resource: result.error.resource,
            step: result.error.step,
            message: result.error.message,
          });
          continue;
        }
        if (!predicates.matchesDetail(result.value)) {
          continue;
        }
        enriched.detail = result.value;
      }

      if (verbose && displayEnrichment) {
        const display = await runEnrichment(displayEnrichment, record, describe);
        if (!display.ok) {
          onWarning({
            kind: 'enrichment-unavailable',
            resource: display.error.resource,
            step: display.error.step,
            message: display.error.message,
          });
        }
        enriched.display = display;
      }

      yield shape(record, enriched);
      yielded++;

      if (limit !== undefined && yielded >= limit) {
        logger.debug({ scanned, yielded, limit }, 'Limit reached, stopping scan');
        return;
      }
    }
  }

  logger.debug({ scanned, yielded }, 'Scan complete');
}

/**
 * Drains an async sequence into an array.
 */
export async function collect<T>(sequence: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of sequence) {
    items.push(item);
  }
  return items;
}
