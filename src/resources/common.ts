/**
 * Options and helpers shared by the per-resource listers.
 */

import type { EnrichmentResult, WarningHandler } from '@shared/types';
import { PredicateSet, prefixPredicate, regexPredicate } from '@core/predicates';

export interface ListOptions {
  /**
   * Include additional fields, fetching per-record details where needed.
   */
  verbose?: boolean;
  limit?: number;
  onWarning?: WarningHandler;
}

export interface NameFilterOptions {
  prefix?: string;
  regex?: string;
}

/**
 * Adds the name prefix and regex predicates, when given.
 */
export function withNameFilters<TRecord, TDetail>(
  predicates: PredicateSet<TRecord, TDetail>,
  filters: NameFilterOptions,
  name: (record: TRecord) => string
): PredicateSet<TRecord, TDetail> {
  return predicates
    .where(filters.prefix ? prefixPredicate(filters.prefix, name) : undefined)
    .where(filters.regex !== undefined ? regexPredicate(filters.regex, name) : undefined);
}

export function isoOrNull(date: Date | undefined): string | null {
  return date ? date.toISOString() : null;
}

/**
 * Whole seconds between two instants, or null when either is missing.
 */
export function secondsBetween(start: Date | undefined, end: Date | undefined): number | null {
  if (!start || !end) {
    return null;
  }
  return Math.round((end.getTime() - start.getTime()) / 1000);
}

/**
 * Marker field for a record whose verbose lookup failed.
 */
export function enrichmentMarker<T>(result: EnrichmentResult<T> | undefined): { enrichment_error?: string } {
  return result && !result.ok ? { enrichment_error: result.error.message } : {};
}

/**
 * Converts an SDK "Key/Value" tag list into a map.
 */
export function tagListToMap(tags: ReadonlyArray<{ Key?: string; Value?: string }> | undefined): Record<string, string> {
  const map: Record<string, string> = {};
  for (const tag of tags ?? []) {
    if (tag.Key) {
      map[tag.Key] = tag.Value ?? '';
    }
  }
  return map;
}

/**
 * Last segment of a dotted class name, e.g. "org.apache.hadoop.mapred.TextInputFormat" -> "TextInputFormat".
 */
export function shortClassName(className: string | undefined): string {
  return className ? (className.split('.').pop() ?? '') : '';
}

/**
 * Lazy stream of output records produced by a lister.
 */
export type RecordStream<T> = AsyncGenerator<T, void, undefined>;
