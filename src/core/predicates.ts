/**
 * Composable record filters.
 *
 * A PredicateSet holds two groups of predicates: field predicates, evaluated
 * against the raw list record, and detail predicates, evaluated against the
 * result of a secondary lookup. Field predicates always run first so that a
 * record failing a cheap check never costs a remote call.
 */

import type { Range } from '@shared/types';
import { ConfigurationError } from '@shared/errors';

export type Predicate<T> = (value: T) => boolean;

/**
 * Immutable AND-composition of predicates. An empty set accepts everything.
 */
export class PredicateSet<TRecord, TDetail = never> {
  private constructor(
    private readonly fieldPredicates: ReadonlyArray<Predicate<TRecord>>,
    private readonly detailPredicates: ReadonlyArray<Predicate<TDetail>>
  ) {}

  static empty<TRecord, TDetail = never>(): PredicateSet<TRecord, TDetail> {
    return new PredicateSet<TRecord, TDetail>([], []);
  }

  /**
   * Adds a predicate over the raw record.
   */
  where(predicate: Predicate<TRecord> | undefined): PredicateSet<TRecord, TDetail> {
    if (!predicate) {
      return this;
    }
    return new PredicateSet([...this.fieldPredicates, predicate], this.detailPredicates);
  }

  /**
   * Adds a predicate that needs the enriched detail of the record.
   */
  whereDetail(predicate: Predicate<TDetail> | undefined): PredicateSet<TRecord, TDetail> {
    if (!predicate) {
      return this;
    }
    return new PredicateSet(this.fieldPredicates, [...this.detailPredicates, predicate]);
  }

  get requiresDetail(): boolean {
    return this.detailPredicates.length > 0;
  }

  get size(): number {
    return this.fieldPredicates.length + this.detailPredicates.length;
  }

  matchesFields(record: TRecord): boolean {
    return this.fieldPredicates.every((predicate) => predicate(record));
  }

  matchesDetail(detail: TDetail): boolean {
    return this.detailPredicates.every((predicate) => predicate(detail));
  }
}

/**
 * `field(record)` starts with `prefix`. An empty prefix matches everything.
 */
export function prefixPredicate<T>(prefix: string, field: (record: T) => string): Predicate<T> {
  if (prefix === '') {
    return () => true;
  }
  return (record) => field(record).startsWith(prefix);
}

/**
 * Unanchored regular-expression search over `field(record)`.
 *
 * @throws {ConfigurationError} If the pattern does not compile
 */
export function regexPredicate<T>(pattern: string, field: (record: T) => string): Predicate<T> {
  let compiled: RegExp;
  try {
    compiled = new RegExp(pattern);
  } catch (error) {
    throw new ConfigurationError(`Invalid regular expression '${pattern}'`, { cause: error });
  }
  return (record) => compiled.test(field(record));
}

/**
 * Inclusive numeric range. Records without a value are excluded.
 *
 * @throws {ConfigurationError} If min is greater than max
 */
export function rangePredicate<T>(
  range: Range<number>,
  field: (record: T) => number | undefined
): Predicate<T> {
  const { min, max } = range;
  if (min !== undefined && max !== undefined && min > max) {
    throw new ConfigurationError(`Invalid range: minimum ${min} is greater than maximum ${max}`);
  }
  return (record) => {
    const value = field(record);
    if (value === undefined) {
      return false;
    }
    return (min === undefined || value >= min) && (max === undefined || value <= max);
  };
}

/**
 * Inclusive time range over UTC instants. Records without a timestamp are excluded.
 *
 * @throws {ConfigurationError} If `min` is later than `max`
 */
export function timeRangePredicate<T>(
  range: Range<Date>,
  field: (record: T) => Date | undefined
): Predicate<T> {
  const min = range.min?.getTime();
  const max = range.max?.getTime();
  if (min !== undefined && max !== undefined && min > max) {
    throw new ConfigurationError(
      `Invalid time range: ${range.min?.toISOString()} is later than ${range.max?.toISOString()}`
    );
  }
  return rangePredicate<T>({ min, max }, (record) => field(record)?.getTime());
}

/**
 * Every expected tag is present with an equal value.
 */
export function tagPredicate(expected: Readonly<Record<string, string>>): Predicate<Record<string, string>> {
  const entries = Object.entries(expected);
  return (tags) => entries.every(([key, value]) => Object.hasOwn(tags, key) && tags[key] === value);
}

/**
 * `field(value)` equals `expected`.
 */
export function equalsPredicate<T, V>(expected: V, field: (value: T) => V | undefined): Predicate<T> {
  return (value) => field(value) === expected;
}
