/**
 * Core type definitions for cloud-sweep.
 *
 * Centralizes shared types to avoid circular dependencies.
 */

import type { EnrichmentError } from './errors';

/**
 * A JSON value as it appears in an output record.
 */
export type FieldValue = string | number | boolean | null | FieldValue[] | { [key: string]: FieldValue };

/**
 * Flat mapping from field name to value, in schema order.
 * Timestamps are ISO-8601 strings. Undefined fields are treated as absent.
 */
export type OutputRecord = Record<string, FieldValue | undefined>;

/**
 * Supported output renderings.
 */
export type OutputFormat = 'jsonl' | 'json' | 'tsv' | 'csv' | 'table';

/**
 * One page returned by a remote list operation.
 */
export interface Page<T> {
  items: readonly T[];
  /**
   * Continuation token; absent when the listing is exhausted.
   */
  nextCursor?: string;
}

/**
 * Remote list capability: one call per page, driven by the previous cursor.
 */
export type ListOperation<T> = (cursor: string | undefined) => Promise<Page<T>>;

/**
 * Inclusive range; either bound may be absent.
 */
export interface Range<T> {
  min?: T;
  max?: T;
}

/**
 * Outcome of a per-record secondary lookup.
 */
export type EnrichmentResult<T> = { ok: true; value: T } | { ok: false; error: EnrichmentError };

/**
 * Kinds of side-channel warnings emitted while scanning.
 *
 * - excluded-unverified: a filter needed a lookup that failed; the record was
 *   excluded without knowing whether it matches
 * - enrichment-unavailable: verbose details could not be fetched; the record
 *   was yielded with an `enrichment_error` field
 * - skipped: a mandatory lookup failed; the record was skipped
 */
export type DiscoveryWarningKind = 'excluded-unverified' | 'enrichment-unavailable' | 'skipped';

export interface DiscoveryWarning {
  kind: DiscoveryWarningKind;
  resource: string;
  step: string;
  message: string;
}

export type WarningHandler = (warning: DiscoveryWarning) => void;

/**
 * Snapshot of one failed workflow execution, the unit of retry.
 */
export interface ExecutionDescriptor {
  stateMachineArn: string;
  executionArn: string;
  name: string;
  startDate: Date;
  status: 'FAILED';
  /**
   * Original input payload, serialized JSON exactly as the service returned it.
   */
  input: string;
}

export type RetryMode = 'dry-run' | 'execute';

export type RetryOutcome =
  | {
      kind: 'would-retry';
      stateMachineArn: string;
      executionArn: string;
      input: string;
    }
  | {
      kind: 'retried';
      stateMachineArn: string;
      executionArn: string;
      retryExecutionArn: string;
      retryName: string;
    }
  | {
      kind: 'failed';
      stateMachineArn: string;
      executionArn: string;
      error: string;
      errorName: string;
    };

/**
 * Retry run summary.
 */
export interface RetryReport {
  mode: RetryMode;
  total: number;
  wouldRetry: number;
  retried: number;
  failed: number;
  outcomes: RetryOutcome[];
}
