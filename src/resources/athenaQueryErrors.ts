/**
 * Failed Athena queries of one workgroup.
 *
 * ListQueryExecutions returns ids only; each page is resolved with
 * BatchGetQueryExecution (at most 50 ids per call) before filtering. Ids the
 * service could not resolve are reported as skipped.
 */

import {
  AthenaClient,
  ListQueryExecutionsCommand,
  BatchGetQueryExecutionCommand,
  type QueryExecution,
} from '@aws-sdk/client-athena';
import { PageSource } from '@core/pageSource';
import { PredicateSet } from '@core/predicates';
import { discover, logWarning } from '@core/pipeline';
import { isoOrNull, type ListOptions, type RecordStream } from './common';

export const DEFAULT_WORKGROUP = 'primary';

/**
 * BatchGetQueryExecution limit.
 */
export const QUERY_BATCH_SIZE = 50;

export interface AthenaQueryErrorListOptions extends ListOptions {
  workgroup?: string;
  /**
   * Keep queries submitted at or after this instant.
   */
  since: Date;
}

export type AthenaQueryErrorRecord = {
  query_id: string;
  workgroup: string;
  database: string;
  submission_time: string | null;
  failure_reason: string;
  error_category: number | null;
  error_type: number | null;
  query?: string;
  statement_type?: string;
  output_location?: string;
};

export function toAthenaQueryErrorRecord(execution: QueryExecution, verbose: boolean): AthenaQueryErrorRecord {
  const status = execution.Status;
  const record: AthenaQueryErrorRecord = {
    query_id: execution.QueryExecutionId ?? '',
    workgroup: execution.WorkGroup ?? '',
    database: execution.QueryExecutionContext?.Database ?? '',
    submission_time: isoOrNull(status?.SubmissionDateTime),
    failure_reason: status?.StateChangeReason ?? '',
    error_category: status?.AthenaError?.ErrorCategory ?? null,
    error_type: status?.AthenaError?.ErrorType ?? null,
  };
  if (verbose) {
    record.query = execution.Query ?? '';
    record.statement_type = execution.StatementType ?? '';
    record.output_location = execution.ResultConfiguration?.OutputLocation ?? '';
  }
  return record;
}

/**
 * Lists failed queries of a workgroup submitted inside the look-back window.
 */
export function listAthenaQueryErrors(
  client: AthenaClient,
  options: AthenaQueryErrorListOptions
): RecordStream<AthenaQueryErrorRecord> {
  const { workgroup = DEFAULT_WORKGROUP, since, verbose = false, onWarning = logWarning } = options;

  const source = new PageSource<QueryExecution>('athena:ListQueryExecutions', async (cursor) => {
    const response = await client.send(new ListQueryExecutionsCommand({ WorkGroup: workgroup, NextToken: cursor }));
    const ids = response.QueryExecutionIds ?? [];
    const executions: QueryExecution[] = [];
    for (let start = 0; start < ids.length; start += QUERY_BATCH_SIZE) {
      const batch = await client.send(
        new BatchGetQueryExecutionCommand({ QueryExecutionIds: ids.slice(start, start + QUERY_BATCH_SIZE) })
      );
      executions.push(...(batch.QueryExecutions ?? []));
      for (const unprocessed of batch.UnprocessedQueryExecutionIds ?? []) {
        onWarning({
          kind: 'skipped',
          resource: unprocessed.QueryExecutionId ?? '',
          step: 'batch-get-query-execution',
          message: `Query ${unprocessed.QueryExecutionId ?? ''} could not be read: ${
            unprocessed.ErrorMessage ?? unprocessed.ErrorCode ?? 'unknown error'
          }`,
        });
      }
    }
    return { items: executions, nextCursor: response.NextToken };
  });

  const predicates = PredicateSet.empty<QueryExecution>()
    .where((execution) => execution.Status?.State === 'FAILED')
    .where((execution) => {
      const submitted = execution.Status?.SubmissionDateTime;
      return submitted !== undefined && submitted.getTime() >= since.getTime();
    });

  return discover({
    source,
    predicates,
    shape: (execution) => toAthenaQueryErrorRecord(execution, verbose),
    describe: (execution) => execution.QueryExecutionId ?? '',
    limit: options.limit,
    onWarning,
  });
}
