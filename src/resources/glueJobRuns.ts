/**
 * Recent runs of one Glue job.
 *
 * GetJobRuns has no time filter, so the look-back window is applied locally.
 * Runs that have not recorded a start time yet are always kept.
 */

import { GlueClient, GetJobRunsCommand, type JobRun } from '@aws-sdk/client-glue';
import { ConfigurationError } from '@shared/errors';
import { PageSource } from '@core/pageSource';
import { PredicateSet } from '@core/predicates';
import { discover } from '@core/pipeline';
import { GLUE_JOB_RUN_STATES, isJobRunState } from './glueJobs';
import { isoOrNull, type ListOptions, type RecordStream } from './common';

export interface GlueJobRunListOptions extends ListOptions {
  jobName: string;
  /**
   * Keep runs started at or after this instant.
   */
  since: Date;
  status?: string;
}

export type GlueJobRunRecord = {
  job_name: string;
  run_id: string;
  attempt: number;
  status: string;
  started_on: string | null;
  completed_on: string | null;
  execution_time: number;
  error_message: string;
  worker_type?: string;
  number_of_workers?: number;
  max_capacity?: number;
  arguments?: Record<string, string>;
};

export function toGlueJobRunRecord(run: JobRun, verbose: boolean): GlueJobRunRecord {
  const record: GlueJobRunRecord = {
    job_name: run.JobName ?? '',
    run_id: run.Id ?? '',
    attempt: run.Attempt ?? 0,
    status: run.JobRunState ?? '',
    started_on: isoOrNull(run.StartedOn),
    completed_on: isoOrNull(run.CompletedOn),
    execution_time: run.ExecutionTime ?? 0,
    error_message: run.ErrorMessage ?? '',
  };
  if (verbose) {
    record.worker_type = run.WorkerType ?? '';
    record.number_of_workers = run.NumberOfWorkers ?? 0;
    record.max_capacity = run.MaxCapacity ?? 0;
    record.arguments = { ...run.Arguments };
  }
  return record;
}

/**
 * Lists the runs of a Glue job inside the look-back window.
 *
 * @throws {ConfigurationError} If the job name is empty or the status is not a run state
 */
export function listGlueJobRuns(client: GlueClient, options: GlueJobRunListOptions): RecordStream<GlueJobRunRecord> {
  const { jobName, since, status, verbose = false } = options;
  if (!jobName) {
    throw new ConfigurationError('A Glue job name is required');
  }
  if (status !== undefined && !isJobRunState(status)) {
    throw new ConfigurationError(
      `Invalid Glue job status '${status}'. Valid values: ${GLUE_JOB_RUN_STATES.join(', ')}`
    );
  }

  const source = new PageSource<JobRun>('glue:GetJobRuns', async (cursor) => {
    const response = await client.send(new GetJobRunsCommand({ JobName: jobName, NextToken: cursor }));
    return { items: response.JobRuns ?? [], nextCursor: response.NextToken };
  });

  const predicates = PredicateSet.empty<JobRun>()
    .where((run) => run.StartedOn === undefined || run.StartedOn.getTime() >= since.getTime())
    .where(status !== undefined ? (run) => run.JobRunState === status : undefined);

  return discover({
    source,
    predicates,
    shape: (run) => toGlueJobRunRecord(run, verbose),
    describe: (run) => run.Id ?? '',
    limit: options.limit,
    onWarning: options.onWarning,
  });
}
