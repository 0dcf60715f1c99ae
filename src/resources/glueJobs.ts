/**
 * Glue job listing with last-run status filtering.
 *
 * The last run of a job is not part of the GetJobs response, so filtering on
 * it (and showing it in verbose mode) costs one GetJobRuns call per job.
 */

import { GlueClient, GetJobsCommand, GetJobRunsCommand, JobRunState, type Job, type JobRun } from '@aws-sdk/client-glue';
import { ConfigurationError } from '@shared/errors';
import { PageSource } from '@core/pageSource';
import { PredicateSet, equalsPredicate } from '@core/predicates';
import { discover } from '@core/pipeline';
import { memoizeLookup, type EnrichmentStep } from '@core/enrichment';
import {
  enrichmentMarker,
  isoOrNull,
  withNameFilters,
  type ListOptions,
  type NameFilterOptions,
  type RecordStream,
} from './common';

export const GLUE_JOB_RUN_STATES: readonly string[] = Object.values(JobRunState);

export function isJobRunState(value: string): value is JobRunState {
  return GLUE_JOB_RUN_STATES.includes(value);
}

export interface GlueJobListOptions extends ListOptions, NameFilterOptions {
  /**
   * Keep only jobs whose most recent run is in this state.
   */
  status?: string;
}

export type GlueJobRecord = {
  name: string;
  role: string;
  created_on: string | null;
  max_capacity: number;
  last_run_status?: string;
  last_run_time?: string | null;
  last_run_duration?: number;
  description?: string;
  command?: string;
  script_location?: string;
  max_retries?: number;
  timeout?: number;
  enrichment_error?: string;
};

/**
 * The most recent run of a job, or null when it never ran.
 */
type LastRun = JobRun | null;

/**
 * Maps a job (and its last run, when fetched) to its output record.
 */
export function toGlueJobRecord(job: Job, lastRun: LastRun | undefined, verbose: boolean): GlueJobRecord {
  const record: GlueJobRecord = {
    name: job.Name ?? '',
    role: job.Role ?? '',
    created_on: isoOrNull(job.CreatedOn),
    max_capacity: job.MaxCapacity ?? 0,
  };

  if (lastRun) {
    record.last_run_status = lastRun.JobRunState ?? '';
    record.last_run_time = isoOrNull(lastRun.StartedOn);
    record.last_run_duration = lastRun.ExecutionTime ?? 0;
  }

  if (verbose) {
    record.description = job.Description ?? '';
    record.command = job.Command?.Name ?? '';
    record.script_location = job.Command?.ScriptLocation ?? '';
    record.max_retries = job.MaxRetries ?? 0;
    record.timeout = job.Timeout ?? 0;
  }

  return record;
}

/**
 * Lists Glue jobs.
 *
 * @throws {ConfigurationError} If the status is not a Glue job run state
 */
export function listGlueJobs(client: GlueClient, options: GlueJobListOptions): RecordStream<GlueJobRecord> {
  const { status, verbose = false } = options;
  if (status !== undefined && !isJobRunState(status)) {
    throw new ConfigurationError(
      `Invalid Glue job status '${status}'. Valid values: ${GLUE_JOB_RUN_STATES.join(', ')}`
    );
  }

  const source = new PageSource<Job>('glue:GetJobs', async (cursor) => {
    const response = await client.send(new GetJobsCommand({ NextToken: cursor }));
    return { items: response.Jobs ?? [], nextCursor: response.NextToken };
  });

  const lastRun: EnrichmentStep<Job, LastRun> = {
    name: 'last-run',
    lookup: memoizeLookup(async (job: Job) => {
      const response = await client.send(new GetJobRunsCommand({ JobName: job.Name, MaxResults: 1 }));
      return response.JobRuns?.[0] ?? null;
    }),
  };

  const predicates = withNameFilters(PredicateSet.empty<Job, LastRun>(), options, (job) => job.Name ?? '').whereDetail(
    status !== undefined ? equalsPredicate<LastRun, string>(status, (run) => run?.JobRunState) : undefined
  );

  return discover({
    source,
    predicates,
    filterEnrichment: lastRun,
    displayEnrichment: lastRun,
    verbose,
    shape: (job, enriched) => {
      const run = enriched.detail ?? (enriched.display?.ok ? enriched.display.value : undefined);
      return { ...toGlueJobRecord(job, run, verbose), ...enrichmentMarker(enriched.display) };
    },
    describe: (job) => job.Name ?? '',
    limit: options.limit,
    onWarning: options.onWarning,
  });
}
