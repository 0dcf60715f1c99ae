/**
 * SageMaker training, processing and transform job listing.
 *
 * Each job type is listed newest first with the name and status filters
 * applied by the service. Listing "all" types merges the three ordered
 * streams so the combined output stays newest first without buffering.
 */

import {
  SageMakerClient,
  ListTrainingJobsCommand,
  ListProcessingJobsCommand,
  ListTransformJobsCommand,
  DescribeTrainingJobCommand,
  DescribeProcessingJobCommand,
  DescribeTransformJobCommand,
} from '@aws-sdk/client-sagemaker';
import { ConfigurationError } from '@shared/errors';
import type { ListOperation } from '@shared/types';
import { PageSource } from '@core/pageSource';
import { PredicateSet, prefixPredicate } from '@core/predicates';
import { discover } from '@core/pipeline';
import { mergeSorted, take } from '@core/merge';
import type { EnrichmentStep } from '@core/enrichment';
import {
  enrichmentMarker,
  isoOrNull,
  secondsBetween,
  type ListOptions,
  type RecordStream,
} from './common';

export const SAGEMAKER_JOB_TYPES = ['training', 'processing', 'transform'] as const;
export type SageMakerJobType = (typeof SAGEMAKER_JOB_TYPES)[number];

export const SAGEMAKER_JOB_STATUSES = ['InProgress', 'Completed', 'Failed', 'Stopping', 'Stopped'] as const;
export type SageMakerJobStatus = (typeof SAGEMAKER_JOB_STATUSES)[number];

export function isSageMakerJobStatus(value: string): value is SageMakerJobStatus {
  return SAGEMAKER_JOB_STATUSES.some((status) => status === value);
}

export function isSageMakerJobType(value: string): value is SageMakerJobType | 'all' {
  return value === 'all' || SAGEMAKER_JOB_TYPES.some((type) => type === value);
}

export interface SageMakerJobListOptions extends ListOptions {
  prefix?: string;
  status?: string;
  type?: SageMakerJobType | 'all';
}

/**
 * Fields common to the three job summaries.
 */
export interface JobSummary {
  type: SageMakerJobType;
  name: string;
  status: string;
  creationTime?: Date;
  endTime?: Date;
}

/**
 * Verbose details common to the three describe calls.
 */
export interface JobDetails {
  instanceType: string;
  instanceCount: number;
  roleArn?: string;
  modelName?: string;
}

export type SageMakerJobRecord = {
  name: string;
  type: SageMakerJobType;
  status: string;
  created_time: string | null;
  end_time: string | null;
  duration_seconds: number | null;
  instance_type?: string;
  instance_count?: number;
  role_arn?: string;
  model_name?: string;
  enrichment_error?: string;
};

/**
 * Maps a job summary (and its details, when fetched) to its output record.
 */
export function toSageMakerJobRecord(job: JobSummary, details: JobDetails | undefined): SageMakerJobRecord {
  const record: SageMakerJobRecord = {
    name: job.name,
    type: job.type,
    status: job.status,
    created_time: isoOrNull(job.creationTime),
    end_time: isoOrNull(job.endTime),
    duration_seconds: secondsBetween(job.creationTime, job.endTime),
  };
  if (details) {
    record.instance_type = details.instanceType;
    record.instance_count = details.instanceCount;
    if (details.roleArn !== undefined) {
      record.role_arn = details.roleArn;
    }
    if (details.modelName !== undefined) {
      record.model_name = details.modelName;
    }
  }
  return record;
}

interface JobTypeAdapter {
  operation: string;
  list: (client: SageMakerClient, filters: ListFilters) => ListOperation<JobSummary>;
  describe: (client: SageMakerClient, name: string) => Promise<JobDetails>;
}

interface ListFilters {
  nameContains?: string;
  status?: SageMakerJobStatus;
}

const SORT = { SortBy: 'CreationTime', SortOrder: 'Descending' } as const;

const ADAPTERS: Record<SageMakerJobType, JobTypeAdapter> = {
  training: {
    operation: 'sagemaker:ListTrainingJobs',
    list: (client, filters) => async (cursor) => {
      const response = await client.send(
        new ListTrainingJobsCommand({
          ...SORT,
          NameContains: filters.nameContains,
          StatusEquals: filters.status,
          NextToken: cursor,
        })
      );
      return {
        items: (response.TrainingJobSummaries ?? []).map((job) => ({
          type: 'training' as const,
          name: job.TrainingJobName ?? '',
          status: job.TrainingJobStatus ?? '',
          creationTime: job.CreationTime,
          endTime: job.TrainingEndTime,
        })),
        nextCursor: response.NextToken,
      };
    },
    describe: async (client, name) => {
      const details = await client.send(new DescribeTrainingJobCommand({ TrainingJobName: name }));
      return {
        instanceType: details.ResourceConfig?.InstanceType ?? '',
        instanceCount: details.ResourceConfig?.InstanceCount ?? 0,
        roleArn: details.RoleArn ?? '',
      };
    },
  },
  processing: {
    operation: 'sagemaker:ListProcessingJobs',
    list: (client, filters) => async (cursor) => {
      const response = await client.send(
        new ListProcessingJobsCommand({
          ...SORT,
          NameContains: filters.nameContains,
          StatusEquals: filters.status,
          NextToken: cursor,
        })
      );
      return {
        items: (response.ProcessingJobSummaries ?? []).map((job) => ({
          type: 'processing' as const,
          name: job.ProcessingJobName ?? '',
          status: job.ProcessingJobStatus ?? '',
          creationTime: job.CreationTime,
          endTime: job.ProcessingEndTime,
        })),
        nextCursor: response.NextToken,
      };
    },
    describe: async (client, name) => {
      const details = await client.send(new DescribeProcessingJobCommand({ ProcessingJobName: name }));
      const cluster = details.ProcessingResources?.ClusterConfig;
      return {
        instanceType: cluster?.InstanceType ?? '',
        instanceCount: cluster?.InstanceCount ?? 0,
        roleArn: details.RoleArn ?? '',
      };
    },
  },
  transform: {
    operation: 'sagemaker:ListTransformJobs',
    list: (client, filters) => async (cursor) => {
      const response = await client.send(
        new ListTransformJobsCommand({
          ...SORT,
          NameContains: filters.nameContains,
          StatusEquals: filters.status,
          NextToken: cursor,
        })
      );
      return {
        items: (response.TransformJobSummaries ?? []).map((job) => ({
          type: 'transform' as const,
          name: job.TransformJobName ?? '',
          status: job.TransformJobStatus ?? '',
          creationTime: job.CreationTime,
          endTime: job.TransformEndTime,
        })),
        nextCursor: response.NextToken,
      };
    },
    describe: async (client, name) => {
      const details = await client.send(new DescribeTransformJobCommand({ TransformJobName: name }));
      return {
        instanceType: details.TransformResources?.InstanceType ?? '',
        instanceCount: details.TransformResources?.InstanceCount ?? 0,
        modelName: details.ModelName ?? '',
      };
    },
  },
};

/**
 * Newest first; jobs without a creation time sort last.
 */
function newestFirst(a: SageMakerJobRecord, b: SageMakerJobRecord): number {
  return (b.created_time ?? '').localeCompare(a.created_time ?? '');
}

/**
 * Lists SageMaker jobs of one type, or of all types merged newest first.
 *
 * @throws {ConfigurationError} If the status or job type is not recognised
 */
export function listSageMakerJobs(
  client: SageMakerClient,
  options: SageMakerJobListOptions
): RecordStream<SageMakerJobRecord> {
  const { prefix = '', status, type = 'all', verbose = false } = options;
  if (status !== undefined && !isSageMakerJobStatus(status)) {
    throw new ConfigurationError(
      `Invalid SageMaker job status '${status}'. Valid values: ${SAGEMAKER_JOB_STATUSES.join(', ')}`
    );
  }
  if (!isSageMakerJobType(type)) {
    throw new ConfigurationError(
      `Invalid SageMaker job type '${String(type)}'. Valid values: ${[...SAGEMAKER_JOB_TYPES, 'all'].join(', ')}`
    );
  }

  const filters: ListFilters = { nameContains: prefix || undefined, status };
  const types: readonly SageMakerJobType[] = type === 'all' ? SAGEMAKER_JOB_TYPES : [type];

  const streams = types.map((jobType) => {
    const adapter = ADAPTERS[jobType];
    const details: EnrichmentStep<JobSummary, JobDetails> = {
      name: `describe-${jobType}-job`,
      lookup: (job) => adapter.describe(client, job.name),
    };
    return discover({
      source: new PageSource(adapter.operation, adapter.list(client, filters)),
      // NameContains is a substring match; the prefix is enforced here.
      predicates: PredicateSet.empty<JobSummary>().where(
        prefix ? prefixPredicate<JobSummary>(prefix, (job) => job.name) : undefined
      ),
      displayEnrichment: details,
      verbose,
      shape: (job, enriched) => ({
        ...toSageMakerJobRecord(job, enriched.display?.ok ? enriched.display.value : undefined),
        ...enrichmentMarker(enriched.display),
      }),
      describe: (job) => `${job.type}/${job.name}`,
      limit: types.length === 1 ? options.limit : undefined,
      onWarning: options.onWarning,
    });
  });

  if (streams.length === 1) {
    return streams[0];
  }
  return take(mergeSorted(streams, newestFirst), options.limit);
}
