/**
 * Recent executions of one SageMaker pipeline, newest first.
 */

import {
  SageMakerClient,
  ListPipelineExecutionsCommand,
  DescribePipelineExecutionCommand,
  PipelineExecutionStatus,
  type PipelineExecutionSummary,
} from '@aws-sdk/client-sagemaker';
import { ConfigurationError } from '@shared/errors';
import { PageSource } from '@core/pageSource';
import { PredicateSet } from '@core/predicates';
import { discover } from '@core/pipeline';
import type { EnrichmentStep } from '@core/enrichment';
import { enrichmentMarker, isoOrNull, type ListOptions, type RecordStream } from './common';

export const PIPELINE_EXECUTION_STATUSES: readonly string[] = Object.values(PipelineExecutionStatus);

export function isPipelineExecutionStatus(value: string): value is PipelineExecutionStatus {
  return PIPELINE_EXECUTION_STATUSES.includes(value);
}

export interface PipelineExecutionListOptions extends ListOptions {
  pipelineName: string;
  /**
   * Keep executions started at or after this instant.
   */
  since: Date;
  status?: string;
}

export type PipelineExecutionRecord = {
  pipeline_name: string;
  execution_arn: string;
  display_name: string;
  status: string;
  start_time: string | null;
  failure_reason: string;
  last_modified_time?: string | null;
  description?: string;
  enrichment_error?: string;
};

interface PipelineExecutionDetails {
  lastModifiedTime?: Date;
  description?: string;
}

export function toPipelineExecutionRecord(
  pipelineName: string,
  execution: PipelineExecutionSummary,
  details: PipelineExecutionDetails | undefined
): PipelineExecutionRecord {
  const record: PipelineExecutionRecord = {
    pipeline_name: pipelineName,
    execution_arn: execution.PipelineExecutionArn ?? '',
    display_name: execution.PipelineExecutionDisplayName ?? '',
    status: execution.PipelineExecutionStatus ?? '',
    start_time: isoOrNull(execution.StartTime),
    failure_reason: execution.PipelineExecutionFailureReason ?? '',
  };
  if (details) {
    record.last_modified_time = isoOrNull(details.lastModifiedTime);
    record.description = details.description ?? '';
  }
  return record;
}

/**
 * Lists the executions of a pipeline inside the look-back window.
 *
 * @throws {ConfigurationError} If the pipeline name is empty or the status is not recognised
 */
export function listSageMakerPipelineExecutions(
  client: SageMakerClient,
  options: PipelineExecutionListOptions
): RecordStream<PipelineExecutionRecord> {
  const { pipelineName, since, status, verbose = false } = options;
  if (!pipelineName) {
    throw new ConfigurationError('A SageMaker pipeline name is required');
  }
  if (status !== undefined && !isPipelineExecutionStatus(status)) {
    throw new ConfigurationError(
      `Invalid pipeline execution status '${status}'. Valid values: ${PIPELINE_EXECUTION_STATUSES.join(', ')}`
    );
  }

  const source = new PageSource<PipelineExecutionSummary>('sagemaker:ListPipelineExecutions', async (cursor) => {
    const response = await client.send(
      new ListPipelineExecutionsCommand({
        PipelineName: pipelineName,
        SortBy: 'CreationTime',
        SortOrder: 'Descending',
        NextToken: cursor,
      })
    );
    return { items: response.PipelineExecutionSummaries ?? [], nextCursor: response.NextToken };
  });

  const details: EnrichmentStep<PipelineExecutionSummary, PipelineExecutionDetails> = {
    name: 'describe-pipeline-execution',
    lookup: async (execution) => {
      const response = await client.send(
        new DescribePipelineExecutionCommand({ PipelineExecutionArn: execution.PipelineExecutionArn })
      );
      return {
        lastModifiedTime: response.LastModifiedTime,
        description: response.PipelineExecutionDescription,
      };
    },
  };

  const predicates = PredicateSet.empty<PipelineExecutionSummary>()
    .where((execution) => execution.StartTime === undefined || execution.StartTime.getTime() >= since.getTime())
    .where(status !== undefined ? (execution) => execution.PipelineExecutionStatus === status : undefined);

  return discover({
    source,
    predicates,
    displayEnrichment: details,
    verbose,
    shape: (execution, enriched) => ({
      ...toPipelineExecutionRecord(
        pipelineName,
        execution,
        enriched.display?.ok ? enriched.display.value : undefined
      ),
      ...enrichmentMarker(enriched.display),
    }),
    describe: (execution) => execution.PipelineExecutionArn ?? '',
    limit: options.limit,
    onWarning: options.onWarning,
  });
}
