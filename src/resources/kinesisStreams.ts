/**
 * Kinesis data stream listing.
 */

import {
  KinesisClient,
  ListStreamsCommand,
  DescribeStreamSummaryCommand,
  type StreamDescriptionSummary,
} from '@aws-sdk/client-kinesis';
import { PageSource } from '@core/pageSource';
import { PredicateSet } from '@core/predicates';
import { discover } from '@core/pipeline';
import {
  enrichmentMarker,
  isoOrNull,
  withNameFilters,
  type ListOptions,
  type NameFilterOptions,
  type RecordStream,
} from './common';

export interface KinesisStreamListOptions extends ListOptions, NameFilterOptions {}

export type KinesisStreamRecord = {
  name: string;
  status?: string;
  mode?: string;
  retention_hours?: number;
  shard_count?: number;
  created_at?: string | null;
  arn?: string;
  monitoring_level?: string[];
  enrichment_error?: string;
};

/**
 * Maps a stream name (and its summary, when fetched) to its output record.
 */
export function toKinesisStreamRecord(
  name: string,
  summary: StreamDescriptionSummary | undefined
): KinesisStreamRecord {
  const record: KinesisStreamRecord = { name };
  if (summary) {
    record.status = summary.StreamStatus ?? '';
    record.mode = summary.StreamModeDetails?.StreamMode ?? 'PROVISIONED';
    record.retention_hours = summary.RetentionPeriodHours ?? 0;
    record.shard_count = summary.OpenShardCount ?? 0;
    record.created_at = isoOrNull(summary.StreamCreationTimestamp);
    record.arn = summary.StreamARN ?? '';
    const monitoring = summary.EnhancedMonitoring ?? [];
    if (monitoring.length > 0) {
      record.monitoring_level = monitoring[0].ShardLevelMetrics ?? [];
    }
  }
  return record;
}

/**
 * Lists stream names; verbose mode describes each stream.
 */
export function listKinesisStreams(
  client: KinesisClient,
  options: KinesisStreamListOptions
): RecordStream<KinesisStreamRecord> {
  const verbose = options.verbose ?? false;

  const source = new PageSource<string>('kinesis:ListStreams', async (cursor) => {
    const response = await client.send(new ListStreamsCommand({ NextToken: cursor }));
    return {
      items: response.StreamNames ?? [],
      nextCursor: response.HasMoreStreams ? response.NextToken : undefined,
    };
  });

  return discover({
    source,
    predicates: withNameFilters(PredicateSet.empty<string>(), options, (name) => name),
    displayEnrichment: {
      name: 'describe-stream',
      lookup: async (name: string) => {
        const response = await client.send(new DescribeStreamSummaryCommand({ StreamName: name }));
        return response.StreamDescriptionSummary;
      },
    },
    verbose,
    shape: (name, enriched) => ({
      ...toKinesisStreamRecord(name, enriched.display?.ok ? enriched.display.value : undefined),
      ...enrichmentMarker(enriched.display),
    }),
    describe: (name) => name,
    limit: options.limit,
    onWarning: options.onWarning,
  });
}
