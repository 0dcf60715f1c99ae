import { describe, it, expect, beforeEach } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import { KinesisClient, ListStreamsCommand, DescribeStreamSummaryCommand } from '@aws-sdk/client-kinesis';
import { listKinesisStreams, toKinesisStreamRecord } from '@resources/kinesisStreams';
import { collect } from '@core/pipeline';

const kinesisMock = mockClient(KinesisClient);

const summary = {
  StreamName: 'clicks',
  StreamARN: 'arn:aws:kinesis:us-east-1:123456789012:stream/clicks',
  StreamStatus: 'ACTIVE' as const,
  StreamModeDetails: { StreamMode: 'ON_DEMAND' as const },
  RetentionPeriodHours: 24,
  StreamCreationTimestamp: new Date('2024-01-05T00:00:00Z'),
  EnhancedMonitoring: [{ ShardLevelMetrics: ['IncomingBytes' as const] }],
  OpenShardCount: 4,
};

describe('kinesisStreams', () => {
  beforeEach(() => {
    kinesisMock.reset();
  });

  describe('toKinesisStreamRecord', () => {
    it('should only carry the name without a summary', () => {
      expect(toKinesisStreamRecord('clicks', undefined)).toEqual({ name: 'clicks' });
    });

    it('should map the stream summary', () => {
      expect(toKinesisStreamRecord('clicks', summary)).toEqual({
        name: 'clicks',
        status: 'ACTIVE',
        mode: 'ON_DEMAND',
        retention_hours: 24,
        shard_count: 4,
        created_at: '2024-01-05T00:00:00.000Z',
        arn: 'arn:aws:kinesis:us-east-1:123456789012:stream/clicks',
        monitoring_level: ['IncomingBytes'],
      });
    });
  });

  describe('listKinesisStreams', () => {
    it('should keep paging while the service reports more streams', async () => {
      kinesisMock
        .on(ListStreamsCommand)
        .resolvesOnce({ StreamNames: ['clicks', 'orders'], HasMoreStreams: true, NextToken: 'token-2' })
        .resolvesOnce({ StreamNames: ['clicks-replay'], HasMoreStreams: false, NextToken: 'ignored' });

      const records = await collect(listKinesisStreams(new KinesisClient({}), { prefix: 'clicks' }));

      expect(records).toEqual([{ name: 'clicks' }, { name: 'clicks-replay' }]);
      expect(kinesisMock.commandCalls(ListStreamsCommand).map((call) => call.args[0].input.NextToken)).toEqual([
        undefined,
        'token-2',
      ]);
    });

    it('should describe streams in verbose mode', async () => {
      kinesisMock.on(ListStreamsCommand).resolves({ StreamNames: ['clicks'], HasMoreStreams: false });
      kinesisMock.on(DescribeStreamSummaryCommand).resolves({ StreamDescriptionSummary: summary });

      const [record] = await collect(listKinesisStreams(new KinesisClient({}), { verbose: true }));

      expect(record).toMatchObject({ name: 'clicks', status: 'ACTIVE', shard_count: 4 });
      expect(kinesisMock.commandCalls(DescribeStreamSummaryCommand)[0].args[0].input).toEqual({ StreamName: 'clicks' });
    });

    it('should apply a regex filter', async () => {
      kinesisMock.on(ListStreamsCommand).resolves({ StreamNames: ['a-prod', 'a-dev'], HasMoreStreams: false });

      const records = await collect(listKinesisStreams(new KinesisClient({}), { regex: 'prod$' }));

      expect(records).toEqual([{ name: 'a-prod' }]);
    });
  });
});
