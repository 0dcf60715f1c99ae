import { describe, it, expect, beforeEach } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import { GlueClient, GetJobRunsCommand, type JobRun } from '@aws-sdk/client-glue';
import { listGlueJobRuns, toGlueJobRunRecord } from '@resources/glueJobRuns';
import { collect } from '@core/pipeline';
import { ConfigurationError } from '@shared/errors';

const glueMock = mockClient(GlueClient);

const since = new Date('2024-03-03T00:00:00Z');

function run(id: string, state: JobRun['JobRunState'], started?: string): JobRun {
  return {
    Id: id,
    JobName: 'nightly',
    JobRunState: state,
    StartedOn: started === undefined ? undefined : new Date(started),
  };
}

describe('glueJobRuns', () => {
  beforeEach(() => {
    glueMock.reset();
  });

  describe('toGlueJobRunRecord', () => {
    it('should map the run fields', () => {
      const record = toGlueJobRunRecord(
        {
          ...run('jr_1', 'FAILED', '2024-03-09T02:00:00Z'),
          Attempt: 1,
          CompletedOn: new Date('2024-03-09T02:05:00Z'),
          ExecutionTime: 300,
          ErrorMessage: 'Out of memory',
        },
        false
      );

      expect(record).toEqual({
        job_name: 'nightly',
        run_id: 'jr_1',
        attempt: 1,
        status: 'FAILED',
        started_on: '2024-03-09T02:00:00.000Z',
        completed_on: '2024-03-09T02:05:00.000Z',
        execution_time: 300,
        error_message: 'Out of memory',
      });
    });

    it('should add capacity and arguments in verbose mode', () => {
      const record = toGlueJobRunRecord(
        { ...run('jr_1', 'SUCCEEDED'), WorkerType: 'G.1X', NumberOfWorkers: 4, Arguments: { '--env': 'test' } },
        true
      );

      expect(record).toMatchObject({
        worker_type: 'G.1X',
        number_of_workers: 4,
        max_capacity: 0,
        arguments: { '--env': 'test' },
      });
    });
  });

  describe('listGlueJobRuns', () => {
    it('should keep runs inside the window and runs without a start time', async () => {
      glueMock
        .on(GetJobRunsCommand)
        .resolvesOnce({
          JobRuns: [run('jr_3', 'RUNNING'), run('jr_2', 'FAILED', '2024-03-09T00:00:00Z')],
          NextToken: 'older',
        })
        .resolves({ JobRuns: [run('jr_1', 'SUCCEEDED', '2024-02-01T00:00:00Z')] });

      const records = await collect(listGlueJobRuns(new GlueClient({}), { jobName: 'nightly', since }));

      expect(records.map((record) => record.run_id)).toEqual(['jr_3', 'jr_2']);
      expect(glueMock.commandCalls(GetJobRunsCommand).map((call) => call.args[0].input)).toEqual([
        { JobName: 'nightly', NextToken: undefined },
        { JobName: 'nightly', NextToken: 'older' },
      ]);
    });

    it('should filter on the run state', async () => {
      glueMock.on(GetJobRunsCommand).resolves({
        JobRuns: [run('jr_2', 'FAILED', '2024-03-09T00:00:00Z'), run('jr_1', 'SUCCEEDED', '2024-03-08T00:00:00Z')],
      });

      const records = await collect(
        listGlueJobRuns(new GlueClient({}), { jobName: 'nightly', since, status: 'FAILED' })
      );

      expect(records.map((record) => record.run_id)).toEqual(['jr_2']);
    });

    it('should reject a missing job name or an unknown state before listing', () => {
      expect(() => listGlueJobRuns(new GlueClient({}), { jobName: '', since })).toThrow(ConfigurationError);
      expect(() => listGlueJobRuns(new GlueClient({}), { jobName: 'nightly', since, status: 'BROKEN' })).toThrow(
        "Invalid Glue job status 'BROKEN'"
      );
      expect(glueMock.calls()).toHaveLength(0);
    });
  });
});
