import { describe, it, expect, beforeEach } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import {
  SFNClient,
  ListStateMachinesCommand,
  ListTagsForResourceCommand,
  DescribeStateMachineCommand,
  StartExecutionCommand,
} from '@aws-sdk/client-sfn';
import { listStateMachines, scanStateMachines, ERROR_FETCHING_DETAILS } from '@resources/stateMachines';
import { StepFunctionsGateway } from '@resources/stepFunctionsGateway';
import { collect } from '@core/pipeline';
import { stateMachine, warningCollector } from '../../helpers/fixtures';

const sfnMock = mockClient(SFNClient);

describe('stateMachines', () => {
  let gateway: StepFunctionsGateway;

  beforeEach(() => {
    sfnMock.reset();
    gateway = new StepFunctionsGateway(new SFNClient({}));
  });

  describe('StepFunctionsGateway', () => {
    it('should turn the tag list into a map', async () => {
      sfnMock.on(ListTagsForResourceCommand).resolves({
        tags: [
          { key: 'team', value: 'data' },
          { key: 'empty' },
        ],
      });

      expect(await gateway.listTags('arn:test')).toEqual({ team: 'data', empty: '' });
    });

    it('should return the ARN of a started execution', async () => {
      sfnMock.on(StartExecutionCommand).resolves({
        executionArn: 'arn:aws:states:us-east-1:123456789012:execution:m:retry-1',
        startDate: new Date(),
      });

      expect(await gateway.startExecution('arn:m', '{}', 'retry-1')).toBe(
        'arn:aws:states:us-east-1:123456789012:execution:m:retry-1'
      );
      expect(sfnMock.commandCalls(StartExecutionCommand)[0].args[0].input).toEqual({
        stateMachineArn: 'arn:m',
        input: '{}',
        name: 'retry-1',
      });
    });

    it('should fail when the service returns no execution ARN', async () => {
      sfnMock.on(StartExecutionCommand).resolves({});

      await expect(gateway.startExecution('arn:m', '{}', 'retry-1')).rejects.toThrow(
        'StartExecution for arn:m returned no executionArn'
      );
    });
  });

  describe('listStateMachines', () => {
    it('should map list items and filter by prefix and creation time', async () => {
      sfnMock.on(ListStateMachinesCommand).resolves({
        stateMachines: [
          stateMachine('orders-old', '2023-01-01T00:00:00Z'),
          stateMachine('orders-new', '2024-02-01T00:00:00Z'),
          stateMachine('billing', '2024-02-01T00:00:00Z'),
        ],
      });

      const records = await collect(
        listStateMachines(gateway, { prefix: 'orders', created: { min: new Date('2024-01-01T00:00:00Z') } })
      );

      expect(records).toEqual([
        {
          name: 'orders-new',
          arn: 'arn:aws:states:us-east-1:123456789012:stateMachine:orders-new',
          type: 'STANDARD',
          creation_date: '2024-02-01T00:00:00.000Z',
        },
      ]);
    });

    it('should add status and role in verbose mode', async () => {
      sfnMock.on(ListStateMachinesCommand).resolves({ stateMachines: [stateMachine('orders')] });
      sfnMock.on(DescribeStateMachineCommand).resolves({
        status: 'ACTIVE',
        roleArn: 'arn:aws:iam::123456789012:role/test-role',
      });

      const [record] = await collect(listStateMachines(gateway, { verbose: true }));

      expect(record).toMatchObject({ status: 'ACTIVE', role_arn: 'arn:aws:iam::123456789012:role/test-role' });
    });

    it('should flag machines whose details could not be fetched', async () => {
      const { onWarning } = warningCollector();
      sfnMock.on(ListStateMachinesCommand).resolves({ stateMachines: [stateMachine('orders')] });
      sfnMock.on(DescribeStateMachineCommand).rejects(new Error('AccessDenied'));

      const [record] = await collect(listStateMachines(gateway, { verbose: true, onWarning }));

      expect(record.status).toBe(ERROR_FETCHING_DETAILS);
      expect(record.enrichment_error).toBe(
        'describe-state-machine lookup failed for arn:aws:states:us-east-1:123456789012:stateMachine:orders: AccessDenied'
      );
    });

    it('should filter on tags fetched per machine', async () => {
      const tagged = stateMachine('orders-a');
      sfnMock.on(ListStateMachinesCommand).resolves({ stateMachines: [tagged, stateMachine('orders-b')] });
      sfnMock.on(ListTagsForResourceCommand).resolves({ tags: [] });
      sfnMock
        .on(ListTagsForResourceCommand, { resourceArn: tagged.stateMachineArn })
        .resolves({ tags: [{ key: 'team', value: 'data' }] });

      const records = await collect(listStateMachines(gateway, { tags: { team: 'data' } }));

      expect(records.map((record) => record.name)).toEqual(['orders-a']);
    });
  });

  describe('scanStateMachines', () => {
    it('should yield the raw list items that pass the filters', async () => {
      sfnMock
        .on(ListStateMachinesCommand)
        .resolvesOnce({ stateMachines: [stateMachine('orders-a')], nextToken: 'next' })
        .resolvesOnce({ stateMachines: [stateMachine('orders-b'), stateMachine('other')] });

      const machines = await collect(scanStateMachines(gateway, { prefix: 'orders' }));

      expect(machines.map((machine) => machine.name)).toEqual(['orders-a', 'orders-b']);
      expect(sfnMock.commandCalls(ListStateMachinesCommand).map((call) => call.args[0].input.nextToken)).toEqual([
        undefined,
        'next',
      ]);
    });
  });
});
