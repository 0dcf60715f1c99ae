import { describe, it, expect, beforeEach } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import { SFNClient, ListExecutionsCommand, DescribeExecutionCommand } from '@aws-sdk/client-sfn';
import { StepFunctionsGateway } from '@resources/stepFunctionsGateway';
import {
  findFailedExecutions,
  findFailedExecutionsAcross,
  type ScanProgress,
} from '@remediation/failedExecutions';
import { collect } from '@core/pipeline';
import { ConfigurationError } from '@shared/errors';
import {
  STATE_MACHINE_ARN,
  executionArn,
  executionItem,
  fromArray,
  stateMachine,
  warningCollector,
} from '../../helpers/fixtures';

const sfnMock = mockClient(SFNClient);

const now = new Date('2024-03-10T12:00:00Z');

describe('failedExecutions', () => {
  let gateway: StepFunctionsGateway;

  beforeEach(() => {
    sfnMock.reset();
    gateway = new StepFunctionsGateway(new SFNClient({}));
  });

  describe('findFailedExecutions', () => {
    it('should keep executions that started strictly inside the window', async () => {
      sfnMock.on(ListExecutionsCommand).resolves({
        executions: [
          executionItem(STATE_MACHINE_ARN, 'recent', '2024-03-09T00:00:00Z'),
          executionItem(STATE_MACHINE_ARN, 'boundary', '2024-03-03T12:00:00Z'),
          executionItem(STATE_MACHINE_ARN, 'stale', '2024-03-01T00:00:00Z'),
        ],
      });
      sfnMock.on(DescribeExecutionCommand).resolves({ input: '{"orderId":"o-7"}' });

      const executions = await collect(findFailedExecutions(gateway, STATE_MACHINE_ARN, { days: 7, now }));

      expect(executions).toEqual([
        {
          stateMachineArn: STATE_MACHINE_ARN,
          executionArn: executionArn('recent'),
          name: 'recent',
          startDate: new Date('2024-03-09T00:00:00Z'),
          status: 'FAILED',
          input: '{"orderId":"o-7"}',
        },
      ]);
      expect(sfnMock.commandCalls(ListExecutionsCommand)[0].args[0].input).toEqual({
        stateMachineArn: STATE_MACHINE_ARN,
        statusFilter: 'FAILED',
        nextToken: undefined,
      });
      expect(sfnMock.commandCalls(DescribeExecutionCommand)).toHaveLength(1);
    });

    it('should stop paging at the first execution outside the window', async () => {
      sfnMock
        .on(ListExecutionsCommand)
        .resolvesOnce({
          executions: [
            executionItem(STATE_MACHINE_ARN, 'recent', '2024-03-09T00:00:00Z'),
            executionItem(STATE_MACHINE_ARN, 'stale', '2024-02-01T00:00:00Z'),
          ],
          nextToken: 'older-history',
        })
        .resolves({ executions: [executionItem(STATE_MACHINE_ARN, 'ancient', '2023-01-01T00:00:00Z')] });
      sfnMock.on(DescribeExecutionCommand).resolves({ input: '{}' });

      const executions = await collect(findFailedExecutions(gateway, STATE_MACHINE_ARN, { days: 7, now }));

      expect(executions.map((execution) => execution.name)).toEqual(['recent']);
      expect(sfnMock.commandCalls(ListExecutionsCommand)).toHaveLength(1);
    });

    it('should use an empty object when the execution has no input', async () => {
      sfnMock.on(ListExecutionsCommand).resolves({
        executions: [executionItem(STATE_MACHINE_ARN, 'no-input', '2024-03-09T00:00:00Z')],
      });
      sfnMock.on(DescribeExecutionCommand).resolves({});

      const [execution] = await collect(findFailedExecutions(gateway, STATE_MACHINE_ARN, { days: 7, now }));

      expect(execution.input).toBe('{}');
    });

    it('should skip executions that cannot be described and carry on', async () => {
      const { warnings, onWarning } = warningCollector();
      sfnMock.on(ListExecutionsCommand).resolves({
        executions: [
          executionItem(STATE_MACHINE_ARN, 'e1', '2024-03-09T00:00:00Z'),
          executionItem(STATE_MACHINE_ARN, 'e2', '2024-03-09T01:00:00Z'),
        ],
      });
      sfnMock.on(DescribeExecutionCommand).resolves({ input: '{}' });
      sfnMock
        .on(DescribeExecutionCommand, { executionArn: executionArn('e1') })
        .rejects(new Error('ExecutionDoesNotExist'));

      const executions = await collect(
        findFailedExecutions(gateway, STATE_MACHINE_ARN, { days: 7, now, onWarning })
      );

      expect(executions.map((execution) => execution.name)).toEqual(['e2']);
      expect(warnings).toEqual([
        {
          kind: 'skipped',
          resource: executionArn('e1'),
          step: 'describe-execution',
          message: `describe-execution lookup failed for ${executionArn('e1')}: ExecutionDoesNotExist`,
        },
      ]);
    });
  });

  describe('findFailedExecutionsAcross', () => {
    const first = stateMachine('orders-a');
    const second = stateMachine('orders-b');

    beforeEach(() => {
      sfnMock.on(DescribeExecutionCommand).resolves({ input: '{}' });
      sfnMock
        .on(ListExecutionsCommand, { stateMachineArn: first.stateMachineArn })
        .resolves({ executions: [executionItem(first.stateMachineArn, 'a1', '2024-03-09T00:00:00Z')] });
      sfnMock.on(ListExecutionsCommand, { stateMachineArn: second.stateMachineArn }).resolves({
        executions: [
          executionItem(second.stateMachineArn, 'b1', '2024-03-09T00:00:00Z'),
          executionItem(second.stateMachineArn, 'b2', '2024-03-09T00:00:00Z'),
        ],
      });
    });

    it('should scan every state machine in order and count progress', async () => {
      const progress: ScanProgress = { stateMachines: 0, executions: 0 };

      const executions = await collect(
        findFailedExecutionsAcross(gateway, fromArray([first, second]), { days: 7, now }, progress)
      );

      expect(executions.map((execution) => execution.name)).toEqual(['a1', 'b1', 'b2']);
      expect(progress).toEqual({ stateMachines: 2, executions: 3 });
    });

    it('should report how many executions each state machine contributed', async () => {
      const scanned: Array<[string, number]> = [];

      await collect(
        findFailedExecutionsAcross(gateway, fromArray([first, second]), {
          days: 7,
          now,
          onStateMachineScanned: (stateMachineArn, found) => scanned.push([stateMachineArn, found]),
        })
      );

      expect(scanned).toEqual([
        [first.stateMachineArn, 1],
        [second.stateMachineArn, 2],
      ]);
    });

    it('should stop once the limit is reached across machines', async () => {
      const progress: ScanProgress = { stateMachines: 0, executions: 0 };

      const executions = await collect(
        findFailedExecutionsAcross(gateway, fromArray([first, second]), { days: 7, now, limit: 2 }, progress)
      );

      expect(executions.map((execution) => execution.name)).toEqual(['a1', 'b1']);
      expect(progress).toEqual({ stateMachines: 2, executions: 2 });
      expect(sfnMock.commandCalls(DescribeExecutionCommand)).toHaveLength(2);
    });

    it('should not list anything with a limit of zero', async () => {
      const executions = await collect(
        findFailedExecutionsAcross(gateway, fromArray([first]), { days: 7, now, limit: 0 })
      );

      expect(executions).toEqual([]);
      expect(sfnMock.commandCalls(ListExecutionsCommand)).toHaveLength(0);
    });

    it('should validate the window before scanning', async () => {
      await expect(
        collect(findFailedExecutionsAcross(gateway, fromArray([first]), { days: 0, now }))
      ).rejects.toThrow(ConfigurationError);
      expect(sfnMock.commandCalls(ListExecutionsCommand)).toHaveLength(0);
    });
  });
});
