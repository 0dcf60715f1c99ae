/**
 * Thin wrapper around the Step Functions client.
 *
 * Exposes exactly the remote capabilities the listers and the retry workflow
 * consume: paged lists, per-resource lookups and start-execution.
 */

import {
  SFNClient,
  ListStateMachinesCommand,
  ListTagsForResourceCommand,
  DescribeStateMachineCommand,
  ListExecutionsCommand,
  DescribeExecutionCommand,
  StartExecutionCommand,
  type StateMachineListItem,
  type ExecutionListItem,
  type DescribeStateMachineCommandOutput,
  type DescribeExecutionCommandOutput,
} from '@aws-sdk/client-sfn';
import type { Page } from '@shared/types';

/**
 * Retry boundary: starts a new execution and returns its ARN.
 */
export interface ExecutionStarter {
  startExecution(stateMachineArn: string, input: string, name: string): Promise<string>;
}

export class StepFunctionsGateway implements ExecutionStarter {
  constructor(private readonly client: SFNClient) {}

  async listStateMachines(cursor: string | undefined): Promise<Page<StateMachineListItem>> {
    const response = await this.client.send(new ListStateMachinesCommand({ nextToken: cursor }));
    return { items: response.stateMachines ?? [], nextCursor: response.nextToken };
  }

  async listTags(resourceArn: string): Promise<Record<string, string>> {
    const response = await this.client.send(new ListTagsForResourceCommand({ resourceArn }));
    const tags: Record<string, string> = {};
    for (const tag of response.tags ?? []) {
      if (tag.key) {
        tags[tag.key] = tag.value ?? '';
      }
    }
    return tags;
  }

  async describeStateMachine(stateMachineArn: string): Promise<DescribeStateMachineCommandOutput> {
    return this.client.send(new DescribeStateMachineCommand({ stateMachineArn }));
  }

  /**
   * Lists executions with the FAILED status filter applied by the service.
   */
  async listFailedExecutions(
    stateMachineArn: string,
    cursor: string | undefined
  ): Promise<Page<ExecutionListItem>> {
    const response = await this.client.send(
      new ListExecutionsCommand({ stateMachineArn, statusFilter: 'FAILED', nextToken: cursor })
    );
    return { items: response.executions ?? [], nextCursor: response.nextToken };
  }

  async describeExecution(executionArn: string): Promise<DescribeExecutionCommandOutput> {
    return this.client.send(new DescribeExecutionCommand({ executionArn }));
  }

  async startExecution(stateMachineArn: string, input: string, name: string): Promise<string> {
    const response = await this.client.send(
      new StartExecutionCommand({ stateMachineArn, input, name })
    );
    if (!response.executionArn) {
      throw new Error(`StartExecution for ${stateMachineArn} returned no executionArn`);
    }
    return response.executionArn;
  }
}
