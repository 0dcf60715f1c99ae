/**
 * CloudFormation stack listing.
 *
 * Stack status is pushed down to ListStacks. Tags are not part of a stack
 * summary, so a tag filter costs one DescribeStacks call per stack that
 * passed the name and time filters.
 *
 * The full description of a single stack is a plain DescribeStacks call.
 */

import {
  CloudFormationClient,
  ListStacksCommand,
  DescribeStacksCommand,
  StackStatus,
  type Stack,
  type StackSummary,
} from '@aws-sdk/client-cloudformation';
import type { Range } from '@shared/types';
import { ConfigurationError, TransportError, describeError } from '@shared/errors';
import { PageSource } from '@core/pageSource';
import { PredicateSet, tagPredicate, timeRangePredicate } from '@core/predicates';
import { discover } from '@core/pipeline';
import {
  isoOrNull,
  tagListToMap,
  withNameFilters,
  type ListOptions,
  type NameFilterOptions,
  type RecordStream,
} from './common';

export const STACK_STATUSES: readonly string[] = Object.values(StackStatus);

export function isStackStatus(value: string): value is StackStatus {
  return STACK_STATUSES.includes(value);
}

export interface CloudFormationStackListOptions extends ListOptions, NameFilterOptions {
  statuses?: readonly string[];
  created?: Range<Date>;
  tags?: Readonly<Record<string, string>>;
}

export type CloudFormationStackRecord = {
  stack_name: string;
  stack_id: string;
  stack_status: string;
  creation_time: string | null;
  last_updated_time: string | null;
  template_description: string;
  deletion_time?: string | null;
  stack_status_reason?: string;
  drift_status?: string;
};

/**
 * Maps a stack summary to its output record.
 */
export function toCloudFormationStackRecord(stack: StackSummary, verbose: boolean): CloudFormationStackRecord {
  const record: CloudFormationStackRecord = {
    stack_name: stack.StackName ?? '',
    stack_id: stack.StackId ?? '',
    stack_status: stack.StackStatus ?? '',
    creation_time: isoOrNull(stack.CreationTime),
    last_updated_time: isoOrNull(stack.LastUpdatedTime),
    template_description: stack.TemplateDescription ?? '',
  };
  if (verbose) {
    record.deletion_time = isoOrNull(stack.DeletionTime);
    record.stack_status_reason = stack.StackStatusReason ?? '';
    record.drift_status = stack.DriftInformation?.StackDriftStatus ?? 'NOT_CHECKED';
  }
  return record;
}

/**
 * Lists CloudFormation stacks, deleted ones included unless filtered out by status.
 *
 * @throws {ConfigurationError} If a status is not a CloudFormation stack status
 */
export function listCloudFormationStacks(
  client: CloudFormationClient,
  options: CloudFormationStackListOptions
): RecordStream<CloudFormationStackRecord> {
  const { statuses = [], created, tags = {}, verbose = false } = options;
  const invalid = statuses.filter((status) => !isStackStatus(status));
  if (invalid.length > 0) {
    throw new ConfigurationError(
      `Invalid stack status '${invalid.join(', ')}'. Valid values: ${STACK_STATUSES.join(', ')}`
    );
  }
  const statusFilter = statuses.filter(isStackStatus);

  const source = new PageSource<StackSummary>('cloudformation:ListStacks', async (cursor) => {
    const response = await client.send(
      new ListStacksCommand({
        StackStatusFilter: statusFilter.length > 0 ? statusFilter : undefined,
        NextToken: cursor,
      })
    );
    return { items: response.StackSummaries ?? [], nextCursor: response.NextToken };
  });

  const predicates = withNameFilters(
    PredicateSet.empty<StackSummary, Record<string, string>>(),
    options,
    (stack) => stack.StackName ?? ''
  )
    .where(created ? timeRangePredicate<StackSummary>(created, (stack) => stack.CreationTime) : undefined)
    .whereDetail(Object.keys(tags).length > 0 ? tagPredicate(tags) : undefined);

  return discover({
    source,
    predicates,
    filterEnrichment: {
      name: 'tags',
      // By id rather than name: deleted stacks are only addressable by id.
      lookup: async (stack: StackSummary) => {
        const response = await client.send(new DescribeStacksCommand({ StackName: stack.StackId }));
        return tagListToMap(response.Stacks?.[0]?.Tags);
      },
    },
    verbose,
    shape: (stack) => toCloudFormationStackRecord(stack, verbose),
    describe: (stack) => stack.StackName ?? stack.StackId ?? '',
    limit: options.limit,
    onWarning: options.onWarning,
  });
}

export type CloudFormationStackDetailRecord = {
  stack_name: string;
  stack_id: string;
  description: string;
  stack_status: string;
  stack_status_reason: string;
  creation_time: string | null;
  last_updated_time: string | null;
  parameters: Record<string, string>;
  outputs: Record<string, string>;
  tags: Record<string, string>;
  capabilities: string[];
  notification_arns: string[];
  timeout_in_minutes: number | null;
  disable_rollback: boolean;
  enable_termination_protection: boolean;
  role_arn: string | null;
  parent_id: string | null;
  root_id: string | null;
  drift_status: string;
};

/**
 * Maps a described stack to its detail record. Parameters and outputs become
 * key/value maps.
 */
export function toCloudFormationStackDetailRecord(stack: Stack): CloudFormationStackDetailRecord {
  const parameters: Record<string, string> = {};
  for (const parameter of stack.Parameters ?? []) {
    if (parameter.ParameterKey) {
      parameters[parameter.ParameterKey] = parameter.ResolvedValue ?? parameter.ParameterValue ?? '';
    }
  }
  const outputs: Record<string, string> = {};
  for (const output of stack.Outputs ?? []) {
    if (output.OutputKey) {
      outputs[output.OutputKey] = output.OutputValue ?? '';
    }
  }

  return {
    stack_name: stack.StackName ?? '',
    stack_id: stack.StackId ?? '',
    description: stack.Description ?? '',
    stack_status: stack.StackStatus ?? '',
    stack_status_reason: stack.StackStatusReason ?? '',
    creation_time: isoOrNull(stack.CreationTime),
    last_updated_time: isoOrNull(stack.LastUpdatedTime),
    parameters,
    outputs,
    tags: tagListToMap(stack.Tags),
    capabilities: [...(stack.Capabilities ?? [])],
    notification_arns: [...(stack.NotificationARNs ?? [])],
    timeout_in_minutes: stack.TimeoutInMinutes ?? null,
    disable_rollback: stack.DisableRollback ?? false,
    enable_termination_protection: stack.EnableTerminationProtection ?? false,
    role_arn: stack.RoleARN ?? null,
    parent_id: stack.ParentId ?? null,
    root_id: stack.RootId ?? null,
    drift_status: stack.DriftInformation?.StackDriftStatus ?? 'NOT_CHECKED',
  };
}

/**
 * Describes one stack by name or id.
 *
 * @throws {ConfigurationError} If the stack name is empty
 * @throws {TransportError} If the call fails or no stack is returned
 */
export async function describeCloudFormationStack(
  client: CloudFormationClient,
  stackName: string
): Promise<CloudFormationStackDetailRecord> {
  if (!stackName) {
    throw new ConfigurationError('A stack name is required');
  }
  const operation = 'cloudformation:DescribeStacks';
  let stacks: Stack[];
  try {
    const response = await client.send(new DescribeStacksCommand({ StackName: stackName }));
    stacks = response.Stacks ?? [];
  } catch (error) {
    throw new TransportError(operation, `${operation} failed for ${stackName}: ${describeError(error)}`, {
      cause: error,
    });
  }
  const [stack] = stacks;
  if (!stack) {
    throw new TransportError(operation, `Stack ${stackName} not found`);
  }
  return toCloudFormationStackDetailRecord(stack);
}
