/**
 * Resources of one CloudFormation stack.
 */

import {
  CloudFormationClient,
  ListStackResourcesCommand,
  ResourceStatus,
  type StackResourceSummary,
} from '@aws-sdk/client-cloudformation';
import { ConfigurationError } from '@shared/errors';
import { PageSource } from '@core/pageSource';
import { PredicateSet } from '@core/predicates';
import { discover } from '@core/pipeline';
import {
  isoOrNull,
  withNameFilters,
  type ListOptions,
  type NameFilterOptions,
  type RecordStream,
} from './common';

export const RESOURCE_STATUSES: readonly string[] = Object.values(ResourceStatus);

export interface StackResourceListOptions extends ListOptions, NameFilterOptions {
  stackName: string;
  statuses?: readonly string[];
  /**
   * Exact resource type, e.g. "AWS::S3::Bucket".
   */
  resourceType?: string;
}

export type StackResourceRecord = {
  logical_resource_id: string;
  physical_resource_id: string;
  resource_type: string;
  last_updated_timestamp: string | null;
  resource_status: string;
  resource_status_reason: string;
  drift_status: string;
  module_logical_id_hierarchy: string | null;
};

export function toStackResourceRecord(resource: StackResourceSummary): StackResourceRecord {
  return {
    logical_resource_id: resource.LogicalResourceId ?? '',
    physical_resource_id: resource.PhysicalResourceId ?? '',
    resource_type: resource.ResourceType ?? '',
    last_updated_timestamp: isoOrNull(resource.LastUpdatedTimestamp),
    resource_status: resource.ResourceStatus ?? '',
    resource_status_reason: resource.ResourceStatusReason ?? '',
    drift_status: resource.DriftInformation?.StackResourceDriftStatus ?? 'NOT_CHECKED',
    module_logical_id_hierarchy: resource.ModuleInfo?.LogicalIdHierarchy ?? null,
  };
}

/**
 * Lists the resources of a stack. Name filters apply to the logical id.
 *
 * @throws {ConfigurationError} If the stack name is empty or a status is not a resource status
 */
export function listCloudFormationStackResources(
  client: CloudFormationClient,
  options: StackResourceListOptions
): RecordStream<StackResourceRecord> {
  const { stackName, statuses = [], resourceType } = options;
  if (!stackName) {
    throw new ConfigurationError('A stack name is required');
  }
  const invalid = statuses.filter((status) => !RESOURCE_STATUSES.includes(status));
  if (invalid.length > 0) {
    throw new ConfigurationError(
      `Invalid resource status '${invalid.join(', ')}'. Valid values: ${RESOURCE_STATUSES.join(', ')}`
    );
  }

  const source = new PageSource<StackResourceSummary>('cloudformation:ListStackResources', async (cursor) => {
    const response = await client.send(new ListStackResourcesCommand({ StackName: stackName, NextToken: cursor }));
    return { items: response.StackResourceSummaries ?? [], nextCursor: response.NextToken };
  });

  const predicates = withNameFilters(
    PredicateSet.empty<StackResourceSummary>(),
    options,
    (resource) => resource.LogicalResourceId ?? ''
  )
    .where(statuses.length > 0 ? (resource) => statuses.includes(resource.ResourceStatus ?? '') : undefined)
    .where(resourceType !== undefined ? (resource) => resource.ResourceType === resourceType : undefined);

  return discover({
    source,
    predicates,
    shape: toStackResourceRecord,
    describe: (resource) => resource.LogicalResourceId ?? '',
    limit: options.limit,
    onWarning: options.onWarning,
  });
}
