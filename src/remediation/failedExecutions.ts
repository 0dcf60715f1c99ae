/**
 * Failed Step Functions execution finder.
 *
 * The FAILED status filter is applied by the service; the time window is
 * checked locally because ListExecutions has no start-date filter. Executions
 * are listed newest first, so the scan ends at the first one outside the
 * window. The original input is not part of the list item, so every
 * execution inside the window is described once to fetch it.
 */

import type { ExecutionListItem, StateMachineListItem } from '@aws-sdk/client-sfn';
import type { ExecutionDescriptor, WarningHandler } from '@shared/types';
import { ConfigurationError } from '@shared/errors';
import { lookbackStart } from '@core/filterInput';
import { PageSource } from '@core/pageSource';
import { PredicateSet } from '@core/predicates';
import { discover } from '@core/pipeline';
import type { StepFunctionsGateway } from '@resources/stepFunctionsGateway';

export const DEFAULT_RETRY_DAYS = 7;

export interface FailedExecutionOptions {
  /**
   * Look-back window in whole days.
   */
  days: number;
  now?: Date;
  limit?: number;
  onWarning?: WarningHandler;
  /**
   * Called after each state machine has been scanned, with the number of
   * failed executions it contributed.
   */
  onStateMachineScanned?: (stateMachineArn: string, found: number) => void;
}

/**
 * Yields the failed executions of one state machine that started inside the window.
 */
export function findFailedExecutions(
  gateway: StepFunctionsGateway,
  stateMachineArn: string,
  options: FailedExecutionOptions
): AsyncGenerator<ExecutionDescriptor, void, undefined> {
  const cutoff = lookbackStart(options.days, options.now ?? new Date()).getTime();

  const predicates = PredicateSet.empty<ExecutionListItem, string>().where(
    (execution) => execution.startDate !== undefined && execution.startDate.getTime() > cutoff
  );

  return discover({
    source: new PageSource<ExecutionListItem>('sfn:ListExecutions', (cursor) =>
      gateway.listFailedExecutions(stateMachineArn, cursor)
    ),
    predicates,
    filterEnrichment: {
      name: 'describe-execution',
      lookup: async (execution: ExecutionListItem) => {
        const description = await gateway.describeExecution(execution.executionArn ?? '');
        return description.input ?? '{}';
      },
    },
    mandatoryEnrichment: true,
    shape: (execution, enriched) => ({
      stateMachineArn,
      executionArn: execution.executionArn ?? '',
      name: execution.name ?? '',
      startDate: execution.startDate ?? new Date(0),
      status: 'FAILED' as const,
      input: enriched.detail ?? '{}',
    }),
    describe: (execution) => execution.executionArn ?? execution.name ?? '',
    until: (execution) => execution.startDate !== undefined && execution.startDate.getTime() <= cutoff,
    limit: options.limit,
    onWarning: options.onWarning,
  });
}

/**
 * Counters kept while scanning several state machines.
 */
export interface ScanProgress {
  stateMachines: number;
  executions: number;
}

/**
 * Runs the finder over every given state machine in order, stopping as soon
 * as `limit` executions have been found in total.
 */
export async function* findFailedExecutionsAcross(
  gateway: StepFunctionsGateway,
  stateMachines: AsyncIterable<StateMachineListItem>,
  options: FailedExecutionOptions,
  progress: ScanProgress = { stateMachines: 0, executions: 0 }
): AsyncGenerator<ExecutionDescriptor, void, undefined> {
  const { limit } = options;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    throw new ConfigurationError(`Invalid limit ${limit}. Expected a non-negative integer`);
  }
  // Validate the window before touching the state machine listing.
  lookbackStart(options.days, options.now ?? new Date());
  if (limit === 0) {
    return;
  }

  for await (const machine of stateMachines) {
    const stateMachineArn = machine.stateMachineArn ?? '';
    progress.stateMachines++;
    const remaining = limit === undefined ? undefined : limit - progress.executions;
    let found = 0;
    for await (const execution of findFailedExecutions(gateway, stateMachineArn, {
      ...options,
      limit: remaining,
    })) {
      progress.executions++;
      found++;
      yield execution;
    }
    options.onStateMachineScanned?.(stateMachineArn, found);
    if (limit !== undefined && progress.executions >= limit) {
      return;
    }
  }
}
