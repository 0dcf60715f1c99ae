/**
 * Step Functions state machine listing.
 */

import type { StateMachineListItem, DescribeStateMachineCommandOutput } from '@aws-sdk/client-sfn';
import type { Range } from '@shared/types';
import { PageSource } from '@core/pageSource';
import { PredicateSet, tagPredicate, timeRangePredicate } from '@core/predicates';
import { discover } from '@core/pipeline';
import type { EnrichmentStep } from '@core/enrichment';
import type { StepFunctionsGateway } from './stepFunctionsGateway';
import {
  enrichmentMarker,
  isoOrNull,
  withNameFilters,
  type ListOptions,
  type NameFilterOptions,
  type RecordStream,
} from './common';

export const ERROR_FETCHING_DETAILS = 'ERROR_FETCHING_DETAILS';

export interface StateMachineListOptions extends ListOptions, NameFilterOptions {
  created?: Range<Date>;
  tags?: Readonly<Record<string, string>>;
}

export type StateMachineRecord = {
  name: string;
  arn: string;
  type: string;
  creation_date: string | null;
  status?: string;
  role_arn?: string;
  enrichment_error?: string;
};

/**
 * Maps a state machine (and its description, when fetched) to its output record.
 */
export function toStateMachineRecord(
  machine: StateMachineListItem,
  description: DescribeStateMachineCommandOutput | undefined
): StateMachineRecord {
  const record: StateMachineRecord = {
    name: machine.name ?? '',
    arn: machine.stateMachineArn ?? '',
    type: machine.type ?? '',
    creation_date: isoOrNull(machine.creationDate),
  };
  if (description) {
    record.status = description.status ?? '';
    record.role_arn = description.roleArn ?? '';
  }
  return record;
}

function stateMachinePredicates(
  options: StateMachineListOptions
): PredicateSet<StateMachineListItem, Record<string, string>> {
  const { created, tags = {} } = options;
  return withNameFilters(
    PredicateSet.empty<StateMachineListItem, Record<string, string>>(),
    options,
    (machine) => machine.name ?? ''
  )
    .where(created ? timeRangePredicate<StateMachineListItem>(created, (machine) => machine.creationDate) : undefined)
    .whereDetail(Object.keys(tags).length > 0 ? tagPredicate(tags) : undefined);
}

function tagsStep(gateway: StepFunctionsGateway): EnrichmentStep<StateMachineListItem, Record<string, string>> {
  return {
    name: 'tags',
    lookup: (machine) => gateway.listTags(machine.stateMachineArn ?? ''),
  };
}

function describeMachine(machine: StateMachineListItem): string {
  return machine.stateMachineArn ?? machine.name ?? '';
}

/**
 * Filtered scan yielding the raw list items, used by the retry command to
 * pick the state machines whose executions it inspects.
 */
export function scanStateMachines(
  gateway: StepFunctionsGateway,
  options: StateMachineListOptions
): RecordStream<StateMachineListItem> {
  return discover({
    source: new PageSource('sfn:ListStateMachines', (cursor) => gateway.listStateMachines(cursor)),
    predicates: stateMachinePredicates(options),
    filterEnrichment: tagsStep(gateway),
    shape: (machine) => machine,
    describe: describeMachine,
    limit: options.limit,
    onWarning: options.onWarning,
  });
}

/**
 * Lists state machines; verbose mode describes each one.
 */
export function listStateMachines(
  gateway: StepFunctionsGateway,
  options: StateMachineListOptions
): RecordStream<StateMachineRecord> {
  return discover({
    source: new PageSource('sfn:ListStateMachines', (cursor) => gateway.listStateMachines(cursor)),
    predicates: stateMachinePredicates(options),
    filterEnrichment: tagsStep(gateway),
    displayEnrichment: {
      name: 'describe-state-machine',
      lookup: (machine: StateMachineListItem) => gateway.describeStateMachine(machine.stateMachineArn ?? ''),
    },
    verbose: options.verbose ?? false,
    shape: (machine, enriched) => {
      const display = enriched.display;
      const record = toStateMachineRecord(machine, display?.ok ? display.value : undefined);
      if (display && !display.ok) {
        record.status = ERROR_FETCHING_DETAILS;
      }
      return { ...record, ...enrichmentMarker(display) };
    },
    describe: describeMachine,
    limit: options.limit,
    onWarning: options.onWarning,
  });
}
