/**
 * Shared fixtures for unit tests.
 */

import type { DiscoveryWarning, ExecutionDescriptor, ListOperation } from '@shared/types';

/**
 * In-process list operation serving fixed pages. Cursors are "page-<n>".
 */
export function pagedList<T>(pages: ReadonlyArray<readonly T[]>): {
  list: ListOperation<T>;
  cursors: Array<string | undefined>;
} {
  const cursors: Array<string | undefined> = [];
  const list: ListOperation<T> = async (cursor) => {
    cursors.push(cursor);
    const index = cursor === undefined ? 0 : Number(cursor.slice('page-'.length));
    return {
      items: pages[index] ?? [],
      nextCursor: index + 1 < pages.length ? `page-${index + 1}` : undefined,
    };
  };
  return { list, cursors };
}

/**
 * Collects discovery warnings instead of logging them.
 */
export function warningCollector(): {
  warnings: DiscoveryWarning[];
  onWarning: (warning: DiscoveryWarning) => void;
} {
  const warnings: DiscoveryWarning[] = [];
  return { warnings, onWarning: (warning) => warnings.push(warning) };
}

export const STATE_MACHINE_ARN = 'arn:aws:states:us-east-1:123456789012:stateMachine:orders-pipeline';

export function executionArn(name: string): string {
  return `arn:aws:states:us-east-1:123456789012:execution:orders-pipeline:${name}`;
}

export function failedExecution(name: string, overrides: Partial<ExecutionDescriptor> = {}): ExecutionDescriptor {
  return {
    stateMachineArn: STATE_MACHINE_ARN,
    executionArn: executionArn(name),
    name,
    startDate: new Date('2024-03-01T10:00:00Z'),
    status: 'FAILED',
    input: '{"orderId":"o-1"}',
    ...overrides,
  };
}

export async function* fromArray<T>(items: readonly T[]): AsyncGenerator<T, void, undefined> {
  yield* items;
}

export function stateMachine(name: string, created = '2024-01-01T00:00:00Z') {
  return {
    stateMachineArn: `arn:aws:states:us-east-1:123456789012:stateMachine:${name}`,
    name,
    type: 'STANDARD' as const,
    creationDate: new Date(created),
  };
}

export function executionItem(stateMachineArn: string, name: string, started: string) {
  return {
    executionArn: executionArn(name),
    stateMachineArn,
    name,
    status: 'FAILED' as const,
    startDate: new Date(started),
  };
}
