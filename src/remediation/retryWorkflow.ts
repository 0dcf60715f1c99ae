/**
 * Retry workflow for failed Step Functions executions.
 *
 * Dry-run (the default) only reports what would be done. Execute starts one
 * new execution per failed execution with the original input. Every
 * execution handed in produces exactly one outcome, in input order; a failed
 * start is reported and the run moves on to the next execution.
 */

import { randomBytes } from 'node:crypto';
import type { ExecutionDescriptor, RetryMode, RetryOutcome, RetryReport } from '@shared/types';
import { RetryError, describeError } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';
import type { ExecutionStarter } from '@resources/stepFunctionsGateway';

const logger = setupLogger('cloud-sweep:retry');

/**
 * Step Functions limit on execution names.
 */
export const MAX_EXECUTION_NAME_LENGTH = 80;

export type RetryWorkflowState = 'idle' | 'mutating' | 'reporting';

export interface RetryWorkflowOptions {
  mode?: RetryMode;
  starter: ExecutionStarter;
  clock?: () => Date;
  /**
   * Random suffix generator; four hex characters by default.
   */
  suffix?: () => string;
}

function randomSuffix(): string {
  return randomBytes(2).toString('hex');
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Derives a new execution name: `retry-<name>-<YYYYMMDD-HHMMSS>-<suffix>` in UTC.
 * The original name is truncated so the result fits the service limit.
 */
export function retryExecutionName(name: string, now: Date, suffix: string): string {
  const stamp =
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `-${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  const fixedLength = 'retry-'.length + 1 + stamp.length + 1 + suffix.length;
  const base = name.slice(0, Math.max(0, MAX_EXECUTION_NAME_LENGTH - fixedLength));
  return `retry-${base}-${stamp}-${suffix}`;
}

export class RetryWorkflow {
  private readonly mode: RetryMode;
  private readonly starter: ExecutionStarter;
  private readonly clock: () => Date;
  private readonly suffix: () => string;
  private currentState: RetryWorkflowState = 'idle';

  constructor(options: RetryWorkflowOptions) {
    this.mode = options.mode ?? 'dry-run';
    this.starter = options.starter;
    this.clock = options.clock ?? (() => new Date());
    this.suffix = options.suffix ?? randomSuffix;
  }

  get state(): RetryWorkflowState {
    return this.currentState;
  }

  /**
   * Processes the executions one at a time, yielding one outcome each.
   *
   * @throws {Error} If the workflow has already been run
   */
  async *run(executions: AsyncIterable<ExecutionDescriptor>): AsyncGenerator<RetryOutcome, void, undefined> {
    if (this.currentState !== 'idle') {
      throw new Error(`Retry workflow cannot run from state '${this.currentState}'`);
    }
    this.currentState = this.mode === 'execute' ? 'mutating' : 'reporting';

    try {
      for await (const execution of executions) {
        yield this.mode === 'execute' ? await this.retry(execution) : this.preview(execution);
      }
    } finally {
      this.currentState = 'reporting';
    }
  }

  private preview(execution: ExecutionDescriptor): RetryOutcome {
    logger.info({ executionArn: execution.executionArn }, 'Would retry execution');
    return {
      kind: 'would-retry',
      stateMachineArn: execution.stateMachineArn,
      executionArn: execution.executionArn,
      input: execution.input,
    };
  }

  private async retry(execution: ExecutionDescriptor): Promise<RetryOutcome> {
    const retryName = retryExecutionName(execution.name, this.clock(), this.suffix());
    try {
      const retryExecutionArn = await this.starter.startExecution(
        execution.stateMachineArn,
        execution.input,
        retryName
      );
      logger.info({ executionArn: execution.executionArn, retryExecutionArn }, 'Retried execution');
      return {
        kind: 'retried',
        stateMachineArn: execution.stateMachineArn,
        executionArn: execution.executionArn,
        retryExecutionArn,
        retryName,
      };
    } catch (error) {
      const failure = new RetryError(
        execution.executionArn,
        `Failed to retry ${execution.executionArn}: ${describeError(error)}`,
        { cause: error }
      );
      logger.warn({ executionArn: execution.executionArn, errorName: failure.remoteName }, failure.message);
      return {
        kind: 'failed',
        stateMachineArn: execution.stateMachineArn,
        executionArn: execution.executionArn,
        error: describeError(error),
        errorName: failure.remoteName,
      };
    }
  }
}

/**
 * Aggregates the outcomes of one run.
 */
export function summarizeOutcomes(mode: RetryMode, outcomes: readonly RetryOutcome[]): RetryReport {
  const count = (kind: RetryOutcome['kind']): number =>
    outcomes.filter((outcome) => outcome.kind === kind).length;
  return {
    mode,
    total: outcomes.length,
    wouldRetry: count('would-retry'),
    retried: count('retried'),
    failed: count('failed'),
    outcomes: [...outcomes],
  };
}
