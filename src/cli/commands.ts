/**
 * Command registry for the cloud-sweep CLI.
 *
 * Each command declares the flags it takes and runs against a context built
 * by the entry point: parsed flags, loaded configuration, AWS client options
 * and the output writers.
 */

import { S3Client } from '@aws-sdk/client-s3';
import { GlueClient } from '@aws-sdk/client-glue';
import { AthenaClient } from '@aws-sdk/client-athena';
import { SageMakerClient } from '@aws-sdk/client-sagemaker';
import { KinesisClient } from '@aws-sdk/client-kinesis';
import { CloudFormationClient } from '@aws-sdk/client-cloudformation';
import { SFNClient } from '@aws-sdk/client-sfn';
import type { OutputRecord, RetryMode, RetryOutcome, RetryReport } from '@shared/types';
import type { AwsClientConfig } from '@shared/utils/awsClients';
import { ConfigurationError } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';
import type { Config } from '@core/config';
import { DEFAULT_LOOKBACK_DAYS, lookbackStart, parseTagExpressions } from '@core/filterInput';
import { listS3Objects } from '@resources/s3Objects';
import { listAthenaTables } from '@resources/athenaTables';
import { listGlueJobs } from '@resources/glueJobs';
import { listGlueJobRuns } from '@resources/glueJobRuns';
import { listAthenaQueryErrors } from '@resources/athenaQueryErrors';
import { listSageMakerPipelineExecutions } from '@resources/sagemakerPipelineExecutions';
import { listCloudFormationStackResources } from '@resources/cloudformationStackResources';
import { isSageMakerJobType, listSageMakerJobs, SAGEMAKER_JOB_TYPES } from '@resources/sagemakerJobs';
import { listKinesisStreams } from '@resources/kinesisStreams';
import { describeCloudFormationStack, listCloudFormationStacks } from '@resources/cloudformationStacks';
import { listStateMachines, scanStateMachines } from '@resources/stateMachines';
import { StepFunctionsGateway } from '@resources/stepFunctionsGateway';
import {
  DEFAULT_RETRY_DAYS,
  findFailedExecutionsAcross,
  type ScanProgress,
} from '@remediation/failedExecutions';
import { RetryWorkflow, summarizeOutcomes } from '@remediation/retryWorkflow';
import { formatRecords, type FormatOptions, type Writer } from '@output/formatter';
import {
  parseCount,
  sizeRange,
  timeRange,
  type CliOptionName,
  type CliValues,
  type ShortFlagAliases,
} from './options';

const logger = setupLogger('cloud-sweep:cli');

export type ExitCode = 0 | 1 | 2;

export interface CommandContext {
  values: CliValues;
  config: Config;
  aws: AwsClientConfig;
  output: FormatOptions;
  limit?: number;
  now: Date;
  stdout: Writer;
  stderr: Writer;
}

export interface CommandDescriptor {
  name: string;
  summary: string;
  options: ReadonlySet<CliOptionName>;
  aliases?: ShortFlagAliases;
  run: (context: CommandContext) => Promise<ExitCode>;
}

/**
 * @throws {ConfigurationError} If the flag is absent or empty
 */
function requireFlag(flag: CliOptionName, value: string | undefined): string {
  if (!value) {
    throw new ConfigurationError(`Missing required option --${flag}`);
  }
  return value;
}

/**
 * @throws {ConfigurationError} If --status was given more than once
 */
function singleStatus(values: CliValues): string | undefined {
  const statuses = values.status ?? [];
  if (statuses.length > 1) {
    throw new ConfigurationError('Only one --status may be given for this command');
  }
  return statuses[0];
}

/**
 * Start of the --days look-back window (7 days unless given).
 */
function lookbackFrom(context: CommandContext): Date {
  return lookbackStart(parseCount('days', context.values.days) ?? DEFAULT_LOOKBACK_DAYS, context.now);
}

async function emit(
  context: CommandContext,
  records: AsyncIterable<OutputRecord> | Iterable<OutputRecord>
): Promise<ExitCode> {
  const count = await formatRecords(records, context.output, context.stdout);
  logger.debug({ count }, 'Records written');
  return 0;
}

/**
 * Output record for one retry outcome.
 */
export function outcomeRecord(outcome: RetryOutcome): OutputRecord {
  const base = {
    outcome: outcome.kind,
    state_machine: outcome.stateMachineArn,
    original_execution: outcome.executionArn,
  };
  switch (outcome.kind) {
    case 'would-retry':
      return { ...base, input: outcome.input };
    case 'retried':
      return { ...base, retry_execution: outcome.retryExecutionArn };
    case 'failed':
      return { ...base, error: outcome.error };
  }
}

/**
 * Human-readable run summary written to stderr after the outcomes.
 */
export function renderRetrySummary(report: RetryReport, progress: ScanProgress): string {
  return [
    `Mode: ${report.mode}`,
    `State machines checked: ${progress.stateMachines}`,
    `Failed executions found: ${progress.executions}`,
    `Would retry: ${report.wouldRetry}, retried: ${report.retried}, failed: ${report.failed}`,
  ].join('\n');
}

async function* recordOutcomes(
  outcomes: AsyncIterable<RetryOutcome>,
  seen: RetryOutcome[]
): AsyncGenerator<OutputRecord, void, undefined> {
  for await (const outcome of outcomes) {
    seen.push(outcome);
    yield outcomeRecord(outcome);
  }
}

async function runRetry(context: CommandContext): Promise<ExitCode> {
  const { values, config } = context;
  const prefix = requireFlag('prefix', values.prefix);
  const mode: RetryMode = values.execute ? 'execute' : 'dry-run';
  const days = parseCount('days', values.days) ?? config.retry?.days ?? DEFAULT_RETRY_DAYS;
  const tags = parseTagExpressions(values.tag ?? []);

  const gateway = new StepFunctionsGateway(new SFNClient(context.aws));
  const progress: ScanProgress = { stateMachines: 0, executions: 0 };
  const machines = scanStateMachines(gateway, { prefix, regex: values.regex, tags });
  const executions = findFailedExecutionsAcross(
    gateway,
    machines,
    {
      days,
      now: context.now,
      limit: context.limit,
      onStateMachineScanned: values.verbose
        ? (stateMachineArn, found) =>
            logger.info({ stateMachineArn, failedExecutions: found, days }, 'Checked state machine')
        : undefined,
    },
    progress
  );

  logger.info({ mode, prefix, days }, 'Scanning for failed executions');
  const workflow = new RetryWorkflow({ mode, starter: gateway });
  const outcomes: RetryOutcome[] = [];
  try {
    await formatRecords(recordOutcomes(workflow.run(executions), outcomes), context.output, context.stdout);
  } finally {
    // An aborted scan still reports the outcomes it produced.
    context.stderr(`${renderRetrySummary(summarizeOutcomes(mode, outcomes), progress)}\n`);
  }
  return 0;
}

export const COMMANDS: readonly CommandDescriptor[] = [
  {
    name: 's3-objects',
    summary: 'List objects in an S3 bucket',
    options: new Set<CliOptionName>(['bucket', 'prefix', 'min-size', 'max-size', 'newer-than', 'older-than']),
    run: (context) =>
      emit(
        context,
        listS3Objects(new S3Client(context.aws), {
          bucket: requireFlag('bucket', context.values.bucket),
          prefix: context.values.prefix,
          size: sizeRange(context.values),
          lastModified: timeRange(context.values, context.now),
          verbose: context.values.verbose,
          limit: context.limit,
        })
      ),
  },
  {
    name: 'athena-tables',
    summary: 'List Athena tables of a Glue Data Catalog database',
    options: new Set<CliOptionName>(['database', 'prefix', 'regex']),
    run: (context) =>
      emit(
        context,
        listAthenaTables(new GlueClient(context.aws), {
          database: context.values.database,
          prefix: context.values.prefix,
          regex: context.values.regex,
          verbose: context.values.verbose,
          limit: context.limit,
        })
      ),
  },
  {
    name: 'glue-jobs',
    summary: 'List Glue jobs with their last run',
    options: new Set<CliOptionName>(['prefix', 'regex', 'status']),
    run: (context) =>
      emit(
        context,
        listGlueJobs(new GlueClient(context.aws), {
          prefix: context.values.prefix,
          regex: context.values.regex,
          status: singleStatus(context.values),
          verbose: context.values.verbose,
          limit: context.limit,
        })
      ),
  },
  {
    name: 'glue-job-runs',
    summary: 'List recent runs of a Glue job',
    options: new Set<CliOptionName>(['job', 'days', 'status']),
    run: (context) =>
      emit(
        context,
        listGlueJobRuns(new GlueClient(context.aws), {
          jobName: requireFlag('job', context.values.job),
          since: lookbackFrom(context),
          status: singleStatus(context.values),
          verbose: context.values.verbose,
          limit: context.limit,
        })
      ),
  },
  {
    name: 'athena-query-errors',
    summary: 'List failed Athena queries of a workgroup',
    options: new Set<CliOptionName>(['workgroup', 'days']),
    run: (context) =>
      emit(
        context,
        listAthenaQueryErrors(new AthenaClient(context.aws), {
          workgroup: context.values.workgroup,
          since: lookbackFrom(context),
          verbose: context.values.verbose,
          limit: context.limit,
        })
      ),
  },
  {
    name: 'sagemaker-jobs',
    summary: 'List SageMaker training, processing and transform jobs',
    options: new Set<CliOptionName>(['prefix', 'status', 'type']),
    run: (context) => {
      const type = context.values.type ?? 'all';
      if (!isSageMakerJobType(type)) {
        throw new ConfigurationError(
          `Invalid --type '${type}'. Valid values: ${[...SAGEMAKER_JOB_TYPES, 'all'].join(', ')}`
        );
      }
      return emit(
        context,
        listSageMakerJobs(new SageMakerClient(context.aws), {
          prefix: context.values.prefix,
          status: singleStatus(context.values),
          type,
          verbose: context.values.verbose,
          limit: context.limit,
        })
      );
    },
  },
  {
    name: 'sagemaker-pipeline-executions',
    summary: 'List recent executions of a SageMaker pipeline',
    options: new Set<CliOptionName>(['pipeline', 'days', 'status']),
    run: (context) =>
      emit(
        context,
        listSageMakerPipelineExecutions(new SageMakerClient(context.aws), {
          pipelineName: requireFlag('pipeline', context.values.pipeline),
          since: lookbackFrom(context),
          status: singleStatus(context.values),
          verbose: context.values.verbose,
          limit: context.limit,
        })
      ),
  },
  {
    name: 'kinesis-streams',
    summary: 'List Kinesis data streams',
    options: new Set<CliOptionName>(['prefix', 'regex']),
    run: (context) =>
      emit(
        context,
        listKinesisStreams(new KinesisClient(context.aws), {
          prefix: context.values.prefix,
          regex: context.values.regex,
          verbose: context.values.verbose,
          limit: context.limit,
        })
      ),
  },
  {
    name: 'cloudformation-stacks',
    summary: 'List CloudFormation stacks',
    options: new Set<CliOptionName>(['prefix', 'regex', 'status', 'tag', 'newer-than', 'older-than']),
    run: (context) =>
      emit(
        context,
        listCloudFormationStacks(new CloudFormationClient(context.aws), {
          prefix: context.values.prefix,
          regex: context.values.regex,
          statuses: context.values.status,
          tags: parseTagExpressions(context.values.tag ?? []),
          created: timeRange(context.values, context.now),
          verbose: context.values.verbose,
          limit: context.limit,
        })
      ),
  },
  {
    name: 'cloudformation-stack-resources',
    summary: 'List the resources of a CloudFormation stack',
    options: new Set<CliOptionName>(['stack', 'prefix', 'regex', 'status', 'type']),
    run: (context) =>
      emit(
        context,
        listCloudFormationStackResources(new CloudFormationClient(context.aws), {
          stackName: requireFlag('stack', context.values.stack),
          prefix: context.values.prefix,
          regex: context.values.regex,
          statuses: context.values.status,
          resourceType: context.values.type,
          limit: context.limit,
        })
      ),
  },
  {
    name: 'cloudformation-stack',
    summary: 'Describe one CloudFormation stack',
    options: new Set<CliOptionName>(['stack']),
    run: async (context) => {
      const stackName = requireFlag('stack', context.values.stack);
      const record = await describeCloudFormationStack(new CloudFormationClient(context.aws), stackName);
      return emit(context, [record]);
    },
  },
  {
    name: 'stepfunctions',
    summary: 'List Step Functions state machines',
    options: new Set<CliOptionName>(['prefix', 'regex', 'tag', 'newer-than', 'older-than']),
    run: (context) =>
      emit(
        context,
        listStateMachines(new StepFunctionsGateway(new SFNClient(context.aws)), {
          prefix: context.values.prefix,
          regex: context.values.regex,
          tags: parseTagExpressions(context.values.tag ?? []),
          created: timeRange(context.values, context.now),
          verbose: context.values.verbose,
          limit: context.limit,
        })
      ),
  },
  {
    name: 'retry-stepfunctions',
    summary: 'Retry failed Step Functions executions (dry-run unless --execute)',
    options: new Set<CliOptionName>(['prefix', 'regex', 'tag', 'days', 'dry-run', 'execute']),
    aliases: { '-d': 'days' },
    run: runRetry,
  },
];

export function findCommand(name: string): CommandDescriptor | undefined {
  return COMMANDS.find((command) => command.name === name);
}
