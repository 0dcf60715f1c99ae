#!/usr/bin/env -S npx tsx
/**
 * cloud-sweep entry point.
 *
 * Usage: cloud-sweep <command> [options]
 *
 * Formatted records go to stdout; logs, warnings, the retry summary and
 * errors go to stderr.
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { SSMClient } from '@aws-sdk/client-ssm';
import { ConfigurationError, describeError } from '@shared/errors';
import { setupLogger, setLogLevel } from '@shared/utils/logger';
import { awsClientConfig, type AwsConnectionOptions } from '@shared/utils/awsClients';
import { CONFIG_ENV_VAR, loadConfig, SSM_SOURCE_PREFIX, type Config } from '@core/config';
import { parseFieldList } from '@core/filterInput';
import type { Writer } from '@output/formatter';
import { COMMANDS, findCommand, type ExitCode } from './commands';
import { parseCommandArgs, parseCount, parseFormat, COMMON_OPTIONS } from './options';

const logger = setupLogger('cloud-sweep:cli');

export interface CliIO {
  stdout: Writer;
  stderr: Writer;
  env: NodeJS.ProcessEnv;
  now?: () => Date;
}

const processIO: CliIO = {
  stdout: (chunk) => process.stdout.write(chunk),
  stderr: (chunk) => process.stderr.write(chunk),
  env: process.env,
};

export function usage(): string {
  const width = Math.max(...COMMANDS.map((command) => command.name.length));
  return [
    'Usage: cloud-sweep <command> [options]',
    '',
    'Commands:',
    ...COMMANDS.map((command) => `  ${command.name.padEnd(width)}  ${command.summary}`),
    `  ${'help'.padEnd(width)}  Show this message`,
    '',
    `Common options: ${COMMON_OPTIONS.map((name) => `--${name}`).join(' ')}`,
    'Formats: jsonl (default), json, tsv, csv, table',
  ].join('\n');
}

/**
 * Profile and region: flag, then environment, then configuration file.
 */
export function resolveConnection(
  flags: AwsConnectionOptions,
  env: NodeJS.ProcessEnv,
  config: Config
): AwsConnectionOptions {
  return {
    profile: flags.profile ?? env.AWS_PROFILE ?? config.profile,
    region: flags.region ?? env.AWS_REGION ?? env.AWS_DEFAULT_REGION ?? config.region,
  };
}

async function readConfig(source: string | undefined, connection: AwsConnectionOptions): Promise<Config> {
  if (!source) {
    return {};
  }
  const client = source.startsWith(SSM_SOURCE_PREFIX) ? new SSMClient(awsClientConfig(connection)) : undefined;
  return loadConfig(source, client);
}

/**
 * Runs one CLI invocation and returns its exit code. Never throws.
 */
export async function main(argv: string[], io: CliIO = processIO): Promise<ExitCode> {
  const [name, ...args] = argv;

  if (name === undefined || name === 'help' || name === '--help' || name === '-h') {
    const write = name === undefined ? io.stderr : io.stdout;
    write(`${usage()}\n`);
    return name === undefined ? 2 : 0;
  }

  try {
    const command = findCommand(name);
    if (!command) {
      throw new ConfigurationError(`Unknown command '${name}'. Run 'cloud-sweep help' for a list of commands`);
    }

    const values = parseCommandArgs(name, args, command.options, command.aliases);
    if (values.help) {
      io.stdout(`Usage: cloud-sweep ${command.name} [options]\n${command.summary}\n`);
      return 0;
    }

    const flags: AwsConnectionOptions = { profile: values.profile, region: values.region };
    const config = await readConfig(
      values.config ?? io.env[CONFIG_ENV_VAR],
      resolveConnection(flags, io.env, {})
    );
    if (config.log_level) {
      setLogLevel(config.log_level);
    }

    const exitCode = await command.run({
      values,
      config,
      aws: awsClientConfig(resolveConnection(flags, io.env, config)),
      output: {
        format: parseFormat(values.format, config.format ?? 'jsonl'),
        fields: values['output-fields'] === undefined ? undefined : parseFieldList(values['output-fields']),
        noHeader: values['no-header'],
      },
      limit: parseCount('limit', values.limit),
      now: io.now?.() ?? new Date(),
      stdout: io.stdout,
      stderr: io.stderr,
    });
    return exitCode;
  } catch (error) {
    logger.debug({ err: error }, 'Command failed');
    io.stderr(`error: ${describeError(error)}\n`);
    return error instanceof ConfigurationError ? 2 : 1;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  // npm links bin scripts, so compare resolved paths.
  return script !== undefined && import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntryPoint()) {
  process.exitCode = await main(process.argv.slice(2));
}
