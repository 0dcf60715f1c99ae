/**
 * Command-line option table and validation.
 */

import { parseArgs } from 'node:util';
import type { OutputFormat, Range } from '@shared/types';
import { ConfigurationError, describeError } from '@shared/errors';
import { parseSize, parseTimeExpression } from '@core/filterInput';
import { isOutputFormat, OUTPUT_FORMATS } from '@output/formatter';

/**
 * Every flag any command accepts. Which flags a command takes is declared
 * by the command itself.
 */
export const CLI_OPTIONS = {
  help: { type: 'boolean', short: 'h' },
  profile: { type: 'string' },
  region: { type: 'string' },
  format: { type: 'string' },
  limit: { type: 'string' },
  'output-fields': { type: 'string' },
  'no-header': { type: 'boolean' },
  verbose: { type: 'boolean', short: 'v' },
  config: { type: 'string' },
  prefix: { type: 'string', short: 'p' },
  regex: { type: 'string', short: 'r' },
  tag: { type: 'string', multiple: true },
  status: { type: 'string', multiple: true },
  'min-size': { type: 'string' },
  'max-size': { type: 'string' },
  'newer-than': { type: 'string' },
  'older-than': { type: 'string' },
  bucket: { type: 'string', short: 'b' },
  database: { type: 'string', short: 'd' },
  type: { type: 'string', short: 't' },
  job: { type: 'string', short: 'j' },
  workgroup: { type: 'string', short: 'w' },
  pipeline: { type: 'string' },
  stack: { type: 'string', short: 's' },
  days: { type: 'string' },
  'dry-run': { type: 'boolean' },
  execute: { type: 'boolean' },
} as const;

export type CliOptionName = keyof typeof CLI_OPTIONS;

export const COMMON_OPTIONS: readonly CliOptionName[] = [
  'help',
  'profile',
  'region',
  'format',
  'limit',
  'output-fields',
  'no-header',
  'verbose',
  'config',
];

export function parseCliArgs(args: string[]) {
  return parseArgs({ args, options: CLI_OPTIONS, strict: true, allowPositionals: false });
}

export type CliValues = ReturnType<typeof parseCliArgs>['values'];

/**
 * Short flags a single command binds differently from the shared table,
 * e.g. `-d` meaning `--days` rather than `--database`.
 */
export type ShortFlagAliases = Readonly<Record<string, CliOptionName>>;

/**
 * Parses the flags of one command, rejecting flags the command does not take.
 *
 * @throws {ConfigurationError} On unknown, misplaced or malformed flags
 */
export function parseCommandArgs(
  command: string,
  args: string[],
  allowed: ReadonlySet<CliOptionName>,
  aliases: ShortFlagAliases = {}
): CliValues {
  const expanded = args.map((arg) => {
    const name = Object.hasOwn(aliases, arg) ? aliases[arg] : undefined;
    return name === undefined ? arg : `--${name}`;
  });

  let values: CliValues;
  try {
    values = parseCliArgs(expanded).values;
  } catch (error) {
    throw new ConfigurationError(describeError(error), { cause: error });
  }

  const known: ReadonlySet<string> = new Set([...COMMON_OPTIONS, ...allowed]);
  const unsupported = Object.keys(values).filter((name) => !known.has(name));
  if (unsupported.length > 0) {
    throw new ConfigurationError(
      `Option${unsupported.length > 1 ? 's' : ''} not supported by '${command}': ${unsupported
        .map((name) => `--${name}`)
        .join(', ')}`
    );
  }
  return values;
}

/**
 * Parses a non-negative integer flag value.
 *
 * @throws {ConfigurationError} If the value is not a non-negative integer
 */
export function parseCount(flag: string, text: string | undefined): number | undefined {
  if (text === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(text.trim())) {
    throw new ConfigurationError(`Invalid --${flag} '${text}'. Expected a non-negative integer`);
  }
  return Number(text);
}

export function parseFormat(text: string | undefined, fallback: OutputFormat): OutputFormat {
  if (text === undefined) {
    return fallback;
  }
  if (!isOutputFormat(text)) {
    throw new ConfigurationError(`Invalid --format '${text}'. Valid values: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return text;
}

/**
 * Size range from --min-size/--max-size, or undefined when neither is given.
 */
export function sizeRange(values: CliValues): Range<number> | undefined {
  const min = values['min-size'];
  const max = values['max-size'];
  if (min === undefined && max === undefined) {
    return undefined;
  }
  return {
    min: min === undefined ? undefined : parseSize(min),
    max: max === undefined ? undefined : parseSize(max),
  };
}

/**
 * Time range from --newer-than/--older-than, or undefined when neither is given.
 */
export function timeRange(values: CliValues, now: Date): Range<Date> | undefined {
  const newer = values['newer-than'];
  const older = values['older-than'];
  if (newer === undefined && older === undefined) {
    return undefined;
  }
  return {
    min: newer === undefined ? undefined : parseTimeExpression(newer, now),
    max: older === undefined ? undefined : parseTimeExpression(older, now),
  };
}
