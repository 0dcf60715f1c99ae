/**
 * Output rendering for record streams.
 *
 * Line-oriented formats (jsonl, tsv, csv) are written as records arrive;
 * json and table need every record before the first byte is written. When
 * the record stream fails part-way, json and table still write the records
 * that arrived before the failure, then rethrow it.
 */

import type { FieldValue, OutputFormat, OutputRecord } from '@shared/types';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['jsonl', 'json', 'tsv', 'csv', 'table'];

export const EMPTY_TABLE_MESSAGE = 'No items found.';

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface FormatOptions {
  format: OutputFormat;
  /**
   * Fields to output, in order. Defaults to every field for JSON formats and
   * to the fields of the first record for tabular formats.
   */
  fields?: readonly string[];
  noHeader?: boolean;
}

export type Writer = (chunk: string) => void;

/**
 * Keeps only `fields`, in their order. Missing fields become null.
 */
export function project(record: OutputRecord, fields: readonly string[]): Record<string, FieldValue> {
  const projected: Record<string, FieldValue> = {};
  for (const field of fields) {
    projected[field] = record[field] ?? null;
  }
  return projected;
}

/**
 * Text of one tabular cell: empty for null, compact JSON for nested values.
 */
export function renderCell(value: FieldValue | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * RFC 4180 field quoting.
 */
export function csvField(text: string): string {
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

const TSV_ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\\\',
  '\t': '\\t',
  '\n': '\\n',
  '\r': '\\r',
};

/**
 * Backslash-escapes tab, CR, LF and backslash so every record stays on one line.
 */
export function tsvField(text: string): string {
  return text.replace(/[\\\t\r\n]/g, (char) => TSV_ESCAPES[char] ?? char);
}

type DrainResult = { failed: false } | { failed: true; error: unknown };

/**
 * Feeds every record to `visit`. A failure of the stream is returned instead
 * of thrown so that buffered output can be flushed first.
 */
async function drain(
  records: AsyncIterable<OutputRecord> | Iterable<OutputRecord>,
  visit: (record: OutputRecord) => void
): Promise<DrainResult> {
  try {
    for await (const record of records) {
      visit(record);
    }
  } catch (error) {
    return { failed: true, error };
  }
  return { failed: false };
}

/**
 * Renders rows as a grid table with a `=` rule under the header.
 */
export function renderTable(header: readonly string[] | undefined, rows: ReadonlyArray<readonly string[]>): string {
  const columnCount = header?.length ?? rows[0]?.length ?? 0;
  const widths: number[] = [];
  for (let column = 0; column < columnCount; column++) {
    const cells = [...(header ? [header[column]] : []), ...rows.map((row) => row[column] ?? '')];
    widths.push(Math.max(0, ...cells.map((cell) => cell.length)));
  }

  const rule = (fill: string): string => `+${widths.map((width) => fill.repeat(width + 2)).join('+')}+`;
  const line = (cells: readonly string[]): string =>
    `|${widths.map((width, column) => ` ${(cells[column] ?? '').padEnd(width)} `).join('|')}|`;

  const lines = [rule('-')];
  if (header) {
    lines.push(line(header), rule('='));
  }
  for (const row of rows) {
    lines.push(line(row), rule('-'));
  }
  return lines.join('\n');
}

/**
 * Writes every record in the requested format.
 *
 * @returns Number of records written
 */
export async function formatRecords(
  records: AsyncIterable<OutputRecord> | Iterable<OutputRecord>,
  options: FormatOptions,
  write: Writer
): Promise<number> {
  const { format, noHeader = false } = options;
  let fields = options.fields;
  let count = 0;

  switch (format) {
    case 'jsonl': {
      for await (const record of records) {
        write(`${JSON.stringify(fields ? project(record, fields) : record)}\n`);
        count++;
      }
      return count;
    }

    case 'json': {
      const selected = options.fields;
      const items: Array<OutputRecord> = [];
      const result = await drain(records, (record) => {
        items.push(selected ? project(record, selected) : record);
      });
      if (!result.failed || items.length > 0) {
        write(`${JSON.stringify(items, null, 2)}\n`);
      }
      if (result.failed) {
        throw result.error;
      }
      return items.length;
    }

    case 'tsv':
    case 'csv': {
      const quote = format === 'csv' ? csvField : tsvField;
      const separator = format === 'csv' ? ',' : '\t';
      for await (const record of records) {
        if (!fields) {
          fields = Object.keys(record);
        }
        if (count === 0 && !noHeader) {
          write(`${fields.map(quote).join(separator)}\n`);
        }
        write(`${fields.map((field) => quote(renderCell(record[field]))).join(separator)}\n`);
        count++;
      }
      return count;
    }

    case 'table': {
      const rows: string[][] = [];
      const selected = options.fields;
      let columns: readonly string[] = selected ?? [];
      const result = await drain(records, (record) => {
        if (rows.length === 0 && !selected) {
          columns = Object.keys(record);
        }
        rows.push(columns.map((field) => renderCell(record[field])));
      });
      if (rows.length > 0) {
        write(`${renderTable(noHeader ? undefined : columns, rows)}\n`);
      } else if (!result.failed) {
        write(`${EMPTY_TABLE_MESSAGE}\n`);
      }
      if (result.failed) {
        throw result.error;
      }
      return rows.length;
    }
  }
}
