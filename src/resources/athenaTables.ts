/**
 * Athena table listing from the Glue Data Catalog.
 */

import { GlueClient, GetTablesCommand, type Table } from '@aws-sdk/client-glue';
import type { FieldValue } from '@shared/types';
import { PageSource } from '@core/pageSource';
import { PredicateSet } from '@core/predicates';
import { discover } from '@core/pipeline';
import {
  isoOrNull,
  shortClassName,
  withNameFilters,
  type ListOptions,
  type NameFilterOptions,
  type RecordStream,
} from './common';

export const DEFAULT_DATABASE = 'default';

export interface AthenaTableListOptions extends ListOptions, NameFilterOptions {
  database?: string;
}

export type AthenaTableRecord = {
  database: string;
  table: string;
  type: string;
  created_time: string | null;
  updated_time: string | null;
  location?: string;
  input_format?: string;
  output_format?: string;
  serde?: string;
  column_count?: number;
  columns?: Array<{ name: string; type: string }>;
  partition_count?: number;
  partition_keys?: string[];
  properties?: Record<string, FieldValue>;
  size_bytes?: number;
};

/**
 * Maps a catalog table to its output record.
 */
export function toAthenaTableRecord(database: string, table: Table, verbose: boolean): AthenaTableRecord {
  const record: AthenaTableRecord = {
    database,
    table: table.Name ?? '',
    type: table.TableType ?? 'EXTERNAL_TABLE',
    created_time: isoOrNull(table.CreateTime),
    updated_time: isoOrNull(table.UpdateTime),
  };

  const storage = table.StorageDescriptor;
  if (storage) {
    record.location = storage.Location ?? '';
    record.input_format = shortClassName(storage.InputFormat);
    record.output_format = shortClassName(storage.OutputFormat);
    if (storage.SerdeInfo) {
      record.serde = shortClassName(storage.SerdeInfo.SerializationLibrary);
    }
  }

  if (verbose) {
    const columns = storage?.Columns ?? [];
    record.column_count = columns.length;
    record.columns = columns.map((column) => ({ name: column.Name ?? '', type: column.Type ?? '' }));

    const partitionKeys = table.PartitionKeys ?? [];
    record.partition_count = partitionKeys.length;
    record.partition_keys = partitionKeys.map((column) => column.Name ?? '');

    const properties = table.Parameters ?? {};
    record.properties = { ...properties };

    const size = properties.totalSize ?? properties.rawDataSize;
    if (size !== undefined && /^\d+$/.test(size)) {
      record.size_bytes = Number(size);
    }
  }

  return record;
}

/**
 * Lists the tables of one catalog database.
 */
export function listAthenaTables(
  client: GlueClient,
  options: AthenaTableListOptions
): RecordStream<AthenaTableRecord> {
  const database = options.database ?? DEFAULT_DATABASE;
  const verbose = options.verbose ?? false;

  const source = new PageSource<Table>('glue:GetTables', async (cursor) => {
    const response = await client.send(
      new GetTablesCommand({ DatabaseName: database, NextToken: cursor })
    );
    return { items: response.TableList ?? [], nextCursor: response.NextToken };
  });

  const predicates = withNameFilters(PredicateSet.empty<Table>(), options, (table) => table.Name ?? '');

  return discover({
    source,
    predicates,
    verbose,
    shape: (table) => toAthenaTableRecord(database, table, verbose),
    describe: (table) => `${database}.${table.Name ?? ''}`,
    limit: options.limit,
    onWarning: options.onWarning,
  });
}
