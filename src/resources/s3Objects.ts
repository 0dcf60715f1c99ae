/**
 * S3 object listing with prefix, size and modification-time filters.
 */

import { S3Client, ListObjectsV2Command, type _Object } from '@aws-sdk/client-s3';
import type { Range } from '@shared/types';
import { PageSource } from '@core/pageSource';
import { PredicateSet, prefixPredicate, rangePredicate, timeRangePredicate } from '@core/predicates';
import { discover } from '@core/pipeline';
import { isoOrNull, type ListOptions, type RecordStream } from './common';

export interface S3ObjectListOptions extends ListOptions {
  bucket: string;
  /**
   * Key prefix, applied by the service and re-checked locally.
   */
  prefix?: string;
  size?: Range<number>;
  lastModified?: Range<Date>;
}

export type S3ObjectRecord = {
  key: string;
  size: number;
  last_modified: string | null;
  storage_class: string;
  etag?: string;
  owner?: string;
};

/**
 * Maps a listed object to its output record.
 */
export function toS3ObjectRecord(object: _Object, verbose: boolean): S3ObjectRecord {
  const record: S3ObjectRecord = {
    key: object.Key ?? '',
    size: object.Size ?? 0,
    last_modified: isoOrNull(object.LastModified),
    storage_class: object.StorageClass ?? 'STANDARD',
  };
  if (verbose) {
    record.etag = (object.ETag ?? '').replace(/^"|"$/g, '');
    record.owner = object.Owner?.DisplayName ?? '';
  }
  return record;
}

/**
 * Lists objects in a bucket, lazily, page by page.
 */
export function listS3Objects(client: S3Client, options: S3ObjectListOptions): RecordStream<S3ObjectRecord> {
  const { bucket, prefix = '', size, lastModified, verbose = false } = options;

  const source = new PageSource<_Object>('s3:ListObjectsV2', async (cursor) => {
    const response = await client.send(
      new ListObjectsV2Command({
        Bucket: bucket,
        Prefix: prefix || undefined,
        ContinuationToken: cursor,
        FetchOwner: verbose || undefined,
      })
    );
    return { items: response.Contents ?? [], nextCursor: response.NextContinuationToken };
  });

  const predicates = PredicateSet.empty<_Object>()
    .where(prefix ? prefixPredicate<_Object>(prefix, (object) => object.Key ?? '') : undefined)
    .where(size ? rangePredicate<_Object>(size, (object) => object.Size) : undefined)
    .where(lastModified ? timeRangePredicate<_Object>(lastModified, (object) => object.LastModified) : undefined);

  return discover({
    source,
    predicates,
    verbose,
    shape: (object) => toS3ObjectRecord(object, verbose),
    describe: (object) => `s3://${bucket}/${object.Key ?? ''}`,
    limit: options.limit,
    onWarning: options.onWarning,
  });
}
