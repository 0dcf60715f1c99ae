/**
 * Lazy, sequential access to a paginated remote list API.
 */

import type { ListOperation, Page } from '@shared/types';
import { TransportError, describeError } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('cloud-sweep:page-source');

/**
 * Wraps a remote list operation as an async sequence of record batches.
 *
 * Each pull issues exactly one remote call with the cursor returned by the
 * previous pull. The sequence ends when the service stops returning a
 * continuation token. A source can be iterated once.
 *
 * @example
 * const source = new PageSource('s3:ListObjectsV2', async (cursor) => {
 *   const response = await s3.send(new ListObjectsV2Command({ Bucket, ContinuationToken: cursor }));
 *   return { items: response.Contents ?? [], nextCursor: response.NextContinuationToken };
 * });
 * for await (const batch of source) { ... }
 */
export class PageSource<T> implements AsyncIterable<readonly T[]> {
  private started = false;
  private pulls = 0;

  constructor(
    readonly operation: string,
    private readonly list: ListOperation<T>
  ) {}

  /**
   * Number of remote calls issued so far.
   */
  get pagesFetched(): number {
    return this.pulls;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<readonly T[], void, undefined> {
    if (this.started) {
      throw new Error(`Page source ${this.operation} has already been consumed`);
    }
    this.started = true;

    let cursor: string | undefined;
    do {
      this.pulls++;
      let page: Page<T>;
      try {
        page = await this.list(cursor);
      } catch (error) {
        throw new TransportError(
          this.operation,
          `${this.operation} failed on page ${this.pulls}: ${describeError(error)}`,
          { cause: error }
        );
      }

      logger.debug(
        { operation: this.operation, page: this.pulls, items: page.items.length },
        'Fetched page'
      );

      cursor = page.nextCursor || undefined;
      if (page.items.length > 0) {
        yield page.items;
      }
    } while (cursor);
  }
}
