/**
 * Helpers for combining lazy record sequences.
 */

import { ConfigurationError } from '@shared/errors';

/**
 * Lazily merges sequences that are each already ordered by `compare` into a
 * single ordered sequence. Only one head element per input is held at a time.
 * Ties go to the earlier input.
 */
export async function* mergeSorted<T>(
  sources: ReadonlyArray<AsyncIterable<T>>,
  compare: (a: T, b: T) => number
): AsyncGenerator<T, void, undefined> {
  const iterators = sources.map((source) => source[Symbol.asyncIterator]());
  const heads: Array<IteratorResult<T, unknown>> = [];

  try {
    for (const iterator of iterators) {
      heads.push(await iterator.next());
    }

    for (;;) {
      let best: { index: number; value: T } | undefined;
      for (let index = 0; index < heads.length; index++) {
        const head = heads[index];
        if (head.done) {
          continue;
        }
        if (!best || compare(head.value, best.value) < 0) {
          best = { index, value: head.value };
        }
      }

      if (!best) {
        return;
      }

      yield best.value;
      heads[best.index] = await iterators[best.index].next();
    }
  } finally {
    for (let index = 0; index < iterators.length; index++) {
      if (!heads[index]?.done) {
        await iterators[index].return?.();
      }
    }
  }
}

/**
 * Yields at most `limit` items and stops pulling the source afterwards.
 * Without a limit the source is passed through.
 */
export async function* take<T>(source: AsyncIterable<T>, limit?: number): AsyncGenerator<T, void, undefined> {
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    throw new ConfigurationError(`Invalid limit ${limit}. Expected a non-negative integer`);
  }
  if (limit === 0) {
    return;
  }
  let count = 0;
  for await (const item of source) {
    yield item;
    count++;
    if (limit !== undefined && count >= limit) {
      return;
    }
  }
}

/**
 * Concatenates sequences produced on demand, in order.
 */
export async function* chain<T>(sources: AsyncIterable<AsyncIterable<T>> | Iterable<AsyncIterable<T>>): AsyncGenerator<T, void, undefined> {
  for await (const source of sources) {
    yield* source;
  }
}
