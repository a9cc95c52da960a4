import type { AggregateBucket, FileBucket } from '../github/types.js';

export function createAggregateBucket(): AggregateBucket {
  return { all: [], chg: [], del: [] };
}

/**
 * Append a PR bucket to the aggregate. Skipped PRs (null) add nothing.
 */
export function appendBucket(aggregate: AggregateBucket, bucket: FileBucket | null): AggregateBucket {
  if (!bucket) {
    return aggregate;
  }

  aggregate.all.push(...bucket.all);
  aggregate.chg.push(...(bucket.chg ?? []));
  aggregate.del.push(...(bucket.del ?? []));

  return aggregate;
}

/**
 * Concatenate buckets in the order given
 */
export function mergeBuckets(buckets: Array<FileBucket | null>): AggregateBucket {
  return buckets.reduce<AggregateBucket>(
    (aggregate, bucket) => appendBucket(aggregate, bucket),
    createAggregateBucket()
  );
}
