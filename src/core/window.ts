import type { WindowSnapshot } from "../types.js";

export const DEFAULT_BUCKET_COUNT = 10;

interface Bucket {
  id: number;
  successes: number;
  failures: number;
}

/**
 * Rolling success/failure tally over `samplingDurationMs`, split into
 * `bucketCount` equal buckets held in a ring. A bucket is identified by
 * `floor(now / bucketMs)`; a slot whose id has fallen out of the last
 * `bucketCount` ids is stale and is cleared on the next access that lands on
 * it. Samples therefore expire at bucket granularity.
 *
 * The newest bucket id seen is a high-water mark: a clock that steps
 * backwards records into, and reads from, that bucket rather than earlier ones.
 */
export class SlidingWindowCounter {
  private readonly bucketMs: number;
  private readonly buckets: Bucket[];
  private generation = 0;
  private latestId = 0;

  constructor(
    samplingDurationMs: number,
    private readonly bucketCount = DEFAULT_BUCKET_COUNT
  ) {
    if (!Number.isFinite(samplingDurationMs) || samplingDurationMs <= 0) {
      throw new Error("samplingDurationMs must be a positive number");
    }
    if (!Number.isInteger(bucketCount) || bucketCount <= 0) {
      throw new Error("bucketCount must be a positive integer");
    }
    this.bucketMs = samplingDurationMs / bucketCount;
    this.buckets = Array.from({ length: bucketCount }, () => ({ id: -1, successes: 0, failures: 0 }));
  }

  /**
   * Incremented on every reset. Callers capture it before a unit of work so
   * that outcomes started before a reset can be told apart.
   */
  get epoch(): number {
    return this.generation;
  }

  record(success: boolean, now: number): void {
    const id = this.currentId(now);
    const bucket = this.buckets[this.slot(id)];
    if (bucket.id !== id) {
      bucket.id = id;
      bucket.successes = 0;
      bucket.failures = 0;
    }
    if (success) {
      bucket.successes += 1;
    } else {
      bucket.failures += 1;
    }
  }

  snapshot(now: number): WindowSnapshot {
    const current = this.currentId(now);
    let total = 0;
    let failures = 0;
    for (const bucket of this.buckets) {
      if (!this.isLive(bucket, current)) {
        continue;
      }
      total += bucket.successes + bucket.failures;
      failures += bucket.failures;
    }
    return { total, failures };
  }

  reset(): void {
    for (const bucket of this.buckets) {
      bucket.id = -1;
      bucket.successes = 0;
      bucket.failures = 0;
    }
    this.generation += 1;
  }

  private isLive(bucket: Bucket, current: number): boolean {
    return bucket.id >= 0 && bucket.id <= current && bucket.id > current - this.bucketCount;
  }

  private currentId(now: number): number {
    this.latestId = Math.max(this.latestId, Math.floor(now / this.bucketMs));
    return this.latestId;
  }

  private slot(id: number): number {
    return id % this.bucketCount;
  }
}
