import { formatDuration } from '@tracebench/shared';
import { ConfigurationError } from './errors';

/** Pseudo-bucket with no time restriction; always eligible. */
export const IMMEDIATE_BUCKET = 'immediate';

export type IneligiblePolicy = 'immediate' | 'skip';

export interface TimeBucketDefinition {
  name: string;
  ageMinMs: number;
  ageMaxMs: number;
}

export interface TimeBucket {
  readonly name: string;
  readonly ageMinMs: number;
  readonly ageMaxMs: number;
}

export interface TimeWindow {
  start: Date;
  end: Date;
}

export type BucketResolution =
  | { kind: 'window'; bucketName: string; window: TimeWindow }
  | { kind: 'immediate'; requestedBucket: string }
  | { kind: 'skip'; requestedBucket: string };

export interface ResolveWindowOptions {
  jitter?: boolean;
  random?: () => number;
}

export interface ResolveBucketOptions {
  nowMs: number;
  elapsedMs: number;
  policy?: IneligiblePolicy;
}

/**
 * A bucket may only be queried once the run has lasted at least as long as
 * its oldest edge; before that it cannot hold data produced by this run.
 */
export function isEligible(bucket: TimeBucket, elapsedMs: number): boolean {
  return bucket.ageMaxMs <= elapsedMs;
}

/**
 * Window `[now - ageMax, now - ageMin - jitter]`. Jitter is drawn from
 * `[0, ageMax - ageMin)` and only moves the end back, so the window stays
 * inside the bucket.
 */
export function resolveWindow(bucket: TimeBucket, nowMs: number, options: ResolveWindowOptions = {}): TimeWindow {
  const width = bucket.ageMaxMs - bucket.ageMinMs;
  let jitterMs = 0;
  if (options.jitter !== false && width > 0) {
    const random = options.random ?? Math.random;
    jitterMs = Math.min(Math.floor(random() * width), width);
  }
  return {
    start: new Date(nowMs - bucket.ageMaxMs),
    end: new Date(nowMs - bucket.ageMinMs - jitterMs)
  };
}

export class TimeBucketRegistry {
  private readonly buckets: ReadonlyMap<string, TimeBucket>;
  private readonly jitter: boolean;
  private readonly random: () => number;

  private constructor(buckets: ReadonlyMap<string, TimeBucket>, options: ResolveWindowOptions) {
    this.buckets = buckets;
    this.jitter = options.jitter ?? true;
    this.random = options.random ?? Math.random;
  }

  static fromDefinitions(definitions: TimeBucketDefinition[], options: ResolveWindowOptions = {}): TimeBucketRegistry {
    const issues: string[] = [];
    const buckets = new Map<string, TimeBucket>();

    for (const definition of definitions) {
      const name = definition.name.trim();
      if (name.length === 0) {
        issues.push('time bucket name must not be empty');
        continue;
      }
      if (name === IMMEDIATE_BUCKET) {
        issues.push(`time bucket name '${IMMEDIATE_BUCKET}' is reserved`);
        continue;
      }
      if (buckets.has(name)) {
        issues.push(`duplicate time bucket '${name}'`);
        continue;
      }
      if (!Number.isFinite(definition.ageMinMs) || definition.ageMinMs < 0) {
        issues.push(`time bucket '${name}': ageStart must be a non-negative duration`);
        continue;
      }
      if (!Number.isFinite(definition.ageMaxMs) || definition.ageMaxMs < definition.ageMinMs) {
        issues.push(
          `time bucket '${name}': ageEnd (${formatDuration(definition.ageMaxMs)}) must not be less than ageStart (${formatDuration(definition.ageMinMs)})`
        );
        continue;
      }
      buckets.set(name, Object.freeze({ name, ageMinMs: definition.ageMinMs, ageMaxMs: definition.ageMaxMs }));
    }

    if (issues.length > 0) {
      throw new ConfigurationError('Invalid time buckets', issues);
    }
    return new TimeBucketRegistry(buckets, options);
  }

  get size(): number {
    return this.buckets.size;
  }

  names(): string[] {
    return [...this.buckets.keys()];
  }

  has(name: string): boolean {
    return name === IMMEDIATE_BUCKET || this.buckets.has(name);
  }

  get(name: string): TimeBucket | undefined {
    return this.buckets.get(name);
  }

  /**
   * Maps a plan entry's bucket to what a single dispatch should query. An
   * ineligible bucket yields `immediate` or `skip` depending on the policy;
   * unknown names are rejected when the plan is built, so they never get here.
   */
  resolve(bucketName: string, options: ResolveBucketOptions): BucketResolution {
    if (bucketName === IMMEDIATE_BUCKET) {
      return { kind: 'immediate', requestedBucket: bucketName };
    }
    const bucket = this.buckets.get(bucketName);
    if (!bucket) {
      throw new Error(`Unknown time bucket '${bucketName}'`);
    }
    if (!isEligible(bucket, options.elapsedMs)) {
      return options.policy === 'skip'
        ? { kind: 'skip', requestedBucket: bucketName }
        : { kind: 'immediate', requestedBucket: bucketName };
    }
    return {
      kind: 'window',
      bucketName,
      window: resolveWindow(bucket, options.nowMs, { jitter: this.jitter, random: this.random })
    };
  }
}
