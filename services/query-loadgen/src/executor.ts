import type { Logger } from 'pino';
import { describeRequest, DEFAULT_RESULT_LIMIT, type SearchResult, type TraceSearchBackend } from '@tracebench/tempo-client';
import { IMMEDIATE_BUCKET, type IneligiblePolicy, type TimeBucketRegistry } from './buckets';
import { isAbortError, systemClock, type Clock } from './clock';
import { describeError } from './errors';
import type { PlanSequence } from './plan';
import { RateLimiter } from './rateLimiter';
import { countReturnedSpans } from './searchResponse';
import type { Outcome, OutcomeSink, QueryTemplate } from './types';

const DEFAULT_STARTUP_JITTER_MS = 1_000;
const MAX_LOGGED_BODY_CHARS = 2_048;

export interface QueryExecutorOptions {
  template: QueryTemplate;
  concurrency: number;
  /** Requests per second across all of this executor's workers. */
  targetRate: number;
  sequence: PlanSequence;
  registry: TimeBucketRegistry;
  backend: TraceSearchBackend;
  sink: OutcomeSink;
  logger: Logger;
  clock?: Clock;
  random?: () => number;
  /** Start of the run; bucket eligibility is measured from here. */
  startedAtMs?: number;
  resultLimit?: number;
  ineligiblePolicy?: IneligiblePolicy;
  startupJitterMs?: number;
}

export interface ExecutorStats {
  queryName: string;
  workers: number;
  activeWorkers: number;
  targetRate: number;
  dispatched: number;
  inFlight: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

export class QueryExecutor {
  readonly template: QueryTemplate;
  readonly concurrency: number;
  readonly targetRate: number;
  private readonly sequence: PlanSequence;
  private readonly registry: TimeBucketRegistry;
  private readonly backend: TraceSearchBackend;
  private readonly sink: OutcomeSink;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly limiter: RateLimiter;
  private readonly resultLimit: number;
  private readonly ineligiblePolicy: IneligiblePolicy;
  private readonly startupJitterMs: number;
  private startedAtMs: number | undefined;
  private controller: AbortController | null = null;
  private completion: Promise<void> | null = null;
  private activeWorkers = 0;
  private inFlight = 0;
  private succeeded = 0;
  private failed = 0;
  private skipped = 0;

  constructor(options: QueryExecutorOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be an integer >= 1, got ${options.concurrency}`);
    }
    if (options.sequence.queryName !== options.template.name) {
      throw new Error(`Plan sequence for '${options.sequence.queryName}' cannot drive query '${options.template.name}'`);
    }
    this.template = options.template;
    this.concurrency = options.concurrency;
    this.targetRate = options.targetRate;
    this.sequence = options.sequence;
    this.registry = options.registry;
    this.backend = options.backend;
    this.sink = options.sink;
    this.logger = options.logger.child({ query: options.template.name });
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.limiter = new RateLimiter({ ratePerSecond: options.targetRate, clock: this.clock });
    this.resultLimit = options.resultLimit ?? DEFAULT_RESULT_LIMIT;
    this.ineligiblePolicy = options.ineligiblePolicy ?? 'immediate';
    this.startupJitterMs = Math.max(0, options.startupJitterMs ?? DEFAULT_STARTUP_JITTER_MS);
    this.startedAtMs = options.startedAtMs;
  }

  get running(): boolean {
    return this.controller !== null && !this.controller.signal.aborted;
  }

  /**
   * Launches the worker pool. The returned promise settles once every worker
   * has stopped, which only happens after `stop()` or an abort of `signal`.
   */
  start(signal?: AbortSignal): Promise<void> {
    if (this.completion) {
      return this.completion;
    }
    const controller = new AbortController();
    this.controller = controller;
    if (signal) {
      if (signal.aborted) {
        controller.abort(signal.reason);
      } else {
        signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true });
      }
    }
    this.startedAtMs ??= this.clock.now();

    this.logger.info(
      { workers: this.concurrency, targetRate: this.targetRate, planEntries: this.sequence.length },
      'Starting query executor'
    );

    const workers = Array.from({ length: this.concurrency }, (_, index) =>
      this.runWorker(index + 1, controller.signal)
    );
    this.completion = Promise.all(workers).then(() => {
      this.logger.info({ dispatched: this.sequence.dispatched }, 'Query executor stopped');
    });
    return this.completion;
  }

  async stop(): Promise<void> {
    if (!this.controller || !this.completion) {
      return;
    }
    this.controller.abort();
    await this.completion;
  }

  stats(): ExecutorStats {
    return {
      queryName: this.template.name,
      workers: this.concurrency,
      activeWorkers: this.activeWorkers,
      targetRate: this.targetRate,
      dispatched: this.sequence.dispatched,
      inFlight: this.inFlight,
      succeeded: this.succeeded,
      failed: this.failed,
      skipped: this.skipped
    };
  }

  private async runWorker(workerId: number, signal: AbortSignal): Promise<void> {
    const log = this.logger.child({ worker: workerId });
    this.activeWorkers += 1;
    try {
      // Stagger first requests; the shared limiter still governs the rate.
      await this.clock.sleep(Math.floor(this.random() * this.startupJitterMs), signal);
      while (!signal.aborted) {
        await this.limiter.acquire(signal);
        await this.dispatch(log, signal);
      }
    } catch (error) {
      if (!signal.aborted && !isAbortError(error)) {
        log.error({ err: error }, 'Worker stopped unexpectedly');
        throw error;
      }
    } finally {
      this.activeWorkers -= 1;
    }
  }

  private async dispatch(log: Logger, signal: AbortSignal): Promise<void> {
    const { entry, position, cycle } = this.sequence.next();
    if (position === 0 && cycle > 0) {
      log.info({ cycle, planEntries: this.sequence.length }, 'Cycled through all plan entries, repeating from start');
    }

    const nowMs = this.clock.now();
    const resolution = this.registry.resolve(entry.bucketName, {
      nowMs,
      elapsedMs: nowMs - (this.startedAtMs ?? nowMs),
      policy: this.ineligiblePolicy
    });

    if (resolution.kind === 'skip') {
      this.skipped += 1;
      log.debug({ bucket: resolution.requestedBucket }, 'Time bucket not eligible yet, skipping dispatch');
      this.emit(log, () => this.sink.recordSkip({ queryName: this.template.name, bucketName: resolution.requestedBucket }));
      return;
    }

    const bucketName = resolution.kind === 'window' ? resolution.bucketName : IMMEDIATE_BUCKET;
    const range = resolution.kind === 'window' ? resolution.window : null;
    const startedAt = this.clock.now();
    this.inFlight += 1;

    let outcome: Outcome;
    try {
      const result = await this.backend.search({
        query: this.template.queryExpression,
        range,
        limit: this.resultLimit,
        signal
      });
      const latencySeconds = (this.clock.now() - startedAt) / 1000;
      outcome = this.interpret(log, result, bucketName, latencySeconds, range);
    } catch (error) {
      if (signal.aborted) {
        return;
      }
      const latencySeconds = (this.clock.now() - startedAt) / 1000;
      log.warn({ err: error, bucket: bucketName }, 'Query request failed');
      outcome = {
        queryName: this.template.name,
        bucketName,
        latencySeconds,
        success: false,
        error: describeError(error)
      };
    } finally {
      this.inFlight -= 1;
    }

    if (outcome.success) {
      this.succeeded += 1;
    } else {
      this.failed += 1;
    }
    this.emit(log, () => this.sink.recordOutcome(outcome));
  }

  private interpret(
    log: Logger,
    result: SearchResult,
    bucketName: string,
    latencySeconds: number,
    range: { start: Date; end: Date } | null
  ): Outcome {
    if (!result.ok) {
      log.warn({ bucket: bucketName, status: result.statusCode, durationSeconds: latencySeconds }, 'Query failed');
      log.debug(
        {
          request: describeRequest(result.request),
          body: result.body?.slice(0, MAX_LOGGED_BODY_CHARS) ?? null,
          bodyError: result.bodyError
        },
        'Failed query details'
      );
      return {
        queryName: this.template.name,
        bucketName,
        latencySeconds,
        success: false,
        statusCode: result.statusCode
      };
    }

    const spans = countReturnedSpans(result.body ?? null);
    if (spans.error) {
      log.warn({ bucket: bucketName, reason: result.bodyError ?? spans.error }, 'Could not count spans in search response');
    }
    log.debug(
      {
        bucket: bucketName,
        status: result.statusCode,
        durationSeconds: latencySeconds,
        spans: spans.count,
        timeRange: range ? { start: range.start.toISOString(), end: range.end.toISOString() } : null
      },
      'Query completed'
    );
    return {
      queryName: this.template.name,
      bucketName,
      latencySeconds,
      success: true,
      resultCount: spans.count,
      statusCode: result.statusCode
    };
  }

  /** Sink calls must never disturb the dispatch loop. */
  private emit(log: Logger, record: () => void): void {
    try {
      record();
    } catch (error) {
      log.warn({ err: error }, 'Failed to record dispatch outcome');
    }
  }
}
