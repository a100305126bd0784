import type { Logger } from 'pino';
import type { TraceSearchBackend } from '@tracebench/tempo-client';
import { TimeBucketRegistry } from './buckets';
import { systemClock, type Clock } from './clock';
import type { LoadgenConfig } from './config/loadgenConfig';
import { ConfigurationError } from './errors';
import { QueryExecutor, type ExecutorStats } from './executor';
import { ExecutionPlan } from './plan';
import type { OutcomeSink, QueryTemplate } from './types';

export interface ExecutorPlan {
  template: QueryTemplate;
  concurrency: number;
  targetRate: number;
  planEntries: number;
  /** Plan entries per bucket, in first-seen order. */
  distribution: Map<string, number>;
}

export interface LoadPlan {
  registry: TimeBucketRegistry;
  plan: ExecutionPlan;
  executors: ExecutorPlan[];
}

export interface PlanLoadOptions {
  random?: () => number;
}

/**
 * Validates cross references and derives the per-template rate and worker
 * count. Templates without their own `targetQPS` share the global rate
 * evenly.
 */
export function planLoad(config: LoadgenConfig, options: PlanLoadOptions = {}): LoadPlan {
  const registry = TimeBucketRegistry.fromDefinitions(config.timeBuckets, {
    jitter: config.query.jitter,
    random: options.random
  });
  const plan = ExecutionPlan.fromEntries(config.executionPlan, {
    queryNames: config.queries.map((query) => query.name),
    hasBucket: (name) => registry.has(name)
  });

  const sharedRate = config.query.targetQPS / config.queries.length;
  const issues: string[] = [];
  const executors: ExecutorPlan[] = [];
  for (const query of config.queries) {
    const targetRate = query.targetQPS ?? sharedRate;
    const concurrency = query.concurrency ?? config.query.concurrentQueries;
    if (!Number.isFinite(targetRate) || targetRate <= 0) {
      issues.push(`query '${query.name}': target rate must be greater than 0`);
    }
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      issues.push(`query '${query.name}': concurrency must be at least 1`);
    }
    executors.push({
      template: { name: query.name, queryExpression: query.queryExpression },
      concurrency,
      targetRate,
      planEntries: plan.entriesFor(query.name).length,
      distribution: plan.distribution(query.name)
    });
  }
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid query settings', issues);
  }

  return { registry, plan, executors };
}

export interface SchedulerDeps {
  backend: TraceSearchBackend;
  sink: OutcomeSink;
  logger: Logger;
  clock?: Clock;
  random?: () => number;
}

export class Scheduler {
  readonly load: LoadPlan;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly pool: QueryExecutor[];
  private controller: AbortController | null = null;
  private completion: Promise<void> | null = null;

  private constructor(load: LoadPlan, pool: QueryExecutor[], logger: Logger, clock: Clock) {
    this.load = load;
    this.pool = pool;
    this.logger = logger;
    this.clock = clock;
  }

  /** Builds every executor up front; nothing is sent until `start()`. */
  static create(config: LoadgenConfig, deps: SchedulerDeps): Scheduler {
    const clock = deps.clock ?? systemClock;
    const load = planLoad(config, { random: deps.random });
    const pool = load.executors.map(
      (executor) =>
        new QueryExecutor({
          template: executor.template,
          concurrency: executor.concurrency,
          targetRate: executor.targetRate,
          sequence: load.plan.sequence(executor.template.name),
          registry: load.registry,
          backend: deps.backend,
          sink: deps.sink,
          logger: deps.logger,
          clock,
          random: deps.random,
          resultLimit: config.query.limit,
          ineligiblePolicy: config.query.ineligibleBucketPolicy,
          startupJitterMs: config.query.startupJitterMs
        })
    );
    return new Scheduler(load, pool, deps.logger, clock);
  }

  get running(): boolean {
    return this.controller !== null && !this.controller.signal.aborted;
  }

  executors(): readonly QueryExecutor[] {
    return this.pool;
  }

  stats(): ExecutorStats[] {
    return this.pool.map((executor) => executor.stats());
  }

  start(): void {
    if (this.controller) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    const startedAt = this.clock.now();
    this.logger.info(
      {
        queries: this.pool.length,
        buckets: this.load.registry.names(),
        planEntries: this.load.plan.entries.length,
        startedAt: new Date(startedAt).toISOString()
      },
      'Starting query scheduler'
    );
    const completion = Promise.all(this.pool.map((executor) => executor.start(controller.signal))).then(() => undefined);
    completion.catch((error: unknown) => {
      this.logger.error({ err: error }, 'Query scheduler failed');
    });
    this.completion = completion;
  }

  /** Settles once every executor has stopped; rejects if a worker crashed. */
  done(): Promise<void> {
    return this.completion ?? Promise.resolve();
  }

  async stop(): Promise<void> {
    if (!this.controller) {
      return;
    }
    if (!this.controller.signal.aborted) {
      this.logger.info('Stopping query scheduler');
      this.controller.abort();
    }
    await this.done();
  }
}
