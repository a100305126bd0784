import { readFile } from 'node:fs/promises';
import process from 'node:process';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { formatDuration } from '@tracebench/shared';
import { TempoClient, type TraceSearchBackend } from '@tracebench/tempo-client';

import { createApp } from './app';
import { loadLoadgenConfig, type LoadgenConfig } from './config/loadgenConfig';
import type { ServiceConfig } from './config/serviceConfig';
import { describeError } from './errors';
import { createLogger } from './logger';
import { createLoadgenMetrics, type LoadgenMetrics } from './metrics';
import { planLoad, Scheduler, type LoadPlan } from './scheduler';

const USER_AGENT = 'tracebench-loadgen/0.1.0';

export interface LoadgenServer {
  app: FastifyInstance;
  scheduler: Scheduler;
  metrics: LoadgenMetrics;
  stop(): Promise<void>;
}

export interface StartLoadgenOptions {
  service: ServiceConfig;
  config: LoadgenConfig;
  logger?: Logger;
  /** Replaces the HTTP client, e.g. with an in-process fake. */
  backend?: TraceSearchBackend;
}

/** Reads a bearer token file; a missing or unreadable file only disables auth. */
export async function readToken(tokenPath: string, logger: Logger): Promise<string | undefined> {
  try {
    const token = (await readFile(tokenPath, 'utf8')).trim();
    if (token.length === 0) {
      logger.warn({ tokenPath }, 'Token file is empty, continuing without authentication');
      return undefined;
    }
    return token;
  } catch (error) {
    logger.warn({ tokenPath, reason: describeError(error) }, 'Could not read token file, continuing without authentication');
    return undefined;
  }
}

export function summarizePlan(config: LoadgenConfig, load: LoadPlan): string[] {
  const lines = [
    `endpoint: ${config.tempo.queryEndpoint}${config.tenantId ? ` (tenant ${config.tenantId})` : ''}`,
    `time buckets: ${load.registry.size}`
  ];
  for (const name of load.registry.names()) {
    const bucket = load.registry.get(name);
    if (bucket) {
      lines.push(`  ${name}: ${formatDuration(bucket.ageMinMs)} - ${formatDuration(bucket.ageMaxMs)} ago`);
    }
  }
  lines.push(`queries: ${load.executors.length}`);
  for (const executor of load.executors) {
    const buckets = [...executor.distribution].map(([bucket, count]) => `${bucket}=${count}`).join(', ');
    lines.push(
      `  ${executor.template.name}: ${executor.targetRate} qps, ${executor.concurrency} workers, ${executor.planEntries} plan entries (${buckets})`
    );
  }
  return lines;
}

export async function validateLoadgenConfig(configPath: string): Promise<string[]> {
  const config = await loadLoadgenConfig(configPath);
  return summarizePlan(config, planLoad(config));
}

export async function startLoadgen(options: StartLoadgenOptions): Promise<LoadgenServer> {
  const { service, config } = options;
  const logger = options.logger ?? createLogger(service.logLevel);

  let client: TempoClient | null = null;
  let backend = options.backend;
  if (!backend) {
    const token = await readToken(service.tokenPath, logger);
    client = new TempoClient({
      baseUrl: config.tempo.queryEndpoint,
      searchPath: config.tempo.searchPath,
      tenantId: config.tenantId,
      token,
      userAgent: USER_AGENT,
      fetchTimeoutMs: config.query.timeoutMs,
      timestampUnit: config.query.timestampUnit,
      insecureSkipVerify: config.tempo.insecureSkipVerify
    });
    backend = client;
  }

  const metrics = createLoadgenMetrics({
    namespace: config.namespace,
    collectDefaultMetrics: service.collectDefaultMetrics
  });

  let scheduler: Scheduler;
  let app: FastifyInstance;
  try {
    scheduler = Scheduler.create(config, { backend, sink: metrics, logger });
    for (const executor of scheduler.executors()) {
      metrics.setExecutorInfo(executor.template.name, {
        targetQps: executor.targetRate,
        workers: executor.concurrency
      });
    }
    app = createApp({ metrics, scheduler }, { logLevel: service.logLevel });
    await app.listen({ port: service.metricsPort, host: service.metricsHost });
  } catch (error) {
    await client?.close();
    throw error;
  }
  logger.info({ host: service.metricsHost, port: service.metricsPort }, 'Metrics server listening');

  scheduler.start();

  let stopping: Promise<void> | null = null;
  const stop = () => {
    stopping ??= (async () => {
      try {
        await scheduler.stop();
      } finally {
        await app.close();
        await client?.close();
      }
    })();
    return stopping;
  };

  return { app, scheduler, metrics, stop };
}

/** Runs until SIGINT or SIGTERM, or until a worker fails unexpectedly. */
export async function runLoadgen(service: ServiceConfig, configPath: string): Promise<void> {
  const logger = createLogger(service.logLevel);
  const config = await loadLoadgenConfig(configPath);
  logger.info(
    {
      configFile: configPath,
      namespace: config.namespace,
      tenantId: config.tenantId,
      endpoint: config.tempo.queryEndpoint,
      targetQPS: config.query.targetQPS,
      concurrentQueries: config.query.concurrentQueries
    },
    'Loaded configuration'
  );

  const server = await startLoadgen({ service, config, logger });

  await new Promise<void>((resolve, reject) => {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'Shutting down query load generator');
      server.stop().then(resolve, reject);
    };
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));

    server.scheduler.done().catch((error: unknown) => {
      server.stop().then(() => reject(error), reject);
    });
  });
}
