import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { load as loadYaml } from 'js-yaml';
import { z } from 'zod';
import { durationVar } from '@tracebench/shared';
import { DEFAULT_RESULT_LIMIT, type TimestampUnit } from '@tracebench/tempo-client';
import type { IneligiblePolicy, TimeBucketDefinition } from '../buckets';
import { ConfigurationError, describeError } from '../errors';
import type { PlanEntry } from '../plan';
import type { QueryTemplate } from '../types';

export interface TempoSettings {
  queryEndpoint: string;
  searchPath?: string;
  insecureSkipVerify: boolean;
}

export interface QuerySettings {
  concurrentQueries: number;
  /** Total requests per second, split evenly across templates without their own rate. */
  targetQPS: number;
  timeoutMs: number;
  limit: number;
  timestampUnit: TimestampUnit;
  ineligibleBucketPolicy: IneligiblePolicy;
  jitter: boolean;
  startupJitterMs: number;
}

export interface QueryTemplateConfig extends QueryTemplate {
  concurrency?: number;
  targetQPS?: number;
}

export interface LoadgenConfig {
  tempo: TempoSettings;
  namespace: string;
  tenantId?: string;
  query: QuerySettings;
  timeBuckets: TimeBucketDefinition[];
  queries: QueryTemplateConfig[];
  executionPlan: PlanEntry[];
}

const DEFAULT_TIMEOUT_MS = 15 * 60_000;
const DEFAULT_STARTUP_JITTER_MS = 1_000;

const requiredDuration = (description: string) =>
  durationVar({ required: true, description }).pipe(z.number());

const optionalDuration = (description: string, defaultValue: number, output = z.number()) =>
  durationVar({ defaultValue, description }).pipe(output);

const tempoSchema = z.object({
  queryEndpoint: z
    .string({ required_error: 'queryEndpoint is required' })
    .trim()
    .url('queryEndpoint must be an absolute URL'),
  searchPath: z.string().trim().min(1).optional(),
  insecureSkipVerify: z.boolean().optional()
});

const querySchema = z.object({
  // Superseded by the rate limiter; still accepted in older files.
  delay: z.unknown().optional(),
  concurrentQueries: z.number().int().min(1, 'concurrentQueries must be at least 1'),
  targetQPS: z.number().positive('targetQPS must be greater than 0'),
  timeout: optionalDuration('timeout', DEFAULT_TIMEOUT_MS, z.number().positive('timeout must be greater than 0')),
  limit: z.number().int().min(1).optional(),
  timestampUnit: z.enum(['seconds', 'microseconds']).optional(),
  ineligibleBucketPolicy: z.enum(['immediate', 'skip']).optional(),
  jitter: z.boolean().optional(),
  startupJitter: optionalDuration('startupJitter', DEFAULT_STARTUP_JITTER_MS)
});

const timeBucketSchema = z.object({
  name: z.string().trim().min(1, 'time bucket name is required'),
  ageStart: requiredDuration('ageStart'),
  ageEnd: requiredDuration('ageEnd'),
  // Accepted for compatibility; selection is driven by the execution plan.
  weight: z.number().optional()
});

const queryTemplateSchema = z.object({
  name: z.string().trim().min(1, 'query name is required'),
  traceql: z.string().trim().min(1, 'traceql is required'),
  concurrency: z.number().int().min(1, 'concurrency must be at least 1').optional(),
  targetQPS: z.number().positive('targetQPS must be greater than 0').optional()
});

const planEntrySchema = z.object({
  queryName: z.string().trim().min(1, 'queryName is required'),
  bucketName: z.string().trim().min(1, 'bucketName is required')
});

const configSchema = z.object({
  tempo: tempoSchema,
  namespace: z.string().trim().min(1, 'namespace is required'),
  tenantId: z.string().trim().nullish(),
  query: querySchema,
  timeBuckets: z.array(timeBucketSchema).default([]),
  queries: z.array(queryTemplateSchema).min(1, 'at least one query is required'),
  executionPlan: z.array(planEntrySchema).min(1, 'executionPlan must not be empty')
});

function formatIssue(issue: z.ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
  return `${location}: ${issue.message}`;
}

function parseDocument(source: string, origin: string): unknown {
  if (!source.trim()) {
    throw new ConfigurationError(`Configuration ${origin} is empty`);
  }
  try {
    return loadYaml(source);
  } catch (error) {
    throw new ConfigurationError(`Unable to parse configuration ${origin}`, [describeError(error)]);
  }
}

/**
 * Parses and validates a YAML configuration document. Schema problems are
 * reported together; cross references between buckets, queries and the
 * plan are checked when the scheduler is built.
 */
export function parseLoadgenConfig(source: string, origin = 'inline'): LoadgenConfig {
  const payload = parseDocument(source, origin);
  const result = configSchema.safeParse(payload);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid configuration ${origin}`,
      result.error.issues.map((issue) => formatIssue(issue))
    );
  }
  const parsed = result.data;

  const names = new Set<string>();
  const duplicates: string[] = [];
  for (const query of parsed.queries) {
    if (names.has(query.name)) {
      duplicates.push(`duplicate query '${query.name}'`);
    }
    names.add(query.name);
  }
  if (duplicates.length > 0) {
    throw new ConfigurationError(`Invalid configuration ${origin}`, duplicates);
  }

  const tenantId = parsed.tenantId && parsed.tenantId.length > 0 ? parsed.tenantId : undefined;

  return {
    tempo: {
      queryEndpoint: parsed.tempo.queryEndpoint,
      searchPath: parsed.tempo.searchPath,
      insecureSkipVerify: parsed.tempo.insecureSkipVerify ?? false
    },
    namespace: parsed.namespace,
    tenantId,
    query: {
      concurrentQueries: parsed.query.concurrentQueries,
      targetQPS: parsed.query.targetQPS,
      timeoutMs: parsed.query.timeout,
      limit: parsed.query.limit ?? DEFAULT_RESULT_LIMIT,
      timestampUnit: parsed.query.timestampUnit ?? 'seconds',
      ineligibleBucketPolicy: parsed.query.ineligibleBucketPolicy ?? 'immediate',
      jitter: parsed.query.jitter ?? true,
      startupJitterMs: parsed.query.startupJitter
    },
    timeBuckets: parsed.timeBuckets.map((bucket) => ({
      name: bucket.name,
      ageMinMs: bucket.ageStart,
      ageMaxMs: bucket.ageEnd
    })),
    queries: parsed.queries.map((query) => ({
      name: query.name,
      queryExpression: query.traceql,
      concurrency: query.concurrency,
      targetQPS: query.targetQPS
    })),
    executionPlan: parsed.executionPlan.map((entry) => ({
      queryName: entry.queryName,
      bucketName: entry.bucketName
    }))
  } satisfies LoadgenConfig;
}

export async function loadLoadgenConfig(filePath: string): Promise<LoadgenConfig> {
  const resolvedPath = path.resolve(filePath);
  let contents: string;
  try {
    contents = await readFile(resolvedPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Unable to read configuration file ${resolvedPath}`, [describeError(error)]);
  }
  return parseLoadgenConfig(contents, resolvedPath);
}
