import { z } from 'zod';
import { booleanVar, hostVar, loadEnvConfig, portVar, stringVar, type EnvSource } from '@tracebench/shared';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ServiceConfig {
  configFile: string;
  logLevel: LogLevel;
  metricsHost: string;
  metricsPort: number;
  tokenPath: string;
  collectDefaultMetrics: boolean;
}

export const DEFAULT_CONFIG_FILE = '/config/config.yaml';
export const DEFAULT_TOKEN_PATH = '/var/run/secrets/kubernetes.io/serviceaccount/token';

const envSchema = z
  .object({
    CONFIG_FILE: stringVar({ defaultValue: DEFAULT_CONFIG_FILE }),
    LOADGEN_LOG_LEVEL: stringVar({ defaultValue: 'info', lowercase: true, allowed: LOG_LEVELS }),
    LOADGEN_METRICS_HOST: hostVar({ defaultHost: '0.0.0.0' }),
    LOADGEN_METRICS_PORT: portVar({ defaultPort: 2112 }),
    LOADGEN_TOKEN_PATH: stringVar({ defaultValue: DEFAULT_TOKEN_PATH }),
    LOADGEN_COLLECT_DEFAULT_METRICS: booleanVar({ defaultValue: true })
  })
  .passthrough();

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function loadServiceConfig(env?: EnvSource): ServiceConfig {
  const parsed = loadEnvConfig(envSchema, { env, context: 'query-loadgen' });
  const logLevel = parsed.LOADGEN_LOG_LEVEL ?? 'info';

  return {
    configFile: parsed.CONFIG_FILE ?? DEFAULT_CONFIG_FILE,
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
    metricsHost: parsed.LOADGEN_METRICS_HOST ?? '0.0.0.0',
    metricsPort: parsed.LOADGEN_METRICS_PORT ?? 2112,
    tokenPath: parsed.LOADGEN_TOKEN_PATH ?? DEFAULT_TOKEN_PATH,
    collectDefaultMetrics: parsed.LOADGEN_COLLECT_DEFAULT_METRICS ?? true
  };
}
