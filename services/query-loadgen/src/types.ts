import type { LoadgenMetrics } from './metrics';
import type { Scheduler } from './scheduler';

export interface QueryTemplate {
  name: string;
  /** Backend query text, e.g. a TraceQL expression. */
  queryExpression: string;
}

/** Result of one dispatch; handed to the sink and then dropped. */
export interface Outcome {
  queryName: string;
  bucketName: string;
  latencySeconds: number;
  success: boolean;
  /** Present on success only. */
  resultCount?: number;
  /** Absent when the request never produced a response. */
  statusCode?: number;
  error?: string;
}

export interface SkippedDispatch {
  queryName: string;
  bucketName: string;
}

export interface OutcomeSink {
  recordOutcome(outcome: Outcome): void;
  recordSkip(skipped: SkippedDispatch): void;
}

export interface AppContext {
  metrics: LoadgenMetrics;
  scheduler: Scheduler;
}
