import { z } from 'zod';
import { describeError } from './errors';

const spanSetSchema = z.object({
  spans: z.array(z.unknown()).nullish(),
  matched: z.number().nullish()
});

const traceSchema = z.object({
  traceID: z.string().nullish(),
  spanSets: z.array(spanSetSchema).nullish(),
  spanSet: spanSetSchema.nullish()
});

export const searchResponseSchema = z.object({
  traces: z.array(traceSchema).nullish()
});

export type SearchResponse = z.infer<typeof searchResponseSchema>;

export interface SpanCount {
  count: number;
  error?: string;
}

/**
 * Counts spans returned by a TraceQL search: structural queries report
 * `spanSets`, simple ones a single `spanSet`. Unreadable bodies count as 0.
 */
export function countReturnedSpans(body: string | null): SpanCount {
  if (body === null) {
    return { count: 0, error: 'response body unavailable' };
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (err) {
    return { count: 0, error: `invalid JSON: ${describeError(err)}` };
  }

  const parsed = searchResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const location = issue && issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return { count: 0, error: `unexpected response shape at ${location}: ${issue?.message ?? 'invalid'}` };
  }

  let count = 0;
  for (const trace of parsed.data.traces ?? []) {
    for (const spanSet of trace.spanSets ?? []) {
      count += spanSet.spans?.length ?? 0;
    }
    if (trace.spanSet) {
      count += trace.spanSet.spans?.length ?? 0;
    }
  }
  return { count };
}
