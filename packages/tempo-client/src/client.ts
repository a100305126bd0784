import { Agent, fetch, Headers } from 'undici';
import type { Dispatcher, Response } from 'undici';
import { TempoClientError } from './errors';
import type {
  RequestDescription,
  SearchInput,
  SearchResult,
  SearchTimeRange,
  TempoClientOptions,
  TimestampUnit,
  TokenSupplier,
  TraceSearchBackend
} from './types';

export const DEFAULT_SEARCH_PATH = '/api/search';
export const GATEWAY_SEARCH_PATH = '/api/traces/v1/{tenant}/tempo/api/search';
export const DEFAULT_RESULT_LIMIT = 1000;

const MASKED_TOKEN_PREFIX = 20;

/** Forwards an abort from `external` to `primary`; the returned function detaches the listener. */
function linkSignal(primary: AbortController, external?: AbortSignal): () => void {
  if (!external) {
    return () => undefined;
  }
  if (external.aborted) {
    primary.abort(external.reason);
    return () => undefined;
  }
  const onAbort = () => {
    primary.abort(external.reason);
  };
  external.addEventListener('abort', onAbort, { once: true });
  return () => {
    external.removeEventListener('abort', onAbort);
  };
}

async function resolveToken(token?: TokenSupplier): Promise<string | null> {
  if (!token) {
    return null;
  }
  if (typeof token === 'function') {
    const resolved = await token();
    return resolved ? resolved.trim() : null;
  }
  const trimmed = token.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function formatTimestamp(value: Date, unit: TimestampUnit, rounding: 'floor' | 'ceil' = 'floor'): string {
  const ms = value.getTime();
  if (unit === 'microseconds') {
    return String(ms * 1000);
  }
  return String(rounding === 'ceil' ? Math.ceil(ms / 1000) : Math.floor(ms / 1000));
}

/**
 * Formats a search window without widening it: the start rounds up and the
 * end rounds down. A window narrower than one unit collapses onto its end.
 */
export function formatRange(range: SearchTimeRange, unit: TimestampUnit): { start: string; end: string } {
  const start = formatTimestamp(range.start, unit, 'ceil');
  const end = formatTimestamp(range.end, unit);
  return { start: Number(start) > Number(end) ? end : start, end };
}

/** Renders a request for logs, keeping only the first characters of credentials. */
export function describeRequest(request: RequestDescription): string {
  const lines = [`Method: ${request.method}`, `URL: ${request.url}`, 'Headers:'];
  for (const [key, value] of Object.entries(request.headers)) {
    if (key.toLowerCase() === 'authorization' && value.length > MASKED_TOKEN_PREFIX) {
      lines.push(`  ${key}: ${value.slice(0, MASKED_TOKEN_PREFIX)}...`);
    } else {
      lines.push(`  ${key}: ${value}`);
    }
  }
  return lines.join('\n');
}

export class TempoClient implements TraceSearchBackend {
  private readonly baseUrl: string;
  private readonly searchPath: string;
  private readonly tenantId?: string;
  private readonly token?: TokenSupplier;
  private readonly defaultHeaders: Record<string, string>;
  private readonly userAgent?: string;
  private readonly fetchTimeoutMs?: number;
  private readonly timestampUnit: TimestampUnit;
  private readonly dispatcher?: Dispatcher;

  constructor(options: TempoClientOptions) {
    if (!options.baseUrl) {
      throw new Error('TempoClient requires a baseUrl');
    }
    // Paths are appended to the endpoint so that a gateway prefix survives.
    this.baseUrl = new URL(options.baseUrl).toString().replace(/\/+$/, '');
    this.tenantId = options.tenantId?.trim() || undefined;
    this.searchPath = options.searchPath ?? (this.tenantId ? GATEWAY_SEARCH_PATH : DEFAULT_SEARCH_PATH);
    this.token = options.token;
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.userAgent = options.userAgent;
    this.fetchTimeoutMs = options.fetchTimeoutMs;
    this.timestampUnit = options.timestampUnit ?? 'seconds';
    if (options.insecureSkipVerify) {
      this.dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
    }
  }

  buildSearchUrl(input: Pick<SearchInput, 'query' | 'range' | 'limit'>): URL {
    const path = this.searchPath.replace('{tenant}', encodeURIComponent(this.tenantId ?? ''));
    const url = new URL(`${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`);
    url.searchParams.set('q', input.query);
    if (input.range) {
      const { start, end } = formatRange(input.range, this.timestampUnit);
      url.searchParams.set('start', start);
      url.searchParams.set('end', end);
    }
    url.searchParams.set('limit', String(input.limit ?? DEFAULT_RESULT_LIMIT));
    return url;
  }

  async search(input: SearchInput): Promise<SearchResult> {
    const url = this.buildSearchUrl(input);
    const headers = await this.buildHeaders();
    const request: RequestDescription = {
      method: 'GET',
      url: url.toString(),
      headers: Object.fromEntries(headers.entries())
    };

    const controller = new AbortController();
    const detach = linkSignal(controller, input.signal);
    let timedOut = false;
    let timeout: NodeJS.Timeout | undefined;
    if (this.fetchTimeoutMs && this.fetchTimeoutMs > 0) {
      timeout = setTimeout(() => {
        timedOut = true;
        controller.abort(new Error('Request timed out'));
      }, this.fetchTimeoutMs);
    }

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          method: 'GET',
          headers,
          signal: controller.signal,
          dispatcher: this.dispatcher
        });
      } catch (err) {
        throw this.toClientError(err, request.url, timedOut, input.signal);
      }

      try {
        const body = await response.text();
        return { statusCode: response.status, ok: response.status < 300, body, request };
      } catch (err) {
        if (input.signal?.aborted || timedOut) {
          throw this.toClientError(err, request.url, timedOut, input.signal);
        }
        return {
          statusCode: response.status,
          ok: response.status < 300,
          body: null,
          bodyError: err instanceof Error ? err.message : String(err),
          request
        };
      }
    } finally {
      detach();
      if (timeout) {
        clearTimeout(timeout);
      }
    }
  }

  async close(): Promise<void> {
    if (this.dispatcher) {
      await this.dispatcher.close();
    }
  }

  private async buildHeaders(): Promise<Headers> {
    const headers = new Headers(this.defaultHeaders);
    headers.set('Accept', 'application/json');
    if (this.userAgent) {
      headers.set('User-Agent', this.userAgent);
    }
    const token = await resolveToken(this.token);
    if (token) {
      headers.set('Authorization', `Bearer ${token}`);
    }
    if (this.tenantId) {
      headers.set('X-Scope-OrgID', this.tenantId);
    }
    return headers;
  }

  private toClientError(err: unknown, url: string, timedOut: boolean, signal?: AbortSignal): TempoClientError {
    if (timedOut) {
      return new TempoClientError(`Request timed out after ${this.fetchTimeoutMs}ms`, {
        code: 'TIMEOUT',
        url,
        cause: err
      });
    }
    if (signal?.aborted || (err instanceof Error && err.name === 'AbortError')) {
      return new TempoClientError('Request aborted', { code: 'ABORTED', url, cause: err });
    }
    const message = err instanceof Error ? err.message : String(err);
    return new TempoClientError(`Request failed: ${message}`, { code: 'TRANSPORT', url, cause: err });
  }
}
