export type TokenSupplier = string | (() => string | null | Promise<string | null>);

export type TimestampUnit = 'seconds' | 'microseconds';

export interface TempoClientOptions {
  baseUrl: string;
  /**
   * Path of the search endpoint. `{tenant}` is replaced with the encoded
   * tenant id, which lets the same client talk to a multi-tenant gateway.
   */
  searchPath?: string;
  tenantId?: string;
  token?: TokenSupplier;
  defaultHeaders?: Record<string, string>;
  userAgent?: string;
  fetchTimeoutMs?: number;
  timestampUnit?: TimestampUnit;
  insecureSkipVerify?: boolean;
}

export interface SearchTimeRange {
  start: Date;
  end: Date;
}

export interface SearchInput {
  query: string;
  range?: SearchTimeRange | null;
  limit?: number;
  signal?: AbortSignal;
}

export interface SearchResult {
  statusCode: number;
  ok: boolean;
  /** Raw response text; null when the body could not be read. */
  body: string | null;
  bodyError?: string;
  request: RequestDescription;
}

export interface RequestDescription {
  method: string;
  url: string;
  headers: Record<string, string>;
}

export interface TraceSearchBackend {
  search(input: SearchInput): Promise<SearchResult>;
}
