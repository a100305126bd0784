export type TempoClientErrorCode = 'TIMEOUT' | 'ABORTED' | 'TRANSPORT';

export class TempoClientError extends Error {
  readonly code: TempoClientErrorCode;
  readonly url: string;

  constructor(message: string, options: { code: TempoClientErrorCode; url: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'TempoClientError';
    this.code = options.code;
    this.url = options.url;
  }
}
