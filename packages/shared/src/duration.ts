const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000
};

const SEGMENT_PATTERN = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h|d)/gy;

export class InvalidDurationError extends Error {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`Invalid duration '${input}': ${reason}`);
    this.name = 'InvalidDurationError';
    this.input = input;
  }
}

/**
 * Parses a duration string (`1h30m`, `250ms`, `1.5s`) into
 * milliseconds. A bare `0` is accepted; negative values are not.
 */
export function parseDuration(input: string): number {
  const value = input.trim();
  if (value.length === 0) {
    throw new InvalidDurationError(input, 'empty value');
  }
  if (value === '0') {
    return 0;
  }
  if (value.startsWith('-')) {
    throw new InvalidDurationError(input, 'negative durations are not allowed');
  }

  const normalized = value.startsWith('+') ? value.slice(1) : value;
  SEGMENT_PATTERN.lastIndex = 0;
  let total = 0;
  let consumed = 0;
  let match: RegExpExecArray | null;
  while ((match = SEGMENT_PATTERN.exec(normalized)) !== null) {
    const [segment, amount, unit] = match;
    total += Number.parseFloat(amount) * UNIT_MS[unit];
    consumed += segment.length;
  }

  if (consumed === 0 || consumed !== normalized.length) {
    throw new InvalidDurationError(input, 'expected a sequence like 1h30m, 45s or 500ms');
  }
  if (!Number.isFinite(total)) {
    throw new InvalidDurationError(input, 'value out of range');
  }
  return total;
}

export function formatDuration(ms: number): string {
  if (ms < 1_000) {
    return `${Math.round(ms)}ms`;
  }
  const parts: string[] = [];
  let remaining = Math.round(ms);
  const hours = Math.floor(remaining / 3_600_000);
  remaining -= hours * 3_600_000;
  const minutes = Math.floor(remaining / 60_000);
  remaining -= minutes * 60_000;
  const seconds = remaining / 1_000;

  if (hours > 0) {
    parts.push(`${hours}h`);
  }
  if (minutes > 0) {
    parts.push(`${minutes}m`);
  }
  if (seconds > 0 || parts.length === 0) {
    parts.push(`${Number.isInteger(seconds) ? seconds : seconds.toFixed(3).replace(/0+$/, '')}s`);
  }
  return parts.join('');
}
