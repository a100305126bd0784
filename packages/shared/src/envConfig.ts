import { z } from 'zod';
import { InvalidDurationError, parseDuration } from './duration';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'EnvConfigError';
    this.issues = issues;
  }
}

type EnvIssueTarget = {
  path: (string | number)[];
  message: string;
};

function formatIssue({ path, message }: EnvIssueTarget): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'tracebench';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => formatIssue({ path: issue.path, message: issue.message }));
    const details = issues.map((issue) => `  - ${issue}`).join('\n');
    throw new EnvConfigError(`[${context}] Invalid environment configuration\n${details}`, issues);
  }

  return result.data;
}

type BaseVarOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

function describe(ctx: z.RefinementCtx, description?: string): string {
  if (description) {
    return description;
  }
  const name = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
  if (typeof name === 'string' && name.length > 0) {
    return name;
  }
  return 'value';
}

function isBlank(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Shared handling for unset variables: the default wins, then a required
 * check, otherwise the variable stays undefined.
 */
function resolveMissing<T>(ctx: z.RefinementCtx, options: BaseVarOptions<T> | undefined): T | undefined {
  if (options?.defaultValue !== undefined) {
    return options.defaultValue;
  }
  if (options?.required) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${describe(ctx, options.description)}` });
    return z.NEVER;
  }
  return undefined;
}

export type BooleanVarOptions = BaseVarOptions<boolean>;

export function booleanVar(options?: BooleanVarOptions) {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveMissing(ctx, options);
    }
    if (typeof value === 'boolean') {
      return value;
    }

    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }

    const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${describe(ctx, options?.description)}. Accepted boolean values: ${accepted}`
    });
    return z.NEVER;
  });
}

export type IntegerVarOptions = BaseVarOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options?: IntegerVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveMissing(ctx, options);
    }

    const description = describe(ctx, options?.description);
    const parsed = typeof value === 'number' ? Math.trunc(value) : Number.parseInt(value, 10);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected ${description} to be an integer` });
      return z.NEVER;
    }
    if (options?.min !== undefined && parsed < options.min) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be >= ${options.min}` });
      return z.NEVER;
    }
    if (options?.max !== undefined && parsed > options.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be <= ${options.max}` });
      return z.NEVER;
    }
    return parsed;
  });
}

export type StringVarOptions = BaseVarOptions<string> & {
  lowercase?: boolean;
  allowed?: readonly string[];
};

export function stringVar(options?: StringVarOptions) {
  return z.string().nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      const fallback = resolveMissing(ctx, options);
      return options?.lowercase && fallback ? fallback.toLowerCase() : fallback;
    }

    const trimmed = value.trim();
    const normalized = options?.lowercase ? trimmed.toLowerCase() : trimmed;
    if (options?.allowed && !options.allowed.includes(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${describe(ctx, options.description)} must be one of: ${options.allowed.join(', ')}`
      });
      return z.NEVER;
    }
    return normalized;
  });
}

export type DurationVarOptions = BaseVarOptions<number>;

/** Accepts a duration string (`30s`, `5m`) or a number of milliseconds. */
export function durationVar(options?: DurationVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveMissing(ctx, options);
    }
    if (typeof value === 'number') {
      if (!Number.isFinite(value) || value < 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${describe(ctx, options?.description)} must be a non-negative number of milliseconds`
        });
        return z.NEVER;
      }
      return value;
    }
    try {
      return parseDuration(value);
    } catch (error) {
      const reason = error instanceof InvalidDurationError ? error.message : String(error);
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${describe(ctx, options?.description)}: ${reason}` });
      return z.NEVER;
    }
  });
}

export type HostPortOptions = {
  defaultHost?: string;
  defaultPort?: number;
};

export const hostVar = (options?: HostPortOptions) =>
  stringVar({ defaultValue: options?.defaultHost ?? '127.0.0.1', description: 'host' });

export const portVar = (options?: HostPortOptions) =>
  integerVar({ defaultValue: options?.defaultPort ?? 3000, min: 1, max: 65535, description: 'port' });
