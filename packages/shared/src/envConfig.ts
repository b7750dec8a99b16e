import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export type EnvSource = Record<string, string | undefined>;

export type EnvVar<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

type WithDefault<O, T> = O & { defaultValue: T };

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

function formatErrorMessage(context: string, issues: z.ZodIssue[]): string {
  const details = issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `  - ${location}: ${issue.message}`;
  });
  return [`[${context}] Invalid environment configuration`, ...details].join('\n');
}

export function loadEnvConfig<T>(schema: EnvVar<T>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const result = schema.safeParse(envSource);
  if (!result.success) {
    throw new EnvConfigError(formatErrorMessage(options?.context ?? 'nyc311', result.error.issues));
  }
  return result.data;
}

type CommonOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

function describeVar(ctx: z.RefinementCtx, description?: string): string {
  if (description) {
    return description;
  }
  const name = ctx.path[ctx.path.length - 1];
  return name === undefined ? 'value' : String(name);
}

function isBlank(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Resolves a blank value to its default, reports a missing required value,
 * or returns `undefined`. Non-blank values are left to the caller.
 */
function resolveBlank<T>(
  ctx: z.RefinementCtx,
  options: CommonOptions<T> | undefined
): T | undefined | typeof z.NEVER {
  if (options?.defaultValue !== undefined) {
    return options.defaultValue;
  }
  if (options?.required) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${describeVar(ctx, options.description)}` });
    return z.NEVER;
  }
  return undefined;
}

type RangeOptions = {
  min?: number;
  max?: number;
};

function checkRange(ctx: z.RefinementCtx, value: number, description: string, range: RangeOptions): boolean {
  if (range.min !== undefined && value < range.min) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be >= ${range.min}` });
    return false;
  }
  if (range.max !== undefined && value > range.max) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be <= ${range.max}` });
    return false;
  }
  return true;
}

export type BooleanVarOptions = CommonOptions<boolean>;

export function booleanVar(options: WithDefault<BooleanVarOptions, boolean>): EnvVar<boolean>;
export function booleanVar(options?: BooleanVarOptions): EnvVar<boolean | undefined>;
export function booleanVar(options?: BooleanVarOptions): EnvVar<boolean | undefined> {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveBlank(ctx, options);
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
      message: `Invalid ${describeVar(ctx, options?.description)}. Accepted boolean values: ${accepted}`
    });
    return z.NEVER;
  });
}

export type NumberVarOptions = CommonOptions<number> & RangeOptions;

function numericVar(
  parse: (raw: string) => number,
  kind: string,
  options?: NumberVarOptions
): EnvVar<number | undefined> {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveBlank(ctx, options);
    }
    const description = describeVar(ctx, options?.description);
    const parsed = typeof value === 'number' ? value : parse(value.trim());
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected ${description} to be ${kind}` });
      return z.NEVER;
    }
    if (!checkRange(ctx, parsed, description, options ?? {})) {
      return z.NEVER;
    }
    return parsed;
  });
}

export function integerVar(options: WithDefault<NumberVarOptions, number>): EnvVar<number>;
export function integerVar(options?: NumberVarOptions): EnvVar<number | undefined>;
export function integerVar(options?: NumberVarOptions): EnvVar<number | undefined> {
  return numericVar(
    (raw) => (/^[-+]?\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN),
    'an integer',
    options
  );
}

export function numberVar(options: WithDefault<NumberVarOptions, number>): EnvVar<number>;
export function numberVar(options?: NumberVarOptions): EnvVar<number | undefined>;
export function numberVar(options?: NumberVarOptions): EnvVar<number | undefined> {
  return numericVar((raw) => Number(raw), 'a number', options);
}

export type StringVarOptions = CommonOptions<string> & {
  pattern?: RegExp;
};

export function stringVar(options: WithDefault<StringVarOptions, string>): EnvVar<string>;
export function stringVar(options?: StringVarOptions): EnvVar<string | undefined>;
export function stringVar(options?: StringVarOptions): EnvVar<string | undefined> {
  return z.string().nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveBlank(ctx, options);
    }
    const normalized = value.trim();
    if (options?.pattern && !options.pattern.test(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${describeVar(ctx, options.description)} does not match expected pattern`
      });
      return z.NEVER;
    }
    return normalized;
  });
}

/**
 * Calendar date in `YYYY-MM-DD` form. The value is returned as written;
 * impossible dates such as `2024-02-30` are rejected.
 */
export function isoDateVar(options?: CommonOptions<string>): EnvVar<string | undefined> {
  return z.string().nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveBlank(ctx, options);
    }
    const normalized = value.trim();
    if (!isIsoDate(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid ${describeVar(ctx, options?.description)} (expected YYYY-MM-DD): ${normalized}`
      });
      return z.NEVER;
    }
    return normalized;
  });
}

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) {
    return false;
  }
  const [year, month, day] = value.split('-').map((part) => Number.parseInt(part, 10));
  const probe = new Date(Date.UTC(year, month - 1, day));
  return probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
}
