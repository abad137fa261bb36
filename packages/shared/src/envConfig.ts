import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'EnvConfigError';
    this.issues = issues;
  }
}

function formatIssue(path: (string | number)[], message: string): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

/**
 * Parses an environment bag with a zod object schema built from the `*Var`
 * helpers below. Every invalid variable is reported at once.
 */
export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'marketlake';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => formatIssue(issue.path, issue.message));
    const details = issues.map((issue) => `  - ${issue}`).join('\n');
    throw new EnvConfigError(`[${context}] Invalid environment configuration\n${details}`, issues);
  }

  return result.data;
}

function describe(path: (string | number)[], description?: string): string {
  if (description) {
    return description;
  }
  const name = path.length > 0 ? path[path.length - 1] : undefined;
  if (typeof name === 'string' && name.length > 0) {
    return name;
  }
  if (typeof name === 'number') {
    return name.toString();
  }
  return 'value';
}

function isBlank(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

type CommonVarOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

export type BooleanVarOptions = CommonVarOptions<boolean>;

export function booleanVar(options: BooleanVarOptions & { defaultValue: boolean }): z.ZodType<boolean, z.ZodTypeDef, unknown>;
export function booleanVar(options?: BooleanVarOptions): z.ZodType<boolean | undefined, z.ZodTypeDef, unknown>;
export function booleanVar(options?: BooleanVarOptions): z.ZodType<boolean | undefined, z.ZodTypeDef, unknown> {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx) => {
    const description = describe(ctx.path, options?.description);

    if (isBlank(value)) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
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
      message: `Invalid ${description}. Accepted boolean values: ${accepted}`
    });
    return z.NEVER;
  });
}

export type NumericVarOptions = CommonVarOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options: NumericVarOptions & { defaultValue: number }): z.ZodType<number, z.ZodTypeDef, unknown>;
export function integerVar(options?: NumericVarOptions): z.ZodType<number | undefined, z.ZodTypeDef, unknown>;
export function integerVar(options?: NumericVarOptions): z.ZodType<number | undefined, z.ZodTypeDef, unknown> {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    const description = describe(ctx.path, options?.description);

    if (isBlank(value)) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    let parsed: number;
    if (typeof value === 'number') {
      parsed = Math.trunc(value);
    } else {
      const trimmed = value.trim();
      parsed = /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
    }

    if (!Number.isFinite(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${description} to be an integer`
      });
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

export type StringVarOptions = CommonVarOptions<string> & {
  pattern?: RegExp;
  lowercase?: boolean;
};

export function stringVar(options: StringVarOptions & { defaultValue: string }): z.ZodType<string, z.ZodTypeDef, unknown>;
export function stringVar(options?: StringVarOptions): z.ZodType<string | undefined, z.ZodTypeDef, unknown>;
export function stringVar(options?: StringVarOptions): z.ZodType<string | undefined, z.ZodTypeDef, unknown> {
  return z.string().nullable().optional().transform((value, ctx) => {
    const description = describe(ctx.path, options?.description);

    if (isBlank(value)) {
      if (options?.defaultValue !== undefined) {
        return options.lowercase ? options.defaultValue.toLowerCase() : options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    const trimmed = value.trim();
    const normalized = options?.lowercase ? trimmed.toLowerCase() : trimmed;

    if (options?.pattern && !options.pattern.test(normalized)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} does not match expected pattern` });
      return z.NEVER;
    }

    return normalized;
  });
}

/**
 * Absolute http(s) URL with any trailing slash removed, so callers can append
 * path segments with a plain template string.
 */
export function urlVar(options: CommonVarOptions<string> & { defaultValue: string }): z.ZodType<string, z.ZodTypeDef, unknown>;
export function urlVar(options?: CommonVarOptions<string>): z.ZodType<string | undefined, z.ZodTypeDef, unknown>;
export function urlVar(options?: CommonVarOptions<string>): z.ZodType<string | undefined, z.ZodTypeDef, unknown> {
  return z.string().nullable().optional().transform((value, ctx) => {
    const description = describe(ctx.path, options?.description);
    const raw = isBlank(value) ? options?.defaultValue : value.trim();

    if (raw === undefined) {
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    let url: URL;
    try {
      url = new URL(raw);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be an absolute URL` });
      return z.NEVER;
    }

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must use http or https` });
      return z.NEVER;
    }

    url.hash = '';
    url.search = '';
    return url.toString().replace(/\/+$/, '');
  });
}
