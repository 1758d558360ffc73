import { z } from 'zod';

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  readonly code = 'ENV_CONFIG_INVALID';

  constructor(message: string) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

type EnvIssue = {
  path: (string | number)[];
  message: string;
};

function formatErrorMessage(context: string, issues: EnvIssue[]): string {
  const details = issues.map(({ path, message }) => {
    const location = path.length > 0 ? path.join('.') : '<root>';
    return `  • ${location}: ${message}`;
  });
  return [`[${context}] Invalid environment configuration`, ...details].join('\n');
}

/** Parses `env` (default `process.env`) with `schema`; every failing variable ends up in one error. */
export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'scopeledger';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    throw new EnvConfigError(
      formatErrorMessage(
        context,
        result.error.issues.map((issue) => ({ path: issue.path, message: issue.message }))
      )
    );
  }
  return result.data;
}

type CommonOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

function variableName(ctx: z.RefinementCtx, description: string | undefined): string {
  if (description) {
    return description;
  }
  const last = ctx.path.at(-1);
  return last === undefined || last === '' ? 'value' : String(last);
}

function isBlank(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/** Default, required-check, or undefined for an unset variable. */
function unsetValue<T>(ctx: z.RefinementCtx, name: string, options: CommonOptions<T> | undefined): T | undefined {
  if (options?.defaultValue !== undefined) {
    return options.defaultValue;
  }
  if (options?.required) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${name}` });
    return z.NEVER;
  }
  return undefined;
}

export type BooleanVarOptions = CommonOptions<boolean>;

export function booleanVar(options?: BooleanVarOptions) {
  return z
    .union([z.string(), z.boolean()])
    .nullable()
    .optional()
    .transform((value, ctx): boolean | undefined => {
      const name = variableName(ctx, options?.description);
      if (isBlank(value)) {
        return unsetValue(ctx, name, options);
      }
      if (typeof value === 'boolean') {
        return value;
      }

      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.includes(normalized)) {
        return true;
      }
      if (FALSE_VALUES.includes(normalized)) {
        return false;
      }
      const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid ${name}. Accepted boolean values: ${accepted}` });
      return z.NEVER;
    });
}

export type IntegerVarOptions = CommonOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options?: IntegerVarOptions) {
  return z
    .union([z.string(), z.number()])
    .nullable()
    .optional()
    .transform((value, ctx): number | undefined => {
      const name = variableName(ctx, options?.description);
      if (isBlank(value)) {
        return unsetValue(ctx, name, options);
      }

      const parsed = typeof value === 'number' ? Math.trunc(value) : Number(value.trim());
      if (!Number.isInteger(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected ${name} to be an integer` });
        return z.NEVER;
      }
      if (options?.min !== undefined && parsed < options.min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be >= ${options.min}` });
        return z.NEVER;
      }
      if (options?.max !== undefined && parsed > options.max) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be <= ${options.max}` });
        return z.NEVER;
      }
      return parsed;
    });
}

export type StringVarOptions = CommonOptions<string> & {
  lowercase?: boolean;
  pattern?: RegExp;
};

/** Trimmed; an empty value counts as unset. */
export function stringVar(options?: StringVarOptions) {
  return z
    .string()
    .optional()
    .transform((value, ctx): string | undefined => {
      const name = variableName(ctx, options?.description);
      const trimmed = value?.trim() ?? '';
      if (!trimmed) {
        const fallback = unsetValue(ctx, name, options);
        return options?.lowercase && fallback !== undefined ? fallback.toLowerCase() : fallback;
      }

      const normalized = options?.lowercase ? trimmed.toLowerCase() : trimmed;
      if (options?.pattern && !options.pattern.test(normalized)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} does not match expected pattern` });
        return z.NEVER;
      }
      return normalized;
    });
}
