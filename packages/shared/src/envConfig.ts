import { z } from 'zod';

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];
const DEFAULT_LIST_SEPARATOR = /[,\s]+/;

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

export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'switchyard';

  const result = schema.safeParse(envSource);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${location}: ${issue.message}`;
  });
  const details = issues.map((issue) => `  - ${issue}`).join('\n');
  throw new EnvConfigError(`[${context}] Invalid environment configuration\n${details}`, issues);
}

type CommonOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

type ParseOutcome<T> = { ok: true; value: T } | { ok: false; message: string };

function describeVariable(path: (string | number)[], description?: string): string {
  if (description) {
    return description;
  }
  const last = path.length > 0 ? path[path.length - 1] : undefined;
  return last === undefined ? 'value' : String(last);
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Builds a zod transformer for a single environment variable. Blank values
 * resolve to the default (or an issue when required); everything else goes
 * through `parse`, whose failure message is reported against the variable name.
 */
function envVariable<Input, T>(
  input: z.ZodType<Input>,
  options: CommonOptions<T> | undefined,
  parse: (value: Input, description: string) => ParseOutcome<T>
) {
  return input
    .nullable()
    .optional()
    .transform((value, ctx): T | undefined => {
      const description = describeVariable(ctx.path, options?.description);

      if (value === null || value === undefined || isBlank(value)) {
        if (options?.defaultValue !== undefined) {
          return options.defaultValue;
        }
        if (options?.required) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
          return z.NEVER;
        }
        return undefined;
      }

      const outcome = parse(value, description);
      if (!outcome.ok) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: outcome.message });
        return z.NEVER;
      }
      return outcome.value;
    });
}

function checkRange(value: number, description: string, min?: number, max?: number): ParseOutcome<number> {
  if (min !== undefined && value < min) {
    return { ok: false, message: `${description} must be >= ${min}` };
  }
  if (max !== undefined && value > max) {
    return { ok: false, message: `${description} must be <= ${max}` };
  }
  return { ok: true, value };
}

export type BooleanVarOptions = CommonOptions<boolean>;

export function booleanVar(options?: BooleanVarOptions) {
  return envVariable(z.union([z.string(), z.boolean()]), options, (value, description) => {
    if (typeof value === 'boolean') {
      return { ok: true, value };
    }
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.includes(normalized)) {
      return { ok: true, value: true };
    }
    if (FALSE_VALUES.includes(normalized)) {
      return { ok: true, value: false };
    }
    const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
    return { ok: false, message: `Invalid ${description}. Accepted boolean values: ${accepted}` };
  });
}

export type NumericVarOptions = CommonOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options?: NumericVarOptions) {
  return envVariable(z.union([z.string(), z.number()]), options, (value, description) => {
    const parsed = typeof value === 'number' ? Math.trunc(value) : Number(value.trim());
    if (!Number.isInteger(parsed)) {
      return { ok: false, message: `Expected ${description} to be an integer` };
    }
    return checkRange(parsed, description, options?.min, options?.max);
  });
}

export function numberVar(options?: NumericVarOptions) {
  return envVariable(z.union([z.string(), z.number()]), options, (value, description) => {
    const parsed = typeof value === 'number' ? value : Number.parseFloat(value);
    if (!Number.isFinite(parsed)) {
      return { ok: false, message: `Expected ${description} to be a number` };
    }
    return checkRange(parsed, description, options?.min, options?.max);
  });
}

export type StringVarOptions = CommonOptions<string> & {
  lowercase?: boolean;
  allowed?: readonly string[];
};

export function stringVar(options?: StringVarOptions) {
  return envVariable(z.string(), options, (value, description) => {
    const trimmed = value.trim();
    const normalized = options?.lowercase ? trimmed.toLowerCase() : trimmed;
    if (options?.allowed && !options.allowed.includes(normalized)) {
      return {
        ok: false,
        message: `${description} must be one of ${options.allowed.map((entry) => `'${entry}'`).join(', ')}`
      };
    }
    return { ok: true, value: normalized };
  });
}

export type StringListVarOptions = CommonOptions<string[]> & {
  separator?: RegExp | string;
  lowercase?: boolean;
};

export function stringListVar(options?: StringListVarOptions) {
  return envVariable(z.union([z.string(), z.array(z.string())]), options, (value) => {
    const entries = Array.isArray(value) ? value : value.split(options?.separator ?? DEFAULT_LIST_SEPARATOR);
    const cleaned = entries
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
      .map((entry) => (options?.lowercase ? entry.toLowerCase() : entry));
    return { ok: true, value: Array.from(new Set(cleaned)) };
  });
}
