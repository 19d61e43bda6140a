import { z } from 'zod';

export type Env = Record<string, string | undefined>;

/**
 * Integer setting that may arrive as a numeric string (env vars, `${VAR}`
 * expansion). Blank strings are refused rather than read as zero.
 */
export function integer(min: number) {
  return z.preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
    z
      .number({ invalid_type_error: 'expected a number' })
      .int(`expected an integer >= ${min}`)
      .min(min, `expected an integer >= ${min}`),
  );
}

const ENV_REF = /\$\{(\w+)\}/g;

/** Replace `${VAR}` references; unknown variables are left as written. */
export function expandEnvVars(value: string, env: Env = process.env): string {
  return value.replace(ENV_REF, (match, name: string) => env[name] ?? match);
}

function expandDeep(value: unknown, env: Env): unknown {
  if (typeof value === 'string') return expandEnvVars(value, env);
  if (Array.isArray(value)) return value.map((item) => expandDeep(item, env));
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, expandDeep(v, env)]));
  }
  return value;
}

/** Parse JSON config text and expand `${VAR}` in every string value. */
export function readJsonConfig(text: string, env: Env): unknown {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`Invalid config: ${err instanceof Error ? err.message : String(err)}`);
  }
  return expandDeep(raw, env);
}

/**
 * Validate `input` against `schema`.
 * @throws Error `Invalid <path>: <reason>` for the first issue found.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) return result.data;
  const issue = result.error.issues[0];
  const path = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
  throw new Error(`Invalid ${path}: ${issue?.message ?? 'unknown problem'}`);
}
