import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { integer, parseOrThrow, readJsonConfig, type Env } from './schema.js';

export { expandEnvVars, type Env } from './schema.js';

export interface PushSettings {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
}

/** Fully resolved server settings. */
export interface ServerSettings {
  defaultPageSize: number;
  maxPageSize: number;
  eventLogLimit: number;
  subscriberQueueLimit: number;
  /** Messages retained per task; undefined keeps everything. */
  maxHistoryLength?: number;
  push: PushSettings;
}

type Loose<T> = { [K in keyof T]?: T[K] | string };

/** Explicit options; numbers may arrive as strings from a config file. */
export interface ServerOptions extends Loose<Omit<ServerSettings, 'push'>> {
  push?: Loose<PushSettings>;
}

export const DEFAULT_SETTINGS: Readonly<ServerSettings> = Object.freeze({
  defaultPageSize: 50,
  maxPageSize: 100,
  eventLogLimit: 1000,
  subscriberQueueLimit: 256,
  push: Object.freeze({ maxAttempts: 5, baseDelayMs: 500, maxDelayMs: 30_000, timeoutMs: 10_000 }),
});

export const PushSettingsSchema = z
  .object(
    {
      maxAttempts: integer(1).default(DEFAULT_SETTINGS.push.maxAttempts),
      baseDelayMs: integer(0).default(DEFAULT_SETTINGS.push.baseDelayMs),
      maxDelayMs: integer(0).default(DEFAULT_SETTINGS.push.maxDelayMs),
      timeoutMs: integer(1).default(DEFAULT_SETTINGS.push.timeoutMs),
    },
    { invalid_type_error: 'expected an object' },
  )
  .superRefine((push, ctx) => {
    if (push.maxDelayMs < push.baseDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxDelayMs'],
        message: `${push.maxDelayMs} is below push.baseDelayMs ${push.baseDelayMs}`,
      });
    }
  });

export const ServerSettingsSchema = z
  .object(
    {
      defaultPageSize: integer(1).optional(),
      maxPageSize: integer(1).default(DEFAULT_SETTINGS.maxPageSize),
      eventLogLimit: integer(1).default(DEFAULT_SETTINGS.eventLogLimit),
      subscriberQueueLimit: integer(1).default(DEFAULT_SETTINGS.subscriberQueueLimit),
      maxHistoryLength: integer(1).optional(),
      push: PushSettingsSchema.default({}),
    },
    { invalid_type_error: 'expected a JSON object' },
  )
  .superRefine((settings, ctx) => {
    if (settings.defaultPageSize !== undefined && settings.defaultPageSize > settings.maxPageSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaultPageSize'],
        message: `${settings.defaultPageSize} exceeds maxPageSize ${settings.maxPageSize}`,
      });
    }
  })
  .transform(
    ({ defaultPageSize, maxHistoryLength, ...rest }): ServerSettings => ({
      ...rest,
      defaultPageSize: defaultPageSize ?? Math.min(DEFAULT_SETTINGS.defaultPageSize, rest.maxPageSize),
      ...(maxHistoryLength === undefined ? {} : { maxHistoryLength }),
    }),
  );

const ENV_KEYS = {
  defaultPageSize: 'A2A_DEFAULT_PAGE_SIZE',
  maxPageSize: 'A2A_MAX_PAGE_SIZE',
  eventLogLimit: 'A2A_EVENT_LOG_LIMIT',
  subscriberQueueLimit: 'A2A_SUBSCRIBER_QUEUE_LIMIT',
  maxHistoryLength: 'A2A_MAX_HISTORY_LENGTH',
} as const;

const PUSH_ENV_KEYS = {
  maxAttempts: 'A2A_PUSH_MAX_ATTEMPTS',
  baseDelayMs: 'A2A_PUSH_BASE_DELAY_MS',
  maxDelayMs: 'A2A_PUSH_MAX_DELAY_MS',
  timeoutMs: 'A2A_PUSH_TIMEOUT_MS',
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fillFromEnv(target: Record<string, unknown>, keys: Record<string, string>, env: Env): void {
  for (const [key, envKey] of Object.entries(keys)) {
    const value = env[envKey];
    if (target[key] === undefined && value !== undefined && value !== '') target[key] = value;
  }
}

/** Fill unset keys from `A2A_*` variables; anything not an object is left for the schema to reject. */
function withEnv(input: unknown, env: Env): unknown {
  if (!isRecord(input)) return input;
  const merged: Record<string, unknown> = { ...input };
  fillFromEnv(merged, ENV_KEYS, env);
  const push = merged.push ?? {};
  if (isRecord(push)) {
    const pushMerged: Record<string, unknown> = { ...push };
    fillFromEnv(pushMerged, PUSH_ENV_KEYS, env);
    merged.push = pushMerged;
  }
  return merged;
}

/**
 * Resolve settings from explicit options, then `A2A_*` environment variables,
 * then defaults.
 * @throws Error naming the offending key.
 */
export function resolveServerConfig(options: ServerOptions = {}, env: Env = process.env): ServerSettings {
  return parseOrThrow(ServerSettingsSchema, withEnv(options, env));
}

/** Parse a JSON config document, expanding `${VAR}` in string values. */
export function parseServerConfig(text: string, env: Env = process.env): ServerSettings {
  return parseOrThrow(ServerSettingsSchema, withEnv(readJsonConfig(text, env), env));
}

export async function loadServerConfig(path: string, env: Env = process.env): Promise<ServerSettings> {
  return parseServerConfig(await readFile(path, 'utf-8'), env);
}
