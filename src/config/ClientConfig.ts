import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { A2AClient } from '../client/A2AClient.js';
import { TaskObserver, type TaskObserverConfig } from '../client/TaskObserver.js';
import type { Logger } from '../types/plugin.js';
import { integer, parseOrThrow, readJsonConfig, type Env } from './schema.js';

export const ClientConfigSchema = z.object(
  {
    url: z.string({ required_error: 'expected a URL' }).url('expected a URL'),
    bearerToken: z.string().min(1, 'expected a non-empty token').optional(),
    timeoutMs: integer(1).default(300_000),
    pollIntervalMs: integer(1).default(1000),
    maxRetries: integer(1).default(3),
    retryDelayMs: integer(0).default(1000),
  },
  { invalid_type_error: 'expected an object' },
);

/** A remote agent this process delegates to, as read from config. */
export type NamedClientConfig = z.output<typeof ClientConfigSchema>;

const ClientConfigFileSchema = z.object(
  {
    a2a: z
      .object(
        { clients: z.record(ClientConfigSchema).default({}) },
        { invalid_type_error: 'expected an object' },
      )
      .default({}),
  },
  { invalid_type_error: 'expected a JSON object' },
);

/** Named remote agents, with factories for a client or an observer of each. */
export class ClientConfigRegistry {
  private readonly configs: ReadonlyMap<string, NamedClientConfig>;

  constructor(configs: Record<string, NamedClientConfig> = {}) {
    this.configs = new Map(Object.entries(configs));
  }

  /** @throws Error listing the configured names when `name` is unknown. */
  get(name: string): NamedClientConfig {
    const config = this.configs.get(name);
    if (!config) {
      throw new Error(`A2A client config '${name}' not found. Available: [${this.list().join(', ')}]`);
    }
    return { ...config };
  }

  list(): string[] {
    return [...this.configs.keys()];
  }

  client(name: string, logger?: Logger): A2AClient {
    const { url, bearerToken } = this.get(name);
    return new A2AClient({ url, bearerToken, logger });
  }

  observer(name: string, overrides: Pick<TaskObserverConfig, 'call' | 'sleep' | 'now' | 'logger'> = {}): TaskObserver {
    const { timeoutMs, pollIntervalMs, maxRetries, retryDelayMs } = this.get(name);
    return new TaskObserver(this.client(name, overrides.logger), {
      ...overrides,
      timeoutMs,
      pollIntervalMs,
      maxRetries,
      retryDelayMs,
    });
  }
}

/** Read `a2a.clients` from a JSON document, expanding `${VAR}` in string values. */
export function parseClientConfigs(text: string, env: Env = process.env): ClientConfigRegistry {
  return new ClientConfigRegistry(parseOrThrow(ClientConfigFileSchema, readJsonConfig(text, env)).a2a.clients);
}

export async function loadClientConfigs(path: string, env: Env = process.env): Promise<ClientConfigRegistry> {
  return parseClientConfigs(await readFile(path, 'utf-8'), env);
}
