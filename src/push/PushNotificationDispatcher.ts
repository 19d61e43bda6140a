import type { StreamResponse } from '../types/events.js';
import type { Logger, PushConfigStore, StoredPushNotificationConfig } from '../types/plugin.js';
import { checkResolvedUrl, checkWebhookUrl, dnsResolver, type HostResolver } from './UrlGuard.js';

export const NOTIFICATION_TOKEN_HEADER = 'X-A2A-Notification-Token';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface PushDispatcherConfig {
  /** Attempts per event per webhook, first try included (default: 5). */
  maxAttempts?: number;
  /** Delay before the second attempt; doubles each retry (default: 500). */
  baseDelayMs?: number;
  /** Upper bound on a single retry delay (default: 30000). */
  maxDelayMs?: number;
  /** Timeout for one HTTP attempt (default: 10000). */
  timeoutMs?: number;
  /** Skip the private-address denylist. Only for tests against local receivers. */
  allowPrivateNetworks?: boolean;
  resolveHost?: HostResolver;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/** Delivery bookkeeping for one (task, webhook) pair. */
export interface DeliveryState {
  taskId: string;
  configId: string;
  delivered: number;
  failed: number;
  /** Attempts spent on the event currently being delivered. */
  attempts: number;
  lastError?: string;
  lastAttemptAt?: string;
}

interface PairWorker {
  state: DeliveryState;
  queue: StreamResponse[];
  running: Promise<void> | null;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Delivers task events to registered webhooks, at least once, in order per
 * webhook. Each (task, webhook) pair has its own queue and retry state, so a
 * failing receiver only delays itself.
 */
export class PushNotificationDispatcher {
  private readonly config: Required<Omit<PushDispatcherConfig, 'logger'>> & { logger?: Logger };
  private readonly store: PushConfigStore;
  private readonly workers = new Map<string, PairWorker>();
  private readonly fanOuts = new Map<string, Promise<void>>();

  constructor(store: PushConfigStore, config?: PushDispatcherConfig) {
    this.store = store;
    this.config = {
      maxAttempts: config?.maxAttempts ?? 5,
      baseDelayMs: config?.baseDelayMs ?? 500,
      maxDelayMs: config?.maxDelayMs ?? 30_000,
      timeoutMs: config?.timeoutMs ?? 10_000,
      allowPrivateNetworks: config?.allowPrivateNetworks ?? false,
      resolveHost: config?.resolveHost ?? dnsResolver,
      fetch: config?.fetch ?? ((input, init) => fetch(input, init)),
      sleep: config?.sleep ?? defaultSleep,
      logger: config?.logger,
    };
  }

  /**
   * Validate a webhook URL at registration time.
   * @returns a reason when the URL must be refused.
   */
  rejectUrl(url: string): string | undefined {
    if (this.config.allowPrivateNetworks) {
      try {
        new URL(url);
        return undefined;
      } catch {
        return 'URL is not valid';
      }
    }
    const check = checkWebhookUrl(url);
    return check.ok ? undefined : check.reason;
  }

  /**
   * Queue an event for every webhook registered on the task. Returns at once;
   * events of one task are fanned out in the order they were enqueued.
   */
  enqueue(taskId: string, event: StreamResponse): void {
    const previous = this.fanOuts.get(taskId) ?? Promise.resolve();
    const next = previous
      .then(() => this.fanOut(taskId, event))
      .catch((err: unknown) => {
        this.config.logger?.('error', 'Push fan-out failed', { taskId, error: err });
      });
    this.fanOuts.set(taskId, next);
    void next.finally(() => {
      if (this.fanOuts.get(taskId) === next) this.fanOuts.delete(taskId);
    });
  }

  /** Drop queued deliveries for one webhook, or for all of a task's webhooks. */
  forget(taskId: string, configId?: string): void {
    for (const [key, worker] of this.workers) {
      if (worker.state.taskId !== taskId) continue;
      if (configId !== undefined && worker.state.configId !== configId) continue;
      worker.queue.length = 0;
      if (!worker.running) this.workers.delete(key);
    }
  }

  deliveryState(taskId: string, configId: string): DeliveryState | undefined {
    const worker = this.workers.get(pairKey(taskId, configId));
    return worker ? { ...worker.state } : undefined;
  }

  /** Wait until every queued delivery has succeeded or been given up on. */
  async drain(): Promise<void> {
    while (this.fanOuts.size > 0 || [...this.workers.values()].some((w) => w.running)) {
      await Promise.all([
        ...this.fanOuts.values(),
        ...[...this.workers.values()].flatMap((w) => (w.running ? [w.running] : [])),
      ]);
    }
  }

  private async fanOut(taskId: string, event: StreamResponse): Promise<void> {
    const configs = await this.store.list(taskId);
    for (const config of configs) {
      const key = pairKey(taskId, config.id);
      let worker = this.workers.get(key);
      if (!worker) {
        worker = {
          state: { taskId, configId: config.id, delivered: 0, failed: 0, attempts: 0 },
          queue: [],
          running: null,
        };
        this.workers.set(key, worker);
      }
      worker.queue.push(event);
      if (!worker.running) {
        const active = worker;
        active.running = this.runWorker(active)
          .catch((err: unknown) => {
            this.config.logger?.('error', 'Push worker failed', { taskId, configId: config.id, error: err });
          })
          .finally(() => {
            active.running = null;
          });
      }
    }
  }

  private async runWorker(worker: PairWorker): Promise<void> {
    const { taskId, configId } = worker.state;
    while (true) {
      const event = worker.queue.shift();
      if (event === undefined) return;

      // Re-read: the config may have been deleted or replaced since enqueueing.
      const config = await this.store.get(taskId, configId);
      if (!config) {
        worker.queue.length = 0;
        this.workers.delete(pairKey(taskId, configId));
        return;
      }
      await this.deliver(worker, config, event);
    }
  }

  private async deliver(
    worker: PairWorker,
    config: StoredPushNotificationConfig,
    event: StreamResponse,
  ): Promise<void> {
    const { state } = worker;
    const { logger } = this.config;
    state.attempts = 0;

    if (!this.config.allowPrivateNetworks) {
      const check = await checkResolvedUrl(config.url, this.config.resolveHost);
      if (!check.ok) {
        state.failed++;
        state.lastError = check.reason;
        logger?.('warn', 'Push destination refused', {
          taskId: state.taskId,
          configId: state.configId,
          reason: check.reason,
        });
        return;
      }
    }

    const body = JSON.stringify(event);
    const headers = buildHeaders(config);

    while (state.attempts < this.config.maxAttempts) {
      state.attempts++;
      state.lastAttemptAt = new Date().toISOString();
      const error = await this.attempt(config.url, headers, body);
      if (error === undefined) {
        state.delivered++;
        state.lastError = undefined;
        return;
      }

      state.lastError = error;
      if (state.attempts >= this.config.maxAttempts) break;

      const delay = Math.min(
        this.config.baseDelayMs * 2 ** (state.attempts - 1),
        this.config.maxDelayMs,
      );
      logger?.('debug', `Push retry ${state.attempts}/${this.config.maxAttempts} in ${delay}ms`, {
        taskId: state.taskId,
        configId: state.configId,
        error,
      });
      await this.config.sleep(delay);
    }

    state.failed++;
    logger?.('warn', 'Push delivery gave up', {
      taskId: state.taskId,
      configId: state.configId,
      attempts: state.attempts,
      error: state.lastError,
    });
  }

  /** One HTTP attempt. Returns an error description, or undefined on success. */
  private async attempt(
    url: string,
    headers: Record<string, string>,
    body: string,
  ): Promise<string | undefined> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);
    try {
      const response = await this.config.fetch(url, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
        redirect: 'error',
      });
      if (!response.ok) return `HTTP ${response.status}`;
      return undefined;
    } catch (err) {
      return err instanceof Error ? err.message : String(err);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function pairKey(taskId: string, configId: string): string {
  return `${taskId}\u0000${configId}`;
}

function buildHeaders(config: StoredPushNotificationConfig): Record<string, string> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (config.token !== undefined) {
    headers[NOTIFICATION_TOKEN_HEADER] = config.token;
  }
  const auth = config.authentication;
  if (auth?.credentials !== undefined && auth.schemes.some((s) => s.toLowerCase() === 'bearer')) {
    headers.Authorization = `Bearer ${auth.credentials}`;
  }
  return headers;
}
