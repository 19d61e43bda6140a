import type { AgentCard } from '../types/agent-card.js';
import type { A2AOperations, CallContext } from '../types/handler.js';
import type { Message } from '../types/message.js';
import type { Logger } from '../types/plugin.js';
import type { Task, TaskState } from '../types/task.js';
import { A2AError } from '../errors/A2AError.js';
import { MessageBuilder } from '../messaging/MessageBuilder.js';

export type ObserveStatus =
  | 'completed'
  | 'failed'
  | 'input-required'
  | 'auth-required'
  | 'canceled'
  | 'timeout'
  | 'message';

export interface ObserveResult {
  status: ObserveStatus;
  /** Last known task; absent for direct replies and timeouts. */
  task?: Task;
  /** The agent's reply when it answered without creating a task. */
  message?: Message;
}

export interface TaskObserverConfig {
  /** Give up (and cancel the task) after this long (default: 300000). */
  timeoutMs?: number;
  /** Delay between getTask polls (default: 1000). */
  pollIntervalMs?: number;
  /** Attempts per call for transient failures (default: 3). */
  maxRetries?: number;
  /** First retry delay; doubles each retry (default: 1000). */
  retryDelayMs?: number;
  call?: CallContext;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
}

export interface ObserveOptions {
  /** Continue an existing task. */
  taskId?: string;
  contextId?: string;
  /** Polled between requests; returning true cancels the task. */
  isCancelled?: () => boolean;
}

const OUTCOMES: Partial<Record<TaskState, ObserveStatus>> = {
  completed: 'completed',
  failed: 'failed',
  rejected: 'failed',
  canceled: 'canceled',
  'input-required': 'input-required',
  'auth-required': 'auth-required',
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Protocol errors are answers; anything else (network, timeout) may be retried. */
function isTransient(err: unknown): boolean {
  return !(err instanceof A2AError);
}

/**
 * Send a message and poll the task until the agent finishes its turn, with
 * retry on transient failures and a hard timeout.
 */
export class TaskObserver {
  private readonly config: Required<Omit<TaskObserverConfig, 'call' | 'logger'>> &
    Pick<TaskObserverConfig, 'call' | 'logger'>;

  constructor(
    private readonly operations: A2AOperations,
    config?: TaskObserverConfig,
  ) {
    this.config = {
      timeoutMs: config?.timeoutMs ?? 300_000,
      pollIntervalMs: config?.pollIntervalMs ?? 1000,
      maxRetries: config?.maxRetries ?? 3,
      retryDelayMs: config?.retryDelayMs ?? 1000,
      sleep: config?.sleep ?? defaultSleep,
      now: config?.now ?? (() => Date.now()),
      call: config?.call,
      logger: config?.logger,
    };
  }

  async sendAndObserve(input: string | Message, options: ObserveOptions = {}): Promise<ObserveResult> {
    const start = this.config.now();
    const message = this.buildMessage(input, options);

    const sent = await this.withRetry(() => this.operations.sendMessage({ message }, this.config.call));
    if (sent.message !== undefined) {
      return { status: 'message', message: sent.message };
    }

    let task = sent.task;
    const taskId = task.id;
    this.config.logger?.('info', 'Task created', { taskId });

    while (true) {
      const outcome = OUTCOMES[task.status.state];
      if (outcome !== undefined) {
        this.config.logger?.(outcome === 'failed' ? 'error' : 'info', `Task ${outcome}`, { taskId });
        return { status: outcome, task };
      }

      if (this.config.now() - start > this.config.timeoutMs) {
        this.config.logger?.('error', 'Task timed out', { taskId });
        await this.cancelQuietly(taskId);
        return { status: 'timeout' };
      }

      if (options.isCancelled?.()) {
        this.config.logger?.('info', 'Task cancelled by caller', { taskId });
        const canceled = await this.cancelQuietly(taskId);
        return canceled ? { status: 'canceled', task: canceled } : { status: 'canceled' };
      }

      await this.config.sleep(this.config.pollIntervalMs);
      task = await this.withRetry(() => this.operations.getTask({ id: taskId }, this.config.call));
      this.config.logger?.('debug', 'Task polled', { taskId, state: task.status.state });
    }
  }

  private buildMessage(input: string | Message, options: ObserveOptions): Message {
    const builder = new MessageBuilder().role('user');
    if (typeof input === 'string') {
      builder.text(input);
    } else {
      builder.messageId(input.messageId).role(input.role);
      for (const part of input.parts) builder.part(part);
      if (input.metadata) builder.metadata(input.metadata);
      for (const uri of input.extensions ?? []) builder.extension(uri);
      builder.references(...(input.referenceTaskIds ?? []));
    }
    const taskId = options.taskId ?? (typeof input === 'string' ? undefined : input.taskId);
    const contextId = options.contextId ?? (typeof input === 'string' ? undefined : input.contextId);
    if (taskId) builder.taskId(taskId);
    if (contextId) builder.contextId(contextId);
    return builder.build();
  }

  private async withRetry<T>(fn: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (err) {
        if (!isTransient(err) || attempt >= this.config.maxRetries - 1) throw err;
        const delay = this.config.retryDelayMs * 2 ** attempt;
        this.config.logger?.('warn', `Retry ${attempt + 1}`, { error: err, delay });
        await this.config.sleep(delay);
      }
    }
  }

  private async cancelQuietly(taskId: string): Promise<Task | undefined> {
    try {
      return await this.operations.cancelTask({ id: taskId }, this.config.call);
    } catch (err) {
      this.config.logger?.('warn', 'Failed to cancel task', { taskId, error: err });
      return undefined;
    }
  }
}

/** Text parts of every artifact, joined by newlines. */
export function extractText(task: Task): string | undefined {
  const texts: string[] = [];
  for (const artifact of task.artifacts ?? []) {
    for (const part of artifact.parts) {
      if ('text' in part) texts.push(part.text);
    }
  }
  return texts.length > 0 ? texts.join('\n') : undefined;
}

/** The agent's question on an interrupted task. */
export function extractQuestion(task: Task): string {
  for (const part of task.status.message?.parts ?? []) {
    if ('text' in part) return part.text;
  }
  return 'Agent requires input';
}

/** A short markdown summary of an agent for a coordinator's prompt. */
export function cardToPrompt(card: AgentCard): string {
  const lines = [`## ${card.name}`, card.description, '', 'Skills:'];
  for (const skill of card.skills) {
    lines.push(`- ${skill.name}: ${skill.description}`);
  }
  return lines.join('\n');
}
