import type { StreamResponse } from '../types/events.js';
import type { Logger } from '../types/plugin.js';
import type { Task } from '../types/task.js';
import { isInterrupted, isTerminal } from '../core/TaskStateMachine.js';
import { SubscriberOverflowError, SubscriberQueue } from './SubscriberQueue.js';

export interface LoggedEvent {
  /** Position in the task's event order, starting at 1. */
  seq: number;
  event: StreamResponse;
}

/** Receives every published event, in order, synchronously. Must not block. */
export type EventListener = (taskId: string, event: StreamResponse) => void;

export interface EventBroadcasterConfig {
  /** Events kept per task; the oldest are dropped (default: 1000). */
  eventLogLimit?: number;
  /** Events a subscriber may fall behind before it is dropped (default: 256). */
  subscriberQueueLimit?: number;
  logger?: Logger;
}

interface Channel {
  seq: number;
  log: LoggedEvent[];
  subscribers: Set<SubscriberQueue>;
}

export interface SubscribeOptions {
  closeOnInterrupt?: boolean;
  /**
   * Resume after this log position instead of starting from the snapshot.
   * Falls back to the snapshot when the log no longer covers the gap.
   */
  afterSeq?: number;
}

/**
 * Single broadcast point per task. `publish` and `subscribe` are synchronous and
 * must be called while holding the task's lock: that is what makes "snapshot
 * first, then every later event" hold for each subscriber.
 *
 * A task's channel, log included, is dropped once its terminal event is out.
 */
export class EventBroadcaster {
  private readonly config: Required<Omit<EventBroadcasterConfig, 'logger'>> & { logger?: Logger };
  private readonly channels = new Map<string, Channel>();
  private readonly listeners: EventListener[] = [];

  constructor(config?: EventBroadcasterConfig) {
    this.config = {
      eventLogLimit: config?.eventLogLimit ?? 1000,
      subscriberQueueLimit: config?.subscriberQueueLimit ?? 256,
      logger: config?.logger,
    };
  }

  /** Register a listener for every task (e.g. the push dispatcher). */
  addListener(listener: EventListener): void {
    this.listeners.push(listener);
  }

  /** Append an event to the task's log and fan it out. Returns its sequence number. */
  publish(taskId: string, event: StreamResponse): number {
    const channel = this.channel(taskId);
    const seq = ++channel.seq;
    channel.log.push({ seq, event });
    if (channel.log.length > this.config.eventLogLimit) {
      channel.log.splice(0, channel.log.length - this.config.eventLogLimit);
    }

    const state = event.statusUpdate?.status.state;
    const terminal = state !== undefined && isTerminal(state);
    const interrupted = state !== undefined && isInterrupted(state);

    for (const subscriber of [...channel.subscribers]) {
      if (!subscriber.push(event, seq)) {
        this.config.logger?.('warn', 'Dropping slow subscriber', {
          taskId,
          limit: this.config.subscriberQueueLimit,
        });
        channel.subscribers.delete(subscriber);
        subscriber.fail(new SubscriberOverflowError(taskId, this.config.subscriberQueueLimit));
        continue;
      }
      if (terminal || (interrupted && subscriber.closeOnInterrupt)) {
        channel.subscribers.delete(subscriber);
        subscriber.end();
      }
    }

    for (const listener of this.listeners) {
      try {
        listener(taskId, event);
      } catch (err) {
        this.config.logger?.('error', 'Event listener failed', { taskId, error: err });
      }
    }

    if (terminal) this.channels.delete(taskId);
    return seq;
  }

  /** Open a stream whose first event is `snapshot`, or the events missed since `afterSeq`. */
  subscribe(snapshot: Task, options: SubscribeOptions = {}): SubscriberQueue {
    const channel = this.channel(snapshot.id);
    const queue = new SubscriberQueue(
      snapshot.id,
      this.config.subscriberQueueLimit,
      (detached) => {
        channel.subscribers.delete(detached);
      },
      options.closeOnInterrupt ?? false,
    );
    const missed = options.afterSeq === undefined ? undefined : this.missedSince(channel, options.afterSeq);
    if (missed) {
      for (const { seq, event } of missed) queue.push(event, seq);
    } else {
      // The snapshot already reflects every event published so far.
      queue.push({ task: snapshot }, channel.seq);
    }
    channel.subscribers.add(queue);
    return queue;
  }

  /** The retained event log for a task, oldest first. */
  events(taskId: string): LoggedEvent[] {
    return [...(this.channels.get(taskId)?.log ?? [])];
  }

  subscriberCount(taskId: string): number {
    return this.channels.get(taskId)?.subscribers.size ?? 0;
  }

  /** End every subscriber of a task and forget its log. */
  purge(taskId: string): void {
    const channel = this.channels.get(taskId);
    if (!channel) return;
    for (const subscriber of channel.subscribers) subscriber.end();
    this.channels.delete(taskId);
  }

  /** End every subscriber of every task. */
  closeAll(): void {
    for (const taskId of [...this.channels.keys()]) {
      const channel = this.channels.get(taskId);
      if (!channel) continue;
      for (const subscriber of channel.subscribers) subscriber.end();
      channel.subscribers.clear();
    }
  }

  private missedSince(channel: Channel, afterSeq: number): LoggedEvent[] | undefined {
    if (channel.seq === 0 || !Number.isInteger(afterSeq) || afterSeq < 0 || afterSeq > channel.seq) return undefined;
    const oldest = channel.log[0]?.seq ?? channel.seq + 1;
    if (afterSeq < oldest - 1) return undefined;
    const missed = channel.log.filter((entry) => entry.seq > afterSeq);
    return missed.length > this.config.subscriberQueueLimit ? undefined : missed;
  }

  private channel(taskId: string): Channel {
    let channel = this.channels.get(taskId);
    if (!channel) {
      channel = { seq: 0, log: [], subscribers: new Set() };
      this.channels.set(taskId, channel);
    }
    return channel;
  }
}
