import type { StreamResponse } from '../types/events.js';
import type { TaskStream } from '../types/handler.js';

/** Raised to a subscriber whose queue overflowed. Resubscribe to get a fresh snapshot. */
export class SubscriberOverflowError extends Error {
  readonly taskId: string;

  constructor(taskId: string, limit: number) {
    super(`Subscriber for task ${taskId} fell more than ${limit} events behind`);
    this.name = 'SubscriberOverflowError';
    this.taskId = taskId;
  }
}

/**
 * Bounded per-subscriber queue. The producer never waits: `push` returns false
 * when the queue is full and the owner decides what to do with the reader.
 */
export class SubscriberQueue implements TaskStream {
  readonly taskId: string;
  /** End the stream at an interrupted state, not only at a terminal one. */
  readonly closeOnInterrupt: boolean;

  private readonly items: { event: StreamResponse; seq?: number }[] = [];
  private readonly limit: number;
  private readonly onDetach: (queue: SubscriberQueue) => void;
  private ended = false;
  private detached = false;
  private error: Error | null = null;
  private wake: (() => void) | null = null;
  private lastSeq: number | undefined;

  constructor(
    taskId: string,
    limit: number,
    onDetach: (queue: SubscriberQueue) => void,
    closeOnInterrupt = false,
  ) {
    this.taskId = taskId;
    this.limit = limit;
    this.onDetach = onDetach;
    this.closeOnInterrupt = closeOnInterrupt;
  }

  /** Enqueue an event, with its position in the task's log when it has one. Returns false when the queue is full. */
  push(event: StreamResponse, seq?: number): boolean {
    if (this.ended) return true;
    if (this.items.length >= this.limit) return false;
    this.items.push({ event, seq });
    this.signal();
    return true;
  }

  /** Finish after the queued events are read. */
  end(): void {
    this.ended = true;
    this.signal();
  }

  /** Finish with an error after the queued events are read. */
  fail(err: Error): void {
    this.error = err;
    this.ended = true;
    this.signal();
  }

  /** Detach this reader now, dropping anything still queued. */
  close(): void {
    this.items.length = 0;
    this.ended = true;
    this.signal();
    this.detach();
  }

  get isEnded(): boolean {
    return this.ended;
  }

  get pending(): number {
    return this.items.length;
  }

  get position(): number | undefined {
    return this.lastSeq;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<StreamResponse, void, undefined> {
    try {
      while (true) {
        const next = this.items.shift();
        if (next !== undefined) {
          this.lastSeq = next.seq ?? this.lastSeq;
          yield next.event;
          continue;
        }
        if (this.error) throw this.error;
        if (this.ended) return;
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        this.wake = null;
      }
    } finally {
      this.detach();
    }
  }

  private signal(): void {
    this.wake?.();
  }

  private detach(): void {
    if (this.detached) return;
    this.detached = true;
    this.onDetach(this);
  }
}
