import type { PushNotificationConfig } from './push.js';
import type { Task, TaskState } from './task.js';
import type { CallContext, OperationName } from './handler.js';

// ---------- Logger ----------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Logger callback for diagnostic events. */
export type Logger = (level: LogLevel, message: string, data?: unknown) => void;

// ---------- Storage ----------

/** Who created a task. Recorded once, never exposed on the wire. */
export interface TaskOwner {
  tenant: string;
  subject: string;
}

export interface TaskRecord {
  task: Task;
  owner: TaskOwner;
}

/** Store-level filter. Scope is applied by the caller of the store. */
export interface TaskQuery {
  contextId?: string;
  state?: TaskState;
  /** ISO-8601; match tasks whose status timestamp is strictly later. */
  updatedAfter?: string;
}

export interface TaskStore {
  get(taskId: string): Promise<TaskRecord | undefined>;
  set(taskId: string, record: TaskRecord): Promise<void>;
  delete(taskId: string): Promise<void>;
  list(query: TaskQuery): Promise<TaskRecord[]>;
}

export type StoredPushNotificationConfig = PushNotificationConfig & { id: string };

export interface PushConfigStore {
  get(taskId: string, configId: string): Promise<StoredPushNotificationConfig | undefined>;
  set(taskId: string, config: StoredPushNotificationConfig): Promise<void>;
  list(taskId: string): Promise<StoredPushNotificationConfig[]>;
  delete(taskId: string, configId: string): Promise<void>;
  deleteAll(taskId: string): Promise<void>;
}

// ---------- Middleware ----------

export interface MiddlewareContext {
  operation: OperationName;
  params: unknown;
  /** Mutable: middleware may resolve the caller or adjust declared extensions. */
  call: CallContext;
}

export type NextFn = () => Promise<void>;

export interface Middleware {
  readonly name: string;
  handle(ctx: MiddlewareContext, next: NextFn): Promise<void>;
}
