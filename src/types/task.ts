import type { Artifact } from './artifact.js';
import type { Message } from './message.js';

export type TaskState =
  | 'submitted'
  | 'working'
  | 'input-required'
  | 'auth-required'
  | 'completed'
  | 'failed'
  | 'canceled'
  | 'rejected';

/** Current status of a task. */
export interface TaskStatus {
  state: TaskState;
  /** Optional agent message explaining the status (e.g. the question for input-required). */
  message?: Message;
  /** ISO-8601 time of the last status change. */
  timestamp: string;
}

/** A unit of delegated work that may span multiple message turns. */
export interface Task {
  id: string;
  contextId: string;
  status: TaskStatus;
  artifacts?: Artifact[];
  history?: Message[];
  metadata?: Record<string, unknown>;
}
