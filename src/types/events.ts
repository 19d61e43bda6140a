import type { Artifact } from './artifact.js';
import type { Message } from './message.js';
import type { Task, TaskStatus } from './task.js';

/** A change of task status. `final` marks the last event of a stream. */
export interface TaskStatusUpdateEvent {
  taskId: string;
  contextId: string;
  status: TaskStatus;
  final: boolean;
  metadata?: Record<string, unknown>;
}

/** A new artifact, or new parts for an existing one when `append` is set. */
export interface TaskArtifactUpdateEvent {
  taskId: string;
  contextId: string;
  artifact: Artifact;
  append?: boolean;
  lastChunk?: boolean;
  metadata?: Record<string, unknown>;
}

type Only<K extends string, V> = { [P in K]: V } & {
  [P in Exclude<StreamResponseKey, K>]?: never;
};

type StreamResponseKey = 'task' | 'message' | 'statusUpdate' | 'artifactUpdate';

/**
 * Envelope shared by streams and webhooks. Exactly one arm is populated and
 * its field name is the discriminator.
 */
export type StreamResponse =
  | Only<'task', Task>
  | Only<'message', Message>
  | Only<'statusUpdate', TaskStatusUpdateEvent>
  | Only<'artifactUpdate', TaskArtifactUpdateEvent>;

/** Result of a send: the task (asynchronous path) or a direct reply. */
export type SendMessageResult = Only<'task', Task> | Only<'message', Message>;
