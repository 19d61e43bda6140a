import type { Message } from './message.js';
import type { PushNotificationConfig } from './push.js';
import type { Task, TaskState } from './task.js';

// ---------- SendMessage / SendStreamingMessage ----------

export interface SendMessageConfiguration {
  /** Media types the caller can consume; must overlap the agent's output modes. */
  acceptedOutputModes?: string[];
  historyLength?: number;
  /** Wait until the task is terminal or interrupted before returning. Default: false. */
  blocking?: boolean;
  pushNotificationConfig?: PushNotificationConfig;
}

export interface SendMessageParams {
  message: Message;
  configuration?: SendMessageConfiguration;
  metadata?: Record<string, unknown>;
}

// ---------- GetTask ----------

export interface GetTaskParams {
  id: string;
  historyLength?: number;
}

// ---------- ListTasks ----------

export interface ListTasksParams {
  contextId?: string;
  status?: TaskState;
  /** ISO-8601; only tasks updated strictly after this instant. */
  statusTimestampAfter?: string;
  pageSize?: number;
  pageToken?: string;
  historyLength?: number;
  includeArtifacts?: boolean;
}

export interface ListTasksResult {
  tasks: Task[];
  /** Empty string when there are no further pages. */
  nextPageToken: string;
  pageSize: number;
  totalSize: number;
}

// ---------- CancelTask / SubscribeToTask ----------

export interface TaskIdParams {
  id: string;
  metadata?: Record<string, unknown>;
}

// ---------- Push notification config ----------

export interface CreateTaskPushNotificationConfigParams {
  taskId: string;
  pushNotificationConfig: PushNotificationConfig;
}

export interface TaskPushNotificationConfigParams {
  taskId: string;
  pushNotificationConfigId: string;
}

export interface ListTaskPushNotificationConfigsParams {
  taskId: string;
}
