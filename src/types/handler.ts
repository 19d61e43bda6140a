import type { AgentCard } from './agent-card.js';
import type { SendMessageResult, StreamResponse } from './events.js';
import type {
  CreateTaskPushNotificationConfigParams,
  GetTaskParams,
  ListTaskPushNotificationConfigsParams,
  ListTasksParams,
  ListTasksResult,
  SendMessageParams,
  TaskIdParams,
  TaskPushNotificationConfigParams,
} from './payloads.js';
import type { TaskPushNotificationConfig } from './push.js';
import type { Task } from './task.js';

/** Authenticated (or anonymous) identity of a caller. */
export interface CallerIdentity {
  tenant: string;
  subject: string;
  roles?: string[];
}

/** Per-request metadata a binding extracts from its wire format. */
export interface CallContext {
  caller?: CallerIdentity;
  /** Declared protocol version, "Major.Minor". */
  version?: string;
  /** Extension URIs the caller declared. */
  extensions?: string[];
  /** Filled in by the core: the extensions in effect for this call. */
  activatedExtensions?: string[];
  /** Last stream position the caller saw (SSE `Last-Event-ID`); resubscribing resumes after it. */
  lastEventId?: string;
}

/** A live event stream. `close()` detaches this reader only. */
export interface TaskStream extends AsyncIterable<StreamResponse> {
  close(): void;
  /** Position of the last event read in the task's event log, when known. */
  readonly position?: number;
}

export type OperationName =
  | 'sendMessage'
  | 'sendStreamingMessage'
  | 'getTask'
  | 'listTasks'
  | 'cancelTask'
  | 'subscribeToTask'
  | 'createTaskPushNotificationConfig'
  | 'getTaskPushNotificationConfig'
  | 'listTaskPushNotificationConfigs'
  | 'deleteTaskPushNotificationConfig'
  | 'getExtendedAgentCard';

/** The binding-agnostic operation surface every wire adapter translates to. */
export interface A2AOperations {
  sendMessage(params: SendMessageParams, call?: CallContext): Promise<SendMessageResult>;
  /** Rejects before streaming starts when the request is invalid. */
  sendStreamingMessage(params: SendMessageParams, call?: CallContext): Promise<TaskStream>;
  getTask(params: GetTaskParams, call?: CallContext): Promise<Task>;
  listTasks(params: ListTasksParams, call?: CallContext): Promise<ListTasksResult>;
  cancelTask(params: TaskIdParams, call?: CallContext): Promise<Task>;
  subscribeToTask(params: TaskIdParams, call?: CallContext): Promise<TaskStream>;
  createTaskPushNotificationConfig(
    params: CreateTaskPushNotificationConfigParams,
    call?: CallContext,
  ): Promise<TaskPushNotificationConfig>;
  getTaskPushNotificationConfig(
    params: TaskPushNotificationConfigParams,
    call?: CallContext,
  ): Promise<TaskPushNotificationConfig>;
  listTaskPushNotificationConfigs(
    params: ListTaskPushNotificationConfigsParams,
    call?: CallContext,
  ): Promise<TaskPushNotificationConfig[]>;
  deleteTaskPushNotificationConfig(
    params: TaskPushNotificationConfigParams,
    call?: CallContext,
  ): Promise<void>;
  getExtendedAgentCard(call?: CallContext): Promise<AgentCard>;
}
