export type { MediaType, FileWithUri, FileWithBytes, TextPart, FilePart, DataPart, Part } from './part.js';

export type { MessageRole, Message } from './message.js';

export type { Artifact } from './artifact.js';

export type { TaskState, TaskStatus, Task } from './task.js';

export type {
  AgentSkill,
  AgentExtension,
  AgentCapabilities,
  AgentProvider,
  SecurityScheme,
  AgentCardSignature,
  AgentCard,
} from './agent-card.js';

export type {
  TaskStatusUpdateEvent,
  TaskArtifactUpdateEvent,
  StreamResponse,
  SendMessageResult,
} from './events.js';

export type {
  PushNotificationAuthenticationInfo,
  PushNotificationConfig,
  TaskPushNotificationConfig,
} from './push.js';

export type {
  SendMessageConfiguration,
  SendMessageParams,
  GetTaskParams,
  ListTasksParams,
  ListTasksResult,
  TaskIdParams,
  CreateTaskPushNotificationConfigParams,
  TaskPushNotificationConfigParams,
  ListTaskPushNotificationConfigsParams,
} from './payloads.js';

export type { ErrorReason, ErrorCode, A2AErrorData } from './errors.js';
export { ErrorCodes } from './errors.js';

export type { CallerIdentity, CallContext, TaskStream, OperationName, A2AOperations } from './handler.js';

export type {
  RequestContext,
  DirectReplyContext,
  ArtifactUpdateOptions,
  AgentReply,
  TaskUpdater,
  AgentExecutor,
} from './executor.js';

export type {
  LogLevel,
  Logger,
  TaskOwner,
  TaskRecord,
  TaskQuery,
  TaskStore,
  StoredPushNotificationConfig,
  PushConfigStore,
  Middleware,
  MiddlewareContext,
  NextFn,
} from './plugin.js';

export type { TransportHost, TransportPlugin } from './transport.js';
