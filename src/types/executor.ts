import type { Artifact } from './artifact.js';
import type { CallerIdentity } from './handler.js';
import type { Message } from './message.js';
import type { Task } from './task.js';

/** What an executor sees when asked to work on a task. */
export interface RequestContext {
  /** Snapshot of the task when execution was dispatched. */
  task: Task;
  /** The message that triggered this execution. */
  message: Message;
  caller: CallerIdentity;
  /** Extensions in effect for the triggering request. */
  extensions: string[];
  /** Aborted when the task is canceled. */
  signal: AbortSignal;
}

/** Context for the synchronous short-circuit, before any task exists. */
export interface DirectReplyContext {
  caller: CallerIdentity;
  extensions: string[];
}

export interface ArtifactUpdateOptions {
  /** Add parts to an artifact already produced under the same id. */
  append?: boolean;
  lastChunk?: boolean;
}

/** Agent text or a full message. Text becomes a single-part agent message. */
export type AgentReply = string | Message;

/** Locked, validated mutations available to an executor for one task. */
export interface TaskUpdater {
  readonly taskId: string;
  readonly contextId: string;
  startWork(message?: AgentReply): Promise<void>;
  addArtifact(artifact: Artifact, options?: ArtifactUpdateOptions): Promise<void>;
  appendHistory(message: AgentReply): Promise<void>;
  requireInput(message: AgentReply): Promise<void>;
  requireAuth(message: AgentReply): Promise<void>;
  complete(message?: AgentReply): Promise<void>;
  fail(message?: AgentReply): Promise<void>;
  reject(message?: AgentReply): Promise<void>;
}

/** The agent's own logic, plugged into the server. */
export interface AgentExecutor {
  /**
   * Optional short-circuit for messages that start no task. Returning a message
   * answers the caller directly; returning undefined falls through to `execute`.
   */
  respond?(message: Message, context: DirectReplyContext): Promise<Message | undefined> | Message | undefined;
  execute(context: RequestContext, updater: TaskUpdater): Promise<void>;
  /** Called after a cancel has been recorded. Best-effort. */
  cancel?(taskId: string): Promise<void> | void;
}
