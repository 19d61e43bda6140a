import { randomUUID } from 'node:crypto';
import type { TransitionTrigger } from '../core/TaskStateMachine.js';
import type { Artifact } from '../types/artifact.js';
import type { AgentReply, ArtifactUpdateOptions, TaskUpdater } from '../types/executor.js';
import type { Message } from '../types/message.js';

/** One locked mutation of a task, as requested by an executor. */
export type TaskChange =
  | { kind: 'status'; trigger: TransitionTrigger; message?: Message }
  | { kind: 'artifact'; artifact: Artifact; append: boolean; lastChunk?: boolean }
  | { kind: 'history'; message: Message };

/** The server side of an updater: applies a change under the task's lock. */
export interface TaskMutator {
  applyChange(taskId: string, change: TaskChange): Promise<void>;
}

export class ServerTaskUpdater implements TaskUpdater {
  constructor(
    private readonly mutator: TaskMutator,
    readonly taskId: string,
    readonly contextId: string,
  ) {}

  startWork(message?: AgentReply): Promise<void> {
    return this.status('start', message);
  }

  addArtifact(artifact: Artifact, options: ArtifactUpdateOptions = {}): Promise<void> {
    return this.mutator.applyChange(this.taskId, {
      kind: 'artifact',
      artifact,
      append: options.append ?? false,
      ...(options.lastChunk !== undefined && { lastChunk: options.lastChunk }),
    });
  }

  appendHistory(message: AgentReply): Promise<void> {
    return this.mutator.applyChange(this.taskId, { kind: 'history', message: this.toMessage(message) });
  }

  requireInput(message: AgentReply): Promise<void> {
    return this.status('requireInput', message);
  }

  requireAuth(message: AgentReply): Promise<void> {
    return this.status('requireAuth', message);
  }

  complete(message?: AgentReply): Promise<void> {
    return this.status('complete', message);
  }

  fail(message?: AgentReply): Promise<void> {
    return this.status('fail', message);
  }

  reject(message?: AgentReply): Promise<void> {
    return this.status('reject', message);
  }

  /** Text becomes a one-part agent message bound to this task. */
  toMessage(reply: AgentReply): Message {
    if (typeof reply === 'string') {
      return {
        messageId: randomUUID(),
        role: 'agent',
        parts: [{ text: reply }],
        taskId: this.taskId,
        contextId: this.contextId,
      };
    }
    return { ...structuredClone(reply), taskId: this.taskId, contextId: this.contextId };
  }

  private status(trigger: TransitionTrigger, message?: AgentReply): Promise<void> {
    return this.mutator.applyChange(
      this.taskId,
      message === undefined ? { kind: 'status', trigger } : { kind: 'status', trigger, message: this.toMessage(message) },
    );
  }
}
