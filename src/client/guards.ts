import type { AgentCard } from '../types/agent-card.js';
import type { SendMessageResult, StreamResponse } from '../types/events.js';
import type { Message } from '../types/message.js';
import type { ListTasksResult } from '../types/payloads.js';
import type { TaskPushNotificationConfig } from '../types/push.js';
import type { Task } from '../types/task.js';
import { MessageValidator } from '../messaging/MessageValidator.js';

// Shallow shape checks for values read off the wire.

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isTask(value: unknown): value is Task {
  if (!isRecord(value) || typeof value.id !== 'string' || typeof value.contextId !== 'string') return false;
  const status = value.status;
  if (!isRecord(status) || typeof status.timestamp !== 'string') return false;
  try {
    return MessageValidator.taskState(status.state) !== undefined;
  } catch {
    return false;
  }
}

export function isMessage(value: unknown): value is Message {
  return MessageValidator.validateStructure(value);
}

export function isSendMessageResult(value: unknown): value is SendMessageResult {
  if (!isRecord(value)) return false;
  return isTask(value.task) !== isMessage(value.message);
}

export function isStreamResponse(value: unknown): value is StreamResponse {
  if (!isRecord(value)) return false;
  const arms = [
    isTask(value.task),
    isMessage(value.message),
    isRecord(value.statusUpdate) && typeof value.statusUpdate.taskId === 'string',
    isRecord(value.artifactUpdate) && typeof value.artifactUpdate.taskId === 'string',
  ];
  return arms.filter(Boolean).length === 1;
}

export function isListTasksResult(value: unknown): value is ListTasksResult {
  return (
    isRecord(value) &&
    Array.isArray(value.tasks) &&
    value.tasks.every(isTask) &&
    typeof value.nextPageToken === 'string' &&
    typeof value.pageSize === 'number' &&
    typeof value.totalSize === 'number'
  );
}

export function isTaskPushNotificationConfig(value: unknown): value is TaskPushNotificationConfig {
  if (!isRecord(value) || typeof value.taskId !== 'string') return false;
  const config = value.pushNotificationConfig;
  return isRecord(config) && typeof config.id === 'string' && typeof config.url === 'string';
}

export function isAgentCard(value: unknown): value is AgentCard {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.url === 'string' &&
    typeof value.protocolVersion === 'string' &&
    isRecord(value.capabilities) &&
    Array.isArray(value.skills)
  );
}
