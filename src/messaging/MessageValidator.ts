import { A2AError } from '../errors/A2AError.js';
import type { Artifact } from '../types/artifact.js';
import type { Message } from '../types/message.js';
import type { Part } from '../types/part.js';
import type { TaskState } from '../types/task.js';

export interface ValidationProblem {
  field: string;
  reason: string;
}

const ID_PATTERN = /^[A-Za-z0-9_.:-]{1,256}$/;
const VALID_ROLES = new Set(['user', 'agent']);
const TASK_STATES = new Set<string>([
  'submitted',
  'working',
  'input-required',
  'auth-required',
  'completed',
  'failed',
  'canceled',
  'rejected',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTaskState(value: unknown): value is TaskState {
  return typeof value === 'string' && TASK_STATES.has(value);
}

function isPartArray(value: unknown): value is Part[] {
  return Array.isArray(value) && value.every((part, i) => partProblem(part, `parts[${i}]`) === undefined);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function partProblem(part: unknown, field: string): ValidationProblem | undefined {
  if (!isRecord(part)) return { field, reason: 'Part must be an object' };
  const arms = ['text', 'file', 'data'].filter((key) => part[key] !== undefined);
  if (arms.length !== 1) {
    return { field, reason: 'Part must have exactly one of text, file or data' };
  }
  if (part.metadata !== undefined && !isRecord(part.metadata)) {
    return { field: `${field}.metadata`, reason: 'metadata must be an object' };
  }
  switch (arms[0]) {
    case 'text':
      if (typeof part.text !== 'string') return { field: `${field}.text`, reason: 'text must be a string' };
      return undefined;
    case 'data':
      if (!isRecord(part.data)) return { field: `${field}.data`, reason: 'data must be an object' };
      return undefined;
    default: {
      const file = part.file;
      if (!isRecord(file)) return { field: `${field}.file`, reason: 'file must be an object' };
      const hasUri = typeof file.uri === 'string';
      const hasBytes = typeof file.bytes === 'string';
      if (hasUri === hasBytes) {
        return { field: `${field}.file`, reason: 'file must have exactly one of uri or bytes' };
      }
      if (file.mediaType !== undefined && typeof file.mediaType !== 'string') {
        return { field: `${field}.file.mediaType`, reason: 'mediaType must be a string' };
      }
      return undefined;
    }
  }
}

function partsProblem(parts: unknown, field: string): ValidationProblem | undefined {
  if (!Array.isArray(parts) || parts.length === 0) {
    return { field, reason: 'parts must be a non-empty array' };
  }
  for (let i = 0; i < parts.length; i++) {
    const problem = partProblem(parts[i], `${field}[${i}]`);
    if (problem) return problem;
  }
  return undefined;
}

export class MessageValidator {
  /** First structural problem of a message, or undefined when it is well-formed. */
  static findProblem(message: unknown, field = 'message'): ValidationProblem | undefined {
    if (!isRecord(message)) return { field, reason: 'Message must be an object' };
    if (typeof message.messageId !== 'string' || message.messageId.length === 0) {
      return { field: `${field}.messageId`, reason: 'messageId is required' };
    }
    if (typeof message.role !== 'string' || !VALID_ROLES.has(message.role)) {
      return { field: `${field}.role`, reason: 'role must be "user" or "agent"' };
    }
    const parts = partsProblem(message.parts, `${field}.parts`);
    if (parts) return parts;

    for (const key of ['taskId', 'contextId'] as const) {
      const value = message[key];
      if (value !== undefined && (typeof value !== 'string' || !ID_PATTERN.test(value))) {
        return { field: `${field}.${key}`, reason: `${key} is malformed` };
      }
    }
    if (message.referenceTaskIds !== undefined && !isStringArray(message.referenceTaskIds)) {
      return { field: `${field}.referenceTaskIds`, reason: 'referenceTaskIds must be strings' };
    }
    if (message.extensions !== undefined && !isStringArray(message.extensions)) {
      return { field: `${field}.extensions`, reason: 'extensions must be strings' };
    }
    if (message.metadata !== undefined && !isRecord(message.metadata)) {
      return { field: `${field}.metadata`, reason: 'metadata must be an object' };
    }
    return undefined;
  }

  static validateStructure(message: unknown): message is Message {
    return MessageValidator.findProblem(message) === undefined;
  }

  static validatePart(part: unknown): part is Part {
    return partProblem(part, 'part') === undefined;
  }

  /**
   * Full validation of an inbound message.
   * @throws A2AError INVALID_PARAMS naming the offending field.
   */
  static validate(message: unknown, field = 'message'): Message {
    const problem = MessageValidator.findProblem(message, field);
    if (problem) throw A2AError.invalidParams(problem.reason, problem.field);
    if (!MessageValidator.validateStructure(message)) {
      throw A2AError.invalidParams('Message structure validation failed', field);
    }
    return message;
  }

  /**
   * Validate an artifact produced by an agent.
   * @throws A2AError INVALID_AGENT_RESPONSE.
   */
  static validateArtifact(artifact: unknown): Artifact {
    if (!isRecord(artifact)) {
      throw A2AError.invalidAgentResponse('Artifact must be an object');
    }
    if (typeof artifact.artifactId !== 'string' || artifact.artifactId.length === 0) {
      throw A2AError.invalidAgentResponse('Artifact needs an artifactId');
    }
    const problem = partsProblem(artifact.parts, 'artifact.parts');
    if (problem || !isPartArray(artifact.parts)) {
      throw A2AError.invalidAgentResponse(problem?.reason ?? 'Artifact parts are malformed', {
        field: problem?.field ?? 'artifact.parts',
      });
    }
    const result: Artifact = { artifactId: artifact.artifactId, parts: artifact.parts };
    if (typeof artifact.name === 'string') result.name = artifact.name;
    if (typeof artifact.description === 'string') result.description = artifact.description;
    if (isRecord(artifact.metadata)) result.metadata = artifact.metadata;
    if (isStringArray(artifact.extensions)) result.extensions = artifact.extensions;
    return result;
  }

  /** @throws A2AError INVALID_PARAMS unless unset or a non-negative integer. */
  static historyLength(value: unknown, field = 'historyLength'): number | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw A2AError.invalidParams('historyLength must be a non-negative integer', field);
    }
    return value;
  }

  /** @throws A2AError INVALID_PARAMS unless unset or an integer in [1, max]. */
  static pageSize(value: unknown, fallback: number, max: number): number {
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > max) {
      throw A2AError.invalidParams(`pageSize must be an integer between 1 and ${max}`, 'pageSize');
    }
    return value;
  }

  static taskState(value: unknown, field = 'status'): TaskState | undefined {
    if (value === undefined || value === null) return undefined;
    if (!isTaskState(value)) {
      throw A2AError.invalidParams(`Unknown task state: ${String(value)}`, field);
    }
    return value;
  }

  static timestamp(value: unknown, field: string): string | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string' || Number.isNaN(Date.parse(value))) {
      throw A2AError.invalidParams(`${field} must be an ISO-8601 timestamp`, field);
    }
    return value;
  }

  static requiredId(value: unknown, field: string): string {
    if (typeof value !== 'string' || value.length === 0) {
      throw A2AError.invalidParams(`${field} is required`, field);
    }
    return value;
  }
}
