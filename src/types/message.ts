import type { Part } from './part.js';

/** Role of the sender of a message. */
export type MessageRole = 'user' | 'agent';

/** A single communication turn. Results travel as artifacts, never as messages. */
export interface Message {
  messageId: string;
  role: MessageRole;
  parts: Part[];
  taskId?: string;
  contextId?: string;
  /** Other tasks this message cites. */
  referenceTaskIds?: string[];
  extensions?: string[];
  metadata?: Record<string, unknown>;
}
