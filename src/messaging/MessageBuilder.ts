import { randomUUID } from 'node:crypto';
import type { Message, MessageRole } from '../types/message.js';
import type { Part } from '../types/part.js';

export class MessageBuilder {
  private _messageId?: string;
  private _role: MessageRole = 'user';
  private _parts: Part[] = [];
  private _taskId?: string;
  private _contextId?: string;
  private _referenceTaskIds: string[] = [];
  private _extensions: string[] = [];
  private _metadata?: Record<string, unknown>;

  messageId(messageId: string): this {
    this._messageId = messageId;
    return this;
  }

  role(role: MessageRole): this {
    this._role = role;
    return this;
  }

  text(text: string, metadata?: Record<string, unknown>): this {
    this._parts.push(metadata ? { text, metadata } : { text });
    return this;
  }

  data(data: Record<string, unknown>): this {
    this._parts.push({ data });
    return this;
  }

  fileUri(uri: string, mediaType?: string, name?: string): this {
    this._parts.push({ file: { uri, ...(mediaType && { mediaType }), ...(name && { name }) } });
    return this;
  }

  fileBytes(bytes: string, mediaType?: string, name?: string): this {
    this._parts.push({ file: { bytes, ...(mediaType && { mediaType }), ...(name && { name }) } });
    return this;
  }

  part(part: Part): this {
    this._parts.push(part);
    return this;
  }

  taskId(taskId: string): this {
    this._taskId = taskId;
    return this;
  }

  contextId(contextId: string): this {
    this._contextId = contextId;
    return this;
  }

  references(...taskIds: string[]): this {
    this._referenceTaskIds.push(...taskIds);
    return this;
  }

  extension(uri: string): this {
    if (!this._extensions.includes(uri)) this._extensions.push(uri);
    return this;
  }

  metadata(metadata: Record<string, unknown>): this {
    this._metadata = metadata;
    return this;
  }

  /**
   * Build the message. A messageId is generated when none was set.
   * Throws if no parts were added.
   */
  build(): Message {
    if (this._parts.length === 0) throw new Error('at least one part is required');

    const message: Message = {
      messageId: this._messageId ?? randomUUID(),
      role: this._role,
      parts: [...this._parts],
    };
    if (this._taskId) message.taskId = this._taskId;
    if (this._contextId) message.contextId = this._contextId;
    if (this._referenceTaskIds.length > 0) message.referenceTaskIds = [...this._referenceTaskIds];
    if (this._extensions.length > 0) message.extensions = [...this._extensions];
    if (this._metadata) message.metadata = this._metadata;
    return message;
  }
}

/** Shorthand for a single-text-part message. */
export function textMessage(role: MessageRole, text: string, messageId?: string): Message {
  const builder = new MessageBuilder().role(role).text(text);
  if (messageId) builder.messageId(messageId);
  return builder.build();
}
