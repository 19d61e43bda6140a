import { ErrorCodes, type A2AErrorData, type ErrorReason } from '../types/errors.js';

export class A2AError extends Error {
  readonly code: number;
  readonly reason: ErrorReason;
  readonly data?: Record<string, unknown>;

  constructor(reason: ErrorReason, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'A2AError';
    this.reason = reason;
    this.code = ErrorCodes[reason];
    this.data = data;
  }

  toJSON(): A2AErrorData {
    return {
      code: this.code,
      reason: this.reason,
      message: this.message,
      ...(this.data !== undefined ? { data: this.data } : {}),
    };
  }

  /** Pass A2AErrors through; wrap anything else as an internal error. */
  static from(err: unknown): A2AError {
    if (err instanceof A2AError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return A2AError.internal(message);
  }

  /** Also used for tasks outside the caller's scope, so the two are indistinguishable. */
  static taskNotFound(taskId: string): A2AError {
    return new A2AError('TASK_NOT_FOUND', 'Task not found', { taskId });
  }

  static taskNotCancelable(taskId: string, state: string): A2AError {
    return new A2AError('TASK_NOT_CANCELABLE', `Task cannot be canceled in state ${state}`, {
      taskId,
      state,
    });
  }

  static pushNotificationNotSupported(): A2AError {
    return new A2AError('PUSH_NOTIFICATION_NOT_SUPPORTED', 'Push notifications are not supported');
  }

  static unsupportedOperation(reason: string, data?: Record<string, unknown>): A2AError {
    return new A2AError('UNSUPPORTED_OPERATION', reason, data);
  }

  static terminalTask(taskId: string, state: string): A2AError {
    return new A2AError('UNSUPPORTED_OPERATION', `Task is in terminal state ${state}`, {
      taskId,
      state,
    });
  }

  static contentTypeNotSupported(accepted: string[], offered: string[]): A2AError {
    return new A2AError('CONTENT_TYPE_NOT_SUPPORTED', 'No acceptable output mode', {
      accepted,
      offered,
    });
  }

  static invalidAgentResponse(reason: string, data?: Record<string, unknown>): A2AError {
    return new A2AError('INVALID_AGENT_RESPONSE', reason, data);
  }

  static extendedAgentCardNotConfigured(): A2AError {
    return new A2AError(
      'EXTENDED_AGENT_CARD_NOT_CONFIGURED',
      'Authenticated extended agent card is not configured',
    );
  }

  static extensionSupportRequired(uris: string[]): A2AError {
    return new A2AError('EXTENSION_SUPPORT_REQUIRED', `Required extensions not declared: ${uris.join(', ')}`, {
      extensions: uris,
    });
  }

  static versionNotSupported(requested: string, supported: string[]): A2AError {
    return new A2AError('VERSION_NOT_SUPPORTED', `Protocol version ${requested} is not supported`, {
      requested,
      supported,
    });
  }

  static parseError(reason = 'Malformed JSON'): A2AError {
    return new A2AError('PARSE_ERROR', reason);
  }

  static invalidRequest(reason: string, data?: Record<string, unknown>): A2AError {
    return new A2AError('INVALID_REQUEST', reason, data);
  }

  static methodNotFound(method: string): A2AError {
    return new A2AError('METHOD_NOT_FOUND', `Method not found: ${method}`, { method });
  }

  static invalidParams(reason: string, field?: string): A2AError {
    return new A2AError('INVALID_PARAMS', reason, field !== undefined ? { field } : undefined);
  }

  static internal(reason = 'Internal error'): A2AError {
    return new A2AError('INTERNAL_ERROR', reason);
  }
}
