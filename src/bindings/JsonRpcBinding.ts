import { A2AError } from '../errors/A2AError.js';
import type { StreamResponse } from '../types/events.js';
import type { A2AOperations, CallContext, TaskStream } from '../types/handler.js';
import type { Logger } from '../types/plugin.js';
import { ParamsValidator } from '../messaging/ParamsValidator.js';

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: Record<string, unknown>;
}

export interface JsonRpcSuccess {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcFailure {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

/** A unary reply, or a stream whose events become one frame each. */
export type JsonRpcOutcome =
  | { kind: 'response'; response: JsonRpcResponse }
  | { kind: 'stream'; id: JsonRpcId; stream: TaskStream };

export const JSON_RPC_METHODS = {
  SEND: 'message/send',
  STREAM: 'message/stream',
  GET: 'tasks/get',
  LIST: 'tasks/list',
  CANCEL: 'tasks/cancel',
  RESUBSCRIBE: 'tasks/resubscribe',
  PUSH_SET: 'tasks/pushNotificationConfig/set',
  PUSH_GET: 'tasks/pushNotificationConfig/get',
  PUSH_LIST: 'tasks/pushNotificationConfig/list',
  PUSH_DELETE: 'tasks/pushNotificationConfig/delete',
  EXTENDED_CARD: 'agent/getAuthenticatedExtendedCard',
} as const;

export const STREAMING_METHODS: ReadonlySet<string> = new Set([JSON_RPC_METHODS.STREAM, JSON_RPC_METHODS.RESUBSCRIBE]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isId(value: unknown): value is JsonRpcId {
  return value === null || typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

/** Translates JSON-RPC 2.0 envelopes to operation calls and back. */
export class JsonRpcBinding {
  constructor(
    private readonly operations: A2AOperations,
    private readonly logger?: Logger,
  ) {}

  /** @throws A2AError PARSE_ERROR or INVALID_REQUEST. */
  static parseEnvelope(raw: unknown): JsonRpcRequest {
    if (Array.isArray(raw)) {
      throw A2AError.invalidRequest('Batch requests are not supported');
    }
    if (!isRecord(raw)) throw A2AError.invalidRequest('Request must be a JSON object');
    if (raw.jsonrpc !== '2.0') throw A2AError.invalidRequest('jsonrpc must be "2.0"');
    if (typeof raw.method !== 'string' || raw.method.length === 0) {
      throw A2AError.invalidRequest('method must be a non-empty string');
    }
    const id = raw.id === undefined ? null : raw.id;
    if (!isId(id)) throw A2AError.invalidRequest('id must be a string, number or null');
    return { jsonrpc: '2.0', id, method: raw.method, params: raw.params };
  }

  /** Best-effort id of a request that failed envelope validation. */
  static idOf(raw: unknown): JsonRpcId {
    return isRecord(raw) && isId(raw.id) ? raw.id : null;
  }

  static success(id: JsonRpcId, result: unknown): JsonRpcSuccess {
    return { jsonrpc: '2.0', id, result };
  }

  static failure(id: JsonRpcId, err: unknown): JsonRpcFailure {
    const error = A2AError.from(err);
    return {
      jsonrpc: '2.0',
      id,
      error: {
        code: error.code,
        message: error.message,
        data: { reason: error.reason, ...error.data },
      },
    };
  }

  /** One frame of a streaming reply. */
  static frame(id: JsonRpcId, event: StreamResponse): JsonRpcSuccess {
    return JsonRpcBinding.success(id, event);
  }

  /** Parse and dispatch a request body. Never throws: failures become error responses. */
  async handleText(body: string, call: CallContext = {}): Promise<JsonRpcOutcome> {
    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch {
      return { kind: 'response', response: JsonRpcBinding.failure(null, A2AError.parseError()) };
    }
    return this.handle(raw, call);
  }

  async handle(raw: unknown, call: CallContext = {}): Promise<JsonRpcOutcome> {
    let request: JsonRpcRequest;
    try {
      request = JsonRpcBinding.parseEnvelope(raw);
    } catch (err) {
      return { kind: 'response', response: JsonRpcBinding.failure(JsonRpcBinding.idOf(raw), err) };
    }

    try {
      if (STREAMING_METHODS.has(request.method)) {
        const stream = await this.openStream(request, call);
        return { kind: 'stream', id: request.id, stream };
      }
      const result = await this.invoke(request, call);
      return { kind: 'response', response: JsonRpcBinding.success(request.id, result) };
    } catch (err) {
      if (!(err instanceof A2AError)) {
        this.logger?.('error', 'JSON-RPC handler error', { method: request.method, error: err });
      }
      return { kind: 'response', response: JsonRpcBinding.failure(request.id, err) };
    }
  }

  private openStream(request: JsonRpcRequest, call: CallContext): Promise<TaskStream> {
    if (request.method === JSON_RPC_METHODS.STREAM) {
      return this.operations.sendStreamingMessage(ParamsValidator.sendMessage(request.params), call);
    }
    return this.operations.subscribeToTask(ParamsValidator.taskId(request.params), call);
  }

  private async invoke(request: JsonRpcRequest, call: CallContext): Promise<unknown> {
    const ops = this.operations;
    const params = request.params;
    switch (request.method) {
      case JSON_RPC_METHODS.SEND:
        return ops.sendMessage(ParamsValidator.sendMessage(params), call);
      case JSON_RPC_METHODS.GET:
        return ops.getTask(ParamsValidator.getTask(params), call);
      case JSON_RPC_METHODS.LIST:
        return ops.listTasks(ParamsValidator.listTasks(params), call);
      case JSON_RPC_METHODS.CANCEL:
        return ops.cancelTask(ParamsValidator.taskId(params), call);
      case JSON_RPC_METHODS.PUSH_SET:
        return ops.createTaskPushNotificationConfig(ParamsValidator.createPushConfig(params), call);
      case JSON_RPC_METHODS.PUSH_GET:
        return ops.getTaskPushNotificationConfig(ParamsValidator.pushConfig(params), call);
      case JSON_RPC_METHODS.PUSH_LIST:
        return ops.listTaskPushNotificationConfigs(ParamsValidator.listPushConfigs(params), call);
      case JSON_RPC_METHODS.PUSH_DELETE:
        await ops.deleteTaskPushNotificationConfig(ParamsValidator.pushConfig(params), call);
        return null;
      case JSON_RPC_METHODS.EXTENDED_CARD:
        return ops.getExtendedAgentCard(call);
      default:
        throw A2AError.methodNotFound(request.method);
    }
  }
}
