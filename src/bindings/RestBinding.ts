import { A2AError } from '../errors/A2AError.js';
import { bindingCodes } from '../errors/bindings.js';
import type { A2AOperations, CallContext, TaskStream } from '../types/handler.js';
import type { A2AErrorData } from '../types/errors.js';
import type { Logger } from '../types/plugin.js';
import { ParamsValidator } from '../messaging/ParamsValidator.js';

export interface RestRequest {
  method: string;
  /** Path relative to the binding prefix, e.g. "/tasks/abc:cancel". */
  path: string;
  query: URLSearchParams;
  body?: unknown;
}

export type RestOutcome =
  | { kind: 'response'; status: number; body?: unknown }
  | { kind: 'stream'; stream: TaskStream };

type Route =
  | { op: 'send' | 'stream' | 'list' | 'card' }
  | { op: 'get' | 'cancel' | 'subscribe' | 'pushCreate' | 'pushList'; taskId: string }
  | { op: 'pushGet' | 'pushDelete'; taskId: string; configId: string };

const TASK_PATH = /^\/tasks\/([^/:]+)(?::(cancel|subscribe))?$/;
const PUSH_PATH = /^\/tasks\/([^/:]+)\/pushNotificationConfigs(?:\/([^/:]+))?$/;

const INTEGER_PARAMS = new Set(['pageSize', 'historyLength']);
const BOOLEAN_PARAMS = new Set(['includeArtifacts']);

function decode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw A2AError.invalidParams('Malformed path segment', 'path');
  }
}

/** Typed view of query parameters; malformed numbers stay strings so validation names them. */
export function queryParams(query: URLSearchParams): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of query) {
    if (INTEGER_PARAMS.has(key) && /^-?\d+$/.test(value)) {
      out[key] = Number(value);
    } else if (BOOLEAN_PARAMS.has(key) && (value === 'true' || value === 'false')) {
      out[key] = value === 'true';
    } else {
      out[key] = value;
    }
  }
  return out;
}

function bodyRecord(body: unknown): Record<string, unknown> {
  if (body === undefined || body === null) return {};
  if (typeof body !== 'object' || Array.isArray(body)) {
    throw A2AError.invalidParams('Request body must be a JSON object', 'body');
  }
  return { ...body };
}

/** Resource-style routes over the same operations, with HTTP status mapping. */
export class RestBinding {
  constructor(
    private readonly operations: A2AOperations,
    private readonly logger?: Logger,
  ) {}

  static route(method: string, path: string): Route | undefined {
    if (path === '/message:send' && method === 'POST') return { op: 'send' };
    if (path === '/message:stream' && method === 'POST') return { op: 'stream' };
    if (path === '/tasks' && method === 'GET') return { op: 'list' };
    if (path === '/card' && method === 'GET') return { op: 'card' };

    const push = PUSH_PATH.exec(path);
    if (push) {
      const taskId = decode(push[1]);
      const configId = push[2];
      if (configId === undefined) {
        if (method === 'POST') return { op: 'pushCreate', taskId };
        if (method === 'GET') return { op: 'pushList', taskId };
        return undefined;
      }
      if (method === 'GET') return { op: 'pushGet', taskId, configId: decode(configId) };
      if (method === 'DELETE') return { op: 'pushDelete', taskId, configId: decode(configId) };
      return undefined;
    }

    const task = TASK_PATH.exec(path);
    if (task) {
      const taskId = decode(task[1]);
      const action = task[2];
      if (action === undefined && method === 'GET') return { op: 'get', taskId };
      if (action === 'cancel' && method === 'POST') return { op: 'cancel', taskId };
      if (action === 'subscribe' && method === 'GET') return { op: 'subscribe', taskId };
    }
    return undefined;
  }

  static errorResponse(err: unknown): { status: number; body: { error: A2AErrorData } } {
    const error = A2AError.from(err);
    return { status: bindingCodes(error.reason).http, body: { error: error.toJSON() } };
  }

  /** Dispatch a request. Never throws: failures become error responses. */
  async handle(request: RestRequest, call: CallContext = {}): Promise<RestOutcome> {
    try {
      return await this.dispatch(request, call);
    } catch (err) {
      if (!(err instanceof A2AError)) {
        this.logger?.('error', 'REST handler error', { path: request.path, error: err });
      }
      return { kind: 'response', ...RestBinding.errorResponse(err) };
    }
  }

  private async dispatch(request: RestRequest, call: CallContext): Promise<RestOutcome> {
    const route = RestBinding.route(request.method, request.path);
    if (!route) throw A2AError.methodNotFound(`${request.method} ${request.path}`);

    const ops = this.operations;
    const ok = (body: unknown): RestOutcome => ({ kind: 'response', status: 200, body });

    switch (route.op) {
      case 'send':
        return ok(await ops.sendMessage(ParamsValidator.sendMessage(request.body), call));
      case 'stream':
        return { kind: 'stream', stream: await ops.sendStreamingMessage(ParamsValidator.sendMessage(request.body), call) };
      case 'list':
        return ok(await ops.listTasks(ParamsValidator.listTasks(queryParams(request.query)), call));
      case 'card':
        return ok(await ops.getExtendedAgentCard(call));
      case 'get':
        return ok(
          await ops.getTask(ParamsValidator.getTask({ ...queryParams(request.query), id: route.taskId }), call),
        );
      case 'cancel':
        return ok(await ops.cancelTask(ParamsValidator.taskId({ ...bodyRecord(request.body), id: route.taskId }), call));
      case 'subscribe':
        return { kind: 'stream', stream: await ops.subscribeToTask(ParamsValidator.taskId({ id: route.taskId }), call) };
      case 'pushCreate':
        return ok(
          await ops.createTaskPushNotificationConfig(
            ParamsValidator.createPushConfig({ taskId: route.taskId, pushNotificationConfig: request.body }),
            call,
          ),
        );
      case 'pushList':
        return ok(await ops.listTaskPushNotificationConfigs(ParamsValidator.listPushConfigs({ taskId: route.taskId }), call));
      case 'pushGet':
        return ok(
          await ops.getTaskPushNotificationConfig(
            ParamsValidator.pushConfig({ taskId: route.taskId, pushNotificationConfigId: route.configId }),
            call,
          ),
        );
      case 'pushDelete':
        await ops.deleteTaskPushNotificationConfig(
          ParamsValidator.pushConfig({ taskId: route.taskId, pushNotificationConfigId: route.configId }),
          call,
        );
        return { kind: 'response', status: 204 };
    }
  }
}
