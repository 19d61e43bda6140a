import { randomUUID } from 'node:crypto';
import type { AgentCard } from '../types/agent-card.js';
import type { SendMessageResult, StreamResponse } from '../types/events.js';
import type { A2AOperations, CallContext, TaskStream } from '../types/handler.js';
import type {
  CreateTaskPushNotificationConfigParams,
  GetTaskParams,
  ListTaskPushNotificationConfigsParams,
  ListTasksParams,
  ListTasksResult,
  SendMessageParams,
  TaskIdParams,
  TaskPushNotificationConfigParams,
} from '../types/payloads.js';
import type { Logger } from '../types/plugin.js';
import type { TaskPushNotificationConfig } from '../types/push.js';
import type { Task } from '../types/task.js';
import { A2AError } from '../errors/A2AError.js';
import { reasonForJsonRpcCode } from '../errors/bindings.js';
import { JSON_RPC_METHODS } from '../bindings/JsonRpcBinding.js';
import { SchnorrCardSigner } from '../crypto/AgentCardSigner.js';
import type { FetchLike } from '../push/PushNotificationDispatcher.js';
import {
  isAgentCard,
  isListTasksResult,
  isSendMessageResult,
  isStreamResponse,
  isTask,
  isTaskPushNotificationConfig,
} from './guards.js';

const WELL_KNOWN_PATH = '/.well-known/agent-card.json';

export interface A2AClientConfig {
  /** JSON-RPC endpoint of the remote agent. */
  url: string;
  bearerToken?: string;
  /** Request timeout in milliseconds; for streams, the idle time between events (default: 30000). */
  timeout?: number;
  /** Protocol version sent as A2A-Version. */
  version?: string;
  /** Extension URIs declared on every request. */
  extensions?: string[];
  fetch?: FetchLike;
  logger?: Logger;
}

export interface DiscoverOptions {
  fetch?: FetchLike;
  /** Require a valid signature from this x-only public key. */
  verifyWith?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Rebuild a protocol error from a JSON-RPC error object. */
export function errorFromJsonRpc(error: unknown): A2AError {
  if (!isRecord(error) || typeof error.code !== 'number') {
    return A2AError.internal('Malformed error response');
  }
  const message = typeof error.message === 'string' ? error.message : 'Remote error';
  const raw: Record<string, unknown> = isRecord(error.data) ? error.data : {};
  const { reason: _reason, ...data } = raw;
  return new A2AError(
    reasonForJsonRpcCode(error.code) ?? 'INTERNAL_ERROR',
    message,
    Object.keys(data).length > 0 ? data : undefined,
  );
}

/** An SSE response body read as a stream of JSON-RPC frames. */
class SseTaskStream implements TaskStream {
  constructor(
    private readonly body: ReadableStream<Uint8Array>,
    private readonly controller: AbortController,
    private readonly timeoutMs: number,
  ) {}

  close(): void {
    this.controller.abort();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<StreamResponse, void, undefined> {
    const reader = this.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';
    // Reset timeout on each event
    let timeoutId = setTimeout(() => this.controller.abort(), this.timeoutMs);

    try {
      while (true) {
        const chunk = await reader.read().then(
          (result) => result,
          (err: unknown) => {
            // close() aborts the body; that ends the stream quietly.
            if (this.controller.signal.aborted) return null;
            throw err;
          },
        );
        if (chunk === null || chunk.done) break;

        buffer += decoder.decode(chunk.value, { stream: true });
        const parts = buffer.split('\n\n');
        buffer = parts.pop() ?? '';

        for (const part of parts) {
          const event = parseFrame(part);
          if (event === undefined) continue;
          clearTimeout(timeoutId);
          timeoutId = setTimeout(() => this.controller.abort(), this.timeoutMs);
          yield event;
        }
      }

      // Handle any remaining data
      const last = buffer.trim() ? parseFrame(buffer) : undefined;
      if (last !== undefined) yield last;
    } finally {
      clearTimeout(timeoutId);
      reader.releaseLock();
      this.controller.abort();
    }
  }
}

function parseFrame(block: string): StreamResponse | undefined {
  const dataLine = block.split('\n').find((line) => line.startsWith('data: '));
  if (!dataLine) return undefined;
  const frame: unknown = JSON.parse(dataLine.slice(6));
  if (!isRecord(frame)) throw A2AError.invalidAgentResponse('Malformed stream frame');
  if (frame.error !== undefined) throw errorFromJsonRpc(frame.error);
  if (!isStreamResponse(frame.result)) throw A2AError.invalidAgentResponse('Malformed stream event');
  return frame.result;
}

/** JSON-RPC client for a remote agent; usable wherever A2AOperations is expected. */
export class A2AClient implements A2AOperations {
  private readonly config: Required<Omit<A2AClientConfig, 'bearerToken' | 'version' | 'logger'>> &
    Pick<A2AClientConfig, 'bearerToken' | 'version' | 'logger'>;

  constructor(config: A2AClientConfig) {
    this.config = {
      url: config.url,
      bearerToken: config.bearerToken,
      timeout: config.timeout ?? 30_000,
      version: config.version,
      extensions: config.extensions ?? [],
      fetch: config.fetch ?? ((input, init) => fetch(input, init)),
      logger: config.logger,
    };
  }

  /**
   * Fetch the agent card from its well-known location.
   * @param baseUrl The base URL of the agent (e.g., "https://agent.example.com")
   * @throws if the card is malformed, or unsigned by `verifyWith` when given.
   */
  static async discover(baseUrl: string, options: DiscoverOptions = {}): Promise<AgentCard> {
    const url = baseUrl.replace(/\/$/, '') + WELL_KNOWN_PATH;
    const doFetch = options.fetch ?? ((input, init) => fetch(input, init));
    const response = await doFetch(url, { method: 'GET', headers: { Accept: 'application/json' } });
    if (!response.ok) {
      throw new Error(`Discovery failed: HTTP ${response.status} from ${url}`);
    }
    const card: unknown = await response.json();
    if (!isAgentCard(card)) {
      throw new Error(`Malformed agent card from ${url}`);
    }
    const publicKey = options.verifyWith;
    if (publicKey !== undefined) {
      const valid = (card.signatures ?? []).some((sig) => SchnorrCardSigner.verifyWithKey(card, sig, publicKey));
      if (!valid) {
        throw new Error(`Agent card signature verification failed for ${url}`);
      }
    }
    return card;
  }

  async sendMessage(params: SendMessageParams, call?: CallContext): Promise<SendMessageResult> {
    const result = await this.rpc(JSON_RPC_METHODS.SEND, params, call);
    if (!isSendMessageResult(result)) throw A2AError.invalidAgentResponse('Malformed send result');
    return result;
  }

  sendStreamingMessage(params: SendMessageParams, call?: CallContext): Promise<TaskStream> {
    return this.rpcStream(JSON_RPC_METHODS.STREAM, params, call);
  }

  async getTask(params: GetTaskParams, call?: CallContext): Promise<Task> {
    const result = await this.rpc(JSON_RPC_METHODS.GET, params, call);
    if (!isTask(result)) throw A2AError.invalidAgentResponse('Malformed task');
    return result;
  }

  async listTasks(params: ListTasksParams, call?: CallContext): Promise<ListTasksResult> {
    const result = await this.rpc(JSON_RPC_METHODS.LIST, params, call);
    if (!isListTasksResult(result)) throw A2AError.invalidAgentResponse('Malformed task list');
    return result;
  }

  async cancelTask(params: TaskIdParams, call?: CallContext): Promise<Task> {
    const result = await this.rpc(JSON_RPC_METHODS.CANCEL, params, call);
    if (!isTask(result)) throw A2AError.invalidAgentResponse('Malformed task');
    return result;
  }

  subscribeToTask(params: TaskIdParams, call?: CallContext): Promise<TaskStream> {
    return this.rpcStream(JSON_RPC_METHODS.RESUBSCRIBE, params, call);
  }

  async createTaskPushNotificationConfig(
    params: CreateTaskPushNotificationConfigParams,
    call?: CallContext,
  ): Promise<TaskPushNotificationConfig> {
    const result = await this.rpc(JSON_RPC_METHODS.PUSH_SET, params, call);
    if (!isTaskPushNotificationConfig(result)) throw A2AError.invalidAgentResponse('Malformed push config');
    return result;
  }

  async getTaskPushNotificationConfig(
    params: TaskPushNotificationConfigParams,
    call?: CallContext,
  ): Promise<TaskPushNotificationConfig> {
    const result = await this.rpc(JSON_RPC_METHODS.PUSH_GET, params, call);
    if (!isTaskPushNotificationConfig(result)) throw A2AError.invalidAgentResponse('Malformed push config');
    return result;
  }

  async listTaskPushNotificationConfigs(
    params: ListTaskPushNotificationConfigsParams,
    call?: CallContext,
  ): Promise<TaskPushNotificationConfig[]> {
    const result = await this.rpc(JSON_RPC_METHODS.PUSH_LIST, params, call);
    if (!Array.isArray(result) || !result.every(isTaskPushNotificationConfig)) {
      throw A2AError.invalidAgentResponse('Malformed push config list');
    }
    return result;
  }

  async deleteTaskPushNotificationConfig(
    params: TaskPushNotificationConfigParams,
    call?: CallContext,
  ): Promise<void> {
    await this.rpc(JSON_RPC_METHODS.PUSH_DELETE, params, call);
  }

  async getExtendedAgentCard(call?: CallContext): Promise<AgentCard> {
    const result = await this.rpc(JSON_RPC_METHODS.EXTENDED_CARD, {}, call);
    if (!isAgentCard(result)) throw A2AError.invalidAgentResponse('Malformed agent card');
    return result;
  }

  private headers(call: CallContext | undefined, accept: string): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json', Accept: accept };
    if (this.config.bearerToken) headers.Authorization = `Bearer ${this.config.bearerToken}`;
    const version = call?.version ?? this.config.version;
    if (version) headers['A2A-Version'] = version;
    const extensions = call?.extensions ?? this.config.extensions;
    if (extensions.length > 0) headers['X-A2A-Extensions'] = extensions.join(', ');
    return headers;
  }

  private body(method: string, params: unknown): string {
    return JSON.stringify({ jsonrpc: '2.0', id: randomUUID(), method, params });
  }

  /** Record the extensions the server reports as active. */
  private noteExtensions(response: Response, call?: CallContext): void {
    const header = response.headers.get('X-A2A-Extensions');
    if (call && header) {
      call.activatedExtensions = header
        .split(',')
        .map((uri) => uri.trim())
        .filter((uri) => uri.length > 0);
    }
  }

  private async rpc(method: string, params: unknown, call?: CallContext): Promise<unknown> {
    this.config.logger?.('debug', 'A2A request', { method, url: this.config.url });
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      const response = await this.config.fetch(this.config.url, {
        method: 'POST',
        headers: this.headers(call, 'application/json'),
        body: this.body(method, params),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }
      this.noteExtensions(response, call);

      const payload: unknown = await response.json();
      if (!isRecord(payload)) throw A2AError.invalidAgentResponse('Malformed JSON-RPC response');
      if (payload.error !== undefined) throw errorFromJsonRpc(payload.error);
      return payload.result;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async rpcStream(method: string, params: unknown, call?: CallContext): Promise<TaskStream> {
    this.config.logger?.('debug', 'A2A stream request', { method, url: this.config.url });
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    let response: Response;
    try {
      response = await this.config.fetch(this.config.url, {
        method: 'POST',
        headers: this.headers(call, 'text/event-stream'),
        body: this.body(method, params),
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }
    this.noteExtensions(response, call);

    // A request refused before streaming starts comes back as a plain JSON-RPC error.
    const contentType = response.headers.get('Content-Type') ?? '';
    if (!contentType.includes('text/event-stream')) {
      const payload: unknown = await response.json();
      throw isRecord(payload) && payload.error !== undefined
        ? errorFromJsonRpc(payload.error)
        : A2AError.invalidAgentResponse('Expected an event stream');
    }
    if (!response.body) {
      throw new Error('Response body is null');
    }
    return new SseTaskStream(response.body, controller, this.config.timeout);
  }
}
