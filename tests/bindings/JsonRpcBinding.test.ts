import { describe, it, expect, vi } from 'vitest';
import { JsonRpcBinding, type JsonRpcOutcome, type JsonRpcResponse } from '../../src/bindings/JsonRpcBinding.js';
import { A2AError } from '../../src/errors/A2AError.js';
import { collect, fixedStream, sampleTask, stubOperations } from '../helpers/operations.js';

const message = { messageId: 'm1', role: 'user', parts: [{ text: 'hi' }] };

function response(outcome: JsonRpcOutcome): JsonRpcResponse {
  if (outcome.kind !== 'response') throw new Error('expected a unary response');
  return outcome.response;
}

describe('JsonRpcBinding', () => {
  it('answers a malformed body with a parse error and a null id', async () => {
    const binding = new JsonRpcBinding(stubOperations());
    expect(response(await binding.handleText('{nope'))).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32700, message: 'Malformed JSON', data: { reason: 'PARSE_ERROR' } },
    });
  });

  it.each([
    [[], 'Batch requests are not supported'],
    ['x', 'Request must be a JSON object'],
    [{ jsonrpc: '1.0', method: 'tasks/get', id: 1 }, 'jsonrpc must be "2.0"'],
    [{ jsonrpc: '2.0', id: 1 }, 'method must be a non-empty string'],
    [{ jsonrpc: '2.0', method: 'tasks/get', id: {} }, 'id must be a string, number or null'],
  ])('rejects the envelope %j', async (raw, reason) => {
    const binding = new JsonRpcBinding(stubOperations());
    const reply = response(await binding.handle(raw));
    expect('error' in reply && reply.error).toMatchObject({ code: -32600, message: reason });
  });

  it('keeps the request id on an invalid envelope', async () => {
    const binding = new JsonRpcBinding(stubOperations());
    expect(response(await binding.handle({ jsonrpc: '1.0', id: 7, method: 'x' })).id).toBe(7);
  });

  it('reports an unknown method', async () => {
    const binding = new JsonRpcBinding(stubOperations());
    expect(response(await binding.handle({ jsonrpc: '2.0', id: 'a', method: 'tasks/explode' }))).toEqual({
      jsonrpc: '2.0',
      id: 'a',
      error: {
        code: -32601,
        message: 'Method not found: tasks/explode',
        data: { reason: 'METHOD_NOT_FOUND', method: 'tasks/explode' },
      },
    });
  });

  it('dispatches message/send with validated params and the call context', async () => {
    const sendMessage = vi.fn(async () => ({ task: sampleTask() }));
    const binding = new JsonRpcBinding(stubOperations({ sendMessage }));
    const call = { version: '0.3' };

    const reply = response(
      await binding.handle({ jsonrpc: '2.0', id: 1, method: 'message/send', params: { message } }, call),
    );

    expect(reply).toEqual({ jsonrpc: '2.0', id: 1, result: { task: sampleTask() } });
    expect(sendMessage).toHaveBeenCalledWith({ message }, call);
  });

  it('turns invalid params into -32602 naming the field', async () => {
    const binding = new JsonRpcBinding(stubOperations());
    const reply = response(
      await binding.handle({ jsonrpc: '2.0', id: 2, method: 'tasks/get', params: { historyLength: 1 } }),
    );
    expect('error' in reply && reply.error).toEqual({
      code: -32602,
      message: 'id is required',
      data: { reason: 'INVALID_PARAMS', field: 'id' },
    });
  });

  it('maps protocol errors to their codes', async () => {
    const binding = new JsonRpcBinding(
      stubOperations({ getTask: async ({ id }) => Promise.reject(A2AError.taskNotFound(id)) }),
    );
    const reply = response(await binding.handle({ jsonrpc: '2.0', id: 3, method: 'tasks/get', params: { id: 'gone' } }));
    expect('error' in reply && reply.error).toEqual({
      code: -32001,
      message: 'Task not found',
      data: { reason: 'TASK_NOT_FOUND', taskId: 'gone' },
    });
  });

  it('hides unexpected errors behind an internal error and logs them', async () => {
    const logger = vi.fn();
    const binding = new JsonRpcBinding(
      stubOperations({ cancelTask: async () => Promise.reject(new Error('db down')) }),
      logger,
    );
    const reply = response(await binding.handle({ jsonrpc: '2.0', id: 4, method: 'tasks/cancel', params: { id: 't1' } }));
    expect('error' in reply && reply.error.code).toBe(-32603);
    expect(logger).toHaveBeenCalledWith('error', 'JSON-RPC handler error', expect.objectContaining({ method: 'tasks/cancel' }));
  });

  it('answers push config delete with a null result', async () => {
    const deleteTaskPushNotificationConfig = vi.fn(async () => {});
    const binding = new JsonRpcBinding(stubOperations({ deleteTaskPushNotificationConfig }));
    const reply = response(
      await binding.handle({
        jsonrpc: '2.0',
        id: 5,
        method: 'tasks/pushNotificationConfig/delete',
        params: { taskId: 't1', pushNotificationConfigId: 'p1' },
      }),
    );
    expect(reply).toEqual({ jsonrpc: '2.0', id: 5, result: null });
    expect(deleteTaskPushNotificationConfig).toHaveBeenCalledWith({ taskId: 't1', pushNotificationConfigId: 'p1' }, {});
  });

  it('opens a stream for message/stream and tasks/resubscribe', async () => {
    const events = [{ task: sampleTask() }];
    const binding = new JsonRpcBinding(
      stubOperations({
        sendStreamingMessage: async () => fixedStream(events),
        subscribeToTask: async () => fixedStream(events),
      }),
    );

    const send = await binding.handle({ jsonrpc: '2.0', id: 6, method: 'message/stream', params: { message } });
    const resubscribe = await binding.handle({ jsonrpc: '2.0', id: 7, method: 'tasks/resubscribe', params: { id: 't1' } });

    for (const [outcome, id] of [
      [send, 6],
      [resubscribe, 7],
    ] as const) {
      expect(outcome.kind).toBe('stream');
      if (outcome.kind === 'stream') {
        expect(outcome.id).toBe(id);
        expect(await collect(outcome.stream)).toEqual(events);
      }
    }
  });

  it('answers a stream that cannot open with a unary error', async () => {
    const binding = new JsonRpcBinding(
      stubOperations({ subscribeToTask: async () => Promise.reject(A2AError.terminalTask('t1', 'completed')) }),
    );
    const reply = response(await binding.handle({ jsonrpc: '2.0', id: 8, method: 'tasks/resubscribe', params: { id: 't1' } }));
    expect('error' in reply && reply.error.code).toBe(-32004);
  });

  it('wraps each stream event as a result frame', () => {
    expect(JsonRpcBinding.frame(9, { task: sampleTask() })).toEqual({ jsonrpc: '2.0', id: 9, result: { task: sampleTask() } });
  });
});
