import { describe, it, expect, vi } from 'vitest';
import { RestBinding, queryParams, type RestRequest } from '../../src/bindings/RestBinding.js';
import { A2AError } from '../../src/errors/A2AError.js';
import { collect, fixedStream, sampleTask, stubOperations } from '../helpers/operations.js';

const request = (method: string, path: string, body?: unknown, query = ''): RestRequest => ({
  method,
  path,
  query: new URLSearchParams(query),
  body,
});

describe('RestBinding.route', () => {
  it.each([
    ['POST', '/message:send', { op: 'send' }],
    ['POST', '/message:stream', { op: 'stream' }],
    ['GET', '/tasks', { op: 'list' }],
    ['GET', '/card', { op: 'card' }],
    ['GET', '/tasks/t1', { op: 'get', taskId: 't1' }],
    ['POST', '/tasks/t1:cancel', { op: 'cancel', taskId: 't1' }],
    ['GET', '/tasks/t1:subscribe', { op: 'subscribe', taskId: 't1' }],
    ['POST', '/tasks/t1/pushNotificationConfigs', { op: 'pushCreate', taskId: 't1' }],
    ['GET', '/tasks/t1/pushNotificationConfigs', { op: 'pushList', taskId: 't1' }],
    ['GET', '/tasks/t1/pushNotificationConfigs/p1', { op: 'pushGet', taskId: 't1', configId: 'p1' }],
    ['DELETE', '/tasks/t1/pushNotificationConfigs/p1', { op: 'pushDelete', taskId: 't1', configId: 'p1' }],
    ['GET', '/tasks/a%20b', { op: 'get', taskId: 'a b' }],
  ])('%s %s', (method, path, route) => {
    expect(RestBinding.route(method, path)).toEqual(route);
  });

  it.each([
    ['GET', '/message:send'],
    ['DELETE', '/tasks/t1'],
    ['PUT', '/tasks/t1/pushNotificationConfigs'],
    ['GET', '/tasks/t1:explode'],
    ['GET', '/elsewhere'],
  ])('has no route for %s %s', (method, path) => {
    expect(RestBinding.route(method, path)).toBeUndefined();
  });
});

describe('queryParams', () => {
  it('converts integers and booleans it knows', () => {
    expect(queryParams(new URLSearchParams('pageSize=10&historyLength=x&includeArtifacts=true&contextId=5'))).toEqual({
      pageSize: 10,
      historyLength: 'x',
      includeArtifacts: true,
      contextId: '5',
    });
  });
});

describe('RestBinding', () => {
  it('sends a message and answers 200', async () => {
    const sendMessage = vi.fn(async () => ({ task: sampleTask() }));
    const binding = new RestBinding(stubOperations({ sendMessage }));
    const message = { messageId: 'm1', role: 'user', parts: [{ text: 'hi' }] };

    const outcome = await binding.handle(request('POST', '/message:send', { message }));
    expect(outcome).toEqual({ kind: 'response', status: 200, body: { task: sampleTask() } });
    expect(sendMessage).toHaveBeenCalledWith({ message }, {});
  });

  it('passes query filters to listTasks', async () => {
    const listTasks = vi.fn(async () => ({ tasks: [], nextPageToken: '', pageSize: 5, totalSize: 0 }));
    const binding = new RestBinding(stubOperations({ listTasks }));
    await binding.handle(request('GET', '/tasks', undefined, 'contextId=c1&pageSize=5&status=working'));
    expect(listTasks).toHaveBeenCalledWith({ contextId: 'c1', pageSize: 5, status: 'working' }, {});
  });

  it('reads the task id from the path', async () => {
    const getTask = vi.fn(async () => sampleTask());
    const binding = new RestBinding(stubOperations({ getTask }));
    await binding.handle(request('GET', '/tasks/t1', undefined, 'historyLength=2'));
    expect(getTask).toHaveBeenCalledWith({ id: 't1', historyLength: 2 }, {});
  });

  it('uses the body as the push config', async () => {
    const createTaskPushNotificationConfig = vi.fn(async () => ({
      taskId: 't1',
      pushNotificationConfig: { id: 'p1', url: 'https://hooks.example.com/' },
    }));
    const binding = new RestBinding(stubOperations({ createTaskPushNotificationConfig }));
    await binding.handle(request('POST', '/tasks/t1/pushNotificationConfigs', { url: 'https://hooks.example.com/' }));
    expect(createTaskPushNotificationConfig).toHaveBeenCalledWith(
      { taskId: 't1', pushNotificationConfig: { url: 'https://hooks.example.com/' } },
      {},
    );
  });

  it('answers delete with 204 and no body', async () => {
    const binding = new RestBinding(stubOperations({ deleteTaskPushNotificationConfig: async () => {} }));
    expect(await binding.handle(request('DELETE', '/tasks/t1/pushNotificationConfigs/p1'))).toEqual({
      kind: 'response',
      status: 204,
    });
  });

  it('opens a stream on subscribe', async () => {
    const binding = new RestBinding(stubOperations({ subscribeToTask: async () => fixedStream([{ task: sampleTask() }]) }));
    const outcome = await binding.handle(request('GET', '/tasks/t1:subscribe'));
    expect(outcome.kind).toBe('stream');
    if (outcome.kind === 'stream') expect(await collect(outcome.stream)).toEqual([{ task: sampleTask() }]);
  });

  it('maps errors to HTTP statuses', async () => {
    const binding = new RestBinding(
      stubOperations({
        getTask: async ({ id }) => Promise.reject(A2AError.taskNotFound(id)),
        cancelTask: async ({ id }) => Promise.reject(A2AError.taskNotCancelable(id, 'completed')),
      }),
    );

    expect(await binding.handle(request('GET', '/tasks/t9'))).toEqual({
      kind: 'response',
      status: 404,
      body: { error: { code: -32001, reason: 'TASK_NOT_FOUND', message: 'Task not found', data: { taskId: 't9' } } },
    });
    const cancel = await binding.handle(request('POST', '/tasks/t1:cancel'));
    expect(cancel.kind === 'response' && cancel.status).toBe(409);
    const unknown = await binding.handle(request('GET', '/nowhere'));
    expect(unknown).toEqual({
      kind: 'response',
      status: 404,
      body: {
        error: {
          code: -32601,
          reason: 'METHOD_NOT_FOUND',
          message: 'Method not found: GET /nowhere',
          data: { method: 'GET /nowhere' },
        },
      },
    });
  });

  it('rejects a non-object body', async () => {
    const binding = new RestBinding(stubOperations());
    const outcome = await binding.handle(request('POST', '/tasks/t1:cancel', [1, 2]));
    expect(outcome).toMatchObject({ kind: 'response', status: 400 });
  });
});
