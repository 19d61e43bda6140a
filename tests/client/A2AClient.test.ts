import { describe, it, expect, afterEach, vi } from 'vitest';
import { A2AServer, type A2AServerConfig } from '../../src/agent/A2AServer.js';
import { A2AClient, errorFromJsonRpc } from '../../src/client/A2AClient.js';
import { SchnorrCardSigner } from '../../src/crypto/AgentCardSigner.js';
import { A2AError } from '../../src/errors/A2AError.js';
import type { FetchLike } from '../../src/push/PushNotificationDispatcher.js';
import { HttpTransport } from '../../src/transport/HttpTransport.js';
import type { CallContext } from '../../src/types/handler.js';
import type { AgentExecutor } from '../../src/types/executor.js';
import { rejectedA2AError } from '../helpers/errors.js';
import { textOf, userMessage } from '../helpers/executors.js';
import { OTHER_PRIVATE_KEY, TEST_PRIVATE_KEY, testCard } from '../helpers/fixtures.js';
import { collect } from '../helpers/operations.js';

const echo: AgentExecutor = {
  async execute(context, updater) {
    await updater.addArtifact({ artifactId: 'answer', parts: [{ text: `echo: ${textOf(context.message) ?? ''}` }] });
    await updater.complete();
  },
};

describe('errorFromJsonRpc', () => {
  it('rebuilds the protocol error from its code', () => {
    const err = errorFromJsonRpc({
      code: -32002,
      message: 'Task cannot be canceled in state completed',
      data: { reason: 'TASK_NOT_CANCELABLE', taskId: 't1', state: 'completed' },
    });
    expect(err).toBeInstanceOf(A2AError);
    expect(err.reason).toBe('TASK_NOT_CANCELABLE');
    expect(err.message).toBe('Task cannot be canceled in state completed');
    expect(err.data).toEqual({ taskId: 't1', state: 'completed' });
  });

  it('treats unknown codes and malformed errors as internal', () => {
    expect(errorFromJsonRpc({ code: -1, message: 'odd' }).reason).toBe('INTERNAL_ERROR');
    expect(errorFromJsonRpc('nope').message).toBe('Malformed error response');
    expect(errorFromJsonRpc({ code: -32001 }).data).toBeUndefined();
  });
});

describe('A2AClient', () => {
  const running: A2AServer[] = [];

  async function start(config: Partial<A2AServerConfig> = {}) {
    const http = new HttpTransport({ port: 0, host: '127.0.0.1' });
    const a2a = new A2AServer({ card: testCard(), executor: echo, env: {}, ...config }).transport(http);
    await a2a.start();
    running.push(a2a);
    const base = `http://127.0.0.1:${http.port ?? 0}`;
    return { a2a, base, client: new A2AClient({ url: `${base}/`, bearerToken: 'test-token' }) };
  }

  afterEach(async () => {
    for (const a2a of running) await a2a.stop();
    running.length = 0;
  });

  it('sends a message and reads the task back', async () => {
    const { client } = await start();
    const sent = await client.sendMessage({ message: userMessage('m1', 'hello'), configuration: { blocking: true } });
    const task = sent.task;
    if (!task) throw new Error('Expected a task');

    expect(task.status.state).toBe('completed');
    expect(task.artifacts?.[0]?.parts).toEqual([{ text: 'echo: hello' }]);

    const fetched = await client.getTask({ id: task.id });
    expect(fetched).toEqual(task);

    const listed = await client.listTasks({});
    expect(listed.tasks.map((t) => t.id)).toEqual([task.id]);
  });

  it('raises the server error as an A2AError', async () => {
    const { client } = await start();
    const err = await rejectedA2AError(client.getTask({ id: 'nope' }));
    expect(err.reason).toBe('TASK_NOT_FOUND');
    expect(err.data).toEqual({ taskId: 'nope' });
  });

  it('streams events over SSE', async () => {
    const { client } = await start();
    const events = await collect(await client.sendStreamingMessage({ message: userMessage('m1', 'hi') }));
    expect(events.map((event) => Object.keys(event)[0])).toEqual([
      'task',
      'statusUpdate',
      'artifactUpdate',
      'statusUpdate',
    ]);
    expect(events[3]?.statusUpdate?.final).toBe(true);
  });

  it('raises a refused stream as an A2AError', async () => {
    const { client } = await start({ card: testCard({ streaming: false }) });
    const err = await rejectedA2AError(client.sendStreamingMessage({ message: userMessage('m1', 'hi') }));
    expect(err.reason).toBe('UNSUPPORTED_OPERATION');
  });

  it('manages webhook configs', async () => {
    const { client } = await start({ executor: { async execute() {} } });
    const sent = await client.sendMessage({ message: userMessage('m1', 'hi') });
    const taskId = sent.task?.id ?? '';
    const config = { taskId, pushNotificationConfig: { id: 'cfg-1', url: 'https://hooks.example.com/a2a' } };

    expect(await client.createTaskPushNotificationConfig(config)).toEqual(config);
    expect(await client.getTaskPushNotificationConfig({ taskId, pushNotificationConfigId: 'cfg-1' })).toEqual(config);
    expect(await client.listTaskPushNotificationConfigs({ taskId })).toEqual([config]);
    await client.deleteTaskPushNotificationConfig({ taskId, pushNotificationConfigId: 'cfg-1' });
    expect(await client.listTaskPushNotificationConfigs({ taskId })).toEqual([]);
  });

  it('cancels a task', async () => {
    const { client } = await start({
      executor: {
        async execute(context) {
          await new Promise<void>((resolve) => context.signal.addEventListener('abort', () => resolve(), { once: true }));
        },
      },
    });
    const sent = await client.sendMessage({ message: userMessage('m1', 'wait') });
    const canceled = await client.cancelTask({ id: sent.task?.id ?? '' });
    expect(canceled.status.state).toBe('canceled');
  });

  it('records the extensions the server activated', async () => {
    const geo = 'https://ext.example.com/geo/v1';
    const { base } = await start({ card: testCard({ streaming: true, extensions: [{ uri: geo }] }) });
    const client = new A2AClient({ url: `${base}/`, extensions: [geo, 'https://unknown.example.com/x'] });
    const call: CallContext = {};

    await client.listTasks({}, call);
    expect(call.activatedExtensions).toEqual([geo]);
  });

  it('sends its headers', async () => {
    const fetch = vi.fn<FetchLike>(
      async () =>
        new Response(
          JSON.stringify({ jsonrpc: '2.0', id: 1, result: { tasks: [], nextPageToken: '', pageSize: 50, totalSize: 0 } }),
          { headers: { 'Content-Type': 'application/json' } },
        ),
    );
    const client = new A2AClient({ url: 'http://agent.test/', bearerToken: 'test-token', version: '0.3', fetch });
    await client.listTasks({});

    const headers = new Headers(fetch.mock.calls[0]?.[1].headers);
    expect(headers.get('authorization')).toBe('Bearer test-token');
    expect(headers.get('a2a-version')).toBe('0.3');
    expect(headers.get('content-type')).toBe('application/json');
  });

  describe('discover', () => {
    it('fetches the card from the well-known path', async () => {
      const { a2a, base } = await start();
      expect(await A2AClient.discover(`${base}/`)).toEqual(a2a.agentCard());
    });

    it('verifies the card signature when asked', async () => {
      const signer = new SchnorrCardSigner(TEST_PRIVATE_KEY);
      const { base } = await start({ signers: [signer] });

      const card = await A2AClient.discover(base, { verifyWith: signer.publicKey });
      expect(card.name).toBe('Research Agent');

      const other = new SchnorrCardSigner(OTHER_PRIVATE_KEY);
      await expect(A2AClient.discover(base, { verifyWith: other.publicKey })).rejects.toThrow(
        `Agent card signature verification failed for ${base}/.well-known/agent-card.json`,
      );
    });

    it('reports a failed fetch', async () => {
      const fetch = vi.fn(async () => new Response('missing', { status: 404 }));
      await expect(A2AClient.discover('http://agent.test', { fetch })).rejects.toThrow(
        'Discovery failed: HTTP 404 from http://agent.test/.well-known/agent-card.json',
      );
    });
  });
});
