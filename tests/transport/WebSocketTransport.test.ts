import { describe, it, expect, afterEach } from 'vitest';
import { EventEmitter } from 'node:events';
import WebSocket from 'ws';
import { A2AServer } from '../../src/agent/A2AServer.js';
import {
  WebSocketTransport,
  sendPaced,
  type PacedSocket,
  type WebSocketTransportConfig,
} from '../../src/transport/WebSocketTransport.js';
import type { AgentExecutor } from '../../src/types/executor.js';
import { textOf, userMessage } from '../helpers/executors.js';
import { testCard } from '../helpers/fixtures.js';
import { field, rpc } from '../helpers/http.js';

const echo: AgentExecutor = {
  async execute(context, updater) {
    await updater.addArtifact({ artifactId: 'answer', parts: [{ text: `echo: ${textOf(context.message) ?? ''}` }] });
    await updater.complete();
  },
};

function open(url: string, headers: Record<string, string> = {}): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url, { headers });
    ws.once('open', () => resolve(ws));
    ws.once('error', reject);
  });
}

/** Collect frames until one satisfies `done`. */
function receive(ws: WebSocket, done: (frame: unknown) => boolean): Promise<unknown[]> {
  return new Promise((resolve) => {
    const frames: unknown[] = [];
    const onMessage = (data: WebSocket.RawData) => {
      const frame: unknown = JSON.parse(data.toString());
      frames.push(frame);
      if (done(frame)) {
        ws.off('message', onMessage);
        resolve(frames);
      }
    };
    ws.on('message', onMessage);
  });
}

describe('WebSocketTransport', () => {
  const running: A2AServer[] = [];
  const sockets: WebSocket[] = [];

  async function start(config: WebSocketTransportConfig = {}) {
    const transport = new WebSocketTransport({ port: 0, host: '127.0.0.1', heartbeatInterval: 0, ...config });
    const a2a = new A2AServer({ card: testCard(), executor: echo, env: {} }).transport(transport);
    await a2a.start();
    running.push(a2a);
    return `ws://127.0.0.1:${transport.port ?? 0}`;
  }

  async function connect(url: string, headers?: Record<string, string>): Promise<WebSocket> {
    const ws = await open(url, headers);
    sockets.push(ws);
    return ws;
  }

  afterEach(async () => {
    for (const ws of sockets) ws.close();
    sockets.length = 0;
    for (const a2a of running) await a2a.stop();
    running.length = 0;
  });

  it('has name "websocket"', () => {
    expect(new WebSocketTransport().name).toBe('websocket');
  });

  it('answers a unary request with one frame', async () => {
    const ws = await connect(await start());
    const reply = receive(ws, (frame) => field(frame, 'id') === 'u1');
    ws.send(JSON.stringify(rpc('message/send', { message: userMessage('m1', 'hi'), configuration: { blocking: true } }, 'u1')));

    const [frame] = await reply;
    expect(field(frame, 'result', 'task', 'status', 'state')).toBe('completed');
    expect(field(frame, 'result', 'task', 'artifacts', 0, 'parts', 0, 'text')).toBe('echo: hi');
  });

  it('streams one frame per event and ends with a null result', async () => {
    const ws = await connect(await start());
    const reply = receive(ws, (frame) => field(frame, 'result') === null);
    ws.send(JSON.stringify(rpc('message/stream', { message: userMessage('m1', 'hi') }, 's1')));

    const frames = await reply;
    expect(frames).toHaveLength(5);
    expect(frames.every((frame) => field(frame, 'id') === 's1')).toBe(true);
    expect(field(frames[0], 'result', 'task', 'status', 'state')).toBe('submitted');
    expect(field(frames[3], 'result', 'statusUpdate', 'status', 'state')).toBe('completed');
  });

  it('returns protocol errors as JSON-RPC errors', async () => {
    const ws = await connect(await start());
    const reply = receive(ws, (frame) => field(frame, 'id') === 9);
    ws.send(JSON.stringify(rpc('tasks/get', { id: 'nope' }, 9)));

    const [frame] = await reply;
    expect(field(frame, 'error')).toEqual({
      code: -32001,
      message: 'Task not found',
      data: { reason: 'TASK_NOT_FOUND', taskId: 'nope' },
    });
  });

  it('closes the connection with 1008 when authentication fails', async () => {
    const url = await start({
      authenticate: (req) => {
        if (req.headers['x-user'] === 'intruder') throw new Error('bad credentials');
        return undefined;
      },
    });
    const ws = await connect(url, { 'X-User': 'intruder' });
    const closed = new Promise<number>((resolve) => ws.once('close', (code) => resolve(code)));
    ws.send(JSON.stringify(rpc('tasks/list', {})));
    expect(await closed).toBe(1008);
  });

  it('uses the caller resolved at connection time', async () => {
    const url = await start({
      authenticate: (req) => {
        const user = req.headers['x-user'];
        return typeof user === 'string' ? { tenant: 'acme', subject: user } : undefined;
      },
    });
    const alice = await connect(url, { 'X-User': 'alice' });
    const bob = await connect(url, { 'X-User': 'bob' });

    const sent = receive(alice, (frame) => field(frame, 'id') === 1);
    alice.send(JSON.stringify(rpc('message/send', { message: userMessage('m1', 'hi'), configuration: { blocking: true } }, 1)));
    const [created] = await sent;
    const id = field(created, 'result', 'task', 'id');

    const listed = receive(bob, (frame) => field(frame, 'id') === 2);
    bob.send(JSON.stringify(rpc('tasks/get', { id }, 2)));
    const [denied] = await listed;
    expect(field(denied, 'error', 'code')).toBe(-32001);
  });
});

/** A socket whose writes complete only when flushed. */
class SlowSocket extends EventEmitter implements PacedSocket {
  readyState = 1;
  readonly OPEN = 1;
  bufferedAmount = 0;
  readonly sent: string[] = [];
  private readonly callbacks: (() => void)[] = [];

  send(data: string, cb: (err?: Error) => void): void {
    this.sent.push(data);
    this.bufferedAmount += data.length;
    this.callbacks.push(() => cb());
  }

  flush(): void {
    this.bufferedAmount = 0;
    for (const callback of this.callbacks.splice(0)) callback();
  }
}

function settled(promise: Promise<void>): () => boolean {
  let done = false;
  void promise.then(() => {
    done = true;
  });
  return () => done;
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('sendPaced', () => {
  it('returns at once while the socket keeps up', async () => {
    const socket = new SlowSocket();
    await sendPaced(socket, { n: 1 }, 100);
    expect(socket.sent).toEqual(['{"n":1}']);
  });

  it('waits for the frame to be written once too much is buffered', async () => {
    const socket = new SlowSocket();
    const isDone = settled(sendPaced(socket, { text: 'x'.repeat(200) }, 100));
    await tick();
    expect(isDone()).toBe(false);

    socket.flush();
    await tick();
    expect(isDone()).toBe(true);
  });

  it('stops waiting when the socket closes', async () => {
    const socket = new SlowSocket();
    const isDone = settled(sendPaced(socket, { text: 'x'.repeat(200) }, 100));
    await tick();
    socket.emit('close');
    await tick();
    expect(isDone()).toBe(true);
  });

  it('skips a socket that is no longer open', async () => {
    const socket = new SlowSocket();
    socket.readyState = 3;
    await sendPaced(socket, { n: 1 }, 100);
    expect(socket.sent).toEqual([]);
  });
});
