import { WebSocketServer, type WebSocket as WsWebSocket } from 'ws';
import { once, type EventEmitter } from 'node:events';
import { createServer, type IncomingMessage, type Server as HttpServer } from 'node:http';
import type { CallContext, TaskStream } from '../types/handler.js';
import type { Logger } from '../types/plugin.js';
import type { TransportHost, TransportPlugin } from '../types/transport.js';
import { JsonRpcBinding, type JsonRpcId } from '../bindings/JsonRpcBinding.js';
import { parseExtensionHeader } from '../negotiation/ExtensionNegotiator.js';
import { EXTENSIONS_HEADER, VERSION_HEADER, type Authenticator } from './HttpTransport.js';

export interface WebSocketTransportConfig {
  /** Port to listen on (default: 8080). */
  port?: number;
  /** Hostname to bind to (default: '0.0.0.0'). */
  host?: string;
  /** Heartbeat interval in ms (default: 30000). Set to 0 to disable. */
  heartbeatInterval?: number;
  /** Bytes a socket may hold unsent before a stream stops reading events (default: 1 MiB). */
  maxBufferedBytes?: number;
  /** Resolves the caller once per connection, from the upgrade request. */
  authenticate?: Authenticator;
  /** Optional logger for diagnostic events. */
  logger?: Logger;
}

/**
 * JSON-RPC over WebSocket. Unary methods answer with one frame; streaming
 * methods send one frame per event, then `{ id, result: null }`.
 */
export class WebSocketTransport implements TransportPlugin {
  readonly name = 'websocket';

  private readonly config: Required<Omit<WebSocketTransportConfig, 'logger' | 'authenticate'>> & {
    logger?: Logger;
    authenticate?: Authenticator;
  };
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private binding: JsonRpcBinding | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private readonly alive = new WeakSet<WsWebSocket>();

  constructor(config?: WebSocketTransportConfig) {
    this.config = {
      port: config?.port ?? 8080,
      host: config?.host ?? '0.0.0.0',
      heartbeatInterval: config?.heartbeatInterval ?? 30_000,
      maxBufferedBytes: config?.maxBufferedBytes ?? 1024 * 1024,
      authenticate: config?.authenticate,
      logger: config?.logger,
    };
  }

  /** Start the WebSocket server in front of `host`. */
  async listen(host: TransportHost): Promise<void> {
    this.binding = new JsonRpcBinding(host.operations, this.config.logger);
    await this.ensureServer();
  }

  /** Stop the WebSocket server. */
  async close(): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }

    if (this.wss) {
      const wss = this.wss;
      this.wss = null;
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }

    if (this.httpServer) {
      const server = this.httpServer;
      this.httpServer = null;
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    }
  }

  /** The port the server is listening on (undefined if not started). */
  get port(): number | undefined {
    const addr = this.httpServer?.address();
    if (addr && typeof addr === 'object') return addr.port;
    return undefined;
  }

  private async ensureServer(): Promise<void> {
    if (this.wss) return;

    const httpServer = createServer();
    const wss = new WebSocketServer({ server: httpServer });
    this.httpServer = httpServer;
    this.wss = wss;

    wss.on('connection', (ws, req) => {
      this.alive.add(ws);
      ws.on('pong', () => this.alive.add(ws));

      const streams = new Set<TaskStream>();
      ws.on('close', () => {
        for (const stream of streams) stream.close();
        streams.clear();
      });

      const call = this.callContext(req);
      ws.on('message', (data) => {
        this.handleFrame(ws, data.toString(), call, streams).catch((err: unknown) => {
          this.config.logger?.('warn', 'Failed to process WebSocket message', err);
        });
      });
    });

    // Heartbeat
    if (this.config.heartbeatInterval > 0) {
      this.heartbeatTimer = setInterval(() => {
        this.wss?.clients.forEach((ws) => {
          if (!this.alive.has(ws)) {
            ws.terminate();
            return;
          }
          this.alive.delete(ws);
          ws.ping();
        });
      }, this.config.heartbeatInterval);
    }

    await new Promise<void>((resolve) => {
      httpServer.listen(this.config.port, this.config.host, () => resolve());
    });
  }

  private async handleFrame(
    ws: WsWebSocket,
    text: string,
    callPromise: Promise<CallContext | undefined>,
    streams: Set<TaskStream>,
  ): Promise<void> {
    const binding = this.binding;
    if (!binding) return;

    const base = await callPromise;
    if (!base) {
      ws.close(1008, 'Unauthorized');
      return;
    }
    // Each request negotiates on its own copy.
    const call: CallContext = { ...base };
    const outcome = await binding.handleText(text, call);
    if (outcome.kind === 'response') {
      send(ws, outcome.response);
      return;
    }

    const id: JsonRpcId = outcome.id;
    const stream = outcome.stream;
    streams.add(stream);
    try {
      for await (const event of stream) {
        await sendPaced(ws, JsonRpcBinding.frame(id, event), this.config.maxBufferedBytes);
      }
      send(ws, JsonRpcBinding.success(id, null));
    } catch (err) {
      send(ws, JsonRpcBinding.failure(id, err));
    } finally {
      streams.delete(stream);
    }
  }

  /** Undefined when authentication failed. */
  private async callContext(req: IncomingMessage): Promise<CallContext | undefined> {
    const call: CallContext = {};
    const version = req.headers[VERSION_HEADER];
    if (typeof version === 'string' && version.trim() !== '') call.version = version.trim();
    const extensions = parseExtensionHeader(req.headers[EXTENSIONS_HEADER]);
    if (extensions.length > 0) call.extensions = extensions;
    try {
      const caller = await this.config.authenticate?.(req);
      if (caller) call.caller = caller;
    } catch (err) {
      this.config.logger?.('warn', 'Authentication failed', err);
      return undefined;
    }
    return call;
  }
}

/** The socket surface stream pacing needs. */
export interface PacedSocket extends EventEmitter {
  readonly readyState: number;
  readonly OPEN: number;
  readonly bufferedAmount: number;
  send(data: string, cb: (err?: Error) => void): void;
}

function send(ws: WsWebSocket, payload: unknown): void {
  if (ws.readyState === ws.OPEN) ws.send(JSON.stringify(payload));
}

/**
 * Send a stream frame. Once more than `maxBufferedBytes` are waiting on the
 * socket, resolve only after this frame is written out or the socket closes.
 */
export async function sendPaced(ws: PacedSocket, payload: unknown, maxBufferedBytes: number): Promise<void> {
  if (ws.readyState !== ws.OPEN) return;
  const written = new Promise<void>((resolve) => {
    ws.send(JSON.stringify(payload), () => resolve());
  });
  if (ws.bufferedAmount <= maxBufferedBytes) return;
  const waiting = new AbortController();
  try {
    await Promise.race([written, once(ws, 'close', { signal: waiting.signal })]);
  } finally {
    waiting.abort();
  }
}
