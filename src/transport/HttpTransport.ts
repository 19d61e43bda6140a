import { once } from 'node:events';
import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { StreamResponse } from '../types/events.js';
import type { CallContext, CallerIdentity, TaskStream } from '../types/handler.js';
import type { Logger } from '../types/plugin.js';
import type { TransportHost, TransportPlugin } from '../types/transport.js';
import { A2AError } from '../errors/A2AError.js';
import { JsonRpcBinding, type JsonRpcId } from '../bindings/JsonRpcBinding.js';
import { RestBinding } from '../bindings/RestBinding.js';
import { parseExtensionHeader } from '../negotiation/ExtensionNegotiator.js';

export const WELL_KNOWN_PATH = '/.well-known/agent-card.json';
export const VERSION_HEADER = 'a2a-version';
export const EXTENSIONS_HEADER = 'x-a2a-extensions';
export const LAST_EVENT_ID_HEADER = 'last-event-id';

/** Resolve the caller of a request. Undefined means anonymous; throwing answers 401. */
export type Authenticator = (req: IncomingMessage) => CallerIdentity | undefined | Promise<CallerIdentity | undefined>;

export interface HttpTransportConfig {
  /** Port to listen on (default: 3000). */
  port?: number;
  /** Hostname to bind to (default: '0.0.0.0'). */
  host?: string;
  /** URL path for JSON-RPC requests (default: '/'). */
  path?: string;
  /** Prefix of the REST routes (default: '/v1'). */
  restPrefix?: string;
  /** Request timeout in milliseconds (default: 30000). */
  timeout?: number;
  /** Largest accepted request body in bytes (default: 1 MiB). */
  maxBodyBytes?: number;
  authenticate?: Authenticator;
  /** Optional logger for diagnostic events. */
  logger?: Logger;
}

/** HTTP host: JSON-RPC and REST bindings, SSE for streams, and the well-known card. */
export class HttpTransport implements TransportPlugin {
  readonly name = 'http';

  private readonly config: Required<Omit<HttpTransportConfig, 'logger' | 'authenticate'>> & {
    logger?: Logger;
    authenticate?: Authenticator;
  };
  private server: Server | null = null;
  private host: TransportHost | null = null;
  private jsonRpc: JsonRpcBinding | null = null;
  private rest: RestBinding | null = null;
  private readonly openStreams = new Set<TaskStream>();

  constructor(config?: HttpTransportConfig) {
    this.config = {
      port: config?.port ?? 3000,
      host: config?.host ?? '0.0.0.0',
      path: config?.path ?? '/',
      restPrefix: config?.restPrefix ?? '/v1',
      timeout: config?.timeout ?? 30_000,
      maxBodyBytes: config?.maxBodyBytes ?? 1024 * 1024,
      authenticate: config?.authenticate,
      logger: config?.logger,
    };
  }

  /** Start the HTTP server in front of `host`. */
  async listen(host: TransportHost): Promise<void> {
    this.host = host;
    this.jsonRpc = new JsonRpcBinding(host.operations, this.config.logger);
    this.rest = new RestBinding(host.operations, this.config.logger);
    await this.ensureServer();
  }

  /** Stop the HTTP server. Open streams are detached first. */
  async close(): Promise<void> {
    for (const stream of this.openStreams) stream.close();
    this.openStreams.clear();
    if (this.server) {
      const server = this.server;
      this.server = null;
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    }
  }

  /** The port the server is listening on (undefined if not started). */
  get port(): number | undefined {
    const addr = this.server?.address();
    if (addr && typeof addr === 'object') return addr.port;
    return undefined;
  }

  private async ensureServer(): Promise<void> {
    if (this.server) return;

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        this.config.logger?.('error', 'HTTP request handler error', err);
        if (!res.headersSent) {
          sendJson(res, 500, { error: A2AError.internal().toJSON() });
        } else {
          res.end();
        }
      });
    });
    server.requestTimeout = this.config.timeout;
    this.server = server;

    await new Promise<void>((resolve) => {
      server.listen(this.config.port, this.config.host, () => resolve());
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const host = this.host;
    if (!host) {
      sendJson(res, 503, { error: 'Not ready' });
      return;
    }

    // Well-Known agent card endpoint
    if (url.pathname === WELL_KNOWN_PATH) {
      if (req.method === 'GET') {
        res.writeHead(200, {
          'Content-Type': 'application/json',
          'Access-Control-Allow-Origin': '*',
          'Cache-Control': 'public, max-age=300',
        });
        res.end(JSON.stringify(host.agentCard()));
        return;
      }
      if (req.method === 'OPTIONS') {
        res.writeHead(204, {
          'Access-Control-Allow-Origin': '*',
          'Access-Control-Allow-Methods': 'GET, OPTIONS',
          'Access-Control-Allow-Headers': 'Content-Type',
          'Access-Control-Max-Age': '86400',
        });
        res.end();
        return;
      }
    }

    const isRpc = req.method === 'POST' && url.pathname === this.config.path;
    const prefix = this.config.restPrefix;
    const isRest = url.pathname === prefix || url.pathname.startsWith(`${prefix}/`);
    if (!isRpc && !isRest) {
      sendJson(res, 404, { error: 'Not found' });
      return;
    }

    let call: CallContext;
    try {
      call = await this.callContext(req);
    } catch (err) {
      this.config.logger?.('warn', 'Authentication failed', err);
      sendJson(res, 401, { error: 'Unauthorized' });
      return;
    }

    if (isRpc) {
      await this.handleJsonRpc(req, res, call);
    } else {
      await this.handleRest(req, res, url, call);
    }
  }

  private async handleJsonRpc(req: IncomingMessage, res: ServerResponse, call: CallContext): Promise<void> {
    const binding = this.jsonRpc;
    if (!binding) return;

    let body: string;
    try {
      body = await this.readBody(req);
    } catch (err) {
      sendJson(res, 200, JsonRpcBinding.failure(null, err));
      return;
    }

    const outcome = await binding.handleText(body, call);
    if (outcome.kind === 'response') {
      sendJson(res, 200, outcome.response, echoHeaders(call));
      return;
    }
    const id: JsonRpcId = outcome.id;
    await this.pipeSse(res, outcome.stream, call, (event) => JsonRpcBinding.frame(id, event), (err) =>
      JsonRpcBinding.failure(id, err),
    );
  }

  private async handleRest(req: IncomingMessage, res: ServerResponse, url: URL, call: CallContext): Promise<void> {
    const binding = this.rest;
    if (!binding) return;

    let body: unknown;
    if (req.method === 'POST' || req.method === 'PUT') {
      try {
        const text = await this.readBody(req);
        body = text.trim() === '' ? undefined : JSON.parse(text);
      } catch (err) {
        const failure = RestBinding.errorResponse(err instanceof A2AError ? err : A2AError.parseError());
        sendJson(res, failure.status, failure.body);
        return;
      }
    }

    const outcome = await binding.handle(
      {
        method: req.method ?? 'GET',
        path: url.pathname.slice(this.config.restPrefix.length),
        query: url.searchParams,
        body,
      },
      call,
    );
    if (outcome.kind === 'response') {
      if (outcome.body === undefined) {
        res.writeHead(outcome.status, echoHeaders(call));
        res.end();
      } else {
        sendJson(res, outcome.status, outcome.body, echoHeaders(call));
      }
      return;
    }
    await this.pipeSse(res, outcome.stream, call, (event) => event, (err) => ({
      error: A2AError.from(err).toJSON(),
    }));
  }

  /**
   * Write each event as one SSE `data:` line, tagged with its log position.
   * A full socket stops reading from the stream, so a reader that cannot keep
   * up overflows its queue. A broken stream ends with an error event.
   */
  private async pipeSse(
    res: ServerResponse,
    stream: TaskStream,
    call: CallContext,
    toFrame: (event: StreamResponse) => unknown,
    toError: (err: unknown) => unknown,
  ): Promise<void> {
    this.openStreams.add(stream);
    res.on('close', () => {
      stream.close();
      this.openStreams.delete(stream);
    });
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      ...echoHeaders(call),
    });

    try {
      for await (const event of stream) {
        const id = stream.position === undefined ? '' : `id: ${stream.position}\n`;
        await writeFrame(res, `${id}data: ${JSON.stringify(toFrame(event))}\n\n`);
      }
    } catch (err) {
      this.config.logger?.('warn', 'Stream ended with error', err);
      res.write(`event: error\ndata: ${JSON.stringify(toError(err))}\n\n`);
    } finally {
      this.openStreams.delete(stream);
      res.end();
    }
  }

  private async callContext(req: IncomingMessage): Promise<CallContext> {
    const call: CallContext = {};
    const version = req.headers[VERSION_HEADER];
    if (typeof version === 'string' && version.trim() !== '') call.version = version.trim();
    const extensions = parseExtensionHeader(req.headers[EXTENSIONS_HEADER]);
    if (extensions.length > 0) call.extensions = extensions;
    const lastEventId = req.headers[LAST_EVENT_ID_HEADER];
    if (typeof lastEventId === 'string' && lastEventId.trim() !== '') call.lastEventId = lastEventId.trim();
    const caller = await this.config.authenticate?.(req);
    if (caller) call.caller = caller;
    return call;
  }

  private readBody(req: IncomingMessage): Promise<string> {
    const limit = this.config.maxBodyBytes;
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      req.on('data', (chunk: Buffer) => {
        size += chunk.length;
        // Keep reading past the limit so the error response can still be written.
        if (size <= limit) chunks.push(chunk);
      });
      req.on('end', () => {
        if (size > limit) {
          reject(A2AError.invalidRequest('Request body too large', { limit }));
          return;
        }
        resolve(Buffer.concat(chunks).toString('utf-8'));
      });
      req.on('error', reject);
    });
  }
}

/** Write one SSE frame, waiting for the socket to drain when its buffer is full. */
async function writeFrame(res: ServerResponse, frame: string): Promise<void> {
  if (res.write(frame) || res.destroyed) return;
  const waiting = new AbortController();
  try {
    await Promise.race([
      once(res, 'drain', { signal: waiting.signal }),
      once(res, 'close', { signal: waiting.signal }),
    ]);
  } finally {
    waiting.abort();
  }
}

function sendJson(
  res: ServerResponse,
  status: number,
  body: unknown,
  headers: Record<string, string> = {},
): void {
  res.writeHead(status, { 'Content-Type': 'application/json', ...headers });
  res.end(JSON.stringify(body));
}

/** Echo the extensions in effect, when any were activated. */
function echoHeaders(call: CallContext): Record<string, string> {
  const activated = call.activatedExtensions ?? [];
  return activated.length > 0 ? { 'X-A2A-Extensions': activated.join(', ') } : {};
}
