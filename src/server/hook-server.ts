/**
 * Hook Server - HTTP callbacks from game processes plus a live event stream.
 *
 * The game server runs its pre/post turn commands as HTTP calls into this
 * server. Operators and bots read session views over HTTP and follow host
 * events over a WebSocket at /events.
 */

import { WebSocketServer, WebSocket } from 'ws';
import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { z } from 'zod';
import { ERROR_HTTP_STATUS, HostErrorCode, HostErrorInfo, OperationResult, isHostError } from '../errors';
import type { TurnHost } from '../orchestration/host';
import type { HostEvent } from '../orchestration/types';
import type { TurnAnnouncer } from './announcer';

/**
 * Protocol version for the event stream.
 */
export const PROTOCOL_VERSION = 1;

/**
 * Message types sent to stream clients.
 */
export type ServerMessage =
  | { type: 'PROTOCOL_INFO'; version: number }
  | { type: 'HOST_EVENT'; event: HostEvent }
  | { type: 'SUBSCRIBED'; sessionIds: string[] }
  | { type: 'ERROR'; message: string };

const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('SUBSCRIBE_SESSION'), sessionId: z.string().min(1) }),
  z.object({ type: z.literal('UNSUBSCRIBE_SESSION'), sessionId: z.string().min(1) }),
]);

/**
 * Message types received from stream clients.
 */
export type ClientMessage = z.infer<typeof ClientMessageSchema>;

const HookQuerySchema = z.object({
  session: z.string().min(1),
});

export interface HookServerOptions {
  host: TurnHost;
  /** Announces turns to chat relays while the server runs */
  announcer?: TurnAnnouncer;
}

/**
 * Per-client stream state. An empty filter means every session.
 */
interface StreamClient {
  socket: WebSocket;
  sessionIds: Set<string>;
}

class HttpError extends Error {
  constructor(readonly status: number, readonly code: HostErrorCode, message: string) {
    super(message);
  }
}

function json(res: ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

function sendError(res: ServerResponse, status: number, error: Pick<HostErrorInfo, 'code' | 'message'>): void {
  json(res, status, { status: 'error', code: error.code, message: error.message });
}

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new HttpError(400, HostErrorCode.INVALID_ARGUMENT, message);
  }
  return parsed.data;
}

/**
 * HTTP + WebSocket front of a TurnHost.
 */
export class HookServer {
  private host: TurnHost;
  private announcer: TurnAnnouncer | null;
  private httpServer: Server | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<StreamClient> = new Set();
  private unsubscribe: (() => void)[] = [];

  constructor(options: HookServerOptions) {
    this.host = options.host;
    this.announcer = options.announcer ?? null;
  }

  /**
   * Starts listening. Returns the bound port (useful with port 0).
   */
  async start(port: number, hostname: string = '127.0.0.1'): Promise<number> {
    const httpServer = createServer((req, res) => {
      this.handleHttpRequest(req, res).catch((err: unknown) => {
        console.error('[HookServer] Request handler crashed:', err);
        if (!res.headersSent) {
          sendError(res, 500, { code: HostErrorCode.INTERNAL_ERROR, message: 'Internal error' });
        }
      });
    });
    this.httpServer = httpServer;

    this.wss = new WebSocketServer({ server: httpServer, path: '/events' });
    this.wss.on('connection', (socket) => this.handleConnection(socket));

    this.unsubscribe.push(this.host.onEvent((event) => this.broadcast(event)));
    if (this.announcer) {
      this.unsubscribe.push(this.announcer.attach(this.host));
    }

    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(port, hostname, () => {
        httpServer.off('error', reject);
        resolve();
      });
    });

    const address = httpServer.address();
    const boundPort = typeof address === 'object' && address !== null ? address.port : port;
    console.log(`[HookServer] Listening on http://${hostname}:${boundPort}`);
    return boundPort;
  }

  /**
   * Stops the server and waits for announcements still being delivered.
   */
  async stop(): Promise<void> {
    for (const off of this.unsubscribe) off();
    this.unsubscribe = [];

    for (const client of this.clients) {
      client.socket.terminate();
    }
    this.clients.clear();

    const wss = this.wss;
    this.wss = null;
    if (wss) {
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }

    const httpServer = this.httpServer;
    this.httpServer = null;
    if (httpServer) {
      await new Promise<void>((resolve, reject) =>
        httpServer.close((err) => (err ? reject(err) : resolve()))
      );
    }

    await this.announcer?.flush();
  }

  // ===========================================================================
  // HTTP
  // ===========================================================================

  private async handleHttpRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const method = req.method ?? 'GET';

    try {
      if (method === 'GET' && (url.pathname === '/health' || url.pathname === '/')) {
        const sessions = this.host.listSessions();
        json(res, 200, {
          status: 'ok',
          sessions: sessions.length,
          running: sessions.filter((s) => s.lifecycle === 'LAUNCHED' || s.lifecycle === 'STARTED').length,
          clients: this.clients.size,
        });
        return;
      }

      if (method === 'GET' && url.pathname === '/sessions') {
        json(res, 200, this.host.listSessions());
        return;
      }

      const sessionMatch = url.pathname.match(/^\/sessions\/([^/]+)$/);
      if (method === 'GET' && sessionMatch) {
        this.respond(res, 200, await this.host.getSessionView(decodeURIComponent(sessionMatch[1])));
        return;
      }

      if (method === 'POST' && url.pathname === '/hooks/pre-advance') {
        const { session } = parseOrThrow(HookQuerySchema, Object.fromEntries(url.searchParams));
        this.respond(res, 200, await this.host.preAdvanceHook(session));
        return;
      }

      if (method === 'POST' && url.pathname === '/hooks/post-advance') {
        const { session } = parseOrThrow(HookQuerySchema, Object.fromEntries(url.searchParams));
        this.respond(res, 200, await this.host.postAdvanceHook(session));
        return;
      }

      sendError(res, 404, { code: HostErrorCode.INVALID_ARGUMENT, message: `No route for ${method} ${url.pathname}` });
    } catch (err) {
      if (err instanceof HttpError) {
        sendError(res, err.status, { code: err.code, message: err.message });
        return;
      }
      if (isHostError(err)) {
        sendError(res, ERROR_HTTP_STATUS[err.code], err);
        return;
      }
      throw err;
    }
  }

  private respond<T>(res: ServerResponse, status: number, result: OperationResult<T>): void {
    if (result.ok) {
      json(res, status, { status: 'ok', value: result.value });
    } else {
      sendError(res, ERROR_HTTP_STATUS[result.error.code], result.error);
    }
  }

  // ===========================================================================
  // Event stream
  // ===========================================================================

  private handleConnection(socket: WebSocket): void {
    const client: StreamClient = { socket, sessionIds: new Set() };
    this.clients.add(client);
    this.sendToClient(socket, { type: 'PROTOCOL_INFO', version: PROTOCOL_VERSION });

    socket.on('message', (data) => {
      let raw: unknown;
      try {
        raw = JSON.parse(data.toString());
      } catch {
        this.sendToClient(socket, { type: 'ERROR', message: 'Invalid message format' });
        return;
      }
      const parsed = ClientMessageSchema.safeParse(raw);
      if (!parsed.success) {
        this.sendToClient(socket, { type: 'ERROR', message: 'Unknown message type' });
        return;
      }
      this.handleClientMessage(client, parsed.data);
    });

    socket.on('close', () => {
      this.clients.delete(client);
    });
  }

  private handleClientMessage(client: StreamClient, message: ClientMessage): void {
    switch (message.type) {
      case 'SUBSCRIBE_SESSION':
        client.sessionIds.add(message.sessionId);
        break;
      case 'UNSUBSCRIBE_SESSION':
        client.sessionIds.delete(message.sessionId);
        break;
    }
    this.sendToClient(client.socket, { type: 'SUBSCRIBED', sessionIds: Array.from(client.sessionIds) });
  }

  private sendToClient(socket: WebSocket, message: ServerMessage): void {
    if (socket.readyState === WebSocket.OPEN) {
      socket.send(JSON.stringify({ v: PROTOCOL_VERSION, ...message }));
    }
  }

  private broadcast(event: HostEvent): void {
    const data = JSON.stringify({ v: PROTOCOL_VERSION, type: 'HOST_EVENT', event });
    for (const client of this.clients) {
      if (client.sessionIds.size > 0 && !client.sessionIds.has(event.sessionId)) continue;
      if (client.socket.readyState === WebSocket.OPEN) {
        client.socket.send(data);
      }
    }
  }
}
