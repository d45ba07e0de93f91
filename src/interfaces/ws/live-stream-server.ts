import type { IncomingMessage, Server as HttpServer } from 'node:http';
import type { Duplex } from 'node:stream';
import { Socket } from 'node:net';
import { once } from 'node:events';
import { createHash } from 'node:crypto';
import type { Logger } from 'pino';
import type { Event } from '../../domain/index.js';
import {
  traceIdSchema,
  type CloseReason,
  type EventSink,
  type IngestionHub,
  type Subscription,
} from '../../application/index.js';
import {
  OPCODE_CLOSE,
  OPCODE_PING,
  OPCODE_PONG,
  encodeCloseFrame,
  encodeControlFrame,
  encodeTextFrame,
  tryParseFrame,
} from './frames.js';

/**
 * Live event stream over a minimal WebSocket server on the raw HTTP upgrade.
 *
 * Each client is one hub subscriber:
 * - `?trace_id=<id>` restricts the stream to one trace
 * - `?trace_id=<id>&replay=1` sends the trace's earlier events first
 *
 * Every event goes out as one text frame holding the Event JSON, in
 * acceptance order. Inbound data frames are ignored; PING, PONG and
 * CLOSE are handled per RFC 6455. A PING goes out every 30 s and
 * clients that did not answer the previous one are dropped.
 */

const WS_GUID = '258EAFA5-E914-47DA-95CA-5AB9FC11CF97';
const HEARTBEAT_INTERVAL_MS = 30_000;
/** Clients only ever send control frames; anything bigger is abuse. */
const MAX_INBOUND_PAYLOAD = 64 * 1024;

const CLOSE_NORMAL = 1000;
const CLOSE_GOING_AWAY = 1001;
const CLOSE_POLICY_VIOLATION = 1008;

interface LiveClient {
  id: number;
  socket: Socket;
  alive: boolean;
  closed: boolean;
  buffer: Buffer;
  subscription: Subscription | null;
}

interface StreamQuery {
  traceId: string | undefined;
  replay: boolean;
}

export interface LiveStreamOptions {
  path: string;
  heartbeatIntervalMs?: number;
}

function rejectUpgrade(socket: Duplex, status: string): void {
  socket.end(`HTTP/1.1 ${status}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
}

/** Reads the stream query; `null` when it is invalid. */
export function parseStreamQuery(url: URL): StreamQuery | null {
  const rawTraceId = url.searchParams.get('trace_id');
  const replayParam = url.searchParams.get('replay');
  const replay = replayParam === '1' || replayParam === 'true';

  if (rawTraceId === null) {
    return replay ? null : { traceId: undefined, replay: false };
  }

  const traceId = traceIdSchema.safeParse(rawTraceId);
  if (!traceId.success) return null;
  return { traceId: traceId.data, replay };
}

export class LiveStreamServer {
  private readonly clients = new Set<LiveClient>();
  private readonly log: Logger;
  private readonly path: string;
  private readonly heartbeatIntervalMs: number;
  private pingInterval: ReturnType<typeof setInterval> | null = null;
  private nextClientId = 1;

  constructor(
    private readonly hub: Pick<IngestionHub, 'subscribe'>,
    log: Logger,
    options: LiveStreamOptions,
  ) {
    this.log = log.child({ component: 'live-stream' });
    this.path = options.path;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS;
  }

  /* ------------------------------------------------------------------ */
  /*  Attach to HTTP server                                             */
  /* ------------------------------------------------------------------ */

  attach(server: HttpServer): void {
    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });

    // Heartbeat: PING every interval, drop unresponsive clients
    this.pingInterval = setInterval(() => {
      for (const client of this.clients) {
        if (!client.alive) {
          this.log.debug({ clientId: client.id }, 'Heartbeat timeout — removing client');
          this.gracefulClose(client, 'heartbeat_timeout');
          continue;
        }
        client.alive = false;
        this.safeWrite(client, encodeControlFrame(OPCODE_PING));
      }
    }, this.heartbeatIntervalMs);
    this.pingInterval.unref();

    this.log.info({ path: this.path }, 'Live stream attached');
  }

  get clientCount(): number {
    return this.clients.size;
  }

  close(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
    for (const client of [...this.clients]) {
      this.safeWrite(client, encodeCloseFrame(CLOSE_GOING_AWAY, 'server shutdown'));
      this.gracefulClose(client, 'server_shutdown');
    }
  }

  /* ------------------------------------------------------------------ */
  /*  Private — handshake                                               */
  /* ------------------------------------------------------------------ */

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (url.pathname !== this.path || !(socket instanceof Socket)) {
      socket.destroy();
      return;
    }

    const key = req.headers['sec-websocket-key'];
    if (key === undefined || key === '') {
      rejectUpgrade(socket, '400 Bad Request');
      return;
    }

    const query = parseStreamQuery(url);
    if (query === null) {
      rejectUpgrade(socket, '400 Bad Request');
      return;
    }

    const accept = createHash('sha1').update(key + WS_GUID).digest('base64');

    socket.write(
      'HTTP/1.1 101 Switching Protocols\r\n' +
        'Upgrade: websocket\r\n' +
        'Connection: Upgrade\r\n' +
        `Sec-WebSocket-Accept: ${accept}\r\n` +
        '\r\n',
    );

    // After the upgrade the HTTP parser pushes EOF into the readable side;
    // with allowHalfOpen=false that would end the socket immediately.
    socket.allowHalfOpen = true;
    socket.setTimeout(0);
    socket.setNoDelay(true);
    socket.setKeepAlive(true, HEARTBEAT_INTERVAL_MS);

    const client: LiveClient = {
      id: this.nextClientId++,
      socket,
      alive: true,
      closed: false,
      buffer: head.length > 0 ? Buffer.from(head) : Buffer.alloc(0),
      subscription: null,
    };

    this.clients.add(client);
    this.log.info(
      { clientId: client.id, traceId: query.traceId, replay: query.replay, clientCount: this.clients.size },
      'Live stream client connected',
    );

    socket.on('data', (chunk: Buffer) => this.onData(client, chunk));
    socket.on('close', (hadError: boolean) => {
      this.gracefulClose(client, hadError ? 'close_error' : 'close');
    });
    socket.on('error', (err) => {
      if (!client.closed) {
        this.log.debug({ clientId: client.id, err }, 'Socket error event');
      }
      this.gracefulClose(client, 'error');
    });

    socket.resume();

    this.hub
      .subscribe(this.sinkFor(client), {
        traceId: query.traceId,
        replay: query.replay,
        onClose: (reason) => this.onSubscriptionClosed(client, reason),
      })
      .then((subscription) => {
        if (client.closed) {
          subscription.unsubscribe();
          return;
        }
        client.subscription = subscription;
      })
      .catch((err: unknown) => {
        this.log.warn({ err, clientId: client.id }, 'Live stream subscription failed');
        this.safeWrite(client, encodeCloseFrame(CLOSE_POLICY_VIOLATION, 'subscription failed'));
        this.gracefulClose(client, 'subscribe_failed');
      });
  }

  /* ------------------------------------------------------------------ */
  /*  Private — delivery                                                */
  /* ------------------------------------------------------------------ */

  /**
   * One text frame per event. Under socket backpressure the sink waits
   * for `drain`; the hub bounds that wait with its delivery timeout.
   */
  private sinkFor(client: LiveClient): EventSink {
    return async (event: Event) => {
      if (client.closed || client.socket.destroyed) {
        throw new Error(`Live stream client ${client.id} is closed`);
      }

      const flushed = client.socket.write(encodeTextFrame(JSON.stringify(event)));
      if (flushed) return;

      const waiting = new AbortController();
      try {
        await Promise.race([
          once(client.socket, 'drain', { signal: waiting.signal }),
          once(client.socket, 'close', { signal: waiting.signal }),
        ]);
      } finally {
        waiting.abort();
      }
    };
  }

  private onSubscriptionClosed(client: LiveClient, reason: CloseReason): void {
    client.subscription = null;
    if (client.closed || reason === 'unsubscribed') return;

    const code = reason === 'hub_closed' ? CLOSE_GOING_AWAY : CLOSE_POLICY_VIOLATION;
    this.safeWrite(client, encodeCloseFrame(code, reason));
    this.gracefulClose(client, reason);
  }

  /* ------------------------------------------------------------------ */
  /*  Private — inbound frames                                          */
  /* ------------------------------------------------------------------ */

  private onData(client: LiveClient, chunk: Buffer): void {
    if (client.closed) return;

    client.buffer = Buffer.concat([client.buffer, chunk]);

    // consume as many complete frames as possible
    while (client.buffer.length > 0) {
      let frame: ReturnType<typeof tryParseFrame>;
      try {
        frame = tryParseFrame(client.buffer, MAX_INBOUND_PAYLOAD);
      } catch (err: unknown) {
        this.log.warn({ clientId: client.id, err }, 'WebSocket frame parse error — closing client');
        this.safeWrite(client, encodeCloseFrame(CLOSE_POLICY_VIOLATION, 'malformed frame'));
        this.gracefulClose(client, 'frame_parse_error');
        return;
      }

      if (!frame) break; // need more bytes

      client.buffer = client.buffer.subarray(frame.nextOffset);
      client.alive = true; // any valid frame resets heartbeat

      if (frame.opcode === OPCODE_PONG) continue;

      if (frame.opcode === OPCODE_PING) {
        this.safeWrite(client, encodeControlFrame(OPCODE_PONG, frame.payload));
        continue;
      }

      if (frame.opcode === OPCODE_CLOSE) {
        this.safeWrite(client, encodeCloseFrame(CLOSE_NORMAL));
        this.gracefulClose(client, 'close_frame');
        return;
      }

      // TEXT / BINARY / CONTINUATION: the stream is one-way
    }
  }

  /* ------------------------------------------------------------------ */
  /*  Private — lifecycle                                               */
  /* ------------------------------------------------------------------ */

  /** Idempotent teardown; `reason` is logged so operators can see why a client dropped. */
  private gracefulClose(client: LiveClient, reason: string): void {
    if (client.closed) return;
    client.closed = true;
    this.clients.delete(client);

    const subscription = client.subscription;
    client.subscription = null;
    subscription?.unsubscribe();

    if (!client.socket.destroyed) {
      const socket = client.socket;
      // Flush any close frame before tearing the socket down.
      socket.end(() => socket.destroy());
    }

    this.log.info(
      { clientId: client.id, reason, clientCount: this.clients.size },
      'Live stream client disconnected',
    );
  }

  /** Write to socket with error guard. Returns true when the data was queued. */
  private safeWrite(client: LiveClient, data: Buffer): boolean {
    if (client.closed || client.socket.destroyed) return false;
    client.socket.write(data);
    return true;
  }
}
