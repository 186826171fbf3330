/**
 * RemoteSession: the command language over TCP
 *
 * One listening socket for the life of the service, one client served at
 * a time. A client sends one request per line, written exactly as it
 * would be typed after the program name on the command line; replies are
 * plain text lines, errors are "error: ..." lines. A blank line or the
 * client closing its end finishes the session; a blank line is how a
 * client says goodbye while keeping its socket open for the replies.
 *
 *   idle     no client; the next queued connection is taken
 *   serving  a client is connected; its requests run through the shared
 *            parser and dispatcher with the client's own output sink
 *
 * Connections that arrive while serving stay paused in arrival order
 * until the current client is gone.
 *
 * Failure policy:
 *   - expected errors (usage, bad argument, device, config, interrupted)
 *     are reported to the client, the client is dropped, the service
 *     keeps listening
 *   - anything else is reported, the client is dropped, and the service
 *     shuts down: serve() rejects with the original error
 */

import { EventEmitter } from 'events';
import * as net from 'net';
import { Logger } from 'pino';
import { ConfigError, Result, UsageError, errorMessage, fail } from '../errors';
import { getLogger } from '../logger';
import { RequestHandler } from '../commands/dispatcher';
import { SocketSink } from '../commands/output-sink';
import { RequestGrammar, parseRequest, tokenize } from '../commands/request-parser';
import { LineReader } from './line-reader';

export type SessionState = 'idle' | 'serving';

export interface RemoteSessionOptions {
  handler: RequestHandler;
  grammar: RequestGrammar;
  port: number;
  host?: string;
}

interface Waiter {
  resolve: () => void;
  reject: (err: unknown) => void;
}

export class RemoteSession extends EventEmitter {
  private handler: RequestHandler;
  private grammar: RequestGrammar;
  private port: number;
  private host: string;
  private server: net.Server | null = null;
  private pending: net.Socket[] = [];
  private current: net.Socket | null = null;
  private stopped = false;
  private fatal: { error: unknown } | null = null;
  private waiters: Waiter[] = [];
  private log: Logger;

  constructor(options: RemoteSessionOptions) {
    super();
    this.handler = options.handler;
    this.grammar = options.grammar;
    this.port = options.port;
    this.host = options.host ?? '0.0.0.0';
    this.log = getLogger('RemoteSession');
  }

  get state(): SessionState {
    return this.current ? 'serving' : 'idle';
  }

  /** Number of connections waiting for the current client to leave */
  get queued(): number {
    return this.pending.length;
  }

  /** Open the listening socket; resolves with the bound port */
  async listen(): Promise<number> {
    if (this.server) throw new UsageError('Session is already listening');

    const server = net.createServer({ pauseOnConnect: true }, (socket) => this.enqueue(socket));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        this.server = null;
        reject(new ConfigError(`Cannot listen on ${this.host}:${this.port}: ${err.message}`, { cause: err }));
      };
      server.once('error', onError);
      server.listen(this.port, this.host, () => {
        server.off('error', onError);
        resolve();
      });
    });

    server.on('error', (err: Error) => {
      this.log.fatal({ err }, 'Listening socket failed');
      void this.shutdown(err);
    });

    const address = server.address();
    const port = address !== null && typeof address === 'object' ? address.port : this.port;
    this.log.info(`Listening for remote commands on ${this.host}:${port}`);
    return port;
  }

  /** Settles when the service stops: resolves after close(), rejects on a fatal failure */
  serve(): Promise<void> {
    if (this.fatal) return Promise.reject(this.fatal.error);
    if (this.stopped) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  async close(): Promise<void> {
    if (this.stopped) return;
    this.log.info('Closing remote session service');
    await this.shutdown();
  }

  // --- Connection handling ---

  private enqueue(socket: net.Socket): void {
    if (this.stopped) {
      socket.destroy();
      return;
    }
    this.pending.push(socket);
    if (this.current) {
      this.log.info(`Connection from ${describe(socket)} waiting (${this.pending.length} queued)`);
    }
    this.pump();
  }

  private pump(): void {
    if (this.current || this.stopped) return;
    const next = this.pending.shift();
    if (!next) return;

    this.current = next;
    this.emit('state', this.state);
    this.serveClient(next).then(
      () => {
        this.current = null;
        this.emit('state', this.state);
        this.pump();
      },
      (err: unknown) => {
        this.current = null;
        this.log.fatal({ err }, 'Unexpected failure, stopping remote session service');
        void this.shutdown(err);
      },
    );
  }

  private async serveClient(socket: net.Socket): Promise<void> {
    const client = describe(socket);
    const sink = new SocketSink(socket);
    const reader = new LineReader(socket);
    const controller = new AbortController();

    socket.on('close', () => controller.abort());
    socket.on('error', (err: Error) => this.log.warn(`Client ${client}: ${err.message}`));
    socket.resume();
    this.log.info(`Client ${client} connected`);

    try {
      for (;;) {
        const line = await reader.readLine();
        if (line === null || line.trim() === '') break;

        this.log.debug({ client, line }, 'request');
        const result = await this.handleLine(line, sink, controller.signal);
        if (!result.ok) {
          this.log.warn({ client, kind: result.error.kind }, `Request failed: ${result.error.message}`);
          sink.error(result.error.message);
          break;
        }
      }
    } catch (err) {
      sink.error(`internal failure: ${errorMessage(err)}`);
      throw err;
    } finally {
      socket.end(() => socket.destroy());
      this.log.info(`Client ${client} disconnected`);
    }
  }

  private async handleLine(line: string, sink: SocketSink, signal: AbortSignal): Promise<Result<void>> {
    const tokens = tokenize(line);
    if (!tokens.ok) return tokens;

    const request = parseRequest(tokens.value, this.grammar);
    if (!request.ok) return request;

    if (request.value.command === 'listen') {
      return fail(new UsageError('Already serving a remote session; listen cannot be nested'));
    }
    return this.handler.dispatch(request.value, sink, signal);
  }

  private async shutdown(error?: unknown): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    if (error !== undefined) this.fatal = { error };

    for (const socket of this.pending) socket.destroy();
    this.pending = [];
    this.current?.destroy();

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (error !== undefined) waiter.reject(error);
      else waiter.resolve();
    }
  }
}

function describe(socket: net.Socket): string {
  return `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? '?'}`;
}
