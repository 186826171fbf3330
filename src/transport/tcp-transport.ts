/**
 * TCP line transport
 *
 * Talks to the meter (or its LAN gateway) over a plain TCP socket:
 *   -> one command per line, terminated by "\n"
 *   <- one reply per line; "ERR <code>[,<message>]" for device errors
 *
 * The socket is opened on first use. Only one request is ever in flight;
 * overlapping send() calls queue behind each other in call order. Each
 * request has its own timeout, optionally extended per call, and is
 * never retried.
 */

import * as net from 'net';
import { Logger } from 'pino';
import { DeviceError } from '../errors';
import { getLogger } from '../logger';
import { SendOptions, Transport, parseErrorReply } from './transport';

export interface TcpTransportOptions {
  host: string;
  port: number;
  timeoutMs?: number;
}

interface PendingRequest {
  command: string;
  resolve: (reply: string) => void;
  reject: (err: DeviceError) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class TcpTransport implements Transport {
  readonly target: string;

  private host: string;
  private port: number;
  private timeoutMs: number;
  private socket: net.Socket | null = null;
  private connecting: Promise<net.Socket> | null = null;
  private pending: PendingRequest | null = null;
  private buffer = '';
  private tail: Promise<unknown> = Promise.resolve();
  private log: Logger;

  constructor(options: TcpTransportOptions) {
    this.host = options.host;
    this.port = options.port;
    this.timeoutMs = options.timeoutMs ?? 3000;
    this.target = `${this.host}:${this.port}`;
    this.log = getLogger('TcpTransport');
  }

  send(command: string, options: SendOptions = {}): Promise<string> {
    const timeoutMs = this.timeoutMs + Math.max(0, options.extraTimeoutMs ?? 0);
    const run = this.tail.then(() => this.request(command, timeoutMs));
    // keep the chain alive whatever this request's outcome
    this.tail = run.catch(() => undefined);
    return run;
  }

  async close(): Promise<void> {
    this.dropSocket();
    this.failPending(new DeviceError(`Connection to ${this.target} closed`));
  }

  isConnected(): boolean {
    return this.socket !== null;
  }

  private async request(command: string, timeoutMs: number): Promise<string> {
    const sock = await this.connect();
    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        // a late reply would be taken as the answer to the next command
        this.dropSocket();
        this.failPending(new DeviceError(`No reply to "${command}" within ${timeoutMs}ms`));
      }, timeoutMs);
      this.pending = { command, resolve, reject, timer };
      this.log.debug({ command }, '->');
      sock.write(`${command}\n`);
    });
  }

  private connect(): Promise<net.Socket> {
    if (this.socket) return Promise.resolve(this.socket);
    if (this.connecting) return this.connecting;

    this.connecting = new Promise<net.Socket>((resolve, reject) => {
      const sock = new net.Socket();
      sock.setEncoding('utf8');
      sock.setNoDelay(true);

      const timer = setTimeout(() => {
        sock.destroy();
        reject(new DeviceError(`Timed out connecting to ${this.target}`));
      }, this.timeoutMs);

      sock.once('connect', () => {
        clearTimeout(timer);
        this.socket = sock;
        this.buffer = '';
        this.log.info(`Connected to ${this.target}`);
        resolve(sock);
      });

      sock.on('data', (chunk: string) => {
        if (this.socket !== sock) return;
        this.onData(chunk);
      });

      sock.on('error', (err: Error) => {
        clearTimeout(timer);
        if (this.socket !== sock) {
          reject(new DeviceError(`Cannot connect to ${this.target}: ${err.message}`, { cause: err }));
          return;
        }
        this.log.error(`Connection error: ${err.message}`);
        this.failPending(new DeviceError(`Connection to ${this.target} failed: ${err.message}`, { cause: err }));
      });

      sock.on('close', () => {
        if (this.socket !== sock) return;
        this.socket = null;
        this.log.info(`Disconnected from ${this.target}`);
        this.failPending(new DeviceError(`Connection to ${this.target} closed`));
      });

      sock.connect(this.port, this.host);
    }).finally(() => {
      this.connecting = null;
    });

    return this.connecting;
  }

  private onData(chunk: string): void {
    this.buffer += chunk;
    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newline + 1);
      this.onLine(line);
      newline = this.buffer.indexOf('\n');
    }
  }

  private onLine(line: string): void {
    const pending = this.pending;
    if (!pending) {
      this.log.warn({ line }, 'Unsolicited reply discarded');
      return;
    }
    this.pending = null;
    clearTimeout(pending.timer);
    this.log.debug({ reply: line }, '<-');

    const error = parseErrorReply(line);
    if (error) {
      pending.reject(new DeviceError(`Device rejected "${pending.command}": ${error.message} (${error.code})`, {
        code: error.code,
      }));
      return;
    }
    pending.resolve(line);
  }

  private dropSocket(): void {
    const sock = this.socket;
    this.socket = null;
    this.buffer = '';
    if (sock) {
      sock.removeAllListeners();
      sock.on('error', (err: Error) => this.log.debug(`Error on discarded socket: ${err.message}`));
      sock.destroy();
    }
  }

  private failPending(err: DeviceError): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.reject(err);
  }
}
