/**
 * Output sinks
 *
 * Operator-facing output (values, samples, results, errors) is written to
 * an explicit sink passed into every dispatch. The local CLI writes to the
 * process streams; the remote session hands each client its own sink.
 */

import * as net from 'net';

export interface OutputSink {
  info(line: string): void;
  error(line: string): void;
}

export class ConsoleSink implements OutputSink {
  info(line: string): void {
    process.stdout.write(`${line}\n`);
  }

  error(line: string): void {
    process.stderr.write(`error: ${line}\n`);
  }
}

/** Writes newline-terminated lines to a client socket; drops output once the socket is gone */
export class SocketSink implements OutputSink {
  private socket: net.Socket;

  constructor(socket: net.Socket) {
    this.socket = socket;
  }

  info(line: string): void {
    this.write(line);
  }

  error(line: string): void {
    this.write(`error: ${line}`);
  }

  private write(line: string): void {
    if (this.socket.destroyed || !this.socket.writable) return;
    this.socket.write(`${line}\n`);
  }
}

/** Collects lines in memory */
export class BufferSink implements OutputSink {
  readonly lines: string[] = [];
  readonly errors: string[] = [];

  info(line: string): void {
    this.lines.push(line);
  }

  error(line: string): void {
    this.errors.push(line);
  }
}
