/**
 * Pull-style line reader over a socket.
 *
 * readLine() resolves with the next complete line (without its "\r\n" or
 * "\n"), or null once the peer has closed, the socket errored, or it was
 * destroyed locally. A trailing partial line at end of stream is returned
 * as a line.
 */

import * as net from 'net';

export class LineReader {
  private lines: string[] = [];
  private partial = '';
  private ended = false;
  private waiter: ((line: string | null) => void) | null = null;

  constructor(socket: net.Socket) {
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.onData(chunk));
    socket.on('end', () => this.onEnd());
    socket.on('close', () => this.onEnd());
  }

  readLine(): Promise<string | null> {
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  private onData(chunk: string): void {
    this.partial += chunk;
    let newline = this.partial.indexOf('\n');
    while (newline !== -1) {
      this.push(this.partial.slice(0, newline).replace(/\r$/, ''));
      this.partial = this.partial.slice(newline + 1);
      newline = this.partial.indexOf('\n');
    }
  }

  private onEnd(): void {
    if (this.ended) return;
    if (this.partial !== '') {
      this.push(this.partial);
      this.partial = '';
    }
    this.ended = true;
    this.deliver(null);
  }

  private push(line: string): void {
    if (!this.deliver(line)) this.lines.push(line);
  }

  private deliver(line: string | null): boolean {
    const waiter = this.waiter;
    if (!waiter) return false;
    this.waiter = null;
    waiter(line);
    return true;
  }
}
