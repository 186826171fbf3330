import * as net from 'net';
import { validateConfig } from '../config';
import { MeterConfig } from '../config-schema';
import { loadInstrumentProfile } from '../registry/instrument-profile';
import { InstrumentProfile } from '../registry/types';
import { SendOptions, Transport } from '../transport/transport';

// --- Shared fixtures ---

export const profile: InstrumentProfile = loadInstrumentProfile();

export function defaultConfig(): MeterConfig {
  return validateConfig({});
}

/** Reply for one command, or an error to reject with */
export type Responder = (command: string) => string | Error;

/**
 * Transport stand-in driven by a responder function.
 * Records every command and its send options in order.
 */
export class ScriptedTransport implements Transport {
  readonly target = 'scripted';
  readonly sent: string[] = [];
  readonly options: (SendOptions | undefined)[] = [];
  closed = false;
  private respond: Responder;

  constructor(respond: Responder) {
    this.respond = respond;
  }

  async send(command: string, options?: SendOptions): Promise<string> {
    this.sent.push(command);
    this.options.push(options);
    const reply = this.respond(command);
    if (reply instanceof Error) throw reply;
    return reply;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Responder that answers successive calls of one command from a list; the last entry repeats */
export function sequence(replies: readonly string[]): () => string {
  let index = 0;
  return () => {
    const reply = replies[Math.min(index, replies.length - 1)];
    index++;
    return reply;
  };
}

// --- Socket helpers ---

export function connect(port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ port, host: '127.0.0.1' }, () => {
      socket.off('error', reject);
      resolve(socket);
    });
    socket.once('error', reject);
    socket.setEncoding('utf8');
  });
}

/** Everything the peer sends until it closes, split into lines */
export function collect(socket: net.Socket): Promise<string[]> {
  return new Promise((resolve) => {
    let text = '';
    socket.on('data', (chunk: string) => {
      text += chunk;
    });
    socket.on('error', () => undefined);
    socket.on('close', () => {
      resolve(text.split('\n').filter((line) => line !== ''));
    });
  });
}

/** Send request lines followed by a blank line and return the replies */
export async function converse(port: number, lines: readonly string[]): Promise<string[]> {
  const socket = await connect(port);
  const replies = collect(socket);
  socket.write(`${lines.join('\n')}\n\n`);
  return replies;
}

export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('Condition not met in time');
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}
