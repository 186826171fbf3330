import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import * as net from 'net';
import { DeviceError } from '../errors';
import { TcpTransport } from '../transport/tcp-transport';
import { formatErrorReply, parseErrorReply } from '../transport/transport';
import { waitFor } from './helpers';

// --- Fake gateway: one reply line per command line ---

function gatewayReply(command: string): string | null {
  if (command === 'SILENT') return null;
  if (command === 'BAD') return formatErrorReply(-224, 'Illegal parameter value');
  if (command.startsWith('SLOW ')) return command.slice(5);
  if (command.startsWith('LATER ')) return command.slice(6);
  return `echo:${command}`;
}

describe('parseErrorReply', () => {
  it('parses code and quoted message', () => {
    assert.deepEqual(parseErrorReply('ERR -224,"Illegal parameter value"'), {
      code: -224,
      message: 'Illegal parameter value',
    });
  });

  it('accepts a bare code', () => {
    assert.deepEqual(parseErrorReply('ERR 5'), { code: 5, message: 'Device error' });
  });

  it('ignores ordinary replies', () => {
    assert.equal(parseErrorReply('300'), undefined);
    assert.equal(parseErrorReply('ERRATIC'), undefined);
  });
});

describe('TcpTransport', () => {
  let server: net.Server;
  let port: number;
  let connections = 0;
  const sockets = new Set<net.Socket>();

  before((_, done) => {
    server = net.createServer((socket) => {
      connections++;
      sockets.add(socket);
      socket.on('close', () => sockets.delete(socket));
      socket.on('error', () => undefined);
      socket.setEncoding('utf8');
      let buffer = '';
      socket.on('data', (chunk: string) => {
        buffer += chunk;
        let newline = buffer.indexOf('\n');
        while (newline !== -1) {
          const command = buffer.slice(0, newline);
          buffer = buffer.slice(newline + 1);
          const reply = gatewayReply(command);
          if (reply !== null) {
            const delay = command.startsWith('SLOW ') ? 30 : command.startsWith('LATER ') ? 250 : 0;
            setTimeout(() => socket.write(`${reply}\r\n`), delay);
          }
          newline = buffer.indexOf('\n');
        }
      });
    });
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      port = address !== null && typeof address === 'object' ? address.port : 0;
      done();
    });
  });

  after((_, done) => {
    for (const socket of sockets) socket.destroy();
    server.close(() => done());
  });

  it('connects on first use and returns the reply line', async () => {
    const transport = new TcpTransport({ host: '127.0.0.1', port });
    try {
      assert.equal(transport.isConnected(), false);
      assert.equal(await transport.send(':RATE?'), 'echo::RATE?');
      assert.equal(transport.isConnected(), true);
      assert.equal(transport.target, `127.0.0.1:${port}`);
    } finally {
      await transport.close();
    }
  });

  it('answers overlapping requests in call order', async () => {
    const transport = new TcpTransport({ host: '127.0.0.1', port });
    try {
      const replies = await Promise.all([
        transport.send('SLOW first'),
        transport.send('second'),
        transport.send('SLOW third'),
      ]);
      assert.deepEqual(replies, ['first', 'echo:second', 'third']);
    } finally {
      await transport.close();
    }
  });

  it('turns an error reply into a DeviceError with the code', async () => {
    const transport = new TcpTransport({ host: '127.0.0.1', port });
    try {
      await assert.rejects(transport.send('BAD'), (err: unknown) => {
        return err instanceof DeviceError && err.code === -224 &&
          err.message === 'Device rejected "BAD": Illegal parameter value (-224)';
      });
      assert.equal(await transport.send('after'), 'echo:after');
    } finally {
      await transport.close();
    }
  });

  it('times out a request without a reply and reconnects for the next one', async () => {
    const transport = new TcpTransport({ host: '127.0.0.1', port, timeoutMs: 150 });
    try {
      await transport.send('hello');
      const opened = connections;
      await assert.rejects(transport.send('SILENT'), (err: unknown) => {
        return err instanceof DeviceError && err.code === undefined &&
          err.message === 'No reply to "SILENT" within 150ms';
      });
      assert.equal(transport.isConnected(), false);
      assert.equal(await transport.send('again'), 'echo:again');
      assert.equal(connections, opened + 1);
    } finally {
      await transport.close();
    }
  });

  it('fails with a DeviceError when nothing is listening', async () => {
    const closed = net.createServer();
    const freePort = await new Promise<number>((resolve) => {
      closed.listen(0, '127.0.0.1', () => {
        const address = closed.address();
        resolve(address !== null && typeof address === 'object' ? address.port : 0);
      });
    });
    await new Promise<void>((resolve) => closed.close(() => resolve()));

    const transport = new TcpTransport({ host: '127.0.0.1', port: freePort, timeoutMs: 1000 });
    await assert.rejects(transport.send('x'), (err: unknown) => {
      return err instanceof DeviceError && err.message.startsWith(`Cannot connect to 127.0.0.1:${freePort}`);
    });
    await transport.close();
  });

  it('notices when the peer closes and reconnects on the next request', async () => {
    const transport = new TcpTransport({ host: '127.0.0.1', port });
    try {
      await transport.send('ping');
      for (const socket of sockets) socket.destroy();
      await waitFor(() => !transport.isConnected());
      assert.equal(await transport.send('pong'), 'echo:pong');
    } finally {
      await transport.close();
    }
  });

  it('extends the reply timeout for one call', async () => {
    const transport = new TcpTransport({ host: '127.0.0.1', port, timeoutMs: 150 });
    try {
      await transport.send('hello');
      assert.equal(await transport.send('LATER done', { extraTimeoutMs: 400 }), 'done');
    } finally {
      await transport.close();
    }
  });
});
