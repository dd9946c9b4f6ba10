import { describe, it, expect } from 'vitest';
import type { Socket } from 'node:net';
import { openTunnel, relay } from './tunnel.js';
import { ConnectionError } from './errors.js';
import {
  connectClient,
  findClosedPort,
  readBytes,
  readUntilClosed,
  startEchoServer,
  startTcpServer,
} from '../../tests/helpers/net.js';

/**
 * Accept one connection on a throwaway server and hand back both ends
 */
async function socketPair(): Promise<{ client: Socket; server: Socket; close: () => Promise<void> }> {
  let accepted: (socket: Socket) => void = () => {};
  const serverSide = new Promise<Socket>((resolve) => {
    accepted = resolve;
  });
  const handle = await startTcpServer((socket) => accepted(socket));
  const client = await connectClient(handle.port);
  const server = await serverSide;
  client.on('error', () => client.destroy());
  return {
    client,
    server,
    close: async () => {
      client.destroy();
      await handle.close();
    },
  };
}

describe('openTunnel', () => {
  it('should acknowledge the CONNECT once the origin is reached', async () => {
    const echo = await startEchoServer();
    const pair = await socketPair();
    try {
      const acknowledged = readBytes(pair.client, 39);
      const origin = await openTunnel(pair.server, '127.0.0.1', echo.port);

      expect((await acknowledged).toString('latin1')).toBe('HTTP/1.1 200 Connection Established\r\n\r\n');
      expect(origin.remotePort).toBe(echo.port);
      origin.destroy();
    } finally {
      await pair.close();
      await echo.close();
    }
  });

  it('should write nothing to the client when the origin is unreachable', async () => {
    const port = await findClosedPort();
    const pair = await socketPair();
    try {
      const received: Buffer[] = [];
      pair.client.on('data', (chunk: Buffer) => received.push(chunk));

      await expect(openTunnel(pair.server, '127.0.0.1', port)).rejects.toBeInstanceOf(ConnectionError);
      expect(received).toEqual([]);
    } finally {
      await pair.close();
    }
  });
});

describe('relay', () => {
  it('should pass bytes both ways and count them', async () => {
    const echo = await startEchoServer();
    const pair = await socketPair();
    try {
      const acknowledged = readBytes(pair.client, 39);
      const origin = await openTunnel(pair.server, '127.0.0.1', echo.port);
      await acknowledged;

      const relayed = relay(pair.server, origin);

      const payload = Buffer.from([0x16, 0x03, 0x01, 0x00, 0xff, 0x00, 0x7f]);
      const echoed = readBytes(pair.client, payload.length);
      pair.client.write(payload);
      expect((await echoed).equals(payload)).toBe(true);

      pair.client.end();
      const stats = await relayed;

      expect(stats.bytesFromClient).toBe(payload.length);
      expect(stats.bytesFromOrigin).toBe(payload.length);
      expect(pair.server.destroyed).toBe(true);
      expect(origin.destroyed).toBe(true);
    } finally {
      await pair.close();
      await echo.close();
    }
  });

  it('should close the client when the origin hangs up', async () => {
    const origin = await socketPair();
    const client = await socketPair();
    try {
      const clientClosed = readUntilClosed(client.client);
      const relayed = relay(client.server, origin.client);

      origin.server.end('bye');

      const stats = await relayed;
      expect(stats.bytesFromOrigin).toBe(3);
      expect((await clientClosed).toString('latin1')).toBe('bye');
    } finally {
      await origin.close();
      await client.close();
    }
  });

  it('should resolve at once when a side is already closed', async () => {
    const origin = await socketPair();
    const client = await socketPair();
    try {
      origin.client.destroy();

      const stats = await relay(client.server, origin.client);

      expect(stats).toEqual({ bytesFromClient: 0, bytesFromOrigin: 0 });
      expect(client.server.destroyed).toBe(true);
    } finally {
      await origin.close();
      await client.close();
    }
  });
});
