/**
 * HTTPS Tunnel Relay
 *
 * Handles CONNECT by opening a plain TCP connection to the origin and
 * relaying bytes in both directions without inspecting them. TLS is never
 * terminated here.
 *
 * @module proxy/tunnel
 */

import type { Socket } from 'node:net';
import { openConnection } from './forwarding-client.js';
import { CONNECTION_ESTABLISHED } from './http-message.js';
import { writeAll } from './socket-io.js';

/** Origin port for CONNECT tunnels */
export const HTTPS_PORT = 443;

export interface RelayStats {
  /** Bytes forwarded client → origin */
  bytesFromClient: number;
  /** Bytes forwarded origin → client */
  bytesFromOrigin: number;
  /** First socket error that ended the relay, if any */
  error?: Error;
}

/**
 * Connect to `host` on the tunnel port and acknowledge the CONNECT.
 *
 * The port in the CONNECT target is ignored. Nothing is written to the
 * client when the origin cannot be reached.
 *
 * @throws ConnectionError when the origin connection fails
 */
export async function openTunnel(clientSocket: Socket, host: string, port: number = HTTPS_PORT): Promise<Socket> {
  const originSocket = await openConnection(host, port);
  try {
    await writeAll(clientSocket, CONNECTION_ESTABLISHED);
  } catch (err) {
    originSocket.destroy();
    throw err;
  }
  return originSocket;
}

/**
 * Pump bytes between the two sockets until either side ends, errors or
 * closes. Both sockets are then shut down (pending writes are flushed
 * first) and the promise resolves once both are closed.
 *
 * There is no idle timeout: a peer that neither sends nor closes keeps the
 * relay open.
 */
export function relay(clientSocket: Socket, originSocket: Socket): Promise<RelayStats> {
  return new Promise((resolve) => {
    const stats: RelayStats = { bytesFromClient: 0, bytesFromOrigin: 0 };
    let finished = false;
    let open = 2;

    const onClosed = (): void => {
      open--;
      if (open === 0) {
        resolve(stats);
      }
    };

    const fromClient = (chunk: Buffer): void => {
      stats.bytesFromClient += chunk.length;
      if (!originSocket.write(chunk)) {
        clientSocket.pause();
      }
    };

    const fromOrigin = (chunk: Buffer): void => {
      stats.bytesFromOrigin += chunk.length;
      if (!clientSocket.write(chunk)) {
        originSocket.pause();
      }
    };

    const resumeClient = (): void => {
      clientSocket.resume();
    };

    const resumeOrigin = (): void => {
      originSocket.resume();
    };

    const finish = (): void => {
      if (finished) return;
      finished = true;

      for (const socket of [clientSocket, originSocket]) {
        socket.off('data', fromClient);
        socket.off('data', fromOrigin);
        socket.pause();
        socket.destroySoon();
      }
      originSocket.off('drain', resumeClient);
      clientSocket.off('drain', resumeOrigin);
    };

    const onError = (err: Error): void => {
      if (!stats.error) stats.error = err;
      finish();
    };

    for (const socket of [clientSocket, originSocket]) {
      if (socket.destroyed) {
        onClosed();
      } else {
        socket.once('close', onClosed);
      }
      socket.once('end', finish);
      socket.once('close', finish);
      socket.on('error', onError);
    }

    clientSocket.on('data', fromClient);
    originSocket.on('data', fromOrigin);
    originSocket.on('drain', resumeClient);
    clientSocket.on('drain', resumeOrigin);

    if (clientSocket.destroyed || originSocket.destroyed || clientSocket.readableEnded || originSocket.readableEnded) {
      finish();
      return;
    }

    clientSocket.resume();
    originSocket.resume();
  });
}
