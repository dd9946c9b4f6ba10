/**
 * Forwarding Client
 *
 * Sends a raw request to an origin server over a fresh TCP connection and
 * returns the raw response bytes. One connection per request; the socket is
 * always closed before the call settles.
 *
 * @module proxy/forwarding-client
 */

import { connect, type Socket } from 'node:net';
import { ConnectionError } from './errors.js';
import { DEFAULT_BUFFER_SIZE, readOnce, readToEnd, writeAll } from './socket-io.js';

/** Origin port for plain HTTP requests */
export const HTTP_PORT = 80;

export interface ForwardOptions {
  /** Origin port (never taken from the request itself) */
  port?: number;
  /** Read until the origin closes; otherwise a single bounded read */
  fullRead?: boolean;
  /** Size of a single bounded read */
  bufferSize?: number;
}

/**
 * Signature shared by the forwarding client and anything standing in for it
 */
export type ForwardFn = (request: Buffer, host: string, options?: ForwardOptions) => Promise<Buffer>;

/**
 * Open a TCP connection to an origin
 *
 * @throws ConnectionError when the connection cannot be established
 */
export function openConnection(host: string, port: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = connect({ host, port });

    const onError = (err: Error): void => {
      socket.destroy();
      reject(new ConnectionError(host, port, err));
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      socket.off('error', onError);
      resolve(socket);
    });
  });
}

/**
 * Forward a raw request to `host` and collect the response.
 *
 * @throws ConnectionError when connecting or sending fails. A failing read
 * yields an empty response instead.
 */
export async function forwardRequest(
  request: Buffer,
  host: string,
  options: ForwardOptions = {}
): Promise<Buffer> {
  const { port = HTTP_PORT, fullRead = true, bufferSize = DEFAULT_BUFFER_SIZE } = options;

  const socket = await openConnection(host, port);
  let socketError: Error | null = null;
  // Errors also surface through the pending write or read below
  socket.on('error', (err) => {
    socketError = err;
  });

  try {
    try {
      await writeAll(socket, request);
    } catch (err) {
      throw new ConnectionError(host, port, socketError ?? err);
    }

    try {
      return fullRead ? await readToEnd(socket) : await readOnce(socket, bufferSize);
    } catch {
      return Buffer.alloc(0);
    }
  } finally {
    socket.destroy();
  }
}
