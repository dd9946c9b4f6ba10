/**
 * Socket I/O Helpers
 *
 * Promise wrappers over net.Socket events that give the connection handler
 * recv/sendall-style primitives: one bounded read, read until the peer
 * closes, and a write that resolves once the bytes are flushed.
 *
 * @module proxy/socket-io
 */

import type { Socket } from 'node:net';

/** Default size of a single bounded read */
export const DEFAULT_BUFFER_SIZE = 8192;

const EMPTY = Buffer.alloc(0);

function isFinished(socket: Socket): boolean {
  return socket.destroyed || socket.readableEnded;
}

/**
 * Read at most `bufferSize` bytes from the socket.
 *
 * Resolves with an empty buffer when the peer closes before sending
 * anything. Bytes beyond `bufferSize` are pushed back onto the socket and
 * the socket is left paused, so a later reader sees them.
 */
export function readOnce(socket: Socket, bufferSize: number = DEFAULT_BUFFER_SIZE): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    if (isFinished(socket)) {
      resolve(EMPTY);
      return;
    }

    const cleanup = (): void => {
      socket.off('data', onData);
      socket.off('end', onEnd);
      socket.off('close', onEnd);
      socket.off('error', onError);
    };

    const onData = (chunk: Buffer): void => {
      cleanup();
      socket.pause();
      if (chunk.length > bufferSize) {
        socket.unshift(chunk.subarray(bufferSize));
        resolve(chunk.subarray(0, bufferSize));
      } else {
        resolve(chunk);
      }
    };

    const onEnd = (): void => {
      cleanup();
      resolve(EMPTY);
    };

    const onError = (err: Error): void => {
      cleanup();
      reject(err);
    };

    socket.on('data', onData);
    socket.on('end', onEnd);
    socket.on('close', onEnd);
    socket.on('error', onError);
    socket.resume();
  });
}

/**
 * Read until the peer closes the connection and concatenate every chunk
 */
export function readToEnd(socket: Socket): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    if (isFinished(socket)) {
      resolve(EMPTY);
      return;
    }

    const chunks: Buffer[] = [];

    const cleanup = (): void => {
      socket.off('data', onData);
      socket.off('end', onEnd);
      socket.off('close', onEnd);
      socket.off('error', onError);
    };

    const onData = (chunk: Buffer): void => {
      chunks.push(chunk);
    };

    const onEnd = (): void => {
      cleanup();
      resolve(Buffer.concat(chunks));
    };

    const onError = (err: Error): void => {
      cleanup();
      reject(err);
    };

    socket.on('data', onData);
    socket.on('end', onEnd);
    socket.on('close', onEnd);
    socket.on('error', onError);
    socket.resume();
  });
}

/**
 * Collect a body of `length` bytes, starting from the bytes that arrived
 * with the head. Resolves with what was received if the peer ends early;
 * bytes past `length` stay on the socket.
 */
export async function readBody(socket: Socket, initial: Buffer, length: number): Promise<Buffer> {
  if (initial.length >= length) {
    return initial.subarray(0, length);
  }

  const chunks = [initial];
  let received = initial.length;
  while (received < length) {
    const chunk = await readOnce(socket, length - received);
    if (chunk.length === 0) {
      break;
    }
    chunks.push(chunk);
    received += chunk.length;
  }
  return Buffer.concat(chunks);
}

/**
 * Write every byte of `data`, resolving once the socket has flushed it
 */
export function writeAll(socket: Socket, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(data, (err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}

/**
 * End the socket after pending writes flush and wait until it is closed
 */
export function closeSocket(socket: Socket): Promise<void> {
  return new Promise((resolve) => {
    if (socket.destroyed) {
      resolve();
      return;
    }
    socket.once('close', () => resolve());
    socket.destroySoon();
  });
}
