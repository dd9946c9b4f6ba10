import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CacheStore } from './index.js';
import { ConnectionError } from '../proxy/errors.js';
import type { ForwardFn, ForwardOptions } from '../proxy/forwarding-client.js';
import { startHttpOrigin } from '../../tests/helpers/net.js';

const LAST_MODIFIED = Buffer.from('Mon, 01 Jan 2024 00:00:00 GMT');
const RESPONSE = Buffer.from('HTTP/1.1 200 OK\r\nLast-Modified: Mon, 01 Jan 2024 00:00:00 GMT\r\n\r\nB');

interface ForwardCall {
  request: string;
  host: string;
  options?: ForwardOptions;
}

function fakeForward(reply: Buffer | Error): { forward: ForwardFn; calls: ForwardCall[] } {
  const calls: ForwardCall[] = [];
  const forward: ForwardFn = async (request, host, options) => {
    calls.push({ request: request.toString(), host, options });
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  };
  return { forward, calls };
}

describe('CacheStore lookup and put', () => {
  let cache: CacheStore;

  beforeEach(() => {
    cache = new CacheStore({ forward: fakeForward(Buffer.alloc(0)).forward });
  });

  it('should return undefined for unknown targets', () => {
    expect(cache.lookup('http://example.com/')).toBeUndefined();
    expect(cache.has('http://example.com/')).toBe(false);
  });

  it('should store an entry', () => {
    cache.put('http://example.com/', RESPONSE, LAST_MODIFIED, 120);

    expect(cache.lookup('http://example.com/')).toEqual({
      rawResponse: RESPONSE,
      lastModified: LAST_MODIFIED,
      fetchLatency: 120,
    });
  });

  it('should replace an entry wholesale', () => {
    cache.put('http://example.com/', RESPONSE, LAST_MODIFIED, 120);
    const newer = Buffer.from('HTTP/1.1 200 OK\r\n\r\nC');
    const newerDate = Buffer.from('Tue, 02 Jan 2024 00:00:00 GMT');
    cache.put('http://example.com/', newer, newerDate, 40);

    const entry = cache.lookup('http://example.com/');
    expect(entry?.rawResponse.toString()).toBe('HTTP/1.1 200 OK\r\n\r\nC');
    expect(entry?.lastModified.toString()).toBe('Tue, 02 Jan 2024 00:00:00 GMT');
    expect(entry?.fetchLatency).toBe(40);
  });

  it('should key by the raw target without host qualification', () => {
    cache.put('/index.html', RESPONSE, LAST_MODIFIED, 10);
    expect(cache.has('/index.html')).toBe(true);
    expect(cache.has('http://example.com/index.html')).toBe(false);
  });

  it('should report stats, list targets and clear', () => {
    cache.put('/a', Buffer.from('12345'), LAST_MODIFIED, 1);
    cache.put('/b', Buffer.from('123'), LAST_MODIFIED, 1);

    expect(cache.getStats()).toEqual({ entries: 2, totalBytes: 8 });
    expect(cache.targets()).toEqual(['/a', '/b']);

    expect(cache.delete('/a')).toBe(true);
    expect(cache.targets()).toEqual(['/b']);

    cache.clear();
    expect(cache.getStats()).toEqual({ entries: 0, totalBytes: 0 });
  });
});

describe('CacheStore.revalidate', () => {
  it('should send a single-read conditional GET with the stored Last-Modified', async () => {
    const { forward, calls } = fakeForward(Buffer.from('HTTP/1.1 304 Not Modified\r\n\r\n'));
    const cache = new CacheStore({ forward, httpPort: 8080, bufferSize: 4096 });
    cache.put('http://example.com/', RESPONSE, LAST_MODIFIED, 50);

    await cache.revalidate('http://example.com/', 'example.com');

    expect(calls).toHaveLength(1);
    expect(calls[0].host).toBe('example.com');
    expect(calls[0].options).toEqual({ port: 8080, fullRead: false, bufferSize: 4096 });
    expect(calls[0].request).toBe(
      'GET http://example.com/ HTTP/1.1\r\n' +
      'Host: example.com\r\n' +
      'If-Modified-Since: Mon, 01 Jan 2024 00:00:00 GMT\r\n\r\n'
    );
  });

  it('should report not-modified with the stored entry on 304', async () => {
    const { forward } = fakeForward(Buffer.from('HTTP/1.1 304 Not Modified\r\n\r\n'));
    const cache = new CacheStore({ forward });
    cache.put('http://example.com/', RESPONSE, LAST_MODIFIED, 50);

    const result = await cache.revalidate('http://example.com/', 'example.com');

    expect(result.status).toBe('not-modified');
    if (result.status === 'not-modified') {
      expect(result.entry.rawResponse.equals(RESPONSE)).toBe(true);
    }
  });

  it('should report fresh for any other status', async () => {
    const { forward } = fakeForward(Buffer.from('HTTP/1.1 200 OK\r\n\r\npartial'));
    const cache = new CacheStore({ forward });
    cache.put('http://example.com/', RESPONSE, LAST_MODIFIED, 50);

    const result = await cache.revalidate('http://example.com/', 'example.com');

    expect(result).toEqual({ status: 'fresh' });
    // The probe bytes are never stored
    expect(cache.lookup('http://example.com/')?.rawResponse.equals(RESPONSE)).toBe(true);
  });

  it('should report fresh for an empty probe response', async () => {
    const { forward } = fakeForward(Buffer.alloc(0));
    const cache = new CacheStore({ forward });
    cache.put('/x', RESPONSE, LAST_MODIFIED, 50);

    expect(await cache.revalidate('/x', 'example.com')).toEqual({ status: 'fresh' });
  });

  it('should report fresh without contacting the origin when nothing is cached', async () => {
    const { forward, calls } = fakeForward(Buffer.from('HTTP/1.1 304 Not Modified\r\n\r\n'));
    const cache = new CacheStore({ forward });

    expect(await cache.revalidate('/missing', 'example.com')).toEqual({ status: 'fresh' });
    expect(calls).toHaveLength(0);
  });

  it('should propagate connection errors', async () => {
    const { forward } = fakeForward(new ConnectionError('example.com', 80, new Error('ECONNREFUSED')));
    const cache = new CacheStore({ forward });
    cache.put('/x', RESPONSE, LAST_MODIFIED, 50);

    await expect(cache.revalidate('/x', 'example.com')).rejects.toBeInstanceOf(ConnectionError);
  });

  it('should use the forwarding client against a real origin by default', async () => {
    const origin = await startHttpOrigin(() => 'HTTP/1.1 304 Not Modified\r\n\r\n');
    try {
      const cache = new CacheStore({ httpPort: origin.port });
      cache.put('/page', RESPONSE, LAST_MODIFIED, 50);

      const result = await cache.revalidate('/page', '127.0.0.1');

      expect(result.status).toBe('not-modified');
      expect(origin.requests[0]).toContain('If-Modified-Since: Mon, 01 Jan 2024 00:00:00 GMT\r\n');
    } finally {
      await origin.close();
    }
  });
});

describe('CacheStore.timeSaved', () => {
  it('should subtract the elapsed time from the original fetch latency', () => {
    const cache = new CacheStore({ forward: vi.fn<ForwardFn>() });
    const entry = { rawResponse: RESPONSE, lastModified: LAST_MODIFIED, fetchLatency: 150 };

    expect(cache.timeSaved(entry, 40)).toBe(110);
    expect(cache.timeSaved(entry, 200)).toBe(-50);
  });
});
