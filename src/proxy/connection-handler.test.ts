import { describe, it, expect, afterEach } from 'vitest';
import { handleConnection, parseRequest, type ProxyContext } from './connection-handler.js';
import { BlockList } from './block-list.js';
import { ConnectionError, ParseError } from './errors.js';
import type { ForwardFn } from './forwarding-client.js';
import { BAD_GATEWAY_RESPONSE } from './http-message.js';
import { CacheStore } from '../cache/index.js';
import { createLogger, type LogRecord } from '../logger/index.js';
import { ProxyMetrics } from '../metrics/index.js';
import { sendRaw, startTcpServer, type TcpServerHandle } from '../../tests/helpers/net.js';

const TARGET = 'http://example.com/';
const REQUEST = `GET ${TARGET} HTTP/1.1\r\nHost: example.com\r\n\r\n`;
const PAGE = 'HTTP/1.1 200 OK\r\nLast-Modified: Mon, 01 Jan 2024 00:00:00 GMT\r\n\r\nok';

/**
 * Clock that returns the given readings in order, then repeats the last one
 */
function steppedClock(...readings: number[]): () => number {
  let index = 0;
  return () => readings[Math.min(index++, readings.length - 1)];
}

function buildContext(forward: ForwardFn, now: () => number): { context: ProxyContext; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const context: ProxyContext = {
    cache: new CacheStore({ forward }),
    blockList: new BlockList(),
    metrics: new ProxyMetrics(),
    logger: createLogger({ sink: (record) => records.push(record), level: 'debug' }),
    forward,
    options: { bufferSize: 8192, httpPort: 80, httpsPort: 443, controlApiEnabled: true },
    now,
  };
  return { context, records };
}

let server: TcpServerHandle | null = null;

async function serve(context: ProxyContext): Promise<number> {
  server = await startTcpServer((socket) => {
    void handleConnection(socket, context);
  });
  return server.port;
}

afterEach(async () => {
  if (server) {
    await server.close();
    server = null;
  }
});

describe('parseRequest', () => {
  it('should pull method, target and host from the raw bytes', () => {
    const raw = Buffer.from(REQUEST);
    expect(parseRequest(raw)).toEqual({ method: 'GET', target: TARGET, host: 'example.com', raw });
  });

  it('should decode the target as UTF-8', () => {
    const raw = Buffer.from('GET http://example.com/naïve HTTP/1.1\r\n\r\n', 'utf-8');
    expect(parseRequest(raw).target).toBe('http://example.com/naïve');
  });

  it('should throw ParseError without a target', () => {
    expect(() => parseRequest(Buffer.from('GET\r\n\r\n'))).toThrow(ParseError);
  });
});

describe('handleConnection', () => {
  it('should record the fetch latency with the cached response', async () => {
    const forward: ForwardFn = async () => Buffer.from(PAGE);
    const { context, records } = buildContext(forward, steppedClock(1000, 1042, 1050));
    const port = await serve(context);

    const response = await sendRaw(port, REQUEST);

    expect(response.toString('latin1')).toBe(PAGE);
    expect(context.cache.lookup(TARGET)?.fetchLatency).toBe(42);
    expect(records.map((record) => record.message)).toContain(`⏱️ ${TARGET} served in 50.00ms`);
  });

  it('should report the time a cache hit saved', async () => {
    const forward: ForwardFn = async () => Buffer.from('HTTP/1.1 304 Not Modified\r\n\r\n');
    const { context, records } = buildContext(forward, steppedClock(0, 30, 31));
    context.cache.put(TARGET, Buffer.from(PAGE), Buffer.from('Mon, 01 Jan 2024 00:00:00 GMT'), 100);
    const port = await serve(context);

    const response = await sendRaw(port, REQUEST);

    expect(response.toString('latin1')).toBe(PAGE);
    expect(context.metrics.snapshot().timeSaved).toBe(70);
    const saved = records.find((record) => record.message === '💰 Saved 70.00ms by caching!');
    expect(saved?.data).toEqual({ target: TARGET, timeSaved: 70 });
  });

  it('should not cache an empty origin response', async () => {
    const forward: ForwardFn = async () => Buffer.alloc(0);
    const { context } = buildContext(forward, steppedClock(0));
    const port = await serve(context);

    const response = await sendRaw(port, REQUEST);

    expect(response.length).toBe(0);
    expect(context.cache.has(TARGET)).toBe(false);
  });

  it('should answer 502 when the origin connection fails', async () => {
    const forward: ForwardFn = async () => {
      throw new ConnectionError('example.com', 80, new Error('connect ECONNREFUSED'));
    };
    const { context, records } = buildContext(forward, steppedClock(0));
    const port = await serve(context);

    const response = await sendRaw(port, REQUEST);

    expect(response.equals(BAD_GATEWAY_RESPONSE)).toBe(true);
    expect(context.metrics.snapshot().errors).toBe(1);
    expect(records.find((record) => record.level === 'error')?.message).toBe(
      '❌ Connection to example.com:80 failed: connect ECONNREFUSED'
    );
  });

  it('should close without a response on other failures', async () => {
    const forward: ForwardFn = async () => {
      throw new Error('boom');
    };
    const { context, records } = buildContext(forward, steppedClock(0));
    const port = await serve(context);

    const response = await sendRaw(port, REQUEST);

    expect(response.length).toBe(0);
    expect(context.metrics.snapshot().errors).toBe(1);
    expect(records.find((record) => record.level === 'error')?.message).toMatch(/^❌ Connection error for 127\.0\.0\.1:\d+: boom$/);
  });

  it('should check the block list before the cache', async () => {
    const calls: string[] = [];
    const forward: ForwardFn = async (request) => {
      calls.push(request.toString());
      return Buffer.from(PAGE);
    };
    const { context } = buildContext(forward, steppedClock(0));
    context.cache.put(TARGET, Buffer.from(PAGE), Buffer.from('Mon, 01 Jan 2024 00:00:00 GMT'), 5);
    context.blockList.add(TARGET);
    const port = await serve(context);

    const response = await sendRaw(port, REQUEST);

    expect(response.toString('latin1').startsWith('HTTP/1.1 403 Forbidden\r\n')).toBe(true);
    expect(calls).toEqual([]);
    expect(context.metrics.snapshot().requests.revalidations).toBe(0);
  });
});
