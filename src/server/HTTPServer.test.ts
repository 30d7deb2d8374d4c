import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { OrderedMap } from '../tree/OrderedMap';
import { HTTPServer } from './HTTPServer';

describe('HTTPServer', () => {
  let table: OrderedMap<string, string>;
  let server: HTTPServer;
  let baseUrl: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    table = new OrderedMap<string, string>([
      ['A', '8'], ['C', '4'], ['H', '5'], ['L', '11'], ['M', '9'],
    ]);
    server = new HTTPServer(table, { port: 0 });
    await server.start();
    baseUrl = `http://127.0.0.1:${server.port}`;
  });

  afterEach(async () => {
    await server.stop();
    vi.restoreAllMocks();
  });

  async function call(method: string, path: string, body?: unknown): Promise<{ status: number; json: unknown }> {
    const init: RequestInit = { method };
    if (body !== undefined) {
      init.headers = { 'content-type': 'application/json' };
      init.body = JSON.stringify(body);
    }
    const res = await fetch(`${baseUrl}${path}`, init);
    return { status: res.status, json: await res.json() };
  }

  it('reports health', async () => {
    const { status, json } = await call('GET', '/health');
    expect(status).toBe(200);
    expect(json).toMatchObject({ status: 'ok' });
  });

  it('puts and gets values', async () => {
    const put = await call('POST', '/put', { key: 'B', value: 42 });
    expect(put).toEqual({ status: 200, json: { success: true, created: true, size: 6 } });

    const overwrite = await call('POST', '/put', { key: 'B', value: 'x' });
    expect(overwrite.json).toEqual({ success: true, created: false, size: 6 });

    expect(await call('GET', '/get/B')).toEqual({ status: 200, json: { key: 'B', value: 'x' } });
    expect(table.get('B')).toBe('x');
  });

  it('validates put bodies', async () => {
    expect((await call('POST', '/put', { key: '', value: 1 })).status).toBe(400);
    expect((await call('POST', '/put', { key: 'Q', value: null })).json).toEqual({
      error: 'Invalid value: must not be null or undefined',
    });
    expect((await call('POST', '/put', [1, 2])).status).toBe(400);
    expect(table.size()).toBe(5);
  });

  it('returns 404 for absent keys', async () => {
    expect(await call('GET', '/get/Z')).toEqual({
      status: 404,
      json: { error: 'Key not found', key: 'Z' },
    });
  });

  it('deletes keys idempotently', async () => {
    expect((await call('DELETE', '/delete/C')).json).toEqual({ success: true, deleted: true, size: 4 });
    expect((await call('DELETE', '/delete/C')).json).toEqual({ success: true, deleted: false, size: 4 });
    expect((await call('GET', '/contains/C')).json).toEqual({ key: 'C', contains: false });
    expect(table.check().ok).toBe(true);
  });

  it('answers ordered queries', async () => {
    expect((await call('GET', '/min')).json).toEqual({ key: 'A' });
    expect((await call('GET', '/max')).json).toEqual({ key: 'M' });
    expect((await call('GET', '/floor/D')).json).toEqual({ key: 'C' });
    expect((await call('GET', '/ceil/D')).json).toEqual({ key: 'H' });
    expect((await call('GET', '/rank/L')).json).toEqual({ key: 'L', rank: 3 });
    expect((await call('GET', '/select/1')).json).toEqual({ rank: 1, key: 'C' });
    expect((await call('GET', '/range?start=B&end=L')).json).toEqual({ count: 3, keys: ['C', 'H', 'L'] });
    expect((await call('GET', '/keys')).json).toEqual({ count: 5, keys: ['A', 'C', 'H', 'L', 'M'] });
    expect((await call('GET', '/check')).json).toEqual({ ok: true, violations: [] });
  });

  it('reports size and shape', async () => {
    const { json } = await call('GET', '/size');
    expect(json).toEqual({ size: 5, empty: false, height: table.height() });

    const levels = await call('GET', '/level-order');
    expect(levels.json).toEqual({ height: table.height(), levels: table.levelOrder() });
  });

  it('removes the extremes', async () => {
    expect((await call('DELETE', '/min')).json).toEqual({ key: 'A' });
    expect((await call('DELETE', '/max')).json).toEqual({ key: 'M' });
    expect(table.keys()).toEqual(['C', 'H', 'L']);
  });

  it('maps table errors to status codes', async () => {
    const notFound = await call('GET', '/floor/0');
    expect(notFound).toEqual({
      status: 404,
      json: { error: 'floor(0): no such key', type: 'NotFoundError' },
    });

    const outOfRange = await call('GET', '/select/5');
    expect(outOfRange.status).toBe(400);
    expect(outOfRange.json).toMatchObject({ type: 'OutOfRangeError' });

    expect((await call('GET', '/select/abc')).status).toBe(400);
    expect((await call('GET', '/range?start=B')).status).toBe(400);

    table.clear();
    expect(await call('GET', '/min')).toEqual({
      status: 409,
      json: { error: 'min() called on an empty symbol table', type: 'UnderflowError' },
    });
  });

  it('rejects bodies over the configured limit', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const small = new HTTPServer(table, { port: 0, jsonBodyLimit: '10b' });
    await small.start();

    try {
      const res = await fetch(`http://127.0.0.1:${small.port}/put`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ key: 'B', value: 'well past ten bytes' }),
      });

      expect(res.status).toBe(413);
      expect(await res.json()).toMatchObject({ type: 'PayloadTooLargeError' });
      expect(errors).not.toHaveBeenCalled();
      expect(table.contains('B')).toBe(false);
    } finally {
      await small.stop();
    }
  });

  it('rejects malformed JSON', async () => {
    const res = await fetch(`${baseUrl}/put`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"key":',
    });
    expect(res.status).toBe(400);
  });
});
