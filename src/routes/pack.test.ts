import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'http';
import type { Express } from 'express';
import { createApp } from '../app';
import { defaultCatalog } from '../services/catalog';
import { outcomeResponse } from './pack';

async function start(app: Express): Promise<{ server: Server; url: string }> {
  const server = app.listen(0, '127.0.0.1');
  await new Promise<void>(resolve => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server did not bind to a TCP port');
  }
  return { server, url: `http://127.0.0.1:${address.port}` };
}

function stop(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
}

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  ({ server, url: baseUrl } = await start(createApp()));
});

afterAll(async () => {
  await stop(server);
});

function postPack(body: string, contentType = 'application/json') {
  return fetch(`${baseUrl}/pack`, {
    method: 'POST',
    headers: { 'Content-Type': contentType },
    body,
  });
}

describe('GET /health', () => {
  it('reports ok and lists the endpoints', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);

    expect(await res.json()).toMatchObject({
      ok: true,
      path: '/health',
      endpoints: ['GET /health', 'POST /pack'],
    });
  });
});

describe('GET /', () => {
  it('describes the service and its boxes', async () => {
    const res = await fetch(`${baseUrl}/`);
    expect(await res.json()).toMatchObject({
      service: 'Box Picker API',
      boxes: ['BX-S', 'BX-M', 'BX-L', 'BX-XL', 'BX-XXL'],
    });
  });
});

describe('POST /pack', () => {
  it('packs items into the smallest box that holds each of them', async () => {
    const res = await postPack(JSON.stringify({
      items: [
        { sku: 'SKU-3', dimensions: { length: 6, width: 4, height: 4 } },
        { sku: 'SKU-1', dimensions: { length: 8, width: 4, height: 4 } },
        { sku: 'SKU-2', dimensions: { length: 10, width: 4, height: 4 } },
      ],
    }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      boxes: [
        {
          box_id: 'BX-M',
          dimensions: { length: 12, width: 10, height: 6 },
          items: ['SKU-3', 'SKU-1', 'SKU-2'],
        },
      ],
      total_boxes: 1,
    });
  });

  it('returns 422 item_too_large for an item bigger than every box', async () => {
    const res = await postPack(JSON.stringify({
      items: [{ sku: 'HUGE', dimensions: { length: 25, width: 21, height: 21 } }],
    }));

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: 'item_too_large',
      details: [
        {
          sku: 'HUGE',
          dimensions: { length: 25, width: 21, height: 21 },
          max_box_inner_dimensions: { length: 24, width: 20, height: 20 },
        },
      ],
    });
  });

  it('returns 400 validation_error for an empty item list', async () => {
    const res = await postPack(JSON.stringify({ items: [] }));
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'validation_error' });
  });

  it('returns 400 validation_error for duplicate skus', async () => {
    const res = await postPack(JSON.stringify({
      items: [
        { sku: 'DUP', dimensions: { length: 6, width: 4, height: 4 } },
        { sku: 'DUP', dimensions: { length: 6, width: 4, height: 4 } },
      ],
    }));
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'validation_error' });
  });

  it('returns 400 validation_error for non-positive dimensions', async () => {
    for (const dimensions of [
      { length: 0, width: 4, height: 4 },
      { length: -1, width: 4, height: 4 },
      { length: 6, width: 0, height: 4 },
      { length: 6, width: 4, height: 0 },
    ]) {
      const res = await postPack(JSON.stringify({ items: [{ sku: 'A', dimensions }] }));
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: 'validation_error' });
    }
  });

  it('returns 400 invalid_json for a malformed body', async () => {
    const res = await postPack('{"items": [');
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'invalid_json' });
  });

  it('returns 415 when the body is not JSON', async () => {
    const res = await postPack('items=1', 'text/plain');
    expect(res.status).toBe(415);
    expect(await res.json()).toEqual({
      error: 'unsupported_media_type',
      details: 'Use Content-Type: application/json',
    });
  });

  it('returns 405 for GET', async () => {
    const res = await fetch(`${baseUrl}/pack`);
    expect(res.status).toBe(405);
    expect(await res.json()).toEqual({ error: 'method_not_allowed' });
  });

  it('returns 415 for a JSON body in an unsupported charset', async () => {
    const res = await postPack('{"items": []}', 'application/json; charset=ebcdic');
    expect(res.status).toBe(415);
    expect(await res.json()).toEqual({
      error: 'unsupported_media_type',
      details: 'unsupported charset "EBCDIC"',
    });
  });

  it('returns 415 for an unknown content encoding', async () => {
    const res = await fetch(`${baseUrl}/pack`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'Content-Encoding': 'br2' },
      body: '{"items": []}',
    });
    expect(res.status).toBe(415);
    expect(await res.json()).toMatchObject({ error: 'unsupported_media_type' });
  });
});

describe('POST /pack with a small body limit', () => {
  let limited: Server;
  let limitedUrl: string;

  beforeAll(async () => {
    ({ server: limited, url: limitedUrl } = await start(createApp(defaultCatalog, '50b')));
  });

  afterAll(async () => {
    await stop(limited);
  });

  it('returns 413 payload_too_large for a body over the limit', async () => {
    const res = await fetch(`${limitedUrl}/pack`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        items: [{ sku: 'A-LONG-ENOUGH-SKU', dimensions: { length: 6, width: 4, height: 4 } }],
      }),
    });
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: 'payload_too_large' });
  });
});

describe('POST /health', () => {
  it('returns 405', async () => {
    const res = await fetch(`${baseUrl}/health`, { method: 'POST' });
    expect(res.status).toBe(405);
    expect(await res.json()).toEqual({ error: 'method_not_allowed' });
  });
});

describe('outcomeResponse', () => {
  it('maps a packing_error outcome to 422 with the message as details', () => {
    expect(
      outcomeResponse({ ok: false, error: 'packing_error', message: "Item 'X' does not fit in any available box." }),
    ).toEqual({
      status: 422,
      body: { error: 'packing_error', details: "Item 'X' does not fit in any available box." },
    });
  });

  it('maps an empty success to zero boxes', () => {
    expect(outcomeResponse({ ok: true, boxes: [] })).toEqual({ status: 200, body: { boxes: [], total_boxes: 0 } });
  });
});

describe('unknown routes', () => {
  it('returns 404 with the route in the details', async () => {
    const res = await fetch(`${baseUrl}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'not_found', details: 'Route GET /nope not found' });
  });
});
