import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import http from 'node:http';
import { send, formBody, FORM_HEADERS } from '../../src/services/http.js';
import { NetworkError } from '../../src/services/errors.js';

// real ofetch against an in-process server; /hang never answers
describe('send', () => {
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      if (req.url === '/hang') {
        return;
      }
      let body = '';
      req.on('data', (chunk: Buffer) => {
        body += chunk.toString();
      });
      req.on('end', () => {
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ received: body, contentType: req.headers['content-type'] }));
      });
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('test server has no TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should return status and decoded body', async () => {
    const response = await send(`${baseUrl}/token`, {
      method: 'POST',
      headers: { ...FORM_HEADERS },
      body: formBody({ grant_type: 'client_credentials', client_id: 'abc' }),
      timeoutMs: 2000,
    });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      received: 'grant_type=client_credentials&client_id=abc',
      contentType: 'application/x-www-form-urlencoded',
    });
  });

  it('should reject with NetworkError once timeoutMs elapses', async () => {
    const startedAt = Date.now();

    await expect(send(`${baseUrl}/hang`, { method: 'POST', timeoutMs: 200 })).rejects.toBeInstanceOf(NetworkError);
    expect(Date.now() - startedAt).toBeLessThan(2000);
  });

  it('should still time out when the caller passes a signal that never aborts', async () => {
    const controller = new AbortController();
    const startedAt = Date.now();

    await expect(
      send(`${baseUrl}/hang`, { method: 'POST', timeoutMs: 200, signal: controller.signal })
    ).rejects.toBeInstanceOf(NetworkError);
    expect(Date.now() - startedAt).toBeLessThan(2000);
  });

  it('should reject with NetworkError when the caller aborts', async () => {
    const controller = new AbortController();
    const startedAt = Date.now();
    setTimeout(() => controller.abort(), 50);

    await expect(
      send(`${baseUrl}/hang`, { method: 'POST', timeoutMs: 5000, signal: controller.signal })
    ).rejects.toBeInstanceOf(NetworkError);
    expect(Date.now() - startedAt).toBeLessThan(2000);
  });

  it('should reject with NetworkError for an already aborted signal', async () => {
    await expect(
      send(`${baseUrl}/hang`, { method: 'GET', timeoutMs: 5000, signal: AbortSignal.abort() })
    ).rejects.toBeInstanceOf(NetworkError);
  });
});
