import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { FlowRunner } from '../../src/runner/flow-runner.js';
import type { ResultSink } from '../../src/logging/result-log.js';

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    req.setEncoding('utf8');
    req.on('data', (chunk: string) => (data += chunk));
    req.on('end', () => resolve(data));
    req.on('error', reject);
  });
}

function send(res: ServerResponse, status: number, payload: unknown, headers: Record<string, string> = {}): void {
  res.writeHead(status, { 'Content-Type': 'application/json', ...headers });
  res.end(JSON.stringify(payload));
}

async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
  const body = await readBody(req);
  const route = `${req.method} ${req.url}`;

  if (route === 'POST /login') {
    send(res, 200, { ok: true }, { 'Set-Cookie': 'session=test-session; Path=/' });
  } else if (route === 'GET /me') {
    if (req.headers.cookie === 'session=test-session') {
      send(res, 200, { user: { id: 7, name: 'alice' } });
    } else {
      send(res, 401, { error: 'unauthorized' });
    }
  } else if (route === 'POST /orders') {
    const parsed: unknown = JSON.parse(body);
    send(res, 201, { order: parsed, content_type: req.headers['content-type'] ?? null });
  } else {
    send(res, 404, { error: 'not found' });
  }
}

describe('FlowRunner against a local server', () => {
  let server: Server;
  let baseUrl: string;
  const noopSink: ResultSink = { record: async () => {} };

  beforeAll(async () => {
    server = createServer((req, res) => {
      handle(req, res).catch((error: unknown) => {
        res.statusCode = 500;
        res.end(String(error));
      });
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') throw new Error('server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  it('carries cookies and extracted variables between steps', async () => {
    const runner = new FlowRunner({ sink: noopSink });
    const result = await runner.run(
      {
        name: 'Session flow',
        steps: [
          { name: 'Login', method: 'POST', url: '/login', body: { user: 'alice' } },
          {
            name: 'Profile',
            url: '/me',
            expect: { body: { user: { id: 7, name: 'alice' } } },
            extract: { user_id: 'user.id', user_name: 'user.name' },
          },
          {
            name: 'Order',
            method: 'post',
            url: '/orders',
            body: { item: 'book' },
            expect: { status: 201, body: { content_type: 'application/json' } },
          },
        ],
      },
      { baseUrl, location: 'session.yaml' },
    );

    expect(result.issues).toEqual([]);
    expect(result.success).toBe(true);
    expect(result.summary).toBe("Successfully executed 3 steps in flow 'Session flow'");
    expect(result.variables).toEqual({ base_url: baseUrl, user_id: 7, user_name: 'alice' });
  });

  it('does not share cookies between runs', async () => {
    const runner = new FlowRunner({ sink: noopSink });
    const result = await runner.run({ steps: [{ url: '/me' }] }, { baseUrl, location: 'fresh.yaml' });

    expect(result.success).toBe(false);
    expect(result.issues).toEqual([
      {
        type: 'flow',
        location: 'fresh.yaml:1',
        step: 'Step 1',
        message: 'Expected status 200, got 401',
        response_status: 401,
        response_body: '{"error":"unauthorized"}',
      },
    ]);
  });
});
