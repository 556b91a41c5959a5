import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import fs from 'fs';
import http from 'http';
import os from 'os';
import path from 'path';
import { startProxy } from '../src/proxy.js';
import { RuleLoader } from '../src/rules/rule-loader.js';
import { setLogLevel } from '../src/logger.js';
import { store } from '../src/store.js';

interface Echo {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
}

interface Reply {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

function portOf(server: http.Server): number {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return address.port;
}

function close(server: http.Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

function send(
  proxyPort: number,
  options: { method?: string; path: string; headers?: http.OutgoingHttpHeaders; body?: string },
): Promise<Reply> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      {
        host: '127.0.0.1',
        port: proxyPort,
        method: options.method ?? 'GET',
        path: options.path,
        headers: options.headers,
        agent: false,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () =>
          resolve({ status: res.statusCode ?? 0, headers: res.headers, body: Buffer.concat(chunks).toString() }),
        );
        res.on('error', reject);
      },
    );
    req.on('error', reject);
    req.end(options.body);
  });
}

let upstream: http.Server;
let upstreamPort: number;
let proxy: http.Server | null = null;

function rulesFor(port: number): string {
  return `
proxy_ports: [${port}]
rules:
  - name: rewrite
    target: Request
    selector:
      path: /lgtm
      method: GET
    actions:
      append:
        queries: foo=bar
        headers:
          x-fault: "on"
  - name: drop
    target: Request
    selector:
      path: /dead
    actions:
      abort: true
  - name: bad-path
    target: Request
    selector:
      path: /broken
    actions:
      replace:
        path: relative
  - name: tag-response
    target: Response
    selector:
      path: /lgtm
      response_headers:
        server: nginx
    actions:
      append:
        headers:
          x-chaos: "yes"
  - name: mock
    target: Response
    selector:
      path: /mock
    actions:
      replace:
        code: 503
        body: unavailable
`;
}

async function startWith(config: string): Promise<number> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fault-proxy-e2e-'));
  const file = path.join(dir, 'rules.yaml');
  fs.writeFileSync(file, config);

  const loader = new RuleLoader(file);
  loader.start({ watch: false });
  proxy = await startProxy(loader, 0);
  return portOf(proxy);
}

beforeAll(async () => {
  setLogLevel('silent');
  upstream = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      if (req.method === 'HEAD') {
        res.writeHead(200, { 'content-type': 'text/plain', 'content-length': '11' });
        res.end();
        return;
      }
      const echo: Echo = {
        method: req.method ?? '',
        url: req.url ?? '',
        headers: req.headers,
        body: Buffer.concat(chunks).toString(),
      };
      res.writeHead(200, { 'content-type': 'application/json', server: 'nginx' });
      res.end(JSON.stringify(echo));
    });
  });
  await new Promise<void>((resolve) => upstream.listen(0, '127.0.0.1', resolve));
  upstreamPort = portOf(upstream);
});

afterEach(async () => {
  if (proxy) await close(proxy);
  proxy = null;
});

afterAll(async () => {
  await close(upstream);
  setLogLevel('info');
});

describe('proxy', () => {
  it('rewrites a matching request and tags the response', async () => {
    const port = await startWith(rulesFor(upstreamPort));

    const reply = await send(port, { path: `http://127.0.0.1:${upstreamPort}/lgtm?os=linux` });
    const echo: Echo = JSON.parse(reply.body);

    expect(reply.status).toBe(200);
    expect(echo.url).toBe('/lgtm?os=linux&foo=bar');
    expect(echo.headers['x-fault']).toBe('on');
    expect(reply.headers['x-chaos']).toBe('yes');
  });

  it('accepts origin-form requests addressed through Host', async () => {
    const port = await startWith(rulesFor(upstreamPort));

    const reply = await send(port, {
      path: '/lgtm?os=linux',
      headers: { host: `127.0.0.1:${upstreamPort}` },
    });
    const echo: Echo = JSON.parse(reply.body);
    expect(echo.url).toBe('/lgtm?os=linux&foo=bar');
  });

  it('forwards request bodies unchanged when no rule matches', async () => {
    const port = await startWith(rulesFor(upstreamPort));

    const reply = await send(port, {
      method: 'POST',
      path: `http://127.0.0.1:${upstreamPort}/submit`,
      headers: { 'content-type': 'text/plain' },
      body: 'payload',
    });
    const echo: Echo = JSON.parse(reply.body);
    expect(echo.method).toBe('POST');
    expect(echo.url).toBe('/submit');
    expect(echo.body).toBe('payload');
    expect(reply.headers['x-chaos']).toBeUndefined();
  });

  it('drops the connection when a rule aborts', async () => {
    const port = await startWith(rulesFor(upstreamPort));
    const abortedBefore = store.stats.aborted;

    await expect(send(port, { path: `http://127.0.0.1:${upstreamPort}/dead` })).rejects.toThrow();
    expect(store.stats.aborted).toBe(abortedBefore + 1);
  });

  it('answers 500 when a rule produces an invalid URI', async () => {
    const port = await startWith(rulesFor(upstreamPort));

    const reply = await send(port, { path: `http://127.0.0.1:${upstreamPort}/broken` });
    expect(reply.status).toBe(500);
    expect(reply.body).toMatch(/^Rule rewrite failed: /);
  });

  it('replaces the upstream response and fixes its length', async () => {
    const port = await startWith(rulesFor(upstreamPort));

    const reply = await send(port, { path: `http://127.0.0.1:${upstreamPort}/mock` });
    expect(reply.status).toBe(503);
    expect(reply.body).toBe('unavailable');
    expect(reply.headers['content-length']).toBe('11');
  });

  it('keeps the upstream length on HEAD responses', async () => {
    const port = await startWith(rulesFor(upstreamPort));

    const reply = await send(port, { method: 'HEAD', path: `http://127.0.0.1:${upstreamPort}/plain` });
    expect(reply.status).toBe(200);
    expect(reply.headers['content-length']).toBe('11');
    expect(reply.body).toBe('');
  });

  it('leaves traffic to other ports alone', async () => {
    const port = await startWith(rulesFor(upstreamPort + 1 > 65535 ? 1 : upstreamPort + 1));

    const reply = await send(port, { path: `http://127.0.0.1:${upstreamPort}/dead` });
    const echo: Echo = JSON.parse(reply.body);
    expect(reply.status).toBe(200);
    expect(echo.url).toBe('/dead');
  });

  it('refuses https targets', async () => {
    const port = await startWith(rulesFor(upstreamPort));

    const reply = await send(port, { path: `https://127.0.0.1:${upstreamPort}/lgtm` });
    expect(reply.status).toBe(501);
  });
});
