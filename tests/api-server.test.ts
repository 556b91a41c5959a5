import { describe, it, expect, beforeEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { createApiServer } from '../src/api-server.js';
import { RuleLoader } from '../src/rules/rule-loader.js';
import { createExchangeEntry, store } from '../src/store.js';

const CONFIG = `
rules:
  - name: tag
    target: Request
    selector:
      path: /api
      headers:
        aname: avalue
    actions:
      delay: 500ms
      replace:
        body: hello
        queries:
          foo: bar
  - name: fail
    target: Response
    selector:
      code: 200
    actions:
      abort: true
`;

function setup() {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fault-proxy-api-'));
  const file = path.join(dir, 'rules.yaml');
  fs.writeFileSync(file, CONFIG);
  const loader = new RuleLoader(file);
  loader.start({ watch: false });
  return { file, loader, app: createApiServer(loader) };
}

describe('API server', () => {
  beforeEach(() => {
    store.clearExchanges();
    store.resetStats();
  });

  it('GET /api/status reports rule counts and stats', async () => {
    const { app, file } = setup();
    store.setProxyRunning(true, 58080);

    const res = await app.request('/api/status');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      proxyRunning: true,
      proxyPort: 58080,
      configPath: path.resolve(file),
      ruleCount: { request: 1, response: 1 },
      stats: { exchanges: 0, aborted: 0 },
    });
  });

  it('GET /api/rules describes rules as JSON', async () => {
    const { app } = setup();

    const res = await app.request('/api/rules');
    expect(await res.json()).toEqual({
      rules: [
        {
          name: 'tag',
          target: 'request',
          selector: { path: '/api', headers: [['aname', 'avalue']] },
          actions: {
            abort: false,
            delay: 500,
            replace: { body: 'hello', queries: { foo: 'bar' } },
          },
        },
        {
          name: 'fail',
          target: 'response',
          selector: { code: 200 },
          actions: { abort: true },
        },
      ],
    });
  });

  it('POST /api/reload picks up file changes', async () => {
    const { app, file, loader } = setup();
    fs.writeFileSync(file, 'rules: []\n');

    const res = await app.request('/api/reload', { method: 'POST' });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ reloaded: true, ruleCount: 0 });
    expect(loader.getRules()).toHaveLength(0);
  });

  it('POST /api/reload returns 400 and keeps the rules on error', async () => {
    const { app, file, loader } = setup();
    fs.writeFileSync(file, 'rules:\n  - target: 42\n');

    const res = await app.request('/api/reload', { method: 'POST' });
    expect(res.status).toBe(400);
    const body = await res.json();
    expect(body).toHaveProperty('error');
    expect(loader.getRules()).toHaveLength(2);
  });

  it('GET /api/exchanges pages through the log', async () => {
    const { app } = setup();
    for (const url of ['/a', '/b', '/c']) {
      store.addExchange(createExchangeEntry(store.nextId(), 'GET', url));
    }

    const res = await app.request('/api/exchanges?limit=2&offset=1');
    const body = await res.json();
    expect(body).toMatchObject({ total: 3, offset: 1, limit: 2 });
    expect(body).toHaveProperty('exchanges.length', 2);
    expect(body).toHaveProperty('exchanges.0.url', '/b');
  });

  it('DELETE /api/exchanges clears the log', async () => {
    const { app } = setup();
    store.addExchange(createExchangeEntry(store.nextId(), 'GET', '/a'));

    const res = await app.request('/api/exchanges', { method: 'DELETE' });
    expect(await res.json()).toEqual({ cleared: true });
    expect(store.getExchanges()).toHaveLength(0);
  });
});
