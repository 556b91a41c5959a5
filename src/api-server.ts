import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { errorMessage } from './errors.js';
import type { RuleLoader } from './rules/rule-loader.js';
import type { HeaderEntries, Rule } from './rules/types.js';
import { store } from './store.js';

function entriesToJson(entries: HeaderEntries | undefined) {
  return entries?.map(([name, value]) => [name, value]);
}

export function describeRule(rule: Rule) {
  const { selector, actions } = rule;
  const { append, replace } = actions;

  return {
    name: rule.name,
    target: rule.target,
    selector: {
      port: selector.port,
      path: selector.path,
      method: selector.method,
      headers: entriesToJson(selector.headers),
      code: selector.code,
      responseHeaders: entriesToJson(selector.responseHeaders),
    },
    actions: {
      abort: actions.abort,
      delay: actions.delay,
      append: append && { queries: append.queries, headers: entriesToJson(append.headers) },
      replace: replace && {
        path: replace.path,
        method: replace.method,
        body: replace.body?.toString('utf8'),
        code: replace.code,
        queries: replace.queries && Object.fromEntries(replace.queries),
        headers: entriesToJson(replace.headers),
      },
    },
  };
}

export function createApiServer(loader: RuleLoader) {
  const app = new Hono();

  // GET /api/status
  app.get('/api/status', (c) => {
    const rules = loader.getRules();
    return c.json({
      proxyRunning: store.proxyRunning,
      proxyPort: store.proxyPort,
      configPath: loader.configPath,
      ruleCount: {
        request: rules.filter((r) => r.target === 'request').length,
        response: rules.filter((r) => r.target === 'response').length,
      },
      stats: store.stats,
    });
  });

  // GET /api/rules
  app.get('/api/rules', (c) => {
    return c.json({ rules: loader.getRules().map(describeRule) });
  });

  // POST /api/reload
  app.post('/api/reload', (c) => {
    try {
      const config = loader.reload();
      return c.json({ reloaded: true, ruleCount: config.rules.length });
    } catch (err) {
      return c.json({ error: errorMessage(err) }, 400);
    }
  });

  // GET /api/exchanges
  app.get('/api/exchanges', (c) => {
    const limit = parseInt(c.req.query('limit') || '100');
    const offset = parseInt(c.req.query('offset') || '0');

    const exchanges = store.getExchanges();
    const sliced = exchanges.slice(offset, offset + limit);

    return c.json({
      total: exchanges.length,
      offset,
      limit,
      exchanges: sliced.map((e) => ({ ...e, timestamp: e.timestamp.toISOString() })),
    });
  });

  // DELETE /api/exchanges
  app.delete('/api/exchanges', (c) => {
    store.clearExchanges();
    return c.json({ cleared: true });
  });

  return app;
}

export function startApiServer(loader: RuleLoader, port: number) {
  return serve({ fetch: createApiServer(loader).fetch, port, hostname: '127.0.0.1' });
}
