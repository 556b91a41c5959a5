import { HeaderList, type HeaderEntry } from '../src/http/headers.js';
import type { ProxyRequest, ProxyResponse, RequestContext } from '../src/http/types.js';
import { parseUri } from '../src/http/uri.js';
import type { Actions, Rule, Selector, Target } from '../src/rules/types.js';

export function makeRequest(
  overrides: { method?: string; url?: string; headers?: HeaderEntry[]; body?: string } = {},
): ProxyRequest {
  return {
    method: overrides.method ?? 'GET',
    uri: parseUri(overrides.url ?? '/rs-tproxy?x=1'),
    headers: new HeaderList(overrides.headers ?? [['host', 'api.example.com'], ['aname', 'avalue']]),
    body: Buffer.from(overrides.body ?? ''),
  };
}

export function makeResponse(
  overrides: { status?: number; headers?: HeaderEntry[]; body?: string } = {},
): ProxyResponse {
  return {
    status: overrides.status ?? 200,
    headers: new HeaderList(overrides.headers ?? [['content-type', 'application/json'], ['server', 'nginx']]),
    body: Buffer.from(overrides.body ?? '{"ok":true}'),
  };
}

export function makeContext(request: ProxyRequest = makeRequest(), port = 80): RequestContext {
  return { port, uri: request.uri, method: request.method, headers: request.headers.clone() };
}

export function makeRule(
  name: string,
  target: Target,
  selector: Selector = {},
  actions: Partial<Actions> = {},
): Rule {
  return { name, target, selector, actions: { abort: false, ...actions } };
}
