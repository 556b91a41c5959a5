import type { ReadonlyHeaders } from '../http/headers.js';
import type { ProxyRequest, ProxyResponse, RequestContext } from '../http/types.js';
import { uriPath } from '../http/uri.js';
import type { HeaderEntries, Rule, RuleSet, Selector } from './types.js';

function matchesHeaders(expected: HeaderEntries | undefined, actual: ReadonlyHeaders): boolean {
  if (!expected) return true;
  return expected.every(([name, value]) => actual.getAll(name).includes(value));
}

export function matchesRequest(port: number, request: ProxyRequest, selector: Selector): boolean {
  return (
    (selector.port === undefined || selector.port === port) &&
    (selector.path === undefined || uriPath(request.uri).startsWith(selector.path)) &&
    (selector.method === undefined || selector.method === request.method) &&
    matchesHeaders(selector.headers, request.headers)
  );
}

/**
 * Port, path, method and `headers` are checked against the captured request
 * context; `code` and `responseHeaders` against the response itself.
 */
export function matchesResponse(
  context: RequestContext,
  response: ProxyResponse,
  selector: Selector,
): boolean {
  return (
    (selector.port === undefined || selector.port === context.port) &&
    (selector.path === undefined || uriPath(context.uri).startsWith(selector.path)) &&
    (selector.method === undefined || selector.method === context.method) &&
    (selector.code === undefined || selector.code === response.status) &&
    matchesHeaders(selector.headers, context.headers) &&
    matchesHeaders(selector.responseHeaders, response.headers)
  );
}

export function matchRequestRules(rules: RuleSet, port: number, request: ProxyRequest): Rule[] {
  return rules.filter((rule) => rule.target === 'request' && matchesRequest(port, request, rule.selector));
}

export function matchResponseRules(
  rules: RuleSet,
  context: RequestContext,
  response: ProxyResponse,
): Rule[] {
  return rules.filter(
    (rule) => rule.target === 'response' && matchesResponse(context, response, rule.selector),
  );
}
