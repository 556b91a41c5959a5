import { RuleAbortError } from '../errors.js';
import type { HeaderList } from '../http/headers.js';
import type { ProxyRequest, ProxyResponse, RequestContext } from '../http/types.js';
import { formatUri } from '../http/uri.js';
import { appendQueries, replacePath, replaceQueries } from '../http/uri-rewriter.js';
import { createLogger } from '../logger.js';
import { matchRequestRules, matchResponseRules } from './rule-matcher.js';
import type { Actions, HeaderEntries, RuleSet } from './types.js';

const log = createLogger('rule-executor');

export interface ApplyOptions {
  /** Aborting it cancels a pending delay; the returned promise rejects with the signal's reason. */
  signal?: AbortSignal;
}

// setTimeout fires after 1ms for anything above this, so longer delays are
// waited out in steps.
const MAX_TIMER_MS = 2_147_483_647;

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    let remaining = ms;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const schedule = () => {
      const step = Math.min(remaining, MAX_TIMER_MS);
      remaining -= step;
      timer = setTimeout(() => {
        if (remaining > 0) {
          schedule();
          return;
        }
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, step);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    schedule();
  });
}

// Entries sharing a name replace that header together, so a multi-valued
// entry yields exactly those values.
function overwriteHeaders(headers: HeaderList, entries: HeaderEntries) {
  const grouped = new Map<string, { name: string; values: string[] }>();
  for (const [name, value] of entries) {
    const key = name.toLowerCase();
    const group = grouped.get(key);
    if (group) {
      group.values.push(value);
    } else {
      grouped.set(key, { name, values: [value] });
    }
  }
  for (const { name, values } of grouped.values()) {
    headers.set(name, values);
  }
}

function appendHeaders(headers: HeaderList, entries: HeaderEntries | undefined) {
  for (const [name, value] of entries ?? []) {
    headers.append(name, value);
  }
}

/**
 * Applies `actions` to a copy of `request`: abort, then append, then
 * replace (path, method, body, queries, headers), then delay. The input is
 * left untouched.
 */
export async function applyRequestAction(
  request: ProxyRequest,
  actions: Actions,
  options: ApplyOptions = {},
): Promise<ProxyRequest> {
  if (actions.abort) {
    throw new RuleAbortError();
  }

  const next: ProxyRequest = { ...request, headers: request.headers.clone() };

  if (actions.append) {
    next.uri = appendQueries(next.uri, actions.append.queries);
    appendHeaders(next.headers, actions.append.headers);
  }

  if (actions.replace) {
    const { replace } = actions;
    // path first: query replacement reattaches to whatever path is current
    next.uri = replacePath(next.uri, replace.path);
    if (replace.method !== undefined) next.method = replace.method;
    if (replace.body !== undefined) next.body = Buffer.from(replace.body);
    next.uri = replaceQueries(next.uri, replace.queries);
    if (replace.headers) overwriteHeaders(next.headers, replace.headers);
  }

  if (actions.delay !== undefined) {
    await sleep(actions.delay, options.signal);
  }

  log.debug(
    `request action applied: ${next.method} ${formatUri(next.uri)}`,
    next.headers.toJSON(),
    `${next.body.length} bytes`,
  );
  return next;
}

export async function applyResponseAction(
  response: ProxyResponse,
  actions: Actions,
  options: ApplyOptions = {},
): Promise<ProxyResponse> {
  if (actions.abort) {
    throw new RuleAbortError();
  }

  const next: ProxyResponse = { ...response, headers: response.headers.clone() };

  if (actions.append) {
    appendHeaders(next.headers, actions.append.headers);
  }

  if (actions.replace) {
    const { replace } = actions;
    if (replace.code !== undefined) next.status = replace.code;
    if (replace.body !== undefined) next.body = Buffer.from(replace.body);
    if (replace.headers) overwriteHeaders(next.headers, replace.headers);
  }

  if (actions.delay !== undefined) {
    await sleep(actions.delay, options.signal);
  }

  log.debug(`response action applied: ${next.status}`, next.headers.toJSON(), `${next.body.length} bytes`);
  return next;
}

export interface RequestRulesResult {
  request: ProxyRequest;
  /** Snapshot of the inbound request, taken before any action ran. */
  context: RequestContext;
  appliedRule?: string;
}

export interface ResponseRulesResult {
  response: ProxyResponse;
  appliedRule?: string;
}

/** Runs the first request rule that matches. Rejects with `RuleAbortError` on abort. */
export async function executeRequestRules(
  rules: RuleSet,
  port: number,
  request: ProxyRequest,
  options: ApplyOptions = {},
): Promise<RequestRulesResult> {
  const context: RequestContext = {
    port,
    uri: request.uri,
    method: request.method,
    headers: request.headers.clone(),
  };

  const rule = matchRequestRules(rules, port, request).at(0);
  if (!rule) return { request, context };

  log.debug(`[rule:${rule.name}] matched ${request.method} ${formatUri(request.uri)}`);
  const applied = await applyRequestAction(request, rule.actions, options);
  return { request: applied, context, appliedRule: rule.name };
}

export async function executeResponseRules(
  rules: RuleSet,
  context: RequestContext,
  response: ProxyResponse,
  options: ApplyOptions = {},
): Promise<ResponseRulesResult> {
  const rule = matchResponseRules(rules, context, response).at(0);
  if (!rule) return { response };

  log.debug(`[rule:${rule.name}] matched ${response.status} for ${context.method} ${formatUri(context.uri)}`);
  const applied = await applyResponseAction(response, rule.actions, options);
  return { response: applied, appliedRule: rule.name };
}
