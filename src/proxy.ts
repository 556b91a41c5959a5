import http from 'http';
import { InvalidUriError, RuleAbortError, errorMessage } from './errors.js';
import { HeaderList } from './http/headers.js';
import type { ProxyRequest, ProxyResponse } from './http/types.js';
import { formatPathAndQuery, formatUri, parseUri, type Uri } from './http/uri.js';
import { createLogger } from './logger.js';
import { executeRequestRules, executeResponseRules } from './rules/rule-executor.js';
import type { RuleLoader } from './rules/rule-loader.js';
import { createExchangeEntry, store } from './store.js';

const log = createLogger('proxy');

interface TargetInfo {
  host: string;
  port: number;
}

function resolveTarget(uri: Uri, hostHeader: string | undefined): TargetInfo | null {
  const authority = uri.authority ?? hostHeader;
  if (!authority) return null;

  let parsed: URL;
  try {
    parsed = new URL(`http://${authority}`);
  } catch {
    return null;
  }
  return {
    host: parsed.hostname.replace(/^\[(.*)\]$/, '$1'),
    port: parsed.port ? parseInt(parsed.port) : 80,
  };
}

function readBody(stream: http.IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk));
    stream.on('end', () => resolve(Buffer.concat(chunks)));
    stream.on('error', reject);
    stream.on('close', () => {
      if (!stream.complete) reject(new Error('connection closed before the body was complete'));
    });
  });
}

// Bodies are fully buffered, so chunked framing is replaced by an exact length.
function framedHeaders(headers: HeaderList, body: Buffer): HeaderList {
  const framed = headers.clone();
  const hadFraming = framed.has('content-length') || framed.has('transfer-encoding');
  framed.delete('transfer-encoding');
  framed.delete('proxy-connection');
  if (hadFraming || body.length > 0) {
    framed.set('content-length', String(body.length));
  }
  return framed;
}

// HEAD, 1xx, 204 and 304 responses carry no body, so their framing headers describe
// the resource and pass through as received.
function hasNoBody(method: string, status: number): boolean {
  return method === 'HEAD' || (status >= 100 && status < 200) || status === 204 || status === 304;
}

function responseHeaders(method: string, upstream: ProxyResponse, response: ProxyResponse): HeaderList {
  if (hasNoBody(method, response.status) && response.body === upstream.body) {
    const headers = response.headers.clone();
    headers.delete('proxy-connection');
    return headers;
  }
  return framedHeaders(response.headers, response.body);
}

function forward(target: TargetInfo, request: ProxyRequest, signal: AbortSignal): Promise<ProxyResponse> {
  return new Promise((resolve, reject) => {
    const upstreamReq = http.request(
      {
        hostname: target.host,
        port: target.port,
        method: request.method,
        path: formatPathAndQuery(request.uri.pathAndQuery ?? { path: '/' }),
        headers: framedHeaders(request.headers, request.body).toObject(),
        signal,
      },
      (upstreamRes) => {
        readBody(upstreamRes).then(
          (body) =>
            resolve({
              status: upstreamRes.statusCode ?? 502,
              headers: HeaderList.fromRaw(upstreamRes.rawHeaders),
              body,
            }),
          reject,
        );
      },
    );

    upstreamReq.on('error', reject);
    upstreamReq.end(request.body);
  });
}

function respondText(res: http.ServerResponse, status: number, message: string) {
  if (res.headersSent) {
    res.destroy();
    return;
  }
  res.writeHead(status, { 'content-type': 'text/plain' });
  res.end(message);
}

async function handleRequest(
  loader: RuleLoader,
  clientReq: http.IncomingMessage,
  clientRes: http.ServerResponse,
) {
  const startTime = Date.now();
  const id = store.nextId();
  const method = clientReq.method ?? 'GET';
  const rawUrl = clientReq.url ?? '/';

  const entry = createExchangeEntry(id, method, rawUrl);
  store.addExchange(entry);

  let uri: Uri;
  try {
    uri = parseUri(rawUrl);
  } catch (err) {
    store.finishExchange(id, 'failed', { status: 400, duration: Date.now() - startTime });
    respondText(clientRes, 400, `Bad request target: ${errorMessage(err)}`);
    return;
  }

  if (uri.scheme !== undefined && uri.scheme.toLowerCase() !== 'http') {
    store.finishExchange(id, 'failed', { status: 501, duration: Date.now() - startTime });
    respondText(clientRes, 501, `Unsupported scheme: ${uri.scheme}`);
    return;
  }

  const target = resolveTarget(uri, clientReq.headers.host);
  if (!target) {
    store.finishExchange(id, 'failed', { status: 400, duration: Date.now() - startTime });
    respondText(clientRes, 400, 'Missing destination host');
    return;
  }

  // One snapshot for the whole exchange, even if a reload lands mid-flight.
  const config = loader.getConfig();
  const intercepted = config.proxyPorts.length === 0 || config.proxyPorts.includes(target.port);
  const rules = intercepted ? config.rules : [];

  const controller = new AbortController();
  clientRes.on('close', () => {
    if (!clientRes.writableFinished) controller.abort();
  });
  const options = { signal: controller.signal };

  try {
    const request: ProxyRequest = {
      method,
      uri,
      headers: HeaderList.fromRaw(clientReq.rawHeaders),
      body: await readBody(clientReq),
    };

    const requestResult = await executeRequestRules(rules, target.port, request, options);
    if (requestResult.appliedRule) {
      store.recordRuleApplied('request');
      store.updateExchange(id, { requestRule: requestResult.appliedRule });
    }

    const upstream = await forward(target, requestResult.request, controller.signal);
    const responseResult = await executeResponseRules(rules, requestResult.context, upstream, options);
    if (responseResult.appliedRule) {
      store.recordRuleApplied('response');
      store.updateExchange(id, { responseRule: responseResult.appliedRule });
    }

    const { response } = responseResult;
    clientRes.writeHead(
      response.status,
      responseHeaders(requestResult.request.method, upstream, response).toObject(),
    );
    clientRes.end(response.body);
    store.finishExchange(id, 'forwarded', { status: response.status, duration: Date.now() - startTime });
  } catch (err) {
    const duration = Date.now() - startTime;

    if (err instanceof RuleAbortError) {
      log.info(`${method} ${formatUri(uri)} aborted by rule`);
      store.finishExchange(id, 'aborted', { duration });
      clientRes.destroy();
      return;
    }

    if (controller.signal.aborted) {
      log.debug(`${method} ${formatUri(uri)} cancelled by client`);
      store.finishExchange(id, 'cancelled', { duration });
      return;
    }

    if (err instanceof InvalidUriError) {
      log.warn(`${method} ${formatUri(uri)}: rule produced an invalid URI: ${err.message}`);
      store.finishExchange(id, 'failed', { status: 500, duration });
      respondText(clientRes, 500, `Rule rewrite failed: ${err.message}`);
      return;
    }

    log.warn(`${method} ${formatUri(uri)}: upstream error: ${errorMessage(err)}`);
    store.finishExchange(id, 'failed', { status: 502, duration });
    respondText(clientRes, 502, 'Proxy Error: ' + errorMessage(err));
  }
}

export function startProxy(loader: RuleLoader, port: number, host = '127.0.0.1') {
  const server = http.createServer((clientReq, clientRes) => {
    handleRequest(loader, clientReq, clientRes).catch((err) => {
      log.error(`Unhandled proxy error: ${errorMessage(err)}`);
      respondText(clientRes, 500, 'Internal proxy error');
    });
  });

  return new Promise<http.Server>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      store.setProxyRunning(true, address !== null && typeof address === 'object' ? address.port : port);
      resolve(server);
    });
  });
}
