import { InvalidUriError, errorMessage } from '../errors.js';
import { formatPathAndQuery, withPathAndQuery, type Uri } from './uri.js';

/**
 * Appends a raw, already-encoded `key=value&...` fragment to the query.
 * Nothing is decoded, so repeated keys accumulate.
 */
export function appendQueries(uri: Uri, queries?: string): Uri {
  if (!queries) return uri;

  const current = uri.pathAndQuery;
  if (current === undefined) {
    return withPathAndQuery(uri, `/?${queries}`);
  }
  const separator = current.query === undefined ? '?' : '&';
  return withPathAndQuery(uri, `${formatPathAndQuery(current)}${separator}${queries}`);
}

/**
 * Swaps the path and keeps the query. `''` means `/`. An authority-form
 * target is returned as is.
 */
export function replacePath(uri: Uri, path?: string): Uri {
  if (path === undefined || (uri.pathAndQuery === undefined && uri.scheme === undefined)) return uri;

  const next = path === '' ? '/' : path;
  if (next.includes('?')) {
    throw new InvalidUriError('replacement path must not contain a query', next);
  }
  const query = uri.pathAndQuery?.query;
  return withPathAndQuery(uri, query === undefined ? next : `${next}?${query}`);
}

/**
 * Decodes the query (the last value of a repeated key wins), overrides it
 * key by key with `queries` and re-encodes it as
 * `application/x-www-form-urlencoded`. Existing keys keep their position;
 * new keys follow in the order given.
 */
export function replaceQueries(uri: Uri, queries?: ReadonlyMap<string, string>): Uri {
  if (queries === undefined) return uri;

  const merged = decodeQuery(uri.pathAndQuery?.query ?? '');
  for (const [key, value] of queries) {
    merged.set(key, value);
  }

  const encoded = encodeQuery(merged);
  const path = uri.pathAndQuery?.path ?? '/';
  return withPathAndQuery(uri, encoded === '' ? path : `${path}?${encoded}`);
}

export function decodeQuery(query: string): Map<string, string> {
  const pairs = new Map<string, string>();
  for (const piece of query.split('&')) {
    if (piece === '') continue;
    const eq = piece.indexOf('=');
    const key = eq === -1 ? piece : piece.slice(0, eq);
    const value = eq === -1 ? '' : piece.slice(eq + 1);
    pairs.set(decodeComponent(key, query), decodeComponent(value, query));
  }
  return pairs;
}

export function encodeQuery(pairs: ReadonlyMap<string, string>): string {
  return new URLSearchParams([...pairs]).toString();
}

function decodeComponent(raw: string, query: string): string {
  try {
    return decodeURIComponent(raw.replace(/\+/g, ' '));
  } catch (err) {
    throw new InvalidUriError(`malformed query string (${errorMessage(err)})`, query);
  }
}
