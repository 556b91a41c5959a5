import { InvalidUriError } from '../errors.js';

export interface PathAndQuery {
  readonly path: string;
  /** `undefined` when there is no `?`; `''` for a bare trailing `?`. */
  readonly query?: string;
}

/**
 * A request target as it appears on the request line: origin-form
 * (`/a?b`), absolute-form (`http://host/a?b`) or authority-form (`host:443`).
 * Values are never mutated; rewrites build new ones.
 */
export interface Uri {
  readonly scheme?: string;
  readonly authority?: string;
  readonly pathAndQuery?: PathAndQuery;
}

const ABSOLUTE_RE = /^([A-Za-z][A-Za-z0-9+.-]*):\/\/([^/?#]*)(.*)$/;
const AUTHORITY_RE = /^[^\x00-\x20\x7f\/?#]+$/;
// visible ASCII except '#', plus the raw high bytes Node hands over as latin1
const PATH_AND_QUERY_RE = /^[\x21\x22\x24-\x7e\x80-\xff]*$/;

export function parsePathAndQuery(raw: string): PathAndQuery {
  if (raw !== '*' && !raw.startsWith('/')) {
    throw new InvalidUriError('path must start with "/"', raw);
  }
  if (!PATH_AND_QUERY_RE.test(raw)) {
    throw new InvalidUriError('path and query contain invalid characters', raw);
  }

  const mark = raw.indexOf('?');
  if (mark === -1) return { path: raw };
  return { path: raw.slice(0, mark), query: raw.slice(mark + 1) };
}

export function formatPathAndQuery(paq: PathAndQuery): string {
  return paq.query === undefined ? paq.path : `${paq.path}?${paq.query}`;
}

export function parseUri(raw: string): Uri {
  if (raw.startsWith('/') || raw === '*') {
    return { pathAndQuery: parsePathAndQuery(raw) };
  }

  const absolute = ABSOLUTE_RE.exec(raw);
  if (absolute) {
    const [, scheme, authority, rest] = absolute;
    if (!AUTHORITY_RE.test(authority)) {
      throw new InvalidUriError('invalid authority', raw);
    }
    if (rest === '') return { scheme, authority };
    return {
      scheme,
      authority,
      pathAndQuery: parsePathAndQuery(rest.startsWith('?') ? `/${rest}` : rest),
    };
  }

  if (AUTHORITY_RE.test(raw)) return { authority: raw };

  throw new InvalidUriError('unrecognised request target', raw);
}

export function formatUri(uri: Uri): string {
  const paq = uri.pathAndQuery ? formatPathAndQuery(uri.pathAndQuery) : '';
  if (uri.scheme !== undefined && uri.authority !== undefined) {
    return `${uri.scheme}://${uri.authority}${paq}`;
  }
  if (uri.authority !== undefined) return uri.authority;
  return paq;
}

/** Path used for matching. An absolute URI without a path reads as `/`. */
export function uriPath(uri: Uri): string {
  if (uri.pathAndQuery) return uri.pathAndQuery.path;
  return uri.scheme !== undefined ? '/' : '';
}

/** Returns a copy of `uri` whose path-and-query is `raw`, validated as a whole. */
export function withPathAndQuery(uri: Uri, raw: string): Uri {
  const pathAndQuery = parsePathAndQuery(raw);
  if (uri.authority !== undefined && uri.scheme === undefined) {
    throw new InvalidUriError('an authority-form target cannot carry a path', raw);
  }
  return { ...uri, pathAndQuery };
}
