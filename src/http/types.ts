import type { HeaderList, ReadonlyHeaders } from './headers.js';
import type { Uri } from './uri.js';

export interface ProxyRequest {
  method: string;
  uri: Uri;
  headers: HeaderList;
  body: Buffer;
}

export interface ProxyResponse {
  status: number;
  headers: HeaderList;
  body: Buffer;
}

/**
 * The inbound request as it was before any request rule touched it.
 * Response selectors are evaluated against this, never against the
 * forwarded request.
 */
export interface RequestContext {
  readonly port: number;
  readonly uri: Uri;
  readonly method: string;
  readonly headers: ReadonlyHeaders;
}
