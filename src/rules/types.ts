import type { HeaderEntry } from '../http/headers.js';

export type Target = 'request' | 'response';

export type HeaderEntries = readonly HeaderEntry[];

/** Every present field must hold; an absent field matches anything. */
export interface Selector {
  readonly port?: number;
  /** Prefix of the request path, query excluded. */
  readonly path?: string;
  readonly method?: string;
  /** Inbound request headers; each entry needs one occurrence with exactly that value. */
  readonly headers?: HeaderEntries;
  /** Response rules only. */
  readonly code?: number;
  /** Response rules only. */
  readonly responseHeaders?: HeaderEntries;
}

export interface AppendAction {
  /** Pre-encoded `key=value&...` fragment. */
  readonly queries?: string;
  readonly headers?: HeaderEntries;
}

export interface ReplaceAction {
  readonly path?: string;
  readonly method?: string;
  readonly body?: Buffer;
  readonly code?: number;
  readonly queries?: ReadonlyMap<string, string>;
  readonly headers?: HeaderEntries;
}

export interface Actions {
  readonly abort: boolean;
  /** Milliseconds. */
  readonly delay?: number;
  readonly append?: AppendAction;
  readonly replace?: ReplaceAction;
}

export interface Rule {
  readonly name: string;
  readonly target: Target;
  readonly selector: Selector;
  readonly actions: Actions;
}

export type RuleSet = readonly Rule[];
