import { z } from 'zod';
import type { HeaderEntry } from '../http/headers.js';
import { parsePathAndQuery } from '../http/uri.js';
import { ConfigError, errorMessage } from '../errors.js';
import type { Actions, Rule, RuleSet, Selector, Target } from '../rules/types.js';
import { parseDuration } from './duration.js';

export const DEFAULT_LISTEN_PORT = 58080;

// RFC 7230 token, used for both method names and header names
const TOKEN_RE = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const HEADER_VALUE_RE = /^[^\r\n\x00]*$/;

const portSchema = z.number().int().min(0).max(65535);
const statusSchema = z.number().int().min(100).max(999);
const methodSchema = z.string().regex(TOKEN_RE, 'invalid HTTP method');

const headerValueSchema = z.string().regex(HEADER_VALUE_RE, 'header values must not contain CR, LF or NUL');

const headersSchema = z
  .record(z.string().regex(TOKEN_RE, 'invalid header name'), z.union([headerValueSchema, z.array(headerValueSchema)]))
  .transform((record): HeaderEntry[] =>
    Object.entries(record).flatMap(([name, value]) =>
      (typeof value === 'string' ? [value] : value).map((v): HeaderEntry => [name, v]),
    ),
  );

const durationSchema = z.union([
  z.number().nonnegative().finite(),
  z.string().transform((value, ctx) => {
    const ms = parseDuration(value);
    if (ms === undefined || !Number.isFinite(ms)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid duration "${value}"` });
      return z.NEVER;
    }
    return ms;
  }),
  z
    .object({ secs: z.number().int().nonnegative(), nanos: z.number().int().nonnegative().default(0) })
    .transform(({ secs, nanos }) => secs * 1000 + nanos / 1e6),
]);

const selectorPathSchema = z.string().transform((value, ctx) => {
  try {
    return parsePathAndQuery(value).path;
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(err) });
    return z.NEVER;
  }
});

const targetSchema = z
  .enum(['Request', 'Response', 'request', 'response'])
  .transform((value): Target => (value.toLowerCase() === 'request' ? 'request' : 'response'));

const selectorSchema = z.object({
  port: portSchema.nullish(),
  path: selectorPathSchema.nullish(),
  method: methodSchema.nullish(),
  headers: headersSchema.nullish(),
  code: statusSchema.nullish(),
  response_headers: headersSchema.nullish(),
});

const actionsSchema = z.object({
  abort: z.boolean().nullish(),
  delay: durationSchema.nullish(),
  append: z
    .object({
      queries: z.string().nullish(),
      headers: headersSchema.nullish(),
    })
    .nullish(),
  replace: z
    .object({
      path: z.string().nullish(),
      method: methodSchema.nullish(),
      body: z.string().nullish(),
      code: statusSchema.nullish(),
      queries: z.record(z.string(), z.string()).nullish(),
      headers: headersSchema.nullish(),
    })
    .nullish(),
});

const ruleSchema = z.object({
  name: z.string().min(1).nullish(),
  target: targetSchema,
  selector: selectorSchema.nullish(),
  actions: actionsSchema.nullish(),
});

export const rawConfigSchema = z.object({
  listen_port: portSchema.nullish(),
  proxy_ports: z.array(portSchema).nullish(),
  rules: z.array(ruleSchema).nullish(),
});

export type RawConfig = z.input<typeof rawConfigSchema>;
type ParsedRule = z.output<typeof ruleSchema>;

export interface Config {
  readonly listenPort: number;
  /** Destination ports whose traffic goes through the rules; empty means every port. */
  readonly proxyPorts: readonly number[];
  readonly rules: RuleSet;
}

function toSelector(raw: ParsedRule['selector']): Selector {
  return {
    port: raw?.port ?? undefined,
    path: raw?.path ?? undefined,
    method: raw?.method ?? undefined,
    headers: raw?.headers ?? undefined,
    code: raw?.code ?? undefined,
    responseHeaders: raw?.response_headers ?? undefined,
  };
}

function toActions(raw: ParsedRule['actions']): Actions {
  const append = raw?.append;
  const replace = raw?.replace;
  return {
    abort: raw?.abort ?? false,
    delay: raw?.delay ?? undefined,
    append: append
      ? { queries: append.queries ?? undefined, headers: append.headers ?? undefined }
      : undefined,
    replace: replace
      ? {
          path: replace.path ?? undefined,
          method: replace.method ?? undefined,
          body: typeof replace.body === 'string' ? Buffer.from(replace.body, 'utf8') : undefined,
          code: replace.code ?? undefined,
          queries: replace.queries ? new Map(Object.entries(replace.queries)) : undefined,
          headers: replace.headers ?? undefined,
        }
      : undefined,
  };
}

function toRule(raw: ParsedRule, index: number): Rule {
  return Object.freeze({
    name: raw.name ?? `rule-${index}`,
    target: raw.target,
    selector: toSelector(raw.selector),
    actions: toActions(raw.actions),
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Validates a decoded config document and turns it into an immutable rule snapshot. */
export function parseConfig(input: unknown, filePath?: string): Config {
  const result = rawConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), filePath);
  }

  const raw = result.data;
  return Object.freeze({
    listenPort: raw.listen_port ?? DEFAULT_LISTEN_PORT,
    proxyPorts: Object.freeze([...(raw.proxy_ports ?? [])]),
    rules: Object.freeze((raw.rules ?? []).map(toRule)),
  });
}
