/** Raised when a matched rule asks for the exchange to be dropped. */
export class RuleAbortError extends Error {
  constructor() {
    super('Abort applied');
    this.name = 'RuleAbortError';
  }
}

/** A rewrite produced, or was given, something that is not a valid request target. */
export class InvalidUriError extends Error {
  constructor(
    message: string,
    readonly input: string,
  ) {
    super(`${message}: ${JSON.stringify(input)}`);
    this.name = 'InvalidUriError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly filePath?: string,
  ) {
    super(filePath ? `${filePath}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
