export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class DuplicateIdError extends Error {
  constructor(readonly collection: string, readonly ids: string[]) {
    super(`ids already exist in collection "${collection}": ${ids.join(', ')}`);
    this.name = 'DuplicateIdError';
  }
}

/**
 * Failure of an external model backend (generation or embeddings).
 * `status` is the HTTP status the service answers with.
 */
export type GenerationErrorKind = 'auth' | 'quota' | 'timeout' | 'unavailable';

export class GenerationError extends Error {
  constructor(
    readonly kind: GenerationErrorKind,
    message: string,
    readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'GenerationError';
  }
}
