/**
 * Error taxonomy for the bridge.
 *
 * Structural failures (catalog unreachable, template absent, clone failed)
 * propagate to the tool boundary. `DegradedFetchError` is raised by
 * enrichment fetches and always caught where it is raised.
 */

export type BridgeErrorCode =
  | 'REMOTE_SERVICE'
  | 'TEMPLATE_NOT_FOUND'
  | 'CLONE_FAILED'
  | 'DEGRADED_FETCH'
  | 'CONFIG_INVALID';

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;

  constructor(code: BridgeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BridgeError';
    this.code = code;
  }
}

/**
 * Non-success or timeout from the hosting API's catalog call
 */
export class RemoteServiceError extends BridgeError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super('REMOTE_SERVICE', message, { cause: options.cause });
    this.name = 'RemoteServiceError';
    this.status = options.status;
  }
}

export class TemplateNotFoundError extends BridgeError {
  constructor(message: string) {
    super('TEMPLATE_NOT_FOUND', message);
    this.name = 'TemplateNotFoundError';
  }
}

export class CloneError extends BridgeError {
  readonly repository: string;

  constructor(repository: string, message: string, options?: { cause?: unknown }) {
    super('CLONE_FAILED', message, options);
    this.name = 'CloneError';
    this.repository = repository;
  }
}

/**
 * README or branch lookup failed; callers replace the value with an empty one
 */
export class DegradedFetchError extends BridgeError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super('DEGRADED_FETCH', message, { cause: options.cause });
    this.name = 'DegradedFetchError';
    this.status = options.status;
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
    this.name = 'ConfigError';
  }
}

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HTTP status carried by an error thrown from an HTTP client, if any
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}
