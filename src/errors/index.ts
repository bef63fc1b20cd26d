/**
 * Errors Module
 *
 * Every error the loader or its HTTP client raises on its own extends
 * LoaderError and carries a machine-readable code. Errors thrown by axios
 * pass through untouched.
 */

export type ErrorCode = 'INVALID_ARGUMENT' | 'DEPENDENCY_UNAVAILABLE' | 'UPSTREAM_ERROR';

export class LoaderError extends Error {
  code: ErrorCode;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LoaderError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Empty url or unknown mode
 */
export class InvalidArgumentError extends LoaderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('INVALID_ARGUMENT', message, context);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * The crawling service client could not be created
 */
export class DependencyUnavailableError extends LoaderError {
  constructor(message: string, cause?: unknown) {
    super('DEPENDENCY_UNAVAILABLE', message, undefined, { cause });
    this.name = 'DependencyUnavailableError';
  }
}

/**
 * The crawling service answered with `success: false` or an empty body, a
 * job failed, or the client could not make the call at all (no API key, job
 * timeout). Non-2xx responses reach the caller as the axios error instead.
 */
export class FirecrawlApiError extends LoaderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('UPSTREAM_ERROR', message, context);
    this.name = 'FirecrawlApiError';
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
