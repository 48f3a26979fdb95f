// Error taxonomy for a collection run

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * The video platform (or the network in front of it) could not serve a request.
 * Aborts the run before anything is written.
 */
export class UpstreamUnavailableError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'UpstreamUnavailableError';
  }
}

export class RateLimitedError extends UpstreamUnavailableError {
  constructor(message: string, status?: number) {
    super(message, status);
    this.name = 'RateLimitedError';
  }
}

/**
 * A single thumbnail could not be downloaded. Recorded per item, never fatal.
 */
export class PartialDownloadFailure extends Error {
  constructor(public readonly videoId: string, message: string) {
    super(message);
    this.name = 'PartialDownloadFailure';
  }
}

export class StorageWriteError extends Error {
  constructor(message: string, public readonly path?: string) {
    super(message);
    this.name = 'StorageWriteError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function readStatus(error: object): number | undefined {
  for (const key of ['status', 'code'] as const) {
    if (key in error) {
      const value: unknown = Reflect.get(error, key);
      const status = typeof value === 'string' ? parseInt(value, 10) : value;
      if (typeof status === 'number' && Number.isFinite(status)) {
        return status;
      }
    }
  }

  if ('response' in error) {
    const response: unknown = Reflect.get(error, 'response');
    if (typeof response === 'object' && response !== null) {
      return readStatus(response);
    }
  }

  return undefined;
}

/**
 * Map an error thrown by the API client to the run-level taxonomy.
 * 429, and 403 responses that mention quota or rate limits, mean we are rate limited.
 */
export function classifyUpstreamError(error: unknown, context: string): UpstreamUnavailableError {
  if (error instanceof UpstreamUnavailableError) {
    return error;
  }

  const message = errorMessage(error);
  const status = typeof error === 'object' && error !== null ? readStatus(error) : undefined;
  const mentionsQuota = /quota|rate ?limit/i.test(message);

  if (status === 429 || (status === 403 && mentionsQuota)) {
    return new RateLimitedError(`${context}: ${message}`, status);
  }

  return new UpstreamUnavailableError(`${context}: ${message}`, status);
}
