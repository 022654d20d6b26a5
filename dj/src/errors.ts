import { logger } from '@autodj/logger';

export type DjErrorCode =
  | 'PARSE_FAILURE'
  | 'NOT_FOUND'
  | 'REPEAT_REJECTED'
  | 'UPSTREAM_UNAVAILABLE'
  | 'PERSISTENCE_FAILURE';

export class DjError extends Error {
  constructor(
    message: string,
    public readonly code: DjErrorCode,
    public readonly isRetryable: boolean = false,
  ) {
    super(message);
    this.name = 'DjError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/** The recommendation response could not be read as track candidates. */
export class ParseFailure extends DjError {
  constructor(message: string, public readonly raw?: string) {
    super(message, 'PARSE_FAILURE', true);
    this.name = 'ParseFailure';
  }
}

export class TrackNotFound extends DjError {
  constructor(public readonly title: string, public readonly artist: string) {
    super(`No catalog match for "${title}" by ${artist}`, 'NOT_FOUND', true);
    this.name = 'TrackNotFound';
  }
}

export class RepeatRejected extends DjError {
  constructor(public readonly title: string, public readonly artist: string) {
    super(`"${title}" by ${artist} was played or queued recently`, 'REPEAT_REJECTED', true);
    this.name = 'RepeatRejected';
  }
}

export type UpstreamService = 'spotify' | 'recommendation' | 'lastfm' | 'lyrics';

/** Network or auth failure of a remote collaborator. */
export class UpstreamUnavailable extends DjError {
  constructor(
    message: string,
    public readonly service: UpstreamService,
    public readonly status?: number,
  ) {
    // Auth and client errors will not clear up by retrying.
    super(message, 'UPSTREAM_UNAVAILABLE', status === undefined || status === 429 || status >= 500);
    this.name = 'UpstreamUnavailable';
  }
}

export class PersistenceFailure extends DjError {
  constructor(message: string, public readonly file: string) {
    super(message, 'PERSISTENCE_FAILURE', false);
    this.name = 'PersistenceFailure';
  }
}

export function describeError(error: unknown): { name: string; message: string; code?: string } {
  if (error instanceof DjError) {
    return { name: error.name, message: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Unknown', message: String(error) };
}

/**
 * Retry wrapper for operations that might fail temporarily
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  maxAttempts: number = 3,
  delay: number = 1000,
  context?: string,
): Promise<T> {
  let lastError: Error = new Error('Unknown error');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === maxAttempts) {
        logger.error({ error: describeError(lastError), context, attempt, maxAttempts }, 'Operation failed after all retry attempts');
        break;
      }

      if (error instanceof DjError && !error.isRetryable) {
        logger.warn({ error: error.message, context, attempt }, 'Non-retryable error, stopping retry attempts');
        break;
      }

      logger.warn({ error: lastError.message, context, attempt, maxAttempts, delay }, 'Operation failed, retrying');
      await new Promise((resolve) => setTimeout(resolve, delay * attempt));
    }
  }

  throw lastError;
}
