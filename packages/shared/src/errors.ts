import { isRetryableError } from './retry.js';

export type ErrorKind = 'transient' | 'auth' | 'content' | 'composition';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

/** Network, timeout, rate limit or 5xx. Eligible for bounded retry. */
export class TransientError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'transient', options);
    this.name = 'TransientError';
  }
}

/** Invalid or missing credentials. Never retried. */
export class AuthError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'auth', options);
    this.name = 'AuthError';
  }
}

/** The collaborator rejected its input. Never retried, triggers fallback. */
export class ContentError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'content', options);
    this.name = 'ContentError';
  }
}

/** Media assembly failed. Fatal for the run. */
export class CompositionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'composition', options);
    this.name = 'CompositionError';
  }
}

export function isTransientError(err: unknown): boolean {
  return err instanceof TransientError;
}

/** Map an HTTP failure onto the error taxonomy */
export function errorFromResponse(status: number, body: string, label: string): PipelineError {
  const message = `${label} error ${status}: ${body}`;
  if (status === 401 || status === 403) return new AuthError(message);
  if (status === 408 || status === 429 || status >= 500) return new TransientError(message);
  return new ContentError(message);
}

/** Classify an arbitrary thrown value. Already-classified errors pass through. */
export function toPipelineError(err: unknown): PipelineError {
  if (err instanceof PipelineError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const lower = message.toLowerCase();

  if (
    lower.includes('401') ||
    lower.includes('403') ||
    lower.includes('unauthorized') ||
    lower.includes('forbidden') ||
    lower.includes('api key')
  ) {
    return new AuthError(message, { cause: err });
  }
  if (isRetryableError(err) || lower.includes('timed out') || lower.includes('timeout')) {
    return new TransientError(message, { cause: err });
  }
  return new ContentError(message, { cause: err });
}
