import {
  TransientError,
  isTransientError,
  toPipelineError,
  withRetry,
  type Logger,
  type PipelineError,
  type RetryPolicy,
  type StageName,
} from '@topicreel/shared';

/** Runs one collaborator call for a stage: bounded retry on transient errors,
 * an optional timeout, and a single fallback attempt path. */

export type StageResult<T> =
  | { status: 'success'; payload: T }
  | { status: 'fallback_used'; payload: T; reason: string }
  | { status: 'failed'; error: PipelineError };

export type StageStatus = StageResult<unknown>['status'];

export type StageCall<I, T> = (input: I, signal: AbortSignal) => Promise<T>;

export interface StageRunnerOptions {
  /** Extra attempts after the first, transient errors only */
  maxRetries: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  /** Per-attempt timeout; 0 or undefined disables it */
  timeoutMs?: number;
}

export class StageRunner {
  constructor(
    private logger: Logger,
    private options: StageRunnerOptions,
  ) {}

  async run<I, T>(
    stage: StageName,
    primary: StageCall<I, T>,
    fallback: StageCall<I, T> | undefined,
    input: I,
    signal?: AbortSignal,
  ): Promise<StageResult<T>> {
    let primaryError: PipelineError;
    try {
      const payload = await this.attempt(stage, 'primary', primary, input, signal);
      this.logger.debug({ stage, path: 'primary' }, 'Stage succeeded');
      return { status: 'success', payload };
    } catch (err) {
      primaryError = toPipelineError(err);
    }

    if (!fallback || signal?.aborted) {
      this.logger.warn({ stage, path: 'failed', kind: primaryError.kind, error: primaryError.message }, 'Stage failed');
      return { status: 'failed', error: primaryError };
    }

    this.logger.warn({ stage, path: 'fallback', reason: primaryError.message }, 'Primary failed, trying fallback');
    try {
      const payload = await this.attempt(stage, 'fallback', fallback, input, signal);
      this.logger.info({ stage, path: 'fallback' }, 'Stage succeeded with fallback');
      return { status: 'fallback_used', payload, reason: primaryError.message };
    } catch (err) {
      const error = toPipelineError(err);
      this.logger.warn({ stage, path: 'failed', kind: error.kind, error: error.message }, 'Fallback failed');
      return { status: 'failed', error };
    }
  }

  retryPolicy(signal?: AbortSignal): RetryPolicy {
    return {
      maxAttempts: this.options.maxRetries + 1,
      initialDelayMs: this.options.initialDelayMs ?? 1000,
      maxDelayMs: this.options.maxDelayMs ?? 30_000,
      backoffMultiplier: 2,
      retryOn: (err) => isTransientError(toPipelineError(err)),
      signal,
    };
  }

  private attempt<I, T>(
    stage: StageName,
    path: 'primary' | 'fallback',
    call: StageCall<I, T>,
    input: I,
    signal?: AbortSignal,
  ): Promise<T> {
    return withRetry(
      () => callWithTimeout(call, input, `${stage} ${path}`, this.options.timeoutMs, signal),
      this.logger,
      `${stage}:${path}`,
      this.retryPolicy(signal),
    );
  }
}

/** Invoke a call with a signal that follows the parent and fires on timeout. */
export async function callWithTimeout<I, T>(
  call: StageCall<I, T>,
  input: I,
  label: string,
  timeoutMs?: number,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) {
    throw toPipelineError(parent.reason ?? new Error(`${label} cancelled`));
  }

  const controller = new AbortController();
  const onAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    const pending: Promise<T>[] = [call(input, controller.signal)];
    if (timeoutMs && timeoutMs > 0) {
      pending.push(
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => {
            const error = new TransientError(`${label} timed out after ${timeoutMs}ms`);
            controller.abort(error);
            reject(error);
          }, timeoutMs);
        }),
      );
    }
    return await Promise.race(pending);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onAbort);
  }
}
