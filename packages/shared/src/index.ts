export * from './types.js';
export * from './config.js';
export * from './logger.js';
export {
  PipelineError,
  TransientError,
  AuthError,
  ContentError,
  CompositionError,
  isTransientError,
  errorFromResponse,
  toPipelineError,
  type ErrorKind,
} from './errors.js';
export { withRetry, isRetryableError, type RetryPolicy } from './retry.js';
