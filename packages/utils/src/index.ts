export {
  createApiMethodExtractor,
  elapsedMilliseconds,
  elapsedSeconds,
  getHttpStatusCodeClass,
  getSlowRequestDurationBucket,
} from './metrics';
export { normalizeError, sanitizeError } from './normalize-error';
export {
  type BatchLogger,
  type BatchProcessorOptions,
  processInBatches,
} from './process-in-batches';
export { isRedacted, Redacted, redactedOrUndefined } from './redacted';
export {
  type BackoffOptions,
  computeBackoffDelayMs,
  type RetryAttemptInfo,
  type RetryWithBackoffOptions,
  retryWithBackoff,
} from './retry-with-backoff';
export {
  createSmeared,
  isSmearingActive,
  LogsDiagnosticDataPolicy,
  Smeared,
  smear,
  smearPath,
} from './smeared';
