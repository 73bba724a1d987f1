import { ConfigService } from '@nestjs/config';
import { errorCodeOf, errorMessage, httpStatusOf, isRecord } from '../common/describe-error';
import { FailureKind, SynthesisTimeoutError } from './generation.errors';

const TRANSIENT_STATUSES = new Set([408, 409, 425, 429]);
const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNABORTED',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'ERR_NETWORK',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);
const TRANSIENT_ERROR_NAMES = new Set(['APIConnectionError', 'APIConnectionTimeoutError']);

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly timeoutMs: number;
  /** Wait before the attempt that follows failed attempt number `attempt` (1-based). */
  delayFor(attempt: number): number;
  classify(error: unknown): FailureKind;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
  timeoutMs: number;
  classify: (error: unknown) => FailureKind;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export const DEFAULT_RETRY_OPTIONS: RetryPolicyOptions = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  factor: 2,
  timeoutMs: 60_000,
  classify: classifySynthesisFailure,
  sleep: abortableSleep,
};

export function createRetryPolicy(overrides: Partial<RetryPolicyOptions> = {}): RetryPolicy {
  const options = { ...DEFAULT_RETRY_OPTIONS, ...overrides };
  if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
    throw new Error(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
  }
  if (!(options.timeoutMs > 0)) {
    throw new Error(`timeoutMs must be positive, got ${options.timeoutMs}`);
  }
  return {
    maxAttempts: options.maxAttempts,
    timeoutMs: options.timeoutMs,
    delayFor: (attempt) => {
      const exponent = Math.max(0, attempt - 1);
      return Math.min(options.maxDelayMs, Math.round(options.baseDelayMs * options.factor ** exponent));
    },
    classify: options.classify,
    sleep: options.sleep,
  };
}

export function retryPolicyFromConfig(configService: ConfigService): RetryPolicy {
  return createRetryPolicy({
    maxAttempts: configService.get<number>('TTS_MAX_ATTEMPTS') ?? DEFAULT_RETRY_OPTIONS.maxAttempts,
    baseDelayMs: configService.get<number>('TTS_RETRY_BASE_DELAY_MS') ?? DEFAULT_RETRY_OPTIONS.baseDelayMs,
    maxDelayMs: configService.get<number>('TTS_RETRY_MAX_DELAY_MS') ?? DEFAULT_RETRY_OPTIONS.maxDelayMs,
    timeoutMs: configService.get<number>('TTS_TIMEOUT_MS') ?? DEFAULT_RETRY_OPTIONS.timeoutMs,
  });
}

/**
 * Rate limits, timeouts, 5xx responses and dropped connections are worth
 * another attempt; everything else (auth, unknown voice, bad request,
 * missing configuration) is not.
 */
export function classifySynthesisFailure(error: unknown): FailureKind {
  if (error instanceof SynthesisTimeoutError) {
    return 'transient';
  }
  const status = httpStatusOf(error);
  if (status !== undefined) {
    return TRANSIENT_STATUSES.has(status) || status >= 500 ? 'transient' : 'permanent';
  }
  const code = errorCodeOf(error);
  if (code && TRANSIENT_CODES.has(code)) {
    return 'transient';
  }
  const name = isRecord(error) ? error['name'] : undefined;
  if (typeof name === 'string' && TRANSIENT_ERROR_NAMES.has(name)) {
    return 'transient';
  }
  const message = errorMessage(error).toLowerCase();
  if (message.includes('socket hang up') || message.includes('timeout') || message.includes('timed out')) {
    return 'transient';
  }
  return 'permanent';
}

/** Resolves after `ms`, or early once `signal` aborts. */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
