import { isAxiosError } from 'axios';
import { RetryPolicy } from '../config/env';
import { NetworkError, ProviderResponseError } from '../errors';
import { logger } from '../logger';

export type Fault = 'retryable' | 'fatal';

export type RetryDecision = { action: 'retry'; delayMs: number } | { action: 'fail' };

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 750 };

const TRANSIENT_CODES = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
]);

function codeOf(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

// DOMExceptions from fetch are not `instanceof Error` in every realm
function nameOf(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('name' in err)) return undefined;
  return typeof err.name === 'string' ? err.name : undefined;
}

export function isAbortError(err: unknown): boolean {
  if (isAxiosError(err)) return err.code === 'ERR_CANCELED';
  const name = nameOf(err);
  return name === 'AbortError' || name === 'CanceledError';
}

/**
 * Transport faults (timeouts, refused or reset connections, DNS lookups) are
 * retryable. Responses with a status, payload problems and cancellation are not.
 */
export function classifyFault(err: unknown): Fault {
  if (isAbortError(err)) return 'fatal';
  if (err instanceof ProviderResponseError) return 'fatal';

  if (isAxiosError(err)) {
    if (err.response) return 'fatal';
    return TRANSIENT_CODES.has(err.code ?? '') ? 'retryable' : 'fatal';
  }

  if (TRANSIENT_CODES.has(codeOf(err) ?? '')) return 'retryable';

  // AbortSignal.timeout() expiring on a fetch
  if (nameOf(err) === 'TimeoutError') return 'retryable';

  // fetch() reports socket faults as a TypeError with the errno on `cause`
  if (err instanceof TypeError && TRANSIENT_CODES.has(codeOf(err.cause) ?? '')) {
    return 'retryable';
  }

  return 'fatal';
}

/** Linear backoff: attempt 1 waits base, attempt 2 waits 2 * base. */
export function decideRetry(policy: RetryPolicy, attempt: number, fault: Fault): RetryDecision {
  if (fault === 'fatal' || attempt >= policy.maxAttempts) {
    return { action: 'fail' };
  }
  return { action: 'retry', delayMs: policy.baseDelayMs * attempt };
}

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new NetworkError('Retry wait aborted', signal.reason));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new NetworkError('Retry wait aborted', signal?.reason));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

export interface RetryOptions {
  policy?: RetryPolicy;
  signal?: AbortSignal;
  sleep?: Sleep;
  /** Included in log lines, e.g. the request URL. */
  label?: string;
}

/**
 * Runs `operation` until it succeeds, fails fatally or the attempt budget is
 * spent. A retryable fault left over after the last attempt becomes a
 * NetworkError; fatal faults propagate unchanged.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (isAbortError(err) || options.signal?.aborted) {
        throw new NetworkError(`Request cancelled: ${options.label ?? 'operation'}`, err);
      }

      const fault = classifyFault(err);
      const decision = decideRetry(policy, attempt, fault);

      if (decision.action === 'fail') {
        if (fault === 'retryable') {
          throw new NetworkError(
            `Gave up after ${attempt} attempt(s): ${options.label ?? 'operation'}`,
            err
          );
        }
        throw err;
      }

      logger.warn(
        { label: options.label, attempt, delayMs: decision.delayMs, code: codeOf(err) },
        'Transient failure, retrying'
      );
      await wait(decision.delayMs, options.signal);
    }
  }
}
