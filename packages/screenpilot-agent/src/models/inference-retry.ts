import { Logger } from '@nestjs/common';
import {
  AgentInterrupt,
  InferenceUnavailableError,
} from '@screenpilot/shared';
import { RetryPolicy } from '../config/agent.config';
import { InferenceRequest, InferenceResult, ModelClient } from './model.types';

const logger = new Logger('InferenceRetry');

/**
 * Delay before retry number `retry` (1-based): base * 2^(retry-1), capped.
 */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  return Math.min(policy.baseDelayMs * 2 ** (retry - 1), policy.maxDelayMs);
}

/**
 * Resolves after `ms`, or rejects with an interrupt as soon as `signal`
 * aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AgentInterrupt());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AgentInterrupt());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settles like `promise`, or rejects with an interrupt once `signal` aborts,
 * even if the call underneath never settles.
 */
export function untilAborted<T>(
  promise: Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AgentInterrupt());
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Calls `client.infer`, retrying only `InferenceUnavailableError`.
 * `policy.attempts` counts the first call; the last failure is rethrown.
 */
export async function inferWithRetry(
  client: ModelClient,
  request: InferenceRequest,
  policy: RetryPolicy,
  signal?: AbortSignal,
): Promise<InferenceResult> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await untilAborted(client.infer(request, signal), signal);
    } catch (error) {
      if (!(error instanceof InferenceUnavailableError) || attempt >= policy.attempts) {
        throw error;
      }
      const delay = backoffDelay(policy, attempt);
      logger.warn(
        `${client.label} unavailable (attempt ${attempt}/${policy.attempts}), retrying in ${delay}ms: ${error.message}`,
      );
      await sleep(delay, signal);
    }
  }
}
