import {
  AgentInterrupt,
  InferenceUnavailableError,
  errorMessage,
} from '@screenpilot/shared';

// inferWithRetry is the only retry loop; the SDKs must not add their own
export const SDK_MAX_RETRIES = 0;

/**
 * Maps an SDK failure to the agent's taxonomy: aborts become an interrupt,
 * everything else is a (retryable) unavailability carrying the HTTP status
 * when the SDK reports one.
 */
export function toInferenceError(
  provider: string,
  error: unknown,
  signal?: AbortSignal,
): Error {
  if (signal?.aborted) {
    return new AgentInterrupt();
  }
  if (error instanceof InferenceUnavailableError) {
    return error;
  }
  const status =
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number'
      ? error.status
      : undefined;
  return new InferenceUnavailableError(
    `${provider} request failed: ${errorMessage(error)}`,
    status,
  );
}
