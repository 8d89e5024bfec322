import { InsightsError, RemoteError, isInsightsError } from '../../errors';
import { fetchWithTimeout, readJsonOrThrow } from '../../utils/http';

export const requireSetting = (value: string | undefined, message: string): string => {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new InsightsError('MisconfiguredProvider', message);
  }
  return trimmed;
};

export const requireText = (value: unknown, service: string): string => {
  if (typeof value !== 'string' || !value.trim()) {
    throw new InsightsError('EmptyResponse', `No response generated from ${service}`);
  }
  return value;
};

export interface PostJsonOptions {
  service: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
}

export const postJson = async (url: string, body: unknown, options: PostJsonOptions): Promise<unknown> => {
  const response = await fetchWithTimeout(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...options.headers },
    body: JSON.stringify(body),
    timeoutMs: options.timeoutMs,
    signal: options.signal,
    service: options.service,
  });
  return readJsonOrThrow(response, options.service);
};

/** Error classes a vendor SDK throws; the timeout and abort classes extend the API one. */
export interface SdkErrorClasses {
  apiError: abstract new (...args: never[]) => Error & { readonly status: number | undefined };
  timeoutError: abstract new (...args: never[]) => Error;
  userAbortError: abstract new (...args: never[]) => Error;
}

/**
 * Maps an SDK failure onto the service's error kinds: the SDK's own deadline
 * to `Timeout`, an HTTP answer to `RemoteError` with its status, no answer at
 * all to status 0. A caller abort passes through unchanged.
 */
export const fromSdkError = (error: unknown, service: string, timeoutMs: number, classes: SdkErrorClasses): unknown => {
  if (error instanceof classes.timeoutError) {
    return new InsightsError('Timeout', `${service} request timed out after ${timeoutMs} ms`, { cause: error });
  }
  if (error instanceof classes.userAbortError || isInsightsError(error)) {
    return error;
  }
  if (error instanceof classes.apiError) {
    return new RemoteError(service, error.status ?? 0, error.message);
  }
  return new RemoteError(service, 0, error instanceof Error ? error.message : String(error));
};

export const trimTrailingSlash = (url: string): string => url.replace(/\/+$/, '');
