import { InsightsError, RemoteError } from '../errors';

export interface TimedRequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  timeoutMs: number;
  signal?: AbortSignal;
  /** Name used in error messages, e.g. "Confluence" or "OpenAI". */
  service: string;
}

/**
 * `fetch` bounded by a timeout. An expired timer surfaces as a `Timeout`
 * error, a transport failure as a `RemoteError` with status 0, and a
 * caller-side abort is rethrown as-is.
 */
export const fetchWithTimeout = async (url: string, options: TimedRequestOptions): Promise<Response> => {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  let abortListener: (() => void) | null = null;

  if (options.signal) {
    if (options.signal.aborted) {
      clearTimeout(timer);
      throw new Error('Aborted');
    }
    abortListener = () => controller.abort();
    options.signal.addEventListener('abort', abortListener, { once: true });
  }

  try {
    return await fetch(url, {
      method: options.method ?? 'GET',
      headers: options.headers,
      body: options.body,
      signal: controller.signal,
    });
  } catch (error) {
    if (timedOut) {
      throw new InsightsError('Timeout', `${options.service} request timed out after ${options.timeoutMs} ms`, {
        cause: error,
      });
    }
    if (options.signal?.aborted) {
      throw error;
    }
    // No HTTP response at all (DNS, refused connection, reset): status 0.
    const message = error instanceof Error ? error.message : String(error);
    throw new RemoteError(options.service, 0, message);
  } finally {
    clearTimeout(timer);
    if (abortListener && options.signal) {
      options.signal.removeEventListener('abort', abortListener);
    }
  }
};

/** Reads the body of a 2xx response as JSON, or fails with `RemoteError`. */
export const readJsonOrThrow = async (response: Response, service: string): Promise<unknown> => {
  const text = await response.text();
  if (!response.ok) {
    throw new RemoteError(service, response.status, text);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InsightsError('EmptyResponse', `${service} returned a body that is not JSON`, { cause: error });
  }
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Walks a parsed JSON value along object keys and array indices. */
export const pick = (value: unknown, ...path: Array<string | number>): unknown => {
  let current: unknown = value;
  for (const segment of path) {
    if (typeof segment === 'number') {
      if (!Array.isArray(current)) return undefined;
      current = current[segment];
    } else {
      if (!isRecord(current)) return undefined;
      current = current[segment];
    }
  }
  return current;
};
