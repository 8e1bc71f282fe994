/**
 * HTTP helpers shared by the transports
 */

import { TransportError } from '$types/errors';

import type { FetchFn } from '$types';
import type { Logger } from '@logging';
import type { FetchTextOptions } from './types';

/**
 * Whether an error came from an aborted request
 * @param err - Caught value
 * @returns True for AbortError
 */
function isAbortError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'AbortError';
}

/**
 * GET a URL and return its body as text
 *
 * The timeout covers both the response headers and the body.
 *
 * @param fetchFn - Fetch implementation
 * @param url - Absolute URL
 * @param options - Timeout and extra headers
 * @returns Response body
 * @throws {TransportError} On timeout, network failure or a non-2xx status
 */
export async function fetchText(fetchFn: FetchFn, url: string, options: FetchTextOptions): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(function() {
    controller.abort();
  }, options.timeoutMs);

  try {
    const response = await fetchFn(url, {
      method: 'GET',
      headers: options.headers,
      signal: controller.signal
    });

    if (!response.ok) {
      throw new TransportError('HTTP ' + response.status + ' ' + response.statusText, response.status);
    }

    return await response.text();
  } catch (err) {
    if (err instanceof TransportError) throw err;
    if (isAbortError(err)) {
      throw new TransportError('Request timeout after ' + options.timeoutMs + 'ms');
    }
    throw new TransportError('Network error: ' + (err instanceof Error ? err.message : String(err)));
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * GET a URL, mapping every transport failure to null
 *
 * HTTP errors are logged at WARNING; timeouts and network errors at INFO,
 * since they are routine on a flaky link.
 *
 * @param name - Transport name for log lines
 * @param fetchFn - Fetch implementation
 * @param logger - Logger
 * @param url - Absolute URL
 * @param options - Timeout and extra headers
 * @returns Response body, or null on failure
 */
export async function fetchTextOrNull(
  name: string,
  fetchFn: FetchFn,
  logger: Logger,
  url: string,
  options: FetchTextOptions
): Promise<string | null> {
  try {
    return await fetchText(fetchFn, url, options);
  } catch (err) {
    if (err instanceof TransportError && err.status !== undefined) {
      logger.warning(name + ' fetch failed: ' + err.message);
    } else {
      logger.info(name + ' fetch failed: ' + (err instanceof Error ? err.message : String(err)));
    }
    return null;
  }
}
