/**
 * Raw file transport
 *
 * Polls a raw file URL (e.g. a gist's raw view). Such hosts sit behind
 * CDN caches, so every request carries a fresh "t" query parameter and
 * Cache-Control: no-cache.
 */

import { fetchTextOrNull } from './http';

import type { GistTransportConfig, Transport, TransportDependencies } from './types';

/**
 * Add the cache-busting query parameter, keeping any existing query
 * @param url - Raw file URL
 * @param nowMs - Current time in milliseconds
 * @returns URL with t=<nowMs>
 */
export function cacheBustedUrl(url: string, nowMs: number): string {
  const target = new URL(url);
  target.searchParams.set('t', String(Math.floor(nowMs)));
  return target.toString();
}

/**
 * Create a raw file transport
 * @param config - Raw file URL
 * @param deps - Shared transport collaborators
 * @returns Transport whose payload is the response body
 */
export function createGistTransport(config: GistTransportConfig, deps: TransportDependencies): Transport {
  async function fetchLatest(): Promise<string | null> {
    return fetchTextOrNull('gist', deps.fetchFn, deps.logger, cacheBustedUrl(config.url, deps.clock() * 1000), {
      timeoutMs: deps.timeoutMs,
      headers: {
        'Cache-Control': 'no-cache',
        'User-Agent': deps.userAgent
      }
    });
  }

  return {
    name: 'gist',
    fetchLatest: fetchLatest
  };
}
