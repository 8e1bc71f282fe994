/**
 * Pub/sub relay transport
 *
 * Reads a relay's "latest message" endpoint. The body is an envelope whose
 * configured field holds the instrument payload, as an object or as JSON text.
 */

import { hasOwn } from '@core/snapshot';
import { fetchTextOrNull } from './http';

import type { PayloadUnwrap } from '@core/snapshot';
import type { RelayTransportConfig, Transport, TransportDependencies } from './types';

/**
 * Build the unwrap step for a relay envelope
 * @param field - Envelope field holding the payload
 * @returns Unwrap returning the field value, undefined when absent (treated as empty)
 */
export function createEnvelopeUnwrap(field: string): PayloadUnwrap {
  return function(decoded) {
    return hasOwn(decoded, field) ? decoded[field] : undefined;
  };
}

/**
 * Create a relay transport
 * @param config - Endpoint URL and envelope field
 * @param deps - Shared transport collaborators
 * @returns Transport with an envelope unwrap step
 */
export function createRelayTransport(config: RelayTransportConfig, deps: TransportDependencies): Transport {
  async function fetchLatest(): Promise<string | null> {
    return fetchTextOrNull('relay', deps.fetchFn, deps.logger, config.url, {
      timeoutMs: deps.timeoutMs,
      headers: {
        'Accept': 'application/json',
        'User-Agent': deps.userAgent
      }
    });
  }

  return {
    name: 'relay',
    fetchLatest: fetchLatest,
    unwrap: createEnvelopeUnwrap(config.envelopeField)
  };
}
