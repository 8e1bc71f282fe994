/**
 * Tests for the pub/sub relay transport
 */

import { parseSnapshot } from '@core/snapshot';
import type { FetchFn } from '$types';
import type { LogLevel } from '@logging';
import { createEnvelopeUnwrap, createRelayTransport } from './relay';

function createMockLogger() {
  return {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warning: vi.fn(),
    critical: vi.fn(),
    setLevel: vi.fn(),
    getLevel: vi.fn((): LogLevel => 1),
    initialize: vi.fn(),
    flush: vi.fn()
  };
}

describe('createEnvelopeUnwrap', () => {
  const unwrap = createEnvelopeUnwrap('message');

  it('should return the envelope field', () => {
    expect(unwrap({ message: '{"a":1}', id: 'x' })).toBe('{"a":1}');
    expect(unwrap({ message: { a: 1 } })).toEqual({ a: 1 });
  });

  it('should return undefined when the field is missing', () => {
    expect(unwrap({ id: 'x' })).toBeUndefined();
  });
});

describe('createRelayTransport', () => {
  it('should fetch the endpoint and expose the envelope unwrap', async () => {
    const envelope = '{"id":"m1","message":"{\\"timestamp\\":1700000000,\\"beamline.magnet.readbackA\\":12.5}"}';
    const fetchFn = vi.fn<Parameters<FetchFn>, ReturnType<FetchFn>>(async () => new Response(envelope));
    const transport = createRelayTransport(
      { url: 'https://relay.example.test/latest', envelopeField: 'message' },
      { fetchFn: fetchFn, logger: createMockLogger(), clock: () => 0, timeoutMs: 5000, userAgent: 'test-agent' }
    );

    const body = await transport.fetchLatest();
    const result = parseSnapshot(body, transport.unwrap);

    expect(fetchFn).toHaveBeenCalledWith('https://relay.example.test/latest', expect.objectContaining({
      headers: { 'Accept': 'application/json', 'User-Agent': 'test-agent' }
    }));
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.snapshot.resolvedInstant).toBe(1700000000);
      expect(result.snapshot.tags.get('beamline.magnet.readbackA')).toBe(12.5);
    }
  });

  it('should treat an envelope without the field as empty', async () => {
    const fetchFn = vi.fn<Parameters<FetchFn>, ReturnType<FetchFn>>(async () => new Response('{"id":"m1"}'));
    const transport = createRelayTransport(
      { url: 'https://relay.example.test/latest', envelopeField: 'message' },
      { fetchFn: fetchFn, logger: createMockLogger(), clock: () => 0, timeoutMs: 5000, userAgent: 'test-agent' }
    );

    const result = parseSnapshot(await transport.fetchLatest(), transport.unwrap);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.name).toBe('EmptyPayloadError');
    }
  });
});
