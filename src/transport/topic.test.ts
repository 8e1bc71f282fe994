/**
 * Tests for the notification topic transport
 */

import { parseSnapshot } from '@core/snapshot';
import type { FetchFn } from '$types';
import type { LogLevel } from '@logging';
import { createTopicTransport, selectLatestMessage, topicPollUrl } from './topic';

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

const OPEN = '{"id":"o1","time":1700000000,"event":"open","topic":"beam-7"}';
const FIRST = '{"id":"m1","time":1700000001,"event":"message","topic":"beam-7","message":"{\\"timestamp\\":1700000001,\\"n\\":1}"}';
const KEEPALIVE = '{"id":"k1","time":1700000002,"event":"keepalive","topic":"beam-7"}';
const SECOND = '{"id":"m2","time":1700000003,"event":"message","topic":"beam-7","message":"{\\"timestamp\\":1700000003,\\"n\\":2}"}';

describe('topicPollUrl', () => {
  it('should build the poll URL', () => {
    expect(topicPollUrl('https://ntfy.example.test/', 'beam-7'))
      .toBe('https://ntfy.example.test/beam-7/json?poll=1&since=latest');
  });
});

describe('selectLatestMessage', () => {
  it('should pick the last message event', () => {
    const body = [OPEN, FIRST, KEEPALIVE, SECOND, KEEPALIVE, ''].join('\n');

    expect(selectLatestMessage(body)).toBe(SECOND);
  });

  it('should skip lines that are not JSON', () => {
    expect(selectLatestMessage(FIRST + '\nnot json\n')).toBe(FIRST);
  });

  it('should return null without a message event', () => {
    expect(selectLatestMessage(OPEN + '\n' + KEEPALIVE)).toBeNull();
    expect(selectLatestMessage('')).toBeNull();
  });
});

describe('createTopicTransport', () => {
  it('should poll the topic and unwrap the message body', async () => {
    const fetchFn = vi.fn<Parameters<FetchFn>, ReturnType<FetchFn>>(async () => new Response(FIRST + '\n' + SECOND + '\n'));
    const transport = createTopicTransport(
      { server: 'https://ntfy.example.test', topic: 'beam-7' },
      { fetchFn: fetchFn, logger: createMockLogger(), clock: () => 0, timeoutMs: 5000, userAgent: 'test-agent' }
    );

    const result = parseSnapshot(await transport.fetchLatest(), transport.unwrap);

    expect(fetchFn.mock.calls[0][0]).toBe('https://ntfy.example.test/beam-7/json?poll=1&since=latest');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.snapshot.resolvedInstant).toBe(1700000003);
      expect(result.snapshot.tags.get('n')).toBe(2);
    }
  });

  it('should resolve null and log at DEBUG when the topic has no message', async () => {
    const logger = createMockLogger();
    const fetchFn = vi.fn<Parameters<FetchFn>, ReturnType<FetchFn>>(async () => new Response(OPEN + '\n'));
    const transport = createTopicTransport(
      { server: 'https://ntfy.example.test', topic: 'beam-7' },
      { fetchFn: fetchFn, logger: logger, clock: () => 0, timeoutMs: 5000, userAgent: 'test-agent' }
    );

    await expect(transport.fetchLatest()).resolves.toBeNull();
    expect(logger.debug).toHaveBeenCalledWith('topic beam-7 has no message yet');
  });
});
