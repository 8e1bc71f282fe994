/**
 * Unit tests for console sink
 */

import type { Mock } from 'vitest';
import type { TimerAPI } from '$types';
import type { ConsoleAPI } from '../types';
import { createConsoleSink } from './console-sink';

describe('createConsoleSink', () => {
  let mockTimer: TimerAPI & { set: Mock<[number, boolean, () => void], void> };
  let mockConsole: ConsoleAPI & { log: Mock<[string], void>; warn: Mock<[string], void> };
  let timerCallback: (() => void) | null;

  beforeEach(() => {
    timerCallback = null;
    mockTimer = {
      set: vi.fn((_interval: number, _repeat: boolean, callback: () => void) => {
        timerCallback = callback;
      })
    };
    mockConsole = {
      log: vi.fn<[string], void>(),
      warn: vi.fn<[string], void>()
    };
  });

  function tick(): void {
    if (timerCallback) timerCallback();
  }

  describe('write', () => {
    test('should buffer messages without writing immediately', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 10, drainInterval: 100 });

      sink.write('message 1');
      sink.write('message 2');

      expect(sink.getBufferSize()).toBe(2);
      expect(mockConsole.log).not.toHaveBeenCalled();
    });

    test('should drop and warn when buffer is full', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 2, drainInterval: 100 });

      sink.write('message 1');
      sink.write('message 2');
      sink.write('message 3');

      expect(sink.getBufferSize()).toBe(2);
      expect(mockConsole.warn).toHaveBeenCalledWith('Console log buffer overflow, dropping message: message 3');
    });
  });

  describe('initialize', () => {
    test('should start a repeating timer with the drain interval', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 10, drainInterval: 250 });
      const callback = vi.fn();

      sink.initialize(callback);

      expect(mockTimer.set).toHaveBeenCalledWith(250, true, expect.any(Function));
      expect(callback).toHaveBeenCalledWith(true, 'Console sink initialized');
    });

    test('should only start the timer once', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 10, drainInterval: 100 });

      sink.initialize(vi.fn());
      sink.initialize(vi.fn());

      expect(mockTimer.set).toHaveBeenCalledTimes(1);
    });
  });

  describe('drain', () => {
    test('should write all buffered messages in FIFO order on each tick', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 10, drainInterval: 100 });
      sink.initialize(vi.fn());

      sink.write('first');
      sink.write('second');
      tick();

      expect(mockConsole.log.mock.calls).toEqual([['first'], ['second']]);
      expect(sink.getBufferSize()).toBe(0);
    });

    test('should do nothing on a tick with an empty buffer', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 10, drainInterval: 100 });
      sink.initialize(vi.fn());

      tick();

      expect(mockConsole.log).not.toHaveBeenCalled();
    });

    test('should write buffered messages on flush without a timer', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 10, drainInterval: 100 });

      sink.write('pending');
      sink.flush();

      expect(mockConsole.log).toHaveBeenCalledWith('pending');
      expect(mockTimer.set).not.toHaveBeenCalled();
    });
  });
});
