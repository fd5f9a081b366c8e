import { describe, it, expect, vi, afterEach } from 'vitest';
import { consoleLogSink, formatLogLine } from './logging.js';

describe('logging', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should prefix a zero-padded local timestamp', () => {
    const date = new Date(2026, 0, 2, 3, 4, 5, 6);
    expect(formatLogLine('State machine initialized', date)).toBe(
      '[03:04:05.006] State machine initialized'
    );
  });

  it('should keep millisecond precision at the end of the day', () => {
    const date = new Date(2026, 11, 31, 23, 59, 59, 999);
    expect(formatLogLine('tick', date)).toBe('[23:59:59.999] tick');
  });

  it('should write tagged lines to the console', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    consoleLogSink('[03:04:05.006] hello');

    expect(log).toHaveBeenCalledWith('[FSM] [03:04:05.006] hello');
  });
});
