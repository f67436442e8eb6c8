/**
 * Tests for console log level filtering
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { LogManager, setLogLevel, warn, error } from '../shared/ui/LogManager.js';

describe('LogManager', () => {
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    LogManager.resetInstance();
    consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleSpy.mockRestore();
    LogManager.resetInstance();
  });

  it('should print warnings at the default level', () => {
    warn('2 of 3 input(s) skipped');

    expect(consoleSpy).toHaveBeenCalledTimes(1);
    expect(String(consoleSpy.mock.calls[0]?.[0])).toContain('[WARN] 2 of 3 input(s) skipped');
  });

  it('should drop messages below the configured level', () => {
    setLogLevel('error');

    warn('hidden');
    error('shown');

    expect(consoleSpy).toHaveBeenCalledTimes(1);
    expect(String(consoleSpy.mock.calls[0]?.[0])).toContain('[ERROR] shown');
  });

  it('should compare priorities in debug < info < warn < error order', () => {
    const manager = LogManager.getInstance();
    manager.setLogLevel('info');

    expect(manager.shouldLog('debug')).toBe(false);
    expect(manager.shouldLog('info')).toBe(true);
    expect(manager.shouldLog('error')).toBe(true);
  });
});
