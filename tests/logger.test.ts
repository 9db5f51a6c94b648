import { describe, it, expect, vi, afterEach } from 'vitest';
import { logger, LogLevel, parseLogLevel, formatTime, formatProgress, formatNumber } from '../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    logger.setLevel(LogLevel.NORMAL);
  });

  it('should prefix contextual messages', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    logger.setLevel(LogLevel.NORMAL);

    logger.createContext('cap').normal('Detected 40 total pages');

    expect(log).toHaveBeenCalledWith('[cap] Detected 40 total pages');
  });

  it('should drop messages above the current level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    logger.setLevel(LogLevel.NORMAL);

    logger.createContext('cap').verbose('hidden');
    logger.createContext('cap').debug('hidden');

    expect(log).not.toHaveBeenCalled();
  });

  it('should print job outcomes', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    logger.success('cap', 'written');
    logger.failure('strata', 'HTTP 500');

    expect(log).toHaveBeenCalledWith('✓ cap          written');
    expect(error).toHaveBeenCalledWith('✗ strata       HTTP 500');
  });

  describe('parseLogLevel', () => {
    it('should map names and short forms', () => {
      expect(parseLogLevel('quiet')).toBe(LogLevel.QUIET);
      expect(parseLogLevel('V')).toBe(LogLevel.VERBOSE);
      expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    });

    it('should fall back to normal', () => {
      expect(parseLogLevel(undefined)).toBe(LogLevel.NORMAL);
      expect(parseLogLevel('loud')).toBe(LogLevel.NORMAL);
    });
  });

  describe('format helpers', () => {
    it('should format durations', () => {
      expect(formatTime(850)).toBe('850ms');
      expect(formatTime(12500)).toBe('12.5s');
      expect(formatTime(125000)).toBe('2m 5s');
    });

    it('should format progress', () => {
      expect(formatProgress(18, 40)).toBe('18/40 (45%)');
      expect(formatProgress(0, 0)).toBe('0/0 (100%)');
    });

    it('should separate thousands', () => {
      expect(formatNumber(1234567.5)).toBe('1,234,567.5');
    });
  });
});
