import { afterEach, describe, expect, it, vi } from 'vitest';
import { FileLogger } from '../logger.js';

describe('FileLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it('writes timestamped lines to stderr without a log file', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-10-18T12:00:00.000Z'));
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const logger = new FileLogger();
    logger.log('🚀 Starting');

    expect(logger.toFile).toBe(false);
    expect(write).toHaveBeenCalledWith('[2026-10-18T12:00:00.000Z] 🚀 Starting\n');
  });
});
