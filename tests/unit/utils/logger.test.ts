import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write info messages with JSON metadata to stderr', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const log = createLogger({ level: 'info', prefix: 'test' });

    log.info('Analyzing dataset', { rows: 3 });

    expect(write).toHaveBeenCalledWith('[test] INFO: Analyzing dataset {"rows":3}\n');
  });

  it('should suppress messages above the configured level', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = createLogger({ level: 'warn' });

    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');

    expect(write).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[tabscope] WARN:', 'shown', '');
  });

  it('should change level at runtime', () => {
    const log = createLogger({ level: 'error' });
    log.setLevel('debug');
    expect(log.getLevel()).toBe('debug');
  });
});
