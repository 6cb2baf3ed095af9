import { describe, it, expect, vi, afterEach } from 'vitest';
import { LOG_PREFIX, createConsoleLogger } from '../logger.js';

describe('console logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints info lines to stdout as is', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    createConsoleLogger().info('JSON written to polynomial.json');
    expect(log).toHaveBeenCalledWith('JSON written to polynomial.json');
  });

  it('drops debug lines unless debug is on', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    createConsoleLogger().debug('stage start');
    expect(debug).not.toHaveBeenCalled();

    createConsoleLogger({ debug: true }).debug('stage read', { path: '/tmp/p.json' });
    expect(debug).toHaveBeenCalledWith(LOG_PREFIX, 'stage read', { path: '/tmp/p.json' });
    expect(LOG_PREFIX).toBe('[rootpack]');
  });

  it('sends errors to stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createConsoleLogger().error('failed', { code: 'IO_ERROR' });
    expect(error).toHaveBeenCalledWith('failed', { code: 'IO_ERROR' });
  });
});
