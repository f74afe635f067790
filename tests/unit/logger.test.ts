import { describe, test, expect, jest, afterEach } from '@jest/globals';
import { createConsoleLogger } from '../../src/logger/index.js';

describe('createConsoleLogger()', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should prefix the level and serialize metadata', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});

    createConsoleLogger().warn('Skipping archive', { archive: 'Archive_3' });

    expect(warn).toHaveBeenCalledWith('[WARN] Skipping archive', '{"archive":"Archive_3"}');
  });

  test('should print an empty string when there is no metadata', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => {});

    createConsoleLogger().info('Starting harvest');

    expect(log).toHaveBeenCalledWith('[INFO] Starting harvest', '');
  });

  test('should drop debug lines unless verbose', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => {});

    createConsoleLogger(false).debug('quiet');
    createConsoleLogger(true).debug('loud');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('[DEBUG] loud', '');
  });
});
