/**
 * Logger Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';

import { createLogger } from '@/lib/logger.js';

describe('createLogger', () => {
  let output: MockInstance<typeof console.error>;

  beforeEach(() => {
    vi.stubEnv('LOG_LEVEL', 'info');
    output = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  function lastEntry(): Record<string, unknown> {
    const line = output.mock.calls.at(-1)?.[0];
    return typeof line === 'string' ? JSON.parse(line) : {};
  }

  it('should write one JSON line with scope and fields', () => {
    createLogger('transfer').info('File downloaded', { bytes: 12 });

    expect(output).toHaveBeenCalledTimes(1);
    expect(lastEntry()).toMatchObject({
      level: 'info',
      scope: 'transfer',
      msg: 'File downloaded',
      bytes: 12,
    });
  });

  it('should drop entries below LOG_LEVEL', () => {
    const log = createLogger('transfer');

    log.debug('noisy');
    expect(output).not.toHaveBeenCalled();

    vi.stubEnv('LOG_LEVEL', 'silent');
    log.error('quiet');
    expect(output).not.toHaveBeenCalled();
  });

  it('should flatten errors', () => {
    createLogger('transfer').error('Failed', { error: new TypeError('bad input') });

    expect(lastEntry().error).toEqual({ name: 'TypeError', message: 'bad input' });
  });

  it('should nest child scopes', () => {
    createLogger('remote').child('client').warn('slow');

    expect(lastEntry().scope).toBe('remote:client');
  });
});
