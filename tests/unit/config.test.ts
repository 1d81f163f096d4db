import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../../src/config.js';

describe('loadConfig', () => {
  it('defaults the log level to info', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'info' });
  });

  it('reads STACKVM_LOG_LEVEL', () => {
    expect(loadConfig({ STACKVM_LOG_LEVEL: 'debug' }).logLevel).toBe('debug');
    expect(loadConfig({ STACKVM_LOG_LEVEL: 'silent' }).logLevel).toBe('silent');
  });

  it('rejects unknown levels', () => {
    expect(() => loadConfig({ STACKVM_LOG_LEVEL: 'loud' })).toThrow(ZodError);
  });
});
