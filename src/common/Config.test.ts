import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, RunMode, resolveConfig } from './Config';

describe('resolveConfig', () => {
  it('fills in defaults', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    expect(resolveConfig({ mode: RunMode.FREQUENCY }).httpPort).toBe(3000);
  });

  it('accepts port 0 for an ephemeral port', () => {
    expect(resolveConfig({ httpPort: 0 }).httpPort).toBe(0);
  });

  it('validates numbers', () => {
    expect(() => resolveConfig({ httpPort: 1.5 })).toThrowError('httpPort must be an integer >= 0');
    expect(() => resolveConfig({ minWordLength: -1 })).toThrowError(
      'minWordLength must be an integer >= 0'
    );
  });
});
