import { describe, it, expect } from 'vitest';
import { ConfigLoader, name, renderInitScript, runGeneration } from './index';

describe('core package', () => {
  it('exports name', () => {
    expect(name).toBe('@termwise/core');
  });

  it('exports the services', () => {
    expect(typeof ConfigLoader.load).toBe('function');
    expect(typeof renderInitScript).toBe('function');
    expect(typeof runGeneration).toBe('function');
  });
});
