import { describe, it, expect } from 'vitest';
import { name, classify, toExitCode, merge, SafetyLevel } from './index';

describe('safety package', () => {
  it('exports name', () => {
    expect(name).toBe('@termwise/safety');
  });

  it('covers the end-to-end verdict path', () => {
    expect(toExitCode(merge(classify('sudo apt install vim'), SafetyLevel.Safe).level)).toBe(10);
    expect(toExitCode(merge(classify('ls -la /home/user'), SafetyLevel.Safe).level)).toBe(0);
  });
});
