import { describe, it, expect } from 'vitest';
import { classifyWithForcedCode } from './forced';
import { toExitCode } from './exit-code';

describe('classifyWithForcedCode', () => {
  it('maps 0 to a safe mock verdict', () => {
    expect(classifyWithForcedCode('rm -rf /', 0)).toEqual({
      level: 'safe',
      reason: 'forced safe verdict',
      source: 'mock',
    });
  });

  it('maps the attention sentinel to an attention mock verdict', () => {
    expect(classifyWithForcedCode('ls', 10)).toEqual({
      level: 'attention',
      reason: 'forced attention verdict',
      source: 'mock',
    });
  });

  it('maps any other code to a safe mock verdict', () => {
    expect(classifyWithForcedCode('ls', 3)).toEqual({
      level: 'safe',
      reason: 'unrecognized forced exit code 3',
      source: 'mock',
    });
  });

  it('drives the exit code mapper without consulting the rules', () => {
    expect(toExitCode(classifyWithForcedCode('ls', 10).level)).toBe(10);
    expect(toExitCode(classifyWithForcedCode('sudo rm -rf /', 0).level)).toBe(0);
  });
});
