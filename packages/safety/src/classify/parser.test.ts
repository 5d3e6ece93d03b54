import { describe, it, expect } from 'vitest';
import { normalizeBin, parseCommand } from './parser';

describe('parseCommand', () => {
  it('parses simple command', () => {
    expect(parseCommand('ls -la')).toEqual({
      bin: 'ls',
      args: ['-la'],
      raw: 'ls -la',
      head: 'ls -la',
    });
  });

  it('parses command with quotes', () => {
    expect(parseCommand('echo "hello world"')).toEqual({
      bin: 'echo',
      args: ['hello world'],
      raw: 'echo "hello world"',
      head: 'echo "hello world"',
    });
  });

  it('skips leading env assignments', () => {
    expect(parseCommand('A=1 B=2 grep -r TODO')).toEqual({
      bin: 'grep',
      args: ['-r', 'TODO'],
      raw: 'A=1 B=2 grep -r TODO',
      head: 'grep -r TODO',
    });
  });

  it('strips the directory prefix from the command name in head', () => {
    expect(parseCommand('  /usr/bin/ls -la  ').head).toBe('ls -la');
  });

  it('handles empty input', () => {
    expect(parseCommand('')).toEqual({ bin: '', args: [], raw: '', head: '' });
  });

  it('handles only vars', () => {
    expect(parseCommand('A=1')).toEqual({ bin: '', args: [], raw: 'A=1', head: '' });
  });

  it('keeps an empty quoted argument', () => {
    expect(parseCommand("echo ''").args).toEqual(['']);
  });
});

describe('normalizeBin', () => {
  it('returns the last path segment', () => {
    expect(normalizeBin('/bin/rm')).toBe('rm');
    expect(normalizeBin('rm')).toBe('rm');
    expect(normalizeBin('')).toBe('');
  });
});
