import { describe, it, expect, vi, beforeEach, afterEach, MockInstance } from 'vitest';
import pc from 'picocolors';
import { ConfigError } from '@termwise/shared';
import { createRuleTable } from '@termwise/safety';
import { OutputRenderer } from './renderer';

describe('OutputRenderer', () => {
  const plain = pc.createColors(false);
  let logSpy: MockInstance;
  let errSpy: MockInstance;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const lines = (spy: MockInstance) => spy.mock.calls.map((call) => String(call[0]));

  it('renders a verdict without a rule id', () => {
    new OutputRenderer(false, plain).verdict('git add .', {
      level: 'attention',
      reason: 'external judgment flagged as requiring attention',
      source: 'ai-assessment',
    });

    expect(lines(logSpy)).toEqual([
      'ATTENTION git add .',
      '  Reason: external judgment flagged as requiring attention',
      '  Source: ai-assessment',
    ]);
  });

  it('renders a verdict as JSON', () => {
    new OutputRenderer(true, plain).verdict('ls', {
      level: 'safe',
      reason: 'directory listing',
      source: 'safe-pattern',
      ruleId: 'ls',
    });

    expect(JSON.parse(lines(logSpy)[0])).toEqual({
      command: 'ls',
      level: 'safe',
      reason: 'directory listing',
      source: 'safe-pattern',
      ruleId: 'ls',
      exitCode: 0,
    });
  });

  it('renders rule tables for humans', () => {
    const table = createRuleTable({
      attention: [{ id: 'sudo', category: 'privilege escalation', pattern: '\\bsudo\\b' }],
      safe: [{ id: 'ls', category: 'directory listing', anchor: 'command', pattern: 'ls\\b' }],
    });

    new OutputRenderer(false, plain).rules(table);

    expect(lines(logSpy)).toEqual([
      'Attention rules (1, checked first):',
      `  ${'sudo'.padEnd(24)} ${'privilege escalation'.padEnd(28)} \\bsudo\\b`,
      '\nSafe rules (1):',
      `  ${'ls'.padEnd(24)} ${'directory listing'.padEnd(28)} ^(?:ls\\b)`,
      '\nCommands matching no rule are treated as safe.',
    ]);
  });

  it('strips one trailing newline from text', () => {
    new OutputRenderer(false, plain).text('• a\n  • b\n');
    expect(lines(logSpy)).toEqual(['• a\n  • b']);
  });

  it('writes errors and details to stderr', () => {
    new OutputRenderer(false, plain).error(
      new ConfigError('bad rule', { details: { ruleId: 'x' } }),
    );

    expect(lines(errSpy)).toEqual(['Error: bad rule', '  Details: {\n  "ruleId": "x"\n}']);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('writes notices to stderr', () => {
    new OutputRenderer(false, plain).notice('TIP: hello');
    expect(lines(errSpy)).toEqual(['\nTIP: hello\n']);
  });
});
