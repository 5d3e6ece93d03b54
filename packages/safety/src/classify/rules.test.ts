import { describe, it, expect } from 'vitest';
import { ConfigError } from '@termwise/shared';
import { PatternClassifier } from './classifier';
import { DEFAULT_RULES, createRuleTable, defaultRuleSet, extendRuleTable } from './rules';

const infraRules = {
  attention: [
    {
      id: 'terraform-destroy',
      category: 'infrastructure teardown',
      pattern: '\\bterraform\\s+destroy\\b',
    },
  ],
  safe: [
    {
      id: 'terraform-plan',
      category: 'infrastructure preview',
      anchor: 'command' as const,
      pattern: 'terraform\\s+plan\\b',
    },
  ],
};

describe('default rule table', () => {
  it('evaluates privilege escalation first', () => {
    expect(DEFAULT_RULES.attention[0]).toMatchObject({
      id: 'sudo',
      category: 'privilege escalation',
      level: 'attention',
      anchor: 'anywhere',
    });
  });

  it('anchors every safe rule at the command name', () => {
    expect(DEFAULT_RULES.safe.every((rule) => rule.anchor === 'command')).toBe(true);
    expect(DEFAULT_RULES.safe.every((rule) => rule.level === 'safe')).toBe(true);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(DEFAULT_RULES)).toBe(true);
    expect(Object.isFrozen(DEFAULT_RULES.attention)).toBe(true);
    expect(Object.isFrozen(DEFAULT_RULES.attention[0])).toBe(true);
  });

  it('exposes the declarative form for inspection', () => {
    const ruleSet = defaultRuleSet();
    expect(ruleSet.attention.map((r) => r.id)).toEqual(DEFAULT_RULES.attention.map((r) => r.id));
    expect(ruleSet.safe[0]).toEqual({
      id: 'ls',
      category: 'directory listing',
      anchor: 'command',
      pattern: 'ls\\b',
    });
  });
});

describe('createRuleTable', () => {
  it('builds a classifier from custom rules without touching matching logic', () => {
    const classifier = new PatternClassifier(createRuleTable(infraRules));

    expect(classifier.classify('terraform destroy -auto-approve')).toEqual({
      level: 'attention',
      reason: 'infrastructure teardown',
      source: 'attention-pattern',
      ruleId: 'terraform-destroy',
    });
    expect(classifier.classify('terraform plan')).toEqual({
      level: 'safe',
      reason: 'infrastructure preview',
      source: 'safe-pattern',
      ruleId: 'terraform-plan',
    });
    expect(classifier.classify('sudo ls').source).toBe('default-fallback');
  });

  it('compiles command-anchored patterns against the start of the command', () => {
    const table = createRuleTable(infraRules);
    expect(table.safe[0].pattern.source).toBe('^(?:terraform\\s+plan\\b)');
    expect(table.attention[0].pattern.source).toBe('\\bterraform\\s+destroy\\b');
  });

  it('rejects an invalid regular expression', () => {
    const input = { attention: [{ id: 'broken', category: 'x', pattern: '(' }] };
    expect(() => createRuleTable(input)).toThrow(ConfigError);
    expect(() => createRuleTable(input)).toThrow('Invalid pattern for rule "broken": (');
  });

  it('rejects rules that fail validation', () => {
    expect(() => createRuleTable({ safe: [{ id: '', category: 'x', pattern: 'ls' }] })).toThrow(
      /Rule table validation failed:\n- safe\.0\.id:/,
    );
  });
});

describe('extendRuleTable', () => {
  it('appends custom rules after the defaults', () => {
    const table = extendRuleTable(DEFAULT_RULES, infraRules);

    expect(table.attention).toHaveLength(DEFAULT_RULES.attention.length + 1);
    expect(table.attention[table.attention.length - 1].id).toBe('terraform-destroy');
    expect(table.safe[table.safe.length - 1].id).toBe('terraform-plan');
  });

  it('lets a default attention rule win over an appended safe rule', () => {
    const table = extendRuleTable(DEFAULT_RULES, {
      safe: [{ id: 'sudo-ok', category: 'trusted', anchor: 'command', pattern: 'sudo\\b' }],
    });

    expect(new PatternClassifier(table).classify('sudo ls').source).toBe('attention-pattern');
  });
});
