import { describe, it, expect } from 'vitest';
import { DEFAULT_RULES } from '@termwise/safety';
import { createClassifier } from './classifier';

describe('createClassifier', () => {
  it('uses the built-in table when the config adds no rules', () => {
    const classifier = createClassifier({ attention: [], safe: [] });
    expect(classifier.ruleTable()).toBe(DEFAULT_RULES);
  });

  it('appends configured rules after the built-in ones', () => {
    const classifier = createClassifier({
      attention: [
        { id: 'kubectl-delete', category: 'cluster change', anchor: 'anywhere', pattern: 'kubectl\\s+delete' },
      ],
      safe: [{ id: 'uptime', category: 'system status', anchor: 'command', pattern: 'uptime\\b' }],
    });

    expect(classifier.classify('kubectl delete pod web-1')).toEqual({
      level: 'attention',
      reason: 'cluster change',
      source: 'attention-pattern',
      ruleId: 'kubectl-delete',
    });
    expect(classifier.classify('uptime').reason).toBe('system status');
    expect(classifier.classify('sudo uptime').reason).toBe('privilege escalation');
    expect(classifier.ruleTable().attention.length).toBe(DEFAULT_RULES.attention.length + 1);
  });
});
