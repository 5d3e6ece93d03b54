import { parseCommand } from './parser';
import { DEFAULT_RULES } from './rules';
import { ClassificationResult, Rule, RuleTable, SafetyLevel, createResult } from './types';

export const NO_RULE_MATCHED = 'no rule matched';

function matches(rule: Rule, raw: string, head: string): boolean {
  return rule.anchor === 'command' ? rule.pattern.test(head) : rule.pattern.test(raw);
}

/**
 * Rule-table driven safety verdict for a single command string.
 *
 * Attention rules are evaluated before safe rules and the first match wins, so a
 * command that matches both is always flagged. Commands matching neither list
 * fall back to `safe`; see DESIGN.md for why that default is kept.
 */
export class PatternClassifier {
  constructor(private readonly rules: RuleTable = DEFAULT_RULES) {}

  classify(command: string): ClassificationResult {
    const { head } = parseCommand(command);

    for (const rule of this.rules.attention) {
      if (matches(rule, command, head)) {
        return createResult(SafetyLevel.Attention, rule.category, 'attention-pattern', rule.id);
      }
    }

    for (const rule of this.rules.safe) {
      if (matches(rule, command, head)) {
        return createResult(SafetyLevel.Safe, rule.category, 'safe-pattern', rule.id);
      }
    }

    return createResult(SafetyLevel.Safe, NO_RULE_MATCHED, 'default-fallback');
  }

  ruleTable(): RuleTable {
    return this.rules;
  }
}

const defaultClassifier = new PatternClassifier();

/** Classifies with the built-in rule table. */
export function classify(command: string): ClassificationResult {
  return defaultClassifier.classify(command);
}
