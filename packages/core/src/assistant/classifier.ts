import { Config } from '@termwise/shared';
import { DEFAULT_RULES, PatternClassifier, extendRuleTable } from '@termwise/safety';

/**
 * Classifier over the built-in rules followed by the rules from the config
 * file. Built-in attention rules still run first.
 */
export function createClassifier(rules: Config['rules']): PatternClassifier {
  if (rules.attention.length === 0 && rules.safe.length === 0) {
    return new PatternClassifier(DEFAULT_RULES);
  }
  return new PatternClassifier(extendRuleTable(DEFAULT_RULES, rules));
}
