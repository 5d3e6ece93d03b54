import { ConfigError, RuleSet, RuleSetSchema, RuleSpec, RuleSpecInput } from '@termwise/shared';
import defaultRuleData from './default-rules.json';
import { Rule, RuleTable, SafetyLevel } from './types';

export function compileRule(spec: RuleSpec, level: SafetyLevel): Rule {
  const source = spec.anchor === 'command' ? `^(?:${spec.pattern})` : spec.pattern;
  let pattern: RegExp;
  try {
    pattern = new RegExp(source);
  } catch (e) {
    throw new ConfigError(`Invalid pattern for rule "${spec.id}": ${spec.pattern}`, {
      cause: e,
      details: { ruleId: spec.id, category: spec.category },
    });
  }
  return Object.freeze({
    id: spec.id,
    category: spec.category,
    level,
    anchor: spec.anchor,
    pattern,
  });
}

/**
 * Validates and compiles a declarative rule set. The returned table and its
 * rules are frozen; order is declaration order.
 */
export function createRuleTable(input: unknown): RuleTable {
  const parsed = RuleSetSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `- ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Rule table validation failed:\n${issues}`);
  }
  return compileRuleSet(parsed.data);
}

function compileRuleSet(ruleSet: RuleSet): RuleTable {
  return Object.freeze({
    attention: Object.freeze(
      ruleSet.attention.map((spec) => compileRule(spec, SafetyLevel.Attention)),
    ),
    safe: Object.freeze(ruleSet.safe.map((spec) => compileRule(spec, SafetyLevel.Safe))),
  });
}

/**
 * Appends extra rules after the base table's rules, keeping the base order.
 */
export function extendRuleTable(
  base: RuleTable,
  extra: { attention?: RuleSpecInput[]; safe?: RuleSpecInput[] },
): RuleTable {
  const additions = createRuleTable(extra);
  return Object.freeze({
    attention: Object.freeze([...base.attention, ...additions.attention]),
    safe: Object.freeze([...base.safe, ...additions.safe]),
  });
}

export function defaultRuleSet(): RuleSet {
  return RuleSetSchema.parse(defaultRuleData);
}

export const DEFAULT_RULES: RuleTable = createRuleTable(defaultRuleData);
