export const SafetyLevel = {
  Safe: 'safe',
  Attention: 'attention',
} as const;

export type SafetyLevel = (typeof SafetyLevel)[keyof typeof SafetyLevel];

/** Which layer produced a verdict. */
export type ProvenanceTag =
  | 'attention-pattern'
  | 'safe-pattern'
  | 'default-fallback'
  | 'ai-assessment'
  | 'mock';

export interface ClassificationResult {
  readonly level: SafetyLevel;
  /** Human-readable justification; the rule category for pattern verdicts */
  readonly reason: string;
  readonly source: ProvenanceTag;
  /** Identifier of the rule that fired, for pattern verdicts */
  readonly ruleId?: string;
}

export type RuleAnchor = 'command' | 'anywhere';

export interface Rule {
  readonly id: string;
  readonly category: string;
  readonly level: SafetyLevel;
  readonly anchor: RuleAnchor;
  readonly pattern: RegExp;
}

export interface RuleTable {
  readonly attention: readonly Rule[];
  readonly safe: readonly Rule[];
}

export interface ParsedCommand {
  bin: string;
  args: string[];
  raw: string;
  /**
   * The raw text from the command name onward, with leading `VAR=value`
   * assignments dropped and any directory prefix removed from the command name.
   */
  head: string;
}

export function createResult(
  level: SafetyLevel,
  reason: string,
  source: ProvenanceTag,
  ruleId?: string,
): ClassificationResult {
  const result: ClassificationResult = ruleId
    ? { level, reason, source, ruleId }
    : { level, reason, source };
  return Object.freeze(result);
}
