import { PatternClassifier } from './classifier';
import { ClassificationResult, SafetyLevel, createResult } from './types';

export const EXTERNAL_JUDGMENT_REASON = 'external judgment flagged as requiring attention';

/**
 * Upgrade-only fusion of the pattern verdict with the model's opinion. A pattern
 * `attention` verdict is returned as is; a model `attention` opinion raises a
 * `safe` pattern verdict; nothing lowers a verdict.
 */
export function merge(
  pattern: ClassificationResult,
  modelOpinion: SafetyLevel,
): ClassificationResult {
  if (pattern.level === SafetyLevel.Attention) {
    return pattern;
  }
  if (modelOpinion === SafetyLevel.Attention) {
    return createResult(SafetyLevel.Attention, EXTERNAL_JUDGMENT_REASON, 'ai-assessment');
  }
  return pattern;
}

/**
 * Classifies `command` and, when a model opinion is available, merges it in.
 * Without an opinion the pattern verdict is final.
 */
export function assess(
  classifier: PatternClassifier,
  command: string,
  modelOpinion?: SafetyLevel,
): ClassificationResult {
  const pattern = classifier.classify(command);
  return modelOpinion === undefined ? pattern : merge(pattern, modelOpinion);
}
