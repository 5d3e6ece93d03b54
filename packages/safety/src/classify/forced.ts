import { ExitCode } from '@termwise/shared';
import { ClassificationResult, SafetyLevel, createResult } from './types';

/**
 * Produces a verdict from a forced exit code, skipping the classifier and the
 * merger. Drives the exit path deterministically in tests and `--mock-exit-code`.
 */
export function classifyWithForcedCode(
  _command: string,
  forcedExitCode: number,
): ClassificationResult {
  switch (forcedExitCode) {
    case ExitCode.Success:
      return createResult(SafetyLevel.Safe, 'forced safe verdict', 'mock');
    case ExitCode.Attention:
      return createResult(SafetyLevel.Attention, 'forced attention verdict', 'mock');
    default:
      return createResult(
        SafetyLevel.Safe,
        `unrecognized forced exit code ${forcedExitCode}`,
        'mock',
      );
  }
}
