import { ExitCode } from '@termwise/shared';
import { SafetyLevel } from './types';

export type VerdictExitCode = typeof ExitCode.Success | typeof ExitCode.Attention;

/**
 * Process exit code for a verdict. Shell integration scripts depend on these
 * values: 0 places the command directly, 10 shows a review warning first.
 */
export function toExitCode(level: SafetyLevel): VerdictExitCode {
  switch (level) {
    case SafetyLevel.Safe:
      return ExitCode.Success;
    case SafetyLevel.Attention:
      return ExitCode.Attention;
  }
}
