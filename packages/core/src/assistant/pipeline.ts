import { AdapterContext, ProviderAdapter } from '@termwise/adapters';
import {
  ClassificationResult,
  PatternClassifier,
  VerdictExitCode,
  assess,
  classifyWithForcedCode,
  toExitCode,
} from '@termwise/safety';
import { CommandGenerator } from './generator';

export interface GenerationResult {
  command: string;
  verdict: ClassificationResult;
  exitCode: VerdictExitCode;
  /** The model's explanation of the command */
  reasoning: string;
}

export interface GenerationOptions {
  provider: ProviderAdapter;
  classifier: PatternClassifier;
  ctx: AdapterContext;
  /** Non-zero values replace classification with the forced verdict */
  forcedExitCode?: number;
}

/**
 * Query to command to verdict. The pattern verdict is merged with the model's
 * rating, which can only raise it.
 */
export async function runGeneration(
  query: string,
  options: GenerationOptions,
): Promise<GenerationResult> {
  const { provider, classifier, ctx, forcedExitCode = 0 } = options;
  const generated = await new CommandGenerator(provider, ctx).generate(query);

  const verdict =
    forcedExitCode !== 0
      ? classifyWithForcedCode(generated.command, forcedExitCode)
      : assess(classifier, generated.command, generated.modelOpinion);
  const exitCode = toExitCode(verdict.level);

  await ctx.logger.log({
    type: 'SafetyVerdictReached',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: ctx.runId,
    payload: {
      command: generated.command,
      level: verdict.level,
      reason: verdict.reason,
      source: verdict.source,
      exitCode,
    },
  });

  return {
    command: generated.command,
    verdict,
    exitCode,
    reasoning: generated.explanation,
  };
}
