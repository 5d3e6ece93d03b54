import { z } from 'zod';
import { ResponseFormatError, UsageError, extractJsonObject } from '@termwise/shared';
import { AdapterContext, ProviderAdapter } from '@termwise/adapters';
import { SafetyLevel } from '@termwise/safety';
import { buildGenerationMessages } from './prompts';

const GenerationAnswerSchema = z.object({
  command: z.string(),
  safety: z.unknown().optional(),
  explanation: z.string().optional(),
});

export interface GeneratedCommand {
  command: string;
  /** The model's own rating; anything other than SAFE counts as attention */
  modelOpinion: SafetyLevel;
  explanation: string;
}

export function toModelOpinion(value: unknown): SafetyLevel {
  return typeof value === 'string' && value.trim().toUpperCase() === 'SAFE'
    ? SafetyLevel.Safe
    : SafetyLevel.Attention;
}

/**
 * Parses a generation answer: `{ command, safety, explanation }`, optionally
 * wrapped in a Markdown fence.
 *
 * @throws ResponseFormatError for non-JSON answers, a missing or empty command
 */
export function parseGenerationAnswer(text: string): GeneratedCommand {
  const parsed = GenerationAnswerSchema.safeParse(extractJsonObject(text, 'generation'));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ResponseFormatError(`Unexpected generation response: ${issues}`);
  }

  const command = parsed.data.command.trim();
  if (!command) {
    throw new ResponseFormatError('The model returned an empty command.');
  }

  return {
    command,
    modelOpinion: toModelOpinion(parsed.data.safety),
    explanation: parsed.data.explanation ?? '',
  };
}

/** Upper bound on the answer size; a command plus a one-line explanation. */
export const GENERATION_MAX_TOKENS = 512;

export class CommandGenerator {
  constructor(
    private readonly provider: ProviderAdapter,
    private readonly ctx: AdapterContext,
  ) {}

  async generate(query: string): Promise<GeneratedCommand> {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new UsageError('Describe the command you want, e.g. `termwise generate list all files`.');
    }

    const response = await this.provider.generate(
      {
        messages: buildGenerationMessages(trimmed),
        jsonMode: true,
        temperature: 0,
        maxTokens: GENERATION_MAX_TOKENS,
        metadata: { task: 'generate', input: trimmed },
      },
      this.ctx,
    );

    if (!response.text?.trim()) {
      throw new ResponseFormatError(`Empty response from ${this.provider.id()}.`);
    }
    await this.ctx.logger.debug(`raw generation response: ${response.text}`);

    return parseGenerationAnswer(response.text);
  }
}
