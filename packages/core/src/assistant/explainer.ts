import { z } from 'zod';
import { ResponseFormatError, UsageError, extractJsonObject } from '@termwise/shared';
import { AdapterContext, ProviderAdapter } from '@termwise/adapters';
import { buildExplanationMessages } from './prompts';

const ExplanationSectionSchema = z.object({
  text: z.string(),
  details: z.array(z.string()).default([]),
});

const ExplanationAnswerSchema = z.object({
  explanation: z.array(ExplanationSectionSchema),
});

export type ExplanationSection = z.infer<typeof ExplanationSectionSchema>;

/** `• text` per section, `  • detail` per detail, each line newline-terminated. */
export function formatExplanation(sections: ExplanationSection[]): string {
  let result = '';
  for (const section of sections) {
    result += `• ${section.text}\n`;
    for (const detail of section.details) {
      result += `  • ${detail}\n`;
    }
  }
  return result;
}

export function parseExplanationAnswer(text: string): ExplanationSection[] {
  const parsed = ExplanationAnswerSchema.safeParse(extractJsonObject(text, 'explanation'));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ResponseFormatError(`Unexpected explanation response: ${issues}`);
  }
  return parsed.data.explanation;
}

export const EXPLANATION_MAX_TOKENS = 1024;

export class CommandExplainer {
  constructor(
    private readonly provider: ProviderAdapter,
    private readonly ctx: AdapterContext,
  ) {}

  async explain(command: string): Promise<string> {
    const trimmed = command.trim();
    if (!trimmed) {
      throw new UsageError('Give the command to explain, e.g. `termwise explain ls -la`.');
    }

    const response = await this.provider.generate(
      {
        messages: buildExplanationMessages(trimmed),
        jsonMode: true,
        temperature: 0,
        maxTokens: EXPLANATION_MAX_TOKENS,
        metadata: { task: 'explain', input: trimmed },
      },
      this.ctx,
    );

    if (!response.text?.trim()) {
      throw new ResponseFormatError(`Empty response from ${this.provider.id()}.`);
    }
    await this.ctx.logger.debug(`raw explanation response: ${response.text}`);

    return formatExplanation(parseExplanationAnswer(response.text));
  }
}
