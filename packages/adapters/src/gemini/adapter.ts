import { ProviderCapabilities } from '@termwise/shared';
import { OpenAIAdapter } from '../openai/adapter';
import { ProviderSettings } from '../types';

/** Gemini's OpenAI-compatible chat completions endpoint. */
export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';
export const GEMINI_DEFAULT_MODEL = 'gemini-2.5-flash';

/**
 * Talks to Gemini through the openai SDK.
 */
export class GeminiAdapter extends OpenAIAdapter {
  constructor(settings: ProviderSettings) {
    super(
      { ...settings, baseUrl: settings.baseUrl ?? GEMINI_BASE_URL },
      { model: GEMINI_DEFAULT_MODEL },
    );
  }

  id(): string {
    return 'gemini';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsJsonMode: true,
      requiresApiKey: true,
      latencyClass: 'fast',
    };
  }
}
