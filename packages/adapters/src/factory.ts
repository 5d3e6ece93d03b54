import { ProviderType } from '@termwise/shared';
import { ProviderAdapter } from './adapter';
import { FakeAdapter } from './fake/adapter';
import { GeminiAdapter } from './gemini/adapter';
import { OpenAIAdapter } from './openai/adapter';
import { ProviderSettings } from './types';

export interface ProviderSelection extends ProviderSettings {
  provider: ProviderType;
  /** Static answer for the fake provider */
  mockResponse?: string;
}

/**
 * Builds the adapter for the configured provider. HTTP providers throw a
 * ConfigError when no API key is set.
 */
export function createProviderAdapter(selection: ProviderSelection): ProviderAdapter {
  const { provider, mockResponse, ...settings } = selection;
  switch (provider) {
    case 'gemini':
      return new GeminiAdapter(settings);
    case 'openai':
      return new OpenAIAdapter(settings);
    case 'fake':
      return new FakeAdapter({ staticResponse: mockResponse });
  }
}
