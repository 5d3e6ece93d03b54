import OpenAI, { APIConnectionTimeoutError, APIError } from 'openai';
import {
  ChatMessage,
  ConfigError,
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
} from '@termwise/shared';
import { ProviderAdapter } from '../adapter';
import { APIErrorLike, BaseProviderAdapter, ErrorTypeConfig } from '../base-adapter';
import { executeProviderRequest } from '../common';
import { AdapterContext, ProviderSettings } from '../types';

export const OPENAI_DEFAULT_MODEL = 'gpt-4o-mini';

export class OpenAIAdapter extends BaseProviderAdapter implements ProviderAdapter {
  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike => error instanceof APIError,
    isTimeoutError: (error: unknown) => error instanceof APIConnectionTimeoutError,
  };

  private readonly client: OpenAI;
  private readonly modelName: string;

  constructor(settings: ProviderSettings, defaults = { model: OPENAI_DEFAULT_MODEL }) {
    super();
    if (!settings.apiKey) {
      throw new ConfigError(`Missing API key for ${this.id()} provider.`);
    }
    this.modelName = settings.model ?? defaults.model;
    this.client = new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseUrl,
      // retries are handled by executeProviderRequest
      maxRetries: 0,
    });
  }

  id(): string {
    return 'openai';
  }

  model(): string {
    return this.modelName;
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsJsonMode: true,
      requiresApiKey: true,
      latencyClass: 'medium',
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, this.id(), this.modelName, async (signal) => {
      try {
        const completion = await this.client.chat.completions.create(
          {
            model: this.modelName,
            messages: req.messages.map(toMessageParam),
            max_tokens: req.maxTokens,
            temperature: req.temperature ?? 0.2,
            response_format: req.jsonMode ? { type: 'json_object' } : undefined,
          },
          { signal },
        );

        const choice = completion.choices[0];
        const usage = completion.usage
          ? {
              inputTokens: completion.usage.prompt_tokens,
              outputTokens: completion.usage.completion_tokens,
              totalTokens: completion.usage.total_tokens,
            }
          : undefined;

        return {
          text: choice?.message.content ?? undefined,
          usage,
          raw: completion,
        };
      } catch (error) {
        throw this.mapError(error);
      }
    });
  }
}

function toMessageParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
}
