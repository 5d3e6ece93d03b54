import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConfigError, ConsoleLogger } from '@termwise/shared';
import { GeminiAdapter } from './adapter';

const { mockCreate, constructorOptions } = vi.hoisted(() => {
  const constructorOptions: unknown[] = [];
  return { mockCreate: vi.fn(), constructorOptions };
});

vi.mock('openai', () => {
  return {
    default: class MockOpenAI {
      chat = {
        completions: {
          create: mockCreate,
        },
      };
      constructor(options: unknown) {
        constructorOptions.push(options);
      }
    },
    APIError: class extends Error {},
    APIConnectionTimeoutError: class extends Error {},
  };
});

describe('GeminiAdapter', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    constructorOptions.length = 0;
  });

  it('targets the OpenAI-compatible Gemini endpoint by default', () => {
    const adapter = new GeminiAdapter({ apiKey: 'test-key' });

    expect(adapter.id()).toBe('gemini');
    expect(adapter.model()).toBe('gemini-2.5-flash');
    expect(constructorOptions[0]).toEqual({
      apiKey: 'test-key',
      baseURL: 'https://generativelanguage.googleapis.com/v1beta/openai/',
      maxRetries: 0,
    });
  });

  it('honours an explicit model and base URL', () => {
    const adapter = new GeminiAdapter({
      apiKey: 'test-key',
      model: 'gemini-2.5-pro',
      baseUrl: 'http://localhost:8080/',
    });

    expect(adapter.model()).toBe('gemini-2.5-pro');
    expect(constructorOptions[0]).toEqual({
      apiKey: 'test-key',
      baseURL: 'http://localhost:8080/',
      maxRetries: 0,
    });
  });

  it('names itself in the missing key error', () => {
    expect(() => new GeminiAdapter({})).toThrow(ConfigError);
    expect(() => new GeminiAdapter({})).toThrow('Missing API key for gemini provider.');
  });

  it('sends chat completions with the Gemini model', async () => {
    mockCreate.mockResolvedValue({ choices: [{ message: { content: '{"command":"ls"}' } }] });
    const adapter = new GeminiAdapter({ apiKey: 'test-key' });

    const result = await adapter.generate(
      { messages: [{ role: 'user', content: 'list files' }], jsonMode: true },
      { runId: 'run', logger: new ConsoleLogger({ level: 'error' }) },
    );

    expect(result.text).toBe('{"command":"ls"}');
    expect(mockCreate).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'gemini-2.5-flash' }),
      expect.anything(),
    );
  });
});
