/**
 * A message in a conversation with an LLM provider.
 */
export interface ChatMessage {
  /** The role of the message sender */
  role: 'system' | 'user' | 'assistant';
  /** The text content of the message */
  content: string;
}

/**
 * What a request asks the model to do. Providers that answer without a model
 * (the fake provider) dispatch on it.
 */
export type ModelTask = 'generate' | 'explain';

/**
 * Request payload for generating a model response.
 *
 * @example
 * ```typescript
 * const request: ModelRequest = {
 *   messages: [{ role: 'user', content: 'list files' }],
 *   jsonMode: true,
 *   metadata: { task: 'generate', input: 'list files' },
 * };
 * ```
 */
export interface ModelRequest {
  /** Conversation history to send to the model */
  messages: ChatMessage[];
  /** Maximum tokens to generate in the response */
  maxTokens?: number;
  /** Sampling temperature (0-2, higher = more random) */
  temperature?: number;
  /** Request JSON-formatted output */
  jsonMode?: boolean;
  /** The task and its raw input (query or command) */
  metadata?: {
    task: ModelTask;
    input: string;
  };
}

/**
 * Token usage statistics from a model response.
 */
export interface Usage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

/**
 * Response from a model generation request.
 */
export interface ModelResponse {
  /** Generated text content */
  text?: string;
  /** Token usage statistics */
  usage?: Usage;
  /** Raw provider-specific response data */
  raw?: unknown;
}

/**
 * Describes the capabilities of an LLM provider adapter.
 */
export interface ProviderCapabilities {
  /** Whether the provider supports JSON mode output */
  supportsJsonMode: boolean;
  /** Whether an API key must be configured */
  requiresApiKey: boolean;
  /** Expected response latency classification */
  latencyClass: 'fast' | 'medium' | 'slow';
}
