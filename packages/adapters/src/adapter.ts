import { ModelRequest, ModelResponse, ProviderCapabilities } from '@termwise/shared';
import { AdapterContext } from './types';

/**
 * Interface for LLM provider adapters.
 * Adapters give the assistant services one way to reach Gemini, OpenAI or the
 * offline fake provider.
 *
 * @example
 * ```typescript
 * class MyAdapter implements ProviderAdapter {
 *   id() { return 'my-adapter'; }
 *   capabilities() { return { supportsJsonMode: true, requiresApiKey: false, latencyClass: 'fast' }; }
 *   async generate(req, ctx) { return { text: '{"command":"ls"}' }; }
 * }
 * ```
 */
export interface ProviderAdapter {
  /** Unique identifier for this adapter instance. */
  id(): string;
  /** Model name requests are sent to. */
  model(): string;
  capabilities(): ProviderCapabilities;
  /**
   * Generate a response from the model.
   * @param req - The model request containing messages and options
   * @param ctx - The adapter context with logger, abort signal, etc.
   */
  generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse>;
}
