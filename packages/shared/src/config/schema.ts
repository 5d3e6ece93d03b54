import { z } from 'zod';

/**
 * Declarative form of a classification rule. `pattern` is a regular expression
 * source; `anchor: 'command'` tests it only at the first command-like token.
 */
export const RuleSpecSchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  anchor: z.enum(['command', 'anywhere']).default('anywhere'),
  pattern: z.string().min(1),
  description: z.string().optional(),
});

export type RuleSpec = z.infer<typeof RuleSpecSchema>;
export type RuleSpecInput = z.input<typeof RuleSpecSchema>;

export const RuleSetSchema = z.object({
  attention: z.array(RuleSpecSchema).default([]),
  safe: z.array(RuleSpecSchema).default([]),
});

export type RuleSet = z.infer<typeof RuleSetSchema>;

export const ProviderTypeSchema = z.enum(['gemini', 'openai', 'fake']);
export type ProviderType = z.infer<typeof ProviderTypeSchema>;

export const MockConfigSchema = z.object({
  /** Static command (or explanation) returned by the fake provider */
  response: z.string().optional(),
  /** Forces the safety verdict; 0 leaves classification untouched */
  exitCode: z.number().int().default(0),
});

export const ConfigSchema = z.object({
  provider: ProviderTypeSchema.default('gemini'),
  model: z.string().optional(),
  apiKey: z.string().optional(),
  apiKeyEnv: z.string().optional(),
  baseUrl: z.string().url().optional(),
  debug: z.boolean().default(false),
  timeoutMs: z.number().int().positive().default(30_000),
  mock: MockConfigSchema.default({ exitCode: 0 }),
  rules: RuleSetSchema.default({ attention: [], safe: [] }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

/** Environment variable read for the API key of each provider by default. */
export const DEFAULT_API_KEY_ENV: Record<ProviderType, string | undefined> = {
  gemini: 'GEMINI_API_KEY',
  openai: 'OPENAI_API_KEY',
  fake: undefined,
};
