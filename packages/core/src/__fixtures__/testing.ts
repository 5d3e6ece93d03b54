import { Mock, vi } from 'vitest';
import { Logger } from '@termwise/shared';
import { ProviderAdapter } from '@termwise/adapters';

export type TestLogger = Logger & {
  log: Mock;
  debug: Mock;
  info: Mock;
  warn: Mock;
  error: Mock;
};

export function createTestLogger(): TestLogger {
  const logger: TestLogger = {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

export type StubProvider = ProviderAdapter & { generate: Mock };

/** Provider that answers every request with `text`. */
export function stubProvider(text: string | undefined): StubProvider {
  return {
    id: () => 'stub',
    model: () => 'stub-model',
    capabilities: () => ({ supportsJsonMode: true, requiresApiKey: false, latencyClass: 'fast' }),
    generate: vi.fn().mockResolvedValue({ text }),
  };
}
