import { randomUUID } from 'crypto';
import { Command } from 'commander';
import { AdapterContext, ProviderAdapter, createProviderAdapter } from '@termwise/adapters';
import { ConfigLoader, requireApiKey } from '@termwise/core';
import { Config, ConsoleLogger, Logger, maskApiKey } from '@termwise/shared';

/** Values of the options declared on the root program. */
export type GlobalOptions = {
  config?: string;
  debug?: boolean;
  provider?: string;
  model?: string;
  apiKey?: string;
  mockResponse?: string;
  mockExitCode?: number;
};

export function loadConfig(command: Command, env: NodeJS.ProcessEnv): Config {
  const options = command.optsWithGlobals<GlobalOptions>();
  return ConfigLoader.load({
    configPath: options.config,
    env,
    flags: {
      provider: options.provider,
      model: options.model,
      apiKey: options.apiKey,
      // only an explicit --debug overrides the file and environment
      debug: options.debug ? true : undefined,
      mockResponse: options.mockResponse,
      mockExitCode: options.mockExitCode,
    },
  });
}

export function createLogger(config: Config): Logger {
  return new ConsoleLogger({ level: config.debug ? 'debug' : 'info' });
}

export function createAdapterContext(
  config: Config,
  logger: Logger,
  abortSignal?: AbortSignal,
): AdapterContext {
  return {
    runId: randomUUID(),
    logger,
    abortSignal,
    timeoutMs: config.timeoutMs,
  };
}

/** Runs `fn` with a signal that aborts on Ctrl-C. */
export async function withInterrupt<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    return await fn(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

/**
 * @throws ConfigError when an HTTP provider has no API key
 */
export async function createProvider(config: Config, logger: Logger): Promise<ProviderAdapter> {
  const apiKey = requireApiKey(config);
  if (apiKey) {
    await logger.debug(`Using ${config.provider} API key: ${maskApiKey(apiKey)}`);
  } else {
    await logger.debug('Using the fake provider');
  }

  const provider = createProviderAdapter({
    provider: config.provider,
    apiKey,
    model: config.model,
    baseUrl: config.baseUrl,
    mockResponse: config.mock.response,
  });
  await logger.debug(`Provider ${provider.id()} with model ${provider.model()}`);
  return provider;
}
