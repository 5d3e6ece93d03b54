import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { Config, ConfigError, ConfigSchema, DEFAULT_API_KEY_ENV } from '@termwise/shared';

/** Values taken from global CLI options. Unset options are `undefined`. */
export interface ConfigFlags {
  provider?: string;
  model?: string;
  apiKey?: string;
  debug?: boolean;
  mockResponse?: string;
  mockExitCode?: number;
}

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: ConfigFlags;
  env?: NodeJS.ProcessEnv;
}

type ConfigLayer = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  return undefined;
}

/**
 * `$XDG_CONFIG_HOME/termwise/config.yaml`, or `~/.config/termwise/config.yaml`.
 */
export function userConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const base = nonEmpty(env.XDG_CONFIG_HOME) ?? path.join(os.homedir(), '.config');
  return path.join(base, 'termwise', 'config.yaml');
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigLayer {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      parsed = yaml.load(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
    const output: ConfigLayer = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static envLayer(env: NodeJS.ProcessEnv): ConfigLayer {
    return {
      provider: nonEmpty(env.TERMWISE_PROVIDER),
      model: nonEmpty(env.TERMWISE_MODEL),
      debug: parseBoolean(env.TERMWISE_DEBUG),
    };
  }

  static flagLayer(flags: ConfigFlags): ConfigLayer {
    return {
      provider: flags.provider,
      model: flags.model,
      apiKey: flags.apiKey,
      debug: flags.debug,
      mock: { response: flags.mockResponse, exitCode: flags.mockExitCode },
    };
  }

  /**
   * Merges, lowest to highest: user file < --config file < environment < flags,
   * then validates. The API key is taken from the flag, then from the provider's
   * environment variable, then from the files.
   */
  static load(options: ConfigOptions = {}): Config {
    const env = options.env ?? process.env;
    const flags = options.flags ?? {};

    const userConfig = this.loadYaml(userConfigPath(env));

    let explicitConfig: ConfigLayer = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, this.envLayer(env));
    merged = this.mergeConfigs(merged, this.flagLayer(flags));

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    const config = result.data;
    // A static mock response always answers through the fake provider
    const provider = config.mock.response ? 'fake' : config.provider;
    const keyEnv = config.apiKeyEnv ?? DEFAULT_API_KEY_ENV[provider];
    const envKey = keyEnv ? nonEmpty(env[keyEnv]) : undefined;

    return {
      ...config,
      provider,
      apiKey: nonEmpty(flags.apiKey) ?? envKey ?? nonEmpty(config.apiKey),
    };
  }
}

/**
 * Returns the API key for HTTP providers, or `undefined` for the fake provider.
 *
 * @throws ConfigError listing every place a key can be set
 */
export function requireApiKey(config: Config): string | undefined {
  if (config.provider === 'fake') {
    return undefined;
  }
  if (config.apiKey) {
    return config.apiKey;
  }
  const envName = config.apiKeyEnv ?? DEFAULT_API_KEY_ENV[config.provider] ?? 'an API key variable';
  throw new ConfigError(
    `${config.provider} API key is required. Set it via (in priority order):\n` +
      `  - CLI flag: --api-key\n` +
      `  - Environment variable: ${envName}\n` +
      `  - Config file: ~/.config/termwise/config.yaml (apiKey)`,
  );
}
