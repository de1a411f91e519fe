import { LLMProviders } from '../types.js';
import { DEFAULT_PROVIDER, PROVIDER_SPECS } from './constants.js';
import { ConfigError } from './errors.js';

export interface ResolvedLLMConfig {
  provider: LLMProviders;
  apiKey: string;
  model: string;
}

export function isProvider(value: string): value is LLMProviders {
  return Object.values<string>(LLMProviders).includes(value);
}

/**
 * Fill in provider defaults and look up the API key.
 * An explicit key wins over the provider's environment variable.
 *
 * @throws ConfigError when no API key is available
 */
export function resolveLLMConfig(
  options: { provider?: LLMProviders; apiKey?: string; model?: string },
  env: NodeJS.ProcessEnv = process.env
): ResolvedLLMConfig {
  const provider = options.provider ?? DEFAULT_PROVIDER;
  const spec = PROVIDER_SPECS[provider];

  const apiKey = options.apiKey || env[spec.apiKeyEnv];
  if (!apiKey) {
    throw new ConfigError(
      `API key required. Provide apiKey or set the ${spec.apiKeyEnv} environment variable.`
    );
  }

  return {
    provider,
    apiKey,
    model: options.model || spec.defaultModel,
  };
}
